/**
 * Run Context
 *
 * Progress, live fix counters and step failures for one auto-fix run.
 * Passed explicitly to the orchestrator; there is no ambient run state.
 */

export interface FixCounters {
  materials: number;
  drivers: number;
  modifiers: number;
  transforms: number;
  geometry: number;
  rigging: number;
}

export interface ProgressUpdate {
  percentage: number;
  message: string;
  counters: FixCounters;
}

export interface StepFailure {
  objectName: string;
  step: string;
  message: string;
}

export const PROGRESS_MILESTONES = {
  init: { percentage: 0, message: "Initializing..." },
  scanning: { percentage: 5, message: "Scanning objects..." },
  fixing: { percentage: 10, message: "Running auto-fixes..." },
  rescanning: { percentage: 80, message: "Re-scanning for remaining issues..." },
  updating: { percentage: 90, message: "Updating results..." },
  complete: { percentage: 100, message: "Complete!" },
} as const;

export type ProgressMilestone = keyof typeof PROGRESS_MILESTONES;

export function emptyCounters(): FixCounters {
  return { materials: 0, drivers: 0, modifiers: 0, transforms: 0, geometry: 0, rigging: 0 };
}

export class RunContext {
  isProcessing = false;
  percentage = 0;
  message = "";
  counters: FixCounters = emptyCounters();
  readonly failures: StepFailure[] = [];
  readonly history: ProgressUpdate[] = [];

  constructor(private readonly onProgress?: (update: ProgressUpdate) => void) {}

  /** Reset state and report the initial milestone */
  begin(): void {
    this.isProcessing = true;
    this.counters = emptyCounters();
    this.failures.length = 0;
    this.history.length = 0;
    this.advance("init");
  }

  advance(milestone: ProgressMilestone): void {
    const { percentage, message } = PROGRESS_MILESTONES[milestone];
    this.percentage = percentage;
    this.message = message;
    this.publish();
  }

  setCounters(counters: FixCounters): void {
    this.counters = { ...counters };
  }

  recordFailure(failure: StepFailure): void {
    this.failures.push(failure);
  }

  /** Always called on exit, success or not */
  finish(): void {
    this.isProcessing = false;
  }

  private publish(): void {
    const update: ProgressUpdate = {
      percentage: this.percentage,
      message: this.message,
      counters: { ...this.counters },
    };
    this.history.push(update);
    this.onProgress?.(update);
  }
}
