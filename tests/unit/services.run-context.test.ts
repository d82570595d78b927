import { describe, it, expect, vi } from "vitest";
import { RunContext } from "../../src/services/run-context.js";

describe("RunContext", () => {
  it("publishes each milestone with a counters snapshot", () => {
    const onProgress = vi.fn();
    const ctx = new RunContext(onProgress);

    ctx.begin();
    ctx.setCounters({ materials: 1, drivers: 0, modifiers: 0, transforms: 2, geometry: 0, rigging: 0 });
    ctx.advance("rescanning");

    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith({
      percentage: 80,
      message: "Re-scanning for remaining issues...",
      counters: { materials: 1, drivers: 0, modifiers: 0, transforms: 2, geometry: 0, rigging: 0 },
    });
    expect(ctx.history[0].counters.transforms).toBe(0);
  });

  it("resets state on begin and clears the processing flag on finish", () => {
    const ctx = new RunContext();
    ctx.recordFailure({ objectName: "Cube", step: "uvs", message: "unwrap failed" });

    ctx.begin();
    expect(ctx.isProcessing).toBe(true);
    expect(ctx.failures).toEqual([]);
    expect(ctx.percentage).toBe(0);

    ctx.finish();
    expect(ctx.isProcessing).toBe(false);
  });
});
