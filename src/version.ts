import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageVersion = z.object({ version: z.string() });

function readVersion(relativePath: string): string | null {
  try {
    const raw: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(relativePath, import.meta.url)), 'utf-8'));
    const parsed = PackageVersion.safeParse(raw);
    return parsed.success ? parsed.data.version : null;
  } catch {
    return null;
  }
}

/**
 * Service version, read from package.json unless SERVICE_VERSION is set.
 * Resolved relative to this file: src/ in dev, dist/src/ once built.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ?? readVersion('../package.json') ?? readVersion('../../package.json') ?? '0.0.0';
