/**
 * Vitest Global Setup
 *
 * Resets the config cache so tests can use vi.stubEnv() before the first
 * config read in a file or test.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
