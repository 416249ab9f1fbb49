/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test so that vi.stubEnv() calls
 * made at file level or inside a test are picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep pino quiet unless a test run asks for logs explicitly.
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
