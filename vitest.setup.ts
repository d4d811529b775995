/**
 * Vitest Global Setup
 *
 * Resets the config cache so tests can use vi.stubEnv() to set environment
 * variables that the config module picks up on next access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
