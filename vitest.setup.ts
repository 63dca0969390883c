/**
 * Vitest setup file.
 *
 * Library code logs through `console` with a "[footfall]" prefix. Tests that
 * exercise fallback paths would otherwise flood the reporter, so the default
 * console logger is muted unless FOOTFALL_TEST_LOGS=1 is set.
 */
import { afterEach, beforeEach, vi } from "vitest";

const showLogs = process.env["FOOTFALL_TEST_LOGS"] === "1";

beforeEach(() => {
  if (!showLogs) {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  }
});

afterEach(() => {
  vi.restoreAllMocks();
});
