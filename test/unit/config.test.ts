import { describe, test, expect, afterEach, vi } from "vitest";
import { DEFAULT_EXTRACT_PATH, loadConfig } from "../../src/config.ts";
import { setLogLevel } from "../../src/logging/logger.ts";

describe("loadConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ extractPath: DEFAULT_EXTRACT_PATH, logLevel: "info" });
  });

  test("reads the extract directory and log level", () => {
    expect(loadConfig({ LOG_LEVEL: "debug", EPUB_EXTRACT_DIR: "/srv/extract" })).toEqual({
      extractPath: "/srv/extract",
      logLevel: "debug",
    });
  });

  test("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/root", EPUB_EXTRACT_DIR: "/x" }).extractPath).toBe("/x");
  });

  test("falls back to defaults and warns on an invalid value", () => {
    setLogLevel("warn");
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(loadConfig({ LOG_LEVEL: "loud", EPUB_EXTRACT_DIR: "/x" })).toEqual({
      extractPath: DEFAULT_EXTRACT_PATH,
      logLevel: "info",
    });
    expect(stderr).toHaveBeenCalledTimes(1);
  });
});
