import { describe, test, expect, afterEach, vi } from "vitest";
import { isLogLevel, log, setLogLevel } from "../../../src/logging/logger.ts";

function lastJson(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const call = spy.mock.calls.at(-1);
  return JSON.parse(String(call?.[0]));
}

describe("logging/logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("writes info entries as one JSON line on stdout", () => {
    setLogLevel("info");
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});

    log.info("Parser", "Parsed", { path: "/books/a.epub", items_count: 3 });

    const entry = lastJson(stdout);
    expect(entry.level).toBe("info");
    expect(entry.tag).toBe("Parser");
    expect(entry.msg).toBe("Parsed");
    expect(entry.path).toBe("/books/a.epub");
    expect(entry.items_count).toBe(3);
    expect(typeof entry.ts).toBe("string");
  });

  test("skips entries below the current level", () => {
    setLogLevel("info");
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});

    log.debug("Parser", "noise");

    expect(stdout).not.toHaveBeenCalled();
  });

  test("writes errors to stderr with the error message", () => {
    setLogLevel("error");
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    log.error("Parser", "Failed", new Error("boom"), { code: "TOC" });

    const entry = lastJson(stderr);
    expect(entry.level).toBe("error");
    expect(entry.error).toBe("boom");
    expect(entry.code).toBe("TOC");
  });

  test("isLogLevel accepts only known levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
