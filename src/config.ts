import { Schema } from "@effect/schema";
import { Either } from "effect";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { log } from "./logging/logger.ts";
import type { LogLevel } from "./logging/types.ts";

export interface Config {
  /** Root directory archives are extracted into */
  extractPath: string;
  logLevel: LogLevel;
}

const Env = Schema.Struct({
  LOG_LEVEL: Schema.optional(Schema.Literal("debug", "info", "warn", "error")),
  EPUB_EXTRACT_DIR: Schema.optional(Schema.NonEmptyString),
});

export const DEFAULT_EXTRACT_PATH = join(tmpdir(), "epub-document-parser");

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = Schema.decodeUnknownEither(Env)(env);

  if (Either.isLeft(result)) {
    log.warn("Config", "Invalid environment, using defaults", { error: result.left.message });
    return { extractPath: DEFAULT_EXTRACT_PATH, logLevel: "info" };
  }

  return {
    extractPath: result.right.EPUB_EXTRACT_DIR ?? DEFAULT_EXTRACT_PATH,
    logLevel: result.right.LOG_LEVEL ?? "info",
  };
}
