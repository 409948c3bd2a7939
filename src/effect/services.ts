import { Context, Effect, Layer } from "effect";
import { readFileSync } from "node:fs";
import { loadConfig } from "../config.ts";
import { log, setLogLevel } from "../logging/logger.ts";
import type { LogContext, LogLevel } from "../logging/types.ts";
import { extractArchive } from "../utils/archive.ts";
import { ExtractionError, NotFoundError, PackageParseError } from "../utils/errors.ts";
import { extractionDirectory } from "../utils/path.ts";
import { parseXmlTree, type XmlElement } from "../xml/tree.ts";

// Config Service
export class ConfigService extends Context.Tag("ConfigService")<
  ConfigService,
  {
    readonly extractPath: string;
    readonly logLevel: LogLevel;
  }
>() {}

// Logger Service
export class LoggerService extends Context.Tag("LoggerService")<
  LoggerService,
  {
    readonly info: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly warn: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly error: (tag: string, msg: string, err?: unknown, ctx?: LogContext) => Effect.Effect<void>;
    readonly debug: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
  }
>() {}

// FileSystem Service
export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readFile: (path: string) => Effect.Effect<Buffer, NotFoundError>;
  }
>() {}

// Archive Service: archive path in, extracted directory out
export class ArchiveService extends Context.Tag("ArchiveService")<
  ArchiveService,
  {
    readonly extract: (path: string) => Effect.Effect<string, ExtractionError>;
  }
>() {}

// XML Service: document bytes in, navigable element tree out
export class XmlService extends Context.Tag("XmlService")<
  XmlService,
  {
    readonly parse: (bytes: Uint8Array, source: string) => Effect.Effect<XmlElement, PackageParseError>;
  }
>() {}

export type ParserServices = ConfigService | LoggerService | FileSystemService | ArchiveService | XmlService;

// Live implementations

const LiveConfigService = Layer.sync(ConfigService, () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
});

const LiveLoggerService = Layer.succeed(LoggerService, {
  info: (tag, msg, ctx) => Effect.sync(() => log.info(tag, msg, ctx)),
  warn: (tag, msg, ctx) => Effect.sync(() => log.warn(tag, msg, ctx)),
  error: (tag, msg, err, ctx) => Effect.sync(() => log.error(tag, msg, err, ctx)),
  debug: (tag, msg, ctx) => Effect.sync(() => log.debug(tag, msg, ctx)),
});

export const LiveFileSystemService = Layer.succeed(FileSystemService, {
  readFile: (path) =>
    Effect.try({
      try: () => readFileSync(path),
      catch: (e) => new NotFoundError(path, `file ${path}`, e),
    }),
});

export const LiveArchiveService = Layer.effect(
  ArchiveService,
  Effect.gen(function* () {
    const config = yield* ConfigService;
    return {
      extract: (path: string) =>
        Effect.try({
          try: () => extractArchive(path, extractionDirectory(config.extractPath, path)),
          catch: (e) => (e instanceof ExtractionError ? e : new ExtractionError(path, "unexpected failure", e)),
        }),
    };
  }),
);

export const LiveXmlService = Layer.succeed(XmlService, {
  parse: (bytes, source) =>
    Effect.try({
      try: () => parseXmlTree(bytes, source),
      catch: (e) => (e instanceof PackageParseError ? e : new PackageParseError(source, "unexpected failure", e)),
    }),
});

// Combined live layer
export const LiveLayer = Layer.mergeAll(
  LiveConfigService,
  LiveLoggerService,
  LiveFileSystemService,
  LiveXmlService,
  LiveArchiveService.pipe(Layer.provide(LiveConfigService)),
);
