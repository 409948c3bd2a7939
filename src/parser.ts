import { Effect, Either, type Layer } from "effect";
import { dirname } from "node:path";
import { locatePackageDocument } from "./epub/container.ts";
import { EpubDocument } from "./epub/document.ts";
import { extractManifest, manifestItemPath } from "./epub/manifest.ts";
import { extractMetadata } from "./epub/metadata.ts";
import { extractSpine } from "./epub/spine.ts";
import { extractTableOfContents } from "./epub/toc.ts";
import type { ParserObserver, TableOfContents } from "./epub/types.ts";
import {
  ArchiveService,
  FileSystemService,
  LiveLayer,
  LoggerService,
  XmlService,
  type ParserServices,
} from "./effect/services.ts";
import { log } from "./logging/logger.ts";
import { EpubParseError, NotFoundError, PackageParseError } from "./utils/errors.ts";
import { resolveHref } from "./utils/path.ts";

/** Delivers one lifecycle callback to the observer, if there still is one. */
export type Notify = (callback: keyof ParserObserver, deliver: (observer: ParserObserver) => void) => Effect.Effect<void>;

const silent: Notify = () => Effect.void;

// Runs a pure extractor, keeping its named error and wrapping anything else.
const extract = <A>(source: string, run: () => A): Effect.Effect<A, EpubParseError> =>
  Effect.try({
    try: run,
    catch: (e) => (e instanceof EpubParseError ? e : new PackageParseError(source, "unexpected failure", e)),
  });

function countEntries(table: TableOfContents): number {
  return table.subTable.reduce((total, child) => total + 1 + countEntries(child), 0);
}

/**
 * The whole parse pipeline as one synchronous program: extract, locate the
 * package document, read metadata, manifest and spine, follow `spine.toc` to
 * the navigation map and build the table of contents.
 */
export const parseDocument = (
  path: string,
  notify: Notify = silent,
): Effect.Effect<EpubDocument, EpubParseError, ParserServices> =>
  Effect.gen(function* () {
    const logger = yield* LoggerService;
    const fs = yield* FileSystemService;
    const xml = yield* XmlService;
    const archive = yield* ArchiveService;
    const startTime = Date.now();

    yield* notify("begin", (o) => o.begin?.(path));
    yield* logger.debug("Parser", "Parsing started", { path, stage: "extract" });

    const directory = yield* archive.extract(path);
    yield* notify("archiveExtracted", (o) => o.archiveExtracted?.(directory));

    const packagePath = yield* locatePackageDocument(directory);
    const contentDirectory = dirname(packagePath);
    yield* logger.debug("Parser", "Package document located", { path, file: packagePath, stage: "container" });

    const packageBytes = yield* fs.readFile(packagePath);
    const packageDocument = yield* xml.parse(packageBytes, packagePath);
    yield* logger.debug("Parser", "Package document parsed", { path, file: packagePath, stage: "package" });

    const metadata = extractMetadata(packageDocument.first("metadata"));
    yield* notify("metadataReady", (o) => o.metadataReady?.(metadata));

    const manifest = yield* extract(packagePath, () => extractManifest(packageDocument.first("manifest"), packagePath));
    yield* notify("manifestReady", (o) => o.manifestReady?.(manifest));
    yield* logger.debug("Parser", "Manifest read", { path, stage: "manifest", items_count: manifest.items.size });

    const spine = yield* extract(packagePath, () => extractSpine(packageDocument.first("spine"), packagePath));
    yield* notify("spineReady", (o) => o.spineReady?.(spine));

    if (spine.pageProgressionDirection === "unspecified") {
      yield* logger.debug("Parser", "Unrecognised page-progression-direction", {
        path,
        stage: "spine",
        direction: packageDocument.first("spine")?.attr("page-progression-direction"),
      });
    }

    const tocId = spine.toc;
    if (tocId === undefined) {
      return yield* Effect.fail(new NotFoundError(packagePath, "spine toc reference"));
    }
    const tocHref = yield* extract(packagePath, () => manifestItemPath(manifest, tocId, packagePath));
    const tocPath = resolveHref(contentDirectory, tocHref);
    yield* logger.debug("Parser", "Navigation document located", { path, file: tocPath, stage: "toc" });

    const tocBytes = yield* fs.readFile(tocPath);
    const tocDocument = yield* xml.parse(tocBytes, tocPath);
    const tableOfContents = yield* extract(tocPath, () => extractTableOfContents(tocDocument));
    yield* notify("tocReady", (o) => o.tocReady?.(tableOfContents));

    const document = new EpubDocument({
      directory,
      contentDirectory,
      metadata,
      manifest,
      spine,
      tableOfContents,
    });

    yield* notify("end", (o) => o.end?.(path));
    yield* logger.info("Parser", "Parsed", {
      path,
      stage: "assemble",
      duration_ms: Date.now() - startTime,
      items_count: manifest.items.size,
      spine_count: spine.items.length,
      toc_count: countEntries(tableOfContents),
      has_cover: document.cover !== undefined,
    });

    return document;
  }).pipe(
    Effect.tapError((error) =>
      Effect.gen(function* () {
        const logger = yield* LoggerService;
        yield* notify("failed", (o) => o.failed?.(path, error));
        yield* logger.error("Parser", error.message, error.originalError ?? error, {
          path,
          file: error.filePath,
          code: error.code,
        });
      }),
    ),
  );

export interface EpubParserOptions {
  observer?: ParserObserver;
  /** Services the pipeline runs with; defaults to the live implementations */
  layer?: Layer.Layer<ParserServices>;
}

/**
 * Parses package archives into {@link EpubDocument}s.
 *
 * The observer is held weakly: the parser never keeps it alive, and once it
 * has been collected its notifications are skipped.
 */
export class EpubParser {
  private observerRef: WeakRef<ParserObserver> | undefined;
  private readonly layer: Layer.Layer<ParserServices>;

  constructor(options: EpubParserOptions = {}) {
    this.layer = options.layer ?? LiveLayer;
    this.observer = options.observer;
  }

  get observer(): ParserObserver | undefined {
    return this.observerRef?.deref();
  }

  set observer(observer: ParserObserver | undefined) {
    this.observerRef = observer ? new WeakRef(observer) : undefined;
  }

  /** Parses the archive at `path`; throws the {@link EpubParseError} that stopped it. */
  parse(path: string): EpubDocument {
    const program = parseDocument(path, this.notify).pipe(Effect.either, Effect.provide(this.layer));
    const result = Effect.runSync(program);

    if (Either.isLeft(result)) {
      throw result.left;
    }
    return result.right;
  }

  private readonly notify: Notify = (callback, deliver) =>
    Effect.sync(() => {
      const observer = this.observer;
      if (!observer) return;
      try {
        deliver(observer);
      } catch (error) {
        log.warn("Parser", "Observer callback threw", {
          callback,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
}
