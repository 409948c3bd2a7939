export { EpubParser, parseDocument, type EpubParserOptions, type Notify } from "./parser.ts";
export { EpubDocument, type EpubDocumentParts } from "./epub/document.ts";
export type {
  Creator,
  Manifest,
  ManifestItem,
  Metadata,
  PageProgressionDirection,
  ParserObserver,
  Spine,
  SpineItem,
  TableOfContents,
} from "./epub/types.ts";
export { MediaType, parseMediaType } from "./epub/media-type.ts";
export { CONTAINER_PATH, locatePackageDocument } from "./epub/container.ts";
export { extractMetadata } from "./epub/metadata.ts";
export { extractManifest, manifestItemPath } from "./epub/manifest.ts";
export { extractSpine } from "./epub/spine.ts";
export { extractTableOfContents, TOC_ROOT_ID } from "./epub/toc.ts";
export { XmlElement, parseXmlTree } from "./xml/tree.ts";
export {
  ArchiveService,
  ConfigService,
  FileSystemService,
  LiveLayer,
  LoggerService,
  XmlService,
  type ParserServices,
} from "./effect/services.ts";
export { loadConfig, type Config } from "./config.ts";
export {
  ContainerError,
  EpubParseError,
  ExtractionError,
  ManifestError,
  NotFoundError,
  PackageParseError,
  SpineError,
  TocError,
  type ParseErrorCode,
} from "./utils/errors.ts";
