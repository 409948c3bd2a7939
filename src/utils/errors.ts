export type ParseErrorCode =
  | "EXTRACTION"
  | "CONTAINER"
  | "MANIFEST"
  | "SPINE"
  | "NOT_FOUND"
  | "TOC"
  | "PACKAGE_PARSE";

export class EpubParseError extends Error {
  public readonly code: ParseErrorCode;
  public readonly filePath: string;
  public readonly originalError?: unknown;

  constructor(code: ParseErrorCode, message: string, filePath: string, originalError?: unknown) {
    super(message);
    this.name = "EpubParseError";
    this.code = code;
    this.filePath = filePath;
    this.originalError = originalError;
  }
}

export class ExtractionError extends EpubParseError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super("EXTRACTION", `Archive extraction failed: ${reason}`, filePath, cause);
    this.name = "ExtractionError";
  }
}

export class ContainerError extends EpubParseError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super("CONTAINER", `Container descriptor unusable: ${reason}`, filePath, cause);
    this.name = "ContainerError";
  }
}

export class ManifestError extends EpubParseError {
  /** The offending item, by id when it has one, else by position. */
  public readonly element?: string;

  constructor(filePath: string, reason: string, element?: string) {
    super("MANIFEST", element ? `Manifest ${element}: ${reason}` : `Manifest: ${reason}`, filePath);
    this.name = "ManifestError";
    this.element = element;
  }
}

export class SpineError extends EpubParseError {
  public readonly element?: string;

  constructor(filePath: string, reason: string, element?: string) {
    super("SPINE", element ? `Spine ${element}: ${reason}` : `Spine: ${reason}`, filePath);
    this.name = "SpineError";
    this.element = element;
  }
}

export class NotFoundError extends EpubParseError {
  constructor(filePath: string, what: string, cause?: unknown) {
    super("NOT_FOUND", `Not found: ${what}`, filePath, cause);
    this.name = "NotFoundError";
  }
}

export class TocError extends EpubParseError {
  public readonly element?: string;

  constructor(filePath: string, reason: string, element?: string) {
    super("TOC", element ? `Table of contents ${element}: ${reason}` : `Table of contents: ${reason}`, filePath);
    this.name = "TocError";
    this.element = element;
  }
}

export class PackageParseError extends EpubParseError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super("PACKAGE_PARSE", `Malformed XML: ${reason}`, filePath, cause);
    this.name = "PackageParseError";
  }
}
