import { resolveHref } from "../utils/path.ts";
import type { Manifest, Metadata, Spine, TableOfContents } from "./types.ts";

export interface EpubDocumentParts {
  directory: string;
  contentDirectory: string;
  metadata: Metadata;
  manifest: Manifest;
  spine: Spine;
  tableOfContents: TableOfContents;
}

/** A fully parsed package. Built once at the end of a successful parse and frozen. */
export class EpubDocument {
  /** Where the archive was extracted */
  readonly directory: string;
  /** Directory holding the package document; manifest paths are relative to it */
  readonly contentDirectory: string;
  readonly metadata: Metadata;
  readonly manifest: Manifest;
  readonly spine: Spine;
  readonly tableOfContents: TableOfContents;

  constructor(parts: EpubDocumentParts) {
    this.directory = parts.directory;
    this.contentDirectory = parts.contentDirectory;
    this.metadata = parts.metadata;
    this.manifest = parts.manifest;
    this.spine = parts.spine;
    this.tableOfContents = parts.tableOfContents;
    Object.freeze(this);
  }

  get title(): string | undefined {
    return this.metadata.title;
  }

  get author(): string | undefined {
    return this.metadata.creator?.name;
  }

  get publisher(): string | undefined {
    return this.metadata.publisher;
  }

  /**
   * Absolute path of the cover image: the item named by
   * `<meta name="cover">`, else the item with the `cover-image` property.
   */
  get cover(): string | undefined {
    const byMeta = this.metadata.coverId ? this.manifest.items.get(this.metadata.coverId) : undefined;
    if (byMeta) return resolveHref(this.contentDirectory, byMeta.path);

    for (const item of this.manifest.items.values()) {
      if (item.property?.split(/\s+/).includes("cover-image")) {
        return resolveHref(this.contentDirectory, item.path);
      }
    }

    return undefined;
  }

  /** Absolute path of a manifest item, `undefined` for an unknown id. */
  resourcePath(id: string): string | undefined {
    const item = this.manifest.items.get(id);
    return item ? resolveHref(this.contentDirectory, item.path) : undefined;
  }
}
