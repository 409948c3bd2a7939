import type { MediaType } from "./media-type.ts";

/** Person credited in the package metadata (`dc:creator`, `dc:contributor`). */
export interface Creator {
  name?: string;
  /** MARC relator code, e.g. `aut` */
  role?: string;
  /** Sort form of the name */
  fileAs?: string;
}

export interface Metadata {
  contributor?: Creator;
  coverage?: string;
  creator?: Creator;
  date?: string;
  description?: string;
  format?: string;
  identifier?: string;
  language?: string;
  publisher?: string;
  relation?: string;
  rights?: string;
  source?: string;
  subject?: string;
  title?: string;
  type?: string;
  /** Manifest id of the cover image */
  coverId?: string;
}

export interface ManifestItem {
  id: string;
  /** Path relative to the content directory */
  path: string;
  mediaType: MediaType;
  property?: string;
}

export interface Manifest {
  id?: string;
  items: ReadonlyMap<string, ManifestItem>;
}

export type PageProgressionDirection = "ltr" | "rtl" | "unspecified";

export interface SpineItem {
  id?: string;
  idref: string;
  linear: boolean;
}

export interface Spine {
  id?: string;
  /** Manifest id of the navigation-map document */
  toc?: string;
  pageProgressionDirection: PageProgressionDirection;
  items: readonly SpineItem[];
}

export interface TableOfContents {
  label: string;
  id: string;
  /** Content reference, e.g. `chapter1.xhtml#start` */
  item?: string;
  subTable: readonly TableOfContents[];
}

/** Optional receiver of parse lifecycle notifications, called in this order. */
export interface ParserObserver {
  begin?(path: string): void;
  archiveExtracted?(directory: string): void;
  metadataReady?(metadata: Metadata): void;
  manifestReady?(manifest: Manifest): void;
  spineReady?(spine: Spine): void;
  tocReady?(tableOfContents: TableOfContents): void;
  end?(path: string): void;
  failed?(path: string, error: Error): void;
}
