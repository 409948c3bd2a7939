import type { XmlElement } from "../xml/tree.ts";
import type { Creator, Metadata } from "./types.ts";

const TEXT_FIELDS = [
  "coverage",
  "date",
  "description",
  "format",
  "identifier",
  "language",
  "publisher",
  "relation",
  "rights",
  "source",
  "subject",
  "title",
  "type",
] as const;

function readCreator(metadata: XmlElement, tag: string): Creator | undefined {
  const element = metadata.first(tag);
  if (!element) return undefined;

  return {
    name: element.value,
    role: element.attr("opf:role"),
    fileAs: element.attr("opf:file-as"),
  };
}

/**
 * Reads the Dublin Core fields of a package `metadata` element.
 *
 * Best effort: every field is read independently and a missing or empty
 * element leaves its field unset. Never throws.
 */
export function extractMetadata(element: XmlElement | undefined): Metadata {
  if (!element) return {};

  const metadata: Metadata = {};

  for (const field of TEXT_FIELDS) {
    const value = element.first(`dc:${field}`)?.value;
    if (value !== undefined) metadata[field] = value;
  }

  const creator = readCreator(element, "dc:creator");
  if (creator) metadata.creator = creator;

  const contributor = readCreator(element, "dc:contributor");
  if (contributor) metadata.contributor = contributor;

  // EPUB 2.0: <meta name="cover" content="cover-id"/>, first one wins
  const coverId = element.all("meta", { name: "cover" })[0]?.attr("content");
  if (coverId !== undefined) metadata.coverId = coverId;

  return metadata;
}
