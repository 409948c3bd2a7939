import type { XmlElement } from "../xml/tree.ts";
import { TocError } from "../utils/errors.ts";
import type { TableOfContents } from "./types.ts";

export const TOC_ROOT_ID = "0";

function describePoint(point: XmlElement, path: number[]): string {
  const id = point.attr("id");
  return id ? `navPoint "${id}"` : `navPoint #${path.join(".")}`;
}

function readNavPoints(parent: XmlElement, path: number[]): TableOfContents[] {
  return parent.all("navPoint").map((point, index) => {
    const position = [...path, index + 1];

    const label = point.find("navLabel", "text")?.value;
    if (label === undefined) {
      throw new TocError(point.source, "missing navLabel text", describePoint(point, position));
    }

    const id = point.attr("id");
    if (!id) {
      throw new TocError(point.source, "missing id attribute", describePoint(point, position));
    }

    const item = point.first("content")?.attr("src");
    if (!item) {
      throw new TocError(point.source, "missing content src", describePoint(point, position));
    }

    return { label, id, item, subTable: readNavPoints(point, position) };
  });
}

/** Builds the table of contents tree from the root of an NCX navigation-map document. */
export function extractTableOfContents(root: XmlElement): TableOfContents {
  const label = root.find("docTitle", "text")?.value;
  if (label === undefined) {
    throw new TocError(root.source, "missing docTitle text");
  }

  const item = root.first("head")?.all("meta", { name: "dtb:uid" })[0]?.attr("content");
  const navMap = root.first("navMap");

  return {
    label,
    id: TOC_ROOT_ID,
    item,
    subTable: navMap ? readNavPoints(navMap, []) : [],
  };
}
