import type { XmlElement } from "../xml/tree.ts";
import { ManifestError, NotFoundError } from "../utils/errors.ts";
import { parseMediaType } from "./media-type.ts";
import type { Manifest, ManifestItem } from "./types.ts";

function describeItem(item: XmlElement, index: number): string {
  const id = item.attr("id");
  return id ? `item "${id}"` : `item #${index + 1}`;
}

/**
 * Builds the id-indexed resource registry from a package `manifest` element.
 *
 * Items are inserted in document order; an item whose id repeats an earlier
 * one replaces it.
 */
export function extractManifest(element: XmlElement | undefined, source = element?.source ?? ""): Manifest {
  const itemElements = element?.all("item") ?? [];
  if (itemElements.length === 0) {
    throw new ManifestError(source, "no item elements");
  }

  const items = new Map<string, ManifestItem>();

  itemElements.forEach((item, index) => {
    const id = item.attr("id");
    if (!id) {
      throw new ManifestError(source, "missing id attribute", describeItem(item, index));
    }

    const path = item.attr("href");
    if (!path) {
      throw new ManifestError(source, "missing href attribute", describeItem(item, index));
    }

    const entry: ManifestItem = { id, path, mediaType: parseMediaType(item.attr("media-type")) };
    const property = item.attr("properties");
    if (property !== undefined) entry.property = property;

    items.set(id, entry);
  });

  return { id: element?.attr("id"), items };
}

/** Path of the manifest item with the given id. */
export function manifestItemPath(manifest: Manifest, id: string, source = ""): string {
  const item = manifest.items.get(id);
  if (!item) {
    throw new NotFoundError(source, `manifest item "${id}"`);
  }
  return item.path;
}
