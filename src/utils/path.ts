import { basename, extname, join } from "node:path";

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Not percent-encoded after all (a literal "%")
    return segment;
  }
}

/**
 * Resolves a manifest href against the content directory.
 * The fragment is dropped and percent-escapes are decoded.
 *
 * @example
 * resolveHref("/books/a/OEBPS", "Text/ch%201.xhtml#p3") => "/books/a/OEBPS/Text/ch 1.xhtml"
 */
export function resolveHref(contentDirectory: string, href: string): string {
  const [withoutFragment = ""] = href.split("#");
  const decoded = withoutFragment.split("/").map(decodeSegment).join("/");
  return join(contentDirectory, decoded);
}

/**
 * Directory an archive is extracted into: its file name without extension.
 *
 * @example
 * extractionDirectory("/tmp/extract", "/books/Moby Dick.epub") => "/tmp/extract/Moby Dick"
 */
export function extractionDirectory(extractRoot: string, archivePath: string): string {
  return join(extractRoot, basename(archivePath, extname(archivePath)));
}

/** Lowercased extension without the dot, `""` when there is none. */
export function fileExtension(path: string): string {
  return extname(path).slice(1).toLowerCase();
}
