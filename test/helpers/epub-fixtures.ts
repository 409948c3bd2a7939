import AdmZip from "adm-zip";
import type { FileTree } from "./fs-helpers.ts";

export function containerXml(fullPath = "OEBPS/content.opf"): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${fullPath}" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;
}

export interface PackageParts {
  metadata?: string;
  manifest?: string;
  spine?: string;
}

export function packageXml(parts: PackageParts = {}): string {
  const {
    metadata = "<dc:title>T</dc:title>",
    manifest = `<item id="toc" href="toc.ncx" media-type="application/x-dtbncx+xml"/>`,
    spine = `<spine toc="toc"><itemref idref="toc"/></spine>`,
  } = parts;

  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="uid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf">
    ${metadata}
  </metadata>
  <manifest>${manifest}</manifest>
  ${spine}
</package>`;
}

export function navPoint(id: string, label: string, src: string, children = ""): string {
  return `<navPoint id="${id}"><navLabel><text>${label}</text></navLabel><content src="${src}"/>${children}</navPoint>`;
}

export interface NcxParts {
  title?: string;
  head?: string;
  navMap?: string;
}

export function ncxXml(parts: NcxParts = {}): string {
  const { title = "T", head = "", navMap = navPoint("np1", "Ch1", "ch1.html") } = parts;

  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>${head}</head>
  <docTitle><text>${title}</text></docTitle>
  <navMap>${navMap}</navMap>
</ncx>`;
}

/** The smallest complete package: one manifest item that is also the navigation map. */
export function minimalEpubFiles(): FileTree {
  return {
    mimetype: "application/epub+zip",
    "META-INF/container.xml": containerXml(),
    "OEBPS/content.opf": packageXml(),
    "OEBPS/toc.ncx": ncxXml(),
  };
}

/** Writes `files` as a zip archive at `path` and returns `path`. */
export function writeEpub(path: string, files: FileTree): string {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, typeof content === "string" ? Buffer.from(content, "utf-8") : content);
  }
  zip.writeZip(path);
  return path;
}
