/** Media types a package manifest declares for its resources. */
export const MediaType = {
  gif: "image/gif",
  jpeg: "image/jpeg",
  png: "image/png",
  svg: "image/svg+xml",
  webp: "image/webp",
  xhtml: "application/xhtml+xml",
  html: "text/html",
  dtbook: "application/x-dtbook+xml",
  oebDocument: "text/x-oeb1-document",
  xml: "application/xml",
  opf: "application/oebps-package+xml",
  ncx: "application/x-dtbncx+xml",
  css: "text/css",
  oebCss: "text/x-oeb1-css",
  javascript: "text/javascript",
  ecmascript: "application/javascript",
  openType: "application/vnd.ms-opentype",
  fontOtf: "font/otf",
  fontTtf: "font/ttf",
  fontWoff: "font/woff",
  fontWoff2: "font/woff2",
  legacyWoff: "application/font-woff",
  legacyTtf: "application/x-font-ttf",
  smil: "application/smil+xml",
  pls: "application/pls+xml",
  mp3: "audio/mpeg",
  mp4Audio: "audio/mp4",
  mp4Video: "video/mp4",
  unknown: "unknown",
} as const;

export type MediaType = (typeof MediaType)[keyof typeof MediaType];

const KNOWN = new Set<string>(Object.values(MediaType).filter((type) => type !== MediaType.unknown));

function isKnownMediaType(value: string): value is MediaType {
  return KNOWN.has(value);
}

/** Maps a `media-type` attribute onto the known set; anything else is `unknown`. */
export function parseMediaType(raw: string | undefined): MediaType {
  if (!raw) return MediaType.unknown;
  const normalized = raw.trim().toLowerCase();
  return isKnownMediaType(normalized) ? normalized : MediaType.unknown;
}
