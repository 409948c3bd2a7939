import { XMLParser, XMLValidator } from "fast-xml-parser";
import { PackageParseError } from "../utils/errors.ts";

const ATTRIBUTE_PREFIX = "@_";
const TEXT_KEY = "#text";

// Every element becomes an array so that repeated siblings keep document order
// and single children are read the same way as repeated ones.
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  alwaysCreateTextNode: true,
  isArray: (_name, _jpath, _isLeafNode, isAttribute) => !isAttribute,
});

type XmlNode = Record<string, unknown>;

function isRecord(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNode(value: unknown): XmlNode {
  if (isRecord(value)) return value;
  if (typeof value === "string" && value.length > 0) return { [TEXT_KEY]: value };
  return {};
}

function localName(name: string): string {
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

/**
 * Read-only view over one element of a parsed XML document.
 *
 * Namespace prefixes are dropped on both tag and attribute names, so
 * `first("dc:title")` and `first("title")` find the same element.
 */
export class XmlElement {
  constructor(
    readonly name: string,
    private readonly node: XmlNode,
    /** File the element was parsed from. */
    readonly source: string,
  ) {}

  attr(name: string): string | undefined {
    const value = this.node[ATTRIBUTE_PREFIX + localName(name)];
    return typeof value === "string" ? value : undefined;
  }

  first(tag: string): XmlElement | undefined {
    return this.all(tag)[0];
  }

  /** Direct children named `tag`, optionally only those whose attributes equal `attributes`. */
  all(tag: string, attributes: Record<string, string> = {}): XmlElement[] {
    const name = localName(tag);
    if (name.startsWith(ATTRIBUTE_PREFIX) || name === TEXT_KEY) return [];

    const raw = this.node[name];
    const children = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
    const filters = Object.entries(attributes);

    return children
      .map((child) => new XmlElement(name, toNode(child), this.source))
      .filter((element) => filters.every(([key, expected]) => element.attr(key) === expected));
  }

  /** Follows a chain of first-child lookups, e.g. `find("navLabel", "text")`. */
  find(...tags: string[]): XmlElement | undefined {
    let current: XmlElement | undefined = this;
    for (const tag of tags) {
      current = current.first(tag);
      if (!current) return undefined;
    }
    return current;
  }

  /** Trimmed text content; empty text counts as absent. */
  get value(): string | undefined {
    const text = this.node[TEXT_KEY];
    if (typeof text !== "string") return undefined;
    const trimmed = text.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
}

function decode(bytes: Uint8Array | string): string {
  const text = typeof bytes === "string" ? bytes : Buffer.from(bytes).toString("utf-8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function parseXmlTree(bytes: Uint8Array | string, source: string): XmlElement {
  const xml = decode(bytes);

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new PackageParseError(source, `${msg} (line ${line}, column ${col})`);
  }

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch (error) {
    throw new PackageParseError(source, error instanceof Error ? error.message : String(error), error);
  }

  if (isRecord(parsed)) {
    const rootName = Object.keys(parsed).find((key) => !key.startsWith("?") && !key.startsWith("#"));
    if (rootName) {
      const root = parsed[rootName];
      return new XmlElement(rootName, toNode(Array.isArray(root) ? root[0] : root), source);
    }
  }

  throw new PackageParseError(source, "document has no root element");
}
