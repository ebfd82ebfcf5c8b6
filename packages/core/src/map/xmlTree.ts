// VUE map XML tree
// - strips the non-XML preamble VUE writes before <LW-MAP>
// - parses into an ordered, typed element tree (document order matters for extraction)

import { XMLParser } from "fast-xml-parser";

import { MapDocumentError } from "./errors.js";

export type MapXmlElement = {
  tag: string;
  attributes: Readonly<Record<string, string>>;
  children: MapXmlElement[];
  text: string;
};

export const MAP_ROOT_TAG = "LW-MAP";

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseAttributeValue: false,
  parseTagValue: false,
  // Attribute values and text are kept as written
  trimValues: false,
  processEntities: true,
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    const text = scalarToString(value);
    if (text === null) continue;
    attributes[key.slice(ATTRIBUTE_PREFIX.length)] = text;
  }
  return attributes;
}

function toElement(entry: Record<string, unknown>): MapXmlElement | null {
  const tag = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
  if (!tag) return null;

  const rawChildren = entry[tag];
  const children: MapXmlElement[] = [];
  const textParts: string[] = [];

  if (Array.isArray(rawChildren)) {
    for (const child of rawChildren) {
      if (!isRecord(child)) continue;
      if (TEXT_KEY in child) {
        const text = scalarToString(child[TEXT_KEY]);
        if (text !== null) textParts.push(text);
        continue;
      }
      const element = toElement(child);
      if (element) children.push(element);
    }
  }

  return {
    tag,
    attributes: readAttributes(entry[ATTRIBUTES_KEY]),
    children,
    text: textParts.join(""),
  };
}

export function stripMapPreamble(text: string): string {
  const match = /^<LW-MAP/m.exec(text);
  if (!match) {
    throw new MapDocumentError(`No <${MAP_ROOT_TAG}> element found at the start of a line`);
  }
  return text.slice(match.index);
}

export function parseMapXml(xml: string): MapXmlElement {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml, true);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MapDocumentError(`Invalid map XML: ${message}`, { cause: error });
  }

  if (Array.isArray(parsed)) {
    for (const entry of parsed) {
      if (!isRecord(entry)) continue;
      const element = toElement(entry);
      if (element) return element;
    }
  }
  throw new MapDocumentError("Map XML contains no root element");
}

export function findChild(element: MapXmlElement, tag: string): MapXmlElement | undefined {
  return element.children.find((child) => child.tag === tag);
}

export function findChildren(element: MapXmlElement, tag: string): MapXmlElement[] {
  return element.children.filter((child) => child.tag === tag);
}
