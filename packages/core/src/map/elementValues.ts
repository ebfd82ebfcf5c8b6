import { MapStructureError } from "./errors.js";
import type { MapXmlElement } from "./xmlTree.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseInteger(raw: string | undefined, what: string): number {
  const trimmed = raw?.trim() ?? "";
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new MapStructureError(
      raw === undefined ? `Missing ${what}` : `Non-integer ${what}: "${raw}"`,
    );
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new MapStructureError(`Out-of-range ${what}: "${raw}"`);
  }
  return value;
}

export function readElementId(element: MapXmlElement): number {
  return parseInteger(element.attributes["ID"], `ID attribute on <${element.tag}>`);
}

export function readLabel(element: MapXmlElement): string {
  return (element.attributes["label"] ?? "").replace(/\n/g, " ");
}
