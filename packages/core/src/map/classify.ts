import type { MapElement } from "./types.js";
import type { MapXmlElement } from "./xmlTree.js";

// xsi:type discriminator carried by every graph-bearing <child> element
export const XSI_TYPE_ATTRIBUTE = "xsi:type";

export const MAP_CHILD_TAG = "child";

export type MapElementKind = MapElement["kind"];

export function classifyElement(element: MapXmlElement): MapElementKind {
  const discriminator = element.attributes[XSI_TYPE_ATTRIBUTE];
  if (discriminator === "node") return "node";
  if (discriminator === "link") return "link";
  return "other";
}

export function readMapElement(element: MapXmlElement): MapElement {
  return { kind: classifyElement(element), element };
}
