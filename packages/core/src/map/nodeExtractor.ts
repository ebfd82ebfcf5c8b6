// Node extraction
// - <child xsi:type="node"> → MapNode, then recursion into nested <child> elements

import { MapStructureError, UnknownMetadataKindError } from "./errors.js";
import { readElementId, readLabel } from "./elementValues.js";
import type { ExtractionContext, MapMetadata, MapNode, MapResource } from "./types.js";
import { findChild, findChildren, type MapXmlElement } from "./xmlTree.js";

// The format defines a single metadata kind: t="1" (keyword)
const KEYWORD_METADATA_KIND = "1";

export type WalkChildren = (
  container: MapXmlElement,
  context: ExtractionContext,
  parentId: number | null,
) => void;

function readResource(nodeId: number, element: MapXmlElement): MapResource | null {
  const resourceElement = findChild(element, "resource");
  if (!resourceElement) return null;

  const properties: Record<string, string> = {};
  for (const property of findChildren(resourceElement, "property")) {
    const key = property.attributes["key"];
    if (key === undefined) continue;
    properties[key] = property.attributes["value"] ?? "";
  }

  const titleElement = findChild(resourceElement, "title");
  return {
    ...properties,
    id: nodeId,
    title: titleElement ? titleElement.text : null,
    type: resourceElement.attributes["type"] ?? null,
  };
}

function readMetadata(nodeId: number, element: MapXmlElement): MapMetadata | null {
  const metadataList = findChild(element, "metadata-list");
  if (!metadataList) return null;

  const keywords: string[] = [];
  const entries = [...findChildren(metadataList, "md"), ...findChildren(element, "md")];
  for (const entry of entries) {
    const kind = entry.attributes["t"];
    if (kind !== KEYWORD_METADATA_KIND) {
      throw new UnknownMetadataKindError(nodeId, kind);
    }
    const value = entry.attributes["v"];
    if (value === undefined) {
      throw new MapStructureError(`Keyword md of node ${nodeId} has no v attribute`);
    }
    keywords.push(value);
  }

  return { keywords };
}

export function assertUnusedId(context: ExtractionContext, id: number): void {
  if (context.nodes.has(id) || context.links.has(id) || context.pending.has(id)) {
    throw new MapStructureError(`Duplicate element ID: ${id}`);
  }
}

export function extractNode(
  element: MapXmlElement,
  context: ExtractionContext,
  parentId: number | null,
  walkChildren: WalkChildren,
): MapNode {
  const id = readElementId(element);
  assertUnusedId(context, id);

  const node: MapNode = {
    id,
    label: readLabel(element),
    layer: element.attributes["layerID"] ?? null,
    parent: parentId,
    resource: readResource(id, element),
    metadata: readMetadata(id, element),
    type: "Node",
  };
  context.nodes.set(id, node);

  // Nested nodes/links share the same flat maps
  walkChildren(element, context, id);

  return node;
}
