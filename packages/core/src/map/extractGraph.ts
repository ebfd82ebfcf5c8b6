// Map graph extraction
// - DFS over <child> elements → flat node/link maps
// - links with not-yet-visited endpoints are retried until a pass makes no progress

import { MAP_CHILD_TAG, readMapElement } from "./classify.js";
import { MapStructureError, UnresolvedLinksError } from "./errors.js";
import { extractLink, parseLinkElement } from "./linkExtractor.js";
import { assertUnusedId, extractNode } from "./nodeExtractor.js";
import {
  createExtractionContext,
  type ExtractMapGraphOptions,
  type ExtractionContext,
  type MapExtractionLogger,
  type MapGraph,
} from "./types.js";
import { findChildren, MAP_ROOT_TAG, type MapXmlElement } from "./xmlTree.js";

export function walkChildren(
  container: MapXmlElement,
  context: ExtractionContext,
  parentId: number | null,
): void {
  for (const child of findChildren(container, MAP_CHILD_TAG)) {
    const mapElement = readMapElement(child);
    switch (mapElement.kind) {
      case "node":
        extractNode(mapElement.element, context, parentId, walkChildren);
        break;
      case "link": {
        const link = parseLinkElement(mapElement.element);
        assertUnusedId(context, link.id);
        extractLink(link, context);
        break;
      }
      case "other":
        break;
      default: {
        const unreachable: never = mapElement;
        throw new Error(`Unhandled map element: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}

export function resolvePendingLinks(
  context: ExtractionContext,
  logger?: MapExtractionLogger,
): void {
  let passes = 0;

  while (context.pending.size > 0) {
    passes += 1;
    const snapshot = Array.from(context.pending.values());

    let resolvedThisPass = 0;
    for (const link of snapshot) {
      if (extractLink(link, context) === "resolved") resolvedThisPass += 1;
    }

    logger?.log?.(
      `[extract] retry pass ${passes}: resolved=${resolvedThisPass} pending=${context.pending.size}`,
    );

    // Fixed point
    if (resolvedThisPass === 0) break;
  }
}

function sortedById<T>(entries: Map<number, T>): Map<number, T> {
  return new Map(Array.from(entries.entries()).sort(([a], [b]) => a - b));
}

export function extractMapGraph(
  root: MapXmlElement,
  options: ExtractMapGraphOptions = {},
): MapGraph {
  if (root.tag !== MAP_ROOT_TAG) {
    throw new MapStructureError(`Expected <${MAP_ROOT_TAG}> root element, got <${root.tag}>`);
  }

  const context = createExtractionContext();
  walkChildren(root, context, null);
  resolvePendingLinks(context, options.logger);

  const unresolvedLinkIds = Array.from(context.pending.keys()).sort((a, b) => a - b);
  for (const id of unresolvedLinkIds) {
    options.logger?.log?.(`[extract] unresolved link ${id}`);
  }
  if (options.requireConnected && unresolvedLinkIds.length > 0) {
    throw new UnresolvedLinksError(unresolvedLinkIds);
  }

  return {
    nodes: sortedById(context.nodes),
    links: sortedById(context.links),
    unresolvedLinkIds,
  };
}
