import type { MapXmlElement } from "./xmlTree.js";

export type MapResource = {
  readonly id: number;
  readonly title: string | null;
  readonly type: string | null;
  readonly [property: string]: string | number | null;
};

export type MapMetadata = {
  readonly keywords: readonly string[];
};

export type MapNode = {
  readonly id: number;
  readonly label: string;
  readonly layer: string | null;
  readonly parent: number | null;
  readonly resource: MapResource | null;
  readonly metadata: MapMetadata | null;
  readonly type: "Node";
};

export type EndpointKind = "node" | "link";

// Stable id lookup into MapGraph.nodes / MapGraph.links
export type EndpointRef = {
  readonly kind: EndpointKind;
  readonly id: number;
};

export type LinkDirection = "directed" | "undirected" | "bidirectional";

export type MapLink = {
  readonly id: number;
  readonly label: string;
  readonly start: EndpointRef;
  readonly end: EndpointRef;
  readonly directed: LinkDirection;
  readonly type: string;
};

export type MapGraph = {
  nodes: ReadonlyMap<number, MapNode>;
  links: ReadonlyMap<number, MapLink>;
  unresolvedLinkIds: number[];
};

export type MapEntity = MapNode | MapLink;

export type PendingLink = {
  id: number;
  label: string;
  arrowState: number;
  references: readonly [EndpointRef, EndpointRef];
  element: MapXmlElement;
};

export type MapElement =
  | { kind: "node"; element: MapXmlElement }
  | { kind: "link"; element: MapXmlElement }
  | { kind: "other"; element: MapXmlElement };

export type MapExtractionLogger = {
  log?: (line: string) => void;
};

export type ExtractMapGraphOptions = {
  requireConnected?: boolean;
  logger?: MapExtractionLogger;
};

// Shared mutable traversal state, threaded through the whole recursion
export type ExtractionContext = {
  nodes: Map<number, MapNode>;
  links: Map<number, MapLink>;
  pending: Map<number, PendingLink>;
};

export function createExtractionContext(): ExtractionContext {
  return { nodes: new Map(), links: new Map(), pending: new Map() };
}

export function resolveEndpoint(
  graph: Pick<MapGraph, "nodes" | "links">,
  ref: EndpointRef,
): MapEntity | undefined {
  return ref.kind === "node" ? graph.nodes.get(ref.id) : graph.links.get(ref.id);
}
