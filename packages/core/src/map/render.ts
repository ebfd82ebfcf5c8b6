// Plain-text tables and JSON views of an extracted map graph

import { resolveEndpoint, type MapGraph, type MapLink, type MapNode } from "./types.js";

export const NODE_TABLE_KEYS = ["label", "layer", "parent", "type"] as const;
export type NodeTableKey = (typeof NODE_TABLE_KEYS)[number];

export const DEFAULT_LABEL_MAX_LENGTH = 30;

type TableCell = string | number | null;

export function truncateLabel(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function linkArrow(link: Pick<MapLink, "label" | "directed">): string {
  const tag = link.label ? `[${link.label}]` : "";
  const left = link.directed === "bidirectional" ? " <" : "";
  const right = link.directed !== "undirected" ? "> " : "";
  return [left, tag, right].join("--");
}

export function formatTable(headers: readonly string[], rows: readonly TableCell[][]): string {
  const numeric = headers.map((_, column) =>
    rows.length > 0 ? rows.every((row) => typeof row[column] === "number") : false,
  );
  const cells = rows.map((row) => headers.map((_, column) => String(row[column] ?? "").trim()));
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...cells.map((row) => row[column]?.length ?? 0)),
  );

  const renderLine = (values: readonly string[]) =>
    values
      .map((value, column) => {
        const width = widths[column] ?? value.length;
        return numeric[column] ? value.padStart(width) : value.padEnd(width);
      })
      .join("  ")
      .trimEnd();

  return [
    renderLine(headers),
    renderLine(widths.map((width) => "-".repeat(width))),
    ...cells.map(renderLine),
  ].join("\n");
}

export function formatNodeTable(graph: MapGraph, key: NodeTableKey = "label"): string {
  const rows: TableCell[][] = Array.from(graph.nodes.values(), (node: MapNode) => [
    node.id,
    node[key],
  ]);
  return formatTable(["ID", key.toUpperCase()], rows);
}

function endpointLabel(graph: MapGraph, link: MapLink, which: "start" | "end"): string {
  return resolveEndpoint(graph, link[which])?.label ?? "";
}

export function formatLinkTable(
  graph: MapGraph,
  maxLength: number = DEFAULT_LABEL_MAX_LENGTH,
): string {
  const rows: TableCell[][] = Array.from(graph.links.values(), (link) => [
    link.id,
    truncateLabel(endpointLabel(graph, link, "start"), maxLength),
    linkArrow(link),
    truncateLabel(endpointLabel(graph, link, "end"), maxLength),
  ]);
  return formatTable(["Link ID", "Node 1", "Relationship", "Node 2"], rows);
}

export type MapGraphJson = {
  nodes: MapNode[];
  links: MapLink[];
  unresolvedLinkIds: number[];
};

export function mapGraphToJson(graph: MapGraph): MapGraphJson {
  return {
    nodes: Array.from(graph.nodes.values()),
    links: Array.from(graph.links.values()),
    unresolvedLinkIds: [...graph.unresolvedLinkIds],
  };
}
