// Neo4j loader for extracted map graphs
// - nodes merged on (source, map_id), links merged between their endpoint nodes
// - stored counts are read back and compared with the extracted graph

import neo4j from "neo4j-driver";
import type { Driver, Integer, Session } from "neo4j-driver";

import type { MapGraphEnv } from "../env.js";
import type { MapGraph, MapLink, MapNode } from "../map/types.js";

export type Neo4jConnectionConfig = {
  uri: string;
  username: string;
  password: string;
  database: string;
};

export type Neo4jSettings = {
  enabled: boolean;
  config: Neo4jConnectionConfig | null;
  unavailableReason: string | null;
};

function nonEmptyOrNull(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed ? trimmed : null;
}

export function resolveNeo4jSettings(
  env: Pick<
    MapGraphEnv,
    "neo4jEnabled" | "neo4jUri" | "neo4jUsername" | "neo4jPassword" | "neo4jDatabase"
  >,
): Neo4jSettings {
  if (!env.neo4jEnabled) {
    return {
      enabled: false,
      config: null,
      unavailableReason: "Neo4j integration disabled. Set MAPGRAPH_NEO4J_ENABLED=1 to enable it.",
    };
  }

  const uri = nonEmptyOrNull(env.neo4jUri);
  const username = nonEmptyOrNull(env.neo4jUsername);
  const password = nonEmptyOrNull(env.neo4jPassword);
  const database = nonEmptyOrNull(env.neo4jDatabase) ?? "neo4j";

  if (!uri || !username || !password) {
    return {
      enabled: true,
      config: null,
      unavailableReason:
        "Neo4j enabled but not fully configured. Set MAPGRAPH_NEO4J_URI, MAPGRAPH_NEO4J_USERNAME, and MAPGRAPH_NEO4J_PASSWORD.",
    };
  }

  return {
    enabled: true,
    config: { uri, username, password, database },
    unavailableReason: null,
  };
}

export class MapGraphSyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MapGraphSyncError";
  }
}

export type CreateNeo4jDriver = (config: Neo4jConnectionConfig) => Driver;

export function createNeo4jDriver(config: Neo4jConnectionConfig): Driver {
  return neo4j.driver(
    config.uri,
    neo4j.auth.basic(config.username, config.password),
    // Lossless integer mode
    { disableLosslessIntegers: false },
  );
}

function toNumber(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (neo4j.isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : Number.parseInt(value.toString(), 10);
  }
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function chunked<T>(items: T[], size: number): T[][] {
  if (items.length === 0) return [];
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

async function runBatchWrites<T extends Record<string, unknown>>(
  session: Session,
  query: string,
  rows: T[],
  batchSize: number,
  params: Record<string, unknown> = {},
): Promise<void> {
  if (rows.length === 0) return;
  for (const batch of chunked(rows, batchSize)) {
    await session.executeWrite((tx) => tx.run(query, { ...params, rows: batch }));
  }
}

export type StoreLinkPartition = {
  compatible: MapLink[];
  skipped: MapLink[];
};

// Relationships cannot start or end on another relationship
export function partitionStoreCompatibleLinks(graph: MapGraph): StoreLinkPartition {
  const compatible: MapLink[] = [];
  const skipped: MapLink[] = [];
  for (const link of graph.links.values()) {
    if (link.start.kind === "node" && link.end.kind === "node") {
      compatible.push(link);
    } else {
      skipped.push(link);
    }
  }
  return { compatible, skipped };
}

export type MapNodeRow = {
  id: Integer;
  label: string;
  type: string;
  layer: string | null;
  parent: Integer | null;
  resource: string | null;
  metadata: string | null;
};

export type MapLinkRow = {
  id: Integer;
  startId: Integer;
  endId: Integer;
  label: string;
  directed: string;
  type: string;
};

export function toMapNodeRow(node: MapNode): MapNodeRow {
  return {
    id: neo4j.int(node.id),
    label: node.label,
    type: node.type,
    layer: node.layer,
    parent: node.parent === null ? null : neo4j.int(node.parent),
    // Nested values are stored as JSON strings (property values must be primitives)
    resource: node.resource ? JSON.stringify(node.resource) : null,
    metadata: node.metadata ? JSON.stringify(node.metadata) : null,
  };
}

export function toMapLinkRow(link: MapLink): MapLinkRow {
  return {
    id: neo4j.int(link.id),
    startId: neo4j.int(link.start.id),
    endId: neo4j.int(link.end.id),
    label: link.label,
    directed: link.directed,
    type: link.type,
  };
}

const ENSURE_MAP_NODE_CONSTRAINT_CYPHER =
  "CREATE CONSTRAINT mapgraph_node_source_id_unique IF NOT EXISTS FOR (n:MapNode) REQUIRE (n.source, n.map_id) IS UNIQUE";

const CLEAR_SOURCE_CYPHER = `
  MATCH (n:MapNode { source: $source })
  DETACH DELETE n
`;

const UPSERT_NODES_CYPHER = `
  UNWIND $rows AS row
  MERGE (n:MapNode { source: $source, map_id: row.id })
  SET
    n.label = row.label,
    n.type = row.type,
    n.layer = row.layer,
    n.parent = row.parent,
    n.resource = row.resource,
    n.metadata = row.metadata
`;

const UPSERT_LINKS_CYPHER = `
  UNWIND $rows AS row
  MATCH (from:MapNode { source: $source, map_id: row.startId })
  MATCH (to:MapNode { source: $source, map_id: row.endId })
  MERGE (from)-[r:MAP_LINK { source: $source, map_id: row.id }]->(to)
  SET
    r.label = row.label,
    r.directed = row.directed,
    r.type = row.type
`;

const COUNT_SOURCE_CYPHER = `
  CALL {
    MATCH (n:MapNode { source: $source })
    RETURN count(n) AS nodes
  }
  CALL {
    MATCH ()-[r:MAP_LINK { source: $source }]->()
    RETURN count(r) AS links
  }
  RETURN nodes, links
`;

export type MapGraphStoreCounts = {
  nodes: number;
  links: number;
};

async function readCountsForSource(session: Session, source: string): Promise<MapGraphStoreCounts> {
  const result = await session.executeRead((tx) => tx.run(COUNT_SOURCE_CYPHER, { source }));

  const row = result.records[0];
  if (!row) return { nodes: 0, links: 0 };

  return {
    nodes: toNumber(row.get("nodes")),
    links: toNumber(row.get("links")),
  };
}

export type MapGraphSyncLogger = {
  log?: (line: string) => void;
};

export type SyncMapGraphToNeo4jOptions = {
  source: string;
  batchSize?: number;
  clearExisting?: boolean;
  createDriver?: CreateNeo4jDriver;
  logger?: MapGraphSyncLogger;
};

export type MapGraphSyncSummary = {
  source: string;
  nodes: number;
  links: number;
  skippedLinkIds: number[];
  storeCounts: MapGraphStoreCounts;
};

export async function syncMapGraphToNeo4j(
  graph: MapGraph,
  config: Neo4jConnectionConfig,
  options: SyncMapGraphToNeo4jOptions,
): Promise<MapGraphSyncSummary> {
  const { source } = options;
  const batchSize = Math.min(Math.max(1, options.batchSize ?? 500), 2000);
  const logger = options.logger;

  const { compatible, skipped } = partitionStoreCompatibleLinks(graph);
  const skippedLinkIds = skipped.map((link) => link.id);
  if (skippedLinkIds.length > 0) {
    logger?.log?.(
      `[neo4j] warning: '${source}' contains links with link endpoints, skipped: ${skippedLinkIds.join(", ")}`,
    );
  }

  const nodeRows = Array.from(graph.nodes.values(), toMapNodeRow);
  const linkRows = compatible.map(toMapLinkRow);

  const driver = (options.createDriver ?? createNeo4jDriver)(config);
  try {
    await driver.verifyConnectivity();
    const session = driver.session({
      database: config.database,
      defaultAccessMode: neo4j.session.WRITE,
    });
    try {
      await session.executeWrite((tx) => tx.run(ENSURE_MAP_NODE_CONSTRAINT_CYPHER));
      if (options.clearExisting ?? true) {
        await session.executeWrite((tx) => tx.run(CLEAR_SOURCE_CYPHER, { source }));
      }

      await runBatchWrites(session, UPSERT_NODES_CYPHER, nodeRows, batchSize, { source });
      logger?.log?.(`[neo4j] nodes=${nodeRows.length}`);
      await runBatchWrites(session, UPSERT_LINKS_CYPHER, linkRows, batchSize, { source });
      logger?.log?.(`[neo4j] links=${linkRows.length}`);

      const storeCounts = await readCountsForSource(session, source);
      if (storeCounts.nodes !== nodeRows.length || storeCounts.links !== linkRows.length) {
        throw new MapGraphSyncError(
          [
            "Neo4j counts are inconsistent after sync.",
            `graph.nodes=${nodeRows.length}`,
            `graph.links=${linkRows.length}`,
            `neo4j.nodes=${storeCounts.nodes}`,
            `neo4j.links=${storeCounts.links}`,
          ].join(" "),
        );
      }

      return {
        source,
        nodes: nodeRows.length,
        links: linkRows.length,
        skippedLinkIds,
        storeCounts,
      };
    } finally {
      await session.close();
    }
  } finally {
    await driver.close();
  }
}

export async function readMapGraphStoreCounts(
  config: Neo4jConnectionConfig,
  source: string,
  createDriver: CreateNeo4jDriver = createNeo4jDriver,
): Promise<MapGraphStoreCounts> {
  const driver = createDriver(config);
  try {
    await driver.verifyConnectivity();
    const session = driver.session({
      database: config.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      return await readCountsForSource(session, source);
    } finally {
      await session.close();
    }
  } finally {
    await driver.close();
  }
}
