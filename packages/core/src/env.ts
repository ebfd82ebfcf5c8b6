// Environment variable loading
// - shared by the CLI and the Neo4j loader

import { config as loadDotenv } from "dotenv";

export type MapGraphEnv = {
  neo4jEnabled: boolean;
  neo4jUri: string | undefined;
  neo4jUsername: string | undefined;
  neo4jPassword: string | undefined;
  neo4jDatabase: string;
  neo4jBatchSize: number;
};

export const DEFAULT_NEO4J_BATCH_SIZE = 500;

export function parseBooleanEnv(rawValue: string | undefined, fallback: boolean): boolean {
  const raw = (rawValue ?? "").trim().toLowerCase();
  if (!raw) return fallback;

  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return fallback;
}

export function parsePositiveIntEnv(rawValue: string | undefined, fallback: number): number {
  const n = Number.parseInt((rawValue ?? "").trim(), 10);
  if (!Number.isFinite(n) || n < 1) return fallback;
  return n;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): MapGraphEnv {
  // .env is a development convenience; real environment variables are enough
  if (source === process.env) loadDotenv();

  return {
    neo4jEnabled: parseBooleanEnv(source.MAPGRAPH_NEO4J_ENABLED, false),
    neo4jUri: source.MAPGRAPH_NEO4J_URI,
    neo4jUsername: source.MAPGRAPH_NEO4J_USERNAME,
    neo4jPassword: source.MAPGRAPH_NEO4J_PASSWORD,
    neo4jDatabase: source.MAPGRAPH_NEO4J_DATABASE ?? "neo4j",
    neo4jBatchSize: parsePositiveIntEnv(source.MAPGRAPH_NEO4J_BATCH_SIZE, DEFAULT_NEO4J_BATCH_SIZE),
  };
}
