// mapgraph CLI commands
// - option validation (zod) + core calls, output through an injected writer

import path from "node:path";

import { z } from "zod";

import {
  DEFAULT_LABEL_MAX_LENGTH,
  NODE_TABLE_KEYS,
  formatLinkTable,
  formatNodeTable,
  loadEnv,
  mapGraphToJson,
  readMapFile,
  resolveNeo4jSettings,
  syncMapGraphToNeo4j,
  type CreateNeo4jDriver,
  type LoadedMapFile,
  type MapGraphEnv,
  type MapGraphSyncSummary,
} from "@mapgraph/core";

// log: command results (stdout); progress: extraction/load progress (stderr in JSON mode)
export type CommandOutput = {
  log: (line: string) => void;
  progress?: (line: string) => void;
};

const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  progress: (line) => console.error(line),
};

// JSON results must be the only thing on the result stream
function progressWriter(output: CommandOutput, json: boolean): (line: string) => void {
  if (!json) return (line) => output.log(line);
  return (line) => output.progress?.(line);
}

const extractOptionsSchema = z.object({
  json: z.boolean().default(false),
  requireConnected: z.boolean().default(false),
});

export const nodesOptionsSchema = extractOptionsSchema.extend({
  key: z.enum(NODE_TABLE_KEYS).default("label"),
});

export const linksOptionsSchema = extractOptionsSchema.extend({
  maxLength: z.coerce.number().int().min(1).default(DEFAULT_LABEL_MAX_LENGTH),
});

export const syncOptionsSchema = z.object({
  requireConnected: z.boolean().default(false),
  batchSize: z.coerce.number().int().min(1).max(2000).optional(),
  source: z.string().trim().min(1).optional(),
  keepExisting: z.boolean().default(false),
});

export type NodesCommandOptions = z.input<typeof nodesOptionsSchema>;
export type LinksCommandOptions = z.input<typeof linksOptionsSchema>;
export type SyncCommandOptions = z.input<typeof syncOptionsSchema>;

async function loadMap(
  filePath: string,
  requireConnected: boolean,
  progress: (line: string) => void,
): Promise<LoadedMapFile> {
  const loaded = await readMapFile(filePath, {
    requireConnected,
    logger: { log: progress },
  });
  const { graph } = loaded;
  progress(
    `[mapgraph] file=${filePath} nodes=${graph.nodes.size} links=${graph.links.size} unresolved=${graph.unresolvedLinkIds.length}`,
  );
  return loaded;
}

export async function runNodesCommand(
  filePath: string,
  rawOptions: NodesCommandOptions,
  output: CommandOutput = consoleOutput,
): Promise<void> {
  const options = nodesOptionsSchema.parse(rawOptions);
  const { graph } = await loadMap(
    filePath,
    options.requireConnected,
    progressWriter(output, options.json),
  );

  if (options.json) {
    output.log(JSON.stringify(mapGraphToJson(graph).nodes, null, 2));
    return;
  }
  output.log(formatNodeTable(graph, options.key));
}

export async function runLinksCommand(
  filePath: string,
  rawOptions: LinksCommandOptions,
  output: CommandOutput = consoleOutput,
): Promise<void> {
  const options = linksOptionsSchema.parse(rawOptions);
  const { graph } = await loadMap(
    filePath,
    options.requireConnected,
    progressWriter(output, options.json),
  );

  if (options.json) {
    output.log(JSON.stringify(mapGraphToJson(graph).links, null, 2));
    return;
  }
  output.log(formatLinkTable(graph, options.maxLength));
}

export type SyncCommandDeps = {
  env?: MapGraphEnv;
  createDriver?: CreateNeo4jDriver;
  output?: CommandOutput;
};

export async function runSyncCommand(
  filePath: string,
  rawOptions: SyncCommandOptions,
  deps: SyncCommandDeps = {},
): Promise<MapGraphSyncSummary> {
  const options = syncOptionsSchema.parse(rawOptions);
  const output = deps.output ?? consoleOutput;
  const env = deps.env ?? loadEnv();

  const settings = resolveNeo4jSettings(env);
  if (!settings.config) {
    throw new Error(settings.unavailableReason ?? "Neo4j is not available.");
  }

  const { graph } = await loadMap(filePath, options.requireConnected, progressWriter(output, false));
  const summary = await syncMapGraphToNeo4j(graph, settings.config, {
    source: options.source ?? path.basename(filePath),
    batchSize: options.batchSize ?? env.neo4jBatchSize,
    clearExisting: !options.keepExisting,
    ...(deps.createDriver ? { createDriver: deps.createDriver } : {}),
    logger: { log: (line) => output.log(line) },
  });

  output.log(
    `[summary] source=${summary.source} nodes=${summary.nodes} links=${summary.links} skippedLinks=${summary.skippedLinkIds.length}`,
  );
  return summary;
}
