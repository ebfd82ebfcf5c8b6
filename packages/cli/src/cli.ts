#!/usr/bin/env node
// mapgraph CLI
// - VUE map (.vue) → node/link tables, JSON, or a Neo4j load

import { Command } from "commander";

import { runLinksCommand, runNodesCommand, runSyncCommand } from "./commands.js";

async function runReportingErrors(task: () => Promise<unknown>): Promise<void> {
  try {
    await task();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[mapgraph] error: ${message}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("mapgraph")
  .description("Extract the node/link graph of a VUE mind map and load it into Neo4j");

program
  .command("nodes")
  .description("List the nodes of a map, ordered by ID")
  .argument("<file>", "path to a .vue map")
  .option("--key <name>", "node field to show (label, layer, parent, type)", "label")
  .option("--json", "print node records as JSON", false)
  .option("--require-connected", "fail when links stay unresolved", false)
  .action(async (file: string, opts) => {
    await runReportingErrors(() =>
      runNodesCommand(file, {
        key: opts.key,
        json: opts.json,
        requireConnected: opts.requireConnected,
      }),
    );
  });

program
  .command("links")
  .description("List the links of a map with their endpoints, ordered by ID")
  .argument("<file>", "path to a .vue map")
  .option("--max-length <n>", "truncate endpoint labels after n characters", "30")
  .option("--json", "print link records as JSON", false)
  .option("--require-connected", "fail when links stay unresolved", false)
  .action(async (file: string, opts) => {
    await runReportingErrors(() =>
      runLinksCommand(file, {
        maxLength: opts.maxLength,
        json: opts.json,
        requireConnected: opts.requireConnected,
      }),
    );
  });

program
  .command("sync")
  .description("Merge the map's nodes and node-to-node links into Neo4j")
  .argument("<file>", "path to a .vue map")
  .option("--source <name>", "source name stored on every node (default: file name)")
  .option("--batch-size <n>", "rows per write transaction (default: MAPGRAPH_NEO4J_BATCH_SIZE)")
  .option("--keep-existing", "do not delete a previous load of the same source", false)
  .option("--require-connected", "fail when links stay unresolved", false)
  .action(async (file: string, opts) => {
    await runReportingErrors(() =>
      runSyncCommand(file, {
        source: opts.source,
        batchSize: opts.batchSize,
        keepExisting: opts.keepExisting,
        requireConnected: opts.requireConnected,
      }),
    );
  });

await program.parseAsync(process.argv);
