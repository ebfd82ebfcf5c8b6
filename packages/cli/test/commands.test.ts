import { describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import type { CreateNeo4jDriver, MapGraphEnv } from "@mapgraph/core";

import {
  linksOptionsSchema,
  nodesOptionsSchema,
  runLinksCommand,
  runNodesCommand,
  runSyncCommand,
} from "../src/commands.js";

const MAP_TEXT = [
  "<!-- Tufts VUE 3.3.0 concept-map (map.vue) 2026-01-01 -->",
  '<?xml version="1.0" encoding="US-ASCII"?>',
  '<LW-MAP xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ID="0" label="map.vue">',
  '  <child ID="1" label="A" layerID="1" xsi:type="node"/>',
  '  <child ID="2" label="B" layerID="1" xsi:type="node"/>',
  '  <child ID="3" label="to" arrowState="2" xsi:type="link">',
  '    <ID1 xsi:type="node">1</ID1>',
  '    <ID2 xsi:type="node">2</ID2>',
  "  </child>",
  "</LW-MAP>",
].join("\n");

async function withMapFile<T>(
  fn: (filePath: string) => Promise<T>,
  text: string = MAP_TEXT,
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "mapgraph-cli-"));
  try {
    const filePath = path.join(dir, "map.vue");
    await fs.writeFile(filePath, text, "utf8");
    return await fn(filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function captureOutput() {
  const lines: string[] = [];
  const progress: string[] = [];
  return {
    lines,
    progress,
    output: {
      log: (line: string) => lines.push(line),
      progress: (line: string) => progress.push(line),
    },
  };
}

const LINK_FIRST_MAP_TEXT = [
  '<LW-MAP xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ID="0" label="map.vue">',
  '  <child ID="3" label="to" arrowState="2" xsi:type="link">',
  '    <ID1 xsi:type="node">1</ID1>',
  '    <ID2 xsi:type="node">2</ID2>',
  "  </child>",
  '  <child ID="1" label="A" xsi:type="node"/>',
  '  <child ID="2" label="B" xsi:type="node"/>',
  "</LW-MAP>",
].join("\n");

const enabledEnv: MapGraphEnv = {
  neo4jEnabled: true,
  neo4jUri: "bolt://127.0.0.1:7687",
  neo4jUsername: "neo4j",
  neo4jPassword: "test-secret",
  neo4jDatabase: "neo4j",
  neo4jBatchSize: 500,
};

function createFakeDriver(storedCounts: { nodes: number; links: number }) {
  const queries: string[] = [];
  const tx = {
    run: async (query: string) => {
      queries.push(query);
      return {
        records: [{ get: (key: string) => (key === "nodes" ? storedCounts.nodes : storedCounts.links) }],
      };
    },
  };
  const session = {
    executeWrite: async (work: (t: typeof tx) => Promise<unknown>) => await work(tx),
    executeRead: async (work: (t: typeof tx) => Promise<unknown>) => await work(tx),
    close: async () => undefined,
  };
  const driver = {
    verifyConnectivity: async () => ({}),
    session: () => session,
    close: async () => undefined,
  } as unknown as ReturnType<CreateNeo4jDriver>;
  return { driver, queries };
}

describe("runNodesCommand()", () => {
  it("prints a summary line and the node table", async () => {
    await withMapFile(async (filePath) => {
      const { lines, output } = captureOutput();

      await runNodesCommand(filePath, {}, output);

      expect(lines).toEqual([
        `[mapgraph] file=${filePath} nodes=2 links=1 unresolved=0`,
        ["ID  LABEL", "--  -----", " 1  A", " 2  B"].join("\n"),
      ]);
    });
  });

  it("prints node records as JSON", async () => {
    await withMapFile(async (filePath) => {
      const { lines, progress, output } = captureOutput();

      await runNodesCommand(filePath, { json: true, key: "layer" }, output);

      expect(JSON.parse(lines.join("\n"))).toEqual([
        { id: 1, label: "A", layer: "1", parent: null, resource: null, metadata: null, type: "Node" },
        { id: 2, label: "B", layer: "1", parent: null, resource: null, metadata: null, type: "Node" },
      ]);
      expect(progress).toEqual([`[mapgraph] file=${filePath} nodes=2 links=1 unresolved=0`]);
    });
  });

  it("keeps retry progress out of JSON output", async () => {
    await withMapFile(async (filePath) => {
      const { lines, progress, output } = captureOutput();

      await runNodesCommand(filePath, { json: true }, output);

      expect(JSON.parse(lines.join("\n"))).toHaveLength(2);
      expect(progress).toEqual([
        "[extract] retry pass 1: resolved=1 pending=0",
        `[mapgraph] file=${filePath} nodes=2 links=1 unresolved=0`,
      ]);
    }, LINK_FIRST_MAP_TEXT);
  });
});

describe("runLinksCommand()", () => {
  it("prints only the link records with --json", async () => {
    await withMapFile(async (filePath) => {
      const { lines, output } = captureOutput();

      await runLinksCommand(filePath, { json: true }, output);

      expect(JSON.parse(lines.join("\n"))).toEqual([
        {
          id: 3,
          label: "to",
          start: { kind: "node", id: 1 },
          end: { kind: "node", id: 2 },
          directed: "directed",
          type: "Link: Node-Node",
        },
      ]);
    }, LINK_FIRST_MAP_TEXT);
  });

  it("prints the link table", async () => {
    await withMapFile(async (filePath) => {
      const { lines, output } = captureOutput();

      await runLinksCommand(filePath, { maxLength: 10 }, output);

      expect(lines[1]).toBe(
        [
          "Link ID  Node 1  Relationship  Node 2",
          "-------  ------  ------------  ------",
          "      3  A       --[to]-->     B",
        ].join("\n"),
      );
    });
  });
});

describe("command option schemas", () => {
  it("rejects unknown node keys and coerces numeric strings", () => {
    expect(nodesOptionsSchema.safeParse({ key: "bogus" }).success).toBe(false);
    expect(linksOptionsSchema.parse({ maxLength: "12" }).maxLength).toBe(12);
    expect(linksOptionsSchema.safeParse({ maxLength: "0" }).success).toBe(false);
  });
});

describe("runSyncCommand()", () => {
  it("refuses to run without Neo4j settings", async () => {
    await withMapFile(async (filePath) => {
      await expect(
        runSyncCommand(filePath, {}, { env: { ...enabledEnv, neo4jEnabled: false } }),
      ).rejects.toThrow(/disabled/);
    });
  });

  it("loads the map into Neo4j and prints a summary", async () => {
    await withMapFile(async (filePath) => {
      const { lines, output } = captureOutput();
      const { driver, queries } = createFakeDriver({ nodes: 2, links: 1 });

      const summary = await runSyncCommand(
        filePath,
        {},
        { env: enabledEnv, createDriver: () => driver, output },
      );

      expect(summary.source).toBe("map.vue");
      expect(queries).toHaveLength(5);
      expect(lines).toEqual([
        `[mapgraph] file=${filePath} nodes=2 links=1 unresolved=0`,
        "[neo4j] nodes=2",
        "[neo4j] links=1",
        "[summary] source=map.vue nodes=2 links=1 skippedLinks=0",
      ]);
    });
  });
});
