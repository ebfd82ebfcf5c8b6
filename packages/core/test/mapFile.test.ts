import { describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { MapDocumentError } from "../src/map/errors.js";
import { readMapFile } from "../src/map/mapFile.js";
import { formatLinkTable } from "../src/map/render.js";

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

describe("readMapFile()", () => {
  it("extracts the graph of a saved map", async () => {
    const { graph } = await readMapFile(path.join(fixturesDir, "sample.vue"));

    expect(Array.from(graph.nodes.keys())).toEqual([1, 2, 3]);
    expect(graph.nodes.get(1)).toEqual({
      id: 1,
      label: "Graphs and maps",
      layer: "1",
      parent: null,
      resource: {
        id: 1,
        title: "Example maps",
        type: "2",
        URL: "https://maps.example.test",
      },
      metadata: { keywords: ["graphs", "maps"] },
      type: "Node",
    });
    expect(graph.nodes.get(2)?.parent).toBe(1);

    expect(Array.from(graph.links.keys())).toEqual([13, 14]);
    expect(graph.links.get(14)).toEqual({
      id: 14,
      label: "Link back",
      start: { kind: "link", id: 13 },
      end: { kind: "node", id: 2 },
      directed: "directed",
      type: "Link: Node-Link: Node-Node",
    });
    expect(graph.unresolvedLinkIds).toEqual([]);

    expect(formatLinkTable(graph)).toBe(
      [
        "Link ID  Node 1           Relationship      Node 2",
        "-------  ---------------  ----------------  ------",
        "     13  Graphs and maps  --[connects]-->   Links",
        "     14  connects         --[Link back]-->  Nodes",
      ].join("\n"),
    );
  });

  it("requires a .vue file", async () => {
    await expect(readMapFile("map.xml")).rejects.toThrow(MapDocumentError);
    await expect(readMapFile("")).rejects.toThrow('A .vue file is required, got ""');
  });

  it("reports a file without a map element", async () => {
    await withTempDir("mapgraph-", async (dir) => {
      const filePath = path.join(dir, "empty.vue");
      await fs.writeFile(filePath, "<!-- nothing here -->\n", "utf8");

      await expect(readMapFile(filePath)).rejects.toThrow("No <LW-MAP> element found");
    });
  });
});
