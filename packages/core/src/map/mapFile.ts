// VUE map file loading
// - .vue path → preamble stripped → XML tree → extracted graph

import { promises as fs } from "node:fs";
import path from "node:path";

import { MapDocumentError } from "./errors.js";
import { extractMapGraph } from "./extractGraph.js";
import type { ExtractMapGraphOptions, MapGraph } from "./types.js";
import { parseMapXml, stripMapPreamble } from "./xmlTree.js";

export const MAP_FILE_EXTENSION = ".vue";

export type LoadedMapFile = {
  filePath: string;
  graph: MapGraph;
};

export function assertMapFilePath(filePath: string): void {
  if (!filePath || path.extname(filePath).toLowerCase() !== MAP_FILE_EXTENSION) {
    throw new MapDocumentError(`A ${MAP_FILE_EXTENSION} file is required, got "${filePath}"`);
  }
}

export function extractMapGraphFromText(
  text: string,
  options: ExtractMapGraphOptions = {},
): MapGraph {
  return extractMapGraph(parseMapXml(stripMapPreamble(text)), options);
}

export async function readMapFile(
  filePath: string,
  options: ExtractMapGraphOptions = {},
): Promise<LoadedMapFile> {
  assertMapFilePath(filePath);
  const text = await fs.readFile(filePath, "utf8");
  return { filePath, graph: extractMapGraphFromText(text, options) };
}
