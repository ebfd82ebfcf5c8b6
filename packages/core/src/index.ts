export * from "./env.js";
export * from "./graph/neo4j.js";
export * from "./map/classify.js";
export * from "./map/errors.js";
export * from "./map/extractGraph.js";
export * from "./map/linkExtractor.js";
export * from "./map/mapFile.js";
export * from "./map/nodeExtractor.js";
export * from "./map/render.js";
export * from "./map/types.js";
export * from "./map/xmlTree.js";
