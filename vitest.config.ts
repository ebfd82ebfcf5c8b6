// Vitest settings
// - runs in the Node.js environment
// - maps NodeNext-style `.js` imports in tests to their `.ts` sources
// - resolves the workspace core package to its sources (no build before tests)

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

function resolveTsFromJsImport() {
  return {
    name: "mapgraph-resolve-ts-from-js-import",
    enforce: "pre" as const,
    resolveId(source: string, importer?: string) {
      if (!importer) return null;
      if (!source.startsWith(".") && !source.startsWith("/")) return null;
      if (!source.endsWith(".js")) return null;

      const resolvedJs = path.resolve(path.dirname(importer), source);
      if (fs.existsSync(resolvedJs)) return null;

      const resolvedTs = resolvedJs.slice(0, -3) + ".ts";
      if (fs.existsSync(resolvedTs)) return resolvedTs;

      return null;
    },
  };
}

export default defineConfig({
  plugins: [resolveTsFromJsImport()],
  resolve: {
    alias: {
      "@mapgraph/core": path.join(rootDir, "packages/core/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
