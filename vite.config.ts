import { defineConfig } from "vite";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@apiref/metadata": resolve(packagesRoot, "metadata/src/index.ts"),
      "@apiref/docgen": resolve(packagesRoot, "docgen/src/index.ts"),
    },
  },
});
