import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import type { DocumentHost } from "./types.js";

export const createFsDocumentHost = (): DocumentHost => ({
  exists: (path) => existsSync(path),
  removeDirectory: (path) => rmSync(path, { recursive: true, force: true }),
  ensureDirectory: (path) => {
    mkdirSync(path, { recursive: true });
  },
  writeFile: (path, contents) => writeFileSync(path, contents, "utf8"),
});
