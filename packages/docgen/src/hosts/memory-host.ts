import { posix } from "node:path";
import type { DocumentHost } from "./types.js";

export type MemoryDocumentHost = DocumentHost & {
  readFile(path: string): string;
  /** Written files keyed by normalized path, in write order. */
  files(): ReadonlyMap<string, string>;
  directories(): readonly string[];
};

export const createMemoryDocumentHost = ({
  files = {},
}: {
  files?: Record<string, string>;
} = {}): MemoryDocumentHost => {
  const contents = new Map<string, string>();
  const directories = new Set<string>();

  const normalizePath = (path: string) => {
    const normalized = posix.normalize(path.replace(/\\/g, "/"));
    return normalized.length > 1 ? normalized.replace(/\/+$/, "") : normalized;
  };

  const registerDirectory = (dir: string) => {
    let current = dir;
    while (!directories.has(current)) {
      directories.add(current);
      const parent = posix.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  };

  const isWithin = (path: string, dir: string) =>
    path === dir || path.startsWith(`${dir}/`);

  Object.entries(files).forEach(([path, text]) => {
    const full = normalizePath(path);
    contents.set(full, text);
    registerDirectory(posix.dirname(full));
  });

  return {
    exists: (path) => {
      const resolved = normalizePath(path);
      return contents.has(resolved) || directories.has(resolved);
    },
    removeDirectory: (path) => {
      const resolved = normalizePath(path);
      Array.from(contents.keys())
        .filter((file) => isWithin(file, resolved))
        .forEach((file) => contents.delete(file));
      Array.from(directories)
        .filter((dir) => isWithin(dir, resolved))
        .forEach((dir) => directories.delete(dir));
    },
    ensureDirectory: (path) => registerDirectory(normalizePath(path)),
    writeFile: (path, text) => {
      const resolved = normalizePath(path);
      const parent = posix.dirname(resolved);
      if (!directories.has(parent)) {
        throw new Error(`Directory not found: ${parent}`);
      }
      contents.set(resolved, text);
    },
    readFile: (path) => {
      const resolved = normalizePath(path);
      const file = contents.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      return file;
    },
    files: () => new Map(contents),
    directories: () => Array.from(directories).sort(),
  };
};
