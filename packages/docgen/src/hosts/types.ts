/**
 * Synchronous sink for generated documents. Paths are the strings produced by
 * the path resolver; hosts never rewrite them beyond normalizing.
 */
export interface DocumentHost {
  exists(path: string): boolean;
  /** Removes a directory and everything below it. */
  removeDirectory(path: string): void;
  /** Creates a directory and any missing parents. */
  ensureDirectory(path: string): void;
  writeFile(path: string, contents: string): void;
}
