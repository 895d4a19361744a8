import type { BackendFormat } from "@apiref/docgen";

export type ApirefConfig = {
  /** Type-library manifests to document, in command-line order. */
  manifests: string[];
  /**
   * Documentation file for every manifest. When absent each manifest falls back
   * to its `documentationFile` entry, then to `<manifest>.xml` beside it.
   */
  docs?: string;
  format: BackendFormat;
  /** Directory that receives one sub-directory per assembly. */
  out: string;
  verbose: boolean;
};
