import { existsSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";
import {
  createAssemblyInfo,
  createDocumentation,
  readDocumentationFile,
  readManifest,
  type AssemblyInfo,
  type DocumentationFile,
} from "@apiref/metadata";
import {
  backendForFormat,
  createConsoleLogger,
  createDocumentGenerator,
  createFsDocumentHost,
  silentLogger,
  type DocumentHost,
  type DocumentationLogger,
  type GenerationResult,
} from "@apiref/docgen";
import type { ApirefConfig } from "./config/types.js";

type LoadedLibrary = {
  assembly: AssemblyInfo;
  docs?: DocumentationFile;
};

const siblingXmlPath = (manifestPath: string): string => {
  const extension = extname(manifestPath);
  const base = extension ? manifestPath.slice(0, -extension.length) : manifestPath;
  return `${base}.xml`;
};

/**
 * Picks the documentation file for one manifest: `--docs`, then the manifest's
 * own `documentationFile` (relative to the manifest), then `<manifest>.xml`
 * when that file exists.
 */
export const resolveDocumentationPath = ({
  manifestPath,
  documentationFile,
  override,
}: {
  manifestPath: string;
  documentationFile?: string;
  override?: string;
}): string | undefined => {
  if (override) {
    return override;
  }
  if (documentationFile) {
    return resolve(dirname(manifestPath), documentationFile);
  }
  const sibling = siblingXmlPath(manifestPath);
  return existsSync(sibling) ? sibling : undefined;
};

const loadLibrary = (
  manifestPath: string,
  config: ApirefConfig,
  logger: DocumentationLogger,
): LoadedLibrary => {
  const manifest = readManifest(manifestPath);
  const assembly = createAssemblyInfo(manifest);
  const docsPath = resolveDocumentationPath({
    manifestPath,
    documentationFile: manifest.documentationFile,
    override: config.docs,
  });

  if (!docsPath) {
    logger.warn("no documentation file found; documents will have no prose", {
      manifest: manifestPath,
    });
    return { assembly };
  }

  logger.debug("reading documentation file", { path: docsPath });
  return { assembly, docs: readDocumentationFile(docsPath) };
};

/** Documents every manifest in `config`; one result per assembly. */
export const runApiref = (
  config: ApirefConfig,
  {
    host = createFsDocumentHost(),
    logger = config.verbose ? createConsoleLogger({ verbose: true }) : silentLogger,
  }: { host?: DocumentHost; logger?: DocumentationLogger } = {},
): GenerationResult[] => {
  const libraries = config.manifests.map((manifestPath) =>
    loadLibrary(manifestPath, config, logger),
  );

  // One oracle over every library so `see` references resolve across them.
  const documentation = createDocumentation({
    assemblies: libraries.map((library) => library.assembly),
    files: libraries.flatMap((library) => (library.docs ? [library.docs] : [])),
  });

  const generator = createDocumentGenerator({
    backend: backendForFormat(config.format),
    documentation,
    host,
    outputRoot: config.out,
    logger,
  });

  return libraries.map((library) => generator.generate(library.assembly));
};

export const formatRunSummary = (result: GenerationResult): string =>
  `${result.assembly}: ${result.files.length} document(s) written to ${result.root}`;
