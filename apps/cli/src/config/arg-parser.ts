import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import {
  BACKEND_FORMATS,
  DEFAULT_OUTPUT_ROOT,
  type BackendFormat,
} from "@apiref/docgen";
import type { ApirefConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version }: { version: string } = require("../../package.json");

const isBackendFormat = (value: string): value is BackendFormat =>
  BACKEND_FORMATS.some((format) => format === value);

const parseFormat = (value: string): BackendFormat => {
  const normalized = value.toLowerCase();
  if (isBackendFormat(normalized)) {
    return normalized;
  }
  throw new InvalidArgumentError(
    `invalid output format "${value}" (allowed: ${BACKEND_FORMATS.join(", ")})`,
  );
};

type ParsedOptions = {
  docs?: string;
  format: BackendFormat;
  out: string;
  verbose?: boolean;
};

const createCommand = (): Command =>
  new Command()
    .name("apiref")
    .description("Generate reference documents for a compiled type library")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<manifest...>", "type-library manifest(s) to document")
    .option("--docs <path>", "XML documentation file (default: <manifest>.xml)")
    .option(
      "--format <format>",
      `output format (${BACKEND_FORMATS.join("|")})`,
      parseFormat,
      "markdown",
    )
    .option("--out <dir>", "output root directory", DEFAULT_OUTPUT_ROOT)
    .option("--verbose", "log generation progress to stderr")
    .exitOverride();

/**
 * Parses `apiref` arguments (without the node and script entries). Usage
 * errors, `--help` and `--version` throw a `CommanderError` carrying the exit
 * code instead of exiting the process.
 */
export const parseArgs = (argv: readonly string[]): ApirefConfig => {
  const program = createCommand();
  program.parse(["node", "apiref", ...argv]);

  const opts = program.opts<ParsedOptions>();
  return {
    manifests: [...program.args],
    docs: opts.docs,
    format: opts.format,
    out: opts.out,
    verbose: opts.verbose ?? false,
  };
};

export const getConfigFromCli = (): ApirefConfig => parseArgs(process.argv.slice(2));
