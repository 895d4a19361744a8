import { CommanderError } from "commander";
import {
  DiagnosticError,
  type Diagnostic,
} from "@apiref/metadata";
import { getConfig } from "./config/index.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { formatRunSummary, runApiref } from "./run.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  runApiref(config).forEach((result) => console.log(formatRunSummary(result)));
}

function errorHandler(error: unknown) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }

  const diagnostic = extractDiagnostic(error);
  if (diagnostic) {
    console.error(formatCliDiagnostic(diagnostic, { color: process.stderr.isTTY }));
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}

const extractDiagnostic = (error: unknown): Diagnostic | undefined =>
  error instanceof DiagnosticError ? error.diagnostic : undefined;
