export * from "./types.js";
export * from "./registry.js";

import type {
  Diagnostic,
  DiagnosticHint,
  DiagnosticInput,
  DiagnosticPhase,
  DiagnosticSeverity,
  SourceSpan,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePhasePrefixes: Readonly<Partial<Record<string, DiagnosticPhase>>> = {
  MF: "manifest",
  DC: "documentation",
  GN: "generation",
  IO: "output",
  PT: "paths",
};

/** Phases follow the two-letter code prefix. */
export const phaseOf = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

export const createDiagnostic = ({
  severity,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phaseOf(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>,
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    severity: options.severity ?? definition.severity,
    hints: options.hints ?? definition.hints,
  });
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${diagnostic.span.file} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(formatDiagnostic(diagnostic));
    this.name = "DiagnosticError";
    this.diagnostic = diagnostic;
  }
}

/** Builds the registry diagnostic for `code` and throws it. */
export const failWith = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>,
): never => {
  throw new DiagnosticError(diagnosticFromCode(options));
};

export const fileSpan = (file: string): SourceSpan => ({
  file,
  start: 0,
  end: 0,
});

export const normalizeErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
