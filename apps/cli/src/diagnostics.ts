import { isAbsolute, resolve } from "node:path";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@apiref/metadata";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity,
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

// Spans cover whole files unless they carry a character range.
const formatLocation = (span: SourceSpan): string => {
  const path = isAbsolute(span.file) ? span.file : resolve(span.file);
  return span.end > span.start ? `${path}:${span.start}-${span.end}` : path;
};

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean } = {},
): string => {
  const color = createColorizer(options.color ?? true);
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${formatLocation(diagnostic.span)} ${color.severityLabel(
    diagnostic.severity,
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const hints = (diagnostic.hints ?? []).map((hint) =>
    color.muted(`  hint: ${hint.message}`),
  );

  return [header, ...hints].join("\n");
};
