import type { DiagnosticHint, DiagnosticSeverity } from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  MF0001:
    | { kind: "unreadable"; errorMessage: string }
    | { kind: "invalid-json"; errorMessage: string };
  MF0002: { kind: "schema-violation"; issues: readonly string[] };
  DC0001:
    | { kind: "unreadable"; errorMessage: string }
    | { kind: "malformed-xml"; errorMessage: string };
  GN0001: {
    kind: "missing-target-framework";
    assembly: string;
    typeName: string;
  };
  IO0001: {
    kind: "remove-directory" | "create-directory" | "write-file";
    errorMessage: string;
  };
  PT0001:
    | { kind: "illegal-segment"; segment: string }
    | { kind: "illegal-extension"; extension: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  MF0001: {
    code: "MF0001",
    message: (params) =>
      params.kind === "unreadable"
        ? `unable to read type library manifest: ${params.errorMessage}`
        : `type library manifest is not valid JSON: ${params.errorMessage}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MF0001"]>,
  MF0002: {
    code: "MF0002",
    message: (params) =>
      `type library manifest does not match the schema: ${params.issues.join("; ")}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MF0002"]>,
  DC0001: {
    code: "DC0001",
    message: (params) =>
      params.kind === "unreadable"
        ? `unable to read documentation file: ${params.errorMessage}`
        : `documentation file is not well-formed XML: ${params.errorMessage}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0001"]>,
  GN0001: {
    code: "GN0001",
    message: (params) =>
      `assembly ${params.assembly} has no target framework (required while documenting ${params.typeName})`,
    severity: "error",
    hints: [
      {
        message:
          'Add "targetFramework": { "name": "..." } to the assembly section of the manifest.',
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0001"]>,
  IO0001: {
    code: "IO0001",
    message: (params) => {
      switch (params.kind) {
        case "remove-directory":
          return `unable to remove output directory: ${params.errorMessage}`;
        case "create-directory":
          return `unable to create output directory: ${params.errorMessage}`;
        case "write-file":
          return `unable to write document: ${params.errorMessage}`;
      }
      return exhaustive(params.kind);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IO0001"]>,
  PT0001: {
    code: "PT0001",
    message: (params) =>
      params.kind === "illegal-segment"
        ? `'${params.segment}' cannot be used as an output file name`
        : `'${params.extension}' is not a valid output file extension`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PT0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
