import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  failWith,
  fileSpan,
  normalizeErrorMessage,
} from "./diagnostics/index.js";
import type {
  AssemblyInfo,
  ConstructorInfo,
  MemberInfo,
  ParameterInfo,
  TypeInfo,
  TypeRef,
} from "./types.js";

/**
 * Type references may be written as `"System.Int32"` shorthand. A trailing
 * `&` marks a by-reference type and each trailing `[]` adds an array rank.
 */
export const parseTypeRefShorthand = (value: string): TypeRef => {
  let name = value.trim();
  let isByRef = false;
  let arrayRank = 0;

  if (name.endsWith("&")) {
    isByRef = true;
    name = name.slice(0, -1);
  }
  while (name.endsWith("[]")) {
    arrayRank += 1;
    name = name.slice(0, -2);
  }

  const separator = name.lastIndexOf(".");
  return {
    name: separator >= 0 ? name.slice(separator + 1) : name,
    namespace: separator >= 0 ? name.slice(0, separator) : undefined,
    genericArguments: [],
    isGenericParameter: false,
    isByRef,
    arrayRank,
  };
};

type TypeRefInput =
  | string
  | {
      name: string;
      namespace?: string;
      genericArguments?: TypeRefInput[];
      isGenericParameter?: boolean;
      isByRef?: boolean;
      arrayRank?: number;
    };

const typeRefSchema: z.ZodType<TypeRef, z.ZodTypeDef, TypeRefInput> = z.lazy(
  () =>
    z.union([
      z.string().min(1).transform(parseTypeRefShorthand),
      z
        .object({
          name: z.string().min(1),
          namespace: z.string().min(1).optional(),
          genericArguments: z.array(typeRefSchema).default([]),
          isGenericParameter: z.boolean().default(false),
          isByRef: z.boolean().default(false),
          arrayRank: z.number().int().min(0).default(0),
        })
        .strict(),
    ]),
);

const AccessibilitySchema = z.enum([
  "public",
  "protected",
  "internal",
  "protected-internal",
  "private-protected",
  "private",
]);

const ConstantValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

const ParameterSchema = z
  .object({
    name: z.string().min(1),
    type: typeRefSchema,
    isOut: z.boolean().default(false),
    isIn: z.boolean().default(false),
    isParams: z.boolean().default(false),
    isOptional: z.boolean().default(false),
    defaultValue: ConstantValueSchema.optional(),
  })
  .strict();

const memberBaseShape = {
  name: z.string().min(1),
  isStatic: z.boolean().default(false),
  isSpecialName: z.boolean().default(false),
  attributes: z.array(typeRefSchema).default([]),
};

const AccessorSchema = z
  .object({ accessibility: AccessibilitySchema.default("public") })
  .strict();

const MemberSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("constructor"),
      ...memberBaseShape,
      name: z.string().min(1).default(".ctor"),
      accessibility: AccessibilitySchema.default("public"),
      parameters: z.array(ParameterSchema).default([]),
    })
    .strict(),
  z
    .object({
      kind: z.literal("field"),
      ...memberBaseShape,
      accessibility: AccessibilitySchema.default("public"),
      type: typeRefSchema,
      isInitOnly: z.boolean().default(false),
      isLiteral: z.boolean().default(false),
      constantValue: ConstantValueSchema.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("property"),
      ...memberBaseShape,
      type: typeRefSchema,
      getter: AccessorSchema.optional(),
      setter: AccessorSchema.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("method"),
      ...memberBaseShape,
      accessibility: AccessibilitySchema.default("public"),
      isAbstract: z.boolean().default(false),
      isVirtual: z.boolean().default(false),
      genericArguments: z.array(typeRefSchema).default([]),
      parameters: z.array(ParameterSchema).default([]),
      returnType: typeRefSchema.default("System.Void"),
    })
    .strict(),
  z
    .object({
      kind: z.literal("event"),
      ...memberBaseShape,
      accessibility: AccessibilitySchema.default("public"),
      type: typeRefSchema,
    })
    .strict(),
]);

const TypeSchema = z
  .object({
    namespace: z.string().min(1).optional(),
    name: z.string().min(1),
    kind: z.enum(["class", "struct", "interface", "enum", "delegate"]),
    accessibility: AccessibilitySchema.default("public"),
    isAbstract: z.boolean().default(false),
    isSealed: z.boolean().default(false),
    genericArguments: z.array(typeRefSchema).default([]),
    baseType: typeRefSchema.optional(),
    interfaces: z.array(typeRefSchema).default([]),
    attributes: z.array(typeRefSchema).default([]),
    members: z.array(MemberSchema).default([]),
  })
  .strict();

export const TypeLibraryManifestSchema = z
  .object({
    assembly: z
      .object({
        name: z.string().min(1),
        version: z.string().min(1).default("0.0.0.0"),
        targetFramework: z
          .object({
            name: z.string().min(1),
            displayName: z.string().optional(),
          })
          .strict()
          .optional(),
        references: z.array(z.string().min(1)).default([]),
      })
      .strict(),
    documentationFile: z.string().min(1).optional(),
    types: z.array(TypeSchema).default([]),
  })
  .strict();

export type TypeLibraryManifest = z.infer<typeof TypeLibraryManifestSchema>;
/** A manifest as written, before defaults are applied. */
export type TypeLibraryManifestInput = z.input<typeof TypeLibraryManifestSchema>;
type ManifestType = TypeLibraryManifest["types"][number];
type ManifestMember = ManifestType["members"][number];
type ManifestParameter = z.infer<typeof ParameterSchema>;

const toParameter = (parameter: ManifestParameter): ParameterInfo => ({
  name: parameter.name,
  parameterType: parameter.type,
  isOut: parameter.isOut,
  isIn: parameter.isIn,
  isParams: parameter.isParams,
  isOptional: parameter.isOptional,
  defaultValue: parameter.defaultValue,
});

const toMember = (
  member: ManifestMember,
  declaringType: TypeInfo,
): MemberInfo | ConstructorInfo => {
  const base = {
    declaringType,
    name: member.name,
    isStatic: member.isStatic,
    isSpecialName: member.isSpecialName,
    attributes: member.attributes,
  };

  switch (member.kind) {
    case "constructor":
      return {
        ...base,
        kind: "constructor",
        accessibility: member.accessibility,
        parameters: member.parameters.map(toParameter),
      };
    case "field":
      return {
        ...base,
        kind: "field",
        accessibility: member.accessibility,
        fieldType: member.type,
        isInitOnly: member.isInitOnly,
        isLiteral: member.isLiteral,
        constantValue: member.constantValue,
      };
    case "property":
      return {
        ...base,
        kind: "property",
        propertyType: member.type,
        getter: member.getter,
        setter: member.setter,
      };
    case "method":
      return {
        ...base,
        kind: "method",
        accessibility: member.accessibility,
        isAbstract: member.isAbstract,
        isVirtual: member.isVirtual,
        genericArguments: member.genericArguments,
        parameters: member.parameters.map(toParameter),
        returnType: member.returnType,
      };
    case "event":
      return {
        ...base,
        kind: "event",
        accessibility: member.accessibility,
        eventType: member.type,
      };
  }
};

const toType = (manifestType: ManifestType, assembly: AssemblyInfo): TypeInfo => {
  const constructors: ConstructorInfo[] = [];
  const members: MemberInfo[] = [];
  const type: TypeInfo = {
    kind: "type",
    assembly,
    namespace: manifestType.namespace,
    name: manifestType.name,
    typeKind: manifestType.kind,
    accessibility: manifestType.accessibility,
    isAbstract: manifestType.isAbstract,
    isSealed: manifestType.isSealed,
    genericArguments: manifestType.genericArguments,
    baseType: manifestType.baseType,
    interfaces: manifestType.interfaces,
    attributes: manifestType.attributes,
    constructors,
    members,
  };

  manifestType.members.forEach((entry) => {
    const member = toMember(entry, type);
    if (member.kind === "constructor") {
      constructors.push(member);
      return;
    }
    members.push(member);
  });

  return type;
};

/** Links a validated manifest into an object graph with back references. */
export const createAssemblyInfo = (manifest: TypeLibraryManifest): AssemblyInfo => {
  const types: TypeInfo[] = [];
  const assembly: AssemblyInfo = {
    name: manifest.assembly.name,
    version: manifest.assembly.version,
    targetFramework: manifest.assembly.targetFramework,
    references: manifest.assembly.references,
    types,
  };
  manifest.types.forEach((entry) => types.push(toType(entry, assembly)));
  return assembly;
};

const formatIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;

export const parseManifest = ({
  source,
  file,
}: {
  source: string;
  file: string;
}): TypeLibraryManifest => {
  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    return failWith({
      code: "MF0001",
      params: { kind: "invalid-json", errorMessage: normalizeErrorMessage(error) },
      span: fileSpan(file),
    });
  }

  const parsed = TypeLibraryManifestSchema.safeParse(json);
  if (!parsed.success) {
    return failWith({
      code: "MF0002",
      params: {
        kind: "schema-violation",
        issues: parsed.error.issues.map(formatIssue),
      },
      span: fileSpan(file),
    });
  }
  return parsed.data;
};

export const readManifest = (file: string): TypeLibraryManifest => {
  let source: string;
  try {
    source = readFileSync(file, "utf8");
  } catch (error) {
    return failWith({
      code: "MF0001",
      params: { kind: "unreadable", errorMessage: normalizeErrorMessage(error) },
      span: fileSpan(file),
    });
  }
  return parseManifest({ source, file });
};
