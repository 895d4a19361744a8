import {
  createAssemblyInfo,
  createDocumentation,
  DiagnosticError,
  parseDocumentationXml,
  TypeLibraryManifestSchema,
  type AnyMemberInfo,
  type AssemblyInfo,
  type Diagnostic,
  type Documentation,
  type DocumentationFile,
  type TypeInfo,
  type TypeLibraryManifestInput,
} from "@apiref/metadata";

export const buildAssembly = (input: TypeLibraryManifestInput): AssemblyInfo =>
  createAssemblyInfo(TypeLibraryManifestSchema.parse(input));

export const docsFrom = (members: string): DocumentationFile =>
  parseDocumentationXml({
    file: "test.xml",
    source: `<?xml version="1.0"?>\n<doc><members>${members}</members></doc>`,
  });

export const typeNamed = (assembly: AssemblyInfo, name: string): TypeInfo => {
  const type = assembly.types.find((candidate) => candidate.name === name);
  if (!type) {
    throw new Error(`fixture type ${name} not found`);
  }
  return type;
};

export const membersNamed = <K extends AnyMemberInfo["kind"]>(
  type: TypeInfo,
  kind: K,
  name: string,
): Extract<AnyMemberInfo, { kind: K }>[] =>
  [...type.constructors, ...type.members].filter(
    (member): member is Extract<AnyMemberInfo, { kind: K }> =>
      member.kind === kind && member.name === name,
  );

export const memberNamed = <K extends AnyMemberInfo["kind"]>(
  type: TypeInfo,
  kind: K,
  name: string,
): Extract<AnyMemberInfo, { kind: K }> => {
  const [member] = membersNamed(type, kind, name);
  if (!member) {
    throw new Error(`fixture ${kind} ${name} not found on ${type.name}`);
  }
  return member;
};

export const diagnosticOf = (run: () => unknown): Diagnostic => {
  try {
    run();
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return error.diagnostic;
    }
    throw error;
  }
  throw new Error("expected a DiagnosticError");
};

/** One static factory class: the smallest library worth documenting. */
export const widgetManifest: TypeLibraryManifestInput = {
  assembly: {
    name: "Sample",
    version: "1.0.0.0",
    targetFramework: {
      name: ".NETStandard,Version=v2.0",
      displayName: ".NET Standard 2.0",
    },
    references: ["netstandard"],
  },
  types: [
    {
      namespace: "Sample",
      name: "Widget",
      kind: "class",
      isAbstract: true,
      isSealed: true,
      baseType: "System.Object",
      members: [
        {
          kind: "method",
          name: "Create",
          isStatic: true,
          parameters: [{ name: "count", type: "System.Int32" }],
          returnType: "Sample.Widget",
        },
      ],
    },
  ],
};

export const widgetDocs = `
  <member name="T:Sample.Widget">
    <summary>Factory for widgets.</summary>
  </member>
  <member name="M:Sample.Widget.Create(System.Int32)">
    <summary>Creates a widget.</summary>
    <param name="count">Number of parts.</param>
    <returns>The new widget.</returns>
  </member>`;

/** A class with every member kind, an enum, a delegate and a hidden type. */
export const gadgetManifest: TypeLibraryManifestInput = {
  assembly: {
    name: "Gadgets",
    version: "2.1.0.0",
    targetFramework: { name: ".NETCoreApp,Version=v8.0" },
    references: ["netstandard", "Sample"],
  },
  types: [
    {
      namespace: "Gadgets",
      name: "Gadget",
      kind: "class",
      baseType: "System.Object",
      interfaces: ["System.IDisposable"],
      attributes: ["System.SerializableAttribute"],
      members: [
        {
          kind: "constructor",
          parameters: [{ name: "size", type: "System.Int32" }],
        },
        { kind: "constructor", name: ".cctor", isStatic: true },
        { kind: "constructor", accessibility: "private" },
        {
          kind: "field",
          name: "Empty",
          type: "Gadgets.Gadget",
          isStatic: true,
          isInitOnly: true,
        },
        { kind: "field", name: "_size", type: "System.Int32", accessibility: "private" },
        { kind: "field", name: "value__", type: "System.Int32", isSpecialName: true },
        {
          kind: "property",
          name: "Size",
          type: "System.Int32",
          getter: {},
          setter: { accessibility: "protected" },
        },
        { kind: "property", name: "Secret", type: "System.String", setter: {} },
        {
          kind: "property",
          name: "Hidden",
          type: "System.String",
          getter: { accessibility: "internal" },
        },
        {
          kind: "property",
          name: "Default",
          type: "Gadgets.Gadget",
          isStatic: true,
          getter: {},
        },
        {
          kind: "method",
          name: "Resize",
          parameters: [{ name: "width", type: "System.Int32" }],
        },
        {
          kind: "method",
          name: "Resize",
          attributes: ["System.ObsoleteAttribute"],
          parameters: [
            { name: "width", type: "System.Int32" },
            { name: "height", type: "System.Int32" },
          ],
        },
        {
          kind: "method",
          name: "ToString",
          isVirtual: true,
          returnType: "System.String",
        },
        {
          kind: "method",
          name: "get_Size",
          isSpecialName: true,
          returnType: "System.Int32",
        },
        {
          kind: "method",
          name: "Reset",
          accessibility: "protected",
          isVirtual: true,
        },
        { kind: "method", name: "Helper", accessibility: "internal" },
        {
          kind: "method",
          name: "Parse",
          isStatic: true,
          parameters: [{ name: "text", type: "System.String" }],
          returnType: "Gadgets.Gadget",
        },
        { kind: "event", name: "Changed", type: "System.EventHandler" },
        {
          kind: "event",
          name: "Internal",
          type: "System.EventHandler",
          accessibility: "internal",
        },
        {
          kind: "event",
          name: "Created",
          type: "System.EventHandler",
          isStatic: true,
        },
      ],
    },
    {
      namespace: "Gadgets",
      name: "Mode",
      kind: "enum",
      isSealed: true,
      baseType: "System.Enum",
      members: [
        { kind: "field", name: "value__", type: "System.Int32", isSpecialName: true },
        {
          kind: "field",
          name: "Off",
          type: "Gadgets.Mode",
          isStatic: true,
          isLiteral: true,
          constantValue: 0,
        },
        {
          kind: "field",
          name: "On",
          type: "Gadgets.Mode",
          isStatic: true,
          isLiteral: true,
          constantValue: 1,
        },
      ],
    },
    {
      namespace: "Gadgets",
      name: "Handler",
      kind: "delegate",
      isSealed: true,
      baseType: "System.MulticastDelegate",
      members: [
        {
          kind: "constructor",
          parameters: [
            { name: "object", type: "System.Object" },
            { name: "method", type: "System.IntPtr" },
          ],
        },
        {
          kind: "method",
          name: "Invoke",
          isVirtual: true,
          parameters: [
            { name: "sender", type: "System.Object" },
            { name: "count", type: "System.Int32" },
          ],
        },
      ],
    },
    {
      namespace: "Gadgets",
      name: "Plumbing",
      kind: "class",
      accessibility: "internal",
      members: [{ kind: "method", name: "Flush" }],
    },
  ],
};

export const gadgetDocs = `
  <member name="T:Gadgets.Gadget">
    <summary>A configurable gadget.</summary>
    <remarks>Gadgets are not thread safe.</remarks>
  </member>
  <member name="M:Gadgets.Gadget.Resize(System.Int32)">
    <summary>Resizes to a square.</summary>
  </member>
  <member name="M:Gadgets.Gadget.Resize(System.Int32,System.Int32)">
    <summary>Resizes to a rectangle.</summary>
    <param name="width">New width.</param>
    <param name="height">New height.</param>
  </member>
  <member name="F:Gadgets.Mode.Off">
    <summary>Switched off.</summary>
  </member>
  <member name="T:Gadgets.Handler">
    <summary>Handles gadget events.</summary>
    <param name="sender">The source.</param>
    <param name="count">How many events.</param>
  </member>`;

export type Library = {
  assembly: AssemblyInfo;
  documentation: Documentation;
};

export const libraryFrom = (
  manifest: TypeLibraryManifestInput,
  docs = "",
): Library => {
  const assembly = buildAssembly(manifest);
  return {
    assembly,
    documentation: createDocumentation({
      assemblies: [assembly],
      files: [docsFrom(docs)],
    }),
  };
};
