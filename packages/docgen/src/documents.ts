import {
  failWith,
  fileSpan,
  type AssemblyInfo,
  type MemberInfo,
  type MethodInfo,
  type ParameterInfo,
  type TypeInfo,
  type TypeKind,
} from "@apiref/metadata";
import { DEFAULT_CODE_LANGUAGE, type Backend, type TableRow } from "./backend.js";
import { composeBadges, renderBadges } from "./badges.js";
import type { DocCommentRenderer } from "./doc-comment-renderer.js";
import type { TypeSelection } from "./introspector.js";
import type { PathResolver } from "./paths.js";
import {
  humanTypeName,
  humanTypeRefName,
  memberName,
  memberSignature,
  memberSyntax,
  parameterSignature,
  typeSyntax,
} from "./signatures.js";

export type DocumentContext = {
  backend: Backend;
  comments: DocCommentRenderer;
  paths: PathResolver;
};

const TYPE_KIND_LABELS: Readonly<Record<TypeKind, string>> = {
  class: "Class",
  struct: "Struct",
  interface: "Interface",
  enum: "Enum",
  delegate: "Delegate",
};

const MEMBER_KIND_LABELS: Readonly<Record<MemberInfo["kind"], string>> = {
  field: "Field",
  property: "Property",
  method: "Method",
  event: "Event",
};

// Assemblies every library references; not worth listing.
const IMPLICIT_REFERENCES: ReadonlySet<string> = new Set(["netstandard"]);

const section = (backend: Backend, level: number, title: string, text: string) =>
  text.length > 0 ? backend.header(level, title) + backend.block(text) : "";

export const frameworkName = (assembly: AssemblyInfo, type: TypeInfo): string => {
  const framework = assembly.targetFramework;
  if (!framework) {
    return failWith({
      code: "GN0001",
      params: {
        kind: "missing-target-framework",
        assembly: assembly.name,
        typeName: humanTypeName(type),
      },
      span: fileSpan(assembly.name),
    });
  }
  const displayName = framework.displayName?.trim();
  return displayName ? displayName : framework.name;
};

export const dependencyList = (assembly: AssemblyInfo, backend: Backend): string => {
  const links = assembly.references
    .filter((reference) => !IMPLICIT_REFERENCES.has(reference))
    .map((reference) => backend.link(backend.escape(reference), `../${reference}/`));
  return links.length > 0 ? links.join(", ") : "None";
};

const infoTable = (type: TypeInfo, { backend }: DocumentContext): string => {
  const assembly = type.assembly;
  const rows: TableRow[] = [
    [
      backend.bold("Namespace"),
      type.namespace ? backend.escape(type.namespace) : backend.italics("global"),
    ],
    [
      backend.bold("Assembly"),
      `${backend.escape(assembly.name)}, Version=${backend.escape(assembly.version)}`,
    ],
    [backend.bold("Framework"), backend.escape(frameworkName(assembly, type))],
    [backend.bold("Dependencies"), dependencyList(assembly, backend)],
  ];
  return backend.table("Info", "Value", rows);
};

/** One row per display name, linked to the member document. */
const memberTable = (
  title: string,
  members: readonly MemberInfo[],
  { backend, comments, paths }: DocumentContext,
): string => {
  if (members.length === 0) {
    return "";
  }

  const rows = new Map<string, TableRow>();
  members.forEach((member) => {
    const name = memberName(member);
    if (rows.has(name)) return;
    rows.set(name, [
      backend.link(backend.escape(name), paths.fileNameFor(member)),
      comments.summaryOf(member),
    ]);
  });

  return backend.header(2, title) + backend.table("Name", "Summary", [...rows.values()]);
};

const constructorTable = (
  selection: TypeSelection,
  { backend, comments }: DocumentContext,
): string => {
  if (selection.constructors.length === 0) {
    return "";
  }
  const rows = selection.constructors.map(
    (ctor): TableRow => [
      backend.inlineCode(memberSignature(ctor), DEFAULT_CODE_LANGUAGE),
      comments.summaryOf(ctor),
    ],
  );
  return backend.header(2, "Constructors") + backend.table("Name", "Summary", rows);
};

const enumValuesTable = (
  selection: TypeSelection,
  { backend, comments }: DocumentContext,
): string => {
  const values = selection.staticFields.filter((field) => field.isLiteral);
  if (values.length === 0) {
    return "";
  }
  const rows = values.map((field): TableRow => {
    const value = field.constantValue;
    const text = value === undefined ? field.name : `${field.name} = ${String(value)}`;
    return [backend.inlineCode(text, DEFAULT_CODE_LANGUAGE), comments.summaryOf(field)];
  });
  return backend.header(2, "Values") + backend.table("Name", "Summary", rows);
};

const parameterRows = (
  parameters: readonly ParameterInfo[],
  describe: (name: string) => string,
  backend: Backend,
): TableRow[] =>
  parameters.map((parameter) => [
    backend.inlineCode(parameterSignature(parameter), DEFAULT_CODE_LANGUAGE),
    describe(parameter.name),
  ]);

const isInvokeMethod = (member: MemberInfo): member is MethodInfo =>
  member.kind === "method" && member.name === "Invoke";

// Delegate parameters come from Invoke; their docs live on the delegate type.
const delegateParameterTable = (
  type: TypeInfo,
  { backend, comments }: DocumentContext,
): string => {
  const invoke = type.members.find(isInvokeMethod);
  if (!invoke || invoke.parameters.length === 0) {
    return "";
  }
  const rows = parameterRows(
    invoke.parameters,
    (name) => comments.parameterOf(type, name),
    backend,
  );
  return backend.header(2, "Parameters") + backend.table("Name", "Description", rows);
};

const categoryTables = (selection: TypeSelection, context: DocumentContext): string => {
  switch (selection.type.typeKind) {
    case "enum":
      return enumValuesTable(selection, context);
    case "delegate":
      return delegateParameterTable(selection.type, context);
    default:
      return [
        constructorTable(selection, context),
        memberTable("Fields", selection.fields, context),
        memberTable("Properties", selection.properties, context),
        memberTable("Methods", selection.methods, context),
        memberTable("Events", selection.events, context),
      ].join("");
  }
};

export const typeDocumentTitle = (type: TypeInfo): string =>
  `${humanTypeName(type)} ${TYPE_KIND_LABELS[type.typeKind]}`;

export const renderTypeDocument = (
  selection: TypeSelection,
  context: DocumentContext,
): string => {
  const { backend, comments } = context;
  const type = selection.type;
  const title = typeDocumentTitle(type);

  let body = backend.header(1, backend.escape(title));
  body += renderBadges(composeBadges(type), backend);

  const summary = comments.summaryOf(type);
  if (summary.length > 0) {
    body += backend.block(summary);
  }

  body += infoTable(type, context);
  body += backend.header(2, "Syntax") + backend.code(typeSyntax(type));
  body += section(backend, 2, "Remarks", comments.remarksOf(type));
  body += section(backend, 2, "Example", comments.exampleOf(type));
  body += categoryTables(selection, context);

  return backend.page(title, body);
};

const overloadHeading = (member: MemberInfo): string =>
  member.kind === "method" ? memberSignature(member, true) : memberName(member);

const renderOverload = (
  member: MemberInfo,
  isOverloaded: boolean,
  { backend, comments }: DocumentContext,
): string => {
  const level = isOverloaded ? 3 : 2;
  let text = isOverloaded
    ? backend.header(
        2,
        backend.inlineCode(overloadHeading(member), DEFAULT_CODE_LANGUAGE),
      )
    : "";

  text += renderBadges(composeBadges(member), backend);

  const summary = comments.summaryOf(member);
  if (summary.length > 0) {
    text += backend.block(summary);
  }

  text += backend.header(level, "Syntax") + backend.code(memberSyntax(member));

  if (member.kind === "method") {
    if (member.parameters.length > 0) {
      const rows = parameterRows(
        member.parameters,
        (name) => comments.parameterOf(member, name),
        backend,
      );
      text += backend.header(level, "Parameters");
      text += backend.table("Name", "Description", rows);
    }

    const returnType = humanTypeRefName(member.returnType);
    if (returnType !== "void") {
      const returns = comments.returnsOf(member);
      text += backend.header(level, "Returns");
      const returnCode = backend.inlineCode(returnType, DEFAULT_CODE_LANGUAGE);
      text += backend.block(`${returnCode} ${returns}`.trim());
    }
  }

  text += section(backend, level, "Remarks", comments.remarksOf(member));
  text += section(backend, level, "Example", comments.exampleOf(member));
  return text;
};

export const memberDocumentTitle = (member: MemberInfo): string =>
  `${humanTypeName(member.declaringType)}.${memberName(member)} ${MEMBER_KIND_LABELS[member.kind]}`;

/**
 * One document for an overload group. Members appear in declaration order,
 * each with its own documentation comment.
 */
export const renderMemberDocument = (
  group: readonly [MemberInfo, ...MemberInfo[]],
  context: DocumentContext,
): string => {
  const { backend, paths } = context;
  const [first] = group;
  const type = first.declaringType;
  const title = memberDocumentTitle(first);

  let body = backend.header(1, backend.escape(title));
  body += backend.block(
    `${backend.italics("Declared by")} ${backend.link(
      backend.escape(humanTypeName(type)),
      paths.fileNameFor(type),
    )}`,
  );

  const isOverloaded = group.length > 1;
  body += group
    .map((member) => renderOverload(member, isOverloaded, context))
    .join(backend.divider());

  return backend.page(title, body);
};
