import {
  isVisibleAccessibility,
  type Accessibility,
  type AnyMemberInfo,
  type ConstantValue,
  type ConstructorInfo,
  type EventInfo,
  type FieldInfo,
  type MethodInfo,
  type ParameterInfo,
  type PropertyInfo,
  type TypeInfo,
  type TypeRef,
} from "@apiref/metadata";

const GENERIC_SEPARATOR = "|";

const SYSTEM_KEYWORDS: ReadonlyMap<string, string> = new Map([
  ["Boolean", "bool"],
  ["Byte", "byte"],
  ["SByte", "sbyte"],
  ["Char", "char"],
  ["Decimal", "decimal"],
  ["Double", "double"],
  ["Single", "float"],
  ["Int16", "short"],
  ["UInt16", "ushort"],
  ["Int32", "int"],
  ["UInt32", "uint"],
  ["Int64", "long"],
  ["UInt64", "ulong"],
  ["Object", "object"],
  ["String", "string"],
  ["Void", "void"],
]);

export const normalizeSpaces = (value: string): string =>
  value.replace(/\s+/g, " ");

/** Drops the compiler's generic arity suffix (``List`1`` → `List`). */
export const stripArity = (name: string): string => {
  const index = name.indexOf("`");
  return index >= 0 ? name.slice(0, index) : name;
};

const withGenericArguments = (
  name: string,
  args: readonly TypeRef[],
): string =>
  args.length > 0
    ? `${stripArity(name)}<${args.map(humanTypeRefName).join(GENERIC_SEPARATOR)}>`
    : stripArity(name);

const isSystemType = (ref: TypeRef, name: string): boolean =>
  ref.namespace === "System" && stripArity(ref.name) === name;

const arraySuffix = (rank: number): string =>
  rank > 0 ? `[${",".repeat(rank - 1)}]` : "";

export const humanTypeRefName = (ref: TypeRef): string => {
  let name: string;

  const keyword =
    ref.namespace === "System" && ref.genericArguments.length === 0
      ? SYSTEM_KEYWORDS.get(ref.name)
      : undefined;
  const nullableArgument =
    isSystemType(ref, "Nullable") && ref.genericArguments.length === 1
      ? ref.genericArguments[0]
      : undefined;

  if (keyword) {
    name = keyword;
  } else if (nullableArgument) {
    name = `${humanTypeRefName(nullableArgument)}?`;
  } else {
    name = withGenericArguments(ref.name, ref.genericArguments);
  }

  return `${name}${arraySuffix(ref.arrayRank)}${ref.isByRef ? "&" : ""}`;
};

export const humanTypeName = (type: TypeInfo): string =>
  withGenericArguments(type.name, type.genericArguments);

const accessKeywords: Readonly<Record<Accessibility, string>> = {
  public: "public",
  protected: "protected",
  internal: "internal",
  "protected-internal": "protected internal",
  "private-protected": "private protected",
  private: "private",
};

const typeModifiers = (type: TypeInfo): string => {
  if (type.typeKind !== "class") {
    return "";
  }
  if (type.isAbstract && type.isSealed) {
    return "static";
  }
  if (type.isAbstract) {
    return "abstract";
  }
  return type.isSealed ? "sealed" : "";
};

const isValueType = (type: TypeInfo): boolean =>
  type.typeKind === "struct" || type.typeKind === "enum";

const isRootObject = (ref: TypeRef): boolean => isSystemType(ref, "Object");

export const inheritanceList = (type: TypeInfo): readonly string[] => {
  const inherits: string[] = [];
  if (!isValueType(type) && type.baseType && !isRootObject(type.baseType)) {
    inherits.push(humanTypeRefName(type.baseType));
  }
  type.interfaces.forEach((iface) => inherits.push(humanTypeRefName(iface)));
  return inherits;
};

/** `public static class Widget : Base, IFace` */
export const typeSyntax = (type: TypeInfo): string => {
  const access = normalizeSpaces(
    `${accessKeywords[type.accessibility]} ${typeModifiers(type)} ${type.typeKind}`,
  ).trim();
  const inherits = inheritanceList(type);

  let text = `${access} ${humanTypeName(type)}`;
  if (inherits.length > 0) {
    text += ` : ${inherits.join(", ")}`;
  }
  return normalizeSpaces(text).trim();
};

export const memberName = (member: AnyMemberInfo): string => {
  switch (member.kind) {
    case "constructor":
      return stripArity(member.declaringType.name);
    case "method":
      return withGenericArguments(member.name, member.genericArguments);
    default:
      return member.name;
  }
};

export const defaultValueText = (value: ConstantValue | undefined): string => {
  if (value === null || value === undefined) {
    return "null";
  }
  if (typeof value === "string") {
    return `"${value}"`;
  }
  return String(value);
};

export const parameterSignature = (
  parameter: ParameterInfo,
  compact = false,
): string => {
  let prefix = "";
  let suffix = "";

  if (parameter.parameterType.isByRef) {
    if (parameter.isOut) {
      prefix += "out ";
    } else if (parameter.isIn) {
      prefix += "in ";
    } else {
      prefix += "ref ";
    }
  }

  if (parameter.isParams) {
    prefix += "params ";
  }

  if (parameter.isOptional) {
    suffix = ` = ${defaultValueText(parameter.defaultValue)}`;
  }

  let typeName = humanTypeRefName(parameter.parameterType);
  if (typeName.endsWith("&")) {
    typeName = typeName.slice(0, -1);
  }

  return compact
    ? `${prefix}${typeName}`
    : `${prefix}${typeName} ${parameter.name}${suffix}`;
};

/** `Name(int count, string label = "x")`, or `Name(int, string)` when compact. */
export const memberSignature = (
  member: MethodInfo | ConstructorInfo,
  compact = false,
): string => {
  const parameters = member.parameters
    .map((parameter) => parameterSignature(parameter, compact))
    .join(", ");
  return `${memberName(member)}(${parameters.trim()})`;
};

const visibilityPrefix = (accessibility: Accessibility): string =>
  accessibility === "public" || accessibility === "protected"
    ? accessibility
    : "";

const methodModifiers = (member: MethodInfo | ConstructorInfo): string => {
  if (member.kind === "constructor") {
    return member.isStatic ? "static" : "";
  }
  if (member.isStatic) {
    return "static";
  }
  if (member.isAbstract) {
    return "abstract";
  }
  return member.isVirtual ? "virtual" : "";
};

/** `public static int Create(int count)` */
export const methodSyntax = (member: MethodInfo | ConstructorInfo): string => {
  const returnType =
    member.kind === "method" ? humanTypeRefName(member.returnType) : "";
  return normalizeSpaces(
    [
      visibilityPrefix(member.accessibility),
      methodModifiers(member),
      returnType,
      memberSignature(member, false),
    ].join(" "),
  ).trim();
};

/** `int Count { get; protected set; }` */
export const propertySyntax = (property: PropertyInfo): string => {
  let accessors = "";

  if (property.getter && isVisibleAccessibility(property.getter.accessibility)) {
    if (property.getter.accessibility === "protected") {
      accessors += "protected ";
    }
    accessors += "get; ";
  }

  if (property.setter && isVisibleAccessibility(property.setter.accessibility)) {
    if (property.setter.accessibility === "protected") {
      accessors += "protected ";
    }
    accessors += "set;";
  }

  return `${humanTypeRefName(property.propertyType)} ${memberName(property)} { ${accessors.trim()} }`;
};

export const fieldSyntax = (field: FieldInfo): string =>
  normalizeSpaces(
    [
      visibilityPrefix(field.accessibility),
      field.isLiteral ? "const" : field.isStatic ? "static" : "",
      field.isInitOnly ? "readonly" : "",
      humanTypeRefName(field.fieldType),
      field.name,
    ].join(" "),
  ).trim();

export const eventSyntax = (event: EventInfo): string =>
  normalizeSpaces(
    [
      visibilityPrefix(event.accessibility),
      event.isStatic ? "static" : "",
      "event",
      humanTypeRefName(event.eventType),
      event.name,
    ].join(" "),
  ).trim();

export const memberSyntax = (member: AnyMemberInfo): string => {
  switch (member.kind) {
    case "constructor":
    case "method":
      return methodSyntax(member);
    case "property":
      return propertySyntax(member);
    case "field":
      return fieldSyntax(member);
    case "event":
      return eventSyntax(member);
  }
};
