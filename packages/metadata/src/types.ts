export type Accessibility =
  | "public"
  | "protected"
  | "internal"
  | "protected-internal"
  | "private-protected"
  | "private";

export type TypeKind = "class" | "struct" | "interface" | "enum" | "delegate";

export type ConstantValue = string | number | boolean | null;

/**
 * A type as it appears inside a signature: a parameter, return, base or
 * attribute type. `name` keeps the metadata spelling, so generic
 * definitions carry their arity suffix (``Dictionary`2``).
 */
export type TypeRef = {
  name: string;
  namespace?: string;
  genericArguments: readonly TypeRef[];
  isGenericParameter: boolean;
  isByRef: boolean;
  /** Array rank; 0 for non-array types. */
  arrayRank: number;
};

export type TargetFramework = {
  name: string;
  displayName?: string;
};

export type AssemblyInfo = {
  name: string;
  version: string;
  targetFramework?: TargetFramework;
  references: readonly string[];
  types: readonly TypeInfo[];
};

export type TypeInfo = {
  kind: "type";
  assembly: AssemblyInfo;
  namespace?: string;
  name: string;
  typeKind: TypeKind;
  accessibility: Accessibility;
  isAbstract: boolean;
  isSealed: boolean;
  genericArguments: readonly TypeRef[];
  baseType?: TypeRef;
  interfaces: readonly TypeRef[];
  attributes: readonly TypeRef[];
  constructors: readonly ConstructorInfo[];
  members: readonly MemberInfo[];
};

export type ParameterInfo = {
  name: string;
  parameterType: TypeRef;
  isOut: boolean;
  isIn: boolean;
  isParams: boolean;
  isOptional: boolean;
  defaultValue?: ConstantValue;
};

type MemberBase = {
  declaringType: TypeInfo;
  name: string;
  isStatic: boolean;
  isSpecialName: boolean;
  attributes: readonly TypeRef[];
};

export type ConstructorInfo = MemberBase & {
  kind: "constructor";
  accessibility: Accessibility;
  parameters: readonly ParameterInfo[];
};

export type FieldInfo = MemberBase & {
  kind: "field";
  accessibility: Accessibility;
  fieldType: TypeRef;
  isInitOnly: boolean;
  isLiteral: boolean;
  constantValue?: ConstantValue;
};

export type AccessorInfo = {
  accessibility: Accessibility;
};

export type PropertyInfo = MemberBase & {
  kind: "property";
  propertyType: TypeRef;
  getter?: AccessorInfo;
  setter?: AccessorInfo;
};

export type MethodInfo = MemberBase & {
  kind: "method";
  accessibility: Accessibility;
  isAbstract: boolean;
  isVirtual: boolean;
  genericArguments: readonly TypeRef[];
  parameters: readonly ParameterInfo[];
  returnType: TypeRef;
};

export type EventInfo = MemberBase & {
  kind: "event";
  accessibility: Accessibility;
  eventType: TypeRef;
};

export type MemberInfo = FieldInfo | PropertyInfo | MethodInfo | EventInfo;

export type AnyMemberInfo = MemberInfo | ConstructorInfo;

export type DocumentedEntity = TypeInfo | AnyMemberInfo;

export const isVisibleAccessibility = (accessibility: Accessibility): boolean =>
  accessibility === "public" || accessibility === "protected";
