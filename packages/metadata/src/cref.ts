import type {
  AnyMemberInfo,
  DocumentedEntity,
  MethodInfo,
  ParameterInfo,
  TypeInfo,
  TypeRef,
} from "./types.js";

// Keys follow the XML documentation-comment ID format:
//   T:Sample.Widget            M:Sample.Widget.#ctor(System.Int32)
//   M:Sample.Widget.Map``1(``0) P:Sample.Widget.Count
//   F:Sample.Widget.Empty      E:Sample.Widget.Changed

const stripArity = (name: string): string => {
  const index = name.indexOf("`");
  return index >= 0 ? name.slice(0, index) : name;
};

export const qualifiedTypeName = ({
  namespace,
  name,
}: {
  namespace?: string;
  name: string;
}): string => (namespace ? `${namespace}.${name}` : name);

type GenericScope = {
  typeParameters: readonly string[];
  methodParameters: readonly string[];
};

const typeRefKey = (ref: TypeRef, scope: GenericScope): string => {
  let key: string;

  const methodIndex = ref.isGenericParameter
    ? scope.methodParameters.indexOf(ref.name)
    : -1;
  const typeIndex = ref.isGenericParameter
    ? scope.typeParameters.indexOf(ref.name)
    : -1;

  if (methodIndex >= 0) {
    key = `\`\`${methodIndex}`;
  } else if (typeIndex >= 0) {
    key = `\`${typeIndex}`;
  } else if (ref.genericArguments.length > 0) {
    const args = ref.genericArguments.map((arg) => typeRefKey(arg, scope));
    key = `${qualifiedTypeName({
      namespace: ref.namespace,
      name: stripArity(ref.name),
    })}{${args.join(",")}}`;
  } else {
    key = qualifiedTypeName(ref);
  }

  if (ref.arrayRank === 1) {
    key += "[]";
  } else if (ref.arrayRank > 1) {
    key += `[${Array.from({ length: ref.arrayRank }, () => "0:").join(",")}]`;
  }

  return ref.isByRef ? `${key}@` : key;
};

const parameterListKey = (
  parameters: readonly ParameterInfo[],
  scope: GenericScope,
): string =>
  parameters.length > 0
    ? `(${parameters
        .map((parameter) => typeRefKey(parameter.parameterType, scope))
        .join(",")})`
    : "";

const scopeOf = (type: TypeInfo, method?: MethodInfo): GenericScope => ({
  typeParameters: type.genericArguments.map((arg) => arg.name),
  methodParameters: method?.genericArguments.map((arg) => arg.name) ?? [],
});

export const typeCrefKey = (type: TypeInfo): string =>
  `T:${qualifiedTypeName(type)}`;

export const memberCrefKey = (member: AnyMemberInfo): string => {
  const owner = qualifiedTypeName(member.declaringType);

  switch (member.kind) {
    case "constructor":
      return `M:${owner}.${member.isStatic ? "#cctor" : "#ctor"}${parameterListKey(
        member.parameters,
        scopeOf(member.declaringType),
      )}`;
    case "method": {
      const arity =
        member.genericArguments.length > 0
          ? `\`\`${member.genericArguments.length}`
          : "";
      return `M:${owner}.${stripArity(member.name)}${arity}${parameterListKey(
        member.parameters,
        scopeOf(member.declaringType, member),
      )}`;
    }
    case "property":
      return `P:${owner}.${member.name}`;
    case "field":
      return `F:${owner}.${member.name}`;
    case "event":
      return `E:${owner}.${member.name}`;
  }
};

export const crefKeyOf = (entity: DocumentedEntity): string =>
  entity.kind === "type" ? typeCrefKey(entity) : memberCrefKey(entity);
