import {
  isVisibleAccessibility,
  type ConstructorInfo,
  type EventInfo,
  type FieldInfo,
  type MemberInfo,
  type MethodInfo,
  type PropertyInfo,
  type TypeInfo,
} from "@apiref/metadata";

/**
 * The documented members of one type, split by kind and scope. Every list
 * is frozen; selecting another type produces a new value and leaves this
 * one untouched.
 */
export type TypeSelection = Readonly<{
  type: TypeInfo;
  constructors: readonly ConstructorInfo[];

  instanceFields: readonly FieldInfo[];
  instanceProperties: readonly PropertyInfo[];
  instanceMethods: readonly MethodInfo[];
  instanceEvents: readonly EventInfo[];

  staticFields: readonly FieldInfo[];
  staticProperties: readonly PropertyInfo[];
  staticMethods: readonly MethodInfo[];
  staticEvents: readonly EventInfo[];

  fields: readonly FieldInfo[];
  properties: readonly PropertyInfo[];
  methods: readonly MethodInfo[];
  events: readonly EventInfo[];

  instanceMembers: readonly MemberInfo[];
  staticMembers: readonly MemberInfo[];
  members: readonly MemberInfo[];
}>;

const IGNORED_METHOD_NAMES: ReadonlySet<string> = new Set([
  "Equals",
  "ToString",
  "GetHashCode",
  "Finalize",
]);

export const isVisibleProperty = (property: PropertyInfo): boolean =>
  property.getter !== undefined &&
  isVisibleAccessibility(property.getter.accessibility);

const isDocumentedField = (field: FieldInfo) =>
  !field.isSpecialName && isVisibleAccessibility(field.accessibility);

const isDocumentedProperty = (property: PropertyInfo) =>
  !property.isSpecialName && isVisibleProperty(property);

const isDocumentedMethod = (method: MethodInfo) =>
  !method.isSpecialName &&
  isVisibleAccessibility(method.accessibility) &&
  !IGNORED_METHOD_NAMES.has(method.name);

const isDocumentedEvent = (event: EventInfo) =>
  !event.isSpecialName && isVisibleAccessibility(event.accessibility);

const frozen = <T>(items: readonly T[]): readonly T[] => Object.freeze([...items]);

const ofKind = <K extends MemberInfo["kind"]>(
  members: readonly MemberInfo[],
  kind: K,
): Extract<MemberInfo, { kind: K }>[] =>
  members.filter(
    (member): member is Extract<MemberInfo, { kind: K }> => member.kind === kind,
  );

const selectScope = (members: readonly MemberInfo[]) => ({
  fields: frozen(ofKind(members, "field").filter(isDocumentedField)),
  properties: frozen(ofKind(members, "property").filter(isDocumentedProperty)),
  methods: frozen(ofKind(members, "method").filter(isDocumentedMethod)),
  events: frozen(ofKind(members, "event").filter(isDocumentedEvent)),
});

const concatMembers = (scope: ReturnType<typeof selectScope>): readonly MemberInfo[] =>
  frozen<MemberInfo>([
    ...scope.fields,
    ...scope.properties,
    ...scope.methods,
    ...scope.events,
  ]);

export const selectType = (type: TypeInfo): TypeSelection => {
  const instance = selectScope(type.members.filter((member) => !member.isStatic));
  const statics = selectScope(type.members.filter((member) => member.isStatic));

  const all = {
    fields: frozen([...instance.fields, ...statics.fields]),
    properties: frozen([...instance.properties, ...statics.properties]),
    methods: frozen([...instance.methods, ...statics.methods]),
    events: frozen([...instance.events, ...statics.events]),
  };

  return Object.freeze({
    type,
    // Constructors are always instance scope and are listed whatever their
    // accessibility.
    constructors: frozen(type.constructors.filter((ctor) => !ctor.isStatic)),

    instanceFields: instance.fields,
    instanceProperties: instance.properties,
    instanceMethods: instance.methods,
    instanceEvents: instance.events,

    staticFields: statics.fields,
    staticProperties: statics.properties,
    staticMethods: statics.methods,
    staticEvents: statics.events,

    fields: all.fields,
    properties: all.properties,
    methods: all.methods,
    events: all.events,

    instanceMembers: concatMembers(instance),
    staticMembers: concatMembers(statics),
    members: concatMembers(all),
  });
};
