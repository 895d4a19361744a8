import { describe, expect, it } from "vitest";
import { parseTypeRefShorthand, type TypeRef } from "@apiref/metadata";
import {
  eventSyntax,
  fieldSyntax,
  humanTypeName,
  humanTypeRefName,
  memberName,
  memberSignature,
  methodSyntax,
  propertySyntax,
  stripArity,
  typeSyntax,
} from "../signatures.js";
import { buildAssembly, gadgetManifest, memberNamed, typeNamed } from "./helpers.js";

const ref = (shorthand: string, genericArguments: TypeRef[] = []): TypeRef => ({
  ...parseTypeRefShorthand(shorthand),
  genericArguments,
});

const T = { name: "T", isGenericParameter: true };
const U = { name: "U", isGenericParameter: true };
const V = { name: "V", isGenericParameter: true };

const assembly = buildAssembly({
  assembly: { name: "Sample" },
  types: [
    {
      namespace: "Sample",
      name: "Pair`2",
      kind: "class",
      genericArguments: [T, U],
      baseType: "System.Object",
      interfaces: [
        {
          name: "IEquatable`1",
          namespace: "System",
          genericArguments: [{ name: "Pair`2", namespace: "Sample", genericArguments: [T, U] }],
        },
      ],
      members: [
        { kind: "constructor", parameters: [{ name: "first", type: T }, { name: "second", type: U }] },
        {
          kind: "method",
          name: "Convert",
          genericArguments: [V],
          parameters: [{ name: "value", type: V }],
          returnType: V,
        },
        {
          kind: "method",
          name: "Configure",
          parameters: [
            { name: "label", type: "System.String", isOptional: true, defaultValue: "x" },
            { name: "limit", type: "System.Int32", isOptional: true, defaultValue: 5 },
            { name: "owner", type: "System.Object", isOptional: true, defaultValue: null },
            { name: "strict", type: "System.Boolean", isOptional: true, defaultValue: false },
          ],
        },
        {
          kind: "method",
          name: "TryRead",
          returnType: "System.Boolean",
          parameters: [
            { name: "result", type: "System.Int32&", isOut: true },
            { name: "buffer", type: "System.Byte[]&", isIn: true },
            { name: "state", type: "System.Object&" },
            { name: "values", type: "System.String[]", isParams: true },
          ],
        },
        { kind: "method", name: "Reset", accessibility: "protected", isAbstract: true },
        {
          kind: "property",
          name: "Count",
          type: "System.Int32",
          getter: {},
          setter: { accessibility: "protected" },
        },
        {
          kind: "property",
          name: "Label",
          type: "System.String",
          getter: {},
          setter: { accessibility: "private" },
        },
        { kind: "field", name: "Max", type: "System.Int32", isStatic: true, isLiteral: true },
        {
          kind: "field",
          name: "Empty",
          type: "Sample.Widget",
          isStatic: true,
          isInitOnly: true,
        },
        { kind: "event", name: "Changed", type: "System.EventHandler" },
      ],
    },
    {
      namespace: "Sample",
      name: "Widget",
      kind: "class",
      isAbstract: true,
      isSealed: true,
      baseType: "System.Object",
    },
    {
      namespace: "Sample",
      name: "Point",
      kind: "struct",
      isSealed: true,
      baseType: "System.ValueType",
      interfaces: ["System.IComparable"],
    },
    { namespace: "Sample", name: "Shape", kind: "class", isAbstract: true, baseType: "Sample.Figure" },
  ],
});

const pair = typeNamed(assembly, "Pair`2");

describe("human type names", () => {
  it("strips arity markers", () => {
    expect(stripArity("List`1")).toBe("List");
    expect(stripArity("Widget")).toBe("Widget");
  });

  it("renders generic arguments joined by a pipe", () => {
    expect(humanTypeName(pair)).toBe("Pair<T|U>");
  });

  it("renders nested generic arguments recursively", () => {
    const dictionary = ref("System.Collections.Generic.Dictionary`2", [
      ref("System.String"),
      ref("System.Collections.Generic.List`1", [ref("System.Int32")]),
    ]);
    expect(humanTypeRefName(dictionary)).toBe("Dictionary<string|List<int>>");
  });

  it("renders keywords, nullables, arrays and by-reference types", () => {
    expect(humanTypeRefName(ref("System.Object"))).toBe("object");
    expect(humanTypeRefName(ref("System.Nullable`1", [ref("System.Int32")]))).toBe("int?");
    expect(humanTypeRefName(ref("System.Int32[]"))).toBe("int[]");
    expect(humanTypeRefName({ ...ref("System.Double"), arrayRank: 2 })).toBe("double[,]");
    expect(humanTypeRefName(ref("System.Int32&"))).toBe("int&");
    expect(humanTypeRefName(ref("Other.String"))).toBe("String");
  });
});

describe("typeSyntax", () => {
  it("omits the root object base and lists interfaces", () => {
    expect(typeSyntax(pair)).toBe("public class Pair<T|U> : IEquatable<Pair<T|U>>");
  });

  it("renders abstract sealed classes as static", () => {
    expect(typeSyntax(typeNamed(assembly, "Widget"))).toBe("public static class Widget");
  });

  it("omits modifiers and the base type of value types", () => {
    expect(typeSyntax(typeNamed(assembly, "Point"))).toBe("public struct Point : IComparable");
  });

  it("keeps a non-root base type", () => {
    expect(typeSyntax(typeNamed(assembly, "Shape"))).toBe("public abstract class Shape : Figure");
  });
});

describe("member names and signatures", () => {
  it("names constructors after the declaring type without arity", () => {
    const [ctor] = pair.constructors;
    expect(ctor && memberName(ctor)).toBe("Pair");
    expect(ctor && memberSignature(ctor)).toBe("Pair(T first, U second)");
  });

  it("renders generic methods with their arguments", () => {
    const convert = memberNamed(pair, "method", "Convert");
    expect(memberName(convert)).toBe("Convert<V>");
    expect(methodSyntax(convert)).toBe("public V Convert<V>(V value)");
  });

  it("renders default values", () => {
    const configure = memberNamed(pair, "method", "Configure");
    expect(memberSignature(configure)).toBe(
      'Configure(string label = "x", int limit = 5, object owner = null, bool strict = false)',
    );
    expect(memberSignature(configure, true)).toBe("Configure(string, int, object, bool)");
  });

  it("renders parameter modifiers without the by-reference marker", () => {
    const tryRead = memberNamed(pair, "method", "TryRead");
    expect(memberSignature(tryRead)).toBe(
      "TryRead(out int result, in byte[] buffer, ref object state, params string[] values)",
    );
    expect(memberSignature(tryRead, true)).toBe(
      "TryRead(out int, in byte[], ref object, params string[])",
    );
    expect(methodSyntax(tryRead)).toBe(
      "public bool TryRead(out int result, in byte[] buffer, ref object state, params string[] values)",
    );
  });

  it("renders method modifiers", () => {
    expect(methodSyntax(memberNamed(pair, "method", "Reset"))).toBe(
      "protected abstract void Reset()",
    );
  });
});

describe("member syntax lines", () => {
  it("renders visible accessors only", () => {
    expect(propertySyntax(memberNamed(pair, "property", "Count"))).toBe(
      "int Count { get; protected set; }",
    );
    expect(propertySyntax(memberNamed(pair, "property", "Label"))).toBe(
      "string Label { get; }",
    );
  });

  it("renders fields", () => {
    expect(fieldSyntax(memberNamed(pair, "field", "Max"))).toBe("public const int Max");
    expect(fieldSyntax(memberNamed(pair, "field", "Empty"))).toBe(
      "public static readonly Widget Empty",
    );
  });

  it("renders events", () => {
    expect(eventSyntax(memberNamed(pair, "event", "Changed"))).toBe(
      "public event EventHandler Changed",
    );
  });

  it("renders static events and methods with their modifier", () => {
    const gadget = typeNamed(buildAssembly(gadgetManifest), "Gadget");
    expect(eventSyntax(memberNamed(gadget, "event", "Created"))).toBe(
      "public static event EventHandler Created",
    );
    expect(methodSyntax(memberNamed(gadget, "method", "Parse"))).toBe(
      "public static Gadget Parse(string text)",
    );
  });
});
