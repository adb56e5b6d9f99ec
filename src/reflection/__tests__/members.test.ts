import { describe, expect, test } from "vitest";
import { isDiagnosticError } from "../../diagnostics/index.js";
import { objectType } from "../describe.js";
import {
  resolveField,
  resolveIndexer,
  resolveMethod,
  resolveProperty,
} from "../members.js";
import { collectionTraitsOf, createSerializationTarget } from "../target.js";
import { Types, typeName } from "../types.js";

const diagnosticCodeOf = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return isDiagnosticError(error) ? error.code : "not-a-diagnostic";
  }
  return undefined;
};

const Counter = objectType({
  name: "Counter",
  fields: { Total: Types.int32, Label: Types.string },
  properties: [{ name: "Display", type: Types.string }],
  methods: [
    { name: "add", parameters: [Types.int32], returns: Types.int32 },
    { name: "add", parameters: [Types.float64], returns: Types.float64 },
    { name: "reset" },
  ],
});

describe("member resolution", () => {
  test("resolves a method by exact parameter types", () => {
    const method = resolveMethod(Counter, "add", [Types.float64]);
    expect(method.returnType).toBe(Types.float64);
  });

  test("overloads without parameter types are ambiguous", () => {
    expect(diagnosticCodeOf(() => resolveMethod(Counter, "add"))).toBe("RF0002");
  });

  test("missing members are unresolved", () => {
    expect(diagnosticCodeOf(() => resolveMethod(Counter, "add", [Types.string]))).toBe(
      "RF0001"
    );
    expect(diagnosticCodeOf(() => resolveField(Counter, "Missing"))).toBe("RF0001");
    expect(diagnosticCodeOf(() => resolveProperty(Counter, "Missing"))).toBe("RF0001");
  });

  test("unresolved method message names the owner and signature", () => {
    expect(() => resolveMethod(Counter, "scale", [Types.int32])).toThrow(
      "Counter has no method scale(int32)"
    );
  });

  test("map indexer requires the exact key and value types", () => {
    const map = Types.map(Types.string, Types.int32);
    const indexer = resolveIndexer(map, "item", Types.string, Types.int32);
    expect(indexer.indexerSetter).toBe("set");
    expect(
      diagnosticCodeOf(() => resolveIndexer(map, "item", Types.string, Types.float64))
    ).toBe("RF0001");
  });
});

describe("serialization target", () => {
  test("object members follow declared field order", () => {
    const target = createSerializationTarget(Counter);
    expect(target.isTuple).toBe(false);
    expect(target.members.map((member) => member.name)).toEqual(["Total", "Label"]);
  });

  test("serializable members select fields and properties in the given order", () => {
    const Selected = objectType({
      name: "Selected",
      fields: { A: Types.int32, B: Types.string },
      properties: [{ name: "C", type: Types.boolean }],
      serializableMembers: ["C", "A"],
    });
    const target = createSerializationTarget(Selected);
    expect(target.members.map((member) => [member.name, typeName(member.type)])).toEqual([
      ["C", "boolean"],
      ["A", "int32"],
    ]);
  });

  test("tuple items are named by position", () => {
    const target = createSerializationTarget(Types.tuple(Types.string, Types.int32));
    expect(target.isTuple).toBe(true);
    expect(target.members.map((member) => member.name)).toEqual(["item1", "item2"]);
    expect(target.instanceConstructor.create()).toEqual([]);
  });

  test("primitive targets are rejected", () => {
    expect(diagnosticCodeOf(() => createSerializationTarget(Types.int32))).toBe("CG0001");
  });
});

describe("collection traits", () => {
  test("arrays enumerate their elements and count by length", () => {
    const traits = collectionTraitsOf(Types.array(Types.string));
    if (traits.kind === "none") throw new Error("expected array traits");
    expect(traits.kind).toBe("array");
    expect(typeName(traits.elementType)).toBe("string");
    expect(traits.count.name).toBe("length");
  });

  test("maps enumerate key and value tuples and count by size", () => {
    const traits = collectionTraitsOf(Types.map(Types.string, Types.int32));
    if (traits.kind === "none") throw new Error("expected map traits");
    expect(typeName(traits.elementType)).toBe("[string,int32]");
    expect(traits.count.name).toBe("size");
  });

  test("objects have no collection traits", () => {
    expect(collectionTraitsOf(Counter).kind).toBe("none");
  });
});
