import { decode, encode } from "@msgpack/msgpack";
import { describe, expect, test } from "vitest";
import { isDiagnosticError } from "../../diagnostics/index.js";
import { objectType } from "../../reflection/describe.js";
import { Types, type TypeDefinition } from "../../reflection/types.js";
import {
  SerializationContext,
  type SerializationContextOptions,
} from "../../runtime/context.js";
import { MetadataRegistry } from "../../runtime/metadata.js";
import type { SerializerFactory } from "../../runtime/serializer.js";
import { SerializationMethodGeneratorManager } from "../container/manager.js";
import { EmittingSerializerBuilder } from "../emit/builder.js";
import { ExpressionSerializerBuilder } from "../expression/builder.js";
import { Color, Envelope, Person, Point, PointValue, Profile } from "./fixtures/types.js";

type BuildFactory = (type: TypeDefinition) => SerializerFactory;

const diagnosticCodeOf = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return isDiagnosticError(error) ? error.code : "not-a-diagnostic";
  }
  return undefined;
};

const expressionBackend = (): BuildFactory => (type) =>
  new ExpressionSerializerBuilder(type).buildSerializerFactory(new SerializationContext());

const emittingBackend =
  (flavor: "field-based" | "context-based") => (): BuildFactory => {
    const manager = new SerializationMethodGeneratorManager();
    return (type) =>
      new EmittingSerializerBuilder(type, { manager, flavor }).buildSerializerFactory(
        new SerializationContext()
      );
  };

const backends: [string, () => BuildFactory][] = [
  ["expression", expressionBackend],
  ["field-based emitting", emittingBackend("field-based")],
  ["context-based emitting", emittingBackend("context-based")],
];

const contextFor = (
  build: BuildFactory,
  options: Omit<SerializationContextOptions, "provider"> = {}
): SerializationContext =>
  new SerializationContext({ ...options, provider: (type, owner) => build(type)(owner) });

const ada = { Name: "Ada", Age: 36 };

// An object type whose name differs from a primitive's only by case.
const StringBox = objectType({ name: "String", fields: { Value: Types.string } });
const Holder = objectType({
  name: "Holder",
  fields: { A: Types.array(Types.string), B: Types.array(StringBox) },
});

const profile = {
  Owner: { Name: "Ada", Age: 36 },
  Favorite: 2,
  Tags: ["x", "y"],
  Scores: new Map([
    ["a", 1],
    ["b", 2],
  ]),
  Nickname: null,
  Home: { City: "Oslo", Zip: null },
  Pair: ["k", 7],
};

describe.each(backends)("%s builder", (_name, createBackend) => {
  const build = createBackend();

  test("packs an object as an array of its members", () => {
    const serializer = contextFor(build).getSerializer(Person);
    expect([...serializer.pack(ada)]).toEqual([0x92, 0xa3, 0x41, 0x64, 0x61, 0x24]);
  });

  test("packs an object as a map in map mode", () => {
    const serializer = contextFor(build, { serializationMethod: "map" }).getSerializer(Person);
    expect([...serializer.pack(ada)]).toEqual([
      0x82, 0xa4, 0x4e, 0x61, 0x6d, 0x65, 0xa3, 0x41, 0x64, 0x61, 0xa3, 0x41, 0x67, 0x65, 0x24,
    ]);
  });

  test("unpacks what either mode produced", () => {
    const arrays = contextFor(build).getSerializer(Person);
    const maps = contextFor(build, { serializationMethod: "map" }).getSerializer(Person);
    expect(arrays.unpack(maps.pack(ada))).toEqual(ada);
    expect(maps.unpack(arrays.pack(ada))).toEqual(ada);
  });

  test("skips trailing items and unknown keys", () => {
    const serializer = contextFor(build).getSerializer(Person);
    expect(serializer.unpack(encode(["Ada", 36, "extra"]))).toEqual(ada);
    expect(serializer.unpack(encode({ Extra: [1, 2], Age: 36, Name: "Ada" }))).toEqual(ada);
  });

  test("packs enums by name unless configured otherwise", () => {
    const context = contextFor(build);
    expect(decode(context.getSerializer(Color).pack(1))).toBe("Green");
    expect(context.getSerializer(Color).unpack(encode("Green"))).toBe(1);

    const byValue = contextFor(build, { enumSerializationMethod: "by-underlying-value" });
    expect([...byValue.getSerializer(Color).pack(1)]).toEqual([0x01]);
    expect(byValue.getSerializer(Color).unpack(Uint8Array.of(0x02))).toBe(2);
  });

  test("round-trips nested objects, collections, nullables and tuples", () => {
    const serializer = contextFor(build).getSerializer(Profile);
    const bytes = serializer.pack(profile);

    expect(decode(bytes)).toEqual([
      ["Ada", 36],
      "Blue",
      ["x", "y"],
      { a: 1, b: 2 },
      null,
      ["Oslo", null],
      ["k", 7],
    ]);
    expect(serializer.unpack(bytes)).toEqual(profile);
  });

  test("round-trips present nullable values", () => {
    const serializer = contextFor(build, { serializationMethod: "map" }).getSerializer(Profile);
    const value = { ...profile, Nickname: "Countess", Home: { City: "Oslo", Zip: 150 } };
    expect(serializer.unpack(serializer.pack(value))).toEqual(value);
  });

  test("null collections pack as nil", () => {
    const serializer = contextFor(build).getSerializer(Profile);
    const value = { ...profile, Tags: null, Scores: null };
    expect(serializer.unpack(serializer.pack(value))).toEqual(value);
  });

  test("members of no declared type keep dates and maps", () => {
    const serializer = contextFor(build).getSerializer(Envelope);
    expect(serializer.unpack(serializer.pack({ Payload: new Date(0) }))).toEqual({
      Payload: new Date(0),
    });
    expect(serializer.unpack(serializer.pack({ Payload: new Map([["a", 1]]) }))).toEqual({
      Payload: { a: 1 },
    });
  });

  test("collections of similarly named types get their own helpers", () => {
    const serializer = contextFor(build).getSerializer(Holder);
    const value = { A: ["x"], B: [{ Value: "y" }] };
    const bytes = serializer.pack(value);

    expect([...bytes]).toEqual([0x92, 0x91, 0xa1, 0x78, 0x91, 0x91, 0xa1, 0x79]);
    expect(serializer.unpack(bytes)).toEqual(value);
  });

  test("tuples always pack by position", () => {
    const serializer = contextFor(build, { serializationMethod: "map" }).getSerializer(
      Types.tuple(Types.string, Types.int32)
    );
    expect([...serializer.pack(["k", 7])]).toEqual([0x92, 0xa1, 0x6b, 0x07]);
    expect(serializer.unpack(Uint8Array.of(0x92, 0xa1, 0x6b, 0x07))).toEqual(["k", 7]);
  });

  test("self-packing types use their own message methods", () => {
    const serializer = contextFor(build).getSerializer(Point);
    expect([...serializer.pack(new PointValue(3, 4))]).toEqual([0x92, 0x03, 0x04]);

    const unpacked = serializer.unpack(Uint8Array.of(0x92, 0x05, 0x06));
    expect(unpacked).toBeInstanceOf(PointValue);
    expect(unpacked).toEqual(new PointValue(5, 6));
  });

  test("separate builds produce identical bytes", () => {
    const first = contextFor(createBackend()).getSerializer(Profile).pack(profile);
    const second = contextFor(createBackend()).getSerializer(Profile).pack(profile);
    expect([...second]).toEqual([...first]);
  });
});

describe("builder contract", () => {
  test("operations fail once the context is finished", () => {
    const builder = new ExpressionSerializerBuilder(Person);
    const context = builder.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    context.finish();
    expect(() => builder.makeInt32Literal(context, 1)).toThrow(
      "cannot makeInt32Literal: code generation context is finished"
    );
  });

  test("emitting operations fail once the context is finished", () => {
    const manager = new SerializationMethodGeneratorManager();
    const builder = new EmittingSerializerBuilder(Person, { manager });
    const context = builder.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    context.finish();
    expect(diagnosticCodeOf(() => builder.makeStringLiteral(context, "x"))).toBe("CG0002");
    context.dispose();
    expect(manager.activeEmitters).toBe(0);
  });

  test("negative zero literals keep their sign in both backends", () => {
    const expression = new ExpressionSerializerBuilder(Person);
    const expressionContext = expression.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    expect(Object.is(expression.makeFloat64Literal(expressionContext, -0).literal, -0)).toBe(
      true
    );

    const emitting = new EmittingSerializerBuilder(Person, {
      manager: new SerializationMethodGeneratorManager(),
    });
    const emitContext = emitting.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    try {
      expect(emitting.makeFloat64Literal(emitContext, -0).code).toBe("-0");
      expect(emitting.makeFloat64Literal(emitContext, 0).code).toBe("0");
    } finally {
      emitContext.dispose();
    }
  });

  test("a sequence must end in a value of its type", () => {
    const builder = new ExpressionSerializerBuilder(Person);
    const context = builder.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    expect(() =>
      builder.emitSequentialStatements(context, Types.int32, [
        builder.makeStringLiteral(context, "x"),
      ])
    ).toThrow("sequence result: expected int32, got string");
  });

  test("emitting sequences check their result type too", () => {
    const builder = new EmittingSerializerBuilder(Person, {
      manager: new SerializationMethodGeneratorManager(),
    });
    const context = builder.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    try {
      expect(
        diagnosticCodeOf(() =>
          builder.emitSequentialStatements(context, Types.int32, [
            builder.makeStringLiteral(context, "x"),
          ])
        )
      ).toBe("CG0001");
    } finally {
      context.dispose();
    }
  });

  test("metadata for missing members is unresolved", () => {
    const builder = new ExpressionSerializerBuilder(Person);
    const context = builder.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    expect(diagnosticCodeOf(() => builder.emitFieldOfExpression(context, Person, "Email"))).toBe(
      "RF0001"
    );
  });

  test("a build releases its emitter even when it fails", () => {
    const manager = new SerializationMethodGeneratorManager();
    const builder = new EmittingSerializerBuilder(Types.int32, { manager });
    expect(diagnosticCodeOf(() => builder.buildSerializerFactory(new SerializationContext()))).toBe(
      "CG0001"
    );
    expect(manager.activeEmitters).toBe(0);
  });
});

describe("dump mode", () => {
  const dumpBackends: [string, (metadata: MetadataRegistry) => BuildFactory][] = [
    [
      "expression",
      (metadata) => (type) =>
        new ExpressionSerializerBuilder(type, {
          dumpEnabled: true,
          metadata,
        }).buildSerializerFactory(new SerializationContext()),
    ],
    [
      "emitting",
      (metadata) => {
        const manager = new SerializationMethodGeneratorManager();
        return (type) =>
          new EmittingSerializerBuilder(type, {
            manager,
            containerMode: "debuggable",
            dumpEnabled: true,
            metadata,
          }).buildSerializerFactory(new SerializationContext());
      },
    ],
  ];

  test.each(dumpBackends)("%s builder looks types up by name", (_name, createBackend) => {
    const metadata = new MetadataRegistry();
    const serializer = contextFor(createBackend(metadata)).getSerializer(Profile);

    expect(serializer.unpack(serializer.pack(profile))).toEqual(profile);
    expect(metadata.resolveType("Person")).toBe(Person);
    expect(metadata.resolveType("Color")).toBe(Color);
  });
});
