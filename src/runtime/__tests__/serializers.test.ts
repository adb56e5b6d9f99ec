import { decode, encode } from "@msgpack/msgpack";
import { describe, expect, test } from "vitest";
import { isDiagnosticError } from "../../diagnostics/index.js";
import { Packer } from "../../lib/msgpack.js";
import { enumType, objectType } from "../../reflection/describe.js";
import { PolymorphismSchema } from "../../reflection/target.js";
import { Types } from "../../reflection/types.js";
import {
  CallbackMessagePackSerializer,
  type CallbackSerializerBindings,
  type DelegateFactory,
  type PackOperation,
  type UnpackOperation,
} from "../callback-serializer.js";
import { SerializationContext } from "../context.js";
import { CallbackEnumMessagePackSerializer } from "../enum-serializer.js";
import { Enumerators } from "../enumerators.js";

const diagnosticCodeOf = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return isDiagnosticError(error) ? error.code : "not-a-diagnostic";
  }
  return undefined;
};

const read = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;

const write = (target: unknown, key: string, value: unknown): void => {
  if (typeof target === "object" && target !== null) Reflect.set(target, key, value);
};

const Entry = objectType({
  name: "Entry",
  fields: { Key: Types.string, Count: Types.int32 },
});

const packKey: PackOperation = (_serializer, _context, packer, value) =>
  packer.packString(String(read(value, "Key")));
const packCount: PackOperation = (_serializer, _context, packer, value) =>
  packer.packInteger(Number(read(value, "Count")));
const unpackKey: UnpackOperation = (_serializer, _context, unpacker, target) =>
  write(target, "Key", unpacker.readString());
const unpackCount: UnpackOperation = (_serializer, _context, unpacker, target) =>
  write(target, "Count", unpacker.readInteger());

const entryBindings = (
  overrides: Partial<CallbackSerializerBindings> = {}
): CallbackSerializerBindings => ({
  targetType: Entry,
  traits: { kind: "none" },
  schema: PolymorphismSchema.default,
  delegates: new Map(),
  createInstance: () => ({}),
  capabilities: { packable: false, unpackable: false },
  packOperations: [packKey, packCount],
  packOperationTable: new Map([
    ["Key", packKey],
    ["Count", packCount],
  ]),
  unpackOperations: [unpackKey, unpackCount],
  unpackOperationTable: new Map([
    ["Key", unpackKey],
    ["Count", unpackCount],
  ]),
  memberNames: ["Key", "Count"],
  ...overrides,
});

describe("callback serializer", () => {
  test("packs members as an array by default", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext(),
      entryBindings()
    );
    expect([...serializer.pack({ Key: "a", Count: 5 })]).toEqual([0x92, 0xa1, 0x61, 0x05]);
  });

  test("packs members as a map in map mode", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext({ serializationMethod: "map" }),
      entryBindings()
    );
    expect(decode(serializer.pack({ Key: "a", Count: 5 }))).toEqual({ Key: "a", Count: 5 });
  });

  test("unpacks either shape and skips what it does not know", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext(),
      entryBindings()
    );
    expect(serializer.unpack(encode(["b", 7, [1, 2]]))).toEqual({ Key: "b", Count: 7 });
    expect(serializer.unpack(encode({ Extra: { x: 1 }, Count: 7, Key: "b" }))).toEqual({
      Key: "b",
      Count: 7,
    });
  });

  test("null packs as nil and nil unpacks as null", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext(),
      entryBindings()
    );
    expect([...serializer.pack(null)]).toEqual([0xc0]);
    expect(serializer.unpack(Uint8Array.of(0xc0))).toBeNull();
  });

  test("scalars are not objects", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext(),
      entryBindings()
    );
    expect(diagnosticCodeOf(() => serializer.unpack(encode("text")))).toBe("MP0001");
  });

  test("self-packing types must implement the message methods", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext(),
      entryBindings({ capabilities: { packable: true, unpackable: true } })
    );
    expect(diagnosticCodeOf(() => serializer.pack({ Key: "a", Count: 1 }))).toBe("MP0001");
    expect(diagnosticCodeOf(() => serializer.unpack(encode(["a", 1])))).toBe("MP0001");
  });

  test("delegate factories are bound to the constructed serializer", () => {
    const serializer = new CallbackMessagePackSerializer(
      new SerializationContext(),
      entryBindings({
        delegates: new Map<string, DelegateFactory>([
          ["describe", (owner) => () => owner.toString()],
        ]),
      })
    );
    expect(serializer.delegates.get("describe")?.()).toBe(
      "CallbackMessagePackSerializer<Entry>"
    );
  });
});

const Level = enumType("Level", { Low: 1, High: 5 });

const enumSerializer = (context: SerializationContext) =>
  new CallbackEnumMessagePackSerializer(
    context,
    Level,
    context.enumSerializationMethodOf(Level),
    (_serializer, _context, packer, value) => {
      if (packer instanceof Packer && typeof value === "number") packer.packInteger(value);
    },
    (_serializer, _context, value) => value
  );

describe("enum serializer", () => {
  test("packs by name by default", () => {
    const serializer = enumSerializer(new SerializationContext());
    expect(decode(serializer.pack(5))).toBe("High");
  });

  test("packs the underlying value when configured for the type", () => {
    const context = new SerializationContext();
    context.setEnumSerializationMethod(Level, "by-underlying-value");
    expect([...enumSerializer(context).pack(5)]).toEqual([0x05]);
  });

  test("unpacks names and underlying values", () => {
    const serializer = enumSerializer(new SerializationContext());
    expect(serializer.unpack(encode("Low"))).toBe(1);
    expect(serializer.unpack(encode(5))).toBe(5);
  });

  test("rejects values outside the enum", () => {
    const serializer = enumSerializer(new SerializationContext());
    expect(diagnosticCodeOf(() => serializer.pack(3))).toBe("MP0001");
    expect(diagnosticCodeOf(() => serializer.unpack(encode("Medium")))).toBe("MP0001");
    expect(diagnosticCodeOf(() => serializer.unpack(encode(3)))).toBe("MP0001");
  });
});

describe("serialization context", () => {
  test("reports a missing serializer when there is no provider", () => {
    expect(() => new SerializationContext().getSerializer(Entry)).toThrow(
      "no serializer is registered"
    );
  });

  test("caches what the provider returns", () => {
    let calls = 0;
    const context = new SerializationContext({
      provider: (_type, owner) => {
        calls++;
        return new CallbackMessagePackSerializer(owner, entryBindings());
      },
    });
    expect(context.getSerializer(Entry)).toBe(context.getSerializer(Entry));
    expect(calls).toBe(1);
  });
});

describe("enumerators", () => {
  test("walks arrays and map entries", () => {
    const items: unknown[] = [];
    const enumerator = Enumerators.of(new Map([["a", 1]]));
    while (enumerator.moveNext()) items.push(enumerator.current);
    expect(items).toEqual([["a", 1]]);
    expect(enumerator.current).toBeUndefined();
  });

  test("range yields indices", () => {
    expect(Enumerators.range(3)).toEqual([0, 1, 2]);
  });

  test("only collections can be enumerated", () => {
    expect(diagnosticCodeOf(() => Enumerators.of(42))).toBe("MP0001");
  });
});
