import { objectType } from "../reflection/describe.js";
import {
  Types,
  typeName,
  type MethodDefinition,
  type ObjectTypeDefinition,
  type TypeDefinition,
} from "../reflection/types.js";
import { Enumerators } from "./enumerators.js";

// Type definitions for the runtime objects generated code talks to.

const packer = objectType({
  name: "Packer",
  methods: [
    { name: "packNull" },
    { name: "packBoolean", parameters: [Types.boolean] },
    { name: "packInteger", parameters: [Types.int32] },
    { name: "packFloat", parameters: [Types.float64] },
    { name: "packString", parameters: [Types.string] },
    { name: "packBinary", parameters: [Types.binary] },
    { name: "packArrayHeader", parameters: [Types.int32] },
    { name: "packMapHeader", parameters: [Types.int32] },
    { name: "packAny", parameters: [Types.any] },
  ],
});

const unpacker = objectType({
  name: "Unpacker",
  methods: [
    { name: "tryReadNil", returns: Types.boolean },
    { name: "readBoolean", returns: Types.boolean },
    { name: "readInteger", returns: Types.int32 },
    { name: "readFloat", returns: Types.float64 },
    { name: "readString", returns: Types.string },
    { name: "readBinary", returns: Types.binary },
    { name: "readArrayHeader", returns: Types.int32 },
    { name: "readMapHeader", returns: Types.int32 },
    { name: "readAny", returns: Types.any },
    { name: "skip" },
  ],
});

const typeHandle = objectType({ name: "TypeDefinition" });
const methodHandle = objectType({ name: "MethodDefinition" });
const fieldHandle = objectType({ name: "FieldDefinition" });

const delegateTable = Types.map(Types.string, Types.any);

const serializer = objectType({
  name: "MessagePackSerializer",
  properties: [{ name: "delegates", type: delegateTable }],
  methods: [
    { name: "packTo", parameters: [packer, Types.any] },
    { name: "unpackFrom", parameters: [unpacker], returns: Types.any },
  ],
});

const serializationContext = objectType({
  name: "SerializationContext",
  methods: [
    { name: "getSerializer", parameters: [typeHandle], returns: serializer },
  ],
});

const enumerators = objectType({ name: "Enumerators" });

const enumerator = (element: TypeDefinition): ObjectTypeDefinition =>
  objectType({
    name: `Enumerator<${typeName(element)}>`,
    properties: [{ name: "current", type: element }],
    methods: [{ name: "moveNext", returns: Types.boolean }],
  });

/** `Enumerators.of` typed for one collection type. */
const enumeratorOf = (
  collection: TypeDefinition,
  element: TypeDefinition
): MethodDefinition => ({
  kind: "method",
  name: "of",
  declaringType: enumerators,
  parameterTypes: [collection],
  returnType: enumerator(element),
  isStatic: true,
  runtime: {
    kind: "static",
    qualifiedName: "Enumerators.of",
    invoke: (items) => Enumerators.of(items),
  },
});

const range: MethodDefinition = {
  kind: "method",
  name: "range",
  declaringType: enumerators,
  parameterTypes: [Types.int32],
  returnType: Types.array(Types.int32),
  isStatic: true,
  runtime: {
    kind: "static",
    qualifiedName: "Enumerators.range",
    invoke: (count) => Enumerators.range(typeof count === "number" ? count : 0),
  },
};

export const HostTypes = {
  packer,
  unpacker,
  typeHandle,
  methodHandle,
  fieldHandle,
  serializer,
  serializationContext,
  delegateTable,
  enumerator,
  enumeratorOf,
  range,
  packOperation: (target: TypeDefinition) =>
    Types.fn([serializer, serializationContext, packer, target], Types.void),
  unpackOperation: (target: TypeDefinition) =>
    Types.fn(
      [serializer, serializationContext, unpacker, target, Types.int32, Types.int32],
      Types.void
    ),
} as const;
