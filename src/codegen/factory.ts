import { raise } from "../diagnostics/index.js";
import type { CollectionTraits, PolymorphismSchema, SerializationTarget } from "../reflection/target.js";
import { typeName, type EnumTypeDefinition, type MethodDefinition } from "../reflection/types.js";
import {
  CallbackMessagePackSerializer,
  type CallbackSerializerBindings,
  type DelegateFactory,
  type SerializerOperations,
} from "../runtime/callback-serializer.js";
import type { SerializationContext } from "../runtime/context.js";
import { CallbackEnumMessagePackSerializer } from "../runtime/enum-serializer.js";
import {
  asDelegate,
  type Delegate,
  type MessagePackSerializer,
  type SerializerFactory,
} from "../runtime/serializer.js";
import { trace } from "../lib/trace.js";

// Narrowing of values produced by generated code, and factory binding shared
// by both builders.

const malformed = (message: string): never =>
  raise({ code: "CG0001", params: { kind: "malformed-graph", message } });

export const readOperationList = (value: unknown, name: string): Delegate[] => {
  if (!Array.isArray(value)) return malformed(`${name} did not evaluate to an array`);
  return value.map((operation: unknown, index) => asDelegate(operation, `${name}[${index}]`));
};

export const readOperationTable = (value: unknown, name: string): Map<string, Delegate> => {
  if (!(value instanceof Map)) return malformed(`${name} did not evaluate to a map`);
  const table = new Map<string, Delegate>();
  for (const [key, operation] of value) {
    if (typeof key !== "string") return malformed(`${name} has a non-string key`);
    table.set(key, asDelegate(operation, `${name}.${key}`));
  }
  return table;
};

export const readStringList = (value: unknown, name: string): string[] => {
  if (!Array.isArray(value)) return malformed(`${name} did not evaluate to an array`);
  return value.map((item: unknown) =>
    typeof item === "string" ? item : malformed(`${name} holds a non-string item`)
  );
};

/** Delegate-table entry binding a compiled private method to its serializer. */
export const privateMethodDelegate =
  (helper: Delegate): DelegateFactory =>
  (serializer, context) =>
  (...args) =>
    helper(serializer, context, ...args);

export const staticMethodDelegate = (method: MethodDefinition): DelegateFactory => {
  const runtime = method.runtime;
  if (runtime?.kind !== "static") {
    return malformed(`${method.name} is not a static method`);
  }
  return () => runtime.invoke;
};

export interface SerializerFactoryParts {
  target: SerializationTarget;
  traits: CollectionTraits;
  schema: PolymorphismSchema;
  operations: SerializerOperations;
  delegates: ReadonlyMap<string, DelegateFactory>;
  /** Instantiates a generated serializer class instead of the callback serializer */
  construct?: (
    context: SerializationContext,
    bindings: CallbackSerializerBindings
  ) => MessagePackSerializer;
}

export const emptyOperations = (): Pick<
  SerializerOperations,
  "packOperations" | "packOperationTable" | "unpackOperations" | "unpackOperationTable"
> => ({
  packOperations: [],
  packOperationTable: new Map(),
  unpackOperations: [],
  unpackOperationTable: new Map(),
});

export const selfPackingOf = (target: SerializationTarget) =>
  target.type.kind === "object"
    ? target.type.capabilities
    : { packable: false, unpackable: false };

export const bindSerializerFactory = ({
  target,
  traits,
  schema,
  operations,
  delegates,
  construct,
}: SerializerFactoryParts): SerializerFactory => {
  const capabilities = selfPackingOf(target);
  trace("factory", "serializer factory bound", {
    type: typeName(target.type),
    packOperations: operations.packOperations.length,
    unpackOperations: operations.unpackOperations.length,
    delegates: delegates.size,
  });
  return (context) => {
    const bindings: CallbackSerializerBindings = {
      ...operations,
      targetType: target.type,
      traits,
      schema,
      delegates,
      capabilities,
      createInstance: () => target.instanceConstructor.create(),
    };
    return construct
      ? construct(context, bindings)
      : new CallbackMessagePackSerializer(context, bindings);
  };
};

export const bindEnumSerializerFactory = (
  enumType: EnumTypeDefinition,
  packUnderlyingValueTo: Delegate,
  unpackFromUnderlyingValue: Delegate
): SerializerFactory => {
  trace("factory", "enum serializer factory bound", { type: enumType.name });
  return (context) =>
    new CallbackEnumMessagePackSerializer(
      context,
      enumType,
      context.enumSerializationMethodOf(enumType),
      packUnderlyingValueTo,
      unpackFromUnderlyingValue
    );
};
