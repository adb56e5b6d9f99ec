import { raise } from "../diagnostics/index.js";
import type { Packer, Unpacker } from "../lib/msgpack.js";
import type { CollectionTraits, PolymorphismSchema } from "../reflection/target.js";
import {
  typeName,
  type SelfPackingCapabilities,
  type TypeDefinition,
} from "../reflection/types.js";
import type { SerializationContext } from "./context.js";
import { MessagePackSerializer, type Delegate } from "./serializer.js";

export type PackOperation = (
  serializer: CallbackMessagePackSerializer,
  context: SerializationContext,
  packer: Packer,
  value: unknown
) => void;

export type UnpackOperation = (
  serializer: CallbackMessagePackSerializer,
  context: SerializationContext,
  unpacker: Unpacker,
  target: unknown,
  itemIndex: number,
  itemsCount: number
) => void;

/** Builds a serializer-bound delegate for one entry of the delegate table. */
export type DelegateFactory = (
  serializer: MessagePackSerializer,
  context: SerializationContext
) => Delegate;

/** The operation collections a build produces. */
export interface SerializerOperations {
  packOperations: readonly PackOperation[];
  packOperationTable: ReadonlyMap<string, PackOperation>;
  unpackOperations: readonly UnpackOperation[];
  unpackOperationTable: ReadonlyMap<string, UnpackOperation>;
  memberNames: readonly string[];
}

export interface CallbackSerializerBindings extends SerializerOperations {
  targetType: TypeDefinition;
  traits: CollectionTraits;
  schema: PolymorphismSchema;
  delegates: ReadonlyMap<string, DelegateFactory>;
  createInstance: () => unknown;
  capabilities: SelfPackingCapabilities;
}

interface Packable {
  packToMessage(packer: Packer, context: SerializationContext): void;
}

interface Unpackable {
  unpackFromMessage(unpacker: Unpacker, context: SerializationContext): void;
}

const isPackable = (value: unknown): value is Packable =>
  typeof value === "object" &&
  value !== null &&
  "packToMessage" in value &&
  typeof value.packToMessage === "function";

const isUnpackable = (value: unknown): value is Unpackable =>
  typeof value === "object" &&
  value !== null &&
  "unpackFromMessage" in value &&
  typeof value.unpackFromMessage === "function";

/**
 * Serializer driven by generated per-member operations. Packs as an array or
 * a map depending on the context; unpacks either shape.
 */
export class CallbackMessagePackSerializer extends MessagePackSerializer {
  readonly schema: PolymorphismSchema;
  readonly traits: CollectionTraits;
  readonly memberNames: readonly string[];
  readonly delegates: ReadonlyMap<string, Delegate>;
  private readonly bindings: CallbackSerializerBindings;

  constructor(context: SerializationContext, bindings: CallbackSerializerBindings) {
    super(context, bindings.targetType);
    this.bindings = bindings;
    this.schema = bindings.schema;
    this.traits = bindings.traits;
    this.memberNames = bindings.memberNames;
    this.delegates = new Map(
      [...bindings.delegates].map(([name, factory]) => [name, factory(this, context)])
    );
  }

  get isTuple(): boolean {
    return this.bindings.targetType.kind === "tuple";
  }

  packTo(packer: Packer, value: unknown): void {
    if (value === null || value === undefined) {
      packer.packNull();
      return;
    }

    if (this.bindings.capabilities.packable) {
      if (!isPackable(value)) {
        return raise({
          code: "MP0001",
          params: {
            kind: "missing-operation",
            typeName: typeName(this.targetType),
            reason: "value does not implement packToMessage",
          },
        });
      }
      value.packToMessage(packer, this.context);
      return;
    }

    if (this.context.serializationMethod === "map" && !this.isTuple) {
      this.packToMap(packer, value);
      return;
    }

    const operations = this.bindings.packOperations;
    packer.packArrayHeader(operations.length);
    for (const operation of operations) {
      operation(this, this.context, packer, value);
    }
  }

  private packToMap(packer: Packer, value: unknown): void {
    const table = this.bindings.packOperationTable;
    packer.packMapHeader(table.size);
    for (const [name, operation] of table) {
      packer.packString(name);
      operation(this, this.context, packer, value);
    }
  }

  unpackFrom(unpacker: Unpacker): unknown {
    if (unpacker.tryReadNil()) return null;

    const target = this.bindings.createInstance();
    if (this.bindings.capabilities.unpackable) {
      if (!isUnpackable(target)) {
        return raise({
          code: "MP0001",
          params: {
            kind: "missing-operation",
            typeName: typeName(this.targetType),
            reason: "instance does not implement unpackFromMessage",
          },
        });
      }
      target.unpackFromMessage(unpacker, this.context);
      return target;
    }

    const kind = unpacker.peekKind();
    if (kind === "array") {
      this.unpackFromArray(unpacker, target);
      return target;
    }
    if (kind === "map") {
      this.unpackFromMap(unpacker, target);
      return target;
    }

    return raise({
      code: "MP0001",
      params: { kind: "unexpected-token", expected: "array or map", actual: kind },
    });
  }

  private unpackFromArray(unpacker: Unpacker, target: unknown): void {
    const itemsCount = unpacker.readArrayHeader();
    const operations = this.bindings.unpackOperations;
    for (let itemIndex = 0; itemIndex < itemsCount; itemIndex++) {
      const operation = operations[itemIndex];
      if (operation) {
        operation(this, this.context, unpacker, target, itemIndex, itemsCount);
      } else {
        unpacker.skip();
      }
    }
  }

  private unpackFromMap(unpacker: Unpacker, target: unknown): void {
    const itemsCount = unpacker.readMapHeader();
    const table = this.bindings.unpackOperationTable;
    for (let itemIndex = 0; itemIndex < itemsCount; itemIndex++) {
      const operation = table.get(unpacker.readString());
      if (operation) {
        operation(this, this.context, unpacker, target, itemIndex, itemsCount);
      } else {
        unpacker.skip();
      }
    }
  }
}
