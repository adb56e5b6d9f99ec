import { raise } from "../diagnostics/index.js";
import { Packer, Unpacker } from "../lib/msgpack.js";
import { typeName, type TypeDefinition } from "../reflection/types.js";
import type { SerializationContext } from "./context.js";

export type Delegate = (...args: readonly unknown[]) => unknown;

/** Wraps a value produced by generated code as a typed callable. */
export const asDelegate = (value: unknown, member: string): Delegate => {
  if (typeof value !== "function") {
    return raise({ code: "MP0001", params: { kind: "not-callable", member } });
  }
  return (...args) => Reflect.apply(value, undefined, args);
};

export abstract class MessagePackSerializer {
  constructor(
    readonly context: SerializationContext,
    readonly targetType: TypeDefinition
  ) {}

  abstract packTo(packer: Packer, value: unknown): void;

  abstract unpackFrom(unpacker: Unpacker): unknown;

  pack(value: unknown): Uint8Array {
    const packer = new Packer();
    this.packTo(packer, value);
    return packer.toBytes();
  }

  unpack(bytes: Uint8Array): unknown {
    return this.unpackFrom(new Unpacker(bytes));
  }

  toString(): string {
    return `${this.constructor.name}<${typeName(this.targetType)}>`;
  }
}

export type SerializerFactory = (
  context: SerializationContext
) => MessagePackSerializer;
