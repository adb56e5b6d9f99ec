import { raise } from "../diagnostics/index.js";
import type { Packer, Unpacker } from "../lib/msgpack.js";
import type { EnumTypeDefinition } from "../reflection/types.js";
import type { EnumSerializationMethod, SerializationContext } from "./context.js";
import { MessagePackSerializer, type Delegate } from "./serializer.js";

/**
 * Enum serializer over the two generated underlying-value delegates. Packs by
 * member name or by underlying value; unpacks both forms.
 */
export class CallbackEnumMessagePackSerializer extends MessagePackSerializer {
  private readonly names = new Map<number, string>();

  constructor(
    context: SerializationContext,
    readonly enumType: EnumTypeDefinition,
    readonly serializationMethod: EnumSerializationMethod,
    private readonly packUnderlyingValueTo: Delegate,
    private readonly unpackFromUnderlyingValue: Delegate
  ) {
    super(context, enumType);
    for (const [name, value] of Object.entries(enumType.members)) {
      if (!this.names.has(value)) this.names.set(value, name);
    }
  }

  private unknownMember(value: unknown): never {
    return raise({
      code: "MP0001",
      params: {
        kind: "unknown-enum-member",
        enumName: this.enumType.name,
        value: String(value),
      },
    });
  }

  packTo(packer: Packer, value: unknown): void {
    if (typeof value !== "number" || !this.names.has(value)) {
      return this.unknownMember(value);
    }

    if (this.serializationMethod === "by-underlying-value") {
      this.packUnderlyingValueTo(this, this.context, packer, value);
      return;
    }

    const name = this.names.get(value) ?? this.unknownMember(value);
    packer.packString(name);
  }

  unpackFrom(unpacker: Unpacker): unknown {
    if (unpacker.peekKind() === "string") {
      const name = unpacker.readString();
      const value = this.enumType.members[name];
      return value === undefined ? this.unknownMember(name) : value;
    }

    const underlying = unpacker.readInteger();
    const value = this.unpackFromUnderlyingValue(this, this.context, underlying);
    if (typeof value !== "number" || !this.names.has(value)) {
      return this.unknownMember(underlying);
    }
    return value;
  }
}
