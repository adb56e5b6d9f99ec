import { raise } from "../diagnostics/index.js";
import { typeName, type TypeDefinition } from "../reflection/types.js";
import type { MessagePackSerializer } from "./serializer.js";

export type SerializationMethod = "array" | "map";

export type EnumSerializationMethod = "by-name" | "by-underlying-value";

export type SerializerProvider = (
  type: TypeDefinition,
  context: SerializationContext
) => MessagePackSerializer;

export interface SerializationContextOptions {
  serializationMethod?: SerializationMethod;
  enumSerializationMethod?: EnumSerializationMethod;
  provider?: SerializerProvider;
}

/**
 * Per-session settings plus the serializer cache consulted by generated code
 * whenever a member's type needs its own serializer.
 */
export class SerializationContext {
  serializationMethod: SerializationMethod;
  enumSerializationMethod: EnumSerializationMethod;
  private provider?: SerializerProvider;
  private readonly enumOverrides = new Map<string, EnumSerializationMethod>();
  private readonly serializers = new Map<string, MessagePackSerializer>();

  constructor(options: SerializationContextOptions = {}) {
    this.serializationMethod = options.serializationMethod ?? "array";
    this.enumSerializationMethod = options.enumSerializationMethod ?? "by-name";
    this.provider = options.provider;
  }

  setProvider(provider: SerializerProvider): void {
    this.provider = provider;
  }

  register(serializer: MessagePackSerializer): void {
    this.serializers.set(typeName(serializer.targetType), serializer);
  }

  getSerializer(type: TypeDefinition): MessagePackSerializer {
    const key = typeName(type);
    const cached = this.serializers.get(key);
    if (cached) return cached;

    if (!this.provider) {
      return raise({
        code: "MP0001",
        params: {
          kind: "missing-operation",
          typeName: key,
          reason: "no serializer is registered and the context has no provider",
        },
      });
    }

    const serializer = this.provider(type, this);
    this.serializers.set(key, serializer);
    return serializer;
  }

  setEnumSerializationMethod(
    type: TypeDefinition,
    method: EnumSerializationMethod
  ): void {
    this.enumOverrides.set(typeName(type), method);
  }

  enumSerializationMethodOf(type: TypeDefinition): EnumSerializationMethod {
    return this.enumOverrides.get(typeName(type)) ?? this.enumSerializationMethod;
  }
}
