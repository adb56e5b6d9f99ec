export * from "./diagnostics/index.js";
export {
  CODEGEN_ENV,
  defaultCodegenOptions,
  resolveCodegenOptions,
} from "./config/index.js";
export type * from "./config/types.js";
export { setTraceEnabled, isTraceEnabled } from "./lib/trace.js";
export { Packer, Unpacker } from "./lib/msgpack.js";

export * from "./reflection/types.js";
export * from "./reflection/describe.js";
export {
  resolveField,
  resolveIndexer,
  resolveMethod,
  resolveProperty,
} from "./reflection/members.js";
export {
  PolymorphismSchema,
  collectionTraitsOf,
  createSerializationTarget,
} from "./reflection/target.js";
export type {
  CollectionTraits,
  SerializationTarget,
  SerializingMember,
} from "./reflection/target.js";

export { MessagePackSerializer } from "./runtime/serializer.js";
export type { SerializerFactory } from "./runtime/serializer.js";
export { CallbackMessagePackSerializer } from "./runtime/callback-serializer.js";
export { CallbackEnumMessagePackSerializer } from "./runtime/enum-serializer.js";
export { SerializationContext } from "./runtime/context.js";
export type {
  EnumSerializationMethod,
  SerializationMethod,
  SerializerProvider,
} from "./runtime/context.js";
export { MetadataRegistry, metadataRegistry } from "./runtime/metadata.js";

export { SerializerBuilder } from "./codegen/builder.js";
export type { BuilderOptions } from "./codegen/builder.js";
export { ExpressionSerializerBuilder } from "./codegen/expression/builder.js";
export { EmittingSerializerBuilder } from "./codegen/emit/builder.js";
export type { EmittingBuilderOptions } from "./codegen/emit/builder.js";
export {
  SerializationMethodGeneratorManager,
  serializationMethodGeneratorManager,
} from "./codegen/container/manager.js";
export { detectCodeGenerationCapabilities } from "./codegen/container/capabilities.js";
export type { CodeGenerationCapabilities } from "./codegen/container/capabilities.js";

export { SerializerGenerator, createSerializationContext } from "./generator.js";
