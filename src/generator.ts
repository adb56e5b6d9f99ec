import {
  resolveCodegenOptions,
  type BuilderKind,
  type CodegenOptions,
} from "./config/index.js";
import { isDiagnosticError } from "./diagnostics/index.js";
import { setTraceEnabled, trace } from "./lib/trace.js";
import {
  serializationMethodGeneratorManager,
  type SerializationMethodGeneratorManager,
} from "./codegen/container/manager.js";
import { EmittingSerializerBuilder } from "./codegen/emit/builder.js";
import { ExpressionSerializerBuilder } from "./codegen/expression/builder.js";
import { PolymorphismSchema } from "./reflection/target.js";
import { typeName, type TypeDefinition } from "./reflection/types.js";
import {
  SerializationContext,
  type SerializationContextOptions,
} from "./runtime/context.js";
import { metadataRegistry, type MetadataRegistry } from "./runtime/metadata.js";
import type { MessagePackSerializer, SerializerFactory } from "./runtime/serializer.js";

export interface SerializerGeneratorOptions extends Partial<CodegenOptions> {
  manager?: SerializationMethodGeneratorManager;
  metadata?: MetadataRegistry;
  /** Fail with UnsupportedFlavor instead of substituting */
  strictFlavor?: boolean;
}

/**
 * Builds and caches one serializer factory per (type, schema). Uses the
 * configured backend and falls back to expression graphs when dynamic code
 * containers are unavailable.
 */
export class SerializerGenerator {
  readonly options: CodegenOptions;
  private readonly manager: SerializationMethodGeneratorManager;
  private readonly metadata: MetadataRegistry;
  private readonly strictFlavor: boolean;
  private readonly factories = new Map<string, SerializerFactory>();
  private activeBackend: BuilderKind;

  constructor(
    options: SerializerGeneratorOptions = {},
    env: Readonly<Record<string, string | undefined>> = process.env
  ) {
    const { manager, metadata, strictFlavor, ...overrides } = options;
    this.options = resolveCodegenOptions(overrides, env);
    this.manager = manager ?? serializationMethodGeneratorManager;
    this.metadata = metadata ?? metadataRegistry;
    this.strictFlavor = strictFlavor ?? false;
    this.activeBackend = this.options.builder;
    setTraceEnabled(this.options.trace);
  }

  /** Backend new factories are built with; `expression` after a fallback. */
  get backend(): BuilderKind {
    return this.activeBackend;
  }

  factoryFor(
    type: TypeDefinition,
    schema: PolymorphismSchema = PolymorphismSchema.default
  ): SerializerFactory {
    const key = `${typeName(type)}#${schema.name}`;
    const cached = this.factories.get(key);
    if (cached) return cached;

    const factory = this.build(type, schema);
    this.factories.set(key, factory);
    return factory;
  }

  createSerializer(type: TypeDefinition, context: SerializationContext): MessagePackSerializer {
    return this.factoryFor(type)(context);
  }

  /** Writes the debuggable container's units to the dump directory. */
  persist(directory: string = this.options.dumpDirectory): Promise<string> {
    return this.manager.persist(directory);
  }

  private build(type: TypeDefinition, schema: PolymorphismSchema): SerializerFactory {
    if (this.activeBackend === "expression") {
      return this.expressionBuilder(type).buildSerializerFactory(new SerializationContext(), schema);
    }
    try {
      return this.emittingBuilder(type).buildSerializerFactory(new SerializationContext(), schema);
    } catch (error) {
      if (!isDiagnosticError(error, "PL0001")) throw error;
      trace("generator", "dynamic code unavailable, using expression builder", {
        type: typeName(type),
      });
      this.activeBackend = "expression";
      return this.expressionBuilder(type).buildSerializerFactory(new SerializationContext(), schema);
    }
  }

  private emittingBuilder(type: TypeDefinition): EmittingSerializerBuilder {
    return new EmittingSerializerBuilder(type, {
      manager: this.manager,
      containerMode: this.options.containerMode,
      flavor: this.options.emitterFlavor,
      strictFlavor: this.strictFlavor,
      assertions: this.options.assertions,
      dumpEnabled: this.options.dumpEnabled,
      metadata: this.metadata,
    });
  }

  private expressionBuilder(type: TypeDefinition): ExpressionSerializerBuilder {
    return new ExpressionSerializerBuilder(type, {
      assertions: this.options.assertions,
      dumpEnabled: this.options.dumpEnabled,
      metadata: this.metadata,
    });
  }
}

export interface CreateSerializationContextOptions
  extends Omit<SerializationContextOptions, "provider"> {
  generator?: SerializerGenerator;
}

/** A serialization context whose provider compiles serializers on demand. */
export const createSerializationContext = (
  options: CreateSerializationContextOptions = {}
): SerializationContext => {
  const { generator = new SerializerGenerator(), ...settings } = options;
  return new SerializationContext({
    ...settings,
    provider: (type, context) => generator.createSerializer(type, context),
  });
};
