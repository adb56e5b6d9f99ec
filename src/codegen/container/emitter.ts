import { raise } from "../../diagnostics/index.js";
import type { EmitterFlavor } from "../../config/index.js";
import { toIdentifier, typeName, type TypeDefinition } from "../../reflection/types.js";
import {
  CallbackMessagePackSerializer,
  type CallbackSerializerBindings,
} from "../../runtime/callback-serializer.js";
import type { SerializationContext } from "../../runtime/context.js";
import { MessagePackSerializer } from "../../runtime/serializer.js";
import type { CodeContainer } from "./code-container.js";

/** What a compiled unit yields once linked. */
export interface LinkedUnit {
  /** The bindings object the unit produced */
  bindings: unknown;
  construct?: (
    context: SerializationContext,
    bindings: CallbackSerializerBindings
  ) => MessagePackSerializer;
}

export interface EmitterInit {
  container: CodeContainer;
  targetType: TypeDefinition;
  sequence: number;
  requestedFlavor: EmitterFlavor;
  flavor: EmitterFlavor;
  release: () => void;
}

const runtimeExports: Readonly<Record<string, unknown>> = {
  CallbackMessagePackSerializer,
  MessagePackSerializer,
};

const malformedUnit = (unit: string, message: string): never =>
  raise({
    code: "CG0001",
    params: { kind: "unit-compilation-failed", unit, message },
  });

/**
 * Per-target handle into a container. Collects the constants and static
 * methods the unit refers to, renders the unit around the emitted bindings
 * and compiles it.
 */
export abstract class SerializerEmitter {
  readonly container: CodeContainer;
  readonly targetType: TypeDefinition;
  readonly sequence: number;
  readonly requestedFlavor: EmitterFlavor;
  readonly flavor: EmitterFlavor;
  private readonly constants: unknown[] = [];
  private readonly constantSlots = new Map<unknown, number>();
  private readonly statics = new Map<string, unknown>();
  private readonly releaseLease: () => void;
  private released = false;

  constructor(init: EmitterInit) {
    this.container = init.container;
    this.targetType = init.targetType;
    this.sequence = init.sequence;
    this.requestedFlavor = init.requestedFlavor;
    this.flavor = init.flavor;
    this.releaseLease = init.release;
  }

  get substituted(): boolean {
    return this.requestedFlavor !== this.flavor;
  }

  get unitName(): string {
    return `${toIdentifier(typeName(this.targetType))}Serializer${this.sequence}`;
  }

  /** Code referring to `value` through the constants table. */
  constant(value: unknown): string {
    const existing = this.constantSlots.get(value);
    if (existing !== undefined) return `$k[${existing}]`;
    const slot = this.constants.length;
    this.constants.push(value);
    this.constantSlots.set(value, slot);
    return `$k[${slot}]`;
  }

  /** Code referring to a static method by its qualified name. */
  staticMethod(qualifiedName: string, invoke: unknown): string {
    this.statics.set(qualifiedName, invoke);
    return `$statics[${JSON.stringify(qualifiedName)}]`;
  }

  /** Unit source returning the given bindings object literal. */
  abstract renderUnit(helpers: readonly string[], bindings: string): string;

  abstract link(compiled: unknown): LinkedUnit;

  /** Unit returning a plain object, such as the helper pair of an enum. */
  renderObjectUnit(helpers: readonly string[], value: string): string {
    return ['"use strict";', ...helpers, `return ${value};`].join("\n");
  }

  compile(source: string): unknown {
    return this.container.compileUnit(this.unitName, source, {
      $rt: runtimeExports,
      $k: this.constants,
      $statics: Object.fromEntries(this.statics),
    });
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.releaseLease();
  }
}

/** The unit is a serializer class whose static `bindings` field holds the operations. */
export class FieldBasedSerializerEmitter extends SerializerEmitter {
  renderUnit(helpers: readonly string[], bindings: string): string {
    return [
      '"use strict";',
      ...helpers,
      `return class ${this.unitName} extends $rt.CallbackMessagePackSerializer {`,
      `  static bindings = ${bindings};`,
      "};",
    ].join("\n");
  }

  link(compiled: unknown): LinkedUnit {
    if (typeof compiled !== "function") {
      return malformedUnit(this.unitName, "unit did not return a class");
    }
    const unit = this.unitName;
    return {
      bindings: Reflect.get(compiled, "bindings"),
      construct: (context, bindings) => {
        const instance: unknown = Reflect.construct(compiled, [context, bindings]);
        if (!(instance instanceof MessagePackSerializer)) {
          return malformedUnit(unit, "generated class is not a serializer");
        }
        return instance;
      },
    };
  }
}

/** The unit returns the bindings object; the callback serializer keeps it. */
export class ContextBasedSerializerEmitter extends SerializerEmitter {
  renderUnit(helpers: readonly string[], bindings: string): string {
    return this.renderObjectUnit(helpers, bindings);
  }

  link(compiled: unknown): LinkedUnit {
    return { bindings: compiled };
  }
}
