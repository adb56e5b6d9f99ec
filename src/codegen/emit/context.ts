import type { TypeDefinition } from "../../reflection/types.js";
import type { SerializationContext } from "../../runtime/context.js";
import type { SerializerEmitter } from "../container/emitter.js";
import { CodeGenerationContext } from "../context.js";
import type { EmitConstruct } from "./construct.js";

/** Build state of the emitting backend; holds the emitter's lease until disposed. */
export class EmitContext extends CodeGenerationContext<EmitConstruct> {
  constructor(
    serializationContext: SerializationContext,
    targetType: TypeDefinition,
    readonly emitter: SerializerEmitter
  ) {
    super(serializationContext, targetType);
  }

  dispose(): void {
    this.emitter.release();
  }
}
