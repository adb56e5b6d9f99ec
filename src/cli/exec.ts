import { EmittingSerializerBuilder } from "../codegen/emit/builder.js";
import {
  serializationMethodGeneratorManager,
  type SerializationMethodGeneratorManager,
} from "../codegen/container/manager.js";
import { trace } from "../lib/trace.js";
import { typeName } from "../reflection/types.js";
import { SerializationContext } from "../runtime/context.js";
import type { DumpCommandOptions } from "./arg-parser.js";
import { readDescriptorFile } from "./descriptor.js";

/** Builds every described type into the debuggable container and persists it. */
export const dumpSerializers = async (
  options: DumpCommandOptions,
  manager: SerializationMethodGeneratorManager = serializationMethodGeneratorManager
): Promise<string> => {
  const types = await readDescriptorFile(options.descriptor);
  for (const type of types) {
    new EmittingSerializerBuilder(type, {
      manager,
      containerMode: "debuggable",
      flavor: options.flavor,
      dumpEnabled: true,
    }).buildSerializerFactory(new SerializationContext());
    trace("cli", "type built", { type: typeName(type) });
  }
  return manager.persist(options.out);
};

export const runDump = async (options: DumpCommandOptions): Promise<void> => {
  const path = await dumpSerializers(options);
  console.log(path);
};
