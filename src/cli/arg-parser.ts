import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { EmitterFlavor } from "../config/index.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const FLAVORS: readonly EmitterFlavor[] = ["field-based", "context-based"];

export interface DumpCommandOptions {
  descriptor: string;
  out: string;
  flavor: EmitterFlavor;
}

export interface CliHandlers {
  dump: (options: DumpCommandOptions) => Promise<void>;
}

export const parseFlavor = (value: string): EmitterFlavor => {
  const normalized = value.toLowerCase();
  const flavor = FLAVORS.find((candidate) => candidate === normalized);
  if (flavor) return flavor;
  throw new InvalidArgumentError(
    `invalid emitter flavor "${value}" (allowed: ${FLAVORS.join(", ")})`
  );
};

export const createProgram = (handlers: CliHandlers): Command => {
  const program = new Command()
    .name("serializer-codegen")
    .description("Generate MessagePack serializer code units")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

  program
    .command("dump")
    .description("compile every type of a descriptor file and persist the generated units")
    .argument("<descriptor>", "JSON type descriptor file")
    .option("-o, --out <dir>", "directory to write the container file to", ".")
    .option(
      "--flavor <flavor>",
      "emitter flavor: field-based or context-based",
      parseFlavor,
      "field-based"
    )
    .action(async (descriptor: string, options: { out: string; flavor: EmitterFlavor }) => {
      await handlers.dump({ descriptor, out: options.out, flavor: options.flavor });
    });

  return program;
};
