import type {
  BuilderKind,
  CodegenOptions,
  ContainerMode,
  EmitterFlavor,
} from "./types.js";

export type * from "./types.js";

export const CODEGEN_ENV = {
  builder: "SERIALIZER_CODEGEN_BUILDER",
  emitterFlavor: "SERIALIZER_CODEGEN_FLAVOR",
  containerMode: "SERIALIZER_CODEGEN_MODE",
  dumpEnabled: "SERIALIZER_CODEGEN_DUMP",
  dumpDirectory: "SERIALIZER_CODEGEN_DUMP_DIR",
  assertions: "SERIALIZER_CODEGEN_ASSERTIONS",
  trace: "SERIALIZER_CODEGEN_TRACE",
} as const;

type Env = Readonly<Record<string, string | undefined>>;

export const defaultCodegenOptions: Readonly<CodegenOptions> = {
  builder: "emit",
  emitterFlavor: "field-based",
  containerMode: "fast",
  dumpEnabled: false,
  dumpDirectory: ".",
  assertions: true,
  trace: false,
};

const BUILDERS: readonly BuilderKind[] = ["emit", "expression"];
const FLAVORS: readonly EmitterFlavor[] = ["field-based", "context-based"];
const MODES: readonly ContainerMode[] = ["fast", "debuggable", "collectable"];

export const parseFlag = (raw: string | undefined): boolean | undefined => {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return undefined;
};

const parseChoice = <T extends string>(
  raw: string | undefined,
  choices: readonly T[]
): T | undefined => {
  const normalized = raw?.trim().toLowerCase();
  return choices.find((choice) => choice === normalized);
};

const envOptions = (env: Env): Partial<CodegenOptions> => {
  const dumpDirectory = env[CODEGEN_ENV.dumpDirectory]?.trim();
  return {
    builder: parseChoice(env[CODEGEN_ENV.builder], BUILDERS),
    emitterFlavor: parseChoice(env[CODEGEN_ENV.emitterFlavor], FLAVORS),
    containerMode: parseChoice(env[CODEGEN_ENV.containerMode], MODES),
    dumpEnabled: parseFlag(env[CODEGEN_ENV.dumpEnabled]),
    dumpDirectory: dumpDirectory ? dumpDirectory : undefined,
    assertions: parseFlag(env[CODEGEN_ENV.assertions]),
    trace: parseFlag(env[CODEGEN_ENV.trace]),
  };
};

const mergeDefined = (
  base: CodegenOptions,
  patch: Partial<CodegenOptions>
): CodegenOptions => ({
  builder: patch.builder ?? base.builder,
  emitterFlavor: patch.emitterFlavor ?? base.emitterFlavor,
  containerMode: patch.containerMode ?? base.containerMode,
  dumpEnabled: patch.dumpEnabled ?? base.dumpEnabled,
  dumpDirectory: patch.dumpDirectory ?? base.dumpDirectory,
  assertions: patch.assertions ?? base.assertions,
  trace: patch.trace ?? base.trace,
});

/** Overrides win over the environment, which wins over the defaults. */
export const resolveCodegenOptions = (
  overrides: Partial<CodegenOptions> = {},
  env: Env = process.env
): CodegenOptions =>
  mergeDefined(mergeDefined(defaultCodegenOptions, envOptions(env)), overrides);
