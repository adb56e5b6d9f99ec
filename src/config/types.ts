export type BuilderKind = "emit" | "expression";

export type EmitterFlavor = "field-based" | "context-based";

export type ContainerMode = "fast" | "debuggable" | "collectable";

export type CodegenOptions = {
  /** Backend that compiles new serializers */
  builder: BuilderKind;
  /** Where emitted serializers keep their operation state */
  emitterFlavor: EmitterFlavor;
  /** Container new emitters are allocated from */
  containerMode: ContainerMode;
  /** Resolve metadata literals to stable named references so dumps stay readable */
  dumpEnabled: boolean;
  /** Directory the debuggable container persists to */
  dumpDirectory: string;
  /** Check node types while building graphs */
  assertions: boolean;
  /** Write trace lines to stderr */
  trace: boolean;
};
