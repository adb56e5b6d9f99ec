export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "platform"
  | "reflection"
  | "codegen"
  | "persist"
  | "runtime";

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  /** Type, container or file the diagnostic is about */
  subject?: string;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}
