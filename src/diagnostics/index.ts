export * from "./types.js";
export * from "./registry.js";

import type { Diagnostic } from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  subject?: string;
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const { severity, phase, hints } = getDiagnosticDefinition(options.code);
  return {
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    subject: options.subject,
    severity,
    phase,
    hints,
  };
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const subject = diagnostic.subject ? `${diagnostic.subject} ` : "";
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${subject}${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic, options?: { cause?: unknown }) {
    super(formatDiagnostic(diagnostic), options);
    this.name = "DiagnosticError";
    this.diagnostic = diagnostic;
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

export type RaiseOptions<K extends DiagnosticCode> = RegistryDiagnosticOptions<K> & {
  cause?: unknown;
};

export const raise = <K extends DiagnosticCode>(
  options: RaiseOptions<K>
): never => {
  throw new DiagnosticError(diagnosticFromCode(options), {
    cause: options.cause,
  });
};

export const isDiagnosticError = (
  error: unknown,
  code?: DiagnosticCode
): error is DiagnosticError =>
  error instanceof DiagnosticError && (code === undefined || error.code === code);
