import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity: DiagnosticSeverity;
  phase: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const expressionBuilderHint: DiagnosticHint = {
  message:
    "Use the expression builder (builder: \"expression\"); it compiles without dynamic code containers.",
};

type DiagnosticParamsMap = {
  PL0001: { kind: "dynamic-code-forbidden"; mode: string; reason?: string };
  PL0002: { kind: "unsupported-flavor"; requested: string; supported: readonly string[] };
  RF0001:
    | { kind: "unresolved-method"; owner: string; name: string; signature?: string }
    | { kind: "unresolved-field"; owner: string; name: string }
    | { kind: "unresolved-property"; owner: string; name: string }
    | { kind: "unresolved-helper"; name: string }
    | { kind: "unresolved-type"; name: string };
  RF0002: {
    kind: "ambiguous-member";
    owner: string;
    name: string;
    candidates: number;
  };
  RF0003: { kind: "invalid-descriptor"; at: string; message: string };
  CG0001:
    | { kind: "type-mismatch"; context: string; expected: string; actual: string }
    | { kind: "malformed-graph"; message: string }
    | { kind: "unit-compilation-failed"; unit: string; message: string };
  CG0002: { kind: "context-closed"; operation: string; state: string };
  IO0001: { kind: "persist-failed"; path: string; reason: string };
  MP0001:
    | { kind: "unexpected-token"; expected: string; actual: string }
    | { kind: "truncated"; needed: number; available: number }
    | { kind: "unknown-enum-member"; enumName: string; value: string }
    | { kind: "missing-operation"; typeName: string; reason: string }
    | { kind: "null-reference"; member: string }
    | { kind: "not-callable"; member: string }
    | { kind: "undecodable"; reason: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  PL0001: {
    code: "PL0001",
    message: (params) =>
      `dynamic code containers are not available (mode ${params.mode})${
        params.reason ? `: ${params.reason}` : ""
      }`,
    severity: "error",
    phase: "platform",
    hints: [expressionBuilderHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PL0001"]>,
  PL0002: {
    code: "PL0002",
    message: (params) =>
      `emitter flavor ${params.requested} is not supported on this platform (supported: ${params.supported.join(", ")})`,
    severity: "error",
    phase: "platform",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PL0002"]>,
  RF0001: {
    code: "RF0001",
    message: (params) => {
      switch (params.kind) {
        case "unresolved-method":
          return `${params.owner} has no method ${params.name}${params.signature ? `(${params.signature})` : ""}`;
        case "unresolved-field":
          return `${params.owner} has no field ${params.name}`;
        case "unresolved-property":
          return `${params.owner} has no property ${params.name}`;
        case "unresolved-helper":
          return `private method ${params.name} was never defined in this build`;
        case "unresolved-type":
          return `no type named ${params.name} is registered`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "reflection",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RF0001"]>,
  RF0002: {
    code: "RF0002",
    message: (params) =>
      `${params.owner}.${params.name} matches ${params.candidates} candidates; the signature must select exactly one`,
    severity: "error",
    phase: "reflection",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RF0002"]>,
  RF0003: {
    code: "RF0003",
    message: (params) => `invalid type descriptor at ${params.at}: ${params.message}`,
    severity: "error",
    phase: "reflection",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RF0003"]>,
  CG0001: {
    code: "CG0001",
    message: (params) => {
      switch (params.kind) {
        case "type-mismatch":
          return `${params.context}: expected ${params.expected}, got ${params.actual}`;
        case "malformed-graph":
          return params.message;
        case "unit-compilation-failed":
          return `generated unit ${params.unit} failed to compile: ${params.message}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0001"]>,
  CG0002: {
    code: "CG0002",
    message: (params) =>
      `cannot ${params.operation}: code generation context is ${params.state}`,
    severity: "error",
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0002"]>,
  IO0001: {
    code: "IO0001",
    message: (params) => `failed to persist ${params.path}: ${params.reason}`,
    severity: "error",
    phase: "persist",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IO0001"]>,
  MP0001: {
    code: "MP0001",
    message: (params) => {
      switch (params.kind) {
        case "unexpected-token":
          return `expected ${params.expected}, found ${params.actual}`;
        case "truncated":
          return `message truncated: needed ${params.needed} bytes, ${params.available} available`;
        case "unknown-enum-member":
          return `${params.value} is not a member of ${params.enumName}`;
        case "missing-operation":
          return `cannot unpack ${params.typeName}: ${params.reason}`;
        case "null-reference":
          return `cannot access ${params.member} of null`;
        case "not-callable":
          return `${params.member} is not a function`;
        case "undecodable":
          return `cannot decode value: ${params.reason}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "runtime",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MP0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
