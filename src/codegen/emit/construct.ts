import { raise } from "../../diagnostics/index.js";
import { isIdentifier, typeName, type TypeDefinition } from "../../reflection/types.js";
import type { Construct, LiteralValue } from "../builder.js";

export type EmitKind = "expression" | "statement" | "local" | "argument";

/**
 * A JavaScript fragment. Void constructs are complete statements; everything
 * else is an expression. Locals and arguments carry their binding name.
 */
export interface EmitConstruct extends Construct {
  readonly kind: EmitKind;
  readonly code: string;
  readonly name?: string;
}

export const Emit = {
  expression: (type: TypeDefinition, code: string, literal?: LiteralValue): EmitConstruct => ({
    kind: "expression",
    type,
    code,
    literal,
  }),

  statement: (type: TypeDefinition, code: string): EmitConstruct => ({
    kind: "statement",
    type,
    code,
  }),

  local: (type: TypeDefinition, name: string): EmitConstruct => ({
    kind: "local",
    type,
    code: name,
    name,
  }),

  argument: (type: TypeDefinition, name: string): EmitConstruct => ({
    kind: "argument",
    type,
    code: name,
    name,
  }),
};

export const isVoidConstruct = (construct: EmitConstruct): boolean =>
  construct.type.kind === "void";

export const isNullLiteral = (construct: EmitConstruct): boolean =>
  construct.literal === null;

export const asStatement = (construct: EmitConstruct): string => {
  if (construct.kind === "local") return "";
  return isVoidConstruct(construct) ? construct.code : `${construct.code};`;
};

export const asExpression = (construct: EmitConstruct): string => {
  if (isVoidConstruct(construct)) {
    return raise({
      code: "CG0001",
      params: {
        kind: "type-mismatch",
        context: "expression operand",
        expected: "a value",
        actual: typeName(construct.type),
      },
    });
  }
  return construct.code;
};

/** `target.name`, or `target["name"]` when the name is not an identifier. */
export const memberAccess = (target: string, name: string): string =>
  isIdentifier(name) ? `${target}.${name}` : `${target}[${JSON.stringify(name)}]`;

/** Source spelling of a literal, or undefined when it needs the constants table. */
export const literalCode = (value: unknown): string | undefined => {
  if (value === null || value === undefined) return "null";
  switch (typeof value) {
    case "boolean":
    case "number":
      return String(value);
    case "string":
      return JSON.stringify(value);
    default:
      return undefined;
  }
};

export const block = (lines: readonly string[]): string =>
  lines.length === 0 ? "{}" : `{\n${lines.filter((line) => line.length > 0).join("\n")}\n}`;
