import { raise } from "../../diagnostics/index.js";
import {
  Types,
  typeName,
  type ConstructorDefinition,
  type FieldDefinition,
  type MethodDefinition,
  type PropertyDefinition,
  type TypeDefinition,
} from "../../reflection/types.js";
import type { LiteralValue } from "../builder.js";
import {
  conditionalType,
  elementTypeOf,
  expectArguments,
  expectAssignable,
  expectBoolean,
  expectCall,
  expectNumeric,
} from "../verify.js";

export interface ConstantNode {
  kind: "constant";
  type: TypeDefinition;
  value: unknown;
  literal?: LiteralValue;
}

export interface DefaultNode {
  kind: "default";
  type: TypeDefinition;
}

/** A method argument or a block local. */
export interface ParameterNode {
  kind: "parameter";
  type: TypeDefinition;
  name: string;
  isLocal: boolean;
  /** Loaded reference; kept when it appears as a block statement */
  significant: boolean;
}

export interface BlockNode {
  kind: "block";
  type: TypeDefinition;
  variables: readonly ParameterNode[];
  body: readonly ExpressionNode[];
}

export type AssignableNode = ParameterNode | FieldNode | PropertyNode | ArrayIndexNode;

export interface AssignNode {
  kind: "assign";
  type: TypeDefinition;
  target: AssignableNode;
  value: ExpressionNode;
}

export interface FieldNode {
  kind: "field";
  type: TypeDefinition;
  instance: ExpressionNode;
  field: FieldDefinition;
}

export interface PropertyNode {
  kind: "property";
  type: TypeDefinition;
  instance: ExpressionNode;
  property: PropertyDefinition;
}

export interface IndexSetNode {
  kind: "index-set";
  type: TypeDefinition;
  instance: ExpressionNode;
  property: PropertyDefinition;
  index: ExpressionNode;
  value: ExpressionNode;
}

export interface CallNode {
  kind: "call";
  type: TypeDefinition;
  instance?: ExpressionNode;
  method: MethodDefinition;
  args: readonly ExpressionNode[];
}

export interface InvokeNode {
  kind: "invoke";
  type: TypeDefinition;
  target: ExpressionNode;
  args: readonly ExpressionNode[];
}

export interface NewNode {
  kind: "new";
  type: TypeDefinition;
  ctor: ConstructorDefinition;
  args: readonly ExpressionNode[];
}

export interface NewArrayNode {
  kind: "new-array";
  type: TypeDefinition;
  elementType: TypeDefinition;
  length: number;
  elements?: readonly ExpressionNode[];
}

export interface ArrayIndexNode {
  kind: "array-index";
  type: TypeDefinition;
  array: ExpressionNode;
  index: ExpressionNode;
}

export interface UnaryNode {
  kind: "unary";
  type: TypeDefinition;
  operator: "not" | "increment";
  operand: ExpressionNode;
}

export type BinaryOperator =
  | "equal"
  | "not-equal"
  | "greater-than"
  | "less-than"
  | "and-also";

export interface BinaryNode {
  kind: "binary";
  type: TypeDefinition;
  operator: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
  /** Equality against a null literal also matches undefined */
  looseNull: boolean;
}

export interface ConditionNode {
  kind: "condition";
  type: TypeDefinition;
  test: ExpressionNode;
  then: ExpressionNode;
  else?: ExpressionNode;
}

export interface LoopNode {
  kind: "loop";
  type: TypeDefinition;
  body: ExpressionNode;
  label: string;
}

export interface BreakNode {
  kind: "break";
  type: TypeDefinition;
  label: string;
}

export interface TryFinallyNode {
  kind: "try-finally";
  type: TypeDefinition;
  body: ExpressionNode;
  finally: ExpressionNode;
}

export interface ConvertNode {
  kind: "convert";
  type: TypeDefinition;
  operand: ExpressionNode;
}

export interface LambdaNode {
  kind: "lambda";
  type: TypeDefinition;
  parameters: readonly ParameterNode[];
  body: ExpressionNode;
}

export type ExpressionNode =
  | ConstantNode
  | DefaultNode
  | ParameterNode
  | BlockNode
  | AssignNode
  | FieldNode
  | PropertyNode
  | IndexSetNode
  | CallNode
  | InvokeNode
  | NewNode
  | NewArrayNode
  | ArrayIndexNode
  | UnaryNode
  | BinaryNode
  | ConditionNode
  | LoopNode
  | BreakNode
  | TryFinallyNode
  | ConvertNode
  | LambdaNode;

const isNullLiteral = (node: ExpressionNode): boolean =>
  node.kind === "constant" && node.literal === null;

const literalIndex = (node: ExpressionNode): number | undefined =>
  node.kind === "constant" && typeof node.literal === "number" ? node.literal : undefined;

/** Node factories; each checks the types it combines. */
export const Expr = {
  constant: (type: TypeDefinition, value: unknown, literal?: LiteralValue): ConstantNode => ({
    kind: "constant",
    type,
    value,
    literal,
  }),

  default: (type: TypeDefinition): DefaultNode => ({ kind: "default", type }),

  parameter: (type: TypeDefinition, name: string, isLocal = false): ParameterNode => ({
    kind: "parameter",
    type,
    name,
    isLocal,
    significant: false,
  }),

  load: (variable: ExpressionNode): ParameterNode => {
    if (variable.kind !== "parameter" || variable.type.kind === "void") {
      return raise({
        code: "CG0001",
        params: { kind: "malformed-graph", message: `cannot load a ${variable.kind} node` },
      });
    }
    return { ...variable, significant: true };
  },

  block: (
    type: TypeDefinition,
    variables: readonly ParameterNode[],
    body: readonly ExpressionNode[]
  ): BlockNode => ({ kind: "block", type, variables, body }),

  assign: (target: ExpressionNode, value: ExpressionNode): AssignNode => {
    if (
      target.kind !== "parameter" &&
      target.kind !== "field" &&
      target.kind !== "property" &&
      target.kind !== "array-index"
    ) {
      return raise({
        code: "CG0001",
        params: { kind: "malformed-graph", message: `cannot assign to a ${target.kind} node` },
      });
    }
    const label = target.kind === "parameter" ? `store ${target.name}` : `assign ${target.kind}`;
    expectAssignable(label, target.type, value.type);
    return { kind: "assign", type: Types.void, target, value };
  },

  field: (instance: ExpressionNode, field: FieldDefinition): FieldNode => ({
    kind: "field",
    type: field.type,
    instance,
    field,
  }),

  property: (instance: ExpressionNode, property: PropertyDefinition): PropertyNode => ({
    kind: "property",
    type: property.type,
    instance,
    property,
  }),

  indexSet: (
    instance: ExpressionNode,
    property: PropertyDefinition,
    index: ExpressionNode,
    value: ExpressionNode
  ): IndexSetNode => {
    expectArguments(`indexer ${property.name}`, property.indexParameters, [index.type]);
    expectAssignable(`indexer ${property.name} value`, property.type, value.type);
    return { kind: "index-set", type: Types.void, instance, property, index, value };
  },

  call: (
    instance: ExpressionNode | undefined,
    method: MethodDefinition,
    args: readonly ExpressionNode[]
  ): CallNode => {
    expectCall(method, args.map((arg) => arg.type));
    return { kind: "call", type: method.returnType, instance, method, args };
  },

  invoke: (
    returnType: TypeDefinition,
    target: ExpressionNode,
    args: readonly ExpressionNode[]
  ): InvokeNode => {
    if (target.type.kind === "function") {
      expectArguments("invoke", target.type.parameters, args.map((arg) => arg.type));
      expectAssignable("invoke result", returnType, target.type.returns);
    }
    return { kind: "invoke", type: returnType, target, args };
  },

  create: (ctor: ConstructorDefinition, args: readonly ExpressionNode[]): NewNode => {
    expectArguments(
      `new ${typeName(ctor.declaringType)}`,
      ctor.parameterTypes,
      args.map((arg) => arg.type)
    );
    return { kind: "new", type: ctor.declaringType, ctor, args };
  },

  newArray: (
    elementType: TypeDefinition,
    length: number,
    elements?: readonly ExpressionNode[]
  ): NewArrayNode => {
    elements?.forEach((element, index) =>
      expectAssignable(`array element ${index}`, elementType, element.type)
    );
    return {
      kind: "new-array",
      type: Types.array(elementType),
      elementType,
      length: elements ? elements.length : length,
      elements,
    };
  },

  arrayIndex: (array: ExpressionNode, index: ExpressionNode): ArrayIndexNode => {
    expectAssignable("array index", Types.int32, index.type);
    return {
      kind: "array-index",
      type: elementTypeOf(array.type, literalIndex(index)),
      array,
      index,
    };
  },

  not: (operand: ExpressionNode): UnaryNode => {
    expectBoolean("not", operand.type);
    return { kind: "unary", type: Types.boolean, operator: "not", operand };
  },

  increment: (operand: ExpressionNode): UnaryNode => {
    expectAssignable("increment", Types.int32, operand.type);
    return { kind: "unary", type: Types.int32, operator: "increment", operand };
  },

  binary: (
    operator: BinaryOperator,
    left: ExpressionNode,
    right: ExpressionNode
  ): BinaryNode => {
    if (operator === "and-also") {
      expectBoolean("and-also left", left.type);
      expectBoolean("and-also right", right.type);
    }
    if (operator === "greater-than" || operator === "less-than") {
      expectNumeric(`${operator} left`, left.type);
      expectNumeric(`${operator} right`, right.type);
    }
    return {
      kind: "binary",
      type: Types.boolean,
      operator,
      left,
      right,
      looseNull: isNullLiteral(left) || isNullLiteral(right),
    };
  },

  condition: (
    test: ExpressionNode,
    then: ExpressionNode,
    otherwise?: ExpressionNode
  ): ConditionNode => {
    expectBoolean("condition", test.type);
    return {
      kind: "condition",
      type: conditionalType(then.type, otherwise?.type),
      test,
      then,
      else: otherwise,
    };
  },

  loop: (body: ExpressionNode, label: string): LoopNode => ({
    kind: "loop",
    type: Types.void,
    body,
    label,
  }),

  break: (label: string): BreakNode => ({ kind: "break", type: Types.void, label }),

  tryFinally: (body: ExpressionNode, finallyNode: ExpressionNode): TryFinallyNode => ({
    kind: "try-finally",
    type: body.type,
    body,
    finally: finallyNode,
  }),

  convert: (operand: ExpressionNode, type: TypeDefinition): ConvertNode => ({
    kind: "convert",
    type,
    operand,
  }),

  lambda: (
    parameters: readonly ParameterNode[],
    returnType: TypeDefinition,
    body: ExpressionNode
  ): LambdaNode => {
    expectAssignable("lambda body", returnType, body.type);
    return {
      kind: "lambda",
      type: Types.fn(
        parameters.map((parameter) => parameter.type),
        returnType
      ),
      parameters,
      body,
    };
  },
};
