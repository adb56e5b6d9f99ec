import { raise } from "../diagnostics/index.js";
import {
  Types,
  isAssignableFrom,
  sameType,
  typeName,
  type MethodDefinition,
  type TypeDefinition,
} from "../reflection/types.js";

// Type rules shared by both builders.

export const expectAssignable = (
  context: string,
  target: TypeDefinition,
  source: TypeDefinition
): void => {
  if (!isAssignableFrom(target, source)) {
    raise({
      code: "CG0001",
      params: {
        kind: "type-mismatch",
        context,
        expected: typeName(target),
        actual: typeName(source),
      },
    });
  }
};

export const expectBoolean = (context: string, type: TypeDefinition): void =>
  expectAssignable(context, Types.boolean, type);

export const expectNumeric = (context: string, type: TypeDefinition): void => {
  const numeric =
    type.kind === "primitive" &&
    (type.name === "int32" || type.name === "float64" || type.name === "any");
  if (!numeric) {
    raise({
      code: "CG0001",
      params: { kind: "type-mismatch", context, expected: "number", actual: typeName(type) },
    });
  }
};

export const expectArguments = (
  context: string,
  parameterTypes: readonly TypeDefinition[],
  argumentTypes: readonly TypeDefinition[]
): void => {
  if (parameterTypes.length !== argumentTypes.length) {
    raise({
      code: "CG0001",
      params: {
        kind: "type-mismatch",
        context: `${context} arity`,
        expected: `${parameterTypes.length} arguments`,
        actual: `${argumentTypes.length}`,
      },
    });
  }
  parameterTypes.forEach((parameter, index) => {
    const argument = argumentTypes[index];
    if (argument) expectAssignable(`${context} argument ${index}`, parameter, argument);
  });
};

export const expectCall = (
  method: MethodDefinition,
  argumentTypes: readonly TypeDefinition[]
): void => expectArguments(`call ${method.name}`, method.parameterTypes, argumentTypes);

/** Result type of a two-armed conditional. */
export const conditionalType = (
  thenType: TypeDefinition,
  elseType: TypeDefinition | undefined
): TypeDefinition => {
  if (!elseType || thenType.kind === "void" || elseType.kind === "void") {
    return Types.void;
  }
  if (sameType(thenType, elseType)) return thenType;
  if (thenType.kind === "null") return Types.nullable(elseType);
  if (elseType.kind === "null") return Types.nullable(thenType);
  if (isAssignableFrom(thenType, elseType)) return thenType;
  if (isAssignableFrom(elseType, thenType)) return elseType;
  return raise({
    code: "CG0001",
    params: {
      kind: "type-mismatch",
      context: "conditional branches",
      expected: typeName(thenType),
      actual: typeName(elseType),
    },
  });
};

/** Element type read from an array or, for a constant index, a tuple. */
export const elementTypeOf = (
  collection: TypeDefinition,
  index: number | undefined
): TypeDefinition => {
  if (collection.kind === "array") return collection.element;
  if (collection.kind === "tuple") {
    const element = index === undefined ? undefined : collection.elements[index];
    return element ?? Types.any;
  }
  if (collection.kind === "primitive" && collection.name === "any") return Types.any;
  return raise({
    code: "CG0001",
    params: {
      kind: "type-mismatch",
      context: "array element access",
      expected: "array or tuple",
      actual: typeName(collection),
    },
  });
};
