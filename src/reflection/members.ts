import { raise } from "../diagnostics/index.js";
import {
  Types,
  type ConstructorDefinition,
  sameType,
  typeName,
  type FieldDefinition,
  type MethodDefinition,
  type PropertyDefinition,
  type TypeDefinition,
} from "./types.js";

const builtinProperty = (
  declaringType: TypeDefinition,
  name: string,
  type: TypeDefinition
): PropertyDefinition => ({
  kind: "property",
  name,
  declaringType,
  type,
  key: name,
  indexParameters: [],
});

const builtinMethod = (
  declaringType: TypeDefinition,
  name: string,
  parameterTypes: readonly TypeDefinition[],
  returnType: TypeDefinition
): MethodDefinition => ({
  kind: "method",
  name,
  declaringType,
  parameterTypes,
  returnType,
  isStatic: false,
  runtime: { kind: "instance", member: name },
});

export const constructorsOf = (
  type: TypeDefinition
): readonly ConstructorDefinition[] => {
  switch (type.kind) {
    case "object":
      return type.constructors;
    case "array":
    case "tuple":
      return [
        { kind: "constructor", declaringType: type, parameterTypes: [], create: () => [] },
      ];
    case "map":
      return [
        {
          kind: "constructor",
          declaringType: type,
          parameterTypes: [],
          create: () => new Map<unknown, unknown>(),
        },
      ];
    default:
      return [];
  }
};

export const defaultConstructorOf = (
  type: TypeDefinition
): ConstructorDefinition =>
  pickOne(
    constructorsOf(type).filter((ctor) => ctor.parameterTypes.length === 0),
    type,
    "constructor",
    () =>
      raise({
        code: "RF0001",
        params: {
          kind: "unresolved-method",
          owner: typeName(type),
          name: "constructor",
          signature: "",
        },
        subject: typeName(type),
      })
  );

export const fieldsOf = (type: TypeDefinition): readonly FieldDefinition[] =>
  type.kind === "object" ? type.fields : [];

export const propertiesOf = (
  type: TypeDefinition
): readonly PropertyDefinition[] => {
  switch (type.kind) {
    case "object":
      return type.properties;
    case "array":
    case "tuple":
      return [builtinProperty(type, "length", Types.int32)];
    case "map":
      return [
        builtinProperty(type, "size", Types.int32),
        {
          ...builtinProperty(type, "item", type.value),
          indexParameters: [type.key],
          indexerSetter: "set",
        },
      ];
    default:
      return [];
  }
};

export const methodsOf = (type: TypeDefinition): readonly MethodDefinition[] => {
  switch (type.kind) {
    case "object":
      return type.methods;
    case "array":
      return [builtinMethod(type, "push", [type.element], Types.int32)];
    case "map":
      return [
        builtinMethod(type, "get", [type.key], Types.nullable(type.value)),
        builtinMethod(type, "set", [type.key, type.value], type),
        builtinMethod(type, "has", [type.key], Types.boolean),
      ];
    default:
      return [];
  }
};

export const methodSignature = (method: MethodDefinition): string =>
  `${method.parameterTypes.map(typeName).join(", ")}`;

const pickOne = <T>(
  candidates: readonly T[],
  owner: TypeDefinition,
  name: string,
  unresolved: () => never
): T => {
  const [first] = candidates;
  if (first === undefined) {
    return unresolved();
  }
  if (candidates.length > 1) {
    return raise({
      code: "RF0002",
      params: {
        kind: "ambiguous-member",
        owner: typeName(owner),
        name,
        candidates: candidates.length,
      },
      subject: typeName(owner),
    });
  }
  return first;
};

const sameTypes = (
  left: readonly TypeDefinition[],
  right: readonly TypeDefinition[]
): boolean =>
  left.length === right.length &&
  left.every((type, index) => {
    const other = right[index];
    return other !== undefined && sameType(type, other);
  });

/** Resolves a method by name and, when given, exact parameter types. */
export const resolveMethod = (
  type: TypeDefinition,
  name: string,
  parameterTypes?: readonly TypeDefinition[]
): MethodDefinition =>
  pickOne(
    methodsOf(type).filter(
      (method) =>
        method.name === name &&
        (parameterTypes === undefined ||
          sameTypes(method.parameterTypes, parameterTypes))
    ),
    type,
    name,
    () =>
      raise({
        code: "RF0001",
        params: {
          kind: "unresolved-method",
          owner: typeName(type),
          name,
          signature: parameterTypes?.map(typeName).join(", "),
        },
        subject: typeName(type),
      })
  );

export const resolveField = (
  type: TypeDefinition,
  name: string
): FieldDefinition =>
  pickOne(
    fieldsOf(type).filter((field) => field.name === name),
    type,
    name,
    () =>
      raise({
        code: "RF0001",
        params: { kind: "unresolved-field", owner: typeName(type), name },
        subject: typeName(type),
      })
  );

export const resolveProperty = (
  type: TypeDefinition,
  name: string
): PropertyDefinition =>
  pickOne(
    propertiesOf(type).filter(
      (property) => property.name === name && property.indexParameters.length === 0
    ),
    type,
    name,
    () =>
      raise({
        code: "RF0001",
        params: { kind: "unresolved-property", owner: typeName(type), name },
        subject: typeName(type),
      })
  );

/**
 * Finds the settable indexer `name` taking exactly `keyType` and assigning
 * exactly `valueType`.
 */
export const resolveIndexer = (
  type: TypeDefinition,
  name: string,
  keyType: TypeDefinition,
  valueType: TypeDefinition
): PropertyDefinition =>
  pickOne(
    propertiesOf(type).filter(
      (property) =>
        property.name === name &&
        property.indexerSetter !== undefined &&
        sameTypes(property.indexParameters, [keyType]) &&
        sameType(property.type, valueType)
    ),
    type,
    name,
    () =>
      raise({
        code: "RF0001",
        params: {
          kind: "unresolved-method",
          owner: typeName(type),
          name,
          signature: `${typeName(keyType)}, ${typeName(valueType)}`,
        },
        subject: typeName(type),
      })
  );
