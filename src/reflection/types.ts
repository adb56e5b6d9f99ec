export type PrimitiveName =
  | "boolean"
  | "int32"
  | "float64"
  | "string"
  | "binary"
  | "any";

export interface VoidType {
  kind: "void";
}

export interface NullType {
  kind: "null";
}

export interface PrimitiveType {
  kind: "primitive";
  name: PrimitiveName;
}

export interface NullableType {
  kind: "nullable";
  inner: TypeDefinition;
}

export interface ArrayTypeDefinition {
  kind: "array";
  element: TypeDefinition;
}

export interface MapTypeDefinition {
  kind: "map";
  key: TypeDefinition;
  value: TypeDefinition;
}

export interface TupleTypeDefinition {
  kind: "tuple";
  elements: readonly TypeDefinition[];
}

export interface FunctionTypeDefinition {
  kind: "function";
  parameters: readonly TypeDefinition[];
  returns: TypeDefinition;
}

export interface EnumTypeDefinition {
  kind: "enum";
  name: string;
  members: Readonly<Record<string, number>>;
}

export interface SelfPackingCapabilities {
  /** Instances implement packToMessage(packer, context) */
  packable: boolean;
  /** Instances implement unpackFromMessage(unpacker, context) */
  unpackable: boolean;
}

export interface ObjectTypeDefinition {
  kind: "object";
  name: string;
  fields: FieldDefinition[];
  properties: PropertyDefinition[];
  methods: MethodDefinition[];
  constructors: ConstructorDefinition[];
  capabilities: SelfPackingCapabilities;
  /** Serialization order; every field in declaration order when absent */
  serializableMembers?: readonly string[];
}

export type TypeDefinition =
  | VoidType
  | NullType
  | PrimitiveType
  | NullableType
  | ArrayTypeDefinition
  | MapTypeDefinition
  | TupleTypeDefinition
  | FunctionTypeDefinition
  | EnumTypeDefinition
  | ObjectTypeDefinition;

export interface FieldDefinition {
  kind: "field";
  name: string;
  declaringType: TypeDefinition;
  type: TypeDefinition;
}

export interface PropertyAccessors {
  get?: (target: unknown) => unknown;
  set?: (target: unknown, value: unknown) => void;
}

export interface PropertyDefinition {
  kind: "property";
  name: string;
  declaringType: TypeDefinition;
  type: TypeDefinition;
  /** Own key read and written when no accessor pair is given */
  key: string;
  accessors?: PropertyAccessors;
  /** Non-empty for indexers */
  indexParameters: readonly TypeDefinition[];
  /** Instance method an indexer assignment calls with (...index, value) */
  indexerSetter?: string;
}

export type RuntimeMethodHandle =
  | { kind: "instance"; member: string }
  | {
      kind: "static";
      qualifiedName: string;
      invoke: (...args: readonly unknown[]) => unknown;
    };

export interface MethodDefinition {
  kind: "method";
  name: string;
  declaringType?: TypeDefinition;
  parameterTypes: readonly TypeDefinition[];
  returnType: TypeDefinition;
  isStatic: boolean;
  /** Absent for private helpers emitted during the build */
  runtime?: RuntimeMethodHandle;
}

export interface ConstructorDefinition {
  kind: "constructor";
  declaringType: TypeDefinition;
  parameterTypes: readonly TypeDefinition[];
  create: (...args: readonly unknown[]) => unknown;
}

const primitive = (name: PrimitiveName): PrimitiveType => ({
  kind: "primitive",
  name,
});

const voidType: VoidType = { kind: "void" };
const nullType: NullType = { kind: "null" };

export const Types = {
  void: voidType,
  null: nullType,
  boolean: primitive("boolean"),
  int32: primitive("int32"),
  float64: primitive("float64"),
  string: primitive("string"),
  binary: primitive("binary"),
  any: primitive("any"),
  nullable: (inner: TypeDefinition): TypeDefinition =>
    inner.kind === "nullable" || inner.kind === "null"
      ? inner
      : { kind: "nullable", inner },
  array: (element: TypeDefinition): ArrayTypeDefinition => ({
    kind: "array",
    element,
  }),
  map: (key: TypeDefinition, value: TypeDefinition): MapTypeDefinition => ({
    kind: "map",
    key,
    value,
  }),
  tuple: (...elements: TypeDefinition[]): TupleTypeDefinition => ({
    kind: "tuple",
    elements,
  }),
  fn: (
    parameters: readonly TypeDefinition[],
    returns: TypeDefinition
  ): FunctionTypeDefinition => ({ kind: "function", parameters, returns }),
} as const;

export const typeName = (type: TypeDefinition): string => {
  switch (type.kind) {
    case "void":
      return "void";
    case "null":
      return "null";
    case "primitive":
      return type.name;
    case "nullable":
      return `${typeName(type.inner)}?`;
    case "array":
      return `${typeName(type.element)}[]`;
    case "map":
      return `Map<${typeName(type.key)},${typeName(type.value)}>`;
    case "tuple":
      return `[${type.elements.map(typeName).join(",")}]`;
    case "function":
      return `(${type.parameters.map(typeName).join(",")})=>${typeName(type.returns)}`;
    case "enum":
    case "object":
      return type.name;
  }
};

export const sameType = (left: TypeDefinition, right: TypeDefinition): boolean =>
  left === right || typeName(left) === typeName(right);

const acceptsNull = (type: TypeDefinition): boolean => {
  switch (type.kind) {
    case "nullable":
    case "null":
    case "object":
    case "array":
    case "map":
    case "tuple":
    case "function":
      return true;
    case "primitive":
      return type.name === "any" || type.name === "string" || type.name === "binary";
    default:
      return false;
  }
};

/** Whether a value of `source` may flow where `target` is expected. */
export const isAssignableFrom = (
  target: TypeDefinition,
  source: TypeDefinition
): boolean => {
  if (target.kind === "void") return true;
  if (target.kind === "primitive" && target.name === "any") return true;
  if (source.kind === "null") return acceptsNull(target);
  if (target.kind === "nullable") {
    const unwrapped = source.kind === "nullable" ? source.inner : source;
    return isAssignableFrom(target.inner, unwrapped);
  }
  return sameType(target, source);
};

export const isVoid = (type: TypeDefinition): boolean => type.kind === "void";

export const defaultValueOf = (type: TypeDefinition): unknown => {
  if (type.kind === "enum") return 0;
  if (type.kind !== "primitive") return null;
  switch (type.name) {
    case "int32":
    case "float64":
      return 0;
    case "boolean":
      return false;
    default:
      return null;
  }
};

export const isIdentifier = (name: string): boolean =>
  /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name);

export const toIdentifier = (name: string): string => {
  const cleaned = name.replace(/[^A-Za-z0-9_$]/g, "_");
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
};
