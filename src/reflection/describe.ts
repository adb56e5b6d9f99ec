import { raise } from "../diagnostics/index.js";
import {
  Types,
  type ConstructorDefinition,
  type EnumTypeDefinition,
  type MethodDefinition,
  type ObjectTypeDefinition,
  type PropertyDefinition,
  type TupleTypeDefinition,
  type TypeDefinition,
} from "./types.js";

export interface PropertyInit {
  name: string;
  type: TypeDefinition;
  /** Own key; defaults to the property name */
  key?: string;
  get?: (target: unknown) => unknown;
  set?: (target: unknown, value: unknown) => void;
  /** Index parameter types, making this an indexer */
  index?: readonly TypeDefinition[];
  /** Method an indexer assignment calls */
  setter?: string;
}

export interface MethodInit {
  name: string;
  parameters?: readonly TypeDefinition[];
  returns?: TypeDefinition;
  isStatic?: boolean;
  invoke?: (...args: readonly unknown[]) => unknown;
}

export type FieldsInit =
  | Readonly<Record<string, TypeDefinition>>
  | ((self: ObjectTypeDefinition) => Readonly<Record<string, TypeDefinition>>);

export interface ObjectTypeInit {
  name: string;
  /** Declared in order; pass a function for self-referencing types */
  fields?: FieldsInit;
  properties?: readonly PropertyInit[];
  methods?: readonly MethodInit[];
  create?: () => object;
  packable?: boolean;
  unpackable?: boolean;
  serializableMembers?: readonly string[];
}

const missingStatic =
  (qualifiedName: string) =>
  (): never =>
    raise({
      code: "MP0001",
      params: { kind: "not-callable", member: qualifiedName },
    });

const methodFrom = (
  owner: ObjectTypeDefinition,
  init: MethodInit
): MethodDefinition => {
  const qualifiedName = `${owner.name}.${init.name}`;
  return {
    kind: "method",
    name: init.name,
    declaringType: owner,
    parameterTypes: init.parameters ?? [],
    returnType: init.returns ?? Types.void,
    isStatic: init.isStatic ?? false,
    runtime: init.isStatic
      ? {
          kind: "static",
          qualifiedName,
          invoke: init.invoke ?? missingStatic(qualifiedName),
        }
      : { kind: "instance", member: init.name },
  };
};

const propertyFrom = (
  owner: ObjectTypeDefinition,
  init: PropertyInit
): PropertyDefinition => ({
  kind: "property",
  name: init.name,
  declaringType: owner,
  type: init.type,
  key: init.key ?? init.name,
  accessors:
    init.get || init.set ? { get: init.get, set: init.set } : undefined,
  indexParameters: init.index ?? [],
  indexerSetter: init.setter,
});

export const objectType = (init: ObjectTypeInit): ObjectTypeDefinition => {
  const type: ObjectTypeDefinition = {
    kind: "object",
    name: init.name,
    fields: [],
    properties: [],
    methods: [],
    constructors: [],
    capabilities: {
      packable: init.packable ?? false,
      unpackable: init.unpackable ?? false,
    },
    serializableMembers: init.serializableMembers,
  };

  const fields =
    typeof init.fields === "function" ? init.fields(type) : init.fields ?? {};
  for (const [name, fieldType] of Object.entries(fields)) {
    type.fields.push({ kind: "field", name, declaringType: type, type: fieldType });
  }
  for (const property of init.properties ?? []) {
    type.properties.push(propertyFrom(type, property));
  }
  for (const method of init.methods ?? []) {
    type.methods.push(methodFrom(type, method));
  }

  const create = init.create ?? (() => ({}));
  const constructor: ConstructorDefinition = {
    kind: "constructor",
    declaringType: type,
    parameterTypes: [],
    create: () => create(),
  };
  type.constructors.push(constructor);
  return type;
};

/**
 * Describes an enum from a member table. Numeric enum objects work as is;
 * their reverse mappings are ignored.
 */
export const enumType = (
  name: string,
  members: Readonly<Record<string, string | number>>
): EnumTypeDefinition => {
  const numeric: Record<string, number> = {};
  for (const [key, value] of Object.entries(members)) {
    if (typeof value === "number") numeric[key] = value;
  }
  return { kind: "enum", name, members: numeric };
};

export const tupleType = (
  ...elements: TypeDefinition[]
): TupleTypeDefinition => Types.tuple(...elements);
