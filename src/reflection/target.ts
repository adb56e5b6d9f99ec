import { raise } from "../diagnostics/index.js";
import { HostTypes } from "../runtime/host-types.js";
import {
  defaultConstructorOf,
  fieldsOf,
  resolveField,
  resolveMethod,
  resolveProperty,
} from "./members.js";
import {
  Types,
  typeName,
  type ConstructorDefinition,
  type FieldDefinition,
  type MethodDefinition,
  type PropertyDefinition,
  type TypeDefinition,
} from "./types.js";

export interface SerializingMember {
  name: string;
  type: TypeDefinition;
  /** Absent for tuple items */
  member?: FieldDefinition | PropertyDefinition;
}

export interface SerializationTarget {
  type: TypeDefinition;
  members: readonly SerializingMember[];
  instanceConstructor: ConstructorDefinition;
  isTuple: boolean;
}

export type CollectionTraits =
  | { kind: "none" }
  | {
      kind: "array" | "map";
      /** Maps enumerate `[key, value]` tuples */
      elementType: TypeDefinition;
      getEnumerator: MethodDefinition;
      moveNext: MethodDefinition;
      current: PropertyDefinition;
      count: PropertyDefinition;
    };

export interface PolymorphismSchema {
  readonly name: string;
  readonly options?: Readonly<Record<string, unknown>>;
}

const defaultSchema: PolymorphismSchema = Object.freeze({ name: "default" });

export const PolymorphismSchema = {
  default: defaultSchema,
  named: (
    name: string,
    options?: Readonly<Record<string, unknown>>
  ): PolymorphismSchema => Object.freeze({ name, options }),
} as const;

const memberOf = (
  type: TypeDefinition,
  name: string
): FieldDefinition | PropertyDefinition =>
  fieldsOf(type).some((field) => field.name === name)
    ? resolveField(type, name)
    : resolveProperty(type, name);

/**
 * Minimal member scanner: `serializableMembers` in declared order, or every
 * field of the type. Tuples serialize their items by position.
 */
export const createSerializationTarget = (
  type: TypeDefinition
): SerializationTarget => {
  if (type.kind === "tuple") {
    return {
      type,
      members: type.elements.map((element, index) => ({
        name: `item${index + 1}`,
        type: element,
      })),
      instanceConstructor: defaultConstructorOf(type),
      isTuple: true,
    };
  }

  if (type.kind !== "object") {
    return raise({
      code: "CG0001",
      params: {
        kind: "malformed-graph",
        message: `${typeName(type)} is neither an object nor a tuple type`,
      },
      subject: typeName(type),
    });
  }

  const names = type.serializableMembers ?? type.fields.map((field) => field.name);
  return {
    type,
    members: names.map((name) => {
      const member = memberOf(type, name);
      return { name, type: member.type, member };
    }),
    instanceConstructor: defaultConstructorOf(type),
    isTuple: false,
  };
};

export const collectionTraitsOf = (type: TypeDefinition): CollectionTraits => {
  if (type.kind !== "array" && type.kind !== "map") return { kind: "none" };

  const elementType =
    type.kind === "array" ? type.element : Types.tuple(type.key, type.value);
  const enumerator = HostTypes.enumerator(elementType);
  return {
    kind: type.kind,
    elementType,
    getEnumerator: HostTypes.enumeratorOf(type, elementType),
    moveNext: resolveMethod(enumerator, "moveNext"),
    current: resolveProperty(enumerator, "current"),
    count: resolveProperty(type, type.kind === "array" ? "length" : "size"),
  };
};
