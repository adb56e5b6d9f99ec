import { raise } from "../diagnostics/index.js";
import { objectType } from "../reflection/describe.js";
import { resolveField, resolveMethod } from "../reflection/members.js";
import {
  Types,
  typeName,
  type FieldDefinition,
  type MethodDefinition,
  type TypeDefinition,
} from "../reflection/types.js";
import { HostTypes } from "./host-types.js";

/**
 * Stable named references to type metadata. Dumped units refer to types by
 * name through this registry instead of embedding live handles.
 */
export class MetadataRegistry {
  private readonly types = new Map<string, TypeDefinition>();

  registerType(type: TypeDefinition): string {
    const name = typeName(type);
    this.types.set(name, type);
    return name;
  }

  resolveType(name: string): TypeDefinition {
    const type = this.types.get(name);
    if (!type) {
      return raise({ code: "RF0001", params: { kind: "unresolved-type", name } });
    }
    return type;
  }

  resolveMethod(
    ownerName: string,
    name: string,
    parameterTypeNames?: readonly string[]
  ): MethodDefinition {
    return resolveMethod(
      this.resolveType(ownerName),
      name,
      parameterTypeNames?.map((parameter) => this.resolveType(parameter))
    );
  }

  resolveField(ownerName: string, name: string): FieldDefinition {
    return resolveField(this.resolveType(ownerName), name);
  }
}

export const metadataRegistry = new MetadataRegistry();

const registryType = objectType({ name: "MetadataRegistry" });

const staticMethod = (
  name: string,
  parameterTypes: readonly TypeDefinition[],
  returnType: TypeDefinition,
  invoke: (...args: readonly unknown[]) => unknown
): MethodDefinition => ({
  kind: "method",
  name,
  declaringType: registryType,
  parameterTypes,
  returnType,
  isStatic: true,
  runtime: { kind: "static", qualifiedName: `MetadataRegistry.${name}`, invoke },
});

const asName = (value: unknown): string => (typeof value === "string" ? value : String(value));

const asNames = (value: unknown): string[] | undefined =>
  Array.isArray(value) ? value.map(asName) : undefined;

/** Static lookups generated code calls in dump mode. */
export const metadataMethods = (registry: MetadataRegistry) => ({
  resolveType: staticMethod("resolveType", [Types.string], HostTypes.typeHandle, (name) =>
    registry.resolveType(asName(name))
  ),
  resolveMethod: staticMethod(
    "resolveMethod",
    [Types.string, Types.string, Types.nullable(Types.array(Types.string))],
    HostTypes.methodHandle,
    (owner, name, parameters) =>
      registry.resolveMethod(asName(owner), asName(name), asNames(parameters))
  ),
  resolveField: staticMethod(
    "resolveField",
    [Types.string, Types.string],
    HostTypes.fieldHandle,
    (owner, name) => registry.resolveField(asName(owner), asName(name))
  ),
});
