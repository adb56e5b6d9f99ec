import { readFile } from "node:fs/promises";
import { raise } from "../diagnostics/index.js";
import { enumType, objectType, tupleType } from "../reflection/describe.js";
import {
  Types,
  type ObjectTypeDefinition,
  type PrimitiveName,
  type TypeDefinition,
} from "../reflection/types.js";

// Descriptor files list named types:
//
// { "types": [
//   { "kind": "enum", "name": "Color", "members": { "Red": 0, "Green": 1 } },
//   { "kind": "object", "name": "Person",
//     "fields": { "Name": "string", "Age": "int32?", "Tags": "string[]",
//                 "Scores": "map<string,int32>", "Favorite": "Color" } }
// ] }
//
// Member types: primitives, `T?`, `T[]`, `map<K,V>`, `tuple<A,B,...>` and the
// names of other types in the file, including the declaring type itself.

const PRIMITIVES: readonly PrimitiveName[] = [
  "boolean",
  "int32",
  "float64",
  "string",
  "binary",
  "any",
];

const invalid = (at: string, message: string): never =>
  raise({ code: "RF0003", params: { kind: "invalid-descriptor", at, message } });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const primitiveNamed = (name: string): PrimitiveName | undefined =>
  PRIMITIVES.find((primitive) => primitive === name);

/** Splits `a,map<b,c>,d` at commas outside angle brackets. */
const splitArguments = (text: string): string[] => {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === "<") depth += 1;
    if (char === ">") depth -= 1;
    if (char === "," && depth === 0) {
      parts.push(text.slice(start, index).trim());
      start = index + 1;
    }
  }
  parts.push(text.slice(start).trim());
  return parts;
};

const genericArguments = (text: string, prefix: string): string[] | undefined =>
  text.startsWith(`${prefix}<`) && text.endsWith(">")
    ? splitArguments(text.slice(prefix.length + 1, -1))
    : undefined;

export const parseMemberType = (
  text: string,
  named: ReadonlyMap<string, TypeDefinition>,
  at: string
): TypeDefinition => {
  const source = text.trim();
  if (source.length === 0) return invalid(at, "empty type");
  if (source.endsWith("?")) {
    return Types.nullable(parseMemberType(source.slice(0, -1), named, at));
  }
  if (source.endsWith("[]")) {
    return Types.array(parseMemberType(source.slice(0, -2), named, at));
  }

  const mapArguments = genericArguments(source, "map");
  if (mapArguments) {
    const [key, value, ...extra] = mapArguments;
    if (key === undefined || value === undefined || extra.length > 0) {
      return invalid(at, `map takes two type arguments: ${source}`);
    }
    return Types.map(parseMemberType(key, named, at), parseMemberType(value, named, at));
  }
  const tupleArguments = genericArguments(source, "tuple");
  if (tupleArguments) {
    return tupleType(...tupleArguments.map((element) => parseMemberType(element, named, at)));
  }

  const primitive = primitiveNamed(source);
  if (primitive) return Types[primitive];
  const reference = named.get(source);
  if (!reference) {
    return raise({ code: "RF0001", params: { kind: "unresolved-type", name: source } });
  }
  return reference;
};

const readName = (entry: Record<string, unknown>, at: string): string => {
  const name = entry.name;
  if (typeof name !== "string" || name.length === 0) return invalid(at, "missing name");
  return name;
};

const readStringRecord = (value: unknown, at: string): [string, string][] => {
  if (!isRecord(value)) return invalid(at, "expected an object of member types");
  return Object.entries(value).map(([member, type]) =>
    typeof type === "string" ? [member, type] : invalid(`${at}.${member}`, "expected a type string")
  );
};

const readEnumMembers = (value: unknown, at: string): Record<string, number> => {
  if (!isRecord(value)) return invalid(at, "expected an object of enum members");
  const members: Record<string, number> = {};
  for (const [member, raw] of Object.entries(value)) {
    if (typeof raw !== "number" || !Number.isInteger(raw)) {
      return invalid(`${at}.${member}`, "enum members must be integers");
    }
    members[member] = raw;
  }
  return members;
};

/**
 * Builds the types of a parsed descriptor document, in declared order. All
 * names are declared before any member type is parsed, so types may refer to
 * each other in any order.
 */
export const parseTypeDescriptors = (document: unknown): TypeDefinition[] => {
  if (!isRecord(document) || !Array.isArray(document.types)) {
    return invalid("$", "expected { \"types\": [...] }");
  }
  const entries: unknown[] = document.types;
  const named = new Map<string, TypeDefinition>();
  const pendingFields: [ObjectTypeDefinition, [string, string][], string][] = [];

  const types = entries.map((entry, index) => {
    const at = `$.types[${index}]`;
    if (!isRecord(entry)) return invalid(at, "expected an object");
    const name = readName(entry, at);
    if (named.has(name)) return invalid(at, `duplicate type ${name}`);

    let type: TypeDefinition;
    if (entry.kind === "enum") {
      type = enumType(name, readEnumMembers(entry.members, `${at}.members`));
    } else if (entry.kind === "object") {
      const object = objectType({ name });
      pendingFields.push([object, readStringRecord(entry.fields ?? {}, `${at}.fields`), at]);
      type = object;
    } else {
      return invalid(`${at}.kind`, "expected \"object\" or \"enum\"");
    }
    named.set(name, type);
    return type;
  });

  for (const [object, fields, at] of pendingFields) {
    for (const [field, text] of fields) {
      object.fields.push({
        kind: "field",
        name: field,
        declaringType: object,
        type: parseMemberType(text, named, `${at}.fields.${field}`),
      });
    }
  }
  return types;
};

export const readDescriptorFile = async (path: string): Promise<TypeDefinition[]> => {
  const text = await readFile(path, "utf8");
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    return raise({
      code: "RF0003",
      params: {
        kind: "invalid-descriptor",
        at: path,
        message: error instanceof Error ? error.message : String(error),
      },
      cause: error,
    });
  }
  return parseTypeDescriptors(document);
};
