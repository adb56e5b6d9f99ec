import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InvalidArgumentError } from "commander";
import { describe, expect, test } from "vitest";
import { SerializationMethodGeneratorManager } from "../../codegen/container/manager.js";
import { isDiagnosticError } from "../../diagnostics/index.js";
import { enumType } from "../../reflection/describe.js";
import { typeName, type TypeDefinition } from "../../reflection/types.js";
import { createProgram, parseFlavor, type DumpCommandOptions } from "../arg-parser.js";
import { parseMemberType, parseTypeDescriptors, readDescriptorFile } from "../descriptor.js";
import { dumpSerializers } from "../exec.js";

const diagnosticCodeOf = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return isDiagnosticError(error) ? error.code : "not-a-diagnostic";
  }
  return undefined;
};

const named = new Map<string, TypeDefinition>([
  ["Color", enumType("Color", { Red: 0, Green: 1 })],
]);

const descriptor = {
  types: [
    { kind: "enum", name: "Color", members: { Red: 0, Green: 1 } },
    {
      kind: "object",
      name: "Person",
      fields: { Name: "string", Favorite: "Color", Friends: "Person[]?" },
    },
  ],
};

describe("member type parser", () => {
  test("parses nested generic types", () => {
    expect(typeName(parseMemberType("map<string, int32[]>?", named, "$"))).toBe(
      "Map<string,int32[]>?"
    );
    expect(typeName(parseMemberType("tuple<string,map<string,Color>>", named, "$"))).toBe(
      "[string,Map<string,Color>]"
    );
  });

  test("unknown names are unresolved types", () => {
    expect(diagnosticCodeOf(() => parseMemberType("Shape", named, "$"))).toBe("RF0001");
  });

  test("maps need exactly two arguments", () => {
    expect(() => parseMemberType("map<string>", named, "$.types[0].fields.Tags")).toThrow(
      "invalid type descriptor at $.types[0].fields.Tags: map takes two type arguments: map<string>"
    );
  });
});

describe("descriptor documents", () => {
  test("types may refer to themselves and to later types", () => {
    const [color, person] = parseTypeDescriptors(descriptor);
    if (person?.kind !== "object") throw new Error("expected an object type");

    expect(color?.kind).toBe("enum");
    expect(person.fields.map((field) => [field.name, typeName(field.type)])).toEqual([
      ["Name", "string"],
      ["Favorite", "Color"],
      ["Friends", "Person[]?"],
    ]);
  });

  test("errors name the offending location", () => {
    expect(() => parseTypeDescriptors({ types: [{ kind: "union", name: "Shape" }] })).toThrow(
      "$.types[0].kind"
    );
    expect(
      diagnosticCodeOf(() =>
        parseTypeDescriptors({ types: [{ kind: "enum", name: "Size", members: { Big: 1.5 } }] })
      )
    ).toBe("RF0003");
    expect(diagnosticCodeOf(() => parseTypeDescriptors({ kinds: [] }))).toBe("RF0003");
  });

  test("unreadable json is an invalid descriptor", async () => {
    const directory = await mkdtemp(join(tmpdir(), "serializer-codegen-cli-"));
    const path = join(directory, "broken.json");
    await writeFile(path, "{ types: ");

    const failure = await readDescriptorFile(path).then(
      () => undefined,
      (error: unknown) => error
    );
    expect(isDiagnosticError(failure, "RF0003")).toBe(true);
  });
});

describe("dump command", () => {
  test("parses its arguments", async () => {
    const received: DumpCommandOptions[] = [];
    const program = createProgram({
      dump: async (options) => {
        received.push(options);
      },
    });
    await program.parseAsync([
      "node",
      "serializer-codegen",
      "dump",
      "types.json",
      "--flavor",
      "Context-Based",
      "-o",
      "out",
    ]);
    expect(received).toEqual([{ descriptor: "types.json", out: "out", flavor: "context-based" }]);
  });

  test("rejects unknown flavors", () => {
    expect(() => parseFlavor("inline")).toThrow(InvalidArgumentError);
  });

  test("writes the debuggable container with dump-mode lookups", async () => {
    const directory = await mkdtemp(join(tmpdir(), "serializer-codegen-cli-"));
    const descriptorPath = join(directory, "types.json");
    await writeFile(descriptorPath, JSON.stringify(descriptor));

    const manager = new SerializationMethodGeneratorManager();
    const path = await dumpSerializers(
      { descriptor: descriptorPath, out: join(directory, "out"), flavor: "context-based" },
      manager
    );

    expect(path).toBe(join(directory, "out", `${manager.getContainer("debuggable").name}.js`));
    const text = await readFile(path, "utf8");
    expect(text.startsWith("// ColorSerializer0\n")).toBe(true);
    expect(text).toContain("\n// PersonSerializer1\n");
    expect(text).toContain('$statics["MetadataRegistry.resolveType"]("Color")');
  });
});
