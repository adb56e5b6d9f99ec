import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { isDiagnosticError } from "../../../diagnostics/index.js";
import { SerializationContext } from "../../../runtime/context.js";
import { EmittingSerializerBuilder } from "../../emit/builder.js";
import type { EmitContext } from "../../emit/context.js";
import { Address, Color, Person, Profile } from "../../__tests__/fixtures/types.js";
import { CodeContainer } from "../code-container.js";
import { ContextBasedSerializerEmitter } from "../emitter.js";
import { SerializationMethodGeneratorManager } from "../manager.js";

const diagnosticCodeOf = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return isDiagnosticError(error) ? error.code : "not-a-diagnostic";
  }
  return undefined;
};

const counterOf = (name: string): number => Number(name.slice(name.lastIndexOf("s") + 1));

const scope = { $rt: {}, $k: [], $statics: {} };

describe("generator manager", () => {
  test("containers are named with the prefix and a counter that never repeats", () => {
    const manager = new SerializationMethodGeneratorManager();
    const fast = manager.getContainer("fast");
    const debuggable = manager.getContainer("debuggable");

    expect(fast.name).toMatch(/^serializer-codegen\.GeneratedSerializers\d+$/);
    expect(manager.getContainer("fast")).toBe(fast);
    expect(counterOf(debuggable.name)).toBeGreaterThan(counterOf(fast.name));

    const other = new SerializationMethodGeneratorManager().getContainer("fast");
    expect(counterOf(other.name)).toBeGreaterThan(counterOf(debuggable.name));
  });

  test("emitter sequences are unique within a container and survive a refresh", () => {
    const manager = new SerializationMethodGeneratorManager();
    const container = manager.getContainer("fast");
    const emitters = [Person, Address, Color].map((type) =>
      manager.createEmitter(container, type, "field-based")
    );
    expect(emitters[0]?.unitName).toBe("PersonSerializer0");

    manager.refresh();
    const replacement = manager.getContainer("fast");
    expect(replacement.name).not.toBe(container.name);
    emitters.push(
      manager.createEmitter(replacement, Profile, "context-based"),
      manager.createEmitter(replacement, Person, "field-based")
    );

    const sequences = emitters.map((emitter) => emitter.sequence);
    expect(new Set(sequences).size).toBe(5);
    expect([...sequences].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
  });

  test("other modes count their own sequences", () => {
    const manager = new SerializationMethodGeneratorManager();
    manager.createEmitter(manager.getContainer("fast"), Person, "field-based");
    expect(
      manager.createEmitter(manager.getContainer("debuggable"), Person, "field-based").sequence
    ).toBe(0);
  });

  test("an abandoned build does not block a refresh", () => {
    const manager = new SerializationMethodGeneratorManager();
    const builder = new EmittingSerializerBuilder(Person, { manager });
    const abandoned = builder.createCodeGenerationContextForSerializerCreation(
      new SerializationContext()
    );
    builder.makeStringLiteral(abandoned, "x");

    expect(manager.activeEmitters).toBe(1);
    expect(() => manager.refresh()).not.toThrow();
    const factory = builder.buildSerializerFactory(new SerializationContext());
    expect([...factory(new SerializationContext()).pack({ Name: "A", Age: 1 })]).toEqual([
      0x92, 0xa1, 0x41, 0x01,
    ]);
  });

  test("a build that started before a refresh finishes in its original container", () => {
    const manager = new SerializationMethodGeneratorManager();
    const original = manager.getContainer("fast");

    class RefreshingBuilder extends EmittingSerializerBuilder {
      override createCodeGenerationContextForSerializerCreation(
        serializationContext: SerializationContext
      ): EmitContext {
        const context = super.createCodeGenerationContextForSerializerCreation(
          serializationContext
        );
        manager.refresh();
        return context;
      }
    }

    const factory = new RefreshingBuilder(Person, { manager }).buildSerializerFactory(
      new SerializationContext()
    );
    expect([...factory(new SerializationContext()).pack({ Name: "A", Age: 1 })]).toEqual([
      0x92, 0xa1, 0x41, 0x01,
    ]);
    expect(original.unitCount).toBe(1);

    const replacement = manager.getContainer("fast");
    expect(replacement).not.toBe(original);
    expect(replacement.unitCount).toBe(0);
    expect(manager.createEmitter(replacement, Address, "field-based").sequence).toBe(1);
  });

  test("dynamic code being unavailable is a platform error", () => {
    const manager = new SerializationMethodGeneratorManager({
      capabilities: { dynamicContainers: false, supportedFlavors: [], flavorSubstitution: false },
    });
    expect(diagnosticCodeOf(() => manager.getContainer("fast"))).toBe("PL0001");
  });

  test("an unsupported flavor is substituted unless strict", () => {
    const manager = new SerializationMethodGeneratorManager({
      capabilities: {
        dynamicContainers: true,
        supportedFlavors: ["context-based"],
        flavorSubstitution: true,
      },
    });
    const container = manager.getContainer("fast");

    const emitter = manager.createEmitter(container, Person, "field-based");
    expect(emitter).toBeInstanceOf(ContextBasedSerializerEmitter);
    expect(emitter.flavor).toBe("context-based");
    expect(emitter.substituted).toBe(true);
    emitter.release();

    expect(
      diagnosticCodeOf(() =>
        manager.createEmitter(container, Person, "field-based", { strict: true })
      )
    ).toBe("PL0002");
    expect(manager.activeEmitters).toBe(0);
  });

  test("debug metadata follows the container mode", () => {
    const manager = new SerializationMethodGeneratorManager();
    expect(manager.getContainer("debuggable").debugMetadata).toEqual({
      retainsSequencePoints: true,
      ignoresSequencePoints: false,
    });
    expect(manager.getContainer("fast").debugMetadata).toEqual({
      retainsSequencePoints: false,
      ignoresSequencePoints: true,
    });
  });

  test("persists the debuggable container's units", async () => {
    const manager = new SerializationMethodGeneratorManager();
    new EmittingSerializerBuilder(Person, {
      manager,
      containerMode: "debuggable",
    }).buildSerializerFactory(new SerializationContext());

    const directory = await mkdtemp(join(tmpdir(), "serializer-codegen-"));
    const path = await manager.persist(directory);
    const name = manager.getContainer("debuggable").name;

    expect(path).toBe(join(directory, `${name}.js`));
    const text = await readFile(path, "utf8");
    expect(text.startsWith("// PersonSerializer0\n(function ($rt, $k, $statics) {\n")).toBe(
      true
    );
  });

  test("persisting into an unusable directory is an io error", async () => {
    const manager = new SerializationMethodGeneratorManager();
    const directory = await mkdtemp(join(tmpdir(), "serializer-codegen-"));
    const blocker = join(directory, "blocker");
    await writeFile(blocker, "not a directory");

    const failure = await manager.persist(join(blocker, "out")).then(
      () => undefined,
      (error: unknown) => error
    );
    expect(isDiagnosticError(failure, "IO0001")).toBe(true);
  });
});

describe("code container", () => {
  test("compiles units and keeps them in fast mode", () => {
    const container = new CodeContainer("test.Fast", "fast");
    expect(container.compileUnit("Answer1", "return 42;", scope)).toBe(42);
    expect(container.unitCount).toBe(1);
    expect(container.liveUnitCount()).toBe(1);
    expect(container.sourceText()).toBe("");
  });

  test("units see the scope they are compiled with", () => {
    const container = new CodeContainer("test.Scope", "fast");
    const compiled = container.compileUnit("Scope1", "return $k[0] + $statics.offset;", {
      $rt: {},
      $k: [40],
      $statics: { offset: 2 },
    });
    expect(compiled).toBe(42);
  });

  test("syntax errors are reported as compilation failures", () => {
    const container = new CodeContainer("test.Broken", "fast");
    expect(diagnosticCodeOf(() => container.compileUnit("Broken1", "return {", scope))).toBe(
      "CG0001"
    );
  });

  test("debuggable containers retain sources in compilation order", () => {
    const container = new CodeContainer("test.Debug", "debuggable");
    container.compileUnit("One1", "return 1;", scope);
    container.compileUnit("Two1", "return 2;", scope);
    expect(container.sourceText()).toBe(
      "// One1\n(function ($rt, $k, $statics) {\nreturn 1;\n});\n\n" +
        "// Two1\n(function ($rt, $k, $statics) {\nreturn 2;\n});\n"
    );
  });

  test("collectable containers track only object units", () => {
    const container = new CodeContainer("test.Collectable", "collectable");
    const unit = container.compileUnit("Object1", "return {};", scope);
    container.compileUnit("Number1", "return 1;", scope);
    expect(unit).toEqual({});
    expect(container.unitCount).toBe(1);
    expect(container.liveUnitCount()).toBe(1);
  });
});
