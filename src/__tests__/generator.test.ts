import { decode } from "@msgpack/msgpack";
import { describe, expect, test } from "vitest";
import { SerializationMethodGeneratorManager } from "../codegen/container/manager.js";
import { Color, Person } from "../codegen/__tests__/fixtures/types.js";
import { isDiagnosticError } from "../diagnostics/index.js";
import { SerializerGenerator, createSerializationContext } from "../generator.js";
import { SerializationContext } from "../runtime/context.js";

const withoutDynamicCode = () =>
  new SerializationMethodGeneratorManager({
    capabilities: { dynamicContainers: false, supportedFlavors: [], flavorSubstitution: false },
  });

describe("serializer generator", () => {
  test("uses the emitting builder by default", () => {
    const generator = new SerializerGenerator(
      { manager: new SerializationMethodGeneratorManager() },
      {}
    );
    const context = createSerializationContext({ generator });
    expect(decode(context.getSerializer(Person).pack({ Name: "Ada", Age: 36 }))).toEqual([
      "Ada",
      36,
    ]);
    expect(generator.backend).toBe("emit");
  });

  test("falls back to expression graphs when dynamic code is unavailable", () => {
    const generator = new SerializerGenerator({ manager: withoutDynamicCode() }, {});
    const context = createSerializationContext({ generator, serializationMethod: "map" });

    const serializer = context.getSerializer(Person);
    expect(generator.backend).toBe("expression");
    expect(decode(serializer.pack({ Name: "Ada", Age: 36 }))).toEqual({ Name: "Ada", Age: 36 });
  });

  test("reads the builder from the environment", () => {
    const generator = new SerializerGenerator(
      { manager: new SerializationMethodGeneratorManager() },
      { SERIALIZER_CODEGEN_BUILDER: "expression" }
    );
    expect(generator.backend).toBe("expression");
  });

  test("caches one factory per type and schema", () => {
    const generator = new SerializerGenerator(
      { manager: new SerializationMethodGeneratorManager() },
      {}
    );
    expect(generator.factoryFor(Color)).toBe(generator.factoryFor(Color));
  });

  test("serializers from one factory are bound to their own context", () => {
    const generator = new SerializerGenerator({ builder: "expression" }, {});
    const first = new SerializationContext();
    const second = new SerializationContext();
    expect(generator.createSerializer(Color, first).context).toBe(first);
    expect(generator.createSerializer(Color, second).context).toBe(second);
  });

  test("a strict flavor request is not substituted", () => {
    const generator = new SerializerGenerator(
      {
        manager: new SerializationMethodGeneratorManager({
          capabilities: {
            dynamicContainers: true,
            supportedFlavors: ["context-based"],
            flavorSubstitution: true,
          },
        }),
        emitterFlavor: "field-based",
        strictFlavor: true,
      },
      {}
    );
    let failure: unknown;
    try {
      generator.factoryFor(Person);
    } catch (error) {
      failure = error;
    }
    expect(isDiagnosticError(failure, "PL0002")).toBe(true);
  });
});
