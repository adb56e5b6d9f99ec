import { describe, expect, it } from "vitest";
import { defaultCodegenOptions, resolveCodegenOptions } from "../index.js";

describe("codegen options", () => {
  it("falls back to defaults without environment", () => {
    expect(resolveCodegenOptions({}, {})).toEqual(defaultCodegenOptions);
  });

  it("reads recognised environment values", () => {
    const options = resolveCodegenOptions(
      {},
      {
        SERIALIZER_CODEGEN_BUILDER: "expression",
        SERIALIZER_CODEGEN_FLAVOR: "Context-Based",
        SERIALIZER_CODEGEN_DUMP: "yes",
        SERIALIZER_CODEGEN_DUMP_DIR: " /tmp/dumps ",
      }
    );
    expect(options.builder).toBe("expression");
    expect(options.emitterFlavor).toBe("context-based");
    expect(options.dumpEnabled).toBe(true);
    expect(options.dumpDirectory).toBe("/tmp/dumps");
    expect(options.containerMode).toBe("fast");
  });

  it("ignores invalid environment values", () => {
    const options = resolveCodegenOptions(
      {},
      { SERIALIZER_CODEGEN_MODE: "turbo", SERIALIZER_CODEGEN_TRACE: "maybe" }
    );
    expect(options.containerMode).toBe("fast");
    expect(options.trace).toBe(false);
  });

  it("lets explicit overrides win over the environment", () => {
    const options = resolveCodegenOptions(
      { builder: "emit", assertions: false },
      { SERIALIZER_CODEGEN_BUILDER: "expression", SERIALIZER_CODEGEN_ASSERTIONS: "1" }
    );
    expect(options.builder).toBe("emit");
    expect(options.assertions).toBe(false);
  });
});
