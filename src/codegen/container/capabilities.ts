import type { EmitterFlavor } from "../../config/index.js";

export interface CodeGenerationCapabilities {
  /** `new Function` is allowed, so units can be compiled at run time */
  dynamicContainers: boolean;
  supportedFlavors: readonly EmitterFlavor[];
  /** An unsupported flavor request is served with a supported one */
  flavorSubstitution: boolean;
}

const ALL_FLAVORS: readonly EmitterFlavor[] = ["field-based", "context-based"];

const compiles = (source: string): boolean => {
  try {
    const fn = new Function(source);
    return typeof fn === "function";
  } catch (error) {
    if (error instanceof EvalError || error instanceof SyntaxError) return false;
    throw error;
  }
};

/**
 * Probes the host. Code generation from strings may be disabled
 * (`--disallow-code-generation-from-strings`, CSP); field-based units also need
 * static class fields.
 */
export const detectCodeGenerationCapabilities = (): CodeGenerationCapabilities => {
  if (!compiles("return 0;")) {
    return { dynamicContainers: false, supportedFlavors: [], flavorSubstitution: false };
  }
  const supportedFlavors = compiles("return class { static bindings = {}; };")
    ? ALL_FLAVORS
    : ALL_FLAVORS.filter((flavor) => flavor === "context-based");
  return {
    dynamicContainers: true,
    supportedFlavors,
    flavorSubstitution: supportedFlavors.length < ALL_FLAVORS.length,
  };
};

export const supportsFlavor = (
  capabilities: CodeGenerationCapabilities,
  flavor: EmitterFlavor
): boolean => capabilities.supportedFlavors.includes(flavor);
