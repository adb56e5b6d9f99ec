import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { raise } from "../../diagnostics/index.js";
import type { ContainerMode, EmitterFlavor } from "../../config/index.js";
import { trace } from "../../lib/trace.js";
import type { TypeDefinition } from "../../reflection/types.js";
import {
  detectCodeGenerationCapabilities,
  supportsFlavor,
  type CodeGenerationCapabilities,
} from "./capabilities.js";
import { CONTAINER_PREFIX, CodeContainer, SequenceCounter } from "./code-container.js";
import {
  ContextBasedSerializerEmitter,
  FieldBasedSerializerEmitter,
  type EmitterInit,
  type SerializerEmitter,
} from "./emitter.js";

export interface ManagerOptions {
  /** Overrides the platform probe */
  capabilities?: CodeGenerationCapabilities;
  prefix?: string;
}

export interface CreateEmitterOptions {
  /** Fail with UnsupportedFlavor instead of substituting */
  strict?: boolean;
}

// Shared by every manager so container names are never reused in a process.
let containerCounter = 0;

/**
 * Owns one container per mode and hands out emitters into them. Emitters taken
 * before a `refresh()` keep compiling into the container they were given.
 */
export class SerializationMethodGeneratorManager {
  readonly capabilities: CodeGenerationCapabilities;
  private readonly prefix: string;
  private readonly containers = new Map<ContainerMode, CodeContainer>();
  private readonly sequences = new Map<ContainerMode, SequenceCounter>();
  private leases = 0;

  constructor(options: ManagerOptions = {}) {
    this.capabilities = options.capabilities ?? detectCodeGenerationCapabilities();
    this.prefix = options.prefix ?? CONTAINER_PREFIX;
  }

  get activeEmitters(): number {
    return this.leases;
  }

  getContainer(mode: ContainerMode): CodeContainer {
    if (!this.capabilities.dynamicContainers) {
      return raise({
        code: "PL0001",
        params: {
          kind: "dynamic-code-forbidden",
          mode,
          reason: "code generation from strings is disabled",
        },
      });
    }
    const existing = this.containers.get(mode);
    if (existing) return existing;

    let sequences = this.sequences.get(mode);
    if (!sequences) {
      sequences = new SequenceCounter();
      this.sequences.set(mode, sequences);
    }
    containerCounter += 1;
    const container = new CodeContainer(
      `${this.prefix}.GeneratedSerializers${containerCounter}`,
      mode,
      sequences
    );
    this.containers.set(mode, container);
    trace("container", "container created", { name: container.name, mode });
    return container;
  }

  /**
   * Drops the current containers. Units compiled in them stay alive through
   * their serializers; the next containers continue their sequence numbers.
   */
  refresh(): void {
    const replaced = [...this.containers.values()].map((container) => container.name);
    this.containers.clear();
    trace("container", "containers refreshed", { replaced });
  }

  createEmitter(
    container: CodeContainer,
    targetType: TypeDefinition,
    flavor: EmitterFlavor,
    options: CreateEmitterOptions = {}
  ): SerializerEmitter {
    const effective = this.effectiveFlavor(flavor, options.strict ?? false);
    this.leases += 1;
    const init: EmitterInit = {
      container,
      targetType,
      sequence: container.nextSequence(),
      requestedFlavor: flavor,
      flavor: effective,
      release: () => {
        this.leases -= 1;
      },
    };
    const emitter =
      effective === "field-based"
        ? new FieldBasedSerializerEmitter(init)
        : new ContextBasedSerializerEmitter(init);
    trace("container", "emitter allocated", {
      container: container.name,
      unit: emitter.unitName,
      flavor: effective,
      substituted: emitter.substituted,
    });
    return emitter;
  }

  /** Writes every unit of the debuggable container to `<directory>/<name>.js`. */
  async persist(directory = "."): Promise<string> {
    const container = this.getContainer("debuggable");
    const path = join(resolve(directory), `${container.name}.js`);
    try {
      await mkdir(resolve(directory), { recursive: true });
      await writeFile(path, container.sourceText(), "utf8");
    } catch (error) {
      return raise({
        code: "IO0001",
        params: {
          kind: "persist-failed",
          path,
          reason: error instanceof Error ? error.message : String(error),
        },
        subject: container.name,
        cause: error,
      });
    }
    trace("container", "container persisted", { name: container.name, path });
    return path;
  }

  private effectiveFlavor(requested: EmitterFlavor, strict: boolean): EmitterFlavor {
    if (supportsFlavor(this.capabilities, requested)) return requested;
    const substitute = this.capabilities.supportedFlavors[0];
    if (strict || !substitute) {
      return raise({
        code: "PL0002",
        params: {
          kind: "unsupported-flavor",
          requested,
          supported: this.capabilities.supportedFlavors,
        },
      });
    }
    trace("container", "flavor substituted", { requested, substitute });
    return substitute;
  }
}

export const serializationMethodGeneratorManager = new SerializationMethodGeneratorManager();
