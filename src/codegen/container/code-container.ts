import { raise } from "../../diagnostics/index.js";
import type { ContainerMode } from "../../config/index.js";
import { trace } from "../../lib/trace.js";

export const CONTAINER_PREFIX = "serializer-codegen";

export interface DebugMetadata {
  /** Units carry a `//# sourceURL=` trailer and keep their source */
  retainsSequencePoints: boolean;
  ignoresSequencePoints: boolean;
}

/** Names bound inside every compiled unit. */
export interface UnitScope {
  /** Runtime module exports the unit extends or calls */
  $rt: Readonly<Record<string, unknown>>;
  /** Constants table: handles and callbacks the unit cannot spell as literals */
  $k: readonly unknown[];
  /** Static methods by qualified name */
  $statics: Readonly<Record<string, unknown>>;
}

interface UnitSource {
  unit: string;
  source: string;
}

/** Emitter sequence numbers; shared by a container and the ones that replace it. */
export class SequenceCounter {
  private last = -1;

  next(): number {
    this.last += 1;
    return this.last;
  }
}

const debugMetadataOf = (mode: ContainerMode): DebugMetadata =>
  mode === "debuggable"
    ? { retainsSequencePoints: true, ignoresSequencePoints: false }
    : { retainsSequencePoints: false, ignoresSequencePoints: true };

/**
 * Namespace owning the code units compiled at run time. The mode fixes how
 * units are retained: `fast` keeps them, `collectable` lets the GC take them
 * once their serializers are gone, `debuggable` keeps them with their source.
 */
export class CodeContainer {
  readonly debugMetadata: DebugMetadata;
  private readonly units: unknown[] = [];
  private readonly weakUnits: WeakRef<object>[] = [];
  private readonly sources: UnitSource[] = [];

  constructor(
    readonly name: string,
    readonly mode: ContainerMode,
    private readonly sequences: SequenceCounter = new SequenceCounter()
  ) {
    this.debugMetadata = debugMetadataOf(mode);
  }

  /** Next emitter sequence number; the first is 0. */
  nextSequence(): number {
    return this.sequences.next();
  }

  compileUnit(unit: string, source: string, scope: UnitScope): unknown {
    const body = this.debugMetadata.retainsSequencePoints
      ? `${source}\n//# sourceURL=${this.name}/${unit}.js`
      : source;

    let factory: Function;
    try {
      factory = new Function("$rt", "$k", "$statics", body);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return raise({
          code: "CG0001",
          params: { kind: "unit-compilation-failed", unit, message: error.message },
          subject: this.name,
          cause: error,
        });
      }
      throw error;
    }

    const compiled: unknown = Reflect.apply(factory, undefined, [
      scope.$rt,
      scope.$k,
      scope.$statics,
    ]);
    this.retain(unit, source, compiled);
    trace("container", "unit compiled", { container: this.name, unit });
    return compiled;
  }

  get unitCount(): number {
    return this.mode === "collectable" ? this.weakUnits.length : this.units.length;
  }

  /** Units still reachable; equals `unitCount` except in collectable mode. */
  liveUnitCount(): number {
    if (this.mode !== "collectable") return this.units.length;
    return this.weakUnits.filter((ref) => ref.deref() !== undefined).length;
  }

  /** All retained sources as one script, in compilation order. */
  sourceText(): string {
    return this.sources
      .map(({ unit, source }) => `// ${unit}\n(function ($rt, $k, $statics) {\n${source}\n});\n`)
      .join("\n");
  }

  private retain(unit: string, source: string, compiled: unknown): void {
    if (this.mode === "collectable") {
      if ((typeof compiled === "object" && compiled !== null) || typeof compiled === "function") {
        this.weakUnits.push(new WeakRef(compiled));
      }
      return;
    }
    this.units.push(compiled);
    if (this.debugMetadata.retainsSequencePoints) this.sources.push({ unit, source });
  }
}
