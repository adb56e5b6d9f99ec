import { raise } from "../diagnostics/index.js";
import type { MethodDefinition, TypeDefinition } from "../reflection/types.js";
import type { SerializationContext } from "../runtime/context.js";

export type CodeGenerationState = "open" | "finished" | "compiled";

export interface PrivateMethod<TConstruct> {
  name: string;
  definition: MethodDefinition;
  isStatic: boolean;
  /** Lambda over (serializer, context, ...declared parameters) */
  lambda: TConstruct;
}

/** Operation sub-graphs built while open, compiled by the terminal step. */
export interface PendingOperations<TConstruct> {
  packOperations?: TConstruct;
  packOperationTable?: TConstruct;
  unpackOperations?: TConstruct;
  unpackOperationTable?: TConstruct;
  memberNames?: TConstruct;
}

export class CodeGenerationContext<TConstruct> {
  private currentState: CodeGenerationState = "open";
  private readonly parameterStack: (readonly TConstruct[])[] = [];
  private readonly localNames = new Map<string, number>();
  private readonly helpers = new Map<string, PrivateMethod<TConstruct>>();
  private readonly helperNames = new Map<string, string>();
  /** Private methods exposed through the serializer's delegate table */
  readonly delegateNames = new Set<string>();
  /** Static methods exposed through the delegate table, by qualified name */
  readonly staticDelegates = new Map<string, MethodDefinition>();
  readonly pending: PendingOperations<TConstruct> = {};

  constructor(
    readonly serializationContext: SerializationContext,
    readonly targetType: TypeDefinition
  ) {}

  get state(): CodeGenerationState {
    return this.currentState;
  }

  assertOpen(operation: string): void {
    if (this.currentState !== "open") {
      raise({
        code: "CG0002",
        params: { kind: "context-closed", operation, state: this.currentState },
      });
    }
  }

  finish(): void {
    this.assertOpen("finish");
    this.currentState = "finished";
  }

  markCompiled(): void {
    if (this.currentState !== "finished") {
      raise({
        code: "CG0002",
        params: { kind: "context-closed", operation: "compile", state: this.currentState },
      });
    }
    this.currentState = "compiled";
  }

  /** Releases resources a backend holds for the build; called once either way. */
  dispose(): void {}

  pushParameters(parameters: readonly TConstruct[]): void {
    this.parameterStack.push(parameters);
  }

  popParameters(): readonly TConstruct[] {
    const parameters = this.parameterStack.pop();
    if (!parameters) {
      return raise({
        code: "CG0001",
        params: { kind: "malformed-graph", message: "endMethod without beginMethod" },
      });
    }
    return parameters;
  }

  currentParameters(): readonly TConstruct[] {
    const parameters = this.parameterStack[this.parameterStack.length - 1];
    if (!parameters) {
      return raise({
        code: "CG0001",
        params: {
          kind: "malformed-graph",
          message: "method arguments referenced outside of a method body",
        },
      });
    }
    return parameters;
  }

  /** `name`, then `name1`, `name2`... for repeated requests. */
  uniqueLocalName(name: string): string {
    const seen = this.localNames.get(name);
    this.localNames.set(name, (seen ?? 0) + 1);
    return seen === undefined ? name : `${name}${seen}`;
  }

  defineHelper(helper: PrivateMethod<TConstruct>): void {
    this.helpers.set(helper.name, helper);
  }

  /** Name of the helper registered under `key`, if any. */
  helperNameFor(key: string): string | undefined {
    return this.helperNames.get(key);
  }

  /** Unique helper name derived from `name`, registered under `key`. */
  reserveHelperName(key: string, name: string): string {
    const unique = this.uniqueLocalName(name);
    this.helperNames.set(key, unique);
    return unique;
  }

  getHelper(name: string): PrivateMethod<TConstruct> {
    const helper = this.helpers.get(name);
    if (!helper) {
      return raise({ code: "RF0001", params: { kind: "unresolved-helper", name } });
    }
    return helper;
  }

  helperEntries(): PrivateMethod<TConstruct>[] {
    return [...this.helpers.values()];
  }

  registerDelegate(name: string): void {
    this.delegateNames.add(name);
  }

  ensureStaticDelegate(qualifiedName: string, method: MethodDefinition): void {
    this.staticDelegates.set(qualifiedName, method);
  }
}
