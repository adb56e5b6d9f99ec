import { raise } from "../../diagnostics/index.js";
import { defaultValueOf } from "../../reflection/types.js";
import type { Delegate } from "../../runtime/serializer.js";
import type {
  AssignNode,
  BinaryNode,
  BlockNode,
  CallNode,
  ExpressionNode,
  LambdaNode,
  LoopNode,
} from "./nodes.js";

/** Variables visible to a running closure; blocks and lambdas nest scopes. */
class Scope {
  private readonly vars = new Map<string, unknown>();

  constructor(private readonly parent?: Scope) {}

  declare(name: string, value: unknown): void {
    this.vars.set(name, value);
  }

  private owner(name: string): Scope {
    if (this.vars.has(name)) return this;
    if (this.parent) return this.parent.owner(name);
    return raise({
      code: "CG0001",
      params: { kind: "malformed-graph", message: `variable ${name} is not in scope` },
    });
  }

  get(name: string): unknown {
    return this.owner(name).vars.get(name);
  }

  set(name: string, value: unknown): void {
    this.owner(name).vars.set(name, value);
  }
}

class BreakCompletion {
  constructor(readonly label: string) {}
}

type Compiled = (scope: Scope) => unknown;

const asObject = (value: unknown, member: string): object => {
  if ((typeof value === "object" && value !== null) || typeof value === "function") {
    return value;
  }
  return raise({ code: "MP0001", params: { kind: "null-reference", member } });
};

const asNumber = (value: unknown, context: string): number => {
  if (typeof value === "number") return value;
  return raise({
    code: "MP0001",
    params: { kind: "unexpected-token", expected: `number for ${context}`, actual: typeof value },
  });
};

const asArray = (value: unknown, context: string): unknown[] => {
  if (Array.isArray(value)) return value;
  return raise({
    code: "MP0001",
    params: { kind: "unexpected-token", expected: `array for ${context}`, actual: typeof value },
  });
};

const callMember = (target: object, member: string, args: readonly unknown[]): unknown => {
  const fn: unknown = Reflect.get(target, member);
  if (typeof fn !== "function") {
    return raise({ code: "MP0001", params: { kind: "not-callable", member } });
  }
  return Reflect.apply(fn, target, args);
};

const compileAll = (nodes: readonly ExpressionNode[]): Compiled[] => nodes.map(compileNode);

const evaluateAll = (compiled: readonly Compiled[], scope: Scope): unknown[] =>
  compiled.map((fn) => fn(scope));

const compileBlock = (node: BlockNode): Compiled => {
  const body = compileAll(node.body);
  return (scope) => {
    const inner = new Scope(scope);
    for (const variable of node.variables) {
      inner.declare(variable.name, defaultValueOf(variable.type));
    }
    let last: unknown;
    for (const statement of body) {
      last = statement(inner);
      if (last instanceof BreakCompletion) return last;
    }
    return node.type.kind === "void" ? undefined : last;
  };
};

const compileAssign = (node: AssignNode): Compiled => {
  const value = compileNode(node.value);
  const target = node.target;
  switch (target.kind) {
    case "parameter":
      return (scope) => {
        scope.set(target.name, value(scope));
      };
    case "field": {
      const instance = compileNode(target.instance);
      return (scope) => {
        Reflect.set(asObject(instance(scope), target.field.name), target.field.name, value(scope));
      };
    }
    case "property": {
      const instance = compileNode(target.instance);
      const { accessors, key, name } = target.property;
      return (scope) => {
        const owner = asObject(instance(scope), name);
        const assigned = value(scope);
        if (accessors?.set) {
          accessors.set(owner, assigned);
        } else {
          Reflect.set(owner, key, assigned);
        }
      };
    }
    case "array-index": {
      const array = compileNode(target.array);
      const index = compileNode(target.index);
      return (scope) => {
        const items = asArray(array(scope), "element assignment");
        items[asNumber(index(scope), "array index")] = value(scope);
      };
    }
  }
};

const compileCall = (node: CallNode): Compiled => {
  const args = compileAll(node.args);
  const runtime = node.method.runtime;
  if (!runtime) {
    return raise({
      code: "CG0001",
      params: {
        kind: "malformed-graph",
        message: `method ${node.method.name} has no runtime handle; private methods are invoked, not called`,
      },
    });
  }
  if (runtime.kind === "static") {
    return (scope) => runtime.invoke(...evaluateAll(args, scope));
  }
  const instanceNode = node.instance;
  if (!instanceNode) {
    return raise({
      code: "CG0001",
      params: { kind: "malformed-graph", message: `instance method ${node.method.name} needs an instance` },
    });
  }
  const instance = compileNode(instanceNode);
  return (scope) =>
    callMember(asObject(instance(scope), runtime.member), runtime.member, evaluateAll(args, scope));
};

const compileBinary = (node: BinaryNode): Compiled => {
  const left = compileNode(node.left);
  const right = compileNode(node.right);
  switch (node.operator) {
    case "equal":
      return node.looseNull
        ? (scope) => (left(scope) ?? null) === (right(scope) ?? null)
        : (scope) => left(scope) === right(scope);
    case "not-equal":
      return node.looseNull
        ? (scope) => (left(scope) ?? null) !== (right(scope) ?? null)
        : (scope) => left(scope) !== right(scope);
    case "greater-than":
      return (scope) => asNumber(left(scope), ">") > asNumber(right(scope), ">");
    case "less-than":
      return (scope) => asNumber(left(scope), "<") < asNumber(right(scope), "<");
    case "and-also":
      return (scope) => left(scope) === true && right(scope) === true;
  }
};

const compileLoop = (node: LoopNode): Compiled => {
  const body = compileNode(node.body);
  return (scope) => {
    for (;;) {
      const result = body(scope);
      if (result instanceof BreakCompletion) {
        return result.label === node.label ? undefined : result;
      }
    }
  };
};

const compileLambda = (node: LambdaNode): ((scope: Scope) => Delegate) => {
  const body = compileNode(node.body);
  return (scope) =>
    (...args) => {
      const frame = new Scope(scope);
      node.parameters.forEach((parameter, index) => frame.declare(parameter.name, args[index]));
      const result = body(frame);
      return result instanceof BreakCompletion ? undefined : result;
    };
};

const compileNode = (node: ExpressionNode): Compiled => {
  switch (node.kind) {
    case "constant": {
      const value = node.value;
      return () => value;
    }
    case "default": {
      const type = node.type;
      return () => defaultValueOf(type);
    }
    case "parameter":
      return (scope) => scope.get(node.name);
    case "block":
      return compileBlock(node);
    case "assign":
      return compileAssign(node);
    case "field": {
      const instance = compileNode(node.instance);
      const name = node.field.name;
      return (scope) => Reflect.get(asObject(instance(scope), name), name);
    }
    case "property": {
      const instance = compileNode(node.instance);
      const { accessors, key, name } = node.property;
      return (scope) => {
        const owner = asObject(instance(scope), name);
        return accessors?.get ? accessors.get(owner) : Reflect.get(owner, key);
      };
    }
    case "index-set": {
      const instance = compileNode(node.instance);
      const index = compileNode(node.index);
      const value = compileNode(node.value);
      const setter = node.property.indexerSetter ?? node.property.name;
      return (scope) => {
        callMember(asObject(instance(scope), setter), setter, [index(scope), value(scope)]);
      };
    }
    case "call":
      return compileCall(node);
    case "invoke": {
      const target = compileNode(node.target);
      const args = compileAll(node.args);
      return (scope) => {
        const fn = target(scope);
        if (typeof fn !== "function") {
          return raise({ code: "MP0001", params: { kind: "not-callable", member: "delegate" } });
        }
        return Reflect.apply(fn, undefined, evaluateAll(args, scope));
      };
    }
    case "new": {
      const args = compileAll(node.args);
      const ctor = node.ctor;
      return (scope) => ctor.create(...evaluateAll(args, scope));
    }
    case "new-array": {
      const elements = node.elements ? compileAll(node.elements) : undefined;
      const { length, elementType } = node;
      return (scope) =>
        elements
          ? evaluateAll(elements, scope)
          : Array.from({ length }, () => defaultValueOf(elementType));
    }
    case "array-index": {
      const array = compileNode(node.array);
      const index = compileNode(node.index);
      return (scope) =>
        asArray(array(scope), "element access")[asNumber(index(scope), "array index")];
    }
    case "unary": {
      const operand = compileNode(node.operand);
      return node.operator === "not"
        ? (scope) => operand(scope) !== true
        : (scope) => asNumber(operand(scope), "increment") + 1;
    }
    case "binary":
      return compileBinary(node);
    case "condition": {
      const test = compileNode(node.test);
      const then = compileNode(node.then);
      const otherwise = node.else ? compileNode(node.else) : undefined;
      return (scope) => (test(scope) === true ? then(scope) : otherwise?.(scope));
    }
    case "loop":
      return compileLoop(node);
    case "break": {
      const completion = new BreakCompletion(node.label);
      return () => completion;
    }
    case "try-finally": {
      const body = compileNode(node.body);
      const cleanup = compileNode(node.finally);
      return (scope) => {
        try {
          return body(scope);
        } finally {
          cleanup(scope);
        }
      };
    }
    case "convert":
      return compileNode(node.operand);
    case "lambda":
      return compileLambda(node);
  }
};

/** Compiles a graph to a closure and evaluates it once. */
export const evaluateExpression = (node: ExpressionNode): unknown =>
  compileNode(node)(new Scope());

export const compileLambdaExpression = (node: LambdaNode): Delegate =>
  compileLambda(node)(new Scope());
