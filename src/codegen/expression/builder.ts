import { raise } from "../../diagnostics/index.js";
import { trace } from "../../lib/trace.js";
import {
  resolveField,
  resolveIndexer,
  resolveMethod,
  resolveProperty,
} from "../../reflection/members.js";
import type {
  CollectionTraits,
  PolymorphismSchema,
  SerializationTarget,
} from "../../reflection/target.js";
import {
  Types,
  typeName,
  type ConstructorDefinition,
  type EnumTypeDefinition,
  type FieldDefinition,
  type MethodDefinition,
  type PropertyDefinition,
  type TypeDefinition,
} from "../../reflection/types.js";
import type { DelegateFactory } from "../../runtime/callback-serializer.js";
import type { SerializationContext } from "../../runtime/context.js";
import { HostTypes } from "../../runtime/host-types.js";
import { metadataMethods } from "../../runtime/metadata.js";
import type { SerializerFactory } from "../../runtime/serializer.js";
import {
  PACK_UNDERLYING_VALUE_TO,
  SerializerBuilder,
  UNPACK_FROM_UNDERLYING_VALUE,
  type ParameterSpec,
} from "../builder.js";
import {
  bindEnumSerializerFactory,
  bindSerializerFactory,
  emptyOperations,
  privateMethodDelegate,
  readOperationList,
  readOperationTable,
  readStringList,
  selfPackingOf,
  staticMethodDelegate,
} from "../factory.js";
import { expectAssignable } from "../verify.js";
import { compileLambdaExpression, evaluateExpression } from "./compiler.js";
import { ExpressionContext } from "./context.js";
import { Expr, type ConstantNode, type ExpressionNode, type LambdaNode, type ParameterNode } from "./nodes.js";

const isParameter = (node: ExpressionNode): node is ParameterNode =>
  node.kind === "parameter";

const asLambda = (node: ExpressionNode, name: string): LambdaNode => {
  if (node.kind !== "lambda") {
    return raise({
      code: "CG0001",
      params: { kind: "malformed-graph", message: `${name} is not a lambda` },
    });
  }
  return node;
};

/**
 * Builds serializers as expression graphs compiled to closures in process.
 * Needs no dynamic code container, so it works where `new Function` is
 * forbidden.
 */
export class ExpressionSerializerBuilder extends SerializerBuilder<
  ExpressionContext,
  ExpressionNode
> {
  private readonly lookups = metadataMethods(this.metadata);

  makeNullLiteral(context: ExpressionContext, contextType: TypeDefinition): ExpressionNode {
    context.assertOpen("makeNullLiteral");
    return Expr.constant(contextType, null, null);
  }

  makeBooleanLiteral(context: ExpressionContext, value: boolean): ExpressionNode {
    context.assertOpen("makeBooleanLiteral");
    return Expr.constant(Types.boolean, value, value);
  }

  makeInt32Literal(context: ExpressionContext, value: number): ExpressionNode {
    context.assertOpen("makeInt32Literal");
    return Expr.constant(Types.int32, value | 0, value | 0);
  }

  makeFloat64Literal(context: ExpressionContext, value: number): ConstantNode {
    context.assertOpen("makeFloat64Literal");
    return Expr.constant(Types.float64, value, value);
  }

  makeStringLiteral(context: ExpressionContext, value: string): ExpressionNode {
    context.assertOpen("makeStringLiteral");
    return Expr.constant(Types.string, value, value);
  }

  makeEnumLiteral(
    context: ExpressionContext,
    type: EnumTypeDefinition,
    value: number
  ): ExpressionNode {
    context.assertOpen("makeEnumLiteral");
    return Expr.constant(type, value, value);
  }

  makeDefaultLiteral(context: ExpressionContext, type: TypeDefinition): ExpressionNode {
    context.assertOpen("makeDefaultLiteral");
    return Expr.default(type);
  }

  emitThisReferenceExpression(context: ExpressionContext): ExpressionNode {
    context.assertOpen("emitThisReferenceExpression");
    return this.argumentAt(context, 0, "serializer");
  }

  declareLocal(context: ExpressionContext, type: TypeDefinition, name: string): ExpressionNode {
    context.assertOpen("declareLocal");
    return Expr.parameter(type, name, true);
  }

  referArgument(
    context: ExpressionContext,
    type: TypeDefinition,
    name: string,
    index: number
  ): ExpressionNode {
    context.assertOpen("referArgument");
    const argument = this.argumentAt(context, index, name);
    expectAssignable(`argument ${name}`, type, argument.type);
    return argument;
  }

  emitLoadVariableExpression(context: ExpressionContext, variable: ExpressionNode): ExpressionNode {
    context.assertOpen("emitLoadVariableExpression");
    return Expr.load(variable);
  }

  emitStoreVariableStatement(
    context: ExpressionContext,
    variable: ExpressionNode,
    value: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitStoreVariableStatement");
    return Expr.assign(variable, value);
  }

  emitGetFieldExpression(
    context: ExpressionContext,
    instance: ExpressionNode,
    field: FieldDefinition
  ): ExpressionNode {
    context.assertOpen("emitGetFieldExpression");
    return Expr.field(instance, field);
  }

  emitSetField(
    context: ExpressionContext,
    instance: ExpressionNode,
    field: FieldDefinition,
    value: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitSetField");
    return Expr.assign(Expr.field(instance, field), value);
  }

  emitGetPropertyExpression(
    context: ExpressionContext,
    instance: ExpressionNode,
    property: PropertyDefinition
  ): ExpressionNode {
    context.assertOpen("emitGetPropertyExpression");
    return Expr.property(instance, property);
  }

  emitSetProperty(
    context: ExpressionContext,
    instance: ExpressionNode,
    property: PropertyDefinition,
    value: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitSetProperty");
    return Expr.assign(Expr.property(instance, property), value);
  }

  emitSetIndexedProperty(
    context: ExpressionContext,
    instance: ExpressionNode,
    declaringType: TypeDefinition,
    propertyName: string,
    key: ExpressionNode,
    value: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitSetIndexedProperty");
    const indexer = resolveIndexer(declaringType, propertyName, key.type, value.type);
    return Expr.indexSet(instance, indexer, key, value);
  }

  emitSequentialStatements(
    context: ExpressionContext,
    contextType: TypeDefinition,
    statements: readonly (ExpressionNode | null | undefined)[]
  ): ExpressionNode {
    context.assertOpen("emitSequentialStatements");
    const present = statements.filter(
      (statement): statement is ExpressionNode => statement !== null && statement !== undefined
    );
    const last = present[present.length - 1];
    if (this.assertions && last) {
      expectAssignable("sequence result", contextType, last.type);
    }

    // Bare locals declare the block's variables; loaded ones stay statements.
    const variables = new Map<string, ParameterNode>();
    for (const statement of present) {
      if (isParameter(statement) && statement.isLocal && !statement.significant) {
        variables.set(statement.name, statement);
      }
    }
    const body = present.filter(
      (statement) => !isParameter(statement) || statement.significant
    );
    return Expr.block(contextType, [...variables.values()], body);
  }

  emitConditionalExpression(
    context: ExpressionContext,
    condition: ExpressionNode,
    thenExpression: ExpressionNode,
    elseExpression?: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitConditionalExpression");
    return Expr.condition(condition, thenExpression, elseExpression);
  }

  emitAndConditionalExpression(
    context: ExpressionContext,
    conditions: readonly ExpressionNode[],
    thenExpression: ExpressionNode,
    elseExpression: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitAndConditionalExpression");
    const [first, ...rest] = conditions;
    if (!first) {
      return raise({
        code: "CG0001",
        params: { kind: "malformed-graph", message: "and-conditional needs a condition" },
      });
    }
    const test = rest.reduce((left, right) => Expr.binary("and-also", left, right), first);
    return Expr.condition(test, thenExpression, elseExpression);
  }

  emitForEachLoop(
    context: ExpressionContext,
    traits: CollectionTraits,
    collection: ExpressionNode,
    emitBody: (current: ExpressionNode) => ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitForEachLoop");
    if (traits.kind === "none") {
      return raise({
        code: "CG0001",
        params: {
          kind: "malformed-graph",
          message: `${typeName(collection.type)} is not enumerable`,
        },
      });
    }
    const enumerator = Expr.parameter(
      traits.getEnumerator.returnType,
      context.uniqueLocalName("enumerator"),
      true
    );
    const current = Expr.parameter(traits.elementType, context.uniqueLocalName("current"), true);
    const label = context.nextLabel();

    return Expr.block(
      Types.void,
      [enumerator, current],
      [
        Expr.assign(enumerator, Expr.call(undefined, traits.getEnumerator, [collection])),
        Expr.loop(
          Expr.condition(
            Expr.call(Expr.load(enumerator), traits.moveNext, []),
            Expr.block(
              Types.void,
              [],
              [
                Expr.assign(current, Expr.property(Expr.load(enumerator), traits.current)),
                emitBody(Expr.load(current)),
              ]
            ),
            Expr.break(label)
          ),
          label
        ),
      ]
    );
  }

  emitTryFinally(
    context: ExpressionContext,
    tryStatement: ExpressionNode,
    finallyStatement: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitTryFinally");
    return Expr.tryFinally(tryStatement, finallyStatement);
  }

  emitNotExpression(context: ExpressionContext, value: ExpressionNode): ExpressionNode {
    context.assertOpen("emitNotExpression");
    return Expr.not(value);
  }

  emitEqualsExpression(
    context: ExpressionContext,
    left: ExpressionNode,
    right: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitEqualsExpression");
    return Expr.binary("equal", left, right);
  }

  emitNotEqualsExpression(
    context: ExpressionContext,
    left: ExpressionNode,
    right: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitNotEqualsExpression");
    return Expr.binary("not-equal", left, right);
  }

  emitGreaterThanExpression(
    context: ExpressionContext,
    left: ExpressionNode,
    right: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitGreaterThanExpression");
    return Expr.binary("greater-than", left, right);
  }

  emitLessThanExpression(
    context: ExpressionContext,
    left: ExpressionNode,
    right: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitLessThanExpression");
    return Expr.binary("less-than", left, right);
  }

  emitIncrement(context: ExpressionContext, int32Variable: ExpressionNode): ExpressionNode {
    context.assertOpen("emitIncrement");
    return Expr.increment(int32Variable);
  }

  emitCreateNewObjectExpression(
    context: ExpressionContext,
    _variable: ExpressionNode | undefined,
    constructor: ConstructorDefinition,
    args: readonly ExpressionNode[]
  ): ExpressionNode {
    context.assertOpen("emitCreateNewObjectExpression");
    return Expr.create(constructor, args);
  }

  emitInvokeMethodExpression(
    context: ExpressionContext,
    instance: ExpressionNode | undefined,
    method: MethodDefinition,
    args: readonly ExpressionNode[]
  ): ExpressionNode {
    context.assertOpen("emitInvokeMethodExpression");
    if (!method.runtime) {
      // Private methods receive the caller's serializer and context first.
      const helper = context.getHelper(method.name);
      return Expr.invoke(method.returnType, helper.lambda, [
        this.argumentAt(context, 0, "serializer"),
        this.argumentAt(context, 1, "context"),
        ...args,
      ]);
    }
    return Expr.call(method.runtime.kind === "static" ? undefined : instance, method, args);
  }

  emitInvokeVoidMethod(
    context: ExpressionContext,
    instance: ExpressionNode | undefined,
    method: MethodDefinition,
    args: readonly ExpressionNode[]
  ): ExpressionNode {
    return this.emitInvokeMethodExpression(context, instance, method, args);
  }

  emitInvokeDelegateExpression(
    context: ExpressionContext,
    returnType: TypeDefinition,
    delegate: ExpressionNode,
    args: readonly ExpressionNode[]
  ): ExpressionNode {
    context.assertOpen("emitInvokeDelegateExpression");
    return Expr.invoke(returnType, delegate, args);
  }

  emitCreateNewArrayExpression(
    context: ExpressionContext,
    elementType: TypeDefinition,
    length: number,
    initialElements?: readonly ExpressionNode[]
  ): ExpressionNode {
    context.assertOpen("emitCreateNewArrayExpression");
    return Expr.newArray(elementType, length, initialElements);
  }

  emitGetArrayElementExpression(
    context: ExpressionContext,
    array: ExpressionNode,
    index: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitGetArrayElementExpression");
    return Expr.arrayIndex(array, index);
  }

  emitSetArrayElementStatement(
    context: ExpressionContext,
    array: ExpressionNode,
    index: ExpressionNode,
    value: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitSetArrayElementStatement");
    return Expr.assign(Expr.arrayIndex(array, index), value);
  }

  emitUnboxAnyExpression(
    context: ExpressionContext,
    targetType: TypeDefinition,
    value: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitUnboxAnyExpression");
    return Expr.convert(value, targetType);
  }

  emitEnumFromUnderlyingCastExpression(
    context: ExpressionContext,
    enumType: EnumTypeDefinition,
    underlyingValue: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitEnumFromUnderlyingCastExpression");
    expectAssignable("enum from underlying value", Types.int32, underlyingValue.type);
    return Expr.convert(underlyingValue, enumType);
  }

  emitEnumToUnderlyingCastExpression(
    context: ExpressionContext,
    underlyingType: TypeDefinition,
    enumValue: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("emitEnumToUnderlyingCastExpression");
    return Expr.convert(enumValue, underlyingType);
  }

  emitTypeOfExpression(context: ExpressionContext, type: TypeDefinition): ExpressionNode {
    context.assertOpen("emitTypeOfExpression");
    if (!this.dumpEnabled) return Expr.constant(HostTypes.typeHandle, type);
    this.registerMetadata(type);
    return Expr.call(undefined, this.lookups.resolveType, [this.nameLiteral(typeName(type))]);
  }

  emitMethodOfExpression(
    context: ExpressionContext,
    owner: TypeDefinition,
    name: string,
    parameterTypes?: readonly TypeDefinition[]
  ): ExpressionNode {
    context.assertOpen("emitMethodOfExpression");
    const method = resolveMethod(owner, name, parameterTypes);
    if (!this.dumpEnabled) return Expr.constant(HostTypes.methodHandle, method);

    this.registerMetadata(owner, ...(parameterTypes ?? []));
    const parameters = parameterTypes
      ? Expr.newArray(
          Types.string,
          parameterTypes.length,
          parameterTypes.map((parameter) => this.nameLiteral(typeName(parameter)))
        )
      : Expr.constant(Types.nullable(Types.array(Types.string)), null, null);
    return Expr.call(undefined, this.lookups.resolveMethod, [
      this.nameLiteral(typeName(owner)),
      this.nameLiteral(method.name),
      parameters,
    ]);
  }

  emitFieldOfExpression(
    context: ExpressionContext,
    owner: TypeDefinition,
    name: string
  ): ExpressionNode {
    context.assertOpen("emitFieldOfExpression");
    const field = resolveField(owner, name);
    if (!this.dumpEnabled) return Expr.constant(HostTypes.fieldHandle, field);

    this.registerMetadata(owner);
    return Expr.call(undefined, this.lookups.resolveField, [
      this.nameLiteral(typeName(owner)),
      this.nameLiteral(field.name),
    ]);
  }

  emitNewPrivateMethodDelegateExpression(
    context: ExpressionContext,
    method: MethodDefinition
  ): ExpressionNode {
    context.assertOpen("emitNewPrivateMethodDelegateExpression");
    return context.getHelper(method.name).lambda;
  }

  emitGetPrivateMethodDelegateExpression(
    context: ExpressionContext,
    method: MethodDefinition
  ): ExpressionNode {
    context.assertOpen("emitGetPrivateMethodDelegateExpression");
    context.getHelper(method.name);
    context.registerDelegate(method.name);
    return this.delegateField(context, method.name, method);
  }

  emitGetStaticDelegateExpression(
    context: ExpressionContext,
    method: MethodDefinition
  ): ExpressionNode {
    context.assertOpen("emitGetStaticDelegateExpression");
    if (method.runtime?.kind !== "static") {
      return raise({
        code: "CG0001",
        params: { kind: "malformed-graph", message: `${method.name} is not a static method` },
      });
    }
    context.ensureStaticDelegate(method.runtime.qualifiedName, method);
    return this.delegateField(context, method.runtime.qualifiedName, method);
  }

  beginMethod(context: ExpressionContext, parameters: readonly ParameterSpec[]): void {
    context.assertOpen("beginMethod");
    context.pushParameters(
      parameters.map((parameter) => Expr.parameter(parameter.type, parameter.name))
    );
  }

  endMethod(
    context: ExpressionContext,
    returnType: TypeDefinition,
    body: ExpressionNode
  ): ExpressionNode {
    context.assertOpen("endMethod");
    const parameters = context.popParameters().filter(isParameter);
    return Expr.lambda(parameters, returnType, body);
  }

  createSerializerConstructor(
    context: ExpressionContext,
    target: SerializationTarget,
    schema: PolymorphismSchema
  ): SerializerFactory {
    context.finish();
    const pending = context.pending;
    const selfPacking = selfPackingOf(target);
    const empty = emptyOperations();
    const evaluate = <T>(
      node: ExpressionNode | undefined,
      skip: boolean,
      read: (value: unknown, name: string) => T,
      fallback: T,
      name: string
    ): T => (node && !skip ? read(evaluateExpression(node), name) : fallback);

    const operations = {
      packOperations: evaluate(
        pending.packOperations,
        selfPacking.packable,
        readOperationList,
        empty.packOperations,
        "packOperations"
      ),
      packOperationTable: evaluate(
        pending.packOperationTable,
        selfPacking.packable,
        readOperationTable,
        empty.packOperationTable,
        "packOperationTable"
      ),
      unpackOperations: evaluate(
        pending.unpackOperations,
        selfPacking.unpackable,
        readOperationList,
        empty.unpackOperations,
        "unpackOperations"
      ),
      unpackOperationTable: evaluate(
        pending.unpackOperationTable,
        selfPacking.unpackable,
        readOperationTable,
        empty.unpackOperationTable,
        "unpackOperationTable"
      ),
      memberNames: evaluate(pending.memberNames, false, readStringList, [], "memberNames"),
    };

    const delegates = this.compileDelegates(context);
    context.markCompiled();
    trace("expression", "serializer compiled", {
      type: typeName(target.type),
      helpers: context.helperEntries().length,
    });

    return bindSerializerFactory({
      target,
      traits: this.traits,
      schema,
      operations,
      delegates,
    });
  }

  createEnumSerializerConstructor(context: ExpressionContext): SerializerFactory {
    context.finish();
    const enumType = this.targetType;
    if (enumType.kind !== "enum") {
      return raise({
        code: "CG0001",
        params: { kind: "malformed-graph", message: `${typeName(enumType)} is not an enum` },
      });
    }
    const packUnderlyingValueTo = compileLambdaExpression(
      asLambda(context.getHelper(PACK_UNDERLYING_VALUE_TO).lambda, PACK_UNDERLYING_VALUE_TO)
    );
    const unpackFromUnderlyingValue = compileLambdaExpression(
      asLambda(
        context.getHelper(UNPACK_FROM_UNDERLYING_VALUE).lambda,
        UNPACK_FROM_UNDERLYING_VALUE
      )
    );
    context.markCompiled();
    return bindEnumSerializerFactory(enumType, packUnderlyingValueTo, unpackFromUnderlyingValue);
  }

  createCodeGenerationContextForSerializerCreation(
    serializationContext: SerializationContext
  ): ExpressionContext {
    return new ExpressionContext(serializationContext, this.targetType);
  }

  private compileDelegates(context: ExpressionContext): Map<string, DelegateFactory> {
    const delegates = new Map<string, DelegateFactory>();
    for (const name of context.delegateNames) {
      const lambda = asLambda(context.getHelper(name).lambda, name);
      delegates.set(name, privateMethodDelegate(compileLambdaExpression(lambda)));
    }
    for (const [name, method] of context.staticDelegates) {
      delegates.set(name, staticMethodDelegate(method));
    }
    return delegates;
  }

  /** `serializer.delegates.get(name)` typed as the method's delegate type. */
  private delegateField(
    context: ExpressionContext,
    name: string,
    method: MethodDefinition
  ): ExpressionNode {
    const table = Expr.property(
      this.argumentAt(context, 0, "serializer"),
      resolveProperty(HostTypes.serializer, "delegates")
    );
    const entry = Expr.call(table, resolveMethod(HostTypes.delegateTable, "get"), [
      this.nameLiteral(name),
    ]);
    return Expr.convert(entry, Types.fn(method.parameterTypes, method.returnType));
  }

  private nameLiteral(value: string): ExpressionNode {
    return Expr.constant(Types.string, value, value);
  }

  private argumentAt(context: ExpressionContext, index: number, name: string): ExpressionNode {
    const argument = context.currentParameters()[index];
    if (!argument) {
      return raise({
        code: "CG0001",
        params: {
          kind: "malformed-graph",
          message: `argument ${name} (#${index}) is not in the current method`,
        },
      });
    }
    return argument;
  }
}
