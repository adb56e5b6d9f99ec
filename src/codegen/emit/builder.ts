import { raise } from "../../diagnostics/index.js";
import type { ContainerMode, EmitterFlavor } from "../../config/index.js";
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
  defaultValueOf,
  toIdentifier,
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
import { asDelegate, type SerializerFactory } from "../../runtime/serializer.js";
import {
  PACK_UNDERLYING_VALUE_TO,
  SerializerBuilder,
  UNPACK_FROM_UNDERLYING_VALUE,
  type BuilderOptions,
  type ParameterSpec,
} from "../builder.js";
import {
  serializationMethodGeneratorManager,
  type SerializationMethodGeneratorManager,
} from "../container/manager.js";
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
import {
  conditionalType,
  elementTypeOf,
  expectArguments,
  expectAssignable,
  expectBoolean,
  expectCall,
  expectNumeric,
} from "../verify.js";
import {
  Emit,
  asExpression,
  asStatement,
  block,
  isNullLiteral,
  isVoidConstruct,
  literalCode,
  memberAccess,
  type EmitConstruct,
} from "./construct.js";
import { EmitContext } from "./context.js";

export interface EmittingBuilderOptions extends BuilderOptions {
  manager?: SerializationMethodGeneratorManager;
  containerMode?: ContainerMode;
  flavor?: EmitterFlavor;
  /** Fail instead of substituting an unsupported flavor */
  strictFlavor?: boolean;
}

const malformed = (message: string): never =>
  raise({ code: "CG0001", params: { kind: "malformed-graph", message } });

/** Typed result of a rendered call: a statement when it returns nothing. */
const callResult = (type: TypeDefinition, code: string): EmitConstruct =>
  type.kind === "void" ? Emit.statement(type, `${code};`) : Emit.expression(type, code);

const defaultCode = (type: TypeDefinition): string =>
  literalCode(defaultValueOf(type)) ?? "null";

const bindingOf = (bindings: unknown, name: string): unknown => {
  if (typeof bindings !== "object" || bindings === null) {
    return malformed(`generated unit did not produce a bindings object`);
  }
  return Reflect.get(bindings, name);
};

/**
 * Emits each serializer as JavaScript source into a code container. The
 * terminal operations render the unit, compile it in the container and bind
 * what it returns into a factory.
 */
export class EmittingSerializerBuilder extends SerializerBuilder<EmitContext, EmitConstruct> {
  private readonly manager: SerializationMethodGeneratorManager;
  private readonly containerMode: ContainerMode;
  private readonly flavor: EmitterFlavor;
  private readonly strictFlavor: boolean;
  private readonly lookups = metadataMethods(this.metadata);

  constructor(targetType: TypeDefinition, options: EmittingBuilderOptions = {}) {
    super(targetType, options);
    this.manager = options.manager ?? serializationMethodGeneratorManager;
    this.containerMode = options.containerMode ?? "fast";
    this.flavor = options.flavor ?? "field-based";
    this.strictFlavor = options.strictFlavor ?? false;
  }

  makeNullLiteral(context: EmitContext, contextType: TypeDefinition): EmitConstruct {
    context.assertOpen("makeNullLiteral");
    return Emit.expression(contextType, "null", null);
  }

  makeBooleanLiteral(context: EmitContext, value: boolean): EmitConstruct {
    context.assertOpen("makeBooleanLiteral");
    return Emit.expression(Types.boolean, String(value), value);
  }

  makeInt32Literal(context: EmitContext, value: number): EmitConstruct {
    context.assertOpen("makeInt32Literal");
    return Emit.expression(Types.int32, String(value | 0), value | 0);
  }

  makeFloat64Literal(context: EmitContext, value: number): EmitConstruct {
    context.assertOpen("makeFloat64Literal");
    return Emit.expression(Types.float64, Object.is(value, -0) ? "-0" : String(value), value);
  }

  makeStringLiteral(context: EmitContext, value: string): EmitConstruct {
    context.assertOpen("makeStringLiteral");
    return Emit.expression(Types.string, JSON.stringify(value), value);
  }

  makeEnumLiteral(context: EmitContext, type: EnumTypeDefinition, value: number): EmitConstruct {
    context.assertOpen("makeEnumLiteral");
    return Emit.expression(type, String(value), value);
  }

  makeDefaultLiteral(context: EmitContext, type: TypeDefinition): EmitConstruct {
    context.assertOpen("makeDefaultLiteral");
    return Emit.expression(type, defaultCode(type));
  }

  emitThisReferenceExpression(context: EmitContext): EmitConstruct {
    context.assertOpen("emitThisReferenceExpression");
    return this.argumentAt(context, 0, "serializer");
  }

  declareLocal(context: EmitContext, type: TypeDefinition, name: string): EmitConstruct {
    context.assertOpen("declareLocal");
    return Emit.local(type, name);
  }

  referArgument(
    context: EmitContext,
    type: TypeDefinition,
    name: string,
    index: number
  ): EmitConstruct {
    context.assertOpen("referArgument");
    const argument = this.argumentAt(context, index, name);
    expectAssignable(`argument ${name}`, type, argument.type);
    return argument;
  }

  emitLoadVariableExpression(context: EmitContext, variable: EmitConstruct): EmitConstruct {
    context.assertOpen("emitLoadVariableExpression");
    return Emit.expression(variable.type, this.variableName(variable));
  }

  emitStoreVariableStatement(
    context: EmitContext,
    variable: EmitConstruct,
    value: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitStoreVariableStatement");
    const name = this.variableName(variable);
    expectAssignable(`store ${name}`, variable.type, value.type);
    return Emit.statement(Types.void, `${name} = ${asExpression(value)};`);
  }

  emitGetFieldExpression(
    context: EmitContext,
    instance: EmitConstruct,
    field: FieldDefinition
  ): EmitConstruct {
    context.assertOpen("emitGetFieldExpression");
    return Emit.expression(field.type, memberAccess(asExpression(instance), field.name));
  }

  emitSetField(
    context: EmitContext,
    instance: EmitConstruct,
    field: FieldDefinition,
    value: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitSetField");
    expectAssignable(`field ${field.name}`, field.type, value.type);
    return Emit.statement(
      Types.void,
      `${memberAccess(asExpression(instance), field.name)} = ${asExpression(value)};`
    );
  }

  emitGetPropertyExpression(
    context: EmitContext,
    instance: EmitConstruct,
    property: PropertyDefinition
  ): EmitConstruct {
    context.assertOpen("emitGetPropertyExpression");
    const owner = asExpression(instance);
    const getter = property.accessors?.get;
    return Emit.expression(
      property.type,
      getter
        ? `${context.emitter.constant(getter)}(${owner})`
        : memberAccess(owner, property.key)
    );
  }

  emitSetProperty(
    context: EmitContext,
    instance: EmitConstruct,
    property: PropertyDefinition,
    value: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitSetProperty");
    expectAssignable(`property ${property.name}`, property.type, value.type);
    const owner = asExpression(instance);
    const setter = property.accessors?.set;
    return Emit.statement(
      Types.void,
      setter
        ? `${context.emitter.constant(setter)}(${owner}, ${asExpression(value)});`
        : `${memberAccess(owner, property.key)} = ${asExpression(value)};`
    );
  }

  emitSetIndexedProperty(
    context: EmitContext,
    instance: EmitConstruct,
    declaringType: TypeDefinition,
    propertyName: string,
    key: EmitConstruct,
    value: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitSetIndexedProperty");
    const indexer = resolveIndexer(declaringType, propertyName, key.type, value.type);
    const setter = indexer.indexerSetter ?? indexer.name;
    return Emit.statement(
      Types.void,
      `${memberAccess(asExpression(instance), setter)}(${asExpression(key)}, ${asExpression(value)});`
    );
  }

  emitSequentialStatements(
    context: EmitContext,
    contextType: TypeDefinition,
    statements: readonly (EmitConstruct | null | undefined)[]
  ): EmitConstruct {
    context.assertOpen("emitSequentialStatements");
    const present = statements.filter(
      (statement): statement is EmitConstruct => statement !== null && statement !== undefined
    );
    const last = present[present.length - 1];
    if (this.assertions && last) {
      expectAssignable("sequence result", contextType, last.type);
    }

    const locals = new Map<string, EmitConstruct>();
    for (const statement of present) {
      if (statement.kind === "local") locals.set(statement.code, statement);
    }
    const declarations = [...locals.values()].map(
      (local) => `let ${local.code} = ${defaultCode(local.type)};`
    );
    const body = present.filter((statement) => statement.kind !== "local");

    if (contextType.kind === "void") {
      return Emit.statement(Types.void, block([...declarations, ...body.map(asStatement)]));
    }
    const result = body[body.length - 1];
    if (!result) return malformed(`sequence of ${typeName(contextType)} has no result`);
    const lines = [
      ...declarations,
      ...body.slice(0, -1).map(asStatement),
      `return ${asExpression(result)};`,
    ];
    return Emit.expression(contextType, `(() => ${block(lines)})()`);
  }

  emitConditionalExpression(
    context: EmitContext,
    condition: EmitConstruct,
    thenExpression: EmitConstruct,
    elseExpression?: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitConditionalExpression");
    expectBoolean("condition", condition.type);
    return this.renderConditional(asExpression(condition), thenExpression, elseExpression);
  }

  emitAndConditionalExpression(
    context: EmitContext,
    conditions: readonly EmitConstruct[],
    thenExpression: EmitConstruct,
    elseExpression: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitAndConditionalExpression");
    if (conditions.length === 0) return malformed("and-conditional needs a condition");
    conditions.forEach((condition) => expectBoolean("and-also operand", condition.type));
    const test = conditions.map((condition) => asExpression(condition)).join(" && ");
    return this.renderConditional(`(${test})`, thenExpression, elseExpression);
  }

  emitForEachLoop(
    context: EmitContext,
    traits: CollectionTraits,
    collection: EmitConstruct,
    emitBody: (current: EmitConstruct) => EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitForEachLoop");
    if (traits.kind === "none") {
      return malformed(`${typeName(collection.type)} is not enumerable`);
    }
    const enumeratorName = context.uniqueLocalName("enumerator");
    const currentName = context.uniqueLocalName("current");
    const acquire = this.renderCall(context, undefined, traits.getEnumerator, [collection]);
    const enumerator = Emit.expression(traits.getEnumerator.returnType, enumeratorName);
    const advance = this.renderCall(context, enumerator, traits.moveNext, []);
    const current = this.emitGetPropertyExpression(context, enumerator, traits.current);
    const body = emitBody(Emit.expression(traits.elementType, currentName));

    return Emit.statement(
      Types.void,
      block([
        `let ${enumeratorName} = ${acquire};`,
        `for (;;) ${block([
          `if (${advance}) ${block([
            `const ${currentName} = ${current.code};`,
            asStatement(body),
          ])} else ${block(["break;"])}`,
        ])}`,
      ])
    );
  }

  emitTryFinally(
    context: EmitContext,
    tryStatement: EmitConstruct,
    finallyStatement: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitTryFinally");
    const cleanup = block([asStatement(finallyStatement)]);
    if (isVoidConstruct(tryStatement)) {
      return Emit.statement(
        Types.void,
        `try ${block([asStatement(tryStatement)])} finally ${cleanup}`
      );
    }
    return Emit.expression(
      tryStatement.type,
      `(() => ${block([`try ${block([`return ${tryStatement.code};`])} finally ${cleanup}`])})()`
    );
  }

  emitNotExpression(context: EmitContext, value: EmitConstruct): EmitConstruct {
    context.assertOpen("emitNotExpression");
    expectBoolean("not", value.type);
    return Emit.expression(Types.boolean, `!(${asExpression(value)})`);
  }

  emitEqualsExpression(
    context: EmitContext,
    left: EmitConstruct,
    right: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitEqualsExpression");
    const operator = isNullLiteral(left) || isNullLiteral(right) ? "==" : "===";
    return this.renderBinary(operator, left, right);
  }

  emitNotEqualsExpression(
    context: EmitContext,
    left: EmitConstruct,
    right: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitNotEqualsExpression");
    const operator = isNullLiteral(left) || isNullLiteral(right) ? "!=" : "!==";
    return this.renderBinary(operator, left, right);
  }

  emitGreaterThanExpression(
    context: EmitContext,
    left: EmitConstruct,
    right: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitGreaterThanExpression");
    expectNumeric("greater-than left", left.type);
    expectNumeric("greater-than right", right.type);
    return this.renderBinary(">", left, right);
  }

  emitLessThanExpression(
    context: EmitContext,
    left: EmitConstruct,
    right: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitLessThanExpression");
    expectNumeric("less-than left", left.type);
    expectNumeric("less-than right", right.type);
    return this.renderBinary("<", left, right);
  }

  emitIncrement(context: EmitContext, int32Variable: EmitConstruct): EmitConstruct {
    context.assertOpen("emitIncrement");
    expectAssignable("increment", Types.int32, int32Variable.type);
    return Emit.expression(Types.int32, `(${asExpression(int32Variable)} + 1)`);
  }

  emitCreateNewObjectExpression(
    context: EmitContext,
    _variable: EmitConstruct | undefined,
    constructor: ConstructorDefinition,
    args: readonly EmitConstruct[]
  ): EmitConstruct {
    context.assertOpen("emitCreateNewObjectExpression");
    const type = constructor.declaringType;
    expectArguments(
      `new ${typeName(type)}`,
      constructor.parameterTypes,
      args.map((arg) => arg.type)
    );
    if (args.length === 0 && type.kind === "map") return Emit.expression(type, "new Map()");
    if (args.length === 0 && (type.kind === "array" || type.kind === "tuple")) {
      return Emit.expression(type, "[]");
    }
    return Emit.expression(
      type,
      `${context.emitter.constant(constructor.create)}(${this.argumentList(args)})`
    );
  }

  emitInvokeMethodExpression(
    context: EmitContext,
    instance: EmitConstruct | undefined,
    method: MethodDefinition,
    args: readonly EmitConstruct[]
  ): EmitConstruct {
    context.assertOpen("emitInvokeMethodExpression");
    return callResult(method.returnType, this.renderCall(context, instance, method, args));
  }

  emitInvokeVoidMethod(
    context: EmitContext,
    instance: EmitConstruct | undefined,
    method: MethodDefinition,
    args: readonly EmitConstruct[]
  ): EmitConstruct {
    return this.emitInvokeMethodExpression(context, instance, method, args);
  }

  emitInvokeDelegateExpression(
    context: EmitContext,
    returnType: TypeDefinition,
    delegate: EmitConstruct,
    args: readonly EmitConstruct[]
  ): EmitConstruct {
    context.assertOpen("emitInvokeDelegateExpression");
    if (delegate.type.kind === "function") {
      expectArguments(
        "delegate invocation",
        delegate.type.parameters,
        args.map((arg) => arg.type)
      );
    }
    return callResult(returnType, `(${asExpression(delegate)})(${this.argumentList(args)})`);
  }

  emitCreateNewArrayExpression(
    context: EmitContext,
    elementType: TypeDefinition,
    length: number,
    initialElements?: readonly EmitConstruct[]
  ): EmitConstruct {
    context.assertOpen("emitCreateNewArrayExpression");
    const type = Types.array(elementType);
    if (initialElements) {
      initialElements.forEach((element, index) =>
        expectAssignable(`array element ${index}`, elementType, element.type)
      );
      return Emit.expression(type, `[${this.argumentList(initialElements, ",\n")}]`);
    }
    if (length === 0) return Emit.expression(type, "[]");
    return Emit.expression(
      type,
      `Array.from({ length: ${length} }, () => ${defaultCode(elementType)})`
    );
  }

  emitGetArrayElementExpression(
    context: EmitContext,
    array: EmitConstruct,
    index: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitGetArrayElementExpression");
    expectAssignable("array index", Types.int32, index.type);
    const literal = typeof index.literal === "number" ? index.literal : undefined;
    return Emit.expression(
      elementTypeOf(array.type, literal),
      `${asExpression(array)}[${asExpression(index)}]`
    );
  }

  emitSetArrayElementStatement(
    context: EmitContext,
    array: EmitConstruct,
    index: EmitConstruct,
    value: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitSetArrayElementStatement");
    expectAssignable("array index", Types.int32, index.type);
    const literal = typeof index.literal === "number" ? index.literal : undefined;
    expectAssignable("array element", elementTypeOf(array.type, literal), value.type);
    return Emit.statement(
      Types.void,
      `${asExpression(array)}[${asExpression(index)}] = ${asExpression(value)};`
    );
  }

  emitUnboxAnyExpression(
    context: EmitContext,
    targetType: TypeDefinition,
    value: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitUnboxAnyExpression");
    return Emit.expression(targetType, asExpression(value));
  }

  emitEnumFromUnderlyingCastExpression(
    context: EmitContext,
    enumType: EnumTypeDefinition,
    underlyingValue: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitEnumFromUnderlyingCastExpression");
    expectAssignable("enum from underlying value", Types.int32, underlyingValue.type);
    return Emit.expression(enumType, asExpression(underlyingValue));
  }

  emitEnumToUnderlyingCastExpression(
    context: EmitContext,
    underlyingType: TypeDefinition,
    enumValue: EmitConstruct
  ): EmitConstruct {
    context.assertOpen("emitEnumToUnderlyingCastExpression");
    return Emit.expression(underlyingType, asExpression(enumValue));
  }

  emitTypeOfExpression(context: EmitContext, type: TypeDefinition): EmitConstruct {
    context.assertOpen("emitTypeOfExpression");
    if (!this.dumpEnabled) {
      return Emit.expression(HostTypes.typeHandle, context.emitter.constant(type));
    }
    this.registerMetadata(type);
    return this.emitInvokeMethodExpression(context, undefined, this.lookups.resolveType, [
      this.makeStringLiteral(context, typeName(type)),
    ]);
  }

  emitMethodOfExpression(
    context: EmitContext,
    owner: TypeDefinition,
    name: string,
    parameterTypes?: readonly TypeDefinition[]
  ): EmitConstruct {
    context.assertOpen("emitMethodOfExpression");
    const method = resolveMethod(owner, name, parameterTypes);
    if (!this.dumpEnabled) {
      return Emit.expression(HostTypes.methodHandle, context.emitter.constant(method));
    }
    this.registerMetadata(owner, ...(parameterTypes ?? []));
    const parameters = parameterTypes
      ? this.emitCreateNewArrayExpression(
          context,
          Types.string,
          parameterTypes.length,
          parameterTypes.map((parameter) => this.makeStringLiteral(context, typeName(parameter)))
        )
      : this.makeNullLiteral(context, Types.nullable(Types.array(Types.string)));
    return this.emitInvokeMethodExpression(context, undefined, this.lookups.resolveMethod, [
      this.makeStringLiteral(context, typeName(owner)),
      this.makeStringLiteral(context, method.name),
      parameters,
    ]);
  }

  emitFieldOfExpression(context: EmitContext, owner: TypeDefinition, name: string): EmitConstruct {
    context.assertOpen("emitFieldOfExpression");
    const field = resolveField(owner, name);
    if (!this.dumpEnabled) {
      return Emit.expression(HostTypes.fieldHandle, context.emitter.constant(field));
    }
    this.registerMetadata(owner);
    return this.emitInvokeMethodExpression(context, undefined, this.lookups.resolveField, [
      this.makeStringLiteral(context, typeName(owner)),
      this.makeStringLiteral(context, field.name),
    ]);
  }

  emitNewPrivateMethodDelegateExpression(
    context: EmitContext,
    method: MethodDefinition
  ): EmitConstruct {
    context.assertOpen("emitNewPrivateMethodDelegateExpression");
    const helper = context.getHelper(method.name);
    return Emit.expression(helper.lambda.type, toIdentifier(helper.name));
  }

  emitGetPrivateMethodDelegateExpression(
    context: EmitContext,
    method: MethodDefinition
  ): EmitConstruct {
    context.assertOpen("emitGetPrivateMethodDelegateExpression");
    context.getHelper(method.name);
    context.registerDelegate(method.name);
    return this.delegateField(context, method.name, method);
  }

  emitGetStaticDelegateExpression(context: EmitContext, method: MethodDefinition): EmitConstruct {
    context.assertOpen("emitGetStaticDelegateExpression");
    if (method.runtime?.kind !== "static") {
      return malformed(`${method.name} is not a static method`);
    }
    context.ensureStaticDelegate(method.runtime.qualifiedName, method);
    return this.delegateField(context, method.runtime.qualifiedName, method);
  }

  beginMethod(context: EmitContext, parameters: readonly ParameterSpec[]): void {
    context.assertOpen("beginMethod");
    context.pushParameters(
      parameters.map((parameter) => Emit.argument(parameter.type, parameter.name))
    );
  }

  endMethod(context: EmitContext, returnType: TypeDefinition, body: EmitConstruct): EmitConstruct {
    context.assertOpen("endMethod");
    const parameters = context.popParameters();
    const names = parameters.map((parameter) => parameter.code).join(", ");
    let bodyCode: string;
    if (returnType.kind === "void") {
      bodyCode = block([asStatement(body)]);
    } else {
      expectAssignable("method result", returnType, body.type);
      bodyCode = `(${asExpression(body)})`;
    }
    return Emit.expression(
      Types.fn(
        parameters.map((parameter) => parameter.type),
        returnType
      ),
      `(${names}) => ${bodyCode}`
    );
  }

  createSerializerConstructor(
    context: EmitContext,
    target: SerializationTarget,
    schema: PolymorphismSchema
  ): SerializerFactory {
    context.finish();
    const { emitter, pending } = context;
    const selfPacking = selfPackingOf(target);
    const entries: [string, EmitConstruct | undefined][] = [
      ["packOperations", selfPacking.packable ? undefined : pending.packOperations],
      ["packOperationTable", selfPacking.packable ? undefined : pending.packOperationTable],
      ["unpackOperations", selfPacking.unpackable ? undefined : pending.unpackOperations],
      ["unpackOperationTable", selfPacking.unpackable ? undefined : pending.unpackOperationTable],
      ["memberNames", pending.memberNames],
    ];
    const helperNames = context.helperEntries().map((helper) => toIdentifier(helper.name));
    const bindings = block(
      [
        ...entries.flatMap(([name, construct]) =>
          construct ? [`${name}: ${asExpression(construct)},`] : []
        ),
        `helpers: { ${helperNames.join(", ")} },`,
      ]
    );

    const source = emitter.renderUnit(this.helperDeclarations(context), bindings);
    const linked = emitter.link(emitter.compile(source));
    const empty = emptyOperations();
    const read = <T>(name: string, reader: (value: unknown, name: string) => T, fallback: T): T => {
      const value = bindingOf(linked.bindings, name);
      return value === undefined ? fallback : reader(value, name);
    };
    const operations = {
      packOperations: read("packOperations", readOperationList, empty.packOperations),
      packOperationTable: read(
        "packOperationTable",
        readOperationTable,
        empty.packOperationTable
      ),
      unpackOperations: read("unpackOperations", readOperationList, empty.unpackOperations),
      unpackOperationTable: read(
        "unpackOperationTable",
        readOperationTable,
        empty.unpackOperationTable
      ),
      memberNames: read("memberNames", readStringList, []),
    };

    const delegates = this.linkDelegates(context, bindingOf(linked.bindings, "helpers"));
    context.markCompiled();
    trace("emit", "serializer unit compiled", {
      unit: emitter.unitName,
      container: emitter.container.name,
      flavor: emitter.flavor,
    });

    return bindSerializerFactory({
      target,
      traits: this.traits,
      schema,
      operations,
      delegates,
      construct: linked.construct,
    });
  }

  createEnumSerializerConstructor(context: EmitContext): SerializerFactory {
    context.finish();
    const enumType = this.targetType;
    if (enumType.kind !== "enum") {
      return malformed(`${typeName(enumType)} is not an enum`);
    }
    const { emitter } = context;
    const source = emitter.renderObjectUnit(
      this.helperDeclarations(context),
      `{ ${PACK_UNDERLYING_VALUE_TO}, ${UNPACK_FROM_UNDERLYING_VALUE} }`
    );
    const helpers = emitter.compile(source);
    const packUnderlyingValueTo = asDelegate(
      bindingOf(helpers, PACK_UNDERLYING_VALUE_TO),
      PACK_UNDERLYING_VALUE_TO
    );
    const unpackFromUnderlyingValue = asDelegate(
      bindingOf(helpers, UNPACK_FROM_UNDERLYING_VALUE),
      UNPACK_FROM_UNDERLYING_VALUE
    );
    context.markCompiled();
    trace("emit", "enum serializer unit compiled", { unit: emitter.unitName });
    return bindEnumSerializerFactory(enumType, packUnderlyingValueTo, unpackFromUnderlyingValue);
  }

  createCodeGenerationContextForSerializerCreation(
    serializationContext: SerializationContext
  ): EmitContext {
    const container = this.manager.getContainer(this.containerMode);
    const emitter = this.manager.createEmitter(container, this.targetType, this.flavor, {
      strict: this.strictFlavor,
    });
    return new EmitContext(serializationContext, this.targetType, emitter);
  }

  private helperDeclarations(context: EmitContext): string[] {
    return context
      .helperEntries()
      .map((helper) => `const ${toIdentifier(helper.name)} = ${helper.lambda.code};`);
  }

  private linkDelegates(context: EmitContext, helpers: unknown): Map<string, DelegateFactory> {
    const delegates = new Map<string, DelegateFactory>();
    for (const name of context.delegateNames) {
      const helper = asDelegate(bindingOf(helpers, toIdentifier(name)), name);
      delegates.set(name, privateMethodDelegate(helper));
    }
    for (const [name, method] of context.staticDelegates) {
      delegates.set(name, staticMethodDelegate(method));
    }
    return delegates;
  }

  /** Call code for `method`, checked against its signature. */
  private renderCall(
    context: EmitContext,
    instance: EmitConstruct | undefined,
    method: MethodDefinition,
    args: readonly EmitConstruct[]
  ): string {
    expectCall(method, args.map((arg) => arg.type));
    const argumentList = this.argumentList(args);
    const runtime = method.runtime;
    if (!runtime) {
      // Private methods receive the caller's serializer and context first.
      const helper = context.getHelper(method.name);
      const callArguments = [
        this.argumentAt(context, 0, "serializer"),
        this.argumentAt(context, 1, "context"),
        ...args,
      ];
      return `${toIdentifier(helper.name)}(${this.argumentList(callArguments)})`;
    }
    if (runtime.kind === "static") {
      return `${context.emitter.staticMethod(runtime.qualifiedName, runtime.invoke)}(${argumentList})`;
    }
    if (!instance) return malformed(`instance method ${method.name} needs an instance`);
    return `${memberAccess(asExpression(instance), runtime.member)}(${argumentList})`;
  }

  private renderConditional(
    test: string,
    thenExpression: EmitConstruct,
    elseExpression: EmitConstruct | undefined
  ): EmitConstruct {
    const type = conditionalType(thenExpression.type, elseExpression?.type);
    if (type.kind === "void" || !elseExpression) {
      const otherwise = elseExpression ? ` else ${block([asStatement(elseExpression)])}` : "";
      return Emit.statement(
        Types.void,
        `if (${test}) ${block([asStatement(thenExpression)])}${otherwise}`
      );
    }
    return Emit.expression(
      type,
      `(${test} ? ${asExpression(thenExpression)} : ${asExpression(elseExpression)})`
    );
  }

  private renderBinary(
    operator: string,
    left: EmitConstruct,
    right: EmitConstruct
  ): EmitConstruct {
    return Emit.expression(
      Types.boolean,
      `(${asExpression(left)} ${operator} ${asExpression(right)})`
    );
  }

  /** `serializer.delegates.get(name)` typed as the method's delegate type. */
  private delegateField(
    context: EmitContext,
    name: string,
    method: MethodDefinition
  ): EmitConstruct {
    const table = this.emitGetPropertyExpression(
      context,
      this.argumentAt(context, 0, "serializer"),
      resolveProperty(HostTypes.serializer, "delegates")
    );
    const entry = this.renderCall(context, table, resolveMethod(HostTypes.delegateTable, "get"), [
      this.makeStringLiteral(context, name),
    ]);
    return Emit.expression(Types.fn(method.parameterTypes, method.returnType), entry);
  }

  private variableName(variable: EmitConstruct): string {
    if (variable.name === undefined) {
      return malformed(`cannot load a ${variable.kind} construct`);
    }
    return variable.name;
  }

  private argumentList(args: readonly EmitConstruct[], separator = ", "): string {
    return args.map((arg) => asExpression(arg)).join(separator);
  }

  private argumentAt(context: EmitContext, index: number, name: string): EmitConstruct {
    const argument = context.currentParameters()[index];
    if (!argument) {
      return malformed(`argument ${name} (#${index}) is not in the current method`);
    }
    return argument;
  }
}
