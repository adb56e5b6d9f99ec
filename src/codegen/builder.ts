import { raise } from "../diagnostics/index.js";
import { defaultConstructorOf, resolveMethod } from "../reflection/members.js";
import {
  PolymorphismSchema,
  collectionTraitsOf,
  createSerializationTarget,
  type CollectionTraits,
  type SerializationTarget,
  type SerializingMember,
} from "../reflection/target.js";
import {
  Types,
  toIdentifier,
  typeName,
  type ArrayTypeDefinition,
  type ConstructorDefinition,
  type EnumTypeDefinition,
  type FieldDefinition,
  type MapTypeDefinition,
  type MethodDefinition,
  type PrimitiveName,
  type PropertyDefinition,
  type TypeDefinition,
} from "../reflection/types.js";
import type { SerializationContext } from "../runtime/context.js";
import { HostTypes } from "../runtime/host-types.js";
import { metadataRegistry, type MetadataRegistry } from "../runtime/metadata.js";
import type { SerializerFactory } from "../runtime/serializer.js";
import { trace } from "../lib/trace.js";
import type { CodeGenerationContext } from "./context.js";

export type LiteralValue = null | boolean | number | string;

/** A code fragment produced by a builder, typed by what it evaluates to. */
export interface Construct {
  readonly type: TypeDefinition;
  /** Set on literal constructs */
  readonly literal?: LiteralValue;
}

export interface ParameterSpec {
  name: string;
  type: TypeDefinition;
}

export interface BuilderOptions {
  /** Check statement sequences against their declared result type */
  assertions?: boolean;
  /** Refer to metadata by stable name instead of embedding handles */
  dumpEnabled?: boolean;
  metadata?: MetadataRegistry;
}

type CollectionType = ArrayTypeDefinition | MapTypeDefinition;

const packerMethods: Record<PrimitiveName, string> = {
  boolean: "packBoolean",
  int32: "packInteger",
  float64: "packFloat",
  string: "packString",
  binary: "packBinary",
  any: "packAny",
};

const unpackerMethods: Record<PrimitiveName, string> = {
  boolean: "readBoolean",
  int32: "readInteger",
  float64: "readFloat",
  string: "readString",
  binary: "readBinary",
  any: "readAny",
};

const capitalize = (value: string): string =>
  value.length === 0 ? value : `${value[0]?.toUpperCase()}${value.slice(1)}`;

/** Readable identifier fragment naming a member type, e.g. `StringToInt32Map`. */
const typeSuffix = (type: TypeDefinition): string => {
  switch (type.kind) {
    case "primitive":
      return capitalize(type.name);
    case "nullable":
      return `Nullable${typeSuffix(type.inner)}`;
    case "array":
      return `${typeSuffix(type.element)}Array`;
    case "map":
      return `${typeSuffix(type.key)}To${typeSuffix(type.value)}Map`;
    case "tuple":
      return `Tuple${type.elements.map(typeSuffix).join("")}`;
    case "enum":
    case "object":
      return capitalize(toIdentifier(type.name));
    default:
      return capitalize(type.kind);
  }
};

const serializerParameter: ParameterSpec = {
  name: "serializer",
  type: HostTypes.serializer,
};
const contextParameter: ParameterSpec = {
  name: "context",
  type: HostTypes.serializationContext,
};

export const PACK_UNDERLYING_VALUE_TO = "packUnderlyingValueTo";
export const UNPACK_FROM_UNDERLYING_VALUE = "unpackFromUnderlyingValue";

/**
 * Contract shared by the code-generating serializer builders, plus the
 * policy that drives it to produce per-member pack and unpack operations.
 *
 * Every generated method takes `(serializer, context, ...)`; private helper
 * methods receive the caller's first two arguments implicitly.
 */
export abstract class SerializerBuilder<
  TContext extends CodeGenerationContext<TConstruct>,
  TConstruct extends Construct,
> {
  readonly traits: CollectionTraits;
  protected readonly assertions: boolean;
  protected readonly dumpEnabled: boolean;
  protected readonly metadata: MetadataRegistry;

  constructor(
    readonly targetType: TypeDefinition,
    options: BuilderOptions = {}
  ) {
    this.traits = collectionTraitsOf(targetType);
    this.assertions = options.assertions ?? true;
    this.dumpEnabled = options.dumpEnabled ?? false;
    this.metadata = options.metadata ?? metadataRegistry;
  }

  // Literals

  abstract makeNullLiteral(context: TContext, contextType: TypeDefinition): TConstruct;
  abstract makeBooleanLiteral(context: TContext, value: boolean): TConstruct;
  abstract makeInt32Literal(context: TContext, value: number): TConstruct;
  abstract makeFloat64Literal(context: TContext, value: number): TConstruct;
  abstract makeStringLiteral(context: TContext, value: string): TConstruct;
  abstract makeEnumLiteral(
    context: TContext,
    type: EnumTypeDefinition,
    value: number
  ): TConstruct;
  abstract makeDefaultLiteral(context: TContext, type: TypeDefinition): TConstruct;

  // References

  abstract emitThisReferenceExpression(context: TContext): TConstruct;
  abstract declareLocal(context: TContext, type: TypeDefinition, name: string): TConstruct;
  abstract referArgument(
    context: TContext,
    type: TypeDefinition,
    name: string,
    index: number
  ): TConstruct;
  abstract emitLoadVariableExpression(context: TContext, variable: TConstruct): TConstruct;
  abstract emitStoreVariableStatement(
    context: TContext,
    variable: TConstruct,
    value: TConstruct
  ): TConstruct;

  // Member access

  abstract emitGetFieldExpression(
    context: TContext,
    instance: TConstruct,
    field: FieldDefinition
  ): TConstruct;
  abstract emitSetField(
    context: TContext,
    instance: TConstruct,
    field: FieldDefinition,
    value: TConstruct
  ): TConstruct;
  abstract emitGetPropertyExpression(
    context: TContext,
    instance: TConstruct,
    property: PropertyDefinition
  ): TConstruct;
  abstract emitSetProperty(
    context: TContext,
    instance: TConstruct,
    property: PropertyDefinition,
    value: TConstruct
  ): TConstruct;
  abstract emitSetIndexedProperty(
    context: TContext,
    instance: TConstruct,
    declaringType: TypeDefinition,
    propertyName: string,
    key: TConstruct,
    value: TConstruct
  ): TConstruct;

  // Control flow

  abstract emitSequentialStatements(
    context: TContext,
    contextType: TypeDefinition,
    statements: readonly (TConstruct | null | undefined)[]
  ): TConstruct;
  abstract emitConditionalExpression(
    context: TContext,
    condition: TConstruct,
    thenExpression: TConstruct,
    elseExpression?: TConstruct
  ): TConstruct;
  abstract emitAndConditionalExpression(
    context: TContext,
    conditions: readonly TConstruct[],
    thenExpression: TConstruct,
    elseExpression: TConstruct
  ): TConstruct;
  abstract emitForEachLoop(
    context: TContext,
    traits: CollectionTraits,
    collection: TConstruct,
    emitBody: (current: TConstruct) => TConstruct
  ): TConstruct;
  abstract emitTryFinally(
    context: TContext,
    tryStatement: TConstruct,
    finallyStatement: TConstruct
  ): TConstruct;

  // Operators

  abstract emitNotExpression(context: TContext, value: TConstruct): TConstruct;
  abstract emitEqualsExpression(
    context: TContext,
    left: TConstruct,
    right: TConstruct
  ): TConstruct;
  abstract emitNotEqualsExpression(
    context: TContext,
    left: TConstruct,
    right: TConstruct
  ): TConstruct;
  abstract emitGreaterThanExpression(
    context: TContext,
    left: TConstruct,
    right: TConstruct
  ): TConstruct;
  abstract emitLessThanExpression(
    context: TContext,
    left: TConstruct,
    right: TConstruct
  ): TConstruct;
  abstract emitIncrement(context: TContext, int32Variable: TConstruct): TConstruct;

  // Invocation

  abstract emitCreateNewObjectExpression(
    context: TContext,
    variable: TConstruct | undefined,
    constructor: ConstructorDefinition,
    args: readonly TConstruct[]
  ): TConstruct;
  abstract emitInvokeMethodExpression(
    context: TContext,
    instance: TConstruct | undefined,
    method: MethodDefinition,
    args: readonly TConstruct[]
  ): TConstruct;
  abstract emitInvokeVoidMethod(
    context: TContext,
    instance: TConstruct | undefined,
    method: MethodDefinition,
    args: readonly TConstruct[]
  ): TConstruct;
  abstract emitInvokeDelegateExpression(
    context: TContext,
    returnType: TypeDefinition,
    delegate: TConstruct,
    args: readonly TConstruct[]
  ): TConstruct;

  // Arrays

  abstract emitCreateNewArrayExpression(
    context: TContext,
    elementType: TypeDefinition,
    length: number,
    initialElements?: readonly TConstruct[]
  ): TConstruct;
  abstract emitGetArrayElementExpression(
    context: TContext,
    array: TConstruct,
    index: TConstruct
  ): TConstruct;
  abstract emitSetArrayElementStatement(
    context: TContext,
    array: TConstruct,
    index: TConstruct,
    value: TConstruct
  ): TConstruct;

  // Conversions

  abstract emitUnboxAnyExpression(
    context: TContext,
    targetType: TypeDefinition,
    value: TConstruct
  ): TConstruct;
  abstract emitEnumFromUnderlyingCastExpression(
    context: TContext,
    enumType: EnumTypeDefinition,
    underlyingValue: TConstruct
  ): TConstruct;
  abstract emitEnumToUnderlyingCastExpression(
    context: TContext,
    underlyingType: TypeDefinition,
    enumValue: TConstruct
  ): TConstruct;

  // Metadata

  abstract emitTypeOfExpression(context: TContext, type: TypeDefinition): TConstruct;
  abstract emitMethodOfExpression(
    context: TContext,
    owner: TypeDefinition,
    name: string,
    parameterTypes?: readonly TypeDefinition[]
  ): TConstruct;
  abstract emitFieldOfExpression(
    context: TContext,
    owner: TypeDefinition,
    name: string
  ): TConstruct;

  // Delegates

  abstract emitNewPrivateMethodDelegateExpression(
    context: TContext,
    method: MethodDefinition
  ): TConstruct;
  abstract emitGetPrivateMethodDelegateExpression(
    context: TContext,
    method: MethodDefinition
  ): TConstruct;
  abstract emitGetStaticDelegateExpression(
    context: TContext,
    method: MethodDefinition
  ): TConstruct;

  // Methods

  /** Opens a method body; its parameters become the current argument list. */
  abstract beginMethod(context: TContext, parameters: readonly ParameterSpec[]): void;
  /** Closes the current method body into a lambda construct. */
  abstract endMethod(
    context: TContext,
    returnType: TypeDefinition,
    body: TConstruct
  ): TConstruct;

  // Terminal operations

  abstract createSerializerConstructor(
    context: TContext,
    target: SerializationTarget,
    schema: PolymorphismSchema
  ): SerializerFactory;
  abstract createEnumSerializerConstructor(context: TContext): SerializerFactory;
  abstract createCodeGenerationContextForSerializerCreation(
    serializationContext: SerializationContext
  ): TContext;

  /**
   * Defines a helper callable from generated methods of this build. The body
   * sees `(serializer, context, ...parameters)` as its arguments.
   */
  definePrivateMethod(
    context: TContext,
    name: string,
    isStatic: boolean,
    returnType: TypeDefinition,
    parameters: readonly ParameterSpec[],
    emitBody: () => TConstruct
  ): MethodDefinition {
    context.assertOpen("definePrivateMethod");
    this.beginMethod(context, [serializerParameter, contextParameter, ...parameters]);
    const lambda = this.endMethod(context, returnType, emitBody());
    const definition: MethodDefinition = {
      kind: "method",
      name,
      declaringType: this.targetType,
      parameterTypes: parameters.map((parameter) => parameter.type),
      returnType,
      isStatic,
    };
    context.defineHelper({ name, definition, isStatic, lambda });
    return definition;
  }

  /** Builds the whole serializer for the target type. */
  buildSerializerFactory(
    serializationContext: SerializationContext,
    schema: PolymorphismSchema = PolymorphismSchema.default
  ): SerializerFactory {
    const context = this.createCodeGenerationContextForSerializerCreation(serializationContext);
    try {
      if (this.targetType.kind === "enum") {
        this.buildEnumSerializer(context, this.targetType);
        return this.createEnumSerializerConstructor(context);
      }
      const target = createSerializationTarget(this.targetType);
      this.buildObjectSerializer(context, target);
      trace("builder", "operations built", {
        type: typeName(this.targetType),
        members: target.members.length,
      });
      return this.createSerializerConstructor(context, target, schema);
    } finally {
      context.dispose();
    }
  }

  protected buildObjectSerializer(context: TContext, target: SerializationTarget): void {
    const pending = context.pending;
    pending.packOperations = this.emitPackOperationListInitialization(context, target);
    pending.unpackOperations = this.emitUnpackOperationListInitialization(context, target);
    if (!target.isTuple) {
      pending.packOperationTable = this.emitPackOperationTableInitialization(context, target);
      pending.unpackOperationTable = this.emitUnpackOperationTableInitialization(
        context,
        target
      );
    }
    pending.memberNames = this.emitMemberListInitialization(context, target);
  }

  protected buildEnumSerializer(context: TContext, enumType: EnumTypeDefinition): void {
    this.definePrivateMethod(
      context,
      PACK_UNDERLYING_VALUE_TO,
      true,
      Types.void,
      [
        { name: "packer", type: HostTypes.packer },
        { name: "value", type: enumType },
      ],
      () =>
        this.emitInvokeVoidMethod(
          context,
          this.referArgument(context, HostTypes.packer, "packer", 2),
          this.packerMethod("packInteger"),
          [
            this.emitEnumToUnderlyingCastExpression(
              context,
              Types.int32,
              this.referArgument(context, enumType, "value", 3)
            ),
          ]
        )
    );
    this.definePrivateMethod(
      context,
      UNPACK_FROM_UNDERLYING_VALUE,
      true,
      enumType,
      [{ name: "value", type: Types.int32 }],
      () =>
        this.emitEnumFromUnderlyingCastExpression(
          context,
          enumType,
          this.referArgument(context, Types.int32, "value", 2)
        )
    );
  }

  protected emitPackOperationListInitialization(
    context: TContext,
    target: SerializationTarget
  ): TConstruct {
    return this.emitCreateNewArrayExpression(
      context,
      HostTypes.packOperation(target.type),
      target.members.length,
      target.members.map((member, index) =>
        this.emitPackOperation(context, target, member, index)
      )
    );
  }

  protected emitUnpackOperationListInitialization(
    context: TContext,
    target: SerializationTarget
  ): TConstruct {
    return this.emitCreateNewArrayExpression(
      context,
      HostTypes.unpackOperation(target.type),
      target.members.length,
      target.members.map((member, index) =>
        this.emitUnpackOperation(context, target, member, index)
      )
    );
  }

  protected emitPackOperationTableInitialization(
    context: TContext,
    target: SerializationTarget
  ): TConstruct {
    return this.emitOperationTable(
      context,
      HostTypes.packOperation(target.type),
      target,
      (member, index) => this.emitPackOperation(context, target, member, index)
    );
  }

  protected emitUnpackOperationTableInitialization(
    context: TContext,
    target: SerializationTarget
  ): TConstruct {
    return this.emitOperationTable(
      context,
      HostTypes.unpackOperation(target.type),
      target,
      (member, index) => this.emitUnpackOperation(context, target, member, index)
    );
  }

  protected emitMemberListInitialization(
    context: TContext,
    target: SerializationTarget
  ): TConstruct {
    return this.emitCreateNewArrayExpression(
      context,
      Types.string,
      target.members.length,
      target.members.map((member) => this.makeStringLiteral(context, member.name))
    );
  }

  private emitOperationTable(
    context: TContext,
    operationType: TypeDefinition,
    target: SerializationTarget,
    emitOperation: (member: SerializingMember, index: number) => TConstruct
  ): TConstruct {
    const tableType = Types.map(Types.string, operationType);
    const table = this.declareLocal(context, tableType, "table");
    return this.emitSequentialStatements(context, tableType, [
      table,
      this.emitStoreVariableStatement(
        context,
        table,
        this.emitCreateNewObjectExpression(context, table, defaultConstructorOf(tableType), [])
      ),
      ...target.members.map((member, index) =>
        this.emitSetIndexedProperty(
          context,
          this.emitLoadVariableExpression(context, table),
          tableType,
          "item",
          this.makeStringLiteral(context, member.name),
          emitOperation(member, index)
        )
      ),
      this.emitLoadVariableExpression(context, table),
    ]);
  }

  protected emitPackOperation(
    context: TContext,
    target: SerializationTarget,
    member: SerializingMember,
    index: number
  ): TConstruct {
    this.beginMethod(context, [
      serializerParameter,
      contextParameter,
      { name: "packer", type: HostTypes.packer },
      { name: "value", type: target.type },
    ]);
    const packer = this.referArgument(context, HostTypes.packer, "packer", 2);
    const value = this.referArgument(context, target.type, "value", 3);
    const body = this.emitPackValue(
      context,
      packer,
      this.emitGetMemberValue(context, value, member, index),
      member.type,
      member.name
    );
    return this.endMethod(context, Types.void, body);
  }

  protected emitUnpackOperation(
    context: TContext,
    target: SerializationTarget,
    member: SerializingMember,
    index: number
  ): TConstruct {
    this.beginMethod(context, [
      serializerParameter,
      contextParameter,
      { name: "unpacker", type: HostTypes.unpacker },
      { name: "target", type: target.type },
      { name: "itemIndex", type: Types.int32 },
      { name: "itemsCount", type: Types.int32 },
    ]);
    const unpacker = this.referArgument(context, HostTypes.unpacker, "unpacker", 2);
    const instance = this.referArgument(context, target.type, "target", 3);
    const value = this.emitUnpackValue(context, unpacker, member.type, member.name);
    const body = this.emitSetMemberValue(context, instance, member, index, value);
    return this.endMethod(context, Types.void, body);
  }

  private emitGetMemberValue(
    context: TContext,
    instance: TConstruct,
    member: SerializingMember,
    index: number
  ): TConstruct {
    if (!member.member) {
      return this.emitGetArrayElementExpression(
        context,
        instance,
        this.makeInt32Literal(context, index)
      );
    }
    return member.member.kind === "field"
      ? this.emitGetFieldExpression(context, instance, member.member)
      : this.emitGetPropertyExpression(context, instance, member.member);
  }

  private emitSetMemberValue(
    context: TContext,
    instance: TConstruct,
    member: SerializingMember,
    index: number,
    value: TConstruct
  ): TConstruct {
    if (!member.member) {
      return this.emitSetArrayElementStatement(
        context,
        instance,
        this.makeInt32Literal(context, index),
        value
      );
    }
    return member.member.kind === "field"
      ? this.emitSetField(context, instance, member.member, value)
      : this.emitSetProperty(context, instance, member.member, value);
  }

  /** Statement packing `value` of `type` with the current `packer` argument. */
  protected emitPackValue(
    context: TContext,
    packer: TConstruct,
    value: TConstruct,
    type: TypeDefinition,
    hint: string
  ): TConstruct {
    switch (type.kind) {
      case "primitive":
        return this.emitInvokeVoidMethod(
          context,
          packer,
          this.packerMethod(packerMethods[type.name]),
          [value]
        );
      case "nullable": {
        const local = this.declareLocal(
          context,
          type,
          context.uniqueLocalName(`${toIdentifier(hint)}Value`)
        );
        return this.emitSequentialStatements(context, Types.void, [
          local,
          this.emitStoreVariableStatement(context, local, value),
          this.emitConditionalExpression(
            context,
            this.emitEqualsExpression(
              context,
              this.emitLoadVariableExpression(context, local),
              this.makeNullLiteral(context, type)
            ),
            this.emitInvokeVoidMethod(context, packer, this.packerMethod("packNull"), []),
            this.emitPackValue(
              context,
              packer,
              this.emitUnboxAnyExpression(
                context,
                type.inner,
                this.emitLoadVariableExpression(context, local)
              ),
              type.inner,
              hint
            )
          ),
        ]);
      }
      case "enum":
      case "object":
      case "tuple":
        return this.emitInvokeVoidMethod(
          context,
          this.emitGetSerializerExpression(context, type),
          resolveMethod(HostTypes.serializer, "packTo"),
          [packer, value]
        );
      case "array":
      case "map":
        return this.emitInvokeVoidMethod(
          context,
          undefined,
          this.ensurePackItemsMethod(context, type),
          [packer, value]
        );
      default:
        return raise({
          code: "CG0001",
          params: {
            kind: "malformed-graph",
            message: `member ${hint} of type ${typeName(type)} cannot be packed`,
          },
        });
    }
  }

  /** Expression reading a value of `type` from the current `unpacker` argument. */
  protected emitUnpackValue(
    context: TContext,
    unpacker: TConstruct,
    type: TypeDefinition,
    hint: string
  ): TConstruct {
    switch (type.kind) {
      case "primitive":
        return this.emitInvokeMethodExpression(
          context,
          unpacker,
          this.unpackerMethod(unpackerMethods[type.name]),
          []
        );
      case "nullable":
        return this.emitConditionalExpression(
          context,
          this.emitInvokeMethodExpression(
            context,
            unpacker,
            this.unpackerMethod("tryReadNil"),
            []
          ),
          this.makeNullLiteral(context, type),
          this.emitUnboxAnyExpression(
            context,
            type,
            this.emitUnpackValue(context, unpacker, type.inner, hint)
          )
        );
      case "enum":
      case "object":
      case "tuple":
        return this.emitUnboxAnyExpression(
          context,
          type,
          this.emitInvokeMethodExpression(
            context,
            this.emitGetSerializerExpression(context, type),
            resolveMethod(HostTypes.serializer, "unpackFrom"),
            [unpacker]
          )
        );
      case "array":
      case "map":
        return this.emitInvokeMethodExpression(
          context,
          undefined,
          this.ensureUnpackItemsMethod(context, type),
          [unpacker]
        );
      default:
        return raise({
          code: "CG0001",
          params: {
            kind: "malformed-graph",
            message: `member ${hint} of type ${typeName(type)} cannot be unpacked`,
          },
        });
    }
  }

  /** `context.getSerializer(typeof(type))` over the current context argument. */
  protected emitGetSerializerExpression(context: TContext, type: TypeDefinition): TConstruct {
    return this.emitInvokeMethodExpression(
      context,
      this.referArgument(context, HostTypes.serializationContext, "context", 1),
      resolveMethod(HostTypes.serializationContext, "getSerializer"),
      [this.emitTypeOfExpression(context, type)]
    );
  }

  private ensurePackItemsMethod(context: TContext, type: CollectionType): MethodDefinition {
    const key = `pack ${typeName(type)}`;
    const existing = context.helperNameFor(key);
    if (existing !== undefined) return context.getHelper(existing).definition;
    const name = context.reserveHelperName(key, `pack${typeSuffix(type)}`);

    const traits = collectionTraitsOf(type);
    return this.definePrivateMethod(
      context,
      name,
      false,
      Types.void,
      [
        { name: "packer", type: HostTypes.packer },
        { name: "items", type },
      ],
      () => {
        const packer = this.referArgument(context, HostTypes.packer, "packer", 2);
        const items = this.referArgument(context, type, "items", 3);
        if (traits.kind === "none") {
          return raise({
            code: "CG0001",
            params: { kind: "malformed-graph", message: `${typeName(type)} is not enumerable` },
          });
        }
        return this.emitConditionalExpression(
          context,
          this.emitEqualsExpression(context, items, this.makeNullLiteral(context, type)),
          this.emitInvokeVoidMethod(context, packer, this.packerMethod("packNull"), []),
          this.emitSequentialStatements(context, Types.void, [
            this.emitInvokeVoidMethod(
              context,
              packer,
              this.packerMethod(type.kind === "array" ? "packArrayHeader" : "packMapHeader"),
              [this.emitGetPropertyExpression(context, items, traits.count)]
            ),
            this.emitForEachLoop(context, traits, items, (current) =>
              type.kind === "array"
                ? this.emitPackValue(context, packer, current, type.element, "item")
                : this.emitSequentialStatements(context, Types.void, [
                    this.emitPackValue(
                      context,
                      packer,
                      this.emitGetArrayElementExpression(
                        context,
                        current,
                        this.makeInt32Literal(context, 0)
                      ),
                      type.key,
                      "key"
                    ),
                    this.emitPackValue(
                      context,
                      packer,
                      this.emitGetArrayElementExpression(
                        context,
                        current,
                        this.makeInt32Literal(context, 1)
                      ),
                      type.value,
                      "value"
                    ),
                  ])
            ),
          ])
        );
      }
    );
  }

  private ensureUnpackItemsMethod(context: TContext, type: CollectionType): MethodDefinition {
    const key = `unpack ${typeName(type)}`;
    const existing = context.helperNameFor(key);
    if (existing !== undefined) return context.getHelper(existing).definition;
    const name = context.reserveHelperName(key, `unpack${typeSuffix(type)}`);

    return this.definePrivateMethod(
      context,
      name,
      false,
      type,
      [{ name: "unpacker", type: HostTypes.unpacker }],
      () => {
        const unpacker = this.referArgument(context, HostTypes.unpacker, "unpacker", 2);
        const count = this.declareLocal(context, Types.int32, context.uniqueLocalName("count"));
        const items = this.declareLocal(context, type, context.uniqueLocalName("items"));
        const created =
          type.kind === "array"
            ? this.emitCreateNewArrayExpression(context, type.element, 0)
            : this.emitCreateNewObjectExpression(context, items, defaultConstructorOf(type), []);
        const indices = this.emitInvokeDelegateExpression(
          context,
          HostTypes.range.returnType,
          this.emitGetStaticDelegateExpression(context, HostTypes.range),
          [this.emitLoadVariableExpression(context, count)]
        );

        return this.emitConditionalExpression(
          context,
          this.emitInvokeMethodExpression(context, unpacker, this.unpackerMethod("tryReadNil"), []),
          this.makeNullLiteral(context, type),
          this.emitSequentialStatements(context, type, [
            count,
            items,
            this.emitStoreVariableStatement(
              context,
              count,
              this.emitInvokeMethodExpression(
                context,
                unpacker,
                this.unpackerMethod(
                  type.kind === "array" ? "readArrayHeader" : "readMapHeader"
                ),
                []
              )
            ),
            this.emitStoreVariableStatement(context, items, created),
            this.emitForEachLoop(
              context,
              collectionTraitsOf(HostTypes.range.returnType),
              indices,
              (index) =>
                type.kind === "array"
                  ? this.emitSetArrayElementStatement(
                      context,
                      this.emitLoadVariableExpression(context, items),
                      index,
                      this.emitUnpackValue(context, unpacker, type.element, "item")
                    )
                  : this.emitSetIndexedProperty(
                      context,
                      this.emitLoadVariableExpression(context, items),
                      type,
                      "item",
                      this.emitUnpackValue(context, unpacker, type.key, "key"),
                      this.emitUnpackValue(context, unpacker, type.value, "value")
                    )
            ),
            this.emitLoadVariableExpression(context, items),
          ])
        );
      }
    );
  }

  protected packerMethod(name: string): MethodDefinition {
    return resolveMethod(HostTypes.packer, name);
  }

  protected unpackerMethod(name: string): MethodDefinition {
    return resolveMethod(HostTypes.unpacker, name);
  }

  /** Registers the type and its parameter types for dump-mode references. */
  protected registerMetadata(...types: readonly TypeDefinition[]): void {
    for (const type of types) this.metadata.registerType(type);
  }
}
