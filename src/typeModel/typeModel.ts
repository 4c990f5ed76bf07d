import type {
  FieldNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
  OperationTypeNode,
  ValueNode,
} from 'graphql';

import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap, ReadOnlyObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { devAssert } from '../jsutils/devAssert';

import { defaultTypeResolver } from './defaultResolvers';

import type { TypeRef } from './typeRefs';

/**
 * Information about the field being resolved, handed to every resolver,
 * type resolver and `isTypeOf` check.
 */
export interface ResolveInfo {
  readonly fieldName: string;
  readonly fieldNodes: ReadonlyArray<FieldNode>;
  readonly returnType: TypeRef;
  readonly parentType: string;
  readonly path: Path;
  readonly typeModel: TypeModel;
  readonly fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
  readonly rootValue: unknown;
  readonly operation: OperationDefinitionNode;
  readonly variableValues: ReadOnlyObjMap<unknown>;
  /** Aborted once the execution deadline passes. */
  readonly signal: AbortSignal | undefined;
}

export type FieldResolver = (
  source: unknown,
  args: ObjMap<unknown>,
  contextValue: unknown,
  info: ResolveInfo,
) => unknown;

/**
 * How a field produces its value. The kind is fixed when the type model is
 * built: `async` resolvers always hand back a promise, `sync` resolvers are
 * expected to return a plain value.
 */
export type ResolverHandle =
  | { readonly kind: 'sync'; readonly resolve: FieldResolver }
  | { readonly kind: 'async'; readonly resolve: FieldResolver };

export type TypeResolver = (
  value: unknown,
  contextValue: unknown,
  info: ResolveInfo,
  abstractTypeName: string,
) => PromiseOrValue<Maybe<string>>;

export type IsTypeOfFn = (
  value: unknown,
  contextValue: unknown,
  info: ResolveInfo,
) => PromiseOrValue<boolean>;

export interface ArgumentSpec {
  readonly name: string;
  readonly type: TypeRef;
  /** Internal value used when the argument is not provided. */
  readonly defaultValue: unknown;
}

export interface FieldSpec {
  readonly name: string;
  readonly returnType: TypeRef;
  readonly args: ReadonlyArray<ArgumentSpec>;
  readonly resolver: ResolverHandle;
}

export type InputFieldSpec = ArgumentSpec;

export interface ScalarTypeDef {
  readonly kind: 'SCALAR';
  readonly name: string;
  readonly serialize: (outputValue: unknown) => unknown;
  readonly parseValue: (inputValue: unknown) => unknown;
  readonly parseLiteral: (
    valueNode: ValueNode,
    variables?: Maybe<ReadOnlyObjMap<unknown>>,
  ) => unknown;
}

export interface EnumValueDef {
  readonly name: string;
  readonly value: unknown;
}

export interface EnumTypeDef {
  readonly kind: 'ENUM';
  readonly name: string;
  readonly values: ReadonlyArray<EnumValueDef>;
  readonly serialize: (outputValue: unknown) => unknown;
  readonly parseValue: (inputValue: unknown) => unknown;
  readonly parseLiteral: (
    valueNode: ValueNode,
    variables?: Maybe<ReadOnlyObjMap<unknown>>,
  ) => unknown;
}

export interface ObjectTypeDef {
  readonly kind: 'OBJECT';
  readonly name: string;
  readonly fields: ReadonlyArray<FieldSpec>;
  readonly interfaces: ReadonlyArray<string>;
  readonly isTypeOf?: IsTypeOfFn | undefined;
}

export interface InterfaceTypeDef {
  readonly kind: 'INTERFACE';
  readonly name: string;
  readonly fields: ReadonlyArray<FieldSpec>;
  readonly interfaces: ReadonlyArray<string>;
  readonly resolveType?: TypeResolver | undefined;
}

export interface UnionTypeDef {
  readonly kind: 'UNION';
  readonly name: string;
  readonly types: ReadonlyArray<string>;
  readonly resolveType?: TypeResolver | undefined;
}

export interface InputObjectTypeDef {
  readonly kind: 'INPUT_OBJECT';
  readonly name: string;
  readonly fields: ReadonlyArray<InputFieldSpec>;
}

export type LeafTypeDef = ScalarTypeDef | EnumTypeDef;

export type AbstractTypeDef = InterfaceTypeDef | UnionTypeDef;

export type TypeDef =
  | ScalarTypeDef
  | EnumTypeDef
  | ObjectTypeDef
  | InterfaceTypeDef
  | UnionTypeDef
  | InputObjectTypeDef;

export interface TypeModelConfig {
  types: ReadonlyArray<TypeDef>;
  query?: Maybe<string>;
  mutation?: Maybe<string>;
  subscription?: Maybe<string>;
}

/**
 * An executable view of a schema: named type definitions with pre-bound
 * resolvers, plus the root operation types.
 */
export class TypeModel {
  private readonly _types: Map<string, TypeDef>;
  private readonly _fields: Map<string, Map<string, FieldSpec>>;
  private readonly _possibleTypes: Map<string, Array<ObjectTypeDef>>;
  private readonly _rootTypeNames: { [operation: string]: string | undefined };

  constructor(config: TypeModelConfig) {
    this._types = new Map();
    this._fields = new Map();
    this._possibleTypes = new Map();

    for (const type of config.types) {
      devAssert(
        !this._types.has(type.name),
        `Type model must contain uniquely named types but contains multiple types named "${type.name}".`,
      );
      this._types.set(type.name, type);

      if (type.kind === 'OBJECT' || type.kind === 'INTERFACE') {
        const fieldMap = new Map<string, FieldSpec>();
        for (const field of type.fields) {
          fieldMap.set(field.name, field);
        }
        this._fields.set(type.name, fieldMap);
      }
    }

    for (const type of config.types) {
      if (type.kind === 'OBJECT') {
        for (const interfaceName of type.interfaces) {
          this._addPossibleType(interfaceName, type);
        }
      } else if (type.kind === 'UNION') {
        for (const memberName of type.types) {
          const member = this._types.get(memberName);
          devAssert(
            member !== undefined && member.kind === 'OBJECT',
            `Union type "${type.name}" can only include Object types, but includes "${memberName}".`,
          );
          this._addPossibleType(type.name, member);
        }
      }
    }

    this._rootTypeNames = {
      query: config.query ?? undefined,
      mutation: config.mutation ?? undefined,
      subscription: config.subscription ?? undefined,
    };
  }

  getType(name: string): TypeDef | undefined {
    return this._types.get(name);
  }

  getObjectType(name: string): ObjectTypeDef | undefined {
    const type = this._types.get(name);
    return type?.kind === 'OBJECT' ? type : undefined;
  }

  getTypes(): IterableIterator<TypeDef> {
    return this._types.values();
  }

  getRootTypeName(operation: OperationTypeNode): string | undefined {
    return this._rootTypeNames[operation];
  }

  getField(typeName: string, fieldName: string): FieldSpec | undefined {
    return this._fields.get(typeName)?.get(fieldName);
  }

  getPossibleTypes(abstractTypeName: string): ReadonlyArray<ObjectTypeDef> {
    return this._possibleTypes.get(abstractTypeName) ?? [];
  }

  isPossibleType(abstractTypeName: string, objectTypeName: string): boolean {
    return this.getPossibleTypes(abstractTypeName).some(
      (possibleType) => possibleType.name === objectTypeName,
    );
  }

  /**
   * Names the concrete object type of a value at an abstract position,
   * using the abstract type's `resolveType` when it has one, and otherwise
   * the value's `__typename` followed by the possible types' `isTypeOf`.
   */
  resolveConcreteType(
    value: unknown,
    abstractType: AbstractTypeDef,
    contextValue: unknown,
    info: ResolveInfo,
  ): PromiseOrValue<Maybe<string>> {
    const resolveType = abstractType.resolveType ?? defaultTypeResolver;
    return resolveType(value, contextValue, info, abstractType.name);
  }

  private _addPossibleType(abstractTypeName: string, type: ObjectTypeDef) {
    const possibleTypes = this._possibleTypes.get(abstractTypeName);
    if (possibleTypes === undefined) {
      this._possibleTypes.set(abstractTypeName, [type]);
    } else {
      possibleTypes.push(type);
    }
  }
}
