import type {
  GraphQLArgument,
  GraphQLField,
  GraphQLInputField,
  GraphQLNamedOutputType,
  GraphQLNamedType,
  GraphQLOutputType,
  GraphQLResolveInfo,
  GraphQLSchema,
  GraphQLType,
} from 'graphql';
import {
  GraphQLList,
  GraphQLNonNull,
  isEnumType,
  isInputObjectType,
  isInterfaceType,
  isListType,
  isNonNullType,
  isObjectType,
  isScalarType,
  isUnionType,
  specifiedScalarTypes,
} from 'graphql';

import { invariant } from '../jsutils/invariant';
import { memoize1 } from '../jsutils/memoize1';

import { defaultFieldResolver } from './defaultResolvers';
import type {
  ArgumentSpec,
  FieldResolver,
  FieldSpec,
  ResolveInfo,
  ResolverHandle,
  TypeDef,
} from './typeModel';
import { TypeModel } from './typeModel';
import type { NullableTypeRef, TypeRef } from './typeRefs';
import { listOf, namedType, nonNullOf } from './typeRefs';

/**
 * The resolve info handed to graphql-js resolvers, with the signal that is
 * aborted once the execution deadline passes.
 */
export interface GraphQLResolveInfoWithSignal extends GraphQLResolveInfo {
  readonly signal: AbortSignal | undefined;
}

export function typeRefFromGraphQLType(type: GraphQLType): TypeRef {
  if (isNonNullType(type)) {
    return nonNullOf(typeRefFromGraphQLType(type.ofType));
  }
  if (isListType(type)) {
    return listOf(typeRefFromGraphQLType(type.ofType));
  }
  return namedType(type.name);
}

function isAsyncFunction(fn: Function): boolean {
  return Object.prototype.toString.call(fn) === '[object AsyncFunction]';
}

/**
 * Builds the type model for a graphql-js schema. Resolvers are wrapped so
 * that they receive a standard `GraphQLResolveInfo`, and are classified as
 * asynchronous when they are declared `async` or when the field sets
 * `extensions: { async: true }`.
 */
export const toTypeModel = memoize1(_toTypeModel);

function _toTypeModel(schema: GraphQLSchema): TypeModel {
  const toGraphQLOutputType = memoize1((typeRef: TypeRef): GraphQLOutputType => {
    if (typeRef.kind === 'NON_NULL') {
      return new GraphQLNonNull(toNullableGraphQLOutputType(typeRef.ofType));
    }
    return toNullableGraphQLOutputType(typeRef);
  });

  function toNullableGraphQLOutputType(
    typeRef: NullableTypeRef,
  ): GraphQLList<GraphQLOutputType> | GraphQLNamedOutputType {
    if (typeRef.kind === 'LIST') {
      return new GraphQLList(toGraphQLOutputType(typeRef.ofType));
    }
    const type = schema.getType(typeRef.name);
    invariant(
      type !== undefined && !isInputObjectType(type),
      `Expected "${typeRef.name}" to be an output type.`,
    );
    return type;
  }

  function toGraphQLResolveInfo(
    info: ResolveInfo,
  ): GraphQLResolveInfoWithSignal {
    const parentType = schema.getType(info.parentType);
    invariant(isObjectType(parentType));
    return {
      fieldName: info.fieldName,
      fieldNodes: info.fieldNodes,
      returnType: toGraphQLOutputType(info.returnType),
      parentType,
      path: info.path,
      schema,
      fragments: info.fragments,
      rootValue: info.rootValue,
      operation: info.operation,
      variableValues: info.variableValues,
      signal: info.signal,
    };
  }

  function toArgumentSpec(arg: GraphQLArgument | GraphQLInputField): ArgumentSpec {
    return {
      name: arg.name,
      type: typeRefFromGraphQLType(arg.type),
      defaultValue: arg.defaultValue,
    };
  }

  function toFieldSpec(field: GraphQLField<unknown, unknown>): FieldSpec {
    const resolveFn = field.resolve;
    const resolve: FieldResolver =
      resolveFn === undefined
        ? defaultFieldResolver
        : (source, args, contextValue, info) =>
            resolveFn(source, args, contextValue, toGraphQLResolveInfo(info));

    const resolver: ResolverHandle =
      field.extensions.async === true ||
      (resolveFn !== undefined && isAsyncFunction(resolveFn))
        ? { kind: 'async', resolve }
        : { kind: 'sync', resolve };

    return {
      name: field.name,
      returnType: typeRefFromGraphQLType(field.type),
      args: field.args.map(toArgumentSpec),
      resolver,
    };
  }

  function toTypeDef(type: GraphQLNamedType): TypeDef {
    if (isScalarType(type)) {
      const scalarType = type;
      return {
        kind: 'SCALAR',
        name: type.name,
        serialize: (outputValue) => scalarType.serialize(outputValue),
        parseValue: (inputValue) => scalarType.parseValue(inputValue),
        parseLiteral: (valueNode, variables) =>
          scalarType.parseLiteral(valueNode, variables),
      };
    }

    if (isEnumType(type)) {
      const enumType = type;
      return {
        kind: 'ENUM',
        name: type.name,
        values: type.getValues().map(({ name, value }) => ({ name, value })),
        serialize: (outputValue) => enumType.serialize(outputValue),
        parseValue: (inputValue) => enumType.parseValue(inputValue),
        parseLiteral: (valueNode, variables) =>
          enumType.parseLiteral(valueNode, variables),
      };
    }

    if (isObjectType(type)) {
      const isTypeOf = type.isTypeOf;
      return {
        kind: 'OBJECT',
        name: type.name,
        fields: Object.values(type.getFields()).map(toFieldSpec),
        interfaces: type.getInterfaces().map((iface) => iface.name),
        isTypeOf:
          isTypeOf == null
            ? undefined
            : (value, contextValue, info) =>
                isTypeOf(value, contextValue, toGraphQLResolveInfo(info)),
      };
    }

    if (isInterfaceType(type) || isUnionType(type)) {
      const abstractType = type;
      const resolveTypeFn = type.resolveType;
      const resolveType =
        resolveTypeFn == null
          ? undefined
          : (value: unknown, contextValue: unknown, info: ResolveInfo) =>
              resolveTypeFn(
                value,
                contextValue,
                toGraphQLResolveInfo(info),
                abstractType,
              );

      return isInterfaceType(type)
        ? {
            kind: 'INTERFACE',
            name: type.name,
            fields: Object.values(type.getFields()).map(toFieldSpec),
            interfaces: type.getInterfaces().map((iface) => iface.name),
            resolveType,
          }
        : {
            kind: 'UNION',
            name: type.name,
            types: type.getTypes().map((member) => member.name),
            resolveType,
          };
    }

    invariant(isInputObjectType(type), `Unexpected type: ${String(type)}.`);
    return {
      kind: 'INPUT_OBJECT',
      name: type.name,
      fields: Object.values(type.getFields()).map(toArgumentSpec),
    };
  }

  const types: Array<TypeDef> = [];
  const typeMap = schema.getTypeMap();
  for (const type of Object.values(typeMap)) {
    if (!type.name.startsWith('__')) {
      types.push(toTypeDef(type));
    }
  }

  // Variables may name a standard scalar that no field references.
  for (const scalar of specifiedScalarTypes) {
    if (typeMap[scalar.name] === undefined) {
      types.push(toTypeDef(scalar));
    }
  }

  return new TypeModel({
    types,
    query: schema.getQueryType()?.name,
    mutation: schema.getMutationType()?.name,
    subscription: schema.getSubscriptionType()?.name,
  });
}
