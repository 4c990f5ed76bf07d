import type { TypeNode } from 'graphql';
import { Kind } from 'graphql';

export interface NamedTypeRef {
  readonly kind: 'NAMED';
  readonly name: string;
}

export interface ListTypeRef {
  readonly kind: 'LIST';
  readonly ofType: TypeRef;
}

export interface NonNullTypeRef {
  readonly kind: 'NON_NULL';
  readonly ofType: NullableTypeRef;
}

export type NullableTypeRef = NamedTypeRef | ListTypeRef;

/**
 * A reference to a schema type by name, possibly wrapped in list and
 * non-null markers. Non-null never wraps non-null.
 */
export type TypeRef = NullableTypeRef | NonNullTypeRef;

export function namedType(name: string): NamedTypeRef {
  const type: NamedTypeRef = { kind: 'NAMED', name };
  return Object.freeze(type);
}

export function listOf(ofType: TypeRef): ListTypeRef {
  const type: ListTypeRef = { kind: 'LIST', ofType };
  return Object.freeze(type);
}

export function nonNullOf(ofType: TypeRef): NonNullTypeRef {
  if (ofType.kind === 'NON_NULL') {
    return ofType;
  }
  const type: NonNullTypeRef = { kind: 'NON_NULL', ofType };
  return Object.freeze(type);
}

export function nullableOf(type: TypeRef): NullableTypeRef {
  return type.kind === 'NON_NULL' ? type.ofType : type;
}

export function isNonNullTypeRef(type: TypeRef): type is NonNullTypeRef {
  return type.kind === 'NON_NULL';
}

export function getNamedTypeName(type: TypeRef): string {
  let unwrapped = type;
  while (unwrapped.kind !== 'NAMED') {
    unwrapped = unwrapped.ofType;
  }
  return unwrapped.name;
}

/**
 * Prints a type reference in SDL notation, e.g. `[Int!]!`.
 */
export function printTypeRef(type: TypeRef): string {
  switch (type.kind) {
    case 'NAMED':
      return type.name;
    case 'LIST':
      return `[${printTypeRef(type.ofType)}]`;
    case 'NON_NULL':
      return `${printTypeRef(type.ofType)}!`;
  }
}

export function typeRefFromAST(typeNode: TypeNode): TypeRef {
  switch (typeNode.kind) {
    case Kind.NAMED_TYPE:
      return namedType(typeNode.name.value);
    case Kind.LIST_TYPE:
      return listOf(typeRefFromAST(typeNode.type));
    case Kind.NON_NULL_TYPE:
      return nonNullOf(typeRefFromAST(typeNode.type));
  }
}
