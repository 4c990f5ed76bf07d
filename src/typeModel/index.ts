export { TypeModel } from './typeModel';

export type {
  AbstractTypeDef,
  ArgumentSpec,
  EnumTypeDef,
  EnumValueDef,
  FieldResolver,
  FieldSpec,
  InputFieldSpec,
  InputObjectTypeDef,
  InterfaceTypeDef,
  IsTypeOfFn,
  LeafTypeDef,
  ObjectTypeDef,
  ResolveInfo,
  ResolverHandle,
  ScalarTypeDef,
  TypeDef,
  TypeModelConfig,
  TypeResolver,
  UnionTypeDef,
} from './typeModel';

export {
  getNamedTypeName,
  isNonNullTypeRef,
  listOf,
  namedType,
  nonNullOf,
  nullableOf,
  printTypeRef,
  typeRefFromAST,
} from './typeRefs';

export type {
  ListTypeRef,
  NamedTypeRef,
  NonNullTypeRef,
  NullableTypeRef,
  TypeRef,
} from './typeRefs';

export { toTypeModel, typeRefFromGraphQLType } from './toTypeModel';

export type { GraphQLResolveInfoWithSignal } from './toTypeModel';

export { defaultFieldResolver, defaultTypeResolver } from './defaultResolvers';
