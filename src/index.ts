/** Execute compiled GraphQL operations. */
export {
  Executor,
  execute,
  executeSync,
  compilePlan,
  getOperationSignature,
  selectOperation,
  printPlan,
  PlanCache,
  ErrorCollector,
  collectFields,
  collectSubfields,
  shouldIncludeField,
  compileArgumentEvaluator,
  compileVariableDefinitions,
  getVariableValues,
  responsePathAsArray,
} from './execution/index';

export type {
  ExecutionArgs,
  ExecutionContext,
  ExecutionResult,
  ExecutorArgs,
  ExecutorExecutionArgs,
  PlanExecutionArgs,
  AbstractCompletion,
  CompiledField,
  CompiledObjectPlan,
  CompiledPlan,
  CompiledResolverField,
  CompiledTypenameField,
  CompletionPlan,
  LeafCompletion,
  ListCompletion,
  NonNullCompletion,
  NullableCompletion,
  ObjectCompletion,
  PlanCacheEntry,
  PlanCacheOptions,
  PlanCacheStats,
  CollectedFields,
  FieldOccurrence,
  Guard,
  GuardedSelectionSet,
  InclusionCondition,
  ArgumentEvaluator,
  CompiledVariableDefinition,
  VariableValues,
} from './execution/index';

/** Executable view of a schema. */
export {
  TypeModel,
  toTypeModel,
  typeRefFromGraphQLType,
  typeRefFromAST,
  namedType,
  listOf,
  nonNullOf,
  nullableOf,
  isNonNullTypeRef,
  getNamedTypeName,
  printTypeRef,
  defaultFieldResolver,
  defaultTypeResolver,
} from './typeModel/index';

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
  ListTypeRef,
  NamedTypeRef,
  NonNullTypeRef,
  NullableTypeRef,
  TypeRef,
  GraphQLResolveInfoWithSignal,
} from './typeModel/index';

/** Coerce input values. */
export { coerceInputValue } from './utilities/coerceInputValue';
export { coerceInputLiteral } from './utilities/coerceInputLiteral';

/** Errors raised while compiling and executing. */
export {
  isGraphQLError,
  CompileError,
  CoercionError,
  CompletionError,
  DeadlineExceededError,
} from './error/index';

export type { CoercionErrorOptions } from './error/index';
