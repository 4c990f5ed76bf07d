export { pathToArray as responsePathAsArray } from '../jsutils/Path';

export { Executor } from './executor';

export type {
  ExecutionContext,
  ExecutionResult,
  ExecutorArgs,
  ExecutorExecutionArgs,
  PlanExecutionArgs,
} from './executor';

export { execute, executeSync } from './execute';

export type { ExecutionArgs } from './execute';

export {
  compilePlan,
  getOperationSignature,
  selectOperation,
} from './compilePlan';

export type {
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
} from './compiledPlan';

export { printPlan } from './printPlan';

export { PlanCache } from './planCache';

export type {
  PlanCacheEntry,
  PlanCacheOptions,
  PlanCacheStats,
} from './planCache';

export { ErrorCollector } from './errorCollector';

export {
  collectFields,
  collectSubfields,
  shouldIncludeField,
} from './collectFields';

export type {
  CollectedFields,
  FieldOccurrence,
  Guard,
  GuardedSelectionSet,
  InclusionCondition,
} from './collectFields';

export {
  compileArgumentEvaluator,
  compileVariableDefinitions,
  getVariableValues,
} from './values';

export type {
  ArgumentEvaluator,
  CompiledVariableDefinition,
  VariableValues,
} from './values';
