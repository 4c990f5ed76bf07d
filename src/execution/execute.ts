import type { GraphQLSchema } from 'graphql';

import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { devAssert } from '../jsutils/devAssert';
import { isPromise } from '../jsutils/isPromise';
import { memoize1 } from '../jsutils/memoize1';

import type { ExecutionResult, ExecutorExecutionArgs } from './executor';
import { Executor } from './executor';

export interface ExecutionArgs extends ExecutorExecutionArgs {
  schema: GraphQLSchema;
}

const getExecutor = memoize1(
  (schema: GraphQLSchema) => new Executor({ schema }),
);

/**
 * Implements the "Executing requests" section of the GraphQL specification.
 *
 * Returns either a synchronous ExecutionResult (if all encountered resolvers
 * are synchronous), or a Promise of an ExecutionResult that will eventually be
 * resolved and never rejected.
 *
 * Executors, and so compiled plans, are shared per schema.
 */
export function execute(args: ExecutionArgs): PromiseOrValue<ExecutionResult> {
  const { schema, ...executorArgs } = args;

  // Schema must be provided.
  devAssert(schema, 'Must provide schema.');

  return getExecutor(schema).execute(executorArgs);
}

/**
 * Also implements the "Executing requests" section of the GraphQL specification.
 * However, it guarantees to complete synchronously (or throw an error) assuming
 * that all field resolvers are also synchronous.
 */
export function executeSync(args: ExecutionArgs): ExecutionResult {
  const result = execute(args);

  // Assert that the execution was synchronous.
  if (isPromise(result)) {
    throw new Error('GraphQL execution failed to complete synchronously.');
  }

  return result;
}
