import type { GraphQLError } from 'graphql';

/**
 * Recognizes errors created by any installed copy of graphql-js.
 */
export function isGraphQLError(error: unknown): error is GraphQLError {
  return Object.prototype.toString.call(error) === '[object GraphQLError]';
}
