import type { GraphQLErrorOptions } from 'graphql';
import { GraphQLError } from 'graphql';

/**
 * A document or operation that cannot be turned into an execution plan:
 * unknown or ambiguous operations, unsupported operation kinds, fields the
 * schema does not define, conflicting response keys and required arguments
 * that are missing.
 */
export class CompileError extends GraphQLError {
  constructor(message: string, options: GraphQLErrorOptions = {}) {
    super(message, options);
    this.name = 'CompileError';
  }
}

export interface CoercionErrorOptions extends GraphQLErrorOptions {
  argumentName?: string | undefined;
}

/**
 * An argument value that does not satisfy its declared input type.
 */
export class CoercionError extends GraphQLError {
  readonly argumentName: string | undefined;

  constructor(message: string, options: CoercionErrorOptions = {}) {
    const { argumentName, ...errorOptions } = options;
    super(message, errorOptions);
    this.name = 'CoercionError';
    this.argumentName = argumentName;
  }
}

/**
 * A resolved value that cannot be completed against its declared output
 * type, such as a non-iterable value for a list position or an abstract
 * value that resolves to no possible object type.
 */
export class CompletionError extends GraphQLError {
  constructor(message: string, options: GraphQLErrorOptions = {}) {
    super(message, options);
    this.name = 'CompletionError';
  }
}

export class DeadlineExceededError extends GraphQLError {
  constructor(options: GraphQLErrorOptions = {}) {
    super('execution deadline exceeded', options);
    this.name = 'DeadlineExceededError';
  }
}
