export { isGraphQLError } from './isGraphQLError';

export {
  CompileError,
  CoercionError,
  CompletionError,
  DeadlineExceededError,
} from './executionErrors';

export type { CoercionErrorOptions } from './executionErrors';
