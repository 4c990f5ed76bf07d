import { Logger } from '@graphql-hive/logger';
import type { DocumentNode, GraphQLSchema } from 'graphql';
import { GraphQLError, OperationTypeNode, locatedError } from 'graphql';

import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { addPath, pathToArray } from '../jsutils/Path';
import { devAssert } from '../jsutils/devAssert';
import { inspect } from '../jsutils/inspect';
import { isIterableObject } from '../jsutils/isIterableObject';
import { isObjectLike } from '../jsutils/isObjectLike';
import { isPromise } from '../jsutils/isPromise';
import { promiseReduce } from '../jsutils/promiseReduce';
import { toError } from '../jsutils/toError';

import {
  CompletionError,
  DeadlineExceededError,
} from '../error/executionErrors';
import { isGraphQLError } from '../error/isGraphQLError';

import type {
  LeafTypeDef,
  ResolveInfo,
  TypeModel,
} from '../typeModel/typeModel';
import { toTypeModel } from '../typeModel/toTypeModel';

import type {
  AbstractCompletion,
  CompiledField,
  CompiledObjectPlan,
  CompiledPlan,
  CompiledResolverField,
  CompletionPlan,
  ListCompletion,
  NullableCompletion,
} from './compiledPlan';
import { shouldIncludeField } from './collectFields';
import { compilePlan, getOperationSignature } from './compilePlan';
import { ErrorCollector } from './errorCollector';
import type { PlanCacheOptions } from './planCache';
import { PlanCache } from './planCache';
import type { VariableValues } from './values';
import { getVariableValues } from './values';

/**
 * Terminology
 *
 * "Positions" are the places in a response where a value is completed: a
 * field of an object, or an item of a list. Each position has a completion
 * plan, which is non-null or nullable.
 *
 * A position that fails yields FAILED instead of a value. A nullable
 * position turns FAILED into `null`; a non-null position hands it to the
 * enclosing position, so that a failure travels up to the nearest nullable
 * position. The error itself is recorded once, where the failure started.
 */

export interface ExecutorArgs {
  schema?: GraphQLSchema;
  typeModel?: TypeModel;
  cache?: PlanCache | PlanCacheOptions;
  logger?: Logger;
}

export interface PlanExecutionArgs {
  rootValue?: unknown;
  contextValue?: unknown;
  variableValues?: Maybe<{ readonly [variable: string]: unknown }>;
  /** Epoch milliseconds after which the execution is abandoned. */
  deadline?: Maybe<number>;
}

export interface ExecutorExecutionArgs extends PlanExecutionArgs {
  document: DocumentNode;
  operationName?: Maybe<string>;
}

export interface ExecutionResult {
  errors?: ReadonlyArray<GraphQLError>;
  data?: ObjMap<unknown> | null;
}

/**
 * Data that must be available at all points during query execution.
 */
export interface ExecutionContext {
  plan: CompiledPlan;
  rootValue: unknown;
  contextValue: unknown;
  variableValues: VariableValues;
  errors: ErrorCollector;
  signal: AbortSignal | undefined;
}

// Longer delays overflow the timer and fire at once.
const MAX_TIMEOUT_DELAY = 2 ** 31 - 1;

const FAILED: unique symbol = Symbol('FAILED');

type Failed = typeof FAILED;

interface SerialResults {
  keys: Array<string>;
  values: Array<unknown>;
}

function buildObject(
  keys: ReadonlyArray<string>,
  values: ReadonlyArray<unknown>,
): ObjMap<unknown> | Failed {
  const results: ObjMap<unknown> = Object.create(null);
  for (let i = 0; i < keys.length; i++) {
    const value = values[i];
    if (value === FAILED) {
      return FAILED;
    }
    results[keys[i]] = value;
  }
  return results;
}

function buildList(values: Array<unknown>): Array<unknown> | Failed {
  return values.includes(FAILED) ? FAILED : values;
}

function buildDeadlineExceededResult(): ExecutionResult {
  return { errors: [new DeadlineExceededError()], data: null };
}

/**
 * Executes compiled plans against a type model, compiling documents into
 * plans through a signature-keyed cache.
 */
export class Executor {
  private readonly _typeModel: TypeModel;
  private readonly _cache: PlanCache;
  private readonly _logger: Logger;

  constructor(executorArgs: ExecutorArgs) {
    const { schema, typeModel, cache, logger } = executorArgs;

    if (typeModel !== undefined) {
      this._typeModel = typeModel;
    } else {
      // Schema must be provided.
      devAssert(schema, 'Must provide schema.');
      this._typeModel = toTypeModel(schema);
    }

    this._logger = logger ?? new Logger({ level: false });
    this._cache =
      cache instanceof PlanCache
        ? cache
        : new PlanCache({ logger: this._logger, ...cache });
  }

  get typeModel(): TypeModel {
    return this._typeModel;
  }

  get cache(): PlanCache {
    return this._cache;
  }

  /**
   * Returns the plan for an operation of a document, compiling it on a
   * cache miss. Throws a `CompileError` when the operation cannot be
   * compiled.
   */
  compile(document: DocumentNode, operationName?: Maybe<string>): CompiledPlan {
    const signature = getOperationSignature(document, operationName);
    return this._cache.getOrCompile(signature, () => {
      const start = performance.now();
      const plan = compilePlan(
        this._typeModel,
        document,
        operationName,
        signature,
      );
      this._logger.debug(
        {
          signature,
          operationName: plan.operationName,
          durationMs: performance.now() - start,
        },
        'Compiled execution plan',
      );
      return plan;
    });
  }

  /**
   * Implements the "Executing requests" section of the GraphQL specification.
   *
   * Returns either a synchronous ExecutionResult (if all encountered resolvers
   * are synchronous), or a Promise of an ExecutionResult that will eventually
   * be resolved and never rejected.
   *
   * If the arguments to this function do not result in a legal execution
   * context, a GraphQLError will be returned in the result.
   */
  execute(args: ExecutorExecutionArgs): PromiseOrValue<ExecutionResult> {
    const { document, operationName, ...executionArgs } = args;

    // If arguments are missing or incorrect, throw an error.
    devAssert(document, 'Must provide document.');

    let plan: CompiledPlan;
    try {
      plan = this.compile(document, operationName);
    } catch (error) {
      if (!isGraphQLError(error)) {
        throw error;
      }
      this._logger.debug(
        { operationName, error: error.message },
        'Operation failed to compile',
      );
      return { errors: [error] };
    }

    return this.executePlan(plan, executionArgs);
  }

  executePlan(
    plan: CompiledPlan,
    args: PlanExecutionArgs = {},
  ): PromiseOrValue<ExecutionResult> {
    const { rootValue, contextValue, variableValues, deadline } = args;

    devAssert(
      variableValues == null || isObjectLike(variableValues),
      'Variables must be provided as an Object where each property is a variable value. Perhaps look to see if an unparsed JSON string was provided.',
    );

    const coercedVariableValues = getVariableValues(
      this._typeModel,
      plan.variableDefinitions,
      variableValues ?? {},
      { maxErrors: 50 },
    );

    if (coercedVariableValues.errors) {
      return { errors: coercedVariableValues.errors };
    }

    if (deadline != null && Date.now() >= deadline) {
      this._logger.warn(
        { signature: plan.signature, operationName: plan.operationName },
        'Execution deadline passed before execution started',
      );
      return buildDeadlineExceededResult();
    }

    const controller = deadline == null ? undefined : new AbortController();
    const exeContext: ExecutionContext = {
      plan,
      rootValue,
      contextValue,
      variableValues: coercedVariableValues.coerced,
      errors: new ErrorCollector(),
      signal: controller?.signal,
    };

    const result = this.executeOperation(exeContext);
    if (deadline == null || controller === undefined || !isPromise(result)) {
      return result;
    }
    return this.raceDeadline(exeContext, result, deadline, controller);
  }

  /**
   * Settles with the execution result, or with a deadline error once the
   * deadline passes. On expiry the execution's signal is aborted so that no
   * further resolver is invoked.
   */
  raceDeadline(
    exeContext: ExecutionContext,
    result: Promise<ExecutionResult>,
    deadline: number,
    controller: AbortController,
  ): Promise<ExecutionResult> {
    return new Promise((resolve, reject) => {
      let timeout: ReturnType<typeof setTimeout> | undefined;
      const arm = (): void => {
        const remaining = deadline - Date.now();
        if (remaining > 0) {
          timeout = setTimeout(arm, Math.min(remaining, MAX_TIMEOUT_DELAY));
          return;
        }
        controller.abort();
        this._logger.warn(
          {
            signature: exeContext.plan.signature,
            operationName: exeContext.plan.operationName,
          },
          'Execution deadline exceeded',
        );
        resolve(buildDeadlineExceededResult());
      };
      arm();

      result.then(
        (executionResult) => {
          clearTimeout(timeout);
          resolve(executionResult);
        },
        (error) => {
          clearTimeout(timeout);
          reject(error);
        },
      );
    });
  }

  /**
   * Implements the "Executing operations" section of the spec.
   */
  executeOperation(
    exeContext: ExecutionContext,
  ): PromiseOrValue<ExecutionResult> {
    const { plan, rootValue } = exeContext;

    let data: PromiseOrValue<ObjMap<unknown> | Failed>;
    try {
      data =
        plan.operationType === OperationTypeNode.MUTATION
          ? this.executeFieldsSerially(exeContext, plan.root, rootValue)
          : this.executeFields(exeContext, plan.root, rootValue, undefined);
    } catch (error) {
      exeContext.errors.record(locatedError(toError(error), plan.operation));
      return this.buildResponse(exeContext, FAILED);
    }

    if (isPromise(data)) {
      return data.then(
        (resolved) => this.buildResponse(exeContext, resolved),
        (error) => {
          exeContext.errors.record(locatedError(toError(error), plan.operation));
          return this.buildResponse(exeContext, FAILED);
        },
      );
    }
    return this.buildResponse(exeContext, data);
  }

  /**
   * Given a completed execution context and data, build the `{ errors, data }`
   * response defined by the "Response" section of the GraphQL specification.
   */
  buildResponse(
    exeContext: ExecutionContext,
    data: ObjMap<unknown> | Failed,
  ): ExecutionResult {
    const errors = exeContext.errors.errors;
    const responseData = data === FAILED ? null : data;
    return errors.length === 0
      ? { data: responseData }
      : { errors, data: responseData };
  }

  /**
   * Implements the "Executing selection sets" section of the spec
   * for fields that must be executed serially.
   */
  executeFieldsSerially(
    exeContext: ExecutionContext,
    plan: CompiledObjectPlan,
    source: unknown,
  ): PromiseOrValue<ObjMap<unknown> | Failed> {
    const results = promiseReduce(
      plan.fields.entries(),
      (serialResults: SerialResults, [order, field]) => {
        if (
          field.guards !== undefined &&
          !shouldIncludeField(field.guards, exeContext.variableValues)
        ) {
          return serialResults;
        }
        const fieldPath = addPath(
          undefined,
          field.responseKey,
          plan.type.name,
          order,
        );
        const result = this.executeField(exeContext, field, source, fieldPath);
        if (isPromise(result)) {
          return result.then((resolved) => {
            serialResults.keys.push(field.responseKey);
            serialResults.values.push(resolved);
            return serialResults;
          });
        }
        serialResults.keys.push(field.responseKey);
        serialResults.values.push(result);
        return serialResults;
      },
      { keys: [], values: [] },
    );

    if (isPromise(results)) {
      return results.then(({ keys, values }) => buildObject(keys, values));
    }
    return buildObject(results.keys, results.values);
  }

  /**
   * Implements the "Executing selection sets" section of the spec
   * for fields that may be executed in parallel.
   *
   * Every included field is evaluated, even after a sibling failed, and
   * pending values are joined once.
   */
  executeFields(
    exeContext: ExecutionContext,
    plan: CompiledObjectPlan,
    source: unknown,
    path: Path | undefined,
  ): PromiseOrValue<ObjMap<unknown> | Failed> {
    const keys: Array<string> = [];
    const values: Array<unknown> = [];
    let containsPromise = false;

    const fields = plan.fields;
    for (let order = 0; order < fields.length; order++) {
      const field = fields[order];
      if (
        field.guards !== undefined &&
        !shouldIncludeField(field.guards, exeContext.variableValues)
      ) {
        continue;
      }

      const fieldPath = addPath(path, field.responseKey, plan.type.name, order);
      const result = this.executeField(exeContext, field, source, fieldPath);
      if (isPromise(result)) {
        containsPromise = true;
      }
      keys.push(field.responseKey);
      values.push(result);
    }

    if (!containsPromise) {
      return buildObject(keys, values);
    }

    return Promise.all(values).then((resolved) => buildObject(keys, resolved));
  }

  /**
   * Implements the "Executing fields" section of the spec
   * In particular, this function figures out the value that the field returns by
   * calling its resolve function, then calls completeValue to complete promises,
   * serialize scalars, or execute the sub-selection-set for objects.
   */
  executeField(
    exeContext: ExecutionContext,
    field: CompiledField,
    source: unknown,
    path: Path,
  ): PromiseOrValue<unknown> {
    if (field.kind === 'typename') {
      return field.parentTypeName;
    }

    const info = this.buildResolveInfo(exeContext, field, path);
    const completion = field.completion;

    let result: unknown;
    try {
      if (exeContext.signal?.aborted) {
        throw new DeadlineExceededError();
      }

      // Build a JS object of arguments from the field.arguments AST, using the
      // variables scope to fulfill any variable references.
      const args = field.argumentEvaluator(exeContext.variableValues);

      const resolver = field.resolver;
      result =
        resolver.kind === 'async'
          ? Promise.resolve(
              resolver.resolve(source, args, exeContext.contextValue, info),
            )
          : resolver.resolve(source, args, exeContext.contextValue, info);
    } catch (rawError) {
      return this.handleFieldError(exeContext, rawError, field, completion, path);
    }

    if (isPromise(result)) {
      return result.then(
        (resolved) =>
          this.completePosition(exeContext, field, completion, info, path, resolved),
        (rawError) =>
          this.handleFieldError(exeContext, rawError, field, completion, path),
      );
    }

    return this.completePosition(exeContext, field, completion, info, path, result);
  }

  buildResolveInfo(
    exeContext: ExecutionContext,
    field: CompiledResolverField,
    path: Path,
  ): ResolveInfo {
    const { plan } = exeContext;
    // The resolve function's optional fourth argument is a collection of
    // information about the current execution state.
    return {
      fieldName: field.fieldName,
      fieldNodes: field.fieldNodes,
      returnType: field.returnType,
      parentType: field.parentTypeName,
      path,
      typeModel: this._typeModel,
      fragments: plan.fragments,
      rootValue: exeContext.rootValue,
      operation: plan.operation,
      variableValues: exeContext.variableValues,
      signal: exeContext.signal,
    };
  }

  /**
   * Records an error raised at a position. The position then fails when it
   * is non-null, and is `null` otherwise.
   */
  handleFieldError(
    exeContext: ExecutionContext,
    rawError: unknown,
    field: CompiledResolverField,
    completion: CompletionPlan,
    path: Path,
  ): null | Failed {
    const error = locatedError(
      toError(rawError),
      field.fieldNodes,
      pathToArray(path),
    );
    exeContext.errors.record(error, path);
    return completion.kind === 'NON_NULL' ? FAILED : null;
  }

  /**
   * Completes the value of one position, a field or a list item, and
   * applies its nullability.
   */
  completePosition(
    exeContext: ExecutionContext,
    field: CompiledResolverField,
    completion: CompletionPlan,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<unknown> {
    let completed: PromiseOrValue<unknown>;
    try {
      completed = this.completeValue(
        exeContext,
        field,
        completion.kind === 'NON_NULL' ? completion.ofType : completion,
        info,
        path,
        result,
      );
    } catch (rawError) {
      return this.handleFieldError(exeContext, rawError, field, completion, path);
    }

    if (isPromise(completed)) {
      return completed.then(
        (resolved) =>
          this.applyNullability(exeContext, field, completion, path, resolved),
        (rawError) =>
          this.handleFieldError(exeContext, rawError, field, completion, path),
      );
    }

    return this.applyNullability(exeContext, field, completion, path, completed);
  }

  applyNullability(
    exeContext: ExecutionContext,
    field: CompiledResolverField,
    completion: CompletionPlan,
    path: Path,
    completed: unknown,
  ): unknown {
    if (completion.kind !== 'NON_NULL') {
      return completed === FAILED ? null : completed;
    }

    if (completed === null) {
      exeContext.errors.record(
        new GraphQLError(
          `Cannot return null for non-nullable field ${field.parentTypeName}.${field.fieldName}.`,
          { nodes: field.fieldNodes, path: pathToArray(path) },
        ),
        path,
      );
      return FAILED;
    }

    return completed;
  }

  /**
   * Implements the instructions for completeValue as defined in the
   * "Value Completion" section of the spec, for a nullable position.
   *
   * If the field type is a List, then this recursively completes the value
   * for the inner type on each item in the list.
   *
   * If the field type is a Scalar or Enum, ensures the completed value is a legal
   * value of the type by calling the `serialize` method of GraphQL type
   * definition.
   *
   * If the field is an abstract type, determine the runtime type of the value
   * and then complete based on that type
   *
   * Otherwise, the field type expects a sub-selection set, and will complete the
   * value by executing all sub-selections.
   */
  completeValue(
    exeContext: ExecutionContext,
    field: CompiledResolverField,
    completion: NullableCompletion,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<unknown> {
    // If result is an Error, throw a located error.
    if (result instanceof Error) {
      throw result;
    }

    // If result value is null or undefined then return null.
    if (result == null) {
      return null;
    }

    switch (completion.kind) {
      case 'LEAF':
        return this.completeLeafValue(completion.type, field, path, result);
      case 'LIST':
        return this.completeListValue(
          exeContext,
          field,
          completion,
          info,
          path,
          result,
        );
      case 'OBJECT':
        return this.completeObjectValue(
          exeContext,
          completion.plan,
          field,
          info,
          path,
          result,
        );
      case 'ABSTRACT':
        return this.completeAbstractValue(
          exeContext,
          completion,
          field,
          info,
          path,
          result,
        );
    }
  }

  /**
   * Complete a list value by completing each item in the list with the
   * inner type
   */
  completeListValue(
    exeContext: ExecutionContext,
    field: CompiledResolverField,
    completion: ListCompletion,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<Array<unknown> | Failed> {
    if (!isIterableObject(result)) {
      throw new CompletionError(
        `Expected Iterable, but did not find one for field "${field.parentTypeName}.${field.fieldName}".`,
        { nodes: field.fieldNodes, path: pathToArray(path) },
      );
    }

    const itemCompletion = completion.ofType;

    // This is specified as a simple map, however we're optimizing the path
    // where the list contains no Promises by avoiding creating another Promise.
    let containsPromise = false;
    const completedResults: Array<unknown> = [];
    let index = 0;
    for (const item of result) {
      // No need to modify the info object containing the path,
      // since from here on it is not ever accessed by resolver functions.
      const itemPath = addPath(path, index, undefined);

      let completedItem: PromiseOrValue<unknown>;
      if (isPromise(item)) {
        completedItem = item.then(
          (resolved) =>
            this.completePosition(
              exeContext,
              field,
              itemCompletion,
              info,
              itemPath,
              resolved,
            ),
          (rawError) =>
            this.handleFieldError(
              exeContext,
              rawError,
              field,
              itemCompletion,
              itemPath,
            ),
        );
      } else {
        completedItem = this.completePosition(
          exeContext,
          field,
          itemCompletion,
          info,
          itemPath,
          item,
        );
      }

      if (isPromise(completedItem)) {
        containsPromise = true;
      }
      completedResults.push(completedItem);
      index++;
    }

    if (!containsPromise) {
      return buildList(completedResults);
    }

    return Promise.all(completedResults).then(buildList);
  }

  /**
   * Complete a Scalar or Enum by serializing to a valid value, returning
   * null if serialization is not possible.
   */
  completeLeafValue(
    returnType: LeafTypeDef,
    field: CompiledResolverField,
    path: Path,
    result: unknown,
  ): unknown {
    const serializedResult = returnType.serialize(result);
    if (serializedResult == null) {
      throw new CompletionError(
        `Expected \`${returnType.name}.serialize(${inspect(result)})\` to ` +
          `return non-nullable value, returned: ${inspect(serializedResult)}`,
        { nodes: field.fieldNodes, path: pathToArray(path) },
      );
    }
    return serializedResult;
  }

  /**
   * Complete a value of an abstract type by determining the runtime object type
   * of that value, then complete the value for that type.
   */
  completeAbstractValue(
    exeContext: ExecutionContext,
    completion: AbstractCompletion,
    field: CompiledResolverField,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown> | Failed> {
    const runtimeTypeName = this._typeModel.resolveConcreteType(
      result,
      completion.type,
      exeContext.contextValue,
      info,
    );

    if (isPromise(runtimeTypeName)) {
      return runtimeTypeName.then((resolvedRuntimeTypeName) =>
        this.completeObjectValue(
          exeContext,
          this.ensureValidRuntimeType(
            resolvedRuntimeTypeName,
            completion,
            field,
            path,
            result,
          ),
          field,
          info,
          path,
          result,
        ),
      );
    }

    return this.completeObjectValue(
      exeContext,
      this.ensureValidRuntimeType(
        runtimeTypeName,
        completion,
        field,
        path,
        result,
      ),
      field,
      info,
      path,
      result,
    );
  }

  ensureValidRuntimeType(
    runtimeTypeName: unknown,
    completion: AbstractCompletion,
    field: CompiledResolverField,
    path: Path,
    result: unknown,
  ): CompiledObjectPlan {
    const abstractTypeName = completion.type.name;
    const errorOptions = { nodes: field.fieldNodes, path: pathToArray(path) };

    if (runtimeTypeName == null) {
      throw new CompletionError(
        `Abstract type "${abstractTypeName}" must resolve to an Object type at runtime for field "${field.parentTypeName}.${field.fieldName}". Either the "${abstractTypeName}" type should provide a "resolveType" function or each possible type should provide an "isTypeOf" function.`,
        errorOptions,
      );
    }

    if (typeof runtimeTypeName !== 'string') {
      throw new CompletionError(
        `Abstract type "${abstractTypeName}" must resolve to an Object type at runtime for field "${field.parentTypeName}.${field.fieldName}" with ` +
          `value ${inspect(result)}, received "${inspect(runtimeTypeName)}".`,
        errorOptions,
      );
    }

    const runtimeType = this._typeModel.getType(runtimeTypeName);
    if (runtimeType === undefined) {
      throw new CompletionError(
        `Abstract type "${abstractTypeName}" was resolved to a type "${runtimeTypeName}" that does not exist inside the schema.`,
        errorOptions,
      );
    }

    if (runtimeType.kind !== 'OBJECT') {
      throw new CompletionError(
        `Abstract type "${abstractTypeName}" was resolved to a non-object type "${runtimeTypeName}".`,
        errorOptions,
      );
    }

    const plan = completion.plans[runtimeTypeName];
    if (plan === undefined) {
      throw new CompletionError(
        `Runtime Object type "${runtimeTypeName}" is not a possible type for "${abstractTypeName}".`,
        errorOptions,
      );
    }

    return plan;
  }

  /**
   * Complete an Object value by executing all sub-selections.
   */
  completeObjectValue(
    exeContext: ExecutionContext,
    plan: CompiledObjectPlan,
    field: CompiledResolverField,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown> | Failed> {
    // If there is an isTypeOf predicate function, call it with the
    // current result. If isTypeOf returns false, then raise an error rather
    // than continuing execution.
    const isTypeOf = plan.type.isTypeOf;
    if (isTypeOf) {
      const isTypeOfResult = isTypeOf(result, exeContext.contextValue, info);

      if (isPromise(isTypeOfResult)) {
        return isTypeOfResult.then((resolvedIsTypeOf) => {
          if (!resolvedIsTypeOf) {
            throw invalidReturnTypeError(plan, field, path, result);
          }
          return this.executeFields(exeContext, plan, result, path);
        });
      }

      if (!isTypeOfResult) {
        throw invalidReturnTypeError(plan, field, path, result);
      }
    }

    return this.executeFields(exeContext, plan, result, path);
  }
}

function invalidReturnTypeError(
  plan: CompiledObjectPlan,
  field: CompiledResolverField,
  path: Path,
  result: unknown,
): CompletionError {
  return new CompletionError(
    `Expected value of type "${plan.type.name}" but got: ${inspect(result)}.`,
    { nodes: field.fieldNodes, path: pathToArray(path) },
  );
}
