import { GraphQLError } from 'graphql';

import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import { inspect } from '../jsutils/inspect';
import { isObjectLike } from '../jsutils/isObjectLike';
import { printPathArray } from '../jsutils/printPathArray';
import { addPath, pathToArray } from '../jsutils/Path';
import { isIterableObject } from '../jsutils/isIterableObject';

import { isGraphQLError } from '../error/isGraphQLError';

import type { TypeModel } from '../typeModel/typeModel';
import type { TypeRef } from '../typeModel/typeRefs';
import { printTypeRef } from '../typeModel/typeRefs';

import { getNamedInputType } from './getInputType';

export type OnErrorCB = (
  path: ReadonlyArray<string | number>,
  invalidValue: unknown,
  error: GraphQLError,
) => void;

/**
 * Coerces a JavaScript value given a GraphQL Input Type.
 */
export function coerceInputValue(
  typeModel: TypeModel,
  inputValue: unknown,
  type: TypeRef,
  onError: OnErrorCB = defaultOnError,
): unknown {
  return coerceInputValueImpl(typeModel, inputValue, type, onError, undefined);
}

function defaultOnError(
  path: ReadonlyArray<string | number>,
  invalidValue: unknown,
  error: GraphQLError,
): void {
  let errorPrefix = 'Invalid value ' + inspect(invalidValue);
  if (path.length > 0) {
    errorPrefix += ` at "value${printPathArray(path)}"`;
  }
  error.message = errorPrefix + ': ' + error.message;
  throw error;
}

function coerceInputValueImpl(
  typeModel: TypeModel,
  inputValue: unknown,
  type: TypeRef,
  onError: OnErrorCB,
  path: Path | undefined,
): unknown {
  if (type.kind === 'NON_NULL') {
    if (inputValue != null) {
      return coerceInputValueImpl(
        typeModel,
        inputValue,
        type.ofType,
        onError,
        path,
      );
    }
    onError(
      pathToArray(path),
      inputValue,
      new GraphQLError(
        `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
      ),
    );
    return;
  }

  if (inputValue == null) {
    // Explicitly return the value null.
    return null;
  }

  if (type.kind === 'LIST') {
    const itemType = type.ofType;
    if (isIterableObject(inputValue)) {
      return Array.from(inputValue, (itemValue, index) =>
        coerceInputValueImpl(
          typeModel,
          itemValue,
          itemType,
          onError,
          addPath(path, index, undefined),
        ),
      );
    }
    // Lists accept a non-list value as a list of one.
    return [
      coerceInputValueImpl(typeModel, inputValue, itemType, onError, path),
    ];
  }

  const namedType = getNamedInputType(typeModel, type.name);

  if (namedType.kind === 'INPUT_OBJECT') {
    if (!isObjectLike(inputValue)) {
      onError(
        pathToArray(path),
        inputValue,
        new GraphQLError(`Expected type "${namedType.name}" to be an object.`),
      );
      return;
    }

    const coercedValue: ObjMap<unknown> = {};
    const fieldNames = new Set<string>();

    for (const field of namedType.fields) {
      fieldNames.add(field.name);
      const fieldValue = inputValue[field.name];

      if (fieldValue === undefined) {
        if (field.defaultValue !== undefined) {
          coercedValue[field.name] = field.defaultValue;
        } else if (field.type.kind === 'NON_NULL') {
          onError(
            pathToArray(path),
            inputValue,
            new GraphQLError(
              `Field "${field.name}" of required type "${printTypeRef(
                field.type,
              )}" was not provided.`,
            ),
          );
        }
        continue;
      }

      coercedValue[field.name] = coerceInputValueImpl(
        typeModel,
        fieldValue,
        field.type,
        onError,
        addPath(path, field.name, namedType.name),
      );
    }

    // Ensure every provided field is defined.
    for (const fieldName of Object.keys(inputValue)) {
      if (!fieldNames.has(fieldName)) {
        onError(
          pathToArray(path),
          inputValue,
          new GraphQLError(
            `Field "${fieldName}" is not defined by type "${namedType.name}".`,
          ),
        );
      }
    }
    return coercedValue;
  }

  let parseResult;

  // Scalars and Enums determine if a input value is valid via parseValue(),
  // which can throw to indicate failure. If it throws, maintain a reference
  // to the original error.
  try {
    parseResult = namedType.parseValue(inputValue);
  } catch (error) {
    if (isGraphQLError(error)) {
      onError(pathToArray(path), inputValue, error);
    } else {
      const originalError = error instanceof Error ? error : undefined;
      onError(
        pathToArray(path),
        inputValue,
        new GraphQLError(
          `Expected type "${namedType.name}". ` +
            (originalError?.message ?? String(error)),
          { originalError },
        ),
      );
    }
    return;
  }
  if (parseResult === undefined) {
    onError(
      pathToArray(path),
      inputValue,
      new GraphQLError(`Expected type "${namedType.name}".`),
    );
  }
  return parseResult;
}
