import type { ValueNode } from 'graphql';
import { GraphQLError, Kind } from 'graphql';

import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap, ReadOnlyObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import { addPath, pathToArray } from '../jsutils/Path';
import { keyMap } from '../jsutils/keyMap';

import { isGraphQLError } from '../error/isGraphQLError';

import type { TypeModel } from '../typeModel/typeModel';
import type { TypeRef } from '../typeModel/typeRefs';
import { printTypeRef } from '../typeModel/typeRefs';

import type { OnErrorCB } from './coerceInputValue';
import { getNamedInputType } from './getInputType';

/**
 * Produces the internal value of a literal found in a document, given its
 * input type. Variables within the literal are read from `variableValues`,
 * which holds already coerced values. A variable that has no runtime value
 * is treated as if the position were omitted.
 *
 * Returns `undefined` when the literal is invalid, after reporting each
 * problem through `onError`.
 */
export function coerceInputLiteral(
  typeModel: TypeModel,
  valueNode: ValueNode,
  type: TypeRef,
  variableValues: Maybe<ReadOnlyObjMap<unknown>>,
  onError: OnErrorCB,
): unknown {
  return coerceInputLiteralImpl(
    typeModel,
    valueNode,
    type,
    variableValues,
    onError,
    undefined,
  );
}

function isMissingVariable(
  valueNode: ValueNode,
  variableValues: Maybe<ReadOnlyObjMap<unknown>>,
): boolean {
  return (
    valueNode.kind === Kind.VARIABLE &&
    (variableValues == null ||
      !Object.prototype.hasOwnProperty.call(
        variableValues,
        valueNode.name.value,
      ))
  );
}

function coerceInputLiteralImpl(
  typeModel: TypeModel,
  valueNode: ValueNode,
  type: TypeRef,
  variableValues: Maybe<ReadOnlyObjMap<unknown>>,
  onError: OnErrorCB,
  path: Path | undefined,
): unknown {
  if (valueNode.kind === Kind.VARIABLE) {
    const value = variableValues?.[valueNode.name.value];
    if (value == null && type.kind === 'NON_NULL') {
      onError(
        pathToArray(path),
        valueNode,
        new GraphQLError(
          `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
        ),
      );
      return;
    }
    return value;
  }

  if (type.kind === 'NON_NULL') {
    if (valueNode.kind === Kind.NULL) {
      onError(
        pathToArray(path),
        valueNode,
        new GraphQLError(
          `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
        ),
      );
      return;
    }
    return coerceInputLiteralImpl(
      typeModel,
      valueNode,
      type.ofType,
      variableValues,
      onError,
      path,
    );
  }

  if (valueNode.kind === Kind.NULL) {
    return null;
  }

  if (type.kind === 'LIST') {
    const itemType = type.ofType;
    if (valueNode.kind === Kind.LIST) {
      return valueNode.values.map((itemNode, index) => {
        const itemPath = addPath(path, index, undefined);
        if (isMissingVariable(itemNode, variableValues)) {
          if (itemType.kind === 'NON_NULL') {
            onError(
              pathToArray(itemPath),
              itemNode,
              new GraphQLError(
                `Expected non-nullable type "${printTypeRef(
                  itemType,
                )}" not to be null.`,
              ),
            );
          }
          return null;
        }
        return coerceInputLiteralImpl(
          typeModel,
          itemNode,
          itemType,
          variableValues,
          onError,
          itemPath,
        );
      });
    }
    // Lists accept a non-list value as a list of one.
    return [
      coerceInputLiteralImpl(
        typeModel,
        valueNode,
        itemType,
        variableValues,
        onError,
        path,
      ),
    ];
  }

  const namedType = getNamedInputType(typeModel, type.name);

  if (namedType.kind === 'INPUT_OBJECT') {
    if (valueNode.kind !== Kind.OBJECT) {
      onError(
        pathToArray(path),
        valueNode,
        new GraphQLError(`Expected type "${namedType.name}" to be an object.`),
      );
      return;
    }

    const coercedValue: ObjMap<unknown> = {};
    const fieldNodes = keyMap(valueNode.fields, (field) => field.name.value);
    const fieldNames = new Set<string>();

    for (const field of namedType.fields) {
      fieldNames.add(field.name);
      const fieldNode = fieldNodes[field.name];

      if (
        fieldNode === undefined ||
        isMissingVariable(fieldNode.value, variableValues)
      ) {
        if (field.defaultValue !== undefined) {
          coercedValue[field.name] = field.defaultValue;
        } else if (field.type.kind === 'NON_NULL') {
          onError(
            pathToArray(path),
            valueNode,
            new GraphQLError(
              `Field "${field.name}" of required type "${printTypeRef(
                field.type,
              )}" was not provided.`,
            ),
          );
        }
        continue;
      }

      coercedValue[field.name] = coerceInputLiteralImpl(
        typeModel,
        fieldNode.value,
        field.type,
        variableValues,
        onError,
        addPath(path, field.name, namedType.name),
      );
    }

    for (const fieldNode of valueNode.fields) {
      if (!fieldNames.has(fieldNode.name.value)) {
        onError(
          pathToArray(path),
          valueNode,
          new GraphQLError(
            `Field "${fieldNode.name.value}" is not defined by type "${namedType.name}".`,
          ),
        );
      }
    }
    return coercedValue;
  }

  let parseResult;

  try {
    parseResult = namedType.parseLiteral(valueNode, variableValues);
  } catch (error) {
    if (isGraphQLError(error)) {
      onError(pathToArray(path), valueNode, error);
    } else {
      const originalError = error instanceof Error ? error : undefined;
      onError(
        pathToArray(path),
        valueNode,
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
      valueNode,
      new GraphQLError(`Expected type "${namedType.name}".`),
    );
  }
  return parseResult;
}
