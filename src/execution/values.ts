import type {
  ArgumentNode,
  FieldNode,
  ValueNode,
  VariableDefinitionNode,
} from 'graphql';
import { GraphQLError, Kind, print } from 'graphql';

import type { ObjMap, ReadOnlyObjMap } from '../jsutils/ObjMap';
import { inspect } from '../jsutils/inspect';
import { keyMap } from '../jsutils/keyMap';
import { printPathArray } from '../jsutils/printPathArray';

import { CoercionError, CompileError } from '../error/executionErrors';

import type { ArgumentSpec, FieldSpec, TypeModel } from '../typeModel/typeModel';
import type { TypeRef } from '../typeModel/typeRefs';
import {
  getNamedTypeName,
  printTypeRef,
  typeRefFromAST,
} from '../typeModel/typeRefs';

import { coerceInputLiteral } from '../utilities/coerceInputLiteral';
import { coerceInputValue } from '../utilities/coerceInputValue';
import { isInputTypeName } from '../utilities/getInputType';

/**
 * Coerced variable values. A variable without a runtime value and without a
 * default is absent from the map, which is not the same as being `null`.
 */
export type VariableValues = ReadOnlyObjMap<unknown>;

export interface CompiledVariableDefinition {
  readonly name: string;
  readonly type: TypeRef;
  /** The coerced default, `undefined` when the definition has none. */
  readonly defaultValue: unknown;
  readonly node: VariableDefinitionNode;
}

/**
 * Produces the arguments of one field for one set of variable values. Throws
 * a `CoercionError` when an argument cannot be coerced.
 */
export type ArgumentEvaluator = (
  variableValues: VariableValues,
) => ObjMap<unknown>;

type ArgumentSetter = (
  args: ObjMap<unknown>,
  variableValues: VariableValues,
) => void;

type CoercedVariableValues =
  | { errors: ReadonlyArray<GraphQLError>; coerced?: never }
  | { coerced: VariableValues; errors?: never };

function hasOwnProperty(obj: unknown, prop: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, prop);
}

/**
 * Resolves the types and default values of an operation's variable
 * definitions once, so that each execution only coerces runtime inputs.
 */
export function compileVariableDefinitions(
  typeModel: TypeModel,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
): ReadonlyArray<CompiledVariableDefinition> {
  return varDefNodes.map((varDefNode) => {
    const name = varDefNode.variable.name.value;
    const type = typeRefFromAST(varDefNode.type);

    if (!isInputTypeName(typeModel, getNamedTypeName(type))) {
      throw new CompileError(
        `Variable "$${name}" expected value of type "${print(
          varDefNode.type,
        )}" which cannot be used as an input type.`,
        { nodes: varDefNode.type },
      );
    }

    let defaultValue: unknown;
    if (varDefNode.defaultValue) {
      const defaultValueNode = varDefNode.defaultValue;
      defaultValue = coerceInputLiteral(
        typeModel,
        defaultValueNode,
        type,
        undefined,
        (path, _invalidValue, error) => {
          let prefix =
            `Variable "$${name}" has invalid default value ` +
            print(defaultValueNode);
          if (path.length > 0) {
            prefix += ` at "${name}${printPathArray(path)}"`;
          }
          throw new CompileError(prefix + '; ' + error.message, {
            nodes: defaultValueNode,
            originalError: error.originalError,
          });
        },
      );
    }

    return Object.freeze({ name, type, defaultValue, node: varDefNode });
  });
}

/**
 * Prepares an object map of variableValues of the correct type based on the
 * provided variable definitions and arbitrary input. If the input cannot be
 * parsed to match the variable definitions, the errors are returned instead.
 *
 * Note: The returned value is a plain Object with a prototype, since it is
 * exposed to user code. Care should be taken to not pull values from the
 * Object prototype.
 *
 * @internal
 */
export function getVariableValues(
  typeModel: TypeModel,
  varDefs: ReadonlyArray<CompiledVariableDefinition>,
  inputs: { readonly [variable: string]: unknown },
  options?: { maxErrors?: number },
): CoercedVariableValues {
  const errors: Array<GraphQLError> = [];
  const maxErrors = options?.maxErrors;
  try {
    const coerced = coerceVariableValues(typeModel, varDefs, inputs, (error) => {
      if (maxErrors != null && errors.length >= maxErrors) {
        throw new GraphQLError(
          'Too many errors processing variables, error limit reached. Execution aborted.',
        );
      }
      errors.push(error);
    });

    if (errors.length === 0) {
      return { coerced };
    }
  } catch (error) {
    if (!(error instanceof GraphQLError)) {
      throw error;
    }
    errors.push(error);
  }

  return { errors };
}

function coerceVariableValues(
  typeModel: TypeModel,
  varDefs: ReadonlyArray<CompiledVariableDefinition>,
  inputs: { readonly [variable: string]: unknown },
  onError: (error: GraphQLError) => void,
): { [variable: string]: unknown } {
  const coercedValues: { [variable: string]: unknown } = {};
  for (const { name: varName, type: varType, defaultValue, node } of varDefs) {
    if (!hasOwnProperty(inputs, varName)) {
      if (defaultValue !== undefined) {
        coercedValues[varName] = defaultValue;
      } else if (varType.kind === 'NON_NULL') {
        onError(
          new GraphQLError(
            `Variable "$${varName}" of required type "${printTypeRef(
              varType,
            )}" was not provided.`,
            { nodes: node },
          ),
        );
      }
      continue;
    }

    const value = inputs[varName];
    if (value === null && varType.kind === 'NON_NULL') {
      onError(
        new GraphQLError(
          `Variable "$${varName}" of non-null type "${printTypeRef(
            varType,
          )}" must not be null.`,
          { nodes: node },
        ),
      );
      continue;
    }

    coercedValues[varName] = coerceInputValue(
      typeModel,
      value,
      varType,
      (path, invalidValue, error) => {
        let prefix =
          `Variable "$${varName}" got invalid value ` + inspect(invalidValue);
        if (path.length > 0) {
          prefix += ` at "${varName}${printPathArray(path)}"`;
        }
        onError(
          new GraphQLError(prefix + '; ' + error.message, {
            nodes: node,
            originalError: error.originalError,
          }),
        );
      },
    );
  }

  return coercedValues;
}

/**
 * Binds the arguments of a field selection to their definitions once.
 *
 * Literal values without variables are coerced here and shared by every
 * execution of the plan, so resolvers must not mutate their arguments.
 * Values that depend on variables are coerced on each call. A required
 * argument missing from the selection is reported as a `CompileError`.
 */
export function compileArgumentEvaluator(
  typeModel: TypeModel,
  fieldSpec: FieldSpec,
  fieldNode: FieldNode,
): ArgumentEvaluator {
  if (fieldSpec.args.length === 0) {
    return () => ({});
  }

  const argumentNodes = keyMap(
    fieldNode.arguments ?? [],
    (arg) => arg.name.value,
  );

  const setters: Array<ArgumentSetter> = [];
  for (const argSpec of fieldSpec.args) {
    const setter = compileArgumentSetter(
      typeModel,
      argSpec,
      argumentNodes[argSpec.name],
      fieldNode,
    );
    if (setter !== undefined) {
      setters.push(setter);
    }
  }

  return (variableValues) => {
    const args: ObjMap<unknown> = {};
    for (const setter of setters) {
      setter(args, variableValues);
    }
    return args;
  };
}

function compileArgumentSetter(
  typeModel: TypeModel,
  argSpec: ArgumentSpec,
  argumentNode: ArgumentNode | undefined,
  fieldNode: FieldNode,
): ArgumentSetter | undefined {
  const { name, type: argType, defaultValue } = argSpec;

  if (argumentNode === undefined) {
    if (defaultValue !== undefined) {
      return (args) => {
        args[name] = defaultValue;
      };
    }
    if (argType.kind === 'NON_NULL') {
      throw new CompileError(
        `Argument "${name}" of required type "${printTypeRef(
          argType,
        )}" was not provided.`,
        { nodes: fieldNode },
      );
    }
    return;
  }

  const valueNode = argumentNode.value;

  if (valueNode.kind === Kind.VARIABLE) {
    const variableName = valueNode.name.value;
    return (args, variableValues) => {
      if (!hasOwnProperty(variableValues, variableName)) {
        if (defaultValue !== undefined) {
          args[name] = defaultValue;
        } else if (argType.kind === 'NON_NULL') {
          throw new CoercionError(
            `Argument "${name}" of required type "${printTypeRef(
              argType,
            )}" was provided the variable "$${variableName}" which was not provided a runtime value.`,
            { nodes: valueNode, argumentName: name },
          );
        }
        return;
      }

      const value = variableValues[variableName];
      if (value === null && argType.kind === 'NON_NULL') {
        throw new CoercionError(
          `Argument "${name}" of non-null type "${printTypeRef(
            argType,
          )}" must not be null.`,
          { nodes: valueNode, argumentName: name },
        );
      }
      args[name] = value;
    };
  }

  if (!containsVariable(valueNode)) {
    let coerced: unknown;
    try {
      coerced = coerceArgumentLiteral(typeModel, argSpec, valueNode, {});
    } catch (error) {
      if (!(error instanceof CoercionError)) {
        throw error;
      }
      return () => {
        throw error;
      };
    }
    return (args) => {
      args[name] = coerced;
    };
  }

  return (args, variableValues) => {
    args[name] = coerceArgumentLiteral(
      typeModel,
      argSpec,
      valueNode,
      variableValues,
    );
  };
}

function coerceArgumentLiteral(
  typeModel: TypeModel,
  argSpec: ArgumentSpec,
  valueNode: ValueNode,
  variableValues: VariableValues,
): unknown {
  return coerceInputLiteral(
    typeModel,
    valueNode,
    argSpec.type,
    variableValues,
    (path, _invalidValue, error) => {
      let prefix =
        `Argument "${argSpec.name}" has invalid value ` + print(valueNode);
      if (path.length > 0) {
        prefix += ` at "${argSpec.name}${printPathArray(path)}"`;
      }
      throw new CoercionError(prefix + '; ' + error.message, {
        nodes: valueNode,
        originalError: error.originalError ?? error,
        argumentName: argSpec.name,
      });
    },
  );
}

function containsVariable(valueNode: ValueNode): boolean {
  switch (valueNode.kind) {
    case Kind.VARIABLE:
      return true;
    case Kind.LIST:
      return valueNode.values.some(containsVariable);
    case Kind.OBJECT:
      return valueNode.fields.some((field) => containsVariable(field.value));
    default:
      return false;
  }
}
