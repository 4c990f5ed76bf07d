import { createHash } from 'node:crypto';

import type {
  DocumentNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
  SelectionSetNode,
} from 'graphql';
import { Kind, OperationTypeNode, print } from 'graphql';

import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap, ReadOnlyObjMap } from '../jsutils/ObjMap';
import { invariant } from '../jsutils/invariant';
import { memoize1 } from '../jsutils/memoize1';

import { CompileError } from '../error/executionErrors';

import type { ObjectTypeDef, TypeModel } from '../typeModel/typeModel';
import type { NullableTypeRef, TypeRef } from '../typeModel/typeRefs';

import type {
  CompiledField,
  CompiledObjectPlan,
  CompiledPlan,
  CompletionPlan,
  NullableCompletion,
} from './compiledPlan';
import type { CollectedFields, FieldOccurrence } from './collectFields';
import {
  collectFields,
  collectSubfields,
  mergeGuards,
} from './collectFields';
import {
  compileArgumentEvaluator,
  compileVariableDefinitions,
} from './values';

interface DocumentDefinitions {
  operations: ReadonlyArray<OperationDefinitionNode>;
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
}

interface CompilationContext {
  typeModel: TypeModel;
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
}

const splitDefinitions = memoize1(
  (document: DocumentNode): DocumentDefinitions => {
    const operations: Array<OperationDefinitionNode> = [];
    const fragments: ObjMap<FragmentDefinitionNode> = Object.create(null);
    for (const definition of document.definitions) {
      switch (definition.kind) {
        case Kind.OPERATION_DEFINITION:
          operations.push(definition);
          break;
        case Kind.FRAGMENT_DEFINITION:
          fragments[definition.name.value] = definition;
          break;
        default:
        // ignore non-executable definitions
      }
    }
    return { operations, fragments };
  },
);

/**
 * Selects the operation to run from a document, along with the document's
 * fragments. Throws a `CompileError` when the choice is ambiguous or the
 * named operation does not exist.
 */
export function selectOperation(
  document: DocumentNode,
  operationName?: Maybe<string>,
): {
  operation: OperationDefinitionNode;
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
} {
  const { operations, fragments } = splitDefinitions(document);

  let operation: OperationDefinitionNode | undefined;
  for (const possibleOperation of operations) {
    if (operationName == null) {
      if (operation !== undefined) {
        throw new CompileError(
          'Must provide operation name if query contains multiple operations.',
        );
      }
      operation = possibleOperation;
    } else if (possibleOperation.name?.value === operationName) {
      operation = possibleOperation;
    }
  }

  if (!operation) {
    if (operationName != null) {
      throw new CompileError(`Unknown operation named "${operationName}".`);
    }
    throw new CompileError('Must provide an operation.');
  }

  return { operation, fragments };
}

/**
 * Computes the cache key of an operation: a SHA-256 digest of the printed
 * operation followed by every fragment it references, sorted by name.
 * Printing normalizes whitespace and comments away, so formatting
 * differences share a signature.
 */
export function getOperationSignature(
  document: DocumentNode,
  operationName?: Maybe<string>,
): string {
  const { operation, fragments } = selectOperation(document, operationName);

  const fragmentNames = new Set<string>();
  collectFragmentNames(operation.selectionSet, fragments, fragmentNames);

  const parts = [print(operation)];
  for (const fragmentName of [...fragmentNames].sort()) {
    parts.push(print(fragments[fragmentName]));
  }

  return createHash('sha256').update(parts.join('\n')).digest('hex');
}

function collectFragmentNames(
  selectionSet: SelectionSetNode,
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>,
  fragmentNames: Set<string>,
): void {
  for (const selection of selectionSet.selections) {
    if (selection.kind === Kind.FRAGMENT_SPREAD) {
      const fragmentName = selection.name.value;
      const fragment = fragments[fragmentName];
      if (!fragmentNames.has(fragmentName) && fragment !== undefined) {
        fragmentNames.add(fragmentName);
        collectFragmentNames(fragment.selectionSet, fragments, fragmentNames);
      }
    } else if (selection.selectionSet) {
      collectFragmentNames(selection.selectionSet, fragments, fragmentNames);
    }
  }
}

/**
 * Compiles an operation of a document against a type model.
 *
 * Compilation resolves every selection against the types it can apply to:
 * fragments are inlined, field definitions and resolvers are looked up,
 * arguments are bound, and one object plan is built per possible type of
 * each abstract position. Nothing here depends on variable values; `@skip`
 * and `@include` on variables become guards that the executor checks.
 */
export function compilePlan(
  typeModel: TypeModel,
  document: DocumentNode,
  operationName?: Maybe<string>,
  signature: string = getOperationSignature(document, operationName),
): CompiledPlan {
  const { operation, fragments } = selectOperation(document, operationName);

  if (operation.operation === OperationTypeNode.SUBSCRIPTION) {
    throw new CompileError('Subscription operations are not supported.', {
      nodes: operation,
    });
  }

  const rootTypeName = typeModel.getRootTypeName(operation.operation);
  const rootType =
    rootTypeName === undefined
      ? undefined
      : typeModel.getObjectType(rootTypeName);
  if (rootType === undefined) {
    throw new CompileError(
      `Schema is not configured to execute ${operation.operation} operation.`,
      { nodes: operation },
    );
  }

  const variableDefinitions = compileVariableDefinitions(
    typeModel,
    operation.variableDefinitions ?? [],
  );

  const context: CompilationContext = { typeModel, fragments };
  const root = compileObjectPlan(
    context,
    rootType,
    collectFields(typeModel, fragments, rootType.name, [
      { selectionSet: operation.selectionSet, guard: [] },
    ]),
  );

  const plan: CompiledPlan = {
    signature,
    operation,
    operationType: operation.operation,
    operationName: operation.name?.value,
    fragments,
    variableDefinitions: Object.freeze(variableDefinitions),
    root,
  };
  return Object.freeze(plan);
}

function compileObjectPlan(
  context: CompilationContext,
  type: ObjectTypeDef,
  collected: CollectedFields,
): CompiledObjectPlan {
  const fields: Array<CompiledField> = [];
  for (const [responseKey, occurrences] of collected) {
    fields.push(compileField(context, type, responseKey, occurrences));
  }

  const plan: CompiledObjectPlan = { type, fields: Object.freeze(fields) };
  return Object.freeze(plan);
}

function compileField(
  context: CompilationContext,
  parentType: ObjectTypeDef,
  responseKey: string,
  occurrences: ReadonlyArray<FieldOccurrence>,
): CompiledField {
  const fieldNodes = Object.freeze(occurrences.map(({ node }) => node));
  const fieldName = fieldNodes[0].name.value;
  const guards = mergeGuards(occurrences);

  if (fieldName === '__typename') {
    const typenameField: CompiledField = {
      kind: 'typename',
      responseKey,
      fieldName,
      parentTypeName: parentType.name,
      fieldNodes,
      guards,
    };
    return Object.freeze(typenameField);
  }

  if (fieldName.startsWith('__')) {
    throw new CompileError(
      `Introspection field "${fieldName}" is not supported.`,
      { nodes: fieldNodes },
    );
  }

  const fieldSpec = context.typeModel.getField(parentType.name, fieldName);
  if (fieldSpec === undefined) {
    throw new CompileError(
      `Cannot query field "${fieldName}" on type "${parentType.name}".`,
      { nodes: fieldNodes },
    );
  }

  const field: CompiledField = {
    kind: 'resolver',
    responseKey,
    fieldName,
    parentTypeName: parentType.name,
    fieldNodes,
    guards,
    returnType: fieldSpec.returnType,
    argumentEvaluator: compileArgumentEvaluator(
      context.typeModel,
      fieldSpec,
      fieldNodes[0],
    ),
    resolver: fieldSpec.resolver,
    completion: compileCompletion(context, fieldSpec.returnType, occurrences),
  };
  return Object.freeze(field);
}

function compileCompletion(
  context: CompilationContext,
  typeRef: TypeRef,
  occurrences: ReadonlyArray<FieldOccurrence>,
): CompletionPlan {
  if (typeRef.kind === 'NON_NULL') {
    const completion: CompletionPlan = {
      kind: 'NON_NULL',
      ofType: compileNullableCompletion(context, typeRef.ofType, occurrences),
    };
    return Object.freeze(completion);
  }
  return compileNullableCompletion(context, typeRef, occurrences);
}

function compileNullableCompletion(
  context: CompilationContext,
  typeRef: NullableTypeRef,
  occurrences: ReadonlyArray<FieldOccurrence>,
): NullableCompletion {
  if (typeRef.kind === 'LIST') {
    const completion: NullableCompletion = {
      kind: 'LIST',
      ofType: compileCompletion(context, typeRef.ofType, occurrences),
    };
    return Object.freeze(completion);
  }

  const type = context.typeModel.getType(typeRef.name);
  invariant(
    type !== undefined && type.kind !== 'INPUT_OBJECT',
    `Expected "${typeRef.name}" to be an output type.`,
  );

  let completion: NullableCompletion;
  if (type.kind === 'SCALAR' || type.kind === 'ENUM') {
    completion = { kind: 'LEAF', type };
  } else if (type.kind === 'OBJECT') {
    completion = {
      kind: 'OBJECT',
      plan: compileObjectPlan(
        context,
        type,
        collectSubfields(
          context.typeModel,
          context.fragments,
          type.name,
          occurrences,
        ),
      ),
    };
  } else {
    const plans: ObjMap<CompiledObjectPlan> = Object.create(null);
    for (const possibleType of context.typeModel.getPossibleTypes(type.name)) {
      plans[possibleType.name] = compileObjectPlan(
        context,
        possibleType,
        collectSubfields(
          context.typeModel,
          context.fragments,
          possibleType.name,
          occurrences,
        ),
      );
    }
    completion = { kind: 'ABSTRACT', type, plans: Object.freeze(plans) };
  }
  return Object.freeze(completion);
}
