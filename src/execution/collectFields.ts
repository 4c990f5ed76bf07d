import type {
  BooleanValueNode,
  DirectiveNode,
  FieldNode,
  FragmentDefinitionNode,
  InlineFragmentNode,
  SelectionNode,
  SelectionSetNode,
  VariableNode,
} from 'graphql';
import { Kind } from 'graphql';

import type { ReadOnlyObjMap } from '../jsutils/ObjMap';

import { CompileError } from '../error/executionErrors';

import type { TypeModel } from '../typeModel/typeModel';

import type { VariableValues } from './values';

/**
 * A `@skip` or `@include` directive whose `if` argument is a variable.
 */
export interface InclusionCondition {
  readonly directive: 'skip' | 'include';
  readonly variableName: string;
}

/**
 * The conditions that must all hold for one occurrence of a selection to be
 * part of the response. An empty guard always holds.
 */
export type Guard = ReadonlyArray<InclusionCondition>;

export interface FieldOccurrence {
  readonly node: FieldNode;
  readonly guard: Guard;
}

export interface GuardedSelectionSet {
  readonly selectionSet: SelectionSetNode;
  readonly guard: Guard;
}

/** Field occurrences grouped by response key, in first-seen order. */
export type CollectedFields = Map<string, Array<FieldOccurrence>>;

/**
 * Given selection sets, collects all of the fields that apply to the given
 * concrete object type, grouped by response key.
 *
 * `@skip` and `@include` with literal arguments are decided here. Those
 * with variable arguments are recorded as guards on each occurrence and
 * checked when the plan runs.
 *
 * @internal
 */
export function collectFields(
  typeModel: TypeModel,
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>,
  runtimeTypeName: string,
  selectionSets: ReadonlyArray<GuardedSelectionSet>,
): CollectedFields {
  const fields: CollectedFields = new Map();
  for (const { selectionSet, guard } of selectionSets) {
    collectFieldsImpl(
      typeModel,
      fragments,
      runtimeTypeName,
      selectionSet,
      guard,
      fields,
      new Set(),
    );
  }
  return fields;
}

/**
 * Given the occurrences of a field, collects all of their subfields for the
 * given concrete object type. Each subfield inherits the guard of the
 * occurrence it was selected under.
 *
 * @internal
 */
export function collectSubfields(
  typeModel: TypeModel,
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>,
  runtimeTypeName: string,
  occurrences: ReadonlyArray<FieldOccurrence>,
): CollectedFields {
  const selectionSets: Array<GuardedSelectionSet> = [];
  for (const { node, guard } of occurrences) {
    if (node.selectionSet) {
      selectionSets.push({ selectionSet: node.selectionSet, guard });
    }
  }
  return collectFields(typeModel, fragments, runtimeTypeName, selectionSets);
}

// eslint-disable-next-line max-params
function collectFieldsImpl(
  typeModel: TypeModel,
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>,
  runtimeTypeName: string,
  selectionSet: SelectionSetNode,
  guard: Guard,
  fields: CollectedFields,
  visitingFragmentNames: Set<string>,
): void {
  for (const selection of selectionSet.selections) {
    const conditions = getInclusionConditions(selection);
    if (conditions === false) {
      continue;
    }
    const selectionGuard =
      conditions.length === 0 ? guard : [...guard, ...conditions];

    switch (selection.kind) {
      case Kind.FIELD: {
        const key = getFieldEntryKey(selection);
        const occurrences = fields.get(key);
        if (occurrences === undefined) {
          fields.set(key, [{ node: selection, guard: selectionGuard }]);
          break;
        }
        const existingNode = occurrences[0].node;
        if (existingNode.name.value !== selection.name.value) {
          throw new CompileError(
            `Fields "${key}" conflict because "${existingNode.name.value}" and "${selection.name.value}" are different fields.`,
            { nodes: [existingNode, selection] },
          );
        }
        occurrences.push({ node: selection, guard: selectionGuard });
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        if (!doesFragmentConditionMatch(typeModel, selection, runtimeTypeName)) {
          continue;
        }
        collectFieldsImpl(
          typeModel,
          fragments,
          runtimeTypeName,
          selection.selectionSet,
          selectionGuard,
          fields,
          visitingFragmentNames,
        );
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const fragName = selection.name.value;
        if (visitingFragmentNames.has(fragName)) {
          continue;
        }

        const fragment = fragments[fragName];
        if (fragment === undefined) {
          throw new CompileError(`Unknown fragment "${fragName}".`, {
            nodes: selection,
          });
        }
        if (!doesFragmentConditionMatch(typeModel, fragment, runtimeTypeName)) {
          continue;
        }

        visitingFragmentNames.add(fragName);
        collectFieldsImpl(
          typeModel,
          fragments,
          runtimeTypeName,
          fragment.selectionSet,
          selectionGuard,
          fields,
          visitingFragmentNames,
        );
        visitingFragmentNames.delete(fragName);
        break;
      }
    }
  }
}

/**
 * Returns false when a literal `@skip(if: true)` or `@include(if: false)`
 * excludes the selection, otherwise the conditions left to check at run
 * time.
 */
function getInclusionConditions(
  selection: SelectionNode,
): false | Array<InclusionCondition> {
  const conditions: Array<InclusionCondition> = [];
  for (const directive of selection.directives ?? []) {
    const name = directive.name.value;
    if (name !== 'skip' && name !== 'include') {
      continue;
    }

    const ifValue = getIfArgument(directive);
    if (ifValue.kind === Kind.VARIABLE) {
      conditions.push({ directive: name, variableName: ifValue.name.value });
    } else if (ifValue.value === (name === 'skip')) {
      return false;
    }
  }
  return conditions;
}

function getIfArgument(
  directive: DirectiveNode,
): VariableNode | BooleanValueNode {
  const value = directive.arguments?.find(
    (arg) => arg.name.value === 'if',
  )?.value;
  if (
    value !== undefined &&
    (value.kind === Kind.VARIABLE || value.kind === Kind.BOOLEAN)
  ) {
    return value;
  }
  throw new CompileError(
    `Directive "@${directive.name.value}" argument "if" of type "Boolean!" must be a Boolean literal or a variable.`,
    { nodes: directive },
  );
}

/**
 * Determines if a fragment is applicable to the given type.
 */
function doesFragmentConditionMatch(
  typeModel: TypeModel,
  fragment: FragmentDefinitionNode | InlineFragmentNode,
  runtimeTypeName: string,
): boolean {
  const typeConditionNode = fragment.typeCondition;
  if (!typeConditionNode) {
    return true;
  }
  const conditionalTypeName = typeConditionNode.name.value;
  if (conditionalTypeName === runtimeTypeName) {
    return true;
  }
  return typeModel.isPossibleType(conditionalTypeName, runtimeTypeName);
}

/**
 * Implements the logic to compute the key of a given field's entry
 */
function getFieldEntryKey(node: FieldNode): string {
  return node.alias ? node.alias.value : node.name.value;
}

/**
 * Merges the guards of a field's occurrences. Returns `undefined` when some
 * occurrence is unconditional, otherwise one guard per occurrence, any of
 * which admits the field.
 */
export function mergeGuards(
  occurrences: ReadonlyArray<FieldOccurrence>,
): ReadonlyArray<Guard> | undefined {
  if (occurrences.some((occurrence) => occurrence.guard.length === 0)) {
    return;
  }
  return occurrences.map((occurrence) => occurrence.guard);
}

/**
 * Checks merged guards against the coerced variable values. A skip
 * condition fails only when its variable is `true`, an include condition
 * only when its variable is `false`.
 */
export function shouldIncludeField(
  guards: ReadonlyArray<Guard>,
  variableValues: VariableValues,
): boolean {
  return guards.some((guard) =>
    guard.every((condition) => {
      const value = variableValues[condition.variableName];
      return condition.directive === 'skip' ? value !== true : value !== false;
    }),
  );
}
