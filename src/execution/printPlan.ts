import { print } from 'graphql';

import { printTypeRef } from '../typeModel/typeRefs';

import type { Guard } from './collectFields';
import type {
  CompiledField,
  CompiledObjectPlan,
  CompiledPlan,
  CompletionPlan,
} from './compiledPlan';

function generateIndent(indent: number): string {
  return ' '.repeat(indent);
}

/**
 * Renders a compiled plan as text. Two plans that print identically execute
 * identically.
 */
export function printPlan(plan: CompiledPlan): string {
  const entries = [
    `Plan: ${plan.operationType}${
      plan.operationName === undefined ? '' : ` ${plan.operationName}`
    } on ${plan.root.type.name}`,
  ];

  if (plan.variableDefinitions.length > 0) {
    entries.push('  Variables:');
    for (const { name, type, node } of plan.variableDefinitions) {
      entries.push(
        `    $${name}: ${printTypeRef(type)}${
          node.defaultValue ? ` = ${print(node.defaultValue)}` : ''
        }`,
      );
    }
  }

  const fields = printObjectPlan(plan.root, 2);
  if (fields !== '') {
    entries.push(fields);
  }
  return entries.join('\n');
}

function printObjectPlan(plan: CompiledObjectPlan, indent: number): string {
  return plan.fields.map((field) => printField(field, indent)).join('\n');
}

function printField(field: CompiledField, indent: number): string {
  const spaces = generateIndent(indent);
  const name =
    field.responseKey === field.fieldName
      ? field.fieldName
      : `${field.responseKey}: ${field.fieldName}`;
  const guards =
    field.guards === undefined ? '' : ` when ${printGuards(field.guards)}`;

  if (field.kind === 'typename') {
    return `${spaces}${name} -> String!${guards}`;
  }

  const argumentNodes = field.fieldNodes[0].arguments ?? [];
  const args =
    argumentNodes.length === 0
      ? ''
      : `(${argumentNodes.map((arg) => print(arg)).join(', ')})`;
  const async = field.resolver.kind === 'async' ? ' [async]' : '';

  const entries = [
    `${spaces}${name}${args} -> ${printTypeRef(field.returnType)}${async}${guards}`,
  ];
  const children = printCompletion(field.completion, indent + 2);
  if (children !== '') {
    entries.push(children);
  }
  return entries.join('\n');
}

function printCompletion(completion: CompletionPlan, indent: number): string {
  switch (completion.kind) {
    case 'NON_NULL':
    case 'LIST':
      return printCompletion(completion.ofType, indent);
    case 'LEAF':
      return '';
    case 'OBJECT':
      return printObjectPlan(completion.plan, indent);
    case 'ABSTRACT': {
      const spaces = generateIndent(indent);
      const entries: Array<string> = [];
      for (const [typeName, plan] of Object.entries(completion.plans)) {
        entries.push(`${spaces}For type '${typeName}':`);
        const fields = printObjectPlan(plan, indent + 2);
        if (fields !== '') {
          entries.push(fields);
        }
      }
      return entries.join('\n');
    }
  }
}

function printGuards(guards: ReadonlyArray<Guard>): string {
  return guards
    .map((guard) =>
      guard
        .map(
          ({ directive, variableName }) =>
            `@${directive}(if: $${variableName})`,
        )
        .join(' '),
    )
    .join(' or ');
}
