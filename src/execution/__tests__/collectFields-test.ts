import { expect } from 'chai';
import { describe, it } from 'mocha';

import { buildSchema, parse } from 'graphql';

import { toTypeModel } from '../../typeModel/toTypeModel';

import type { CollectedFields, Guard } from '../collectFields';
import {
  collectFields,
  collectSubfields,
  mergeGuards,
  shouldIncludeField,
} from '../collectFields';
import { selectOperation } from '../compilePlan';

const schema = buildSchema(`
  interface Named {
    name: String
  }

  type Friend implements Named {
    id: ID
    name: String
  }

  type Hero implements Named {
    id: ID
    name: String
    friends: [Friend]
  }

  type Query {
    hero: Hero
    a: String
    b: String
  }
`);

const typeModel = toTypeModel(schema);

function collect(source: string): CollectedFields {
  const { operation, fragments } = selectOperation(parse(source));
  return collectFields(typeModel, fragments, 'Query', [
    { selectionSet: operation.selectionSet, guard: [] },
  ]);
}

function summarize(
  fields: CollectedFields,
): Array<[string, Array<Guard>]> {
  return [...fields].map(([key, occurrences]): [string, Array<Guard>] => [
    key,
    occurrences.map(({ guard }) => guard),
  ]);
}

describe('collectFields', () => {
  it('groups occurrences by response key in first-seen order', () => {
    const fields = collect('{ b a b c: a }');
    expect(summarize(fields)).to.deep.equal([
      ['b', [[], []]],
      ['a', [[]]],
      ['c', [[]]],
    ]);
    expect(fields.get('c')?.[0].node.name.value).to.equal('a');
  });

  it('decides literal skip and include while collecting', () => {
    const fields = collect(`{
      a @skip(if: true)
      b @include(if: false)
      hero @skip(if: false) @include(if: true) { name }
    }`);
    expect(summarize(fields)).to.deep.equal([['hero', [[]]]]);
  });

  it('records variable conditions as guards', () => {
    const fields = collect(`query ($s: Boolean, $i: Boolean) {
      a @skip(if: $s)
      ... @include(if: $i) {
        a
        b
      }
    }`);
    expect(summarize(fields)).to.deep.equal([
      [
        'a',
        [
          [{ directive: 'skip', variableName: 's' }],
          [{ directive: 'include', variableName: 'i' }],
        ],
      ],
      ['b', [[{ directive: 'include', variableName: 'i' }]]],
    ]);
  });

  it('combines the conditions of enclosing fragments', () => {
    const fields = collect(`query ($s: Boolean, $t: Boolean) {
      ...F @skip(if: $s)
    }
    fragment F on Query {
      a @include(if: $t)
    }`);
    expect(summarize(fields)).to.deep.equal([
      [
        'a',
        [
          [
            { directive: 'skip', variableName: 's' },
            { directive: 'include', variableName: 't' },
          ],
        ],
      ],
    ]);
  });

  it('expands each fragment once along a path', () => {
    const fields = collect(`{ ...A }
      fragment A on Query { a ...B }
      fragment B on Query { b ...A }
    `);
    expect([...fields.keys()]).to.deep.equal(['a', 'b']);
  });

  it('applies fragments whose type condition covers the object type', () => {
    const document = parse(`{
      hero {
        ... on Named { name }
        ... on Friend { id }
        ... on Hero { friends { id } }
      }
    }`);
    const { operation, fragments } = selectOperation(document);
    const rootFields = collectFields(typeModel, fragments, 'Query', [
      { selectionSet: operation.selectionSet, guard: [] },
    ]);
    const heroOccurrences = rootFields.get('hero') ?? [];

    const heroFields = collectSubfields(
      typeModel,
      fragments,
      'Hero',
      heroOccurrences,
    );
    expect([...heroFields.keys()]).to.deep.equal(['name', 'friends']);

    const friendFields = collectSubfields(
      typeModel,
      fragments,
      'Friend',
      heroOccurrences,
    );
    expect([...friendFields.keys()]).to.deep.equal(['name', 'id']);
  });

  it('rejects different fields under one response key', () => {
    expect(() => collect('{ x: a x: b }')).to.throw(
      'Fields "x" conflict because "a" and "b" are different fields.',
    );
  });

  it('rejects spreads of unknown fragments', () => {
    expect(() => collect('{ ...Missing }')).to.throw(
      'Unknown fragment "Missing".',
    );
  });

  it('rejects conditions that are neither literals nor variables', () => {
    expect(() => collect('{ a @skip(if: "yes") }')).to.throw(
      'Directive "@skip" argument "if" of type "Boolean!" must be a Boolean literal or a variable.',
    );
  });
});

describe('mergeGuards', () => {
  const skipS: Guard = [{ directive: 'skip', variableName: 's' }];
  const includeI: Guard = [{ directive: 'include', variableName: 'i' }];

  it('drops guards when some occurrence is unconditional', () => {
    const fields = collect('query ($s: Boolean) { a @skip(if: $s) a }');
    expect(mergeGuards(fields.get('a') ?? [])).to.equal(undefined);
  });

  it('keeps one guard per occurrence otherwise', () => {
    const fields = collect(
      'query ($s: Boolean, $i: Boolean) { a @skip(if: $s) a @include(if: $i) }',
    );
    expect(mergeGuards(fields.get('a') ?? [])).to.deep.equal([
      skipS,
      includeI,
    ]);
  });
});

describe('shouldIncludeField', () => {
  const skipS: Guard = [{ directive: 'skip', variableName: 's' }];
  const includeI: Guard = [{ directive: 'include', variableName: 'i' }];

  it('skips only when the skip variable is true', () => {
    expect(shouldIncludeField([skipS], {})).to.equal(true);
    expect(shouldIncludeField([skipS], { s: false })).to.equal(true);
    expect(shouldIncludeField([skipS], { s: null })).to.equal(true);
    expect(shouldIncludeField([skipS], { s: true })).to.equal(false);
  });

  it('excludes only when the include variable is false', () => {
    expect(shouldIncludeField([includeI], {})).to.equal(true);
    expect(shouldIncludeField([includeI], { i: true })).to.equal(true);
    expect(shouldIncludeField([includeI], { i: false })).to.equal(false);
  });

  it('requires every condition of a guard', () => {
    const guard: Guard = [...skipS, ...includeI];
    expect(shouldIncludeField([guard], { s: false, i: true })).to.equal(true);
    expect(shouldIncludeField([guard], { s: false, i: false })).to.equal(
      false,
    );
  });

  it('includes the field when any guard holds', () => {
    expect(
      shouldIncludeField([skipS, includeI], { s: true, i: true }),
    ).to.equal(true);
    expect(
      shouldIncludeField([skipS, includeI], { s: true, i: false }),
    ).to.equal(false);
  });
});
