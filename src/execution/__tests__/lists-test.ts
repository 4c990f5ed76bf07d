import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { GraphQLOutputType } from 'graphql';
import {
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  parse,
} from 'graphql';

import { expectJSON } from '../../__testUtils__/expectJSON';

import type { ExecutionResult } from '../executor';
import { execute, executeSync } from '../execute';

function executeListField(
  type: GraphQLOutputType,
  value: unknown,
): Promise<ExecutionResult> {
  const schema = new GraphQLSchema({
    query: new GraphQLObjectType({
      name: 'Query',
      fields: {
        listField: { type, resolve: () => value },
      },
    }),
  });
  return Promise.resolve(
    execute({ schema, document: parse('{ listField }') }),
  );
}

const listFieldError = (index: number, message: string) => ({
  message,
  locations: [{ line: 1, column: 3 }],
  path: ['listField', index],
});

describe('Execute: Handles list nullability', () => {
  describe('[Int]', () => {
    const type = new GraphQLList(GraphQLInt);

    it('completes items in source order', async () => {
      expect(await executeListField(type, [1, null, 2])).to.deep.equal({
        data: { listField: [1, null, 2] },
      });
    });

    it('nulls only the failed item', async () => {
      expectJSON(
        await executeListField(type, [
          1,
          Promise.reject(new Error('bad')),
          2,
        ]),
      ).toDeepEqual({
        data: { listField: [1, null, 2] },
        errors: [listFieldError(1, 'bad')],
      });
    });
  });

  describe('[Int!]', () => {
    const type = new GraphQLList(new GraphQLNonNull(GraphQLInt));

    it('nulls the list when an item is null', async () => {
      expectJSON(await executeListField(type, [1, null, 2])).toDeepEqual({
        data: { listField: null },
        errors: [
          listFieldError(
            1,
            'Cannot return null for non-nullable field Query.listField.',
          ),
        ],
      });
    });

    it('evaluates every item after a failure', async () => {
      expectJSON(
        await executeListField(type, [
          Promise.resolve(1),
          Promise.reject(new Error('second')),
          Promise.resolve(null),
        ]),
      ).toDeepEqual({
        data: { listField: null },
        errors: [
          listFieldError(1, 'second'),
          listFieldError(
            2,
            'Cannot return null for non-nullable field Query.listField.',
          ),
        ],
      });
    });
  });

  describe('[Int]!', () => {
    const type = new GraphQLNonNull(new GraphQLList(GraphQLInt));

    it('nulls only the failed item', async () => {
      expectJSON(
        await executeListField(type, [
          1,
          2,
          Promise.reject(new Error('third')),
          4,
        ]),
      ).toDeepEqual({
        data: { listField: [1, 2, null, 4] },
        errors: [listFieldError(2, 'third')],
      });
    });

    it('nulls the parent when the list is null', async () => {
      expectJSON(await executeListField(type, null)).toDeepEqual({
        data: null,
        errors: [
          {
            message:
              'Cannot return null for non-nullable field Query.listField.',
            locations: [{ line: 1, column: 3 }],
            path: ['listField'],
          },
        ],
      });
    });
  });

  describe('[Int!]!', () => {
    const type = new GraphQLNonNull(
      new GraphQLList(new GraphQLNonNull(GraphQLInt)),
    );

    it('nulls the parent when an item fails', async () => {
      expectJSON(await executeListField(type, [1, null])).toDeepEqual({
        data: null,
        errors: [
          listFieldError(
            1,
            'Cannot return null for non-nullable field Query.listField.',
          ),
        ],
      });
    });

    it('reports a null list at the field', async () => {
      expectJSON(await executeListField(type, null)).toDeepEqual({
        data: null,
        errors: [
          {
            message:
              'Cannot return null for non-nullable field Query.listField.',
            locations: [{ line: 1, column: 3 }],
            path: ['listField'],
          },
        ],
      });
    });
  });

  it('accepts any iterable', async () => {
    const type = new GraphQLList(GraphQLString);
    expect(
      await executeListField(type, new Set(['apple', 'banana'])),
    ).to.deep.equal({ data: { listField: ['apple', 'banana'] } });

    function* generate() {
      yield 'one';
      yield 'two';
    }
    expect(await executeListField(type, generate())).to.deep.equal({
      data: { listField: ['one', 'two'] },
    });
  });

  it('rejects values that are not iterable', async () => {
    expectJSON(
      await executeListField(new GraphQLList(GraphQLString), 'abc'),
    ).toDeepEqual({
      data: { listField: null },
      errors: [
        {
          message:
            'Expected Iterable, but did not find one for field "Query.listField".',
          locations: [{ line: 1, column: 3 }],
          path: ['listField'],
        },
      ],
    });
  });

  it('completes nested lists synchronously', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          matrix: {
            type: new GraphQLList(new GraphQLList(GraphQLInt)),
            resolve: () => [[1, 2], null, [3]],
          },
        },
      }),
    });
    expect(
      executeSync({ schema, document: parse('{ matrix }') }),
    ).to.deep.equal({ data: { matrix: [[1, 2], null, [3]] } });
  });
});
