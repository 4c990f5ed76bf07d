import { expect } from 'chai';
import { describe, it } from 'mocha';

import {
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  parse,
} from 'graphql';

import { expectJSON } from '../../__testUtils__/expectJSON';
import { expectPromise } from '../../__testUtils__/expectPromise';

import { execute, executeSync } from '../execute';
import { Executor } from '../executor';

describe('Execute: synchronously when possible', () => {
  const schema = new GraphQLSchema({
    query: new GraphQLObjectType({
      name: 'Query',
      fields: {
        syncField: {
          type: GraphQLString,
          resolve(rootValue) {
            return rootValue;
          },
        },
        asyncField: {
          type: GraphQLString,
          resolve(rootValue) {
            return Promise.resolve(rootValue);
          },
        },
      },
    }),
    mutation: new GraphQLObjectType({
      name: 'Mutation',
      fields: {
        syncMutationField: {
          type: GraphQLString,
          resolve(rootValue) {
            return rootValue;
          },
        },
      },
    }),
  });

  it('does not return a Promise for initial errors', () => {
    const doc = 'fragment Example on Query { syncField }';
    const result = execute({
      schema,
      document: parse(doc),
      rootValue: 'rootValue',
    });
    expectJSON(result).toDeepEqual({
      errors: [{ message: 'Must provide an operation.' }],
    });
  });

  it('does not return a Promise if fields are all synchronous', () => {
    const doc = 'query Example { syncField }';
    const result = execute({
      schema,
      document: parse(doc),
      rootValue: 'rootValue',
    });
    expect(result).to.deep.equal({ data: { syncField: 'rootValue' } });
  });

  it('does not return a Promise if mutation fields are all synchronous', () => {
    const doc = 'mutation Example { syncMutationField }';
    const result = execute({
      schema,
      document: parse(doc),
      rootValue: 'rootValue',
    });
    expect(result).to.deep.equal({ data: { syncMutationField: 'rootValue' } });
  });

  it('returns a Promise if any field is asynchronous', async () => {
    const doc = 'query Example { syncField, asyncField }';
    const result = execute({
      schema,
      document: parse(doc),
      rootValue: 'rootValue',
    });
    expect(result).to.be.instanceOf(Promise);
    expect(await result).to.deep.equal({
      data: { syncField: 'rootValue', asyncField: 'rootValue' },
    });
  });

  it('returns a Promise for resolvers declared async', async () => {
    const asyncSchema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          declaredAsync: {
            type: GraphQLString,
            async resolve() {
              return 'declared';
            },
          },
          flaggedAsync: {
            type: GraphQLString,
            extensions: { async: true },
            resolve() {
              return 'flagged';
            },
          },
        },
      }),
    });

    const first = execute({
      schema: asyncSchema,
      document: parse('{ declaredAsync }'),
    });
    await expectPromise(first).toResolveAs({
      data: { declaredAsync: 'declared' },
    });

    const second = execute({
      schema: asyncSchema,
      document: parse('{ flaggedAsync }'),
    });
    await expectPromise(second).toResolveAs({
      data: { flaggedAsync: 'flagged' },
    });
  });

  describe('executeSync', () => {
    it('does not return a Promise for sync execution', () => {
      const doc = 'query Example { syncField }';
      const result = executeSync({
        schema,
        document: parse(doc),
        rootValue: 'rootValue',
      });
      expect(result).to.deep.equal({ data: { syncField: 'rootValue' } });
    });

    it('throws if encountering async execution', () => {
      const doc = 'query Example { syncField, asyncField }';
      expect(() => {
        executeSync({
          schema,
          document: parse(doc),
          rootValue: 'rootValue',
        });
      }).to.throw('GraphQL execution failed to complete synchronously.');
    });

    it('reports operations the schema cannot execute', () => {
      const badSchema = new GraphQLSchema({});
      const document = parse('{ __typename }');
      const result = executeSync({
        schema: badSchema,
        document,
      });
      expectJSON(result).toDeepEqual({
        errors: [
          {
            message: 'Schema is not configured to execute query operation.',
            locations: [{ line: 1, column: 1 }],
          },
        ],
      });
    });

    it('does not return a Promise for compile errors', () => {
      const document = parse('query Example { unknownField }');
      const result = executeSync({
        schema,
        document,
      });
      expectJSON(result).toDeepEqual({
        errors: [
          {
            message: 'Cannot query field "unknownField" on type "Query".',
            locations: [{ line: 1, column: 17 }],
          },
        ],
      });
    });
  });

  describe('Executor#executePlan', () => {
    const executor = new Executor({ schema });

    it('reuses a plan synchronously across executions', () => {
      const plan = executor.compile(parse('{ syncField }'));
      expect(executor.executePlan(plan, { rootValue: 'first' })).to.deep.equal(
        { data: { syncField: 'first' } },
      );
      expect(
        executor.executePlan(plan, { rootValue: 'second' }),
      ).to.deep.equal({ data: { syncField: 'second' } });
    });

    it('does not return a Promise for variable coercion errors', () => {
      const plan = executor.compile(
        parse('query ($name: String!) { asyncField }'),
      );
      const result = executor.executePlan(plan, { rootValue: 'rootValue' });
      expectJSON(result).toDeepEqual({
        errors: [
          {
            message:
              'Variable "$name" of required type "String!" was not provided.',
            locations: [{ line: 1, column: 8 }],
          },
        ],
      });
    });

    it('does not return a Promise when asynchronous fields are skipped', () => {
      const plan = executor.compile(
        parse('query ($skip: Boolean!) { syncField asyncField @skip(if: $skip) }'),
      );
      const result = executor.executePlan(plan, {
        rootValue: 'rootValue',
        variableValues: { skip: true },
      });
      expect(result).to.deep.equal({ data: { syncField: 'rootValue' } });
    });
  });
});
