import { expect } from 'chai';
import { describe, it } from 'mocha';

import {
  GraphQLList,
  GraphQLObjectType,
  GraphQLScalarType,
  GraphQLSchema,
  GraphQLString,
  buildSchema,
} from 'graphql';

import { toTypeModel } from '../../typeModel/toTypeModel';
import type { TypeRef } from '../../typeModel/typeRefs';
import { listOf, namedType, nonNullOf } from '../../typeModel/typeRefs';

import { coerceInputValue } from '../coerceInputValue';

const typeModel = toTypeModel(
  buildSchema(`
    enum Color {
      RED
      BLUE
    }

    input Point {
      x: Int!
      y: Int = 0
      color: Color
    }

    type Query {
      field(point: Point): String
    }
  `),
);

interface CoerceError {
  path: ReadonlyArray<string | number>;
  value: unknown;
  error: string;
}

function coerceValue(
  inputValue: unknown,
  type: TypeRef,
): { errors: Array<CoerceError>; value: unknown } {
  const errors: Array<CoerceError> = [];
  const value = coerceInputValue(
    typeModel,
    inputValue,
    type,
    (path, invalidValue, error) => {
      errors.push({ path, value: invalidValue, error: error.message });
    },
  );
  return { errors, value };
}

function expectValue(result: ReturnType<typeof coerceValue>) {
  expect(result.errors).to.deep.equal([]);
  return expect(result.value);
}

function expectErrors(result: ReturnType<typeof coerceValue>) {
  return expect(result.errors);
}

describe('coerceInputValue', () => {
  describe('for non-null types', () => {
    const type = nonNullOf(namedType('Int'));

    it('returns a value for a non-null value', () => {
      expectValue(coerceValue(1, type)).to.equal(1);
    });

    it('returns an error for undefined and null', () => {
      for (const value of [undefined, null]) {
        expectErrors(coerceValue(value, type)).to.deep.equal([
          {
            error: 'Expected non-nullable type "Int!" not to be null.',
            path: [],
            value,
          },
        ]);
      }
    });
  });

  describe('for scalars', () => {
    it('returns a parsed value', () => {
      expectValue(coerceValue('abc', namedType('String'))).to.equal('abc');
    });

    it('returns an error for values the scalar rejects', () => {
      expectErrors(coerceValue('one', namedType('Int'))).to.deep.equal([
        {
          error: 'Int cannot represent non-integer value: "one"',
          path: [],
          value: 'one',
        },
      ]);
    });
  });

  describe('for enums', () => {
    it('returns internal values', () => {
      expectValue(coerceValue('RED', namedType('Color'))).to.equal('RED');
    });

    it('returns an error for unknown names', () => {
      expectErrors(coerceValue('XYZ', namedType('Color'))).to.deep.equal([
        {
          error: 'Value "XYZ" does not exist in "Color" enum.',
          path: [],
          value: 'XYZ',
        },
      ]);
    });
  });

  describe('for input objects', () => {
    const type = namedType('Point');

    it('fills in defaults', () => {
      expectValue(coerceValue({ x: 1 }, type)).to.deep.equal({ x: 1, y: 0 });
    });

    it('keeps explicit nulls', () => {
      expectValue(coerceValue({ x: 1, y: null }, type)).to.deep.equal({
        x: 1,
        y: null,
      });
    });

    it('returns an error for non-objects', () => {
      expectErrors(coerceValue(123, type)).to.deep.equal([
        {
          error: 'Expected type "Point" to be an object.',
          path: [],
          value: 123,
        },
      ]);
    });

    it('returns errors for missing and unknown fields', () => {
      const value = { z: 1 };
      expectErrors(coerceValue(value, type)).to.deep.equal([
        {
          error: 'Field "x" of required type "Int!" was not provided.',
          path: [],
          value,
        },
        {
          error: 'Field "z" is not defined by type "Point".',
          path: [],
          value,
        },
      ]);
    });

    it('reports the path of invalid field values', () => {
      expectErrors(coerceValue({ x: 1, color: 'XYZ' }, type)).to.deep.equal(
        [
          {
            error: 'Value "XYZ" does not exist in "Color" enum.',
            path: ['color'],
            value: 'XYZ',
          },
        ],
      );
    });
  });

  describe('for lists', () => {
    const type = listOf(nonNullOf(namedType('Int')));

    it('coerces each item', () => {
      expectValue(coerceValue([1, 2], type)).to.deep.equal([1, 2]);
    });

    it('wraps a single value in a list', () => {
      expectValue(coerceValue(3, type)).to.deep.equal([3]);
    });

    it('reports the index of invalid items', () => {
      expectErrors(coerceValue([1, null], type)).to.deep.equal([
        {
          error: 'Expected non-nullable type "Int!" not to be null.',
          path: [1],
          value: null,
        },
      ]);
    });
  });

  it('throws with a descriptive message without an error callback', () => {
    expect(() =>
      coerceInputValue(typeModel, { x: 'one' }, namedType('Point')),
    ).to.throw(
      'Invalid value "one" at "value.x": Int cannot represent non-integer value: "one"',
    );
  });

  it('never passes null list items to the item parser', () => {
    const parsed: Array<unknown> = [];
    const strictType = new GraphQLScalarType({
      name: 'Strict',
      parseValue(value) {
        if (value === null) {
          throw new Error('Strict cannot parse null.');
        }
        parsed.push(value);
        return value;
      },
    });
    const strictModel = toTypeModel(
      new GraphQLSchema({
        query: new GraphQLObjectType({
          name: 'Query',
          fields: {
            field: {
              type: GraphQLString,
              args: { values: { type: new GraphQLList(strictType) } },
            },
          },
        }),
      }),
    );

    const errors: Array<string> = [];
    const value = coerceInputValue(
      strictModel,
      [null, 'x'],
      listOf(namedType('Strict')),
      (_path, _invalidValue, error) => {
        errors.push(error.message);
      },
    );

    expect(value).to.deep.equal([null, 'x']);
    expect(errors).to.deep.equal([]);
    expect(parsed).to.deep.equal(['x']);
  });
});
