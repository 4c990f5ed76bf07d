import { expect } from 'chai';
import { describe, it } from 'mocha';

import {
  GraphQLList,
  GraphQLObjectType,
  GraphQLScalarType,
  GraphQLSchema,
  GraphQLString,
  Kind,
  buildSchema,
  parseValue,
} from 'graphql';

import type { ObjMap } from '../../jsutils/ObjMap';

import { toTypeModel } from '../../typeModel/toTypeModel';
import type { TypeRef } from '../../typeModel/typeRefs';
import { listOf, namedType, nonNullOf } from '../../typeModel/typeRefs';

import { coerceInputLiteral } from '../coerceInputLiteral';

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

interface LiteralError {
  path: ReadonlyArray<string | number>;
  error: string;
}

function coerceLiteral(
  source: string,
  type: TypeRef,
  variableValues?: ObjMap<unknown>,
): { errors: Array<LiteralError>; value: unknown } {
  const errors: Array<LiteralError> = [];
  const value = coerceInputLiteral(
    typeModel,
    parseValue(source),
    type,
    variableValues,
    (path, _invalidValue, error) => {
      errors.push({ path, error: error.message });
    },
  );
  return { errors, value };
}

describe('coerceInputLiteral', () => {
  it('coerces scalars and enums', () => {
    expect(coerceLiteral('123', namedType('Int'))).to.deep.equal({
      errors: [],
      value: 123,
    });
    expect(coerceLiteral('BLUE', namedType('Color'))).to.deep.equal({
      errors: [],
      value: 'BLUE',
    });
    expect(coerceLiteral('null', namedType('Int'))).to.deep.equal({
      errors: [],
      value: null,
    });
  });

  it('reports literals the scalar rejects', () => {
    expect(coerceLiteral('"abc"', namedType('Int'))).to.deep.equal({
      errors: [
        { path: [], error: 'Int cannot represent non-integer value: "abc"' },
      ],
      value: undefined,
    });
  });

  it('reports null for non-null types', () => {
    expect(coerceLiteral('null', nonNullOf(namedType('Int')))).to.deep.equal({
      errors: [
        { path: [], error: 'Expected non-nullable type "Int!" not to be null.' },
      ],
      value: undefined,
    });
  });

  it('coerces input objects with defaults', () => {
    expect(coerceLiteral('{ x: 1, color: RED }', namedType('Point')))
      .to.deep.equal({
        errors: [],
        value: { x: 1, y: 0, color: 'RED' },
      });
  });

  it('reports missing and unknown input object fields', () => {
    expect(coerceLiteral('{ z: 1 }', namedType('Point'))).to.deep.equal({
      errors: [
        { path: [], error: 'Field "x" of required type "Int!" was not provided.' },
        { path: [], error: 'Field "z" is not defined by type "Point".' },
      ],
      value: { y: 0 },
    });
  });

  it('wraps a single literal in a list', () => {
    expect(coerceLiteral('4', listOf(namedType('Int')))).to.deep.equal({
      errors: [],
      value: [4],
    });
  });

  describe('with variables', () => {
    it('reads coerced variable values', () => {
      expect(
        coerceLiteral('{ x: $x, y: $y }', namedType('Point'), {
          x: 5,
          y: null,
        }),
      ).to.deep.equal({ errors: [], value: { x: 5, y: null } });
    });

    it('treats missing field variables as omitted fields', () => {
      expect(
        coerceLiteral('{ x: 1, y: $y }', namedType('Point'), {}),
      ).to.deep.equal({ errors: [], value: { x: 1, y: 0 } });
      expect(coerceLiteral('{ x: $x }', namedType('Point'), {})).to.deep.equal(
        {
          errors: [
            {
              path: [],
              error: 'Field "x" of required type "Int!" was not provided.',
            },
          ],
          value: { y: 0 },
        },
      );
    });

    it('turns missing list item variables into null', () => {
      expect(
        coerceLiteral('[1, $item]', listOf(namedType('Int')), {}),
      ).to.deep.equal({ errors: [], value: [1, null] });
      expect(
        coerceLiteral('[1, $item]', listOf(nonNullOf(namedType('Int'))), {}),
      ).to.deep.equal({
        errors: [
          {
            path: [1],
            error: 'Expected non-nullable type "Int!" not to be null.',
          },
        ],
        value: [1, null],
      });
    });

    it('reports null variables in non-null positions', () => {
      expect(
        coerceLiteral('$x', nonNullOf(namedType('Int')), { x: null }),
      ).to.deep.equal({
        errors: [
          {
            path: [],
            error: 'Expected non-nullable type "Int!" not to be null.',
          },
        ],
        value: undefined,
      });
    });
  });

  it('never passes null list items to the item parser', () => {
    const parsed: Array<unknown> = [];
    const strictType = new GraphQLScalarType({
      name: 'Strict',
      parseLiteral(valueNode) {
        if (valueNode.kind !== Kind.STRING) {
          throw new Error(`Strict cannot parse ${valueNode.kind}.`);
        }
        parsed.push(valueNode.value);
        return valueNode.value;
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
    const value = coerceInputLiteral(
      strictModel,
      parseValue('[null, "x"]'),
      listOf(namedType('Strict')),
      undefined,
      (_path, _invalidValue, error) => {
        errors.push(error.message);
      },
    );

    expect(value).to.deep.equal([null, 'x']);
    expect(errors).to.deep.equal([]);
    expect(parsed).to.deep.equal(['x']);
  });
});
