import { expect } from 'chai';
import { describe, it } from 'mocha';

import { GraphQLError } from 'graphql';

import { addPath } from '../../jsutils/Path';

import { ErrorCollector } from '../errorCollector';

describe('ErrorCollector', () => {
  const hero = addPath(undefined, 'hero', 'Query', 0);
  const heroName = addPath(hero, 'name', 'Human', 1);
  const heroFriends = addPath(hero, 'friends', 'Human', 2);
  const greeting = addPath(undefined, 'greeting', 'Query', 1);

  it('keeps one error per path', () => {
    const collector = new ErrorCollector();
    expect(collector.record(new GraphQLError('first'), heroName)).to.equal(
      true,
    );
    expect(collector.record(new GraphQLError('second'), heroName)).to.equal(
      false,
    );

    expect(collector.size).to.equal(1);
    expect(collector.hasErrorAt(heroName)).to.equal(true);
    expect(collector.hasErrorAt(hero)).to.equal(false);
    expect(collector.errors.map((error) => error.message)).to.deep.equal([
      'first',
    ]);
  });

  it('orders errors by response position', () => {
    const collector = new ErrorCollector();
    collector.record(new GraphQLError('greeting'), greeting);
    collector.record(
      new GraphQLError('second friend'),
      addPath(heroFriends, 1, undefined),
    );
    collector.record(
      new GraphQLError('first friend'),
      addPath(heroFriends, 0, undefined),
    );
    collector.record(new GraphQLError('name'), heroName);
    collector.record(new GraphQLError('operation'));

    expect(collector.errors.map((error) => error.message)).to.deep.equal([
      'operation',
      'name',
      'first friend',
      'second friend',
      'greeting',
    ]);
  });

  it('orders a parent before its descendants', () => {
    const collector = new ErrorCollector();
    collector.record(new GraphQLError('child'), heroName);
    collector.record(new GraphQLError('parent'), hero);

    expect(collector.errors.map((error) => error.message)).to.deep.equal([
      'parent',
      'child',
    ]);
  });
});
