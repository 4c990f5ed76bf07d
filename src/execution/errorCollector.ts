import type { GraphQLError } from 'graphql';

import type { Path } from '../jsutils/Path';
import { pathToArray, pathToOrders } from '../jsutils/Path';

interface CollectedError {
  readonly error: GraphQLError;
  readonly orders: ReadonlyArray<number>;
}

/**
 * Gathers the field errors of one execution.
 *
 * At most one error is kept per response path. Errors are reported in
 * response order, i.e. the order in which a depth-first walk of the
 * compiled plan reaches their paths, regardless of when concurrent
 * resolvers happened to fail. Errors without a path come first.
 */
export class ErrorCollector {
  private readonly _collected: Array<CollectedError> = [];
  private readonly _paths = new Set<string>();

  get size(): number {
    return this._collected.length;
  }

  /**
   * Records an error. Returns false when an error was already recorded for
   * the same path.
   */
  record(error: GraphQLError, path?: Path): boolean {
    if (path !== undefined) {
      const key = JSON.stringify(pathToArray(path));
      if (this._paths.has(key)) {
        return false;
      }
      this._paths.add(key);
    }
    this._collected.push({ error, orders: pathToOrders(path) });
    return true;
  }

  hasErrorAt(path: Path): boolean {
    return this._paths.has(JSON.stringify(pathToArray(path)));
  }

  get errors(): ReadonlyArray<GraphQLError> {
    return [...this._collected]
      .sort((a, b) => compareOrders(a.orders, b.orders))
      .map(({ error }) => error);
  }
}

function compareOrders(
  a: ReadonlyArray<number>,
  b: ReadonlyArray<number>,
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}
