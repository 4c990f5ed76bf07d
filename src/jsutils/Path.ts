import type { Maybe } from './Maybe';

/**
 * A response path. `order` is the position of the entry among its siblings:
 * the index of the field within its compiled selection set, or the list
 * index for list items.
 */
export interface Path {
  readonly prev: Path | undefined;
  readonly key: string | number;
  readonly typename: string | undefined;
  readonly order: number;
}

/**
 * Given a Path and a key, return a new Path containing the new key.
 */
export function addPath(
  prev: Readonly<Path> | undefined,
  key: string | number,
  typename: string | undefined,
  order: number = typeof key === 'number' ? key : 0,
): Path {
  return { prev, key, typename, order };
}

/**
 * Given a Path, return an Array of the path keys.
 */
export function pathToArray(
  path: Maybe<Readonly<Path>>,
): Array<string | number> {
  const flattened = [];
  let curr = path;
  while (curr) {
    flattened.push(curr.key);
    curr = curr.prev;
  }
  return flattened.reverse();
}

/**
 * Given a Path, return an Array of the sibling positions along it.
 */
export function pathToOrders(path: Maybe<Readonly<Path>>): Array<number> {
  const flattened = [];
  let curr = path;
  while (curr) {
    flattened.push(curr.order);
    curr = curr.prev;
  }
  return flattened.reverse();
}
