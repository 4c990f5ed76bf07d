import { expect } from 'chai';

export function expectPromise(promise: unknown) {
  expect(promise).to.be.instanceOf(Promise);

  return {
    async toResolveAs(value: unknown): Promise<void> {
      let resolvedValue: unknown;
      try {
        resolvedValue = await promise;
      } catch (error) {
        throw new Error(`Expected promise to resolve, got ${String(error)}`);
      }
      expect(resolvedValue).to.deep.equal(value);
    },
  };
}
