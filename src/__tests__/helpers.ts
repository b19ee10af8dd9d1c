import { expect } from 'vitest';

/**
 * Element-wise toBeCloseTo; toEqual tells -0 from 0.
 */
export function expectClose(actual: ArrayLike<number>, expected: number[], digits = 5): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, digits));
}
