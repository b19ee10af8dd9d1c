import { describe, it, expect } from 'vitest';
import {
  createIdentity,
  formatMatrix,
  fromRotationTranslationScale,
  fromRotationZ,
  fromTranslation,
  invert,
  isIdentity,
  multiply,
  toMat4,
  transformDirection,
  transformPoint
} from '../utils/matrix-utils';
import { quatFromAxisAngle, quatMultiply, quatNormalize, quatSlerp, vec3Lerp } from '../utils/quaternion-utils';
import { expectClose } from './helpers';

describe('matrix utils', () => {
  it('multiplies translations by adding them', () => {
    const m = multiply(fromTranslation([1, 2, 3]), fromTranslation([4, 5, 6]));
    expectClose(m.slice(12, 15), [5, 7, 9]);
  });

  it('applies the right-hand matrix first', () => {
    // Rotate 90° about Z, then translate by (10, 0, 0)
    const m = multiply(fromTranslation([10, 0, 0]), fromRotationZ(Math.PI / 2));
    expectClose(transformPoint(m, [1, 0, 0]), [10, 1, 0]);
  });

  it('inverts an affine matrix', () => {
    const m = fromRotationTranslationScale(quatFromAxisAngle([0, 1, 0], 0.7), [3, -2, 5], [2, 2, 2]);
    const inverse = invert(m);
    expect(inverse).not.toBeNull();
    if (!inverse) return;
    expect(isIdentity(multiply(m, inverse))).toBe(true);
  });

  it('returns null for a singular matrix', () => {
    const m = fromRotationTranslationScale([0, 0, 0, 1], [0, 0, 0], [1, 0, 1]);
    expect(invert(m)).toBeNull();
  });

  it('does not mutate its inputs', () => {
    const a = fromTranslation([1, 0, 0]);
    const b = fromRotationZ(1);
    const aCopy = [...a];
    const bCopy = [...b];
    multiply(a, b);
    invert(a);
    expect(a).toEqual(aCopy);
    expect(b).toEqual(bCopy);
  });

  it('composes TRS in translate-rotate-scale order', () => {
    const m = fromRotationTranslationScale(quatFromAxisAngle([0, 0, 1], Math.PI / 2), [4, 0, 0], [2, 1, 1]);
    // scale x by 2 -> (2, 0, 0), rotate -> (0, 2, 0), translate -> (4, 2, 0)
    expectClose(transformPoint(m, [1, 0, 0]), [4, 2, 0]);
  });

  it('ignores translation for directions', () => {
    const m = multiply(fromTranslation([5, 5, 5]), fromRotationZ(Math.PI));
    expectClose(transformDirection(m, [1, 0, 0]), [-1, 0, 0]);
  });

  it('copies a matrix out of a flat array at an offset', () => {
    const flat = new Float32Array(32);
    flat.set(fromTranslation([7, 8, 9]), 16);
    expect(toMat4(flat, 16)).toEqual(fromTranslation([7, 8, 9]));
  });

  it('formats matrices row by row', () => {
    expect(formatMatrix(fromTranslation([4, 0, 0]))).toBe('[1, 0, 0, 4 | 0, 1, 0, 0 | 0, 0, 1, 0 | 0, 0, 0, 1]');
  });

  it('recognizes the identity within a tolerance', () => {
    const m = createIdentity();
    m[12] = 1e-8;
    expect(isIdentity(m)).toBe(true);
    m[12] = 1e-3;
    expect(isIdentity(m)).toBe(false);
  });
});

describe('quaternion utils', () => {
  it('builds a rotation from a non-unit axis', () => {
    expectClose(quatFromAxisAngle([0, 0, 2], Math.PI), [0, 0, 1, 0]);
  });

  it('returns the identity for a zero axis', () => {
    expect(quatFromAxisAngle([0, 0, 0], 1)).toEqual([0, 0, 0, 1]);
  });

  it('normalizes quaternions', () => {
    expect(quatNormalize([0, 0, 0, 2])).toEqual([0, 0, 0, 1]);
  });

  it('slerps halfway between two rotations', () => {
    const a = quatFromAxisAngle([0, 0, 1], 0);
    const b = quatFromAxisAngle([0, 0, 1], Math.PI / 2);
    const half = quatSlerp(a, b, 0.5);
    expectClose(half, quatFromAxisAngle([0, 0, 1], Math.PI / 4));
  });

  it('takes the shortest arc', () => {
    const a: [number, number, number, number] = [0, 0, 0, 1];
    const b: [number, number, number, number] = [0, 0, 0, -1];
    // Same rotation with opposite sign: every t stays at the identity
    expectClose(quatSlerp(a, b, 0.5), [0, 0, 0, 1]);
  });

  it('composes rotations about the same axis', () => {
    const quarter = quatFromAxisAngle([1, 0, 0], Math.PI / 4);
    expectClose(quatMultiply(quarter, quarter), quatFromAxisAngle([1, 0, 0], Math.PI / 2));
  });

  it('lerps vectors', () => {
    expect(vec3Lerp([0, 0, 0], [2, 4, 6], 0.25)).toEqual([0.5, 1, 1.5]);
  });
});
