/**
 * Matrix Utilities
 *
 * 4x4 matrix helpers for bone transforms. Matrices are stored column-major
 * as 16-element arrays, the layout glTF accessors and WebGL uniforms use, so
 * element (row r, column c) lives at index c * 4 + r.
 */

import { SKELETON } from '../constants/skeleton';

export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number];
export type Mat4 = number[];

/**
 * Identity matrix as a plain array.
 */
export const IDENTITY_MATRIX: readonly number[] = Object.freeze([
  1, 0, 0, 0,
  0, 1, 0, 0,
  0, 0, 1, 0,
  0, 0, 0, 1,
]);

/**
 * Returns a fresh identity matrix.
 */
export function createIdentity(): Mat4 {
  return [...IDENTITY_MATRIX];
}

/**
 * Copies any 16-element array-like (Float32Array, accessor slice) into a Mat4.
 */
export function toMat4(source: ArrayLike<number>, offset: number = 0): Mat4 {
  const out: Mat4 = new Array<number>(16);
  for (let i = 0; i < 16; i++) {
    out[i] = source[offset + i];
  }
  return out;
}

/**
 * Computes a · b.
 * Applying the result to a point applies b first, then a.
 */
export function multiply(a: ArrayLike<number>, b: ArrayLike<number>): Mat4 {
  const out: Mat4 = new Array<number>(16);
  for (let col = 0; col < 4; col++) {
    for (let row = 0; row < 4; row++) {
      out[col * 4 + row] =
        a[row] * b[col * 4] +
        a[4 + row] * b[col * 4 + 1] +
        a[8 + row] * b[col * 4 + 2] +
        a[12 + row] * b[col * 4 + 3];
    }
  }
  return out;
}

/**
 * Inverts a 4x4 matrix.
 * Returns null when the determinant is too close to zero to invert.
 */
export function invert(m: ArrayLike<number>): Mat4 | null {
  const a00 = m[0], a01 = m[1], a02 = m[2], a03 = m[3];
  const a10 = m[4], a11 = m[5], a12 = m[6], a13 = m[7];
  const a20 = m[8], a21 = m[9], a22 = m[10], a23 = m[11];
  const a30 = m[12], a31 = m[13], a32 = m[14], a33 = m[15];

  const b00 = a00 * a11 - a01 * a10;
  const b01 = a00 * a12 - a02 * a10;
  const b02 = a00 * a13 - a03 * a10;
  const b03 = a01 * a12 - a02 * a11;
  const b04 = a01 * a13 - a03 * a11;
  const b05 = a02 * a13 - a03 * a12;
  const b06 = a20 * a31 - a21 * a30;
  const b07 = a20 * a32 - a22 * a30;
  const b08 = a20 * a33 - a23 * a30;
  const b09 = a21 * a32 - a22 * a31;
  const b10 = a21 * a33 - a23 * a31;
  const b11 = a22 * a33 - a23 * a32;

  const det = b00 * b11 - b01 * b10 + b02 * b09 + b03 * b08 - b04 * b07 + b05 * b06;
  if (Math.abs(det) < SKELETON.SINGULAR_EPSILON) {
    return null;
  }
  const invDet = 1.0 / det;

  return [
    (a11 * b11 - a12 * b10 + a13 * b09) * invDet,
    (a02 * b10 - a01 * b11 - a03 * b09) * invDet,
    (a31 * b05 - a32 * b04 + a33 * b03) * invDet,
    (a22 * b04 - a21 * b05 - a23 * b03) * invDet,
    (a12 * b08 - a10 * b11 - a13 * b07) * invDet,
    (a00 * b11 - a02 * b08 + a03 * b07) * invDet,
    (a32 * b02 - a30 * b05 - a33 * b01) * invDet,
    (a20 * b05 - a22 * b02 + a23 * b01) * invDet,
    (a10 * b10 - a11 * b08 + a13 * b06) * invDet,
    (a01 * b08 - a00 * b10 - a03 * b06) * invDet,
    (a30 * b04 - a31 * b02 + a33 * b00) * invDet,
    (a21 * b02 - a20 * b04 - a23 * b00) * invDet,
    (a11 * b07 - a10 * b09 - a12 * b06) * invDet,
    (a00 * b09 - a01 * b07 + a02 * b06) * invDet,
    (a31 * b01 - a30 * b03 - a32 * b00) * invDet,
    (a20 * b03 - a21 * b01 + a22 * b00) * invDet,
  ];
}

/**
 * Translation matrix.
 */
export function fromTranslation(t: Vec3): Mat4 {
  const out = createIdentity();
  out[12] = t[0];
  out[13] = t[1];
  out[14] = t[2];
  return out;
}

/**
 * Rotation about the Z axis, counter-clockwise for positive angles.
 */
export function fromRotationZ(radians: number): Mat4 {
  const c = Math.cos(radians);
  const s = Math.sin(radians);
  return [
    c, s, 0, 0,
    -s, c, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/**
 * Builds T · R · S from a translation, a unit quaternion and a scale.
 * This is the order glTF composes node TRS properties in.
 */
export function fromRotationTranslationScale(q: Quat, t: Vec3, s: Vec3): Mat4 {
  const [x, y, z, w] = q;
  const x2 = x + x;
  const y2 = y + y;
  const z2 = z + z;
  const xx = x * x2;
  const xy = x * y2;
  const xz = x * z2;
  const yy = y * y2;
  const yz = y * z2;
  const zz = z * z2;
  const wx = w * x2;
  const wy = w * y2;
  const wz = w * z2;

  return [
    (1 - (yy + zz)) * s[0], (xy + wz) * s[0], (xz - wy) * s[0], 0,
    (xy - wz) * s[1], (1 - (xx + zz)) * s[1], (yz + wx) * s[1], 0,
    (xz + wy) * s[2], (yz - wx) * s[2], (1 - (xx + yy)) * s[2], 0,
    t[0], t[1], t[2], 1,
  ];
}

/**
 * Applies an affine matrix to a point (w = 1).
 */
export function transformPoint(m: ArrayLike<number>, p: ArrayLike<number>): Vec3 {
  const x = p[0], y = p[1], z = p[2];
  return [
    m[0] * x + m[4] * y + m[8] * z + m[12],
    m[1] * x + m[5] * y + m[9] * z + m[13],
    m[2] * x + m[6] * y + m[10] * z + m[14],
  ];
}

/**
 * Applies the upper 3x3 of a matrix to a direction (w = 0).
 */
export function transformDirection(m: ArrayLike<number>, v: ArrayLike<number>): Vec3 {
  const x = v[0], y = v[1], z = v[2];
  return [
    m[0] * x + m[4] * y + m[8] * z,
    m[1] * x + m[5] * y + m[9] * z,
    m[2] * x + m[6] * y + m[10] * z,
  ];
}

/**
 * Orthographic projection, used by the demo renderer to frame 2D rigs.
 */
export function orthographic(left: number, right: number, bottom: number, top: number, near: number, far: number): Mat4 {
  const lr = 1 / (left - right);
  const bt = 1 / (bottom - top);
  const nf = 1 / (near - far);
  return [
    -2 * lr, 0, 0, 0,
    0, -2 * bt, 0, 0,
    0, 0, 2 * nf, 0,
    (left + right) * lr, (top + bottom) * bt, (far + near) * nf, 1,
  ];
}

/**
 * Checks whether every element is within `epsilon` of the identity.
 */
export function isIdentity(m: ArrayLike<number>, epsilon: number = 1e-6): boolean {
  for (let i = 0; i < 16; i++) {
    if (Math.abs(m[i] - IDENTITY_MATRIX[i]) > epsilon) {
      return false;
    }
  }
  return true;
}

/**
 * Formats a matrix row by row for log output.
 * Example: '[1, 0, 0, 4 | 0, 1, 0, 0 | 0, 0, 1, 0 | 0, 0, 0, 1]'
 */
export function formatMatrix(m: ArrayLike<number>, precision: number = 4): string {
  const rows: string[] = [];
  for (let row = 0; row < 4; row++) {
    const values: string[] = [];
    for (let col = 0; col < 4; col++) {
      values.push(String(Number(m[col * 4 + row].toFixed(precision))));
    }
    rows.push(values.join(', '));
  }
  return `[${rows.join(' | ')}]`;
}
