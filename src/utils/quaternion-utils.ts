/**
 * Quaternion and vector interpolation helpers.
 * Quaternions are [x, y, z, w], matching glTF rotation order.
 */

import { ANIMATION } from '../constants/animation';
import type { Quat, Vec3 } from './matrix-utils';

export function quatIdentity(): Quat {
  return [0, 0, 0, 1];
}

/**
 * Rotation of `radians` about `axis`. The axis is normalized first.
 */
export function quatFromAxisAngle(axis: Vec3, radians: number): Quat {
  const length = Math.hypot(axis[0], axis[1], axis[2]);
  if (length === 0) {
    return quatIdentity();
  }
  const half = radians / 2;
  const s = Math.sin(half) / length;
  return [axis[0] * s, axis[1] * s, axis[2] * s, Math.cos(half)];
}

export function quatNormalize(q: ArrayLike<number>): Quat {
  const length = Math.hypot(q[0], q[1], q[2], q[3]);
  if (length === 0) {
    return quatIdentity();
  }
  return [q[0] / length, q[1] / length, q[2] / length, q[3] / length];
}

/**
 * Spherical interpolation along the shortest arc.
 */
export function quatSlerp(a: ArrayLike<number>, b: ArrayLike<number>, t: number): Quat {
  let bx = b[0], by = b[1], bz = b[2], bw = b[3];
  let cosom = a[0] * bx + a[1] * by + a[2] * bz + a[3] * bw;

  if (cosom < 0) {
    cosom = -cosom;
    bx = -bx;
    by = -by;
    bz = -bz;
    bw = -bw;
  }

  let scale0: number;
  let scale1: number;
  if (1 - cosom > ANIMATION.SLERP_EPSILON) {
    const omega = Math.acos(cosom);
    const sinom = Math.sin(omega);
    scale0 = Math.sin((1 - t) * omega) / sinom;
    scale1 = Math.sin(t * omega) / sinom;
  } else {
    // Nearly parallel
    scale0 = 1 - t;
    scale1 = t;
  }

  return quatNormalize([
    scale0 * a[0] + scale1 * bx,
    scale0 * a[1] + scale1 * by,
    scale0 * a[2] + scale1 * bz,
    scale0 * a[3] + scale1 * bw,
  ]);
}

export function vec3Lerp(a: ArrayLike<number>, b: ArrayLike<number>, t: number): Vec3 {
  return [
    a[0] + (b[0] - a[0]) * t,
    a[1] + (b[1] - a[1]) * t,
    a[2] + (b[2] - a[2]) * t,
  ];
}

/**
 * Hamilton product a · b (rotate by b, then by a).
 */
export function quatMultiply(a: ArrayLike<number>, b: ArrayLike<number>): Quat {
  const ax = a[0], ay = a[1], az = a[2], aw = a[3];
  const bx = b[0], by = b[1], bz = b[2], bw = b[3];
  return [
    ax * bw + aw * bx + ay * bz - az * by,
    ay * bw + aw * by + az * bx - ax * bz,
    az * bw + aw * bz + ax * by - ay * bx,
    aw * bw - ax * bx - ay * by - az * bz,
  ];
}
