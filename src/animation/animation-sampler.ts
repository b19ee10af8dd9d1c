/**
 * Keyframe sampling for bone tracks.
 *
 * Follows glTF sampler semantics: STEP holds the previous key, LINEAR
 * interpolates (slerp for rotations) and CUBICSPLINE evaluates a Hermite
 * spline whose keys are stored as [in-tangent, value, out-tangent].
 */

import type { Interpolation, TrackPath } from '../schemas';
import { quatNormalize, quatSlerp, vec3Lerp } from '../utils/quaternion-utils';

export interface AnimationTrack {
  bone: number;
  path: TrackPath;
  times: ArrayLike<number>;
  values: ArrayLike<number>;
  interpolation: Interpolation;
}

/**
 * Components per key: 4 for rotations, 3 otherwise.
 */
export function componentsFor(path: TrackPath): number {
  return path === 'rotation' ? 4 : 3;
}

function readKey(track: AnimationTrack, key: number, element: 0 | 1 | 2): number[] {
  const components = componentsFor(track.path);
  const cubic = track.interpolation === 'CUBICSPLINE';
  const start = cubic ? (key * 3 + element) * components : key * components;
  const out: number[] = [];
  for (let i = 0; i < components; i++) {
    out.push(track.values[start + i]);
  }
  return out;
}

/**
 * Value stored at a key, skipping tangents for cubic tracks.
 */
function keyValue(track: AnimationTrack, key: number): number[] {
  return readKey(track, key, track.interpolation === 'CUBICSPLINE' ? 1 : 0);
}

/**
 * Index of the last key at or before `time` (binary search).
 */
export function findKeyIndex(times: ArrayLike<number>, time: number): number {
  let low = 0;
  let high = times.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (times[mid] <= time) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

function hermite(track: AnimationTrack, key: number, u: number, span: number): number[] {
  const p0 = keyValue(track, key);
  const m0 = readKey(track, key, 2).map(v => v * span);
  const p1 = keyValue(track, key + 1);
  const m1 = readKey(track, key + 1, 0).map(v => v * span);

  const u2 = u * u;
  const u3 = u2 * u;
  const h00 = 2 * u3 - 3 * u2 + 1;
  const h10 = u3 - 2 * u2 + u;
  const h01 = -2 * u3 + 3 * u2;
  const h11 = u3 - u2;

  const out = p0.map((_, i) => h00 * p0[i] + h10 * m0[i] + h01 * p1[i] + h11 * m1[i]);
  return track.path === 'rotation' ? quatNormalize(out) : out;
}

/**
 * Samples a track at `time` seconds.
 * Times outside the key range clamp to the first or last key.
 */
export function sampleTrack(track: AnimationTrack, time: number): number[] {
  const count = track.times.length;
  if (count === 1 || time <= track.times[0]) {
    return keyValue(track, 0);
  }
  if (time >= track.times[count - 1]) {
    return keyValue(track, count - 1);
  }

  const key = findKeyIndex(track.times, time);
  if (track.interpolation === 'STEP') {
    return keyValue(track, key);
  }

  const t0 = track.times[key];
  const t1 = track.times[key + 1];
  const span = t1 - t0;
  const u = (time - t0) / span;

  if (track.interpolation === 'CUBICSPLINE') {
    return hermite(track, key, u, span);
  }

  const a = keyValue(track, key);
  const b = keyValue(track, key + 1);
  return track.path === 'rotation' ? quatSlerp(a, b, u) : vec3Lerp(a, b, u);
}
