/**
 * Procedural joint motion
 *
 * A sine oscillation about a fixed axis, applied on top of each bone's
 * rest rotation: angle(t) = sin(t · speed + phase · i) · amplitude.
 */

import { ANIMATION } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import type { Skeleton } from '../core/skeleton';
import {
  OscillationOptionsSchema,
  SampleRateSchema,
  type OscillationOptions,
  type OscillationOptionsInput
} from '../schemas';
import { quatFromAxisAngle, quatMultiply } from '../utils/quaternion-utils';
import { parseWithSchema } from '../validation';
import { AnimationClip } from './animation-clip';
import type { AnimationTrack } from './animation-sampler';

function resolve(options: OscillationOptionsInput): OscillationOptions {
  return parseWithSchema(OscillationOptionsSchema, options, 'oscillation', ERROR_MESSAGES.INVALID_OSCILLATION);
}

function angleAt(options: OscillationOptions, seconds: number, boneSlot: number): number {
  return Math.sin(seconds * options.speed + options.phase * boneSlot) * options.amplitude;
}

export function oscillationAngle(options: OscillationOptionsInput, seconds: number, boneSlot: number = 0): number {
  return angleAt(resolve(options), seconds, boneSlot);
}

/**
 * Sets each listed bone's rotation to rest · oscillation(seconds).
 */
export function applyOscillation(skeleton: Skeleton, options: OscillationOptionsInput, seconds: number): void {
  const resolved = resolve(options);
  resolved.bones.forEach((bone, slot) => {
    const rest = skeleton.getBone(bone).rotation;
    const delta = quatFromAxisAngle(resolved.axis, angleAt(resolved, seconds, slot));
    skeleton.setLocalTransform(bone, { rotation: quatMultiply(rest, delta) });
  });
}

/**
 * Bakes one period of the oscillation into LINEAR rotation keys.
 */
export function createOscillatingClip(
  name: string,
  skeleton: Skeleton,
  options: OscillationOptionsInput,
  sampleRate: number = ANIMATION.BAKE_SAMPLE_RATE
): AnimationClip {
  const resolved = resolve(options);
  const rate = parseWithSchema(SampleRateSchema, sampleRate, 'sampleRate', ERROR_MESSAGES.INVALID_OSCILLATION);
  const duration = (2 * Math.PI) / resolved.speed;
  const keyCount = Math.max(2, Math.ceil(duration * rate) + 1);

  const times: number[] = [];
  for (let key = 0; key < keyCount; key++) {
    times.push(Math.min((key / (keyCount - 1)) * duration, duration));
  }

  const tracks: AnimationTrack[] = resolved.bones.map((bone, slot): AnimationTrack => {
    const rest = skeleton.getBone(bone).rotation;
    const values: number[] = [];
    for (const time of times) {
      const delta = quatFromAxisAngle(resolved.axis, angleAt(resolved, time, slot));
      values.push(...quatMultiply(rest, delta));
    }
    return { bone, path: 'rotation', times, values, interpolation: 'LINEAR' };
  });

  return new AnimationClip(name, tracks, duration);
}
