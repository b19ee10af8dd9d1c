/**
 * Animation Clip
 *
 * A named set of bone tracks that can be sampled at any time and written
 * into a skeleton's current pose.
 */

import { SkinningErrorFactory } from '../errors';
import { AnimationClipSchema, type AnimationClipInput } from '../schemas';
import { parseWithSchema } from '../validation';
import type { Skeleton, BoneTransform } from '../core/skeleton';
import { sampleTrack, type AnimationTrack } from './animation-sampler';

export interface ApplyOptions {
  /** Wrap time into [0, duration) instead of clamping */
  loop?: boolean;
}

export class AnimationClip {
  readonly name: string;
  readonly tracks: readonly AnimationTrack[];
  readonly duration: number;

  constructor(name: string, tracks: AnimationTrack[], duration?: number) {
    this.name = name;
    this.tracks = tracks;
    this.duration = duration ?? tracks.reduce(
      (max, track) => Math.max(max, track.times[track.times.length - 1] ?? 0),
      0
    );
  }

  /**
   * Builds a clip from plain track definitions, validated with Zod.
   */
  static fromDefinition(input: AnimationClipInput): AnimationClip {
    const definition = parseWithSchema(AnimationClipSchema, input, 'clip', 'Invalid animation clip');
    return new AnimationClip(definition.name, definition.tracks);
  }

  /**
   * Bones animated by this clip, ascending
   */
  listBones(): number[] {
    return Array.from(new Set(this.tracks.map(track => track.bone))).sort((a, b) => a - b);
  }

  /**
   * Maps a playback time into the clip's range.
   */
  resolveTime(time: number, loop: boolean): number {
    if (this.duration <= 0) return 0;
    if (loop) {
      return ((time % this.duration) + this.duration) % this.duration;
    }
    return Math.min(Math.max(time, 0), this.duration);
  }

  /**
   * Samples every track, grouped by bone.
   */
  sample(time: number, options: ApplyOptions = {}): Map<number, Partial<BoneTransform>> {
    const localTime = this.resolveTime(time, options.loop ?? true);
    const pose = new Map<number, Partial<BoneTransform>>();

    for (const track of this.tracks) {
      const value = sampleTrack(track, localTime);
      const transform = pose.get(track.bone) ?? {};
      switch (track.path) {
        case 'translation':
          transform.translation = [value[0], value[1], value[2]];
          break;
        case 'rotation':
          transform.rotation = [value[0], value[1], value[2], value[3]];
          break;
        case 'scale':
          transform.scale = [value[0], value[1], value[2]];
          break;
      }
      pose.set(track.bone, transform);
    }

    return pose;
  }

  /**
   * Writes the sampled pose into the skeleton. Bones without tracks keep
   * their current transform.
   */
  apply(skeleton: Skeleton, time: number, options: ApplyOptions = {}): void {
    for (const track of this.tracks) {
      if (track.bone >= skeleton.boneCount) {
        throw SkinningErrorFactory.validationError(
          `Clip "${this.name}" animates bone ${track.bone}, skeleton has ${skeleton.boneCount}`,
          'tracks.bone',
          { clip: this.name, bone: track.bone }
        );
      }
    }

    for (const [bone, transform] of this.sample(time, options)) {
      skeleton.setLocalTransform(bone, transform);
    }
  }
}
