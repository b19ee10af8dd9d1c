/**
 * Skinned Model
 *
 * A skeleton with the meshes bound to it and the clips that animate it.
 */

import type { AnimationClip } from '../animation/animation-clip';
import type { Skeleton } from './skeleton';
import type { SkinnedMesh } from './skinned-mesh';

export interface SkinnedModel {
  name: string;
  skeleton: Skeleton;
  meshes: SkinnedMesh[];
  clips: AnimationClip[];
}

/**
 * Looks a clip up by name; without a name the first clip is returned.
 */
export function findClip(model: SkinnedModel, name?: string): AnimationClip | undefined {
  if (name === undefined) {
    return model.clips[0];
  }
  return model.clips.find(clip => clip.name === name);
}
