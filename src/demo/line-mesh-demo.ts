/**
 * Line Mesh Demo
 *
 * A horizontal strip of 10 vertices bent by a chain of 3 bones:
 *
 *   x:      0     2     4     6     8
 *   top:    0     2     4     6     8      (y = +1)
 *   bottom: 1     3     5     7     9      (y = -1)
 *   bones:  b0   b0+b1  b1   b1+b2  b2
 *
 * Bone 0 sits at the origin, bones 1 and 2 each 4 units further along x.
 * Every bone swings about Z with the same sine oscillation.
 */

import { AnimationClip } from '../animation/animation-clip';
import { applyOscillation, createOscillatingClip } from '../animation/procedural';
import { Skeleton } from '../core/skeleton';
import { createSkinnedMesh, type SkinnedMesh } from '../core/skinned-mesh';
import type { SkinnedModel } from '../core/skinned-model';
import type { OscillationOptionsInput } from '../schemas';
import { skinVertices, type SkinningResult } from '../skinning/linear-blend-skinning';
import { orthographic, type Mat4 } from '../utils/matrix-utils';

export interface LineMeshDemo {
  skeleton: Skeleton;
  mesh: SkinnedMesh;
  clip: AnimationClip;
  oscillation: OscillationOptionsInput;
  /** Frames the strip with some margin for the swing */
  projection: Mat4;
}

const COLUMNS = [0, 2, 4, 6, 8];
const BONE_SPACING = 4;

const COLUMN_INFLUENCES = [
  { joints: [0], weights: [1] },
  { joints: [0, 1], weights: [0.5, 0.5] },
  { joints: [1], weights: [1] },
  { joints: [1, 2], weights: [0.5, 0.5] },
  { joints: [2], weights: [1] },
];

function stripIndices(columns: number): number[] {
  const indices: number[] = [];
  for (let c = 0; c < columns - 1; c++) {
    const top = c * 2;
    indices.push(top, top + 2, top + 1, top + 3);
  }
  for (let c = 0; c < columns; c++) {
    indices.push(c * 2, c * 2 + 1);
  }
  return indices;
}

export function createLineMeshDemo(oscillation: Partial<OscillationOptionsInput> = {}): LineMeshDemo {
  const skeleton = Skeleton.fromDefinitions([
    { name: 'bone0' },
    { name: 'bone1', parent: 0, translation: [BONE_SPACING, 0, 0] },
    { name: 'bone2', parent: 1, translation: [BONE_SPACING, 0, 0] },
  ]);
  skeleton.bind();

  const positions: number[] = [];
  const influences = COLUMNS.flatMap((x, column) => {
    positions.push(x, 1, x, -1);
    return [COLUMN_INFLUENCES[column], COLUMN_INFLUENCES[column]];
  });

  const mesh = createSkinnedMesh(
    {
      name: 'strip',
      dimensions: 2,
      positions,
      influences,
      indices: stripIndices(COLUMNS.length),
      mode: 'lines',
    },
    {},
    skeleton.boneCount
  );

  const options: OscillationOptionsInput = {
    bones: [0, 1, 2],
    axis: [0, 0, 1],
    ...oscillation,
  };

  return {
    skeleton,
    mesh,
    clip: createOscillatingClip('swing', skeleton, options),
    oscillation: options,
    projection: orthographic(-12, 12, -12, 12, -1, 1),
  };
}

/**
 * Poses the rig at `seconds` and returns the skinned strip.
 */
export function evaluateLineMeshDemo(demo: LineMeshDemo, seconds: number): SkinningResult {
  applyOscillation(demo.skeleton, demo.oscillation, seconds);
  return skinVertices(demo.mesh, demo.skeleton.computeSkinMatrices());
}

export function toSkinnedModel(demo: LineMeshDemo): SkinnedModel {
  return {
    name: 'LineMeshDemo',
    skeleton: demo.skeleton,
    meshes: [demo.mesh],
    clips: [demo.clip],
  };
}
