/**
 * Linear Blend Skinning
 *
 * CPU reference of what the skinning vertex shader does:
 *
 *   p' = Σ wᵢ · (skinᵢ · p),  skinᵢ = worldᵢ · inverseBindᵢ
 *
 * The inverse bind matrix first moves a bind-pose vertex into the bone's
 * own space, so only the bone's motion since the bind pose is applied.
 */

import { SkinningErrorFactory } from '../errors';
import type { SkinnedMesh } from '../core/skinned-mesh';
import type { Vec3 } from '../utils/matrix-utils';

export interface SkinningResult {
  positions: Float32Array;
  normals?: Float32Array;
}

function assertPalette(mesh: SkinnedMesh, skinMatrices: ArrayLike<ArrayLike<number>>): void {
  for (let i = 0; i < mesh.weights.length; i++) {
    if (mesh.weights[i] > 0 && mesh.joints[i] >= skinMatrices.length) {
      throw SkinningErrorFactory.validationError(
        `Mesh "${mesh.name}" uses joint ${mesh.joints[i]} but only ${skinMatrices.length} skin matrices were given`,
        'skinMatrices',
        { joint: mesh.joints[i], matrixCount: skinMatrices.length }
      );
    }
  }
}

/**
 * Blends one attribute of one vertex. `w` is 1 for positions, 0 for normals.
 * Returns false when the vertex has no weight at all.
 */
function blend(
  mesh: SkinnedMesh,
  vertex: number,
  source: ArrayLike<number>,
  skinMatrices: ArrayLike<ArrayLike<number>>,
  w: 0 | 1,
  out: Vec3
): boolean {
  const x = source[vertex * 3];
  const y = source[vertex * 3 + 1];
  const z = source[vertex * 3 + 2];
  out[0] = 0;
  out[1] = 0;
  out[2] = 0;
  let total = 0;

  const base = vertex * mesh.influencesPerVertex;
  for (let slot = 0; slot < mesh.influencesPerVertex; slot++) {
    const weight = mesh.weights[base + slot];
    if (weight === 0) continue;

    const m = skinMatrices[mesh.joints[base + slot]];
    out[0] += weight * (m[0] * x + m[4] * y + m[8] * z + m[12] * w);
    out[1] += weight * (m[1] * x + m[5] * y + m[9] * z + m[13] * w);
    out[2] += weight * (m[2] * x + m[6] * y + m[10] * z + m[14] * w);
    total += weight;
  }

  return total > 0;
}

/**
 * Skinned position of a single vertex.
 */
export function skinVertex(mesh: SkinnedMesh, vertex: number, skinMatrices: ArrayLike<ArrayLike<number>>): Vec3 {
  if (vertex < 0 || vertex >= mesh.vertexCount) {
    throw SkinningErrorFactory.validationError(`Vertex ${vertex} is out of range`, 'vertex', { vertex });
  }
  assertPalette(mesh, skinMatrices);

  const out: Vec3 = [0, 0, 0];
  if (!blend(mesh, vertex, mesh.positions, skinMatrices, 1, out)) {
    return [mesh.positions[vertex * 3], mesh.positions[vertex * 3 + 1], mesh.positions[vertex * 3 + 2]];
  }
  return out;
}

/**
 * Skins every vertex. Vertices with no weight keep their bind position.
 * Normals are blended with the upper 3x3 and renormalized.
 */
export function skinVertices(
  mesh: SkinnedMesh,
  skinMatrices: ArrayLike<ArrayLike<number>>,
  target?: Float32Array
): SkinningResult {
  assertPalette(mesh, skinMatrices);

  const positions = target ?? new Float32Array(mesh.positions.length);
  const normals = mesh.normals ? new Float32Array(mesh.normals.length) : undefined;
  const out: Vec3 = [0, 0, 0];

  for (let vertex = 0; vertex < mesh.vertexCount; vertex++) {
    const base = vertex * 3;

    if (blend(mesh, vertex, mesh.positions, skinMatrices, 1, out)) {
      positions[base] = out[0];
      positions[base + 1] = out[1];
      positions[base + 2] = out[2];
    } else {
      positions[base] = mesh.positions[base];
      positions[base + 1] = mesh.positions[base + 1];
      positions[base + 2] = mesh.positions[base + 2];
    }

    if (mesh.normals && normals) {
      const skinned = blend(mesh, vertex, mesh.normals, skinMatrices, 0, out);
      const source = skinned ? out : [mesh.normals[base], mesh.normals[base + 1], mesh.normals[base + 2]];
      const length = Math.hypot(source[0], source[1], source[2]) || 1;
      normals[base] = source[0] / length;
      normals[base + 1] = source[1] / length;
      normals[base + 2] = source[2] / length;
    }
  }

  return normals ? { positions, normals } : { positions };
}
