/**
 * Skinned Mesh
 *
 * Vertex data plus packed bone influences, in the attribute layout that
 * both glTF primitives and WebGL vertex buffers use.
 */

import { ERROR_MESSAGES } from '../constants/errors';
import {
  InfluenceOptionsSchema,
  SkinnedMeshInputSchema,
  type InfluenceOptions,
  type PrimitiveMode,
  type SkinnedMeshInput,
  type VertexInfluence
} from '../schemas';
import { parseWithSchema } from '../validation';
import {
  influenceSlotsFor,
  packInfluences,
  prepareInfluence,
  unpackInfluences,
  validateInfluences
} from '../skinning/weights';

export interface SkinnedMesh {
  name: string;
  vertexCount: number;
  /** xyz per vertex */
  positions: Float32Array;
  normals?: Float32Array;
  joints: Uint16Array;
  weights: Float32Array;
  influencesPerVertex: number;
  indices?: Uint16Array | Uint32Array;
  mode: PrimitiveMode;
}

/**
 * Already-validated mesh data, as produced by the input schema or an importer.
 */
export interface SkinnedMeshSource {
  name: string;
  dimensions: 2 | 3;
  positions: ArrayLike<number>;
  normals?: ArrayLike<number>;
  influences: VertexInfluence[];
  indices?: ArrayLike<number>;
  mode: PrimitiveMode;
}

const MAX_UINT16_INDEX = 0xffff;

/**
 * Validates plain input with Zod and builds a skinned mesh.
 * When `boneCount` is given every joint index is checked against it.
 */
export function createSkinnedMesh(
  input: SkinnedMeshInput,
  options: Partial<InfluenceOptions> = {},
  boneCount?: number
): SkinnedMesh {
  const data = parseWithSchema(SkinnedMeshInputSchema, input, 'mesh', ERROR_MESSAGES.INVALID_MESH);
  return buildSkinnedMesh(data, options, boneCount);
}

/**
 * Limits, normalizes and packs influences, and pads 2D positions with z = 0.
 */
export function buildSkinnedMesh(
  source: SkinnedMeshSource,
  options: Partial<InfluenceOptions> = {},
  boneCount?: number
): SkinnedMesh {
  const resolved = InfluenceOptionsSchema.parse(options);

  if (boneCount !== undefined) {
    validateInfluences(source.influences, boneCount);
  }

  const vertexCount = source.influences.length;
  const positions = new Float32Array(vertexCount * 3);
  for (let vertex = 0; vertex < vertexCount; vertex++) {
    for (let axis = 0; axis < source.dimensions; axis++) {
      positions[vertex * 3 + axis] = source.positions[vertex * source.dimensions + axis];
    }
  }

  const prepared = source.influences.map(influence => prepareInfluence(influence, resolved));
  const packed = packInfluences(prepared, influenceSlotsFor(resolved.maxInfluences));

  const mesh: SkinnedMesh = {
    name: source.name,
    vertexCount,
    positions,
    joints: packed.joints,
    weights: packed.weights,
    influencesPerVertex: packed.influencesPerVertex,
    mode: source.mode,
  };

  if (source.normals) {
    mesh.normals = Float32Array.from(source.normals);
  }
  if (source.indices) {
    mesh.indices = vertexCount > MAX_UINT16_INDEX
      ? Uint32Array.from(source.indices)
      : Uint16Array.from(source.indices);
  }

  return mesh;
}

/**
 * Influences of every vertex, zero-weight slots dropped.
 */
export function listInfluences(mesh: SkinnedMesh): VertexInfluence[] {
  return unpackInfluences(mesh.joints, mesh.weights, mesh.influencesPerVertex);
}

/**
 * Highest joint index any vertex uses with a non-zero weight, or -1.
 */
export function maxReferencedJoint(mesh: SkinnedMesh): number {
  let max = -1;
  for (let i = 0; i < mesh.weights.length; i++) {
    if (mesh.weights[i] > 0 && mesh.joints[i] > max) {
      max = mesh.joints[i];
    }
  }
  return max;
}
