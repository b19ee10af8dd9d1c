/**
 * Vertex Weights
 *
 * Preparation of per-vertex bone influences: merging, limiting,
 * normalizing and packing into the JOINTS_n / WEIGHTS_n layout shared by
 * glTF accessors and WebGL vertex attributes.
 */

import { SKELETON } from '../constants/skeleton';
import { SkinningErrorFactory } from '../errors';
import type { InfluenceOptions, VertexInfluence } from '../schemas';

/**
 * Influences packed as fixed-size slots per vertex.
 * Unused slots hold joint 0 with weight 0.
 */
export interface PackedInfluences {
  joints: Uint16Array;
  weights: Float32Array;
  influencesPerVertex: number;
}

interface InfluenceEntry {
  joint: number;
  weight: number;
}

function toEntries(influence: VertexInfluence): InfluenceEntry[] {
  // Repeated joints are summed into one entry
  const merged = new Map<number, number>();
  influence.joints.forEach((joint, i) => {
    merged.set(joint, (merged.get(joint) ?? 0) + influence.weights[i]);
  });
  return Array.from(merged, ([joint, weight]) => ({ joint, weight }));
}

function fromEntries(entries: InfluenceEntry[]): VertexInfluence {
  return {
    joints: entries.map(entry => entry.joint),
    weights: entries.map(entry => entry.weight),
  };
}

/**
 * Sum of a vertex's weights
 */
export function weightSum(influence: VertexInfluence): number {
  return influence.weights.reduce((sum, weight) => sum + weight, 0);
}

/**
 * Scales weights so they sum to 1.
 * A vertex whose weights sum to 0 comes back empty and stays at its bind position.
 */
export function normalizeInfluence(influence: VertexInfluence): VertexInfluence {
  const entries = toEntries(influence).filter(entry => entry.weight > 0);
  const sum = entries.reduce((total, entry) => total + entry.weight, 0);
  if (sum <= 0) {
    return { joints: [], weights: [] };
  }
  return fromEntries(entries.map(entry => ({ joint: entry.joint, weight: entry.weight / sum })));
}

/**
 * Keeps the `maxInfluences` heaviest non-zero weights, dropping those
 * below `threshold`. Equal weights are ordered by the lower joint index.
 */
export function limitInfluences(
  influence: VertexInfluence,
  maxInfluences: number,
  threshold: number = 0
): VertexInfluence {
  const entries = toEntries(influence)
    .filter(entry => entry.weight > 0 && entry.weight >= threshold)
    .sort((a, b) => b.weight - a.weight || a.joint - b.joint)
    .slice(0, maxInfluences);
  return fromEntries(entries);
}

/**
 * Applies the configured limit, threshold and normalization to one vertex.
 */
export function prepareInfluence(influence: VertexInfluence, options: InfluenceOptions): VertexInfluence {
  const limited = limitInfluences(influence, options.maxInfluences, options.weightThreshold);
  return options.normalizeWeights ? normalizeInfluence(limited) : limited;
}

/**
 * Checks weights are in [0, 1] and joints reference existing bones.
 */
export function validateInfluences(influences: VertexInfluence[], boneCount: number): void {
  influences.forEach((influence, vertex) => {
    if (influence.joints.length !== influence.weights.length) {
      throw SkinningErrorFactory.validationError(
        `Vertex ${vertex} has ${influence.joints.length} joints but ${influence.weights.length} weights`,
        `influences.${vertex}`,
        { vertex }
      );
    }

    influence.joints.forEach((joint, slot) => {
      const weight = influence.weights[slot];
      if (!Number.isInteger(joint) || joint < 0 || joint >= boneCount) {
        throw SkinningErrorFactory.validationError(
          `Vertex ${vertex} references joint ${joint}, skeleton has ${boneCount} bones`,
          `influences.${vertex}.joints`,
          { vertex, joint, boneCount }
        );
      }
      if (!(weight >= 0 && weight <= 1)) {
        throw SkinningErrorFactory.validationError(
          `Vertex ${vertex} has weight ${weight} outside [0, 1]`,
          `influences.${vertex}.weights`,
          { vertex, weight }
        );
      }
    });
  });
}

/**
 * Rounds an influence count up to whole VEC4 attributes (4 or 8).
 */
export function influenceSlotsFor(maxInfluences: number): number {
  const perAttribute = SKELETON.JOINTS_PER_ATTRIBUTE;
  return Math.max(1, Math.ceil(maxInfluences / perAttribute)) * perAttribute;
}

/**
 * Packs influences into fixed-size slots, zero padded.
 */
export function packInfluences(influences: VertexInfluence[], influencesPerVertex: number): PackedInfluences {
  const joints = new Uint16Array(influences.length * influencesPerVertex);
  const weights = new Float32Array(influences.length * influencesPerVertex);

  influences.forEach((influence, vertex) => {
    if (influence.joints.length > influencesPerVertex) {
      throw SkinningErrorFactory.validationError(
        `Vertex ${vertex} has ${influence.joints.length} influences, only ${influencesPerVertex} fit`,
        `influences.${vertex}`,
        { vertex, influencesPerVertex }
      );
    }
    const base = vertex * influencesPerVertex;
    influence.joints.forEach((joint, slot) => {
      joints[base + slot] = joint;
      weights[base + slot] = influence.weights[slot];
    });
  });

  return { joints, weights, influencesPerVertex };
}

/**
 * Reads packed slots back into per-vertex influences, skipping zero weights.
 */
export function unpackInfluences(
  joints: ArrayLike<number>,
  weights: ArrayLike<number>,
  influencesPerVertex: number
): VertexInfluence[] {
  const vertexCount = Math.floor(weights.length / influencesPerVertex);
  const influences: VertexInfluence[] = [];

  for (let vertex = 0; vertex < vertexCount; vertex++) {
    const influence: VertexInfluence = { joints: [], weights: [] };
    for (let slot = 0; slot < influencesPerVertex; slot++) {
      const weight = weights[vertex * influencesPerVertex + slot];
      if (weight > 0) {
        influence.joints.push(joints[vertex * influencesPerVertex + slot]);
        influence.weights.push(weight);
      }
    }
    influences.push(influence);
  }

  return influences;
}
