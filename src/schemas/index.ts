/**
 * Zod Schemas for skinkit
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { ANIMATION } from '../constants/animation';
import { DEFAULT_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { SKELETON } from '../constants/skeleton';
import {
  Vec3Schema,
  QuatSchema,
  Mat4Schema,
  InterpolationSchema,
  TrackPathSchema,
  PrimitiveModeSchema,
  LogLevelSchema
} from './base-schemas';

/**
 * glTF Preprocessing Options Schema
 */
export const GltfPreprocessOptionsSchema = z.object({
  dequantize: z.boolean().optional().default(true),
  resample: z.boolean().optional().default(false),
});

/**
 * Skinning Configuration Schema
 */
export const SkinningConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  debugOutputDir: z.string().min(1, 'Debug output directory cannot be empty').optional().default(DEFAULT_CONFIG.DEBUG_OUTPUT_DIR),
  logLevel: LogLevelSchema.optional().default(DEFAULT_CONFIG.LOG_LEVEL),
  maxInfluences: z.number().int().min(1).max(SKELETON.MAX_INFLUENCES).optional().default(DEFAULT_CONFIG.MAX_INFLUENCES),
  normalizeWeights: z.boolean().optional().default(DEFAULT_CONFIG.NORMALIZE_WEIGHTS),
  weightThreshold: z.number().min(0).max(1).optional().default(DEFAULT_CONFIG.WEIGHT_THRESHOLD),
  loop: z.boolean().optional().default(DEFAULT_CONFIG.LOOP),
  preprocess: GltfPreprocessOptionsSchema.optional().default({}),
});

/**
 * Options that shape how vertex influences are prepared
 */
export const InfluenceOptionsSchema = SkinningConfigSchema.pick({
  maxInfluences: true,
  normalizeWeights: true,
  weightThreshold: true,
});

/**
 * Bone Definition Schema
 *
 * Rest-pose local transform of one bone. `parent` is the index of the
 * parent bone, or -1 for a root.
 */
export const BoneDefinitionSchema = z.object({
  name: z.string().min(1, 'Bone name cannot be empty'),
  parent: z.number().int().min(SKELETON.ROOT_PARENT).optional().default(SKELETON.ROOT_PARENT),
  translation: Vec3Schema.optional().default([0, 0, 0]),
  rotation: QuatSchema.optional().default([0, 0, 0, 1]),
  scale: Vec3Schema.optional().default([1, 1, 1]),
  parentTransform: Mat4Schema.optional(),
});

export const BoneDefinitionsSchema = z.array(BoneDefinitionSchema).min(1, ERROR_MESSAGES.EMPTY_SKELETON);

/**
 * Vertex Influence Schema
 *
 * Joint indices and matching weights for one vertex.
 */
export const VertexInfluenceSchema = z.object({
  joints: z.array(z.number().int().nonnegative()),
  weights: z.array(z.number().min(0, 'Weight must be in [0, 1]').max(1, 'Weight must be in [0, 1]')),
}).refine(influence => influence.joints.length === influence.weights.length, {
  message: 'joints and weights must have the same length',
});

/**
 * Skinned Mesh Input Schema
 *
 * Flat position (and optional normal) arrays plus one influence per vertex.
 * With `dimensions: 2` positions are [x, y] pairs.
 */
export const SkinnedMeshInputSchema = z.object({
  name: z.string().optional().default('SkinnedMesh'),
  dimensions: z.union([z.literal(2), z.literal(3)]).optional().default(3),
  positions: z.array(z.number()).min(1, 'Mesh needs at least one vertex'),
  normals: z.array(z.number()).optional(),
  influences: z.array(VertexInfluenceSchema),
  indices: z.array(z.number().int().nonnegative()).optional(),
  mode: PrimitiveModeSchema.optional().default('triangles'),
}).superRefine((mesh, ctx) => {
  if (mesh.positions.length % mesh.dimensions !== 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['positions'],
      message: `Position count must be a multiple of ${mesh.dimensions}`,
    });
    return;
  }

  const vertexCount = mesh.positions.length / mesh.dimensions;

  if (mesh.influences.length !== vertexCount) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['influences'],
      message: `Expected ${vertexCount} influences, got ${mesh.influences.length}`,
    });
  }

  if (mesh.normals && mesh.normals.length !== vertexCount * 3) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['normals'],
      message: `Expected ${vertexCount * 3} normal components, got ${mesh.normals.length}`,
    });
  }

  mesh.indices?.forEach((index, i) => {
    if (index >= vertexCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['indices', i],
        message: `Index ${index} is out of range for ${vertexCount} vertices`,
      });
    }
  });
});

/**
 * Animation Track Schema
 *
 * `values` holds one element per key (three per key for CUBICSPLINE:
 * in-tangent, value, out-tangent).
 */
export const AnimationTrackSchema = z.object({
  bone: z.number().int().nonnegative(),
  path: TrackPathSchema,
  times: z.array(z.number().nonnegative()).min(1, 'A track needs at least one key'),
  values: z.array(z.number()),
  interpolation: InterpolationSchema.optional().default('LINEAR'),
}).superRefine((track, ctx) => {
  for (let i = 1; i < track.times.length; i++) {
    if (track.times[i] <= track.times[i - 1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['times', i],
        message: 'Key times must be strictly increasing',
      });
      return;
    }
  }

  const components = track.path === 'rotation' ? 4 : 3;
  const elementsPerKey = track.interpolation === 'CUBICSPLINE' ? 3 : 1;
  const expected = track.times.length * components * elementsPerKey;
  if (track.values.length !== expected) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['values'],
      message: `Expected ${expected} values, got ${track.values.length}`,
    });
  }
});

export const AnimationClipSchema = z.object({
  name: z.string().min(1, 'Clip name cannot be empty'),
  tracks: z.array(AnimationTrackSchema),
});

/**
 * Procedural Oscillation Schema
 *
 * Sine rotation about `axis` for each listed bone. `speed` is an angular
 * frequency and must be positive: one period is 2π / speed seconds.
 */
export const OscillationOptionsSchema = z.object({
  bones: z.array(z.number().int().nonnegative()).min(1, 'Oscillation needs at least one bone'),
  axis: Vec3Schema.optional().default([0, 0, 1]),
  amplitude: z.number().finite().optional().default(ANIMATION.OSCILLATION_AMPLITUDE),
  speed: z.number().positive('Speed must be positive').finite().optional().default(ANIMATION.OSCILLATION_SPEED),
  phase: z.number().finite().optional().default(0),
});

/**
 * Keys per second when baking procedural motion
 */
export const SampleRateSchema = z.number().positive('Sample rate must be positive').finite();

/**
 * Type exports for TypeScript inference
 */
export type GltfPreprocessOptions = z.infer<typeof GltfPreprocessOptionsSchema>;
export type SkinningConfig = z.infer<typeof SkinningConfigSchema>;
export type SkinningConfigInput = z.input<typeof SkinningConfigSchema>;
export type InfluenceOptions = z.infer<typeof InfluenceOptionsSchema>;
export type BoneDefinition = z.infer<typeof BoneDefinitionSchema>;
export type BoneDefinitionInput = z.input<typeof BoneDefinitionSchema>;
export type VertexInfluence = z.infer<typeof VertexInfluenceSchema>;
export type SkinnedMeshInput = z.input<typeof SkinnedMeshInputSchema>;
export type SkinnedMeshData = z.infer<typeof SkinnedMeshInputSchema>;
export type AnimationTrackInput = z.input<typeof AnimationTrackSchema>;
export type AnimationTrackDefinition = z.infer<typeof AnimationTrackSchema>;
export type AnimationClipInput = z.input<typeof AnimationClipSchema>;
export type Interpolation = z.infer<typeof InterpolationSchema>;
export type TrackPath = z.infer<typeof TrackPathSchema>;
export type PrimitiveMode = z.infer<typeof PrimitiveModeSchema>;
export type OscillationOptionsInput = z.input<typeof OscillationOptionsSchema>;
export type OscillationOptions = z.infer<typeof OscillationOptionsSchema>;

// Re-export base schemas
export {
  Vec3Schema,
  QuatSchema,
  Mat4Schema,
  InterpolationSchema,
  TrackPathSchema,
  PrimitiveModeSchema,
  LogLevelSchema
} from './base-schemas';
