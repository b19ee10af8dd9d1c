/**
 * Base Schemas
 *
 * Common validation schemas shared by the rig, mesh and animation schemas.
 */

import { z } from 'zod';
import { LogLevel } from '../utils/logger';

export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

export const QuatSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * Column-major 4x4 matrix
 */
export const Mat4Schema = z.array(z.number()).length(16);

/**
 * Keyframe interpolation modes (glTF sampler interpolation)
 */
export const InterpolationSchema = z.enum(['STEP', 'LINEAR', 'CUBICSPLINE']);

/**
 * Animated bone property
 */
export const TrackPathSchema = z.enum(['translation', 'rotation', 'scale']);

/**
 * Primitive topology of a skinned mesh
 */
export const PrimitiveModeSchema = z.enum(['points', 'lines', 'triangles']);

export const LogLevelSchema = z.nativeEnum(LogLevel);
