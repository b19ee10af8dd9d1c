/**
 * Skeleton Constants
 *
 * Constants for skeleton and skinning operations.
 */

export const SKELETON = {
  /**
   * Number of joint influences packed per vertex attribute.
   * glTF stores joints and weights as VEC4, so one JOINTS_n/WEIGHTS_n pair
   * holds four influences.
   */
  JOINTS_PER_ATTRIBUTE: 4,

  /**
   * Upper bound on influences per vertex (JOINTS_0 + JOINTS_1).
   */
  MAX_INFLUENCES: 8,

  /**
   * Parent index of a root bone.
   */
  ROOT_PARENT: -1,

  /**
   * Determinant below which a matrix is treated as singular.
   */
  SINGULAR_EPSILON: 1e-10,
} as const;

/**
 * Vertex attribute semantics for skinned primitives.
 */
export const SKIN_ATTRIBUTES = {
  POSITION: 'POSITION',
  NORMAL: 'NORMAL',
  JOINTS: ['JOINTS_0', 'JOINTS_1'],
  WEIGHTS: ['WEIGHTS_0', 'WEIGHTS_1'],
} as const;
