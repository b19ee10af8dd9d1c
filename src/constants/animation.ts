/**
 * Animation Constants
 */
export const ANIMATION = {
  /**
   * Frame rate used by the timer fallback of the animation loop.
   */
  FRAME_RATE: 60,

  /**
   * Sample rate used when baking procedural motion into keyframes.
   */
  BAKE_SAMPLE_RATE: 30,

  /**
   * Default peak angle (radians) and angular frequency (radians per second)
   * of procedural oscillation.
   */
  OSCILLATION_AMPLITUDE: 0.8,
  OSCILLATION_SPEED: 1,

  /**
   * Below this angle between two rotations slerp falls back to lerp.
   */
  SLERP_EPSILON: 1e-6,
} as const;
