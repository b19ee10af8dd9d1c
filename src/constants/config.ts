/**
 * Configuration Constants
 */

import { LogLevel } from '../utils/logger';

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  DEBUG_OUTPUT_DIR: './debug-output',
  LOG_LEVEL: LogLevel.INFO,
  MAX_INFLUENCES: 4,
  NORMALIZE_WEIGHTS: true,
  WEIGHT_THRESHOLD: 0,
  LOOP: true,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  GLB: '.glb',
  GLTF: '.gltf',
} as const;

/**
 * Debug output file names
 */
export const DEBUG_FILE_NAMES = {
  POSE: 'pose.json',
  MODEL: 'model.glb',
} as const;
