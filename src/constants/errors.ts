/**
 * Error Constants for skinkit
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  SCHEMA_VALIDATION_ERROR: 'SKIN_SCHEMA_VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'SKIN_CONFIG_VALIDATION_ERROR',
  IMPORT_ERROR: 'SKIN_IMPORT_ERROR',
  FILE_SYSTEM_ERROR: 'SKIN_FILE_SYSTEM_ERROR',
  VALIDATION_ERROR: 'SKIN_VALIDATION_ERROR',
  RENDER_ERROR: 'SKIN_RENDER_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  INVALID_CONFIG: 'Invalid configuration provided',
  INVALID_BONES: 'Invalid bone definitions',
  INVALID_MESH: 'Invalid skinned mesh input',
  INVALID_OSCILLATION: 'Invalid oscillation options',
  EMPTY_SKELETON: 'A skeleton needs at least one bone',
  SINGULAR_BIND_MATRIX: 'Bind matrix is not invertible',
  BONE_CYCLE: 'Bone hierarchy contains a cycle',
  INVERSE_BIND_COUNT: 'Inverse bind matrix count does not match bone count',
  MISSING_ATTRIBUTE: 'Primitive is missing a required attribute',
  SHADER_COMPILE_FAILED: 'Shader compilation failed',
  PROGRAM_LINK_FAILED: 'Program link failed',
  RENDERER_DISPOSED: 'Renderer has been disposed',
} as const;
