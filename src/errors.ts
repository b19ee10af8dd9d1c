/**
 * Custom Error Classes for Skinning Operations
 *
 * Error handling with Zod validation and tagged union pattern.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Skinning Error Class
 *
 * Base error class for all skinning operations with tagged union pattern.
 */
export abstract class BaseSkinningError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Schema Validation Error
 *
 * Raised when bone definitions or mesh input fail their Zod schema.
 */
export class SkinningSchemaError extends BaseSkinningError {
  readonly _tag = 'SkinningSchemaError' as const;
  readonly code = ERROR_CODES.SCHEMA_VALIDATION_ERROR;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, zodError });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Configuration Error
 */
export class SkinningConfigError extends BaseSkinningError {
  readonly _tag = 'SkinningConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Import Error
 *
 * Error for glTF skin import failures. `stage` names the step that failed.
 */
export class SkinningImportError extends BaseSkinningError {
  readonly _tag = 'SkinningImportError' as const;
  readonly code = ERROR_CODES.IMPORT_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * File System Error
 */
export class SkinningFileSystemError extends BaseSkinningError {
  readonly _tag = 'SkinningFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Validation Error
 *
 * Error for rig data that parses but breaks a skinning invariant
 * (weights out of range, unknown joints, singular bind matrices).
 */
export class SkinningValidationError extends BaseSkinningError {
  readonly _tag = 'SkinningValidationError' as const;
  readonly code = ERROR_CODES.VALIDATION_ERROR;
  readonly field: string;

  constructor(message: string, field: string, context?: Record<string, unknown>) {
    super(message, { field, ...context });
    this.field = field;
  }
}

/**
 * Render Error
 *
 * Error for WebGL shader compilation, program linking and renderer misuse.
 */
export class SkinningRenderError extends BaseSkinningError {
  readonly _tag = 'SkinningRenderError' as const;
  readonly code = ERROR_CODES.RENDER_ERROR;
  readonly infoLog: string;

  constructor(message: string, infoLog: string, context?: Record<string, unknown>) {
    super(message, { infoLog, ...context });
    this.infoLog = infoLog;
  }
}

/**
 * Union type for all skinning errors
 */
export type SkinningError =
  | SkinningSchemaError
  | SkinningConfigError
  | SkinningImportError
  | SkinningFileSystemError
  | SkinningValidationError
  | SkinningRenderError;

/**
 * Error factory functions
 */
export const SkinningErrorFactory = {
  /**
   * Create schema validation error
   */
  schemaError(message: string, path: string, zodError?: ZodError): SkinningSchemaError {
    return new SkinningSchemaError(message, path, zodError);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): SkinningConfigError {
    return new SkinningConfigError(message, configKey, context);
  },

  /**
   * Create import error
   */
  importError(message: string, stage: string, context?: Record<string, unknown>): SkinningImportError {
    return new SkinningImportError(message, stage, context);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): SkinningFileSystemError {
    return new SkinningFileSystemError(message, filePath, operation, context);
  },

  /**
   * Create validation error
   */
  validationError(message: string, field: string, context?: Record<string, unknown>): SkinningValidationError {
    return new SkinningValidationError(message, field, context);
  },

  /**
   * Create render error
   */
  renderError(message: string, infoLog: string, context?: Record<string, unknown>): SkinningRenderError {
    return new SkinningRenderError(message, infoLog, context);
  },
};
