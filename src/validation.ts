/**
 * Schema validation helpers
 *
 * Runs a Zod schema and turns failures into tagged skinning errors.
 */

import { z } from 'zod';
import { SkinningErrorFactory } from './errors';

/**
 * Parses `input` with `schema`, throwing a SkinningSchemaError that carries
 * the Zod issues on failure.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  path: string,
  message: string
): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || path}: ${issue.message}`)
      .join('; ');
    throw SkinningErrorFactory.schemaError(`${message}: ${details}`, path, result.error);
  }
  return result.data;
}
