import type { ZodError, ZodTypeAny, output } from 'zod';
import { ValidationError } from '../../shared/errors.js';

/**
 * Formats Zod validation errors into a structured array of field errors.
 */
function formatZodErrors(error: ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

function parseWith<S extends ZodTypeAny>(schema: S, input: unknown, what: string): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`${what} validation failed`, formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Parses the query string against a Zod schema, returning the coerced
 * value. Throws a ValidationError (400) that the global error handler
 * turns into the standard envelope.
 */
export function parseQuery<S extends ZodTypeAny>(schema: S, query: unknown): output<S> {
  return parseWith(schema, query, 'Query parameter');
}

/**
 * Parses route parameters against a Zod schema. See {@link parseQuery}.
 */
export function parseParams<S extends ZodTypeAny>(schema: S, params: unknown): output<S> {
  return parseWith(schema, params, 'Route parameter');
}
