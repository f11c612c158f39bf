/**
 * Decoding helpers: text to JSON, JSON to typed values.
 */

import { DecodeError } from '../types/errors.js';
import type { WireSchema } from './schemas.js';

/**
 * Parse JSON text, mapping syntax errors to `DecodeError`
 *
 * @param record - 1-based record number when the text is one line of a stream
 */
export function parseJson(text: string, what: string, record?: number): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`Invalid JSON in ${what}: ${reason}`, { record, text });
  }
}

/**
 * Validate a parsed value against a schema
 *
 * Unknown fields pass through; a missing required field or a wrong type is a
 * `DecodeError` naming the first offending path.
 */
export function decodeWith<T>(
  schema: WireSchema<T>,
  value: unknown,
  what: string,
  record?: number
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  throw new DecodeError(`Invalid ${what} at ${path}: ${issue?.message ?? 'unrecognized shape'}`, {
    record,
    issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}

/**
 * Build a decoder bound to a schema, for use by the stream parser
 */
export function decoderFor<T>(schema: WireSchema<T>, what: string): (value: unknown, record?: number) => T {
  return (value, record) => decodeWith(schema, value, what, record);
}
