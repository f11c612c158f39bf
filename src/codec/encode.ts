/**
 * Encoding helpers for request payloads.
 */

import type { ModelOptions } from '../types/options.js';

/**
 * Request body as sent on the wire
 */
export type WireBody = Record<string, unknown>;

/**
 * Drop keys whose value is `undefined` so they are omitted from the JSON body
 */
export function compact(fields: Record<string, unknown>): WireBody {
  const body: WireBody = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      body[key] = value;
    }
  }
  return body;
}

/**
 * Merge per-request options over the client defaults, keeping key order
 * (defaults first, then request keys). Returns `undefined` when both are empty.
 */
export function mergeOptions(
  defaults: ModelOptions | undefined,
  options: ModelOptions | undefined
): ModelOptions | undefined {
  const merged: ModelOptions = {};
  for (const source of [defaults, options]) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return Object.keys(merged).length > 0 ? merged : undefined;
}

/**
 * Serialize a request body
 */
export function encodeJson(body: unknown): string {
  return JSON.stringify(body);
}
