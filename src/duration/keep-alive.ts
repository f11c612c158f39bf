/**
 * Keep-alive duration policy
 *
 * How long the server keeps a model loaded after a request. Callers may hand
 * in a policy, a number of seconds or a duration string; everything is
 * normalized to one of four variants before it goes on the wire.
 */

import { OllamaError } from '../types/errors.js';

export type KeepAlive =
  | { readonly kind: 'default' }
  | { readonly kind: 'none' }
  | { readonly kind: 'seconds'; readonly seconds: number }
  | { readonly kind: 'forever' };

/**
 * Anything a caller may pass where a keep-alive is expected
 */
export type KeepAliveInput = KeepAlive | number | string;

/**
 * Wire representation: seconds, `0` to unload immediately, `-1` to keep forever.
 * `undefined` means the field is omitted and the server default applies.
 */
export type KeepAliveWire = number | undefined;

const DEFAULT: KeepAlive = Object.freeze({ kind: 'default' });
const NONE: KeepAlive = Object.freeze({ kind: 'none' });
const FOREVER: KeepAlive = Object.freeze({ kind: 'forever' });

const UNIT_SECONDS: Record<string, number> = {
  ns: 1e-9,
  us: 1e-6,
  'µs': 1e-6,
  ms: 1e-3,
  s: 1,
  m: 60,
  h: 3600,
};

const DURATION_PART = /(\d+(?:\.\d+)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;
// Decimal seconds only: no exponents, hex or other `Number()` spellings
const BARE_SECONDS = /^[+-]?(\d+(\.\d+)?|\.\d+)$/;

export const KeepAlive = {
  default(): KeepAlive {
    return DEFAULT;
  },

  none(): KeepAlive {
    return NONE;
  },

  forever(): KeepAlive {
    return FOREVER;
  },

  /**
   * Keep loaded for `n` seconds. `0` collapses to `none`, negatives to `forever`.
   */
  seconds(n: number): KeepAlive {
    if (!Number.isFinite(n)) {
      throw OllamaError.validationError('Keep-alive seconds must be a finite number', 'keep_alive', String(n));
    }
    if (n === 0) return NONE;
    if (n < 0) return FOREVER;
    return Object.freeze({ kind: 'seconds', seconds: n });
  },

  minutes(n: number): KeepAlive {
    return KeepAlive.seconds(n * 60);
  },
};

function isKeepAlive(value: KeepAliveInput): value is KeepAlive {
  return typeof value === 'object' && value !== null && 'kind' in value;
}

/**
 * Parse a Go-style duration string ("5m", "1h30m", "250ms") or a bare number
 * of seconds ("300", "-1") into seconds.
 */
export function parseDurationSeconds(text: string): number {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw OllamaError.validationError('Keep-alive duration is empty', 'keep_alive', text);
  }

  if (BARE_SECONDS.test(trimmed)) {
    return Number(trimmed);
  }

  let rest = trimmed;
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '') {
    throw OllamaError.validationError(`Invalid keep-alive duration: ${text}`, 'keep_alive', text);
  }

  let total = 0;
  let position = 0;
  while (position < rest.length) {
    DURATION_PART.lastIndex = position;
    const match = DURATION_PART.exec(rest);
    if (!match) {
      throw OllamaError.validationError(`Invalid keep-alive duration: ${text}`, 'keep_alive', text);
    }
    const [whole, amount, unit] = match;
    total += Number(amount) * (UNIT_SECONDS[unit] ?? 0);
    position += whole.length;
  }

  return sign * total;
}

/**
 * Normalize caller input into one of the four policy variants
 */
export function normalizeKeepAlive(input: KeepAliveInput | undefined): KeepAlive {
  if (input === undefined) {
    return DEFAULT;
  }
  if (isKeepAlive(input)) {
    return input.kind === 'seconds' ? KeepAlive.seconds(input.seconds) : input;
  }
  if (typeof input === 'number') {
    return KeepAlive.seconds(input);
  }
  return KeepAlive.seconds(parseDurationSeconds(input));
}

/**
 * Serialize a policy to what the server expects in `keep_alive`
 */
export function serializeKeepAlive(policy: KeepAlive): KeepAliveWire {
  switch (policy.kind) {
    case 'default':
      return undefined;
    case 'none':
      return 0;
    case 'forever':
      return -1;
    case 'seconds':
      return policy.seconds;
  }
}

/**
 * Normalize and serialize in one step
 */
export function encodeKeepAlive(input: KeepAliveInput | undefined): KeepAliveWire {
  return serializeKeepAlive(normalizeKeepAlive(input));
}
