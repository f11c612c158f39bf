/**
 * Pieces every endpoint driver uses: its dependencies, per-call options and
 * the client defaults applied to each request.
 */

import type { OllamaConfig } from '../config/types.js';
import { mergeOptions } from '../codec/encode.js';
import { encodeKeepAlive, serializeKeepAlive, type KeepAliveInput, type KeepAliveWire } from '../duration/keep-alive.js';
import type { EndpointContext } from '../streaming/endpoint.js';
import type { HttpTransport } from '../transport/types.js';
import { OllamaError } from '../types/errors.js';
import type { ModelOptions } from '../types/options.js';

export interface ServiceDeps {
  config: OllamaConfig;
  transport: HttpTransport;
}

/**
 * Options for a single non-streaming call
 */
export interface CallOptions {
  /** Cancels the exchange */
  signal?: AbortSignal;
}

export function endpointContext(deps: ServiceDeps): EndpointContext {
  return { transport: deps.transport, logger: deps.config.logger };
}

/**
 * Applies the client's defaults to request fields
 */
export class RequestDefaults {
  constructor(private readonly config: OllamaConfig) {}

  /**
   * Resolve the model name; the request's wins over the default
   *
   * @throws {LocalValidationError} If neither is set
   */
  model(requested: string | undefined): string {
    const model = requested?.trim() ? requested : this.config.defaultModel;
    if (!model) {
      throw OllamaError.validationError('Model is required (set it on the request or as the client default)', 'model');
    }
    return model;
  }

  /**
   * Keep-alive to send: the request's policy, else the client default
   */
  keepAlive(requested: KeepAliveInput | undefined): KeepAliveWire {
    return requested === undefined
      ? serializeKeepAlive(this.config.defaultKeepAlive)
      : encodeKeepAlive(requested);
  }

  options(requested: ModelOptions | undefined): ModelOptions | undefined {
    return mergeOptions(this.config.defaultOptions, requested);
  }
}

/**
 * Require a non-blank string parameter
 */
export function requireName(value: string | undefined, field: string): string {
  if (value === undefined || value.trim() === '') {
    throw OllamaError.validationError(`${field} is required`, field);
  }
  return value;
}
