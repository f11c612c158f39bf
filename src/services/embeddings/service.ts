/**
 * Embeddings Service
 *
 * Vector embeddings over `POST /api/embed`.
 */

import { decodeWith } from '../../codec/decode.js';
import { compact } from '../../codec/encode.js';
import { EmbedResponseSchema } from '../../codec/schemas.js';
import type { HttpTransport } from '../../transport/types.js';
import type { EmbedRequest, EmbedResponse } from '../../types/embeddings.js';
import { DecodeError, OllamaError } from '../../types/errors.js';
import { RequestDefaults, type CallOptions, type ServiceDeps } from '../shared.js';

/**
 * Dependencies for EmbeddingsService
 */
export type EmbeddingsServiceDeps = ServiceDeps;

/**
 * Embeddings service for generating vector embeddings
 *
 * A single string or a batch goes out in one request; the response holds
 * one vector per input, in input order.
 */
export class EmbeddingsService {
  private readonly transport: HttpTransport;
  private readonly defaults: RequestDefaults;

  constructor(deps: EmbeddingsServiceDeps) {
    this.transport = deps.transport;
    this.defaults = new RequestDefaults(deps.config);
  }

  /**
   * Embed one text or a batch
   *
   * @throws {LocalValidationError} If no model resolves, the batch is empty or `dimensions` is not a positive integer
   * @throws {DecodeError} If the server returns a different number of vectors than inputs
   *
   * @example
   * ```typescript
   * const { embeddings } = await client.embeddings.create({
   *   model: 'nomic-embed-text',
   *   input: ['first text', 'second text'],
   * });
   * ```
   */
  async create(request: EmbedRequest, options: CallOptions = {}): Promise<EmbedResponse> {
    const body = this.buildRequestBody(request);
    const expected = Array.isArray(request.input) ? request.input.length : 1;

    const response = await this.transport.request({
      method: 'POST',
      path: '/api/embed',
      body,
      signal: options.signal,
    });

    const decoded = decodeWith(EmbedResponseSchema, response.body, 'embed response');
    if (decoded.embeddings.length !== expected) {
      throw new DecodeError(
        `Expected ${expected} embedding(s), received ${decoded.embeddings.length}`,
        { expected, received: decoded.embeddings.length }
      );
    }
    return decoded;
  }

  private buildRequestBody(request: EmbedRequest): Record<string, unknown> {
    const model = this.defaults.model(request.model);

    if (Array.isArray(request.input) && request.input.length === 0) {
      throw OllamaError.validationError('Input batch must not be empty', 'input');
    }

    const { dimensions } = request;
    if (dimensions !== undefined && (!Number.isInteger(dimensions) || dimensions <= 0)) {
      throw OllamaError.validationError('dimensions must be a positive integer', 'dimensions', String(dimensions));
    }

    return compact({
      model,
      input: request.input,
      truncate: request.truncate,
      dimensions,
      keep_alive: this.defaults.keepAlive(request.keep_alive),
      options: this.defaults.options(request.options),
    });
  }
}
