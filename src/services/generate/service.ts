/**
 * Generate Service
 *
 * Text completion over `POST /api/generate`.
 */

import { decoderFor } from '../../codec/decode.js';
import { compact } from '../../codec/encode.js';
import { GenerateChunkSchema } from '../../codec/schemas.js';
import { callOnce, openStream, type EndpointContext, type StreamingEndpoint } from '../../streaming/endpoint.js';
import type { ResponseStream, StreamEvent } from '../../streaming/response-stream.js';
import type { GenerateChunk, GenerateRequest, GenerateResponse } from '../../types/generate.js';
import { endpointContext, RequestDefaults, type CallOptions, type ServiceDeps } from '../shared.js';

export type GenerateServiceDeps = ServiceDeps;

/**
 * Describe the generate endpoint
 */
export function generateEndpoint(defaults: RequestDefaults): StreamingEndpoint<GenerateRequest, GenerateChunk> {
  return {
    operation: 'generate',
    path: '/api/generate',
    buildRequest: (request, stream) =>
      compact({
        model: defaults.model(request.model),
        prompt: request.prompt,
        suffix: request.suffix,
        system: request.system,
        template: request.template,
        context: request.context,
        raw: request.raw,
        format: request.format,
        images: request.images,
        think: request.think,
        stream,
        keep_alive: defaults.keepAlive(request.keep_alive),
        options: defaults.options(request.options),
      }),
    decode: decoderFor(GenerateChunkSchema, 'generate response'),
    isComplete: (chunk) => chunk.done,
    doneReason: (chunk) => chunk.done_reason,
  };
}

/**
 * Generate service for text completion
 *
 * Supports context continuation, raw mode, fill-in-the-middle (`suffix`)
 * and multimodal inputs.
 */
export class GenerateService {
  private readonly context: EndpointContext;
  private readonly endpoint: StreamingEndpoint<GenerateRequest, GenerateChunk>;

  constructor(deps: GenerateServiceDeps) {
    this.context = endpointContext(deps);
    this.endpoint = generateEndpoint(new RequestDefaults(deps.config));
  }

  /**
   * Generate a complete response in one exchange
   *
   * @throws {LocalValidationError} If no model can be resolved
   */
  async create(request: GenerateRequest, options: CallOptions = {}): Promise<GenerateResponse> {
    return callOnce(this.context, this.endpoint, request, options.signal);
  }

  /**
   * Stream the response as it is generated
   *
   * The request is validated immediately; nothing is sent until the first
   * event is pulled. The last event has `done: true` and carries the metrics.
   */
  createStream(request: GenerateRequest): ResponseStream<StreamEvent<GenerateChunk>> {
    return openStream(this.context, this.endpoint, request);
  }
}
