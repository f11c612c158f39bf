/**
 * Models Service
 *
 * Model management: listing, inspection, copy, delete, and the
 * progress-reporting pull, push and create operations.
 */

import { decodeWith } from '../../codec/decode.js';
import { compact } from '../../codec/encode.js';
import { ModelInfoSchema, ModelListSchema, RunningModelListSchema } from '../../codec/schemas.js';
import { drainStream, openStream, type EndpointContext } from '../../streaming/endpoint.js';
import type { ResponseStream, StreamEvent } from '../../streaming/response-stream.js';
import type { HttpTransport } from '../../transport/types.js';
import type { CopyRequest, ModelInfo, ModelList, RunningModelList, ShowRequest } from '../../types/models.js';
import type { CreateRequest, ProgressRecord, PullRequest, PushRequest } from '../../types/progress.js';
import { endpointContext, requireName, type CallOptions, type ServiceDeps } from '../shared.js';
import { createEndpoint, pullEndpoint, pushEndpoint } from './progress.js';

export type ModelsServiceDeps = ServiceDeps;

const DEFAULT_TAG = 'latest';

/**
 * `llama3.2` and `llama3.2:latest` name the same model
 */
function withTag(name: string): string {
  const lastSegment = name.slice(name.lastIndexOf('/') + 1);
  return lastSegment.includes(':') ? name : `${name}:${DEFAULT_TAG}`;
}

export class ModelsService {
  private readonly transport: HttpTransport;
  private readonly context: EndpointContext;

  constructor(deps: ModelsServiceDeps) {
    this.transport = deps.transport;
    this.context = endpointContext(deps);
  }

  /**
   * List all locally available models
   * GET /api/tags
   */
  async list(options: CallOptions = {}): Promise<ModelList> {
    const response = await this.transport.request({ method: 'GET', path: '/api/tags', signal: options.signal });
    return decodeWith(ModelListSchema, response.body, 'model list');
  }

  /**
   * Show model details, including its capabilities
   * POST /api/show
   */
  async show(request: ShowRequest | string, options: CallOptions = {}): Promise<ModelInfo> {
    const { model, verbose } = typeof request === 'string' ? { model: request, verbose: undefined } : request;
    const response = await this.transport.request({
      method: 'POST',
      path: '/api/show',
      body: compact({ model: requireName(model, 'model'), verbose }),
      signal: options.signal,
    });
    return decodeWith(ModelInfoSchema, response.body, 'model info');
  }

  /**
   * Capabilities the server reports for a model, e.g. "completion", "tools", "vision"
   */
  async capabilities(model: string, options: CallOptions = {}): Promise<ReadonlySet<string>> {
    const info = await this.show(model, options);
    return new Set(info.capabilities ?? []);
  }

  /**
   * List running models (loaded in memory)
   * GET /api/ps
   */
  async running(options: CallOptions = {}): Promise<RunningModelList> {
    const response = await this.transport.request({ method: 'GET', path: '/api/ps', signal: options.signal });
    return decodeWith(RunningModelListSchema, response.body, 'running model list');
  }

  /**
   * Check if model is available locally; an untagged name matches `:latest`
   */
  async isAvailable(model: string, options: CallOptions = {}): Promise<boolean> {
    const wanted = withTag(requireName(model, 'model'));
    const { models } = await this.list(options);
    return models.some((m) => withTag(m.name) === wanted || withTag(m.model) === wanted);
  }

  /**
   * Copy a model under a new name
   * POST /api/copy
   */
  async copy(request: CopyRequest, options: CallOptions = {}): Promise<void> {
    await this.transport.request({
      method: 'POST',
      path: '/api/copy',
      body: {
        source: requireName(request.source, 'source'),
        destination: requireName(request.destination, 'destination'),
      },
      signal: options.signal,
    });
  }

  /**
   * Delete a local model
   * DELETE /api/delete
   */
  async delete(model: string, options: CallOptions = {}): Promise<void> {
    await this.transport.request({
      method: 'DELETE',
      path: '/api/delete',
      body: { model: requireName(model, 'model') },
      signal: options.signal,
    });
  }

  /**
   * Download a model from the registry and wait for completion
   *
   * Progress is streamed and discarded, so a long transfer never waits on
   * response headers; resolves with the `success` record.
   */
  async pull(request: PullRequest, options: CallOptions = {}): Promise<ProgressRecord> {
    return drainStream(this.context, pullEndpoint, request, options.signal);
  }

  /**
   * Download a model, streaming progress records
   *
   * @example
   * ```typescript
   * for await (const { data } of client.models.pullStream({ model: 'llama3.2' })) {
   *   console.log(data.status, data.completed, data.total);
   * }
   * ```
   */
  pullStream(request: PullRequest): ResponseStream<StreamEvent<ProgressRecord>> {
    return openStream(this.context, pullEndpoint, request);
  }

  /**
   * Upload a model to the registry and wait for completion
   */
  async push(request: PushRequest, options: CallOptions = {}): Promise<ProgressRecord> {
    return drainStream(this.context, pushEndpoint, request, options.signal);
  }

  pushStream(request: PushRequest): ResponseStream<StreamEvent<ProgressRecord>> {
    return openStream(this.context, pushEndpoint, request);
  }

  /**
   * Create a model from a Modelfile (inline or a server-side path)
   *
   * @throws {LocalValidationError} Unless exactly one of `modelfile` and `path` is set
   */
  async create(request: CreateRequest, options: CallOptions = {}): Promise<ProgressRecord> {
    return drainStream(this.context, createEndpoint, request, options.signal);
  }

  createStream(request: CreateRequest): ResponseStream<StreamEvent<ProgressRecord>> {
    return openStream(this.context, createEndpoint, request);
  }
}
