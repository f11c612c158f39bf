/**
 * Ollama Client Implementation
 *
 * Main client for a local (or proxied) Ollama server.
 */

import { decodeWith } from './codec/decode.js';
import { VersionResponseSchema } from './codec/schemas.js';
import { optionsFromEnv } from './config/env.js';
import { resolveConfig } from './config/resolve.js';
import type { OllamaClientOptions, OllamaConfig } from './config/types.js';
import { BlobsService } from './services/blobs/service.js';
import { ChatService } from './services/chat/service.js';
import { EmbeddingsService } from './services/embeddings/service.js';
import { GenerateService } from './services/generate/service.js';
import { ModelsService } from './services/models/service.js';
import type { CallOptions, ServiceDeps } from './services/shared.js';
import { HttpTransportImpl } from './transport/http.js';
import type { HttpTransport } from './transport/types.js';
import type { HealthStatus } from './types/health.js';

/**
 * Main Ollama client class
 *
 * Services are created on first access and share one transport. The client
 * holds no per-request state, so one instance may serve concurrent calls.
 *
 * @example
 * ```typescript
 * import { OllamaClientBuilder } from 'ollama-stream-client';
 *
 * const client = new OllamaClientBuilder().defaultModel('llama3.2').build();
 *
 * const response = await client.chat.create({
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 *
 * for await (const event of client.generate.createStream({ prompt: 'Why is the sky blue?' })) {
 *   process.stdout.write(event.data.response);
 * }
 * ```
 */
export class OllamaClient {
  private readonly _config: OllamaConfig;
  private readonly transport: HttpTransport;

  // Lazy-initialized services
  private _chatService?: ChatService;
  private _generateService?: GenerateService;
  private _embeddingsService?: EmbeddingsService;
  private _modelsService?: ModelsService;
  private _blobsService?: BlobsService;

  /**
   * @param transport - Replaces the HTTP transport, e.g. with an in-process stand-in
   */
  constructor(config: OllamaConfig, transport?: HttpTransport) {
    this._config = config;
    this.transport = transport ?? new HttpTransportImpl(config);
  }

  /**
   * Create a client from options, filling in defaults
   */
  static create(options: OllamaClientOptions = {}): OllamaClient {
    return new OllamaClient(resolveConfig(options));
  }

  /**
   * Create a client from environment variables
   *
   * Reads OLLAMA_HOST, OLLAMA_MODEL and OLLAMA_KEEP_ALIVE.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): OllamaClient {
    return OllamaClient.create(optionsFromEnv(env));
  }

  get config(): OllamaConfig {
    return this._config;
  }

  private get deps(): ServiceDeps {
    return { config: this._config, transport: this.transport };
  }

  /**
   * Chat service for multi-turn conversations and tool calls
   */
  get chat(): ChatService {
    if (!this._chatService) {
      this._chatService = new ChatService(this.deps);
    }
    return this._chatService;
  }

  /**
   * Generate service for text completion
   */
  get generate(): GenerateService {
    if (!this._generateService) {
      this._generateService = new GenerateService(this.deps);
    }
    return this._generateService;
  }

  /**
   * Embeddings service for vector generation
   */
  get embeddings(): EmbeddingsService {
    if (!this._embeddingsService) {
      this._embeddingsService = new EmbeddingsService(this.deps);
    }
    return this._embeddingsService;
  }

  /**
   * Models service for model management
   */
  get models(): ModelsService {
    if (!this._modelsService) {
      this._modelsService = new ModelsService(this.deps);
    }
    return this._modelsService;
  }

  get blobs(): BlobsService {
    if (!this._blobsService) {
      this._blobsService = new BlobsService(this.deps);
    }
    return this._blobsService;
  }

  /**
   * Server version
   * GET /api/version
   */
  async version(options: CallOptions = {}): Promise<string> {
    const response = await this.transport.request({ method: 'GET', path: '/api/version', signal: options.signal });
    return decodeWith(VersionResponseSchema, response.body, 'version response').version;
  }

  /**
   * Check if the server is running and reachable
   *
   * Never throws; an unreachable server reports `running: false`.
   */
  async health(): Promise<HealthStatus> {
    const running = await this.transport.isReachable();
    if (!running) {
      return { running };
    }

    try {
      return { running, version: await this.version() };
    } catch (error) {
      this._config.logger.debug('Could not read server version', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { running };
    }
  }
}
