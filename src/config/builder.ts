/**
 * Builder for creating Ollama client instances.
 */

import type { Dispatcher } from 'undici';
import { OllamaClient } from '../client.js';
import type { KeepAliveInput } from '../duration/keep-alive.js';
import type { Logger } from '../observability/logging.js';
import type { ModelOptions } from '../types/options.js';
import { optionsFromEnv } from './env.js';
import { resolveConfig } from './resolve.js';
import type { OllamaClientOptions, OllamaConfig } from './types.js';

/**
 * Builder for OllamaConfig with fluent API.
 */
export class OllamaClientBuilder {
  private options: OllamaClientOptions = {};
  private readonly headers: Record<string, string> = {};

  /**
   * Set server address. Bare hosts and `:port` are accepted.
   */
  baseUrl(url: string): this {
    this.options.host = url;
    return this;
  }

  /**
   * Alias of `baseUrl`.
   */
  host(host: string): this {
    return this.baseUrl(host);
  }

  /**
   * Set base URL from the OLLAMA_HOST environment variable, if set.
   */
  baseUrlFromEnv(): this {
    const { host } = optionsFromEnv();
    if (host) {
      this.options.host = host;
    }
    return this;
  }

  /**
   * Set connection timeout in milliseconds.
   */
  timeoutMs(ms: number): this {
    this.options.timeoutMs = ms;
    return this;
  }

  /**
   * Set authentication token.
   * For use with proxied Ollama setups.
   */
  authToken(token: string): this {
    this.options.authToken = token;
    return this;
  }

  /**
   * Set the identity string sent as User-Agent.
   */
  userAgent(value: string): this {
    this.options.userAgent = value;
    return this;
  }

  /**
   * Set default model.
   */
  defaultModel(model: string): this {
    this.options.defaultModel = model;
    return this;
  }

  /**
   * Set default model from the OLLAMA_MODEL environment variable, if set.
   */
  defaultModelFromEnv(): this {
    const { defaultModel } = optionsFromEnv();
    if (defaultModel) {
      this.options.defaultModel = defaultModel;
    }
    return this;
  }

  /**
   * Set the keep-alive applied to requests that set none.
   */
  keepAlive(value: KeepAliveInput): this {
    this.options.keepAlive = value;
    return this;
  }

  /**
   * Set default keep-alive from the OLLAMA_KEEP_ALIVE environment variable, if set.
   */
  keepAliveFromEnv(): this {
    const { keepAlive } = optionsFromEnv();
    if (keepAlive !== undefined) {
      this.options.keepAlive = keepAlive;
    }
    return this;
  }

  /**
   * Set options merged under every request's own options.
   */
  defaultOptions(options: ModelOptions): this {
    this.options.defaultOptions = { ...options };
    return this;
  }

  /**
   * Add a default header.
   */
  defaultHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  /**
   * Set the logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Set the undici dispatcher used for every request.
   */
  dispatcher(dispatcher: Dispatcher): this {
    this.options.dispatcher = dispatcher;
    return this;
  }

  /**
   * Validate and freeze the configuration without creating a client.
   *
   * @throws {ConfigurationError} If configuration is invalid
   */
  buildConfig(): OllamaConfig {
    return resolveConfig({ ...this.options, headers: { ...this.headers } });
  }

  /**
   * Build the client.
   *
   * @throws {ConfigurationError} If configuration is invalid
   */
  build(): OllamaClient {
    return new OllamaClient(this.buildConfig());
  }
}
