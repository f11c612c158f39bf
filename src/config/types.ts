/**
 * Configuration types for the Ollama client.
 */

import type { Dispatcher } from 'undici';
import type { KeepAlive, KeepAliveInput } from '../duration/keep-alive.js';
import type { Logger } from '../observability/logging.js';
import type { ModelOptions } from '../types/options.js';

/**
 * Ollama client configuration.
 *
 * Read-only once built; shared by reference by every call the client makes.
 */
export interface OllamaConfig {
  /** Base URL for the Ollama server, normalized (protocol, host, port). */
  readonly baseUrl: string;
  /** Time allowed for response headers to arrive, in milliseconds. */
  readonly timeoutMs: number;
  /** Identity string sent as User-Agent. */
  readonly userAgent: string;
  /** Optional bearer token (for proxied setups). */
  readonly authToken?: string;
  /** Model used when a request names none. */
  readonly defaultModel?: string;
  /** Keep-alive applied when a request sets none. */
  readonly defaultKeepAlive: KeepAlive;
  /** Options merged under each request's own options. */
  readonly defaultOptions?: Readonly<ModelOptions>;
  /** Default headers for all requests. */
  readonly defaultHeaders: Readonly<Record<string, string>>;
  /** Logger used by the transport and stream layers. */
  readonly logger: Logger;
  /** undici dispatcher (connection pool, proxy agent or mock agent). */
  readonly dispatcher?: Dispatcher;
}

/**
 * Loose options accepted when building a configuration.
 */
export interface OllamaClientOptions {
  host?: string;
  timeoutMs?: number;
  userAgent?: string;
  authToken?: string;
  defaultModel?: string;
  keepAlive?: KeepAliveInput;
  defaultOptions?: ModelOptions;
  headers?: Record<string, string>;
  logger?: Logger;
  dispatcher?: Dispatcher;
}
