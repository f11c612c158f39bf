/**
 * Ollama Integration - Embeddings Types
 */

import type { KeepAliveInput } from '../duration/keep-alive.js';
import type { ModelOptions } from './options.js';

/**
 * Embeddings request
 *
 * `input` is either one text or a batch; the response keeps batch order.
 */
export interface EmbedRequest {
  /**
   * Model name; falls back to the client's default model
   */
  model?: string;

  /**
   * Text to embed, or a batch of texts
   */
  input: string | string[];

  /**
   * Truncate inputs that exceed the context length (server default: true)
   */
  truncate?: boolean;

  /**
   * Output dimensionality, for models that support it. Forwarded verbatim.
   */
  dimensions?: number;

  /**
   * How long to keep the model loaded after this request
   */
  keep_alive?: KeepAliveInput;

  /**
   * Model inference options, merged over the client's default options
   */
  options?: ModelOptions;
}

/**
 * Embeddings response
 */
export interface EmbedResponse {
  /** Model name used */
  model: string;
  /** One vector per input, in input order */
  embeddings: number[][];
  /** Total duration in nanoseconds */
  total_duration?: number;
  /** Model load duration in nanoseconds */
  load_duration?: number;
  /** Number of prompt tokens evaluated */
  prompt_eval_count?: number;
}
