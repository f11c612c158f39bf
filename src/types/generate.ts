/**
 * Ollama Integration - Generate Types
 *
 * Types for the text generation API.
 */

import type { KeepAliveInput } from '../duration/keep-alive.js';
import type { JsonObject } from './json.js';
import type { ModelOptions } from './options.js';

/**
 * Structured output format: `"json"` or a JSON schema
 */
export type ResponseFormat = 'json' | JsonObject;

/**
 * Text generation request
 */
export interface GenerateRequest {
  /**
   * Model name to use for generation
   *
   * Falls back to the client's default model when omitted.
   */
  model?: string;

  /**
   * Input prompt
   */
  prompt: string;

  /**
   * Text after the insertion point (fill-in-the-middle)
   */
  suffix?: string;

  /**
   * System prompt
   */
  system?: string;

  /**
   * Custom prompt template
   *
   * Overrides the model's default template.
   */
  template?: string;

  /**
   * Context from previous generation
   *
   * Obtained from the `context` field of the final chunk or response.
   */
  context?: number[];

  /**
   * Raw mode
   *
   * If true, skips prompt templating.
   */
  raw?: boolean;

  /**
   * Structured output format
   */
  format?: ResponseFormat;

  /**
   * Base64-encoded images for multimodal models
   */
  images?: string[];

  /**
   * Ask reasoning-capable models to return their reasoning in `thinking`
   */
  think?: boolean;

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
 * Timing and token counters reported on the final record
 */
export interface GenerationMetrics {
  /** Total duration in nanoseconds */
  total_duration?: number;
  /** Model load duration in nanoseconds */
  load_duration?: number;
  /** Number of prompt tokens evaluated */
  prompt_eval_count?: number;
  /** Prompt evaluation duration in nanoseconds */
  prompt_eval_duration?: number;
  /** Number of tokens generated */
  eval_count?: number;
  /** Generation duration in nanoseconds */
  eval_duration?: number;
}

/**
 * Generation streaming chunk
 *
 * The final chunk has `done: true` and carries the metrics and context.
 */
export interface GenerateChunk extends GenerationMetrics {
  /** Model name used */
  model: string;
  /** Creation timestamp (ISO 8601) */
  created_at?: string;
  /** Partial generated text */
  response: string;
  /** Partial reasoning text (when `think` is set) */
  thinking?: string;
  /** Stream completion flag */
  done: boolean;
  /** Reason for completion, e.g. "stop", "length", "load" */
  done_reason?: string;
  /** Context for continuation (final chunk only) */
  context?: number[];
}

/**
 * Text generation response (non-streaming)
 */
export type GenerateResponse = GenerateChunk;
