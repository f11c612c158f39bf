/**
 * Ollama Integration - Chat Types
 *
 * Types for the chat completion API.
 */

import type { KeepAliveInput } from '../duration/keep-alive.js';
import type { ResponseFormat, GenerationMetrics } from './generate.js';
import type { Message, Tool } from './message.js';
import type { ModelOptions } from './options.js';

/**
 * Chat completion request
 */
export interface ChatRequest {
  /**
   * Model name; falls back to the client's default model
   */
  model?: string;

  /**
   * Conversation messages. Must contain at least one message.
   */
  messages: Message[];

  /**
   * Tools the model may call
   */
  tools?: Tool[];

  /**
   * Structured output format
   */
  format?: ResponseFormat;

  /**
   * Ask reasoning-capable models to return their reasoning in `message.thinking`
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
 * Chat streaming chunk
 *
 * `message` holds only the increment produced since the previous chunk.
 * The final chunk has `done: true` and carries the metrics.
 */
export interface ChatChunk extends GenerationMetrics {
  /** Model name used */
  model: string;
  /** Creation timestamp (ISO 8601) */
  created_at?: string;
  /** Partial message */
  message: Message;
  /** Stream completion flag */
  done: boolean;
  /** Reason for completion, e.g. "stop", "length", "load" */
  done_reason?: string;
}

/**
 * Chat completion response (non-streaming)
 */
export type ChatResponse = ChatChunk;
