/**
 * Ollama Integration - Message Types
 *
 * Message, role and tool types for chat completions.
 */

import type { JsonObject } from './json.js';

/**
 * Message role in conversation
 */
export type Role = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Tool call as it appears on the wire
 *
 * Complete calls carry `arguments` as an object. Providers that stream calls
 * in pieces send `arguments` as partial text and tag each piece with `index`.
 */
export interface ToolCall {
  function: {
    index?: number;
    name?: string;
    arguments?: JsonObject | string;
  };
}

/**
 * Chat message
 *
 * Represents a single message in a conversation.
 * Supports text, images, reasoning output and tool calls.
 */
export interface Message {
  /**
   * Role of the message sender
   */
  role: Role;

  /**
   * Message text content
   */
  content: string;

  /**
   * Reasoning text, present for reasoning-capable models when `think` is set
   */
  thinking?: string;

  /**
   * Optional base64-encoded images
   */
  images?: string[];

  /**
   * Tool calls requested by the assistant
   */
  tool_calls?: ToolCall[];

  /**
   * Name of the tool whose result this message carries (role `tool`)
   */
  tool_name?: string;
}

/**
 * Tool definition offered to the model
 *
 * The client only forwards definitions and reassembles call requests.
 * Running the tool and sending its result back is the caller's round-trip.
 */
export interface Tool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: JsonObject;
  };
}
