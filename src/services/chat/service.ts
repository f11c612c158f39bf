/**
 * Chat Service
 *
 * Conversational completion over `POST /api/chat`, with optional tool calls.
 */

import { decoderFor } from '../../codec/decode.js';
import { compact } from '../../codec/encode.js';
import { ChatChunkSchema } from '../../codec/schemas.js';
import type { Logger } from '../../observability/logging.js';
import { callOnce, openStream, type EndpointContext, type StreamingEndpoint } from '../../streaming/endpoint.js';
import type { ResponseStream, StreamEvent } from '../../streaming/response-stream.js';
import { reassembleToolCalls, type ChatStreamEvent } from '../../streaming/tool-calls.js';
import type { ChatChunk, ChatRequest, ChatResponse } from '../../types/chat.js';
import { OllamaError } from '../../types/errors.js';
import { endpointContext, RequestDefaults, type CallOptions, type ServiceDeps } from '../shared.js';

export type ChatServiceDeps = ServiceDeps;

/**
 * Describe the chat endpoint
 */
export function chatEndpoint(defaults: RequestDefaults): StreamingEndpoint<ChatRequest, ChatChunk> {
  return {
    operation: 'chat',
    path: '/api/chat',
    buildRequest: (request, stream) => {
      const model = defaults.model(request.model);
      if (request.messages.length === 0) {
        throw OllamaError.validationError('At least one message is required', 'messages');
      }
      return compact({
        model,
        messages: request.messages,
        tools: request.tools,
        format: request.format,
        think: request.think,
        stream,
        keep_alive: defaults.keepAlive(request.keep_alive),
        options: defaults.options(request.options),
      });
    },
    decode: decoderFor(ChatChunkSchema, 'chat response'),
    isComplete: (chunk) => chunk.done,
    doneReason: (chunk) => chunk.done_reason,
  };
}

/**
 * Chat service for conversational completions
 *
 * @example
 * ```typescript
 * for await (const event of client.chat.createEventStream({ messages, tools })) {
 *   if (event.type === 'delta') process.stdout.write(event.content);
 *   if (event.type === 'tool_call') await runTool(event.call.name, event.call.arguments);
 * }
 * ```
 */
export class ChatService {
  private readonly context: EndpointContext;
  private readonly logger: Logger;
  private readonly endpoint: StreamingEndpoint<ChatRequest, ChatChunk>;

  constructor(deps: ChatServiceDeps) {
    this.context = endpointContext(deps);
    this.logger = deps.config.logger;
    this.endpoint = chatEndpoint(new RequestDefaults(deps.config));
  }

  /**
   * Complete the conversation in one exchange
   *
   * @throws {LocalValidationError} If no model can be resolved or `messages` is empty
   */
  async create(request: ChatRequest, options: CallOptions = {}): Promise<ChatResponse> {
    return callOnce(this.context, this.endpoint, request, options.signal);
  }

  /**
   * Stream raw chat chunks
   */
  createStream(request: ChatRequest): ResponseStream<StreamEvent<ChatChunk>> {
    return openStream(this.context, this.endpoint, request);
  }

  /**
   * Stream content deltas with tool calls reassembled into complete calls
   */
  createEventStream(request: ChatRequest): ResponseStream<ChatStreamEvent> {
    const logger = this.logger;
    return this.createStream(request).through((source) => reassembleToolCalls(source, logger));
  }
}
