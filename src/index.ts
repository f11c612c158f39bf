/**
 * Typed streaming client for the Ollama HTTP API.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { OllamaClient, KeepAlive } from 'ollama-stream-client';
 *
 * const client = OllamaClient.fromEnv();
 *
 * // Streaming generation
 * for await (const event of client.generate.createStream({ model: 'llama3.2', prompt: 'Once upon a time' })) {
 *   process.stdout.write(event.data.response);
 * }
 *
 * // Chat with reassembled tool calls
 * for await (const event of client.chat.createEventStream({ model: 'llama3.2', messages, tools })) {
 *   if (event.type === 'tool_call') console.log(event.call.name, event.call.arguments);
 * }
 *
 * // Embeddings, unloading the model afterwards
 * const { embeddings } = await client.embeddings.create({
 *   model: 'nomic-embed-text',
 *   input: ['first', 'second'],
 *   keep_alive: KeepAlive.none(),
 * });
 * ```
 */

// Main client
export { OllamaClient } from './client.js';

// Configuration
export {
  OllamaClientBuilder,
  resolveConfig,
  optionsFromEnv,
  formatHost,
  DEFAULT_BASE_URL,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_MS,
} from './config/index.js';
export type { OllamaConfig, OllamaClientOptions } from './config/index.js';

// Logging
export { ConsoleLogger, NoopLogger, createLogger } from './observability/index.js';
export type { Logger, LogLevel, LogFormat, LoggingConfig } from './observability/index.js';

// Keep-alive policy
export { KeepAlive, normalizeKeepAlive, serializeKeepAlive, parseDurationSeconds } from './duration/index.js';
export type { KeepAliveInput, KeepAliveWire } from './duration/index.js';

// Streams
export {
  ResponseStream,
  ToolCallReassembler,
  reassembleToolCalls,
  openStream,
  drainStream,
  callOnce,
} from './streaming/index.js';
export type {
  StreamEvent,
  StreamingEndpoint,
  EndpointContext,
  ChatStreamEvent,
  ReassembledToolCall,
} from './streaming/index.js';

// Services
export {
  GenerateService,
  ChatService,
  EmbeddingsService,
  ModelsService,
  BlobsService,
} from './services/index.js';
export type { CallOptions } from './services/index.js';

// Transport
export { HttpTransportImpl, NdjsonParser } from './transport/index.js';
export type {
  HttpTransport,
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  RecordDecoder,
} from './transport/index.js';

// Types
export * from './types/index.js';
