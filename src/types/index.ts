/**
 * Ollama Integration - Types Module
 *
 * Central export point for all type definitions.
 */

// Error types
export {
  OllamaError,
  OllamaErrorCode,
  TransportError,
  ResponseError,
  DecodeError,
  ServerStreamError,
  TruncationError,
  ToolCallParseError,
  LocalValidationError,
  ConfigurationError,
  StreamStateError,
  isOllamaError,
} from './errors.js';

// JSON types
export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export { isJsonObject } from './json.js';

// Message types
export type { Message, Role, Tool, ToolCall } from './message.js';

// Options types
export type { ModelOptions, OptionValue } from './options.js';

// Generate types
export type {
  GenerateRequest,
  GenerateResponse,
  GenerateChunk,
  GenerationMetrics,
  ResponseFormat,
} from './generate.js';

// Chat types
export type { ChatRequest, ChatResponse, ChatChunk } from './chat.js';

// Embeddings types
export type { EmbedRequest, EmbedResponse } from './embeddings.js';

// Progress types
export type { ProgressRecord, PullRequest, PushRequest, CreateRequest } from './progress.js';
export { isProgressComplete, PROGRESS_SUCCESS_STATUS } from './progress.js';

// Model management types
export type {
  ModelDetails,
  ModelSummary,
  ModelList,
  ShowRequest,
  ModelInfo,
  RunningModel,
  RunningModelList,
  CopyRequest,
} from './models.js';

// Health types
export type { HealthStatus, VersionResponse } from './health.js';
