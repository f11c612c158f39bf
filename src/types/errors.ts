/**
 * Error types for the Ollama client.
 *
 * Every error thrown by the client is an `OllamaError`. The subclasses split
 * failures by where they happen: on the wire (`TransportError`), in the HTTP
 * status (`ResponseError`), while decoding a record (`DecodeError`,
 * `ServerStreamError`, `TruncationError`), while reassembling tool calls
 * (`ToolCallParseError`) or before anything was sent (`LocalValidationError`,
 * `ConfigurationError`).
 */

/**
 * Ollama error codes
 */
export enum OllamaErrorCode {
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  SERVER_NOT_RUNNING = 'SERVER_NOT_RUNNING',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  ABORTED = 'ABORTED',
  HTTP_ERROR = 'HTTP_ERROR',
  MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
  DECODE_ERROR = 'DECODE_ERROR',
  SERVER_STREAM_ERROR = 'SERVER_STREAM_ERROR',
  TRUNCATION_ERROR = 'TRUNCATION_ERROR',
  TOOL_CALL_PARSE_ERROR = 'TOOL_CALL_PARSE_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  STREAM_ERROR = 'STREAM_ERROR',
}

/**
 * Base Ollama error class with recovery hints and retry classification
 */
export class OllamaError extends Error {
  readonly code: OllamaErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: OllamaErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OllamaError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Check if error is retryable
   *
   * The client never retries on its own; this tells the caller whether a
   * retry of the whole call may succeed.
   */
  isRetryable(): boolean {
    if (this.code === OllamaErrorCode.HTTP_ERROR) {
      const status = this.details?.status;
      return typeof status === 'number' && status >= 500;
    }
    return [
      OllamaErrorCode.SERVER_NOT_RUNNING,
      OllamaErrorCode.CONNECTION_ERROR,
      OllamaErrorCode.TIMEOUT_ERROR,
      OllamaErrorCode.TRUNCATION_ERROR,
    ].includes(this.code);
  }

  /**
   * Get recovery hint for this error
   */
  recoveryHint(): string | undefined {
    switch (this.code) {
      case OllamaErrorCode.SERVER_NOT_RUNNING:
        return "Run 'ollama serve' or start the Ollama application";
      case OllamaErrorCode.MODEL_NOT_FOUND: {
        const model = this.details?.model;
        return typeof model === 'string' && model !== 'unknown'
          ? `Run 'ollama pull ${model}' to download the model`
          : undefined;
      }
      case OllamaErrorCode.TIMEOUT_ERROR:
        return 'Increase timeoutMs or check that the server is responsive';
      case OllamaErrorCode.TRUNCATION_ERROR:
        return 'The connection closed mid-record; retry the request';
      default:
        return undefined;
    }
  }

  /**
   * Create connection error
   */
  static connectionError(message: string, address: string, cause?: string): TransportError {
    return new TransportError(OllamaErrorCode.CONNECTION_ERROR, message, { address, cause });
  }

  /**
   * Create server not running error
   */
  static serverNotRunning(message?: string): TransportError {
    return new TransportError(
      OllamaErrorCode.SERVER_NOT_RUNNING,
      message || 'Ollama server is not running',
      { hint: "Run 'ollama serve' or start the Ollama application" }
    );
  }

  /**
   * Create timeout error
   */
  static timeout(operation: string, timeoutMs: number): TransportError {
    return new TransportError(
      OllamaErrorCode.TIMEOUT_ERROR,
      `${operation} timed out after ${timeoutMs}ms`,
      { operation, timeoutMs }
    );
  }

  /**
   * Create aborted error (caller cancelled an in-flight exchange)
   */
  static aborted(operation: string): TransportError {
    return new TransportError(OllamaErrorCode.ABORTED, `${operation} was aborted`, { operation });
  }

  /**
   * Create error for a non-2xx HTTP status
   */
  static httpError(status: number, message: string): ResponseError {
    return new ResponseError(OllamaErrorCode.HTTP_ERROR, status, message);
  }

  /**
   * Create model not found error
   */
  static modelNotFound(model: string, message?: string): ResponseError {
    return new ResponseError(
      OllamaErrorCode.MODEL_NOT_FOUND,
      404,
      message ?? `Model not found: ${model}`,
      { model }
    );
  }

  /**
   * Create validation error
   */
  static validationError(message: string, field?: string, value?: string): LocalValidationError {
    return new LocalValidationError(message, field, value);
  }

  /**
   * Create configuration error
   */
  static configurationError(message: string, field?: string): ConfigurationError {
    return new ConfigurationError(message, field);
  }

  /**
   * Create stream misuse error
   */
  static streamError(message: string): StreamStateError {
    return new StreamStateError(message);
  }
}

/**
 * Connection or transfer failure. Surfaced unmodified, never retried here.
 */
export class TransportError extends OllamaError {
  constructor(code: OllamaErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TransportError';
  }
}

/**
 * The server answered with a non-success status.
 */
export class ResponseError extends OllamaError {
  readonly status: number;

  constructor(
    code: OllamaErrorCode,
    status: number,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, { ...details, status });
    this.name = 'ResponseError';
    this.status = status;
  }
}

/**
 * A record (or a whole response body) is not valid JSON or lacks a required field.
 */
export class DecodeError extends OllamaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(OllamaErrorCode.DECODE_ERROR, message, details);
    this.name = 'DecodeError';
  }
}

/**
 * The server embedded an error payload in an otherwise well-formed stream.
 * The message is the server's, verbatim.
 */
export class ServerStreamError extends OllamaError {
  constructor(message: string, record?: number) {
    super(OllamaErrorCode.SERVER_STREAM_ERROR, message, { record });
    this.name = 'ServerStreamError';
  }
}

/**
 * The stream ended in the middle of a record.
 */
export class TruncationError extends OllamaError {
  readonly partial: string;

  constructor(partial: string) {
    super(
      OllamaErrorCode.TRUNCATION_ERROR,
      `Stream ended with an incomplete record (${partial.length} characters)`,
      { partial }
    );
    this.name = 'TruncationError';
    this.partial = partial;
  }
}

/**
 * A finalized tool call's argument text could not be parsed into an object.
 */
export class ToolCallParseError extends OllamaError {
  readonly index: number;
  readonly rawArguments: string;

  constructor(index: number, message: string, rawArguments: string, name?: string) {
    super(OllamaErrorCode.TOOL_CALL_PARSE_ERROR, message, { index, name, rawArguments });
    this.name = 'ToolCallParseError';
    this.index = index;
    this.rawArguments = rawArguments;
  }
}

/**
 * The caller supplied missing or mutually exclusive parameters.
 * Raised before any network call is made.
 */
export class LocalValidationError extends OllamaError {
  readonly field?: string;

  constructor(message: string, field?: string, value?: string) {
    super(OllamaErrorCode.VALIDATION_ERROR, message, { field, value });
    this.name = 'LocalValidationError';
    this.field = field;
  }
}

/**
 * The client configuration is invalid.
 */
export class ConfigurationError extends OllamaError {
  constructor(message: string, field?: string) {
    super(OllamaErrorCode.CONFIGURATION_ERROR, message, { field });
    this.name = 'ConfigurationError';
  }
}

/**
 * A response stream was misused, e.g. iterated a second time.
 */
export class StreamStateError extends OllamaError {
  constructor(message: string) {
    super(OllamaErrorCode.STREAM_ERROR, message);
    this.name = 'StreamStateError';
  }
}

/**
 * Type guard for client errors
 */
export function isOllamaError(error: unknown): error is OllamaError {
  return error instanceof OllamaError;
}
