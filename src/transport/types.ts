/**
 * Transport Layer Types
 *
 * Defines the HTTP transport abstraction for the Ollama client.
 */

export type HttpMethod = 'GET' | 'POST' | 'DELETE' | 'HEAD';

/**
 * One HTTP exchange
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** API path, e.g. "/api/tags" */
  path: string;
  /**
   * Request body. Bytes are sent as-is (application/octet-stream); any other
   * value is JSON-serialized.
   */
  body?: unknown;
  /** Extra headers for this request */
  headers?: Record<string, string>;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Statuses besides 2xx that should be returned rather than thrown */
  okStatuses?: readonly number[];
}

/**
 * HTTP response structure
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Response body (JSON-parsed; `undefined` when empty) */
  body: unknown;
  /** Response headers */
  headers: Record<string, string>;
}

/**
 * Streaming HTTP response: headers are in, the body is read incrementally
 */
export interface StreamingHttpResponse {
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: Record<string, string>;
  /**
   * Body chunks. Stopping iteration early closes the connection.
   */
  body: AsyncIterable<Uint8Array>;
}

/**
 * HTTP transport abstraction
 *
 * Connection handling, TLS, pooling and any socket-level retry belong to the
 * implementation. Non-success statuses surface as `ResponseError`,
 * connection failures as `TransportError`.
 */
export interface HttpTransport {
  /**
   * Send a request and read the whole body
   */
  request(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Send a request and return as soon as headers arrive
   */
  requestStream(request: HttpRequest): Promise<StreamingHttpResponse>;

  /**
   * Check if server is reachable
   */
  isReachable(): Promise<boolean>;
}
