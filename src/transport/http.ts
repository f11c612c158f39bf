/**
 * HTTP Transport Implementation
 *
 * Implements the HttpTransport interface on top of undici's fetch.
 */

import { fetch, type Response } from 'undici';
import type { OllamaConfig } from '../config/types.js';
import { parseJson } from '../codec/decode.js';
import { encodeJson } from '../codec/encode.js';
import { OllamaError } from '../types/errors.js';
import type { HttpRequest, HttpResponse, HttpTransport, StreamingHttpResponse } from './types.js';

interface SentRequest {
  response: Response;
  /** Stop listening to the caller's signal */
  detach: () => void;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorCauseText(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? `${cause.code} ` : '';
    return `${code}${cause.message}`;
  }
  return '';
}

/**
 * HTTP transport implementation using undici fetch
 */
export class HttpTransportImpl implements HttpTransport {
  private readonly config: OllamaConfig;

  constructor(config: OllamaConfig) {
    this.config = config;
  }

  /**
   * Build full URL from base URL and path
   */
  private buildUrl(path: string): string {
    return `${this.config.baseUrl}${path}`;
  }

  /**
   * Create headers for request
   */
  private buildHeaders(request: HttpRequest, contentType?: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
      ...this.config.defaultHeaders,
      ...request.headers,
    };

    if (contentType) {
      headers['Content-Type'] = contentType;
    }

    if (this.config.authToken) {
      headers['Authorization'] = `Bearer ${this.config.authToken}`;
    }

    return headers;
  }

  private encodeBody(body: unknown): { payload?: string | Uint8Array; contentType?: string } {
    if (body === undefined) {
      return {};
    }
    if (body instanceof Uint8Array) {
      return { payload: body, contentType: 'application/octet-stream' };
    }
    return { payload: encodeJson(body), contentType: 'application/json' };
  }

  /**
   * Map fetch errors to OllamaError types
   */
  private mapFetchError(
    error: unknown,
    operation: string,
    signal: AbortSignal | undefined,
    timedOut: boolean
  ): OllamaError {
    if (error instanceof OllamaError) {
      return error;
    }

    if (timedOut) {
      return OllamaError.timeout(operation, this.config.timeoutMs);
    }

    if (signal?.aborted) {
      return OllamaError.aborted(operation);
    }

    if (!(error instanceof Error)) {
      return OllamaError.connectionError(`${operation} failed: ${String(error)}`, this.config.baseUrl);
    }

    if (error.name === 'AbortError') {
      return OllamaError.aborted(operation);
    }

    const cause = errorCauseText(error);

    // Connection refused: nothing is listening
    if (error.message.includes('ECONNREFUSED') || cause.includes('ECONNREFUSED')) {
      return OllamaError.serverNotRunning(
        'Cannot connect to Ollama server. ' +
        "Run 'ollama serve' or start the Ollama application."
      );
    }

    return OllamaError.connectionError(
      cause ? `${error.message}: ${cause}` : error.message,
      this.config.baseUrl,
      error.name
    );
  }

  /**
   * Handle error response from server
   */
  private async handleErrorResponse(response: Response, request: HttpRequest): Promise<never> {
    const status = response.status;
    let text = '';

    if (request.method !== 'HEAD') {
      try {
        text = await response.text();
      } catch (error) {
        this.config.logger.debug('Failed to read error body', {
          path: request.path,
          status,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const parsed = tryParseJson(text);
    let message = text.trim() || `HTTP ${status} error`;
    if (typeof parsed === 'object' && parsed !== null) {
      if ('error' in parsed && typeof parsed.error === 'string') {
        message = parsed.error;
      } else if ('message' in parsed && typeof parsed.message === 'string') {
        message = parsed.message;
      }
    }

    this.config.logger.debug('HTTP error response', { path: request.path, status, message });

    switch (status) {
      case 404: {
        const model = this.modelOf(request.body) ?? /model ['"]([^'"]+)['"]/i.exec(message)?.[1];
        if (model !== undefined) {
          throw OllamaError.modelNotFound(model, message);
        }
        throw OllamaError.httpError(status, message);
      }
      case 408:
        throw OllamaError.timeout(`${request.method} ${request.path}`, this.config.timeoutMs);
      default:
        throw OllamaError.httpError(status, message);
    }
  }

  private modelOf(body: unknown): string | undefined {
    if (typeof body === 'object' && body !== null && 'model' in body && typeof body.model === 'string') {
      return body.model;
    }
    return undefined;
  }

  /**
   * JSON bodies are parsed strictly; plain-text bodies (e.g. `GET /`) are returned as text
   */
  private decodeBody(text: string, operation: string): unknown {
    const trimmed = text.trim();
    if (trimmed === '') {
      return undefined;
    }
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      return parseJson(trimmed, `${operation} response`);
    }
    return text;
  }

  private isAccepted(status: number, request: HttpRequest): boolean {
    return (status >= 200 && status < 300) || (request.okStatuses?.includes(status) ?? false);
  }

  /**
   * Send the request and wait for response headers
   *
   * The timeout covers only the wait for headers; a streamed body may take
   * as long as generation does.
   */
  private async send(request: HttpRequest, operation: string): Promise<SentRequest> {
    const { signal } = request;
    if (signal?.aborted) {
      throw OllamaError.aborted(operation);
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const detach = (): void => signal?.removeEventListener('abort', onAbort);

    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    const { payload, contentType } = this.encodeBody(request.body);
    this.config.logger.debug('HTTP request', { method: request.method, path: request.path });

    try {
      const response = await fetch(this.buildUrl(request.path), {
        method: request.method,
        headers: this.buildHeaders(request, contentType),
        body: payload,
        signal: controller.signal,
        dispatcher: this.config.dispatcher,
      });

      this.config.logger.debug('HTTP response', {
        method: request.method,
        path: request.path,
        status: response.status,
      });

      return { response, detach };
    } catch (error) {
      detach();
      throw this.mapFetchError(error, operation, signal, timedOut);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Send a request and read the whole body
   */
  async request(request: HttpRequest): Promise<HttpResponse> {
    const operation = `${request.method} ${request.path}`;
    const { response, detach } = await this.send(request, operation);

    try {
      if (!this.isAccepted(response.status, request)) {
        await this.handleErrorResponse(response, request);
      }

      const text = request.method === 'HEAD' ? '' : await response.text();

      return {
        status: response.status,
        headers: Object.fromEntries(response.headers.entries()),
        body: this.decodeBody(text, operation),
      };
    } catch (error) {
      throw this.mapFetchError(error, operation, request.signal, false);
    } finally {
      detach();
    }
  }

  /**
   * Send a request and receive a streaming response
   */
  async requestStream(request: HttpRequest): Promise<StreamingHttpResponse> {
    const operation = `${request.method} ${request.path}`;
    const { response, detach } = await this.send(request, operation);

    try {
      if (!this.isAccepted(response.status, request)) {
        await this.handleErrorResponse(response, request);
      }
      if (!response.body) {
        throw OllamaError.streamError('Response body is null');
      }
    } catch (error) {
      detach();
      throw this.mapFetchError(error, operation, request.signal, false);
    }

    return {
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body: this.readBody(response, operation, request.signal, detach),
    };
  }

  /**
   * Yield body chunks; stopping early cancels the body, which releases the connection
   */
  private async *readBody(
    response: Response,
    operation: string,
    signal: AbortSignal | undefined,
    detach: () => void
  ): AsyncGenerator<Uint8Array, void, undefined> {
    if (!response.body) {
      detach();
      throw OllamaError.streamError('Response body is null');
    }

    const reader = response.body.getReader();
    let finished = false;

    try {
      while (true) {
        let result: Awaited<ReturnType<typeof reader.read>>;
        try {
          result = await reader.read();
        } catch (error) {
          finished = true;
          throw this.mapFetchError(error, operation, signal, false);
        }

        if (result.done) {
          finished = true;
          return;
        }

        yield result.value;
      }
    } finally {
      detach();
      if (!finished) {
        await reader.cancel().catch((error: unknown) => {
          this.config.logger.debug('Failed to cancel response body', {
            operation,
            error: error instanceof Error ? error.message : String(error),
          });
        });
      }
      reader.releaseLock();
    }
  }

  /**
   * Check if server is reachable
   */
  async isReachable(): Promise<boolean> {
    try {
      await this.request({ method: 'GET', path: '/' });
      return true;
    } catch (error) {
      this.config.logger.debug('Server not reachable', {
        baseUrl: this.config.baseUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
