/**
 * Generic endpoint wiring.
 *
 * Every endpoint family is described by the same capability set (how to
 * build its body, how to decode a record, when a record completes the
 * operation); `openStream`, `drainStream` and `callOnce` run any of them
 * through the transport, streaming or not.
 */

import type { WireBody } from '../codec/encode.js';
import type { Logger } from '../observability/logging.js';
import { DecodeError } from '../types/errors.js';
import { NdjsonParser, type RecordDecoder } from '../transport/ndjson-parser.js';
import type { HttpTransport } from '../transport/types.js';
import { createStreamEvent, ResponseStream, type StreamEvent } from './response-stream.js';

export interface StreamingEndpoint<TRequest, TRecord> {
  /** Name used in logs and error messages */
  readonly operation: string;
  /** API path, e.g. "/api/pull" */
  readonly path: string;
  /**
   * Build the wire body. Throws `LocalValidationError` for bad input, which
   * `openStream` surfaces before any exchange starts.
   */
  buildRequest(request: TRequest, stream: boolean): WireBody;
  /** Decode one record (or the single non-streaming response) */
  readonly decode: RecordDecoder<TRecord>;
  /** Completion predicate */
  isComplete(record: TRecord): boolean;
  /** Completion reason, if the record carries one */
  doneReason?(record: TRecord): string | undefined;
}

/**
 * What a driver needs to issue exchanges
 */
export interface EndpointContext {
  readonly transport: HttpTransport;
  readonly logger: Logger;
}

/**
 * Open a streaming exchange
 *
 * The body is built (and validated) now; the request goes out on first pull.
 */
export function openStream<TRequest, TRecord>(
  context: EndpointContext,
  endpoint: StreamingEndpoint<TRequest, TRecord>,
  request: TRequest
): ResponseStream<StreamEvent<TRecord>> {
  const body = endpoint.buildRequest(request, true);
  const parser = new NdjsonParser<TRecord>(endpoint.decode, `${endpoint.operation} record`);

  return new ResponseStream(async function* (signal) {
    const response = await context.transport.requestStream({
      method: 'POST',
      path: endpoint.path,
      body,
      signal,
    });

    let records = 0;
    let completed = false;
    for await (const record of parser.parse(response.body)) {
      records += 1;
      const done = endpoint.isComplete(record);
      completed = completed || done;
      yield createStreamEvent(record, done, endpoint.doneReason?.(record));
    }

    context.logger.debug('Stream closed', { operation: endpoint.operation, records, completed });
  });
}

/**
 * Run the endpoint without streaming and decode the single response
 */
export async function callOnce<TRequest, TRecord>(
  context: EndpointContext,
  endpoint: StreamingEndpoint<TRequest, TRecord>,
  request: TRequest,
  signal?: AbortSignal
): Promise<TRecord> {
  const body = endpoint.buildRequest(request, false);
  const response = await context.transport.request({
    method: 'POST',
    path: endpoint.path,
    body,
    signal,
  });
  return endpoint.decode(response.body);
}

/**
 * Stream the endpoint to its end and return the completing record
 *
 * Used for open-ended operations (pull, push, create): with `stream:false`
 * the server holds its headers until the work is finished, which would trip
 * the header timeout. Returns the first record that satisfies `isComplete`,
 * or the last record on a clean end of stream.
 */
export async function drainStream<TRequest, TRecord>(
  context: EndpointContext,
  endpoint: StreamingEndpoint<TRequest, TRecord>,
  request: TRequest,
  signal?: AbortSignal
): Promise<TRecord> {
  const stream = openStream(context, endpoint, request);
  const onAbort = (): void => stream.abort();
  if (signal?.aborted) {
    stream.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    let last: StreamEvent<TRecord> | undefined;
    for await (const event of stream) {
      last = event;
      if (event.done) break;
    }
    if (last === undefined) {
      throw new DecodeError(`${endpoint.operation} stream ended without a record`, {
        operation: endpoint.operation,
      });
    }
    return last.data;
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}
