import { vi, type Mock } from 'vitest';
import type { HttpResponse, HttpTransport, StreamingHttpResponse } from '../transport/types.js';
import { bytesFrom } from './byte-sources.js';

export interface MockHttpTransport extends HttpTransport {
  request: Mock<HttpTransport['request']>;
  requestStream: Mock<HttpTransport['requestStream']>;
  isReachable: Mock<HttpTransport['isReachable']>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    request: vi.fn<HttpTransport['request']>(),
    requestStream: vi.fn<HttpTransport['requestStream']>(),
    isReachable: vi.fn<HttpTransport['isReachable']>(),
  };
}

export function mockHttpTransportResponse(
  transport: MockHttpTransport,
  body: unknown,
  status = 200
): void {
  const response: HttpResponse = { status, body, headers: {} };
  transport.request.mockResolvedValue(response);
}

export function mockHttpTransportError(transport: MockHttpTransport, error: Error): void {
  transport.request.mockRejectedValue(error);
  transport.requestStream.mockRejectedValue(error);
}

/**
 * Answer streaming requests with the given NDJSON lines, one chunk per line
 */
export function mockHttpTransportStream(transport: MockHttpTransport, records: unknown[]): void {
  transport.requestStream.mockImplementation(async () => streamingResponse(
    records.map((record) => bytesFrom(`${JSON.stringify(record)}\n`))
  ));
}

export function streamingResponse(body: AsyncIterable<Uint8Array> | Uint8Array[]): StreamingHttpResponse {
  return {
    status: 200,
    headers: { 'content-type': 'application/x-ndjson' },
    body: Array.isArray(body) ? fromChunks(body) : body,
  };
}

async function* fromChunks(chunks: Uint8Array[]): AsyncGenerator<Uint8Array, void, undefined> {
  for (const chunk of chunks) {
    yield chunk;
  }
}
