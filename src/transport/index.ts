/**
 * Transport Layer Exports
 */

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';
export { HttpTransportImpl } from './http.js';
export { NdjsonParser } from './ndjson-parser.js';
export type { RecordDecoder } from './ndjson-parser.js';
