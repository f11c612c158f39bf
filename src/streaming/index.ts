export { ResponseStream, createStreamEvent } from './response-stream.js';
export type { StreamEvent, StreamProducer } from './response-stream.js';
export { openStream, drainStream, callOnce } from './endpoint.js';
export type { StreamingEndpoint, EndpointContext } from './endpoint.js';
export { ToolCallReassembler, reassembleToolCalls, fragmentsOf } from './tool-calls.js';
export type { ChatStreamEvent, ReassembledToolCall, ToolCallFragment } from './tool-calls.js';
