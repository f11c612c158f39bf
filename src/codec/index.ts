export * from './schemas.js';
export { parseJson, decodeWith, decoderFor } from './decode.js';
export { compact, mergeOptions, encodeJson } from './encode.js';
export type { WireBody } from './encode.js';
