export {
  KeepAlive,
  normalizeKeepAlive,
  serializeKeepAlive,
  encodeKeepAlive,
  parseDurationSeconds,
} from './keep-alive.js';
export type { KeepAliveInput, KeepAliveWire } from './keep-alive.js';
