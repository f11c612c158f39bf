export * from './generate/index.js';
export * from './chat/index.js';
export * from './embeddings/index.js';
export * from './models/index.js';
export * from './blobs/index.js';
export { RequestDefaults } from './shared.js';
export type { CallOptions, ServiceDeps } from './shared.js';
