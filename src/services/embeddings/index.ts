/**
 * Embeddings Service Exports
 */

export { EmbeddingsService } from './service.js';
export type { EmbeddingsServiceDeps } from './service.js';
