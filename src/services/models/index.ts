export { ModelsService } from './service.js';
export type { ModelsServiceDeps } from './service.js';
export { pullEndpoint, pushEndpoint, createEndpoint } from './progress.js';
