export { BlobsService } from './service.js';
export type { BlobsServiceDeps } from './service.js';
