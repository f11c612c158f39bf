export { GenerateService, generateEndpoint } from './service.js';
export type { GenerateServiceDeps } from './service.js';
