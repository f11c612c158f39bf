/**
 * Chat Service Exports
 */

export { ChatService, chatEndpoint } from './service.js';
export type { ChatServiceDeps } from './service.js';
