/**
 * Configuration module for the Ollama client.
 *
 * @example
 * ```typescript
 * import { OllamaClientBuilder } from './config';
 *
 * const client = new OllamaClientBuilder()
 *   .baseUrlFromEnv()
 *   .defaultModelFromEnv()
 *   .keepAlive('10m')
 *   .build();
 * ```
 */

export * from './types.js';
export * from './constants.js';
export { formatHost, isRemoteHost } from './host.js';
export { resolveConfig, OllamaConfigSchema } from './resolve.js';
export { optionsFromEnv } from './env.js';
export { OllamaClientBuilder } from './builder.js';
