/**
 * Environment variable configuration.
 */

import type { OllamaClientOptions } from './types.js';

/**
 * Read client options from the environment
 *
 * - `OLLAMA_HOST`: server address, in any form `formatHost` accepts
 * - `OLLAMA_MODEL`: default model
 * - `OLLAMA_KEEP_ALIVE`: default keep-alive, e.g. "5m", "0", "-1"
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): OllamaClientOptions {
  const options: OllamaClientOptions = {};
  if (env.OLLAMA_HOST) {
    options.host = env.OLLAMA_HOST;
  }
  if (env.OLLAMA_MODEL) {
    options.defaultModel = env.OLLAMA_MODEL;
  }
  if (env.OLLAMA_KEEP_ALIVE) {
    options.keepAlive = env.OLLAMA_KEEP_ALIVE;
  }
  return options;
}
