/**
 * Turn loose client options into a validated, frozen configuration.
 */

import { z } from 'zod';
import { normalizeKeepAlive, type KeepAlive } from '../duration/keep-alive.js';
import { createLogger } from '../observability/logging.js';
import { OllamaError } from '../types/errors.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './constants.js';
import { formatHost, isRemoteHost } from './host.js';
import type { OllamaClientOptions, OllamaConfig } from './types.js';

/**
 * Schema for the scalar configuration fields
 */
export const OllamaConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'Base URL must start with http:// or https://',
    }),
  timeoutMs: z.number().int().positive({ message: 'Timeout must be greater than 0' }),
  userAgent: z.string().min(1, { message: 'User agent must not be empty' }),
  defaultModel: z.string().min(1).optional(),
});

/**
 * Build a configuration from options
 *
 * @throws {ConfigurationError} If a field is invalid
 */
export function resolveConfig(options: OllamaClientOptions = {}): OllamaConfig {
  const logger = options.logger ?? createLogger();

  const scalars = {
    baseUrl: formatHost(options.host),
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    defaultModel: options.defaultModel,
  };

  const result = OllamaConfigSchema.safeParse(scalars);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.');
    throw OllamaError.configurationError(issue?.message ?? 'Invalid configuration', field);
  }

  let defaultKeepAlive: KeepAlive;
  try {
    defaultKeepAlive = normalizeKeepAlive(options.keepAlive);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw OllamaError.configurationError(reason, 'keepAlive');
  }

  if (isRemoteHost(result.data.baseUrl) && !options.authToken) {
    logger.warn('Connecting to remote Ollama without authentication', {
      baseUrl: result.data.baseUrl,
    });
  }

  return Object.freeze({
    ...result.data,
    authToken: options.authToken,
    defaultKeepAlive,
    defaultOptions: options.defaultOptions ? Object.freeze({ ...options.defaultOptions }) : undefined,
    defaultHeaders: Object.freeze({ ...options.headers }),
    logger,
    dispatcher: options.dispatcher,
  });
}
