import { vi, type Mock } from 'vitest';
import { resolveConfig } from '../config/resolve.js';
import type { OllamaClientOptions, OllamaConfig } from '../config/types.js';
import type { Logger } from '../observability/logging.js';

type LogMethod = (message: string, context?: Record<string, unknown>) => void;

export interface MockLogger extends Logger {
  trace: Mock<LogMethod>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
}

export function createMockLogger(): MockLogger {
  return {
    trace: vi.fn<LogMethod>(),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
  };
}

/**
 * Local configuration with a mock logger, overridable per test
 */
export function createTestConfig(options: OllamaClientOptions = {}): OllamaConfig {
  return resolveConfig({ logger: createMockLogger(), ...options });
}
