/**
 * Host string normalization.
 */

import { OllamaError } from '../types/errors.js';
import { DEFAULT_BASE_URL, DEFAULT_PORT } from './constants.js';

const PROTOCOL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Turn whatever the user typed (`example.com`, `:8080`, `0.0.0.0:11434`,
 * `https://proxy/ollama/`) into `protocol://host:port[/path]`.
 *
 * Without a protocol the host is plain http on the Ollama port; with one,
 * a missing port is the protocol's well-known port.
 */
export function formatHost(host: string | undefined): string {
  if (host === undefined || host.trim() === '') {
    return DEFAULT_BASE_URL;
  }

  let candidate = host.trim();
  const hasProtocol = PROTOCOL_PATTERN.test(candidate);
  if (!hasProtocol) {
    if (candidate.startsWith(':')) {
      candidate = `127.0.0.1${candidate}`;
    }
    candidate = `http://${candidate}`;
  }

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw OllamaError.configurationError(`Invalid host: ${host}`, 'baseUrl');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw OllamaError.configurationError('Base URL must start with http:// or https://', 'baseUrl');
  }

  const hostname = url.hostname === '0.0.0.0' ? '127.0.0.1' : url.hostname;
  let port = url.port;
  if (port === '') {
    if (!hasProtocol) {
      port = String(DEFAULT_PORT);
    } else {
      port = url.protocol === 'https:' ? '443' : '80';
    }
  }
  const path = url.pathname.replace(/\/+$/, '');

  return `${url.protocol}//${hostname}:${port}${path}`;
}

/**
 * Whether a normalized base URL points somewhere other than this machine
 */
export function isRemoteHost(baseUrl: string): boolean {
  const { hostname } = new URL(baseUrl);
  return !['localhost', '127.0.0.1', '[::1]'].includes(hostname);
}
