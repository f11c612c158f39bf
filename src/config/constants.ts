/**
 * Default configuration constants for the Ollama client.
 */

/** Default server port. */
export const DEFAULT_PORT = 11434;

/** Default base URL for the Ollama server. */
export const DEFAULT_BASE_URL = `http://127.0.0.1:${DEFAULT_PORT}`;

/**
 * Default connection timeout in milliseconds (2 minutes).
 *
 * Bounds the wait for response headers only; streamed bodies may run as
 * long as generation takes.
 */
export const DEFAULT_TIMEOUT_MS = 120000;

/** Client name reported in the User-Agent header. */
export const CLIENT_NAME = 'ollama-stream-client';

/** Client version reported in the User-Agent header. */
export const CLIENT_VERSION = '0.1.0';

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = `${CLIENT_NAME}/${CLIENT_VERSION}`;
