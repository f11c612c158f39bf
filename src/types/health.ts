/**
 * Ollama Integration - Health Status Types
 */

/**
 * Health status
 */
export interface HealthStatus {
  /**
   * True if the server is reachable and responding
   */
  running: boolean;

  /**
   * Server version, when it could be read
   */
  version?: string;
}

/**
 * Response of `GET /api/version`
 */
export interface VersionResponse {
  version: string;
}
