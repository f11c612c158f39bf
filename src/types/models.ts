/**
 * Ollama Integration - Model Management Types
 *
 * Types for model listing, details, and management.
 */

/**
 * Model details
 *
 * Metadata about model architecture and configuration.
 */
export interface ModelDetails {
  /**
   * Parent model name, if this model was derived from another
   */
  parent_model?: string;

  /**
   * Model format
   *
   * Example: "gguf"
   */
  format?: string;

  /**
   * Model family
   *
   * Example: "llama", "mistral"
   */
  family?: string;

  /**
   * All model families
   */
  families?: string[] | null;

  /**
   * Parameter size
   *
   * Example: "7B", "13B", "70B"
   */
  parameter_size?: string;

  /**
   * Quantization level
   *
   * Example: "Q4_0", "Q5_K_M", "Q8_0"
   */
  quantization_level?: string;
}

/**
 * Model summary
 *
 * Basic information about a locally available model.
 */
export interface ModelSummary {
  /** Model name used for API calls */
  name: string;
  /** Full model identifier */
  model: string;
  /** Last modified timestamp (ISO 8601) */
  modified_at?: string;
  /** Model size in bytes */
  size: number;
  /** Model digest */
  digest: string;
  /** Model details */
  details?: ModelDetails;
}

/**
 * Model list response
 */
export interface ModelList {
  models: ModelSummary[];
}

/**
 * Show request
 */
export interface ShowRequest {
  /** Model to describe */
  model: string;
  /** Include large fields such as full tokenizer data */
  verbose?: boolean;
}

/**
 * Model information
 *
 * Detailed information about a specific model.
 */
export interface ModelInfo {
  /** Model license */
  license?: string;

  /** Model definition the model was created from */
  modelfile?: string;

  /** Serialized parameter configuration */
  parameters?: string;

  /** Prompt template */
  template?: string;

  /** Default system prompt */
  system?: string;

  /** Model details */
  details?: ModelDetails;

  /** Architecture metadata, keyed by GGUF field name */
  model_info?: Record<string, unknown>;

  /**
   * Capability tags, e.g. "completion", "tools", "thinking", "embedding"
   *
   * Open-ended: new servers may report tags this client does not know.
   */
  capabilities?: string[];

  /** Last modified timestamp (ISO 8601) */
  modified_at?: string;
}

/**
 * Running model
 *
 * Information about a currently loaded model.
 */
export interface RunningModel {
  /** Model name */
  name: string;
  /** Full model identifier */
  model: string;
  /** Total memory usage in bytes */
  size: number;
  /** Model digest */
  digest: string;
  /** Model details */
  details?: ModelDetails;
  /** When the model will be unloaded (ISO 8601) */
  expires_at?: string;
  /** VRAM usage in bytes */
  size_vram?: number;
}

/**
 * Running models list response
 */
export interface RunningModelList {
  models: RunningModel[];
}

/**
 * Copy request
 */
export interface CopyRequest {
  source: string;
  destination: string;
}
