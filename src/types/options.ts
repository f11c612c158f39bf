/**
 * Ollama Integration - Model Options
 *
 * Tuning parameters forwarded to the model runner.
 */

/**
 * Value admitted in the options bag
 *
 * A closed variant: strings, numbers, booleans, lists and nested mappings of
 * the same. Key order follows insertion order.
 */
export type OptionValue = string | number | boolean | OptionValue[] | { [key: string]: OptionValue };

/**
 * Model inference options
 *
 * The named keys are the ones the server documents; any further key is
 * forwarded verbatim as long as its value is an `OptionValue`.
 */
export interface ModelOptions {
  /**
   * Temperature for sampling (0.0-2.0)
   *
   * Higher values make output more random, lower values more deterministic.
   */
  temperature?: number;

  /**
   * Top-p sampling (0.0-1.0)
   */
  top_p?: number;

  /**
   * Top-k sampling
   */
  top_k?: number;

  /**
   * Min-p sampling (0.0-1.0)
   */
  min_p?: number;

  /**
   * Maximum number of tokens to predict
   *
   * -1 for infinite generation (limited by context).
   */
  num_predict?: number;

  /**
   * Stop sequences
   */
  stop?: string[];

  /**
   * Context window size
   */
  num_ctx?: number;

  /**
   * Batch size for prompt processing
   */
  num_batch?: number;

  /**
   * Number of layers to offload to GPU
   */
  num_gpu?: number;

  /**
   * Main GPU index
   */
  main_gpu?: number;

  /**
   * Number of CPU threads
   */
  num_thread?: number;

  /**
   * Repeat penalty (1.0+)
   */
  repeat_penalty?: number;

  /**
   * How far back to look for repetitions
   */
  repeat_last_n?: number;

  /**
   * Presence penalty (-2.0 to 2.0)
   */
  presence_penalty?: number;

  /**
   * Frequency penalty (-2.0 to 2.0)
   */
  frequency_penalty?: number;

  /**
   * Random seed for reproducible generation
   */
  seed?: number;

  /**
   * Number of tokens to keep from prompt when the context is full
   */
  num_keep?: number;

  /**
   * Mirostat sampling mode (0, 1 or 2)
   */
  mirostat?: number;

  /**
   * Mirostat learning rate
   */
  mirostat_eta?: number;

  /**
   * Mirostat target entropy
   */
  mirostat_tau?: number;

  [key: string]: OptionValue | undefined;
}
