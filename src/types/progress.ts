/**
 * Ollama Integration - Progress Types
 *
 * Records streamed by pull, push and create.
 */

/**
 * One progress record
 *
 * `completed`/`total` are byte counts for the layer named by `digest`. The
 * server is the source of truth: values are passed through as received,
 * without any monotonicity check, and percentage maths is up to the caller.
 */
export interface ProgressRecord {
  status: string;
  digest?: string;
  total?: number;
  completed?: number;
}

/**
 * Status value that marks the end of a pull, push or create
 */
export const PROGRESS_SUCCESS_STATUS = 'success';

/**
 * Completion predicate shared by pull, push and create
 */
export function isProgressComplete(record: ProgressRecord): boolean {
  return record.status === PROGRESS_SUCCESS_STATUS;
}

/**
 * Pull request
 */
export interface PullRequest {
  /** Model to download */
  model: string;
  /** Allow insecure connections to the registry */
  insecure?: boolean;
}

/**
 * Push request
 */
export interface PushRequest {
  /** Model to upload, in `namespace/model:tag` form */
  model: string;
  /** Allow insecure connections to the registry */
  insecure?: boolean;
}

/**
 * Create request
 *
 * Exactly one of `modelfile` (inline definition) and `path` (reference to a
 * definition file on the server host) must be given.
 */
export interface CreateRequest {
  /** Name of the model to create */
  model: string;
  /** Inline model definition */
  modelfile?: string;
  /** Path to a model definition on the server host */
  path?: string;
  /** Quantization type applied to a non-quantized base, e.g. "q4_K_M" */
  quantize?: string;
}
