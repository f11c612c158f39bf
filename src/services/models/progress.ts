/**
 * Progress-reporting endpoints: pull, push and create.
 *
 * Each streams status records until one reads `"success"`. Progress fields
 * are optional and passed through as received.
 */

import { decoderFor } from '../../codec/decode.js';
import { compact, type WireBody } from '../../codec/encode.js';
import { ProgressRecordSchema } from '../../codec/schemas.js';
import type { StreamingEndpoint } from '../../streaming/endpoint.js';
import { OllamaError } from '../../types/errors.js';
import {
  isProgressComplete,
  type CreateRequest,
  type ProgressRecord,
  type PullRequest,
  type PushRequest,
} from '../../types/progress.js';
import { requireName } from '../shared.js';

function progressEndpoint<TRequest>(
  operation: string,
  path: string,
  buildRequest: (request: TRequest, stream: boolean) => WireBody
): StreamingEndpoint<TRequest, ProgressRecord> {
  return {
    operation,
    path,
    buildRequest,
    decode: decoderFor(ProgressRecordSchema, `${operation} progress`),
    isComplete: isProgressComplete,
  };
}

export const pullEndpoint = progressEndpoint<PullRequest>('pull', '/api/pull', (request, stream) =>
  compact({ model: requireName(request.model, 'model'), insecure: request.insecure, stream })
);

export const pushEndpoint = progressEndpoint<PushRequest>('push', '/api/push', (request, stream) =>
  compact({ model: requireName(request.model, 'model'), insecure: request.insecure, stream })
);

/**
 * `modelfile` (inline text) and `path` (server-side file) are mutually exclusive
 */
export const createEndpoint = progressEndpoint<CreateRequest>('create', '/api/create', (request, stream) => {
  const model = requireName(request.model, 'model');
  const hasModelfile = request.modelfile !== undefined;
  const hasPath = request.path !== undefined;

  if (hasModelfile === hasPath) {
    throw OllamaError.validationError(
      'Exactly one of modelfile or path is required',
      hasModelfile ? 'path' : 'modelfile'
    );
  }

  return compact({
    model,
    modelfile: request.modelfile,
    path: request.path,
    quantize: request.quantize,
    stream,
  });
});
