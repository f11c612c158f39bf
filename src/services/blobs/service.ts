/**
 * Blobs Service
 *
 * Content-addressed file uploads, referenced by digest from a Modelfile.
 */

import { DigestSchema } from '../../codec/schemas.js';
import type { HttpTransport } from '../../transport/types.js';
import { OllamaError } from '../../types/errors.js';
import type { CallOptions, ServiceDeps } from '../shared.js';

export type BlobsServiceDeps = ServiceDeps;

function blobPath(digest: string): string {
  if (!DigestSchema.safeParse(digest).success) {
    throw OllamaError.validationError(
      'Digest must be "sha256:" followed by 64 lowercase hex characters',
      'digest',
      digest
    );
  }
  return `/api/blobs/${digest}`;
}

export class BlobsService {
  private readonly transport: HttpTransport;

  constructor(deps: BlobsServiceDeps) {
    this.transport = deps.transport;
  }

  /**
   * Check whether the server holds a blob
   * HEAD /api/blobs/:digest
   */
  async check(digest: string, options: CallOptions = {}): Promise<boolean> {
    const response = await this.transport.request({
      method: 'HEAD',
      path: blobPath(digest),
      okStatuses: [404],
      signal: options.signal,
    });
    return response.status !== 404;
  }

  /**
   * Upload a blob; the server verifies the bytes against the digest
   * POST /api/blobs/:digest
   */
  async create(digest: string, bytes: Uint8Array, options: CallOptions = {}): Promise<void> {
    await this.transport.request({
      method: 'POST',
      path: blobPath(digest),
      body: bytes,
      signal: options.signal,
    });
  }
}
