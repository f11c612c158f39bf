import { describe, it, expect, beforeEach } from 'vitest';
import { BlobsService } from '../service.js';
import { LocalValidationError } from '../../../types/errors.js';
import { createMockHttpTransport, type MockHttpTransport } from '../../../__mocks__/http-transport.mock.js';
import { createTestConfig } from '../../../__mocks__/config.mock.js';

const DIGEST = `sha256:${'ab'.repeat(32)}`;

describe('BlobsService', () => {
  let transport: MockHttpTransport;
  let service: BlobsService;

  beforeEach(() => {
    transport = createMockHttpTransport();
    service = new BlobsService({ config: createTestConfig(), transport });
  });

  it('should report an existing blob', async () => {
    transport.request.mockResolvedValue({ status: 200, body: undefined, headers: {} });

    await expect(service.check(DIGEST)).resolves.toBe(true);
    expect(transport.request).toHaveBeenCalledWith({
      method: 'HEAD',
      path: `/api/blobs/${DIGEST}`,
      okStatuses: [404],
      signal: undefined,
    });
  });

  it('should report a missing blob as false', async () => {
    transport.request.mockResolvedValue({ status: 404, body: undefined, headers: {} });

    await expect(service.check(DIGEST)).resolves.toBe(false);
  });

  it('should upload raw bytes', async () => {
    transport.request.mockResolvedValue({ status: 201, body: undefined, headers: {} });
    const bytes = new Uint8Array([1, 2, 3]);

    await service.create(DIGEST, bytes);

    expect(transport.request).toHaveBeenCalledWith({
      method: 'POST',
      path: `/api/blobs/${DIGEST}`,
      body: bytes,
      signal: undefined,
    });
  });

  it.each(['sha256:abc', `sha256:${'AB'.repeat(32)}`, `sha512:${'ab'.repeat(32)}`, ''])(
    'should reject digest %j locally',
    async (digest) => {
      await expect(service.check(digest)).rejects.toBeInstanceOf(LocalValidationError);
      await expect(service.create(digest, new Uint8Array())).rejects.toBeInstanceOf(LocalValidationError);
      expect(transport.request).not.toHaveBeenCalled();
    }
  );
});
