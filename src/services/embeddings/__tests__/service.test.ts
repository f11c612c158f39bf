import { describe, it, expect, beforeEach } from 'vitest';
import { EmbeddingsService } from '../service.js';
import { DecodeError, LocalValidationError } from '../../../types/errors.js';
import { createMockHttpTransport, mockHttpTransportResponse, type MockHttpTransport } from '../../../__mocks__/http-transport.mock.js';
import { createTestConfig } from '../../../__mocks__/config.mock.js';

describe('EmbeddingsService', () => {
  let transport: MockHttpTransport;
  let service: EmbeddingsService;

  beforeEach(() => {
    transport = createMockHttpTransport();
    service = new EmbeddingsService({ config: createTestConfig({ defaultModel: 'nomic-embed-text' }), transport });
  });

  it('should keep batch order in the request and the response', async () => {
    mockHttpTransportResponse(transport, {
      model: 'nomic-embed-text',
      embeddings: [
        [0.1, 0.2],
        [0.3, 0.4],
        [0.5, 0.6],
      ],
    });

    const response = await service.create({ input: ['a', 'b', 'c'] });

    expect(transport.request).toHaveBeenCalledWith({
      method: 'POST',
      path: '/api/embed',
      body: { model: 'nomic-embed-text', input: ['a', 'b', 'c'] },
      signal: undefined,
    });
    expect(response.embeddings).toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
      [0.5, 0.6],
    ]);
  });

  it('should embed a single string', async () => {
    mockHttpTransportResponse(transport, { model: 'nomic-embed-text', embeddings: [[1, 0]], total_duration: 42 });

    const response = await service.create({ input: 'hello', truncate: false, dimensions: 2, keep_alive: '-1' });

    expect(response.embeddings).toHaveLength(1);
    expect(response.total_duration).toBe(42);
    expect(transport.request).toHaveBeenCalledWith(
      expect.objectContaining({
        body: { model: 'nomic-embed-text', input: 'hello', truncate: false, dimensions: 2, keep_alive: -1 },
      })
    );
  });

  it('should reject a response with the wrong number of vectors', async () => {
    mockHttpTransportResponse(transport, { model: 'nomic-embed-text', embeddings: [[0.1]] });

    const error = await service.create({ input: ['a', 'b'] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toHaveProperty('message', 'Expected 2 embedding(s), received 1');
  });

  it.each([0, -3, 1.5])('should reject dimensions=%d before sending', async (dimensions) => {
    await expect(service.create({ input: 'x', dimensions })).rejects.toBeInstanceOf(LocalValidationError);
    expect(transport.request).not.toHaveBeenCalled();
  });

  it('should reject an empty batch', async () => {
    await expect(service.create({ input: [] })).rejects.toThrow('Input batch must not be empty');
    expect(transport.request).not.toHaveBeenCalled();
  });
});
