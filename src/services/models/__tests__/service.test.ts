import { describe, it, expect, beforeEach } from 'vitest';
import { ModelsService } from '../service.js';
import { LocalValidationError, TruncationError } from '../../../types/errors.js';
import type { HttpResponse } from '../../../transport/types.js';
import { createMockHttpTransport, mockHttpTransportResponse, mockHttpTransportStream, streamingResponse, type MockHttpTransport } from '../../../__mocks__/http-transport.mock.js';
import { bytesFrom } from '../../../__mocks__/byte-sources.js';
import { createTestConfig } from '../../../__mocks__/config.mock.js';

const DIGEST = `sha256:${'0f'.repeat(32)}`;

function ok(body: unknown): HttpResponse {
  return { status: 200, body, headers: {} };
}

describe('ModelsService', () => {
  let transport: MockHttpTransport;
  let service: ModelsService;

  beforeEach(() => {
    transport = createMockHttpTransport();
    service = new ModelsService({ config: createTestConfig(), transport });
  });

  describe('list', () => {
    it('should list local models', async () => {
      mockHttpTransportResponse(transport, {
        models: [
          {
            name: 'llama3.2:latest',
            model: 'llama3.2:latest',
            modified_at: '2025-01-01T00:00:00Z',
            size: 2019393189,
            digest: DIGEST,
            details: { format: 'gguf', family: 'llama', families: null, parameter_size: '3.2B' },
          },
        ],
      });

      const { models } = await service.list();

      expect(transport.request).toHaveBeenCalledWith({ method: 'GET', path: '/api/tags', signal: undefined });
      expect(models).toHaveLength(1);
      expect(models[0]?.details?.parameter_size).toBe('3.2B');
    });
  });

  describe('isAvailable', () => {
    beforeEach(() => {
      mockHttpTransportResponse(transport, {
        models: [
          { name: 'llama3.2:latest', model: 'llama3.2:latest', size: 1, digest: DIGEST },
          { name: 'library/qwen2.5:7b', model: 'library/qwen2.5:7b', size: 1, digest: DIGEST },
        ],
      });
    });

    it('should match an untagged name against :latest', async () => {
      await expect(service.isAvailable('llama3.2')).resolves.toBe(true);
      await expect(service.isAvailable('llama3.2:latest')).resolves.toBe(true);
    });

    it('should require the exact tag otherwise', async () => {
      await expect(service.isAvailable('library/qwen2.5:7b')).resolves.toBe(true);
      await expect(service.isAvailable('library/qwen2.5')).resolves.toBe(false);
      await expect(service.isAvailable('mistral')).resolves.toBe(false);
    });
  });

  describe('show', () => {
    it('should send the model name and expose capabilities', async () => {
      mockHttpTransportResponse(transport, {
        modelfile: 'FROM llama3.2',
        template: '{{ .Prompt }}',
        capabilities: ['completion', 'tools'],
        model_info: { 'general.architecture': 'llama' },
      });

      const info = await service.show({ model: 'llama3.2', verbose: true });

      expect(info.capabilities).toEqual(['completion', 'tools']);
      expect(transport.request).toHaveBeenCalledWith({
        method: 'POST',
        path: '/api/show',
        body: { model: 'llama3.2', verbose: true },
        signal: undefined,
      });
    });

    it('should return capabilities as a set', async () => {
      mockHttpTransportResponse(transport, { capabilities: ['completion', 'vision'] });

      const capabilities = await service.capabilities('llava');

      expect(capabilities.has('vision')).toBe(true);
      expect(capabilities.has('tools')).toBe(false);
      expect(transport.request).toHaveBeenCalledWith(expect.objectContaining({ body: { model: 'llava' } }));
    });

    it('should return an empty set when the server lists none', async () => {
      mockHttpTransportResponse(transport, { modelfile: 'FROM x' });

      expect((await service.capabilities('x')).size).toBe(0);
    });
  });

  describe('running', () => {
    it('should list loaded models', async () => {
      mockHttpTransportResponse(transport, {
        models: [{ name: 'llama3.2', model: 'llama3.2', size: 10, digest: DIGEST, size_vram: 10, expires_at: '2025-01-01T00:05:00Z' }],
      });

      const { models } = await service.running();

      expect(models[0]?.size_vram).toBe(10);
      expect(transport.request).toHaveBeenCalledWith({ method: 'GET', path: '/api/ps', signal: undefined });
    });
  });

  describe('copy and delete', () => {
    it('should copy a model', async () => {
      transport.request.mockResolvedValue(ok(undefined));

      await service.copy({ source: 'llama3.2', destination: 'llama3.2-backup' });

      expect(transport.request).toHaveBeenCalledWith({
        method: 'POST',
        path: '/api/copy',
        body: { source: 'llama3.2', destination: 'llama3.2-backup' },
        signal: undefined,
      });
    });

    it('should delete with the DELETE method', async () => {
      transport.request.mockResolvedValue(ok(undefined));

      await service.delete('llama3.2-backup');

      expect(transport.request).toHaveBeenCalledWith({
        method: 'DELETE',
        path: '/api/delete',
        body: { model: 'llama3.2-backup' },
        signal: undefined,
      });
    });

    it('should reject blank names locally', async () => {
      await expect(service.copy({ source: 'a', destination: ' ' })).rejects.toBeInstanceOf(LocalValidationError);
      await expect(service.delete('')).rejects.toBeInstanceOf(LocalValidationError);
      expect(transport.request).not.toHaveBeenCalled();
    });
  });

  describe('pull', () => {
    it('should stream progress until success', async () => {
      mockHttpTransportStream(transport, [
        { status: 'pulling manifest' },
        { status: 'pulling 0f0f', digest: DIGEST, total: 100, completed: 10 },
        { status: 'pulling 0f0f', digest: DIGEST, total: 100, completed: 5 },
        { status: 'verifying sha256 digest' },
        { status: 'success' },
      ]);

      const events = await service.pullStream({ model: 'llama3.2' }).collect();

      expect(events.map((e) => e.data.completed)).toEqual([undefined, 10, 5, undefined, undefined]);
      expect(events.map((e) => e.done)).toEqual([false, false, false, false, true]);
      expect(transport.requestStream).toHaveBeenCalledWith(
        expect.objectContaining({ method: 'POST', path: '/api/pull', body: { model: 'llama3.2', stream: true } })
      );
    });

    it('should stream to completion and return the success record', async () => {
      mockHttpTransportStream(transport, [
        { status: 'pulling manifest' },
        { status: 'pulling 0f0f', digest: DIGEST, total: 100, completed: 100 },
        { status: 'success' },
      ]);

      await expect(service.pull({ model: 'llama3.2', insecure: true })).resolves.toEqual({ status: 'success' });
      expect(transport.requestStream).toHaveBeenCalledWith(
        expect.objectContaining({ body: { model: 'llama3.2', insecure: true, stream: true } })
      );
      expect(transport.request).not.toHaveBeenCalled();
    });

    it('should abort the exchange when the caller signal fires', async () => {
      const controller = new AbortController();
      controller.abort();
      mockHttpTransportStream(transport, [{ status: 'success' }]);

      await service.pull({ model: 'llama3.2' }, { signal: controller.signal });

      const sent = transport.requestStream.mock.calls[0]?.[0];
      expect(sent?.signal?.aborted).toBe(true);
    });

    it('should fail when the connection drops mid-record', async () => {
      transport.requestStream.mockResolvedValue(
        streamingResponse([bytesFrom('{"status":"pulling manifest"}\n{"status":"pull')])
      );

      const statuses: string[] = [];
      const error = await (async () => {
        for await (const event of service.pullStream({ model: 'llama3.2' })) {
          statuses.push(event.data.status);
        }
      })().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TruncationError);
      expect(statuses).toEqual(['pulling manifest']);
    });
  });

  describe('push', () => {
    it('should stream push progress', async () => {
      mockHttpTransportStream(transport, [{ status: 'retrieving manifest' }, { status: 'success' }]);

      const events = await service.pushStream({ model: 'me/custom:v1' }).collect();

      expect(events[1]?.done).toBe(true);
      expect(transport.requestStream).toHaveBeenCalledWith(
        expect.objectContaining({ path: '/api/push', body: { model: 'me/custom:v1', stream: true } })
      );
    });
  });

  describe('create', () => {
    it('should send an inline Modelfile', async () => {
      mockHttpTransportStream(transport, [{ status: 'parsing modelfile' }, { status: 'success' }]);

      const events = await service
        .createStream({ model: 'mario', modelfile: 'FROM llama3.2\nSYSTEM You are Mario.', quantize: 'q4_K_M' })
        .collect();

      expect(events.map((e) => e.data.status)).toEqual(['parsing modelfile', 'success']);
      expect(transport.requestStream).toHaveBeenCalledWith(
        expect.objectContaining({
          path: '/api/create',
          body: { model: 'mario', modelfile: 'FROM llama3.2\nSYSTEM You are Mario.', quantize: 'q4_K_M', stream: true },
        })
      );
    });

    it('should send a server-side path', async () => {
      mockHttpTransportStream(transport, [{ status: 'reading model metadata' }, { status: 'success' }]);

      await expect(service.create({ model: 'mario', path: '/models/Modelfile' })).resolves.toEqual({ status: 'success' });

      expect(transport.requestStream).toHaveBeenCalledWith(
        expect.objectContaining({ body: { model: 'mario', path: '/models/Modelfile', stream: true } })
      );
    });

    it('should reject both modelfile and path before any network call', () => {
      expect(() => service.createStream({ model: 'mario', modelfile: 'FROM x', path: '/Modelfile' })).toThrow(
        'Exactly one of modelfile or path is required'
      );
      expect(transport.requestStream).not.toHaveBeenCalled();
    });

    it('should reject neither modelfile nor path', async () => {
      await expect(service.create({ model: 'mario' })).rejects.toBeInstanceOf(LocalValidationError);
      expect(transport.requestStream).not.toHaveBeenCalled();
    });
  });
});
