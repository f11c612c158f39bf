import { describe, it, expect } from 'vitest';
import { NdjsonParser } from '../ndjson-parser.js';
import { decoderFor } from '../../codec/decode.js';
import { ProgressRecordSchema } from '../../codec/schemas.js';
import { DecodeError, ServerStreamError, TruncationError } from '../../types/errors.js';
import { isProgressComplete, type ProgressRecord } from '../../types/progress.js';
import { bytesFrom, chunksOf, collect, CountingSource, failingSource, splitAt } from '../../__mocks__/byte-sources.js';

function progressParser(): NdjsonParser<ProgressRecord> {
  return new NdjsonParser(decoderFor(ProgressRecordSchema, 'progress record'), 'progress record');
}

async function* source(...chunks: Uint8Array[]): AsyncGenerator<Uint8Array, void, undefined> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

const PULL_STREAM =
  '{"status":"downloading","completed":10,"total":100}\n' +
  '{"status":"downloading","completed":100,"total":100}\n' +
  '{"status":"success"}\n';

describe('NdjsonParser', () => {
  it('should decode a pull progress stream in order and end cleanly', async () => {
    const records = await collect(progressParser().parse(source(bytesFrom(PULL_STREAM))));

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({ status: 'downloading', completed: 10, total: 100 });
    expect(records[1]).toEqual({ status: 'downloading', completed: 100, total: 100 });
    expect(records[2]).toEqual({ status: 'success' });
    expect(records.map(isProgressComplete)).toEqual([false, false, true]);
  });

  it('should yield the same records however the bytes are chunked', async () => {
    const bytes = bytesFrom(PULL_STREAM);
    const expected = await collect(progressParser().parse(source(bytes)));

    for (let size = 1; size <= bytes.length; size += 1) {
      const records = await collect(progressParser().parse(source(...chunksOf(bytes, size))));
      expect(records).toEqual(expected);
    }
  });

  it('should reassemble multi-byte characters split across chunks', async () => {
    const bytes = bytesFrom('{"status":"vérifié ✓ 完了"}\n');
    // Offsets fall inside the first "é", the check mark and "完"
    const chunks = splitAt(bytes, [13, 22, 27]);

    const records = await collect(progressParser().parse(source(...chunks)));

    expect(records).toEqual([{ status: 'vérifié ✓ 完了' }]);
  });

  it('should accept CRLF line endings and skip blank lines', async () => {
    const text = '{"status":"a"}\r\n\r\n\n  \n{"status":"b"}\r\n';

    const records = await collect(progressParser().parse(source(bytesFrom(text))));

    expect(records.map((r) => r.status)).toEqual(['a', 'b']);
  });

  it('should keep fields it does not model', async () => {
    const records = await collect(progressParser().parse(source(bytesFrom('{"status":"a","extra":1}\n'))));

    expect(records[0]).toEqual({ status: 'a', extra: 1 });
  });

  it('should end cleanly when only whitespace trails the last record', async () => {
    const records = await collect(progressParser().parse(source(bytesFrom('{"status":"a"}\n  \t'))));

    expect(records).toEqual([{ status: 'a' }]);
  });

  it('should throw TruncationError for a partial trailing record', async () => {
    const seen: string[] = [];
    const consume = async (): Promise<void> => {
      for await (const record of progressParser().parse(source(bytesFrom('{"status":"a"}\n{"status":"b')))) {
        seen.push(record.status);
      }
    };

    const error = await consume().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TruncationError);
    expect(error).toMatchObject({ partial: '{"status":"b', code: 'TRUNCATION_ERROR' });
    expect(seen).toEqual(['a']);
  });

  it('should treat a final record without a newline as truncated', async () => {
    await expect(collect(progressParser().parse(source(bytesFrom('{"status":"success"}'))))).rejects.toBeInstanceOf(
      TruncationError
    );
  });

  it('should stop with ServerStreamError at an error record', async () => {
    const text = '{"status":"a"}\n{"error":"pull model manifest: file does not exist"}\n{"status":"b"}\n';
    const seen: string[] = [];

    const error = await (async () => {
      for await (const record of progressParser().parse(source(bytesFrom(text)))) {
        seen.push(record.status);
      }
    })().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerStreamError);
    expect(error).toHaveProperty('message', 'pull model manifest: file does not exist');
    expect(error).toMatchObject({ details: { record: 2 } });
    expect(seen).toEqual(['a']);
  });

  it('should throw DecodeError with the record number for invalid JSON', async () => {
    const error = await collect(progressParser().parse(source(bytesFrom('{"status":"a"}\nnot json\n')))).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ details: { record: 2, text: 'not json' } });
    expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid JSON in progress record: /));
  });

  it('should throw DecodeError naming a missing required field', async () => {
    const error = await collect(progressParser().parse(source(bytesFrom('{"completed":1}\n')))).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toHaveProperty('message', 'Invalid progress record at status: Required');
  });

  it('should stop reading the source when the consumer stops', async () => {
    const counting = new CountingSource([
      bytesFrom('{"status":"a"}\n'),
      bytesFrom('{"status":"b"}\n'),
      bytesFrom('{"status":"c"}\n'),
    ]);

    const seen: string[] = [];
    for await (const record of progressParser().parse(counting)) {
      seen.push(record.status);
      break;
    }

    expect(seen).toEqual(['a']);
    expect(counting.reads).toBe(1);
    expect(counting.closed).toBe(true);
  });

  it('should propagate a source failure after the records already read', async () => {
    const failure = new Error('socket hang up');
    const seen: string[] = [];

    const error = await (async () => {
      for await (const record of progressParser().parse(failingSource([bytesFrom('{"status":"a"}\n')], failure))) {
        seen.push(record.status);
      }
    })().catch((e: unknown) => e);

    expect(error).toBe(failure);
    expect(seen).toEqual(['a']);
  });

  it('should keep separate buffers for concurrent parses', async () => {
    const parser = progressParser();
    const first = parser.parse(source(bytesFrom('{"status":"fi'), bytesFrom('rst"}\n')));
    const second = parser.parse(source(bytesFrom('{"status":"sec'), bytesFrom('ond"}\n')));

    const [a, b] = await Promise.all([collect(first), collect(second)]);

    expect(a).toEqual([{ status: 'first' }]);
    expect(b).toEqual([{ status: 'second' }]);
  });
});
