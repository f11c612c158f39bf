/**
 * NDJSON Stream Parser
 *
 * Turns a byte stream of newline-delimited JSON into a lazy sequence of
 * decoded records.
 */

import { parseJson } from '../codec/decode.js';
import { ServerStreamError, TruncationError } from '../types/errors.js';

/**
 * Decodes one parsed JSON value; `record` is its 1-based position in a stream
 */
export type RecordDecoder<T> = (value: unknown, record?: number) => T;

interface ParseState {
  buffer: string;
  record: number;
}

function isErrorRecord(value: unknown): value is { error: string } {
  return typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string';
}

/**
 * Parser for newline-delimited JSON streams
 *
 * Handles:
 * - Buffering of partial lines across chunk boundaries
 * - UTF-8 decoding (multi-byte characters may be split across chunks)
 * - `\r\n` line endings and blank lines
 * - Error records (`{"error": "..."}`), which end the sequence with a `ServerStreamError`
 * - A non-blank partial record at end of input, which ends it with a `TruncationError`
 *
 * Records are yielded in arrival order. Nothing is read from the source until
 * the consumer pulls, and when the consumer stops (`break`, `return()`, or an
 * error) the source iterator is closed.
 *
 * Each `parse` call keeps its own buffer, so one parser may serve several
 * streams at once.
 *
 * @template T - Type of decoded records
 */
export class NdjsonParser<T> {
  constructor(
    private readonly decode: RecordDecoder<T>,
    private readonly what: string = 'stream record'
  ) {}

  /**
   * Parse NDJSON stream
   *
   * @param stream - Async iterable of raw bytes
   * @yields Decoded records of type T
   * @throws {DecodeError} On invalid JSON or a record the decoder rejects
   * @throws {ServerStreamError} On an error record
   * @throws {TruncationError} When input ends inside a record
   */
  async *parse(stream: AsyncIterable<Uint8Array>): AsyncGenerator<T, void, undefined> {
    const decoder = new TextDecoder('utf-8');
    const state: ParseState = { buffer: '', record: 0 };

    for await (const chunk of stream) {
      state.buffer += decoder.decode(chunk, { stream: true });
      yield* this.drain(state);
    }

    // Flush any bytes the decoder held back
    state.buffer += decoder.decode();
    yield* this.drain(state);

    if (state.buffer.trim().length > 0) {
      throw new TruncationError(state.buffer);
    }
  }

  /**
   * Yield every complete line in the buffer, leaving the partial tail
   */
  private *drain(state: ParseState): Generator<T, void, undefined> {
    let newlineIndex = state.buffer.indexOf('\n');

    while (newlineIndex !== -1) {
      let line = state.buffer.slice(0, newlineIndex);
      state.buffer = state.buffer.slice(newlineIndex + 1);

      if (line.endsWith('\r')) {
        line = line.slice(0, -1);
      }

      if (line.trim().length > 0) {
        state.record += 1;
        yield this.decodeLine(line, state.record);
      }

      newlineIndex = state.buffer.indexOf('\n');
    }
  }

  private decodeLine(line: string, record: number): T {
    const value = parseJson(line, this.what, record);

    if (isErrorRecord(value)) {
      throw new ServerStreamError(value.error, record);
    }

    return this.decode(value, record);
  }
}
