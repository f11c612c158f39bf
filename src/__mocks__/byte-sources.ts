/**
 * In-process byte sources for stream tests.
 */

const encoder = new TextEncoder();

export function bytesFrom(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Split bytes at the given offsets, e.g. `[3, 7]` gives `[0,3) [3,7) [7,end)`
 */
export function splitAt(bytes: Uint8Array, offsets: number[]): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  let start = 0;
  for (const offset of offsets) {
    chunks.push(bytes.slice(start, offset));
    start = offset;
  }
  chunks.push(bytes.slice(start));
  return chunks;
}

/**
 * Split bytes into chunks of `size` bytes
 */
export function chunksOf(bytes: Uint8Array, size: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let start = 0; start < bytes.length; start += size) {
    chunks.push(bytes.slice(start, start + size));
  }
  return chunks;
}

/**
 * Source that records how many chunks were pulled and whether it was closed
 */
export class CountingSource implements AsyncIterable<Uint8Array> {
  reads = 0;
  closed = false;

  constructor(private readonly chunks: Uint8Array[]) {}

  [Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    return this.generate();
  }

  private async *generate(): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      for (const chunk of this.chunks) {
        this.reads += 1;
        yield chunk;
      }
    } finally {
      this.closed = true;
    }
  }
}

/**
 * Source that yields its chunks and then fails
 */
export async function* failingSource(chunks: Uint8Array[], error: Error): AsyncGenerator<Uint8Array, void, undefined> {
  for (const chunk of chunks) {
    yield chunk;
  }
  throw error;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
