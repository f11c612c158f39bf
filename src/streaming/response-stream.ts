/**
 * Lazy, cancelable response streams.
 */

import { OllamaError } from '../types/errors.js';

/**
 * One decoded unit of a streaming exchange
 *
 * `done` is the endpoint's own completion predicate applied to `data`
 * (`done: true` for generate/chat, `status: "success"` for pull/push/create).
 * Events are frozen once created.
 */
export interface StreamEvent<T> {
  readonly data: T;
  readonly done: boolean;
  readonly doneReason?: string;
}

export function createStreamEvent<T>(data: T, done: boolean, doneReason?: string): StreamEvent<T> {
  return Object.freeze(doneReason === undefined ? { data, done } : { data, done, doneReason });
}

/**
 * Produces the items of a stream; receives the stream's abort signal
 */
export type StreamProducer<E> = (signal: AbortSignal) => AsyncGenerator<E, void, undefined>;

/**
 * A finite, non-restartable sequence of items from one HTTP exchange
 *
 * Nothing is sent until the first item is pulled. Leaving a `for await` loop
 * early closes the connection; `abort()` cancels the exchange from outside
 * the loop (a pending read then fails with a `TransportError` coded `ABORTED`).
 *
 * @example
 * ```typescript
 * const stream = client.models.pullStream({ model: 'llama3.2' });
 * for await (const event of stream) {
 *   const { completed, total } = event.data;
 *   if (completed !== undefined && total) console.log(Math.round((completed / total) * 100));
 * }
 * ```
 */
export class ResponseStream<E> implements AsyncIterable<E> {
  private started = false;

  constructor(
    private readonly produce: StreamProducer<E>,
    private readonly controller: AbortController = new AbortController()
  ) {}

  /**
   * Signal that fires when the stream is aborted
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Cancel the underlying exchange
   */
  abort(): void {
    this.controller.abort();
  }

  [Symbol.asyncIterator](): AsyncGenerator<E, void, undefined> {
    if (this.started) {
      throw OllamaError.streamError('Response stream can only be iterated once');
    }
    this.started = true;
    return this.produce(this.controller.signal);
  }

  /**
   * Derive a stream by transforming this one; both share one abort controller
   */
  through<U>(transform: (source: AsyncIterable<E>) => AsyncGenerator<U, void, undefined>): ResponseStream<U> {
    return new ResponseStream<U>(() => transform(this), this.controller);
  }

  /**
   * Drain the stream into an array
   */
  async collect(): Promise<E[]> {
    const items: E[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }
}
