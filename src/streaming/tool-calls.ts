/**
 * Tool-Call Reassembler
 *
 * Providers may stream a tool call in pieces: a name in one chunk, argument
 * text spread over the following ones, each tagged with the call's index.
 * The reassembler accumulates those pieces per index and emits one complete
 * call once its arguments are final.
 */

import type { ChatChunk } from '../types/chat.js';
import { ToolCallParseError } from '../types/errors.js';
import { isJsonObject, type JsonObject } from '../types/json.js';
import type { Message } from '../types/message.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { StreamEvent } from './response-stream.js';

/**
 * One piece of a tool call, as read from a chat chunk
 */
export interface ToolCallFragment {
  index: number;
  functionName?: string;
  /** Partial argument text, appended in arrival order */
  argumentsText?: string;
  /** Complete arguments; finalizes the call */
  argumentsObject?: JsonObject;
}

/**
 * A finalized tool call
 */
export interface ReassembledToolCall {
  readonly index: number;
  readonly name: string;
  readonly arguments: JsonObject;
  /** Names seen earlier for the same index and overridden by `name` */
  readonly conflictingNames?: readonly string[];
}

export type ChatStreamEvent =
  | {
      readonly type: 'delta';
      readonly content: string;
      readonly thinking?: string;
      readonly done: boolean;
      readonly doneReason?: string;
      readonly chunk: ChatChunk;
    }
  | { readonly type: 'tool_call'; readonly call: ReassembledToolCall }
  | { readonly type: 'tool_call_error'; readonly index: number; readonly error: ToolCallParseError };

interface Accumulator {
  name?: string;
  conflictingNames: string[];
  parts: string[];
}

/**
 * Read the tool-call fragments carried by a message
 *
 * A fragment without an explicit `index` takes its position in the array.
 */
export function fragmentsOf(message: Message): ToolCallFragment[] {
  return (message.tool_calls ?? []).map((call, position) => {
    const { index, name, arguments: args } = call.function;
    const fragment: ToolCallFragment = { index: index ?? position };
    if (name !== undefined && name !== '') {
      fragment.functionName = name;
    }
    if (typeof args === 'string') {
      fragment.argumentsText = args;
    } else if (args !== undefined) {
      fragment.argumentsObject = args;
    }
    return fragment;
  });
}

function deltaEvent(chunk: ChatChunk): ChatStreamEvent {
  const event: ChatStreamEvent = {
    type: 'delta',
    content: chunk.message.content,
    ...(chunk.message.thinking !== undefined ? { thinking: chunk.message.thinking } : {}),
    done: chunk.done,
    ...(chunk.done_reason !== undefined ? { doneReason: chunk.done_reason } : {}),
    chunk,
  };
  return Object.freeze(event);
}

/**
 * Accumulates tool-call fragments across chunks of one chat stream
 *
 * Not shared between streams; create one per stream.
 */
export class ToolCallReassembler {
  private readonly open = new Map<number, Accumulator>();

  constructor(private readonly logger: Logger = new NoopLogger()) {}

  /**
   * Number of calls still accumulating
   */
  get pending(): number {
    return this.open.size;
  }

  /**
   * Apply one chunk and return the events it completes
   *
   * Calls finalized by the chunk come first, then the chunk's own delta.
   */
  push(chunk: ChatChunk): ChatStreamEvent[] {
    const events: ChatStreamEvent[] = [];

    for (const fragment of fragmentsOf(chunk.message)) {
      const finalized = this.apply(fragment);
      if (finalized) {
        events.push(finalized);
      }
    }

    if (chunk.done) {
      events.push(...this.flush());
    }

    events.push(deltaEvent(chunk));
    return events;
  }

  /**
   * Finalize every open call in index order
   */
  flush(): ChatStreamEvent[] {
    const indices = [...this.open.keys()].sort((a, b) => a - b);
    const events: ChatStreamEvent[] = [];

    for (const index of indices) {
      const accumulator = this.open.get(index);
      if (accumulator) {
        events.push(this.finalize(index, accumulator));
      }
    }

    this.open.clear();
    return events;
  }

  private apply(fragment: ToolCallFragment): ChatStreamEvent | undefined {
    const { index } = fragment;
    let accumulator = this.open.get(index);
    if (!accumulator) {
      accumulator = { conflictingNames: [], parts: [] };
      this.open.set(index, accumulator);
    }

    if (fragment.functionName !== undefined) {
      if (accumulator.name !== undefined && accumulator.name !== fragment.functionName) {
        this.logger.warn('Conflicting tool call names', {
          index,
          previous: accumulator.name,
          name: fragment.functionName,
        });
        accumulator.conflictingNames.push(accumulator.name);
      }
      accumulator.name = fragment.functionName;
    }

    if (fragment.argumentsText !== undefined) {
      accumulator.parts.push(fragment.argumentsText);
    }

    if (fragment.argumentsObject !== undefined) {
      this.open.delete(index);
      return this.finalize(index, accumulator, fragment.argumentsObject);
    }

    return undefined;
  }

  private finalize(index: number, accumulator: Accumulator, complete?: JsonObject): ChatStreamEvent {
    const raw = accumulator.parts.join('');
    const { name } = accumulator;

    if (name === undefined) {
      return this.failure(index, `Tool call ${index} has no function name`, raw);
    }

    let args: JsonObject;
    if (complete !== undefined) {
      args = complete;
    } else if (raw.trim() === '') {
      args = {};
    } else {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return this.failure(index, `Tool call ${index} (${name}) has invalid JSON arguments: ${reason}`, raw, name);
      }
      if (!isJsonObject(parsed)) {
        return this.failure(index, `Tool call ${index} (${name}) arguments are not a JSON object`, raw, name);
      }
      args = parsed;
    }

    const call: ReassembledToolCall = {
      index,
      name,
      arguments: args,
      ...(accumulator.conflictingNames.length > 0
        ? { conflictingNames: Object.freeze([...accumulator.conflictingNames]) }
        : {}),
    };
    const event: ChatStreamEvent = { type: 'tool_call', call: Object.freeze(call) };
    return Object.freeze(event);
  }

  private failure(index: number, message: string, raw: string, name?: string): ChatStreamEvent {
    const error = new ToolCallParseError(index, message, raw, name);
    this.logger.debug('Tool call could not be reassembled', { index, name, error: message });
    const event: ChatStreamEvent = { type: 'tool_call_error', index, error };
    return Object.freeze(event);
  }
}

/**
 * Stream transform: chat events in, delta and tool-call events out
 *
 * Calls still open when the source ends cleanly are flushed at the end.
 */
export async function* reassembleToolCalls(
  source: AsyncIterable<StreamEvent<ChatChunk>>,
  logger?: Logger
): AsyncGenerator<ChatStreamEvent, void, undefined> {
  const reassembler = new ToolCallReassembler(logger);

  for await (const event of source) {
    yield* reassembler.push(event.data);
  }

  yield* reassembler.flush();
}
