import { describe, it, expect } from 'vitest';
import { fragmentsOf, reassembleToolCalls, ToolCallReassembler, type ChatStreamEvent } from '../tool-calls.js';
import { createStreamEvent, type StreamEvent } from '../response-stream.js';
import { ToolCallParseError } from '../../types/errors.js';
import type { ChatChunk } from '../../types/chat.js';
import type { Message, ToolCall } from '../../types/message.js';
import { collect } from '../../__mocks__/byte-sources.js';
import { createMockLogger } from '../../__mocks__/config.mock.js';

function chunk(message: Partial<Message>, done = false, doneReason?: string): ChatChunk {
  return {
    model: 'llama3.2',
    message: { role: 'assistant', content: '', ...message },
    done,
    ...(doneReason !== undefined ? { done_reason: doneReason } : {}),
  };
}

function calls(...toolCalls: ToolCall['function'][]): Partial<Message> {
  return { tool_calls: toolCalls.map((fn) => ({ function: fn })) };
}

async function* events(...chunks: ChatChunk[]): AsyncGenerator<StreamEvent<ChatChunk>, void, undefined> {
  for (const c of chunks) {
    yield createStreamEvent(c, c.done, c.done_reason);
  }
}

function toolCalls(output: ChatStreamEvent[]): ChatStreamEvent[] {
  return output.filter((e) => e.type === 'tool_call');
}

describe('ToolCallReassembler', () => {
  it('should reassemble arguments streamed across chunks into one call', async () => {
    const output = await collect(
      reassembleToolCalls(
        events(
          chunk(calls({ index: 0, name: 'get_weather', arguments: '{"ci' })),
          chunk(calls({ index: 0, arguments: 'ty":"Por' })),
          chunk(calls({ index: 0, arguments: 'tland"}' })),
          chunk({}, true, 'stop')
        )
      )
    );

    expect(output.map((e) => e.type)).toEqual(['delta', 'delta', 'delta', 'tool_call', 'delta']);
    expect(toolCalls(output)).toEqual([
      { type: 'tool_call', call: { index: 0, name: 'get_weather', arguments: { city: 'Portland' } } },
    ]);
  });

  it('should report a call whose name is folded into its argument text', async () => {
    const output = await collect(
      reassembleToolCalls(
        events(
          chunk(calls({ index: 0, arguments: '{"get_wea' })),
          chunk(calls({ index: 0, arguments: 'ther","ci' })),
          chunk(calls({ index: 0, arguments: 'ty":"Portland"}' })),
          chunk({}, true, 'stop')
        )
      )
    );

    expect(output.map((e) => e.type)).toEqual(['delta', 'delta', 'delta', 'tool_call_error', 'delta']);
    const failure = output[3];
    if (failure?.type !== 'tool_call_error') throw new Error('expected a tool_call_error event');
    expect(failure.index).toBe(0);
    expect(failure.error.message).toBe('Tool call 0 has no function name');
    expect(failure.error.rawArguments).toBe('{"get_weather","city":"Portland"}');
  });

  it('should report the same fragments as invalid JSON once a name is known', () => {
    const reassembler = new ToolCallReassembler();

    reassembler.push(chunk(calls({ index: 0, name: 'get_weather', arguments: '{"get_wea' })));
    reassembler.push(chunk(calls({ index: 0, arguments: 'ther","ci' })));
    reassembler.push(chunk(calls({ index: 0, arguments: 'ty":"Portland"}' })));
    const [failure, last] = reassembler.push(chunk({}, true, 'stop'));

    if (failure?.type !== 'tool_call_error') throw new Error('expected a tool_call_error event');
    expect(failure.error.message).toMatch(/^Tool call 0 \(get_weather\) has invalid JSON arguments: /);
    expect(failure.error.rawArguments).toBe('{"get_weather","city":"Portland"}');
    expect(last).toEqual(expect.objectContaining({ type: 'delta', done: true, doneReason: 'stop' }));
  });

  it('should finalize calls whose arguments arrive as an object', () => {
    const reassembler = new ToolCallReassembler();

    const output = reassembler.push(
      chunk({
        content: 'checking',
        ...calls({ name: 'lookup', arguments: { q: 1 } }, { name: 'now', arguments: {} }),
      })
    );

    expect(output).toEqual([
      { type: 'tool_call', call: { index: 0, name: 'lookup', arguments: { q: 1 } } },
      { type: 'tool_call', call: { index: 1, name: 'now', arguments: {} } },
      expect.objectContaining({ type: 'delta', content: 'checking', done: false }),
    ]);
    expect(reassembler.pending).toBe(0);
  });

  it('should flush open calls in index order when the stream is done', () => {
    const reassembler = new ToolCallReassembler();

    expect(
      reassembler.push(
        chunk(calls({ index: 1, name: 'second', arguments: '{"n":' }, { index: 0, name: 'first', arguments: '' }))
      )
    ).toHaveLength(1);
    reassembler.push(chunk(calls({ index: 1, arguments: '2}' })));
    expect(reassembler.pending).toBe(2);

    const output = reassembler.push(chunk({}, true, 'stop'));

    expect(output).toEqual([
      { type: 'tool_call', call: { index: 0, name: 'first', arguments: {} } },
      { type: 'tool_call', call: { index: 1, name: 'second', arguments: { n: 2 } } },
      expect.objectContaining({ type: 'delta', done: true, doneReason: 'stop' }),
    ]);
    expect(reassembler.pending).toBe(0);
  });

  it('should report unparseable arguments per call and keep going', () => {
    const reassembler = new ToolCallReassembler();

    const output = reassembler.push(
      chunk(calls({ index: 0, name: 'broken', arguments: '{"a":' }, { index: 1, name: 'fine', arguments: '{"b":true}' }), true)
    );

    expect(output.map((e) => e.type)).toEqual(['tool_call_error', 'tool_call', 'delta']);
    const [failure, success] = output;
    if (failure?.type !== 'tool_call_error') throw new Error('expected a tool_call_error event');
    expect(failure.index).toBe(0);
    expect(failure.error).toBeInstanceOf(ToolCallParseError);
    expect(failure.error.rawArguments).toBe('{"a":');
    expect(failure.error.message).toMatch(/^Tool call 0 \(broken\) has invalid JSON arguments: /);
    expect(success).toEqual({ type: 'tool_call', call: { index: 1, name: 'fine', arguments: { b: true } } });
  });

  it('should reject arguments that are valid JSON but not an object', () => {
    const output = new ToolCallReassembler().push(chunk(calls({ name: 'list', arguments: '[1,2]' }), true));

    const [failure] = output;
    if (failure?.type !== 'tool_call_error') throw new Error('expected a tool_call_error event');
    expect(failure.error.message).toBe('Tool call 0 (list) arguments are not a JSON object');
  });

  it('should report a call that never received a name', () => {
    const output = new ToolCallReassembler().push(chunk(calls({ arguments: '{}' }), true));

    const [failure] = output;
    if (failure?.type !== 'tool_call_error') throw new Error('expected a tool_call_error event');
    expect(failure.error.message).toBe('Tool call 0 has no function name');
    expect(failure.error.rawArguments).toBe('{}');
  });

  it('should keep the last name on conflict and record the earlier one', () => {
    const logger = createMockLogger();
    const reassembler = new ToolCallReassembler(logger);

    reassembler.push(chunk(calls({ index: 0, name: 'lookup', arguments: '{' })));
    reassembler.push(chunk(calls({ index: 0, name: 'lookup', arguments: '' })));
    reassembler.push(chunk(calls({ index: 0, name: 'search', arguments: '}' })));
    const [finalized] = reassembler.push(chunk({}, true));

    expect(finalized).toEqual({
      type: 'tool_call',
      call: { index: 0, name: 'search', arguments: {}, conflictingNames: ['lookup'] },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Conflicting tool call names', {
      index: 0,
      previous: 'lookup',
      name: 'search',
    });
  });

  it('should flush open calls when the stream ends without a done chunk', async () => {
    const output = await collect(
      reassembleToolCalls(events(chunk(calls({ name: 'ping', arguments: '{"host":"localhost"}' }))))
    );

    expect(output.map((e) => e.type)).toEqual(['delta', 'tool_call']);
    expect(output[1]).toEqual({
      type: 'tool_call',
      call: { index: 0, name: 'ping', arguments: { host: 'localhost' } },
    });
  });

  it('should pass content and thinking through as deltas', () => {
    const source = chunk({ content: 'Hello', thinking: 'greet the user' });

    const [delta] = new ToolCallReassembler().push(source);

    expect(delta).toEqual({
      type: 'delta',
      content: 'Hello',
      thinking: 'greet the user',
      done: false,
      chunk: source,
    });
  });
});

describe('fragmentsOf', () => {
  it('should use the array position when a fragment has no index', () => {
    const fragments = fragmentsOf({
      role: 'assistant',
      content: '',
      tool_calls: [
        { function: { name: 'a', arguments: '{' } },
        { function: { index: 5, arguments: { x: 1 } } },
      ],
    });

    expect(fragments).toEqual([
      { index: 0, functionName: 'a', argumentsText: '{' },
      { index: 5, argumentsObject: { x: 1 } },
    ]);
  });
});
