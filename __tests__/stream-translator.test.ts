import { describe, it, expect, vi } from 'vitest';
import { StreamTranslator, translateStream } from '../src/translate/stream.js';
import { chunkToDeltas } from '../src/translate/chunk.js';
import { UpstreamHttpError, classifyError } from '../src/errors.js';
import type { ChatCompletionChunk, StreamEvent } from '../src/types.js';
import { chunk, collect, fromArray, usageChunk } from './helpers.js';

function translator(): StreamTranslator {
  return new StreamTranslator({ requestedModel: 'claude-3-haiku', inputTokenEstimate: 9, messageId: 'msg_test' });
}

function run(chunks: ChatCompletionChunk[]): StreamEvent[] {
  const t = translator();
  return [...chunks.flatMap((c) => t.pushChunk(c)), ...t.finish()];
}

const start: StreamEvent[] = [
  {
    type: 'message_start',
    message: {
      id: 'msg_test',
      type: 'message',
      role: 'assistant',
      model: 'claude-3-haiku',
      content: [],
      stop_reason: null,
      stop_sequence: null,
      usage: { input_tokens: 0, output_tokens: 0 },
    },
  },
  { type: 'ping' },
];

async function* failAfter(chunks: ChatCompletionChunk[], error: unknown): AsyncGenerator<ChatCompletionChunk> {
  yield* chunks;
  throw error;
}

/** Checks the protocol ordering rules over a complete event list. */
function assertWellFormed(events: StreamEvent[]): void {
  expect(events[0]?.type).toBe('message_start');
  expect(events.filter((e) => e.type === 'message_start')).toHaveLength(1);
  expect(events[events.length - 1]?.type).toBe('message_stop');
  expect(events.filter((e) => e.type === 'message_stop')).toHaveLength(1);

  const started = new Set<number>();
  const stopped = new Set<number>();
  for (const e of events) {
    if (e.type === 'content_block_start') {
      expect(started.has(e.index)).toBe(false);
      started.add(e.index);
    } else if (e.type === 'content_block_delta') {
      expect(started.has(e.index)).toBe(true);
      expect(stopped.has(e.index)).toBe(false);
    } else if (e.type === 'content_block_stop') {
      expect(started.has(e.index)).toBe(true);
      expect(stopped.has(e.index)).toBe(false);
      stopped.add(e.index);
    }
  }
  expect([...stopped].sort()).toEqual([...started].sort());
}

describe('StreamTranslator', () => {
  it('emits a text message in protocol order with reported usage', () => {
    const events = run([
      chunk({ role: 'assistant', content: '' }),
      chunk({ content: 'Hel' }),
      chunk({ content: 'lo' }),
      chunk({}, 'stop'),
      usageChunk(11, 2),
    ]);
    expect(events).toEqual([
      ...start,
      { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hel' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'lo' } },
      { type: 'content_block_stop', index: 0 },
      {
        type: 'message_delta',
        delta: { stop_reason: 'end_turn', stop_sequence: null },
        usage: { input_tokens: 11, output_tokens: 2 },
      },
      { type: 'message_stop' },
    ]);
  });

  it('maps length to max_tokens with estimated usage when none is reported', () => {
    const events = run([chunk({ role: 'assistant' }), chunk({ content: 'abcdefgh' }), chunk({}, 'length')]);
    const delta = events.find((e) => e.type === 'message_delta');
    expect(delta).toEqual({
      type: 'message_delta',
      delta: { stop_reason: 'max_tokens', stop_sequence: null },
      usage: { input_tokens: 9, output_tokens: 2 },
    });
  });

  it('reassembles tool-call argument fragments', () => {
    const events = run([
      chunk({
        role: 'assistant',
        tool_calls: [{ index: 0, id: 'call_1', type: 'function', function: { name: 'calc', arguments: '' } }],
      }),
      chunk({ tool_calls: [{ index: 0, function: { arguments: '{"a":' } }] }),
      chunk({ tool_calls: [{ index: 0, function: { arguments: '1}' } }] }),
      chunk({}, 'tool_calls'),
    ]);
    expect(events).toEqual([
      ...start,
      {
        type: 'content_block_start',
        index: 0,
        content_block: { type: 'tool_use', id: 'call_1', name: 'calc', input: {} },
      },
      { type: 'content_block_delta', index: 0, delta: { type: 'input_json_delta', partial_json: '{"a":' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'input_json_delta', partial_json: '1}' } },
      { type: 'content_block_stop', index: 0 },
      {
        type: 'message_delta',
        delta: { stop_reason: 'tool_use', stop_sequence: null },
        usage: { input_tokens: 9, output_tokens: 1 },
      },
      { type: 'message_stop' },
    ]);
    const json = events
      .map((e) => (e.type === 'content_block_delta' && e.delta.type === 'input_json_delta' ? e.delta.partial_json : ''))
      .join('');
    expect(json).toBe('{"a":1}');
  });

  it('closes the text block before a tool block and numbers blocks in order', () => {
    const events = run([
      chunk({ role: 'assistant', content: 'Let me check.' }),
      chunk({ tool_calls: [{ index: 0, id: 'call_a', function: { name: 'one', arguments: '{}' } }] }),
      chunk({ tool_calls: [{ index: 1, id: 'call_b', function: { name: 'two', arguments: '{"x":' } }] }),
      // late fragment for a call whose block is already closed
      chunk({ tool_calls: [{ index: 0, function: { arguments: '"late"' } }] }),
      chunk({ tool_calls: [{ index: 1, function: { arguments: '2}' } }] }),
      chunk({}, 'tool_calls'),
    ]);
    expect(events.slice(2, -2)).toEqual([
      { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Let me check.' } },
      { type: 'content_block_stop', index: 0 },
      { type: 'content_block_start', index: 1, content_block: { type: 'tool_use', id: 'call_a', name: 'one', input: {} } },
      { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{}' } },
      { type: 'content_block_stop', index: 1 },
      { type: 'content_block_start', index: 2, content_block: { type: 'tool_use', id: 'call_b', name: 'two', input: {} } },
      { type: 'content_block_delta', index: 2, delta: { type: 'input_json_delta', partial_json: '{"x":' } },
      { type: 'content_block_delta', index: 2, delta: { type: 'input_json_delta', partial_json: '2}' } },
      { type: 'content_block_stop', index: 2 },
    ]);
    assertWellFormed(events);
  });

  it('logs and counts fragments that arrive for a closed tool call', () => {
    const debug = vi.fn<(msg: string) => void>();
    const t = new StreamTranslator({
      requestedModel: 'claude-3-haiku',
      inputTokenEstimate: 9,
      messageId: 'msg_test',
      logger: { debug, info: () => {}, warn: () => {}, error: () => {} },
    });
    t.pushChunk(chunk({ tool_calls: [{ index: 0, id: 'call_a', function: { name: 'one', arguments: '{' } }] }));
    t.pushChunk(chunk({ content: 'aside' }));
    expect(t.pushChunk(chunk({ tool_calls: [{ index: 0, function: { arguments: '}' } }] }))).toEqual([]);

    expect(t.droppedFragments).toBe(1);
    expect(debug).toHaveBeenCalledWith('msg_test: dropped fragment for closed tool call 0 (1 argument chars)');
  });

  it('generates a tool id when the first fragment has none', () => {
    const t = translator();
    const events = t.pushChunk(chunk({ tool_calls: [{ index: 0, function: { name: 'noop' } }] }));
    const startEvent = events.find((e) => e.type === 'content_block_start');
    expect(startEvent?.type).toBe('content_block_start');
    if (startEvent?.type === 'content_block_start' && startEvent.content_block.type === 'tool_use') {
      expect(startEvent.content_block.id).toMatch(/^toolu_/);
    }
  });

  it('starts lazily when no role chunk arrives', () => {
    const events = run([chunk({ content: 'x' })]);
    expect(events.slice(0, 2)).toEqual(start);
    expect(events[events.length - 2]).toEqual({
      type: 'message_delta',
      delta: { stop_reason: 'end_turn', stop_sequence: null },
      usage: { input_tokens: 9, output_tokens: 1 },
    });
  });

  it('produces a complete empty message from an empty stream', () => {
    expect(run([])).toEqual([
      ...start,
      {
        type: 'message_delta',
        delta: { stop_reason: 'end_turn', stop_sequence: null },
        usage: { input_tokens: 9, output_tokens: 0 },
      },
      { type: 'message_stop' },
    ]);
  });

  it('ignores chunks that carry nothing', () => {
    const t = translator();
    expect(t.pushChunk({ choices: [] })).toEqual([]);
    expect(t.pushChunk(chunk({}))).toEqual([]);
    expect(t.currentState).toBe('idle');
  });

  it('drops content after the finish reason', () => {
    const t = translator();
    t.pushChunk(chunk({ content: 'a' }, 'stop'));
    expect(t.pushChunk(chunk({ content: 'b' }))).toEqual([]);
    expect(t.currentState).toBe('stopping');
  });

  it('emits nothing once terminal', () => {
    const t = translator();
    t.pushChunk(chunk({ content: 'a' }));
    t.cancel();
    expect(t.currentState).toBe('cancelled');
    expect(t.pushChunk(chunk({ content: 'b' }))).toEqual([]);
    expect(t.finish()).toEqual([]);
    expect(t.fail({ category: 'internal', message: 'x' })).toEqual([]);
  });

  it('keeps well-formed ordering over mixed interleavings', () => {
    // deterministic pseudo-random walk over text and tool fragments
    let seed = 42;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };
    for (let round = 0; round < 25; round++) {
      const chunks: ChatCompletionChunk[] = [chunk({ role: 'assistant' })];
      let callIndex = -1;
      const steps = 3 + Math.floor(next() * 10);
      for (let s = 0; s < steps; s++) {
        const r = next();
        if (r < 0.4) {
          chunks.push(chunk({ content: `t${s}` }));
        } else if (r < 0.6 || callIndex < 0) {
          callIndex += 1;
          chunks.push(chunk({ tool_calls: [{ index: callIndex, id: `call_${callIndex}`, function: { name: 'f', arguments: '{' } }] }));
        } else {
          chunks.push(chunk({ tool_calls: [{ index: callIndex, function: { arguments: '}' } }] }));
        }
      }
      chunks.push(chunk({}, next() < 0.5 ? 'stop' : 'tool_calls'));
      assertWellFormed(run(chunks));
    }
  });
});

describe('chunkToDeltas', () => {
  it('orders role, text, tool calls, usage, finish', () => {
    expect(
      chunkToDeltas({
        choices: [
          {
            delta: {
              role: 'assistant',
              content: 'hi',
              tool_calls: [{ function: { name: 'f', arguments: '{}' } }],
            },
            finish_reason: 'stop',
          },
        ],
        usage: { prompt_tokens: 1, completion_tokens: 2 },
      }),
    ).toEqual([
      { kind: 'role', role: 'assistant' },
      { kind: 'text', text: 'hi' },
      { kind: 'tool_call', index: 0, name: 'f', arguments: '{}' },
      { kind: 'usage', promptTokens: 1, completionTokens: 2 },
      { kind: 'finish', reason: 'stop' },
    ]);
  });
});

describe('translateStream', () => {
  const classify = (err: unknown) => classifyError(err, { secrets: ['test-secret'] });

  it('yields the translated events and finishes', async () => {
    const t = translator();
    const events = await collect(
      translateStream(fromArray([chunk({ role: 'assistant', content: 'ok' }, 'stop')]), t, {
        isCancelled: () => false,
        onCancel: () => {},
        classify,
      }),
    );
    expect(events.map((e) => e.type)).toEqual([
      'message_start',
      'ping',
      'content_block_start',
      'content_block_delta',
      'content_block_stop',
      'message_delta',
      'message_stop',
    ]);
    expect(t.currentState).toBe('done');
  });

  it('emits exactly one error event when the upstream fails before anything was sent', async () => {
    const onCancel = vi.fn();
    const events = await collect(
      translateStream(failAfter([], new UpstreamHttpError(429, '{"error":"rate limit"}')), translator(), {
        isCancelled: () => false,
        onCancel,
        classify,
      }),
    );
    expect(events).toEqual([
      { type: 'error', error: { type: 'rate_limit_error', message: 'Rate limited by upstream provider: rate limit' } },
    ]);
    expect(onCancel).not.toHaveBeenCalled();
  });

  it('ends with an error event and no message_stop when the upstream fails midway', async () => {
    const t = translator();
    const events = await collect(
      translateStream(failAfter([chunk({ content: 'partial' })], new Error('socket hang up')), t, {
        isCancelled: () => false,
        onCancel: () => {},
        classify,
      }),
    );
    expect(events.map((e) => e.type)).toEqual([
      'message_start',
      'ping',
      'content_block_start',
      'content_block_delta',
      'error',
    ]);
    expect(events[4]).toEqual({
      type: 'error',
      error: { type: 'api_error', message: 'Upstream service unavailable: socket hang up' },
    });
    expect(t.currentState).toBe('errored');
  });

  it('stops forwarding as soon as cancellation is observed', async () => {
    const t = translator();
    const onCancel = vi.fn();
    let cancelled = false;
    const seen: StreamEvent[] = [];
    const source = fromArray([
      chunk({ role: 'assistant', content: 'one' }),
      chunk({ content: 'two' }),
      chunk({ content: 'three' }, 'stop'),
    ]);
    for await (const event of translateStream(source, t, { isCancelled: () => cancelled, onCancel, classify })) {
      seen.push(event);
      if (event.type === 'content_block_delta') cancelled = true;
    }
    expect(seen.map((e) => e.type)).toEqual(['message_start', 'ping', 'content_block_start', 'content_block_delta']);
    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(t.currentState).toBe('cancelled');
  });

  it('treats an abandoned iterator as a cancellation', async () => {
    const t = translator();
    const onCancel = vi.fn();
    const iterator = translateStream(fromArray([chunk({ role: 'assistant', content: 'x' })]), t, {
      isCancelled: () => false,
      onCancel,
      classify,
    });
    expect((await iterator.next()).value).toEqual(start[0]);
    await iterator.return();
    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(t.currentState).toBe('cancelled');
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('swallows failures that arrive after cancellation', async () => {
    let cancelled = false;
    const source = (async function* () {
      yield chunk({ content: 'x' });
      cancelled = true;
      throw new Error('aborted');
    })();
    const events = await collect(
      translateStream(source, translator(), { isCancelled: () => cancelled, onCancel: () => {}, classify }),
    );
    expect(events.map((e) => e.type)).toEqual(['message_start', 'ping', 'content_block_start', 'content_block_delta']);
  });
});
