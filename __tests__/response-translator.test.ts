import { describe, it, expect } from 'vitest';
import { mapStopReason, parseToolArguments, translateResponse } from '../src/translate/response.js';
import { translateRequest } from '../src/translate/request.js';
import type { ChatCompletionResponse } from '../src/types.js';
import { messagesRequest } from './helpers.js';

const context = { requestedModel: 'claude-3-5-sonnet-20241022', inputTokenEstimate: 7 };

describe('translateResponse', () => {
  it('translates text and usage', () => {
    const out = translateResponse(
      {
        id: 'chatcmpl-abc',
        choices: [{ message: { role: 'assistant', content: 'Hello!' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      },
      context,
    );
    expect(out).toEqual({
      id: 'chatcmpl-abc',
      type: 'message',
      role: 'assistant',
      model: 'claude-3-5-sonnet-20241022',
      content: [{ type: 'text', text: 'Hello!' }],
      stop_reason: 'end_turn',
      stop_sequence: null,
      usage: { input_tokens: 12, output_tokens: 3 },
    });
  });

  it('maps length to max_tokens and estimates missing usage', () => {
    const out = translateResponse(
      { choices: [{ message: { content: 'abcdefghijkl' }, finish_reason: 'length' }] },
      context,
    );
    expect(out.stop_reason).toBe('max_tokens');
    // 12 chars / 4
    expect(out.usage).toEqual({ input_tokens: 7, output_tokens: 3 });
    expect(out.id).toMatch(/^msg_/);
  });

  it('turns tool calls into tool_use blocks with parsed input', () => {
    const out = translateResponse(
      {
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } },
                { id: 'call_2', type: 'function', function: { name: 'broken', arguments: '[1,2]' } },
              ],
            },
            finish_reason: 'tool_calls',
          },
        ],
      },
      context,
    );
    expect(out.stop_reason).toBe('tool_use');
    expect(out.content).toEqual([
      { type: 'tool_use', id: 'call_1', name: 'get_weather', input: { city: 'Paris' } },
      { type: 'tool_use', id: 'call_2', name: 'broken', input: {} },
    ]);
  });

  it('generates tool ids when upstream omits them', () => {
    const out = translateResponse(
      { choices: [{ message: { tool_calls: [{ function: { name: 'noop', arguments: '{}' } }] } }] },
      context,
    );
    const [block] = out.content;
    expect(block?.type).toBe('tool_use');
    if (block?.type === 'tool_use') expect(block.id).toMatch(/^toolu_/);
  });

  it('returns a single empty text block for an empty reply', () => {
    const out = translateResponse({ choices: [{ message: { content: '' }, finish_reason: 'stop' }] }, context);
    expect(out.content).toEqual([{ type: 'text', text: '' }]);
    expect(out.usage).toEqual({ input_tokens: 7, output_tokens: 0 });
  });

  it('reads text from content parts', () => {
    const out = translateResponse(
      { choices: [{ message: { content: [{ type: 'text', text: 'a' }, { type: 'text', text: 'b' }] } }] },
      context,
    );
    expect(out.content).toEqual([
      { type: 'text', text: 'a' },
      { type: 'text', text: 'b' },
    ]);
  });

  it('round-trips role, text and tool call name/arguments byte for byte', () => {
    const input = { query: 'weather in "Paris"', days: 3, nested: { ok: true } };
    const request = messagesRequest({
      messages: [
        { role: 'user', content: 'Plan my trip' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Let me look that up.' },
            { type: 'tool_use', id: 'toolu_a', name: 'search', input },
          ],
        },
      ],
    });
    const upstreamRequest = translateRequest(request, 'gpt-4o', { tokens: { min: 1, max: 4096 } });
    const assistant = upstreamRequest.messages[1];
    if (assistant?.role !== 'assistant') throw new Error('expected an assistant message');
    const call = assistant.tool_calls?.[0];
    if (!call) throw new Error('expected a tool call');

    const upstream: ChatCompletionResponse = {
      choices: [
        {
          message: { role: assistant.role, content: assistant.content, tool_calls: [call] },
          finish_reason: 'tool_calls',
        },
      ],
    };
    const out = translateResponse(upstream, context);

    expect(out.role).toBe('assistant');
    expect(out.content).toEqual([
      { type: 'text', text: 'Let me look that up.' },
      { type: 'tool_use', id: 'toolu_a', name: 'search', input },
    ]);
    const block = out.content[1];
    if (block?.type !== 'tool_use') throw new Error('expected a tool_use block');
    expect(JSON.stringify(block.input)).toBe(call.function.arguments);
  });
});

describe('mapStopReason', () => {
  it('maps every known finish reason', () => {
    expect(mapStopReason('stop')).toBe('end_turn');
    expect(mapStopReason('length')).toBe('max_tokens');
    expect(mapStopReason('tool_calls')).toBe('tool_use');
    expect(mapStopReason('function_call')).toBe('tool_use');
    expect(mapStopReason('content_filter')).toBe('stop_sequence');
  });

  it('falls back to end_turn', () => {
    expect(mapStopReason('something_new')).toBe('end_turn');
    expect(mapStopReason(null)).toBe('end_turn');
    expect(mapStopReason(undefined)).toBe('end_turn');
  });
});

describe('parseToolArguments', () => {
  it('accepts JSON objects only', () => {
    expect(parseToolArguments('{"a":1}')).toEqual({ a: 1 });
    expect(parseToolArguments('"text"')).toEqual({});
    expect(parseToolArguments('null')).toEqual({});
    expect(parseToolArguments('{"a":')).toEqual({});
    expect(parseToolArguments(undefined)).toEqual({});
  });
});
