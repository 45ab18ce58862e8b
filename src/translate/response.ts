/**
 * Chat-Completions response → Messages API response (non-streaming).
 *
 * @packageDocumentation
 */

import { nanoid } from 'nanoid';
import { estimateTextTokens } from '../token-estimate.js';
import type {
  ChatCompletionResponse,
  ChatUsage,
  MessagesResponse,
  ResponseContentBlock,
  StopReason,
  Usage,
} from '../types.js';

/**
 * Map an upstream finish reason onto a Messages API stop reason.
 */
export function mapStopReason(finishReason: string | null | undefined): StopReason {
  switch (finishReason) {
    case 'stop':
      return 'end_turn';
    case 'length':
      return 'max_tokens';
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'content_filter':
      return 'stop_sequence';
    default:
      return 'end_turn';
  }
}

export function newMessageId(): string {
  return `msg_${nanoid(24)}`;
}

export function newToolUseId(): string {
  return `toolu_${nanoid(24)}`;
}

/**
 * Parse complete tool-call arguments. Anything that is not a JSON object
 * yields an empty input.
 */
export function parseToolArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  } catch {
    return {};
  }
}

/**
 * Resolve final usage: upstream counts win, estimates fill the gaps.
 */
export function resolveUsage(
  upstream: ChatUsage | null | undefined,
  estimates: { inputTokens: number; outputTokens: number },
): Usage {
  return {
    input_tokens: upstream?.prompt_tokens ?? estimates.inputTokens,
    output_tokens: upstream?.completion_tokens ?? estimates.outputTokens,
  };
}

export interface ResponseTranslationContext {
  /** Model name the caller asked for; echoed back. */
  requestedModel: string;
  /** Estimated input tokens, used when the upstream reports no usage. */
  inputTokenEstimate: number;
}

/**
 * Translate a complete upstream response in one pass.
 */
export function translateResponse(
  response: ChatCompletionResponse,
  context: ResponseTranslationContext,
): MessagesResponse {
  const choice = response.choices[0];
  const content: ResponseContentBlock[] = [];
  let outputChars = '';

  const messageContent = choice?.message.content;
  if (typeof messageContent === 'string') {
    if (messageContent) {
      content.push({ type: 'text', text: messageContent });
      outputChars += messageContent;
    }
  } else if (Array.isArray(messageContent)) {
    for (const part of messageContent) {
      if (part.type === 'text' && part.text) {
        content.push({ type: 'text', text: part.text });
        outputChars += part.text;
      }
    }
  }

  for (const call of choice?.message.tool_calls ?? []) {
    const args = call.function.arguments ?? '';
    content.push({
      type: 'tool_use',
      id: call.id || newToolUseId(),
      name: call.function.name ?? '',
      input: parseToolArguments(args),
    });
    outputChars += args;
  }

  if (content.length === 0) {
    content.push({ type: 'text', text: '' });
  }

  return {
    id: response.id || newMessageId(),
    type: 'message',
    role: 'assistant',
    model: context.requestedModel,
    content,
    stop_reason: mapStopReason(choice?.finish_reason),
    stop_sequence: null,
    usage: resolveUsage(response.usage, {
      inputTokens: context.inputTokenEstimate,
      outputTokens: estimateTextTokens(outputChars),
    }),
  };
}
