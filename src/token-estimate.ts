/**
 * Approximate token counting.
 *
 * Counts characters and divides by four. This is not a tokenizer and the
 * numbers are estimates only; they stand in wherever the upstream does not
 * report usage.
 *
 * @packageDocumentation
 */

import type { ContentBlock, MessageParam, TextBlock } from './types.js';

const CHARS_PER_TOKEN = 4;

/** Estimated token count for a character total: 0 when empty, else at least 1. */
export function charsToTokens(chars: number): number {
  if (chars <= 0) return 0;
  return Math.max(1, Math.floor(chars / CHARS_PER_TOKEN));
}

export function estimateTextTokens(text: string): number {
  return charsToTokens(text.length);
}

function blockChars(block: ContentBlock): number {
  switch (block.type) {
    case 'text':
      return block.text.length;
    case 'tool_use':
      return JSON.stringify(block.input).length;
    case 'tool_result':
      if (block.content === undefined) return 0;
      if (typeof block.content === 'string') return block.content.length;
      return block.content.reduce((n, part) => n + (part.type === 'text' ? part.text.length : 0), 0);
    case 'image':
      return 0;
  }
}

function messageChars(message: MessageParam): number {
  if (typeof message.content === 'string') return message.content.length;
  return message.content.reduce((n, block) => n + blockChars(block), 0);
}

function systemChars(system: string | TextBlock[] | undefined): number {
  if (system === undefined) return 0;
  if (typeof system === 'string') return system.length;
  return system.reduce((n, block) => n + block.text.length, 0);
}

export interface EstimateInput {
  system?: string | TextBlock[];
  messages: MessageParam[];
}

/**
 * Estimate input tokens for a request. Tool declarations are not counted.
 */
export function estimateTokens(request: EstimateInput): number {
  const chars = systemChars(request.system) + request.messages.reduce((n, m) => n + messageChars(m), 0);
  return charsToTokens(chars);
}
