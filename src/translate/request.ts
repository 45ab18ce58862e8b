/**
 * Messages API request → Chat-Completions request.
 *
 * Pure and total: constructs with no Chat-Completions counterpart are
 * dropped rather than rejected.
 *
 * @packageDocumentation
 */

import type {
  ChatCompletionRequest,
  ChatContentPart,
  ChatMessage,
  ChatTool,
  ChatToolCall,
  ChatToolChoice,
  ContentBlock,
  ImageBlock,
  MessageParam,
  MessagesRequest,
  TextBlock,
  ToolChoice,
  ToolDefinition,
  ToolResultBlock,
} from '../types.js';

type AssistantMessage = Extract<ChatMessage, { role: 'assistant' }>;

export interface TokenBounds {
  min: number;
  max: number;
}

export interface RequestTranslationOptions {
  tokens: TokenBounds;
  /** Ask streaming upstreams to append a usage chunk. */
  includeStreamUsage?: boolean;
}

export function clampMaxTokens(requested: number, bounds: TokenBounds): number {
  return Math.min(bounds.max, Math.max(bounds.min, requested));
}

function systemText(system: string | TextBlock[] | undefined): string {
  if (system === undefined) return '';
  if (typeof system === 'string') return system;
  return system.map((b) => b.text).join('\n');
}

function imageUrl(block: ImageBlock): string {
  const source = block.source;
  switch (source.type) {
    case 'base64':
      return `data:${source.media_type};base64,${source.data}`;
    case 'url':
      return source.url;
  }
}

function toolResultText(block: ToolResultBlock): string {
  if (block.content === undefined) return '';
  if (typeof block.content === 'string') return block.content;
  return block.content
    .filter((part): part is TextBlock => part.type === 'text')
    .map((part) => part.text)
    .join('\n');
}

function toolCall(block: Extract<ContentBlock, { type: 'tool_use' }>): ChatToolCall {
  return {
    id: block.id,
    type: 'function',
    function: { name: block.name, arguments: JSON.stringify(block.input) },
  };
}

/**
 * Build the upstream message for the non-tool-result blocks of one
 * message, preserving its role. Returns null when nothing is left.
 */
function contentMessage(role: MessageParam['role'], blocks: ContentBlock[]): ChatMessage | null {
  const texts: string[] = [];
  const parts: ChatContentPart[] = [];
  const calls: ChatToolCall[] = [];
  let hasImage = false;

  for (const block of blocks) {
    switch (block.type) {
      case 'text':
        texts.push(block.text);
        parts.push({ type: 'text', text: block.text });
        break;
      case 'image':
        hasImage = true;
        parts.push({ type: 'image_url', image_url: { url: imageUrl(block) } });
        break;
      case 'tool_use':
        calls.push(toolCall(block));
        break;
      case 'tool_result':
        // split out by the caller
        break;
    }
  }

  switch (role) {
    case 'assistant': {
      if (texts.length === 0 && calls.length === 0) return null;
      const message: AssistantMessage = { role: 'assistant', content: texts.length ? texts.join('') : null };
      if (calls.length) message.tool_calls = calls;
      return message;
    }
    case 'system':
      return texts.length ? { role: 'system', content: texts.join('\n') } : null;
    case 'user':
      if (hasImage) return { role: 'user', content: parts };
      return texts.length ? { role: 'user', content: texts.join('') } : null;
  }
}

/**
 * Translate one message. Tool results become `tool` messages ahead of
 * whatever else the message carries.
 */
export function translateMessage(message: MessageParam): ChatMessage[] {
  if (typeof message.content === 'string') {
    switch (message.role) {
      case 'assistant':
        return [{ role: 'assistant', content: message.content }];
      case 'system':
        return [{ role: 'system', content: message.content }];
      case 'user':
        return [{ role: 'user', content: message.content }];
    }
  }

  const out: ChatMessage[] = [];
  const rest: ContentBlock[] = [];
  for (const block of message.content) {
    if (block.type === 'tool_result') {
      out.push({ role: 'tool', content: toolResultText(block), tool_call_id: block.tool_use_id });
    } else {
      rest.push(block);
    }
  }
  const remaining = contentMessage(message.role, rest);
  if (remaining) out.push(remaining);
  return out;
}

export function translateTools(tools: ToolDefinition[]): ChatTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      ...(tool.description !== undefined ? { description: tool.description } : {}),
      parameters: tool.input_schema,
    },
  }));
}

export function translateToolChoice(choice: ToolChoice): ChatToolChoice {
  switch (choice.type) {
    case 'auto':
      return 'auto';
    case 'any':
      return 'required';
    case 'none':
      return 'none';
    case 'tool':
      return { type: 'function', function: { name: choice.name } };
  }
}

/**
 * Translate a validated Messages API request for `targetModel`.
 */
export function translateRequest(
  request: MessagesRequest,
  targetModel: string,
  options: RequestTranslationOptions,
): ChatCompletionRequest {
  const messages: ChatMessage[] = [];

  const system = systemText(request.system);
  if (system) messages.push({ role: 'system', content: system });

  for (const message of request.messages) {
    messages.push(...translateMessage(message));
  }

  const stream = request.stream ?? false;
  const out: ChatCompletionRequest = {
    model: targetModel,
    messages,
    max_tokens: clampMaxTokens(request.max_tokens, options.tokens),
    stream,
  };

  if (request.temperature !== undefined) out.temperature = request.temperature;
  if (request.top_p !== undefined) out.top_p = request.top_p;
  if (request.stop_sequences && request.stop_sequences.length > 0) out.stop = request.stop_sequences;
  if (request.tools && request.tools.length > 0) out.tools = translateTools(request.tools);
  if (request.tool_choice) out.tool_choice = translateToolChoice(request.tool_choice);
  if (stream && (options.includeStreamUsage ?? true)) out.stream_options = { include_usage: true };

  return out;
}
