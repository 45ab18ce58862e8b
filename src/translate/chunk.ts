/**
 * Normalize raw Chat-Completions chunks into {@link UpstreamDelta}s.
 *
 * @packageDocumentation
 */

import type { ChatCompletionChunk, UpstreamDelta } from '../types.js';

type ToolCallDelta = Extract<UpstreamDelta, { kind: 'tool_call' }>;
type UsageDelta = Extract<UpstreamDelta, { kind: 'usage' }>;

/**
 * Break a chunk into the deltas it carries, in the order the state machine
 * should see them: role, text, tool calls, usage, finish. A chunk with
 * nothing recognizable yields an empty list.
 */
export function chunkToDeltas(chunk: ChatCompletionChunk): UpstreamDelta[] {
  const deltas: UpstreamDelta[] = [];
  const choice = chunk.choices[0];
  const delta = choice?.delta;

  if (delta?.role) deltas.push({ kind: 'role', role: delta.role });
  if (delta?.content) deltas.push({ kind: 'text', text: delta.content });

  for (const [position, call] of (delta?.tool_calls ?? []).entries()) {
    const out: ToolCallDelta = { kind: 'tool_call', index: call.index ?? position };
    if (call.id) out.id = call.id;
    if (call.function?.name) out.name = call.function.name;
    if (call.function?.arguments) out.arguments = call.function.arguments;
    deltas.push(out);
  }

  if (chunk.usage) {
    const usage: UsageDelta = { kind: 'usage' };
    if (chunk.usage.prompt_tokens !== undefined) usage.promptTokens = chunk.usage.prompt_tokens;
    if (chunk.usage.completion_tokens !== undefined) usage.completionTokens = chunk.usage.completion_tokens;
    deltas.push(usage);
  }

  if (choice?.finish_reason) deltas.push({ kind: 'finish', reason: choice.finish_reason });

  return deltas;
}
