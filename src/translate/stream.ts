/**
 * Streaming translation: Chat-Completions chunks → Messages API events.
 *
 * The caller protocol needs a strict sequence:
 *
 *   message_start, ping,
 *   (content_block_start, content_block_delta*, content_block_stop)*,
 *   message_delta, message_stop
 *
 * Upstream deltas arrive as loose fragments (role, text, tool-call pieces,
 * finish reason, usage). {@link StreamTranslator} tracks which block is
 * open and emits the events each delta implies, one block at a time.
 *
 * States: idle → message_started ⇄ block_open → stopping → done.
 * `cancelled` and `errored` are terminal and reachable from any
 * non-terminal state.
 *
 * @packageDocumentation
 */

import { callerErrorType, type ErrorEnvelope } from '../errors.js';
import { type Logger, silentLogger } from '../logger.js';
import { charsToTokens } from '../token-estimate.js';
import type { ChatCompletionChunk, StopReason, StreamEvent, UpstreamDelta } from '../types.js';
import { chunkToDeltas } from './chunk.js';
import { mapStopReason, newMessageId, newToolUseId } from './response.js';

export type StreamState = 'idle' | 'message_started' | 'block_open' | 'stopping' | 'done' | 'cancelled' | 'errored';

type OpenBlock = { kind: 'text'; index: number } | { kind: 'tool_use'; index: number; callIndex: number };

export interface StreamTranslatorOptions {
  /** Model name the caller asked for; reported in message_start. */
  requestedModel: string;
  /** Fallback input token count when the upstream reports none. */
  inputTokenEstimate: number;
  messageId?: string;
  logger?: Logger;
}

export class StreamTranslator {
  readonly messageId: string;
  private readonly requestedModel: string;
  private readonly inputTokenEstimate: number;
  private readonly logger: Logger;

  private state: StreamState = 'idle';
  private nextBlockIndex = 0;
  private open: OpenBlock | null = null;
  private readonly seenCalls = new Set<number>();
  private stopReason: StopReason | null = null;
  private promptTokens: number | undefined;
  private completionTokens: number | undefined;
  private outputChars = 0;
  private lateFragments = 0;

  constructor(options: StreamTranslatorOptions) {
    this.messageId = options.messageId ?? newMessageId();
    this.requestedModel = options.requestedModel;
    this.inputTokenEstimate = options.inputTokenEstimate;
    this.logger = options.logger ?? silentLogger;
  }

  get currentState(): StreamState {
    return this.state;
  }

  get isTerminal(): boolean {
    return this.state === 'done' || this.state === 'cancelled' || this.state === 'errored';
  }

  get hasStarted(): boolean {
    return this.state !== 'idle';
  }

  /** Tool-call fragments dropped because their block had already closed. */
  get droppedFragments(): number {
    return this.lateFragments;
  }

  /**
   * Feed one upstream delta; returns the events it produces.
   */
  push(delta: UpstreamDelta): StreamEvent[] {
    if (this.isTerminal) return [];

    // after the finish reason only usage still matters
    if (this.state === 'stopping') {
      if (delta.kind === 'usage') this.recordUsage(delta);
      return [];
    }

    switch (delta.kind) {
      case 'role':
        return this.ensureStarted();

      case 'text': {
        if (!delta.text) return [];
        const events = this.ensureStarted();
        let open = this.open;
        if (open?.kind !== 'text') {
          events.push(...this.closeOpenBlock());
          open = { kind: 'text', index: this.nextBlockIndex++ };
          this.open = open;
          this.state = 'block_open';
          events.push({ type: 'content_block_start', index: open.index, content_block: { type: 'text', text: '' } });
        }
        events.push({
          type: 'content_block_delta',
          index: open.index,
          delta: { type: 'text_delta', text: delta.text },
        });
        this.outputChars += delta.text.length;
        return events;
      }

      case 'tool_call': {
        const events = this.ensureStarted();
        let open = this.open;
        if (!this.seenCalls.has(delta.index)) {
          this.seenCalls.add(delta.index);
          events.push(...this.closeOpenBlock());
          const index = this.nextBlockIndex++;
          open = { kind: 'tool_use', index, callIndex: delta.index };
          this.open = open;
          this.state = 'block_open';
          events.push({
            type: 'content_block_start',
            index,
            content_block: { type: 'tool_use', id: delta.id ?? newToolUseId(), name: delta.name ?? '', input: {} },
          });
        } else if (open?.kind !== 'tool_use' || open.callIndex !== delta.index) {
          // the block for this call is closed; its arguments can no longer be extended
          this.lateFragments += 1;
          this.logger.debug(
            `${this.messageId}: dropped fragment for closed tool call ${delta.index} (${delta.arguments?.length ?? 0} argument chars)`,
          );
          return events;
        }
        if (delta.arguments) {
          events.push({
            type: 'content_block_delta',
            index: open.index,
            delta: { type: 'input_json_delta', partial_json: delta.arguments },
          });
          this.outputChars += delta.arguments.length;
        }
        return events;
      }

      case 'usage':
        this.recordUsage(delta);
        return [];

      case 'finish': {
        const events = this.ensureStarted();
        events.push(...this.closeOpenBlock());
        this.stopReason = mapStopReason(delta.reason);
        this.state = 'stopping';
        return events;
      }

      default:
        return [];
    }
  }

  /**
   * Feed a raw chunk; shorthand for normalizing and pushing each delta.
   */
  pushChunk(chunk: ChatCompletionChunk): StreamEvent[] {
    return chunkToDeltas(chunk).flatMap((delta) => this.push(delta));
  }

  /**
   * The upstream stream ended. Closes anything open, synthesizes a `stop`
   * finish when none arrived, and emits message_delta + message_stop.
   */
  finish(): StreamEvent[] {
    if (this.isTerminal) return [];
    const events = this.ensureStarted();
    events.push(...this.closeOpenBlock());
    const stopReason = this.stopReason ?? mapStopReason('stop');
    events.push({
      type: 'message_delta',
      delta: { stop_reason: stopReason, stop_sequence: null },
      usage: {
        input_tokens: this.promptTokens ?? this.inputTokenEstimate,
        output_tokens: this.completionTokens ?? charsToTokens(this.outputChars),
      },
    });
    events.push({ type: 'message_stop' });
    this.state = 'done';
    return events;
  }

  /**
   * The upstream failed. Emits a single error event and ends the stream,
   * whether or not message_start went out.
   */
  fail(envelope: ErrorEnvelope): StreamEvent[] {
    if (this.isTerminal) return [];
    this.state = 'errored';
    return [{ type: 'error', error: { type: callerErrorType(envelope.category), message: envelope.message } }];
  }

  /** Stop without emitting anything further. */
  cancel(): void {
    if (!this.isTerminal) this.state = 'cancelled';
  }

  private ensureStarted(): StreamEvent[] {
    if (this.state !== 'idle') return [];
    this.state = 'message_started';
    return [
      {
        type: 'message_start',
        message: {
          id: this.messageId,
          type: 'message',
          role: 'assistant',
          model: this.requestedModel,
          content: [],
          stop_reason: null,
          stop_sequence: null,
          usage: { input_tokens: 0, output_tokens: 0 },
        },
      },
      { type: 'ping' },
    ];
  }

  private closeOpenBlock(): StreamEvent[] {
    if (!this.open) return [];
    const index = this.open.index;
    this.open = null;
    this.state = 'message_started';
    return [{ type: 'content_block_stop', index }];
  }

  private recordUsage(delta: Extract<UpstreamDelta, { kind: 'usage' }>): void {
    if (delta.promptTokens !== undefined) this.promptTokens = delta.promptTokens;
    if (delta.completionTokens !== undefined) this.completionTokens = delta.completionTokens;
  }
}

export interface TranslateStreamOptions {
  /** Polled before every chunk and every emitted event. */
  isCancelled: () => boolean;
  /** Called once when the stream is abandoned mid-flight. */
  onCancel: () => void;
  /** Turns an upstream failure into an envelope for the error event. */
  classify: (error: unknown) => ErrorEnvelope;
}

/**
 * Drive a {@link StreamTranslator} over an upstream chunk source.
 *
 * On cancellation the generator returns without further events; on an
 * upstream failure it yields one error event and returns. If the consumer
 * stops iterating early, `onCancel` runs from the finally block.
 */
export async function* translateStream(
  chunks: AsyncIterable<ChatCompletionChunk>,
  translator: StreamTranslator,
  options: TranslateStreamOptions,
): AsyncGenerator<StreamEvent, void, unknown> {
  const abandon = () => {
    if (translator.isTerminal) return;
    translator.cancel();
    options.onCancel();
  };

  try {
    for await (const chunk of chunks) {
      if (options.isCancelled()) return abandon();
      for (const event of translator.pushChunk(chunk)) {
        if (options.isCancelled()) return abandon();
        yield event;
      }
    }
    for (const event of translator.finish()) {
      if (options.isCancelled()) return abandon();
      yield event;
    }
  } catch (err) {
    if (options.isCancelled()) return abandon();
    yield* translator.fail(options.classify(err));
  } finally {
    abandon();
  }
}
