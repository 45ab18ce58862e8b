/**
 * Dispatcher
 *
 * Runs one inbound call end to end: pick a (credential, model) pair, build
 * the upstream request, call the upstream, and translate either the
 * result or the failure back into the caller's format. The same channel
 * carries both: a result union for unary calls, the event stream for
 * streaming ones.
 *
 * No retries happen here; a retry is a fresh dispatch.
 *
 * @packageDocumentation
 */

import { ClientDisconnectedError, classifyError, type ErrorEnvelope } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import { DEFAULT_PASSTHROUGH_PREFIXES, resolveTargetModel } from './model-resolver.js';
import type { Credential, CredentialModelRotator } from './rotator.js';
import type { StatsCollector } from './stats.js';
import { estimateTokens } from './token-estimate.js';
import { translateRequest, type TokenBounds } from './translate/request.js';
import { translateResponse } from './translate/response.js';
import { StreamTranslator, translateStream, type StreamState } from './translate/stream.js';
import type { MessagesRequest, MessagesResponse, StreamEvent } from './types.js';
import type { UpstreamClient } from './upstream-client.js';

export interface DispatchContext {
  /** Whether the caller is still there. Checked before dispatch and, when streaming, at every chunk. */
  isConnected: () => boolean;
  /** Aborted when the caller disconnects. Only streaming calls observe it mid-flight. */
  signal?: AbortSignal;
  /** Id for the upstream request handle; generated when absent. */
  requestId?: string;
  /** Receives the classified failure before a streaming call emits its error event. */
  onFailure?: (error: ErrorEnvelope) => void;
}

export type DispatchResult =
  | { ok: true; response: MessagesResponse; model: string }
  | { ok: false; error: ErrorEnvelope; model: string };

export interface DispatcherOptions {
  rotator: CredentialModelRotator;
  client: UpstreamClient;
  tokens: TokenBounds;
  includeStreamUsage?: boolean;
  passthroughPrefixes?: readonly string[];
  logger?: Logger;
  stats?: StatsCollector;
}

interface Route {
  credential: Credential;
  model: string;
}

export class Dispatcher {
  private readonly rotator: CredentialModelRotator;
  private readonly client: UpstreamClient;
  private readonly tokens: TokenBounds;
  private readonly includeStreamUsage: boolean;
  private readonly passthroughPrefixes: readonly string[];
  private readonly logger: Logger;
  private readonly stats: StatsCollector | null;

  constructor(options: DispatcherOptions) {
    this.rotator = options.rotator;
    this.client = options.client;
    this.tokens = options.tokens;
    this.includeStreamUsage = options.includeStreamUsage ?? true;
    this.passthroughPrefixes = options.passthroughPrefixes ?? DEFAULT_PASSTHROUGH_PREFIXES;
    this.logger = options.logger ?? silentLogger;
    this.stats = options.stats ?? null;
  }

  /**
   * Unary call. The caller-disconnect check happens once, before a
   * rotation slot is consumed; the upstream call itself is not interruptible.
   *
   * @throws ClientDisconnectedError when the caller is already gone
   */
  async complete(request: MessagesRequest, ctx: DispatchContext): Promise<DispatchResult> {
    if (!ctx.isConnected()) throw new ClientDisconnectedError();

    const started = Date.now();
    const route = this.route(request.model);
    const upstreamRequest = translateRequest({ ...request, stream: false }, route.model, {
      tokens: this.tokens,
      includeStreamUsage: this.includeStreamUsage,
    });
    const handle = this.client.open(ctx.requestId);

    try {
      const upstream = await this.client.createChatCompletion(upstreamRequest, route.credential, handle);
      const response = translateResponse(upstream, {
        requestedModel: request.model,
        inputTokenEstimate: estimateTokens(request),
      });
      this.finish(request.model, route, started, false, 'done');
      return { ok: true, response, model: route.model };
    } catch (err) {
      const error = classifyError(err, { secrets: this.rotator.secrets() });
      this.finish(request.model, route, started, false, 'errored', error);
      return { ok: false, error, model: route.model };
    } finally {
      handle.release();
    }
  }

  /**
   * Streaming call. Yields caller-format events in protocol order. Upstream
   * failures surface as a single `error` event. Cancellation (abort signal,
   * a failed connectivity probe, or the consumer abandoning iteration)
   * aborts the upstream call and ends the stream without further events.
   */
  async *stream(request: MessagesRequest, ctx: DispatchContext): AsyncGenerator<StreamEvent, void, unknown> {
    if (ctx.signal?.aborted || !ctx.isConnected()) {
      this.logger.debug('Caller gone before dispatch; stream not started');
      return;
    }

    const started = Date.now();
    const route = this.route(request.model);
    const upstreamRequest = translateRequest({ ...request, stream: true }, route.model, {
      tokens: this.tokens,
      includeStreamUsage: this.includeStreamUsage,
    });
    const handle = this.client.open(ctx.requestId);
    const onAbort = () => handle.cancel();
    ctx.signal?.addEventListener('abort', onAbort, { once: true });

    const translator = new StreamTranslator({
      requestedModel: request.model,
      inputTokenEstimate: estimateTokens(request),
      logger: this.logger,
    });
    let failure: ErrorEnvelope | undefined;

    try {
      yield* translateStream(this.client.streamChatCompletion(upstreamRequest, route.credential, handle), translator, {
        isCancelled: () => handle.cancelled || ctx.signal?.aborted === true || !ctx.isConnected(),
        onCancel: () => handle.cancel(),
        classify: (err) => {
          failure = classifyError(err, { secrets: this.rotator.secrets() });
          ctx.onFailure?.(failure);
          return failure;
        },
      });
    } finally {
      ctx.signal?.removeEventListener('abort', onAbort);
      handle.release();
      this.finish(request.model, route, started, true, translator.currentState, failure);
    }
  }

  private route(requestedModel: string): Route {
    const selection = this.rotator.select();
    return {
      credential: selection.credential,
      model: resolveTargetModel(requestedModel, selection.model, this.passthroughPrefixes),
    };
  }

  private finish(
    requestedModel: string,
    route: Route,
    started: number,
    streamed: boolean,
    state: StreamState,
    failure?: ErrorEnvelope,
  ): void {
    const latencyMs = Date.now() - started;
    const success = state === 'done';
    const cancelled = !success && state !== 'errored';
    const mark = success ? '✓' : cancelled ? '⊘' : '✗';
    const suffix = failure ? ` [${failure.category}]` : cancelled ? ' [cancelled]' : '';
    const line = `${mark} ${requestedModel} → ${route.model} (key #${route.credential.index + 1}${streamed ? ', stream' : ''}) ${latencyMs}ms${suffix}`;
    if (success || cancelled) {
      this.logger.info(line);
    } else {
      this.logger.warn(line);
    }

    this.stats?.recordDispatch({
      timestamp: Date.now(),
      latencyMs,
      model: route.model,
      credentialIndex: route.credential.index,
      streamed,
      success,
      ...(failure ? { errorCategory: failure.category } : {}),
      ...(cancelled ? { cancelled: true } : {}),
    });
  }
}
