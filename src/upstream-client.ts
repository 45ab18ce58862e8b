/**
 * Chat-Completions HTTP client.
 *
 * Each call runs under a {@link RequestHandle}: an abort controller, an
 * idle deadline re-armed on every received chunk, and an entry in the
 * client's registry of in-flight calls. Cancelling a handle aborts the
 * fetch immediately and never waits on further I/O.
 *
 * @packageDocumentation
 */

import { nanoid } from 'nanoid';
import { MalformedResponseError, UpstreamHttpError, UpstreamPayloadError, UpstreamTimeoutError, isRecord } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import type { Credential } from './rotator.js';
import { DONE_MARKER, readSseData } from './translate/sse.js';
import {
  ChatCompletionChunkSchema,
  ChatCompletionResponseSchema,
  type ChatCompletionChunk,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
} from './types.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface UpstreamClientOptions {
  /** Base URL up to and including the version segment, e.g. `https://api.openai.com/v1`. */
  baseUrl: string;
  /** Idle deadline in ms: max wait for headers or for the next chunk. */
  timeoutMs: number;
  logger?: Logger;
  fetch?: FetchFn;
}

export class RequestHandle {
  readonly id: string;
  private readonly controller = new AbortController();
  private readonly timeoutMs: number;
  private readonly onRelease: (handle: RequestHandle) => void;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private _cancelled = false;
  private _timedOut = false;
  private _released = false;

  constructor(id: string, timeoutMs: number, onRelease: (handle: RequestHandle) => void) {
    this.id = id;
    this.timeoutMs = timeoutMs;
    this.onRelease = onRelease;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this._cancelled;
  }

  get timedOut(): boolean {
    return this._timedOut;
  }

  get released(): boolean {
    return this._released;
  }

  /** Re-arm the idle deadline. */
  touch(): void {
    if (this._released) return;
    this.clearTimer();
    this.timer = setTimeout(() => {
      this._timedOut = true;
      this.controller.abort(new UpstreamTimeoutError(this.timeoutMs));
    }, this.timeoutMs);
    this.timer.unref();
  }

  /** Abort the upstream call and release the handle. */
  cancel(): void {
    if (this._released) return;
    this._cancelled = true;
    this.controller.abort();
    this.release();
  }

  /** Drop the handle after the call completed. Idempotent. */
  release(): void {
    if (this._released) return;
    this._released = true;
    this.clearTimer();
    this.onRelease(this);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Turn a complete JSON response into a single chunk, for backends that
 * ignore `stream: true`.
 */
export function responseToChunk(response: ChatCompletionResponse): ChatCompletionChunk {
  const choice = response.choices[0];
  const content = choice?.message.content;
  const text = typeof content === 'string'
    ? content
    : (content ?? []).map((part) => part.text ?? '').join('');
  return {
    id: response.id,
    model: response.model,
    choices: [
      {
        index: 0,
        delta: {
          role: 'assistant',
          content: text,
          tool_calls: (choice?.message.tool_calls ?? []).map((call, index) => ({
            index,
            id: call.id,
            type: 'function',
            function: { name: call.function.name, arguments: call.function.arguments },
          })),
        },
        finish_reason: choice?.finish_reason ?? 'stop',
      },
    ],
    usage: response.usage,
  };
}

export class UpstreamClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchFn;
  private readonly active = new Map<string, RequestHandle>();

  constructor(options: UpstreamClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get activeCount(): number {
    return this.active.size;
  }

  /** Register a new in-flight call. */
  open(id: string = nanoid()): RequestHandle {
    const handle = new RequestHandle(id, this.timeoutMs, (h) => {
      if (this.active.get(h.id) === h) this.active.delete(h.id);
    });
    this.active.set(id, handle);
    return handle;
  }

  /** Cancel an in-flight call by id. Returns false if it is not active. */
  cancel(id: string): boolean {
    const handle = this.active.get(id);
    if (!handle) return false;
    handle.cancel();
    this.logger.debug(`Cancelled upstream request ${id}`);
    return true;
  }

  /**
   * Unary call. Throws UpstreamHttpError, UpstreamTimeoutError or
   * MalformedResponseError; the transport's own error otherwise.
   */
  async createChatCompletion(
    body: ChatCompletionRequest,
    credential: Credential,
    handle: RequestHandle,
  ): Promise<ChatCompletionResponse> {
    const response = await this.send({ ...body, stream: false }, credential, handle);
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw this.abortReason(err, handle);
    }
    return parseResponse(text);
  }

  /**
   * Streaming call. Yields validated chunks until `[DONE]` or end of body.
   * Frames that do not parse are skipped; a frame carrying an `error`
   * object ends the stream by throwing.
   */
  async *streamChatCompletion(
    body: ChatCompletionRequest,
    credential: Credential,
    handle: RequestHandle,
  ): AsyncGenerator<ChatCompletionChunk, void, unknown> {
    const response = await this.send({ ...body, stream: true }, credential, handle);

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        throw this.abortReason(err, handle);
      }
      yield responseToChunk(parseResponse(text));
      return;
    }

    if (!response.body) {
      throw new MalformedResponseError('missing response body');
    }

    try {
      for await (const data of readSseData(response.body)) {
        handle.touch();
        if (data === DONE_MARKER) return;
        const chunk = parseChunk(data);
        if (!chunk) {
          this.logger.debug(`Skipping unparseable stream frame (${data.length} bytes)`);
          continue;
        }
        yield chunk;
      }
    } catch (err) {
      throw this.abortReason(err, handle);
    }
  }

  private async send(body: ChatCompletionRequest, credential: Credential, handle: RequestHandle): Promise<Response> {
    handle.touch();
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: body.stream ? 'text/event-stream' : 'application/json',
          Authorization: `Bearer ${credential.secret}`,
        },
        body: JSON.stringify(body),
        signal: handle.signal,
      });
    } catch (err) {
      throw this.abortReason(err, handle);
    }

    if (!response.ok) {
      let text = '';
      try {
        text = await response.text();
      } catch (err) {
        this.logger.debug(`Could not read error body: ${err instanceof Error ? err.message : String(err)}`);
      }
      throw new UpstreamHttpError(response.status, text);
    }
    return response;
  }

  private abortReason(err: unknown, handle: RequestHandle): unknown {
    if (handle.timedOut) return new UpstreamTimeoutError(this.timeoutMs);
    return err;
  }
}

function statusFrom(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value : typeof value === 'string' && /^\d{3}$/.test(value) ? Number(value) : NaN;
  return Number.isInteger(n) && n >= 400 && n < 600 ? n : undefined;
}

/**
 * Some backends report failures inside a 2xx body or SSE frame as
 * `{"error": ...}`. An HTTP-like `code` or `status` on the error object
 * is treated as the response status.
 */
function embeddedError(json: unknown, text: string): Error | null {
  if (!isRecord(json)) return null;
  const err = json['error'];
  if (err === undefined || err === null) return null;
  const status = isRecord(err) ? (statusFrom(err['code']) ?? statusFrom(err['status'])) : undefined;
  return status === undefined ? new UpstreamPayloadError(text) : new UpstreamHttpError(status, text);
}

function parseResponse(text: string): ChatCompletionResponse {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new MalformedResponseError('body is not JSON');
  }
  const embedded = embeddedError(json, text);
  if (embedded) throw embedded;
  const parsed = ChatCompletionResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedResponseError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

/** Returns null for frames that do not parse; throws for error frames. */
function parseChunk(data: string): ChatCompletionChunk | null {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return null;
  }
  const embedded = embeddedError(json, data);
  if (embedded) throw embedded;
  const parsed = ChatCompletionChunkSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
