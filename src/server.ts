/**
 * Bridge HTTP server
 *
 * Messages-API front door over `node:http`. Parses and validates inbound
 * requests, enforces the shared client key, and hands each call to the
 * {@link Dispatcher}. Unary replies go out as JSON, streaming ones as SSE.
 *
 * Endpoints:
 * - `POST /v1/messages`
 * - `POST /v1/messages/count_tokens`
 * - `GET /validate-keys`
 * - `GET /health`, `GET /stats`, `GET /`
 *
 * @packageDocumentation
 */

import * as crypto from 'node:crypto';
import * as http from 'node:http';
import { nanoid } from 'nanoid';
import { describeConfig, type BridgeConfig } from './config.js';
import { Dispatcher, type DispatchResult } from './dispatcher.js';
import { ClientDisconnectedError, InvalidRequestError, isRetryable, toCallerError, type ErrorEnvelope } from './errors.js';
import { probeCredentials, summarizeProbe, toStatuses } from './key-probe.js';
import { type Logger, createLogger } from './logger.js';
import { CredentialModelRotator } from './rotator.js';
import { StatsCollector } from './stats.js';
import { estimateTokens } from './token-estimate.js';
import { encodeStreamEvent } from './translate/sse.js';
import {
  MessagesRequestSchema,
  TokenCountRequestSchema,
  type CallerErrorType,
  type MessagesRequest,
} from './types.js';
import { UpstreamClient, type FetchFn } from './upstream-client.js';

const MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB max request body
const PROBE_TIMEOUT_MS = 10_000;

/**
 * Everything a running bridge needs, wired from one config.
 */
export interface BridgeContext {
  config: BridgeConfig;
  rotator: CredentialModelRotator;
  client: UpstreamClient;
  /** Short-deadline client for key probes. */
  probeClient: UpstreamClient;
  dispatcher: Dispatcher;
  stats: StatsCollector;
  logger: Logger;
  version: string;
  /** Epoch ms at which the context was built; /health reports uptime from it. */
  startedAt: number;
}

export interface BridgeContextOptions {
  logger?: Logger;
  fetch?: FetchFn;
  version?: string;
}

/**
 * Build the rotator, clients, stats and dispatcher for a config.
 *
 * @throws ConfigError on an empty key or model list
 */
export function createBridgeContext(config: BridgeConfig, options: BridgeContextOptions = {}): BridgeContext {
  const logger = options.logger ?? createLogger(config.logLevel);
  const rotator = new CredentialModelRotator(config.upstream.apiKeys, config.upstream.models);
  const client = new UpstreamClient({
    baseUrl: config.upstream.baseUrl,
    timeoutMs: config.upstream.timeoutMs,
    logger,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  const probeClient = new UpstreamClient({
    baseUrl: config.upstream.baseUrl,
    timeoutMs: Math.min(PROBE_TIMEOUT_MS, config.upstream.timeoutMs),
    logger,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  const stats = new StatsCollector();
  const dispatcher = new Dispatcher({
    rotator,
    client,
    tokens: config.tokens,
    includeStreamUsage: config.upstream.includeStreamUsage,
    passthroughPrefixes: config.passthroughModelPrefixes,
    logger,
    stats,
  });
  return {
    config,
    rotator,
    client,
    probeClient,
    dispatcher,
    stats,
    logger,
    version: options.version ?? '0.0.0',
    startedAt: Date.now(),
  };
}

// ============================================================================
// Request helpers
// ============================================================================

async function readRequestBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_SIZE) {
      throw new InvalidRequestError('Request body too large (max 10MB)');
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const body = await readRequestBody(req);
  try {
    return JSON.parse(body);
  } catch {
    throw new InvalidRequestError('Request body is not valid JSON');
  }
}

function headerValue(req: http.IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Compare the presented client key with the configured one in constant
 * time. Accepts `x-api-key` or `Authorization: Bearer`.
 */
export function isAuthorized(req: http.IncomingMessage, expected: string | undefined): boolean {
  if (!expected) return true;
  const bearer = headerValue(req, 'authorization')?.match(/^Bearer\s+(.+)$/i)?.[1];
  const presented = headerValue(req, 'x-api-key') ?? bearer;
  if (!presented) return false;
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(payload) });
  res.end(payload);
}

function sendError(res: http.ServerResponse, status: number, type: CallerErrorType, message: string): void {
  sendJson(res, status, { type: 'error', error: { type, message } });
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

/**
 * Tracks whether the caller is still connected and aborts a signal when
 * it goes away.
 */
function watchConnection(res: http.ServerResponse): { isConnected: () => boolean; signal: AbortSignal } {
  const controller = new AbortController();
  let closed = false;
  res.on('close', () => {
    closed = true;
    if (!res.writableFinished) controller.abort();
  });
  return {
    isConnected: () => !closed && !res.destroyed,
    signal: controller.signal,
  };
}

// ============================================================================
// Handlers
// ============================================================================

async function handleMessages(ctx: BridgeContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const parsed = MessagesRequestSchema.safeParse(await readJsonBody(req));
  if (!parsed.success) {
    sendError(res, 400, 'invalid_request_error', formatIssues(parsed.error.issues));
    return;
  }
  const request = parsed.data;
  const connection = watchConnection(res);
  const requestId = nanoid();

  if (request.stream) {
    await streamMessages(ctx, request, res, { ...connection, requestId });
    return;
  }

  const maxRetries = ctx.config.upstream.maxRetries;
  for (let attempt = 0; ; attempt++) {
    let result: DispatchResult;
    try {
      result = await ctx.dispatcher.complete(request, { ...connection, requestId: `${requestId}-${attempt}` });
    } catch (err) {
      if (err instanceof ClientDisconnectedError) {
        ctx.logger.debug(`Caller disconnected before dispatch (${requestId})`);
        return;
      }
      throw err;
    }

    if (result.ok) {
      sendJson(res, 200, result.response);
      return;
    }
    if (attempt < maxRetries && isRetryable(result.error.category) && connection.isConnected()) {
      ctx.logger.warn(`Retrying ${requestId} after ${result.error.category} (attempt ${attempt + 2}/${maxRetries + 1})`);
      continue;
    }
    const { status, body } = toCallerError(result.error);
    sendJson(res, status, body);
    return;
  }
}

async function streamMessages(
  ctx: BridgeContext,
  request: MessagesRequest,
  res: http.ServerResponse,
  connection: { isConnected: () => boolean; signal: AbortSignal; requestId: string },
): Promise<void> {
  const maxRetries = ctx.config.upstream.maxRetries;

  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });
  res.flushHeaders();

  const open = async (attempt: number) => {
    const seen: { failure?: ErrorEnvelope } = {};
    const events = ctx.dispatcher.stream(request, {
      ...connection,
      requestId: `${connection.requestId}-${attempt}`,
      onFailure: (error) => {
        seen.failure = error;
      },
    });
    const first = await events.next();
    const failure = seen.failure;
    // no event is written before the first one, so a failure there can still be retried
    const retryable = !first.done && first.value.type === 'error' && failure !== undefined && isRetryable(failure.category);
    return { events, first, failure, retryable };
  };

  let attempt = 0;
  let opened = await open(attempt);
  while (opened.retryable && attempt < maxRetries && connection.isConnected()) {
    ctx.logger.warn(
      `Retrying stream ${connection.requestId} after ${opened.failure?.category ?? 'error'} (attempt ${attempt + 2}/${maxRetries + 1})`,
    );
    await opened.events.return();
    attempt += 1;
    opened = await open(attempt);
  }
  const { events, first } = opened;

  if (first.done || !connection.isConnected()) {
    await events.return();
    if (!res.destroyed) res.end();
    return;
  }

  res.write(encodeStreamEvent(first.value));

  for (;;) {
    if (res.destroyed) {
      await events.return();
      return;
    }
    const next = await events.next();
    if (next.done) break;
    res.write(encodeStreamEvent(next.value));
  }
  if (!res.destroyed) res.end();
}

async function handleCountTokens(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const parsed = TokenCountRequestSchema.safeParse(await readJsonBody(req));
  if (!parsed.success) {
    sendError(res, 400, 'invalid_request_error', formatIssues(parsed.error.issues));
    return;
  }
  sendJson(res, 200, { input_tokens: estimateTokens(parsed.data) });
}

async function handleValidateKeys(ctx: BridgeContext, res: http.ServerResponse): Promise<void> {
  const results = await probeCredentials(ctx.rotator.snapshotCredentials(), ctx.probeClient, {
    model: ctx.rotator.nextModel(),
  });
  ctx.rotator.annotate(toStatuses(results));
  const summary = summarizeProbe(results);
  sendJson(res, 200, {
    status: summary.status,
    timestamp: new Date().toISOString(),
    summary: {
      total: summary.total,
      valid: summary.valid,
      invalid: summary.invalid,
      validRate: summary.validRate,
    },
    validKeys: results.filter((r) => r.valid),
    invalidKeys: results.filter((r) => !r.valid),
    recommendations: summary.recommendations,
  });
}

function handleInfo(ctx: BridgeContext, res: http.ServerResponse): void {
  sendJson(res, 200, {
    message: `messages-bridge v${ctx.version}`,
    status: 'running',
    config: describeConfig(ctx.config),
    credentials: ctx.rotator.listCredentials(),
    endpoints: {
      messages: '/v1/messages',
      countTokens: '/v1/messages/count_tokens',
      validateKeys: '/validate-keys',
      health: '/health',
      stats: '/stats',
    },
  });
}

async function route(ctx: BridgeContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const pathname = (req.url ?? '').split('?')[0] ?? '';

  if (req.method === 'GET') {
    switch (pathname) {
      case '/health':
      case '/healthz':
        sendJson(res, 200, {
          ok: true,
          uptime: Math.floor((Date.now() - ctx.startedAt) / 1000),
          activeRequests: ctx.client.activeCount,
        });
        return;
      case '/stats':
        sendJson(res, 200, ctx.stats.getStats());
        return;
      case '/validate-keys':
        await handleValidateKeys(ctx, res);
        return;
      case '/':
        handleInfo(ctx, res);
        return;
    }
  }

  if (req.method === 'POST' && (pathname === '/v1/messages' || pathname === '/v1/messages/count_tokens')) {
    if (!isAuthorized(req, ctx.config.clientApiKey)) {
      sendError(res, 401, 'authentication_error', 'Invalid API key. Provide a valid key via x-api-key or Authorization: Bearer.');
      return;
    }
    if (pathname === '/v1/messages') {
      await handleMessages(ctx, req, res);
    } else {
      await handleCountTokens(req, res);
    }
    return;
  }

  sendError(res, 404, 'not_found_error', `No route for ${req.method ?? 'GET'} ${pathname}`);
}

/**
 * Create the bridge HTTP server. Call `listen` on the result.
 */
export function createBridgeServer(ctx: BridgeContext): http.Server {
  return http.createServer((req, res) => {
    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, x-api-key, anthropic-version, anthropic-beta');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    route(ctx, req, res).catch((err: unknown) => {
      if (err instanceof InvalidRequestError) {
        if (!res.headersSent) sendError(res, 400, 'invalid_request_error', err.message);
        else res.end();
        return;
      }
      ctx.logger.error(`Unhandled error on ${req.method ?? ''} ${req.url ?? ''}: ${err instanceof Error ? err.message : String(err)}`);
      if (!res.headersSent) {
        sendError(res, 500, 'api_error', 'Internal proxy error');
      } else if (!res.destroyed) {
        res.end();
      }
    });
  });
}

/**
 * Start listening on the configured host and port.
 */
export function startBridge(ctx: BridgeContext): Promise<http.Server> {
  const server = createBridgeServer(ctx);
  const { host, port } = ctx.config.server;
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      ctx.logger.info(`Listening on http://${host}:${boundPort}`);
      ctx.logger.info(`Upstream: ${ctx.config.upstream.baseUrl} (${ctx.rotator.credentialCount} key(s), models: ${ctx.rotator.listModels().join(', ')})`);
      if (!ctx.config.clientApiKey) {
        ctx.logger.warn('ANTHROPIC_API_KEY not set; client authentication is disabled');
      }
      resolve(server);
    });
  });
}
