/**
 * messages-bridge
 *
 * Accepts Messages API requests and serves them from a Chat-Completions
 * backend, rotating through the configured keys and models.
 *
 * @example
 * ```typescript
 * import { loadConfig, createBridgeContext, startBridge } from 'messages-bridge';
 *
 * const ctx = createBridgeContext(loadConfig());
 * await startBridge(ctx);
 * ```
 *
 * @packageDocumentation
 */

// Server
export { createBridgeContext, createBridgeServer, startBridge, isAuthorized } from './server.js';
export type { BridgeContext, BridgeContextOptions } from './server.js';
export { probeHealth } from './health.js';

// Configuration
export { loadConfig, describeConfig, parseList, BridgeConfigSchema, DEFAULT_CONFIG, CONFIG_PATH_ENV } from './config.js';
export type { BridgeConfig, LoadConfigOptions } from './config.js';

// Core
export { Dispatcher } from './dispatcher.js';
export type { DispatchContext, DispatchResult, DispatcherOptions } from './dispatcher.js';
export { CredentialModelRotator, maskSecret } from './rotator.js';
export type { Credential, CredentialStatus, CredentialView, Selection } from './rotator.js';
export { UpstreamClient, RequestHandle, responseToChunk } from './upstream-client.js';
export type { FetchFn, UpstreamClientOptions } from './upstream-client.js';
export * from './translate/index.js';

// Errors
export {
  ErrorCategories,
  ConfigError,
  InvalidRequestError,
  ClientDisconnectedError,
  UpstreamHttpError,
  UpstreamTimeoutError,
  UpstreamPayloadError,
  MalformedResponseError,
  classifyError,
  sanitizeMessage,
  extractUpstreamDetail,
  callerErrorType,
  toCallerError,
  isRetryable,
} from './errors.js';
export type { ErrorCategory, ErrorEnvelope } from './errors.js';

// Supporting pieces
export { resolveTargetModel, DEFAULT_PASSTHROUGH_PREFIXES } from './model-resolver.js';
export { estimateTokens, estimateTextTokens, charsToTokens } from './token-estimate.js';
export { probeCredentials, summarizeProbe, toStatuses, validateRotatorKeys } from './key-probe.js';
export type { ProbeOptions, ProbeResult, ProbeSummary } from './key-probe.js';
export { StatsCollector } from './stats.js';
export type { DispatchRecord, StatsSnapshot } from './stats.js';
export { createLogger, defaultLogger, silentLogger, LogLevels } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export * from './types.js';
