/**
 * Translation module exports.
 *
 * @packageDocumentation
 */

export { translateRequest, translateMessage, translateTools, translateToolChoice, clampMaxTokens } from './request.js';
export type { RequestTranslationOptions, TokenBounds } from './request.js';
export { translateResponse, mapStopReason, parseToolArguments, resolveUsage, newMessageId, newToolUseId } from './response.js';
export type { ResponseTranslationContext } from './response.js';
export { StreamTranslator, translateStream } from './stream.js';
export type { StreamState, StreamTranslatorOptions, TranslateStreamOptions } from './stream.js';
export { chunkToDeltas } from './chunk.js';
export { SseDecoder, encodeStreamEvent, readSseData, DONE_MARKER } from './sse.js';
