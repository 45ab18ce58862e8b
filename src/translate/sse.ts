/**
 * Server-sent events framing, both directions.
 *
 * @packageDocumentation
 */

import type { StreamEvent } from '../types.js';

/** Marker the Chat-Completions API sends as its last data line. */
export const DONE_MARKER = '[DONE]';

/**
 * Serialize one event for the caller's event stream.
 */
export function encodeStreamEvent(event: StreamEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * Incremental SSE parser. Feed decoded text with `push`; each complete
 * event's joined `data:` payload comes back in order.
 */
export class SseDecoder {
  private buffer = '';

  push(text: string): string[] {
    this.buffer += text;
    const normalized = this.buffer.replace(/\r\n/g, '\n');
    const frames = normalized.split('\n\n');
    this.buffer = frames.pop() ?? '';
    return frames.map(extractData).filter((data): data is string => data !== null);
  }

  /** Flush whatever is left once the source ends without a blank line. */
  flush(): string[] {
    const rest = this.buffer.replace(/\r\n/g, '\n');
    this.buffer = '';
    if (!rest.trim()) return [];
    const data = extractData(rest);
    return data === null ? [] : [data];
  }
}

function extractData(frame: string): string | null {
  const lines: string[] = [];
  for (const raw of frame.split('\n')) {
    const line = raw.trimEnd();
    if (!line.startsWith('data:')) continue;
    lines.push(line.slice(5).trimStart());
  }
  return lines.length ? lines.join('\n') : null;
}

/**
 * Decode a byte stream into SSE data payloads.
 */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string, void, unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const sse = new SseDecoder();

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      yield* sse.push(decoder.decode(value, { stream: true }));
    }
    const tail = decoder.decode();
    if (tail) yield* sse.push(tail);
    yield* sse.flush();
  } finally {
    reader.releaseLock();
  }
}
