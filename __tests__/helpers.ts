/**
 * Shared fixtures for the bridge tests.
 */
import * as http from 'node:http';
import type { ChatCompletionChunk, MessagesRequest } from '../src/types.js';

export interface MockServer {
  server: http.Server;
  port: number;
  url: string;
}

// Helper: create a simple HTTP server on a free port
export function createMockServer(handler: http.RequestListener): Promise<MockServer> {
  return new Promise((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr !== null ? addr.port : 0;
      resolve({ server, port, url: `http://127.0.0.1:${port}` });
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

export function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf-8');
    req.on('data', (c: string) => (body += c));
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

export function chunk(
  delta: NonNullable<ChatCompletionChunk['choices'][number]['delta']>,
  finishReason: string | null = null,
): ChatCompletionChunk {
  return {
    id: 'chatcmpl-test',
    model: 'gpt-4o',
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
}

export function usageChunk(promptTokens: number, completionTokens: number): ChatCompletionChunk {
  return {
    id: 'chatcmpl-test',
    model: 'gpt-4o',
    choices: [],
    usage: { prompt_tokens: promptTokens, completion_tokens: completionTokens },
  };
}

/** Frame chunks the way a Chat-Completions backend streams them. */
export function sseBody(chunks: readonly unknown[], done = true): string {
  return chunks.map((c) => `data: ${JSON.stringify(c)}\n\n`).join('') + (done ? 'data: [DONE]\n\n' : '');
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T, void, unknown> {
  for (const item of items) {
    yield item;
  }
}

export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iter) out.push(item);
  return out;
}

export function messagesRequest(overrides: Partial<MessagesRequest> = {}): MessagesRequest {
  return {
    model: 'claude-3-5-sonnet-20241022',
    max_tokens: 256,
    messages: [{ role: 'user', content: 'Hello there' }],
    ...overrides,
  };
}

/** Parse an SSE response body from the bridge into `[event, data]` pairs. */
export function parseSse(text: string): Array<{ event: string; data: unknown }> {
  return text
    .split('\n\n')
    .filter((frame) => frame.trim())
    .map((frame) => {
      const lines = frame.split('\n');
      const event = lines.find((l) => l.startsWith('event: '))?.slice(7) ?? '';
      const data = lines.find((l) => l.startsWith('data: '))?.slice(6) ?? 'null';
      return { event, data: JSON.parse(data) };
    });
}
