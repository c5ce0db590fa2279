/**
 * Mock upstream response fixtures for tests
 */
import { vi } from 'vitest';
import type { Dispatcher } from 'undici';

export interface MockResponseInit {
  statusCode?: number;
  headers?: Record<string, string>;
  json?: unknown;
  text?: string;
  chunks?: Array<string | Uint8Array>;
}

/**
 * Shape of an undici `request()` result: `text()`/`json()` plus an
 * async-iterable body yielding the given chunks.
 */
export function mockResponse(init: MockResponseInit): Dispatcher.ResponseData {
  const chunks = (init.chunks ?? []).map((c) => (typeof c === 'string' ? Buffer.from(c) : c));
  const text =
    init.text ??
    (init.json !== undefined ? JSON.stringify(init.json) : Buffer.concat(chunks).toString('utf-8'));

  const body = {
    text: vi.fn().mockResolvedValue(text),
    json: vi.fn().mockImplementation(async () => JSON.parse(text)),
    async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
      for (const chunk of chunks) yield chunk;
    },
  };

  return {
    statusCode: init.statusCode ?? 200,
    headers: init.headers ?? {},
    body,
  } as unknown as Dispatcher.ResponseData;
}

/** One `data:` frame per payload; objects are JSON-encoded. */
export function sseFrames(...payloads: Array<string | object>): string[] {
  return payloads.map((p) => `data: ${typeof p === 'string' ? p : JSON.stringify(p)}\n\n`);
}

/** Named SSE events, `event:` line followed by its `data:` line. */
export function namedSseFrames(...events: Array<[event: string, data: string | object]>): string[] {
  return events.map(
    ([event, data]) => `event: ${event}\ndata: ${typeof data === 'string' ? data : JSON.stringify(data)}\n\n`
  );
}

export function jsonLines(...values: object[]): string[] {
  return values.map((v) => `${JSON.stringify(v)}\n`);
}

/**
 * Encode one AWS event-stream message with string headers. CRC fields are
 * left zeroed.
 */
export function encodeEventStreamMessage(headers: Record<string, string>, payload: string): Buffer {
  const headerBytes = Buffer.concat(
    Object.entries(headers).map(([name, value]) => {
      const n = Buffer.from(name, 'utf-8');
      const v = Buffer.from(value, 'utf-8');
      const out = Buffer.alloc(1 + n.length + 1 + 2 + v.length);
      out.writeUInt8(n.length, 0);
      n.copy(out, 1);
      out.writeUInt8(7, 1 + n.length);
      out.writeUInt16BE(v.length, 2 + n.length);
      v.copy(out, 4 + n.length);
      return out;
    })
  );
  const payloadBytes = Buffer.from(payload, 'utf-8');
  const total = 12 + headerBytes.length + payloadBytes.length + 4;

  const prelude = Buffer.alloc(12);
  prelude.writeUInt32BE(total, 0);
  prelude.writeUInt32BE(headerBytes.length, 4);
  return Buffer.concat([prelude, headerBytes, payloadBytes, Buffer.alloc(4)]);
}

export const mockOpenAIChatResponse = {
  id: 'chatcmpl-test123',
  object: 'chat.completion',
  created: 1699000000,
  model: 'gpt-4o-mini',
  choices: [
    {
      index: 0,
      message: { role: 'assistant', content: 'Hello! How can I help you today?' },
      finish_reason: 'stop',
      logprobs: null,
    },
  ],
  usage: { prompt_tokens: 10, completion_tokens: 9, total_tokens: 19 },
};

export const mockOpenAIStreamChunks = sseFrames(
  { id: 'chatcmpl-stream1', choices: [{ delta: { role: 'assistant', content: '' }, finish_reason: null }] },
  { id: 'chatcmpl-stream1', choices: [{ delta: { content: 'Hel' }, finish_reason: null }] },
  { id: 'chatcmpl-stream1', choices: [{ delta: { content: 'lo' }, finish_reason: null }] },
  { id: 'chatcmpl-stream1', choices: [{ delta: {}, finish_reason: 'stop' }] },
  { id: 'chatcmpl-stream1', choices: [], usage: { prompt_tokens: 5, completion_tokens: 2 } },
  '[DONE]'
);

export const mockClaudeResponse = {
  id: 'msg_test123',
  type: 'message',
  role: 'assistant',
  content: [{ type: 'text', text: 'Hello from Claude!' }],
  model: 'claude-3-haiku-20240307',
  stop_reason: 'end_turn',
  usage: { input_tokens: 10, output_tokens: 5 },
};

export const mockGeminiResponse = {
  candidates: [
    {
      content: { role: 'model', parts: [{ text: 'Hello from Gemini!' }] },
      finishReason: 'STOP',
      index: 0,
    },
  ],
  usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 4, totalTokenCount: 14 },
};
