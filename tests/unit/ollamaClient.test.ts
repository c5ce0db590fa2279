import { describe, it, expect, beforeEach, vi } from 'vitest';
import { request } from 'undici';
import { Model } from '../../src/core/Model.js';
import { OllamaClient, buildOllamaBody } from '../../src/providers/ollama.js';
import { ProviderKind } from '../../src/types/provider.js';
import { ConfigError } from '../../src/types/request.js';
import { jsonLines, mockResponse } from '../fixtures/mockResponses.js';
import { runStream, upstreamCall, userMessage } from '../fixtures/upstream.js';

vi.mock('undici', () => ({
  request: vi.fn(),
  Agent: vi.fn(),
}));

const signal = new AbortController().signal;

function ollama(extra: { api_auth?: string; chat_endpoint?: string } = {}): OllamaClient {
  return new OllamaClient(
    { type: ProviderKind.Ollama, api_base: 'http://localhost:11434/', ...extra },
    new Model('ollama', 'llama3')
  );
}

describe('buildOllamaBody', () => {
  it('puts sampling and output limit under options', () => {
    const body = buildOllamaBody(
      userMessage('Hi', { temperature: 0.2, top_p: 0.8 }),
      new Model('ollama', 'llama3', { maxOutputTokens: 64 })
    );
    expect(body).toEqual({
      model: 'llama3',
      messages: [{ role: 'user', content: 'Hi' }],
      stream: false,
      options: { temperature: 0.2, top_p: 0.8, num_predict: 64 },
    });
  });
});

describe('OllamaClient', () => {
  beforeEach(() => {
    vi.mocked(request).mockReset();
  });

  it('requires api_base', () => {
    expect(() => new OllamaClient({ type: ProviderKind.Ollama }, new Model('ollama', 'llama3'))).toThrow(ConfigError);
  });

  it('posts to /api/chat and reads eval counters', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({
        json: { message: { role: 'assistant', content: 'Hi there' }, done: true, prompt_eval_count: 8, eval_count: 2 },
      })
    );

    const output = await ollama().send(userMessage('Hello'), signal);

    expect(output).toEqual({ text: 'Hi there', details: { input_tokens: 8, output_tokens: 2 } });
    expect(upstreamCall().url).toBe('http://localhost:11434/api/chat');
    expect(upstreamCall().headers['Authorization']).toBeUndefined();
  });

  it('sends api_auth verbatim and honours a custom endpoint', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: { message: { content: 'ok' }, done: true } }));

    await ollama({ api_auth: 'Basic dGVzdDp0ZXN0', chat_endpoint: '/v2/chat' }).send(userMessage('Hello'), signal);

    const call = upstreamCall();
    expect(call.url).toBe('http://localhost:11434/v2/chat');
    expect(call.headers['Authorization']).toBe('Basic dGVzdDp0ZXN0');
  });

  it('surfaces an error field in a buffered response', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: { error: 'model "llama3" not found' } }));
    await expect(ollama().send(userMessage('Hello'), signal)).rejects.toThrow('model "llama3" not found');
  });

  it('streams message chunks and stops at done', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({
        chunks: jsonLines(
          { message: { content: 'Hel' }, done: false },
          { message: { content: 'lo' }, done: false },
          { message: { content: '' }, done: true, prompt_eval_count: 5, eval_count: 2 }
        ),
      })
    );

    const { events, handler } = await runStream(ollama(), userMessage('Hello'));

    expect(events).toEqual([{ type: 'text', text: 'Hel' }, { type: 'text', text: 'lo' }, { type: 'done' }]);
    expect(handler.details).toEqual({ input_tokens: 5, output_tokens: 2 });
  });

  it('fails on an error line mid-stream', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({ chunks: jsonLines({ message: { content: 'Hel' }, done: false }, { error: 'out of memory' }) })
    );
    await expect(runStream(ollama(), userMessage('Hello'))).rejects.toThrow('out of memory');
  });
});
