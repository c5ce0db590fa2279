import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Agent, request } from 'undici';
import { Model } from '../../src/core/Model.js';
import { OpenAIClient, buildOpenAIBody } from '../../src/providers/openai.js';
import { OpenAICompatibleClient } from '../../src/providers/openaiCompatible.js';
import { AzureOpenAIClient } from '../../src/providers/azureOpenai.js';
import { CloudflareClient } from '../../src/providers/cloudflare.js';
import { extractErrorMessage } from '../../src/providers/base.js';
import { ProviderKind } from '../../src/types/provider.js';
import { ConfigError, ProviderError, RequestError, StreamProtocolError } from '../../src/types/request.js';
import { mockOpenAIChatResponse, mockOpenAIStreamChunks, mockResponse, sseFrames } from '../fixtures/mockResponses.js';
import { runStream, upstreamCall, userMessage } from '../fixtures/upstream.js';

vi.mock('undici', () => ({
  request: vi.fn(),
  Agent: vi.fn(),
}));

const signal = new AbortController().signal;

function openai(model = new Model('openai', 'gpt-4o-mini', { maxOutputTokens: 256 })): OpenAIClient {
  return new OpenAIClient({ type: ProviderKind.OpenAI, api_key: 'test-secret' }, model);
}

describe('buildOpenAIBody', () => {
  it('maps canonical input and only sets supplied sampling fields', () => {
    const body = buildOpenAIBody(
      {
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: [{ type: 'text', text: 'a' }, { type: 'text', text: 'b' }] },
        ],
        temperature: 0.2,
        stream: false,
      },
      new Model('openai', 'gpt-4o')
    );
    expect(body).toEqual({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'a\nb' },
      ],
      temperature: 0.2,
      stream: false,
    });
  });

  it('asks for usage on streams when requested', () => {
    const body = buildOpenAIBody(userMessage('hi', { stream: true }), new Model('openai', 'gpt-4o'), {
      includeUsage: true,
    });
    expect(body.stream_options).toEqual({ include_usage: true });
  });
});

describe('extractErrorMessage', () => {
  it('reads the common vendor envelopes', () => {
    expect(extractErrorMessage({ error: { message: 'bad key' } })).toBe('bad key');
    expect(extractErrorMessage({ error: 'quota' })).toBe('quota');
    expect(extractErrorMessage({ errors: [{ message: 'cf failure' }] })).toBe('cf failure');
    expect(extractErrorMessage({ error_code: 17, error_msg: 'daily limit' })).toBe('daily limit');
    expect(extractErrorMessage({ detail: 'not found' })).toBe('not found');
    expect(extractErrorMessage([{ error: { message: 'in array' } }])).toBe('in array');
    expect(extractErrorMessage('plain')).toBeUndefined();
  });
});

describe('OpenAIClient', () => {
  beforeEach(() => {
    vi.mocked(request).mockReset();
    vi.mocked(Agent).mockClear();
  });

  it('requires an api_key', () => {
    expect(
      () => new OpenAIClient({ type: ProviderKind.OpenAI }, new Model('openai', 'gpt-4o'))
    ).toThrow("Client 'openai' is missing required field 'api_key'");
  });

  it('sends a bearer-authenticated chat completion and reads usage', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: mockOpenAIChatResponse }));

    const output = await openai().send(userMessage('Hello'), signal);

    expect(output).toEqual({
      text: 'Hello! How can I help you today?',
      details: { id: 'chatcmpl-test123', input_tokens: 10, output_tokens: 9 },
    });
    const call = upstreamCall();
    expect(call.url).toBe('https://api.openai.com/v1/chat/completions');
    expect(call.method).toBe('POST');
    expect(call.headers['Authorization']).toBe('Bearer test-secret');
    expect(call.headers['Content-Type']).toBe('application/json');
    expect(call.body).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Hello' }],
      max_tokens: 256,
      stream: false,
    });
  });

  it('merges extra_fields and the organization header', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: mockOpenAIChatResponse }));
    const client = new OpenAIClient(
      { type: ProviderKind.OpenAI, api_key: 'test-secret', organization_id: 'org-test', api_base: 'http://localhost:9999/v1' },
      new Model('openai', 'gpt-4o', { extraFields: { seed: 42 } })
    );

    await client.send(userMessage('Hello'), signal);

    const call = upstreamCall();
    expect(call.url).toBe('http://localhost:9999/v1/chat/completions');
    expect(call.headers['OpenAI-Organization']).toBe('org-test');
    expect(call.body).toMatchObject({ seed: 42 });
  });

  it('streams deltas, records usage and stops at [DONE]', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ chunks: mockOpenAIStreamChunks }));

    const { events, handler } = await runStream(openai(), userMessage('Hello'));

    expect(events).toEqual([{ type: 'text', text: 'Hel' }, { type: 'text', text: 'lo' }, { type: 'done' }]);
    expect(handler.details).toEqual({ id: 'chatcmpl-stream1', input_tokens: 5, output_tokens: 2 });
    expect(upstreamCall().body).toMatchObject({ stream: true, stream_options: { include_usage: true } });
  });

  it('maps a non-2xx status to a ProviderError with the vendor message', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({ statusCode: 401, json: { error: { message: 'Incorrect API key provided' } } })
    );

    const error = await openai().send(userMessage('Hello'), signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ provider: 'openai', status: 401, message: 'Incorrect API key provided' });
  });

  it('falls back to the raw body when the error is not JSON', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ statusCode: 502, text: 'Bad Gateway' }));
    await expect(openai().send(userMessage('Hello'), signal)).rejects.toThrow('Bad Gateway');
  });

  it('rejects a malformed stream chunk', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ chunks: sseFrames('{not json') }));
    await expect(runStream(openai(), userMessage('Hello'))).rejects.toThrow(StreamProtocolError);
  });

  it('validates sampling before any network call', async () => {
    await expect(openai().send(userMessage('Hello', { temperature: 2.5 }), signal)).rejects.toThrow(RequestError);
    await expect(openai().send(userMessage('Hello', { top_p: -0.1 }), signal)).rejects.toThrow(
      'top_p must be between 0 and 1 for openai'
    );
    expect(request).not.toHaveBeenCalled();
  });

  it('uses a dedicated dispatcher for the configured connect timeout', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: mockOpenAIChatResponse }));
    const client = new OpenAIClient(
      { type: ProviderKind.OpenAI, api_key: 'test-secret', extra: { connect_timeout: 3 } },
      new Model('openai', 'gpt-4o')
    );

    await client.send(userMessage('Hello'), signal);

    expect(Agent).toHaveBeenCalledWith({ connect: { timeout: 3000 } });
    expect(vi.mocked(request).mock.calls[0]?.[1]?.dispatcher).toBeDefined();
  });

  it('overrides max output tokens on its own model only', async () => {
    const model = new Model('openai', 'gpt-4o', { maxOutputTokens: 100 });
    const client = openai(model);
    client.setMaxOutputTokens(12);
    expect(client.model.maxOutputTokens).toBe(12);
  });
});

describe('OpenAICompatibleClient', () => {
  beforeEach(() => {
    vi.mocked(request).mockReset();
  });

  it('uses the known platform base for a named client', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: mockOpenAIChatResponse }));
    const client = new OpenAICompatibleClient(
      { type: ProviderKind.OpenAICompatible, name: 'groq', api_key: 'test-secret' },
      new Model('groq', 'llama3-8b-8192')
    );

    await client.send(userMessage('Hello'), signal);

    const call = upstreamCall();
    expect(call.url).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(call.body).not.toHaveProperty('stream_options');
  });

  it('honours a custom endpoint and omits auth without a key', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: mockOpenAIChatResponse }));
    const client = new OpenAICompatibleClient(
      {
        type: ProviderKind.OpenAICompatible,
        name: 'localai',
        api_base: 'http://localhost:8080/v1/',
        chat_endpoint: '/v2/chat',
      },
      new Model('localai', 'llama3')
    );

    await client.send(userMessage('Hello'), signal);

    const call = upstreamCall();
    expect(call.url).toBe('http://localhost:8080/v1/v2/chat');
    expect(call.headers['Authorization']).toBeUndefined();
  });

  it('requires api_base for unknown platforms', () => {
    expect(
      () =>
        new OpenAICompatibleClient(
          { type: ProviderKind.OpenAICompatible, name: 'custom' },
          new Model('custom', 'x')
        )
    ).toThrow(ConfigError);
  });
});

describe('AzureOpenAIClient', () => {
  beforeEach(() => {
    vi.mocked(request).mockReset();
  });

  it('calls the deployment URL with an api-key header', async () => {
    vi.mocked(request).mockResolvedValueOnce(mockResponse({ json: mockOpenAIChatResponse }));
    const client = new AzureOpenAIClient(
      { type: ProviderKind.AzureOpenAI, api_base: 'https://test.openai.azure.com/', api_key: 'test-secret' },
      new Model('azure-openai', 'my-deployment')
    );

    await client.send(userMessage('Hello'), signal);

    const call = upstreamCall();
    expect(call.url).toBe(
      'https://test.openai.azure.com/openai/deployments/my-deployment/chat/completions?api-version=2024-02-01'
    );
    expect(call.headers['api-key']).toBe('test-secret');
  });
});

describe('CloudflareClient', () => {
  beforeEach(() => {
    vi.mocked(request).mockReset();
  });

  const client = (): CloudflareClient =>
    new CloudflareClient(
      { type: ProviderKind.Cloudflare, account_id: 'acc-test', api_key: 'test-secret' },
      new Model('cloudflare', '@cf/meta/llama-3-8b-instruct')
    );

  it('reads result.response', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({ json: { result: { response: 'Hi there' }, success: true, errors: [] } })
    );

    const output = await client().send(userMessage('Hello'), signal);

    expect(output.text).toBe('Hi there');
    expect(upstreamCall().url).toBe(
      'https://api.cloudflare.com/client/v4/accounts/acc-test/ai/run/@cf/meta/llama-3-8b-instruct'
    );
  });

  it('streams response chunks until [DONE]', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({ chunks: sseFrames({ response: 'Hi' }, { response: ' there' }, '[DONE]') })
    );

    const { events } = await runStream(client(), userMessage('Hello'));

    expect(events).toEqual([{ type: 'text', text: 'Hi' }, { type: 'text', text: ' there' }, { type: 'done' }]);
  });

  it('surfaces the errors[] envelope', async () => {
    vi.mocked(request).mockResolvedValueOnce(
      mockResponse({ statusCode: 400, json: { success: false, errors: [{ code: 7000, message: 'No route for that URI' }] } })
    );
    await expect(client().send(userMessage('Hello'), signal)).rejects.toThrow('No route for that URI');
  });
});
