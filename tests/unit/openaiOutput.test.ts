import { describe, it, expect } from 'vitest';
import {
  type CompletionMeta,
  chunkFrame,
  createCompletionMeta,
  errorEnvelope,
  toCompletionBody,
  toOpenAIStream,
} from '../../src/streaming/openaiOutput.js';
import { type HandlerEvent } from '../../src/streaming/SseHandler.js';

const meta: CompletionMeta = { id: 'chatcmpl-test', model: 'openai:gpt-4o', created: 1700000000 };

async function* events(...items: HandlerEvent[]): AsyncIterable<HandlerEvent> {
  for (const item of items) yield item;
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const frame of stream) out.push(frame);
  return out;
}

function frame(delta: object, finishReason: 'stop' | null = null): string {
  return `data: ${JSON.stringify({
    id: 'chatcmpl-test',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'openai:gpt-4o',
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  })}\n\n`;
}

describe('createCompletionMeta', () => {
  it('uses a chatcmpl- id and unix seconds', () => {
    const result = createCompletionMeta('m', new Date('2024-01-01T00:00:00.900Z'));
    expect(result.id).toMatch(/^chatcmpl-[0-9a-f]{32}$/);
    expect(result.created).toBe(1704067200);
    expect(result.model).toBe('m');
  });
});

describe('toCompletionBody', () => {
  it('sums usage and prefers the vendor id', () => {
    const body = toCompletionBody(meta, {
      text: 'hello',
      details: { id: 'vendor-id', input_tokens: 3, output_tokens: 1 },
    });
    expect(body).toEqual({
      id: 'vendor-id',
      object: 'chat.completion',
      created: 1700000000,
      model: 'openai:gpt-4o',
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: 'hello' },
          logprobs: null,
          finish_reason: 'stop',
        },
      ],
      usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
    });
  });

  it('reports missing usage as zero', () => {
    const body = toCompletionBody(meta, { text: '', details: {} });
    expect(body.id).toBe('chatcmpl-test');
    expect(body.usage).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
  });
});

describe('chunkFrame', () => {
  it('serializes one chat.completion.chunk frame', () => {
    expect(chunkFrame(meta, { content: 'hi' })).toBe(frame({ content: 'hi' }));
  });
});

describe('toOpenAIStream', () => {
  it('emits role, content, finish frames and [DONE]', async () => {
    const frames = await collect(
      toOpenAIStream({ type: 'text', text: 'he' }, events({ type: 'text', text: 'llo' }, { type: 'done' }), meta)
    );
    expect(frames).toEqual([
      frame({ role: 'assistant', content: '' }),
      frame({ content: 'he' }),
      frame({ content: 'llo' }),
      frame({}, 'stop'),
      'data: [DONE]\n\n',
    ]);
  });

  it('ends with an error frame and no [DONE] after a mid-stream failure', async () => {
    const frames = await collect(
      toOpenAIStream({ type: 'text', text: 'he' }, events({ type: 'error', error: new Error('upstream reset') }), meta)
    );
    expect(frames).toEqual([
      frame({ role: 'assistant', content: '' }),
      frame({ content: 'he' }),
      `data: ${JSON.stringify(errorEnvelope('upstream reset'))}\n\n`,
    ]);
  });

  it('ignores events after done', async () => {
    const frames = await collect(toOpenAIStream({ type: 'done' }, events({ type: 'text', text: 'late' }), meta));
    expect(frames).toEqual([frame({ role: 'assistant', content: '' }), frame({}, 'stop'), 'data: [DONE]\n\n']);
  });

  it('ends quietly when the channel closes without a terminal event', async () => {
    const frames = await collect(toOpenAIStream({ type: 'text', text: 'x' }, events(), meta));
    expect(frames).toEqual([frame({ role: 'assistant', content: '' }), frame({ content: 'x' })]);
  });
});
