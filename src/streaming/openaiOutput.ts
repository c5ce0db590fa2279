import { randomUUID } from 'crypto';
import {
  type ChatCompletionChunk,
  type ChatCompletionResponse,
  type CompletionOutput,
  type ErrorEnvelope,
} from '../types/request.js';
import { type HandlerEvent } from './SseHandler.js';

/**
 * Identity shared by every frame of one completion.
 */
export interface CompletionMeta {
  id: string;
  model: string;
  created: number;
}

export function createCompletionMeta(model: string, now: Date = new Date()): CompletionMeta {
  return {
    id: `chatcmpl-${randomUUID().replace(/-/g, '')}`,
    model,
    created: Math.floor(now.getTime() / 1000),
  };
}

export function errorEnvelope(message: string): ErrorEnvelope {
  return { error: { message, type: 'invalid_request_error' } };
}

/**
 * Buffered `chat.completion` body. A vendor-supplied id wins over the
 * generated one; missing usage counts as zero.
 */
export function toCompletionBody(meta: CompletionMeta, output: CompletionOutput): ChatCompletionResponse {
  const promptTokens = output.details.input_tokens ?? 0;
  const completionTokens = output.details.output_tokens ?? 0;

  return {
    id: output.details.id ?? meta.id,
    object: 'chat.completion',
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: output.text },
        logprobs: null,
        finish_reason: 'stop',
      },
    ],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  };
}

export function chunkFrame(
  meta: CompletionMeta,
  delta: ChatCompletionChunk['choices'][number]['delta'],
  finishReason: 'stop' | null = null
): string {
  const chunk: ChatCompletionChunk = {
    id: meta.id,
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

/**
 * Render handler events as OpenAI `chat.completion.chunk` SSE frames.
 *
 * `first` is the event already taken off the channel by the handshake.
 * The role frame goes out before any content; `done` yields the finish frame
 * and `[DONE]`. An error after the handshake yields one error frame and ends
 * the stream without `[DONE]`.
 */
export async function* toOpenAIStream(
  first: HandlerEvent,
  rest: AsyncIterable<HandlerEvent>,
  meta: CompletionMeta
): AsyncIterable<string> {
  yield chunkFrame(meta, { role: 'assistant', content: '' });

  async function* all(): AsyncIterable<HandlerEvent> {
    yield first;
    yield* rest;
  }

  for await (const event of all()) {
    switch (event.type) {
      case 'text':
        yield chunkFrame(meta, { content: event.text });
        break;
      case 'done':
        yield chunkFrame(meta, {}, 'stop');
        yield 'data: [DONE]\n\n';
        return;
      case 'error':
        yield `data: ${JSON.stringify(errorEnvelope(event.error.message))}\n\n`;
        return;
    }
  }
}
