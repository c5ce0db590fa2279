import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { type StreamContext, parseJsonChunk, readSseStream } from '../streaming/sseStream.js';
import { BaseProviderClient, type ClientOptions } from './base.js';

const OPENAI_API_BASE = 'https://api.openai.com/v1';

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
});

export const openAIResponseSchema = z.object({
  id: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullish() }),
    })
  ),
  usage: usageSchema.nullish(),
});

const openAIChunkSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).nullish(),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: usageSchema.nullish(),
});

export interface OpenAIChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stream: boolean;
  stream_options?: { include_usage: boolean };
}

/**
 * Translate canonical input into an OpenAI chat-completions body. Shared by
 * every OpenAI-shaped vendor.
 */
export function buildOpenAIBody(
  data: SendData,
  model: Model,
  options: { includeUsage?: boolean } = {}
): OpenAIChatRequest {
  const body: OpenAIChatRequest = {
    model: model.name,
    messages: data.messages.map((m) => ({ role: m.role, content: messageText(m) })),
    stream: data.stream,
  };

  if (data.temperature !== undefined) body.temperature = data.temperature;
  if (data.top_p !== undefined) body.top_p = data.top_p;
  if (model.maxOutputTokens !== undefined) body.max_tokens = model.maxOutputTokens;
  if (data.stream && options.includeUsage) body.stream_options = { include_usage: true };

  return body;
}

export function openAIOutput(response: z.infer<typeof openAIResponseSchema>): CompletionOutput {
  return {
    text: response.choices[0]?.message.content ?? '',
    details: {
      id: response.id,
      input_tokens: response.usage?.prompt_tokens,
      output_tokens: response.usage?.completion_tokens,
    },
  };
}

/**
 * Feed an OpenAI-style SSE body (`data: {...}` frames ending in `[DONE]`)
 * to the handler.
 */
export async function streamOpenAI(
  response: Dispatcher.ResponseData,
  ctx: StreamContext
): Promise<void> {
  await readSseStream(response.body, ctx, (message) => {
    const data = message.data.trim();
    if (!data) return;
    if (data === '[DONE]') {
      ctx.handler.done();
      return;
    }

    const chunk = parseJsonChunk(ctx, data, openAIChunkSchema);
    if (chunk.id) ctx.handler.details.id = chunk.id;
    if (chunk.usage) {
      ctx.handler.details.input_tokens = chunk.usage.prompt_tokens;
      ctx.handler.details.output_tokens = chunk.usage.completion_tokens;
    }

    const content = chunk.choices[0]?.delta?.content;
    if (content) ctx.handler.push(content);
  });
}

/**
 * OpenAI chat completions.
 */
export class OpenAIClient extends BaseProviderClient<ClientConfigOf<ProviderKind.OpenAI>> {
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.OpenAI>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    return openAIOutput(await this.readJson(response, openAIResponseSchema));
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const response = await this.request(data, signal);
    await streamOpenAI(response, this.streamContext(handler));
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (this.config.organization_id) headers['OpenAI-Organization'] = this.config.organization_id;

    return this.call(`${this.config.api_base ?? OPENAI_API_BASE}/chat/completions`, {
      headers,
      body: this.withExtraFields(buildOpenAIBody(data, this.model, { includeUsage: true })),
      signal,
    });
  }
}
