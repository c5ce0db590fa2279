import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { parseJsonChunk, readSseStream } from '../streaming/sseStream.js';
import { BaseProviderClient, type ClientOptions } from './base.js';

const CLOUDFLARE_API_BASE = 'https://api.cloudflare.com/client/v4';

const usageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  })
  .nullish();

const cloudflareResponseSchema = z.object({
  result: z.object({
    response: z.string().nullish(),
    usage: usageSchema,
  }),
});

const cloudflareChunkSchema = z.object({
  response: z.string().nullish(),
  usage: usageSchema,
});

/**
 * Cloudflare Workers AI text generation.
 */
export class CloudflareClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Cloudflare>> {
  private readonly accountId: string;
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Cloudflare>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.accountId = this.required(config.account_id, 'account_id');
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    const { result } = await this.readJson(response, cloudflareResponseSchema);
    return {
      text: result.response ?? '',
      details: {
        input_tokens: result.usage?.prompt_tokens,
        output_tokens: result.usage?.completion_tokens,
      },
    };
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const response = await this.request(data, signal);
    const ctx = this.streamContext(handler);

    await readSseStream(response.body, ctx, (message) => {
      const payload = message.data.trim();
      if (!payload) return;
      if (payload === '[DONE]') {
        handler.done();
        return;
      }

      const chunk = parseJsonChunk(ctx, payload, cloudflareChunkSchema);
      if (chunk.usage) {
        handler.details.input_tokens = chunk.usage.prompt_tokens;
        handler.details.output_tokens = chunk.usage.completion_tokens;
      }
      if (chunk.response) handler.push(chunk.response);
    });
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const body: Record<string, unknown> = {
      messages: data.messages.map((m) => ({ role: m.role, content: messageText(m) })),
      stream: data.stream,
    };
    if (data.temperature !== undefined) body['temperature'] = data.temperature;
    if (data.top_p !== undefined) body['top_p'] = data.top_p;
    if (this.model.maxOutputTokens !== undefined) body['max_tokens'] = this.model.maxOutputTokens;

    return this.call(`${CLOUDFLARE_API_BASE}/accounts/${this.accountId}/ai/run/${this.model.name}`, {
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: this.withExtraFields(body),
      signal,
    });
  }
}
