import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { parseJsonChunk, readSseStream } from '../streaming/sseStream.js';
import { BaseProviderClient, type ClientOptions } from './base.js';

const DASHSCOPE_URL = 'https://dashscope.aliyuncs.com/api/v1/services/aigc/text-generation/generation';

const qianwenResponseSchema = z.object({
  request_id: z.string().optional(),
  output: z.object({
    choices: z
      .array(
        z.object({
          message: z.object({ content: z.string().nullish() }),
          finish_reason: z.string().nullish(),
        })
      )
      .default([]),
  }),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

const qianwenErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

export interface QianwenRequest {
  model: string;
  input: { messages: Array<{ role: string; content: string }> };
  parameters: {
    result_format: 'message';
    temperature?: number;
    top_p?: number;
    max_tokens?: number;
    incremental_output?: boolean;
  };
}

export function buildQianwenBody(data: SendData, model: Model): QianwenRequest {
  const body: QianwenRequest = {
    model: model.name,
    input: {
      messages: data.messages.map((m) => ({ role: m.role, content: messageText(m) })),
    },
    parameters: { result_format: 'message' },
  };

  if (data.temperature !== undefined) body.parameters.temperature = data.temperature;
  if (data.top_p !== undefined) body.parameters.top_p = data.top_p;
  if (model.maxOutputTokens !== undefined) body.parameters.max_tokens = model.maxOutputTokens;
  if (data.stream) body.parameters.incremental_output = true;
  return body;
}

// DashScope reports the literal string "null" until the final chunk.
function isFinished(reason: string | null | undefined): boolean {
  return !!reason && reason !== 'null';
}

/**
 * Alibaba Qianwen through DashScope's text-generation API.
 */
export class QianwenClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Qianwen>> {
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Qianwen>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    const body = await this.readJson(response, qianwenResponseSchema);
    return {
      text: body.output.choices[0]?.message.content ?? '',
      details: {
        id: body.request_id,
        input_tokens: body.usage?.input_tokens,
        output_tokens: body.usage?.output_tokens,
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
      if (message.event === 'error') {
        const error = parseJsonChunk(ctx, message.data, qianwenErrorSchema);
        throw new ProviderError(this.provider, 500, error.message ?? error.code ?? 'qianwen stream error', error);
      }

      const chunk = parseJsonChunk(ctx, message.data, qianwenResponseSchema);
      if (chunk.request_id) handler.details.id = chunk.request_id;
      if (chunk.usage) {
        handler.details.input_tokens = chunk.usage.input_tokens;
        handler.details.output_tokens = chunk.usage.output_tokens;
      }

      const choice = chunk.output.choices[0];
      if (choice?.message.content) handler.push(choice.message.content);
      if (isFinished(choice?.finish_reason)) handler.done();
    });
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (data.stream) headers['X-DashScope-SSE'] = 'enable';

    return this.call(DASHSCOPE_URL, {
      headers,
      body: this.withExtraFields(buildQianwenBody(data, this.model)),
      signal,
    });
  }
}
