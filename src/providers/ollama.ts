import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { parseJsonChunk } from '../streaming/sseStream.js';
import { readJsonLines } from '../streaming/jsonLines.js';
import { BaseProviderClient, type ClientOptions } from './base.js';

interface OllamaRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  stream: boolean;
  options: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
  };
}

const ollamaResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export function buildOllamaBody(data: SendData, model: Model): OllamaRequest {
  const body: OllamaRequest = {
    model: model.name,
    messages: data.messages.map((m) => ({ role: m.role, content: messageText(m) })),
    stream: data.stream,
    options: {},
  };

  if (data.temperature !== undefined) body.options.temperature = data.temperature;
  if (data.top_p !== undefined) body.options.top_p = data.top_p;
  if (model.maxOutputTokens !== undefined) body.options.num_predict = model.maxOutputTokens;

  return body;
}

/**
 * Local models served by Ollama. Streams JSON lines; the last one carries
 * `done: true` and the token counters.
 */
export class OllamaClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Ollama>> {
  private readonly apiBase: string;

  constructor(config: ClientConfigOf<ProviderKind.Ollama>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiBase = this.required(config.api_base, 'api_base');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    const body = await this.readJson(response, ollamaResponseSchema);
    if (body.error) throw new ProviderError(this.provider, response.statusCode, body.error, body);

    return {
      text: body.message?.content ?? '',
      details: {
        input_tokens: body.prompt_eval_count,
        output_tokens: body.eval_count,
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

    await readJsonLines(response.body, ctx, (line) => {
      const chunk = parseJsonChunk(ctx, line, ollamaResponseSchema);
      if (chunk.error) throw new ProviderError(this.provider, 500, chunk.error, chunk);

      if (chunk.message?.content) handler.push(chunk.message.content);
      if (chunk.done) {
        handler.details.input_tokens = chunk.prompt_eval_count;
        handler.details.output_tokens = chunk.eval_count;
        handler.done();
      }
    });
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const endpoint = this.config.chat_endpoint ?? '/api/chat';
    const headers: Record<string, string> = {};
    if (this.config.api_auth) headers['Authorization'] = this.config.api_auth;

    return this.call(`${this.apiBase.replace(/\/$/, '')}${endpoint}`, {
      headers,
      body: this.withExtraFields(buildOllamaBody(data, this.model)),
      signal,
    });
  }
}
