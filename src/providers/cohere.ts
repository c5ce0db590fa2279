import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError, RequestError, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { parseJsonChunk } from '../streaming/sseStream.js';
import { readJsonLines } from '../streaming/jsonLines.js';
import { BaseProviderClient, type ClientOptions, type SamplingLimits } from './base.js';

const COHERE_API_BASE = 'https://api.cohere.ai/v1';

interface CohereRequest {
  model: string;
  message: string;
  chat_history?: Array<{ role: 'USER' | 'CHATBOT'; message: string }>;
  preamble?: string;
  temperature?: number;
  p?: number;
  max_tokens?: number;
  stream: boolean;
}

const metaSchema = z.object({
  billed_units: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

const cohereResponseSchema = z.object({
  generation_id: z.string().optional(),
  text: z.string(),
  meta: metaSchema.optional(),
});

const cohereEventSchema = z.object({
  event_type: z.string(),
  generation_id: z.string().optional(),
  text: z.string().optional(),
  finish_reason: z.string().optional(),
  response: z.object({ meta: metaSchema.optional() }).optional(),
});

/**
 * Cohere's chat endpoint: the last turn is `message`, earlier turns go in
 * `chat_history`, system turns become the `preamble`.
 */
export function buildCohereBody(data: SendData, model: Model): CohereRequest {
  const system = data.messages.filter((m) => m.role === 'system').map((m) => messageText(m));
  const turns = data.messages.filter((m) => m.role !== 'system');
  const last = turns[turns.length - 1];
  if (!last) {
    throw new RequestError('At least one user or assistant message is required');
  }

  const body: CohereRequest = {
    model: model.name,
    message: messageText(last),
    stream: data.stream,
  };

  const history = turns.slice(0, -1).map((m) => ({
    role: m.role === 'assistant' ? ('CHATBOT' as const) : ('USER' as const),
    message: messageText(m),
  }));
  if (history.length > 0) body.chat_history = history;
  if (system.length > 0) body.preamble = system.join('\n\n');
  if (data.temperature !== undefined) body.temperature = data.temperature;
  if (data.top_p !== undefined) body.p = data.top_p;
  if (model.maxOutputTokens !== undefined) body.max_tokens = model.maxOutputTokens;

  return body;
}

/**
 * Cohere chat. Streams newline-delimited JSON events terminated by
 * `stream-end`.
 */
export class CohereClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Cohere>> {
  protected readonly samplingLimits: SamplingLimits = { temperature: [0, 1], topP: [0, 1] };
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Cohere>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    const body = await this.readJson(response, cohereResponseSchema);
    return {
      text: body.text,
      details: {
        id: body.generation_id,
        input_tokens: body.meta?.billed_units?.input_tokens,
        output_tokens: body.meta?.billed_units?.output_tokens,
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
      const event = parseJsonChunk(ctx, line, cohereEventSchema);
      switch (event.event_type) {
        case 'stream-start':
          if (event.generation_id) handler.details.id = event.generation_id;
          break;
        case 'text-generation':
          if (event.text) handler.push(event.text);
          break;
        case 'stream-end': {
          if (event.finish_reason === 'ERROR') {
            throw new ProviderError(this.provider, 500, 'Cohere stream ended with an error', event);
          }
          const billed = event.response?.meta?.billed_units;
          handler.details.input_tokens = billed?.input_tokens;
          handler.details.output_tokens = billed?.output_tokens;
          handler.done();
          break;
        }
        default:
          break;
      }
    });
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    return this.call(`${this.config.api_base ?? COHERE_API_BASE}/chat`, {
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: this.withExtraFields(buildCohereBody(data, this.model)),
      signal,
    });
  }
}
