import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { readSseStream } from '../streaming/sseStream.js';
import { formatPrompt, selectPromptFormat } from '../utils/promptFormat.js';
import { BaseProviderClient, type ClientOptions } from './base.js';

const REPLICATE_API_BASE = 'https://api.replicate.com/v1';
const POLL_INTERVAL_MS = 500;
const TERMINAL_STATUSES = new Set(['succeeded', 'failed', 'canceled']);

const predictionSchema = z.object({
  id: z.string(),
  status: z.string(),
  urls: z.object({
    get: z.string(),
    stream: z.string().optional(),
  }),
  output: z.union([z.array(z.string()), z.string()]).nullish(),
  error: z.unknown().optional(),
  metrics: z
    .object({
      input_token_count: z.number().optional(),
      output_token_count: z.number().optional(),
    })
    .optional(),
});

type Prediction = z.infer<typeof predictionSchema>;

export function buildReplicateInput(data: SendData, model: Model): Record<string, unknown> {
  const input: Record<string, unknown> = {
    prompt: formatPrompt(data.messages, selectPromptFormat(model.name)),
    prompt_template: '{prompt}',
  };
  if (data.temperature !== undefined) input['temperature'] = data.temperature;
  if (data.top_p !== undefined) input['top_p'] = data.top_p;
  if (model.maxOutputTokens !== undefined) input['max_new_tokens'] = model.maxOutputTokens;
  return input;
}

/**
 * Replicate predictions. The buffered path polls the prediction until it
 * settles; the streaming path follows the prediction's `urls.stream` SSE feed
 * (`output`, `error` and `done` events).
 */
export class ReplicateClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Replicate>> {
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Replicate>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    let prediction = await this.createPrediction(data, signal);

    while (!TERMINAL_STATUSES.has(prediction.status)) {
      await sleep(POLL_INTERVAL_MS, undefined, { signal });
      const response = await this.call(prediction.urls.get, { headers: this.authHeaders(), signal });
      prediction = await this.readJson(response, predictionSchema);
    }

    if (prediction.status !== 'succeeded') {
      const reason = typeof prediction.error === 'string' ? prediction.error : `prediction ${prediction.status}`;
      throw new ProviderError(this.provider, 500, reason, prediction);
    }

    const output = prediction.output ?? '';
    return {
      text: Array.isArray(output) ? output.join('') : output,
      details: {
        id: prediction.id,
        input_tokens: prediction.metrics?.input_token_count,
        output_tokens: prediction.metrics?.output_token_count,
      },
    };
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const prediction = await this.createPrediction(data, signal);
    if (!prediction.urls.stream) {
      throw new ProviderError(this.provider, 500, `Model '${this.model.name}' does not support streaming`, prediction);
    }
    handler.details.id = prediction.id;

    const response = await this.call(prediction.urls.stream, {
      headers: { ...this.authHeaders(), Accept: 'text/event-stream', 'Cache-Control': 'no-store' },
      signal,
    });

    await readSseStream(response.body, this.streamContext(handler), (message) => {
      switch (message.event) {
        case 'output':
          handler.push(message.data);
          break;
        case 'error':
          throw new ProviderError(this.provider, 500, message.data || 'Replicate stream error', message.data);
        case 'done':
          handler.done();
          break;
        default:
          break;
      }
    });
  }

  private async createPrediction(data: SendData, signal: AbortSignal): Promise<Prediction> {
    const response: Dispatcher.ResponseData = await this.call(
      `${REPLICATE_API_BASE}/models/${this.model.name}/predictions`,
      {
        headers: this.authHeaders(),
        body: this.withExtraFields({
          input: buildReplicateInput(data, this.model),
          stream: data.stream,
        }),
        signal,
      }
    );
    return this.readJson(response, predictionSchema);
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }
}
