import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { type StreamContext, parseJsonChunk, readSseStream } from '../streaming/sseStream.js';
import { BaseProviderClient, type ClientOptions, type SamplingLimits } from './base.js';

const CLAUDE_API_BASE = 'https://api.anthropic.com/v1';
const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 4096;

export const CLAUDE_SAMPLING_LIMITS: SamplingLimits = {
  temperature: [0, 1],
  topP: [0, 1],
};

interface ClaudeMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ClaudeRequest {
  model?: string;
  anthropic_version?: string;
  messages: ClaudeMessage[];
  system?: string;
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  stream?: boolean;
}

export const claudeResponseSchema = z.object({
  id: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export const claudeEventSchema = z.object({
  type: z.string(),
  message: z
    .object({
      id: z.string().optional(),
      usage: z.object({ input_tokens: z.number().optional() }).optional(),
    })
    .optional(),
  delta: z
    .object({
      type: z.string().optional(),
      text: z.string().optional(),
    })
    .optional(),
  usage: z.object({ output_tokens: z.number().optional() }).optional(),
  error: z.object({ message: z.string() }).optional(),
});

/**
 * Translate canonical input into a Messages API body. System turns are
 * hoisted into the top-level `system` field.
 */
export function buildClaudeBody(data: SendData, model: Model): ClaudeRequest {
  const system = data.messages
    .filter((m) => m.role === 'system')
    .map((m) => messageText(m))
    .join('\n\n');

  const body: ClaudeRequest = {
    messages: data.messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({ role: m.role === 'assistant' ? 'assistant' : 'user', content: messageText(m) })),
    max_tokens: model.maxOutputTokens ?? DEFAULT_MAX_TOKENS,
  };

  if (system) body.system = system;
  if (data.temperature !== undefined) body.temperature = data.temperature;
  if (data.top_p !== undefined) body.top_p = data.top_p;

  return body;
}

export function claudeOutput(response: z.infer<typeof claudeResponseSchema>): CompletionOutput {
  return {
    text: response.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join(''),
    details: {
      id: response.id,
      input_tokens: response.usage?.input_tokens,
      output_tokens: response.usage?.output_tokens,
    },
  };
}

/**
 * Apply one Messages API stream event to the handler.
 *
 *   message_start       → id and input usage
 *   content_block_delta → text_delta
 *   message_delta       → output usage
 *   message_stop        → done
 *   error               → ProviderError
 */
export function applyClaudeEvent(ctx: StreamContext, event: z.infer<typeof claudeEventSchema>): void {
  switch (event.type) {
    case 'message_start':
      if (event.message?.id) ctx.handler.details.id = event.message.id;
      if (event.message?.usage?.input_tokens !== undefined) {
        ctx.handler.details.input_tokens = event.message.usage.input_tokens;
      }
      break;

    case 'content_block_delta':
      if (event.delta?.type === 'text_delta' && event.delta.text) {
        ctx.handler.push(event.delta.text);
      }
      break;

    case 'message_delta':
      if (event.usage?.output_tokens !== undefined) {
        ctx.handler.details.output_tokens = event.usage.output_tokens;
      }
      break;

    case 'message_stop':
      ctx.handler.done();
      break;

    case 'error':
      throw new ProviderError(ctx.provider, 500, event.error?.message ?? 'Stream error', event);

    default:
      break;
  }
}

/**
 * Anthropic Claude via the Messages API.
 */
export class ClaudeClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Claude>> {
  protected readonly samplingLimits = CLAUDE_SAMPLING_LIMITS;
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Claude>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    return claudeOutput(await this.readJson(response, claudeResponseSchema));
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const response = await this.request(data, signal);
    const ctx = this.streamContext(handler);

    await readSseStream(response.body, ctx, (message) => {
      if (!message.data.trim()) return;
      applyClaudeEvent(ctx, parseJsonChunk(ctx, message.data, claudeEventSchema));
    });
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const body: ClaudeRequest = { ...buildClaudeBody(data, this.model), model: this.model.name };
    if (data.stream) body.stream = true;

    return this.call(`${this.config.api_base ?? CLAUDE_API_BASE}/messages`, {
      headers: {
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: this.withExtraFields(body),
      signal,
    });
  }
}
