import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { parseJsonChunk, readSseStream } from '../streaming/sseStream.js';
import { normalizeHeaders } from '../utils/headers.js';
import { BaseProviderClient, type ClientOptions, type SamplingLimits } from './base.js';

const TOKEN_URL = 'https://aip.baidubce.com/oauth/2.0/token';
const CHAT_BASE = 'https://aip.baidubce.com/rpc/2.0/ai_custom/v1/wenxinworkshop/chat';

// Refresh a little before the server-side expiry.
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const MODEL_ENDPOINTS: Record<string, string> = {
  'ernie-4.0-8k': 'completions_pro',
  'ernie-3.5-8k': 'completions',
  'ernie-speed-128k': 'ernie-speed-128k',
  'ernie-lite-8k': 'ernie-lite-8k',
};

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
});

const ernieResponseSchema = z.object({
  id: z.string().optional(),
  result: z.string().optional(),
  is_end: z.boolean().optional(),
  usage: usageSchema.optional(),
  error_code: z.number().optional(),
  error_msg: z.string().optional(),
});

type ErnieResponse = z.infer<typeof ernieResponseSchema>;

interface CachedToken {
  value: string;
  expiresAt: number;
}

const tokenCache = new Map<string, CachedToken>();

/** Drop every cached access token. */
export function clearErnieTokens(): void {
  tokenCache.clear();
}

export function ernieEndpoint(modelName: string): string {
  return MODEL_ENDPOINTS[modelName] ?? modelName;
}

export interface ErnieRequest {
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  system?: string;
  temperature?: number;
  top_p?: number;
  max_output_tokens?: number;
  stream: boolean;
}

export function buildErnieBody(data: SendData, model: Model): ErnieRequest {
  const system: string[] = [];
  const messages: ErnieRequest['messages'] = [];

  for (const message of data.messages) {
    if (message.role === 'system') {
      system.push(messageText(message));
    } else {
      messages.push({ role: message.role, content: messageText(message) });
    }
  }

  const body: ErnieRequest = { messages, stream: data.stream };
  if (system.length > 0) body.system = system.join('\n\n');
  if (data.temperature !== undefined) body.temperature = data.temperature;
  if (data.top_p !== undefined) body.top_p = data.top_p;
  if (model.maxOutputTokens !== undefined) body.max_output_tokens = model.maxOutputTokens;
  return body;
}

/**
 * Baidu ERNIE (Qianfan). Every call first exchanges `api_key`/`secret_key`
 * for an access token, cached until shortly before it expires.
 */
export class ErnieClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Ernie>> {
  protected readonly samplingLimits: SamplingLimits = { temperature: [0, 1], topP: [0, 1] };
  private readonly apiKey: string;
  private readonly secretKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Ernie>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
    this.secretKey = this.required(config.secret_key, 'secret_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    const body = this.checked(await this.readJson(response, ernieResponseSchema));
    return {
      text: body.result ?? '',
      details: {
        id: body.id,
        input_tokens: body.usage?.prompt_tokens,
        output_tokens: body.usage?.completion_tokens,
      },
    };
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const response = await this.request(data, signal);

    // Errors come back as a plain JSON body even on streaming calls.
    const contentType = normalizeHeaders(response.headers)['content-type'] ?? '';
    if (contentType.includes('application/json')) {
      this.checked(await this.readJson(response, ernieResponseSchema));
      throw new ProviderError(this.provider, response.statusCode, 'Expected an event stream from ernie');
    }

    const ctx = this.streamContext(handler);
    await readSseStream(response.body, ctx, (message) => {
      const chunk = this.checked(parseJsonChunk(ctx, message.data, ernieResponseSchema));
      if (chunk.id) handler.details.id = chunk.id;
      if (chunk.result) handler.push(chunk.result);
      if (chunk.is_end) {
        if (chunk.usage) {
          handler.details.input_tokens = chunk.usage.prompt_tokens;
          handler.details.output_tokens = chunk.usage.completion_tokens;
        }
        handler.done();
      }
    });
  }

  private async request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const token = await this.accessToken(signal);
    const url = `${CHAT_BASE}/${ernieEndpoint(this.model.name)}?access_token=${encodeURIComponent(token)}`;
    return this.call(url, {
      body: this.withExtraFields(buildErnieBody(data, this.model)),
      signal,
    });
  }

  private async accessToken(signal: AbortSignal): Promise<string> {
    const key = `${this.apiKey}:${this.secretKey}`;
    const cached = tokenCache.get(key);
    if (cached && cached.expiresAt > Date.now()) return cached.value;

    const query = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.apiKey,
      client_secret: this.secretKey,
    });
    const response = await this.call(`${TOKEN_URL}?${query.toString()}`, { method: 'POST', signal });
    const token = await this.readJson(response, tokenSchema);

    tokenCache.set(key, {
      value: token.access_token,
      expiresAt: Date.now() + token.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    });
    this.logger?.debug({ provider: this.provider }, 'fetched access token');
    return token.access_token;
  }

  private checked(body: ErnieResponse): ErnieResponse {
    if (body.error_code !== undefined) {
      throw new ProviderError(this.provider, 400, body.error_msg ?? `ernie error ${body.error_code}`, body);
    }
    return body;
  }
}
