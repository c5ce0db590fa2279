import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ProviderError, messageText } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { type StreamContext, parseJsonChunk, readSseStream } from '../streaming/sseStream.js';
import { BaseProviderClient, type ClientOptions } from './base.js';

const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

const SAFETY_CATEGORIES = [
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
] as const;

interface GeminiPart {
  text: string;
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

export interface GeminiRequest {
  contents: GeminiContent[];
  systemInstruction?: { parts: GeminiPart[] };
  generationConfig?: {
    temperature?: number;
    topP?: number;
    maxOutputTokens?: number;
  };
  safetySettings?: Array<{ category: string; threshold: string }>;
}

export const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});

type GeminiResponse = z.infer<typeof geminiResponseSchema>;

/**
 * Translate canonical input into a generateContent body. Shared with VertexAI.
 */
export function buildGeminiBody(
  data: SendData,
  model: Model,
  blockThreshold?: string
): GeminiRequest {
  const system = data.messages
    .filter((m) => m.role === 'system')
    .map((m) => messageText(m))
    .filter(Boolean);

  const body: GeminiRequest = {
    contents: data.messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: messageText(m) }],
      })),
  };

  if (system.length > 0) {
    body.systemInstruction = { parts: [{ text: system.join('\n\n') }] };
  }

  const generationConfig: NonNullable<GeminiRequest['generationConfig']> = {};
  if (data.temperature !== undefined) generationConfig.temperature = data.temperature;
  if (data.top_p !== undefined) generationConfig.topP = data.top_p;
  if (model.maxOutputTokens !== undefined) generationConfig.maxOutputTokens = model.maxOutputTokens;
  if (Object.keys(generationConfig).length > 0) body.generationConfig = generationConfig;

  if (blockThreshold) {
    body.safetySettings = SAFETY_CATEGORIES.map((category) => ({ category, threshold: blockThreshold }));
  }

  return body;
}

function candidateText(response: GeminiResponse): string {
  return (response.candidates?.[0]?.content?.parts ?? []).map((p) => p.text ?? '').join('');
}

function assertNotBlocked(provider: string, response: GeminiResponse): void {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason && !response.candidates?.length) {
    throw new ProviderError(provider, 400, `Prompt blocked by ${provider}: ${blockReason}`, response);
  }
}

export function geminiOutput(provider: string, response: GeminiResponse): CompletionOutput {
  assertNotBlocked(provider, response);
  return {
    text: candidateText(response),
    details: {
      input_tokens: response.usageMetadata?.promptTokenCount,
      output_tokens: response.usageMetadata?.candidatesTokenCount,
    },
  };
}

/**
 * Feed a `streamGenerateContent?alt=sse` body to the handler. The stream has
 * no sentinel: it ends when the body closes.
 */
export async function streamGemini(response: Dispatcher.ResponseData, ctx: StreamContext): Promise<void> {
  await readSseStream(response.body, ctx, (message) => {
    if (!message.data.trim()) return;

    const chunk = parseJsonChunk(ctx, message.data, geminiResponseSchema);
    assertNotBlocked(ctx.provider, chunk);
    if (chunk.usageMetadata) {
      ctx.handler.details.input_tokens = chunk.usageMetadata.promptTokenCount;
      ctx.handler.details.output_tokens = chunk.usageMetadata.candidatesTokenCount;
    }

    const text = candidateText(chunk);
    if (text) ctx.handler.push(text);
  });
}

/**
 * Google Gemini via the Generative Language API.
 */
export class GeminiClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Gemini>> {
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.Gemini>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiKey = this.required(config.api_key, 'api_key');
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    return geminiOutput(this.provider, await this.readJson(response, geminiResponseSchema));
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const response = await this.request(data, signal);
    await streamGemini(response, this.streamContext(handler));
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const base = this.config.api_base ?? GEMINI_API_BASE;
    const url = data.stream
      ? `${base}/models/${this.model.name}:streamGenerateContent?alt=sse&key=${this.apiKey}`
      : `${base}/models/${this.model.name}:generateContent?key=${this.apiKey}`;

    return this.call(url, {
      body: this.withExtraFields(buildGeminiBody(data, this.model, this.config.block_threshold)),
      signal,
    });
  }
}
