import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind, OPENAI_COMPATIBLE_PLATFORMS } from '../types/provider.js';
import { type CompletionOutput, type SendData } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { BaseProviderClient, type ClientOptions } from './base.js';
import { buildOpenAIBody, openAIOutput, openAIResponseSchema, streamOpenAI } from './openai.js';

/**
 * Any platform exposing OpenAI's chat-completions API. Well-known platforms
 * (groq, mistral, openrouter, ...) only need their name and an API key.
 */
export class OpenAICompatibleClient extends BaseProviderClient<
  ClientConfigOf<ProviderKind.OpenAICompatible>
> {
  private readonly apiBase: string;

  constructor(
    config: ClientConfigOf<ProviderKind.OpenAICompatible>,
    model: Model,
    options?: ClientOptions
  ) {
    super(config, model, options);
    const platformBase = config.name ? OPENAI_COMPATIBLE_PLATFORMS[config.name] : undefined;
    this.apiBase = this.required(config.api_base ?? platformBase, 'api_base');
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
    const endpoint = this.config.chat_endpoint ?? '/chat/completions';
    const headers: Record<string, string> = {};
    if (this.config.api_key) headers['Authorization'] = `Bearer ${this.config.api_key}`;

    return this.call(`${this.apiBase.replace(/\/$/, '')}${endpoint}`, {
      headers,
      body: this.withExtraFields(buildOpenAIBody(data, this.model)),
      signal,
    });
  }
}
