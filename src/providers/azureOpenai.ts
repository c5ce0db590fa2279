import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { BaseProviderClient, type ClientOptions } from './base.js';
import { buildOpenAIBody, openAIOutput, openAIResponseSchema, streamOpenAI } from './openai.js';

const DEFAULT_API_VERSION = '2024-02-01';

/**
 * Azure OpenAI. Model names are deployment names.
 */
export class AzureOpenAIClient extends BaseProviderClient<ClientConfigOf<ProviderKind.AzureOpenAI>> {
  private readonly apiBase: string;
  private readonly apiKey: string;

  constructor(config: ClientConfigOf<ProviderKind.AzureOpenAI>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.apiBase = this.required(config.api_base, 'api_base');
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
    const base = this.apiBase.replace(/\/$/, '');
    const version = this.config.api_version ?? DEFAULT_API_VERSION;
    const url = `${base}/openai/deployments/${encodeURIComponent(this.model.name)}/chat/completions?api-version=${version}`;

    return this.call(url, {
      headers: { 'api-key': this.apiKey },
      body: this.withExtraFields(buildOpenAIBody(data, this.model)),
      signal,
    });
  }
}
