import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { BaseProviderClient, type ClientOptions } from './base.js';
import { buildGeminiBody, geminiOutput, geminiResponseSchema, streamGemini } from './gemini.js';

/**
 * Gemini models served by Google Cloud VertexAI. Authenticates with an OAuth
 * access token supplied by configuration.
 */
export class VertexAIClient extends BaseProviderClient<ClientConfigOf<ProviderKind.VertexAI>> {
  private readonly projectId: string;
  private readonly location: string;
  private readonly accessToken: string;

  constructor(config: ClientConfigOf<ProviderKind.VertexAI>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.projectId = this.required(config.project_id, 'project_id');
    this.location = this.required(config.location, 'location');
    this.accessToken = this.required(config.access_token, 'access_token');
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
    const base =
      `https://${this.location}-aiplatform.googleapis.com/v1/projects/${this.projectId}` +
      `/locations/${this.location}/publishers/google/models/${this.model.name}`;
    const url = data.stream ? `${base}:streamGenerateContent?alt=sse` : `${base}:generateContent`;

    return this.call(url, {
      headers: { Authorization: `Bearer ${this.accessToken}` },
      body: this.withExtraFields(buildGeminiBody(data, this.model, this.config.block_threshold)),
      signal,
    });
  }
}
