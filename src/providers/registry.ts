import { ProviderKind } from '../types/provider.js';
import { type GatewayConfig } from '../core/GatewayConfig.js';
import { type Model } from '../core/Model.js';
import { type ClientOptions, type ProviderClient } from './base.js';
import { OpenAIClient } from './openai.js';
import { OpenAICompatibleClient } from './openaiCompatible.js';
import { AzureOpenAIClient } from './azureOpenai.js';
import { GeminiClient } from './gemini.js';
import { VertexAIClient } from './vertexai.js';
import { ClaudeClient } from './claude.js';
import { CohereClient } from './cohere.js';
import { OllamaClient } from './ollama.js';
import { BedrockClient } from './bedrock.js';
import { CloudflareClient } from './cloudflare.js';
import { ReplicateClient } from './replicate.js';
import { ErnieClient } from './ernie.js';
import { QianwenClient } from './qianwen.js';

export type ClientFactory = (config: GatewayConfig, options: ClientOptions) => ProviderClient;

/**
 * Build the client for the config's selected model. The client is bound to
 * the config's model instance, so per-request overrides stay on the snapshot.
 */
export const initClient: ClientFactory = (config, options) => {
  const model: Model = config.model;
  const client = config.clientFor(model);

  switch (client.type) {
    case ProviderKind.OpenAI:
      return new OpenAIClient(client, model, options);
    case ProviderKind.OpenAICompatible:
      return new OpenAICompatibleClient(client, model, options);
    case ProviderKind.AzureOpenAI:
      return new AzureOpenAIClient(client, model, options);
    case ProviderKind.Gemini:
      return new GeminiClient(client, model, options);
    case ProviderKind.VertexAI:
      return new VertexAIClient(client, model, options);
    case ProviderKind.Claude:
      return new ClaudeClient(client, model, options);
    case ProviderKind.Cohere:
      return new CohereClient(client, model, options);
    case ProviderKind.Ollama:
      return new OllamaClient(client, model, options);
    case ProviderKind.Bedrock:
      return new BedrockClient(client, model, options);
    case ProviderKind.Cloudflare:
      return new CloudflareClient(client, model, options);
    case ProviderKind.Replicate:
      return new ReplicateClient(client, model, options);
    case ProviderKind.Ernie:
      return new ErnieClient(client, model, options);
    case ProviderKind.Qianwen:
      return new QianwenClient(client, model, options);
  }
};
