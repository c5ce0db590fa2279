import { z } from 'zod';

export enum ProviderKind {
  OpenAI = 'openai',
  OpenAICompatible = 'openai-compatible',
  Gemini = 'gemini',
  Claude = 'claude',
  Cohere = 'cohere',
  Ollama = 'ollama',
  AzureOpenAI = 'azure-openai',
  VertexAI = 'vertexai',
  Bedrock = 'bedrock',
  Cloudflare = 'cloudflare',
  Replicate = 'replicate',
  Ernie = 'ernie',
  Qianwen = 'qianwen',
}

export const modelConfigSchema = z.object({
  name: z.string().min(1),
  max_input_tokens: z.number().int().positive().optional(),
  max_output_tokens: z.number().int().positive().optional(),
  extra_fields: z.record(z.unknown()).optional(),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

const blockThreshold = z.enum([
  'BLOCK_NONE',
  'BLOCK_ONLY_HIGH',
  'BLOCK_MEDIUM_AND_ABOVE',
  'BLOCK_LOW_AND_ABOVE',
]);

const common = {
  name: z.string().min(1).optional(),
  models: z.array(modelConfigSchema).optional(),
  extra: z
    .object({
      connect_timeout: z.number().positive().optional(),
    })
    .optional(),
};

export const clientConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(ProviderKind.OpenAI),
    ...common,
    api_key: z.string().optional(),
    api_base: z.string().url().optional(),
    organization_id: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.OpenAICompatible),
    ...common,
    api_key: z.string().optional(),
    api_base: z.string().url().optional(),
    chat_endpoint: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Gemini),
    ...common,
    api_key: z.string().optional(),
    api_base: z.string().url().optional(),
    block_threshold: blockThreshold.optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Claude),
    ...common,
    api_key: z.string().optional(),
    api_base: z.string().url().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Cohere),
    ...common,
    api_key: z.string().optional(),
    api_base: z.string().url().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Ollama),
    ...common,
    api_base: z.string().url().optional(),
    api_auth: z.string().optional(),
    chat_endpoint: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.AzureOpenAI),
    ...common,
    api_base: z.string().url().optional(),
    api_key: z.string().optional(),
    api_version: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.VertexAI),
    ...common,
    project_id: z.string().optional(),
    location: z.string().optional(),
    access_token: z.string().optional(),
    block_threshold: blockThreshold.optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Bedrock),
    ...common,
    access_key_id: z.string().optional(),
    secret_access_key: z.string().optional(),
    session_token: z.string().optional(),
    region: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Cloudflare),
    ...common,
    account_id: z.string().optional(),
    api_key: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Replicate),
    ...common,
    api_key: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Ernie),
    ...common,
    api_key: z.string().optional(),
    secret_key: z.string().optional(),
  }),
  z.object({
    type: z.literal(ProviderKind.Qianwen),
    ...common,
    api_key: z.string().optional(),
  }),
]);

export type ClientConfig = z.infer<typeof clientConfigSchema>;

/**
 * Narrow a client config union to the variant of one provider kind.
 */
export type ClientConfigOf<K extends ProviderKind> = Extract<ClientConfig, { type: K }>;

/**
 * Credential/endpoint fields that may be supplied through the environment
 * as `<CLIENT_NAME>_<FIELD>`.
 */
export const ENV_FIELDS: Record<ProviderKind, readonly string[]> = {
  [ProviderKind.OpenAI]: ['api_key', 'api_base', 'organization_id'],
  [ProviderKind.OpenAICompatible]: ['api_key', 'api_base'],
  [ProviderKind.Gemini]: ['api_key'],
  [ProviderKind.Claude]: ['api_key'],
  [ProviderKind.Cohere]: ['api_key'],
  [ProviderKind.Ollama]: ['api_base', 'api_auth'],
  [ProviderKind.AzureOpenAI]: ['api_base', 'api_key'],
  [ProviderKind.VertexAI]: ['project_id', 'location', 'access_token'],
  [ProviderKind.Bedrock]: ['access_key_id', 'secret_access_key', 'session_token', 'region'],
  [ProviderKind.Cloudflare]: ['account_id', 'api_key'],
  [ProviderKind.Replicate]: ['api_key'],
  [ProviderKind.Ernie]: ['api_key', 'secret_key'],
  [ProviderKind.Qianwen]: ['api_key'],
};

/**
 * Providers that host arbitrary models, so a model id that is not in the
 * client's list is still callable.
 */
export const OPEN_MODEL_PROVIDERS: ReadonlySet<ProviderKind> = new Set([
  ProviderKind.OpenAICompatible,
  ProviderKind.Ollama,
  ProviderKind.AzureOpenAI,
  ProviderKind.Cloudflare,
  ProviderKind.Replicate,
  ProviderKind.Bedrock,
]);

/**
 * Well-known OpenAI-compatible platforms and their API base URLs.
 */
export const OPENAI_COMPATIBLE_PLATFORMS: Readonly<Record<string, string>> = {
  anyscale: 'https://api.endpoints.anyscale.com/v1',
  deepinfra: 'https://api.deepinfra.com/v1/openai',
  fireworks: 'https://api.fireworks.ai/inference/v1',
  groq: 'https://api.groq.com/openai/v1',
  mistral: 'https://api.mistral.ai/v1',
  moonshot: 'https://api.moonshot.cn/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  octoai: 'https://text.octoai.run/v1',
  perplexity: 'https://api.perplexity.ai',
  together: 'https://api.together.xyz/v1',
};

/**
 * Name a client is addressed by in model ids: its configured name, else its type.
 */
export function clientName(config: ClientConfig): string {
  return config.name ?? config.type;
}
