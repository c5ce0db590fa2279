import { z } from 'zod';
import { type Dispatcher } from 'undici';
import { type ClientConfigOf, type ProviderKind } from '../types/provider.js';
import { type CompletionOutput, type SendData, ConfigError, ProviderError } from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { type StreamContext, parseJsonChunk } from '../streaming/sseStream.js';
import { type EventStreamMessage, readEventStream } from '../streaming/eventStream.js';
import { type AwsCredentials, signRequest } from '../utils/sigv4.js';
import { normalizeHeaders } from '../utils/headers.js';
import { LLAMA3_PROMPT_FORMAT, LLAMA2_PROMPT_FORMAT, formatPrompt } from '../utils/promptFormat.js';
import { BaseProviderClient, type ClientOptions, type SamplingLimits } from './base.js';
import { applyClaudeEvent, buildClaudeBody, claudeEventSchema, claudeOutput, claudeResponseSchema } from './claude.js';

const BEDROCK_ANTHROPIC_VERSION = 'bedrock-2023-05-31';

type ModelFamily = 'anthropic' | 'meta' | 'mistral';

const invocationMetricsSchema = z
  .object({
    inputTokenCount: z.number().optional(),
    outputTokenCount: z.number().optional(),
  })
  .optional();

const llamaChunkSchema = z.object({
  generation: z.string().default(''),
  prompt_token_count: z.number().nullish(),
  generation_token_count: z.number().nullish(),
  stop_reason: z.string().nullish(),
  'amazon-bedrock-invocationMetrics': invocationMetricsSchema,
});

const mistralChunkSchema = z.object({
  outputs: z.array(
    z.object({
      text: z.string(),
      stop_reason: z.string().nullish(),
    })
  ),
  'amazon-bedrock-invocationMetrics': invocationMetricsSchema,
});

const eventPayloadSchema = z.object({ bytes: z.string() });
const exceptionPayloadSchema = z.object({ message: z.string().optional() });

function modelFamily(modelName: string): ModelFamily | null {
  if (modelName.startsWith('anthropic.')) return 'anthropic';
  if (modelName.startsWith('meta.')) return 'meta';
  if (modelName.startsWith('mistral.')) return 'mistral';
  return null;
}

/**
 * Build the model-family specific invoke body.
 */
export function buildBedrockBody(data: SendData, model: Model, family: ModelFamily): object {
  const sampling = {
    ...(data.temperature !== undefined ? { temperature: data.temperature } : {}),
    ...(data.top_p !== undefined ? { top_p: data.top_p } : {}),
  };

  switch (family) {
    case 'anthropic':
      return { ...buildClaudeBody(data, model), anthropic_version: BEDROCK_ANTHROPIC_VERSION };
    case 'meta':
      return {
        prompt: formatPrompt(data.messages, LLAMA3_PROMPT_FORMAT),
        ...(model.maxOutputTokens !== undefined ? { max_gen_len: model.maxOutputTokens } : {}),
        ...sampling,
      };
    case 'mistral':
      return {
        prompt: formatPrompt(data.messages, LLAMA2_PROMPT_FORMAT),
        ...(model.maxOutputTokens !== undefined ? { max_tokens: model.maxOutputTokens } : {}),
        ...sampling,
      };
  }
}

/**
 * Amazon Bedrock. Requests are SigV4-signed; streaming responses use the AWS
 * event-stream binary framing, each event carrying a base64 JSON chunk in
 * the model family's own format.
 */
export class BedrockClient extends BaseProviderClient<ClientConfigOf<ProviderKind.Bedrock>> {
  protected readonly samplingLimits: SamplingLimits = { temperature: [0, 1], topP: [0, 1] };
  private readonly credentials: AwsCredentials;
  private readonly region: string;
  private readonly family: ModelFamily;

  constructor(config: ClientConfigOf<ProviderKind.Bedrock>, model: Model, options?: ClientOptions) {
    super(config, model, options);
    this.credentials = {
      accessKeyId: this.required(config.access_key_id, 'access_key_id'),
      secretAccessKey: this.required(config.secret_access_key, 'secret_access_key'),
      sessionToken: config.session_token,
    };
    this.region = this.required(config.region, 'region');

    const family = modelFamily(model.name);
    if (!family) {
      throw new ConfigError(`Unsupported bedrock model '${model.name}'`);
    }
    this.family = family;
  }

  protected async sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    const response = await this.request(data, signal);
    const headers = normalizeHeaders(response.headers);
    const usage = {
      input_tokens: optionalInt(headers['x-amzn-bedrock-input-token-count']),
      output_tokens: optionalInt(headers['x-amzn-bedrock-output-token-count']),
    };

    switch (this.family) {
      case 'anthropic': {
        const output = claudeOutput(await this.readJson(response, claudeResponseSchema));
        return {
          text: output.text,
          details: {
            id: output.details.id,
            input_tokens: output.details.input_tokens ?? usage.input_tokens,
            output_tokens: output.details.output_tokens ?? usage.output_tokens,
          },
        };
      }
      case 'meta': {
        const body = await this.readJson(response, llamaChunkSchema);
        return {
          text: body.generation,
          details: {
            input_tokens: body.prompt_token_count ?? usage.input_tokens,
            output_tokens: body.generation_token_count ?? usage.output_tokens,
          },
        };
      }
      case 'mistral': {
        const body = await this.readJson(response, mistralChunkSchema);
        return { text: body.outputs.map((o) => o.text).join(''), details: usage };
      }
    }
  }

  protected async sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void> {
    const response = await this.request(data, signal);
    const ctx = this.streamContext(handler);

    await readEventStream(response.body, ctx, (message) => {
      const chunk = this.decodeChunk(ctx, message);
      if (chunk !== null) this.applyChunk(ctx, chunk);
    });
  }

  private decodeChunk(ctx: StreamContext, message: EventStreamMessage): string | null {
    const payload = message.payload.toString('utf-8');

    if (message.headers[':message-type'] === 'exception') {
      const exception = parseJsonChunk(ctx, payload, exceptionPayloadSchema);
      throw new ProviderError(
        this.provider,
        500,
        exception.message ?? message.headers[':exception-type'] ?? 'Bedrock stream exception',
        payload
      );
    }
    if (message.headers[':event-type'] !== 'chunk') return null;

    const event = parseJsonChunk(ctx, payload, eventPayloadSchema);
    return Buffer.from(event.bytes, 'base64').toString('utf-8');
  }

  private applyChunk(ctx: StreamContext, chunk: string): void {
    const { handler } = ctx;

    switch (this.family) {
      case 'anthropic':
        applyClaudeEvent(ctx, parseJsonChunk(ctx, chunk, claudeEventSchema));
        break;

      case 'meta': {
        const event = parseJsonChunk(ctx, chunk, llamaChunkSchema);
        handler.push(event.generation);
        if (event.stop_reason) {
          const metrics = event['amazon-bedrock-invocationMetrics'];
          handler.details.input_tokens = metrics?.inputTokenCount ?? event.prompt_token_count ?? undefined;
          handler.details.output_tokens = metrics?.outputTokenCount ?? event.generation_token_count ?? undefined;
          handler.done();
        }
        break;
      }

      case 'mistral': {
        const event = parseJsonChunk(ctx, chunk, mistralChunkSchema);
        const output = event.outputs[0];
        if (output) handler.push(output.text);
        if (output?.stop_reason) {
          const metrics = event['amazon-bedrock-invocationMetrics'];
          handler.details.input_tokens = metrics?.inputTokenCount;
          handler.details.output_tokens = metrics?.outputTokenCount;
          handler.done();
        }
        break;
      }
    }
  }

  private request(data: SendData, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    const action = data.stream ? 'invoke-with-response-stream' : 'invoke';
    const url =
      `https://bedrock-runtime.${this.region}.amazonaws.com` +
      `/model/${encodeURIComponent(this.model.name)}/${action}`;
    const body = this.withExtraFields(buildBedrockBody(data, this.model, this.family));

    const headers = signRequest(
      {
        method: 'POST',
        url,
        region: this.region,
        service: 'bedrock',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify(body),
      },
      this.credentials
    );

    return this.call(url, { headers, body, signal });
  }
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return isNaN(n) ? undefined : n;
}
