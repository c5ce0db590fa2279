import { Agent, request as undiciRequest, type Dispatcher } from 'undici';
import { type ZodType, type ZodTypeDef } from 'zod';
import { type ClientConfig, clientName } from '../types/provider.js';
import {
  type CompletionOutput,
  type SendData,
  ConfigError,
  ProviderError,
  RequestError,
} from '../types/request.js';
import { type Model } from '../core/Model.js';
import { type SseHandler } from '../streaming/SseHandler.js';
import { type StreamContext } from '../streaming/sseStream.js';
import { normalizeHeaders } from '../utils/headers.js';

export interface ClientLogger {
  warn(obj: Record<string, unknown>, msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
}

/**
 * Contract shared by every vendor client.
 */
export interface ProviderClient {
  /** Name of the configured client (its `name`, else its type). */
  readonly provider: string;
  readonly model: Model;

  /** Override the bound model's output limit for this request only. */
  setMaxOutputTokens(value: number | undefined): void;

  /**
   * One buffered round trip: returns the assembled answer and usage.
   */
  send(data: SendData, signal: AbortSignal): Promise<CompletionOutput>;

  /**
   * Issue the vendor's streaming call and feed every delta to `handler`.
   * Resolves once the upstream stream ends; stops reading as soon as
   * `signal` aborts.
   */
  sendStreaming(data: SendData, handler: SseHandler, signal: AbortSignal): Promise<void>;
}

export interface ClientOptions {
  logger?: ClientLogger | undefined;
  connectTimeoutMs?: number | undefined;
}

type Range = readonly [min: number, max: number];

export interface SamplingLimits {
  temperature: Range;
  topP: Range;
}

export const DEFAULT_SAMPLING_LIMITS: SamplingLimits = {
  temperature: [0, 2],
  topP: [0, 1],
};

interface PostOptions {
  headers?: Record<string, string>;
  body?: unknown;
  method?: Dispatcher.HttpMethod;
  signal: AbortSignal;
}

const dispatchers = new Map<number, Agent>();

function dispatcherFor(connectTimeoutMs: number): Agent {
  let agent = dispatchers.get(connectTimeoutMs);
  if (!agent) {
    agent = new Agent({ connect: { timeout: connectTimeoutMs } });
    dispatchers.set(connectTimeoutMs, agent);
  }
  return agent;
}

function parseMaybeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a human-readable message out of a vendor error envelope.
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (Array.isArray(body)) return extractErrorMessage(body[0]);
  if (!isRecord(body)) return undefined;

  const error = body['error'];
  if (isRecord(error) && typeof error['message'] === 'string') return error['message'];
  if (typeof error === 'string') return error;

  const errors = body['errors'];
  if (Array.isArray(errors) && errors.length > 0) return extractErrorMessage(errors[0]);

  for (const key of ['message', 'error_msg', 'detail']) {
    const value = body[key];
    if (typeof value === 'string' && value) return value;
  }
  return undefined;
}

/**
 * Shared plumbing for vendor clients: config validation, sampling checks,
 * and the undici request/response helpers.
 */
export abstract class BaseProviderClient<C extends ClientConfig> implements ProviderClient {
  readonly provider: string;
  protected readonly logger: ClientLogger | undefined;
  private readonly connectTimeoutMs: number | undefined;
  protected readonly samplingLimits: SamplingLimits = DEFAULT_SAMPLING_LIMITS;

  constructor(
    protected readonly config: C,
    private readonly boundModel: Model,
    options: ClientOptions = {}
  ) {
    this.provider = clientName(config);
    this.logger = options.logger;
    this.connectTimeoutMs = config.extra?.connect_timeout
      ? config.extra.connect_timeout * 1000
      : options.connectTimeoutMs;
  }

  get model(): Model {
    return this.boundModel;
  }

  setMaxOutputTokens(value: number | undefined): void {
    this.boundModel.setMaxOutputTokens(value);
  }

  async send(data: SendData, signal: AbortSignal): Promise<CompletionOutput> {
    this.validateSampling(data);
    return this.sendInner(data, signal);
  }

  async sendStreaming(data: SendData, handler: SseHandler, signal: AbortSignal): Promise<void> {
    this.validateSampling(data);
    await this.sendStreamingInner(data, handler, signal);
  }

  protected abstract sendInner(data: SendData, signal: AbortSignal): Promise<CompletionOutput>;

  protected abstract sendStreamingInner(
    data: SendData,
    handler: SseHandler,
    signal: AbortSignal
  ): Promise<void>;

  protected validateSampling(data: SendData): void {
    const { temperature, topP } = this.samplingLimits;
    if (data.temperature !== undefined && (data.temperature < temperature[0] || data.temperature > temperature[1])) {
      throw new RequestError(
        `temperature must be between ${temperature[0]} and ${temperature[1]} for ${this.provider}`
      );
    }
    if (data.top_p !== undefined && (data.top_p < topP[0] || data.top_p > topP[1])) {
      throw new RequestError(`top_p must be between ${topP[0]} and ${topP[1]} for ${this.provider}`);
    }
  }

  /**
   * Fail with a configuration error naming the missing field.
   */
  protected required(value: string | undefined, field: string): string {
    if (!value) {
      throw new ConfigError(`Client '${this.provider}' is missing required field '${field}'`);
    }
    return value;
  }

  /**
   * Merge the model's `extra_fields` into a vendor request body.
   */
  protected withExtraFields<T extends object>(body: T): T {
    const extra = this.model.extraFields;
    return extra ? { ...body, ...extra } : body;
  }

  /**
   * Issue a request and return the response when its status is 2xx;
   * otherwise throw a ProviderError carrying the vendor's message.
   */
  protected async call(url: string, options: PostOptions): Promise<Dispatcher.ResponseData> {
    const hasBody = options.body !== undefined;
    const headers = { ...options.headers };
    if (hasBody && !Object.keys(headers).some((name) => name.toLowerCase() === 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await undiciRequest(url, {
      method: options.method ?? (hasBody ? 'POST' : 'GET'),
      headers,
      body: hasBody ? JSON.stringify(options.body) : null,
      signal: options.signal,
      ...(this.connectTimeoutMs ? { dispatcher: dispatcherFor(this.connectTimeoutMs) } : {}),
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      const raw = await response.body.text().catch(() => '');
      const errorBody = parseMaybeJson(raw);
      const responseHeaders = normalizeHeaders(response.headers);
      this.logger?.warn(
        { provider: this.provider, status: response.statusCode, requestId: responseHeaders['x-request-id'] },
        'upstream request failed'
      );
      throw new ProviderError(
        this.provider,
        response.statusCode,
        extractErrorMessage(errorBody) ?? (raw || `${this.provider} API error: ${response.statusCode}`),
        errorBody
      );
    }

    return response;
  }

  /**
   * Read and validate a JSON response body.
   */
  protected async readJson<T>(
    response: Dispatcher.ResponseData,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    const raw = await response.body.text();
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new ProviderError(this.provider, response.statusCode, `Invalid response from ${this.provider}: ${raw}`, raw);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new ProviderError(
        this.provider,
        response.statusCode,
        extractErrorMessage(json) ?? `Unexpected response from ${this.provider}: ${raw}`,
        json
      );
    }
    return result.data;
  }

  protected streamContext(handler: SseHandler): StreamContext {
    return { provider: this.provider, handler, logger: this.logger };
  }
}
