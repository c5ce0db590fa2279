/**
 * Canonical request/response/event shapes used across the gateway.
 * Every provider client translates to/from these types.
 */

export type MessageRole = 'system' | 'user' | 'assistant';

export interface MessagePart {
  type: 'text';
  text: string;
}

export interface Message {
  readonly role: MessageRole;
  readonly content: string | readonly MessagePart[];
}

/**
 * One canonical completion request.
 */
export interface SendData {
  messages: readonly Message[];
  temperature?: number | undefined;
  top_p?: number | undefined;
  stream: boolean;
}

/**
 * Metadata of a finished completion. Counters are only known once the
 * upstream call has returned or its stream has ended.
 */
export interface CompletionDetails {
  id?: string | undefined;
  input_tokens?: number | undefined;
  output_tokens?: number | undefined;
}

export interface CompletionOutput {
  text: string;
  details: CompletionDetails;
}

export type SseEvent = { type: 'text'; text: string } | { type: 'done' };

/**
 * Flatten message content into plain text.
 */
export function messageText(message: Message): string {
  if (typeof message.content === 'string') return message.content;
  return message.content.map((part) => part.text).join('\n');
}

// ── OpenAI wire format ─────────────────────────────────────────────────────

export interface ChatCompletionRequestBody {
  model: string;
  messages: Message[];
  temperature?: number | undefined;
  top_p?: number | undefined;
  max_tokens?: number | undefined;
  stream: boolean;
}

export interface UsageInfo {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string };
    logprobs: null;
    finish_reason: 'stop';
  }>;
  usage: UsageInfo;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: { role?: 'assistant'; content?: string };
    finish_reason: 'stop' | null;
  }>;
}

export interface ErrorEnvelope {
  error: {
    message: string;
    type: 'invalid_request_error';
  };
}

// ── Errors ─────────────────────────────────────────────────────────────────

/**
 * Base class of every error the gateway turns into an HTTP response.
 */
export abstract class GatewayError extends Error {
  abstract readonly statusCode: number;
}

/**
 * Missing/invalid client configuration or an unresolvable model name.
 */
export class ConfigError extends GatewayError {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Malformed inbound request or parameters outside a vendor's limits.
 */
export class RequestError extends GatewayError {
  constructor(
    message: string,
    public readonly statusCode: number = 400
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

/**
 * The caller went away, or the gateway is shutting down, before the
 * completion produced anything.
 */
export class CancelledError extends GatewayError {
  readonly statusCode = 499;

  constructor(message = 'Request cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Error reported by an upstream vendor, either as a non-2xx status or as an
 * error envelope inside an otherwise successful response.
 */
export class ProviderError extends GatewayError {
  readonly statusCode = 400;

  constructor(
    public readonly provider: string,
    public readonly status: number,
    message: string,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * A streaming chunk that could not be parsed.
 */
export class StreamProtocolError extends ProviderError {
  constructor(provider: string, message: string, chunk?: string) {
    super(provider, 502, message, chunk);
    this.name = 'StreamProtocolError';
  }
}
