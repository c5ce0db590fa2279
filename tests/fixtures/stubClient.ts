import { type Model } from '../../src/core/Model.js';
import { type ProviderClient } from '../../src/providers/base.js';
import { type ClientFactory } from '../../src/providers/registry.js';
import { type CompletionDetails, type CompletionOutput, type SendData } from '../../src/types/request.js';
import { type SseHandler } from '../../src/streaming/SseHandler.js';

export interface StubScript {
  deltas?: string[];
  details?: CompletionDetails;
  /** Thrown before anything is produced. */
  error?: Error;
  /** Thrown after every delta has been pushed. */
  errorAfterDeltas?: Error;
}

export interface StubCall {
  modelId: string;
  maxOutputTokens: number | undefined;
  data: SendData;
}

/**
 * In-process provider client that replays a fixed script.
 */
export class StubClient implements ProviderClient {
  readonly provider: string;

  constructor(
    readonly model: Model,
    private readonly script: StubScript,
    private readonly calls: StubCall[]
  ) {
    this.provider = model.clientName;
  }

  setMaxOutputTokens(value: number | undefined): void {
    this.model.setMaxOutputTokens(value);
  }

  async send(data: SendData): Promise<CompletionOutput> {
    this.record(data);
    if (this.script.error) throw this.script.error;
    if (this.script.errorAfterDeltas) throw this.script.errorAfterDeltas;
    return { text: (this.script.deltas ?? []).join(''), details: { ...this.script.details } };
  }

  async sendStreaming(data: SendData, handler: SseHandler): Promise<void> {
    this.record(data);
    if (this.script.error) throw this.script.error;

    for (const delta of this.script.deltas ?? []) handler.push(delta);
    Object.assign(handler.details, this.script.details);
    if (this.script.errorAfterDeltas) throw this.script.errorAfterDeltas;
  }

  private record(data: SendData): void {
    this.calls.push({ modelId: this.model.id, maxOutputTokens: this.model.maxOutputTokens, data });
  }
}

export function stubClientFactory(script: StubScript): { factory: ClientFactory; calls: StubCall[] } {
  const calls: StubCall[] = [];
  return {
    factory: (config) => new StubClient(config.model, script, calls),
    calls,
  };
}
