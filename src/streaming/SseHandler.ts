import { type CompletionDetails, type SseEvent } from '../types/request.js';
import { type ClientLogger } from '../providers/base.js';
import { EventChannel } from './EventChannel.js';

export type HandlerEvent = SseEvent | { type: 'error'; error: Error };

export type StreamState = 'open' | 'emitting' | 'closed';

/**
 * Turns a provider's incremental output into the canonical event sequence.
 *
 * Provider clients call `push()` for each delta and `done()` at the vendor's
 * terminal marker; the gateway consumes `events`. Once closed (done, failed
 * or aborted) every further call is ignored, so at most one terminal event is
 * ever delivered and it is always last.
 */
export class SseHandler {
  private readonly channel = new EventChannel<HandlerEvent>();
  private state: StreamState = 'open';
  private output = '';

  /** Usage reported by the vendor while streaming, if any. */
  readonly details: CompletionDetails = {};

  constructor(
    private readonly signal: AbortSignal,
    private readonly logger?: ClientLogger
  ) {
    if (signal.aborted) {
      this.abort();
    } else {
      signal.addEventListener('abort', () => this.abort(), { once: true });
    }
  }

  get currentState(): StreamState {
    return this.state;
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /** Concatenation of every delta delivered so far. */
  get text(): string {
    return this.output;
  }

  get events(): EventChannel<HandlerEvent> {
    return this.channel;
  }

  push(delta: string): void {
    if (this.state === 'closed' || delta === '') return;
    this.state = 'emitting';
    this.output += delta;
    this.channel.push({ type: 'text', text: delta });
  }

  done(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.channel.push({ type: 'done' });
    this.channel.close();
  }

  fail(error: Error): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.logger?.warn({ err: error.message }, 'stream terminated by upstream error');
    this.channel.push({ type: 'error', error });
    this.channel.close();
  }

  private abort(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.logger?.debug({ reason: 'aborted' }, 'stream cancelled');
    this.channel.close();
  }

  /**
   * True once the consumer should stop reading upstream bytes.
   */
  get shouldStop(): boolean {
    return this.state === 'closed' || this.signal.aborted;
  }
}
