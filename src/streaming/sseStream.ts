import { createParser, type EventSourceMessage } from 'eventsource-parser';
import { type ZodType, type ZodTypeDef } from 'zod';
import { StreamProtocolError } from '../types/request.js';
import { type ClientLogger } from '../providers/base.js';
import { type SseHandler } from './SseHandler.js';

export interface StreamContext {
  provider: string;
  handler: SseHandler;
  logger?: ClientLogger | undefined;
}

/**
 * Parse one streamed JSON chunk against the vendor's chunk schema.
 * Anything that does not parse is an upstream protocol error.
 */
export function parseJsonChunk<T>(
  ctx: StreamContext,
  data: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    ctx.logger?.warn({ provider: ctx.provider, chunk: data }, 'malformed stream chunk');
    throw new StreamProtocolError(ctx.provider, `Invalid stream chunk from ${ctx.provider}: ${data}`, data);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    ctx.logger?.warn({ provider: ctx.provider, chunk: data }, 'unexpected stream chunk shape');
    throw new StreamProtocolError(ctx.provider, `Unexpected stream chunk from ${ctx.provider}: ${data}`, data);
  }
  return result.data;
}

/**
 * Read a `text/event-stream` body, calling `onMessage` for each complete
 * event, including a last event whose closing blank line never arrived.
 * Stops (releasing the upstream body) once the handler is closed or the
 * request is aborted.
 */
export async function readSseStream(
  body: AsyncIterable<Uint8Array>,
  ctx: StreamContext,
  onMessage: (message: EventSourceMessage) => void
): Promise<void> {
  const decoder = new TextDecoder();
  const parser = createParser({
    onEvent: (message) => {
      if (ctx.handler.shouldStop) return;
      onMessage(message);
    },
  });

  for await (const chunk of body) {
    if (ctx.handler.shouldStop) break;
    parser.feed(decoder.decode(chunk, { stream: true }));
    if (ctx.handler.shouldStop) break;
  }

  // Terminate an event the body left open.
  if (!ctx.handler.shouldStop) {
    parser.feed(`${decoder.decode()}\n\n`);
  }
}
