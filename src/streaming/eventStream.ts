import { StreamProtocolError } from '../types/request.js';
import { type StreamContext } from './sseStream.js';

/**
 * Decoder for the AWS `application/vnd.amazon.eventstream` framing used by
 * Bedrock's streaming endpoints.
 *
 * Each message is:
 *   total length (u32) | headers length (u32) | prelude crc (u32)
 *   headers | payload | message crc (u32)
 *
 * Header values of type string (7) are kept; other types are skipped.
 */
export interface EventStreamMessage {
  headers: Record<string, string>;
  payload: Buffer;
}

const PRELUDE_LENGTH = 12;
const TRAILER_LENGTH = 4;

// Fixed value sizes by header type; strings and byte arrays are length-prefixed.
const FIXED_HEADER_SIZES: Record<number, number> = {
  0: 0,
  1: 0,
  2: 1,
  3: 2,
  4: 4,
  5: 8,
  8: 8,
  9: 16,
};

export class EventStreamDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly provider: string) {}

  push(chunk: Uint8Array): EventStreamMessage[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const messages: EventStreamMessage[] = [];

    while (this.buffer.length >= PRELUDE_LENGTH) {
      const totalLength = this.buffer.readUInt32BE(0);
      const headersLength = this.buffer.readUInt32BE(4);

      if (totalLength < PRELUDE_LENGTH + headersLength + TRAILER_LENGTH) {
        throw new StreamProtocolError(this.provider, `Invalid event-stream frame length ${totalLength}`);
      }
      if (this.buffer.length < totalLength) break;

      const headersStart = PRELUDE_LENGTH;
      const payloadStart = headersStart + headersLength;
      const payloadEnd = totalLength - TRAILER_LENGTH;

      messages.push({
        headers: this.decodeHeaders(this.buffer.subarray(headersStart, payloadStart)),
        payload: Buffer.from(this.buffer.subarray(payloadStart, payloadEnd)),
      });
      this.buffer = this.buffer.subarray(totalLength);
    }

    return messages;
  }

  get pending(): number {
    return this.buffer.length;
  }

  private decodeHeaders(raw: Buffer): Record<string, string> {
    const headers: Record<string, string> = {};
    let offset = 0;

    while (offset < raw.length) {
      const nameLength = raw.readUInt8(offset);
      offset += 1;
      const name = raw.subarray(offset, offset + nameLength).toString('utf-8');
      offset += nameLength;
      const type = raw.readUInt8(offset);
      offset += 1;

      if (type === 6 || type === 7) {
        const valueLength = raw.readUInt16BE(offset);
        offset += 2;
        if (type === 7) {
          headers[name] = raw.subarray(offset, offset + valueLength).toString('utf-8');
        }
        offset += valueLength;
        continue;
      }

      const size = FIXED_HEADER_SIZES[type];
      if (size === undefined) {
        throw new StreamProtocolError(this.provider, `Unknown event-stream header type ${type}`);
      }
      offset += size;
    }

    return headers;
  }
}

/**
 * Read an event-stream body, calling `onMessage` for every decoded message.
 */
export async function readEventStream(
  body: AsyncIterable<Uint8Array>,
  ctx: StreamContext,
  onMessage: (message: EventStreamMessage) => void
): Promise<void> {
  const decoder = new EventStreamDecoder(ctx.provider);

  for await (const chunk of body) {
    if (ctx.handler.shouldStop) break;

    for (const message of decoder.push(chunk)) {
      if (ctx.handler.shouldStop) return;
      onMessage(message);
    }
  }

  if (!ctx.handler.shouldStop && decoder.pending > 0) {
    throw new StreamProtocolError(ctx.provider, 'Event stream ended in the middle of a message');
  }
}
