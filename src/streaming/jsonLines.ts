import { type StreamContext } from './sseStream.js';

/**
 * Read a newline-delimited JSON body, calling `onLine` for every complete,
 * non-blank line. A trailing line without newline is delivered when the body
 * ends.
 */
export async function readJsonLines(
  body: AsyncIterable<Uint8Array>,
  ctx: StreamContext,
  onLine: (line: string) => void
): Promise<void> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of body) {
    if (ctx.handler.shouldStop) break;

    buffer += decoder.decode(chunk, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      if (ctx.handler.shouldStop) return;
      if (line.trim()) onLine(line.trim());
    }
  }

  buffer += decoder.decode();
  if (!ctx.handler.shouldStop && buffer.trim()) {
    onLine(buffer.trim());
  }
}
