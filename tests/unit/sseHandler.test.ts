import { describe, it, expect, vi } from 'vitest';
import { SseHandler, type HandlerEvent } from '../../src/streaming/SseHandler.js';

async function drain(handler: SseHandler): Promise<HandlerEvent[]> {
  const events: HandlerEvent[] = [];
  for await (const event of handler.events) events.push(event);
  return events;
}

describe('SseHandler', () => {
  it('emits text events in order and one trailing done', async () => {
    const handler = new SseHandler(new AbortController().signal);
    handler.push('he');
    handler.push('llo');
    handler.done();
    handler.done();

    expect(await drain(handler)).toEqual([
      { type: 'text', text: 'he' },
      { type: 'text', text: 'llo' },
      { type: 'done' },
    ]);
    expect(handler.text).toBe('hello');
  });

  it('drops empty deltas', async () => {
    const handler = new SseHandler(new AbortController().signal);
    handler.push('');
    expect(handler.currentState).toBe('open');
    handler.done();
    expect(await drain(handler)).toEqual([{ type: 'done' }]);
  });

  it('moves open → emitting → closed', () => {
    const handler = new SseHandler(new AbortController().signal);
    expect(handler.currentState).toBe('open');
    handler.push('x');
    expect(handler.currentState).toBe('emitting');
    handler.done();
    expect(handler.currentState).toBe('closed');
    expect(handler.isClosed).toBe(true);
  });

  it('delivers a failure as the terminal event', async () => {
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const handler = new SseHandler(new AbortController().signal, logger);
    const error = new Error('boom');
    handler.push('partial');
    handler.fail(error);
    handler.push('ignored');
    handler.done();

    expect(await drain(handler)).toEqual([
      { type: 'text', text: 'partial' },
      { type: 'error', error },
    ]);
    expect(logger.warn).toHaveBeenCalledWith({ err: 'boom' }, 'stream terminated by upstream error');
  });

  it('stops emitting once the signal aborts', async () => {
    const controller = new AbortController();
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const handler = new SseHandler(controller.signal, logger);
    handler.push('one');
    controller.abort();
    handler.push('two');
    handler.done();

    expect(handler.shouldStop).toBe(true);
    expect(await drain(handler)).toEqual([{ type: 'text', text: 'one' }]);
    expect(logger.debug).toHaveBeenCalledWith({ reason: 'aborted' }, 'stream cancelled');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('starts closed on an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const handler = new SseHandler(controller.signal);
    handler.push('x');
    expect(await drain(handler)).toEqual([]);
  });
});
