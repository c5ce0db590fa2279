import { CancelledError } from '../types/request.js';

/**
 * Create a controller that aborts as soon as any of the given signals does.
 * The returned controller can also be aborted directly; once it aborts it
 * detaches from the source signals.
 */
export function linkAbortSignals(...signals: AbortSignal[]): AbortController {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort();

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const signal of signals) signal.removeEventListener('abort', onAbort);
    },
    { once: true }
  );

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort();
      break;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  }

  return controller;
}

export function isAbortError(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'RequestAbortedError');
}
