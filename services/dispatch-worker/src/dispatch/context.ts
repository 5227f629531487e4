import { DeadlineExceededError } from '../errors';
import type { ExecutionContext } from '../types';

export interface DeadlineScope {
  ctx: ExecutionContext;
  /** Stop the deadline timer. Does not abort. */
  dispose(): void;
}

/**
 * An execution context whose signal aborts with DeadlineExceededError once
 * `deadlineMs` has passed.
 */
export function createExecutionContext(deadlineMs: number): DeadlineScope {
  const controller = new AbortController();
  const deadline = new Date(Date.now() + deadlineMs);

  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(deadlineMs));
  }, deadlineMs);

  return {
    ctx: { signal: controller.signal, deadline },
    dispose: () => clearTimeout(timer),
  };
}

/** Rejects with the signal's reason once it aborts. Never resolves. */
export function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
