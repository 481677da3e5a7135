import { errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import { sleep } from './timing.js';

const log = getLogger('http', { component: 'retry' });

export interface RetryPolicy {
  /** Attempts including the first call. */
  attempts: number;
  /** Pause before retry n is `delayMs * n`. */
  delayMs: number;
  /** Errors for which this returns false are rethrown at once. */
  isTransient: (error: unknown) => boolean;
}

/**
 * Runs `fn` until it resolves, a non-transient error is thrown or the
 * attempts run out. The last error is rethrown.
 */
export async function retry<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.attempts || !policy.isTransient(error)) {
        throw error;
      }
      const delayMs = policy.delayMs * attempt;
      log.warn(
        { attempt, attempts: policy.attempts, delayMs, error: errorMessage(error) },
        'Transient failure, retrying',
      );
      await sleep(delayMs);
      attempt++;
    }
  }
}
