/**
 * Bounded wait for a suspending operation
 */

import { GeofencingError, ErrorCode } from '../errors';

export type TimedOutcome<T> = { status: 'completed'; value: T } | { status: 'timedOut' };

/**
 * Race an operation against a timer.
 *
 * The operation receives an AbortSignal that fires when the timer wins, so a
 * cooperative collaborator can stop its work. Whatever the operation produces
 * after the deadline is discarded. A rejection before the deadline is passed
 * through to the caller. The timer never outlives the race.
 */
export async function raceWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<TimedOutcome<T>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<TimedOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      resolve({ status: 'timedOut' });
      controller.abort(
        new GeofencingError(ErrorCode.TIMEOUT, `Operation timed out after ${timeoutMs}ms`, {
          details: { timeoutMs },
        })
      );
    }, timeoutMs);
  });

  try {
    const attempt = operation(controller.signal).then(
      (value): TimedOutcome<T> => ({ status: 'completed', value })
    );
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
