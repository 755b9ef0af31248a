import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  now(): number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const systemClock: Clock = { now: () => Date.now() };

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock: Clock;
  sleep: Sleep;
  signal?: AbortSignal;
}

export interface PollOutcome {
  satisfied: boolean;
  elapsedMs: number;
}

/**
 * Runs `check` until it resolves true or `timeoutMs` has passed on `clock`.
 * The deadline is re-read on every iteration and the last sleep is clipped to it.
 * Each check gets a signal that also fires at the deadline; a check cut short that way counts as false.
 */
export async function pollUntil(check: (signal: AbortSignal) => Promise<boolean>, opts: PollOptions): Promise<PollOutcome> {
  const startedAt = opts.clock.now();
  const elapsed = () => opts.clock.now() - startedAt;

  while (elapsed() < opts.timeoutMs) {
    opts.signal?.throwIfAborted();
    const deadline = AbortSignal.timeout(opts.timeoutMs - elapsed());
    const probe = opts.signal ? AbortSignal.any([opts.signal, deadline]) : deadline;

    let satisfied: boolean;
    try {
      satisfied = await raceAbort(check(probe), probe);
    } catch (error) {
      if (opts.signal?.aborted || !deadline.aborted) throw error;
      satisfied = false;
    }
    if (satisfied) return { satisfied: true, elapsedMs: elapsed() };

    const remaining = opts.timeoutMs - elapsed();
    if (remaining <= 0) break;
    await opts.sleep(Math.min(opts.intervalMs, remaining), opts.signal);
  }

  return { satisfied: false, elapsedMs: elapsed() };
}

/** Settles with `promise`, or rejects with the signal's reason once it aborts, whichever comes first. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
