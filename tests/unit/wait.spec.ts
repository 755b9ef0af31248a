import { describe, expect, it } from 'vitest';
import { pollUntil, sleep, systemClock } from '../../src/server/relay/wait.js';
import { VirtualClock, virtualSleep } from '../helpers/fake-relay.js';

describe('pollUntil', () => {
  it('stops at the first positive check', async () => {
    const clock = new VirtualClock();
    let checks = 0;

    const outcome = await pollUntil(async () => ++checks === 3, { intervalMs: 500, timeoutMs: 10_000, clock, sleep: virtualSleep(clock) });

    expect(outcome).toEqual({ satisfied: true, elapsedMs: 1_000 });
    expect(checks).toBe(3);
  });

  it('clips the last sleep to the deadline', async () => {
    const clock = new VirtualClock();
    const seen: number[] = [];

    const outcome = await pollUntil(
      async () => {
        seen.push(clock.now());
        return false;
      },
      { intervalMs: 1_000, timeoutMs: 2_500, clock, sleep: virtualSleep(clock) }
    );

    expect(outcome).toEqual({ satisfied: false, elapsedMs: 2_500 });
    expect(seen).toEqual([0, 1_000, 2_000]);
  });

  it('never checks with a zero timeout', async () => {
    const clock = new VirtualClock();
    let checks = 0;

    const outcome = await pollUntil(async () => ++checks > 0, { intervalMs: 1, timeoutMs: 0, clock, sleep: virtualSleep(clock) });

    expect(outcome.satisfied).toBe(false);
    expect(checks).toBe(0);
  });

  it('throws once the signal is aborted', async () => {
    const clock = new VirtualClock();
    const controller = new AbortController();
    controller.abort();

    await expect(
      pollUntil(async () => true, { intervalMs: 1, timeoutMs: 100, clock, sleep: virtualSleep(clock), signal: controller.signal })
    ).rejects.toThrow(/aborted/);
  });
});

describe('pollUntil with a check that never settles', () => {
  it('gives up at the deadline and reports not satisfied', async () => {
    const seen: AbortSignal[] = [];

    const outcome = await pollUntil(
      (signal) => {
        seen.push(signal);
        return new Promise<boolean>(() => undefined);
      },
      { intervalMs: 10, timeoutMs: 50, clock: systemClock, sleep }
    );

    expect(outcome.satisfied).toBe(false);
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(40);
    expect(seen.length).toBeGreaterThanOrEqual(1);
    expect(seen[0].aborted).toBe(true);
  });

  it('still reports cancellation by the caller', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      pollUntil(() => new Promise<boolean>(() => undefined), {
        intervalMs: 10,
        timeoutMs: 5_000,
        clock: systemClock,
        sleep,
        signal: controller.signal
      })
    ).rejects.toThrow(/aborted/);
  });
});

describe('sleep', () => {
  it('cuts a real sleep short on abort', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    await expect(sleep(5_000, controller.signal)).rejects.toThrow(/aborted/);
    expect(Date.now() - started).toBeLessThan(2_000);
  });
});
