import { describe, it, expect, afterEach, vi } from 'vitest';
import { logMarkerProbe, waitForReady } from '../../src/runner/readiness.js';
import { ReadinessTimeoutError } from '../../src/errors.js';
import { FakeEnvironment, fakeClock } from '../helpers/fake-environment.js';

describe('waitForReady', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the number of probes it took', async () => {
    const clock = fakeClock();
    const probe = vi
      .fn<() => Promise<boolean>>()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValue(true);

    const polls = await waitForReady(probe, {
      deadline: 60_000,
      intervalMs: 3_000,
      service: 'compute_is_ready',
      ...clock,
    });

    expect(polls).toBe(3);
    expect(clock.now()).toBe(9_000);
  });

  it('sleeps before the first probe', async () => {
    const clock = fakeClock();
    const seen: number[] = [];

    await waitForReady(
      async () => {
        seen.push(clock.now());
        return true;
      },
      { deadline: 60_000, intervalMs: 3_000, service: 'svc', ...clock },
    );

    expect(seen).toEqual([3_000]);
  });

  it('still probes exactly at the deadline', async () => {
    const clock = fakeClock();
    const probe = vi.fn(async () => clock.now() === 60_000);

    const polls = await waitForReady(probe, {
      deadline: 60_000,
      intervalMs: 3_000,
      service: 'svc',
      ...clock,
    });

    expect(polls).toBe(20);
  });

  it('throws ReadinessTimeoutError once the deadline has passed', async () => {
    const clock = fakeClock();
    const probe = vi.fn(async () => false);

    const wait = waitForReady(probe, {
      deadline: 60_000,
      intervalMs: 3_000,
      service: 'compute_is_ready',
      ...clock,
    });

    await expect(wait).rejects.toBeInstanceOf(ReadinessTimeoutError);
    await expect(wait).rejects.toThrow(
      'timeout before the compute is ready (compute_is_ready after 63s)',
    );
    expect(probe).toHaveBeenCalledTimes(20);
  });

  it('keeps polling after a failed log read', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const clock = fakeClock();
    const env = new FakeEnvironment();
    env.failingLogReads.add(1);

    const polls = await waitForReady(
      logMarkerProbe(env.compose, 'compute_is_ready', 'accepting connections'),
      {
        deadline: 60_000,
        intervalMs: 3_000,
        service: 'compute_is_ready',
        ...clock,
      },
    );

    expect(polls).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(
      '  ! Could not read compute_is_ready logs: docker compose logs compute_is_ready exited with code 1',
    );
  });
});
