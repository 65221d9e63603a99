import { describe, it, expect } from 'vitest';
import { FixedIntervalThrottle } from '@profilescout/core';

function fakeTime(start = 0) {
  let t = start;
  const waits: number[] = [];
  return {
    waits,
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
    sleep: async (ms: number) => {
      waits.push(ms);
      t += ms;
    },
  };
}

describe('FixedIntervalThrottle', () => {
  it('waits one interval after construction before the first call', async () => {
    const time = fakeTime();
    const throttle = new FixedIntervalThrottle({ minIntervalMs: 2000, now: time.now, sleep: time.sleep });

    expect(await throttle.acquire()).toBe(2000);
    expect(time.now()).toBe(2000);
  });

  it('spaces back-to-back calls by the minimum interval', async () => {
    const time = fakeTime();
    const throttle = new FixedIntervalThrottle({ minIntervalMs: 2000, now: time.now, sleep: time.sleep });

    const starts: number[] = [];
    for (let i = 0; i < 4; i++) {
      await throttle.acquire();
      starts.push(time.now());
    }

    expect(starts).toEqual([2000, 4000, 6000, 8000]);
  });

  it('does not wait when the interval has already elapsed', async () => {
    const time = fakeTime();
    const throttle = new FixedIntervalThrottle({ minIntervalMs: 2000, now: time.now, sleep: time.sleep });

    time.advance(5000);
    expect(await throttle.acquire()).toBe(0);
    time.advance(2500);
    expect(await throttle.acquire()).toBe(0);
    expect(time.waits).toEqual([]);
  });

  it('reserves distinct slots for concurrent callers', async () => {
    const waits: number[] = [];
    const throttle = new FixedIntervalThrottle({
      minIntervalMs: 2000,
      now: () => 0,
      sleep: async (ms) => void waits.push(ms),
    });

    const waited = await Promise.all([throttle.acquire(), throttle.acquire(), throttle.acquire()]);

    expect(waited).toEqual([2000, 4000, 6000]);
    expect(waits).toEqual([2000, 4000, 6000]);
  });

  it('never waits with a zero interval', async () => {
    const time = fakeTime();
    const throttle = new FixedIntervalThrottle({ minIntervalMs: 0, now: time.now, sleep: time.sleep });

    expect(await throttle.acquire()).toBe(0);
    expect(await throttle.acquire()).toBe(0);
  });
});
