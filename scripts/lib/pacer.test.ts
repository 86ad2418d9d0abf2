import { describe, it, expect } from 'vitest';
import { RequestPacer, type Clock } from './pacer';

function fakeClock(start = 0): Clock & { sleeps: number[]; advance(ms: number): void } {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

describe('RequestPacer', () => {
  it('spaces concurrent callers one interval apart', async () => {
    const clock = fakeClock();
    const pacer = new RequestPacer(10, clock);
    await Promise.all([pacer.acquire(), pacer.acquire(), pacer.acquire()]);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('does not wait once the interval has passed', async () => {
    const clock = fakeClock();
    const pacer = new RequestPacer(10, clock);
    await pacer.acquire();
    clock.advance(250);
    await pacer.acquire();
    expect(clock.sleeps).toEqual([]);
  });

  it('applies the safety factor to the quota', () => {
    expect(RequestPacer.fromRateLimit({ quotaPerSecond: 50, safetyFactor: 0.9 }).intervalMs).toBeCloseTo(1000 / 45);
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RequestPacer(0)).toThrow(/must be > 0/);
  });
});
