import type { Clock, Sleep } from '../types.js';

/**
 * Manually advanced clock plus a sleep that records delays and returns immediately
 */
export interface FakeTime {
  clock: Clock;
  sleep: Sleep;
  advance(ms: number): void;
  readonly sleeps: number[];
}

export function createFakeTime(start = 1_000): FakeTime {
  let now = start;
  const sleeps: number[] = [];

  return {
    clock: () => now,
    sleep: async ms => {
      sleeps.push(ms);
      now += ms;
    },
    advance(ms: number) {
      now += ms;
    },
    sleeps,
  };
}
