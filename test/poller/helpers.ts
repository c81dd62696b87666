/**
 * Shared test helpers for poller test modules.
 */

import { vi, type Mock } from 'vitest';
import type { Clock, PollerLogger, Sleeper } from '../../src/types';

export interface MockLogger extends PollerLogger {
  debug: Mock<(message: string) => void>;
  warning: Mock<(message: string) => void>;
}

export function makeLogger(): MockLogger {
  return {
    debug: vi.fn<(message: string) => void>(),
    warning: vi.fn<(message: string) => void>(),
  };
}

export interface FakeTime {
  clock: Clock;
  sleeper: Sleeper;
  /** Every duration passed to the sleeper, in order */
  sleeps: number[];
  advance(ms: number): void;
}

/**
 * A clock that only moves when the sleeper is called (or advance() is).
 */
export function makeFakeTime(startMs = 1_700_000_000_000): FakeTime {
  let nowMs = startMs;
  const sleeps: number[] = [];
  return {
    clock: () => nowMs,
    sleeper: (ms) => {
      sleeps.push(ms);
      nowMs += ms;
    },
    sleeps,
    advance: (ms) => {
      nowMs += ms;
    },
  };
}

/** Work function that increments a counter and returns the new value. */
export function makeCounter(start = 0): { value: () => number; next: () => number } {
  let current = start;
  return {
    value: () => current,
    next: () => ++current,
  };
}

export class TransientError extends Error {
  constructor(message = 'transient') {
    super(message);
    this.name = 'TransientError';
  }
}

export class FatalError extends Error {
  constructor(message = 'fatal') {
    super(message);
    this.name = 'FatalError';
  }
}
