/**
 * Tests for the executor core: createAttemptRunner, assertPollArguments,
 * outputOf, isSatisfied and definePoller.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  assertPollArguments,
  createAttemptRunner,
  definePoller,
  isSatisfied,
  outputOf,
} from '../../src/poller/execute';
import type { PollLoop } from '../../src/poller/execute';
import { PollerConfigError } from '../../src/errors';
import { hasCode, instanceOf } from '../../src/matchers';
import { makeLogger, TransientError, FatalError } from './helpers';

// -----------------------------------------------------------------------------
// createAttemptRunner
// -----------------------------------------------------------------------------

describe('createAttemptRunner', () => {
  it('returns the work function output', async (): Promise<void> => {
    const run = createAttemptRunner([], makeLogger());

    const outcome = await run(() => 20, (n) => n + 1);

    expect(outcome).toEqual({ suppressed: false, output: 21 });
  });

  it('awaits a promise returned by the work function', async (): Promise<void> => {
    const run = createAttemptRunner([], makeLogger());

    const outcome = await run(async () => 'id', async (id) => `${id}-done`);

    expect(outcome).toEqual({ suppressed: false, output: 'id-done' });
  });

  it('suppresses a thrown error that matches the allow-list and logs a warning', async (): Promise<void> => {
    const logger = makeLogger();
    const error = new TransientError();
    const run = createAttemptRunner([instanceOf(TransientError)], logger);

    const outcome = await run(() => null, (): number => {
      throw error;
    });

    expect(outcome).toEqual({ suppressed: true, error });
    expect(logger.warning).toHaveBeenCalledWith('Poller is ignoring the error: TransientError');
  });

  it('suppresses a rejection that matches the allow-list', async (): Promise<void> => {
    const logger = makeLogger();
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    const run = createAttemptRunner([hasCode('ECONNRESET')], logger);

    const outcome = await run(() => null, async (): Promise<number> => {
      throw reset;
    });

    expect(outcome.suppressed).toBe(true);
    expect(logger.warning).toHaveBeenCalledWith('Poller is ignoring the error: Error');
  });

  it('checks every matcher in the allow-list', async (): Promise<void> => {
    const run = createAttemptRunner(
      [instanceOf(RangeError), instanceOf(TransientError)],
      makeLogger(),
    );

    const outcome = await run(() => null, (): number => {
      throw new TransientError();
    });

    expect(outcome.suppressed).toBe(true);
  });

  it('rethrows an error that is not allow-listed unchanged', async (): Promise<void> => {
    const logger = makeLogger();
    const error = new FatalError();
    const run = createAttemptRunner([instanceOf(TransientError)], logger);

    await expect(
      run(() => null, (): number => {
        throw error;
      }),
    ).rejects.toBe(error);
    expect(logger.warning).not.toHaveBeenCalled();
  });

  it('calls the supplier for every attempt', async (): Promise<void> => {
    const supply = vi.fn(() => 1);
    const run = createAttemptRunner([], makeLogger());

    await run(supply, (n) => n);
    await run(supply, (n) => n);

    expect(supply).toHaveBeenCalledTimes(2);
  });

  it('propagates supplier errors even when they match the allow-list', async (): Promise<void> => {
    const error = new TransientError('no input');
    const fn = vi.fn((n: number) => n);
    const run = createAttemptRunner([instanceOf(TransientError)], makeLogger());

    await expect(
      run((): number => {
        throw error;
      }, fn),
    ).rejects.toBe(error);
    expect(fn).not.toHaveBeenCalled();
  });

  it('rethrows thrown non-Error values unchanged', async (): Promise<void> => {
    const run = createAttemptRunner([instanceOf(Error)], makeLogger());

    await expect(
      run(() => null, (): number => {
        throw 'plain string';
      }),
    ).rejects.toBe('plain string');
  });
});

// -----------------------------------------------------------------------------
// Outcome helpers
// -----------------------------------------------------------------------------

describe('outputOf', () => {
  it('returns the output of a completed attempt', (): void => {
    expect(outputOf({ suppressed: false, output: 0 })).toBe(0);
  });

  it('returns null for a suppressed attempt', (): void => {
    expect(outputOf({ suppressed: true, error: new TransientError() })).toBeNull();
  });
});

describe('isSatisfied', () => {
  it('tests the predicate against the output', (): void => {
    expect(isSatisfied({ suppressed: false, output: 6 }, (n: number) => n === 6)).toBe(true);
    expect(isSatisfied({ suppressed: false, output: 5 }, (n: number) => n === 6)).toBe(false);
  });

  it('never calls the predicate for a suppressed attempt', (): void => {
    const until = vi.fn(() => true);

    expect(isSatisfied({ suppressed: true, error: null }, until)).toBe(false);
    expect(until).not.toHaveBeenCalled();
  });
});

// -----------------------------------------------------------------------------
// assertPollArguments
// -----------------------------------------------------------------------------

describe('assertPollArguments', () => {
  const fn = (): number => 1;

  it('accepts three functions', (): void => {
    expect(() => assertPollArguments(fn, fn, fn)).not.toThrow();
  });

  const missing: Array<[string, unknown[]]> = [
    ['input supplier', [null, fn, fn]],
    ['work function', [fn, undefined, fn]],
    ['stop predicate', [fn, fn, 'yes']],
  ];

  it.each(missing)('rejects a missing %s', (label, args): void => {
    expect(() => assertPollArguments(args[0], args[1], args[2])).toThrow(
      new PollerConfigError(`The ${label} must be a function`, 'INVALID_ARGUMENT'),
    );
  });
});

// -----------------------------------------------------------------------------
// definePoller
// -----------------------------------------------------------------------------

describe('definePoller', () => {
  function makeSingleShotLoop(onCall: () => void = () => {}): PollLoop {
    const runAttempt = createAttemptRunner([], makeLogger());
    return async (supply, fn, until) => {
      onCall();
      const outcome = await runAttempt(supply, fn);
      return { count: 1, result: isSatisfied(outcome, until) ? outputOf(outcome) : null };
    };
  }

  it('produces a frozen poller of the given kind', (): void => {
    const poller = definePoller('count-based', makeSingleShotLoop());

    expect(poller.kind).toBe('count-based');
    expect(Object.isFrozen(poller)).toBe(true);
  });

  it('forwards poll to the loop', async (): Promise<void> => {
    const poller = definePoller('count-based', makeSingleShotLoop());

    await expect(poller.poll(() => 2, (n) => n * 3, (n) => n === 6)).resolves.toEqual({
      count: 1,
      result: 6,
    });
  });

  it('wraps pollInput in a constant supplier', async (): Promise<void> => {
    const onCall = vi.fn();
    const poller = definePoller('interval-based', makeSingleShotLoop(onCall));

    const result = await poller.pollInput('abc', (s) => s.length, (n) => n === 3);

    expect(result).toEqual({ count: 1, result: 3 });
    expect(onCall).toHaveBeenCalledTimes(1);
  });

  it('runs pollAction with no input and tests the condition', async (): Promise<void> => {
    const action = vi.fn();
    const poller = definePoller('interval-based', makeSingleShotLoop());

    const result = await poller.pollAction(action, () => true);

    expect(action).toHaveBeenCalledTimes(1);
    expect(action).toHaveBeenCalledWith();
    expect(result.count).toBe(1);
  });

  it('rejects bad arguments before calling the loop', async (): Promise<void> => {
    const onCall = vi.fn();
    const poller = definePoller('count-based', makeSingleShotLoop(onCall));

    await expect(Reflect.apply(poller.pollAction, poller, [() => {}, null])).rejects.toThrow(
      'The stop predicate must be a function',
    );
    expect(onCall).not.toHaveBeenCalled();
  });
});
