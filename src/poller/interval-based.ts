/**
 * Interval-Based Poller
 *
 * Runs an attempt, then pauses `intervalMs` before the next one, until the
 * predicate holds or the `durationMs` budget is used up.
 *
 * Timeout is decided before sleeping: if the next attempt could not start
 * within the budget, polling stops now rather than sleep past the deadline.
 * This can end a poll up to one interval early, never late. A deadline that
 * has already been reached also ends the poll, so a zero duration with a
 * zero interval makes exactly one attempt.
 */

import type {
  Clock,
  InputSupplier,
  IntervalBasedPollerConfig,
  Poller,
  PollResult,
  Sleeper,
  StopPredicate,
  TimeoutCallback,
  WorkFunction,
} from '../types';
import { assertDuration, assertFunction, resolveBaseConfig } from '../config';
import { PollerConfigError } from '../errors';
import { defaultSleeper } from '../sleeper';
import { noop } from '../utils';
import { createAttemptRunner, definePoller, isSatisfied, outputOf } from './execute';

export const systemClock: Clock = () => Date.now();

/**
 * True when polling must stop after an unsuccessful attempt made at `nowMs`.
 */
export function isTimedOut(nowMs: number, intervalMs: number, deadlineMs: number): boolean {
  return nowMs + intervalMs > deadlineMs || nowMs >= deadlineMs;
}

function readClock(clock: Clock): number {
  const nowMs = clock();
  if (!Number.isFinite(nowMs)) {
    throw new PollerConfigError(
      `The clock must return a finite number of milliseconds. Provided value: ${String(nowMs)}`,
      'INVALID_TIMING',
    );
  }
  return nowMs;
}

/**
 * Creates an interval-based poller.
 *
 * @throws PollerConfigError if a timing value is missing, negative or not finite,
 *   or if `clock`, `sleeper` or `onTimeout` is given but not a function
 */
export function createIntervalBasedPoller(config: IntervalBasedPollerConfig): Poller {
  const { ignoredErrors, logger, diagnostics } = resolveBaseConfig(config);
  assertDuration(config.durationMs, 'duration');
  assertDuration(config.intervalMs, 'interval');

  const clock: Clock = config.clock === undefined ? systemClock : config.clock;
  const sleeper: Sleeper = config.sleeper === undefined ? defaultSleeper : config.sleeper;
  const onTimeout: TimeoutCallback = config.onTimeout === undefined ? noop : config.onTimeout;
  assertFunction(clock, 'clock');
  assertFunction(sleeper, 'sleeper');
  assertFunction(onTimeout, 'timeout callback');

  const { durationMs, intervalMs } = config;
  const runAttempt = createAttemptRunner(ignoredErrors, logger);

  async function pollUntilDeadline<A, B>(
    supply: InputSupplier<A>,
    fn: WorkFunction<A, B>,
    until: StopPredicate<B>,
  ): Promise<PollResult<B>> {
    const deadlineMs = readClock(clock) + durationMs;
    let count = 0;

    while (true) {
      count++;
      const outcome = await runAttempt(supply, fn);
      const result = outputOf(outcome);

      if (isSatisfied(outcome, until)) {
        return Object.freeze({ count, result });
      }

      if (isTimedOut(readClock(clock), intervalMs, deadlineMs)) {
        if (diagnostics) {
          logger.debug(`Polling timed out after ${count} attempts`);
        }
        await onTimeout();
        return Object.freeze({ count, result });
      }

      if (diagnostics) {
        logger.debug(`Attempt ${count}: condition not met, retrying in ${intervalMs}ms`);
      }
      await sleeper(intervalMs);
    }
  }

  return definePoller('interval-based', pollUntilDeadline);
}
