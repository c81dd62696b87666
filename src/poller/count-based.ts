/**
 * Count-Based Poller
 *
 * Runs attempts back to back until the predicate holds or
 * `maxAttempts` attempts have been made. Never sleeps.
 */

import type {
  CountBasedPollerConfig,
  InputSupplier,
  Poller,
  PollResult,
  StopPredicate,
  WorkFunction,
} from '../types';
import { assertPositiveInteger, resolveBaseConfig } from '../config';
import { createAttemptRunner, definePoller, isSatisfied, outputOf } from './execute';

/**
 * Creates a count-based poller.
 *
 * @throws PollerConfigError if `maxAttempts` is not a positive integer
 */
export function createCountBasedPoller(config: CountBasedPollerConfig): Poller {
  const { ignoredErrors, logger, diagnostics } = resolveBaseConfig(config);
  assertPositiveInteger(config.maxAttempts, 'maximum number of polling attempts');

  const { maxAttempts } = config;
  const runAttempt = createAttemptRunner(ignoredErrors, logger);

  async function pollUntilExhausted<A, B>(
    supply: InputSupplier<A>,
    fn: WorkFunction<A, B>,
    until: StopPredicate<B>,
  ): Promise<PollResult<B>> {
    let count = 0;
    let result: B | null = null;

    while (count < maxAttempts) {
      count++;
      const outcome = await runAttempt(supply, fn);
      result = outputOf(outcome);

      if (isSatisfied(outcome, until)) {
        break;
      }
      if (diagnostics) {
        logger.debug(`Attempt ${count}/${maxAttempts}: condition not met`);
      }
    }

    return Object.freeze({ count, result });
  }

  return definePoller('count-based', pollUntilExhausted);
}
