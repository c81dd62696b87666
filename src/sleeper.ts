/**
 * Sleepers
 * Layer: core
 *
 * The pause taken between interval-based attempts. Swappable so tests
 * and dry runs can skip the wait.
 */

import type { PollerLogger, Sleeper } from './types';
import { sleep } from './utils';

/** Real timed pause. */
export const defaultSleeper: Sleeper = (ms) => sleep(ms);

/** Returns immediately. */
export const immediateSleeper: Sleeper = () => {};

/**
 * Does not pause; records the requested duration at debug level instead.
 */
export function createLoggingSleeper(logger: PollerLogger): Sleeper {
  return (ms) => {
    logger.debug(`Sleeper skipped a ${ms}ms pause`);
  };
}
