/**
 * Executor Core
 *
 * Runs the work function once and applies the error allow-list.
 * Shared by both termination strategies.
 */

import type {
  ErrorMatcher,
  InputSupplier,
  PollAction,
  Poller,
  PollerKind,
  PollerLogger,
  PollResult,
  StopPredicate,
  WorkFunction,
} from '../types';
import { assertFunction } from '../config';
import { describeErrorKind, matchesAny } from '../matchers';

export interface AttemptOutput<B> {
  suppressed: false;
  output: B;
}

export interface AttemptSuppressed {
  suppressed: true;
  error: unknown;
}

export type AttemptOutcome<B> = AttemptOutput<B> | AttemptSuppressed;

export type AttemptRunner = <A, B>(
  supply: InputSupplier<A>,
  fn: WorkFunction<A, B>,
) => Promise<AttemptOutcome<B>>;

/**
 * Creates the function that performs one attempt: fetch fresh input,
 * then run the work function on it.
 *
 * Sync throws and rejections from the work function are handled alike. An
 * allow-listed error is logged as a warning and reported as suppressed;
 * anything else is rethrown as-is. Supplier errors always propagate.
 */
export function createAttemptRunner(
  ignoredErrors: readonly ErrorMatcher[],
  logger: PollerLogger,
): AttemptRunner {
  return <A, B>(supply: InputSupplier<A>, fn: WorkFunction<A, B>): Promise<AttemptOutcome<B>> =>
    new Promise<A>((resolve) => resolve(supply())).then((input) =>
      new Promise<B>((resolve) => resolve(fn(input))).then(
        (output): AttemptOutcome<B> => ({ suppressed: false, output }),
        (error: unknown): AttemptOutcome<B> => {
          if (!matchesAny(ignoredErrors, error)) {
            throw error;
          }
          logger.warning(`Poller is ignoring the error: ${describeErrorKind(error)}`);
          return { suppressed: true, error };
        },
      ),
    );
}

/**
 * Fails fast before any attempt when poll() is handed something
 * that is not callable.
 */
export function assertPollArguments(supply: unknown, fn: unknown, until: unknown): void {
  assertFunction(supply, 'input supplier');
  assertFunction(fn, 'work function');
  assertFunction(until, 'stop predicate');
}

/** Output recorded in a PollResult for an attempt. */
export function outputOf<B>(outcome: AttemptOutcome<B>): B | null {
  return outcome.suppressed ? null : outcome.output;
}

/** True when the attempt produced output that satisfies the predicate. */
export function isSatisfied<B>(outcome: AttemptOutcome<B>, until: StopPredicate<B>): boolean {
  return !outcome.suppressed && until(outcome.output);
}

// -----------------------------------------------------------------------------
// Poller assembly
// -----------------------------------------------------------------------------

export type PollLoop = <A, B>(
  supply: InputSupplier<A>,
  fn: WorkFunction<A, B>,
  until: StopPredicate<B>,
) => Promise<PollResult<B>>;

/**
 * Wraps a termination strategy's loop into a frozen Poller.
 * The instance keeps no per-call state, so concurrent polls are independent.
 * Argument errors reject the returned promise before any attempt runs.
 */
export function definePoller(kind: PollerKind, loop: PollLoop): Poller {
  return Object.freeze({
    kind,
    async poll<A, B>(
      supply: InputSupplier<A>,
      fn: WorkFunction<A, B>,
      until: StopPredicate<B>,
    ): Promise<PollResult<B>> {
      assertPollArguments(supply, fn, until);
      return loop(supply, fn, until);
    },
    async pollInput<A, B>(input: A, fn: WorkFunction<A, B>, until: StopPredicate<B>): Promise<PollResult<B>> {
      assertPollArguments(() => input, fn, until);
      return loop(() => input, fn, until);
    },
    async pollAction(action: PollAction, condition: () => boolean): Promise<PollResult<void>> {
      assertPollArguments(() => undefined, action, condition);
      return loop<undefined, void>(
        () => undefined,
        () => action(),
        () => condition(),
      );
    },
  });
}
