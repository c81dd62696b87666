/**
 * Boundary types for retry-poller
 *
 * These types define the contracts between the executor core,
 * the termination strategies and their callers.
 */

// -----------------------------------------------------------------------------
// PollResult
// Outcome of a single poll() call
// -----------------------------------------------------------------------------

export interface PollResult<T> {
  /** Attempts made, always >= 1 */
  readonly count: number;
  /** Output of the last attempt, or null if its error was suppressed */
  readonly result: T | null;
}

// -----------------------------------------------------------------------------
// Caller-supplied functions
// -----------------------------------------------------------------------------

/** Produces the work function's input. Called again on every attempt. */
export type InputSupplier<A> = () => A | Promise<A>;

export type WorkFunction<A, B> = (input: A) => B | Promise<B>;

/** Returns true when polling should stop successfully. */
export type StopPredicate<B> = (output: B) => boolean;

export type PollAction = () => void | Promise<void>;

export type TimeoutCallback = () => void | Promise<void>;

/** Epoch milliseconds. */
export type Clock = () => number;

export type Sleeper = (ms: number) => Promise<void> | void;

/** Decides whether a thrown value is allow-listed. */
export type ErrorMatcher = (error: unknown) => boolean;

// -----------------------------------------------------------------------------
// PollerLogger
// Leveled diagnostic sink
// -----------------------------------------------------------------------------

export interface PollerLogger {
  debug(message: string): void;
  warning(message: string): void;
}

// -----------------------------------------------------------------------------
// Poller
// -----------------------------------------------------------------------------

export type PollerKind = 'count-based' | 'interval-based';

/**
 * Argument checks run before the first attempt. A non-function argument
 * rejects the returned promise with PollerConfigError.
 */
export interface Poller {
  readonly kind: PollerKind;
  /**
   * Runs `fn` on fresh input from `supply` until `until` holds
   * or the termination budget runs out.
   */
  poll<A, B>(
    supply: InputSupplier<A>,
    fn: WorkFunction<A, B>,
    until: StopPredicate<B>,
  ): Promise<PollResult<B>>;
  /** Same as poll, with the same input on every attempt. */
  pollInput<A, B>(input: A, fn: WorkFunction<A, B>, until: StopPredicate<B>): Promise<PollResult<B>>;
  /** Runs `action` until `condition` returns true. */
  pollAction(action: PollAction, condition: () => boolean): Promise<PollResult<void>>;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface BasePollerConfig {
  /** Errors matching any of these are logged and suppressed */
  ignoredErrors?: readonly ErrorMatcher[];
  /** Defaults to the @actions/core logger */
  logger?: PollerLogger;
  /** Per-attempt debug logging. Defaults to RETRY_POLLER_DIAGNOSTICS. */
  diagnostics?: boolean;
}

export interface CountBasedPollerConfig extends BasePollerConfig {
  /** Positive integer */
  maxAttempts: number;
}

export interface IntervalBasedPollerConfig extends BasePollerConfig {
  /** Total wall-clock budget in ms */
  durationMs: number;
  /** Pause between attempts in ms */
  intervalMs: number;
  clock?: Clock;
  sleeper?: Sleeper;
  /** Invoked once when the time budget runs out without success */
  onTimeout?: TimeoutCallback;
}

/** Environment variable consulted when `diagnostics` is not set. */
export const DIAGNOSTICS_ENV_VAR = 'RETRY_POLLER_DIAGNOSTICS';
