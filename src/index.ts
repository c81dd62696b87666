export type {
  BasePollerConfig,
  Clock,
  CountBasedPollerConfig,
  ErrorMatcher,
  InputSupplier,
  IntervalBasedPollerConfig,
  PollAction,
  Poller,
  PollerKind,
  PollerLogger,
  PollResult,
  Sleeper,
  StopPredicate,
  TimeoutCallback,
  WorkFunction,
} from './types';
export { DIAGNOSTICS_ENV_VAR } from './types';
export { PollerConfigError } from './errors';
export type { PollerConfigErrorCode } from './errors';
export { instanceOf, hasName, hasCode, matchesAny, describeErrorKind } from './matchers';
export type { ErrorClass } from './matchers';
export { createActionsLogger, defaultLogger } from './logger';
export { defaultSleeper, immediateSleeper, createLoggingSleeper } from './sleeper';
export { isDiagnosticsEnabled } from './config';
export { createCountBasedPoller } from './poller/count-based';
export { createIntervalBasedPoller, systemClock } from './poller/interval-based';
