/**
 * Poller Configuration
 * Layer: core
 *
 * Provided ports:
 *   - config.resolveBase
 *   - config.isDiagnosticsEnabled
 *
 * Validates configuration structs up front so that a bad value fails
 * when the poller is created, never part-way through a poll.
 */

import type { BasePollerConfig, ErrorMatcher, PollerLogger } from './types';
import { DIAGNOSTICS_ENV_VAR } from './types';
import { PollerConfigError } from './errors';
import { defaultLogger } from './logger';
import { isARealObject, parseBooleanFlag } from './utils';

export interface ResolvedBaseConfig {
  ignoredErrors: readonly ErrorMatcher[];
  logger: PollerLogger;
  diagnostics: boolean;
}

// -----------------------------------------------------------------------------
// Port: config.isDiagnosticsEnabled
// -----------------------------------------------------------------------------

/**
 * Returns true if the RETRY_POLLER_DIAGNOSTICS env var is truthy.
 */
export function isDiagnosticsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanFlag(env[DIAGNOSTICS_ENV_VAR]);
}

// -----------------------------------------------------------------------------
// Validators
// -----------------------------------------------------------------------------

export function assertFunction(value: unknown, label: string): void {
  if (typeof value !== 'function') {
    throw new PollerConfigError(`The ${label} must be a function`, 'INVALID_ARGUMENT');
  }
}

export function assertPositiveInteger(value: unknown, label: string): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new PollerConfigError(
      `The ${label} must be an integer greater than 0. Provided value: ${String(value)}`,
      'INVALID_ATTEMPTS',
    );
  }
}

export function assertDuration(value: unknown, label: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new PollerConfigError(
      `The ${label} must be a finite number of milliseconds >= 0. Provided value: ${String(value)}`,
      'INVALID_TIMING',
    );
  }
}

function assertMatcherList(value: unknown): asserts value is readonly ErrorMatcher[] {
  if (!Array.isArray(value)) {
    throw new PollerConfigError('The ignored errors must be an array', 'INVALID_ARGUMENT');
  }
  value.forEach((matcher: unknown, index: number) => {
    assertFunction(matcher, `ignored error matcher at index ${index}`);
  });
}

function assertOptionalBoolean(
  value: unknown,
  label: string,
): asserts value is boolean | undefined {
  if (value !== undefined && typeof value !== 'boolean') {
    throw new PollerConfigError(
      `The ${label} flag must be a boolean. Provided value: ${String(value)}`,
      'INVALID_ARGUMENT',
    );
  }
}

function assertLogger(value: unknown): asserts value is PollerLogger {
  if (
    !isARealObject(value) ||
    typeof value['debug'] !== 'function' ||
    typeof value['warning'] !== 'function'
  ) {
    throw new PollerConfigError(
      'The logger must provide debug and warning functions',
      'INVALID_ARGUMENT',
    );
  }
}

// -----------------------------------------------------------------------------
// Port: config.resolveBase
// -----------------------------------------------------------------------------

/**
 * Validates the options every poller shares and fills in defaults.
 * The allow-list is copied so later changes to the caller's array have no effect.
 */
export function resolveBaseConfig(config: BasePollerConfig): ResolvedBaseConfig {
  if (!isARealObject(config)) {
    throw new PollerConfigError('The poller configuration must be an object', 'INVALID_ARGUMENT');
  }

  const ignoredErrors: unknown = config.ignoredErrors ?? [];
  assertMatcherList(ignoredErrors);

  const logger: unknown = config.logger ?? defaultLogger;
  assertLogger(logger);

  const diagnostics: unknown = config.diagnostics;
  assertOptionalBoolean(diagnostics, 'diagnostics');

  return {
    ignoredErrors: Object.freeze([...ignoredErrors]),
    logger,
    diagnostics: diagnostics ?? isDiagnosticsEnabled(),
  };
}
