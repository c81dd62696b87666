/**
 * Configuration Errors
 * Layer: core
 *
 * Raised synchronously when a poller is created or poll() is called
 * with arguments that can never work. Never raised between attempts.
 */

export type PollerConfigErrorCode = 'INVALID_ARGUMENT' | 'INVALID_ATTEMPTS' | 'INVALID_TIMING';

export class PollerConfigError extends Error {
  constructor(
    message: string,
    public readonly code: PollerConfigErrorCode,
  ) {
    super(message);
    this.name = 'PollerConfigError';
  }
}
