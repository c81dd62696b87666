/**
 * Diagnostic Logger
 * Layer: infra
 *
 * Provided ports:
 *   - logger.create
 *
 * Default sink for poller diagnostics, backed by @actions/core.
 * Warnings become workflow annotations on a runner; debug lines only show
 * when step debugging is enabled.
 */

import * as core from '@actions/core';
import type { PollerLogger } from './types';

// -----------------------------------------------------------------------------
// Port: logger.create
// -----------------------------------------------------------------------------

export function createActionsLogger(): PollerLogger {
  return {
    debug: (message) => {
      core.debug(message);
    },
    warning: (message) => {
      core.warning(message);
    },
  };
}

export const defaultLogger: PollerLogger = createActionsLogger();
