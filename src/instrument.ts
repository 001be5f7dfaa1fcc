import * as Sentry from '@sentry/node';

import type { Config } from './config/index.js';

/**
 * Initialize Sentry error tracking when a DSN is configured.
 * Returns whether tracking is enabled.
 */
export function initSentry(config: Config['sentry']): boolean {
  if (!config) {
    return false;
  }

  Sentry.init({
    dsn: config.dsn,
    environment: config.environment,
    tracesSampleRate: config.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });
  return true;
}

// Re-export Sentry for use in error handler
export { Sentry };
