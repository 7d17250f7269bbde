/**
 * FILE PURPOSE: Sentry capture for per-document failures
 * WHY: A batch run keeps going past a failed document, so the failure would
 *      otherwise only exist as a stderr line and a manifest row.
 *      No-op when SENTRY_DSN is not set.
 */

import * as Sentry from '@sentry/node';

let enabled = false;

export function initErrorReporting(dsn: string | undefined): boolean {
  if (!dsn) return false;
  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0,
    sendDefaultPii: false,
  });
  enabled = true;
  return true;
}

export function reportError(err: unknown, context: Record<string, string>): void {
  if (!enabled) return;
  Sentry.captureException(err, { extra: context });
}

/** Wait for queued events before the process exits. */
export async function flushErrorReporting(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
