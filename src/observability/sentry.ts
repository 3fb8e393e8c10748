import * as Sentry from "@sentry/node";
import type { Application } from "express";

let enabled = false;

export function initSentry(dsn: string | undefined, environment: string) {
  if (!dsn) return;
  Sentry.init({ dsn, environment, tracesSampleRate: 0.1 });
  enabled = true;
}

// Must be registered after all routes.
export function attachSentryErrorHandler(app: Application) {
  if (enabled) Sentry.setupExpressErrorHandler(app);
}

export function captureError(error: unknown, context?: Record<string, unknown>) {
  if (!enabled) return;
  Sentry.captureException(error, context ? { extra: context } : undefined);
}
