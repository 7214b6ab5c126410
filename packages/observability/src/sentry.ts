import * as Sentry from "@sentry/node";

/** No-op unless SENTRY_DSN_BACKEND is set. */
export function initSentry(serviceName: string): boolean {
  const dsn = process.env.SENTRY_DSN_BACKEND;
  if (!dsn) return false;

  Sentry.init({
    dsn,
    environment: process.env.APP_ENV || process.env.NODE_ENV || "local",
    tracesSampleRate: 0.2,
    release: process.env.RELEASE_SHA || "local",
    serverName: serviceName,
  });
  return true;
}
