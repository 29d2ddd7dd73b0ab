/**
 * Monitoring & Observability Module
 * Logs events, reports errors and keeps the most recent errors
 */

import * as Sentry from '@sentry/node';
import { loadConfig } from './config';

// ============ In-Memory Error Store ============

const metricsStore = {
  recentErrors: [] as Array<{ timestamp: number; error: string; context: Record<string, unknown> }>,
};

const MAX_ERRORS = 100;

let sentryInitialized = false;

/**
 * Initialise Sentry when a DSN is configured. Safe to call more than once.
 */
export function initMonitoring(): boolean {
  if (sentryInitialized) return true;

  const { monitoring } = loadConfig();
  if (!monitoring.sentryDsn) return false;

  Sentry.init({
    dsn: monitoring.sentryDsn,
    environment: monitoring.environment,
    tracesSampleRate: 0.1,
    beforeSend(event) {
      // Dead pages and timeouts are expected while crawling
      const type = event.exception?.values?.[0]?.type;
      if (type === 'FetchError' || type === 'FetchTimeoutError') {
        return null;
      }
      return event;
    },
  });
  sentryInitialized = true;
  return true;
}

// ============ Logging ============

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

export const logger = {
  debug(message: string, context?: LogContext) {
    if (process.env.NODE_ENV === 'development' || process.env.DEBUG) {
      console.debug(formatLog('debug', message, context));
    }
  },

  info(message: string, context?: LogContext) {
    console.info(formatLog('info', message, context));
  },

  warn(message: string, context?: LogContext) {
    console.warn(formatLog('warn', message, context));
    Sentry.addBreadcrumb({
      category: 'warning',
      message,
      level: 'warning',
      data: context,
    });
  },

  error(message: string, error?: Error | unknown, context?: LogContext) {
    console.error(formatLog('error', message, context));

    metricsStore.recentErrors.push({
      timestamp: Date.now(),
      error: error instanceof Error ? error.message : String(error),
      context: context || {},
    });
    if (metricsStore.recentErrors.length > MAX_ERRORS) {
      metricsStore.recentErrors.shift();
    }

    if (error instanceof Error) {
      Sentry.captureException(error, {
        extra: context,
        tags: { component: 'company-enricher' },
      });
    } else {
      Sentry.captureMessage(message, {
        level: 'error',
        extra: { error, ...context },
      });
    }
  },
};

// ============ Recent Errors ============

export function getRecentErrors(limit: number = 20): Array<{ timestamp: number; error: string; context: Record<string, unknown> }> {
  return metricsStore.recentErrors.slice(-limit);
}

export function resetMetrics(): void {
  metricsStore.recentErrors = [];
}
