/**
 * Tests for Monitoring & Observability Module
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as Sentry from '@sentry/node';

// Mock Sentry
vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
}));

import { clearConfigCache } from '../config';
import {
  getRecentErrors,
  initMonitoring,
  logger,
  resetMetrics,
} from '../monitoring';

describe('Monitoring', () => {
  beforeEach(() => {
    resetMetrics();
    vi.clearAllMocks();
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('logger', () => {
    it('should format lines with level and context', () => {
      logger.info('Found website', { company: 'Acme' });

      const [line] = vi.mocked(console.info).mock.calls[0];
      expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Found website \{"company":"Acme"\}$/);
    });

    it('should leave warnings as breadcrumbs', () => {
      logger.warn('Website unreachable', { websiteUrl: 'https://acme.com' });

      expect(Sentry.addBreadcrumb).toHaveBeenCalledWith({
        category: 'warning',
        message: 'Website unreachable',
        level: 'warning',
        data: { websiteUrl: 'https://acme.com' },
      });
    });

    it('should report errors and keep them for inspection', () => {
      const error = new Error('boom');
      logger.error('Error processing company', error, { company: 'Acme' });

      expect(Sentry.captureException).toHaveBeenCalledWith(error, {
        extra: { company: 'Acme' },
        tags: { component: 'company-enricher' },
      });
      expect(getRecentErrors()).toEqual([
        expect.objectContaining({ error: 'boom', context: { company: 'Acme' } }),
      ]);
    });

    it('should report non-error values as messages', () => {
      logger.error('Unexpected failure', 'bad state');

      expect(Sentry.captureMessage).toHaveBeenCalledWith('Unexpected failure', {
        level: 'error',
        extra: { error: 'bad state' },
      });
    });

    it('should limit recent errors to the requested count', () => {
      for (let i = 0; i < 5; i++) {
        logger.error(`failure ${i}`, new Error(`e${i}`));
      }

      expect(getRecentErrors(2).map(entry => entry.error)).toEqual(['e3', 'e4']);
    });

    it('should clear recent errors on reset', () => {
      logger.error('failure', new Error('boom'));
      resetMetrics();

      expect(getRecentErrors()).toEqual([]);
    });
  });

  describe('initMonitoring', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      clearConfigCache();
    });

    it('should stay off without a DSN', () => {
      vi.stubEnv('SENTRY_DSN', '');
      clearConfigCache();

      expect(initMonitoring()).toBe(false);
      expect(Sentry.init).not.toHaveBeenCalled();
    });
  });
});
