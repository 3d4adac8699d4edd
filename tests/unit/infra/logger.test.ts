/**
 * Unit tests for logger module
 */

import { describe, expect, it } from 'vitest';

import { createChildLogger, createLogger } from '@/infra/logger/index.js';

describe('Logger', () => {
  describe('createLogger', () => {
    it('uses the configured level without a pretty transport', () => {
      const logger = createLogger({ level: 'silent', pretty: false });

      expect(logger.level).toBe('silent');
      expect(logger.isLevelEnabled('error')).toBe(false);
    });

    it('enables levels at and above the configured one', () => {
      const logger = createLogger({ level: 'warn', pretty: false });

      expect(logger.isLevelEnabled('error')).toBe(true);
      expect(logger.isLevelEnabled('info')).toBe(false);
    });
  });

  describe('createChildLogger', () => {
    it('adds context bindings and keeps the parent level', () => {
      const parent = createLogger({ level: 'silent', pretty: false });

      const child = createChildLogger(parent, { areas: ['Testland'], source: 'wide' });

      expect(child.bindings()).toMatchObject({ areas: ['Testland'], source: 'wide' });
      expect(child.level).toBe('silent');
    });
  });
});
