/**
 * Tests for logger redaction
 * Credentials and one-time tokens must never reach log output
 */

import { describe, it, expect } from 'vitest';
import { createLogger, maskTokenQuery } from '../logger.js';

function captureLogger() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  const logger = createLogger({ level: 'info' }, stream);
  const entry = (index: number): Record<string, unknown> => {
    const line = logs[index];
    if (line === undefined) {
      throw new Error(`no log line at ${index}`);
    }
    return JSON.parse(line);
  };
  return { logger, logs, entry };
}

describe('Logger Redaction', () => {
  describe('Password Redaction', () => {
    it('should redact password form fields', () => {
      const { logger, entry } = captureLogger();

      logger.info({ username: 'alice', password: 'pw', password1: 'pw1', password2: 'pw2' });

      const logEntry = entry(0);
      expect(logEntry.username).toBe('alice');
      expect(logEntry.password).toBe('[REDACTED]');
      expect(logEntry.password1).toBe('[REDACTED]');
      expect(logEntry.password2).toBe('[REDACTED]');
    });

    it('should redact the SMTP password but keep the host', () => {
      const { logger, entry } = captureLogger();

      logger.info({ smtp: { host: 'smtp.example.com', password: 'test-secret' } });

      expect(entry(0).smtp).toEqual({ host: 'smtp.example.com', password: '[REDACTED]' });
    });
  });

  describe('Token Redaction', () => {
    it('should redact token fields', () => {
      const { logger, entry } = captureLogger();

      logger.info({ rtoken: 'abc', ctoken: 'def', token: 'ghi' });

      const logEntry = entry(0);
      expect(logEntry.rtoken).toBe('[REDACTED]');
      expect(logEntry.ctoken).toBe('[REDACTED]');
      expect(logEntry.token).toBe('[REDACTED]');
    });

    it('should mask tokens in message strings', () => {
      const { logger, entry } = captureLogger();

      logger.info('visited /reset?rtoken=abc123&x=1');

      expect(entry(0).msg).toBe('visited /reset?rtoken=[REDACTED]&x=1');
    });

    it('should mask tokens in serialized request urls', () => {
      const { logger, entry } = captureLogger();

      logger.info({ req: new Request('http://localhost/confirm?ctoken=secret-value') });

      expect(entry(0).req).toEqual({ method: 'GET', url: '/confirm?ctoken=[REDACTED]' });
    });
  });

  describe('maskTokenQuery', () => {
    it('leaves other query parameters untouched', () => {
      expect(maskTokenQuery('/login?r=/user')).toBe('/login?r=/user');
    });

    it('masks both token parameters', () => {
      expect(maskTokenQuery('/a?ctoken=1&rtoken=2')).toBe('/a?ctoken=[REDACTED]&rtoken=[REDACTED]');
    });
  });

  describe('Log Levels', () => {
    it('should skip debug output at info level', () => {
      const { logger, logs } = captureLogger();

      logger.debug('hidden');
      logger.info('shown');

      expect(logs).toHaveLength(1);
    });
  });
});
