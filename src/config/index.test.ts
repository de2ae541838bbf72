/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import { ConfigError, getSecret, readEnv } from './index.js';

describe('config', () => {
  describe('readEnv', () => {
    it('should pick the variables the tool reads', () => {
      const env = readEnv({
        PAPER_TRIAGE_CONFIG: '/etc/triage.json',
        PAPER_TRIAGE_API_KEY: 'test-secret',
        HOME: '/home/reader',
      });

      expect(env).toEqual({
        PAPER_TRIAGE_CONFIG: '/etc/triage.json',
        PAPER_TRIAGE_API_KEY: 'test-secret',
      });
    });

    it('should leave unset variables undefined', () => {
      expect(readEnv({})).toEqual({});
    });
  });

  describe('getSecret', () => {
    it('should return a set value', () => {
      expect(getSecret('SMTP_PASSWORD', { SMTP_PASSWORD: 'test-secret' })).toBe('test-secret');
    });

    it('should treat empty and blank values as unset', () => {
      expect(getSecret('SMTP_PASSWORD', { SMTP_PASSWORD: '' })).toBeUndefined();
      expect(getSecret('SMTP_PASSWORD', { SMTP_PASSWORD: '   ' })).toBeUndefined();
      expect(getSecret('SMTP_PASSWORD', {})).toBeUndefined();
    });
  });

  describe('ConfigError', () => {
    it('should carry its name and cause', () => {
      const cause = new Error('bad value');
      const error = new ConfigError('Invalid configuration', { cause });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ConfigError');
      expect(error.cause).toBe(cause);
    });
  });
});
