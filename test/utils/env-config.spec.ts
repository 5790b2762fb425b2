/**
 * Tests for environment variable helpers
 */

import { describe, it, expect } from 'vitest';
import {
  getBooleanFromEnv,
  getEnvironmentFromEnv,
  getLogLevelFromEnv,
  getStringFromEnv
} from '../../src/utils/env-config';

describe('Environment Config Helpers', () => {
  describe('getStringFromEnv', () => {
    it('should trim values and treat blanks as missing', () => {
      expect(getStringFromEnv({ BASE: '  https://images.example.com ' }, 'BASE')).toBe('https://images.example.com');
      expect(getStringFromEnv({ BASE: '   ' }, 'BASE')).toBeUndefined();
      expect(getStringFromEnv({}, 'BASE')).toBeUndefined();
    });
  });

  describe('getBooleanFromEnv', () => {
    it('should accept true, 1 and yes in any case', () => {
      expect(getBooleanFromEnv({ FLAG: 'TRUE' }, 'FLAG', false)).toBe(true);
      expect(getBooleanFromEnv({ FLAG: '1' }, 'FLAG', false)).toBe(true);
      expect(getBooleanFromEnv({ FLAG: 'Yes' }, 'FLAG', false)).toBe(true);
    });

    it('should treat any other value as false', () => {
      expect(getBooleanFromEnv({ FLAG: 'off' }, 'FLAG', true)).toBe(false);
    });

    it('should use the default when the key is missing', () => {
      expect(getBooleanFromEnv({}, 'FLAG', true)).toBe(true);
    });
  });

  describe('getLogLevelFromEnv', () => {
    it('should normalize the level to upper case', () => {
      expect(getLogLevelFromEnv({ LOG_LEVEL: 'warn' }, 'LOG_LEVEL', 'INFO')).toBe('WARN');
    });

    it('should fall back on unknown levels', () => {
      expect(getLogLevelFromEnv({ LOG_LEVEL: 'trace' }, 'LOG_LEVEL', 'ERROR')).toBe('ERROR');
    });
  });

  describe('getEnvironmentFromEnv', () => {
    it('should take the first key with a known environment', () => {
      const env = { IMAGE_URL_ENV: 'qa', NODE_ENV: 'Production' };

      expect(getEnvironmentFromEnv(env, ['IMAGE_URL_ENV', 'NODE_ENV'], 'development')).toBe('production');
    });

    it('should use the default when no key matches', () => {
      expect(getEnvironmentFromEnv({}, ['NODE_ENV'], 'staging')).toBe('staging');
    });
  });
});
