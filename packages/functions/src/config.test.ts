import { afterEach, describe, expect, it, vi } from 'vitest';
import { getConfig, loadConfig, resetConfig } from './config.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  describe('loadConfig', () => {
    it('defaults to dev with a dev_ prefix and a 7-day window', () => {
      expect(loadConfig({})).toEqual({
        env: 'dev',
        collectionPrefix: 'dev_',
        expiringSoonDays: 7,
      });
    });

    it('uses no prefix in prod', () => {
      expect(loadConfig({ APP_ENV: 'prod' }).collectionPrefix).toBe('');
    });

    it('prefers an explicit prefix', () => {
      expect(loadConfig({ APP_ENV: 'prod', FIRESTORE_COLLECTION_PREFIX: 'test_' }).collectionPrefix).toBe('test_');
      expect(loadConfig({ FIRESTORE_COLLECTION_PREFIX: '' }).collectionPrefix).toBe('');
    });

    it('coerces the expiring window', () => {
      expect(loadConfig({ EXPIRING_SOON_DAYS: '3' }).expiringSoonDays).toBe(3);
    });

    it('throws on invalid values', () => {
      expect(() => loadConfig({ APP_ENV: 'staging' })).toThrow();
      expect(() => loadConfig({ EXPIRING_SOON_DAYS: '0' })).toThrow();
    });
  });

  describe('getConfig', () => {
    it('reads process.env once and caches the result', () => {
      vi.stubEnv('APP_ENV', 'prod');
      vi.stubEnv('EXPIRING_SOON_DAYS', '10');

      const first = getConfig();
      vi.stubEnv('EXPIRING_SOON_DAYS', '2');

      expect(first).toEqual({ env: 'prod', collectionPrefix: '', expiringSoonDays: 10 });
      expect(getConfig()).toBe(first);
    });

    it('reloads after a reset', () => {
      vi.stubEnv('APP_ENV', 'prod');
      vi.stubEnv('EXPIRING_SOON_DAYS', '10');
      getConfig();

      vi.stubEnv('EXPIRING_SOON_DAYS', '2');
      resetConfig();

      expect(getConfig().expiringSoonDays).toBe(2);
    });
  });
});
