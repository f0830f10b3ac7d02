/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { createConfig, parseEnv } from '@/infra/config/env.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({ PROJECT_DIR: '/project' });

      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.DATA_DIR).toBe('data');
      expect(env.METADATA_DIR).toBe('.datasets');
      expect(env.TRANSFER_CONCURRENCY).toBe(4);
      expect(env.NETWORK_RETRIES).toBe(3);
      expect(env.RETRY_DELAY_MS).toBe(500);
      expect(env.ZENODO_URL).toBe('https://zenodo.org');
      expect(env.ZENODO_ACCESS_TOKEN).toBeUndefined();
    });

    it('defaults the project directory to the working directory', () => {
      expect(parseEnv({}).PROJECT_DIR).toBe(process.cwd());
    });

    it('parses integers', () => {
      const env = parseEnv({ TRANSFER_CONCURRENCY: '8', NETWORK_RETRIES: '0' });

      expect(env.TRANSFER_CONCURRENCY).toBe(8);
      expect(env.NETWORK_RETRIES).toBe(0);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('throws on a non-numeric concurrency', () => {
      expect(() => parseEnv({ TRANSFER_CONCURRENCY: 'many' })).toThrow('Invalid environment configuration');
    });

    it('throws on a concurrency below one', () => {
      expect(() => parseEnv({ TRANSFER_CONCURRENCY: '0' })).toThrow('Invalid environment configuration');
    });

    it('throws on an unknown NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('sets pretty logging for non-production', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
    });

    it('splits git hosts', () => {
      const config = createConfig(parseEnv({ GIT_HOSTS: ' github.com, git.lab.test ,' }));

      expect(config.git.hosts).toEqual(['github.com', 'git.lab.test']);
    });

    it('groups provider settings', () => {
      const config = createConfig(
        parseEnv({
          ZENODO_ACCESS_TOKEN: 'test-secret',
          DATAVERSE_SERVER_URL: 'https://dv.test',
          DATAVERSE_NAME: 'lab',
        })
      );

      expect(config.providers).toEqual({
        zenodo: { baseUrl: 'https://zenodo.org', accessToken: 'test-secret' },
        dataverse: { serverUrl: 'https://dv.test', dataverseName: 'lab', accessToken: undefined },
      });
    });

    it('passes the project layout through', () => {
      const config = createConfig(parseEnv({ PROJECT_DIR: '/work', DATA_DIR: 'inputs' }));

      expect(config.project).toEqual({ rootDir: '/work', dataDir: 'inputs', metadataDir: '.datasets' });
    });
  });
});
