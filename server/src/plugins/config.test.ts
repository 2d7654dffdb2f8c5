import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildApp } from '../app.js';
import { loadConfig } from './config.js';
import type { FastifyInstance } from 'fastify';

const DEFAULTS = {
  port: 3000,
  host: '0.0.0.0',
  databaseUrl: './data/timekeep.db',
  logLevel: 'info',
  nodeEnv: 'production',
  trustProxy: false,
  csvBodyLimit: 10 * 1024 * 1024,
};

describe('Configuration Module - loadConfig() Pure Function', () => {
  describe('Default Configuration Values Applied', () => {
    it('returns correct defaults when no env vars set', () => {
      expect(loadConfig({})).toEqual(DEFAULTS);
    });

    it('treats empty string env vars as missing (defaults applied)', () => {
      const config = loadConfig({
        PORT: '',
        HOST: '',
        DATABASE_URL: '',
        LOG_LEVEL: '',
        NODE_ENV: '',
        TRUST_PROXY: '',
        CSV_BODY_LIMIT: '',
      });

      expect(config).toEqual(DEFAULTS);
    });
  });

  describe('Custom Environment Values Override Defaults', () => {
    it('custom values override defaults', () => {
      const config = loadConfig({
        PORT: '4000',
        HOST: '127.0.0.1',
        DATABASE_URL: '/custom/path/db.sqlite',
        LOG_LEVEL: 'debug',
        NODE_ENV: 'development',
        TRUST_PROXY: 'true',
        CSV_BODY_LIMIT: '2048',
      });

      expect(config).toEqual({
        port: 4000,
        host: '127.0.0.1',
        databaseUrl: '/custom/path/db.sqlite',
        logLevel: 'debug',
        nodeEnv: 'development',
        trustProxy: true,
        csvBodyLimit: 2048,
      });
    });

    it('partial overrides work (mix defaults and custom)', () => {
      const config = loadConfig({ PORT: '8080', LOG_LEVEL: 'warn' });

      expect(config).toEqual({ ...DEFAULTS, port: 8080, logLevel: 'warn' });
    });

    it('LOG_LEVEL and TRUST_PROXY are case-insensitive', () => {
      const config = loadConfig({ LOG_LEVEL: 'ERROR', TRUST_PROXY: 'TRUE' });

      expect(config.logLevel).toBe('error');
      expect(config.trustProxy).toBe(true);
    });
  });

  describe('PORT Validation', () => {
    it('rejects non-numeric PORT', () => {
      expect(() => loadConfig({ PORT: 'not-a-number' })).toThrow(
        'Configuration validation failed:\n  - PORT must be a valid number, got: not-a-number',
      );
    });

    it('rejects out-of-range PORT', () => {
      expect(() => loadConfig({ PORT: '70000' })).toThrow(
        'PORT must be in range 0-65535, got: 70000',
      );
    });

    it('accepts boundary values', () => {
      expect(loadConfig({ PORT: '0' }).port).toBe(0);
      expect(loadConfig({ PORT: '65535' }).port).toBe(65535);
    });
  });

  describe('Other Validation', () => {
    it('rejects unknown LOG_LEVEL', () => {
      expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
        'LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, got: verbose',
      );
    });

    it('rejects TRUST_PROXY values other than true/false', () => {
      expect(() => loadConfig({ TRUST_PROXY: 'yes' })).toThrow(
        "TRUST_PROXY must be 'true' or 'false', got: yes",
      );
    });

    it('rejects non-positive CSV_BODY_LIMIT', () => {
      expect(() => loadConfig({ CSV_BODY_LIMIT: '0' })).toThrow(
        'CSV_BODY_LIMIT must be greater than 0, got: 0',
      );
      expect(() => loadConfig({ CSV_BODY_LIMIT: 'lots' })).toThrow(
        'CSV_BODY_LIMIT must be a valid number, got: lots',
      );
    });

    it('lists every validation error at once', () => {
      expect(() => loadConfig({ PORT: 'abc', TRUST_PROXY: 'maybe' })).toThrow(
        "Configuration validation failed:\n  - PORT must be a valid number, got: abc\n  - TRUST_PROXY must be 'true' or 'false', got: maybe",
      );
    });
  });
});

describe('Configuration Plugin - Fastify Integration', () => {
  let app: FastifyInstance | undefined;
  let tempDir: string;
  const originalEnv = process.env;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'timekeep-config-test-'));
    process.env = { ...originalEnv, DATABASE_URL: join(tempDir, 'test.db'), LOG_LEVEL: 'fatal' };
  });

  afterEach(async () => {
    if (app) {
      await app.close();
      app = undefined;
    }
    rmSync(tempDir, { recursive: true, force: true });
    process.env = originalEnv;
  });

  it('decorates fastify.config with the loaded values', async () => {
    process.env.CSV_BODY_LIMIT = '4096';

    app = await buildApp();

    expect(app.config.csvBodyLimit).toBe(4096);
    expect(app.config.logLevel).toBe('fatal');
  });

  it('db plugin opens the database at config.databaseUrl', async () => {
    const customDbPath = join(tempDir, 'nested', 'custom.db');
    process.env.DATABASE_URL = customDbPath;

    app = await buildApp();

    expect(app.config.databaseUrl).toBe(customDbPath);
    expect(existsSync(customDbPath)).toBe(true);
  });

  it('server fails to start with multiple invalid values', async () => {
    process.env.PORT = '70000';
    process.env.CSV_BODY_LIMIT = '-1';

    await expect(buildApp()).rejects.toThrow('PORT must be in range 0-65535');
    await expect(buildApp()).rejects.toThrow('CSV_BODY_LIMIT must be greater than 0');
  });
});
