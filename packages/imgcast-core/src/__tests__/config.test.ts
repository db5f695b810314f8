import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  DEFAULT_CACHE_DIR,
  assertValidConfig,
  buildConfig,
  ensureCacheDirs,
  validateConfig,
} from '../config.js';

const ENV_KEYS = [
  'IMGCAST_CACHE_DIR',
  'IMGCAST_DOWNLOAD_DIR',
  'IMGCAST_IMAGE_DIR',
  'IMGCAST_CHUNK_SIZE',
  'IMGCAST_PROGRESS_INTERVAL_MS',
];

describe('config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('buildConfig', () => {
    it('should use defaults when nothing is set', () => {
      const config = buildConfig();

      expect(config).toEqual({
        cacheDir: DEFAULT_CACHE_DIR,
        downloadDir: path.join(DEFAULT_CACHE_DIR, 'download'),
        imageDir: path.join(DEFAULT_CACHE_DIR, 'images'),
        chunkSize: 40_960,
        progressIntervalMs: 1_000,
        hashAlgorithm: 'sha256',
        sidecarSuffix: '.sha256',
      });
    });

    it('should read environment variables', () => {
      process.env['IMGCAST_CACHE_DIR'] = '/tmp/imgcast-env';
      process.env['IMGCAST_CHUNK_SIZE'] = '65536';
      process.env['IMGCAST_PROGRESS_INTERVAL_MS'] = '250';

      const config = buildConfig();

      expect(config.cacheDir).toBe('/tmp/imgcast-env');
      expect(config.downloadDir).toBe(path.join('/tmp/imgcast-env', 'download'));
      expect(config.chunkSize).toBe(65_536);
      expect(config.progressIntervalMs).toBe(250);
    });

    it('should treat empty or malformed variables as unset', () => {
      process.env['IMGCAST_CACHE_DIR'] = '';
      process.env['IMGCAST_CHUNK_SIZE'] = 'lots';

      const config = buildConfig();

      expect(config.cacheDir).toBe(DEFAULT_CACHE_DIR);
      expect(config.chunkSize).toBe(40_960);
    });

    it('should prefer overrides to the environment', () => {
      process.env['IMGCAST_CHUNK_SIZE'] = '65536';

      const config = buildConfig({ cacheDir: '/data/cache', chunkSize: 2048 });

      expect(config.chunkSize).toBe(2048);
      expect(config.imageDir).toBe(path.join('/data/cache', 'images'));
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(buildConfig())).toEqual([]);
    });

    it('should reject out-of-range chunk sizes', () => {
      expect(validateConfig(buildConfig({ chunkSize: 512 }))).toEqual([
        'chunkSize must be an integer of at least 1024',
      ]);
      expect(validateConfig(buildConfig({ chunkSize: 32 * 1024 * 1024 }))).toEqual([
        'chunkSize must not exceed 16777216',
      ]);
    });

    it('should reject a bad progress interval and sidecar suffix', () => {
      const errors = validateConfig(
        buildConfig({ progressIntervalMs: -1, sidecarSuffix: 'a/b' })
      );

      expect(errors).toEqual([
        'progressIntervalMs must not be negative',
        'sidecarSuffix must be a non-empty file name suffix',
      ]);
    });

    it('should throw every message from assertValidConfig', () => {
      expect(() => assertValidConfig(buildConfig({ chunkSize: 0, progressIntervalMs: 90_000 }))).toThrow(
        'Invalid imgcast config: chunkSize must be an integer of at least 1024; progressIntervalMs must not exceed 60000 (1 minute)'
      );
    });
  });

  describe('ensureCacheDirs', () => {
    it('should create both cache directories', async () => {
      const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'imgcast-config-test-'));
      try {
        const config = buildConfig({ cacheDir: tmp });
        await ensureCacheDirs(config);

        expect(fs.statSync(config.downloadDir).isDirectory()).toBe(true);
        expect(fs.statSync(config.imageDir).isDirectory()).toBe(true);
      } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
      }
    });
  });
});
