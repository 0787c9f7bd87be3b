import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadAndValidateConfig } from './main.js';
import { ConfigLoadError, ConfigValidationError, DEFAULT_CONFIG } from './index.js';

describe('Main Configuration Loading', () => {
  const originalEnv = process.env;
  const originalCwd = process.cwd();
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessionkeep-main-'));
    process.env = { HOME: testDir };
  });

  afterEach(() => {
    process.env = originalEnv;
    process.chdir(originalCwd);
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadAndValidateConfig', () => {
    it('should load, overlay, and fill defaults', () => {
      const configPath = path.join(testDir, 'sessionkeep.toml');
      fs.writeFileSync(
        configPath,
        `
[store]
url = "redis://file-host:6379"

[lock]
retries = 2
`,
      );
      process.env.SESSIONKEEP_LOCK_RETRIES = '7';

      const config = loadAndValidateConfig({ configPath });

      expect(config.store.url).toBe('redis://file-host:6379');
      expect(config.lock.retries).toBe(7); // From env
      expect(config.lock.backoff_base_ms).toBe(500); // Default
      expect(config.keys).toEqual(DEFAULT_CONFIG.keys);
    });

    it('should skip env overlay when applyEnv is false', () => {
      const configPath = path.join(testDir, 'sessionkeep.toml');
      fs.writeFileSync(configPath, '[lock]\nretries = 2\n');
      process.env.SESSIONKEEP_LOCK_RETRIES = '7';

      const config = loadAndValidateConfig({ configPath, applyEnv: false });

      expect(config.lock.retries).toBe(2);
    });

    it('should throw ConfigValidationError for invalid values', () => {
      const configPath = path.join(testDir, 'sessionkeep.toml');
      fs.writeFileSync(configPath, '[store]\nmax_connections = 0\n');

      expect(() => loadAndValidateConfig({ configPath })).toThrow(ConfigValidationError);
    });

    it('should skip validation when validate is false', () => {
      const configPath = path.join(testDir, 'sessionkeep.toml');
      fs.writeFileSync(configPath, '[store]\nmax_connections = 0\n');

      const config = loadAndValidateConfig({ configPath, validate: false });

      expect(config.store.max_connections).toBe(0);
    });

    it('should throw when no file is found', () => {
      process.chdir(testDir);

      expect(() => loadAndValidateConfig()).toThrow(ConfigLoadError);
    });

    it('should fall back to defaults when allowMissing is set', () => {
      process.chdir(testDir);
      process.env.SESSIONKEEP_STORE_PROVIDER = 'memory';

      const config = loadAndValidateConfig({ allowMissing: true });

      expect(config.store.provider).toBe('memory');
      expect(config.ttl.default_seconds).toBe(3600);
    });

    it('should still require an explicit path to exist', () => {
      const missing = path.join(testDir, 'nope.toml');

      expect(() => loadAndValidateConfig({ configPath: missing, allowMissing: true })).toThrow(
        ConfigLoadError,
      );
    });
  });
});
