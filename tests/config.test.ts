import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  loadConfigFromFile,
  loadConfigFromPackageJson,
  loadConfig,
  configFromEnv,
  mergeConfig,
  validateConfig,
  toClientOptions,
  type CvekitConfig
} from '../src/config/index.js';
import { CveConfigurationError } from '../src/errors.js';

describe('Configuration File Support', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cvekit-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadConfigFromFile', () => {
    it('loads JSON config file', () => {
      const configPath = path.join(tempDir, '.cvekitrc.json');
      fs.writeFileSync(configPath, JSON.stringify({ username: 'user@example.com', org: 'example-cna', timeout: 5000 }));

      const config = loadConfigFromFile(configPath);
      expect(config).toEqual({ username: 'user@example.com', org: 'example-cna', timeout: 5000 });
    });

    it('loads .cvekitrc file (implicit JSON)', () => {
      const configPath = path.join(tempDir, '.cvekitrc');
      fs.writeFileSync(configPath, JSON.stringify({ env: 'dev' }));

      expect(loadConfigFromFile(configPath)).toEqual({ env: 'dev' });
    });

    it('returns null for non-existent file', () => {
      expect(loadConfigFromFile(path.join(tempDir, 'nonexistent.json'))).toBeNull();
    });

    it('throws for invalid JSON', () => {
      const configPath = path.join(tempDir, '.cvekitrc');
      fs.writeFileSync(configPath, '{ invalid json }');

      expect(() => loadConfigFromFile(configPath)).toThrow(CveConfigurationError);
      expect(() => loadConfigFromFile(configPath)).toThrow(`${configPath}: invalid JSON`);
    });

    it('throws for settings of the wrong type', () => {
      const configPath = path.join(tempDir, '.cvekitrc');
      fs.writeFileSync(configPath, JSON.stringify({ org: 42 }));

      expect(() => loadConfigFromFile(configPath)).toThrow(`${configPath}: "org" must be a string`);
    });

    it('throws when the file is not an object', () => {
      const configPath = path.join(tempDir, '.cvekitrc');
      fs.writeFileSync(configPath, JSON.stringify(['prod']));

      expect(() => loadConfigFromFile(configPath)).toThrow('configuration must be a JSON object');
    });

    it('ignores unknown keys', () => {
      const configPath = path.join(tempDir, '.cvekitrc');
      fs.writeFileSync(configPath, JSON.stringify({ org: 'example-cna', color: 'blue' }));

      expect(loadConfigFromFile(configPath)).toEqual({ org: 'example-cna' });
    });
  });

  describe('loadConfigFromPackageJson', () => {
    it('loads config from package.json cvekit field', () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({
        name: 'test-project',
        cvekit: { org: 'example-cna', env: 'test' }
      }));

      expect(loadConfigFromPackageJson(tempDir)).toEqual({ org: 'example-cna', env: 'test' });
    });

    it('returns null when no cvekit field', () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({ name: 'test-project' }));

      expect(loadConfigFromPackageJson(tempDir)).toBeNull();
    });

    it('returns null when package.json does not exist', () => {
      expect(loadConfigFromPackageJson(tempDir)).toBeNull();
    });
  });

  describe('loadConfig', () => {
    it('prioritizes explicit config path', () => {
      fs.writeFileSync(path.join(tempDir, '.cvekitrc'), JSON.stringify({ env: 'dev' }));
      fs.writeFileSync(path.join(tempDir, 'custom.json'), JSON.stringify({ env: 'test' }));

      expect(loadConfig(tempDir, 'custom.json')).toEqual({ env: 'test' });
    });

    it('throws for a missing explicit config path', () => {
      expect(() => loadConfig(tempDir, 'missing.json')).toThrow(
        `Config file not found: ${path.join(tempDir, 'missing.json')}`
      );
    });

    it('searches config files in order', () => {
      fs.writeFileSync(path.join(tempDir, '.cvekitrc'), JSON.stringify({ env: 'dev' }));
      fs.writeFileSync(path.join(tempDir, '.cvekitrc.json'), JSON.stringify({ env: 'test' }));

      expect(loadConfig(tempDir)).toEqual({ env: 'dev' });
    });

    it('falls back to package.json', () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({ cvekit: { org: 'pkg-org' } }));

      expect(loadConfig(tempDir)).toEqual({ org: 'pkg-org' });
    });

    it('returns null when no config found', () => {
      expect(loadConfig(tempDir)).toBeNull();
    });
  });

  describe('configFromEnv', () => {
    it('reads CVE_* variables', () => {
      const config = configFromEnv({
        CVE_USER: 'user@example.com',
        CVE_ORG: 'example-cna',
        CVE_API_KEY: 'test-secret',
        CVE_ENVIRONMENT: 'test',
        CVE_API_URL: 'http://localhost:3000/api/',
        HOME: '/home/user'
      });

      expect(config).toEqual({
        username: 'user@example.com',
        org: 'example-cna',
        apiKey: 'test-secret',
        env: 'test',
        url: 'http://localhost:3000/api/'
      });
    });

    it('treats empty values as unset', () => {
      expect(configFromEnv({ CVE_ORG: '', CVE_USER: 'user@example.com' })).toEqual({ username: 'user@example.com' });
    });
  });

  describe('mergeConfig', () => {
    it('later layers override earlier ones', () => {
      const file: CvekitConfig = { username: 'file-user', org: 'file-org', env: 'dev' };
      const env: CvekitConfig = { org: 'env-org' };
      const flags: CvekitConfig = { env: 'test' };

      expect(mergeConfig(file, env, flags)).toEqual({ username: 'file-user', org: 'env-org', env: 'test' });
    });

    it('ignores undefined values and missing layers', () => {
      const merged = mergeConfig({ org: 'file-org' }, null, { org: undefined, apiKey: 'test-secret' });

      expect(merged).toEqual({ org: 'file-org', apiKey: 'test-secret' });
    });
  });

  describe('validateConfig', () => {
    const complete: CvekitConfig = { username: 'user@example.com', org: 'example-cna', apiKey: 'test-secret' };

    it('validates correct config', () => {
      expect(validateConfig(complete)).toEqual({ valid: true, errors: [] });
    });

    it('reports missing credentials', () => {
      const result = validateConfig({});

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Missing username (--username or CVE_USER)',
        'Missing organization short name (--org or CVE_ORG)',
        'Missing API key (--api-key or CVE_API_KEY)'
      ]);
    });

    it('rejects unknown environment', () => {
      const result = validateConfig({ ...complete, env: 'staging' });

      expect(result.errors).toEqual(['Invalid env: staging. Valid options: prod, dev, test']);
    });

    it('accepts unknown environment with explicit URL', () => {
      expect(validateConfig({ ...complete, env: 'local', url: 'http://localhost:3000/api/' }).valid).toBe(true);
    });

    it('rejects non-positive timeout', () => {
      expect(validateConfig({ ...complete, timeout: 0 }).errors).toEqual(['timeout must be a positive number']);
    });
  });

  describe('toClientOptions', () => {
    it('builds client options from a complete config', () => {
      const options = toClientOptions({
        username: 'user@example.com',
        org: 'example-cna',
        apiKey: 'test-secret',
        env: 'test',
        timeout: 1000
      });

      expect(options).toEqual({
        username: 'user@example.com',
        org: 'example-cna',
        apiKey: 'test-secret',
        env: 'test',
        url: undefined,
        timeout: 1000
      });
    });

    it('throws with every validation error', () => {
      expect(() => toClientOptions({ username: 'user@example.com' })).toThrow(
        'Missing organization short name (--org or CVE_ORG)\nMissing API key (--api-key or CVE_API_KEY)'
      );
    });
  });

  describe('complex scenarios', () => {
    it('handles full workflow: load, merge, validate', () => {
      fs.writeFileSync(path.join(tempDir, '.cvekitrc'), JSON.stringify({
        username: 'file-user@example.com',
        org: 'example-cna',
        env: 'prod'
      }));

      const merged = mergeConfig(
        loadConfig(tempDir),
        configFromEnv({ CVE_API_KEY: 'test-secret', CVE_ENVIRONMENT: 'dev' }),
        { env: 'test' }
      );

      expect(merged).toEqual({
        username: 'file-user@example.com',
        org: 'example-cna',
        apiKey: 'test-secret',
        env: 'test'
      });
      expect(validateConfig(merged).valid).toBe(true);
    });
  });
});
