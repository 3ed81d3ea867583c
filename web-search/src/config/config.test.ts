import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig, mergeConfigs, parseConfig } from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'web-search-config-test-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load valid configuration', async () => {
    const configPath = path.join(tempDir, 'config.json');
    const testConfig = {
      engine: 'Yahoo! BOSS',
      engines: {
        'Yahoo! BOSS': { key: 'test-key', secret: 'test-secret' },
      },
      transport: { timeoutMs: 2000, userAgent: 'config-test' },
    };

    await fs.writeFile(configPath, JSON.stringify(testConfig, null, 2));

    const config = await loadConfig(configPath);

    expect(config.engine).toBe('Yahoo! BOSS');
    expect(config.engines['Yahoo! BOSS']).toEqual({ key: 'test-key', secret: 'test-secret' });
    expect(config.transport).toEqual({ timeoutMs: 2000, userAgent: 'config-test' });
  });

  it('should merge with defaults for partial config', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ transport: { timeoutMs: 500 } }));

    const config = await loadConfig(configPath);

    expect(config.transport.timeoutMs).toBe(500);
    expect(config.transport.userAgent).toBeDefined();
  });

  it('should throw when the explicit config file is missing', async () => {
    const configPath = path.join(tempDir, 'missing.json');

    await expect(loadConfig(configPath)).rejects.toThrow(`Config file not found or invalid: ${configPath}`);
  });

  it('should throw when the explicit config file is not valid JSON', async () => {
    const configPath = path.join(tempDir, 'broken.json');
    await fs.writeFile(configPath, '{ engine: Bing');

    await expect(loadConfig(configPath)).rejects.toThrow(`Config file not found or invalid: ${configPath}`);
  });

  it('should throw when credentials are not strings', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ engines: { Bing: { key: 42 } } }));

    await expect(loadConfig(configPath)).rejects.toThrow(`Config file not found or invalid: ${configPath}`);
  });
});

describe('mergeConfigs', () => {
  it('should return defaults when nothing is loaded', () => {
    expect(mergeConfigs(null, null)).toEqual(DEFAULT_CONFIG);
  });

  it('should merge credentials per engine', () => {
    const config = mergeConfigs(
      { engines: { Bing: { key: 'old-key', type: 'searchweb' } } },
      { engines: { Bing: { key: 'new-key' }, 'Yahoo! BOSS': { key: 'test-key', secret: 'test-secret' } } }
    );

    expect(config.engines).toEqual({
      Bing: { key: 'new-key', type: 'searchweb' },
      'Yahoo! BOSS': { key: 'test-key', secret: 'test-secret' },
    });
  });

  it('should let later configs win', () => {
    const config = mergeConfigs({ engine: 'Bing', debug: true }, { engine: 'Yahoo! BOSS', debug: false });

    expect(config.engine).toBe('Yahoo! BOSS');
    expect(config.debug).toBe(false);
  });

  it('should not modify the defaults', () => {
    mergeConfigs({ engines: { Bing: { key: 'test-key' } }, transport: { timeoutMs: 1 } });

    expect(DEFAULT_CONFIG.engines).toEqual({});
    expect(DEFAULT_CONFIG.transport.timeoutMs).toBe(15000);
  });
});

describe('parseConfig', () => {
  it('should accept a complete config', () => {
    expect(parseConfig({ engine: 'Bing', engines: { Bing: { key: 'test-key' } }, debug: true })).toEqual({
      engine: 'Bing',
      engines: { Bing: { key: 'test-key' } },
      debug: true,
    });
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseConfig([])).toThrow('config must be a JSON object');
    expect(() => parseConfig({ engine: 3 })).toThrow('engine must be a string');
    expect(() => parseConfig({ engines: { Bing: 'test-key' } })).toThrow('engines.Bing must be an object');
    expect(() => parseConfig({ engines: { Bing: { key: 42 } } })).toThrow('engines.Bing.key must be a string');
    expect(() => parseConfig({ transport: { timeoutMs: -1 } })).toThrow(
      'transport.timeoutMs must be a positive number'
    );
  });
});
