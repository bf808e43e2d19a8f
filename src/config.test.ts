import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigManager, DEFAULT_MAX_DEPTH } from './config.js';

describe('ConfigManager', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    ConfigManager.reset();
  });

  it('falls back to defaults for unset variables', () => {
    expect(ConfigManager.load({})).toEqual({ logLevel: 'warn', maxDepth: DEFAULT_MAX_DEPTH });
    expect(ConfigManager.load({ TOON_LOG_LEVEL: '' })).toEqual({ logLevel: 'warn', maxDepth: 256 });
  });

  it('reads and coerces values', () => {
    expect(ConfigManager.load({ TOON_LOG_LEVEL: 'debug', TOON_MAX_DEPTH: '32' })).toEqual({
      logLevel: 'debug',
      maxDepth: 32,
    });
  });

  it('ignores invalid values with a note on stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    expect(ConfigManager.load({ TOON_LOG_LEVEL: 'loud', TOON_MAX_DEPTH: '-1' })).toEqual({
      logLevel: 'warn',
      maxDepth: 256,
    });
    expect(write).toHaveBeenCalledOnce();
  });

  it('caches until reset', () => {
    vi.stubEnv('TOON_MAX_DEPTH', '10');
    ConfigManager.reset();
    expect(ConfigManager.cfg.maxDepth).toBe(10);
    vi.stubEnv('TOON_MAX_DEPTH', '20');
    expect(ConfigManager.cfg.maxDepth).toBe(10);
    ConfigManager.reset();
    expect(ConfigManager.cfg.maxDepth).toBe(20);
    vi.unstubAllEnvs();
  });
});
