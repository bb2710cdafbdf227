import { describe, expect, it } from 'vitest';
import { configFromEnv, parseDelay, resolveConfig } from '../config.js';
import { DEFAULT_COLLABORATION_CONFIG } from '../types.js';

describe('resolveConfig', () => {
  it('returns the defaults for an empty configuration', () => {
    expect(resolveConfig()).toEqual({ ...DEFAULT_COLLABORATION_CONFIG, validateAuth: undefined });
  });

  it('keeps null delays instead of falling back', () => {
    const config = resolveConfig({ documentCleanupDelay: null, documentSaveDelay: null, filePollInterval: null });
    expect(config.documentCleanupDelay).toBeNull();
    expect(config.documentSaveDelay).toBeNull();
    expect(config.filePollInterval).toBeNull();
  });

  it('keeps the auth validator', () => {
    const validateAuth = async (token: string) => token === 'test-secret';
    expect(resolveConfig({ validateAuth }).validateAuth).toBe(validateAuth);
  });

  it('rejects invalid values', () => {
    expect(() => resolveConfig({ port: 70000 })).toThrow('Invalid configuration: port');
    expect(() => resolveConfig({ documentSaveDelay: -1 })).toThrow('documentSaveDelay');
    expect(() => resolveConfig({ filePollInterval: 0 })).toThrow('filePollInterval');
    expect(() => resolveConfig({ basePath: '/api/' })).toThrow('basePath');
  });
});

describe('parseDelay', () => {
  it('parses seconds and the disabling words', () => {
    expect(parseDelay('2.5', 'save delay')).toBe(2.5);
    expect(parseDelay('0', 'save delay')).toBe(0);
    expect(parseDelay('off', 'save delay')).toBeNull();
    expect(parseDelay('none', 'save delay')).toBeNull();
  });

  it('rejects anything else', () => {
    expect(() => parseDelay('soon', 'save delay')).toThrow('Invalid save delay: soon');
  });
});

describe('configFromEnv', () => {
  it('reads the DOCROOM variables', () => {
    expect(
      configFromEnv({
        DOCROOM_PORT: '9000',
        DOCROOM_HOST: '127.0.0.1',
        DOCROOM_ROOT: '/srv/notes',
        DOCROOM_TOKEN: 'test-secret',
        DOCROOM_CLEANUP_DELAY: 'off',
        DOCROOM_SAVE_DELAY: '3',
      })
    ).toEqual({
      config: { port: 9000, host: '127.0.0.1', documentCleanupDelay: null, documentSaveDelay: 3 },
      rootDir: '/srv/notes',
      token: 'test-secret',
    });
  });

  it('ignores unrelated variables', () => {
    expect(configFromEnv({ HOME: '/root' })).toEqual({ config: {}, rootDir: undefined, token: undefined });
  });

  it('rejects malformed values', () => {
    expect(() => configFromEnv({ DOCROOM_SAVE_DELAY: 'later' })).toThrow('Invalid environment: DOCROOM_SAVE_DELAY');
  });
});
