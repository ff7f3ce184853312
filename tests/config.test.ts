import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/config';

describe('resolveConfig (CONFIG)', () => {
  it('should default to typst on the PATH with no timeout', () => {
    expect(resolveConfig({}, {})).toEqual({ typstBin: 'typst', timeoutMs: null });
  });

  it('should read the environment', () => {
    expect(
      resolveConfig({}, { TYPST_RSX_BIN: '/usr/local/bin/typst', TYPST_RSX_TIMEOUT_MS: '1500' })
    ).toEqual({ typstBin: '/usr/local/bin/typst', timeoutMs: 1500 });
  });

  it('should prefer explicit overrides to the environment', () => {
    const env = { TYPST_RSX_BIN: 'env-typst', TYPST_RSX_TIMEOUT_MS: '1500' };
    expect(resolveConfig({ typstBin: 'cli-typst', timeoutMs: 10 }, env)).toEqual({
      typstBin: 'cli-typst',
      timeoutMs: 10,
    });
    expect(resolveConfig({ timeoutMs: null }, env).timeoutMs).toBeNull();
  });

  it('should treat an empty timeout variable as unset', () => {
    expect(resolveConfig({}, { TYPST_RSX_TIMEOUT_MS: ' ' }).timeoutMs).toBeNull();
  });

  it('should reject a timeout variable that is not a positive integer', () => {
    expect(() => resolveConfig({}, { TYPST_RSX_TIMEOUT_MS: 'soon' })).toThrow(
      'TYPST_RSX_TIMEOUT_MS must be a positive integer number of milliseconds, got "soon"'
    );
    expect(() => resolveConfig({}, { TYPST_RSX_TIMEOUT_MS: '-5' })).toThrow(TypeError);
  });

  it('should reject an invalid timeout override', () => {
    expect(() => resolveConfig({ timeoutMs: 1.5 }, {})).toThrow(
      'timeoutMs must be a positive integer, got 1.5'
    );
  });

  it('should fall back to process.env when no environment is given', () => {
    process.env.TYPST_RSX_BIN = 'from-process';
    expect(resolveConfig().typstBin).toBe('from-process');
  });
});
