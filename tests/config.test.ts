import { describe, it, expect } from 'vitest';
import { resolveEngineConfig } from '../src/config.js';

describe('resolveEngineConfig', () => {
  it('applies defaults', () => {
    const config = resolveEngineConfig({}, {});
    expect(config.maxDepth).toBe(10);
    expect(config.builtins).toBe(true);
    expect(config.onExecute).toBeNull();
    expect(config.env).toEqual({});
  });

  it('reads the depth limit from the environment', () => {
    expect(resolveEngineConfig({}, { SHELLCORE_MAX_DEPTH: '4' }).maxDepth).toBe(4);
    expect(resolveEngineConfig({}, { SHELLCORE_MAX_DEPTH: 'lots' }).maxDepth).toBe(10);
  });

  it('prefers explicit options over the environment', () => {
    const env = { SHELLCORE_MAX_DEPTH: '4', HOME: '/h' };
    const config = resolveEngineConfig({ maxDepth: 6, env: { HOME: '/other' } }, env);
    expect(config.maxDepth).toBe(6);
    expect(config.env).toEqual({ HOME: '/other' });
  });

  it.each([0, -1, 2.5])('rejects maxDepth %s', (maxDepth) => {
    expect(() => resolveEngineConfig({ maxDepth }, {})).toThrow(RangeError);
  });
});
