import { describe, it, expect, vi } from 'vitest';
import { CommandRegistry, createDefaultRegistry } from '../../src/commands/registry.js';
import type { Command } from '../../src/commands/types.js';

const noop: Command = async () => 0;

describe('CommandRegistry', () => {
  it('resolves the longest registered prefix', async () => {
    const registry = new CommandRegistry();
    const alias: Command = async () => 0;
    const aliasAdd: Command = async () => 0;
    registry.register('alias', alias);
    registry.register('alias add', aliasAdd);

    const resolved = await registry.resolve('alias', ['add', 'g', 'print hi']);
    expect(resolved).toEqual({ name: 'alias add', command: aliasAdd, args: ['g', 'print hi'] });

    const plain = await registry.resolve('alias', ['g']);
    expect(plain).toEqual({ name: 'alias', command: alias, args: ['g'] });
  });

  it('normalizes whitespace in names', async () => {
    const registry = new CommandRegistry();
    registry.register('  alias   rm ', noop);
    expect(registry.has('alias rm')).toBe(true);
    expect(registry.list()).toEqual(['alias rm']);
  });

  it('returns undefined for unknown commands', async () => {
    const registry = new CommandRegistry();
    expect(await registry.resolve('nope', [])).toBeUndefined();
  });

  it('loads a lazy command once', async () => {
    const registry = new CommandRegistry();
    const loader = vi.fn(async () => ({ default: noop }));
    registry.registerLazy('later', loader);

    expect(registry.has('later')).toBe(true);
    expect(loader).not.toHaveBeenCalled();
    expect(await registry.get('later')).toBe(noop);
    expect(await registry.get('later')).toBe(noop);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('replaces a lazy entry on register and forgets on unregister', async () => {
    const registry = new CommandRegistry();
    registry.registerLazy('x', async () => ({ default: async () => 1 }));
    registry.register('x', noop);
    expect(await registry.get('x')).toBe(noop);
    registry.unregister('x');
    expect(registry.has('x')).toBe(false);
  });

  it('ships the stateless core commands', () => {
    expect(createDefaultRegistry().list()).toEqual(['date', 'echo', 'grep', 'print', 'sleep']);
  });
});
