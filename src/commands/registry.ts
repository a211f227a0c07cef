import type { Command } from './types.js';

export type CommandLoader = () => Promise<{ default: Command }>;

export interface ResolvedCommand {
  /** Fully-qualified, space-joined name that matched */
  name: string;
  command: Command;
  /** Words left over after the name */
  args: string[];
}

/**
 * Name-addressed command table. Names may contain spaces (`alias add`);
 * lookup picks the longest registered name that prefixes the invocation.
 */
export class CommandRegistry {
  private commands = new Map<string, Command>();
  private lazy = new Map<string, CommandLoader>();
  private maxWords = 1;

  register(name: string, command: Command): void {
    const key = normalize(name);
    this.commands.set(key, command);
    this.lazy.delete(key);
    this.track(key);
  }

  registerLazy(name: string, loader: CommandLoader): void {
    const key = normalize(name);
    this.lazy.set(key, loader);
    this.commands.delete(key);
    this.track(key);
  }

  unregister(name: string): void {
    const key = normalize(name);
    this.commands.delete(key);
    this.lazy.delete(key);
  }

  has(name: string): boolean {
    const key = normalize(name);
    return this.commands.has(key) || this.lazy.has(key);
  }

  async get(name: string): Promise<Command | undefined> {
    const key = normalize(name);
    const cmd = this.commands.get(key);
    if (cmd) return cmd;

    const loader = this.lazy.get(key);
    if (loader) {
      const mod = await loader();
      this.commands.set(key, mod.default);
      this.lazy.delete(key);
      return mod.default;
    }

    return undefined;
  }

  /** Resolve `name args...` to the longest registered command prefix. */
  async resolve(name: string, args: readonly string[]): Promise<ResolvedCommand | undefined> {
    const words = [name, ...args];
    for (let n = Math.min(this.maxWords, words.length); n >= 1; n--) {
      const qualified = words.slice(0, n).join(' ');
      if (!this.has(qualified)) continue;
      const command = await this.get(qualified);
      if (command) {
        return { name: qualified, command, args: words.slice(n) };
      }
    }
    return undefined;
  }

  list(): string[] {
    const names = new Set([...this.commands.keys(), ...this.lazy.keys()]);
    return [...names].sort();
  }

  private track(key: string): void {
    this.maxWords = Math.max(this.maxWords, key.split(' ').length);
  }
}

function normalize(name: string): string {
  return name.trim().split(/\s+/).join(' ');
}

/** Registry holding the stateless core commands. */
export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry();

  // I/O
  registry.registerLazy('print', () => import('./io/print.js'));
  registry.registerLazy('echo', () => import('./io/print.js'));

  // Text processing
  registry.registerLazy('grep', () => import('./text/grep.js'));

  // System
  registry.registerLazy('sleep', () => import('./system/sleep.js'));
  registry.registerLazy('date', () => import('./system/date.js'));

  return registry;
}
