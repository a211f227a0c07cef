/**
 * String-keyed map shared by the engine's variable and alias tables.
 *
 * All methods are synchronous, so each call runs to completion before any
 * other caller can observe the map. Iteration always walks a snapshot: a
 * callback may set or delete keys (even on this same store) without
 * disturbing the walk.
 */
export class StringStore {
  private map = new Map<string, string>();

  constructor(initial?: Record<string, string> | Map<string, string>) {
    if (!initial) return;
    const pairs = initial instanceof Map ? initial.entries() : Object.entries(initial);
    for (const [key, value] of pairs) {
      this.map.set(key, value);
    }
  }

  get(key: string): string | undefined {
    return this.map.get(key);
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  set(key: string, value: string): void {
    this.map.set(key, value);
  }

  delete(key: string): boolean {
    return this.map.delete(key);
  }

  get size(): number {
    return this.map.size;
  }

  keys(): string[] {
    return [...this.map.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.map.entries()];
  }

  /** Return true from the callback to stop early. */
  forEach(fn: (key: string, value: string) => boolean | void): void {
    for (const [key, value] of this.entries()) {
      if (fn(key, value) === true) break;
    }
  }

  sortedForEach(fn: (key: string, value: string) => boolean | void): void {
    const sorted = this.entries().sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, value] of sorted) {
      if (fn(key, value) === true) break;
    }
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.map);
  }
}

/** Variables keyed by their `@name` token. */
export class VariableStore extends StringStore {
  clone(): VariableStore {
    return new VariableStore(this.toObject());
  }
}

/** Aliases keyed by the full or first-word invocation they replace. */
export class AliasTable extends StringStore {
  /** `name=value` lines, sorted by name. */
  export(): string {
    const lines: string[] = [];
    this.sortedForEach((name, value) => {
      lines.push(`${name}=${value}`);
    });
    return lines.length > 0 ? lines.join('\n') + '\n' : '';
  }

  /**
   * Load `name=value` lines. Blank lines and `#` comments are skipped, as
   * are entries whose name contains a space or whose value is empty.
   * Returns the lines that were rejected.
   */
  import(text: string): string[] {
    const rejected: string[] = [];
    for (const raw of text.split(/\r?\n/)) {
      const line = raw.trim();
      if (!line || line.startsWith('#')) continue;
      const eq = line.indexOf('=');
      if (eq === -1) {
        rejected.push(raw);
        continue;
      }
      const name = line.slice(0, eq).trim();
      const value = line.slice(eq + 1).trim();
      if (!name || name.includes(' ') || !value) {
        rejected.push(raw);
        continue;
      }
      this.set(name, value);
    }
    return rejected;
  }
}
