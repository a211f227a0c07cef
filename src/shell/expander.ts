import type { AliasTable, VariableStore } from './store.js';
import { ShellError, errorMessage, isFatalExpansionError } from './errors.js';
import { expandArithmetic } from './arithmetic.js';
import type { Logger } from '../utils/logger.js';

export type Environment = Record<string, string | undefined>;

export interface ExpanderResult {
  value: string;
  /** Return the value as-is, skipping later expanders and token resolution */
  stop?: boolean;
}

/** A host-supplied rewrite step, run after variable substitution. */
export type CustomExpander = (input: string) => ExpanderResult | Promise<ExpanderResult>;

export interface ExpandContext {
  scope?: VariableStore;
  /** Runs a nested line one level deeper than the caller */
  execute: (line: string) => Promise<string>;
}

const FIRST_WORD_END = /[ \t\n|>;&]/;
const VAR_TOKEN = /@([A-Za-z_][A-Za-z0-9_]*)/g;
const ENV_BRACED = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const ENV_SIMPLE = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

export class Expander {
  private expanders: CustomExpander[] = [];

  constructor(
    private aliases: AliasTable,
    private variables: VariableStore,
    private env: Environment,
    private logger: Logger,
  ) {}

  addExpander(expander: CustomExpander): void {
    this.expanders.push(expander);
  }

  /** Alias, variable, custom-expander and token expansion of a whole line. */
  async expand(line: string, ctx: ExpandContext): Promise<string> {
    return this.expandVariablesOnly(this.expandAliases(line), ctx);
  }

  /** Everything `expand` does except aliases; applied to single arguments. */
  async expandVariablesOnly(text: string, ctx: ExpandContext): Promise<string> {
    let result = substitute(text, this.variables);
    if (ctx.scope) {
      result = substitute(result, ctx.scope);
    }

    for (const expander of this.expanders) {
      const out = await expander(result);
      if (out.stop) return out.value;
      result = out.value;
    }

    return this.resolveToken(result, ctx);
  }

  expandAliases(line: string): string {
    const exact = this.aliases.get(line);
    if (exact !== undefined) return exact;

    const match = FIRST_WORD_END.exec(line);
    const firstWord = match ? line.slice(0, match.index) : line;
    const replacement = this.aliases.get(firstWord);
    if (replacement !== undefined && firstWord !== line) {
      return replacement + line.slice(firstWord.length);
    }
    return line;
  }

  /**
   * Resolves a whole string that is exactly one token: `@env:NAME`,
   * `@exec:line` or a variable name. Anything else comes back unchanged.
   */
  async resolveToken(token: string, ctx: ExpandContext): Promise<string> {
    if (token.startsWith('@env:')) {
      return this.env[token.slice('@env:'.length)] ?? token;
    }

    if (token.startsWith('@exec:')) {
      const nested = token.slice('@exec:'.length);
      try {
        return await ctx.execute(nested);
      } catch (err) {
        if (isFatalExpansionError(err)) throw err;
        this.logger.debug('Expander', '@exec failed', { line: nested, error: errorMessage(err) });
        return err instanceof ShellError ? err.output : '';
      }
    }

    return this.variables.get(token) ?? ctx.scope?.get(token) ?? token;
  }

  /**
   * Expansion applied to values assigned with `let`: surrounding quotes,
   * then `$((expr))`, `$(line)`, `${VAR}`/`$VAR` and finally `@name`.
   */
  async expandValue(value: string, ctx: ExpandContext): Promise<string> {
    const lookup = (name: string): string | undefined =>
      this.variables.get(name) ?? ctx.scope?.get(name);

    let result = value.replace(/^["']+|["']+$/g, '');
    result = expandArithmetic(result, (name) => lookup('@' + name));
    result = await this.expandCommandSubstitution(result, ctx);
    result = result
      .replace(ENV_BRACED, (_, name: string) => this.env[name] ?? '')
      .replace(ENV_SIMPLE, (_, name: string) => this.env[name] ?? '');
    return result.replace(VAR_TOKEN, (match) => lookup(match) ?? match);
  }

  private async expandCommandSubstitution(value: string, ctx: ExpandContext): Promise<string> {
    let result = value;
    let from = 0;

    while (true) {
      const start = result.indexOf('$(', from);
      if (start === -1) break;

      let depth = 0;
      let end = -1;
      for (let i = start + 1; i < result.length; i++) {
        if (result[i] === '(') depth++;
        else if (result[i] === ')') depth--;
        if (depth === 0) {
          end = i + 1;
          break;
        }
      }
      if (end === -1) break;

      const nested = result.slice(start + 2, end - 1);
      let replacement: string;
      try {
        replacement = (await ctx.execute(nested)).trim();
      } catch (err) {
        if (isFatalExpansionError(err)) throw err;
        this.logger.debug('Expander', 'command substitution failed', { line: nested, error: errorMessage(err) });
        from = end;
        continue;
      }
      result = result.slice(0, start) + replacement + result.slice(end);
      from = start + replacement.length;
    }

    return result;
  }
}

/** Plain substring replacement of every key, in store order. */
function substitute(text: string, store: VariableStore): string {
  let result = text;
  store.forEach((key, value) => {
    if (key) result = result.replaceAll(key, value);
  });
  return result;
}
