import type { Command, CommandOutputStream } from '../types.js';
import type { AliasTable } from '../../shell/store.js';

function listAliases(aliases: AliasTable, stdout: CommandOutputStream): void {
  if (aliases.size === 0) {
    stdout.write('No aliases defined\n');
    return;
  }
  stdout.write('Aliases:\n' + '-'.repeat(40) + '\n');
  aliases.sortedForEach((name, value) => {
    stdout.write(`${name}=${value}\n`);
  });
}

/**
 * `alias` lists, `alias name=value...` defines, `alias name` shows one.
 * Names may contain spaces when quoted: `alias "x z"=w`.
 */
export function createAliasCommand(aliases: AliasTable): Command {
  return async (ctx) => {
    if (ctx.args.length === 0) {
      listAliases(aliases, ctx.stdout);
      return 0;
    }

    let exitCode = 0;
    for (const arg of ctx.args) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx > 0) {
        aliases.set(arg.slice(0, eqIdx).trim(), arg.slice(eqIdx + 1));
        continue;
      }
      const value = aliases.get(arg);
      if (value !== undefined) {
        ctx.stdout.write(`${arg}=${value}\n`);
      } else {
        ctx.stderr.write(`alias: ${arg}: not found\n`);
        exitCode = 1;
      }
    }
    return exitCode;
  };
}

/** `alias add name command...` */
export function createAliasAddCommand(aliases: AliasTable): Command {
  return async (ctx) => {
    const [name, ...rest] = ctx.args;
    if (name === undefined || rest.length === 0) {
      ctx.stderr.write('alias add: usage: alias add name command...\n');
      return 1;
    }
    const value = rest.join(' ');
    aliases.set(name, value);
    ctx.stdout.write(`Setting alias, \`${name}\` command: \`${value}\`\n`);
    return 0;
  };
}

/** `unalias name...`, also registered as `alias rm`. */
export function createUnaliasCommand(aliases: AliasTable, verb: string): Command {
  return async (ctx) => {
    if (ctx.args.length === 0) {
      ctx.stderr.write(`${verb}: usage: ${verb} name ...\n`);
      return 1;
    }
    let exitCode = 0;
    for (const name of ctx.args) {
      if (!aliases.delete(name)) {
        ctx.stderr.write(`${verb}: ${name}: not found\n`);
        exitCode = 1;
      }
    }
    return exitCode;
  };
}
