import type { Command } from '../types.js';
import type { Expander } from '../../shell/expander.js';
import type { VariableStore } from '../../shell/store.js';
import { parseArgs } from '../../utils/args.js';

const VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INTEGER = /^[-+]?[0-9]+$/;

const toKey = (name: string): string => (name.startsWith('@') ? name : '@' + name);

/** User variables: `@name` keys, minus the reserved token forms. */
function userVariables(variables: VariableStore): Array<[string, string]> {
  const result: Array<[string, string]> = [];
  variables.sortedForEach((key, value) => {
    if (key.startsWith('@') && !key.startsWith('@arg') && !key.startsWith('@env:') && !key.startsWith('@exec:')) {
      result.push([key.slice(1), value]);
    }
  });
  return result;
}

interface Assignment {
  name: string;
  value: string;
}

/**
 * Groups `let` arguments into assignments. Accepts `a=1 b=2`, `x = 5` and
 * unquoted multi-word values (`msg=hello world`).
 */
function parseAssignments(args: string[]): { assignments: Assignment[]; invalid: string[] } {
  const assignments: Assignment[] = [];
  const invalid: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    if (eq > 0) {
      assignments.push({ name: arg.slice(0, eq).trim(), value: arg.slice(eq + 1) });
      continue;
    }
    const next = args[i + 1];
    if (eq === -1 && next !== undefined && next.startsWith('=')) {
      let value = next.slice(1);
      i++;
      if (value === '' && i + 1 < args.length) {
        value = args[++i];
      }
      assignments.push({ name: arg, value });
      continue;
    }
    const last = assignments[assignments.length - 1];
    if (last) {
      last.value += ' ' + arg;
    } else {
      invalid.push(arg);
    }
  }

  return { assignments, invalid };
}

export function createLetCommand(variables: VariableStore, expander: Expander): Command {
  return async (ctx) => {
    if (ctx.args.length === 0) {
      ctx.stderr.write('let: usage: let name=value ...\n');
      return 1;
    }

    const { assignments, invalid } = parseAssignments(ctx.args);
    let exitCode = 0;

    for (const arg of invalid) {
      ctx.stderr.write(`let: invalid assignment: ${arg} (expected name=value)\n`);
      exitCode = 1;
    }

    for (const { name, value } of assignments) {
      if (!VAR_NAME.test(name)) {
        ctx.stderr.write(`let: invalid variable name: ${name} (must start with letter/underscore)\n`);
        exitCode = 1;
        continue;
      }
      const expanded = await expander.expandValue(value.trim(), {
        scope: ctx.scope,
        execute: ctx.execute,
      });
      variables.set('@' + name, expanded);
      ctx.stdout.write(`${name} = ${expanded}\n`);
    }

    return exitCode;
  };
}

/** `set` lists global variables; `set name value...` assigns one. */
export function createSetCommand(variables: VariableStore): Command {
  return async (ctx) => {
    if (ctx.args.length === 0) {
      variables.sortedForEach((key, value) => {
        ctx.stdout.write(`${key}=${value}\n`);
      });
      return 0;
    }

    const [name, ...rest] = ctx.args;
    if (rest.length === 0) {
      const value = variables.get(toKey(name));
      if (value === undefined) {
        ctx.stderr.write(`set: ${name}: not set\n`);
        return 1;
      }
      ctx.stdout.write(`${value}\n`);
      return 0;
    }
    variables.set(toKey(name), rest.join(' '));
    return 0;
  };
}

export function createUnsetCommand(variables: VariableStore): Command {
  return async (ctx) => {
    if (ctx.args.length === 0) {
      ctx.stderr.write('unset: usage: unset name ...\n');
      return 1;
    }
    for (const name of ctx.args) {
      if (variables.delete(toKey(name))) {
        ctx.stdout.write(`Removed variable: ${name}\n`);
      } else {
        ctx.stdout.write(`Variable not found: ${name}\n`);
      }
    }
    return 0;
  };
}

export function createVarsCommand(variables: VariableStore): Command {
  return async (ctx) => {
    const { flags, unknown } = parseArgs(ctx.args, {
      json: { type: 'boolean' },
      export: { type: 'boolean' },
    });
    if (unknown.length > 0) {
      ctx.stderr.write(`vars: unknown option: ${unknown[0]}\nUsage: vars [--json|--export]\n`);
      return 1;
    }
    const vars = userVariables(variables);

    if (flags['json'] === true) {
      ctx.stdout.write(JSON.stringify(Object.fromEntries(vars), null, 2) + '\n');
      return 0;
    }

    if (flags['export'] === true) {
      ctx.stdout.write('# Variable export\n');
      for (const [name, value] of vars) {
        ctx.stdout.write(`export ${name.toUpperCase()}="${value.replaceAll('"', '\\"')}"\n`);
      }
      return 0;
    }

    if (vars.length === 0) {
      ctx.stdout.write('No variables set\n');
      return 0;
    }

    ctx.stdout.write('Variables:\n' + '-'.repeat(60) + '\n');
    for (const [name, value] of vars) {
      const display = value.length > 50 ? value.slice(0, 47) + '...' : value;
      ctx.stdout.write(`${name.padEnd(20)} = ${display}\n`);
    }
    return 0;
  };
}

/** `inc name [n]` / `dec name [n]`; an unset variable counts as 0. */
export function createCounterCommand(variables: VariableStore, direction: 1 | -1): Command {
  const verb = direction === 1 ? 'inc' : 'dec';
  return async (ctx) => {
    const [name, amountArg] = ctx.args;
    if (name === undefined || ctx.args.length > 2) {
      ctx.stderr.write(`${verb}: usage: ${verb} name [amount]\n`);
      return 1;
    }

    if (amountArg !== undefined && !INTEGER.test(amountArg)) {
      ctx.stderr.write(`${verb}: invalid amount: ${amountArg} (must be integer)\n`);
      return 1;
    }
    const amount = amountArg === undefined ? 1 : parseInt(amountArg, 10);

    const key = toKey(name);
    const current = variables.get(key) ?? '0';
    if (!INTEGER.test(current.trim())) {
      ctx.stderr.write(`${verb}: variable ${name} is not numeric: ${current}\n`);
      return 1;
    }

    const next = parseInt(current, 10) + direction * amount;
    variables.set(key, String(next));
    ctx.stdout.write(`${name.replace(/^@/, '')} = ${next}\n`);
    return 0;
  };
}
