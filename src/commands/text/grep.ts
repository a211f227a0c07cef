import type { Command } from '../types.js';
import { parseArgs, type ArgSpec } from '../../utils/args.js';

const spec: ArgSpec = {
  'invert-match': { type: 'boolean', short: 'v' },
  'ignore-case': { type: 'boolean', short: 'i' },
};

/** Substring line filter over stdin. */
const command: Command = async (ctx) => {
  const { flags, positional, unknown } = parseArgs(ctx.args, spec);
  if (unknown.length > 0) {
    ctx.stderr.write(`grep: unknown option: ${unknown[0]}\n`);
    return 2;
  }
  const invert = flags['invert-match'] === true;
  const ignoreCase = flags['ignore-case'] === true;

  if (positional.length === 0) {
    ctx.stderr.write('grep: missing pattern\n');
    return 2;
  }

  const pattern = ignoreCase ? positional.join(' ').toLowerCase() : positional.join(' ');
  const input = ctx.stdin ? await ctx.stdin.readAll() : '';
  const lines = input.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  for (const line of lines) {
    const haystack = ignoreCase ? line.toLowerCase() : line;
    if (haystack.includes(pattern) !== invert) {
      ctx.stdout.write(line + '\n');
    }
  }

  return 0;
};

export default command;
