import type { Command } from '../types.js';

function pad(n: number, len = 2): string {
  return String(n).padStart(len, '0');
}

/** strftime-style subset, in UTC. */
function formatDate(format: string, d: Date): string {
  return format.replace(/%([YmdHMSsZ%])/g, (_, spec: string) => {
    switch (spec) {
      case 'Y': return String(d.getUTCFullYear());
      case 'm': return pad(d.getUTCMonth() + 1);
      case 'd': return pad(d.getUTCDate());
      case 'H': return pad(d.getUTCHours());
      case 'M': return pad(d.getUTCMinutes());
      case 'S': return pad(d.getUTCSeconds());
      case 's': return String(Math.floor(d.getTime() / 1000));
      case 'Z': return 'UTC';
      default: return '%';
    }
  });
}

/** `date [+FORMAT]`; ISO 8601 by default. */
const command: Command = async (ctx) => {
  const now = new Date();
  const arg = ctx.args[0];

  if (arg !== undefined && arg.startsWith('+')) {
    ctx.stdout.write(formatDate(arg.slice(1), now) + '\n');
  } else {
    ctx.stdout.write(now.toISOString() + '\n');
  }
  return 0;
};

export default command;
