import type { Command } from '../types.js';

const command: Command = async (ctx) => {
  if (ctx.args.length === 0) {
    ctx.stderr.write('sleep: missing operand\n');
    return 1;
  }

  const seconds = parseFloat(ctx.args[0]);
  if (isNaN(seconds) || seconds < 0) {
    ctx.stderr.write(`sleep: invalid time interval '${ctx.args[0]}'\n`);
    return 1;
  }

  if (ctx.signal.aborted) return 130;

  await new Promise<void>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      ctx.signal.removeEventListener('abort', onAbort);
      resolve();
    }, Math.round(seconds * 1000));
    ctx.signal.addEventListener('abort', onAbort, { once: true });
  });

  return ctx.signal.aborted ? 130 : 0;
};

export default command;
