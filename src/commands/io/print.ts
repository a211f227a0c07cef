import type { Command } from '../types.js';

function interpretEscapes(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\\' && i + 1 < text.length) {
      switch (text[i + 1]) {
        case 'n': result += '\n'; i++; continue;
        case 't': result += '\t'; i++; continue;
        case '\\': result += '\\'; i++; continue;
      }
    }
    result += text[i];
  }
  return result;
}

/** `print [text...]`: with no arguments, copies stdin through. */
const command: Command = async (ctx) => {
  if (ctx.args.length === 0 && ctx.stdin) {
    ctx.stdout.write(await ctx.stdin.readAll());
    return 0;
  }

  ctx.stdout.write(interpretEscapes(ctx.args.join(' ')) + '\n');
  return 0;
};

export default command;
