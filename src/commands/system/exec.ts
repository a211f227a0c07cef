import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import type { Command } from '../types.js';
import type { Environment } from '../../shell/expander.js';
import type { JobManager } from '../../shell/jobs.js';
import { parseArgs } from '../../utils/args.js';

/** The part of a ChildProcess that `exec` uses. */
export interface ChildProcessLike extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type ProcessSpawner = (program: string, args: string[], env: Environment) => ChildProcessLike;

export const spawnProcess: ProcessSpawner = (program, args, env) =>
  spawn(program, args, { env, stdio: ['pipe', 'pipe', 'pipe'] });

/**
 * Feeds `input` to the child, then resolves with the exit code once the
 * process has closed. Aborting `signal` sends SIGTERM; a process killed by
 * a signal reports 128 + 15.
 */
function waitForExit(
  child: ChildProcessLike,
  input: string,
  signal: AbortSignal,
  onData: (text: string) => void,
): Promise<number> {
  return new Promise((resolve, reject) => {
    const stdin = child.stdin;
    if (stdin) {
      // EPIPE: the child exited without reading all of its input
      stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') reject(err);
      });
      if (input !== '') stdin.end(input);
      else stdin.end();
    }

    const forward = (chunk: Buffer | string): void => onData(chunk.toString());
    child.stdout?.on('data', forward);
    child.stderr?.on('data', forward);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    child.once('error', (err: Error) => {
      signal.removeEventListener('abort', onAbort);
      reject(err);
    });
    child.once('close', (code: number | null) => {
      signal.removeEventListener('abort', onAbort);
      resolve(code ?? 143);
    });
  });
}

/** `exec [-b|--background] program [args...]`; piped input becomes the process's stdin. */
export function createExecCommand(jobs: JobManager, spawner: ProcessSpawner = spawnProcess): Command {
  return async (ctx) => {
    const { flags, positional } = parseArgs(
      ctx.args,
      { background: { type: 'boolean', short: 'b' } },
      { stopAtPositional: true },
    );
    const [program, ...args] = positional;
    if (program === undefined) {
      ctx.stderr.write('exec: usage: exec [-b|--background] program [args...]\n');
      return 1;
    }

    const input = ctx.stdin ? await ctx.stdin.readAll() : '';

    if (flags['background'] !== true) {
      const child = spawner(program, args, ctx.env);
      return waitForExit(child, input, ctx.signal, (text) => ctx.stdout.write(text));
    }

    const label = [program, ...args].join(' ');
    const id = jobs.launch(label, async (job) => {
      const child = spawner(program, args, ctx.env);
      if (child.pid !== undefined) job.setPid(child.pid);
      const code = await waitForExit(child, input, job.signal, job.write);
      if (code !== 0) {
        throw new Error(`${program} exited with code ${code}`);
      }
    });

    const pid = jobs.get(id)?.pid;
    ctx.stdout.write(`[${id}] ${pid !== null && pid !== undefined ? `PID ${pid}: ` : ''}${label}\n`);
    return 0;
  };
}
