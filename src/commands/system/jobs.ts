import type { Command, CommandOutputStream } from '../types.js';
import type { JobInfo, JobManager } from '../../shell/jobs.js';
import { errorMessage } from '../../shell/errors.js';
import { parseArgs } from '../../utils/args.js';

function formatDuration(ms: number): string {
  return `${Math.round(ms / 1000)}s`;
}

function isLive(job: JobInfo): boolean {
  return job.status === 'pending' || job.status === 'running';
}

export function createJobsCommand(jobs: JobManager): Command {
  return async (ctx) => {
    const { flags, unknown } = parseArgs(ctx.args, {
      all: { type: 'boolean', short: 'a' },
      verbose: { type: 'boolean', short: 'v' },
    });
    if (unknown.length > 0) {
      ctx.stderr.write(`jobs: unknown option: ${unknown[0]}\nUsage: jobs [-a] [-v]\n`);
      return 1;
    }
    const verbose = flags['verbose'] === true;

    const all = jobs.list();
    if (all.length === 0) {
      ctx.stdout.write('No jobs\n');
      return 0;
    }

    const shown = flags['all'] === true ? all : all.filter(isLive);
    if (shown.length === 0) {
      ctx.stdout.write('No running jobs\n');
      return 0;
    }

    ctx.stdout.write('Background Jobs:\n' + '-'.repeat(80) + '\n');
    for (const job of shown) {
      let command = job.command;
      if (command.length > 60 && !verbose) {
        command = command.slice(0, 57) + '...';
      }
      ctx.stdout.write(
        `[${job.id}] [${job.status}] PID:${job.pid ?? '-'} Duration:${formatDuration(jobs.duration(job.id))}\n`,
      );
      ctx.stdout.write(`    ${command}\n`);

      if (verbose && job.output !== '') {
        const lines = job.output.split('\n');
        ctx.stdout.write('    Output preview:\n');
        for (const line of lines.slice(0, 3)) {
          if (line !== '') ctx.stdout.write(`      ${line}\n`);
        }
        if (lines.length > 3) ctx.stdout.write('      ...\n');
      }
      ctx.stdout.write('\n');
    }
    return 0;
  };
}

function writeDetails(job: JobInfo, duration: number, stdout: CommandOutputStream): void {
  stdout.write('='.repeat(80) + '\n');
  stdout.write(`Job ID: ${job.id}\n`);
  stdout.write(`Command: ${job.command}\n`);
  stdout.write(`Status: ${job.status}\n`);
  stdout.write(`PID: ${job.pid ?? '-'}\n`);
  stdout.write(`Started: ${new Date(job.startTime).toISOString()}\n`);
  if (job.endTime !== null) {
    stdout.write(`Ended: ${new Date(job.endTime).toISOString()}\n`);
  }
  stdout.write(`Duration: ${formatDuration(duration)}\n`);
  if (job.error) {
    stdout.write(`Error: ${job.error.message}\n`);
  }
  if (job.output !== '') {
    const lines = job.output.replace(/\n$/, '').split('\n');
    stdout.write('-'.repeat(80) + '\n');
    stdout.write('Output (last 20 lines):\n');
    if (lines.length > 20) stdout.write('...\n');
    for (const line of lines.slice(-20)) {
      stdout.write(line + '\n');
    }
  }
  stdout.write('='.repeat(80) + '\n');
}

/** `job <id> [logs|kill|wait]` */
export function createJobCommand(jobs: JobManager): Command {
  return async (ctx) => {
    const [idArg, action] = ctx.args;
    if (idArg === undefined) {
      ctx.stderr.write('job: usage: job <id> [logs|kill|wait]\n');
      return 1;
    }

    const id = Number(idArg);
    if (!Number.isInteger(id) || id <= 0) {
      ctx.stderr.write(`Invalid job ID: ${idArg}\n`);
      return 1;
    }
    const job = jobs.get(id);
    if (!job) {
      ctx.stderr.write(`Job ${id} not found\n`);
      return 1;
    }

    switch (action) {
      case undefined:
        writeDetails(job, jobs.duration(id), ctx.stdout);
        return 0;

      case 'logs': {
        const output = jobs.logs(id);
        ctx.stdout.write(output === '' ? 'No output\n' : output);
        return 0;
      }

      case 'kill':
        try {
          await jobs.kill(id);
        } catch (err) {
          ctx.stderr.write(`Error killing job: ${errorMessage(err)}\n`);
          return 1;
        }
        ctx.stdout.write(`Job ${id} killed\n`);
        return 0;

      case 'wait':
        ctx.stdout.write(`Waiting for job ${id}...\n`);
        try {
          await jobs.wait(id, ctx.signal);
        } catch (err) {
          ctx.stderr.write(`Job ${id} failed: ${errorMessage(err)}\n`);
          return 1;
        }
        ctx.stdout.write(`Job ${id} completed\n`);
        return 0;

      default:
        ctx.stderr.write(`Unknown action: ${action}\nValid actions: logs, kill, wait\n`);
        return 1;
    }
  };
}

export function createKillAllCommand(jobs: JobManager): Command {
  return async (ctx) => {
    const errors = await jobs.killAll();
    if (errors.length > 0) {
      ctx.stderr.write('Errors killing some jobs:\n');
      for (const err of errors) {
        ctx.stderr.write(`  ${err.message}\n`);
      }
      return 1;
    }
    ctx.stdout.write('All jobs killed\n');
    return 0;
  };
}

export function createJobCleanCommand(jobs: JobManager): Command {
  return async (ctx) => {
    const removed = jobs.clean();
    ctx.stdout.write(`Removed ${removed} completed/failed job(s)\n`);
    return 0;
  };
}

/** `spawn <line...>` */
export const spawnCommand: Command = async (ctx) => {
  if (ctx.args.length === 0) {
    ctx.stderr.write('spawn: usage: spawn <command line>\n');
    return 1;
  }
  const line = ctx.args.join(' ');
  const id = ctx.spawn(line);
  ctx.stdout.write(`[${id}] ${line}\n`);
  return 0;
};
