import { describe, it, expect, beforeEach } from 'vitest';
import { CommandExecutor } from '../../src/shell/CommandExecutor.js';
import type { JobHandle } from '../../src/shell/jobs.js';
import { RecursionError } from '../../src/shell/errors.js';
import { silentLogger } from '../../src/utils/logger.js';

const untilAborted = (job: JobHandle): Promise<void> =>
  new Promise((resolve) => {
    job.signal.addEventListener('abort', () => resolve(), { once: true });
  });

describe('job commands', () => {
  let executor: CommandExecutor;

  beforeEach(() => {
    executor = new CommandExecutor({ env: {}, logger: silentLogger });
  });

  describe('jobs', () => {
    it('reports an empty table', async () => {
      expect(await executor.execute('jobs')).toBe('No jobs\n');
    });

    it('lists live jobs', async () => {
      executor.jobs.launch('work', untilAborted);
      expect(await executor.execute('jobs')).toBe(
        'Background Jobs:\n' + '-'.repeat(80) + '\n[1] [running] PID:- Duration:0s\n    work\n\n',
      );
      await executor.jobs.killAll();
    });

    it('hides finished jobs unless -a is given', async () => {
      const id = executor.jobs.launch('quick', async () => {});
      await executor.jobs.wait(id);
      expect(await executor.execute('jobs')).toBe('No running jobs\n');
      expect(await executor.execute('jobs -a')).toContain('[1] [completed] PID:- Duration:0s\n    quick\n');
    });

    it('rejects unknown options', async () => {
      await expect(executor.execute('jobs --all')).resolves.toBe('No jobs\n');
      await expect(executor.execute('jobs -x')).rejects.toMatchObject({
        message: 'jobs: exited with code 1',
        output: 'jobs: unknown option: -x\nUsage: jobs [-a] [-v]\n',
      });
    });

    it('previews output with -v', async () => {
      executor.jobs.launch('chatty', async (job) => {
        job.write('one\ntwo\n');
        await untilAborted(job);
      });
      expect(await executor.execute('jobs -v')).toContain('    Output preview:\n      one\n      two\n');
      await executor.jobs.killAll();
    });
  });

  describe('job', () => {
    it('shows job details', async () => {
      const id = executor.jobs.launch('detail', async (job) => {
        job.write('line\n');
      });
      await executor.jobs.wait(id);
      const output = await executor.execute('job 1');
      expect(output).toContain('Job ID: 1\n');
      expect(output).toContain('Command: detail\n');
      expect(output).toContain('Status: completed\n');
      expect(output).toContain('Output (last 20 lines):\nline\n');
    });

    it('prints logs', async () => {
      const id = executor.jobs.launch('logger', async (job) => {
        job.write('hello\n');
      });
      await executor.jobs.wait(id);
      expect(await executor.execute('job 1 logs')).toBe('hello\n');
    });

    it('reports empty logs', async () => {
      const id = executor.jobs.launch('silent', async () => {});
      await executor.jobs.wait(id);
      expect(await executor.execute('job 1 logs')).toBe('No output\n');
    });

    it('kills a job once', async () => {
      executor.jobs.launch('loop', untilAborted);
      expect(await executor.execute('job 1 kill')).toBe('Job 1 killed\n');
      expect(executor.jobs.get(1)?.status).toBe('killed');
      await expect(executor.execute('job 1 kill')).rejects.toMatchObject({
        output: 'Error killing job: job 1 is already killed\n',
      });
    });

    it('waits for a job', async () => {
      executor.jobs.launch('later', () => new Promise<void>((resolve) => setTimeout(() => resolve(), 10)));
      expect(await executor.execute('job 1 wait')).toBe('Waiting for job 1...\nJob 1 completed\n');
    });

    it('reports a failed job when waiting', async () => {
      executor.jobs.launch('broken', async () => {
        throw new Error('boom');
      });
      await expect(executor.execute('job 1 wait')).rejects.toMatchObject({
        output: 'Waiting for job 1...\nJob 1 failed: boom\n',
      });
    });

    it('validates the job ID', async () => {
      await expect(executor.execute('job 9')).rejects.toMatchObject({ output: 'Job 9 not found\n' });
      await expect(executor.execute('job abc')).rejects.toMatchObject({ output: 'Invalid job ID: abc\n' });
    });
  });

  describe('killall and jobclean', () => {
    it('kills every live job and cleans up', async () => {
      executor.jobs.launch('a', untilAborted);
      executor.jobs.launch('b', untilAborted);
      expect(await executor.execute('killall')).toBe('All jobs killed\n');
      expect(await executor.execute('jobclean')).toBe('Removed 2 completed/failed job(s)\n');
      expect(executor.jobs.list()).toEqual([]);
    });
  });

  describe('spawn', () => {
    it('runs a line in the background', async () => {
      expect(await executor.execute('spawn "print hi"')).toBe('[1] print hi\n');
      await executor.jobs.wait(1);
      expect(executor.jobs.logs(1)).toBe('hi\n');
    });

    it('bounds a line that keeps spawning itself', async () => {
      executor = new CommandExecutor({ env: {}, logger: silentLogger, maxDepth: 4 });
      executor.setAlias('loop', 'spawn loop');
      expect(await executor.execute('loop')).toBe('[1] loop\n');

      const errors: unknown[] = [];
      for (let id = 1; executor.jobs.get(id) !== undefined; id++) {
        errors.push(await executor.jobs.wait(id).then(() => null, (err: unknown) => err));
      }

      expect(executor.jobs.list().map((job) => job.status)).toEqual(['completed', 'completed', 'completed', 'failed']);
      expect(errors[3]).toBeInstanceOf(RecursionError);
      expect(executor.jobs.get(4)?.error?.message).toBe(
        'maximum execution depth exceeded (4) - possible infinite recursion',
      );
    });

    it('passes the caller scope to the job', async () => {
      expect(await executor.execute('spawn print @who', { '@who': 'scoped' })).toBe('[1] print scoped\n');
      await executor.jobs.wait(1);
      expect(executor.jobs.logs(1)).toBe('scoped\n');
    });
  });
});
