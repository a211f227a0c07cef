import { EventEmitter } from 'node:events';
import { PassThrough, Writable } from 'node:stream';
import { describe, it, expect, beforeEach } from 'vitest';
import { CommandExecutor } from '../../src/shell/CommandExecutor.js';
import type { ChildProcessLike, ProcessSpawner } from '../../src/commands/system/exec.js';
import { DispatchError } from '../../src/shell/errors.js';
import { silentLogger } from '../../src/utils/logger.js';

class FakeChild extends EventEmitter implements ChildProcessLike {
  readonly pid = 4242;
  readonly received: string[] = [];
  readonly stdin = new Writable({
    write: (chunk: Buffer, _encoding, callback) => {
      this.received.push(chunk.toString());
      callback();
    },
  });
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: string[] = [];

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(String(signal));
    setImmediate(() => this.emit('close', null));
    return true;
  }
}

describe('exec', () => {
  let calls: Array<{ program: string; args: string[] }>;
  let children: FakeChild[];
  let script: (child: FakeChild) => void;
  let executor: CommandExecutor;

  beforeEach(() => {
    calls = [];
    children = [];
    script = () => {};
    const spawn: ProcessSpawner = (program, args) => {
      calls.push({ program, args });
      const child = new FakeChild();
      children.push(child);
      setImmediate(() => script(child));
      return child;
    };
    executor = new CommandExecutor({ env: {}, logger: silentLogger, spawn });
  });

  it('streams process output in the foreground', async () => {
    script = (child) => {
      child.stdout.emit('data', Buffer.from('out\n'));
      child.stderr.emit('data', Buffer.from('err\n'));
      child.emit('close', 0);
    };
    expect(await executor.execute('exec echo hi there')).toBe('out\nerr\n');
    expect(calls).toEqual([{ program: 'echo', args: ['hi', 'there'] }]);
  });

  it('writes piped input to the process', async () => {
    script = (child) => {
      child.stdout.emit('data', child.received.join('').toUpperCase());
      child.emit('close', 0);
    };
    expect(await executor.execute('print hello | exec tr a-z A-Z')).toBe('HELLO\n');
    expect(children[0].received).toEqual(['hello\n']);
    expect(children[0].stdin.writableFinished).toBe(true);
  });

  it('closes stdin when there is no piped input', async () => {
    script = (child) => child.emit('close', 0);
    expect(await executor.execute('exec true')).toBe('');
    expect(children[0].received).toEqual([]);
    expect(children[0].stdin.writableFinished).toBe(true);
  });

  it('fails on a non-zero exit code', async () => {
    script = (child) => child.emit('close', 2);
    await expect(executor.execute('exec false')).rejects.toThrow(new DispatchError('exec', 'exited with code 2'));
  });

  it('fails when the process cannot start', async () => {
    script = (child) => child.emit('error', new Error('spawn nope ENOENT'));
    await expect(executor.execute('exec nope')).rejects.toThrow('exec: spawn nope ENOENT');
  });

  it('requires a program', async () => {
    await expect(executor.execute('exec')).rejects.toMatchObject({
      output: 'exec: usage: exec [-b|--background] program [args...]\n',
    });
  });

  it('runs a process as a job with -b', async () => {
    expect(await executor.execute('exec -b server --port 8080')).toBe('[1] PID 4242: server --port 8080\n');
    expect(calls).toEqual([{ program: 'server', args: ['--port', '8080'] }]);
    expect(executor.jobs.get(1)).toMatchObject({ status: 'running', pid: 4242, command: 'server --port 8080' });

    children[0].stdout.emit('data', 'ready\n');
    expect(executor.jobs.logs(1)).toBe('ready\n');

    await executor.jobs.kill(1);
    expect(children[0].signals).toEqual(['SIGTERM']);
    expect(executor.jobs.get(1)?.status).toBe('killed');
  });

  it('marks a background process failed on a non-zero exit', async () => {
    script = (child) => child.emit('close', 1);
    await executor.execute('exec --background task');
    await expect(executor.jobs.wait(1)).rejects.toThrow('task exited with code 1');
    expect(executor.jobs.get(1)?.status).toBe('failed');
  });
});
