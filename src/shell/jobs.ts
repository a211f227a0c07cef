import { CancellationError, JobError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'killed';

/** Point-in-time, frozen view of a job. */
export interface JobInfo {
  readonly id: number;
  readonly command: string;
  readonly startTime: number;
  readonly endTime: number | null;
  readonly status: JobStatus;
  readonly pid: number | null;
  readonly output: string;
  readonly error: Error | null;
}

export interface StartOptions {
  /** Requests cancellation of the underlying work */
  cancel: () => void;
  pid?: number;
}

/** Handle passed to work driven by {@link JobManager.launch}. */
export interface JobHandle {
  readonly id: number;
  readonly signal: AbortSignal;
  write(text: string): void;
  setPid(pid: number): void;
}

export type JobWork = (job: JobHandle) => Promise<void>;

interface Job {
  id: number;
  command: string;
  startTime: number;
  endTime: number | null;
  status: JobStatus;
  pid: number | null;
  output: string;
  error: Error | null;
  cancel: (() => void) | null;
  killRequested: boolean;
  done: Promise<void>;
  resolveDone: () => void;
}

const isTerminal = (status: JobStatus): boolean =>
  status === 'completed' || status === 'failed' || status === 'killed';

/**
 * Registry of background work. Jobs stay queryable after they finish until
 * {@link JobManager.clean} prunes them.
 *
 * Killing is cooperative: `kill` asks the work to stop and waits for it to
 * settle, and output written until then is kept.
 */
export class JobManager {
  private jobs = new Map<number, Job>();
  private nextId = 1;

  constructor(private logger: Logger = silentLogger) {}

  add(command: string): number {
    const id = this.nextId++;
    let resolveDone: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      resolveDone = resolve;
    });
    this.jobs.set(id, {
      id,
      command,
      startTime: Date.now(),
      endTime: null,
      status: 'pending',
      pid: null,
      output: '',
      error: null,
      cancel: null,
      killRequested: false,
      done,
      resolveDone,
    });
    this.logger.debug('Jobs', 'added', { id, command });
    return id;
  }

  start(id: number, options: StartOptions): void {
    const job = this.require(id);
    if (job.status !== 'pending') {
      throw new JobError(id, `cannot start: already ${job.status}`);
    }
    job.status = 'running';
    job.cancel = options.cancel;
    job.pid = options.pid ?? null;
    this.logger.debug('Jobs', 'started', { id, pid: job.pid });
  }

  setPid(id: number, pid: number): void {
    this.require(id).pid = pid;
  }

  appendOutput(id: number, text: string): void {
    const job = this.jobs.get(id);
    if (job) job.output += text;
  }

  /** Returns false if the job was already terminal. */
  complete(id: number): boolean {
    const job = this.require(id);
    if (isTerminal(job.status)) return false;
    this.finish(job, job.killRequested ? 'killed' : 'completed', null);
    return true;
  }

  /** Returns false if the job was already terminal. */
  fail(id: number, error: unknown): boolean {
    const job = this.require(id);
    if (isTerminal(job.status)) return false;
    const err = error instanceof Error ? error : new Error(String(error));
    if (job.killRequested) {
      this.finish(job, 'killed', null);
    } else {
      this.logger.warn('Jobs', 'failed', { id, command: job.command, error: err.message });
      this.finish(job, 'failed', err);
    }
    return true;
  }

  get(id: number): JobInfo | undefined {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : undefined;
  }

  list(): JobInfo[] {
    return [...this.jobs.values()]
      .sort((a, b) => a.id - b.id)
      .map(snapshot);
  }

  logs(id: number): string {
    return this.require(id).output;
  }

  /** Milliseconds from start to end, or to now while the job is live. */
  duration(id: number): number {
    const job = this.require(id);
    return (job.endTime ?? Date.now()) - job.startTime;
  }

  async kill(id: number): Promise<void> {
    const job = this.require(id);
    if (isTerminal(job.status)) {
      throw new JobError(id, `is already ${job.status}`);
    }

    job.killRequested = true;
    if (job.status === 'pending') {
      this.finish(job, 'killed', null);
      return;
    }

    this.logger.debug('Jobs', 'kill requested', { id });
    try {
      job.cancel?.();
    } catch (err) {
      this.logger.warn('Jobs', 'cancel function threw', { id, error: errorMessage(err) });
    }
    await job.done;
  }

  /** Kills every live job and returns the errors of kills that failed. */
  async killAll(): Promise<Error[]> {
    const live = [...this.jobs.values()].filter((job) => !isTerminal(job.status));
    const results = await Promise.allSettled(live.map((job) => this.kill(job.id)));
    const errors: Error[] = [];
    for (const result of results) {
      if (result.status === 'rejected') {
        errors.push(result.reason instanceof Error ? result.reason : new Error(String(result.reason)));
      }
    }
    return errors;
  }

  /**
   * Resolves once the job is terminal and rethrows the error it failed with.
   * A killed job rejects with a CancellationError.
   */
  async wait(id: number, signal?: AbortSignal): Promise<void> {
    const job = this.require(id);

    if (!isTerminal(job.status)) {
      if (signal?.aborted) {
        throw new CancellationError(`wait for job ${id} cancelled`);
      }
      if (signal) {
        let onAbort: () => void = () => {};
        const aborted = new Promise<never>((_, reject) => {
          onAbort = () => reject(new CancellationError(`wait for job ${id} cancelled`));
          signal.addEventListener('abort', onAbort, { once: true });
        });
        try {
          await Promise.race([job.done, aborted]);
        } finally {
          signal.removeEventListener('abort', onAbort);
        }
      } else {
        await job.done;
      }
    }

    if (job.status === 'killed') {
      throw new CancellationError(`job ${id} was killed`);
    }
    if (job.error) {
      throw job.error;
    }
  }

  /** Removes terminal jobs and returns how many were removed. */
  clean(): number {
    let removed = 0;
    for (const job of [...this.jobs.values()]) {
      if (isTerminal(job.status)) {
        this.jobs.delete(job.id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Registers `command` and drives `work` in the background with its own
   * AbortController. A rejection from `work` marks the job failed.
   */
  launch(command: string, work: JobWork): number {
    const id = this.add(command);
    const controller = new AbortController();
    this.start(id, { cancel: () => controller.abort() });

    const handle: JobHandle = {
      id,
      signal: controller.signal,
      write: (text) => this.appendOutput(id, text),
      setPid: (pid) => this.setPid(id, pid),
    };

    void this.drive(handle, work);
    return id;
  }

  private async drive(handle: JobHandle, work: JobWork): Promise<void> {
    try {
      await work(handle);
      this.complete(handle.id);
    } catch (err) {
      this.fail(handle.id, err);
    }
  }

  private finish(job: Job, status: JobStatus, error: Error | null): void {
    job.status = status;
    job.error = error;
    job.endTime = Date.now();
    job.cancel = null;
    job.resolveDone();
    this.logger.debug('Jobs', status, { id: job.id, duration: job.endTime - job.startTime });
  }

  private require(id: number): Job {
    const job = this.jobs.get(id);
    if (!job) {
      throw new JobError(id, 'not found');
    }
    return job;
  }
}

function snapshot(job: Job): JobInfo {
  return Object.freeze({
    id: job.id,
    command: job.command,
    startTime: job.startTime,
    endTime: job.endTime,
    status: job.status,
    pid: job.pid,
    output: job.output,
    error: job.error,
  });
}
