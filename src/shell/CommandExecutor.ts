import type { Command } from '../commands/types.js';
import { CommandRegistry, createDefaultRegistry, type CommandLoader } from '../commands/registry.js';
import { createLetCommand, createSetCommand, createUnsetCommand, createVarsCommand, createCounterCommand } from '../commands/system/vars.js';
import { createAliasCommand, createAliasAddCommand, createUnaliasCommand } from '../commands/system/alias.js';
import {
  createJobsCommand,
  createJobCommand,
  createKillAllCommand,
  createJobCleanCommand,
  spawnCommand,
} from '../commands/system/jobs.js';
import { createExecCommand, spawnProcess, type ProcessSpawner } from '../commands/system/exec.js';
import { resolveEngineConfig, type EngineConfig, type EngineOptions } from '../config.js';
import { Expander, type CustomExpander } from './expander.js';
import { Interpreter, type ExecutionContext } from './interpreter.js';
import { RecursionGuard } from './depth.js';
import { JobManager } from './jobs.js';
import { parse } from './parser.js';
import { AliasTable, VariableStore } from './store.js';
import { CancellationError, ShellError, asShellError, isCancellation } from './errors.js';

export interface CommandExecutorOptions extends EngineOptions {
  /** Process launcher used by `exec` (default: node:child_process spawn) */
  spawn?: ProcessSpawner;
}

/** Variables visible to one call only. A plain object is copied into a fresh store. */
export type Scope = VariableStore | Record<string, string>;

export interface RunOptions {
  scope?: Scope;
  /** Abort signal to cancel the command */
  signal?: AbortSignal;
  /** Timeout in milliseconds */
  timeout?: number;
}

export interface ExecutionResult {
  output: string;
  error: ShellError | null;
  success: boolean;
  /** Milliseconds */
  duration: number;
  commandLine: string;
}

const toStore = (scope: Scope | undefined): VariableStore | undefined =>
  scope === undefined || scope instanceof VariableStore ? scope : new VariableStore(scope);

/**
 * The engine: expands a line, parses it into chains and runs them against
 * the command registry. Each instance owns its variables, aliases and jobs.
 */
export class CommandExecutor {
  readonly variables = new VariableStore();
  readonly aliases = new AliasTable();
  readonly jobs: JobManager;
  readonly registry: CommandRegistry;

  private config: EngineConfig;
  private expander: Expander;
  private interpreter: Interpreter;
  private guard: RecursionGuard;

  constructor(options: CommandExecutorOptions = {}) {
    this.config = resolveEngineConfig(options);
    const { logger } = this.config;

    this.guard = new RecursionGuard(this.config.maxDepth);
    this.jobs = new JobManager(logger);
    this.expander = new Expander(this.aliases, this.variables, this.config.env, logger);
    this.registry = this.config.builtins ? createDefaultRegistry() : new CommandRegistry();

    this.interpreter = new Interpreter({
      registry: this.registry,
      expander: this.expander,
      jobs: this.jobs,
      env: this.config.env,
      fileHandler: this.config.fileHandler,
      logger,
      executeNested: (parent, line) => this.executeAt(parent, line, parent.scope, parent.signal),
      spawnNested: (parent, line) => this.launch(parent, line, parent.scope),
    });

    if (this.config.builtins) {
      this.registerBuiltins(options.spawn ?? spawnProcess);
    }
  }

  get maxDepth(): number {
    return this.guard.maxDepth;
  }

  /** Executions currently in flight, nested ones included. */
  get activeExecutions(): number {
    return this.guard.active;
  }

  // ─── Execution ───

  /** Runs `line` to completion; rejects with a ShellError carrying partial output. */
  execute(line: string, scope?: Scope): Promise<string> {
    return this.executeAt(null, line, toStore(scope), new AbortController().signal);
  }

  /** Like `execute`, stopping between stages once `signal` aborts. */
  executeWithContext(signal: AbortSignal, line: string, scope?: Scope): Promise<string> {
    return this.executeAt(null, line, toStore(scope), signal);
  }

  /** Never rejects: failures are reported on the result. */
  async run(line: string, options: RunOptions = {}): Promise<ExecutionResult> {
    const started = Date.now();
    const controller = new AbortController();
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    // Forward external signal
    const forward = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', forward, { once: true });

    if (options.timeout !== undefined && options.timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeout);
    }

    const result = (output: string, error: ShellError | null): ExecutionResult => ({
      output,
      error,
      success: error === null,
      duration: Date.now() - started,
      commandLine: line,
    });

    try {
      const output = await this.executeWithContext(controller.signal, line, options.scope);
      return result(output, null);
    } catch (err) {
      let error = asShellError(err);
      if (timedOut && isCancellation(error)) {
        error = new CancellationError(`timed out after ${options.timeout}ms`, { cause: error }).withOutput(error.output);
      }
      return result(error.output, error);
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
      options.signal?.removeEventListener('abort', forward);
    }
  }

  /** Runs `line` as a background job, independent of any caller's signal. */
  spawn(line: string, scope?: Scope): number {
    return this.launch(null, line, toStore(scope));
  }

  /** A job started from inside an execution runs one level below it. */
  private launch(parent: ExecutionContext | null, line: string, scope: VariableStore | undefined): number {
    return this.jobs.launch(line, async (job) => {
      try {
        job.write(await this.executeAt(parent, line, scope, job.signal));
      } catch (err) {
        if (err instanceof ShellError) job.write(err.output);
        throw err;
      }
    });
  }

  private async executeAt(
    parent: ExecutionContext | null,
    line: string,
    scope: VariableStore | undefined,
    signal: AbortSignal,
  ): Promise<string> {
    const startTime = Date.now();
    const parentDepth = parent?.depth ?? 0;

    try {
      const output = await this.guard.run(parentDepth, async (depth) => {
        if (signal.aborted) {
          throw new CancellationError();
        }
        const ctx: ExecutionContext = { depth, signal, startTime, scope, parent };
        const expanded = await this.expander.expand(line, this.interpreter.expandContext(ctx));
        return this.interpreter.runChains(ctx, parse(expanded));
      });
      if (parent === null) this.report(line, startTime, null);
      return output;
    } catch (err) {
      const error = asShellError(err);
      if (parent === null) this.report(line, startTime, error);
      throw error;
    }
  }

  private report(line: string, startTime: number, error: ShellError | null): void {
    const duration = Date.now() - startTime;
    const { logger, onExecute } = this.config;
    logger.debug('Executor', error ? 'failed' : 'executed', {
      line,
      duration,
      ...(error ? { error: error.message } : {}),
    });
    if (!onExecute) return;
    try {
      onExecute({ line, startTime, duration, success: error === null, error, depth: 1 });
    } catch (err) {
      logger.warn('Executor', 'onExecute hook threw', { error: err });
    }
  }

  // ─── Registration ───

  register(name: string, command: Command): void {
    this.registry.register(name, command);
  }

  registerLazy(name: string, loader: CommandLoader): void {
    this.registry.registerLazy(name, loader);
  }

  addExpander(expander: CustomExpander): void {
    this.expander.addExpander(expander);
  }

  getAvailableCommands(): string[] {
    return this.registry.list();
  }

  // ─── Aliases ───

  setAlias(name: string, value: string): void {
    this.aliases.set(name, value);
  }

  getAlias(name: string): string | undefined {
    return this.aliases.get(name);
  }

  removeAlias(name: string): boolean {
    return this.aliases.delete(name);
  }

  getAliases(): Record<string, string> {
    return this.aliases.toObject();
  }

  exportAliases(): string {
    return this.aliases.export();
  }

  /** Returns the lines that were not valid `name=value` entries. */
  importAliases(text: string): string[] {
    return this.aliases.import(text);
  }

  private registerBuiltins(spawner: ProcessSpawner): void {
    const { registry, variables, aliases, jobs } = this;

    registry.register('let', createLetCommand(variables, this.expander));
    registry.register('set', createSetCommand(variables));
    registry.register('unset', createUnsetCommand(variables));
    registry.register('vars', createVarsCommand(variables));
    registry.register('inc', createCounterCommand(variables, 1));
    registry.register('dec', createCounterCommand(variables, -1));

    registry.register('alias', createAliasCommand(aliases));
    registry.register('alias add', createAliasAddCommand(aliases));
    registry.register('alias rm', createUnaliasCommand(aliases, 'alias rm'));
    registry.register('unalias', createUnaliasCommand(aliases, 'unalias'));

    registry.register('jobs', createJobsCommand(jobs));
    registry.register('job', createJobCommand(jobs));
    registry.register('killall', createKillAllCommand(jobs));
    registry.register('jobclean', createJobCleanCommand(jobs));
    registry.register('spawn', spawnCommand);
    registry.register('exec', createExecCommand(jobs, spawner));
  }
}
