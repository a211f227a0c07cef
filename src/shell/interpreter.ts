import type { ParsedChain, ParsedCommand, ParsedLine } from './types.js';
import type { CommandRegistry } from '../commands/registry.js';
import type {
  CommandOutputStream,
  CommandInputStream,
  CommandContext,
} from '../commands/types.js';
import type { Environment, ExpandContext, Expander } from './expander.js';
import type { JobManager } from './jobs.js';
import type { VariableStore } from './store.js';
import {
  CancellationError,
  CommandNotFoundError,
  DispatchError,
  RedirectError,
  ShellError,
  asShellError,
  errorMessage,
} from './errors.js';
import type { Logger } from '../utils/logger.js';

/** State of one execution. Nested executions derive theirs from the caller's. */
export interface ExecutionContext {
  readonly depth: number;
  readonly signal: AbortSignal;
  readonly startTime: number;
  readonly scope?: VariableStore;
  readonly parent: ExecutionContext | null;
}

/** Writes redirected output to `path`, replacing any previous content. */
export type FileHandler = (path: string, content: string) => Promise<void>;

export interface InterpreterConfig {
  registry: CommandRegistry;
  expander: Expander;
  jobs: JobManager;
  env: Environment;
  fileHandler: FileHandler;
  logger: Logger;
  /** Runs `line` as a nested execution one level below `parent` */
  executeNested: (parent: ExecutionContext, line: string) => Promise<string>;
  /** Launches `line` as a job whose execution sits one level below `parent` */
  spawnNested: (parent: ExecutionContext, line: string) => number;
}

export class Interpreter {
  private config: InterpreterConfig;

  constructor(config: InterpreterConfig) {
    this.config = config;
  }

  /**
   * Runs every chain in order and returns their concatenated output. The
   * first failing chain stops the run; the error it raises carries all
   * output produced up to and including the failing stage.
   */
  async runChains(ctx: ExecutionContext, line: ParsedLine): Promise<string> {
    let output = '';

    for (const chain of line.chains) {
      if (chain.background) {
        output += this.launchBackground(ctx, chain);
        continue;
      }
      try {
        output += await this.runChain(ctx, chain);
      } catch (err) {
        const error = asShellError(err);
        throw error.withOutput(output + error.output);
      }
    }

    if (line.redirect !== null) {
      const target = await this.config.expander.expandVariablesOnly(line.redirect, this.expandContext(ctx));
      try {
        await this.config.fileHandler(target, output);
      } catch (err) {
        this.config.logger.warn('Executor', 'redirect failed', { target, error: errorMessage(err) });
        throw new RedirectError(target, { cause: err }).withOutput(output);
      }
    }

    return output;
  }

  /**
   * Runs the stages of one chain, feeding each stage the previous stage's
   * output. Returns the last stage's output; `onOutput` sees it as written.
   */
  async runChain(
    ctx: ExecutionContext,
    chain: ParsedChain,
    onOutput?: (text: string) => void,
  ): Promise<string> {
    let stdin: string | undefined;
    let stage: ParsedCommand | null = chain.head;

    while (stage !== null) {
      if (ctx.signal.aborted) {
        throw new CancellationError();
      }
      const last: boolean = stage.next === null;
      stdin = await this.runStage(ctx, stage, stdin, last ? onOutput : undefined);
      stage = stage.next;
    }

    return stdin ?? '';
  }

  private async runStage(
    ctx: ExecutionContext,
    stage: ParsedCommand,
    input: string | undefined,
    onOutput?: (text: string) => void,
  ): Promise<string> {
    const { expander, registry } = this.config;
    const expandCtx = this.expandContext(ctx);

    const name = await expander.expandVariablesOnly(stage.name, expandCtx);
    const args: string[] = [];
    for (const arg of stage.args) {
      args.push(await expander.expandVariablesOnly(arg, expandCtx));
    }

    const resolved = await registry.resolve(name, args);
    if (!resolved) {
      throw new CommandNotFoundError(name);
    }

    let buffer = '';
    const out: CommandOutputStream = {
      write: (text: string) => {
        buffer += text;
        onOutput?.(text);
      },
    };

    const cmdCtx: CommandContext = {
      args: resolved.args,
      env: this.config.env,
      stdout: out,
      stderr: out,
      signal: ctx.signal,
      stdin: input !== undefined ? createStringReader(input) : undefined,
      scope: ctx.scope,
      execute: (line) => this.config.executeNested(ctx, line),
      spawn: (line) => this.config.spawnNested(ctx, line),
    };

    let exitCode: number;
    try {
      exitCode = await resolved.command(cmdCtx);
    } catch (err) {
      if (err instanceof ShellError) {
        throw err.withOutput(buffer);
      }
      if (ctx.signal.aborted) {
        throw new CancellationError(undefined, { cause: err }).withOutput(buffer);
      }
      throw new DispatchError(resolved.name, errorMessage(err), { cause: err }).withOutput(buffer);
    }

    if (exitCode !== 0) {
      if (ctx.signal.aborted) {
        throw new CancellationError().withOutput(buffer);
      }
      throw new DispatchError(resolved.name, `exited with code ${exitCode}`).withOutput(buffer);
    }

    return buffer;
  }

  private launchBackground(ctx: ExecutionContext, chain: ParsedChain): string {
    const id = this.config.jobs.launch(chain.text, async (job) => {
      const jobCtx: ExecutionContext = {
        depth: ctx.depth,
        signal: job.signal,
        startTime: Date.now(),
        scope: ctx.scope,
        parent: ctx,
      };
      await this.runChain(jobCtx, chain, (text) => job.write(text));
    });
    return `[${id}] ${chain.text}\n`;
  }

  expandContext(ctx: ExecutionContext): ExpandContext {
    return {
      scope: ctx.scope,
      execute: (line) => this.config.executeNested(ctx, line),
    };
  }
}

function createStringReader(content: string): CommandInputStream {
  let consumed = false;
  return {
    read: async () => {
      if (consumed) return null;
      consumed = true;
      return content;
    },
    readAll: async () => content,
  };
}
