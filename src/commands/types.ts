import type { Environment } from '../shell/expander.js';
import type { VariableStore } from '../shell/store.js';

export interface CommandOutputStream {
  write(text: string): void;
}

export interface CommandInputStream {
  read(): Promise<string | null>;   // null = EOF
  readAll(): Promise<string>;
}

export interface CommandContext {
  /** Arguments after the (possibly multi-word) command name */
  args: string[];
  env: Environment;
  stdout: CommandOutputStream;
  stderr: CommandOutputStream;
  signal: AbortSignal;
  stdin?: CommandInputStream;
  /** Variables supplied by the caller for this execution only */
  scope?: VariableStore;
  /** Run a nested line one level deeper than this command */
  execute(line: string): Promise<string>;
  /** Start a line as a background job one level deeper; returns the job ID */
  spawn(line: string): number;
}

export type Command = (ctx: CommandContext) => Promise<number>;
