import { writeFile } from 'node:fs/promises';
import type { Environment } from './shell/expander.js';
import type { FileHandler } from './shell/interpreter.js';
import { DEFAULT_MAX_DEPTH } from './shell/depth.js';
import { createLogger, parseLogLevel, LogLevel, type Logger } from './utils/logger.js';

// ─── Engine Options ───

/** Telemetry for one top-level execution. */
export interface ExecutionEvent {
  line: string;
  startTime: number;
  duration: number;
  success: boolean;
  error: Error | null;
  depth: number;
}

export interface EngineOptions {
  /** Maximum nesting of `@exec:`/`$(...)` and command-issued executions (default: 10) */
  maxDepth?: number;
  /** Environment for `@env:NAME`, `$VAR` and commands (default: process.env) */
  env?: Environment;
  /** Writer for `> file` redirects (default: fs/promises writeFile) */
  fileHandler?: FileHandler;
  /** Custom logger; overrides `logLevel` */
  logger?: Logger;
  /** Level for the built-in stderr logger (default: SHELLCORE_LOG or warn) */
  logLevel?: LogLevel;
  /** Register the core commands (default: true) */
  builtins?: boolean;
  /** Called after every top-level execution */
  onExecute?: (event: ExecutionEvent) => void;
}

export interface EngineConfig {
  maxDepth: number;
  env: Environment;
  fileHandler: FileHandler;
  logger: Logger;
  builtins: boolean;
  onExecute: ((event: ExecutionEvent) => void) | null;
}

const defaultFileHandler: FileHandler = async (path, content) => {
  await writeFile(path, content, 'utf8');
};

/**
 * Applies defaults to `options`. `SHELLCORE_MAX_DEPTH` and `SHELLCORE_LOG`
 * are read from `processEnv` when the matching option is not given.
 */
export function resolveEngineConfig(
  options: EngineOptions = {},
  processEnv: Environment = process.env,
): EngineConfig {
  const envDepth = parseInt(processEnv['SHELLCORE_MAX_DEPTH'] ?? '', 10);
  const maxDepth = options.maxDepth ?? (Number.isInteger(envDepth) && envDepth > 0 ? envDepth : DEFAULT_MAX_DEPTH);
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }

  const level = options.logLevel ?? parseLogLevel(processEnv['SHELLCORE_LOG']) ?? LogLevel.WARN;

  return {
    maxDepth,
    env: options.env ?? processEnv,
    fileHandler: options.fileHandler ?? defaultFileHandler,
    logger: options.logger ?? createLogger({ level }),
    builtins: options.builtins ?? true,
    onExecute: options.onExecute ?? null,
  };
}
