export { CommandExecutor } from './shell/CommandExecutor.js';
export type {
  CommandExecutorOptions,
  ExecutionResult,
  RunOptions,
  Scope,
} from './shell/CommandExecutor.js';
export { resolveEngineConfig } from './config.js';
export type { EngineOptions, EngineConfig, ExecutionEvent } from './config.js';

export { parse } from './shell/parser.js';
export { lex } from './shell/lexer.js';
export { TokenKind } from './shell/types.js';
export type { Token, ParsedCommand, ParsedChain, ParsedLine } from './shell/types.js';

export { Expander } from './shell/expander.js';
export type { CustomExpander, ExpanderResult, ExpandContext, Environment } from './shell/expander.js';
export { evaluateArithmetic, expandArithmetic } from './shell/arithmetic.js';
export { Interpreter } from './shell/interpreter.js';
export type { ExecutionContext, FileHandler, InterpreterConfig } from './shell/interpreter.js';
export { RecursionGuard, DEFAULT_MAX_DEPTH } from './shell/depth.js';
export { JobManager } from './shell/jobs.js';
export type { JobInfo, JobStatus, JobHandle, JobWork, StartOptions } from './shell/jobs.js';
export { StringStore, VariableStore, AliasTable } from './shell/store.js';
export {
  ErrorCode,
  ShellError,
  ParseError,
  RecursionError,
  DispatchError,
  CommandNotFoundError,
  JobError,
  CancellationError,
  RedirectError,
  isCancellation,
} from './shell/errors.js';
export type { ErrorCodeType } from './shell/errors.js';

export { CommandRegistry, createDefaultRegistry } from './commands/registry.js';
export type { CommandLoader, ResolvedCommand } from './commands/registry.js';
export type {
  Command,
  CommandContext,
  CommandInputStream,
  CommandOutputStream,
} from './commands/types.js';
export type { ChildProcessLike, ProcessSpawner } from './commands/system/exec.js';

export { createLogger, silentLogger, LogLevel } from './utils/logger.js';
export type { Logger, LogContext, LoggerOptions } from './utils/logger.js';
