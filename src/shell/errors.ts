export const ErrorCode = {
  ESYNTAX: 'ESYNTAX',
  ERECURSION: 'ERECURSION',
  EDISPATCH: 'EDISPATCH',
  ENOCMD: 'ENOCMD',
  EJOB: 'EJOB',
  ECANCELED: 'ECANCELED',
  EREDIRECT: 'EREDIRECT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for every error the engine surfaces. `output` carries whatever
 * output had accumulated before the failure, so callers can still show it.
 */
export class ShellError extends Error {
  code: ErrorCodeType;
  output = '';

  constructor(code: ErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'ShellError';
  }

  withOutput(output: string): this {
    this.output = output;
    return this;
  }
}

export class ParseError extends ShellError {
  constructor(message: string, public pos: number = -1) {
    super(ErrorCode.ESYNTAX, `syntax error: ${message}`);
    this.name = 'ParseError';
  }
}

export class RecursionError extends ShellError {
  constructor(public maxDepth: number) {
    super(
      ErrorCode.ERECURSION,
      `maximum execution depth exceeded (${maxDepth}) - possible infinite recursion`,
    );
    this.name = 'RecursionError';
  }
}

export class DispatchError extends ShellError {
  constructor(public command: string, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.EDISPATCH, `${command}: ${message}`, options);
    this.name = 'DispatchError';
  }
}

export class CommandNotFoundError extends DispatchError {
  constructor(command: string) {
    super(command, 'command not found');
    this.code = ErrorCode.ENOCMD;
    this.name = 'CommandNotFoundError';
  }
}

export class JobError extends ShellError {
  constructor(public jobId: number, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.EJOB, `job ${jobId} ${message}`, options);
    this.name = 'JobError';
  }
}

export class CancellationError extends ShellError {
  constructor(message = 'command cancelled', options?: { cause?: unknown }) {
    super(ErrorCode.ECANCELED, message, options);
    this.name = 'CancellationError';
  }
}

export class RedirectError extends ShellError {
  constructor(public target: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(ErrorCode.EREDIRECT, `failed to write to file ${target}${reason}`, options);
    this.name = 'RedirectError';
  }
}

export function isCancellation(err: unknown): err is CancellationError {
  return err instanceof CancellationError;
}

/** Errors that must escape expansion instead of passing through as text. */
export function isFatalExpansionError(err: unknown): boolean {
  return err instanceof RecursionError || err instanceof CancellationError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wraps anything thrown outside the engine's own error types. */
export function asShellError(err: unknown): ShellError {
  if (err instanceof ShellError) return err;
  return new ShellError(ErrorCode.EDISPATCH, errorMessage(err), { cause: err });
}
