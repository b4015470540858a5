/**
 * Error taxonomy for the fix engine.
 *
 * UnknownFixError, DuplicateFixError and ConfigError are usage errors raised
 * before any file is touched. The rest describe one file and are recorded on
 * that file's RewriteOutcome instead of aborting the run.
 */

/**
 * One or more requested fix names are not registered.
 */
export class UnknownFixError extends Error {
  constructor(
    public readonly names: readonly string[],
    /** Closest registered names for each unknown name */
    public readonly suggestions: ReadonlyMap<string, readonly string[]> = new Map()
  ) {
    super(`unknown fix${names.length === 1 ? '' : 'es'}: ${names.join(', ')}`);
    this.name = 'UnknownFixError';
  }
}

/**
 * A fix was registered under a name that is already taken.
 */
export class DuplicateFixError extends Error {
  constructor(public readonly fixName: string) {
    super(`fix "${fixName}" is already registered`);
    this.name = 'DuplicateFixError';
  }
}

/**
 * Source text that the parser rejects. Line and column are 1-based.
 */
export class ParseError extends Error {
  constructor(
    public readonly path: string,
    public readonly line: number,
    public readonly column: number,
    public readonly detail: string
  ) {
    super(`${path}:${line}:${column}: ${detail}`);
    this.name = 'ParseError';
  }
}

export type IOOperation = 'read' | 'write' | 'stat';

/**
 * A read, write or stat of one file failed.
 */
export class IOError extends Error {
  constructor(
    public readonly path: string,
    public readonly operation: IOOperation,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${path}: ${operation} failed: ${detail}`, options);
    this.name = 'IOError';
  }
}

/**
 * The fix set kept changing the file after the pass cap was reached.
 */
export class ConvergenceError extends Error {
  constructor(
    public readonly path: string,
    public readonly passes: number,
    /** Fixes that still fired in the last pass */
    public readonly fixNames: readonly string[]
  ) {
    super(`${path}: fixes did not converge after ${passes} passes (still applying: ${fixNames.join(', ')})`);
    this.name = 'ConvergenceError';
  }
}

/**
 * A fix threw, misreported whether it changed the tree, or produced output
 * the parser rejects.
 */
export class FixError extends Error {
  constructor(
    public readonly path: string,
    public readonly fix: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${path}: fix ${fix}: ${detail}`, options);
    this.name = 'FixError';
  }
}

/**
 * The configuration file or environment holds an invalid value.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/** Errors that are recorded per file rather than thrown to the caller */
export type FileError = ParseError | IOError | ConvergenceError | FixError;

export function isFileError(error: unknown): error is FileError {
  return (
    error instanceof ParseError ||
    error instanceof IOError ||
    error instanceof ConvergenceError ||
    error instanceof FixError
  );
}
