/**
 * Error taxonomy. Every error is local to one file or one invocation;
 * none of these stops the engine.
 */

export type HotdropErrorCode =
  | 'UNMATCHED_FILE'
  | 'CONFIGURATION'
  | 'PROCESS_SPAWN'
  | 'PROCESS_EXIT'
  | 'CLEANUP';

export class HotdropError extends Error {
  readonly code: HotdropErrorCode;

  constructor(code: HotdropErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No environment pattern matches the file. The file is left untouched. */
export class UnmatchedFileError extends HotdropError {
  constructor(readonly filePath: string) {
    super('UNMATCHED_FILE', `no environment matches ${filePath}`);
  }
}

/** Invalid config file, ambiguous variable mixing, or an unresolved placeholder. */
export class ConfigurationError extends HotdropError {
  constructor(message: string, readonly environment?: string) {
    super('CONFIGURATION', environment ? `${environment}: ${message}` : message);
  }
}

export class ProcessSpawnError extends HotdropError {
  constructor(readonly step: number, readonly command: string, cause: Error) {
    super('PROCESS_SPAWN', `step ${step} failed to start: ${cause.message}`, { cause });
  }
}

export class ProcessExitError extends HotdropError {
  constructor(
    readonly exitCode: number | null,
    readonly step: number,
    readonly command: string,
    readonly signal: NodeJS.Signals | null = null,
  ) {
    super(
      'PROCESS_EXIT',
      signal
        ? `step ${step} killed by ${signal}`
        : `step ${step} exited with code ${exitCode}`,
    );
  }
}

/** Deleting a consumed input failed after the invocation succeeded. */
export class CleanupError extends HotdropError {
  constructor(readonly filePath: string, cause: unknown) {
    super(
      'CLEANUP',
      `could not remove ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
