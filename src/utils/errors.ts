/**
 * Error taxonomy for a quality gate run.
 *
 * Only ConfigError and ValidationError abort a run, and both are raised before
 * any gate executes. Everything else is isolated to the gate that hit it.
 */
export class QgateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The pipeline definition is invalid. */
export class ConfigError extends QgateError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}\n${problems.map(p => `  - ${p}`).join('\n')}` : message);
    this.problems = problems;
  }
}

/** The invocation input is invalid. */
export class ValidationError extends QgateError {}

/** A gate's subprocess could not be started. */
export class ExecutionError extends QgateError {
  constructor(message: string, readonly command: string, readonly code?: string) {
    super(message);
  }
}

export class GitError extends QgateError {
  constructor(message: string, readonly args: string[], readonly stderr: string) {
    super(message);
  }
}

/** Another process holds the baseline lock; the write is rejected. */
export class BaselineLockError extends QgateError {
  constructor(readonly lockPath: string, readonly holder?: string) {
    super(`Baseline state is locked by another run${holder ? ` (${holder})` : ''}: ${lockPath}`);
  }
}

/** The stored baseline changed since this run loaded it; the write is rejected. */
export class BaselineConflictError extends QgateError {
  constructor(readonly statePath: string) {
    super(`Baseline state was updated by another run since it was loaded: ${statePath}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
