/**
 * Error types raised by the harness.
 *
 * Every layer (test, suite, repetition) logs its own context and rethrows the
 * same error object, so these types reach the CLI unchanged.
 */

/**
 * An external command exited with a non-zero code
 */
export class ProcessFailedError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    args: readonly string[],
    exitCode: number | null,
    stdout: string,
    stderr: string
  ) {
    super(`Command ${JSON.stringify(args)} failed with exit code ${exitCode}`);
    this.name = "ProcessFailedError";
    this.args = args;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Captured output did not satisfy an attached validator
 */
export class ValidationError extends Error {
  readonly validator: string;

  constructor(validator: string) {
    super(`Validation failed: ${validator}`);
    this.name = "ValidationError";
    this.validator = validator;
  }
}

/**
 * A configuration or programming error. Never recoverable at runtime.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * A benchmark plan file could not be loaded
 */
export class PlanError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "PlanError";
    this.file = file;
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
