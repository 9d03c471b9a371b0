/**
 * Errors - Exit codes and error helpers
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;

/**
 * Error raised by a command with the exit code the process should end with.
 * External tools report failure through their exit code, which is carried here.
 */
export class CommandError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_GENERAL_ERROR) {
    super(message);
    this.name = "CommandError";
    this.exitCode = exitCode;
  }
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Exit code for a caught error
 */
export function getExitCode(err: unknown): number {
  return err instanceof CommandError ? err.exitCode : EXIT_GENERAL_ERROR;
}
