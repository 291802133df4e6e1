/* src/runner/errors.ts
 * Errors raised while executing the target file. All of them end up in the
 * same catch-all handler; the classes only carry what the report prints.
 */

/** The script raised an exception; `message` is the runtime's rendering of it. */
export class ScriptFailure extends Error {
  readonly excType: string;

  constructor(excType: string, message: string) {
    super(message);
    this.name = 'ScriptFailure';
    this.excType = excType;
  }
}

/** The script ran past its configured timeout and was terminated. */
export class ScriptTimeoutError extends Error {
  readonly seconds: number;

  constructor(seconds: number) {
    super(`script timed out after ${String(seconds)}s`);
    this.name = 'ScriptTimeoutError';
    this.seconds = seconds;
  }
}

/** The shell could not run the interpreter command (exit 126/127). */
export class InterpreterUnavailableError extends Error {
  readonly command: string;
  readonly exitCode: number;

  constructor(command: string, exitCode: number, detail: string) {
    super(
      detail.length > 0
        ? detail
        : `${command}: exited with ${String(exitCode)}`,
    );
    this.name = 'InterpreterUnavailableError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

/** Message text of anything thrown; mirrors how the report renders it. */
export const messageOf = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
