/**
 * Failures of the lexer itself, as opposed to problems in the program being
 * lexed. These are thrown, never reported as diagnostics.
 */
export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalCompilerError";
  }
}

export class HandleExhaustionError extends InternalCompilerError {
  readonly last: number;

  constructor(last: number) {
    super(`identifier handles exhausted: cannot allocate past ${last}`);
    this.name = "HandleExhaustionError";
    this.last = last;
  }
}
