/**
 * Base error for every failure the CLIs surface to the operator.
 * `exitCode` is the process exit status the CLI terminates with.
 */
export class BaseError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      context: this.context
    };
  }
}
