export interface UssdErrorOptions {
  cause?: unknown;
}

/** Base class for failures the dialog core knows how to classify */
export abstract class UssdError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: UssdErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }
}

/** Raw input rejected by a node validator or choice set */
export class InputValidationError extends UssdError {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly nodeId: string,
  ) {
    super(message);
  }
}

/** Session idle past the timeout, or already swept */
export class SessionExpiredError extends UssdError {
  readonly retryable = true;

  constructor(
    public readonly sessionId: string,
    public readonly idleSeconds: number,
  ) {
    super(`Session ${sessionId} expired after ${idleSeconds}s idle`);
  }
}

/** Session store or listing repository unreachable, failing or too slow */
export class DependencyError extends UssdError {
  readonly retryable = true;

  constructor(
    public readonly dependency: string,
    message: string,
    options?: UssdErrorOptions,
  ) {
    super(`${dependency}: ${message}`, options);
  }
}

/** Menu tree integrity violation; fatal at startup */
export class ConfigurationError extends UssdError {
  readonly retryable = false;

  constructor(
    message: string,
    public readonly problems: string[] = [message],
  ) {
    super(message);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
