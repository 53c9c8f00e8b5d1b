export class NotFoundError extends Error {
  readonly status = 404;

  constructor(message = "not_found") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class MethodNotAllowedError extends Error {
  readonly status = 405;

  constructor(
    readonly method: string,
    readonly allowed: readonly string[]
  ) {
    super(`method ${method} not allowed`);
    this.name = "MethodNotAllowedError";
  }
}

/** Raised when an upstream call fails after the HTTP client gave up retrying. */
export class ExternalServiceError extends Error {
  constructor(
    message: string,
    readonly cause?: unknown,
    readonly status?: number
  ) {
    super(message);
    this.name = "ExternalServiceError";
  }
}
