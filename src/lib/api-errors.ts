// ---------------------------------------------------------------------------
// API error types
// ---------------------------------------------------------------------------
// Fastify's error handler checks `error.statusCode` to determine the HTTP
// response code. Every failure the comment core can raise is one of the
// subclasses below, so routes never translate errors by hand.
// ---------------------------------------------------------------------------

/**
 * Base API error with an HTTP status code.
 * Fastify uses `statusCode` on thrown errors to set the response status.
 */
export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.statusCode = statusCode;
    this.name = "ApiError";
  }
}

/** Rejected before any store access; nothing was written. */
export class InvalidInputError extends ApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(400, message, options);
    this.name = "InvalidInputError";
  }
}

/** The thread URL could not be parsed. */
export class InvalidUrlError extends InvalidInputError {
  constructor(url: string, reason: string) {
    super(`bad url value: ${reason}`);
    this.name = "InvalidUrlError";
    this.url = url;
  }

  readonly url: string;
}

/** The thread URL has no authority, so it cannot name a thread. */
export class MissingHostError extends InvalidInputError {
  constructor(url: string) {
    super("bad url value: missing host");
    this.name = "MissingHostError";
    this.url = url;
  }

  readonly url: string;
}

export class CommentsDisabledError extends ApiError {
  constructor() {
    super(403, "comments not enabled");
    this.name = "CommentsDisabledError";
  }
}

export class CommentNotFoundError extends ApiError {
  constructor(id: number) {
    super(404, `comment ${id} not found`);
    this.name = "CommentNotFoundError";
  }
}

/** The key-value store failed or returned something it should not hold. */
export class BackendUnavailableError extends ApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(503, message, options);
    this.name = "BackendUnavailableError";
  }
}

/** Bounded identifier allocation ran out of attempts. */
export class AllocationContentionError extends ApiError {
  constructor(attempts: number) {
    super(503, `no free comment identifier after ${attempts} attempts`);
    this.name = "AllocationContentionError";
    this.attempts = attempts;
  }

  readonly attempts: number;
}

/** The spam classifier answered with something other than a verdict. */
export class ClassifierProtocolError extends ApiError {
  constructor(body: string) {
    super(502, `unexpected return value from spam classifier: ${body}`);
    this.name = "ClassifierProtocolError";
    this.body = body;
  }

  readonly body: string;
}

/** An index references a comment record that does not exist. */
export class CorruptIndexError extends ApiError {
  constructor(key: string) {
    super(500, `index references missing comment record ${key}`);
    this.name = "CorruptIndexError";
    this.key = key;
  }

  readonly key: string;
}

/**
 * Create a 400 Bad Request error.
 *
 * @param message - Human-readable description of the validation failure.
 */
export function badRequest(message: string): InvalidInputError {
  return new InvalidInputError(message);
}

/**
 * Wrap a store failure, keeping the original error as `cause`.
 */
export function backendUnavailable(err: unknown, action: string): BackendUnavailableError {
  if (err instanceof BackendUnavailableError) return err;
  return new BackendUnavailableError(`backend error while ${action}`, { cause: err });
}
