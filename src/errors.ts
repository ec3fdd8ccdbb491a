export class ServiceError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "ServiceError";
  }
}

/** A request field is missing or malformed. */
export class InvalidInputError extends ServiceError {
  constructor(message: string) {
    super(message, 400);
    this.name = "InvalidInputError";
  }
}

/** The identifier does not resolve to a country. */
export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/**
 * An upstream API failed, timed out, or gave the pipeline nothing to continue
 * with. The message carries the upstream detail where there is one.
 */
export class UpstreamUnavailableError extends ServiceError {
  constructor(message: string) {
    super(message, 503);
    this.name = "UpstreamUnavailableError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
