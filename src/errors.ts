/**
 * Relay error taxonomy. Every class carries the API error code and the
 * HTTP status the routes answer with.
 */

export type RelayErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "ALREADY_PROCESSED"
  | "DELIVERY_FAILED";

export class RelayError extends Error {
  constructor(
    readonly code: RelayErrorCode,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing target or session state, malformed input. */
export class ValidationError extends RelayError {
  constructor(message: string) {
    super("VALIDATION_ERROR", 400, message);
  }
}

/** Unknown message, token, user or code. */
export class NotFoundError extends RelayError {
  constructor(what: string) {
    super("NOT_FOUND", 404, `${what} not found`);
  }
}

export class ForbiddenError extends RelayError {
  constructor(message = "Access denied") {
    super("FORBIDDEN", 403, message);
  }
}

/** A moderation decision on a message that already has one. */
export class AlreadyProcessedError extends RelayError {
  constructor(readonly messageId: string, readonly currentStatus: string) {
    super("ALREADY_PROCESSED", 409, `Message already ${currentStatus}`);
  }
}

/** The outbound transport failed or timed out. */
export class DeliveryFailure extends RelayError {
  constructor(message: string, readonly reason?: unknown) {
    super("DELIVERY_FAILED", 502, message);
  }
}
