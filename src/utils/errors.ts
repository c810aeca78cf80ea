/**
 * Error class hierarchy for gcal-mcp.
 *
 * Every failure a tool can report derives from CalendarToolError. The `kind`
 * is what callers see in the `{ ok: false, error: { kind, message } }` payload.
 */

import { ZodError } from "zod";

export type ErrorKind =
  | "NotFoundError"
  | "AmbiguousInputError"
  | "UnsupportedEventTypeError"
  | "SeriesUpdateError"
  | "UpstreamError"
  | "ValidationError"
  | "AuthTokenError";

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

export class CalendarToolError extends Error {
  readonly kind: ErrorKind;
  readonly httpStatus?: number;

  constructor(message: string, kind: ErrorKind, httpStatus?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.httpStatus = httpStatus;
  }
}

// ---------------------------------------------------------------------------
// Not found (calendar, event or instance; HTTP 404 / 410)
// ---------------------------------------------------------------------------

export class NotFoundError extends CalendarToolError {
  readonly resourceType: string;
  readonly resourceId: string;

  constructor(resourceType: string, resourceId: string, httpStatus = 404) {
    super(`Not found: ${resourceType} ${resourceId}`, "NotFoundError", httpStatus);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

// ---------------------------------------------------------------------------
// Ambiguous input (identification underspecified)
// ---------------------------------------------------------------------------

export class AmbiguousInputError extends CalendarToolError {
  constructor(message: string) {
    super(message, "AmbiguousInputError");
  }
}

// ---------------------------------------------------------------------------
// Unsupported event type (all-day or non-recurring where a series is needed)
// ---------------------------------------------------------------------------

export class UnsupportedEventTypeError extends CalendarToolError {
  readonly eventId: string;

  constructor(eventId: string, reason: string) {
    super(`Unsupported event ${eventId}: ${reason}`, "UnsupportedEventTypeError");
    this.eventId = eventId;
  }
}

// ---------------------------------------------------------------------------
// Series update aborted before the new half was created
// ---------------------------------------------------------------------------

export class SeriesUpdateError extends CalendarToolError {
  readonly recurringEventId: string;

  constructor(recurringEventId: string, message: string, cause?: unknown) {
    super(
      `Could not terminate series ${recurringEventId}: ${message}. No new series was created.`,
      "SeriesUpdateError",
      undefined,
      { cause },
    );
    this.recurringEventId = recurringEventId;
  }
}

// ---------------------------------------------------------------------------
// Upstream (any other failure reported by Google or the transport)
// ---------------------------------------------------------------------------

export class UpstreamError extends CalendarToolError {
  /** Google error reason (e.g. "forbidden", "rateLimitExceeded") or a network error code. */
  readonly reason?: string;
  readonly retryable: boolean;

  constructor(message: string, httpStatus?: number, reason?: string, retryable = false) {
    super(message, "UpstreamError", httpStatus);
    this.reason = reason;
    this.retryable = retryable;
  }

  get isAuthFailure(): boolean {
    return this.httpStatus === 401;
  }
}

// ---------------------------------------------------------------------------
// Validation (tool input rejected)
// ---------------------------------------------------------------------------

export class ValidationError extends CalendarToolError {
  readonly details: string;

  constructor(details: string) {
    super(`Invalid parameters: ${details}`, "ValidationError", 400);
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Refresh token expired or revoked
// ---------------------------------------------------------------------------

const REVOKED_REFRESH_TOKEN =
  "The Google refresh token has expired or been revoked. Generate a new one with:\n\n" +
  "  npm run auth login\n\n" +
  "then update GOOGLE_REFRESH_TOKEN.";

export class AuthTokenError extends CalendarToolError {
  constructor(message = REVOKED_REFRESH_TOKEN) {
    super(message, "AuthTokenError", 401);
  }
}

// ---------------------------------------------------------------------------
// Failure payload
// ---------------------------------------------------------------------------

export interface FailurePayload {
  ok: false;
  error: { kind: ErrorKind; message: string };
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Converts a known failure into the structured payload returned across the tool boundary.
 * Returns null for anything else, which the caller rethrows.
 */
export function toFailurePayload(error: unknown): FailurePayload | null {
  if (error instanceof CalendarToolError) {
    return { ok: false, error: { kind: error.kind, message: error.message } };
  }
  if (error instanceof ZodError) {
    const validation = new ValidationError(describeZodError(error));
    return { ok: false, error: { kind: validation.kind, message: validation.message } };
  }
  return null;
}
