/**
 * Google API error mapping.
 *
 * Converts failures thrown by googleapis (gaxios errors carrying the HTTP
 * response) and network-level errors into the typed error hierarchy defined
 * in `src/utils/errors.ts`.
 */

import {
  AuthTokenError,
  CalendarToolError,
  NotFoundError,
  UpstreamError,
} from "../utils/errors.js";
import { isRecordObject } from "../utils/type-guards.js";

/** Identifies the resource a call addresses, for NotFoundError messages. */
export interface ResourceRef {
  type: string;
  id: string;
}

interface GoogleErrorDetails {
  message?: string;
  reason?: string;
}

const NETWORK_CODES = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
];

/**
 * Reads `{ error: { message, errors: [{ reason }] } }` (Calendar API) or
 * `{ error: "invalid_grant", error_description }` (OAuth endpoint).
 */
function parseErrorBody(body: unknown): GoogleErrorDetails {
  if (!isRecordObject(body)) return {};
  const error = body.error;
  if (typeof error === "string") {
    return {
      reason: error,
      message: typeof body.error_description === "string" ? body.error_description : error,
    };
  }
  if (!isRecordObject(error)) return {};
  const details: GoogleErrorDetails = {};
  if (typeof error.message === "string") details.message = error.message;
  if (Array.isArray(error.errors)) {
    const first: unknown = error.errors[0];
    if (isRecordObject(first) && typeof first.reason === "string") {
      details.reason = first.reason;
    }
  }
  if (!details.reason && typeof error.status === "string") {
    details.reason = error.status;
  }
  return details;
}

/** HTTP status and parsed body of a gaxios error, when it carries a response. */
export function readErrorResponse(
  error: unknown,
): { status: number; details: GoogleErrorDetails } | undefined {
  if (!isRecordObject(error) || !isRecordObject(error.response)) return undefined;
  const { status, data } = error.response;
  if (typeof status !== "number") return undefined;
  return { status, details: parseErrorBody(data) };
}

function networkCode(error: unknown): string | undefined {
  if (!isRecordObject(error)) return undefined;
  const code = error.code;
  return typeof code === "string" && NETWORK_CODES.includes(code) ? code : undefined;
}

/**
 * Map any failure from a Google call to a CalendarToolError.
 */
export function mapGoogleError(error: unknown, target?: ResourceRef): CalendarToolError {
  if (error instanceof CalendarToolError) {
    return error;
  }

  const response = readErrorResponse(error);
  if (response) {
    const { status, details } = response;
    const message = details.message ?? `Google Calendar API responded with HTTP ${status}`;

    // Token endpoint refusal surfacing through an API call.
    if (details.reason === "invalid_grant") {
      return new AuthTokenError();
    }
    if ((status === 404 || status === 410) && target) {
      return new NotFoundError(target.type, target.id, status);
    }
    if (status === 429 || details.reason === "rateLimitExceeded") {
      return new UpstreamError(message, status, details.reason ?? "rateLimitExceeded", true);
    }
    if (status >= 500 && status <= 599) {
      return new UpstreamError(message, status, details.reason, true);
    }
    return new UpstreamError(message, status, details.reason);
  }

  const code = networkCode(error);
  if (code) {
    const message = error instanceof Error ? error.message : code;
    return new UpstreamError(`No connection to Google Calendar: ${message}`, undefined, code, true);
  }

  return new UpstreamError(error instanceof Error ? error.message : "Unknown Google API error");
}
