/**
 * Google API call logging.
 *
 * Logs structured request/response metadata via pino.
 * NEVER logs tokens, event bodies, descriptions or attendee addresses.
 */

import { randomUUID } from "node:crypto";
import { CalendarToolError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("google-http");

/**
 * Runs one provider call and logs its outcome.
 *
 * Logged fields (safe, no PII):
 * - request_id
 * - operation (e.g. "events.list")
 * - status, duration_ms
 * - error_kind, reason on failure
 */
export async function withRequestLogging<T>(operation: string, call: () => Promise<T>): Promise<T> {
  const requestId = randomUUID();
  const startTime = performance.now();

  logger.debug({ event: "google_request", request_id: requestId, operation });

  try {
    const result = await call();
    logger.info({
      event: "google_response",
      request_id: requestId,
      operation,
      duration_ms: Math.round(performance.now() - startTime),
    });
    return result;
  } catch (error: unknown) {
    const toolError = error instanceof CalendarToolError ? error : undefined;
    logger.warn({
      event: "google_error",
      request_id: requestId,
      operation,
      status: toolError?.httpStatus,
      error_kind: toolError?.kind ?? (error instanceof Error ? error.name : "UnknownError"),
      duration_ms: Math.round(performance.now() - startTime),
    });
    throw error;
  }
}
