import { z } from "zod";
import { isTimeValue, isTimestampWithOffset } from "../calendar/event-shape.js";

/**
 * Calendar selector accepted by every calendar-scoped tool.
 */
export const CalendarQuery = z
  .string()
  .describe(
    'Calendar name (case-insensitive, partial names allowed), calendar ID, or "primary". Default: primary calendar',
  );

/**
 * ISO 8601 timestamp, or YYYY-MM-DD for all-day events.
 */
export const TimeValue = z
  .string()
  .refine(isTimeValue, "Expected an ISO 8601 timestamp or a YYYY-MM-DD date");

/**
 * ISO 8601 timestamp with offset, e.g. 2026-03-10T09:00:00+01:00.
 */
export const Timestamp = z
  .string()
  .refine(isTimestampWithOffset, "Expected an ISO 8601 timestamp with offset");

/**
 * Per-calendar result cap for list operations.
 */
export const MaxResults = z
  .number()
  .int()
  .positive()
  .max(500)
  .optional()
  .describe("Maximum number of results per calendar (default: 50, max: 500)");

/**
 * Literal RFC 5545 recurrence lines.
 */
export const RecurrenceRules = z
  .array(
    z
      .string()
      .regex(/^(RRULE|EXRULE|EXDATE|RDATE)[:;]/i, "Expected an RRULE, EXRULE, EXDATE or RDATE line"),
  )
  .describe('RFC 5545 lines, e.g. ["RRULE:FREQ=WEEKLY;BYDAY=MO"]');

/**
 * Popup reminders in minutes before start.
 */
export const ReminderMinutes = z
  .array(z.number())
  .describe("Popup reminders in minutes before start, e.g. [120, 60]. [] disables reminders");
