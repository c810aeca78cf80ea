import type { calendar_v3 } from "googleapis";
import { ValidationError } from "../utils/errors.js";

export interface CalendarSummary {
  id: string;
  /** Display name: the user's override when set, otherwise the calendar's own summary. */
  summary: string | null;
  primary: boolean;
  accessRole: string | null;
  timeZone: string | null;
}

export interface EventReminders {
  useDefault: boolean;
  minutes: number[];
}

export interface CalendarEvent {
  id: string;
  calendarId: string;
  summary: string | null;
  /** ISO 8601 timestamp for timed events, YYYY-MM-DD for all-day events. */
  start: string | null;
  end: string | null;
  allDay: boolean;
  timeZone?: string;
  description?: string;
  location?: string;
  recurrence?: string[];
  reminders?: EventReminders;
  attendees?: string[];
  status?: string;
  htmlLink?: string;
  /** Set on materialized occurrences of a series. */
  instanceId?: string;
  recurringEventId?: string;
  originalStartTime?: string;
}

export type CalendarEventInstance = CalendarEvent &
  Required<Pick<CalendarEvent, "instanceId" | "recurringEventId" | "originalStartTime">>;

/** Caller-facing event fields shared by create, update and series split. */
export interface EventFields {
  summary?: string;
  description?: string;
  location?: string;
  start?: string;
  end?: string;
  timeZone?: string;
  /** Popup reminder minutes; [] disables reminders. */
  reminders?: number[];
  attendees?: string[];
  recurrence?: string[];
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;
const DATE_TIME_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

export function isDateOnly(value: string): boolean {
  return DATE_ONLY.test(value);
}

export function isTimeValue(value: string): boolean {
  return DATE_ONLY.test(value) || DATE_TIME.test(value);
}

export function isTimestampWithOffset(value: string): boolean {
  return DATE_TIME_WITH_OFFSET.test(value) && !Number.isNaN(Date.parse(value));
}

const WALL_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?/;

/** Offset of `timeZone` from UTC at an instant, in ms. */
function zoneOffsetMs(instantMs: number, timeZone: string): number {
  let format: Intl.DateTimeFormat;
  try {
    format = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
  } catch {
    throw new ValidationError(`Unknown time zone "${timeZone}"`);
  }
  const parts = format.formatToParts(new Date(instantMs));
  const read = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");
  const asUtc = Date.UTC(
    read("year"),
    read("month") - 1,
    read("day"),
    read("hour"),
    read("minute"),
    read("second"),
  );
  return asUtc - Math.floor(instantMs / 1000) * 1000;
}

/**
 * Instant of a wall-clock time in `timeZone`. The wall time is given as the
 * epoch ms it would have in UTC, e.g. Date.UTC(2026, 2, 16, 9).
 */
export function wallTimeToEpoch(wallMs: number, timeZone: string): number {
  const guess = wallMs - zoneOffsetMs(wallMs, timeZone);
  return wallMs - zoneOffsetMs(guess, timeZone);
}

/**
 * Epoch ms of a timestamp. Values without an offset are read in `timeZone`;
 * NaN when there is neither.
 */
export function instantOf(value: string, timeZone?: string): number {
  if (isTimestampWithOffset(value)) {
    return Date.parse(value);
  }
  const match = DATE_TIME.test(value) ? WALL_TIME.exec(value) : null;
  if (!match || !timeZone) {
    return Number.NaN;
  }
  const [, y, mo, d, h, mi, s = "0"] = match;
  const wall = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
  return wallTimeToEpoch(wall, timeZone);
}

function readTime(value: calendar_v3.Schema$EventDateTime | undefined): string | null {
  return value?.dateTime ?? value?.date ?? null;
}

export function toCalendarSummary(entry: calendar_v3.Schema$CalendarListEntry): CalendarSummary {
  return {
    id: entry.id ?? "",
    summary: entry.summaryOverride ?? entry.summary ?? null,
    primary: entry.primary === true,
    accessRole: entry.accessRole ?? null,
    timeZone: entry.timeZone ?? null,
  };
}

function toReminders(value: calendar_v3.Schema$Event["reminders"]): EventReminders | undefined {
  if (!value) return undefined;
  const minutes = (value.overrides ?? [])
    .map((override) => override.minutes)
    .filter((m): m is number => typeof m === "number");
  return { useDefault: value.useDefault === true, minutes };
}

export function toCalendarEvent(event: calendar_v3.Schema$Event, calendarId: string): CalendarEvent {
  const shaped: CalendarEvent = {
    id: event.id ?? "",
    calendarId,
    summary: event.summary ?? null,
    start: readTime(event.start),
    end: readTime(event.end),
    allDay: Boolean(event.start?.date),
  };

  const timeZone = event.start?.timeZone ?? event.end?.timeZone;
  if (timeZone) shaped.timeZone = timeZone;
  if (event.description) shaped.description = event.description;
  if (event.location) shaped.location = event.location;
  if (event.recurrence && event.recurrence.length > 0) shaped.recurrence = [...event.recurrence];
  const reminders = toReminders(event.reminders);
  if (reminders) shaped.reminders = reminders;
  const attendees = (event.attendees ?? [])
    .map((attendee) => attendee.email)
    .filter((email): email is string => typeof email === "string" && email.length > 0);
  if (attendees.length > 0) shaped.attendees = attendees;
  if (event.status) shaped.status = event.status;
  if (event.htmlLink) shaped.htmlLink = event.htmlLink;

  if (event.recurringEventId) {
    shaped.instanceId = shaped.id;
    shaped.recurringEventId = event.recurringEventId;
    const originalStart = readTime(event.originalStartTime);
    if (originalStart) shaped.originalStartTime = originalStart;
  }
  return shaped;
}

export function isInstance(event: CalendarEvent): event is CalendarEventInstance {
  return (
    event.instanceId !== undefined &&
    event.recurringEventId !== undefined &&
    event.originalStartTime !== undefined
  );
}

/** Start instant in epoch ms; all-day dates count as UTC midnight. Unknown starts sort last. */
export function startInstant(event: CalendarEvent): number {
  if (!event.start) return Number.POSITIVE_INFINITY;
  const ms = Date.parse(event.start);
  return Number.isNaN(ms) ? Number.POSITIVE_INFINITY : ms;
}

/**
 * Google's start/end object for a caller time value: `date` for YYYY-MM-DD,
 * `dateTime` (plus the optional time zone) for timestamps.
 */
export function toEventDateTime(value: string, timeZone?: string): calendar_v3.Schema$EventDateTime {
  if (isDateOnly(value)) {
    return { date: value };
  }
  if (!DATE_TIME.test(value)) {
    throw new ValidationError(`"${value}" is neither an ISO 8601 timestamp nor a YYYY-MM-DD date`);
  }
  return timeZone ? { dateTime: value, timeZone } : { dateTime: value };
}

/** Day after a YYYY-MM-DD date; Google treats all-day end dates as exclusive. */
export function nextDay(date: string): string {
  const next = new Date(`${date}T00:00:00Z`);
  next.setUTCDate(next.getUTCDate() + 1);
  return next.toISOString().slice(0, 10);
}

/** Sorted, deduplicated, non-negative whole minutes. */
export function normalizeReminderMinutes(minutes: readonly number[]): number[] {
  const cleaned = minutes.filter((m) => Number.isFinite(m) && m >= 0).map((m) => Math.trunc(m));
  return [...new Set(cleaned)].sort((a, b) => a - b);
}

export function toRemindersPayload(minutes: readonly number[]): calendar_v3.Schema$Event["reminders"] {
  const normalized = normalizeReminderMinutes(minutes);
  if (normalized.length === 0) {
    return { useDefault: false };
  }
  return {
    useDefault: false,
    overrides: normalized.map((m) => ({ method: "popup", minutes: m })),
  };
}

/**
 * Google request body for the given fields. Only keys present in `fields` are set.
 * `start` and `end` must be of the same kind when both are given.
 */
export function buildEventBody(fields: EventFields): calendar_v3.Schema$Event {
  const body: calendar_v3.Schema$Event = {};
  if (fields.summary !== undefined) body.summary = fields.summary;
  if (fields.description !== undefined) body.description = fields.description;
  if (fields.location !== undefined) body.location = fields.location;
  if (fields.start !== undefined && fields.end !== undefined) {
    if (isDateOnly(fields.start) !== isDateOnly(fields.end)) {
      throw new ValidationError("start and end must both be timestamps or both be YYYY-MM-DD dates");
    }
  }
  if (fields.start !== undefined) body.start = toEventDateTime(fields.start, fields.timeZone);
  if (fields.end !== undefined) body.end = toEventDateTime(fields.end, fields.timeZone);
  if (fields.reminders !== undefined) body.reminders = toRemindersPayload(fields.reminders);
  if (fields.attendees !== undefined) body.attendees = fields.attendees.map((email) => ({ email }));
  if (fields.recurrence !== undefined) body.recurrence = [...fields.recurrence];
  return body;
}
