import { z } from "zod";
import type { EventFields } from "../calendar/event-shape.js";
import {
  CalendarQuery,
  MaxResults,
  RecurrenceRules,
  ReminderMinutes,
  TimeValue,
  Timestamp,
} from "./common.js";

/**
 * Event fields a caller may change. Keys are snake_case; `timeZone` is accepted as an alias.
 */
export const EventPatch = z.object({
  summary: z.string().min(1).optional().describe("New title"),
  description: z.string().optional().describe("New description"),
  location: z.string().optional().describe("New location"),
  start: TimeValue.optional().describe("New start"),
  end: TimeValue.optional().describe("New end"),
  time_zone: z.string().optional().describe("IANA time zone for start/end, e.g. 'Europe/Berlin'"),
  timeZone: z.string().optional().describe("Alias of time_zone"),
  reminders: ReminderMinutes.optional(),
  attendees: z.array(z.string().email()).optional().describe("Attendee emails (replaces existing)"),
  recurrence: RecurrenceRules.optional(),
});

export type EventPatchType = z.infer<typeof EventPatch>;

/**
 * Patch for the new half of a split series. Its start is target_instance_start
 * and its recurrence is new_recurrence, so neither appears here.
 */
export const SeriesChangePatch = EventPatch.omit({ start: true, recurrence: true });

export type SeriesChangePatchType = z.infer<typeof SeriesChangePatch>;

export function toEventFields(patch: Partial<EventPatchType>): EventFields {
  const fields: EventFields = {};
  if (patch.summary !== undefined) fields.summary = patch.summary;
  if (patch.description !== undefined) fields.description = patch.description;
  if (patch.location !== undefined) fields.location = patch.location;
  if (patch.start !== undefined) fields.start = patch.start;
  if (patch.end !== undefined) fields.end = patch.end;
  const timeZone = patch.time_zone ?? patch.timeZone;
  if (timeZone !== undefined) fields.timeZone = timeZone;
  if (patch.reminders !== undefined) fields.reminders = patch.reminders;
  if (patch.attendees !== undefined) fields.attendees = patch.attendees;
  if (patch.recurrence !== undefined) fields.recurrence = patch.recurrence;
  return fields;
}

/**
 * Parameters for list_calendars tool.
 */
export const ListCalendarsParams = z.object({});

/**
 * Parameters for resolve_calendar tool.
 */
export const ResolveCalendarParams = z.object({
  query: z.string().describe('Calendar name fragment, calendar ID, or "primary"'),
});

/**
 * Parameters for list_events tool.
 */
export const ListEventsParams = z.object({
  calendar: CalendarQuery.optional(),
  time_min: Timestamp.optional().describe("Lower bound (exclusive) for event end, ISO 8601"),
  time_max: Timestamp.optional().describe("Upper bound (exclusive) for event start, ISO 8601"),
  max_results: MaxResults,
  query: z.string().optional().describe("Free-text search over event fields"),
  include_all_calendars: z
    .boolean()
    .default(false)
    .describe("List across every accessible calendar instead of one"),
});

export type ListEventsParamsType = z.infer<typeof ListEventsParams>;

/**
 * Parameters for create_event tool.
 */
export const CreateEventParams = z.object({
  calendar: CalendarQuery,
  summary: z.string().min(1).describe("Event title"),
  start: TimeValue.describe("ISO 8601 timestamp, or YYYY-MM-DD for an all-day event"),
  end: TimeValue.optional().describe(
    "ISO 8601 timestamp, or YYYY-MM-DD (exclusive). Optional for all-day events: defaults to the next day",
  ),
  time_zone: z.string().optional().describe("IANA time zone, e.g. 'Europe/Berlin'"),
  description: z.string().optional().describe("Event description"),
  location: z.string().optional().describe("Event location"),
  reminders: ReminderMinutes.optional(),
  recurrence: RecurrenceRules.optional(),
  attendees: z.array(z.string().email()).optional().describe("Attendee emails"),
  all_day: z.boolean().optional().describe("All-day event; start must be YYYY-MM-DD"),
});

export type CreateEventParamsType = z.infer<typeof CreateEventParams>;

/**
 * Parameters for update_event tool.
 */
export const UpdateEventParams = z.object({
  calendar: CalendarQuery,
  event_id: z.string().min(1).describe("ID of the event to update"),
  patch: EventPatch.describe("Fields to change; omitted fields are left as they are"),
});

export type UpdateEventParamsType = z.infer<typeof UpdateEventParams>;

/**
 * Parameters for delete_event tool.
 */
export const DeleteEventParams = z.object({
  calendar: CalendarQuery,
  event_id: z.string().min(1).describe("ID of the event to delete"),
  as_instance: z
    .boolean()
    .default(false)
    .describe("The ID is one occurrence of a recurring series; cancel only that occurrence"),
});

export type DeleteEventParamsType = z.infer<typeof DeleteEventParams>;
