import { CreateEventParams } from "../schemas/calendar.js";
import { defineTool } from "../types/tools.js";

export const createEventTool = defineTool({
  name: "create_event",
  description:
    "Create an event. Use YYYY-MM-DD dates for all-day events (end is exclusive and defaults to the next day) or ISO 8601 timestamps for timed events. Optional recurrence takes RFC 5545 lines such as RRULE:FREQ=WEEKLY;BYDAY=MO. Reminders are popup minutes before start.",
  params: CreateEventParams,
  handler: (params, { events }) =>
    events.createEvent({
      calendar: params.calendar,
      summary: params.summary,
      start: params.start,
      end: params.end,
      timeZone: params.time_zone,
      description: params.description,
      location: params.location,
      reminders: params.reminders,
      recurrence: params.recurrence,
      attendees: params.attendees,
      allDay: params.all_day,
    }),
});
