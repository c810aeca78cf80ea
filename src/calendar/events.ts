import { UnsupportedEventTypeError, ValidationError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { GoogleCalendarClient } from "./client.js";
import {
  type CalendarEvent,
  type EventFields,
  buildEventBody,
  isDateOnly,
  nextDay,
  toCalendarEvent,
} from "./event-shape.js";
import type { CalendarResolver } from "./resolver.js";

const logger = createLogger("calendar-events");

export interface CreateEventInput extends EventFields {
  calendar?: string;
  summary: string;
  start: string;
  allDay?: boolean;
}

export interface EventMutationResult {
  ok: true;
  event: CalendarEvent;
}

export interface DeleteEventResult {
  ok: true;
  calendarId: string;
  eventId: string;
}

/**
 * Create, update and delete single events.
 */
export class EventService {
  constructor(
    private readonly client: GoogleCalendarClient,
    private readonly resolver: CalendarResolver,
  ) {}

  async createEvent(input: CreateEventInput): Promise<EventMutationResult> {
    const { calendar, allDay, ...fields } = input;
    if (allDay && !isDateOnly(fields.start)) {
      throw new ValidationError("all-day events need start as YYYY-MM-DD");
    }
    if (fields.end === undefined) {
      if (!isDateOnly(fields.start)) {
        throw new ValidationError("end is required for timed events");
      }
      fields.end = nextDay(fields.start);
    }

    const requestBody = buildEventBody(fields);
    const calendarId = await this.resolver.resolveId(calendar);
    const created = await this.client.insertEvent(calendarId, requestBody);

    logger.info({ calendarId, allDay: isDateOnly(fields.start) }, "Event created");
    return { ok: true, event: toCalendarEvent(created, calendarId) };
  }

  async updateEvent(
    calendar: string | undefined,
    eventId: string,
    patch: EventFields,
  ): Promise<EventMutationResult> {
    const requestBody = buildEventBody(patch);
    if (Object.keys(requestBody).length === 0) {
      throw new ValidationError("patch must change at least one field");
    }
    const calendarId = await this.resolver.resolveId(calendar);
    const updated = await this.client.patchEvent(calendarId, eventId, requestBody);

    logger.info({ calendarId, fields: Object.keys(requestBody) }, "Event updated");
    return { ok: true, event: toCalendarEvent(updated, calendarId) };
  }

  /**
   * Deletes an event. With `asInstance` the event must be a single occurrence of a
   * series; deleting it cancels only that occurrence.
   */
  async deleteEvent(
    calendar: string | undefined,
    eventId: string,
    asInstance = false,
  ): Promise<DeleteEventResult> {
    const calendarId = await this.resolver.resolveId(calendar);
    if (asInstance) {
      const event = await this.client.getEvent(calendarId, eventId);
      if (!event.recurringEventId) {
        throw new UnsupportedEventTypeError(eventId, "not an occurrence of a recurring series");
      }
    }
    await this.client.deleteEvent(calendarId, eventId);

    logger.info({ calendarId, asInstance }, "Event deleted");
    return { ok: true, calendarId, eventId };
  }
}
