import type { calendar_v3 } from "googleapis";
import type { CalendarSession } from "../auth/google-session.js";
import { withAuthRetry } from "../middleware/auth-retry.js";
import { type ResourceRef, mapGoogleError } from "../middleware/error-mapping.js";
import { withRequestLogging } from "../middleware/logging.js";

/** Largest page the calendar list endpoint serves. */
const CALENDAR_LIST_PAGE_SIZE = 250;

export interface EventListParams {
  calendarId: string;
  timeMin?: string;
  timeMax?: string;
  maxResults: number;
  query?: string;
}

export interface InstanceListParams {
  calendarId: string;
  recurringEventId: string;
  timeMin?: string;
  timeMax?: string;
  maxResults?: number;
  originalStart?: string;
}

/**
 * Facade over the Google Calendar v3 client.
 *
 * Each call is logged, its failures are mapped to the typed error hierarchy,
 * and a 401 triggers one token refresh followed by one retry.
 */
export class GoogleCalendarClient {
  constructor(private readonly session: CalendarSession) {}

  /** Every calendar on the user's calendar list, across all pages. */
  async listCalendars(): Promise<calendar_v3.Schema$CalendarListEntry[]> {
    const entries: calendar_v3.Schema$CalendarListEntry[] = [];
    let pageToken: string | undefined;
    do {
      const token = pageToken;
      const page = await this.execute("calendarList.list", undefined, (calendar) =>
        calendar.calendarList.list({ maxResults: CALENDAR_LIST_PAGE_SIZE, pageToken: token }),
      );
      entries.push(...(page.items ?? []));
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken);
    return entries;
  }

  getCalendarListEntry(calendarId: string): Promise<calendar_v3.Schema$CalendarListEntry> {
    return this.execute("calendarList.get", { type: "calendar", id: calendarId }, (calendar) =>
      calendar.calendarList.get({ calendarId }),
    );
  }

  /** Calendar metadata; also reaches calendars the user can access but has not subscribed to. */
  getCalendar(calendarId: string): Promise<calendar_v3.Schema$Calendar> {
    return this.execute("calendars.get", { type: "calendar", id: calendarId }, (calendar) =>
      calendar.calendars.get({ calendarId }),
    );
  }

  /** Expanded occurrences (singleEvents) ordered by start time. */
  async listEvents(params: EventListParams): Promise<calendar_v3.Schema$Event[]> {
    const page = await this.execute(
      "events.list",
      { type: "calendar", id: params.calendarId },
      (calendar) =>
        calendar.events.list({
          calendarId: params.calendarId,
          singleEvents: true,
          orderBy: "startTime",
          maxResults: params.maxResults,
          ...(params.timeMin ? { timeMin: params.timeMin } : {}),
          ...(params.timeMax ? { timeMax: params.timeMax } : {}),
          ...(params.query ? { q: params.query } : {}),
        }),
    );
    return page.items ?? [];
  }

  async listInstances(params: InstanceListParams): Promise<calendar_v3.Schema$Event[]> {
    const page = await this.execute(
      "events.instances",
      { type: "recurring event", id: params.recurringEventId },
      (calendar) =>
        calendar.events.instances({
          calendarId: params.calendarId,
          eventId: params.recurringEventId,
          ...(params.maxResults !== undefined ? { maxResults: params.maxResults } : {}),
          ...(params.timeMin ? { timeMin: params.timeMin } : {}),
          ...(params.timeMax ? { timeMax: params.timeMax } : {}),
          ...(params.originalStart ? { originalStart: params.originalStart } : {}),
        }),
    );
    return page.items ?? [];
  }

  getEvent(calendarId: string, eventId: string): Promise<calendar_v3.Schema$Event> {
    return this.execute("events.get", { type: "event", id: eventId }, (calendar) =>
      calendar.events.get({ calendarId, eventId }),
    );
  }

  insertEvent(
    calendarId: string,
    requestBody: calendar_v3.Schema$Event,
  ): Promise<calendar_v3.Schema$Event> {
    return this.execute("events.insert", { type: "calendar", id: calendarId }, (calendar) =>
      calendar.events.insert({ calendarId, requestBody }),
    );
  }

  patchEvent(
    calendarId: string,
    eventId: string,
    requestBody: calendar_v3.Schema$Event,
  ): Promise<calendar_v3.Schema$Event> {
    return this.execute("events.patch", { type: "event", id: eventId }, (calendar) =>
      calendar.events.patch({ calendarId, eventId, requestBody }),
    );
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    await this.execute("events.delete", { type: "event", id: eventId }, (calendar) =>
      calendar.events.delete({ calendarId, eventId }),
    );
  }

  private execute<T>(
    operation: string,
    target: ResourceRef | undefined,
    call: (calendar: calendar_v3.Calendar) => Promise<{ data: T }>,
  ): Promise<T> {
    const attempt = () =>
      withRequestLogging(operation, async () => {
        try {
          const response = await call(this.session.calendar);
          return response.data;
        } catch (error) {
          throw mapGoogleError(error, target);
        }
      });
    return withAuthRetry(this.session, operation, attempt);
  }
}
