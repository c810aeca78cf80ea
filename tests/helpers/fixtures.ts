import type { calendar_v3 } from "googleapis";
import { GoogleSession } from "../../src/auth/google-session.js";
import { EventAggregator } from "../../src/calendar/aggregator.js";
import { GoogleCalendarClient } from "../../src/calendar/client.js";
import { EventService } from "../../src/calendar/events.js";
import { CalendarResolver } from "../../src/calendar/resolver.js";
import { RecurringSeriesManager } from "../../src/calendar/series.js";
import type { CalendarServices } from "../../src/types/tools.js";
import { calendarStore } from "../mocks/calendar-store.js";

export const PRIMARY_ID = "owner@example.com";

/** Session against the in-process fake; gaxios retries off so failures surface at once. */
export function createTestSession(): GoogleSession {
  return new GoogleSession(
    { clientId: "test-client-id", clientSecret: "test-secret", refreshToken: "test-refresh-token" },
    { retries: 0 },
  );
}

export interface TestContext extends CalendarServices {
  session: GoogleSession;
  client: GoogleCalendarClient;
}

export function createTestContext(defaultMaxResults = 50): TestContext {
  const session = createTestSession();
  const client = new GoogleCalendarClient(session);
  const resolver = new CalendarResolver(client);
  return {
    session,
    client,
    resolver,
    aggregator: new EventAggregator(client, resolver, defaultMaxResults),
    events: new EventService(client, resolver),
    series: new RecurringSeriesManager(client, resolver, defaultMaxResults),
  };
}

/** Primary calendar plus "Work" and "Family". */
export function seedCalendars(): void {
  calendarStore.addCalendar({ id: PRIMARY_ID, summary: "Alex Example", primary: true });
  calendarStore.addCalendar({ id: "cal-work", summary: "Work" });
  calendarStore.addCalendar({ id: "cal-family", summary: "Family" });
}

export function timedEvent(
  id: string,
  summary: string,
  start: string,
  end: string,
  extra: calendar_v3.Schema$Event = {},
): calendar_v3.Schema$Event {
  return { id, summary, start: { dateTime: start }, end: { dateTime: end }, ...extra };
}

/** Weekly Monday stand-up, 09:00-09:30 UTC, starting 2026-03-02. */
export function weeklyStandup(extra: calendar_v3.Schema$Event = {}): calendar_v3.Schema$Event {
  return {
    id: "series-standup",
    summary: "Stand-up",
    description: "Team sync",
    location: "Room 4",
    start: { dateTime: "2026-03-02T09:00:00Z", timeZone: "UTC" },
    end: { dateTime: "2026-03-02T09:30:00Z", timeZone: "UTC" },
    recurrence: ["RRULE:FREQ=WEEKLY;COUNT=8"],
    reminders: { useDefault: false, overrides: [{ method: "popup", minutes: 10 }] },
    ...extra,
  };
}
