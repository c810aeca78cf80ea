import { CalendarToolError, type ErrorKind } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { GoogleCalendarClient } from "./client.js";
import { type CalendarEvent, startInstant, toCalendarEvent } from "./event-shape.js";
import type { CalendarResolver } from "./resolver.js";

const logger = createLogger("event-aggregator");

export const MAX_RESULTS_CAP = 500;

export interface ListEventsOptions {
  calendar?: string;
  timeMin?: string;
  timeMax?: string;
  /** Per-calendar cap, not a global one. */
  maxResults?: number;
  query?: string;
  includeAllCalendars?: boolean;
}

export interface CalendarListingError {
  calendarId: string;
  summary: string | null;
  kind: ErrorKind;
  message: string;
}

export interface AggregatedEvents {
  events: CalendarEvent[];
  errors?: CalendarListingError[];
}

interface CalendarTarget {
  calendarId: string;
  summary: string | null;
}

export function clampMaxResults(value: number | undefined, fallback: number): number {
  const requested = value ?? fallback;
  return Math.max(1, Math.min(Math.trunc(requested), MAX_RESULTS_CAP));
}

/** Ascending start instant, then calendarId, then id; ids compare by code unit. */
export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  const byStart = startInstant(a) - startInstant(b);
  if (byStart !== 0 && !Number.isNaN(byStart)) return byStart;
  if (a.calendarId !== b.calendarId) return a.calendarId < b.calendarId ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

/**
 * Lists events across one or many calendars.
 *
 * Recurring series arrive as their individual occurrences. In all-calendars
 * mode the fan-out is best-effort: a calendar whose listing fails is left out
 * and reported in `errors`.
 */
export class EventAggregator {
  constructor(
    private readonly client: GoogleCalendarClient,
    private readonly resolver: CalendarResolver,
    private readonly defaultMaxResults: number,
  ) {}

  async listEvents(options: ListEventsOptions = {}): Promise<AggregatedEvents> {
    const maxResults = clampMaxResults(options.maxResults, this.defaultMaxResults);

    if (!options.includeAllCalendars) {
      const resolved = await this.resolver.resolve(options.calendar);
      const events = await this.pull(resolved, options, maxResults);
      return { events: events.sort(compareEvents) };
    }

    const calendars = await this.resolver.listCalendars();
    const targets = calendars.map((cal) => ({ calendarId: cal.id, summary: cal.summary }));
    const settled = await Promise.allSettled(
      targets.map((target) => this.pull(target, options, maxResults)),
    );

    const events: CalendarEvent[] = [];
    const errors: CalendarListingError[] = [];
    settled.forEach((outcome, index) => {
      const target = targets[index];
      if (!target) return;
      if (outcome.status === "fulfilled") {
        events.push(...outcome.value);
        return;
      }
      const reason: unknown = outcome.reason;
      if (!(reason instanceof CalendarToolError)) {
        throw reason;
      }
      errors.push({ ...target, kind: reason.kind, message: reason.message });
    });

    if (errors.length > 0) {
      logger.warn(
        { failedCalendars: errors.length, totalCalendars: targets.length },
        "Some calendars could not be listed",
      );
    }

    events.sort(compareEvents);
    return errors.length > 0 ? { events, errors } : { events };
  }

  private async pull(
    target: CalendarTarget,
    options: ListEventsOptions,
    maxResults: number,
  ): Promise<CalendarEvent[]> {
    const items = await this.client.listEvents({
      calendarId: target.calendarId,
      timeMin: options.timeMin,
      timeMax: options.timeMax,
      query: options.query,
      maxResults,
    });
    return items.map((item) => toCalendarEvent(item, target.calendarId));
  }
}
