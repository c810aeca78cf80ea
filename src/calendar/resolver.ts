import { NotFoundError, UpstreamError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { GoogleCalendarClient } from "./client.js";
import { type CalendarSummary, toCalendarSummary } from "./event-shape.js";

const logger = createLogger("calendar-resolver");

/** How the query was matched. */
export type CalendarMatch = "primary" | "id" | "name";

/** Which rule picked the winner among several name matches. */
export type TieBreakRule = "exact-name" | "primary" | "listing-order";

export interface ResolvedCalendar {
  calendarId: string;
  summary: string | null;
  matchedBy: CalendarMatch;
  tieBreak?: TieBreakRule;
  /** Number of calendars whose display name contained the query (1 for primary/id matches). */
  candidates: number;
}

function isPrimaryQuery(query: string | null | undefined): boolean {
  const trimmed = query?.trim() ?? "";
  return trimmed === "" || trimmed.toLowerCase() === "primary";
}

function fromSummary(
  calendar: CalendarSummary,
  matchedBy: CalendarMatch,
  candidates: number,
  tieBreak?: TieBreakRule,
): ResolvedCalendar {
  const resolved: ResolvedCalendar = {
    calendarId: calendar.id,
    summary: calendar.summary,
    matchedBy,
    candidates,
  };
  if (tieBreak) resolved.tieBreak = tieBreak;
  return resolved;
}

/**
 * Picks a calendar by display name.
 *
 * Case-insensitive substring match. Several matches are narrowed by, in order:
 * an exact (case-insensitive) name, the primary flag, then provider listing order.
 */
export function pickCalendarByName(
  calendars: readonly CalendarSummary[],
  query: string,
): ResolvedCalendar {
  const needle = query.trim().toLowerCase();
  const matches = calendars.filter((cal) => (cal.summary ?? "").toLowerCase().includes(needle));

  const [first, ...rest] = matches;
  if (!first) {
    throw new NotFoundError("calendar", query);
  }
  if (rest.length === 0) {
    return fromSummary(first, "name", 1);
  }

  const exact = matches.filter((cal) => (cal.summary ?? "").trim().toLowerCase() === needle);
  const [onlyExact] = exact;
  if (exact.length === 1 && onlyExact) {
    return fromSummary(onlyExact, "name", matches.length, "exact-name");
  }

  const pool = exact.length > 1 ? exact : matches;
  const primary = pool.find((cal) => cal.primary);
  if (primary) {
    return fromSummary(primary, "name", matches.length, "primary");
  }
  return fromSummary(pool[0] ?? first, "name", matches.length, "listing-order");
}

function isNotACalendarId(error: unknown): boolean {
  return (
    error instanceof NotFoundError || (error instanceof UpstreamError && error.httpStatus === 400)
  );
}

/**
 * Maps free-text calendar queries to calendar ids.
 * Always asks the provider: calendars can change at any time, so nothing is memoized.
 */
export class CalendarResolver {
  constructor(private readonly client: GoogleCalendarClient) {}

  async listCalendars(): Promise<CalendarSummary[]> {
    const entries = await this.client.listCalendars();
    return entries.map(toCalendarSummary);
  }

  async resolve(query?: string | null): Promise<ResolvedCalendar> {
    if (isPrimaryQuery(query)) {
      const entry = await this.client.getCalendarListEntry("primary");
      return fromSummary(toCalendarSummary(entry), "primary", 1);
    }

    const trimmed = (query ?? "").trim();
    try {
      const entry = await this.client.getCalendarListEntry(trimmed);
      return fromSummary(toCalendarSummary(entry), "id", 1);
    } catch (error) {
      if (!isNotACalendarId(error)) throw error;
    }
    // Accessible calendars missing from the user's list.
    try {
      const calendar = await this.client.getCalendar(trimmed);
      return {
        calendarId: calendar.id ?? trimmed,
        summary: calendar.summary ?? null,
        matchedBy: "id",
        candidates: 1,
      };
    } catch (error) {
      if (!isNotACalendarId(error)) throw error;
    }

    const calendars = await this.listCalendars();
    const byId = calendars.find((cal) => cal.id.toLowerCase() === trimmed.toLowerCase());
    if (byId) {
      return fromSummary(byId, "id", 1);
    }

    const resolved = pickCalendarByName(calendars, trimmed);
    logger.debug(
      { matchedBy: resolved.matchedBy, tieBreak: resolved.tieBreak, candidates: resolved.candidates },
      "Calendar resolved by name",
    );
    return resolved;
  }

  async resolveId(query?: string | null): Promise<string> {
    const { calendarId } = await this.resolve(query);
    return calendarId;
  }
}
