import type { calendar_v3 } from "googleapis";
import {
  AmbiguousInputError,
  CalendarToolError,
  NotFoundError,
  SeriesUpdateError,
  UnsupportedEventTypeError,
  UpstreamError,
  ValidationError,
} from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/type-guards.js";
import { clampMaxResults } from "./aggregator.js";
import type { GoogleCalendarClient } from "./client.js";
import {
  type CalendarEvent,
  type CalendarEventInstance,
  type EventFields,
  buildEventBody,
  instantOf,
  isDateOnly,
  isInstance,
  isTimestampWithOffset,
  toCalendarEvent,
} from "./event-shape.js";
import { hasRecurrenceRule, terminateBefore } from "./recurrence.js";
import type { CalendarResolver } from "./resolver.js";

const logger = createLogger("recurring-series");

/** Fields a split may change on the new half; start and recurrence come from their own inputs. */
export type SeriesChangePatch = Omit<EventFields, "start" | "recurrence">;

export interface UpdateFollowingInput {
  calendar?: string;
  recurringEventId: string;
  targetInstanceStart: string;
  changePatch: SeriesChangePatch;
  newRecurrence: string[];
}

export interface UpdateFollowingResult {
  ok: true;
  newRecurringEvent: CalendarEvent;
  /** The terminated original, or null when the cutoff removed every occurrence and it was deleted. */
  originalSeries: CalendarEvent | null;
}

export interface CancelInstanceInput {
  calendar?: string;
  instanceId?: string;
  recurringEventId?: string;
  originalStartTime?: string;
}

export interface ListInstancesInput {
  calendar?: string;
  recurringEventId: string;
  timeMin?: string;
  timeMax?: string;
  maxResults?: number;
}

type InstanceLocator =
  | { by: "id"; instanceId: string }
  | { by: "original-start"; recurringEventId: string; originalStartTime: string };

/** Fields copied from the original series onto the new half. */
const INHERITED_FIELDS = [
  "summary",
  "description",
  "location",
  "reminders",
  "attendees",
  "colorId",
  "transparency",
  "visibility",
] as const;

/**
 * Decides how an instance is identified. Runs before any provider call.
 */
export function locateInstance(input: CancelInstanceInput): InstanceLocator {
  if (input.instanceId) {
    return { by: "id", instanceId: input.instanceId };
  }
  if (input.recurringEventId && input.originalStartTime) {
    return {
      by: "original-start",
      recurringEventId: input.recurringEventId,
      originalStartTime: input.originalStartTime,
    };
  }
  throw new AmbiguousInputError(
    "Identify the instance with instance_id, or with both recurring_event_id and original_start_time.",
  );
}

function toIsoSeconds(ms: number): string {
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, "Z");
}

function requireInstance(event: calendar_v3.Schema$Event, calendarId: string): CalendarEventInstance {
  const shaped = toCalendarEvent(event, calendarId);
  if (!isInstance(shaped)) {
    throw new UnsupportedEventTypeError(shaped.id, "not an occurrence of a recurring series");
  }
  return shaped;
}

/**
 * Operations on recurring series: listing and cancelling single occurrences,
 * and splitting a series to change "this and all following" occurrences.
 */
export class RecurringSeriesManager {
  constructor(
    private readonly client: GoogleCalendarClient,
    private readonly resolver: CalendarResolver,
    private readonly defaultMaxResults: number,
  ) {}

  async listRecurringInstances(input: ListInstancesInput) {
    const calendarId = await this.resolver.resolveId(input.calendar);
    const items = await this.client.listInstances({
      calendarId,
      recurringEventId: input.recurringEventId,
      timeMin: input.timeMin,
      timeMax: input.timeMax,
      maxResults: clampMaxResults(input.maxResults, this.defaultMaxResults),
    });
    const instances = items.map((item) => toCalendarEvent(item, calendarId));
    return { ok: true as const, recurringEventId: input.recurringEventId, instances };
  }

  async cancelRecurringInstance(input: CancelInstanceInput) {
    const locator = locateInstance(input);
    const calendarId = await this.resolver.resolveId(input.calendar);

    const instance =
      locator.by === "id"
        ? await this.fetchInstance(calendarId, locator.instanceId)
        : await this.findInstance(calendarId, locator.recurringEventId, locator.originalStartTime);

    // Deleting an occurrence marks it cancelled; the series itself is untouched.
    await this.client.deleteEvent(calendarId, instance.id);

    logger.info({ recurringEventId: instance.recurringEventId }, "Recurring instance cancelled");
    return { ok: true as const, instance: { ...instance, status: "cancelled" } };
  }

  async updateFollowingInstances(input: UpdateFollowingInput): Promise<UpdateFollowingResult> {
    const { recurringEventId, targetInstanceStart } = input;
    if (!isTimestampWithOffset(targetInstanceStart)) {
      throw new ValidationError(
        `target_instance_start must be an ISO 8601 timestamp with offset, got "${targetInstanceStart}"`,
      );
    }
    if (input.newRecurrence.length === 0) {
      throw new ValidationError("new_recurrence must contain at least one rule");
    }
    const targetMs = Date.parse(targetInstanceStart);
    const calendarId = await this.resolver.resolveId(input.calendar);

    // 1. Fetch the series.
    const series = await this.client.getEvent(calendarId, recurringEventId);

    // 2. Only timed series can be split.
    const seriesStart = series.start?.dateTime;
    if (series.start?.date || !seriesStart) {
      throw new UnsupportedEventTypeError(recurringEventId, "all-day series cannot be split");
    }
    if (!hasRecurrenceRule(series.recurrence)) {
      throw new UnsupportedEventTypeError(recurringEventId, "event is not a recurring series");
    }

    // Both halves are computed before any mutation; invalid input leaves the original untouched.
    const requestBody = this.buildNewSeries(series, input);
    const removesEveryOccurrence = targetMs <= Date.parse(seriesStart);
    const boundedRules = removesEveryOccurrence
      ? []
      : terminateBefore(
          series.recurrence ?? [],
          targetInstanceStart,
          series.start?.timeZone ?? undefined,
        );

    // 3. Terminate the original before the target. No new half is created if this fails.
    const originalSeries = await this.terminateSeries(
      calendarId,
      series,
      removesEveryOccurrence,
      boundedRules,
    );

    // 4. Create the new half.
    let created: calendar_v3.Schema$Event;
    try {
      created = await this.client.insertEvent(calendarId, requestBody);
    } catch (error) {
      const status = error instanceof CalendarToolError ? error.httpStatus : undefined;
      throw new UpstreamError(
        `Series ${recurringEventId} was ended before ${targetInstanceStart}, but creating the new series failed: ${errorMessage(error)}`,
        status,
      );
    }

    logger.info(
      { recurringEventId, newRecurringEventId: created.id, originalDeleted: originalSeries === null },
      "Recurring series split",
    );

    return {
      ok: true,
      newRecurringEvent: toCalendarEvent(created, calendarId),
      originalSeries,
    };
  }

  private async terminateSeries(
    calendarId: string,
    series: calendar_v3.Schema$Event,
    removesEveryOccurrence: boolean,
    boundedRules: string[],
  ): Promise<CalendarEvent | null> {
    const seriesId = series.id ?? "";
    try {
      if (removesEveryOccurrence) {
        await this.client.deleteEvent(calendarId, seriesId);
        return null;
      }
      const updated = await this.client.patchEvent(calendarId, seriesId, {
        recurrence: boundedRules,
      });
      return toCalendarEvent(updated, calendarId);
    } catch (error) {
      throw new SeriesUpdateError(seriesId, errorMessage(error), error);
    }
  }

  private buildNewSeries(
    series: calendar_v3.Schema$Event,
    input: UpdateFollowingInput,
  ): calendar_v3.Schema$Event {
    const { changePatch, targetInstanceStart } = input;
    const body: calendar_v3.Schema$Event = {};
    for (const field of INHERITED_FIELDS) {
      const value = series[field];
      if (value !== undefined && value !== null) {
        Object.assign(body, { [field]: value });
      }
    }

    const timeZone = changePatch.timeZone ?? series.start?.timeZone ?? undefined;
    if (changePatch.end !== undefined) {
      if (isDateOnly(changePatch.end)) {
        throw new ValidationError("change_patch.end must be a timestamp for a timed series");
      }
      const endMs = instantOf(changePatch.end, timeZone);
      if (Number.isNaN(endMs)) {
        throw new ValidationError(
          `change_patch.end "${changePatch.end}" needs an offset when the series has no time zone`,
        );
      }
      if (endMs <= Date.parse(targetInstanceStart)) {
        throw new ValidationError(
          `change_patch.end must be after target_instance_start ${targetInstanceStart}`,
        );
      }
    }
    const { end: patchEnd, ...overlay } = changePatch;
    Object.assign(body, buildEventBody(overlay));

    const durationMs =
      Date.parse(series.end?.dateTime ?? "") - Date.parse(series.start?.dateTime ?? "");
    const defaultEnd = toIsoSeconds(
      Date.parse(targetInstanceStart) + (Number.isNaN(durationMs) ? 0 : durationMs),
    );

    body.start = timeZone
      ? { dateTime: targetInstanceStart, timeZone }
      : { dateTime: targetInstanceStart };
    const end = patchEnd ?? defaultEnd;
    body.end = timeZone ? { dateTime: end, timeZone } : { dateTime: end };
    body.recurrence = [...input.newRecurrence];
    return body;
  }

  private async fetchInstance(calendarId: string, instanceId: string): Promise<CalendarEventInstance> {
    const event = await this.client.getEvent(calendarId, instanceId);
    if (event.status === "cancelled") {
      throw new NotFoundError("instance", instanceId, 410);
    }
    return requireInstance(event, calendarId);
  }

  private async findInstance(
    calendarId: string,
    recurringEventId: string,
    originalStartTime: string,
  ): Promise<CalendarEventInstance> {
    const wanted = Date.parse(originalStartTime);
    const items = await this.client.listInstances({
      calendarId,
      recurringEventId,
      originalStart: originalStartTime,
    });
    const match = items.find((item) => {
      const original = item.originalStartTime?.dateTime ?? item.originalStartTime?.date;
      if (!original) return false;
      return original === originalStartTime || Date.parse(original) === wanted;
    });
    if (!match || match.status === "cancelled") {
      throw new NotFoundError("instance", `${recurringEventId} at ${originalStartTime}`);
    }
    return requireInstance(match, calendarId);
  }
}
