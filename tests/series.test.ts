import { http } from "msw";
import { beforeEach, describe, expect, it } from "vitest";
import { locateInstance } from "../src/calendar/series.js";
import {
  AmbiguousInputError,
  NotFoundError,
  SeriesUpdateError,
  UnsupportedEventTypeError,
  UpstreamError,
  ValidationError,
} from "../src/utils/errors.js";
import { createTestContext, seedCalendars, timedEvent, weeklyStandup } from "./helpers/fixtures.js";
import { calendarStore } from "./mocks/calendar-store.js";
import { CALENDAR_API, googleError } from "./mocks/handlers/calendar.js";
import { server } from "./mocks/server.js";

const TARGET = "2026-03-16T09:00:00Z";

function mutations(): string[] {
  return calendarStore.calls.filter((call) => !call.startsWith("GET "));
}

describe("recurring series", () => {
  beforeEach(() => {
    seedCalendars();
    calendarStore.addEvent("cal-work", weeklyStandup());
  });

  describe("listRecurringInstances", () => {
    it("should list occurrences inside the window", async () => {
      const { series } = createTestContext();

      const result = await series.listRecurringInstances({
        calendar: "Work",
        recurringEventId: "series-standup",
        timeMin: "2026-03-10T00:00:00Z",
        maxResults: 3,
      });

      expect(result.ok).toBe(true);
      expect(result.recurringEventId).toBe("series-standup");
      expect(result.instances.map((i) => i.originalStartTime)).toEqual([
        "2026-03-16T09:00:00Z",
        "2026-03-23T09:00:00Z",
        "2026-03-30T09:00:00Z",
      ]);
      expect(result.instances[0]).toMatchObject({
        id: "series-standup_20260316T090000Z",
        instanceId: "series-standup_20260316T090000Z",
        calendarId: "cal-work",
        summary: "Stand-up",
      });
    });

    it("should report an unknown series as not found", async () => {
      const { series } = createTestContext();

      await expect(
        series.listRecurringInstances({ calendar: "Work", recurringEventId: "nope" }),
      ).rejects.toThrow("Not found: recurring event nope");
    });
  });

  describe("cancelRecurringInstance", () => {
    it("should decide identification before any call", () => {
      expect(locateInstance({ instanceId: "i1", recurringEventId: "s1" })).toEqual({
        by: "id",
        instanceId: "i1",
      });
      expect(locateInstance({ recurringEventId: "s1", originalStartTime: TARGET })).toEqual({
        by: "original-start",
        recurringEventId: "s1",
        originalStartTime: TARGET,
      });
      expect(() => locateInstance({ originalStartTime: TARGET })).toThrow(AmbiguousInputError);
    });

    it("should fail without a full identification and make no provider calls", async () => {
      const { series } = createTestContext();

      await expect(
        series.cancelRecurringInstance({ calendar: "Work", recurringEventId: "series-standup" }),
      ).rejects.toBeInstanceOf(AmbiguousInputError);
      expect(calendarStore.calls).toEqual([]);
      expect(calendarStore.tokenGrants).toEqual([]);
    });

    it("should cancel one occurrence by instance id", async () => {
      const { series } = createTestContext();
      const instanceId = "series-standup_20260309T090000Z";

      const result = await series.cancelRecurringInstance({ calendar: "Work", instanceId });

      expect(result.ok).toBe(true);
      expect(result.instance).toMatchObject({
        id: instanceId,
        recurringEventId: "series-standup",
        originalStartTime: "2026-03-09T09:00:00Z",
        status: "cancelled",
      });

      const remaining = await series.listRecurringInstances({
        calendar: "Work",
        recurringEventId: "series-standup",
      });
      expect(remaining.instances).toHaveLength(7);
      expect(remaining.instances.map((i) => i.id)).not.toContain(instanceId);
      expect(calendarStore.stored("cal-work", "series-standup")?.recurrence).toEqual([
        "RRULE:FREQ=WEEKLY;COUNT=8",
      ]);
    });

    it("should cancel one occurrence by series id and original start", async () => {
      const { series } = createTestContext();

      const result = await series.cancelRecurringInstance({
        calendar: "Work",
        recurringEventId: "series-standup",
        originalStartTime: "2026-03-16T10:00:00+01:00",
      });

      expect(result.instance.id).toBe("series-standup_20260316T090000Z");
      expect(mutations()).toEqual([
        "DELETE /calendars/cal-work/events/series-standup_20260316T090000Z",
      ]);
    });

    it("should report an already cancelled occurrence as gone", async () => {
      const { series } = createTestContext();
      const instanceId = "series-standup_20260309T090000Z";
      await series.cancelRecurringInstance({ calendar: "Work", instanceId });

      const second = series.cancelRecurringInstance({ calendar: "Work", instanceId });

      await expect(second).rejects.toBeInstanceOf(NotFoundError);
      await expect(second).rejects.toMatchObject({ httpStatus: 410 });
    });

    it("should report an unknown original start as not found", async () => {
      const { series } = createTestContext();

      await expect(
        series.cancelRecurringInstance({
          calendar: "Work",
          recurringEventId: "series-standup",
          originalStartTime: "2026-03-17T09:00:00Z",
        }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should refuse an event that is not an occurrence", async () => {
      calendarStore.addEvent(
        "cal-work",
        timedEvent("evt-lunch", "Lunch", "2026-03-10T12:00:00Z", "2026-03-10T13:00:00Z"),
      );
      const { series } = createTestContext();

      await expect(
        series.cancelRecurringInstance({ calendar: "Work", instanceId: "evt-lunch" }),
      ).rejects.toBeInstanceOf(UnsupportedEventTypeError);
      expect(mutations()).toEqual([]);
    });
  });

  describe("updateFollowingInstances", () => {
    it("should end the original before the target and start a new series there", async () => {
      const { series } = createTestContext();

      const result = await series.updateFollowingInstances({
        calendar: "Work",
        recurringEventId: "series-standup",
        targetInstanceStart: TARGET,
        changePatch: { summary: "Stand-up (new room)", location: "Room 7" },
        newRecurrence: ["RRULE:FREQ=WEEKLY;COUNT=4"],
      });

      expect(result.ok).toBe(true);
      expect(result.originalSeries?.recurrence).toEqual([
        "RRULE:FREQ=WEEKLY;UNTIL=20260316T085959Z",
      ]);
      expect(result.newRecurringEvent).toEqual({
        id: "evt-1",
        calendarId: "cal-work",
        summary: "Stand-up (new room)",
        start: TARGET,
        end: "2026-03-16T09:30:00Z",
        allDay: false,
        timeZone: "UTC",
        description: "Team sync",
        location: "Room 7",
        recurrence: ["RRULE:FREQ=WEEKLY;COUNT=4"],
        reminders: { useDefault: false, minutes: [10] },
        status: "confirmed",
      });

      const original = await series.listRecurringInstances({
        calendar: "cal-work",
        recurringEventId: "series-standup",
      });
      const following = await series.listRecurringInstances({
        calendar: "cal-work",
        recurringEventId: "evt-1",
      });
      const lastOriginal = original.instances.at(-1)?.start ?? "";
      expect(Date.parse(lastOriginal)).toBeLessThan(Date.parse(TARGET));
      expect(original.instances.map((i) => i.start)).toEqual([
        "2026-03-02T09:00:00Z",
        "2026-03-09T09:00:00Z",
      ]);
      expect(following.instances[0]?.start).toBe(TARGET);
      expect(following.instances).toHaveLength(4);
      expect(following.instances[0]).toMatchObject({
        summary: "Stand-up (new room)",
        location: "Room 7",
        description: "Team sync",
      });
    });

    it("should patch the original before creating the new series", async () => {
      const { series } = createTestContext();

      await series.updateFollowingInstances({
        calendar: "cal-work",
        recurringEventId: "series-standup",
        targetInstanceStart: TARGET,
        changePatch: {},
        newRecurrence: ["RRULE:FREQ=WEEKLY"],
      });

      expect(mutations()).toEqual([
        "PATCH /calendars/cal-work/events/series-standup",
        "POST /calendars/cal-work/events",
      ]);
    });

    it("should use an explicit end and time zone from the patch", async () => {
      const { series } = createTestContext();

      await series.updateFollowingInstances({
        calendar: "cal-work",
        recurringEventId: "series-standup",
        targetInstanceStart: "2026-03-16T10:00:00+01:00",
        changePatch: { end: "2026-03-16T11:00:00+01:00", timeZone: "Europe/Berlin" },
        newRecurrence: ["RRULE:FREQ=WEEKLY;BYDAY=MO"],
      });

      const created = calendarStore.stored("cal-work", "evt-1");
      expect(created?.start).toEqual({
        dateTime: "2026-03-16T10:00:00+01:00",
        timeZone: "Europe/Berlin",
      });
      expect(created?.end).toEqual({
        dateTime: "2026-03-16T11:00:00+01:00",
        timeZone: "Europe/Berlin",
      });
      expect(created?.summary).toBe("Stand-up");
    });

    it("should delete the original when the target is at or before its start", async () => {
      const { series } = createTestContext();

      const result = await series.updateFollowingInstances({
        calendar: "cal-work",
        recurringEventId: "series-standup",
        targetInstanceStart: "2026-03-02T09:00:00Z",
        changePatch: { summary: "Stand-up v2" },
        newRecurrence: ["RRULE:FREQ=WEEKLY"],
      });

      expect(result.originalSeries).toBeNull();
      expect(calendarStore.stored("cal-work", "series-standup")).toBeUndefined();
      expect(result.newRecurringEvent.start).toBe("2026-03-02T09:00:00Z");
    });

    it("should refuse an all-day series without any mutation", async () => {
      calendarStore.addEvent("cal-work", {
        id: "series-gym",
        summary: "Gym",
        start: { date: "2026-03-02" },
        end: { date: "2026-03-03" },
        recurrence: ["RRULE:FREQ=WEEKLY"],
      });
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "series-gym",
          targetInstanceStart: TARGET,
          changePatch: { summary: "Gym (evening)" },
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toBeInstanceOf(UnsupportedEventTypeError);
      expect(mutations()).toEqual([]);
      expect(calendarStore.stored("cal-work", "series-gym")?.recurrence).toEqual([
        "RRULE:FREQ=WEEKLY",
      ]);
    });

    it("should refuse an event without recurrence", async () => {
      calendarStore.addEvent(
        "cal-work",
        timedEvent("evt-lunch", "Lunch", "2026-03-10T12:00:00Z", "2026-03-10T13:00:00Z"),
      );
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "evt-lunch",
          targetInstanceStart: TARGET,
          changePatch: {},
          newRecurrence: ["RRULE:FREQ=DAILY"],
        }),
      ).rejects.toThrow("Unsupported event evt-lunch: event is not a recurring series");
      expect(mutations()).toEqual([]);
    });

    it("should validate inputs before any call", async () => {
      const { series } = createTestContext();
      const base = {
        calendar: "cal-work",
        recurringEventId: "series-standup",
        changePatch: {},
      };

      await expect(
        series.updateFollowingInstances({
          ...base,
          targetInstanceStart: "2026-03-16",
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        series.updateFollowingInstances({ ...base, targetInstanceStart: TARGET, newRecurrence: [] }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(calendarStore.calls).toEqual([]);
    });

    it("should reject a date end for a timed series before any mutation", async () => {
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "series-standup",
          targetInstanceStart: TARGET,
          changePatch: { end: "2026-03-17" },
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(mutations()).toEqual([]);
    });

    it("should reject an end at or before the target before any mutation", async () => {
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "series-standup",
          targetInstanceStart: TARGET,
          changePatch: { end: "2026-03-16T08:00:00Z" },
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toThrow(
        "change_patch.end must be after target_instance_start 2026-03-16T09:00:00Z",
      );
      expect(mutations()).toEqual([]);
      expect(calendarStore.stored("cal-work", "series-standup")?.recurrence).toEqual([
        "RRULE:FREQ=WEEKLY;COUNT=8",
      ]);
    });

    it("should compare an end without offset in the given time zone", async () => {
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "series-standup",
          targetInstanceStart: "2026-03-16T10:00:00+01:00",
          changePatch: { end: "2026-03-16T09:30:00", timeZone: "Europe/Berlin" },
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(mutations()).toEqual([]);
    });

    it("should reject an end without offset when the series has no time zone", async () => {
      calendarStore.addEvent(
        "cal-work",
        weeklyStandup({
          id: "series-nozone",
          start: { dateTime: "2026-03-02T09:00:00Z" },
          end: { dateTime: "2026-03-02T09:30:00Z" },
        }),
      );
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "series-nozone",
          targetInstanceStart: TARGET,
          changePatch: { end: "2026-03-16T10:00:00" },
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toThrow(
        'change_patch.end "2026-03-16T10:00:00" needs an offset when the series has no time zone',
      );
      expect(mutations()).toEqual([]);
    });

    it("should drop extra dates at or after the target from the original", async () => {
      calendarStore.addEvent(
        "cal-work",
        weeklyStandup({
          id: "series-extra",
          recurrence: [
            "RRULE:FREQ=WEEKLY;COUNT=8",
            "RDATE:20260304T090000Z,20260401T090000Z",
            "RDATE;TZID=Europe/Berlin:20260320T100000",
          ],
        }),
      );
      const { series } = createTestContext();

      const result = await series.updateFollowingInstances({
        calendar: "cal-work",
        recurringEventId: "series-extra",
        targetInstanceStart: TARGET,
        changePatch: {},
        newRecurrence: ["RRULE:FREQ=WEEKLY;COUNT=4"],
      });

      expect(result.originalSeries?.recurrence).toEqual([
        "RRULE:FREQ=WEEKLY;UNTIL=20260316T085959Z",
        "RDATE:20260304T090000Z",
      ]);
    });

    it("should reject an unreadable extra date before any mutation", async () => {
      calendarStore.addEvent(
        "cal-work",
        weeklyStandup({
          id: "series-bad-rdate",
          recurrence: ["RRULE:FREQ=WEEKLY;COUNT=8", "RDATE:next-tuesday"],
        }),
      );
      const { series } = createTestContext();

      await expect(
        series.updateFollowingInstances({
          calendar: "cal-work",
          recurringEventId: "series-bad-rdate",
          targetInstanceStart: TARGET,
          changePatch: {},
          newRecurrence: ["RRULE:FREQ=WEEKLY"],
        }),
      ).rejects.toThrow('Unrecognised RDATE value "next-tuesday"');
      expect(mutations()).toEqual([]);
    });

    it("should not create the new series when ending the original fails", async () => {
      server.use(
        http.patch(`${CALENDAR_API}/calendars/:calendarId/events/:eventId`, () =>
          googleError(403, "forbidden", "Forbidden"),
        ),
      );
      const { series } = createTestContext();

      const attempt = series.updateFollowingInstances({
        calendar: "cal-work",
        recurringEventId: "series-standup",
        targetInstanceStart: TARGET,
        changePatch: {},
        newRecurrence: ["RRULE:FREQ=WEEKLY"],
      });

      await expect(attempt).rejects.toBeInstanceOf(SeriesUpdateError);
      await expect(attempt).rejects.toThrow(
        "Could not terminate series series-standup: Forbidden. No new series was created.",
      );
      expect(calendarStore.calls.some((call) => call.startsWith("POST "))).toBe(false);
    });

    it("should report a failed create after the original was ended", async () => {
      server.use(
        http.post(`${CALENDAR_API}/calendars/:calendarId/events`, () =>
          googleError(403, "forbidden", "Forbidden"),
        ),
      );
      const { series } = createTestContext();

      const attempt = series.updateFollowingInstances({
        calendar: "cal-work",
        recurringEventId: "series-standup",
        targetInstanceStart: TARGET,
        changePatch: {},
        newRecurrence: ["RRULE:FREQ=WEEKLY"],
      });

      await expect(attempt).rejects.toBeInstanceOf(UpstreamError);
      await expect(attempt).rejects.toThrow(
        `Series series-standup was ended before ${TARGET}, but creating the new series failed: Forbidden`,
      );
      await expect(attempt).rejects.toMatchObject({ httpStatus: 403 });
      expect(calendarStore.stored("cal-work", "series-standup")?.recurrence).toEqual([
        "RRULE:FREQ=WEEKLY;UNTIL=20260316T085959Z",
      ]);
    });
  });
});
