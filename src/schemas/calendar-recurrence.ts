import { z } from "zod";
import { SeriesChangePatch } from "./calendar.js";
import { CalendarQuery, MaxResults, RecurrenceRules, Timestamp } from "./common.js";

/**
 * Parameters for list_recurring_instances tool.
 */
export const ListRecurringInstancesParams = z.object({
  calendar: CalendarQuery,
  recurring_event_id: z.string().min(1).describe("ID of the recurring series"),
  time_min: Timestamp.optional().describe("Only instances ending after this time"),
  time_max: Timestamp.optional().describe("Only instances starting before this time"),
  max_results: MaxResults,
});

export type ListRecurringInstancesParamsType = z.infer<typeof ListRecurringInstancesParams>;

/**
 * Parameters for cancel_recurring_instance tool.
 * Either instance_id, or recurring_event_id together with original_start_time.
 */
export const CancelRecurringInstanceParams = z.object({
  calendar: CalendarQuery,
  instance_id: z.string().min(1).optional().describe("ID of the occurrence to cancel"),
  recurring_event_id: z.string().min(1).optional().describe("ID of the recurring series"),
  original_start_time: z
    .string()
    .min(1)
    .optional()
    .describe("The occurrence's originalStartTime (ISO 8601)"),
});

export type CancelRecurringInstanceParamsType = z.infer<typeof CancelRecurringInstanceParams>;

/**
 * Parameters for update_following_instances tool.
 */
export const UpdateFollowingInstancesParams = z.object({
  calendar: CalendarQuery,
  recurring_event_id: z.string().min(1).describe("ID of the recurring series to split"),
  target_instance_start: Timestamp.describe(
    "Start of the first occurrence to change (ISO 8601 with offset)",
  ),
  change_patch: SeriesChangePatch.describe(
    "Fields for the new series; omitted fields are copied from the original",
  ),
  new_recurrence: RecurrenceRules.min(1).describe(
    "Recurrence for the new series, used verbatim (e.g. ['RRULE:FREQ=WEEKLY;BYDAY=TU'])",
  ),
});

export type UpdateFollowingInstancesParamsType = z.infer<typeof UpdateFollowingInstancesParams>;
