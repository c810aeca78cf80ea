import {
  CancelRecurringInstanceParams,
  ListRecurringInstancesParams,
} from "../schemas/calendar-recurrence.js";
import { defineTool } from "../types/tools.js";

export const listRecurringInstancesTool = defineTool({
  name: "list_recurring_instances",
  description:
    "List the occurrences of a recurring series, optionally within a time window. Each occurrence carries its own id and originalStartTime.",
  params: ListRecurringInstancesParams,
  handler: (params, { series }) =>
    series.listRecurringInstances({
      calendar: params.calendar,
      recurringEventId: params.recurring_event_id,
      timeMin: params.time_min,
      timeMax: params.time_max,
      maxResults: params.max_results,
    }),
});

export const cancelRecurringInstanceTool = defineTool({
  name: "cancel_recurring_instance",
  description:
    "Cancel one occurrence of a recurring series; the rest of the series is untouched. Identify the occurrence by instance_id, or by recurring_event_id together with original_start_time.",
  params: CancelRecurringInstanceParams,
  handler: (params, { series }) =>
    series.cancelRecurringInstance({
      calendar: params.calendar,
      instanceId: params.instance_id,
      recurringEventId: params.recurring_event_id,
      originalStartTime: params.original_start_time,
    }),
});
