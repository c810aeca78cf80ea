import { toEventFields } from "../schemas/calendar.js";
import { UpdateFollowingInstancesParams } from "../schemas/calendar-recurrence.js";
import { defineTool } from "../types/tools.js";

export const updateFollowingInstancesTool = defineTool({
  name: "update_following_instances",
  description:
    "Change this and all following occurrences of a recurring series. The original series is ended just before target_instance_start and a new series starting there is created with new_recurrence and the fields from change_patch; unchanged fields are copied from the original. All-day series are not supported.",
  params: UpdateFollowingInstancesParams,
  handler: (params, { series }) =>
    series.updateFollowingInstances({
      calendar: params.calendar,
      recurringEventId: params.recurring_event_id,
      targetInstanceStart: params.target_instance_start,
      changePatch: toEventFields(params.change_patch),
      newRecurrence: params.new_recurrence,
    }),
});
