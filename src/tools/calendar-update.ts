import { UpdateEventParams, toEventFields } from "../schemas/calendar.js";
import { defineTool } from "../types/tools.js";

export const updateEventTool = defineTool({
  name: "update_event",
  description:
    "Change fields of one event. Only the fields given in `patch` are changed. To change one occurrence of a series, pass the occurrence id; to change this and all following occurrences use update_following_instances.",
  params: UpdateEventParams,
  handler: (params, { events }) =>
    events.updateEvent(params.calendar, params.event_id, toEventFields(params.patch)),
});
