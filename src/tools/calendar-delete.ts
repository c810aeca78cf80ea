import { DeleteEventParams } from "../schemas/calendar.js";
import { defineTool } from "../types/tools.js";

export const deleteEventTool = defineTool({
  name: "delete_event",
  description:
    "Delete an event. Passing a series id deletes the whole series. With as_instance=true the id must be a single occurrence, and only that occurrence is cancelled.",
  params: DeleteEventParams,
  handler: (params, { events }) =>
    events.deleteEvent(params.calendar, params.event_id, params.as_instance),
});
