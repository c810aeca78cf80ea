import { ListEventsParams } from "../schemas/calendar.js";
import { defineTool } from "../types/tools.js";

export const listEventsTool = defineTool({
  name: "list_events",
  description:
    "List events in a time window, with recurring series expanded into single occurrences. With include_all_calendars=true every accessible calendar is queried; calendars that fail are reported in `errors` while the rest are still returned. Events are sorted by start time.",
  params: ListEventsParams,
  handler: (params, { aggregator }) =>
    aggregator.listEvents({
      calendar: params.calendar,
      timeMin: params.time_min,
      timeMax: params.time_max,
      maxResults: params.max_results,
      query: params.query,
      includeAllCalendars: params.include_all_calendars,
    }),
});
