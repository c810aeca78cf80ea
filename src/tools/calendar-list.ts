import { ListCalendarsParams, ResolveCalendarParams } from "../schemas/calendar.js";
import { defineTool } from "../types/tools.js";

export const listCalendarsTool = defineTool({
  name: "list_calendars",
  description:
    "List every calendar the account can access. Returns id, name, primary flag, access role and time zone. Calendar ids and names can be passed as `calendar` to the other tools.",
  params: ListCalendarsParams,
  handler: async (_params, { resolver }) => ({ calendars: await resolver.listCalendars() }),
});

export const resolveCalendarTool = defineTool({
  name: "resolve_calendar",
  description:
    'Resolve a calendar name, id or "primary" to a calendar id. Names match case-insensitively and partially; several matches prefer an exact name, then the primary calendar, then listing order.',
  params: ResolveCalendarParams,
  handler: (params, { resolver }) => resolver.resolve(params.query),
});
