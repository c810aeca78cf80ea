import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CalendarSession } from "./auth/google-session.js";
import { EventAggregator } from "./calendar/aggregator.js";
import { GoogleCalendarClient } from "./calendar/client.js";
import { EventService } from "./calendar/events.js";
import { CalendarResolver } from "./calendar/resolver.js";
import { RecurringSeriesManager } from "./calendar/series.js";
import type { Config } from "./config.js";
import { registerCalendarTools } from "./tools/registry.js";
import type { CalendarServices } from "./types/tools.js";

export const SERVER_NAME = "gcal-mcp";
export const SERVER_VERSION = "0.1.0";

/**
 * Wires the calendar components onto one session. Nothing here touches the
 * network until a tool runs.
 */
export function createCalendarServices(
  session: CalendarSession,
  limits: Config["limits"],
): CalendarServices {
  const client = new GoogleCalendarClient(session);
  const resolver = new CalendarResolver(client);
  return {
    resolver,
    aggregator: new EventAggregator(client, resolver, limits.defaultMaxResults),
    events: new EventService(client, resolver),
    series: new RecurringSeriesManager(client, resolver, limits.defaultMaxResults),
  };
}

export function createServer(services: CalendarServices): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerCalendarTools(server, services);
  return server;
}
