import type { z } from "zod";
import type { EventAggregator } from "../calendar/aggregator.js";
import type { EventService } from "../calendar/events.js";
import type { CalendarResolver } from "../calendar/resolver.js";
import type { RecurringSeriesManager } from "../calendar/series.js";

/** Components every tool handler can reach. */
export interface CalendarServices {
  resolver: CalendarResolver;
  aggregator: EventAggregator;
  events: EventService;
  series: RecurringSeriesManager;
}

/** Standard MCP tool result shape returned by all tool handlers. */
export type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

interface ToolConfig<Shape extends z.ZodRawShape> {
  name: string;
  description: string;
  params: z.ZodObject<Shape>;
  handler: (params: z.infer<z.ZodObject<Shape>>, services: CalendarServices) => Promise<unknown>;
}

/** A registry entry. Arguments are validated by `execute` before the handler runs. */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly shape: z.ZodRawShape;
  execute(args: unknown, services: CalendarServices): Promise<unknown>;
}

export function defineTool<Shape extends z.ZodRawShape>(config: ToolConfig<Shape>): ToolDefinition {
  return {
    name: config.name,
    description: config.description,
    shape: config.params.shape,
    execute: (args, services) => config.handler(config.params.parse(args), services),
  };
}
