import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CalendarServices, ToolDefinition, ToolResult } from "../types/tools.js";
import { toFailurePayload } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { createEventTool } from "./calendar-create.js";
import { deleteEventTool } from "./calendar-delete.js";
import { listEventsTool } from "./calendar-events.js";
import { cancelRecurringInstanceTool, listRecurringInstancesTool } from "./calendar-instances.js";
import { listCalendarsTool, resolveCalendarTool } from "./calendar-list.js";
import { updateFollowingInstancesTool } from "./calendar-recurring.js";
import { updateEventTool } from "./calendar-update.js";

const logger = createLogger("tools");

export const CALENDAR_TOOLS: readonly ToolDefinition[] = [
  listCalendarsTool,
  listEventsTool,
  createEventTool,
  updateEventTool,
  deleteEventTool,
  resolveCalendarTool,
  listRecurringInstancesTool,
  cancelRecurringInstanceTool,
  updateFollowingInstancesTool,
];

function textResult(value: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

/**
 * Runs one tool call. Known failures become `{ ok: false, error }` results with
 * isError set; anything else is rethrown to the SDK.
 */
export async function runTool(
  tool: ToolDefinition,
  args: unknown,
  services: CalendarServices,
): Promise<ToolResult> {
  const startTime = Date.now();
  try {
    const value = await tool.execute(args, services);
    logger.info(
      { tool: tool.name, duration_ms: Date.now() - startTime },
      `${tool.name} completed`,
    );
    return textResult(value);
  } catch (error) {
    const payload = toFailurePayload(error);
    if (!payload) throw error;
    logger.warn(
      { tool: tool.name, error_kind: payload.error.kind, duration_ms: Date.now() - startTime },
      `${tool.name} failed`,
    );
    return textResult(payload, true);
  }
}

export function registerCalendarTools(
  server: McpServer,
  services: CalendarServices,
  tools: readonly ToolDefinition[] = CALENDAR_TOOLS,
): void {
  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.shape, (args) => runTool(tool, args, services));
  }
  logger.debug({ tools: tools.length }, "Calendar tools registered");
}
