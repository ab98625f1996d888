import {
  ComponentMcpServer,
  type ComponentRegistry,
} from "@calnodes/component-core";
import { createCalendarRegistry } from "./components/index.js";
import type { CalendarContext } from "./types.js";

/**
 * MCP Server exposing the Google Calendar components as tools.
 * The server holds one CalendarContext, so a session created by
 * authenticate_google_calendar is reused by every later call.
 */
export class CalendarMcpServer extends ComponentMcpServer<CalendarContext> {
  constructor(
    registry: ComponentRegistry<CalendarContext> = createCalendarRegistry(),
    context: CalendarContext = {},
  ) {
    super("google-calendar-components", "0.1.0", registry, context);
  }

  public isAuthenticated(): boolean {
    return this.context.session !== undefined;
  }

  public override async start(): Promise<void> {
    await super.start();
    console.error("Google Calendar MCP Server started");
  }
}
