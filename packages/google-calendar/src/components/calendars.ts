import { z } from "zod";
import { defineComponent } from "@calnodes/component-core";
import * as calendarClient from "../calendar-client.js";
import type { CalendarContext } from "../types.js";
import { requireSession } from "./ports.js";

export const listCalendarsComponent = defineComponent({
  name: "list_calendars",
  description:
    "List every calendar the authenticated account can access. Returns the raw calendar list with entries under items.",
  inputSchema: {
    type: "object" as const,
    properties: {},
  },
  input: z.object({}),
  async execute(ctx: CalendarContext) {
    const calendars = await calendarClient.listCalendars(requireSession(ctx));
    return { calendars };
  },
});

export const getCalendarDetailsComponent = defineComponent({
  name: "get_calendar_details",
  description: "Get the metadata of a calendar.",
  inputSchema: {
    type: "object" as const,
    properties: {
      calendarId: {
        type: "string",
        description: "The ID of the calendar",
      },
    },
    required: ["calendarId"],
  },
  input: z.object({ calendarId: z.string() }),
  async execute(ctx: CalendarContext, { calendarId }) {
    const details = await calendarClient.getCalendar(
      requireSession(ctx),
      calendarId,
    );
    return { details };
  },
});
