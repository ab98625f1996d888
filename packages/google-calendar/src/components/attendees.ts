import { z } from "zod";
import { defineComponent } from "@calnodes/component-core";
import * as calendarClient from "../calendar-client.js";
import type { CalendarContext } from "../types.js";
import { calendarIdPort, optionalString, requireSession } from "./ports.js";

export const updateEventAttendeesComponent = defineComponent({
  name: "update_event_attendees",
  description:
    "Replace the attendee list of an event. Attendees are not notified.",
  inputSchema: {
    type: "object" as const,
    properties: {
      eventId: {
        type: "string",
        description: "The ID of the event to update",
      },
      attendees: {
        type: "array",
        items: { type: "string" },
        description: "Attendee email addresses to set on the event",
      },
      calendarId: calendarIdPort,
    },
    required: ["eventId", "attendees"],
  },
  input: z.object({
    eventId: z.string(),
    attendees: z.array(z.string()),
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const updatedEventId = await calendarClient.updateAttendees(
      requireSession(ctx),
      input,
    );
    return { updatedEventId };
  },
});
