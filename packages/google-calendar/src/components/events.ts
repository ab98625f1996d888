import { z } from "zod";
import { defineComponent } from "@calnodes/component-core";
import * as calendarClient from "../calendar-client.js";
import type { CalendarContext } from "../types.js";
import {
  calendarIdPort,
  optionalEmails,
  optionalString,
  requireSession,
} from "./ports.js";

export const getCalendarEventsComponent = defineComponent({
  name: "get_calendar_events",
  description:
    "Fetch events from a calendar within a time range. Returns { events: [...] } with name, times, location, participants and Meet link per event, or { message } when the range is empty.",
  inputSchema: {
    type: "object" as const,
    properties: {
      calendarId: calendarIdPort,
      startTime: {
        type: "string",
        description: "Start of the range in ISO 8601 format",
      },
      endTime: {
        type: "string",
        description: "End of the range in ISO 8601 format",
      },
    },
    required: ["startTime", "endTime"],
  },
  input: z.object({
    calendarId: optionalString,
    startTime: z.string(),
    endTime: z.string(),
  }),
  async execute(ctx: CalendarContext, input) {
    const events = await calendarClient.listEvents(requireSession(ctx), {
      calendarId: input.calendarId,
      timeMin: input.startTime,
      timeMax: input.endTime,
    });
    return { events };
  },
});

export const getEventComponent = defineComponent({
  name: "get_event",
  description: "Get a single event by its ID.",
  inputSchema: {
    type: "object" as const,
    properties: {
      eventId: { type: "string", description: "The ID of the event" },
      calendarId: calendarIdPort,
    },
    required: ["eventId"],
  },
  input: z.object({
    eventId: z.string(),
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const event = await calendarClient.getEvent(requireSession(ctx), input);
    return { event };
  },
});

export const createEventComponent = defineComponent({
  name: "create_event",
  description:
    "Create a new event. Times are ISO 8601 date-times; attendees are notified.",
  inputSchema: {
    type: "object" as const,
    properties: {
      summary: { type: "string", description: "Event title" },
      description: { type: "string", description: "Event description" },
      startTime: {
        type: "string",
        description: "Start date/time in ISO 8601 format",
      },
      endTime: {
        type: "string",
        description: "End date/time in ISO 8601 format",
      },
      location: { type: "string", description: "Event location" },
      participants: {
        type: "array",
        items: { type: "string" },
        description: "List of participant email addresses",
      },
      calendarId: calendarIdPort,
    },
    required: ["summary", "startTime", "endTime"],
  },
  input: z.object({
    summary: z.string(),
    description: optionalString,
    startTime: z.string(),
    endTime: z.string(),
    location: optionalString,
    participants: optionalEmails,
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const eventId = await calendarClient.createEvent(requireSession(ctx), input);
    return { eventId };
  },
});

export const modifyEventComponent = defineComponent({
  name: "modify_event",
  description:
    "Modify an existing event. Only fields given a new value are changed; attendees are notified.",
  inputSchema: {
    type: "object" as const,
    properties: {
      eventId: {
        type: "string",
        description: "The ID of the event to modify",
      },
      newSummary: { type: "string", description: "New event title" },
      newDescription: {
        type: "string",
        description: "New event description",
      },
      newStartTime: {
        type: "string",
        description: "New start date/time in ISO 8601 format",
      },
      newEndTime: {
        type: "string",
        description: "New end date/time in ISO 8601 format",
      },
      newLocation: { type: "string", description: "New event location" },
      newParticipants: {
        type: "array",
        items: { type: "string" },
        description: "New list of participant email addresses",
      },
      calendarId: calendarIdPort,
    },
    required: ["eventId"],
  },
  input: z.object({
    eventId: z.string(),
    newSummary: optionalString,
    newDescription: optionalString,
    newStartTime: optionalString,
    newEndTime: optionalString,
    newLocation: optionalString,
    newParticipants: optionalEmails,
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const modifiedEventId = await calendarClient.modifyEvent(
      requireSession(ctx),
      input,
    );
    return { modifiedEventId };
  },
});

export const deleteEventComponent = defineComponent({
  name: "delete_event",
  description: "Delete an event by its ID.",
  inputSchema: {
    type: "object" as const,
    properties: {
      eventId: {
        type: "string",
        description: "The ID of the event to delete",
      },
      calendarId: calendarIdPort,
    },
    required: ["eventId"],
  },
  input: z.object({
    eventId: z.string(),
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const deletionStatus = await calendarClient.deleteEvent(
      requireSession(ctx),
      input,
    );
    return { deletionStatus };
  },
});

export const quickAddEventComponent = defineComponent({
  name: "quick_add_event",
  description:
    'Create an event from a natural language description, e.g. "Lunch with Sam tomorrow at noon for 2 hours". Without a time, the event starts now with the calendar\'s default duration.',
  inputSchema: {
    type: "object" as const,
    properties: {
      query: {
        type: "string",
        description: "Natural language description of the event",
      },
      calendarId: calendarIdPort,
    },
    required: ["query"],
  },
  input: z.object({
    query: z.string(),
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const eventId = await calendarClient.quickAddEvent(requireSession(ctx), {
      text: input.query,
      calendarId: input.calendarId,
    });
    return { eventId };
  },
});

export const searchEventsComponent = defineComponent({
  name: "search_events",
  description:
    "Search events matching a free text query within a time range. Returns the raw event list.",
  inputSchema: {
    type: "object" as const,
    properties: {
      query: { type: "string", description: "Free text search query" },
      timeMin: {
        type: "string",
        description: "Start of the range in ISO 8601 format",
      },
      timeMax: {
        type: "string",
        description: "End of the range in ISO 8601 format",
      },
      calendarId: calendarIdPort,
    },
    required: ["query", "timeMin", "timeMax"],
  },
  input: z.object({
    query: z.string(),
    timeMin: z.string(),
    timeMax: z.string(),
    calendarId: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const events = await calendarClient.searchEvents(requireSession(ctx), input);
    return { events };
  },
});

export const moveEventComponent = defineComponent({
  name: "move_event",
  description: "Move an event from one calendar to another.",
  inputSchema: {
    type: "object" as const,
    properties: {
      eventId: { type: "string", description: "The ID of the event to move" },
      sourceCalendarId: {
        type: "string",
        description: "Calendar the event currently belongs to",
      },
      destinationCalendarId: {
        type: "string",
        description: "Calendar to move the event to",
      },
    },
    required: ["eventId", "sourceCalendarId", "destinationCalendarId"],
  },
  input: z.object({
    eventId: z.string(),
    sourceCalendarId: z.string(),
    destinationCalendarId: z.string(),
  }),
  async execute(ctx: CalendarContext, input) {
    const movedEvent = await calendarClient.moveEvent(
      requireSession(ctx),
      input,
    );
    return { movedEvent };
  },
});
