import { describe, it, expect } from "vitest";
import { ComponentInputError } from "@calnodes/component-core";
import {
  getCalendarComponents,
  createCalendarRegistry,
  createEventComponent,
  extractEventFromJsonComponent,
  listCalendarsComponent,
} from "./index.js";
import { AuthenticationError } from "../errors.js";
import type { CalendarContext } from "../types.js";

describe("calendar components", () => {
  const components = getCalendarComponents();

  it("should register every component, authentication first", () => {
    expect(components.map((c) => c.name)).toEqual([
      "authenticate_google_calendar",
      "get_calendar_events",
      "get_event",
      "create_event",
      "modify_event",
      "delete_event",
      "quick_add_event",
      "search_events",
      "move_event",
      "list_calendars",
      "get_calendar_details",
      "update_event_attendees",
      "extract_event_from_json",
    ]);
    expect(createCalendarRegistry().list()).toHaveLength(13);
  });

  describe("required ports", () => {
    const withRequired = components.filter(
      (c) => (c.inputSchema.required ?? []).length > 0,
    );

    it.each(withRequired.map((c) => [c.name, c] as const))(
      "%s rejects a call missing its required ports",
      async (_name, component) => {
        const required = component.inputSchema.required ?? [];

        await expect(component.run({}, {})).rejects.toMatchObject({
          name: "ComponentInputError",
          issues: required.map((port) => `${port}: Required`),
        });
      },
    );

    it("should list create_event's required ports", () => {
      expect(createEventComponent.inputSchema.required).toEqual([
        "summary",
        "startTime",
        "endTime",
      ]);
    });
  });

  it("should require authentication before calling the API", async () => {
    const ctx: CalendarContext = {};

    await expect(listCalendarsComponent.run(ctx, {})).rejects.toThrow(
      new AuthenticationError(
        "Google Calendar is not authenticated. Run authenticate_google_calendar first.",
      ),
    );
  });

  it("should reject mistyped participants before touching the session", async () => {
    await expect(
      createEventComponent.run(
        {},
        {
          summary: "Sync",
          startTime: "2026-03-01T10:00:00Z",
          endTime: "2026-03-01T11:00:00Z",
          participants: "alice@example.com",
        },
      ),
    ).rejects.toBeInstanceOf(ComponentInputError);
  });

  it("should extract a payload without a session", async () => {
    const result = await extractEventFromJsonComponent.run(
      {},
      {
        json: '{"summary": "Retro", "start_time": "2026-03-05T16:00:00Z", "end_time": "2026-03-05T17:00:00Z", "location": "Room D"}',
      },
    );

    expect(result).toEqual({
      summary: "Retro",
      startTime: "2026-03-05T16:00:00Z",
      endTime: "2026-03-05T17:00:00Z",
      location: "Room D",
      participants: [],
      description: "",
    });
  });
});
