import { z } from "zod";
import { defineComponent } from "@calnodes/component-core";
import { parseEventPayload } from "../payload.js";
import type { CalendarContext } from "../types.js";

export const extractEventFromJsonComponent = defineComponent({
  name: "extract_event_from_json",
  description:
    "Extract event fields (summary, start_time, end_time, location, participants, description) from a JSON string. Does not need authentication.",
  inputSchema: {
    type: "object" as const,
    properties: {
      json: {
        type: "string",
        description: "JSON string describing the event",
      },
    },
    required: ["json"],
  },
  input: z.object({ json: z.string() }),
  async execute(_ctx: CalendarContext, { json }) {
    return parseEventPayload(json);
  },
});
