import { z } from "zod";
import { defineComponent } from "@calnodes/component-core";
import { authenticate } from "../auth.js";
import type { CalendarContext } from "../types.js";
import { optionalString } from "./ports.js";

export const authenticateComponent = defineComponent({
  name: "authenticate_google_calendar",
  description:
    "Authenticate with Google Calendar using a service account. Reads the key from serviceAccountJson, or from the base64-encoded GOOGLE_SERVICE_ACCOUNT_CREDENTIALS variable when the file does not exist. Must run before any other calendar component.",
  inputSchema: {
    type: "object" as const,
    properties: {
      serviceAccountJson: {
        type: "string",
        description: "Path to the service account JSON key file",
      },
      impersonateUserAccount: {
        type: "string",
        description:
          "Email of the user to impersonate (requires domain-wide delegation)",
      },
    },
  },
  input: z.object({
    serviceAccountJson: optionalString,
    impersonateUserAccount: optionalString,
  }),
  async execute(ctx: CalendarContext, input) {
    const session = await authenticate(input);
    ctx.session = session;
    return {
      authenticated: true,
      clientEmail: session.client.email ?? null,
      subject: session.subject ?? null,
    };
  },
});
