import { z } from "zod";
import { AuthenticationError } from "../errors.js";
import type { CalendarContext, CalendarSession } from "../types.js";

// Unconnected ports may arrive as null; both null and undefined mean "not set".
export const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const optionalEmails = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? undefined);

export const calendarIdPort = {
  type: "string",
  description: 'Calendar ID (default: "primary")',
};

/**
 * Session stored by authenticate_google_calendar earlier in the run.
 * @throws AuthenticationError if the run has not authenticated
 */
export function requireSession(ctx: CalendarContext): CalendarSession {
  if (!ctx.session) {
    throw new AuthenticationError(
      "Google Calendar is not authenticated. Run authenticate_google_calendar first.",
    );
  }
  return ctx.session;
}
