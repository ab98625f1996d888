import { z } from "zod";

const envSchema = z.object({
  // Credentials (file path, or base64-encoded key JSON as fallback)
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().optional(),
  GOOGLE_SERVICE_ACCOUNT_CREDENTIALS: z.string().optional(),

  // Domain-wide delegation
  GOOGLE_IMPERSONATE_USER: z.string().email().optional(),

  // Event defaults
  GOOGLE_CALENDAR_TIMEZONE: z.string().min(1).default("UTC"),
  GOOGLE_CALENDAR_SEND_UPDATES: z
    .enum(["all", "externalOnly", "none"])
    .default("all"),
});

export type CalendarEnv = z.infer<typeof envSchema>;

/**
 * Read calendar settings from the environment. Empty values count as unset.
 */
export function loadCalendarEnv(
  source: NodeJS.ProcessEnv = process.env,
): CalendarEnv {
  const present = Object.fromEntries(
    Object.entries(source).filter(
      ([, value]) => value !== undefined && value !== "",
    ),
  );
  return envSchema.parse(present);
}
