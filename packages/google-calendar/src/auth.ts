import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { google } from "googleapis";
import { z, ZodError } from "zod";
import { loadCalendarEnv, type CalendarEnv } from "./env.js";
import { AuthenticationError } from "./errors.js";
import type {
  CalendarSession,
  SendUpdates,
  ServiceAccountClient,
} from "./types.js";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar"];

const serviceAccountKeySchema = z
  .object({
    client_email: z.string().email(),
    private_key: z.string().min(1),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

export interface AuthenticateOptions {
  /** Path to a service account key file */
  serviceAccountJson?: string;
  /** Email of the user to act as (domain-wide delegation) */
  impersonateUserAccount?: string;
  env?: CalendarEnv;
}

function parseKey(raw: string, source: string): ServiceAccountKey {
  try {
    return serviceAccountKeySchema.parse(JSON.parse(raw));
  } catch (error) {
    const reason =
      error instanceof ZodError
        ? `missing or invalid ${error.issues
            .map((i) => i.path.join(".") || "key object")
            .join(", ")}`
        : "not valid JSON";
    throw new AuthenticationError(
      `Service account key from ${source} is ${reason}`,
      { cause: error },
    );
  }
}

/**
 * Load a service account key from a file, falling back to the base64-encoded
 * GOOGLE_SERVICE_ACCOUNT_CREDENTIALS variable when the file does not exist.
 */
export async function loadServiceAccountKey(
  keyFile: string | undefined,
  env: CalendarEnv,
): Promise<ServiceAccountKey> {
  const path = keyFile || env.GOOGLE_SERVICE_ACCOUNT_FILE;

  if (path && existsSync(path)) {
    console.error(
      `[Calendar Auth] Using provided service account JSON: ${path}`,
    );
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(
        `Cannot read service account key ${path}: ${message}`,
        { cause: error },
      );
    }
    return parseKey(raw, path);
  }

  const encoded = env.GOOGLE_SERVICE_ACCOUNT_CREDENTIALS;
  if (!encoded) {
    throw new AuthenticationError(
      "Neither a valid file path nor GOOGLE_SERVICE_ACCOUNT_CREDENTIALS environment variable was found.",
    );
  }

  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  return parseKey(decoded, "GOOGLE_SERVICE_ACCOUNT_CREDENTIALS");
}

export function createServiceAccountClient(
  key: ServiceAccountKey,
  subject?: string,
): ServiceAccountClient {
  return new google.auth.JWT({
    email: key.client_email,
    key: key.private_key,
    scopes: CALENDAR_SCOPES,
    subject,
  });
}

export function createSession(
  client: ServiceAccountClient,
  options: {
    subject?: string;
    timeZone?: string;
    sendUpdates?: SendUpdates;
  } = {},
): CalendarSession {
  return {
    calendar: google.calendar({ version: "v3", auth: client }),
    client,
    scopes: CALENDAR_SCOPES,
    subject: options.subject,
    timeZone: options.timeZone ?? "UTC",
    sendUpdates: options.sendUpdates ?? "all",
  };
}

/**
 * Build an authorized Google Calendar session from service account credentials.
 * @throws AuthenticationError if no usable key is found or Google rejects it
 */
export async function authenticate(
  options: AuthenticateOptions = {},
): Promise<CalendarSession> {
  let env: CalendarEnv;
  try {
    // Explicit inputs replace their environment counterparts before validation
    env =
      options.env ??
      loadCalendarEnv({
        ...process.env,
        ...(options.impersonateUserAccount
          ? { GOOGLE_IMPERSONATE_USER: options.impersonateUserAccount }
          : {}),
      });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AuthenticationError(
      `Invalid calendar configuration: ${message}`,
      { cause: error },
    );
  }

  const key = await loadServiceAccountKey(options.serviceAccountJson, env);
  const subject = options.impersonateUserAccount || env.GOOGLE_IMPERSONATE_USER;
  const client = createServiceAccountClient(key, subject);

  try {
    await client.authorize();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[Calendar Auth] authorize error:", message);
    throw new AuthenticationError(
      `Google rejected the service account credentials: ${message}`,
      { cause: error },
    );
  }

  console.error(
    "[Calendar Auth] Google Calendar authentication completed successfully.",
  );
  return createSession(client, {
    subject,
    timeZone: env.GOOGLE_CALENDAR_TIMEZONE,
    sendUpdates: env.GOOGLE_CALENDAR_SEND_UPDATES,
  });
}
