import { describe, it, expect } from "vitest";
import { loadCalendarEnv } from "./env.js";

describe("loadCalendarEnv", () => {
  it("should apply defaults and drop unrelated variables", () => {
    expect(loadCalendarEnv({ PATH: "/usr/bin" })).toEqual({
      GOOGLE_CALENDAR_TIMEZONE: "UTC",
      GOOGLE_CALENDAR_SEND_UPDATES: "all",
    });
  });

  it("should read every calendar setting", () => {
    expect(
      loadCalendarEnv({
        GOOGLE_SERVICE_ACCOUNT_FILE: "/etc/calendar/key.json",
        GOOGLE_SERVICE_ACCOUNT_CREDENTIALS: "e30=",
        GOOGLE_IMPERSONATE_USER: "user@example.com",
        GOOGLE_CALENDAR_TIMEZONE: "Europe/Berlin",
        GOOGLE_CALENDAR_SEND_UPDATES: "none",
      }),
    ).toEqual({
      GOOGLE_SERVICE_ACCOUNT_FILE: "/etc/calendar/key.json",
      GOOGLE_SERVICE_ACCOUNT_CREDENTIALS: "e30=",
      GOOGLE_IMPERSONATE_USER: "user@example.com",
      GOOGLE_CALENDAR_TIMEZONE: "Europe/Berlin",
      GOOGLE_CALENDAR_SEND_UPDATES: "none",
    });
  });

  it("should treat empty values as unset", () => {
    const env = loadCalendarEnv({
      GOOGLE_IMPERSONATE_USER: "",
      GOOGLE_CALENDAR_TIMEZONE: "",
    });

    expect(env.GOOGLE_IMPERSONATE_USER).toBeUndefined();
    expect(env.GOOGLE_CALENDAR_TIMEZONE).toBe("UTC");
  });

  it("should reject an invalid impersonation email", () => {
    expect(() =>
      loadCalendarEnv({ GOOGLE_IMPERSONATE_USER: "not-an-email" }),
    ).toThrow();
  });

  it("should reject an unknown sendUpdates policy", () => {
    expect(() =>
      loadCalendarEnv({ GOOGLE_CALENDAR_SEND_UPDATES: "sometimes" }),
    ).toThrow();
  });
});
