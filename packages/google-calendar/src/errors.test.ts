import { describe, it, expect } from "vitest";
import { RequestError, toRequestError } from "./errors.js";

describe("toRequestError", () => {
  it("should take the status from the HTTP response", () => {
    const cause = Object.assign(new Error("Requested entity was not found."), {
      response: { status: 404 },
    });

    const error = toRequestError("events.get", cause);

    expect(error.name).toBe("RequestError");
    expect(error.message).toBe(
      "events.get failed: Requested entity was not found.",
    );
    expect(error.status).toBe(404);
    expect(error.cause).toBe(cause);
  });

  it("should fall back to a numeric error code", () => {
    const error = toRequestError(
      "events.insert",
      Object.assign(new Error("Forbidden"), { code: 403 }),
    );

    expect(error.status).toBe(403);
  });

  it("should leave status unset for network errors", () => {
    const error = toRequestError(
      "events.list",
      Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }),
    );

    expect(error.status).toBeUndefined();
    expect(error.message).toBe("events.list failed: socket hang up");
  });

  it("should stringify non-Error values", () => {
    expect(toRequestError("calendars.get", "boom").message).toBe(
      "calendars.get failed: boom",
    );
  });

  it("should not wrap a RequestError twice", () => {
    const original = new RequestError("events.move", "conflict", 409);

    expect(toRequestError("events.move", original)).toBe(original);
  });
});
