import { z } from "zod";
import { ParseError } from "./errors.js";
import type { EventPayload } from "./types.js";

const payloadSchema = z.object({
  summary: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  location: z.string().optional(),
  description: z.string().optional(),
  participants: z.array(z.string()).optional(),
});

/**
 * Extract event fields from a JSON string such as
 * `{"summary": "...", "start_time": "...", "end_time": "...", "participants": [...]}`.
 * @throws ParseError on malformed JSON or a missing/mistyped required field
 */
export function parseEventPayload(json: string): EventPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Event payload is not valid JSON: ${message}`, {
      cause: error,
    });
  }

  const parsed = payloadSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => issue.path.join(".") || "payload")
      .join(", ");
    throw new ParseError(`Event payload has missing or invalid fields: ${fields}`, {
      cause: parsed.error,
    });
  }

  const data = parsed.data;
  return {
    summary: data.summary,
    startTime: data.start_time,
    endTime: data.end_time,
    location: data.location ?? "",
    participants: data.participants ?? [],
    description: data.description ?? "",
  };
}
