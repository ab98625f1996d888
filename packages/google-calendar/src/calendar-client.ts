import type { calendar_v3 } from "googleapis";
import { RequestError, toRequestError } from "./errors.js";
import type {
  CalendarSession,
  CreateEventParams,
  EventListing,
  EventRef,
  EventSummary,
  ListEventsParams,
  ModifyEventParams,
  MoveEventParams,
  QuickAddEventParams,
  SearchEventsParams,
  UpdateAttendeesParams,
} from "./types.js";

const DEFAULT_CALENDAR_ID = "primary";

export const NO_EVENTS_MESSAGE =
  "No events found for the specified time range.";

export const EVENT_DELETED_STATUS = "Event deleted successfully.";

export function resolveCalendarId(calendarId?: string): string {
  return calendarId || DEFAULT_CALENDAR_ID;
}

/**
 * Run one API call, logging and rethrowing failures as RequestError.
 */
async function request<T>(
  operation: string,
  call: () => Promise<{ data: T }>,
): Promise<T> {
  try {
    const res = await call();
    return res.data;
  } catch (error) {
    const wrapped = toRequestError(operation, error);
    console.error("[Calendar] request error:", wrapped.message);
    throw wrapped;
  }
}

function requireEventId(
  operation: string,
  event: calendar_v3.Schema$Event,
): string {
  if (!event.id) {
    throw new RequestError(operation, "response did not include an event id");
  }
  return event.id;
}

function toAttendees(emails: string[]): calendar_v3.Schema$EventAttendee[] {
  return emails.map((email) => ({ email }));
}

/**
 * Last path segment of a Google Meet URL, e.g. "abc-defg-hij".
 */
export function extractMeetingId(meetUrl: string | undefined): string | null {
  if (!meetUrl) return null;
  const segments = meetUrl.split("/");
  return segments[segments.length - 1];
}

export function toEventSummary(event: calendar_v3.Schema$Event): EventSummary {
  const gmeetLink = event.hangoutLink ?? "";
  return {
    eventName: event.summary ?? "No Title",
    startTime: event.start?.dateTime ?? event.start?.date ?? "",
    endTime: event.end?.dateTime ?? event.end?.date ?? "",
    location: event.location ?? "",
    participants: (event.attendees ?? [])
      .map((a) => a.email)
      .filter((email): email is string => Boolean(email)),
    gmeetLink,
    meetingId: extractMeetingId(gmeetLink),
  };
}

// ── Events ───────────────────────────────────────────────────

export async function listEvents(
  session: CalendarSession,
  params: ListEventsParams,
): Promise<EventListing> {
  const data = await request("events.list", () =>
    session.calendar.events.list({
      calendarId: resolveCalendarId(params.calendarId),
      timeMin: params.timeMin,
      timeMax: params.timeMax,
      singleEvents: true,
    }),
  );

  const items = data.items ?? [];
  if (items.length === 0) {
    return { message: NO_EVENTS_MESSAGE };
  }
  return { events: items.map(toEventSummary) };
}

export async function getEvent(
  session: CalendarSession,
  params: EventRef,
): Promise<calendar_v3.Schema$Event> {
  return request("events.get", () =>
    session.calendar.events.get({
      calendarId: resolveCalendarId(params.calendarId),
      eventId: params.eventId,
    }),
  );
}

export function buildEventBody(
  params: CreateEventParams,
  timeZone: string,
): calendar_v3.Schema$Event {
  const body: calendar_v3.Schema$Event = {
    summary: params.summary,
    start: { dateTime: params.startTime, timeZone },
    end: { dateTime: params.endTime, timeZone },
  };

  if (params.description) {
    body.description = params.description;
  }
  if (params.location) {
    body.location = params.location;
  }
  if (params.participants && params.participants.length > 0) {
    body.attendees = toAttendees(params.participants);
  }
  return body;
}

/**
 * Insert an event and notify attendees per the session's sendUpdates policy.
 * @returns the new event's ID
 */
export async function createEvent(
  session: CalendarSession,
  params: CreateEventParams,
): Promise<string> {
  const created = await request("events.insert", () =>
    session.calendar.events.insert({
      calendarId: resolveCalendarId(params.calendarId),
      requestBody: buildEventBody(params, session.timeZone),
      sendUpdates: session.sendUpdates,
    }),
  );
  return requireEventId("events.insert", created);
}

/**
 * Overwrite only the fields given a non-empty value; everything else keeps
 * the event's current value.
 * @returns the modified event's ID
 */
export async function modifyEvent(
  session: CalendarSession,
  params: ModifyEventParams,
): Promise<string> {
  const calendarId = resolveCalendarId(params.calendarId);
  const current = await getEvent(session, {
    eventId: params.eventId,
    calendarId,
  });
  const event: calendar_v3.Schema$Event = { ...current };

  if (params.newSummary) {
    event.summary = params.newSummary;
  }
  if (params.newDescription) {
    event.description = params.newDescription;
  }
  if (params.newStartTime) {
    event.start = {
      dateTime: params.newStartTime,
      timeZone: session.timeZone,
    };
  }
  if (params.newEndTime) {
    event.end = { dateTime: params.newEndTime, timeZone: session.timeZone };
  }
  if (params.newLocation) {
    event.location = params.newLocation;
  }
  if (params.newParticipants && params.newParticipants.length > 0) {
    event.attendees = toAttendees(params.newParticipants);
  }

  const updated = await request("events.update", () =>
    session.calendar.events.update({
      calendarId,
      eventId: params.eventId,
      requestBody: event,
      sendUpdates: session.sendUpdates,
    }),
  );
  return requireEventId("events.update", updated);
}

export async function deleteEvent(
  session: CalendarSession,
  params: EventRef,
): Promise<{ status: string }> {
  await request("events.delete", () =>
    session.calendar.events.delete({
      calendarId: resolveCalendarId(params.calendarId),
      eventId: params.eventId,
    }),
  );
  return { status: EVENT_DELETED_STATUS };
}

/**
 * Create an event from a natural language description
 * (e.g. "Lunch with Sam tomorrow at noon for 2 hours").
 * @returns the new event's ID, or "" if the response carries none
 */
export async function quickAddEvent(
  session: CalendarSession,
  params: QuickAddEventParams,
): Promise<string> {
  const created = await request("events.quickAdd", () =>
    session.calendar.events.quickAdd({
      calendarId: resolveCalendarId(params.calendarId),
      text: params.text,
    }),
  );
  return created.id ?? "";
}

export async function searchEvents(
  session: CalendarSession,
  params: SearchEventsParams,
): Promise<calendar_v3.Schema$Events> {
  return request("events.list", () =>
    session.calendar.events.list({
      calendarId: resolveCalendarId(params.calendarId),
      q: params.query,
      timeMin: params.timeMin,
      timeMax: params.timeMax,
      singleEvents: true,
    }),
  );
}

export async function moveEvent(
  session: CalendarSession,
  params: MoveEventParams,
): Promise<calendar_v3.Schema$Event> {
  return request("events.move", () =>
    session.calendar.events.move({
      calendarId: params.sourceCalendarId,
      eventId: params.eventId,
      destination: params.destinationCalendarId,
    }),
  );
}

// ── Attendees ────────────────────────────────────────────────

/**
 * Replace the attendee list of an event. Attendees are not notified.
 * @returns the updated event's ID, or "" if the response carries none
 */
export async function updateAttendees(
  session: CalendarSession,
  params: UpdateAttendeesParams,
): Promise<string> {
  const calendarId = resolveCalendarId(params.calendarId);
  const current = await getEvent(session, {
    eventId: params.eventId,
    calendarId,
  });

  const updated = await request("events.update", () =>
    session.calendar.events.update({
      calendarId,
      eventId: params.eventId,
      requestBody: { ...current, attendees: toAttendees(params.attendees) },
    }),
  );
  return updated.id ?? "";
}

// ── Calendars ────────────────────────────────────────────────

export async function listCalendars(
  session: CalendarSession,
): Promise<calendar_v3.Schema$CalendarList> {
  return request("calendarList.list", () =>
    session.calendar.calendarList.list(),
  );
}

export async function getCalendar(
  session: CalendarSession,
  calendarId: string,
): Promise<calendar_v3.Schema$Calendar> {
  return request("calendars.get", () =>
    session.calendar.calendars.get({ calendarId }),
  );
}
