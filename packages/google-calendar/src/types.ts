import type { calendar_v3, google } from "googleapis";

export type ServiceAccountClient = InstanceType<typeof google.auth.JWT>;

export type SendUpdates = "all" | "externalOnly" | "none";

export interface CalendarSession {
  calendar: calendar_v3.Calendar;
  client: ServiceAccountClient;
  scopes: string[];
  /** Impersonated user, when domain-wide delegation is in use */
  subject?: string;
  /** Time zone written alongside event start/end timestamps */
  timeZone: string;
  sendUpdates: SendUpdates;
}

/**
 * Per-run state the host threads through every component call.
 */
export interface CalendarContext {
  session?: CalendarSession;
}

export interface EventDescriptor {
  summary: string;
  description?: string;
  startTime: string;
  endTime: string;
  location?: string;
  participants?: string[];
}

export interface EventSummary {
  eventName: string;
  startTime: string;
  endTime: string;
  location: string;
  participants: string[];
  gmeetLink: string;
  meetingId: string | null;
}

export type EventListing =
  | { events: EventSummary[] }
  | { message: string };

export interface ListEventsParams {
  calendarId?: string;
  timeMin: string;
  timeMax: string;
}

export interface SearchEventsParams extends ListEventsParams {
  query: string;
}

export interface EventRef {
  eventId: string;
  calendarId?: string;
}

export interface CreateEventParams extends EventDescriptor {
  calendarId?: string;
}

export interface ModifyEventParams extends EventRef {
  newSummary?: string;
  newDescription?: string;
  newStartTime?: string;
  newEndTime?: string;
  newLocation?: string;
  newParticipants?: string[];
}

export interface QuickAddEventParams {
  text: string;
  calendarId?: string;
}

export interface MoveEventParams {
  eventId: string;
  sourceCalendarId: string;
  destinationCalendarId: string;
}

export interface UpdateAttendeesParams extends EventRef {
  attendees: string[];
}

/**
 * Event fields extracted from a JSON payload.
 */
export interface EventPayload {
  summary: string;
  startTime: string;
  endTime: string;
  location: string;
  participants: string[];
  description: string;
}
