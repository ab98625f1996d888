// Google Calendar components package entry point
export {
  authenticate,
  loadServiceAccountKey,
  createServiceAccountClient,
  createSession,
  CALENDAR_SCOPES,
  type AuthenticateOptions,
  type ServiceAccountKey,
} from "./auth.js";
export {
  listEvents,
  getEvent,
  createEvent,
  modifyEvent,
  deleteEvent,
  quickAddEvent,
  searchEvents,
  moveEvent,
  updateAttendees,
  listCalendars,
  getCalendar,
} from "./calendar-client.js";
export { parseEventPayload } from "./payload.js";
export { AuthenticationError, RequestError, ParseError } from "./errors.js";
export { loadCalendarEnv, type CalendarEnv } from "./env.js";
export {
  getCalendarComponents,
  createCalendarRegistry,
} from "./components/index.js";
export { CalendarMcpServer } from "./server.js";
export type {
  CalendarContext,
  CalendarSession,
  EventDescriptor,
  EventListing,
  EventPayload,
  EventSummary,
  SendUpdates,
} from "./types.js";
