import { ComponentRegistry, type Component } from "@calnodes/component-core";
import type { CalendarContext } from "../types.js";
import { authenticateComponent } from "./auth.js";
import {
  getCalendarEventsComponent,
  getEventComponent,
  createEventComponent,
  modifyEventComponent,
  deleteEventComponent,
  quickAddEventComponent,
  searchEventsComponent,
  moveEventComponent,
} from "./events.js";
import {
  listCalendarsComponent,
  getCalendarDetailsComponent,
} from "./calendars.js";
import { updateEventAttendeesComponent } from "./attendees.js";
import { extractEventFromJsonComponent } from "./payload.js";

export {
  authenticateComponent,
  getCalendarEventsComponent,
  getEventComponent,
  createEventComponent,
  modifyEventComponent,
  deleteEventComponent,
  quickAddEventComponent,
  searchEventsComponent,
  moveEventComponent,
  listCalendarsComponent,
  getCalendarDetailsComponent,
  updateEventAttendeesComponent,
  extractEventFromJsonComponent,
};

/**
 * All Google Calendar components, authentication first.
 */
export function getCalendarComponents(): Component<CalendarContext>[] {
  return [
    authenticateComponent,
    getCalendarEventsComponent,
    getEventComponent,
    createEventComponent,
    modifyEventComponent,
    deleteEventComponent,
    quickAddEventComponent,
    searchEventsComponent,
    moveEventComponent,
    listCalendarsComponent,
    getCalendarDetailsComponent,
    updateEventAttendeesComponent,
    extractEventFromJsonComponent,
  ];
}

export function createCalendarRegistry(): ComponentRegistry<CalendarContext> {
  return new ComponentRegistry(getCalendarComponents());
}
