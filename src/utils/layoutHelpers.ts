import { differenceInCalendarDays, isSameDay } from 'date-fns';
import type { Appointment, AgendaViewSettings } from '../types';

/** Row height used for timed appointments when settings leave it at -1 */
export const DEFAULT_APPOINTMENT_ITEM_HEIGHT = 50;

/** Row height used for all-day/spanning appointments when settings leave it at -1 */
export const DEFAULT_ALL_DAY_ITEM_HEIGHT = 25;

/**
 * Check whether two dates fall on the same calendar day (local time)
 * @returns false when either date is missing
 */
export function isSameDate(a: Date | null | undefined, b: Date | null | undefined): boolean {
  if (!a || !b) return false;
  return isSameDay(a, b);
}

/**
 * True when the appointment crosses a day boundary, or is flagged as spanning
 */
export function isSpannedAppointment(appointment: Appointment): boolean {
  return !isSameDay(appointment.startTime, appointment.endTime) || appointment.isSpanned === true;
}

/**
 * True for a recurring series occurrence (non-empty rule)
 */
export function isRecurringAppointment(appointment: Appointment): boolean {
  return typeof appointment.recurrenceRule === 'string' && appointment.recurrenceRule.length > 0;
}

/**
 * True for an occurrence changed from its series
 */
export function isRecurrenceException(appointment: Appointment): boolean {
  return appointment.recurrenceId !== undefined && appointment.recurrenceId !== null;
}

/**
 * Ordering used by the agenda: start time, then timed before all-day,
 * then non-spanning before spanning
 */
export function compareAppointments(a: Appointment, b: Appointment): number {
  const byStart = a.startTime.getTime() - b.startTime.getTime();
  if (byStart !== 0) return byStart;

  const byAllDay = Number(a.isAllDay === true) - Number(b.isAllDay === true);
  if (byAllDay !== 0) return byAllDay;

  return Number(isSpannedAppointment(a)) - Number(isSpannedAppointment(b));
}

/**
 * Sort a copy of the appointments for display.
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export function sortAppointments(appointments: readonly Appointment[]): Appointment[] {
  return [...appointments].sort(compareAppointments);
}

/**
 * Day position of a spanning appointment relative to the displayed date
 * @returns 1-based current day and total number of days covered
 */
export function getSpanDayInfo(appointment: Appointment, date: Date): { current: number; total: number } {
  const total = differenceInCalendarDays(appointment.endTime, appointment.startTime) + 1;
  const current = differenceInCalendarDays(date, appointment.startTime) + 1;
  return { current, total };
}

/**
 * Resolve row heights, replacing -1 (or missing) with the defaults
 */
export function resolveItemHeights(settings: AgendaViewSettings = {}): {
  appointmentItemHeight: number;
  allDayItemHeight: number;
} {
  const timed = settings.appointmentItemHeight ?? -1;
  const allDay = settings.allDayItemHeight ?? -1;
  return {
    appointmentItemHeight: timed === -1 ? DEFAULT_APPOINTMENT_ITEM_HEIGHT : timed,
    allDayItemHeight: allDay === -1 ? DEFAULT_ALL_DAY_ITEM_HEIGHT : allDay,
  };
}
