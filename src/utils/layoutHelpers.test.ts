import { describe, expect, it } from 'vitest';
import type { Appointment } from '../types';
import {
  compareAppointments,
  getSpanDayInfo,
  isRecurrenceException,
  isRecurringAppointment,
  isSameDate,
  isSpannedAppointment,
  resolveItemHeights,
} from './layoutHelpers';

const at = (day: number, hour: number) => new Date(2024, 2, day, hour);
const base: Appointment = { subject: 'Item', startTime: at(15, 9), endTime: at(15, 10) };

describe('layoutHelpers', () => {
  it('isSameDate compares calendar days and rejects missing dates', () => {
    expect(isSameDate(at(15, 1), at(15, 23))).toBe(true);
    expect(isSameDate(at(15, 1), at(16, 1))).toBe(false);
    expect(isSameDate(null, at(15, 1))).toBe(false);
  });

  it('isSpannedAppointment looks at end date and flag', () => {
    expect(isSpannedAppointment(base)).toBe(false);
    expect(isSpannedAppointment({ ...base, endTime: at(16, 1) })).toBe(true);
    expect(isSpannedAppointment({ ...base, isSpanned: true })).toBe(true);
  });

  it('recognises recurring series and changed occurrences', () => {
    expect(isRecurringAppointment({ ...base, recurrenceRule: 'FREQ=WEEKLY' })).toBe(true);
    expect(isRecurringAppointment({ ...base, recurrenceRule: '' })).toBe(false);
    expect(isRecurrenceException({ ...base, recurrenceId: 0 })).toBe(true);
    expect(isRecurrenceException({ ...base, recurrenceId: null })).toBe(false);
  });

  it('compareAppointments orders by start first', () => {
    const earlyAllDay: Appointment = { ...base, startTime: at(15, 8), isAllDay: true };
    expect(compareAppointments(earlyAllDay, base)).toBeLessThan(0);
    expect(compareAppointments({ ...base, isAllDay: true }, base)).toBeGreaterThan(0);
  });

  it('getSpanDayInfo counts calendar days', () => {
    const trip: Appointment = { subject: 'Trip', startTime: at(14, 22), endTime: at(17, 2) };
    expect(getSpanDayInfo(trip, at(16, 0))).toEqual({ current: 3, total: 4 });
  });

  it('resolveItemHeights replaces -1 and missing values with defaults', () => {
    expect(resolveItemHeights()).toEqual({ appointmentItemHeight: 50, allDayItemHeight: 25 });
    expect(resolveItemHeights({ appointmentItemHeight: -1, allDayItemHeight: 30 }))
      .toEqual({ appointmentItemHeight: 50, allDayItemHeight: 30 });
  });
});
