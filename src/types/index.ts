/**
 * An appointment shown in the agenda.
 * Consumed read-only: the agenda never mutates appointments or the list holding them.
 */
export interface Appointment {
  /** Optional application identifier, only used for callbacks and descriptions */
  id?: string;

  subject: string;

  /**
   * Start of the appointment
   */
  startTime: Date;

  /**
   * End of the appointment
   * Must not be before startTime
   */
  endTime: Date;

  /** Occupies the whole day, no specific time of day */
  isAllDay?: boolean;

  /**
   * Explicitly marks the appointment as crossing a day boundary.
   * Appointments whose end date differs from their start date are treated as spanning regardless.
   */
  isSpanned?: boolean;

  /** Recurrence rule (e.g. "FREQ=DAILY;COUNT=5"); a non-empty rule marks a recurring series */
  recurrenceRule?: string | null;

  /** Set on an occurrence that was changed from its recurring series */
  recurrenceId?: string | number | null;

  /**
   * Background color of the appointment row, any CSS color string.
   * Default: theme appointment color
   */
  color?: string;

  notes?: string;

  location?: string;

  /**
   * Optional metadata for application use
   */
  metadata?: Record<string, unknown>;
}

/**
 * Text direction reported on accessibility nodes
 */
export enum TextDirection {
  LeftToRight = 'ltr',
  RightToLeft = 'rtl'
}

/**
 * Formats a date with a date-fns style pattern for a locale code (e.g. "en", "vi-VN")
 */
export type DateFormatter = (date: Date, pattern: string, locale: string) => string;

/**
 * Item height settings for agenda rows.
 * A value of -1 selects the built-in default.
 */
export interface AgendaViewSettings {
  /**
   * Height of timed appointment rows
   * Default: -1 (50px)
   */
  appointmentItemHeight?: number;

  /**
   * Height of all-day and spanning appointment rows
   * Default: -1 (25px)
   */
  allDayItemHeight?: number;
}

/**
 * Translation keys for component text strings
 */
export enum TranslationKey {
  /** Shown when no date is selected */
  noSelectedDate = 'noSelectedDate',
  /** Shown when the selected date has no appointments */
  noEvents = 'noEvents',
  /** Word used in the "(Day 2 / 3)" suffix of spanning appointments */
  daySpanCount = 'daySpanCount'
}

/**
 * Localized strings used by the agenda
 */
export type AgendaLocalizations = Record<TranslationKey, string>;

/**
 * Validation error details
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}
