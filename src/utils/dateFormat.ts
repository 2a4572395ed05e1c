import { format } from 'date-fns';
import type { Locale } from 'date-fns';
import { enUS, vi } from 'date-fns/locale';
import type { Appointment, DateFormatter } from '../types';
import { isSameDate } from './layoutHelpers';

/** Time range pattern when start and end fall on the same day */
export const SAME_DAY_TIME_FORMAT = 'hh:mm a';

/** Time range pattern when the appointment ends on another day */
export const CROSS_DAY_TIME_FORMAT = 'MMM dd, hh:mm a';

const DATE_LOCALES: Record<string, Locale> = {
  en: enUS,
  vi,
};

/**
 * Language part of a locale code: "en-US" and "en_US" => "en"
 */
export function getLanguageCode(locale: string): string {
  return locale.split(/[-_]/)[0].toLowerCase();
}

/**
 * date-fns locale for a locale code, English when unknown
 */
export function resolveDateLocale(locale: string): Locale {
  return DATE_LOCALES[getLanguageCode(locale)] ?? enUS;
}

/**
 * Default formatter, date-fns patterns
 */
export const formatDate: DateFormatter = (date, pattern, locale) =>
  format(date, pattern, { locale: resolveDateLocale(locale) });

/**
 * "start - end" line shown under a timed appointment's subject
 * @param customFormat - Pattern overriding the same-day/cross-day defaults
 */
export function formatTimeRange(
  appointment: Appointment,
  locale: string,
  formatter: DateFormatter = formatDate,
  customFormat?: string | null
): string {
  const pattern = customFormat
    || (isSameDate(appointment.startTime, appointment.endTime) ? SAME_DAY_TIME_FORMAT : CROSS_DAY_TIME_FORMAT);
  return `${formatter(appointment.startTime, pattern, locale)} - ${formatter(appointment.endTime, pattern, locale)}`;
}
