import type { Appointment, ValidationError } from '../types';
import type { AgendaProps } from '../AgendaView';
import type { Result } from '../types/internal';
import { fail, ok } from '../types/internal';

/**
 * Check that a value is a Date holding a real time value
 */
export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Validate a single appointment object
 */
export function validateAppointment(appointment: unknown): Result<void, ValidationError[]> {
  const errors: ValidationError[] = [];

  if (typeof appointment !== 'object' || appointment === null) {
    return fail([{ field: 'appointment', message: 'Appointment must be an object' }]);
  }

  const a = appointment as Partial<Appointment>;

  if (typeof a.subject !== 'string') {
    errors.push({
      field: 'subject',
      message: 'subject must be a string',
      value: a.subject
    });
  }

  if (!isValidDate(a.startTime)) {
    errors.push({
      field: 'startTime',
      message: 'startTime must be a valid Date',
      value: a.startTime
    });
  }

  if (!isValidDate(a.endTime)) {
    errors.push({
      field: 'endTime',
      message: 'endTime must be a valid Date',
      value: a.endTime
    });
  }

  // Validate time order (only if both are valid)
  if (isValidDate(a.startTime) && isValidDate(a.endTime) && a.endTime.getTime() < a.startTime.getTime()) {
    errors.push({
      field: 'endTime',
      message: 'endTime must not be before startTime',
      value: { startTime: a.startTime.toISOString(), endTime: a.endTime.toISOString() }
    });
  }

  if (a.color !== undefined && typeof a.color !== 'string') {
    errors.push({
      field: 'color',
      message: 'color must be a CSS color string',
      value: a.color
    });
  }

  if (errors.length > 0) {
    return fail(errors);
  }

  return ok(undefined);
}

/**
 * Validate every appointment of a list, prefixing fields with their index.
 * Null and undefined entries are allowed: the layout skips them.
 */
export function validateAppointments(
  appointments: ReadonlyArray<Appointment | null | undefined> | null | undefined
): Result<void, ValidationError[]> {
  if (appointments === null || appointments === undefined) {
    return ok(undefined);
  }

  if (!Array.isArray(appointments)) {
    return fail([{ field: 'appointments', message: 'appointments must be an array or null', value: appointments }]);
  }

  const errors: ValidationError[] = [];
  appointments.forEach((appointment, index) => {
    if (appointment === null || appointment === undefined) return;
    const result = validateAppointment(appointment);
    if (!result.success) {
      result.error.forEach(err => {
        errors.push({ ...err, field: `appointments[${index}].${err.field}` });
      });
    }
  });

  return errors.length > 0 ? fail(errors) : ok(undefined);
}

/**
 * Validate component props (only the fields present are checked)
 */
export function validateProps(props: Partial<AgendaProps>): Result<void, ValidationError[]> {
  const errors: ValidationError[] = [];

  // Present but undefined: these have no default to fall back on
  for (const field of ['width', 'height', 'selectedDate'] as const) {
    if (field in props && props[field] === undefined) {
      errors.push({
        field,
        message: `${field} must not be undefined`,
      });
    }
  }

  for (const field of ['width', 'height', 'timeLabelWidth'] as const) {
    const value = props[field];
    if (value !== undefined && !isNonNegativeNumber(value)) {
      errors.push({
        field,
        message: `${field} must be a finite number >= 0`,
        value
      });
    }
  }

  if (props.textScaleFactor !== undefined) {
    if (typeof props.textScaleFactor !== 'number' || !Number.isFinite(props.textScaleFactor) || props.textScaleFactor <= 0) {
      errors.push({
        field: 'textScaleFactor',
        message: 'textScaleFactor must be a positive number',
        value: props.textScaleFactor
      });
    }
  }

  if (props.selectedDate !== undefined && props.selectedDate !== null && !isValidDate(props.selectedDate)) {
    errors.push({
      field: 'selectedDate',
      message: 'selectedDate must be a valid Date or null',
      value: props.selectedDate
    });
  }

  const settings = props.viewSettings;
  if (settings) {
    for (const field of ['appointmentItemHeight', 'allDayItemHeight'] as const) {
      const value = settings[field];
      if (value !== undefined && value !== -1 && !(isNonNegativeNumber(value) && value > 0)) {
        errors.push({
          field: `viewSettings.${field}`,
          message: `${field} must be a positive number or -1 for the default`,
          value
        });
      }
    }
  }

  if (props.locale !== undefined && (typeof props.locale !== 'string' || props.locale.length === 0)) {
    errors.push({
      field: 'locale',
      message: 'locale must be a non-empty string',
      value: props.locale
    });
  }

  if (props.appointments !== undefined) {
    const appointmentsResult = validateAppointments(props.appointments);
    if (!appointmentsResult.success) {
      errors.push(...appointmentsResult.error);
    }
  }

  return errors.length > 0 ? fail(errors) : ok(undefined);
}
