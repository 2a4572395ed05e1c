import type { AgendaProps } from '../AgendaView';

/**
 * Work an update requires
 */
export enum AgendaUpdate {
  None = 'none',
  Repaint = 'repaint',
  Relayout = 'relayout'
}

/** Props whose change moves or re-creates slots */
const LAYOUT_KEYS = [
  'appointments',
  'timeLabelWidth',
  'width',
  'height',
  'appointmentBuilder',
  'wideLayout',
] as const satisfies readonly (keyof AgendaProps)[];

/** Props that only change how the default painter draws slots */
const STYLE_KEYS = [
  'theme',
  'appointmentFont',
  'placeholderFont',
  'appointmentTimeTextFormat',
] as const satisfies readonly (keyof AgendaProps)[];

/** Props that change the semantics labels or their direction, whoever paints */
const SEMANTICS_KEYS = [
  'locale',
  'localizations',
  'textDirection',
  'describeAppointment',
  'formatDate',
] as const satisfies readonly (keyof AgendaProps)[];

function sameDate(a: Date | null | undefined, b: Date | null | undefined): boolean {
  if (!a || !b) return a === b;
  return a.getTime() === b.getTime();
}

function sameViewSettings(prev: AgendaProps, next: AgendaProps): boolean {
  return prev.viewSettings?.appointmentItemHeight === next.viewSettings?.appointmentItemHeight
    && prev.viewSettings?.allDayItemHeight === next.viewSettings?.allDayItemHeight;
}

/**
 * True when builder children, not the default painter, draw the agenda
 */
function builderDraws(props: AgendaProps): boolean {
  return props.appointmentBuilder !== undefined
    && props.selectedDate !== null
    && (props.appointments?.some(a => a !== null && a !== undefined) ?? false);
}

/**
 * Compare two prop snapshots and decide what the agenda has to redo.
 * Style-only changes are ignored while a builder draws the appointments;
 * the text scale factor and semantics inputs still repaint.
 */
export function diffAgendaProps(prev: AgendaProps, next: AgendaProps): AgendaUpdate {
  if (
    !sameDate(prev.selectedDate, next.selectedDate)
    || LAYOUT_KEYS.some(key => prev[key] !== next[key])
    || !sameViewSettings(prev, next)
  ) {
    return AgendaUpdate.Relayout;
  }

  if (
    prev.textScaleFactor !== next.textScaleFactor
    || SEMANTICS_KEYS.some(key => prev[key] !== next[key])
  ) {
    return AgendaUpdate.Repaint;
  }

  if (builderDraws(next)) {
    return AgendaUpdate.None;
  }

  return STYLE_KEYS.some(key => prev[key] !== next[key]) ? AgendaUpdate.Repaint : AgendaUpdate.None;
}
