/**
 * Agenda Renderer - paints appointment rows, or positions builder content at each slot
 */

import type { Appointment, AgendaLocalizations, DateFormatter } from '../types';
import { TranslationKey } from '../types';
import { formatTimeRange } from '../utils/dateFormat';
import {
  getSpanDayInfo,
  isRecurrenceException,
  isRecurringAppointment,
  isSameDate,
  isSpannedAppointment,
} from '../utils/layoutHelpers';
import type { CanvasRenderer } from './CanvasRenderer';
import { TextRenderer, type TextLayout } from './TextRenderer';
import type { AgendaChild, AppointmentView, Color, FontSpec, RoundedRect, Size } from './types';

/**
 * Configuration for agenda rendering
 */
export interface AgendaRendererConfig {
  /** Subject and time text font */
  appointmentFont: FontSpec;
  /** Font of the "no events" / "no selected date" label */
  placeholderFont: FontSpec;
  /** Line height multiplier */
  lineHeight: number;
  /** Inner padding of a row */
  padding: number;
  /** Marker appended to truncated text */
  ellipsis: string;
  /** Glyph drawn on recurring series occurrences */
  recurrenceGlyph: string;
  /** Glyph drawn on occurrences changed from their series */
  recurrenceExceptionGlyph: string;
  /** Glyph drawn when a spanning appointment continues past the shown date */
  spanGlyph: string;
}

export const DEFAULT_APPOINTMENT_FONT: FontSpec = {
  family: 'Roboto, "Segoe UI", sans-serif',
  size: 13,
  weight: 400,
};

export const DEFAULT_PLACEHOLDER_FONT: FontSpec = {
  family: 'Roboto, "Segoe UI", sans-serif',
  size: 15,
  weight: 400,
};

const DEFAULT_CONFIG: AgendaRendererConfig = {
  appointmentFont: DEFAULT_APPOINTMENT_FONT,
  placeholderFont: DEFAULT_PLACEHOLDER_FONT,
  lineHeight: 1.2,
  padding: 5,
  ellipsis: '..',
  recurrenceGlyph: '↻',
  recurrenceExceptionGlyph: '↺',
  spanGlyph: '→',
};

/** Top plus bottom padding subtracted before fitting lines into a row */
const VERTICAL_TEXT_PADDING = 10;

/** Horizontal room a trailing glyph takes besides its size */
const GLYPH_REGION_EXTRA = 8;

/** Text width given up for a trailing glyph besides its size */
const GLYPH_TEXT_RESERVE = 10;

/**
 * Everything the default painter reads for one frame
 */
export interface AgendaPaintState {
  selectedDate: Date | null;
  slots: readonly AppointmentView[];
  size: Size;
  textScaleFactor: number;
  locale: string;
  localizations: AgendaLocalizations;
  appointmentTimeTextFormat?: string | null;
  formatDate: DateFormatter;
}

/**
 * Text size for a row: the font size, unless the row is smaller than it in either dimension
 */
export function getTextSize(rect: Size, fontSize: number): number {
  if (rect.width < fontSize || rect.height < fontSize) {
    return Math.max(0, Math.min(rect.width, rect.height));
  }
  return fontSize;
}

/**
 * Number of subject lines that fit a row
 * @param reserveTimeLine - Keep one line free for the time range
 */
export function getMaxLines(itemHeight: number, lineHeight: number, reserveTimeLine: boolean): number {
  if (lineHeight <= 0) return 1;
  const fitting = Math.floor((itemHeight - VERTICAL_TEXT_PADDING) / lineHeight);
  if (fitting > 1) {
    return reserveTimeLine ? fitting - 1 : fitting;
  }
  return 1;
}

/**
 * Summary shown for an appointment spanning several days, e.g. "Trip (Day 2 / 3)"
 */
export function getSpanText(appointment: Appointment, date: Date, dayLabel: string): string {
  const { current, total } = getSpanDayInfo(appointment, date);
  return `${appointment.subject} (${dayLabel} ${current} / ${total})`;
}

/**
 * AgendaRenderer handles drawing of the agenda surface
 */
export class AgendaRenderer {
  private renderer: CanvasRenderer;
  private textRenderer: TextRenderer;
  private config: AgendaRendererConfig;

  constructor(renderer: CanvasRenderer, config: Partial<AgendaRendererConfig> = {}) {
    this.renderer = renderer;
    this.textRenderer = new TextRenderer(renderer);
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Update configuration
   */
  updateConfig(config: Partial<AgendaRendererConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Default paint path: one row per occupied slot, or the informational label
   */
  render(state: AgendaPaintState): void {
    this.renderer.clear();

    if (state.selectedDate === null || state.slots.length === 0) {
      this.renderPlaceholder(state);
      return;
    }

    for (const view of state.slots) {
      this.renderAppointment(view, state.selectedDate, state);
    }
  }

  /**
   * Builder paint path: each child paints in its slot's local coordinates
   */
  renderChildren(children: readonly AgendaChild[]): void {
    this.renderer.clear();

    for (const child of children) {
      const bounds = child.view.bounds;
      if (!bounds) continue;

      this.renderer.save();
      this.renderer.translate(bounds.x, bounds.y);
      this.renderer.clip({ x: 0, y: 0, width: bounds.width, height: bounds.height });
      child.content.paint(this.renderer.getContext(), { width: bounds.width, height: bounds.height });
      this.renderer.restore();
    }
  }

  /**
   * Draw the "no selected date" / "no events" label
   */
  private renderPlaceholder(state: AgendaPaintState): void {
    const { padding, placeholderFont } = this.config;
    const label = state.selectedDate === null
      ? state.localizations[TranslationKey.noSelectedDate]
      : state.localizations[TranslationKey.noEvents];

    const font = this.scaleFont(placeholderFont, state.textScaleFactor);
    const layout = this.textRenderer.layoutText(label, state.size.width - 2 * padding, font, {
      maxLines: 1,
      ellipsis: this.config.ellipsis,
      lineHeight: this.config.lineHeight,
    });

    const x = Math.max(padding, (state.size.width - layout.width) / 2);
    this.textRenderer.paintLayout(layout, x, 2 * padding, this.renderer.getTheme().placeholderTextColor);
  }

  /**
   * Render a single appointment row
   */
  private renderAppointment(view: AppointmentView, selectedDate: Date, state: AgendaPaintState): void {
    const { appointment, bounds } = view;
    if (!appointment || !bounds) return;

    const theme = this.renderer.getTheme();
    const color = appointment.color?.trim() || theme.appointmentDefaultColor;
    this.renderer.fillRoundedRect(bounds, color, bounds.radius);

    const scaled = this.scaleFont(this.config.appointmentFont, state.textScaleFactor);
    const textSize = getTextSize(bounds, scaled.size);
    const font: FontSpec = { ...scaled, size: textSize };
    const hasRecurrenceGlyph = isRecurringAppointment(appointment) || isRecurrenceException(appointment);

    let textTop: number;
    if (isSpannedAppointment(appointment)) {
      textTop = this.renderSpanning(appointment, bounds, font, color, selectedDate, state);
    } else if (!appointment.isAllDay) {
      textTop = this.renderTimed(appointment, bounds, font, hasRecurrenceGlyph, state);
    } else {
      textTop = this.renderAllDay(appointment, bounds, font, hasRecurrenceGlyph);
    }

    if (hasRecurrenceGlyph) {
      const glyph = isRecurringAppointment(appointment)
        ? this.config.recurrenceGlyph
        : this.config.recurrenceExceptionGlyph;
      this.renderGlyph(glyph, bounds, font, color, textTop, false);
    }
  }

  /**
   * Spanning row: summary text, plus a "continues" glyph unless the shown date is the last day
   * @returns Top offset of the text block inside the row
   */
  private renderSpanning(
    appointment: Appointment,
    bounds: RoundedRect,
    font: FontSpec,
    color: Color,
    selectedDate: Date,
    state: AgendaPaintState
  ): number {
    const text = getSpanText(appointment, selectedDate, state.localizations[TranslationKey.daySpanCount]);
    const continues = !isSameDate(appointment.endTime, selectedDate);
    const reserve = continues ? font.size + GLYPH_TEXT_RESERVE : 0;

    const layout = this.layoutRowText(text, bounds, font, reserve, false);
    const top = (bounds.height - layout.height) / 2;
    this.paintRowText(layout, bounds, top);

    if (continues) {
      this.renderGlyph(this.config.spanGlyph, bounds, font, color, top, true);
    }
    return top;
  }

  /**
   * Timed row: subject block with the time range underneath, centered as a whole
   * @returns Top offset of the text block inside the row
   */
  private renderTimed(
    appointment: Appointment,
    bounds: RoundedRect,
    font: FontSpec,
    hasGlyph: boolean,
    state: AgendaPaintState
  ): number {
    const reserve = hasGlyph ? font.size + GLYPH_TEXT_RESERVE : 0;
    const subject = this.layoutRowText(appointment.subject, bounds, font, reserve, true);
    const top = (bounds.height - (subject.height + subject.lineHeight)) / 2;
    this.paintRowText(subject, bounds, top);

    const timeText = formatTimeRange(appointment, state.locale, state.formatDate, state.appointmentTimeTextFormat);
    const time = this.textRenderer.layoutText(timeText, bounds.width - this.config.padding - reserve, font, {
      maxLines: 1,
      ellipsis: this.config.ellipsis,
      lineHeight: this.config.lineHeight,
    });
    this.paintRowText(time, bounds, top + subject.height);
    return top;
  }

  /**
   * All-day row: subject only, vertically centered
   * @returns Top offset of the text block inside the row
   */
  private renderAllDay(
    appointment: Appointment,
    bounds: RoundedRect,
    font: FontSpec,
    hasGlyph: boolean
  ): number {
    const reserve = hasGlyph ? font.size + GLYPH_TEXT_RESERVE : 0;
    const layout = this.layoutRowText(appointment.subject, bounds, font, reserve, false);
    const top = (bounds.height - layout.height) / 2;
    this.paintRowText(layout, bounds, top);
    return top;
  }

  /**
   * Lay out row text with the line cap for the row height
   */
  private layoutRowText(
    text: string,
    bounds: RoundedRect,
    font: FontSpec,
    reserve: number,
    reserveTimeLine: boolean
  ): TextLayout {
    const lineHeight = this.textRenderer.getLineHeight(font, this.config.lineHeight);
    return this.textRenderer.layoutText(text, bounds.width - this.config.padding - reserve, font, {
      maxLines: getMaxLines(bounds.height, lineHeight, reserveTimeLine),
      ellipsis: this.config.ellipsis,
      lineHeight: this.config.lineHeight,
    });
  }

  private paintRowText(layout: TextLayout, bounds: RoundedRect, top: number): void {
    this.textRenderer.paintLayout(
      layout,
      bounds.x + this.config.padding,
      bounds.y + top,
      this.renderer.getTheme().appointmentTextColor
    );
  }

  /**
   * Right-aligned glyph over a background region cut out of the row end
   */
  private renderGlyph(
    glyph: string,
    bounds: RoundedRect,
    font: FontSpec,
    color: Color,
    textTop: number,
    centerOnText: boolean
  ): void {
    const regionWidth = Math.min(bounds.width, font.size + GLYPH_REGION_EXTRA);
    this.renderer.fillRoundedRect(
      {
        x: bounds.x + bounds.width - regionWidth,
        y: bounds.y,
        width: regionWidth,
        height: bounds.height,
      },
      color,
      bounds.radius
    );

    const layout = this.textRenderer.layoutText(glyph, regionWidth, font, {
      maxLines: 1,
      ellipsis: '',
      lineHeight: this.config.lineHeight,
    });
    // The glyph box is taller than the glyph itself; pull it up onto the text line
    const lift = centerOnText ? (layout.height - font.size / 2) / 2 : 0;

    this.textRenderer.paintLayout(
      layout,
      bounds.x + bounds.width - layout.width - GLYPH_REGION_EXTRA,
      bounds.y + textTop - lift,
      this.renderer.getTheme().appointmentTextColor
    );
  }

  private scaleFont(font: FontSpec, textScaleFactor: number): FontSpec {
    return { ...font, size: font.size * textScaleFactor };
  }
}
