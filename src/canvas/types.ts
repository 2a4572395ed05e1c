/**
 * Canvas-specific types for the agenda renderer
 */

import type { Appointment, TextDirection } from '../types';

/**
 * A rectangle in pixel coordinates
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A rectangle with uniformly rounded corners
 */
export interface RoundedRect extends Rect {
  radius: number;
}

/**
 * A point in pixel coordinates
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Width and height of a painted box
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Color definition - supports CSS color strings
 */
export type Color = string;

/**
 * Font specification for canvas text rendering
 */
export interface FontSpec {
  family: string;
  size: number;
  weight?: number | string;
  style?: 'normal' | 'italic';
}

/**
 * The part of a 2D canvas context the agenda draws with.
 * A browser CanvasRenderingContext2D satisfies it.
 */
export interface DrawingContext {
  font: string;
  fillStyle: string | CanvasGradient | CanvasPattern;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  beginPath(): void;
  rect(x: number, y: number, width: number, height: number): void;
  clip(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  quadraticCurveTo(cpx: number, cpy: number, x: number, y: number): void;
  closePath(): void;
  fill(): void;
  clearRect(x: number, y: number, width: number, height: number): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
}

/**
 * Reusable slot binding an appointment to its computed rectangle.
 * A slot without an appointment is free and is handed to the next appointment that needs one.
 */
export class AppointmentView {
  appointment: Appointment | null = null;
  bounds: RoundedRect | null = null;
  canReuse: boolean = true;

  /**
   * Blank the slot so the next layout pass can reuse it
   */
  clear(): void {
    this.appointment = null;
    this.bounds = null;
    this.canReuse = true;
  }
}

/**
 * Accessibility node derived from slot geometry
 */
export interface SemanticsNode {
  /** Stable for the lifetime of the pooled handle */
  readonly id: number;
  rect: Rect;
  label: string;
  textDirection: TextDirection;
}

/**
 * Geometry inputs of one layout pass
 */
export interface AgendaLayoutConfig {
  width: number;
  height: number;
  /** Height of timed rows */
  appointmentItemHeight: number;
  /** Height of all-day and spanning rows */
  allDayItemHeight: number;
  /** Gap around and between rows (default: 5) */
  padding?: number;
  /**
   * Alternate layout where spanning rows keep the timed height.
   * Currently disabled: leave false unless the alternate layout is wanted.
   */
  wideLayout?: boolean;
}

/**
 * Hit test result
 */
export type HitTestResult =
  | {
      type: 'appointment';
      appointment: Appointment;
      view: AppointmentView;
      /** The point in slot-local coordinates */
      localPoint: Point;
      point: Point;
    }
  | { type: 'none'; point: Point };

/**
 * Theme colors for canvas rendering
 */
export interface AgendaTheme {
  appointmentDefaultColor: Color;
  appointmentTextColor: Color;
  placeholderTextColor: Color;
}

/**
 * Details handed to an appointment builder
 */
export interface AppointmentBuilderDetails {
  /** The selected date the agenda shows */
  date: Date;
  /** The appointment(s) the built content stands for */
  appointments: readonly Appointment[];
  /** Slot rectangle in agenda coordinates */
  bounds: Rect;
}

/**
 * Content produced by an appointment builder. It paints in slot-local coordinates.
 */
export interface AppointmentContent {
  paint(ctx: DrawingContext, size: Size): void;
  /** Return false to let the hit fall through; hits are accepted when omitted */
  hitTest?(localPoint: Point): boolean;
}

export type AppointmentBuilder = (details: AppointmentBuilderDetails) => AppointmentContent;

/**
 * A built child positioned at its slot
 */
export interface AgendaChild {
  view: AppointmentView;
  content: AppointmentContent;
}
