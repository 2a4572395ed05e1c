/**
 * Accessibility Layer - semantics nodes for screen reader support
 *
 * Canvas content is not accessible to screen readers, so the agenda derives
 * a node list mirroring the painted rows. Node handles are pooled so a row
 * keeps its node identity across updates.
 */

import type { Appointment, AgendaLocalizations, DateFormatter } from '../types';
import { TextDirection, TranslationKey } from '../types';
import { formatDate } from '../utils/dateFormat';
import { isSpannedAppointment } from '../utils/layoutHelpers';
import type { AppointmentView, Rect, SemanticsNode, Size } from './types';

/** Pattern for times in row descriptions */
export const DESCRIPTION_TIME_FORMAT = 'hh:mm a';

/** Pattern for times of spanning rows, which need the date as well */
export const DESCRIPTION_DATE_TIME_FORMAT = 'hh:mm a, dd MMMM yyyy';

/** Pattern for the date announced on an empty day */
export const EMPTY_DAY_DATE_FORMAT = 'EEEE, dd MMMM yyyy';

/**
 * Configuration for the accessibility layer
 */
export interface AccessibilityConfig {
  /** Custom row description */
  describeAppointment?: (appointment: Appointment) => string;
  /** Formatter used by the default descriptions */
  formatDate: DateFormatter;
  locale: string;
  textDirection: TextDirection;
}

const DEFAULT_CONFIG: AccessibilityConfig = {
  formatDate,
  locale: 'en',
  textDirection: TextDirection.LeftToRight,
};

/**
 * Inputs of one semantics pass
 */
export interface SemanticsState {
  selectedDate: Date | null;
  slots: readonly AppointmentView[];
  size: Size;
  localizations: AgendaLocalizations;
}

class PooledSemanticsNode implements SemanticsNode {
  readonly id: number;
  rect: Rect = { x: 0, y: 0, width: 0, height: 0 };
  label: string = '';
  textDirection: TextDirection = TextDirection.LeftToRight;

  constructor(id: number) {
    this.id = id;
  }
}

/**
 * AccessibilityLayer derives semantics nodes from slot geometry
 */
export class AccessibilityLayer {
  private config: AccessibilityConfig;
  private pool: PooledSemanticsNode[] = [];
  private nodes: SemanticsNode[] = [];
  private nextId: number = 0;

  constructor(config: Partial<AccessibilityConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Rebuild the node list. Handles of the previous pass are reused front to back
   * before new ones are allocated.
   */
  update(state: SemanticsState): SemanticsNode[] {
    const queue = this.pool;
    const next: PooledSemanticsNode[] = [];

    const take = (rect: Rect, label: string): void => {
      const node = queue.shift() ?? new PooledSemanticsNode(this.nextId++);
      node.rect = rect;
      node.label = label;
      node.textDirection = this.config.textDirection;
      next.push(node);
    };

    if (state.selectedDate === null) {
      take(this.fullSurface(state.size), state.localizations[TranslationKey.noSelectedDate]);
    } else if (state.slots.length === 0) {
      take(this.fullSurface(state.size), this.describeEmptyDay(state.selectedDate, state.localizations));
    } else {
      for (const view of state.slots) {
        if (!view.appointment || !view.bounds) continue;
        const { x, y, width, height } = view.bounds;
        take({ x, y, width, height }, this.describe(view.appointment));
      }
    }

    // The pool is drained by the next pass; callers keep the returned list
    this.pool = [...next];
    this.nodes = next;
    return next;
  }

  /**
   * Nodes of the last pass
   */
  getNodes(): readonly SemanticsNode[] {
    return this.nodes;
  }

  /**
   * Number of handles kept for the next pass
   */
  getPoolSize(): number {
    return this.pool.length;
  }

  /**
   * Row description announced by screen readers
   */
  describe(appointment: Appointment): string {
    if (this.config.describeAppointment) {
      return this.config.describeAppointment(appointment);
    }

    if (appointment.isAllDay && !isSpannedAppointment(appointment)) {
      return `${appointment.subject}, All day`;
    }

    const pattern = isSpannedAppointment(appointment) ? DESCRIPTION_DATE_TIME_FORMAT : DESCRIPTION_TIME_FORMAT;
    const { formatDate: format, locale } = this.config;
    return `${appointment.subject}, ${format(appointment.startTime, pattern, locale)} to ${format(appointment.endTime, pattern, locale)}`;
  }

  private describeEmptyDay(date: Date, localizations: AgendaLocalizations): string {
    const day = this.config.formatDate(date, EMPTY_DAY_DATE_FORMAT, this.config.locale);
    return `${day}, ${localizations[TranslationKey.noEvents]}`;
  }

  private fullSurface(size: Size): Rect {
    return { x: 0, y: 0, width: size.width, height: size.height };
  }

  /**
   * Update configuration
   */
  updateConfig(config: Partial<AccessibilityConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Drop every node and pooled handle
   */
  clear(): void {
    this.pool = [];
    this.nodes = [];
  }

  /**
   * Destroy and clean up
   */
  destroy(): void {
    this.clear();
  }
}
