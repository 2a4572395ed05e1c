/**
 * Layout Engine for the agenda
 * Assigns pooled slots to appointments and computes their rectangles in a single pass
 */

import type { Appointment } from '../types';
import { isSpannedAppointment, sortAppointments } from '../utils/layoutHelpers';
import { AppointmentView } from './types';
import type { AgendaLayoutConfig, AgendaTheme, Point, Rect } from './types';

/**
 * Default theme colors
 */
export const DEFAULT_THEME: AgendaTheme = {
  appointmentDefaultColor: '#3b82f6',
  appointmentTextColor: '#ffffff',
  placeholderTextColor: '#9e9e9e',
};

/** Gap around and between rows */
export const AGENDA_PADDING = 5;

/** Upper bound for row corner radius */
export const MAX_CORNER_RADIUS = 5;

/**
 * Corner radius for a row: 10% of its height, capped so short rows don't turn into pills
 */
export function getCornerRadius(itemHeight: number): number {
  return Math.max(0, Math.min(MAX_CORNER_RADIUS, itemHeight * 0.1));
}

/**
 * Row height for an appointment
 */
export function getItemHeight(appointment: Appointment, config: AgendaLayoutConfig): number {
  const useAllDayHeight = (appointment.isAllDay === true || isSpannedAppointment(appointment))
    && !(config.wideLayout ?? false);
  return useAllDayHeight ? config.allDayItemHeight : config.appointmentItemHeight;
}

/**
 * LayoutEngine owns the slot arena and recomputes it for each appointment list
 */
export class LayoutEngine {
  private views: AppointmentView[] = [];
  private allocatedCount: number = 0;

  /**
   * Compute slots for the appointments of the selected date
   * @param appointments - Appointments to lay out; null means "no data"
   * @param selectedDate - Date being shown; null yields no slots
   * @returns Occupied slots in paint order
   */
  computeSlots(
    appointments: ReadonlyArray<Appointment | null | undefined> | null | undefined,
    selectedDate: Date | null,
    config: AgendaLayoutConfig
  ): AppointmentView[] {
    for (const view of this.views) {
      view.clear();
    }

    if (selectedDate === null || !appointments) {
      return [];
    }

    const present = appointments.filter((a): a is Appointment => a !== null && a !== undefined);
    if (present.length === 0) {
      return [];
    }

    const padding = config.padding ?? AGENDA_PADDING;
    const width = Math.max(0, config.width - 2 * padding);
    const occupied: AppointmentView[] = [];
    let y = padding;

    for (const appointment of sortAppointments(present)) {
      const height = getItemHeight(appointment, config);
      const view = this.acquireView();
      view.appointment = appointment;
      view.canReuse = false;
      view.bounds = {
        x: padding,
        y,
        width,
        height,
        radius: getCornerRadius(height),
      };
      occupied.push(view);
      y += height + padding;
    }

    return occupied;
  }

  /**
   * First free slot in backing order, or a newly appended one
   */
  private acquireView(): AppointmentView {
    const free = this.views.find(view => view.appointment === null);
    if (free) return free;

    const view = new AppointmentView();
    this.views.push(view);
    this.allocatedCount++;
    return view;
  }

  /**
   * Occupied slots of the last pass
   */
  getSlots(): AppointmentView[] {
    return this.views.filter(view => view.appointment !== null && view.bounds !== null);
  }

  /**
   * Every slot ever allocated, free ones included
   */
  getAllViews(): readonly AppointmentView[] {
    return this.views;
  }

  /**
   * Number of slots allocated since construction or the last reset
   */
  getAllocatedSlotCount(): number {
    return this.allocatedCount;
  }

  /**
   * Total height the occupied slots need, including the trailing padding
   */
  getContentHeight(padding: number = AGENDA_PADDING): number {
    const slots = this.getSlots();
    const last = slots[slots.length - 1];
    if (!last?.bounds) return 0;
    return last.bounds.y + last.bounds.height + padding;
  }

  /**
   * Drop every slot (component teardown)
   */
  reset(): void {
    this.views = [];
    this.allocatedCount = 0;
  }
}

/**
 * Utility: Check if a point is inside a rectangle
 */
export function pointInRect(point: Point, rect: Rect): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height
  );
}
