/**
 * Hit Tester - hit detection for agenda rows
 */

import type { AgendaChild, AppointmentView, Point, HitTestResult } from './types';
import { pointInRect } from './LayoutEngine';

/**
 * HitTester maps a surface point to the row under it.
 * Rows are stacked without overlap, so a linear walk in paint order is enough.
 */
export class HitTester {
  private slots: readonly AppointmentView[] = [];
  private children: Map<AppointmentView, AgendaChild> = new Map();

  /**
   * Update the hit tester with new layout
   * @param children - Builder children, consulted before a slot hit is accepted
   */
  updateLayout(slots: readonly AppointmentView[], children: readonly AgendaChild[] = []): void {
    this.slots = slots;
    this.children = new Map(children.map(child => [child.view, child]));
  }

  /**
   * Perform hit test at a point
   */
  hitTest(point: Point): HitTestResult {
    for (const view of this.slots) {
      const { appointment, bounds } = view;
      if (!appointment || !bounds || !pointInRect(point, bounds)) continue;

      const localPoint = { x: point.x - bounds.x, y: point.y - bounds.y };
      const child = this.children.get(view);
      if (child?.content.hitTest && !child.content.hitTest(localPoint)) {
        continue;
      }

      return {
        type: 'appointment',
        appointment,
        view,
        localPoint,
        point,
      };
    }

    return { type: 'none', point };
  }

  /**
   * Get the row at a point, if any
   */
  getAppointmentAt(point: Point): AppointmentView | null {
    const result = this.hitTest(point);
    return result.type === 'appointment' ? result.view : null;
  }

  /**
   * Clear hit tester state
   */
  clear(): void {
    this.slots = [];
    this.children.clear();
  }
}
