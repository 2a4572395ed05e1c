import { describe, expect, it } from 'vitest';
import { TextDirection, type Appointment } from '../types';
import { resolveLocalizations } from '../utils/localization';
import { AccessibilityLayer, type SemanticsState } from './AccessibilityLayer';
import { LayoutEngine } from './LayoutEngine';

const at = (day: number, hour: number, minute = 0) => new Date(2024, 2, day, hour, minute);
const friday = at(15, 0);

const timed = (subject: string, hour: number): Appointment => ({
  subject,
  startTime: at(15, hour),
  endTime: at(15, hour, 30),
});

function stateFor(engine: LayoutEngine, appointments: Appointment[], selectedDate: Date | null = friday): SemanticsState {
  return {
    selectedDate,
    slots: engine.computeSlots(appointments, selectedDate, {
      width: 300,
      height: 400,
      appointmentItemHeight: 50,
      allDayItemHeight: 25,
    }),
    size: { width: 300, height: 400 },
    localizations: resolveLocalizations('en'),
  };
}

describe('AccessibilityLayer', () => {
  describe('update', () => {
    it('creates one node per row with the row rect', () => {
      const engine = new LayoutEngine();
      const layer = new AccessibilityLayer();

      const nodes = layer.update(stateFor(engine, [timed('Standup', 9), timed('Lunch', 12)]));

      expect(nodes.map(n => ({ rect: n.rect, label: n.label }))).toEqual([
        { rect: { x: 5, y: 5, width: 290, height: 50 }, label: 'Standup, 09:00 AM to 09:30 AM' },
        { rect: { x: 5, y: 60, width: 290, height: 50 }, label: 'Lunch, 12:00 PM to 12:30 PM' },
      ]);
      expect(nodes[0].textDirection).toBe(TextDirection.LeftToRight);
    });

    it('covers the surface with the "no selected date" label', () => {
      const layer = new AccessibilityLayer();
      const nodes = layer.update(stateFor(new LayoutEngine(), [timed('Standup', 9)], null));

      expect(nodes).toHaveLength(1);
      expect(nodes[0].rect).toEqual({ x: 0, y: 0, width: 300, height: 400 });
      expect(nodes[0].label).toBe('No selected date');
    });

    it('announces the date of an empty day', () => {
      const layer = new AccessibilityLayer();
      const nodes = layer.update(stateFor(new LayoutEngine(), []));

      expect(nodes.map(n => n.label)).toEqual(['Friday, 15 March 2024, No events']);
    });

    it('reports the configured text direction', () => {
      const layer = new AccessibilityLayer({ textDirection: TextDirection.RightToLeft });
      const nodes = layer.update(stateFor(new LayoutEngine(), [timed('Standup', 9)]));

      expect(nodes[0].textDirection).toBe(TextDirection.RightToLeft);
    });
  });

  describe('describe', () => {
    const layer = new AccessibilityLayer();

    it('describes all-day rows without times', () => {
      expect(layer.describe({ subject: 'Holiday', startTime: at(15, 0), endTime: at(15, 23), isAllDay: true }))
        .toBe('Holiday, All day');
    });

    it('adds dates for spanning rows', () => {
      expect(layer.describe({ subject: 'Trip', startTime: at(14, 10), endTime: at(16, 12) }))
        .toBe('Trip, 10:00 AM, 14 March 2024 to 12:00 PM, 16 March 2024');
    });

    it('prefers the caller description', () => {
      const custom = new AccessibilityLayer({ describeAppointment: a => `Event ${a.subject}` });
      expect(custom.describe(timed('Standup', 9))).toBe('Event Standup');
    });
  });

  describe('node pool', () => {
    it('reuses handles front to back before allocating new ones', () => {
      const engine = new LayoutEngine();
      const layer = new AccessibilityLayer();

      expect(layer.update(stateFor(engine, [timed('A', 9), timed('B', 10)])).map(n => n.id)).toEqual([0, 1]);
      expect(layer.update(stateFor(engine, [timed('A', 9), timed('B', 10), timed('C', 11)])).map(n => n.id))
        .toEqual([0, 1, 2]);
      expect(layer.update(stateFor(engine, [timed('A', 9)])).map(n => n.id)).toEqual([0]);
      expect(layer.update(stateFor(engine, [timed('A', 9), timed('B', 10)])).map(n => n.id)).toEqual([0, 3]);
    });

    it('keeps the same handle object for a row across passes', () => {
      const engine = new LayoutEngine();
      const layer = new AccessibilityLayer();
      const list = [timed('A', 9)];

      const [first] = layer.update(stateFor(engine, list));
      const [second] = layer.update(stateFor(engine, list));

      expect(second).toBe(first);
    });

    it('leaves a list returned by an earlier pass untouched', () => {
      const engine = new LayoutEngine();
      const layer = new AccessibilityLayer();

      const before = layer.update(stateFor(engine, [timed('A', 9), timed('B', 10)]));
      const held = layer.getNodes();
      layer.update(stateFor(engine, [timed('A', 9)]));

      expect(before.map(n => n.id)).toEqual([0, 1]);
      expect(held.map(n => n.id)).toEqual([0, 1]);
      expect(layer.getNodes().map(n => n.id)).toEqual([0]);
    });

    it('clear empties the pool', () => {
      const engine = new LayoutEngine();
      const layer = new AccessibilityLayer();
      layer.update(stateFor(engine, [timed('A', 9), timed('B', 10)]));

      layer.clear();

      expect(layer.getPoolSize()).toBe(0);
      expect(layer.getNodes()).toEqual([]);
      expect(layer.update(stateFor(engine, [timed('A', 9)])).map(n => n.id)).toEqual([2]);
    });
  });
});
