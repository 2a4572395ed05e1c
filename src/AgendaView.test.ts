import { afterEach, describe, expect, it, vi } from 'vitest';
import { AgendaView, type AgendaInput } from './AgendaView';
import type { AppointmentBuilderDetails } from './canvas/types';
import { RecordingContext } from './test-utils/RecordingContext';
import { TextDirection, type Appointment } from './types';
import { AgendaUpdate } from './utils/updateDiff';

const at = (day: number, hour: number) => new Date(2024, 2, day, hour);
const selectedDate = at(15, 0);
const morning: Appointment = { subject: 'Morning', startTime: at(15, 9), endTime: at(15, 10) };
const noon: Appointment = { subject: 'Noon', startTime: at(15, 11), endTime: at(15, 12) };
const evening: Appointment = { subject: 'Evening', startTime: at(15, 18), endTime: at(15, 19) };

const baseInput: AgendaInput = {
  width: 300,
  height: 400,
  selectedDate,
  appointments: [noon, morning],
  viewSettings: { appointmentItemHeight: 60 },
};

function createView(ctx: RecordingContext, input: AgendaInput = baseInput): AgendaView {
  const result = AgendaView.create(ctx, input);
  if (!result.success) throw result.error;
  return result.data;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('AgendaView', () => {
  describe('create', () => {
    it('lays out, paints and describes the rows', () => {
      const ctx = new RecordingContext();
      const view = createView(ctx);

      expect(view.getSlots().map(s => [s.appointment?.subject, s.bounds?.y])).toEqual([
        ['Morning', 5],
        ['Noon', 70],
      ]);
      expect(view.getSemanticsNodes().map(n => n.label)).toEqual([
        'Morning, 09:00 AM to 10:00 AM',
        'Noon, 11:00 AM to 12:00 PM',
      ]);
      expect(ctx.texts().map(t => t.text)).toEqual([
        'Morning', '09:00 AM - 10:00 AM', 'Noon', '11:00 AM - 12:00 PM',
      ]);
      expect(view.getChildren()).toEqual([]);
    });

    it('rejects invalid props', () => {
      const result = AgendaView.create(new RecordingContext(), { ...baseInput, width: -1 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Invalid props: width: width must be a finite number >= 0');
      }
    });

    it('rejects a locale without translations', () => {
      const result = AgendaView.create(new RecordingContext(), { ...baseInput, locale: 'fr' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('No agenda translations for unsupported locale "fr"');
      }
    });

    it('paints the label when no date is selected', () => {
      const ctx = new RecordingContext();
      const view = createView(ctx, { ...baseInput, selectedDate: null });

      expect(view.getSlots()).toEqual([]);
      expect(ctx.texts().map(t => t.text)).toEqual(['No selected date']);
      expect(view.getSemanticsNodes().map(n => n.label)).toEqual(['No selected date']);
    });
  });

  describe('update', () => {
    it('repaints in place for a text scale change', () => {
      const ctx = new RecordingContext();
      const view = createView(ctx);
      const before = view.getSlots()[0];
      const ids = view.getSemanticsNodes().map(n => n.id);

      const result = view.update({ textScaleFactor: 1.5 });

      expect(result).toEqual({ success: true, data: AgendaUpdate.Repaint });
      expect(view.getSlots()[0]).toBe(before);
      expect(view.getSemanticsNodes().map(n => n.id)).toEqual(ids);
    });

    it('does nothing when no prop changed', () => {
      const ctx = new RecordingContext();
      const view = createView(ctx);
      ctx.reset();

      expect(view.update({ width: 300 })).toEqual({ success: true, data: AgendaUpdate.None });
      expect(ctx.calls).toEqual([]);
    });

    it('relayouts a new list, reusing slots', () => {
      const view = createView(new RecordingContext());

      expect(view.update({ appointments: [evening, morning, noon] }))
        .toEqual({ success: true, data: AgendaUpdate.Relayout });
      expect(view.getSlots().map(s => s.appointment?.subject)).toEqual(['Morning', 'Noon', 'Evening']);
      expect(view.getAllocatedSlotCount()).toBe(3);

      view.update({ appointments: [morning] });
      expect(view.getAllocatedSlotCount()).toBe(3);
    });

    it('switches to the label when the date is cleared', () => {
      const ctx = new RecordingContext();
      const view = createView(ctx);
      ctx.reset();

      view.update({ selectedDate: null });

      expect(ctx.texts().map(t => t.text)).toEqual(['No selected date']);
      expect(view.hitTest({ x: 10, y: 20 }).type).toBe('none');
    });

    it('keeps an earlier semantics list intact across updates', () => {
      const view = createView(new RecordingContext());
      const before = view.getSemanticsNodes();
      const ids = before.map(n => n.id);

      view.update({ appointments: [morning] });
      view.update({ appointments: [morning, noon, evening] });

      expect(before.map(n => n.id)).toEqual(ids);
      expect(view.getSemanticsNodes()).toHaveLength(3);
    });

    it('rejects an undefined selected date', () => {
      const view = createView(new RecordingContext());
      const result = view.update({ selectedDate: undefined });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Invalid props: selectedDate: selectedDate must not be undefined');
      }
      expect(view.getProps().selectedDate).toBe(selectedDate);
      expect(view.getSlots()).toHaveLength(2);
    });

    it('restores the default for an undefined text scale factor', () => {
      const view = createView(new RecordingContext());
      view.update({ textScaleFactor: 2 });

      expect(view.update({ textScaleFactor: undefined })).toEqual({ success: true, data: AgendaUpdate.Repaint });
      expect(view.getProps().textScaleFactor).toBe(1);
    });

    it('keeps the current props when validation fails', () => {
      const view = createView(new RecordingContext());

      expect(view.update({ width: -5 }).success).toBe(false);
      expect(view.getProps().width).toBe(300);
    });

    it('warns about rejected appointments', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const view = createView(new RecordingContext());
      const broken: Appointment = { ...morning, endTime: at(15, 8) };

      expect(view.update({ appointments: [broken] }).success).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('relocalizes labels on a locale change', () => {
      const ctx = new RecordingContext();
      const view = createView(ctx, { ...baseInput, appointments: [] });
      ctx.reset();

      expect(view.update({ locale: 'vi' })).toEqual({ success: true, data: AgendaUpdate.Repaint });
      expect(ctx.texts().map(t => t.text)).toEqual(['Không có sự kiện']);
    });
  });

  describe('appointment builder', () => {
    function builderView(ctx: RecordingContext) {
      const details: AppointmentBuilderDetails[] = [];
      const view = createView(ctx, {
        ...baseInput,
        appointmentBuilder: d => {
          details.push(d);
          return {
            paint: childCtx => childCtx.fillText(d.appointments[0].subject, 0, 0),
          };
        },
      });
      return { view, details };
    }

    it('builds one child per row and skips default painting', () => {
      const ctx = new RecordingContext();
      const { view, details } = builderView(ctx);

      expect(view.getChildren()).toHaveLength(2);
      expect(details[0]).toEqual({
        date: selectedDate,
        appointments: [morning],
        bounds: { x: 5, y: 5, width: 290, height: 60 },
      });
      expect(ctx.texts().map(t => [t.text, t.x, t.y])).toEqual([['Morning', 0, 0], ['Noon', 0, 0]]);
      expect(ctx.ops('translate').map(c => c.args)).toEqual([[5, 5], [5, 70]]);
    });

    it('leaves styling to the builder', () => {
      const { view, details } = builderView(new RecordingContext());

      expect(view.update({ theme: { appointmentTextColor: '#000000' } }))
        .toEqual({ success: true, data: AgendaUpdate.None });
      expect(view.update({ textScaleFactor: 2 })).toEqual({ success: true, data: AgendaUpdate.Repaint });
      expect(details).toHaveLength(2);
    });

    it('refreshes semantics when their inputs change', () => {
      const { view, details } = builderView(new RecordingContext());
      const ids = view.getSemanticsNodes().map(n => n.id);

      const result = view.update({
        describeAppointment: a => `Event ${a.subject}`,
        textDirection: TextDirection.RightToLeft,
      });

      expect(result).toEqual({ success: true, data: AgendaUpdate.Repaint });
      expect(view.getSemanticsNodes().map(n => [n.id, n.label, n.textDirection])).toEqual([
        [ids[0], 'Event Morning', TextDirection.RightToLeft],
        [ids[1], 'Event Noon', TextDirection.RightToLeft],
      ]);
      expect(details).toHaveLength(2);
    });

    it('routes hits through the children', () => {
      const { view } = builderView(new RecordingContext());
      const hit = view.hitTest({ x: 10, y: 80 });

      expect(hit.type === 'appointment' ? hit.appointment : null).toBe(noon);
    });
  });

  describe('destroy', () => {
    it('drops slots and semantics and refuses updates', () => {
      const view = createView(new RecordingContext());
      view.destroy();

      expect(view.getSlots()).toEqual([]);
      expect(view.getSemanticsNodes()).toEqual([]);
      const result = view.update({ textScaleFactor: 2 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('AgendaView has been destroyed');
      }
    });
  });
});
