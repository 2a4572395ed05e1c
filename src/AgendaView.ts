import type {
  Appointment,
  AgendaLocalizations,
  AgendaViewSettings,
  DateFormatter,
} from './types';
import { TextDirection } from './types';
import type { Result } from './types/internal';
import { fail, ok } from './types/internal';

import { validateProps } from './utils/validators';
import { resolveItemHeights } from './utils/layoutHelpers';
import { resolveLocalizations } from './utils/localization';
import { formatDate as defaultFormatDate } from './utils/dateFormat';
import { AgendaUpdate, diffAgendaProps } from './utils/updateDiff';

import type {
  AgendaChild,
  AgendaTheme,
  AppointmentBuilder,
  AppointmentView,
  DrawingContext,
  FontSpec,
  HitTestResult,
  Point,
  SemanticsNode,
} from './canvas/types';
import { LayoutEngine, DEFAULT_THEME } from './canvas/LayoutEngine';
import { CanvasRenderer } from './canvas/CanvasRenderer';
import {
  AgendaRenderer,
  DEFAULT_APPOINTMENT_FONT,
  DEFAULT_PLACEHOLDER_FONT,
  type AgendaRendererConfig,
} from './canvas/AgendaRenderer';
import { AccessibilityLayer, type AccessibilityConfig } from './canvas/AccessibilityLayer';
import { HitTester } from './canvas/HitTester';

/**
 * Agenda component props
 */
export interface AgendaProps {
  /** Surface width in pixels */
  width: number;
  /** Surface height in pixels */
  height: number;
  /** Day shown by the agenda; null shows the "no selected date" label */
  selectedDate: Date | null;
  /**
   * Appointments of the selected day. Null and undefined entries are skipped.
   * The list is compared by identity: pass a new array to relayout.
   */
  appointments: ReadonlyArray<Appointment | null | undefined> | null;
  /** Width of the host's time ruler; a change relayouts the agenda */
  timeLabelWidth: number;
  /** Multiplier applied to every font size (default: 1) */
  textScaleFactor: number;
  /** Locale code for labels and dates (default: "en") */
  locale: string;
  /** Label overrides on top of the built-in tables */
  localizations?: Partial<AgendaLocalizations>;
  /** Row heights */
  viewSettings?: AgendaViewSettings;
  /** Theme overrides */
  theme?: Partial<AgendaTheme>;
  /** Subject and time font override */
  appointmentFont?: FontSpec;
  /** Informational label font override */
  placeholderFont?: FontSpec;
  /** date-fns pattern for the time range of timed rows */
  appointmentTimeTextFormat?: string | null;
  /** Direction reported on semantics nodes (default: left to right) */
  textDirection: TextDirection;
  /** Custom semantics label for a row */
  describeAppointment?: (appointment: Appointment) => string;
  /** Custom date formatter (default: date-fns format) */
  formatDate?: DateFormatter;
  /** Builds the content drawn in place of the default row painting */
  appointmentBuilder?: AppointmentBuilder;
  /** Keep spanning rows at the timed height (default: false) */
  wideLayout?: boolean;
}

/**
 * Props accepted by create(); everything else has a default
 */
export type AgendaInput = Partial<AgendaProps> & Pick<AgendaProps, 'width' | 'height' | 'selectedDate'>;

/**
 * How the current layout pass is painted
 */
type PaintStrategy =
  | { kind: 'default' }
  | { kind: 'builder'; children: AgendaChild[] };

function normalizeProps(input: AgendaInput): AgendaProps {
  return {
    ...input,
    appointments: input.appointments ?? null,
    timeLabelWidth: input.timeLabelWidth ?? 0,
    textScaleFactor: input.textScaleFactor ?? 1,
    locale: input.locale ?? 'en',
    textDirection: input.textDirection ?? TextDirection.LeftToRight,
  };
}

function toError(prefix: string, errors: { field: string; message: string }[]): Error {
  return new Error(`${prefix}: ${errors.map(e => `${e.field}: ${e.message}`).join(', ')}`);
}

/**
 * Agenda Component
 * Canvas-drawn list of the selected day's appointments
 */
export class AgendaView {
  private props: AgendaProps;
  private localizations: AgendaLocalizations;
  private strategy: PaintStrategy = { kind: 'default' };

  // Rendering components
  private renderer: CanvasRenderer;
  private agendaRenderer: AgendaRenderer;
  private layoutEngine: LayoutEngine;
  private accessibility: AccessibilityLayer;
  private hitTester: HitTester;

  private slots: AppointmentView[] = [];
  private destroyed: boolean = false;

  /**
   * Factory method to create an AgendaView instance with validation
   * @param ctx - 2D context of the surface the agenda draws on
   * @param input - Component props
   * @returns Result containing either the AgendaView instance or an error
   */
  static create(ctx: DrawingContext, input: AgendaInput): Result<AgendaView, Error> {
    const validation = validateProps(input);
    if (!validation.success) {
      return fail(toError('Invalid props', validation.error));
    }

    const props = normalizeProps(input);
    let localizations: AgendaLocalizations;
    try {
      localizations = resolveLocalizations(props.locale, props.localizations);
    } catch (error) {
      return fail(error instanceof Error ? error : new Error(String(error)));
    }

    return ok(new AgendaView(ctx, props, localizations));
  }

  /**
   * Private constructor - use AgendaView.create() instead
   */
  private constructor(ctx: DrawingContext, props: AgendaProps, localizations: AgendaLocalizations) {
    this.props = props;
    this.localizations = localizations;

    this.renderer = new CanvasRenderer(ctx, { width: props.width, height: props.height }, {
      ...DEFAULT_THEME,
      ...props.theme,
    });
    this.agendaRenderer = new AgendaRenderer(this.renderer, this.rendererConfig());
    this.layoutEngine = new LayoutEngine();
    this.accessibility = new AccessibilityLayer(this.accessibilityConfig());
    this.hitTester = new HitTester();

    this.relayout();
  }

  /**
   * Apply changed props. Runs the diff once and performs the work it asks for.
   * @returns The work that was done, or the validation error (props left unchanged)
   */
  update(changes: Partial<AgendaProps>): Result<AgendaUpdate, Error> {
    if (this.destroyed) {
      return fail(new Error('AgendaView has been destroyed'));
    }

    const validation = validateProps(changes);
    if (!validation.success) {
      const rejected = validation.error.filter(e => e.field.startsWith('appointments'));
      if (rejected.length > 0) {
        console.warn(`AgendaView: rejected ${rejected.length} appointment field(s)`, rejected);
      }
      return fail(toError('Invalid props', validation.error));
    }

    // Explicit undefined on a defaulted prop restores its default
    const next = normalizeProps({ ...this.props, ...changes });
    let localizations = this.localizations;
    if (next.locale !== this.props.locale || next.localizations !== this.props.localizations) {
      try {
        localizations = resolveLocalizations(next.locale, next.localizations);
      } catch (error) {
        return fail(error instanceof Error ? error : new Error(String(error)));
      }
    }

    const decision = diffAgendaProps(this.props, next);
    this.props = next;
    this.localizations = localizations;

    if (decision === AgendaUpdate.None) {
      return ok(decision);
    }

    this.renderer.setTheme({ ...DEFAULT_THEME, ...next.theme });
    this.agendaRenderer.updateConfig(this.rendererConfig());
    this.accessibility.updateConfig(this.accessibilityConfig());

    if (decision === AgendaUpdate.Relayout) {
      this.relayout();
    } else {
      this.repaint();
    }

    return ok(decision);
  }

  /**
   * Lay out slots, pick the paint strategy, then paint
   */
  private relayout(): void {
    const { appointmentItemHeight, allDayItemHeight } = resolveItemHeights(this.props.viewSettings);
    this.renderer.resize(this.props.width, this.props.height);

    this.slots = this.layoutEngine.computeSlots(this.props.appointments, this.props.selectedDate, {
      width: this.props.width,
      height: this.props.height,
      appointmentItemHeight,
      allDayItemHeight,
      wideLayout: this.props.wideLayout,
    });

    this.strategy = this.chooseStrategy();
    this.hitTester.updateLayout(
      this.slots,
      this.strategy.kind === 'builder' ? this.strategy.children : []
    );
    this.repaint();
  }

  private chooseStrategy(): PaintStrategy {
    const builder = this.props.appointmentBuilder;
    const date = this.props.selectedDate;
    if (!builder || date === null || this.slots.length === 0) {
      return { kind: 'default' };
    }

    const children: AgendaChild[] = [];
    for (const view of this.slots) {
      if (!view.appointment || !view.bounds) continue;
      const { x, y, width, height } = view.bounds;
      children.push({
        view,
        content: builder({ date, appointments: [view.appointment], bounds: { x, y, width, height } }),
      });
    }
    return { kind: 'builder', children };
  }

  /**
   * Paint with the current strategy and refresh semantics
   */
  private repaint(): void {
    if (this.strategy.kind === 'builder') {
      this.agendaRenderer.renderChildren(this.strategy.children);
    } else {
      this.agendaRenderer.render({
        selectedDate: this.props.selectedDate,
        slots: this.slots,
        size: this.renderer.getSize(),
        textScaleFactor: this.props.textScaleFactor,
        locale: this.props.locale,
        localizations: this.localizations,
        appointmentTimeTextFormat: this.props.appointmentTimeTextFormat,
        formatDate: this.props.formatDate ?? defaultFormatDate,
      });
    }

    this.accessibility.update({
      selectedDate: this.props.selectedDate,
      slots: this.slots,
      size: this.renderer.getSize(),
      localizations: this.localizations,
    });
  }

  private rendererConfig(): Partial<AgendaRendererConfig> {
    return {
      appointmentFont: this.props.appointmentFont ?? DEFAULT_APPOINTMENT_FONT,
      placeholderFont: this.props.placeholderFont ?? DEFAULT_PLACEHOLDER_FONT,
    };
  }

  private accessibilityConfig(): AccessibilityConfig {
    return {
      describeAppointment: this.props.describeAppointment,
      formatDate: this.props.formatDate ?? defaultFormatDate,
      locale: this.props.locale,
      textDirection: this.props.textDirection,
    };
  }

  /**
   * Force a repaint with the current layout
   */
  render(): void {
    if (this.destroyed) return;
    this.repaint();
  }

  /**
   * Occupied slots in paint order
   */
  getSlots(): readonly AppointmentView[] {
    return this.slots;
  }

  /**
   * Semantics nodes of the last paint
   */
  getSemanticsNodes(): readonly SemanticsNode[] {
    return this.accessibility.getNodes();
  }

  /**
   * Builder children of the current layout (empty on the default paint path)
   */
  getChildren(): readonly AgendaChild[] {
    return this.strategy.kind === 'builder' ? this.strategy.children : [];
  }

  /**
   * Current props
   */
  getProps(): Readonly<AgendaProps> {
    return this.props;
  }

  /**
   * Number of slots the layout engine has allocated so far
   */
  getAllocatedSlotCount(): number {
    return this.layoutEngine.getAllocatedSlotCount();
  }

  /**
   * Row at a surface point
   */
  hitTest(point: Point): HitTestResult {
    return this.hitTester.hitTest(point);
  }

  /**
   * Drop slots, children and pooled semantics handles
   */
  destroy(): void {
    this.destroyed = true;
    this.accessibility.destroy();
    this.hitTester.clear();
    this.layoutEngine.reset();
    this.slots = [];
    this.strategy = { kind: 'default' };
  }
}
