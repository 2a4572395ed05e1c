/**
 * Canvas Agenda Module
 *
 * Layout, painting, semantics and hit testing of the agenda surface.
 * The main component is AgendaView from the parent module.
 */

// Types
export type {
  Rect,
  RoundedRect,
  Point,
  Size,
  Color,
  FontSpec,
  DrawingContext,
  SemanticsNode,
  AgendaLayoutConfig,
  HitTestResult,
  AgendaTheme,
  AppointmentBuilderDetails,
  AppointmentContent,
  AppointmentBuilder,
  AgendaChild,
} from './types';
export { AppointmentView } from './types';

// Layout engine
export { LayoutEngine, DEFAULT_THEME, getCornerRadius, getItemHeight, pointInRect } from './LayoutEngine';

// Renderers
export { CanvasRenderer, fontToString } from './CanvasRenderer';
export { TextRenderer, type TextLayout, type TextLine, type TextLayoutOptions } from './TextRenderer';
export {
  AgendaRenderer,
  getTextSize,
  getMaxLines,
  getSpanText,
  type AgendaRendererConfig,
  type AgendaPaintState,
} from './AgendaRenderer';

// Interaction
export { HitTester } from './HitTester';

// Accessibility
export { AccessibilityLayer, type AccessibilityConfig, type SemanticsState } from './AccessibilityLayer';
