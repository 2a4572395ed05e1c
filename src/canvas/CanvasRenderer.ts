/**
 * Canvas Renderer - Low-level drawing primitives and utilities
 */

import type { Rect, Color, FontSpec, AgendaTheme, DrawingContext, Size } from './types';
import { DEFAULT_THEME } from './LayoutEngine';

/**
 * Convert FontSpec to CSS font string
 */
export function fontToString(font: FontSpec): string {
  const style = font.style ?? 'normal';
  const weight = font.weight ?? 400;
  return `${style} ${weight} ${font.size}px ${font.family}`;
}

/**
 * CanvasRenderer provides low-level drawing primitives over a 2D context
 */
export class CanvasRenderer {
  private ctx: DrawingContext;
  private size: Size;
  private theme: AgendaTheme;

  constructor(
    ctx: DrawingContext,
    size: Size,
    theme: Partial<AgendaTheme> = {}
  ) {
    this.ctx = ctx;
    this.size = { ...size };
    this.theme = { ...DEFAULT_THEME, ...theme };
  }

  /**
   * Update the logical surface size
   */
  resize(width: number, height: number): void {
    this.size = { width, height };
  }

  /**
   * Get logical dimensions
   */
  getSize(): Size {
    return { ...this.size };
  }

  /**
   * Get the raw context for advanced operations
   */
  getContext(): DrawingContext {
    return this.ctx;
  }

  /**
   * Get theme
   */
  getTheme(): AgendaTheme {
    return this.theme;
  }

  /**
   * Update theme
   */
  setTheme(theme: Partial<AgendaTheme>): void {
    this.theme = { ...this.theme, ...theme };
  }

  /**
   * Clear the entire surface
   */
  clear(): void {
    this.ctx.clearRect(0, 0, this.size.width, this.size.height);
  }

  save(): void {
    this.ctx.save();
  }

  restore(): void {
    this.ctx.restore();
  }

  /**
   * Set clipping region
   */
  clip(rect: Rect): void {
    this.ctx.beginPath();
    this.ctx.rect(rect.x, rect.y, Math.max(0, rect.width), Math.max(0, rect.height));
    this.ctx.clip();
  }

  /**
   * Translate canvas origin
   */
  translate(x: number, y: number): void {
    this.ctx.translate(x, y);
  }

  // ==================== Drawing Primitives ====================

  /**
   * Fill a rounded rectangle
   */
  fillRoundedRect(rect: Rect, color: Color, radius: number): void {
    this.ctx.fillStyle = color;
    this.roundedRectPath(rect, radius);
    this.ctx.fill();
  }

  /**
   * Create rounded rectangle path
   */
  private roundedRectPath(rect: Rect, radius: number): void {
    const { x, y } = rect;
    const width = Math.max(0, rect.width);
    const height = Math.max(0, rect.height);
    const r = Math.max(0, Math.min(radius, width / 2, height / 2));

    this.ctx.beginPath();
    this.ctx.moveTo(x + r, y);
    this.ctx.lineTo(x + width - r, y);
    this.ctx.quadraticCurveTo(x + width, y, x + width, y + r);
    this.ctx.lineTo(x + width, y + height - r);
    this.ctx.quadraticCurveTo(x + width, y + height, x + width - r, y + height);
    this.ctx.lineTo(x + r, y + height);
    this.ctx.quadraticCurveTo(x, y + height, x, y + height - r);
    this.ctx.lineTo(x, y + r);
    this.ctx.quadraticCurveTo(x, y, x + r, y);
    this.ctx.closePath();
  }

  // ==================== Text Rendering ====================

  /**
   * Set font for text rendering
   */
  setFont(font: FontSpec): void {
    this.ctx.font = fontToString(font);
  }

  /**
   * Measure text width with the current font
   */
  measureWidth(text: string): number {
    return this.ctx.measureText(text).width;
  }

  /**
   * Draw text with basic positioning
   */
  drawText(
    text: string,
    x: number,
    y: number,
    color: Color,
    align: CanvasTextAlign = 'left',
    baseline: CanvasTextBaseline = 'top'
  ): void {
    this.ctx.fillStyle = color;
    this.ctx.textAlign = align;
    this.ctx.textBaseline = baseline;
    this.ctx.fillText(text, x, y);
  }
}
