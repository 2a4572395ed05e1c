/**
 * Text Renderer - word wrapping with a line cap and ellipsis truncation
 */

import type { Color, FontSpec } from './types';
import type { CanvasRenderer } from './CanvasRenderer';

/**
 * Single laid out line
 */
export interface TextLine {
  text: string;
  width: number;
}

/**
 * Text layout information
 */
export interface TextLayout {
  lines: TextLine[];
  /** Width of the longest line */
  width: number;
  /** Height of the block; an empty text still takes one line */
  height: number;
  lineHeight: number;
  font: FontSpec;
  /** Whether text was cut to respect maxLines */
  didExceedMaxLines: boolean;
}

/**
 * Text layout options
 */
export interface TextLayoutOptions {
  maxLines?: number;
  ellipsis?: string;
  /** Line height multiplier */
  lineHeight?: number;
}

const DEFAULT_OPTIONS: Required<TextLayoutOptions> = {
  maxLines: 1,
  ellipsis: '..',
  lineHeight: 1.2,
};

/**
 * TextRenderer lays out and paints multi-line text through a CanvasRenderer
 */
export class TextRenderer {
  private renderer: CanvasRenderer;

  constructor(renderer: CanvasRenderer) {
    this.renderer = renderer;
  }

  /**
   * Height of one line of the given font
   */
  getLineHeight(font: FontSpec, lineHeight: number = DEFAULT_OPTIONS.lineHeight): number {
    return font.size * lineHeight;
  }

  /**
   * Wrap text at word boundaries within maxWidth, keeping at most maxLines lines
   */
  layoutText(
    text: string,
    maxWidth: number,
    font: FontSpec,
    options: TextLayoutOptions = {}
  ): TextLayout {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.renderer.setFont(font);

    const width = Math.max(0, maxWidth);
    const maxLines = Math.max(1, Math.floor(opts.maxLines));
    const lineHeight = this.getLineHeight(font, opts.lineHeight);

    const words = text.split(/\s+/).filter(word => word.length > 0);
    const rawLines: string[] = [];
    let currentLine = '';
    let didExceedMaxLines = false;

    for (const word of words) {
      const testLine = currentLine ? `${currentLine} ${word}` : word;

      if (currentLine && this.renderer.measureWidth(testLine) > width) {
        if (rawLines.length === maxLines - 1) {
          // currentLine is the last line we may show
          didExceedMaxLines = true;
          break;
        }
        rawLines.push(currentLine);
        currentLine = word;
      } else {
        currentLine = testLine;
      }
    }

    if (currentLine) {
      rawLines.push(currentLine);
    }

    const lines = rawLines.map((line, index) => {
      const forceEllipsis = didExceedMaxLines && index === rawLines.length - 1;
      const shown = this.truncateWithEllipsis(line, width, opts.ellipsis, forceEllipsis);
      return { text: shown, width: this.renderer.measureWidth(shown) };
    });

    return {
      lines,
      width: Math.max(0, ...lines.map(line => line.width)),
      height: Math.max(1, lines.length) * lineHeight,
      lineHeight,
      font,
      didExceedMaxLines,
    };
  }

  /**
   * Truncate text with ellipsis to fit width
   * @param force - Append the ellipsis even when the text already fits
   */
  truncateWithEllipsis(text: string, maxWidth: number, ellipsis: string = '..', force: boolean = false): string {
    if (!force && this.renderer.measureWidth(text) <= maxWidth) {
      return text;
    }

    if (this.renderer.measureWidth(text + ellipsis) <= maxWidth) {
      return text + ellipsis;
    }

    const availableWidth = maxWidth - this.renderer.measureWidth(ellipsis);
    if (availableWidth <= 0) {
      return ellipsis;
    }

    // Binary search for optimal truncation point
    let low = 0;
    let high = text.length;

    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.renderer.measureWidth(text.slice(0, mid)) <= availableWidth) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return text.slice(0, low) + ellipsis;
  }

  /**
   * Paint laid out text with its top-left corner at (x, y)
   */
  paintLayout(layout: TextLayout, x: number, y: number, color: Color): void {
    this.renderer.setFont(layout.font);
    layout.lines.forEach((line, index) => {
      this.renderer.drawText(line.text, x, y + index * layout.lineHeight, color, 'left', 'top');
    });
  }
}
