import type { DrawingContext } from '../canvas/types';

/** Width every character measures in the recording context */
export const CHAR_WIDTH = 7;

export interface RecordedCall {
  op: string;
  args: (string | number)[];
  fillStyle: string;
  font: string;
}

export interface RecordedText {
  text: string;
  x: number;
  y: number;
  fillStyle: string;
  font: string;
}

/**
 * In-process stand-in for a 2D canvas context.
 * Records every call; text measures CHAR_WIDTH per character whatever the font.
 */
export class RecordingContext implements DrawingContext {
  font: string = '10px sans-serif';
  fillStyle: string | CanvasGradient | CanvasPattern = '#000000';
  textAlign: CanvasTextAlign = 'start';
  textBaseline: CanvasTextBaseline = 'alphabetic';

  readonly calls: RecordedCall[] = [];

  private record(op: string, ...args: (string | number)[]): void {
    this.calls.push({
      op,
      args,
      fillStyle: typeof this.fillStyle === 'string' ? this.fillStyle : '',
      font: this.font,
    });
  }

  save(): void { this.record('save'); }
  restore(): void { this.record('restore'); }
  translate(x: number, y: number): void { this.record('translate', x, y); }
  beginPath(): void { this.record('beginPath'); }
  rect(x: number, y: number, width: number, height: number): void { this.record('rect', x, y, width, height); }
  clip(): void { this.record('clip'); }
  moveTo(x: number, y: number): void { this.record('moveTo', x, y); }
  lineTo(x: number, y: number): void { this.record('lineTo', x, y); }
  quadraticCurveTo(cpx: number, cpy: number, x: number, y: number): void {
    this.record('quadraticCurveTo', cpx, cpy, x, y);
  }
  closePath(): void { this.record('closePath'); }
  fill(): void { this.record('fill'); }
  clearRect(x: number, y: number, width: number, height: number): void {
    this.record('clearRect', x, y, width, height);
  }
  fillText(text: string, x: number, y: number): void { this.record('fillText', text, x, y); }

  measureText(text: string): { width: number } {
    return { width: text.length * CHAR_WIDTH };
  }

  /**
   * Every fillText call, in order
   */
  texts(): RecordedText[] {
    return this.calls
      .filter(call => call.op === 'fillText')
      .map(call => ({
        text: String(call.args[0]),
        x: Number(call.args[1]),
        y: Number(call.args[2]),
        fillStyle: call.fillStyle,
        font: call.font,
      }));
  }

  /**
   * Fill styles of every fill() call, in order
   */
  fills(): string[] {
    return this.calls.filter(call => call.op === 'fill').map(call => call.fillStyle);
  }

  /**
   * Calls with the given operation name
   */
  ops(op: string): RecordedCall[] {
    return this.calls.filter(call => call.op === op);
  }

  reset(): void {
    this.calls.length = 0;
  }
}
