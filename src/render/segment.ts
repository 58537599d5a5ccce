/**
 * Host rendering protocol.
 *
 * A renderable yields a flat stream of segments; a segment whose text is
 * `'\n'` ends the current line. Consumers (the ANSI writer, the Ink view)
 * regroup the stream with `splitLines`.
 */

import type { Style } from './style.js';

export interface Segment {
  readonly text: string;
  readonly style?: Style;
}

/** Constraints the container passes to `render` and `measure`. */
export interface RenderOptions {
  /** Maximum number of cells available on a line */
  maxWidth: number;
  /** Number of rows available, when the container knows it */
  height?: number;
}

export interface Measurement {
  minimum: number;
  maximum: number;
}

export interface Renderable {
  render(options: RenderOptions): Iterable<Segment>;
  measure(options: RenderOptions): Measurement;
}

const LINE_BREAK: Segment = Object.freeze({ text: '\n' });

export function lineBreak(): Segment {
  return LINE_BREAK;
}

export function isLineBreak(segment: Segment): boolean {
  return segment.text === '\n';
}

export function segment(text: string, style?: Style): Segment {
  return style ? { text, style } : { text };
}

/**
 * Group a segment stream into lines. A trailing partial line (no final
 * line break) is kept as its own line.
 */
export function splitLines(segments: Iterable<Segment>): Segment[][] {
  const lines: Segment[][] = [];
  let current: Segment[] = [];

  for (const seg of segments) {
    if (isLineBreak(seg)) {
      lines.push(current);
      current = [];
    } else {
      current.push(seg);
    }
  }

  if (current.length > 0) {
    lines.push(current);
  }

  return lines;
}

/** Plain text of a line, styles dropped. */
export function lineText(line: readonly Segment[]): string {
  return line.map(s => s.text).join('');
}

/** Number of terminal cells a string occupies (one per code point). */
export function cellLength(text: string): number {
  return Array.from(text).length;
}
