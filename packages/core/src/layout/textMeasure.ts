/**
 * packages/core/src/layout/textMeasure.ts — Monospace text measurement.
 *
 * Why: Layout needs an intrinsic size for every text run, and selection needs
 * to map a point back to a character offset. Both go through the same line
 * breaking so a selected offset always lands where the run was drawn.
 *
 * Rules:
 *   - one column per UTF-16 code unit, `charWidth` px per column
 *   - `\n` is a hard break
 *   - with a width limit, lines break greedily at the last space that fits
 *     (the space is consumed); a word longer than the line is split
 *   - an empty run is one empty line tall
 */

import type { FontMetrics, Point, Size } from "../tree/types.js";
import type { TextMeasurer } from "./types.js";

/** One laid-out line: `[start, end)` into the source text. */
export type TextLine = Readonly<{ start: number; end: number; width: number }>;

function maxColumns(charWidth: number, maxWidth: number | undefined): number {
  if (maxWidth === undefined || !Number.isFinite(maxWidth) || charWidth <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.max(1, Math.floor(maxWidth / charWidth));
}

function pushLine(out: TextLine[], start: number, end: number, charWidth: number): void {
  out.push(Object.freeze({ start, end, width: (end - start) * charWidth }));
}

/** Break `text` into lines under a width limit. */
export function wrapText(
  text: string,
  charWidth: number,
  maxWidth: number | undefined,
): readonly TextLine[] {
  const cols = maxColumns(charWidth, maxWidth);
  const out: TextLine[] = [];

  let hardStart = 0;
  while (hardStart <= text.length) {
    const nl = text.indexOf("\n", hardStart);
    const hardEnd = nl < 0 ? text.length : nl;

    let pos = hardStart;
    while (hardEnd - pos > cols) {
      const limit = pos + cols;
      const space = text.lastIndexOf(" ", limit);
      if (space > pos) {
        pushLine(out, pos, space, charWidth);
        pos = space + 1;
      } else {
        pushLine(out, pos, limit, charWidth);
        pos = limit;
      }
    }
    pushLine(out, pos, hardEnd, charWidth);

    if (nl < 0) break;
    hardStart = nl + 1;
  }

  return out;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

export const monospaceTextMeasurer: TextMeasurer = Object.freeze({
  measure(text: string, font: FontMetrics, maxWidth: number | undefined): Size {
    const lines = wrapText(text, font.charWidth, maxWidth);
    let w = 0;
    for (const line of lines) if (line.width > w) w = line.width;
    return { w, h: lines.length * font.lineHeight };
  },

  offsetAt(text: string, font: FontMetrics, maxWidth: number | undefined, point: Point): number {
    const lines = wrapText(text, font.charWidth, maxWidth);
    const row =
      font.lineHeight > 0 ? Math.min(Math.max(Math.floor(point.y / font.lineHeight), 0), lines.length - 1) : 0;
    const line = lines[row];
    if (!line) return 0;
    const col = font.charWidth > 0 ? Math.round(point.x / font.charWidth) : 0;
    let offset = line.start + Math.min(Math.max(col, 0), line.end - line.start);
    // Never split a surrogate pair.
    if (offset < line.end && isLowSurrogate(text.charCodeAt(offset))) offset++;
    return offset;
  },
});
