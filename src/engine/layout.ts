/**
 * Brick Layout Pipeline
 *
 * Converts an ordered listing of source lines into a brick field.
 *
 * Pipeline: DisplayLine[] -> layoutBricks -> LayoutResult
 *   1. Rotate the listing so it starts at the anchor line, keep maxLines
 *   2. Allocate one row per line until the vertical space runs out
 *   3. Split each line into alternating non-space / space runs
 *   4. Walk a cursor left to right; every non-space run becomes a brick,
 *      and the first run that would cross the right edge ends the row
 *
 * The result is rebuilt from scratch on every call. No diffing against a
 * previous layout.
 */

import type { Brick, DisplayLine, FontMetrics, LayoutResult, RenderLine, Viewport } from './types';
import { LAYOUT } from './constants';
import { lineHeightFor } from './metrics';
import { rect } from './rect';

/** Matches either a run of non-whitespace or a run of whitespace. */
const TOKEN_RE = /\S+|\s+/g;

export interface LayoutOptions {
  maxLines: number;
  viewport: Viewport;
  metrics: FontMetrics;
}

/**
 * Rotate `items` to start at `anchorIndex`, wrapping around, and keep at
 * most `limit` entries. An out-of-range anchor is treated as 0.
 */
export function rotateFromAnchor<T>(items: readonly T[], anchorIndex: number, limit: number): T[] {
  const n = items.length;
  if (n === 0) return [];

  const anchor = Number.isInteger(anchorIndex) && anchorIndex >= 0 && anchorIndex < n ? anchorIndex : 0;
  const count = Math.min(Math.max(0, limit), n);

  const out: T[] = [];
  for (let i = 0; i < count; i++) {
    out.push(items[(anchor + i) % n]);
  }
  return out;
}

/**
 * Split a line into tokens. Joining the tokens gives back the line exactly.
 */
export function tokenizeLine(text: string): string[] {
  return text.match(TOKEN_RE) ?? [];
}

/** True for tokens that become bricks. */
export function isBrickToken(token: string): boolean {
  return token.trim().length > 0;
}

/** Number of rows that fit in the code area. Always at least 1. */
export function maxVisibleRows(viewportHeight: number, lineHeight: number): number {
  const available = viewportHeight - LAYOUT.codeTop - LAYOUT.codeBottomMargin;
  return Math.max(1, Math.floor(available / lineHeight));
}

/** Gutter text for a line number, right-aligned. */
export function gutterLabel(lineNumber: number): string {
  return String(lineNumber).padStart(LAYOUT.gutterColumns, ' ');
}

/**
 * Lay out bricks for the given listing.
 *
 * @param lines - Listing in source order
 * @param anchorIndex - Index into `lines` the field should start from
 * @param options - Line cap, effective viewport and font metrics
 * @returns Bricks in row-major order and one gutter row per visible line
 */
export function layoutBricks(
  lines: readonly DisplayLine[],
  anchorIndex: number,
  options: LayoutOptions,
): LayoutResult {
  const { viewport, metrics } = options;
  const lineHeight = lineHeightFor(metrics, LAYOUT.lineLeading, LAYOUT.minLineHeight);
  const rows = rotateFromAnchor(lines, anchorIndex, options.maxLines)
    .slice(0, maxVisibleRows(viewport.height, lineHeight));

  const codeLeft = LAYOUT.codeLeft;
  const codeRight = viewport.width - LAYOUT.codeRightMargin;

  const bricks: Brick[] = [];
  const renderLines: RenderLine[] = [];

  rows.forEach((line, row) => {
    const top = LAYOUT.codeTop + row * lineHeight;
    renderLines.push({
      lineNumber: line.lineNumber,
      baselineY: top + metrics.ascent,
      label: gutterLabel(line.lineNumber),
    });

    let x = codeLeft;
    for (const token of tokenizeLine(line.text)) {
      const width = Math.max(1, metrics.measure(token));
      // The token at the left margin is always placed
      if (x + width > codeRight && x > codeLeft) break;

      if (isBrickToken(token)) {
        bricks.push({
          id: bricks.length,
          rect: rect(x, top, width, lineHeight),
          label: token,
          sourceText: line.text,
          lineNumber: line.lineNumber,
          alive: true,
        });
      }
      x += width;
    }
  });

  return { bricks, renderLines };
}
