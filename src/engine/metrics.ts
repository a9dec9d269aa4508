/**
 * Monospace font metrics.
 *
 * Every character advances by the same width. Good enough for code
 * listings and fully deterministic, which the tests rely on.
 */

import type { FontMetrics } from './types';
import { DEFAULT_FONT } from './constants';

export interface MonospaceOptions {
  charWidth: number;
  height: number;
  ascent: number;
}

export function createMonospaceMetrics(options: MonospaceOptions = DEFAULT_FONT): FontMetrics {
  const { charWidth, height, ascent } = options;
  return {
    height,
    ascent,
    measure: (text: string) => text.length * charWidth,
  };
}

/** Row height for a font: the font height plus leading, never below minLineHeight. */
export function lineHeightFor(metrics: FontMetrics, leading: number, minLineHeight: number): number {
  return Math.max(minLineHeight, metrics.height + leading);
}
