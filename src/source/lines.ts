/**
 * Source Line Collection
 *
 * Turns whatever the host hands over (raw pseudocode or disassembly lines,
 * possibly carrying inline colour tags) into the DisplayLine listing the
 * layout consumes, and resolves which listing index the cursor points at.
 */

import type { DisplayLine } from '../engine/types';

/** A listing plus the index the brick field should start from. */
export interface SourceLines {
  lines: readonly DisplayLine[];
  anchorIndex: number;
}

/** Anything that can report the current code listing. */
export interface LineSource {
  readLines(): SourceLines;
}

// Inline colour tag bytes
const TAG_ON = '\x01';
const TAG_OFF = '\x02';
const TAG_ESCAPE = '\x03';
const TAG_INVERT = '\x04';
/** Colour code that is followed by an encoded address */
const TAG_ADDRESS_CODE = '\x28';
const ADDRESS_DIGITS = 16;

/** Strip inline colour tags and surrounding whitespace. */
export function cleanSourceLine(raw: string | null | undefined): string {
  if (!raw) return '';

  let out = '';
  let i = 0;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch === TAG_ON || ch === TAG_OFF) {
      const code = raw[i + 1];
      i += 2;
      if (ch === TAG_ON && code === TAG_ADDRESS_CODE) i += ADDRESS_DIGITS;
    } else if (ch === TAG_ESCAPE) {
      if (i + 1 < raw.length) out += raw[i + 1];
      i += 2;
    } else if (ch === TAG_INVERT) {
      i += 1;
    } else {
      out += ch;
      i += 1;
    }
  }
  return out.trim();
}

/**
 * Build a listing from raw host lines.
 *
 * Empty lines (after cleaning) are dropped; kept lines are numbered by
 * their raw position + 1. The anchor is the first kept line at or after
 * `cursorIndex`, or 0 when none is.
 *
 * @param rawLines - Lines in host order
 * @param cursorIndex - Raw index of the line under the cursor
 */
export function collectDisplayLines(rawLines: readonly string[], cursorIndex = 0): SourceLines {
  const lines: DisplayLine[] = [];
  let anchorIndex = -1;

  rawLines.forEach((raw, rawIndex) => {
    const text = cleanSourceLine(raw);
    if (!text) return;
    if (anchorIndex < 0 && rawIndex >= cursorIndex) anchorIndex = lines.length;
    lines.push({ lineNumber: rawIndex + 1, text });
  });

  return { lines, anchorIndex: Math.max(0, anchorIndex) };
}

/**
 * Index of the first address at or after `cursor`, 0 if every address is
 * before it. Used to map a cursor address onto a disassembly listing.
 */
export function anchorForAddress(addresses: readonly number[], cursor: number): number {
  const idx = addresses.findIndex((addr) => addr >= cursor);
  return idx < 0 ? 0 : idx;
}

/** A listing held in memory and replaced wholesale by the host. */
export class StaticLineSource implements LineSource {
  private current: SourceLines;

  constructor(lines: readonly DisplayLine[] = [], anchorIndex = 0) {
    this.current = { lines: [...lines], anchorIndex };
  }

  update(lines: readonly DisplayLine[], anchorIndex = 0): void {
    this.current = { lines: [...lines], anchorIndex };
  }

  readLines(): SourceLines {
    return this.current;
  }
}
