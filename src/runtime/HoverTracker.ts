import type { Point } from '../engine/types';

/** What the host should do with its tooltip after a pointer event. */
export type TooltipChange =
  | { kind: 'show'; text: string }
  | { kind: 'hide' }
  | { kind: 'none' };

/**
 * Remembers which tooltip is on screen so the host only re-shows it when the
 * text changes and only hides it once.
 */
export class HoverTracker {
  private current = '';
  private readonly lookup: (point: Point) => string | null;

  /** @param lookup - Tooltip text at a point, usually simulation.tooltipAt */
  constructor(lookup: (point: Point) => string | null) {
    this.lookup = lookup;
  }

  get text(): string { return this.current; }

  move(point: Point): TooltipChange {
    const text = this.lookup(point) ?? '';
    if (text) {
      if (text === this.current) return { kind: 'none' };
      this.current = text;
      return { kind: 'show', text };
    }
    return this.leave();
  }

  /** Pointer left the panel. */
  leave(): TooltipChange {
    if (!this.current) return { kind: 'none' };
    this.current = '';
    return { kind: 'hide' };
  }
}
