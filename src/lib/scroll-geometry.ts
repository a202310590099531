/**
 * Scroll geometry for the key strip.
 *
 * Only naturals take up horizontal space; accidentals float over the seams
 * between them. Every offset is therefore computed on the natural-key grid.
 */

import type { NotePosition } from './note-position';

/** Width the strip leaves free when keys are sized to fit (border allowance). */
export const KEY_STRIP_MARGIN = 2;

export interface ScrollTarget {
  target: NotePosition;
  naturals: readonly NotePosition[];
  keyWidth: number;
  viewportWidth: number;
}

function isMeasured(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Width of one natural key. An explicit width wins; otherwise the whole range
 * is squeezed into the viewport. 0 while nothing has been measured.
 */
export function keyWidthFor(
  viewportWidth: number,
  naturalCount: number,
  explicitWidth: number | null = null,
): number {
  if (explicitWidth !== null && isMeasured(explicitWidth)) return explicitWidth;
  if (naturalCount <= 0 || !isMeasured(viewportWidth)) return 0;
  return Math.max(0, (viewportWidth - KEY_STRIP_MARGIN) / naturalCount);
}

/**
 * Offset that centres `target` in the viewport. Accidentals scroll to their
 * natural. Targets outside `naturals`, or unknown metrics, give 0.
 *
 * The result is not clamped: it may be negative or past the end of the strip.
 */
export function scrollOffsetFor({ target, naturals, keyWidth, viewportWidth }: ScrollTarget): number {
  if (!isMeasured(keyWidth) || !isMeasured(viewportWidth)) return 0;
  const natural = target.natural;
  const index = naturals.findIndex((p) => p.equals(natural));
  if (index < 0) return 0;
  return index * keyWidth + keyWidth / 2 - viewportWidth / 2;
}

export function contentWidthFor(naturalCount: number, keyWidth: number): number {
  return Math.max(0, naturalCount) * Math.max(0, keyWidth);
}

/** Clamp to what a scroll surface of `viewportWidth` over `contentWidth` can show. */
export function clampScrollOffset(offset: number, contentWidth: number, viewportWidth: number): number {
  const maxOffset = Math.max(0, contentWidth - viewportWidth);
  return Math.max(0, Math.min(offset, maxOffset));
}
