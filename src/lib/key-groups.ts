/**
 * Key grouping. Splits a range into clusters that render as one stacked unit.
 *
 * Accidentals are drawn as an overlay row above the naturals, so each cluster
 * is a run of naturals with the black keys that sit between them. A cluster
 * ends wherever two naturals touch with no black key in between (E–F, B–C):
 *
 *   C C♯ D D♯ E | F F♯ G G♯ A A♯ B | C
 */

import type { NotePosition } from './note-position';
import type { NoteRange } from './note-range';

export type RenderGroup = readonly NotePosition[];

/** Swap every accidental for its alternative spelling. Order is unchanged. */
export function respell(
  positions: readonly NotePosition[],
  useAlternativeAccidentals: boolean,
): NotePosition[] {
  if (!useAlternativeAccidentals) return [...positions];
  return positions.map((p) => p.alternativeAccidental ?? p);
}

/**
 * Partition `positions` into render groups. Concatenating the result gives
 * back the (respelled) input in order.
 */
export function groupKeys(
  positions: readonly NotePosition[],
  useAlternativeAccidentals = false,
): RenderGroup[] {
  const spelled = respell(positions, useAlternativeAccidentals);
  const groups: NotePosition[][] = [];
  let current: NotePosition[] = [];

  spelled.forEach((position, i) => {
    if (i > 0 && position.isNatural && spelled[i - 1].isNatural) {
      groups.push(current);
      current = [];
    }
    current.push(position);
  });

  if (current.length > 0) groups.push(current);
  return groups;
}

/**
 * Holds the groups for one (range, spelling) pair and recomputes only when
 * that pair changes. Layout passes hit the cache. The groups handed out are
 * frozen, since every caller shares them.
 */
export class KeyGroupCache {
  private key: { range: NoteRange; useAlternativeAccidentals: boolean } | null = null;
  private groups: readonly RenderGroup[] = [];

  get(range: NoteRange, useAlternativeAccidentals: boolean): readonly RenderGroup[] {
    const key = this.key;
    if (
      key === null ||
      key.useAlternativeAccidentals !== useAlternativeAccidentals ||
      !key.range.equals(range)
    ) {
      this.groups = Object.freeze(
        groupKeys(range.allPositions, useAlternativeAccidentals).map((group) => Object.freeze(group)),
      );
      this.key = { range, useAlternativeAccidentals };
    }
    return this.groups;
  }

  invalidate(): void {
    this.key = null;
    this.groups = [];
  }
}
