/**
 * Note ranges: the contiguous chromatic span of keys a control shows.
 */

import { NotePosition, diatonicStep } from './note-position';

export const Clef = {
  Treble: 'treble',
  Bass: 'bass',
  Alto: 'alto',
} as const;

export type Clef = (typeof Clef)[keyof typeof Clef];

/** Bottom and top line of each staff. */
const STAFF_BOUNDS: Record<Clef, [NotePosition, NotePosition]> = {
  treble: [new NotePosition('E', 4), new NotePosition('F', 5)],
  bass:   [new NotePosition('G', 2), new NotePosition('A', 3)],
  alto:   [new NotePosition('F', 3), new NotePosition('G', 4)],
};

/** Two ledger lines = four diatonic steps past the staff. */
const LEDGER_EXTENSION_STEPS = 4;

export interface ClefRangeOptions {
  /** Include two ledger lines above and below each staff. */
  extended?: boolean;
}

export class NoteRange {
  constructor(readonly low: NotePosition, readonly high: NotePosition) {}

  /** Covers every staff in `clefs`. No clefs gives an empty range. */
  static forClefs(clefs: readonly Clef[], options: ClefRangeOptions = {}): NoteRange {
    if (clefs.length === 0) return NoteRange.empty();
    const extension = options.extended ? LEDGER_EXTENSION_STEPS : 0;
    const lows = clefs.map((clef) => diatonicStep(STAFF_BOUNDS[clef][0], -extension));
    const highs = clefs.map((clef) => diatonicStep(STAFF_BOUNDS[clef][1], extension));
    const low = lows.reduce((a, b) => (b.compareTo(a) < 0 ? b : a));
    const high = highs.reduce((a, b) => (b.compareTo(a) > 0 ? b : a));
    return new NoteRange(low, high);
  }

  static empty(): NoteRange {
    return new NoteRange(NotePosition.middleC, diatonicStep(NotePosition.middleC, -1));
  }

  get isEmpty(): boolean {
    return this.low.midi > this.high.midi;
  }

  /**
   * Every key from `low` to `high` inclusive, accidentals spelled as sharps.
   * Returns a new array on each call.
   */
  get allPositions(): NotePosition[] {
    const positions: NotePosition[] = [];
    for (let midi = this.low.midi; midi <= this.high.midi; midi++) {
      const position = NotePosition.fromMidi(midi);
      if (position) positions.push(position);
    }
    return positions;
  }

  /** White keys only; they alone take up width on the strip. */
  get naturalPositions(): NotePosition[] {
    return this.allPositions.filter((p) => p.isNatural);
  }

  contains(position: NotePosition): boolean {
    return position.midi >= this.low.midi && position.midi <= this.high.midi;
  }

  equals(other: NoteRange | null | undefined): boolean {
    return other != null && this.low.equals(other.low) && this.high.equals(other.high);
  }

  toString(): string {
    return `${this.low.name}–${this.high.name}`;
  }
}
