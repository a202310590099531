/**
 * Note positions: a single piano key named by letter, octave and accidental.
 *
 * Pitch arithmetic and enharmonic spelling come from Tonal.js, which works in
 * ASCII notation (`C#4`, `Db4`). Display names use the ♯ / ♭ glyphs, the same
 * spelling the physical key table is written in.
 */

import { Note } from 'tonal';

export type NoteLetter = 'C' | 'D' | 'E' | 'F' | 'G' | 'A' | 'B';

export const Accidental = {
  None: 'none',
  Sharp: 'sharp',
  Flat: 'flat',
} as const;

export type Accidental = (typeof Accidental)[keyof typeof Accidental];

/** Diatonic letter order within an octave (C-based, like octave numbering). */
export const NOTE_LETTERS: readonly NoteLetter[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];

// \u266F = ♯, \u266D = ♭
const GLYPHS: Record<Accidental, string> = { none: '', sharp: '\u266F', flat: '\u266D' };
const ASCII: Record<Accidental, string> = { none: '', sharp: '#', flat: 'b' };

const ACCIDENTAL_BY_ASCII: Record<string, Accidental> = {
  '': Accidental.None,
  '#': Accidental.Sharp,
  b: Accidental.Flat,
};

const LETTER_SET: ReadonlySet<string> = new Set<string>(NOTE_LETTERS);

function isNoteLetter(value: string): value is NoteLetter {
  return LETTER_SET.has(value);
}

export class NotePosition {
  static readonly middleC = new NotePosition('C', 4);

  constructor(
    readonly note: NoteLetter,
    readonly octave: number,
    readonly accidental: Accidental = Accidental.None,
  ) {}

  /**
   * Parse a note name such as `C4`, `c#4`, `C♯4`, `Db4` or `D♭4`.
   * Returns null for anything that is not a single-accidental scientific
   * pitch name.
   */
  static parse(input: string): NotePosition | null {
    const ascii = input.trim().replace(/\u266F/g, '#').replace(/\u266D/g, 'b');
    const parsed = Note.get(ascii);
    if (parsed.empty || parsed.oct === undefined) return null;
    const accidental = ACCIDENTAL_BY_ASCII[parsed.acc];
    if (accidental === undefined || !isNoteLetter(parsed.letter)) return null;
    return new NotePosition(parsed.letter, parsed.oct, accidental);
  }

  /** Sharp spelling by default, matching the layout of the physical key table. */
  static fromMidi(midi: number, preferFlats = false): NotePosition | null {
    const name = preferFlats ? Note.fromMidi(midi) : Note.fromMidiSharps(midi);
    return name ? NotePosition.parse(name) : null;
  }

  /** Display name, e.g. `C♯4`. Press state and the key table are keyed by it. */
  get name(): string {
    return `${this.note}${GLYPHS[this.accidental]}${this.octave}`;
  }

  /** Tonal.js notation, e.g. `C#4`. */
  get pitchName(): string {
    return `${this.note}${ASCII[this.accidental]}${this.octave}`;
  }

  get midi(): number {
    return Note.midi(this.pitchName) ?? Number.NaN;
  }

  get isNatural(): boolean {
    return this.accidental === Accidental.None;
  }

  /** The white key this position sits on (or next to). */
  get natural(): NotePosition {
    return this.isNatural ? this : new NotePosition(this.note, this.octave);
  }

  /**
   * Same physical key under the other accidental (C♯4 ↔ D♭4).
   * Naturals have no alternative.
   */
  get alternativeAccidental(): NotePosition | null {
    if (this.isNatural) return null;
    return NotePosition.parse(Note.enharmonic(this.pitchName));
  }

  /** Diatonic index: letters counted from C0. */
  get diatonicIndex(): number {
    return this.octave * 7 + NOTE_LETTERS.indexOf(this.note);
  }

  equals(other: NotePosition | null | undefined): boolean {
    return (
      other != null &&
      other.note === this.note &&
      other.octave === this.octave &&
      other.accidental === this.accidental
    );
  }

  /** Orders by pitch; enharmonic pairs order by letter (C♯4 before D♭4). */
  compareTo(other: NotePosition): number {
    return this.midi - other.midi || this.diatonicIndex - other.diatonicIndex;
  }

  toString(): string {
    return this.name;
  }
}

/** Natural note `steps` letters above (or below, when negative) `position`. */
export function diatonicStep(position: NotePosition, steps: number): NotePosition {
  const index = position.diatonicIndex + steps;
  const octave = Math.floor(index / 7);
  return new NotePosition(NOTE_LETTERS[index - octave * 7], octave);
}
