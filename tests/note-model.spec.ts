import { describe, test, expect } from 'vitest';
import { Accidental, NotePosition, diatonicStep } from '../src/lib/note-position';
import { Clef, NoteRange } from '../src/lib/note-range';

const n = (name: string): NotePosition => {
  const position = NotePosition.parse(name);
  if (!position) throw new Error(`bad test note ${name}`);
  return position;
};

describe('NotePosition', () => {
  test('parses ASCII and glyph spellings alike', () => {
    expect(n('C#4').equals(n('C♯4'))).toBe(true);
    expect(n('Db4').equals(n('D♭4'))).toBe(true);
    expect(n('c4').name).toBe('C4');
  });

  test('rejects names without an octave or with double accidentals', () => {
    expect(NotePosition.parse('C')).toBeNull();
    expect(NotePosition.parse('C##4')).toBeNull();
    expect(NotePosition.parse('H4')).toBeNull();
    expect(NotePosition.parse('')).toBeNull();
  });

  test('display names use sharp and flat glyphs', () => {
    expect(new NotePosition('C', 4, Accidental.Sharp).name).toBe('C♯4');
    expect(new NotePosition('D', 4, Accidental.Flat).name).toBe('D♭4');
    expect(new NotePosition('G', 2).name).toBe('G2');
  });

  test('alternative accidental swaps sharp and flat spelling of one key', () => {
    expect(n('C♯4').alternativeAccidental?.name).toBe('D♭4');
    expect(n('D♭4').alternativeAccidental?.name).toBe('C♯4');
    expect(n('A♯2').alternativeAccidental?.name).toBe('B♭2');
    expect(n('E4').alternativeAccidental).toBeNull();
  });

  test('enharmonic pair shares a key number but is not equal', () => {
    const sharp = n('C♯4');
    const flat = n('D♭4');
    expect(sharp.midi).toBe(61);
    expect(flat.midi).toBe(61);
    expect(sharp.equals(flat)).toBe(false);
    expect(sharp.compareTo(flat)).toBeLessThan(0);
  });

  test('natural strips the accidental', () => {
    expect(n('F♯3').natural.name).toBe('F3');
    expect(n('B♭3').natural.name).toBe('B3');
    const g = n('G4');
    expect(g.natural).toBe(g);
  });

  test('middle C is C4', () => {
    expect(NotePosition.middleC.name).toBe('C4');
    expect(NotePosition.middleC.midi).toBe(60);
  });

  test('diatonicStep walks letters across octave boundaries', () => {
    expect(diatonicStep(n('E4'), -4).name).toBe('A3');
    expect(diatonicStep(n('F5'), 4).name).toBe('C6');
    expect(diatonicStep(n('C4'), -1).name).toBe('B3');
  });
});

describe('NoteRange', () => {
  test('one octave lists naturals interleaved with sharps', () => {
    const range = new NoteRange(n('C4'), n('C5'));
    expect(range.allPositions.map((p) => p.name)).toEqual([
      'C4', 'C♯4', 'D4', 'D♯4', 'E4', 'F4', 'F♯4', 'G4', 'G♯4', 'A4', 'A♯4', 'B4', 'C5',
    ]);
    expect(range.naturalPositions.map((p) => p.name)).toEqual([
      'C4', 'D4', 'E4', 'F4', 'G4', 'A4', 'B4', 'C5',
    ]);
  });

  test('allPositions returns a fresh array each time', () => {
    const range = new NoteRange(n('C4'), n('E4'));
    const first = range.allPositions;
    first.reverse();
    expect(range.allPositions[0].name).toBe('C4');
  });

  test('treble staff spans E4 to F5', () => {
    const range = NoteRange.forClefs([Clef.Treble]);
    expect(range.toString()).toBe('E4–F5');
    expect(range.naturalPositions).toHaveLength(9);
  });

  test('extended clefs add two ledger lines each side', () => {
    expect(NoteRange.forClefs([Clef.Treble], { extended: true }).toString()).toBe('A3–C6');
    expect(NoteRange.forClefs([Clef.Bass], { extended: true }).toString()).toBe('C2–E4');
    expect(NoteRange.forClefs([Clef.Alto], { extended: true }).toString()).toBe('B2–D5');
  });

  test('several clefs cover the union of their staves', () => {
    expect(NoteRange.forClefs([Clef.Treble, Clef.Bass]).toString()).toBe('G2–F5');
  });

  test('no clefs and inverted bounds give an empty range', () => {
    expect(NoteRange.forClefs([]).isEmpty).toBe(true);
    expect(NoteRange.forClefs([]).allPositions).toEqual([]);
    expect(new NoteRange(n('D4'), n('C4')).allPositions).toEqual([]);
  });

  test('contains goes by key, so either spelling of a shown accidental is inside', () => {
    const range = new NoteRange(n('C4'), n('C5'));
    expect(range.contains(n('C4'))).toBe(true);
    expect(range.contains(n('C5'))).toBe(true);
    expect(range.contains(n('D♭4'))).toBe(true);
    expect(range.contains(n('B3'))).toBe(false);
    expect(range.contains(n('C♯5'))).toBe(false);
    expect(NoteRange.forClefs([]).contains(NotePosition.middleC)).toBe(false);
  });

  test('equality compares bounds', () => {
    expect(new NoteRange(n('C4'), n('C5')).equals(new NoteRange(n('C4'), n('C5')))).toBe(true);
    expect(new NoteRange(n('C4'), n('C5')).equals(new NoteRange(n('C4'), n('B4')))).toBe(false);
  });
});
