import { describe, test, expect } from 'vitest';
import { NotePosition } from '../src/lib/note-position';
import { NoteRange } from '../src/lib/note-range';
import { KeyGroupCache, groupKeys } from '../src/lib/key-groups';
import type { RenderGroup } from '../src/lib/key-groups';

const n = (name: string): NotePosition => {
  const position = NotePosition.parse(name);
  if (!position) throw new Error(`bad test note ${name}`);
  return position;
};

const names = (groups: readonly RenderGroup[]): string[][] => groups.map((g) => g.map((p) => p.name));

/** Indices of the full sequence at which a group starts. */
function groupStarts(groups: readonly RenderGroup[]): number[] {
  const starts: number[] = [];
  let index = 0;
  for (const group of groups) {
    starts.push(index);
    index += group.length;
  }
  return starts;
}

describe('groupKeys', () => {
  test('one octave splits at E–F and B–C', () => {
    const groups = groupKeys(new NoteRange(n('C4'), n('C5')).allPositions);
    expect(names(groups)).toEqual([
      ['C4', 'C♯4', 'D4', 'D♯4', 'E4'],
      ['F4', 'F♯4', 'G4', 'G♯4', 'A4', 'A♯4', 'B4'],
      ['C5'],
    ]);
  });

  /**
   * @reason The renderer draws groups side by side; any dropped or reordered
   *   key would shift every key after it.
   */
  test('concatenated groups reproduce the range in order', () => {
    const positions = new NoteRange(n('A2'), n('D♯6')).allPositions;
    const groups = groupKeys(positions);
    expect(groups.flat().map((p) => p.name)).toEqual(positions.map((p) => p.name));
  });

  test('a group starts exactly where two naturals touch', () => {
    const positions = new NoteRange(n('C2'), n('C6')).allPositions;
    const expected = [0];
    for (let i = 1; i < positions.length; i++) {
      if (positions[i].isNatural && positions[i - 1].isNatural) expected.push(i);
    }
    expect(groupStarts(groupKeys(positions))).toEqual(expected);
  });

  test('accidentals stay with the natural before them', () => {
    for (const group of groupKeys(new NoteRange(n('C3'), n('B5')).allPositions)) {
      expect(group[0].isNatural).toBe(true);
    }
  });

  test('a leading accidental joins the first group', () => {
    const groups = groupKeys(new NoteRange(n('C♯4'), n('F4')).allPositions);
    expect(names(groups)).toEqual([['C♯4', 'D4', 'D♯4', 'E4'], ['F4']]);
  });

  test('empty and single-key ranges', () => {
    expect(groupKeys([])).toEqual([]);
    expect(names(groupKeys([n('C4')]))).toEqual([['C4']]);
  });

  test('alternative spelling renames accidentals without moving boundaries', () => {
    const positions = new NoteRange(n('C4'), n('C5')).allPositions;
    const sharps = groupKeys(positions, false);
    const flats = groupKeys(positions, true);

    expect(flats.map((g) => g.length)).toEqual(sharps.map((g) => g.length));
    expect(names(flats)[0]).toEqual(['C4', 'D♭4', 'D4', 'E♭4', 'E4']);
    expect(names(flats)[1]).toEqual(['F4', 'G♭4', 'G4', 'A♭4', 'A4', 'B♭4', 'B4']);
  });

  test('does not modify the input', () => {
    const positions = new NoteRange(n('C4'), n('E4')).allPositions;
    groupKeys(positions, true);
    expect(positions[1].name).toBe('C♯4');
  });
});

describe('KeyGroupCache', () => {
  test('returns the same groups while range and spelling are unchanged', () => {
    const cache = new KeyGroupCache();
    const first = cache.get(new NoteRange(n('C4'), n('C5')), false);
    const second = cache.get(new NoteRange(n('C4'), n('C5')), false);
    expect(second).toBe(first);
  });

  test('recomputes when the spelling or range changes', () => {
    const cache = new KeyGroupCache();
    const range = new NoteRange(n('C4'), n('C5'));
    const sharps = cache.get(range, false);
    const flats = cache.get(range, true);
    expect(flats).not.toBe(sharps);
    expect(flats[0][1].name).toBe('D♭4');

    const wider = cache.get(new NoteRange(n('C4'), n('C6')), true);
    expect(wider).toHaveLength(5);
  });

  test('shared groups are frozen', () => {
    const cache = new KeyGroupCache();
    const groups = cache.get(new NoteRange(n('C4'), n('C5')), false);
    expect(Object.isFrozen(groups)).toBe(true);
    expect(groups.every((group) => Object.isFrozen(group))).toBe(true);
    expect(cache.get(new NoteRange(n('C4'), n('C5')), false)[0].map((p) => p.name)).toEqual([
      'C4', 'C♯4', 'D4', 'D♯4', 'E4',
    ]);
  });

  test('invalidate forces a rebuild', () => {
    const cache = new KeyGroupCache();
    const range = new NoteRange(n('C4'), n('C5'));
    const first = cache.get(range, false);
    cache.invalidate();
    expect(cache.get(range, false)).not.toBe(first);
  });
});
