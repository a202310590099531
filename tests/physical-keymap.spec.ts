import { describe, test, expect } from 'vitest';
import {
  PHYSICAL_KEY_MAP,
  getAllMappedKeys,
  keyForNote,
  labelForCode,
  labelForKeyEvent,
  noteForKey,
} from '../src/lib/physical-keymap';

describe('physical key map', () => {
  test('covers C2–C6 naturals and C♯2–A♯5 sharps', () => {
    const notes = Object.keys(PHYSICAL_KEY_MAP);
    expect(notes).toHaveLength(49);
    expect(notes.filter((name) => name.includes('♯'))).toHaveLength(20);
    expect(keyForNote('C2')).toBe('1');
    expect(keyForNote('C6')).toBe('m');
    expect(keyForNote('C♯2')).toBe('!');
    expect(keyForNote('A♯5')).toBe('B');
  });

  test('labels are unique, so every pair maps back', () => {
    expect(new Set(getAllMappedKeys()).size).toBe(49);
    for (const [note, label] of Object.entries(PHYSICAL_KEY_MAP)) {
      expect(noteForKey(label)).toBe(note);
    }
  });

  test('home row around middle C', () => {
    expect(noteForKey('s')).toBe('C4');
    expect(noteForKey('S')).toBe('C♯4');
    expect(noteForKey('g')).toBe('F4');
  });

  test('unmapped names and labels give null', () => {
    expect(keyForNote('D♭4')).toBeNull();
    expect(keyForNote('C7')).toBeNull();
    expect(noteForKey('?')).toBeNull();
  });

  test('the table cannot be modified', () => {
    expect(Object.isFrozen(PHYSICAL_KEY_MAP)).toBe(true);
  });
});

describe('labelForCode', () => {
  test('letter keys follow shift', () => {
    expect(labelForCode('KeyS', false)).toBe('s');
    expect(labelForCode('KeyS', true)).toBe('S');
  });

  test('digit keys use the US shifted symbols', () => {
    expect(labelForCode('Digit2', false)).toBe('2');
    expect(labelForCode('Digit2', true)).toBe('@');
    expect(labelForCode('Digit1', true)).toBe('!');
  });

  test('keys off the main block have no label', () => {
    expect(labelForCode('Numpad1', false)).toBeNull();
    expect(labelForCode('ArrowLeft', false)).toBeNull();
    expect(labelForCode('NotAKey', false)).toBeNull();
  });
});

test('labelForKeyEvent prefers a printable key and falls back to the code', () => {
  expect(labelForKeyEvent({ key: 'g', code: 'KeyH', shiftKey: false })).toBe('g');
  expect(labelForKeyEvent({ key: 'Dead', code: 'KeyS', shiftKey: true })).toBe('S');
  expect(labelForKeyEvent({ key: 'Shift', code: 'ShiftLeft', shiftKey: true })).toBeNull();
});
