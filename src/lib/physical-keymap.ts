/**
 * PHYSICAL KEY MAP: note name ↔ computer-keyboard label
 *
 * The table covers C2–C6 on the white keys and C♯2–A♯5 on the black keys,
 * laid out across the digit, QWER, ASDF and ZXCV rows. Shifted labels play
 * the sharp above the unshifted label's note (s = C4, S = C♯4).
 *
 * The pairs are fixed input data shared by every control in the process; they
 * live in `../data/physical-keymap.json` and are frozen on load. Notes outside
 * the table cannot be played from the keyboard; pointer input still works.
 *
 * Labels are what `KeyboardEvent.key` produces on a US QWERTY layout. When
 * `key` is not a single character (dead keys, non-Latin layouts), the
 * physical `KeyboardEvent.code` is translated instead, via the same
 * isomorphic-qwerty position table the layout code uses.
 */

import { COORDS_BY_CODE } from 'isomorphic-qwerty';
import table from '../data/physical-keymap.json';

export const PHYSICAL_KEY_MAP: Readonly<Record<string, string>> = Object.freeze({ ...table });

const KEY_BY_NOTE: ReadonlyMap<string, string> = new Map(Object.entries(PHYSICAL_KEY_MAP));

const NOTE_BY_KEY: ReadonlyMap<string, string> = new Map(
  Object.entries(PHYSICAL_KEY_MAP).map(([note, key]) => [key, note]),
);

/** Label for a display name (`C♯4` → `S`), or null outside the table. */
export function keyForNote(name: string): string | null {
  return KEY_BY_NOTE.get(name) ?? null;
}

/** Display name for a label (`g` → `F4`), or null when nothing is mapped. */
export function noteForKey(label: string): string | null {
  return NOTE_BY_KEY.get(label) ?? null;
}

export function getAllMappedKeys(): string[] {
  return [...NOTE_BY_KEY.keys()];
}

// ─────────────────────────────────────────────────────────────────────────────
// KeyboardEvent.code → label
// Only isomorphic-qwerty layer z=1 (main alphanumeric block) carries labels.
// ─────────────────────────────────────────────────────────────────────────────

const MAIN_LAYER_CODES = new Set<string>();
for (const [code, [, , iqZ]] of COORDS_BY_CODE) {
  if (iqZ === 1) MAIN_LAYER_CODES.add(code);
}

// US layout shift row
const SHIFTED_DIGITS: Record<string, string> = {
  '1': '!', '2': '@', '3': '#', '4': '$', '5': '%',
  '6': '^', '7': '&', '8': '*', '9': '(', '0': ')',
};

/**
 * Label the physical key `code` produces on US QWERTY, e.g. `('KeyS', true)`
 * → `S`, `('Digit2', true)` → `@`. Null for keys without a table-style label.
 */
export function labelForCode(code: string, shifted: boolean): string | null {
  if (!MAIN_LAYER_CODES.has(code)) return null;

  const letter = /^Key([A-Z])$/.exec(code);
  if (letter) return shifted ? letter[1] : letter[1].toLowerCase();

  const digit = /^Digit([0-9])$/.exec(code);
  if (digit) return shifted ? SHIFTED_DIGITS[digit[1]] : digit[1];

  return null;
}

/** Resolve the label of a key event: its `key` when printable, else its `code`. */
export function labelForKeyEvent(event: { key: string; code: string; shiftKey: boolean }): string | null {
  if (event.key.length === 1) return event.key;
  return labelForCode(event.code, event.shiftKey);
}
