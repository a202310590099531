/**
 * Host-settable options for a piano control, with defaults.
 *
 * Settings are patched, not replaced: `resolveSettings` merges a partial
 * patch over the current values and clamps anything out of range back to a
 * usable value instead of failing.
 */

import type { NotePosition } from './note-position';
import { Clef, NoteRange } from './note-range';

/** Receives the display name of a tapped key, in the active spelling. */
export type OnNotePositionTapped = (position: string) => void;

export interface PianoSettings {
  /** Keys to show. */
  noteRange: NoteRange;
  highlightedNotes: readonly NotePosition[];
  /** CSS color blended into highlighted keys by the renderer. */
  highlightColor: string;
  naturalColor: string;
  accidentalColor: string;
  /** Pulse highlighted keys. */
  animateHighlightedNotes: boolean;
  /** Show and report accidentals as flats instead of sharps. */
  useAlternativeAccidentals: boolean;
  hideNoteNames: boolean;
  /** Hide the scrollbar and disable user scrolling; programmatic scrolling still works. */
  hideScrollbar: boolean;
  /** Fixed natural-key width in px; null sizes keys to fit the viewport. */
  keyWidth: number | null;
  /** Change to scroll the strip so this note is centred. */
  noteToScrollTo: NotePosition | null;
  onNotePositionTapped: OnNotePositionTapped | null;
}

export const DEFAULT_PIANO_SETTINGS: Readonly<PianoSettings> = {
  noteRange: NoteRange.forClefs([Clef.Treble]),
  highlightedNotes: [],
  highlightColor: 'red',
  naturalColor: 'white',
  accidentalColor: 'black',
  animateHighlightedNotes: false,
  useAlternativeAccidentals: false,
  hideNoteNames: false,
  hideScrollbar: false,
  keyWidth: null,
  noteToScrollTo: null,
  onNotePositionTapped: null,
};

function orDefault<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

function clampKeyWidth(width: number | null): number | null {
  return width !== null && Number.isFinite(width) && width > 0 ? width : null;
}

function clampColor(color: string, fallback: string): string {
  return color.trim() === '' ? fallback : color;
}

/**
 * Merge `patch` over `base`. `undefined` fields keep the base value; `null`
 * clears nullable fields. Invalid widths fall back to automatic sizing and
 * blank colors to the defaults.
 */
export function resolveSettings(
  patch: Partial<PianoSettings>,
  base: Readonly<PianoSettings> = DEFAULT_PIANO_SETTINGS,
): PianoSettings {
  return {
    noteRange: orDefault(patch.noteRange, base.noteRange),
    highlightedNotes: [...orDefault(patch.highlightedNotes, base.highlightedNotes)],
    highlightColor: clampColor(orDefault(patch.highlightColor, base.highlightColor), DEFAULT_PIANO_SETTINGS.highlightColor),
    naturalColor: clampColor(orDefault(patch.naturalColor, base.naturalColor), DEFAULT_PIANO_SETTINGS.naturalColor),
    accidentalColor: clampColor(orDefault(patch.accidentalColor, base.accidentalColor), DEFAULT_PIANO_SETTINGS.accidentalColor),
    animateHighlightedNotes: orDefault(patch.animateHighlightedNotes, base.animateHighlightedNotes),
    useAlternativeAccidentals: orDefault(patch.useAlternativeAccidentals, base.useAlternativeAccidentals),
    hideNoteNames: orDefault(patch.hideNoteNames, base.hideNoteNames),
    hideScrollbar: orDefault(patch.hideScrollbar, base.hideScrollbar),
    keyWidth: clampKeyWidth(orDefault(patch.keyWidth, base.keyWidth)),
    noteToScrollTo: orDefault(patch.noteToScrollTo, base.noteToScrollTo),
    onNotePositionTapped: orDefault(patch.onNotePositionTapped, base.onNotePositionTapped),
  };
}
