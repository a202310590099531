/**
 * Keyboard view model: everything a renderer needs to draw the strip.
 *
 * Each render group becomes one stacked unit: a row of naturals, with the
 * group's accidentals in an overlay row that starts half a key in and covers
 * the top 55% of the strip. Geometry is in strip pixels (x grows from the
 * first natural); heights are fractions of the strip height.
 *
 * Colors pass through untouched. Blending the highlight color in is the
 * renderer's business.
 */

import { NotePosition } from './note-position';
import { keyForNote } from './physical-keymap';
import { contentWidthFor } from './scroll-geometry';
import type { RenderGroup } from './key-groups';
import type { PianoSettings } from './settings';

// Fraction of the strip height covered by accidentals.
const ACCIDENTAL_HEIGHT = 0.55;
// Accidental row starts this far past the half-key mark.
const ACCIDENTAL_NUDGE = 0.02;
const NATURAL_PADDING = 0.02;
const ACCIDENTAL_PADDING = 0.04;

export interface KeyView {
  position: NotePosition;
  /** Display name, e.g. `D♭4`. Also the `data-note` value for pointer input. */
  name: string;
  /** Physical key label to print on the key; null when unmapped or names are hidden. */
  label: string | null;
  showName: boolean;
  isNatural: boolean;
  isMiddleC: boolean;
  pressed: boolean;
  highlighted: boolean;
  /** Pulse animation on (highlighted and animation enabled). */
  animated: boolean;
  color: string;
  /** Set only when highlighted. */
  highlightColor: string | null;
  /** Left edge in strip px. */
  x: number;
  width: number;
  /** Horizontal inset on each side, px. */
  padding: number;
  /** Fraction of strip height, from the top. */
  height: number;
}

export interface GroupView {
  naturals: KeyView[];
  accidentals: KeyView[];
  x: number;
  width: number;
}

export interface KeyboardView {
  groups: GroupView[];
  keyWidth: number;
  viewportWidth: number;
  contentWidth: number;
  /** Unclamped; the scroll surface clamps. */
  scrollOffset: number;
  /** False when `hideScrollbar` is set: no scrollbar and no user scrolling. */
  userScrollable: boolean;
}

export type ViewSettings = Pick<
  PianoSettings,
  | 'highlightedNotes'
  | 'highlightColor'
  | 'naturalColor'
  | 'accidentalColor'
  | 'animateHighlightedNotes'
  | 'hideNoteNames'
  | 'hideScrollbar'
>;

export interface ViewInput {
  groups: readonly RenderGroup[];
  keyWidth: number;
  viewportWidth: number;
  scrollOffset: number;
  settings: ViewSettings;
  isPressed: (name: string) => boolean;
}

/** The key table is spelled with sharps; flats borrow their sharp's label. */
export function labelFor(position: NotePosition): string | null {
  return keyForNote(position.name) ?? keyForNote(position.alternativeAccidental?.name ?? '');
}

export function buildKeyboardView(input: ViewInput): KeyboardView {
  const { groups, keyWidth, viewportWidth, scrollOffset, settings, isPressed } = input;

  const makeKey = (position: NotePosition, x: number): KeyView => {
    const highlighted = settings.highlightedNotes.some((n) => n.equals(position));
    const isNatural = position.isNatural;
    return {
      position,
      name: position.name,
      label: settings.hideNoteNames ? null : labelFor(position),
      showName: !settings.hideNoteNames,
      isNatural,
      isMiddleC: position.equals(NotePosition.middleC),
      pressed: isPressed(position.name),
      highlighted,
      animated: highlighted && settings.animateHighlightedNotes,
      color: isNatural ? settings.naturalColor : settings.accidentalColor,
      highlightColor: highlighted ? settings.highlightColor : null,
      x,
      width: keyWidth,
      padding: Math.ceil(keyWidth * (isNatural ? NATURAL_PADDING : ACCIDENTAL_PADDING)),
      height: isNatural ? 1 : ACCIDENTAL_HEIGHT,
    };
  };

  let naturalCount = 0;
  const groupViews = groups.map((group): GroupView => {
    const x = naturalCount * keyWidth;
    const naturals = group.filter((p) => p.isNatural);
    const accidentals = group.filter((p) => !p.isNatural);
    const accidentalStart = x + keyWidth / 2 + keyWidth * ACCIDENTAL_NUDGE;
    naturalCount += naturals.length;
    return {
      naturals: naturals.map((p, i) => makeKey(p, x + i * keyWidth)),
      accidentals: accidentals.map((p, i) => makeKey(p, accidentalStart + i * keyWidth)),
      x,
      width: naturals.length * keyWidth,
    };
  });

  return {
    groups: groupViews,
    keyWidth,
    viewportWidth,
    contentWidth: contentWidthFor(naturalCount, keyWidth),
    scrollOffset,
    userScrollable: !settings.hideScrollbar,
  };
}

/**
 * Key under a point on the strip. `x` is in strip px, `yFraction` runs 0 (top)
 * to 1 (bottom). Accidentals sit on top, so they are tested first, inside
 * their padding. Null between keys or off the strip.
 */
export function keyAtPoint(view: KeyboardView, x: number, yFraction: number): KeyView | null {
  if (yFraction < 0 || yFraction > 1) return null;

  for (const group of view.groups) {
    for (const key of group.accidentals) {
      if (yFraction > key.height) continue;
      if (x >= key.x + key.padding && x < key.x + key.width - key.padding) return key;
    }
  }

  for (const group of view.groups) {
    if (x < group.x || x >= group.x + group.width) continue;
    for (const key of group.naturals) {
      if (x >= key.x && x < key.x + key.width) return key;
    }
  }

  return null;
}
