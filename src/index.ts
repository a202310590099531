export { NotePosition, Accidental, NOTE_LETTERS, diatonicStep } from './lib/note-position';
export type { NoteLetter } from './lib/note-position';
export { NoteRange, Clef } from './lib/note-range';
export type { ClefRangeOptions } from './lib/note-range';
export { groupKeys, respell, KeyGroupCache } from './lib/key-groups';
export type { RenderGroup } from './lib/key-groups';
export {
  KEY_STRIP_MARGIN,
  keyWidthFor,
  scrollOffsetFor,
  contentWidthFor,
  clampScrollOffset,
} from './lib/scroll-geometry';
export type { ScrollTarget } from './lib/scroll-geometry';
export { ScrollController, Curves, FRAME_MS, DEFAULT_SCROLL_DURATION_MS } from './lib/scroll-controller';
export type { Curve, AnimateOptions, ScrollListener } from './lib/scroll-controller';
export {
  PHYSICAL_KEY_MAP,
  keyForNote,
  noteForKey,
  getAllMappedKeys,
  labelForCode,
  labelForKeyEvent,
} from './lib/physical-keymap';
export { buildKeyboardView, keyAtPoint, labelFor } from './lib/keyboard-view';
export type { KeyView, GroupView, KeyboardView, ViewSettings, ViewInput } from './lib/keyboard-view';
export { DEFAULT_PIANO_SETTINGS, resolveSettings } from './lib/settings';
export type { PianoSettings, OnNotePositionTapped } from './lib/settings';
export { PianoControl } from './lib/piano-control';
export type { AttachTargets, ViewListener } from './lib/piano-control';
export {
  keyInteractionMachine,
  resolvePhysicalKey,
  isNotePressed,
  POINTER_RELEASE_MS,
} from './machines/keyInteractionMachine';
export { keyboardListener, pointerListener, blurListener, NOTE_DATA_ATTRIBUTE } from './machines/inputActors';
export type { ListenerInput } from './machines/inputActors';
export type * from './machines/types';
