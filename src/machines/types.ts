/**
 * Key interaction machine types
 *
 * Pure TypeScript types for the press/release machine's context, events and
 * emitted events. No runtime code, no XState imports.
 */

// ─── Press sources ───────────────────────────────────────────────────────────

/**
 * Where a press came from. Keyboard presses end on key-up; pointer presses
 * end on a timer, because hover-driven pointers give no reliable "up".
 */
export type PressSource = 'keyboard' | 'pointer';

// ─── Context ─────────────────────────────────────────────────────────────────

export interface KeyInteractionContext {
  /** Pressed state per display name; a missing entry means released. */
  pressed: Record<string, boolean>;
  /**
   * Note each held physical key started, by `KeyboardEvent.code`. Key-up
   * releases this note even if modifiers changed the key's label meanwhile.
   */
  heldKeys: Record<string, string>;
  /** Spell physical-key notes with their alternative accidental (C♯ → D♭). */
  useAlternativeAccidentals: boolean;
  /** Visual flash length for pointer presses, in ms. */
  releaseDelayMs: number;
  /** Receives keydown/keyup and blur while attached. */
  keyTarget: EventTarget | null;
  /** Receives pointer events from key elements while attached. */
  pointerTarget: EventTarget | null;
  /** Signals focus loss (usually `window`) while attached. */
  blurTarget: EventTarget | null;
}

export interface KeyInteractionInput {
  useAlternativeAccidentals?: boolean;
  releaseDelayMs?: number;
}

// ─── Events ──────────────────────────────────────────────────────────────────

/** A press gesture starts on `note` (display name). */
export interface PressBeginEvent {
  type: 'PRESS_BEGIN';
  note: string;
  source: PressSource;
}

/** A keyboard press on `note` ends. */
export interface PressEndEvent {
  type: 'PRESS_END';
  note: string;
}

/** The pointer flash timer for `note` has elapsed. */
export interface AutoReleaseEvent {
  type: 'AUTO_RELEASE';
  note: string;
}

/** A physical key went down; `label` is the character it produces. */
export interface KeyDownEvent {
  type: 'KEY_DOWN';
  label: string;
  /** Physical key (`KeyboardEvent.code`), when known. */
  code?: string;
}

/** `label` is null when the key produces no table label on release (e.g. a dead key). */
export interface KeyUpEvent {
  type: 'KEY_UP';
  label: string | null;
  code?: string;
}

/** A pointer went down on, or entered while down, the key for `note`. */
export interface PointerPressEvent {
  type: 'POINTER_PRESS';
  note: string;
}

/** Focus left the key target; held keys will never see their key-up. */
export interface WindowBlurEvent {
  type: 'WINDOW_BLUR';
}

export interface SetSpellingEvent {
  type: 'SET_SPELLING';
  useAlternativeAccidentals: boolean;
}

/** Start listening for raw input on the given targets. */
export interface AttachEvent {
  type: 'ATTACH';
  keyTarget: EventTarget | null;
  pointerTarget: EventTarget | null;
  blurTarget: EventTarget | null;
}

export interface DetachEvent {
  type: 'DETACH';
}

export type KeyInteractionEvent =
  | PressBeginEvent
  | PressEndEvent
  | AutoReleaseEvent
  | KeyDownEvent
  | KeyUpEvent
  | PointerPressEvent
  | WindowBlurEvent
  | SetSpellingEvent
  | AttachEvent
  | DetachEvent;

// ─── Emitted ─────────────────────────────────────────────────────────────────

/** Emitted exactly once per press gesture. */
export interface NoteTappedEmitted {
  type: 'noteTapped';
  note: string;
  source: PressSource;
}
