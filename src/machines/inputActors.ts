/**
 * Input Actors
 *
 * XState v5 fromCallback actors that translate raw DOM events into typed
 * key-interaction events. They do NOT handle press logic; they only bridge
 * the host's event targets to the machine's event bus. The machine invokes
 * them while it is attached.
 *
 * Dual-cleanup pattern per XState fromCallback bug #5433:
 *   receive((e) => { if (e.type === 'CLEANUP') removeListeners(); })
 *   return () => removeListeners();
 *
 * Events are read structurally rather than with `instanceof KeyboardEvent`
 * so any EventTarget works, including Node's own in a headless host.
 */

import { fromCallback } from 'xstate';
import { labelForKeyEvent } from '../lib/physical-keymap';
import type {
  KeyDownEvent,
  KeyUpEvent,
  PointerPressEvent,
  WindowBlurEvent,
} from './types';

// ─── Internal cleanup event ──────────────────────────────────────────────────

/** Sent to an actor to request manual listener teardown (dual-cleanup pattern). */
type CleanupEvent = { type: 'CLEANUP' };

/** Input shared by every listener. A null target makes the actor idle. */
export interface ListenerInput {
  target: EventTarget | null;
}

/** The `data-*` attribute a renderer puts on each key element. */
export const NOTE_DATA_ATTRIBUTE = 'data-note';

// ─── Event field readers ─────────────────────────────────────────────────────

interface KeyFields {
  key: string;
  code: string;
  shiftKey: boolean;
  repeat: boolean;
}

function readKeyFields(e: Event): KeyFields | null {
  if (!('key' in e) || typeof e.key !== 'string') return null;
  return {
    key: e.key,
    code: 'code' in e && typeof e.code === 'string' ? e.code : '',
    shiftKey: 'shiftKey' in e && e.shiftKey === true,
    repeat: 'repeat' in e && e.repeat === true,
  };
}

function readButtons(e: Event): number {
  return 'buttons' in e && typeof e.buttons === 'number' ? e.buttons : 0;
}

/** Typing into a form control must not play notes. */
function isEditableTarget(target: EventTarget | null): boolean {
  if (typeof HTMLElement === 'undefined' || !(target instanceof HTMLElement)) return false;
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLSelectElement ||
    target instanceof HTMLTextAreaElement ||
    target.isContentEditable
  );
}

/** Note name of the key element under an event, via its `data-note`. */
function noteFromTarget(target: EventTarget | null): string | null {
  if (typeof Element === 'undefined' || !(target instanceof Element)) return null;
  return target.closest(`[${NOTE_DATA_ATTRIBUTE}]`)?.getAttribute(NOTE_DATA_ATTRIBUTE) ?? null;
}

// ─── keyboardListener ────────────────────────────────────────────────────────

/**
 * Listens for keydown/keyup on the target and sends KEY_DOWN/KEY_UP with the
 * label the key produces.
 *
 * Filters:
 *   - Repeated keys (`e.repeat === true`)
 *   - Events originating in form controls
 *   - Key-downs without a table-style label
 *
 * Both events carry `e.code` so the machine can pair a key-up with the note
 * its key-down started.
 */
export const keyboardListener = fromCallback<CleanupEvent, ListenerInput>(
  ({ sendBack, receive, input }) => {
    const { target } = input;
    if (!target) return;

    const onKeyDown = (e: Event): void => {
      const fields = readKeyFields(e);
      if (!fields || fields.repeat || isEditableTarget(e.target)) return;
      const label = labelForKeyEvent(fields);
      if (label === null) return;
      const event: KeyDownEvent = { type: 'KEY_DOWN', label, code: fields.code || undefined };
      sendBack(event);
    };

    const onKeyUp = (e: Event): void => {
      const fields = readKeyFields(e);
      if (!fields || isEditableTarget(e.target)) return;
      // The held key is found by code, so a release whose label changed
      // (Shift let go first) still goes through.
      const label = labelForKeyEvent(fields);
      if (label === null && fields.code === '') return;
      const event: KeyUpEvent = { type: 'KEY_UP', label, code: fields.code || undefined };
      sendBack(event);
    };

    target.addEventListener('keydown', onKeyDown);
    target.addEventListener('keyup', onKeyUp);

    const removeListeners = (): void => {
      target.removeEventListener('keydown', onKeyDown);
      target.removeEventListener('keyup', onKeyUp);
    };

    // Dual cleanup: receive() for manual CLEANUP + return function as backup
    receive((event) => {
      if (event.type === 'CLEANUP') removeListeners();
    });

    return removeListeners;
  },
);

// ─── pointerListener ─────────────────────────────────────────────────────────

/**
 * Sends POINTER_PRESS when a pointer goes down on a key element, or slides
 * onto one with a button still held (glissando).
 *
 * Listens on `pointerover` rather than `pointerenter` so a single listener on
 * the strip container sees every key via bubbling.
 */
export const pointerListener = fromCallback<CleanupEvent, ListenerInput>(
  ({ sendBack, receive, input }) => {
    const { target } = input;
    if (!target) return;

    const press = (e: Event): void => {
      const note = noteFromTarget(e.target);
      if (note === null) return;
      const event: PointerPressEvent = { type: 'POINTER_PRESS', note };
      sendBack(event);
    };

    const onPointerDown = (e: Event): void => press(e);

    const onPointerOver = (e: Event): void => {
      if (readButtons(e) === 0) return; // hover without a button held
      press(e);
    };

    target.addEventListener('pointerdown', onPointerDown);
    target.addEventListener('pointerover', onPointerOver);

    const removeListeners = (): void => {
      target.removeEventListener('pointerdown', onPointerDown);
      target.removeEventListener('pointerover', onPointerOver);
    };

    receive((event) => {
      if (event.type === 'CLEANUP') removeListeners();
    });

    return removeListeners;
  },
);

// ─── blurListener ────────────────────────────────────────────────────────────

/**
 * Sends WINDOW_BLUR when the target loses focus (e.g. Alt+Tab), since the
 * key-ups for any held keys will go elsewhere.
 */
export const blurListener = fromCallback<CleanupEvent, ListenerInput>(
  ({ sendBack, receive, input }) => {
    const { target } = input;
    if (!target) return;

    const onBlur = (): void => {
      const event: WindowBlurEvent = { type: 'WINDOW_BLUR' };
      sendBack(event);
    };

    target.addEventListener('blur', onBlur);

    const removeListeners = (): void => {
      target.removeEventListener('blur', onBlur);
    };

    receive((event) => {
      if (event.type === 'CLEANUP') removeListeners();
    });

    return removeListeners;
  },
);
