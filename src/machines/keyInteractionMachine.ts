/**
 * Key Interaction Machine (XState v5)
 *
 * Tracks pressed/released per note (keyed by display name) and emits
 * `noteTapped` once per press gesture.
 *
 * Press rules:
 *   - PRESS_BEGIN on a pressed note is ignored (key repeat, re-entrant hover).
 *   - Keyboard presses end on key-up (PRESS_END). A key-up releases the
 *     note its physical key (by `code`) started, whatever it types now.
 *   - Pointer presses end POINTER_RELEASE_MS later (AUTO_RELEASE), whatever
 *     the pointer does meanwhile. A re-press inside that window is ignored
 *     and the original deadline still releases the key, so the pressed state
 *     can lag the pointer by at most one flash. A keyboard press or key-up on
 *     the note cancels a flash still pending for it.
 *
 * While `attached`, the input actors feed KEY_DOWN / KEY_UP / POINTER_PRESS /
 * WINDOW_BLUR from the host's event targets. The same events may also be sent
 * directly by a renderer that owns its own input handling.
 */

import { setup, assign, assertEvent, emit, enqueueActions } from 'xstate';
import { keyboardListener, pointerListener, blurListener } from './inputActors';
import { noteForKey } from '../lib/physical-keymap';
import { NotePosition } from '../lib/note-position';
import type {
  KeyInteractionContext,
  KeyInteractionEvent,
  KeyInteractionInput,
  NoteTappedEmitted,
} from './types';

/** Length of the visual flash for a pointer press. */
export const POINTER_RELEASE_MS = 150;

function releaseTimerId(note: string): string {
  return `release:${note}`;
}

/**
 * Note a physical key label plays, spelled the way the keys are rendered.
 * The key table is written with sharps; with alternative accidentals on, a
 * sharp becomes its flat (S → C♯4 → D♭4).
 */
export function resolvePhysicalKey(label: string, useAlternativeAccidentals: boolean): string | null {
  const name = noteForKey(label);
  if (name === null || !useAlternativeAccidentals) return name;
  const alternative = NotePosition.parse(name)?.alternativeAccidental;
  return alternative ? alternative.name : name;
}

export const keyInteractionMachine = setup({
  types: {
    context: {} as KeyInteractionContext,
    events: {} as KeyInteractionEvent,
    emitted: {} as NoteTappedEmitted,
    input: {} as KeyInteractionInput,
  },
  actors: {
    keyboardListener,
    pointerListener,
    blurListener,
  },
  delays: {
    pointerFlash: ({ context }) => context.releaseDelayMs,
  },
  guards: {
    isAlreadyPressed: ({ context, event }) => {
      assertEvent(event, 'PRESS_BEGIN');
      return context.pressed[event.note] === true;
    },
    isPointerPress: ({ event }) => {
      assertEvent(event, 'PRESS_BEGIN');
      return event.source === 'pointer';
    },
  },
  actions: {
    markPressed: assign(({ context, event }) => {
      assertEvent(event, 'PRESS_BEGIN');
      return { pressed: { ...context.pressed, [event.note]: true } };
    }),

    markReleased: assign(({ context, event }) => {
      assertEvent(event, ['PRESS_END', 'AUTO_RELEASE']);
      if (context.pressed[event.note] !== true) return {};
      return { pressed: { ...context.pressed, [event.note]: false } };
    }),

    releaseAll: assign(({ context }) => ({
      pressed: Object.fromEntries(Object.keys(context.pressed).map((note) => [note, false])),
      heldKeys: {},
    })),

    notifyTapped: emit(({ event }) => {
      assertEvent(event, 'PRESS_BEGIN');
      return { type: 'noteTapped' as const, note: event.note, source: event.source };
    }),

    cancelRelease: enqueueActions(({ enqueue, event }) => {
      assertEvent(event, ['PRESS_BEGIN', 'PRESS_END']);
      enqueue.cancel(releaseTimerId(event.note));
    }),

    // A fresh press gets a fresh deadline.
    scheduleRelease: enqueueActions(({ enqueue, event }) => {
      assertEvent(event, 'PRESS_BEGIN');
      const id = releaseTimerId(event.note);
      enqueue.cancel(id);
      enqueue.raise({ type: 'AUTO_RELEASE', note: event.note }, { id, delay: 'pointerFlash' });
    }),

    translateKeyDown: enqueueActions(({ context, event, enqueue }) => {
      assertEvent(event, 'KEY_DOWN');
      const note = resolvePhysicalKey(event.label, context.useAlternativeAccidentals);
      if (note === null) return;
      if (event.code) enqueue.assign({ heldKeys: { ...context.heldKeys, [event.code]: note } });
      enqueue.raise({ type: 'PRESS_BEGIN', note, source: 'keyboard' });
    }),

    translateKeyUp: enqueueActions(({ context, event, enqueue }) => {
      assertEvent(event, 'KEY_UP');
      const { code, label } = event;
      const held: string | undefined = code ? context.heldKeys[code] : undefined;
      const note = held ?? (label === null ? null : resolvePhysicalKey(label, context.useAlternativeAccidentals));
      if (held !== undefined) {
        enqueue.assign({
          heldKeys: Object.fromEntries(Object.entries(context.heldKeys).filter(([key]) => key !== code)),
        });
      }
      if (note !== null) enqueue.raise({ type: 'PRESS_END', note });
    }),

    translatePointerPress: enqueueActions(({ event, enqueue }) => {
      assertEvent(event, 'POINTER_PRESS');
      enqueue.raise({ type: 'PRESS_BEGIN', note: event.note, source: 'pointer' });
    }),

    // Held notes were named in the old spelling; their key-ups would now
    // resolve to different names, so drop them.
    setSpelling: assign(({ context, event }) => {
      assertEvent(event, 'SET_SPELLING');
      if (event.useAlternativeAccidentals === context.useAlternativeAccidentals) return {};
      return {
        useAlternativeAccidentals: event.useAlternativeAccidentals,
        pressed: Object.fromEntries(Object.keys(context.pressed).map((note) => [note, false])),
        heldKeys: {},
      };
    }),

    storeTargets: assign(({ event }) => {
      assertEvent(event, 'ATTACH');
      return { keyTarget: event.keyTarget, pointerTarget: event.pointerTarget, blurTarget: event.blurTarget };
    }),

    clearTargets: assign(() => ({ keyTarget: null, pointerTarget: null, blurTarget: null })),
  },
}).createMachine({
  id: 'keyInteraction',
  context: ({ input }) => ({
    pressed: {},
    heldKeys: {},
    useAlternativeAccidentals: input.useAlternativeAccidentals ?? false,
    releaseDelayMs: input.releaseDelayMs ?? POINTER_RELEASE_MS,
    keyTarget: null,
    pointerTarget: null,
    blurTarget: null,
  }),
  initial: 'detached',
  on: {
    PRESS_BEGIN: [
      { guard: 'isAlreadyPressed' },
      { guard: 'isPointerPress', actions: ['markPressed', 'notifyTapped', 'scheduleRelease'] },
      { actions: ['markPressed', 'notifyTapped', 'cancelRelease'] },
    ],
    PRESS_END:     { actions: ['markReleased', 'cancelRelease'] },
    AUTO_RELEASE:  { actions: 'markReleased' },
    KEY_DOWN:      { actions: 'translateKeyDown' },
    KEY_UP:        { actions: 'translateKeyUp' },
    POINTER_PRESS: { actions: 'translatePointerPress' },
    WINDOW_BLUR:   { actions: 'releaseAll' },
    SET_SPELLING:  { actions: 'setSpelling' },
  },
  states: {
    detached: {
      on: {
        ATTACH: { target: 'attached', actions: 'storeTargets' },
      },
    },
    attached: {
      invoke: [
        { src: 'keyboardListener', input: ({ context }) => ({ target: context.keyTarget }) },
        { src: 'pointerListener',  input: ({ context }) => ({ target: context.pointerTarget }) },
        { src: 'blurListener',     input: ({ context }) => ({ target: context.blurTarget }) },
      ],
      on: {
        ATTACH: { target: 'attached', reenter: true, actions: 'storeTargets' },
        DETACH: { target: 'detached', actions: 'clearTargets' },
      },
    },
  },
});

/** Whether `note` (display name) is pressed in a machine snapshot's context. */
export function isNotePressed(context: Pick<KeyInteractionContext, 'pressed'>, note: string): boolean {
  return context.pressed[note] === true;
}
