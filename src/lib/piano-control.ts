/**
 * PianoControl: headless engine behind one scrollable piano strip.
 *
 * Wires together:
 * - Key grouping (KeyGroupCache), re-run only when range or spelling changes
 * - Key width and scroll geometry, re-run on every layout pass
 * - ScrollController, created on the first measured layout and reused
 * - Key interaction machine (press state, host callback, input bridges)
 *
 * A renderer calls `layout()` whenever the viewport is measured, draws the
 * returned view, and redraws on `subscribe()` notifications. Raw input comes
 * back either through `attach()` (DOM targets) or the direct input methods.
 */

import { createActor } from 'xstate';
import type { Actor } from 'xstate';
import { keyInteractionMachine, isNotePressed } from '../machines/keyInteractionMachine';
import { KeyGroupCache } from './key-groups';
import { buildKeyboardView } from './keyboard-view';
import { ScrollController, Curves, DEFAULT_SCROLL_DURATION_MS } from './scroll-controller';
import { clampScrollOffset, contentWidthFor, keyWidthFor, scrollOffsetFor } from './scroll-geometry';
import { resolveSettings } from './settings';
import type { KeyboardView } from './keyboard-view';
import type { RenderGroup } from './key-groups';
import type { NotePosition } from './note-position';
import type { PianoSettings } from './settings';

export type ViewListener = (view: KeyboardView) => void;

export interface AttachTargets {
  /** Usually `document`. */
  keyTarget?: EventTarget | null;
  /** The element containing the key elements (each with `data-note`). */
  pointerTarget?: EventTarget | null;
  /** Usually `window`. */
  blurTarget?: EventTarget | null;
}

export class PianoControl {
  private settings: PianoSettings;
  private readonly groupCache = new KeyGroupCache();
  private readonly actor: Actor<typeof keyInteractionMachine>;
  private scroll: ScrollController | null = null;
  private viewportWidth = 0;
  private keyWidth = 0;
  private listeners: Set<ViewListener> = new Set();
  private disposed = false;

  constructor(settings: Partial<PianoSettings> = {}) {
    this.settings = resolveSettings(settings);
    this.actor = createActor(keyInteractionMachine, {
      input: { useAlternativeAccidentals: this.settings.useAlternativeAccidentals },
    });
    this.actor.on('noteTapped', (event) => {
      this.settings.onNotePositionTapped?.(event.note);
    });
    this.actor.subscribe(() => this.notify());
    this.actor.start();
  }

  // ─── Settings ────────────────────────────────────────────────────────────

  getSettings(): Readonly<PianoSettings> {
    return { ...this.settings };
  }

  /**
   * Patch settings. Groups are rebuilt only if the range or spelling changed;
   * a new `noteToScrollTo` animates the strip to it.
   */
  updateSettings(patch: Partial<PianoSettings>): void {
    if (this.disposed) return;
    const previous = this.settings;
    this.settings = resolveSettings(patch, previous);

    if (this.settings.useAlternativeAccidentals !== previous.useAlternativeAccidentals) {
      this.actor.send({ type: 'SET_SPELLING', useAlternativeAccidentals: this.settings.useAlternativeAccidentals });
    }

    const keyWidthChanged = this.updateKeyWidth();
    const target = this.settings.noteToScrollTo;
    if (target !== null && !target.equals(previous.noteToScrollTo)) {
      this.scrollToTarget(true);
    } else if (keyWidthChanged) {
      this.scrollToTarget(false);
    }
    this.notify();
  }

  // ─── Layout & scrolling ──────────────────────────────────────────────────

  /**
   * Record the viewport width and return the view to draw. The first
   * measured pass creates the scroll position, already centred on
   * `noteToScrollTo`; later passes that change the viewport or key width
   * jump back to it.
   */
  layout(viewportWidth: number): KeyboardView {
    if (this.disposed) return this.getView();
    const measured = Number.isFinite(viewportWidth) && viewportWidth > 0 ? viewportWidth : 0;
    const viewportChanged = measured !== this.viewportWidth;
    this.viewportWidth = measured;
    const keyWidthChanged = this.updateKeyWidth();

    if (this.scroll === null) {
      if (measured > 0) {
        this.scroll = new ScrollController(this.targetOffset());
        this.scroll.subscribe(() => this.notify());
      }
    } else if (viewportChanged || keyWidthChanged) {
      this.scrollToTarget(false);
    }
    return this.getView();
  }

  /** Step the strip by `keys` natural keys (negative scrolls left). */
  scrollByKeys(keys: number): void {
    if (this.disposed || this.scroll === null || this.keyWidth <= 0) return;
    const contentWidth = contentWidthFor(this.naturals().length, this.keyWidth);
    const from = clampScrollOffset(this.scroll.offset, contentWidth, this.viewportWidth);
    const to = clampScrollOffset(from + keys * this.keyWidth, contentWidth, this.viewportWidth);
    this.scroll.animateTo(to, { durationMs: DEFAULT_SCROLL_DURATION_MS, curve: Curves.easeOut });
  }

  getScrollOffset(): number {
    return this.scroll?.offset ?? 0;
  }

  getKeyWidth(): number {
    return this.keyWidth;
  }

  getGroups(): readonly RenderGroup[] {
    return this.groupCache.get(this.settings.noteRange, this.settings.useAlternativeAccidentals);
  }

  getView(): KeyboardView {
    return buildKeyboardView({
      groups: this.getGroups(),
      keyWidth: this.keyWidth,
      viewportWidth: this.viewportWidth,
      scrollOffset: this.getScrollOffset(),
      settings: this.settings,
      isPressed: (name) => this.isPressed(name),
    });
  }

  // ─── Input ───────────────────────────────────────────────────────────────

  /** A tap or click on a key. Works for any shown note, mapped or not. */
  tap(note: NotePosition): void {
    if (this.disposed || !this.settings.noteRange.contains(note)) return;
    this.actor.send({ type: 'POINTER_PRESS', note: note.name });
  }

  /** A pointer moved onto a key; only presses when a button is held. */
  pointerEnter(note: NotePosition, buttonsDown: boolean): void {
    if (buttonsDown) this.tap(note);
  }

  /**
   * `code` is the physical key (`KeyboardEvent.code`). When given, the
   * matching `keyUp` releases whatever note this key-down started.
   */
  keyDown(label: string, code?: string): void {
    if (this.disposed) return;
    this.actor.send({ type: 'KEY_DOWN', label, code });
  }

  keyUp(label: string | null, code?: string): void {
    if (this.disposed) return;
    this.actor.send({ type: 'KEY_UP', label, code });
  }

  /** Focus was lost; releases every held key. */
  blur(): void {
    if (this.disposed) return;
    this.actor.send({ type: 'WINDOW_BLUR' });
  }

  /** Listen for raw DOM input. Re-attaching replaces the previous targets. */
  attach(targets: AttachTargets): void {
    if (this.disposed) return;
    this.actor.send({
      type: 'ATTACH',
      keyTarget: targets.keyTarget ?? null,
      pointerTarget: targets.pointerTarget ?? null,
      blurTarget: targets.blurTarget ?? null,
    });
  }

  detach(): void {
    if (this.disposed) return;
    this.actor.send({ type: 'DETACH' });
  }

  isPressed(note: NotePosition | string): boolean {
    const name = typeof note === 'string' ? note : note.name;
    return isNotePressed(this.actor.getSnapshot().context, name);
  }

  // ─── Subscriptions & lifecycle ───────────────────────────────────────────

  subscribe(listener: ViewListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Stop input handling, cancel pending release timers and release the scroll
   * position. Later calls on the control do nothing.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.listeners.clear();
    this.actor.stop();
    this.scroll?.dispose();
    this.scroll = null;
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private naturals(): NotePosition[] {
    return this.getGroups().flatMap((group) => group.filter((p) => p.isNatural));
  }

  /** Returns true when the key width changed. */
  private updateKeyWidth(): boolean {
    const next = keyWidthFor(this.viewportWidth, this.naturals().length, this.settings.keyWidth);
    const changed = next !== this.keyWidth;
    this.keyWidth = next;
    return changed;
  }

  private targetOffset(): number {
    const target = this.settings.noteToScrollTo;
    if (target === null) return 0;
    return scrollOffsetFor({
      target,
      naturals: this.naturals(),
      keyWidth: this.keyWidth,
      viewportWidth: this.viewportWidth,
    });
  }

  private scrollToTarget(animate: boolean): void {
    if (this.scroll === null || this.settings.noteToScrollTo === null) return;
    const offset = this.targetOffset();
    if (animate) {
      this.scroll.animateTo(offset, { durationMs: DEFAULT_SCROLL_DURATION_MS, curve: Curves.easeOut });
    } else {
      this.scroll.jumpTo(offset);
    }
  }

  private notify(): void {
    if (this.disposed || this.listeners.size === 0) return;
    const view = this.getView();
    for (const listener of this.listeners) listener(view);
  }
}
