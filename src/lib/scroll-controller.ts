/**
 * ScrollController: the single writable scroll position of a key strip.
 *
 * Created by the control on its first layout pass (before that there is no
 * geometry to scroll by) and reused until the control is disposed. Offsets
 * are stored unclamped; the renderer's scroll surface clamps.
 *
 * Animations advance on fixed ~60fps frames rather than wall-clock time, so a
 * transition always takes the same number of steps.
 */

export type Curve = (t: number) => number;

export const Curves = {
  linear: ((t) => t) satisfies Curve,
  easeOut: ((t) => 1 - Math.pow(1 - t, 3)) satisfies Curve,
};

export interface AnimateOptions {
  durationMs?: number;
  curve?: Curve;
}

export type ScrollListener = (offset: number) => void;

export const FRAME_MS = 16;
export const DEFAULT_SCROLL_DURATION_MS = 500;

export class ScrollController {
  private _offset: number;
  private frameTimer: ReturnType<typeof setTimeout> | null = null;
  private listeners: Set<ScrollListener> = new Set();
  private disposed = false;

  constructor(initialOffset = 0) {
    this._offset = initialOffset;
  }

  get offset(): number {
    return this._offset;
  }

  get isAnimating(): boolean {
    return this.frameTimer !== null;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  jumpTo(offset: number): void {
    this.assertLive('jumpTo');
    this.stopAnimation();
    this.setOffset(offset);
  }

  /** Replaces any running animation. Lands exactly on `offset`. */
  animateTo(offset: number, options: AnimateOptions = {}): void {
    this.assertLive('animateTo');
    const { durationMs = DEFAULT_SCROLL_DURATION_MS, curve = Curves.easeOut } = options;
    this.stopAnimation();
    if (durationMs <= 0 || offset === this._offset) {
      this.setOffset(offset);
      return;
    }

    const start = this._offset;
    const frames = Math.max(1, Math.ceil(durationMs / FRAME_MS));
    let frame = 0;

    const step = (): void => {
      frame++;
      if (frame >= frames) {
        this.frameTimer = null;
        this.setOffset(offset);
        return;
      }
      this.frameTimer = setTimeout(step, FRAME_MS);
      this.setOffset(start + (offset - start) * curve(frame / frames));
    };

    this.frameTimer = setTimeout(step, FRAME_MS);
  }

  stopAnimation(): void {
    if (this.frameTimer !== null) {
      clearTimeout(this.frameTimer);
      this.frameTimer = null;
    }
  }

  subscribe(listener: ScrollListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Stops animation and drops listeners. May be called once. */
  dispose(): void {
    if (this.disposed) throw new Error('ScrollController was already disposed');
    this.stopAnimation();
    this.listeners.clear();
    this.disposed = true;
  }

  private setOffset(offset: number): void {
    if (offset === this._offset) return;
    this._offset = offset;
    for (const listener of this.listeners) listener(offset);
  }

  private assertLive(operation: string): void {
    if (this.disposed) throw new Error(`ScrollController.${operation} called after dispose`);
  }
}
