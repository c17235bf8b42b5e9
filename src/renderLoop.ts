/**
 * Render Loop
 *
 * Drives the foreground: every frame pumps delivered continuations, then
 * runs the registered per-frame hooks (tab bookkeeping, redraws).
 */

import { Disposable, toDisposable } from './lifecycle';
import type { IDisposable } from './lifecycle';
import type { ForegroundPump } from './core/foreground-pump';
import type { TaskLog } from './outputChannel';
import { describeError } from './core/errors';
import { FrameIntervalMs } from './config';

export type FrameHook = () => void;

export class RenderLoop extends Disposable {
  private readonly hooks: FrameHook[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private frames = 0;

  constructor(
    private readonly pump: ForegroundPump,
    private readonly log?: TaskLog,
    private readonly intervalMs: number = FrameIntervalMs
  ) {
    super();
    this._register(toDisposable(() => this.stop()));
  }

  get frameCount(): number {
    return this.frames;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Register a hook run after the pump on every frame.
   */
  onFrame(hook: FrameHook): IDisposable {
    this.hooks.push(hook);
    return toDisposable(() => {
      const index = this.hooks.indexOf(hook);
      if (index >= 0) this.hooks.splice(index, 1);
    });
  }

  /**
   * Run one frame.
   */
  runFrame(): void {
    this.frames++;
    this.pump.tick();
    for (const hook of [...this.hooks]) {
      try {
        hook();
      } catch (err) {
        this.log?.error(`Frame hook failed: ${describeError(err)}`);
      }
    }
  }

  start(): void {
    if (this.isDisposed) {
      throw new Error('Render loop has been disposed');
    }
    if (this.timer) return;
    this.timer = setInterval(() => this.runFrame(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}
