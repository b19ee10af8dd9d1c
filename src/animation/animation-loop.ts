/**
 * Animation Loop
 *
 * Per-frame driver for skinned playback. Frames come from an injectable
 * scheduler: requestAnimationFrame in a browser, a 60 fps timer elsewhere.
 */

import { ANIMATION } from '../constants/animation';
import { Logger, LoggerFactory } from '../utils/logger';

export interface FrameScheduler {
  request(callback: (timestampMs: number) => void): number;
  cancel(handle: number): void;
}

/**
 * Called once per frame with the seconds since start() and since the
 * previous frame.
 */
export type FrameCallback = (elapsedSeconds: number, deltaSeconds: number) => void;

export interface AnimationLoopOptions {
  scheduler?: FrameScheduler;
  logger?: Logger;
  onError?: (error: unknown) => void;
}

/**
 * Timer-based scheduler for hosts without requestAnimationFrame.
 */
export function createTimerScheduler(frameRate: number = ANIMATION.FRAME_RATE): FrameScheduler {
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextHandle = 1;

  return {
    request(callback) {
      const handle = nextHandle++;
      timers.set(handle, setTimeout(() => {
        timers.delete(handle);
        callback(performance.now());
      }, 1000 / frameRate));
      return handle;
    },
    cancel(handle) {
      const timer = timers.get(handle);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(handle);
      }
    },
  };
}

export function createDefaultScheduler(): FrameScheduler {
  if (typeof globalThis.requestAnimationFrame === 'function') {
    return {
      request: callback => globalThis.requestAnimationFrame(callback),
      cancel: handle => globalThis.cancelAnimationFrame(handle),
    };
  }
  return createTimerScheduler();
}

export class AnimationLoop {
  private readonly scheduler: FrameScheduler;
  private readonly logger: Logger;
  private readonly onError?: (error: unknown) => void;
  private handle: number | null = null;
  private startTimestamp: number | null = null;
  private lastElapsed = 0;
  private running = false;
  private frames = 0;

  constructor(private readonly onFrame: FrameCallback, options: AnimationLoopOptions = {}) {
    this.scheduler = options.scheduler ?? createDefaultScheduler();
    this.logger = options.logger ?? LoggerFactory.forRendering();
    this.onError = options.onError;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startTimestamp = null;
    this.lastElapsed = 0;
    this.frames = 0;
    this.handle = this.scheduler.request(this.tick);
    this.logger.debug('Animation loop started');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.handle !== null) {
      this.scheduler.cancel(this.handle);
      this.handle = null;
    }
    this.logger.debug('Animation loop stopped', { frames: this.frames });
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Frames delivered since the last start()
   */
  getFrameCount(): number {
    return this.frames;
  }

  private readonly tick = (timestampMs: number): void => {
    this.handle = null;
    if (!this.running) return;

    if (this.startTimestamp === null) {
      this.startTimestamp = timestampMs;
    }
    const elapsed = (timestampMs - this.startTimestamp) / 1000;
    const delta = elapsed - this.lastElapsed;
    this.lastElapsed = elapsed;

    try {
      this.frames++;
      this.onFrame(elapsed, delta);
    } catch (error) {
      // A failing frame stops playback
      this.running = false;
      if (this.handle !== null) {
        this.scheduler.cancel(this.handle);
        this.handle = null;
      }
      this.logger.logError(error instanceof Error ? error : new Error(String(error)), {
        operation: 'animation_frame',
        frame: this.frames,
      });
      this.onError?.(error);
      return;
    }

    // start() inside the callback has already queued the next frame
    if (this.running && this.handle === null) {
      this.handle = this.scheduler.request(this.tick);
    }
  };
}
