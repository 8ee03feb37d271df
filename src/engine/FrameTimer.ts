// FrameTimer - Frame pacing for the render loop
// Measures delta time, keeps a smoothed FPS and works out how long to sleep

/**
 * Variable timestep frame timer.
 *
 * Key concepts:
 * - dt: Seconds since the previous tick, capped at MAX_FRAME_TIME
 * - fps: Exponentially smoothed frames per second
 * - sleep budget: Time left in the frame after work, for the target FPS
 */

const MAX_FRAME_TIME = 0.25;  // A stalled frame never reports more than 250ms
const FPS_SMOOTHING = 0.1;

export type Clock = () => number; // milliseconds

export class FrameTimer {
  private targetFps: number;
  private lastFrameTime: number;
  private frameStart: number;
  private fps: number = 0;
  private frameCount: number = 0;
  private elapsed: number = 0;

  private clock: Clock;

  constructor(targetFps: number = 30, clock: Clock = () => performance.now()) {
    this.clock = clock;
    this.targetFps = FrameTimer.sanitizeFps(targetFps);
    this.lastFrameTime = this.clock();
    this.frameStart = this.lastFrameTime;
  }

  private static sanitizeFps(fps: number): number {
    return Number.isFinite(fps) && fps > 0 ? fps : 30;
  }

  setTargetFps(fps: number): void {
    this.targetFps = FrameTimer.sanitizeFps(fps);
  }

  getTargetFps(): number {
    return this.targetFps;
  }

  /**
   * Mark the start of a frame.
   *
   * @returns dt in seconds since the previous tick
   */
  tick(): number {
    const now = this.clock();
    let dt = (now - this.lastFrameTime) / 1000;
    this.lastFrameTime = now;
    this.frameStart = now;

    if (dt < 0) dt = 0;
    if (dt > MAX_FRAME_TIME) dt = MAX_FRAME_TIME;

    if (dt > 0) {
      const instant = 1 / dt;
      this.fps = this.frameCount === 0 ? instant : this.fps + (instant - this.fps) * FPS_SMOOTHING;
    }

    this.frameCount++;
    this.elapsed += dt;
    return dt;
  }

  /**
   * Milliseconds left before the next frame is due, never negative.
   */
  getSleepTime(): number {
    const frameBudget = 1000 / this.targetFps;
    const spent = this.clock() - this.frameStart;
    return Math.max(0, frameBudget - spent);
  }

  getFps(): number {
    return this.fps;
  }

  getFrameCount(): number {
    return this.frameCount;
  }

  getElapsed(): number {
    return this.elapsed;
  }

  reset(): void {
    this.lastFrameTime = this.clock();
    this.frameStart = this.lastFrameTime;
    this.fps = 0;
    this.frameCount = 0;
    this.elapsed = 0;
  }
}
