/**
 * RedrawScheduler - coalesces redraw requests into animation frames.
 *
 * Redraw requests are fire-and-forget: any number of request() calls
 * before the next frame produce a single onFrame() invocation.
 */

export interface RedrawSchedulerDeps {
  /** Called once per scheduled frame */
  onFrame: () => void;
  /** Custom requestAnimationFrame for testing (defaults to global) */
  requestFrame?: (callback: () => void) => void;
  /** Optional logger for debugging */
  log?: (message: string, ...args: unknown[]) => void;
}

export class RedrawScheduler {
  private pending = false;
  private cancelled = false;
  private disposed = false;
  private coalesced = 0;

  private readonly onFrame: () => void;
  private readonly requestFrame: (callback: () => void) => void;
  private readonly log: (message: string, ...args: unknown[]) => void;

  constructor(deps: RedrawSchedulerDeps) {
    this.onFrame = deps.onFrame;
    this.requestFrame = deps.requestFrame ?? ((cb) => requestAnimationFrame(cb));
    this.log = deps.log ?? (() => {});
  }

  /**
   * Ask for a redraw on the next frame.
   */
  request(): void {
    if (this.disposed) return;
    if (this.pending) {
      this.coalesced++;
      return;
    }
    this.pending = true;
    this.cancelled = false;
    this.requestFrame(() => this.flush());
  }

  private flush(): void {
    if (this.disposed || this.cancelled || !this.pending) return;
    this.pending = false;
    if (this.coalesced > 0) {
      this.log('[RedrawScheduler] Coalesced', this.coalesced, 'requests into one frame');
      this.coalesced = 0;
    }
    this.onFrame();
  }

  /**
   * Drop a pending frame. Later requests schedule new frames.
   */
  cancel(): void {
    this.cancelled = true;
    this.pending = false;
    this.coalesced = 0;
  }

  /**
   * Permanently stop: drops a pending frame and ignores every later request.
   * Call this when the host unmounts.
   */
  dispose(): void {
    this.disposed = true;
    this.cancel();
  }

  /**
   * Check if a frame is scheduled and not yet run.
   */
  isPending(): boolean {
    return this.pending;
  }
}
