/**
 * Single-slot wake-up timer for a limiter's pump.
 * Scheduling again replaces the pending wake-up rather than adding one.
 */

export class WakeTimer {
  private timer: NodeJS.Timeout | undefined;
  private dueAt: number | undefined;

  /**
   * Schedule the callback. Any earlier wake-up is cancelled first.
   * @param delayMs - Delay in milliseconds; negative values fire on the next tick.
   * @param onWake - Invoked once when the delay elapses.
   * @param now - Current time on the caller's clock, recorded for {@link due}.
   */
  schedule(delayMs: number, onWake: () => void, now: number): void {
    this.cancel();

    const delay = Math.max(0, Math.ceil(delayMs));
    this.dueAt = now + delay;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.dueAt = undefined;
      onWake();
    }, delay);
  }

  /** Cancel the pending wake-up, if any. */
  cancel(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
      this.dueAt = undefined;
    }
  }

  /** When the pending wake-up fires, on the clock passed to {@link schedule}. */
  get due(): number | undefined {
    return this.dueAt;
  }

  get pending(): boolean {
    return this.timer !== undefined;
  }
}
