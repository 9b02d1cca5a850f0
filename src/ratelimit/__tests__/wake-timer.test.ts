import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WakeTimer } from '../wake-timer.js';

describe('WakeTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once after the delay', () => {
    const timer = new WakeTimer();
    const onWake = vi.fn();

    timer.schedule(100, onWake, 0);
    expect(timer.pending).toBe(true);
    expect(timer.due).toBe(100);

    vi.advanceTimersByTime(99);
    expect(onWake).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onWake).toHaveBeenCalledTimes(1);
    expect(timer.pending).toBe(false);
    expect(timer.due).toBeUndefined();
  });

  it('replaces the pending wake-up instead of adding one', () => {
    const timer = new WakeTimer();
    const first = vi.fn();
    const second = vi.fn();

    timer.schedule(100, first, 0);
    timer.schedule(50, second, 0);

    vi.advanceTimersByTime(200);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('rounds fractional delays up and clamps negative ones', () => {
    const timer = new WakeTimer();
    timer.schedule(10.2, vi.fn(), 5);
    expect(timer.due).toBe(16);

    timer.schedule(-20, vi.fn(), 5);
    expect(timer.due).toBe(5);
  });

  it('cancel prevents the callback', () => {
    const timer = new WakeTimer();
    const onWake = vi.fn();

    timer.schedule(100, onWake, 0);
    timer.cancel();
    vi.advanceTimersByTime(200);

    expect(onWake).not.toHaveBeenCalled();
    expect(timer.pending).toBe(false);
  });
});
