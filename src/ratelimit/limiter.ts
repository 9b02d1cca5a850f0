/**
 * Base admission authority.
 * Decides when each request may be sent so the remote quota is never
 * exceeded. All grants go through one pump that serves a FIFO queue, so
 * every decision sees the state left behind by the previous grant.
 *
 * Scheduling: a ticket at the head of the queue is granted at
 * max(quota time, throttle override), where quota time is "now" while
 * `remaining > 0` and `resetAt` once it hits zero. Without any quota belief
 * (fresh limiter, or the window has reset) a single probe grant is let
 * through and the next one waits for a response or the fallback delay.
 *
 * One limiter holds the quota for the whole API. Credentialed and telegram
 * lanes queue here too; a lane's gate can hold back its own tickets, in
 * which case the next ticket of another lane goes first.
 */

import { logger } from '../shared/logger.js';
import { AcquireCancelledError, type CancelReason } from '../shared/errors.js';
import { WakeTimer } from './wake-timer.js';
import type {
  AcquireOptions,
  AdmissionGate,
  CredentialFields,
  Grant,
  LimiterSignal,
  LimiterSnapshot,
  ObservedResponse,
  QuotaExtractor,
  QuotaReport,
  QuotaState,
  RateLimiterOptions,
  RequestAuthority,
  SignalListener,
  ThrottleOverride,
} from './types.js';

/** A caller waiting for admission. */
interface Ticket {
  readonly enqueuedAt: number;
  readonly claim?: () => boolean;
  readonly gate?: AdmissionGate;
  resolve(grant: Grant): void;
  reject(error: AcquireCancelledError): void;
  /** Detach abort listeners and timeout timers. */
  dispose(): void;
}

export const DEFAULT_THROTTLE_STATUS = 429;

/** Monotonic milliseconds; unaffected by wall-clock adjustments. */
export const monotonicClock = (): number => performance.now();

export class RateLimiter implements RequestAuthority {
  public readonly name: string;
  private readonly clock: () => number;
  private readonly fallbackDelayMs: number;
  private readonly extractor: QuotaExtractor;
  private readonly throttleStatus: number;
  private readonly onSignal?: SignalListener;
  private readonly wake = new WakeTimer();

  private queue: Ticket[] = [];
  private quota: QuotaState | undefined;
  private throttle: ThrottleOverride | undefined;
  private probeUntil: number | undefined;
  private grantCount = 0;
  private destroyed = false;

  constructor(options: RateLimiterOptions) {
    this.extractor = options.extractor;
    this.fallbackDelayMs = options.fallbackDelayMs;
    this.throttleStatus = options.throttleStatus ?? DEFAULT_THROTTLE_STATUS;
    this.clock = options.clock ?? monotonicClock;
    this.onSignal = options.onSignal;
    this.name = options.name ?? 'api';
  }

  /**
   * Wait for admission.
   * Rejects only with AcquireCancelledError (abort, timeout, failed claim or
   * destroy); throttling just makes the wait longer.
   */
  acquire(options: AcquireOptions = {}): Promise<Grant> {
    if (this.destroyed) {
      return Promise.reject(new AcquireCancelledError('destroyed'));
    }
    if (options.signal?.aborted) {
      return Promise.reject(new AcquireCancelledError('aborted'));
    }

    return new Promise<Grant>((resolve, reject) => {
      const cleanups: Array<() => void> = [];
      const ticket: Ticket = {
        enqueuedAt: this.clock(),
        claim: options.claim,
        gate: options.gate,
        resolve,
        reject,
        dispose: () => {
          for (const cleanup of cleanups) cleanup();
          cleanups.length = 0;
        },
      };

      const signal = options.signal;
      if (signal) {
        const onAbort = () => this.cancel(ticket, 'aborted');
        signal.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => signal.removeEventListener('abort', onAbort));
      }

      if (options.timeoutMs !== undefined) {
        const timer = setTimeout(() => this.cancel(ticket, 'timeout'), options.timeoutMs);
        cleanups.push(() => clearTimeout(timer));
      }

      this.queue.push(ticket);
      this.pump();
    });
  }

  /**
   * Grant immediately if admission is possible now and no queued ticket
   * would go first. Returns undefined, changing nothing, otherwise.
   * @param claim - Same contract as {@link AcquireOptions.claim}.
   */
  tryAcquire(claim?: () => boolean, gate?: AdmissionGate): Grant | undefined {
    if (this.destroyed) return undefined;

    const now = this.clock();
    if (this.readyAt(now) > now) return undefined;
    if (this.nextEligible(now).ticket) return undefined;
    if (gate && (gate.readyAt(now) > now || this.queue.some((ticket) => ticket.gate === gate))) {
      return undefined;
    }
    if (claim && !claim()) return undefined;
    return this.issue(now, now, gate);
  }

  /**
   * Feed a response back into the limiter.
   * Replaces the quota window, applies explicit throttling, and wakes the queue.
   * @returns Signals computed from this response, in the order they were raised.
   */
  observe(response: ObservedResponse): LimiterSignal[] {
    const now = this.clock();
    const signals: LimiterSignal[] = [];
    const report = this.extractor(response);
    const throttled = response.status === this.throttleStatus;

    // Any response ends the probe.
    this.probeUntil = undefined;

    if (throttled) {
      const retryAfterMs = report.retryAfterMs ?? this.fallbackDelayMs;
      const retryAt = now + retryAfterMs;
      this.throttle = { retryNotBefore: retryAt };
      signals.push({ type: 'throttled', retryAt, retryAfterMs });

      logger.info(
        { limiter: this.name, retryAfterMs },
        `Throttled by API, holding ${this.name} queue for ${retryAfterMs}ms`,
      );
    }

    const quota = this.toQuotaState(report, now);
    if (typeof quota !== 'string') {
      this.quota = quota;
      logger.debug(
        { limiter: this.name, remaining: quota.remaining, resetInMs: quota.resetAt - now },
        `Quota updated for ${this.name}`,
      );
    } else if (throttled && this.throttle) {
      this.quota = { remaining: 0, resetAt: this.throttle.retryNotBefore, windowSeen: now };
    } else {
      this.quota = { remaining: 0, resetAt: now + this.fallbackDelayMs, windowSeen: now };
      signals.push({ type: 'malformed-quota', reason: quota });

      logger.warn(
        { limiter: this.name, status: response.status, reason: quota, fallbackDelayMs: this.fallbackDelayMs },
        `Unusable quota data (${quota}), pacing ${this.name} by fallback delay`,
      );
    }

    for (const signal of signals) this.emit(signal);
    this.pump();
    return signals;
  }

  /** Base limiters carry no credentials. */
  prepareRequest(): CredentialFields {
    return {};
  }

  /** Current state as last computed. Does not advance any expiry. */
  snapshot(): LimiterSnapshot {
    return {
      quota: this.quota,
      throttle: this.throttle,
      probeUntil: this.probeUntil,
      pending: this.queue.length,
      granted: this.grantCount,
    };
  }

  /**
   * Reject every pending ticket and discard all state.
   * Later acquires reject immediately.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.wake.cancel();

    const pending = this.queue;
    this.queue = [];
    for (const ticket of pending) {
      ticket.dispose();
      ticket.reject(new AcquireCancelledError('destroyed'));
    }

    this.quota = undefined;
    this.throttle = undefined;
    this.probeUntil = undefined;
    logger.debug({ limiter: this.name, rejected: pending.length }, `Limiter ${this.name} destroyed`);
  }

  /** Earliest time the quota and throttle state admit anything. */
  private readyAt(now: number): number {
    this.expire(now);

    let at = now;
    if (this.quota) {
      if (this.quota.remaining <= 0) at = Math.max(at, this.quota.resetAt);
    } else if (this.probeUntil !== undefined) {
      at = Math.max(at, this.probeUntil);
    }
    if (this.throttle) {
      at = Math.max(at, this.throttle.retryNotBefore);
    }
    return at;
  }

  /** Deliver a signal to the listener. Lanes raise their own signals through here. */
  emit(signal: LimiterSignal): void {
    if (!this.onSignal) return;
    try {
      this.onSignal(signal);
    } catch (err) {
      logger.error({ limiter: this.name, err, signal: signal.type }, 'Signal listener threw');
    }
  }

  private pump(): void {
    if (this.destroyed) return;

    while (this.queue.length > 0) {
      const now = this.clock();
      const { ticket, at } = this.nextEligible(now);
      if (ticket === undefined) {
        this.wake.schedule(at - now, () => this.pump(), now);
        return;
      }

      this.queue.splice(this.queue.indexOf(ticket), 1);
      ticket.dispose();
      if (ticket.claim && !ticket.claim()) {
        ticket.reject(new AcquireCancelledError('withdrawn'));
      } else {
        ticket.resolve(this.issue(now, ticket.enqueuedAt, ticket.gate));
      }
    }

    this.wake.cancel();
  }

  /**
   * The ticket to grant now, or when to look again. The quota holds back
   * everyone; a gate holds back only the tickets behind it.
   */
  private nextEligible(now: number): { ticket?: Ticket; at: number } {
    const quotaAt = this.readyAt(now);
    if (quotaAt > now) return { at: quotaAt };

    const held = new Set<AdmissionGate>();
    let at = Number.POSITIVE_INFINITY;
    for (const ticket of this.queue) {
      const { gate } = ticket;
      if (gate === undefined) return { ticket, at: now };
      if (held.has(gate)) continue;

      const gateAt = gate.readyAt(now);
      if (gateAt <= now) return { ticket, at: now };
      held.add(gate);
      at = Math.min(at, gateAt);
    }
    return { at };
  }

  private issue(now: number, enqueuedAt: number, gate?: AdmissionGate): Grant {
    if (this.quota) {
      this.quota = { ...this.quota, remaining: Math.max(0, this.quota.remaining - 1) };
    } else {
      this.probeUntil = now + this.fallbackDelayMs;
    }
    gate?.onGrant(now);

    const grant: Grant = {
      sequence: ++this.grantCount,
      grantedAt: now,
      waitedMs: now - enqueuedAt,
    };

    logger.debug(
      { limiter: this.name, sequence: grant.sequence, waitedMs: grant.waitedMs, remaining: this.quota?.remaining },
      `Granted ${this.name} request #${grant.sequence}`,
    );
    return grant;
  }

  private cancel(ticket: Ticket, reason: CancelReason): void {
    const index = this.queue.indexOf(ticket);
    if (index === -1) return;

    this.queue.splice(index, 1);
    ticket.dispose();
    ticket.reject(new AcquireCancelledError(reason));
    logger.debug({ limiter: this.name, reason, pending: this.queue.length }, 'Pending acquire cancelled');

    this.pump();
  }

  private expire(now: number): void {
    if (this.throttle && now >= this.throttle.retryNotBefore) this.throttle = undefined;
    if (this.quota && now >= this.quota.resetAt) this.quota = undefined;
    if (this.probeUntil !== undefined && now >= this.probeUntil) this.probeUntil = undefined;
  }

  /** Validate an extractor report. Returns the reason when it is unusable. */
  private toQuotaState(report: QuotaReport, now: number): QuotaState | string {
    const { remaining, resetAfterMs, limit } = report;
    if (remaining === undefined) return 'missing remaining count';
    if (!Number.isInteger(remaining) || remaining < 0) return `invalid remaining count ${remaining}`;
    if (resetAfterMs === undefined) return 'missing reset time';
    if (!Number.isFinite(resetAfterMs) || resetAfterMs < 0) return `invalid reset time ${resetAfterMs}`;

    return {
      remaining,
      resetAt: now + resetAfterMs,
      windowSeen: now,
      ...(limit !== undefined && { limit }),
    };
  }
}
