/**
 * Admission and pacing types.
 * Defines the state model owned by a limiter and the capability interface
 * the transport depends on.
 */

/** Quota window as last advertised by the API. Replaced as a whole, never patched. */
export interface QuotaState {
  /** Requests still permitted before `resetAt`. */
  readonly remaining: number;
  /** Monotonic timestamp (ms) when the window resets. */
  readonly resetAt: number;
  /** Monotonic timestamp (ms) when this state was captured. */
  readonly windowSeen: number;
  /** Window size, when advertised. */
  readonly limit?: number;
}

/** Explicit "wait until" instruction from a throttled response. */
export interface ThrottleOverride {
  readonly retryNotBefore: number;
}

/** Quota fields pulled out of a response by a {@link QuotaExtractor}. */
export interface QuotaReport {
  remaining?: number;
  /** Milliseconds until the window resets. */
  resetAfterMs?: number;
  limit?: number;
  /** Explicit retry-after from a throttled response, in milliseconds. */
  retryAfterMs?: number;
}

/** Minimal view of an HTTP response. A fetch `Response` satisfies it. */
export interface ObservedResponse {
  readonly status: number;
  readonly headers: Headers;
}

/** Turns a response into quota fields. Header naming lives here, not in the limiter. */
export type QuotaExtractor = (response: ObservedResponse) => QuotaReport;

/** Typed signals computed from observed responses. */
export type LimiterSignal =
  | { type: 'throttled'; retryAt: number; retryAfterMs: number }
  | { type: 'auth-rejected'; identity: string }
  | { type: 'malformed-quota'; reason: string };

export type SignalListener = (signal: LimiterSignal) => void;

/** Issued once per admitted request. */
export interface Grant {
  /** Strictly increasing per limiter, in grant order. */
  readonly sequence: number;
  /** Monotonic timestamp (ms) of the grant. */
  readonly grantedAt: number;
  /** How long the caller waited in the queue, in ms. */
  readonly waitedMs: number;
}

export interface AcquireOptions {
  /** Aborting removes the ticket from the queue and rejects with AcquireCancelledError. */
  signal?: AbortSignal;
  /** Give up after this many ms. */
  timeoutMs?: number;
  /**
   * Called at grant time, before any state changes. Returning false withdraws
   * the ticket instead of granting it. Used by callers on other threads whose
   * wait may already have been abandoned.
   */
  claim?: () => boolean;
  /** Extra pacing rule for this ticket on top of the shared quota. */
  gate?: AdmissionGate;
}

/**
 * Per-lane pacing rule checked by the shared pump. Tickets behind a gate
 * that is not ready yet wait without holding up tickets of other lanes;
 * tickets of the same gate keep their order.
 */
export interface AdmissionGate {
  /** Earliest time the gate admits, on the limiter's clock. */
  readyAt(now: number): number;
  /** Called when a ticket behind this gate is granted. */
  onGrant(now: number): void;
}

/** What the caller knows about the request a response belongs to. */
export interface ObserveContext {
  /** Whether the authority's credentials were attached. Assumed when omitted. */
  credentialed?: boolean;
}

/** Credential fields to attach to an outgoing request. */
export interface CredentialFields {
  password?: string;
  autologin?: string;
  pin?: string;
}

/**
 * What the transport needs from a limiter. Plain limiters, credentialed ones
 * and telegram pacers all satisfy it.
 */
export interface RequestAuthority {
  acquire(options?: AcquireOptions): Promise<Grant>;
  prepareRequest(): CredentialFields;
  observe(response: ObservedResponse, context?: ObserveContext): LimiterSignal[];
}

/** Observability view of a limiter. */
export interface LimiterSnapshot {
  quota?: QuotaState;
  throttle?: ThrottleOverride;
  /** Deadline of the in-flight probe grant, when no quota belief is held. */
  probeUntil?: number;
  pending: number;
  granted: number;
}

export interface RateLimiterOptions {
  /** Maps responses to quota fields. */
  extractor: QuotaExtractor;
  /** Pacing used when quota data is missing or unusable. */
  fallbackDelayMs: number;
  /** Status code that means explicit throttling. */
  throttleStatus?: number;
  /** Monotonic clock in ms. */
  clock?: () => number;
  onSignal?: SignalListener;
  /** Label used in log lines. */
  name?: string;
}
