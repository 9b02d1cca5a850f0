/**
 * A lane is a view onto the shared API limiter. Its requests wait in the
 * shared FIFO queue and are charged against the one quota; subclasses add
 * credentials or a pacing gate of their own.
 */

import type { RateLimiter } from './limiter.js';
import type {
  AcquireOptions,
  AdmissionGate,
  CredentialFields,
  Grant,
  LimiterSignal,
  LimiterSnapshot,
  ObserveContext,
  ObservedResponse,
  RequestAuthority,
} from './types.js';

export interface LaneOptions {
  /** Limiter that owns the API quota. Destroying it ends every lane on it. */
  limiter: RateLimiter;
}

export abstract class LimiterLane implements RequestAuthority {
  public readonly limiter: RateLimiter;

  protected constructor(options: LaneOptions) {
    this.limiter = options.limiter;
  }

  acquire(options: AcquireOptions = {}): Promise<Grant> {
    return this.limiter.acquire({ ...options, gate: this.gate });
  }

  tryAcquire(claim?: () => boolean): Grant | undefined {
    return this.limiter.tryAcquire(claim, this.gate);
  }

  observe(response: ObservedResponse, _context?: ObserveContext): LimiterSignal[] {
    return this.limiter.observe(response);
  }

  prepareRequest(): CredentialFields {
    return {};
  }

  snapshot(): LimiterSnapshot {
    return this.limiter.snapshot();
  }

  /** Pacing rule applied to this lane's tickets only. */
  protected get gate(): AdmissionGate | undefined {
    return undefined;
  }
}
