/**
 * Telegram pacer.
 * The telegram endpoint's real pacing rule is not advertised in headers, so
 * on top of the shared quota window this lane enforces a fixed floor between
 * its grants. Recruitment telegrams get the longer floor. While a telegram
 * waits on its floor, other API requests keep flowing.
 *
 * A slot counts as used the moment it is granted, whether or not the caller
 * goes on to send. A caller that fails before sending still pushes the next
 * telegram back by a full interval.
 */

import { LimiterLane, type LaneOptions } from './lane.js';
import type { AdmissionGate, LimiterSnapshot } from './types.js';

/** Minimum spacing between telegrams, in ms. */
export interface TelegramFloors {
  standardMs: number;
  recruitmentMs: number;
}

export interface TelegramRateLimiterOptions extends LaneOptions {
  recruitment: boolean;
  floors: TelegramFloors;
}

export interface TelegramSnapshot extends LimiterSnapshot {
  recruitment: boolean;
  minIntervalMs: number;
  lastGrantedAt?: number;
}

export class TelegramRateLimiter extends LimiterLane {
  public readonly recruitment: boolean;
  public readonly minIntervalMs: number;
  private lastGrantedAt: number | undefined;

  private readonly floor: AdmissionGate = {
    readyAt: (now) => (this.lastGrantedAt === undefined ? now : this.lastGrantedAt + this.minIntervalMs),
    onGrant: (now) => {
      this.lastGrantedAt = now;
    },
  };

  constructor(options: TelegramRateLimiterOptions) {
    super(options);
    this.recruitment = options.recruitment;
    this.minIntervalMs = options.recruitment
      ? options.floors.recruitmentMs
      : options.floors.standardMs;
  }

  override snapshot(): TelegramSnapshot {
    return {
      ...super.snapshot(),
      recruitment: this.recruitment,
      minIntervalMs: this.minIntervalMs,
      lastGrantedAt: this.lastGrantedAt,
    };
  }

  protected override get gate(): AdmissionGate {
    return this.floor;
  }
}
