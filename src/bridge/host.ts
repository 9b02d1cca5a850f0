/**
 * Limiter host: the admission side of the blocking bridge.
 * Runs on the limiter's own event loop and turns protocol messages from
 * worker threads into ordinary tickets in the limiter's FIFO queue, so
 * blocking and promise-based callers are ordered by the same pump.
 */

import { MessageChannel, type MessagePort } from 'node:worker_threads';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { AcquireCancelledError } from '../shared/errors.js';
import type { Grant, RequestAuthority } from '../ratelimit/types.js';
import {
  CLAIMED,
  FAILED,
  GRANTED,
  HostRequestSchema,
  PENDING,
  SEQUENCE,
  STATUS,
  type HostReply,
  type HostRequest,
} from './protocol.js';

/** What the host needs from a limiter. */
export interface HostedLimiter extends RequestAuthority {
  tryAcquire(claim?: () => boolean): Grant | undefined;
  invalidate?(): void;
}

/** One connected caller (usually one worker thread's port). */
export interface HostSession {
  handle(message: unknown): void;
  /** Abort every wait this session still has queued. */
  close(): void;
}

export class LimiterHost {
  private readonly limiter: HostedLimiter;

  constructor(limiter: HostedLimiter) {
    this.limiter = limiter;
  }

  /**
   * Create a channel and serve one end of it.
   * Transfer the returned port to a worker and wrap it with `connectToHost`.
   */
  openChannel(): MessagePort {
    const { port1, port2 } = new MessageChannel();
    const detach = this.attach(port1);
    port1.once('close', detach);
    return port2;
  }

  /**
   * Serve requests arriving on a port.
   * @returns A function that stops serving and aborts queued waits.
   */
  attach(port: MessagePort): () => void {
    const session = this.createSession((reply) => port.postMessage(reply));
    const listener = (message: unknown) => session.handle(message);
    port.on('message', listener);

    return () => {
      port.off('message', listener);
      session.close();
    };
  }

  /**
   * Build a session that answers through `reply`.
   * `attach` uses this with a port; it can also be driven directly.
   */
  createSession(reply: (message: HostReply) => void): HostSession {
    const waits = new Map<number, AbortController>();

    const handle = (raw: unknown): void => {
      const parsed = HostRequestSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ issues: z.prettifyError(parsed.error) }, 'Ignoring malformed limiter message');
        return;
      }
      this.dispatch(parsed.data, reply, waits);
    };

    const close = (): void => {
      for (const controller of waits.values()) controller.abort();
      waits.clear();
    };

    return { handle, close };
  }

  private dispatch(
    message: HostRequest,
    reply: (message: HostReply) => void,
    waits: Map<number, AbortController>,
  ): void {
    switch (message.type) {
      case 'acquire':
        this.acquire(message.id, new Int32Array(message.cell), waits);
        return;
      case 'cancel':
        waits.get(message.id)?.abort();
        return;
      case 'prepare': {
        const view = new Int32Array(message.cell);
        // Reply first: the caller reads it as soon as the cell flips.
        reply({ type: 'prepared', id: message.id, fields: this.limiter.prepareRequest() });
        Atomics.store(view, STATUS, GRANTED);
        Atomics.notify(view, STATUS);
        return;
      }
      case 'observe':
        this.limiter.observe(
          { status: message.status, headers: new Headers(message.headers) },
          { credentialed: message.credentialed },
        );
        return;
      case 'invalidate':
        this.limiter.invalidate?.();
        return;
    }
  }

  private acquire(id: number, view: Int32Array, waits: Map<number, AbortController>): void {
    // Taking the cell from PENDING is what makes the grant count. If the
    // caller already gave up, the claim fails and the ticket is withdrawn.
    const claim = () => Atomics.compareExchange(view, STATUS, PENDING, CLAIMED) === PENDING;

    const immediate = this.limiter.tryAcquire(claim);
    if (immediate) {
      complete(view, immediate);
      return;
    }
    if (Atomics.load(view, STATUS) !== PENDING) return;

    const controller = new AbortController();
    waits.set(id, controller);

    void this.limiter.acquire({ signal: controller.signal, claim }).then(
      (grant) => {
        waits.delete(id);
        complete(view, grant);
      },
      (err: unknown) => {
        waits.delete(id);
        if (Atomics.compareExchange(view, STATUS, PENDING, FAILED) === PENDING) {
          Atomics.notify(view, STATUS);
        }
        if (err instanceof AcquireCancelledError) {
          logger.debug({ id, reason: err.reason }, 'Blocking acquire ended without a grant');
        } else {
          logger.error({ id, err }, 'Blocking acquire failed');
        }
      },
    );
  }
}

function complete(view: Int32Array, grant: Grant): void {
  Atomics.store(view, SEQUENCE, grant.sequence);
  Atomics.store(view, STATUS, GRANTED);
  Atomics.notify(view, STATUS);
}
