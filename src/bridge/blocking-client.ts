/**
 * Blocking side of the limiter bridge, for worker threads that cannot
 * await. Every call parks the calling thread on a shared status cell until
 * the host answers; the host's event loop keeps running meanwhile.
 */

import { receiveMessageOnPort, type MessagePort } from 'node:worker_threads';
import { AcquireCancelledError } from '../shared/errors.js';
import type { CredentialFields, ObserveContext } from '../ratelimit/types.js';
import {
  CANCELLED,
  CLAIMED,
  FAILED,
  HostReplySchema,
  PENDING,
  SEQUENCE,
  STATUS,
  createCell,
  type HostRequest,
} from './protocol.js';

/** How requests reach the host and replies come back. */
export interface BlockingTransport {
  send(message: HostRequest): void;
  /** Next queued reply, read without waiting; undefined when none is queued. */
  receive(): unknown;
}

/** Transport over a worker_threads port. */
export function portTransport(port: MessagePort): BlockingTransport {
  return {
    send: (message) => port.postMessage(message),
    receive: () => receiveMessageOnPort(port)?.message,
  };
}

export interface BlockingGrant {
  /** The limiter's grant sequence number. */
  sequence: number;
  waitedMs: number;
}

export interface BlockingClientOptions {
  /** Default wait limit for {@link BlockingLimiterClient.acquire}. Unlimited when unset. */
  timeoutMs?: number;
}

export class BlockingLimiterClient {
  private readonly transport: BlockingTransport;
  private readonly defaultTimeoutMs: number | undefined;
  private nextId = 0;

  constructor(transport: BlockingTransport, options: BlockingClientOptions = {}) {
    this.transport = transport;
    this.defaultTimeoutMs = options.timeoutMs;
  }

  /**
   * Block this thread until the host grants admission.
   * @throws AcquireCancelledError on timeout, or when the host can no longer grant.
   */
  acquire(options: { timeoutMs?: number } = {}): BlockingGrant {
    const id = ++this.nextId;
    const { buffer, view } = createCell();
    const started = performance.now();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    this.transport.send({ type: 'acquire', id, cell: buffer });

    const outcome = Atomics.wait(view, STATUS, PENDING, timeoutMs);
    if (outcome === 'timed-out') {
      // Whoever moves the cell off PENDING first decides the outcome.
      if (Atomics.compareExchange(view, STATUS, PENDING, CANCELLED) === PENDING) {
        this.transport.send({ type: 'cancel', id });
        throw new AcquireCancelledError('timeout');
      }
    }

    // The host claimed the grant and is writing the sequence number.
    while (Atomics.load(view, STATUS) === CLAIMED) {
      Atomics.wait(view, STATUS, CLAIMED);
    }

    if (Atomics.load(view, STATUS) === FAILED) {
      throw new AcquireCancelledError('destroyed');
    }

    return {
      sequence: Atomics.load(view, SEQUENCE),
      waitedMs: performance.now() - started,
    };
  }

  /** Credential fields from the host's limiter. Blocks until it answers. */
  prepareRequest(): CredentialFields {
    const id = ++this.nextId;
    const { buffer, view } = createCell();

    this.transport.send({ type: 'prepare', id, cell: buffer });
    Atomics.wait(view, STATUS, PENDING);

    for (let raw = this.transport.receive(); raw !== undefined; raw = this.transport.receive()) {
      const reply = HostReplySchema.safeParse(raw);
      if (reply.success && reply.data.id === id) {
        return reply.data.fields;
      }
    }
    throw new Error(`Limiter host sent no reply to prepare request #${id}`);
  }

  /**
   * Report a response to the host. Does not block; the host handles it
   * before any request this thread sends afterwards.
   */
  observe(response: { status: number; headers: Headers }, context: ObserveContext = {}): void {
    this.transport.send({
      type: 'observe',
      status: response.status,
      headers: Array.from(response.headers.entries()),
      credentialed: context.credentialed,
    });
  }

  /** Drop the host limiter's cached session. Does not block. */
  invalidate(): void {
    this.transport.send({ type: 'invalidate' });
  }
}

/** Wrap a port received from `LimiterHost.openChannel()`. */
export function connectToHost(port: MessagePort, options?: BlockingClientOptions): BlockingLimiterClient {
  return new BlockingLimiterClient(portTransport(port), options);
}
