/**
 * Wire protocol between blocking callers and a limiter host.
 *
 * Blocking callers wait on a shared status cell rather than on a message:
 * the host flips the cell and notifies, so the caller's thread can sleep in
 * Atomics.wait without an event loop. Messages carry requests one way and
 * credential replies the other.
 */

import { z } from 'zod';

/** Int32 slots in a status cell. */
export const STATUS = 0;
export const SEQUENCE = 1;
export const CELL_BYTES = 2 * Int32Array.BYTES_PER_ELEMENT;

/** Status cell values. */
export const PENDING = 0;
/** Host has taken the grant; the sequence slot is about to be written. */
export const CLAIMED = 1;
export const GRANTED = 2;
/** Caller gave up first. */
export const CANCELLED = 3;
/** Host can no longer grant (limiter destroyed or detached). */
export const FAILED = 4;

const cell = z.instanceof(SharedArrayBuffer);

export const HostRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('acquire'), id: z.number().int(), cell }),
  z.object({ type: z.literal('cancel'), id: z.number().int() }),
  z.object({ type: z.literal('prepare'), id: z.number().int(), cell }),
  z.object({
    type: z.literal('observe'),
    status: z.number().int(),
    headers: z.array(z.tuple([z.string(), z.string()])),
    credentialed: z.boolean().optional(),
  }),
  z.object({ type: z.literal('invalidate') }),
]);

export const HostReplySchema = z.object({
  type: z.literal('prepared'),
  id: z.number().int(),
  fields: z.object({
    password: z.string().optional(),
    autologin: z.string().optional(),
    pin: z.string().optional(),
  }),
});

export type HostRequest = z.infer<typeof HostRequestSchema>;
export type HostReply = z.infer<typeof HostReplySchema>;

/** Create a fresh status cell. */
export function createCell(): { buffer: SharedArrayBuffer; view: Int32Array } {
  const buffer = new SharedArrayBuffer(CELL_BYTES);
  return { buffer, view: new Int32Array(buffer) };
}
