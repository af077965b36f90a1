/**
 * Control Protocol
 *
 * Request and response envelopes exchanged with the engine's control script.
 *
 * Endpoints (HTTP on the loopback interface):
 * - `GET /ping`    liveness probe
 * - `POST /pages`  create a page, result `{ id }`
 * - `POST /invoke` property access or method call on a page
 */

import { z } from 'zod';
import type { FrameSelector, WireValue } from '../codec/index.js';

export const PING_PATH = '/ping';
export const CREATE_PAGE_PATH = '/pages';
export const INVOKE_PATH = '/invoke';

/** Error message the control script sends when a frame path no longer resolves */
export const ENGINE_FRAME_NOT_FOUND = 'frame not found';

/**
 * A member invocation. `target` is omitted for process-level members.
 */
export interface InvokeRequest {
  target?: string;
  member: string;
  args?: WireValue[];
  /** Frame path applied before a frame-scoped member runs */
  frame?: readonly FrameSelector[];
}

export const responseEnvelopeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    result: z.unknown().optional(),
  }),
  z.object({
    status: z.literal('error'),
    message: z.string().default('unknown engine error'),
  }),
]);

export type ResponseEnvelope = z.output<typeof responseEnvelopeSchema>;
