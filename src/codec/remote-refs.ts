/**
 * Remote reference codecs
 *
 * Identifiers and frame paths that address objects inside the engine.
 * These never leave the bridge; callers only see handles.
 */

import { z } from 'zod';
import { parseWire, type Codec, type WireValue } from './codec.js';

/**
 * One step of a frame path
 */
export type FrameSelector = { readonly name: string } | { readonly position: number };

/**
 * A child page as reported by its parent: remote id plus declared window name
 */
export interface ChildPageRef {
  id: string;
  /** Empty when the window was opened without a target name */
  windowName: string;
}

const remoteIdSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

export const remoteIdCodec: Codec<string> = {
  type: 'page id',
  encode: (id) => id,
  decode: (wire) =>
    String(parseWire(z.object({ id: remoteIdSchema }), 'page id', wire).id),
};

export const childPageListCodec: Codec<ChildPageRef[]> = {
  type: 'child page list',
  encode: (refs) => refs.map((ref) => ({ id: ref.id, windowName: ref.windowName })),
  decode: (wire) =>
    (
      parseWire(
        z.array(z.object({ id: remoteIdSchema, windowName: z.string().nullish() })).nullish(),
        'child page list',
        wire
      ) ?? []
    ).map((ref) => ({ id: String(ref.id), windowName: ref.windowName ?? '' })),
};

export function encodeFramePath(path: readonly FrameSelector[]): WireValue[] {
  return path.map((step): WireValue => ('name' in step ? { name: step.name } : { position: step.position }));
}

/**
 * Child frames of the frame a request resolved to
 */
export interface FrameSetInfo {
  names: string[];
  count: number;
}

export const frameSetCodec: Codec<FrameSetInfo> = {
  type: 'frame set',
  encode: (frames) => ({ names: frames.names, count: frames.count }),
  decode: (wire) => {
    const parsed = parseWire(
      z.object({ names: z.array(z.string().nullable()), count: z.number().int().nonnegative() }),
      'frame set',
      wire
    );
    return { names: parsed.names.map((name) => name ?? ''), count: parsed.count };
  },
};
