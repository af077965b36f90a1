/**
 * Render options codec
 */

import { z } from 'zod';
import { parseWire, type Codec, type WireValue } from './codec.js';

export type RenderFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'ppm' | 'pdf';

export interface RenderOptions {
  /** Inferred by the engine from the file extension when absent */
  format?: RenderFormat;
  /** 0-100, for lossy formats */
  quality?: number;
}

const renderOptionsSchema = z
  .object({
    format: z.enum(['png', 'jpeg', 'gif', 'bmp', 'ppm', 'pdf']).optional(),
    quality: z.number().int().min(0).max(100).optional(),
  })
  .nullish();

export const renderOptionsCodec: Codec<RenderOptions> = {
  type: 'render options',
  encode: (options) => {
    const wire: Record<string, WireValue> = {};
    if (options.format) wire.format = options.format;
    if (options.quality !== undefined) wire.quality = options.quality;
    return wire;
  },
  decode: (wire) => parseWire(renderOptionsSchema, 'render options', wire) ?? {},
};
