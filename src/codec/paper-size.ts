/**
 * Paper size codec
 *
 * A paper size is either explicit width/height or a named format, with an
 * optional orientation and an optional margin. The representations are kept
 * as given; nothing is synthesized from the other form.
 */

import { z } from 'zod';
import { parseWire, type Codec, type WireValue } from './codec.js';

export interface PaperMargin {
  top: string;
  bottom: string;
  left: string;
  right: string;
}

export interface PaperSize {
  /** Explicit width, e.g. "5in" */
  width?: string;
  /** Explicit height, e.g. "10in" */
  height?: string;
  /** Named format, e.g. "A4" or "Letter" */
  format?: string;
  /** "portrait" or "landscape" */
  orientation?: string;
  /** Absent means no margin, which differs from a margin of empty strings */
  margin?: PaperMargin;
}

/**
 * Whether no paper size has been configured.
 */
export function isEmptyPaperSize(size: PaperSize): boolean {
  return !size.width && !size.height && !size.format && !size.orientation && !size.margin;
}

const dimension = z.union([z.string(), z.number()]).nullish();

const wireMarginSchema = z.union([
  z.string(),
  z.number(),
  z.object({
    top: dimension,
    bottom: dimension,
    left: dimension,
    right: dimension,
  }),
]);

const wirePaperSizeSchema = z
  .object({
    width: dimension,
    height: dimension,
    format: z.string().nullish(),
    orientation: z.string().nullish(),
    margin: wireMarginSchema.nullish(),
  })
  .nullish();

function dimensionToString(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  // Bare numbers are pixels to the engine.
  return typeof value === 'number' ? `${value}px` : value;
}

function decodeMargin(wire: z.output<typeof wireMarginSchema>): PaperMargin {
  if (typeof wire === 'string' || typeof wire === 'number') {
    const all = dimensionToString(wire);
    return { top: all, bottom: all, left: all, right: all };
  }
  return {
    top: dimensionToString(wire.top),
    bottom: dimensionToString(wire.bottom),
    left: dimensionToString(wire.left),
    right: dimensionToString(wire.right),
  };
}

function encodePaperSize(size: PaperSize): WireValue {
  const wire: Record<string, WireValue> = {};
  if (size.width) wire.width = size.width;
  if (size.height) wire.height = size.height;
  if (size.format) wire.format = size.format;
  if (size.orientation) wire.orientation = size.orientation;
  if (size.margin) {
    wire.margin = {
      top: size.margin.top,
      bottom: size.margin.bottom,
      left: size.margin.left,
      right: size.margin.right,
    };
  }
  return wire;
}

function decodePaperSize(wire: unknown): PaperSize {
  const parsed = parseWire(wirePaperSizeSchema, 'paper size', wire);
  const size: PaperSize = {};
  if (!parsed) {
    return size;
  }

  const width = dimensionToString(parsed.width);
  const height = dimensionToString(parsed.height);
  if (width) size.width = width;
  if (height) size.height = height;
  if (parsed.format) size.format = parsed.format;
  if (parsed.orientation) size.orientation = parsed.orientation;
  if (parsed.margin !== null && parsed.margin !== undefined) {
    size.margin = decodeMargin(parsed.margin);
  }
  return size;
}

export const paperSizeCodec: Codec<PaperSize> = {
  type: 'paper size',
  encode: encodePaperSize,
  decode: decodePaperSize,
};
