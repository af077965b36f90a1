/**
 * Geometry value types
 *
 * Rect, Position and Size are plain value objects. The all-zero value is the
 * "never configured" state on both sides of the wire.
 */

import { z } from 'zod';
import { parseWire, type Codec } from './codec.js';

export interface Rect {
  top: number;
  left: number;
  width: number;
  height: number;
}

export interface Position {
  top: number;
  left: number;
}

export interface Size {
  width: number;
  height: number;
}

export const ZERO_RECT: Readonly<Rect> = Object.freeze({ top: 0, left: 0, width: 0, height: 0 });

export const ZERO_POSITION: Readonly<Position> = Object.freeze({ top: 0, left: 0 });

export const ZERO_SIZE: Readonly<Size> = Object.freeze({ width: 0, height: 0 });

export function isZeroRect(rect: Rect): boolean {
  return rect.top === 0 && rect.left === 0 && rect.width === 0 && rect.height === 0;
}

export function isZeroPosition(position: Position): boolean {
  return position.top === 0 && position.left === 0;
}

export function isZeroSize(size: Size): boolean {
  return size.width === 0 && size.height === 0;
}

// The engine omits unset members and reports null before a page is laid out.
const coordinate = z.number().nullish().transform((value) => value ?? 0);

const rectSchema = z
  .object({ top: coordinate, left: coordinate, width: coordinate, height: coordinate })
  .nullish();

const positionSchema = z.object({ top: coordinate, left: coordinate }).nullish();

const sizeSchema = z.object({ width: coordinate, height: coordinate }).nullish();

export const rectCodec: Codec<Rect> = {
  type: 'rect',
  encode: ({ top, left, width, height }) => ({ top, left, width, height }),
  decode: (wire) => {
    const rect = parseWire(rectSchema, 'rect', wire);
    return rect ? { ...rect } : { ...ZERO_RECT };
  },
};

export const positionCodec: Codec<Position> = {
  type: 'position',
  encode: ({ top, left }) => ({ top, left }),
  decode: (wire) => {
    const position = parseWire(positionSchema, 'position', wire);
    return position ? { ...position } : { ...ZERO_POSITION };
  },
};

export const sizeCodec: Codec<Size> = {
  type: 'size',
  encode: ({ width, height }) => ({ width, height }),
  decode: (wire) => {
    const size = parseWire(sizeSchema, 'size', wire);
    return size ? { ...size } : { ...ZERO_SIZE };
  },
};
