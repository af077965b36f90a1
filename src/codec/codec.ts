/**
 * Codec primitives
 *
 * A Codec maps one domain value type to and from the JSON wire encoding.
 * Every value crossing the control channel goes through exactly one codec,
 * so adding a value type touches this directory only.
 */

import { z } from 'zod';
import { TransportError } from '../shared/errors/index.js';

/**
 * JSON value as carried on the control channel
 */
export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

/**
 * Bidirectional mapping between a domain type and its wire form
 */
export interface Codec<T> {
  /** Name used in decode errors */
  readonly type: string;
  encode(value: T): WireValue;
  decode(wire: unknown): T;
}

/**
 * Parse a wire value against a schema, raising DECODE_FAILED on mismatch.
 */
export function parseWire<S extends z.ZodTypeAny>(
  schema: S,
  type: string,
  wire: unknown
): z.output<S> {
  const result = schema.safeParse(wire);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw TransportError.decodeFailed(type, detail);
  }
  return result.data;
}

export const wireValueSchema: z.ZodType<WireValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(wireValueSchema),
    z.record(wireValueSchema),
  ])
);

/**
 * Build a codec for a value whose wire form is itself (after validation).
 */
function passthrough<T extends WireValue>(type: string, schema: z.ZodType<T>): Codec<T> {
  return {
    type,
    encode: (value) => value,
    decode: (wire) => parseWire(schema, type, wire),
  };
}

export const stringCodec: Codec<string> = passthrough('string', z.string());

export const numberCodec: Codec<number> = passthrough('number', z.number());

export const booleanCodec: Codec<boolean> = passthrough('boolean', z.boolean());

export const stringListCodec: Codec<string[]> = passthrough('string list', z.array(z.string()));

/**
 * Engine string properties that report null before a document loads
 */
export const nullableStringCodec: Codec<string> = {
  type: 'string',
  encode: (value) => value,
  decode: (wire) => parseWire(z.string().nullable(), 'string', wire) ?? '',
};

/**
 * Results that carry no value (setters, actions)
 */
export const voidCodec: Codec<void> = {
  type: 'void',
  encode: () => null,
  decode: () => undefined,
};

/**
 * Arbitrary JSON returned by script evaluation
 */
export const jsonCodec: Codec<unknown> = {
  type: 'json',
  encode: (value) => {
    const encoded: unknown = JSON.parse(JSON.stringify(value ?? null));
    return parseWire(wireValueSchema, 'json', encoded);
  },
  decode: (wire) => wire ?? null,
};
