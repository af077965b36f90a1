/**
 * Input event codec
 *
 * Mouse and keyboard events forwarded to the engine's sendEvent().
 */

import { z } from 'zod';
import { parseWire, type Codec } from './codec.js';

export type MouseEventType = 'click' | 'doubleclick' | 'mousedown' | 'mouseup' | 'mousemove';

export type MouseButton = 'left' | 'middle' | 'right';

export interface MouseEvent {
  type: MouseEventType;
  x: number;
  y: number;
  /** Defaults to left */
  button?: MouseButton;
}

export type KeyboardEventType = 'keypress' | 'keydown' | 'keyup';

export type KeyModifier = 'shift' | 'ctrl' | 'alt' | 'meta' | 'keypad';

export interface KeyboardEvent {
  type: KeyboardEventType;
  /** A key code, or a string typed one character at a time */
  key: string | number;
  modifiers?: KeyModifier[];
}

/**
 * Engine modifier bit flags
 */
export const KEY_MODIFIER_FLAGS: Record<KeyModifier, number> = {
  shift: 0x02000000,
  ctrl: 0x04000000,
  alt: 0x08000000,
  meta: 0x10000000,
  keypad: 0x20000000,
};

const KEY_MODIFIERS: readonly KeyModifier[] = ['shift', 'ctrl', 'alt', 'meta', 'keypad'];

export function modifiersToMask(modifiers: readonly KeyModifier[] = []): number {
  return modifiers.reduce((mask, modifier) => mask | KEY_MODIFIER_FLAGS[modifier], 0);
}

export function maskToModifiers(mask: number): KeyModifier[] {
  return KEY_MODIFIERS.filter(
    (modifier) => (mask & KEY_MODIFIER_FLAGS[modifier]) !== 0
  );
}

const mouseEventSchema = z.object({
  type: z.enum(['click', 'doubleclick', 'mousedown', 'mouseup', 'mousemove']),
  x: z.number(),
  y: z.number(),
  button: z.enum(['left', 'middle', 'right']).default('left'),
});

const keyboardEventSchema = z.object({
  type: z.enum(['keypress', 'keydown', 'keyup']),
  key: z.union([z.string(), z.number()]),
  modifier: z.number().default(0),
});

export const mouseEventCodec: Codec<MouseEvent> = {
  type: 'mouse event',
  encode: (event) => ({
    type: event.type,
    x: event.x,
    y: event.y,
    button: event.button ?? 'left',
  }),
  decode: (wire) => parseWire(mouseEventSchema, 'mouse event', wire),
};

export const keyboardEventCodec: Codec<KeyboardEvent> = {
  type: 'keyboard event',
  encode: (event) => ({
    type: event.type,
    key: event.key,
    modifier: modifiersToMask(event.modifiers),
  }),
  decode: (wire) => {
    const parsed = parseWire(keyboardEventSchema, 'keyboard event', wire);
    const event: KeyboardEvent = { type: parsed.type, key: parsed.key };
    const modifiers = maskToModifiers(parsed.modifier);
    if (modifiers.length > 0) {
      event.modifiers = modifiers;
    }
    return event;
  },
};
