/**
 * Value Codec
 *
 * Domain value types and their wire mappings.
 */

export * from './codec.js';
export * from './geometry.js';
export * from './cookie.js';
export * from './headers.js';
export * from './paper-size.js';
export * from './settings.js';
export * from './input-events.js';
export * from './remote-refs.js';
export * from './render-options.js';
