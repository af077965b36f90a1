/**
 * Error taxonomy exports
 */

export * from './bridge-error.js';
