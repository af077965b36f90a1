/**
 * RPC Transport
 */

export * from './protocol.js';
export * from './transport.interface.js';
export { HttpTransport, type HttpTransportConfig } from './http-transport.js';
export { CallQueue } from './call-queue.js';
