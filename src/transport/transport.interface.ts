/**
 * Transport Interface
 *
 * Abstraction over the control channel, so the registry and page handles
 * do not depend on how requests reach the engine.
 */

import type { Codec } from '../codec/index.js';
import type { InvokeRequest } from './protocol.js';

/**
 * The part of a codec the transport needs to turn a result into a value
 */
export type ResultDecoder<T> = Pick<Codec<T>, 'type' | 'decode'>;

export interface Transport {
  /** True once closed or faulted; every later call fails with TransportError */
  readonly isClosed: boolean;

  /**
   * Single liveness probe. Resolves false instead of throwing.
   */
  ping(): Promise<boolean>;

  /**
   * Allocate a page inside the engine and return its remote identifier.
   */
  createPage(): Promise<string>;

  /**
   * Invoke a member and decode its result.
   *
   * @throws RemoteError when the engine rejects the request
   * @throws TransportError on channel faults or undecodable results
   */
  call<T>(request: InvokeRequest, decoder: ResultDecoder<T>): Promise<T>;

  /**
   * Stop accepting calls. Does not notify the fault handler.
   */
  close(): void;
}
