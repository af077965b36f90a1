/**
 * Port Allocator
 *
 * Hands out control ports for engine processes. Ports are reserved in-process
 * and bind-checked on 127.0.0.1 before use, so concurrent processes never share one.
 */

import { createServer } from 'node:net';
import { ChannelError } from '../shared/errors/index.js';
import type { PortRange } from './types.js';

/**
 * @example
 * ```typescript
 * const allocator = new PortAllocator({ min: 20202, max: 20301 });
 *
 * const port = await allocator.allocate();   // first free port, e.g. 20202
 * allocator.release(port);
 * ```
 */
export class PortAllocator {
  private readonly min: number;
  private readonly max: number;
  private readonly allocatedPorts = new Set<number>();

  constructor(range: PortRange) {
    if (range.min > range.max) {
      throw new RangeError(`Invalid port range: min (${range.min}) > max (${range.max})`);
    }
    if (range.min < 1 || range.max > 65535) {
      throw new RangeError('Port range must be between 1 and 65535');
    }
    this.min = range.min;
    this.max = range.max;
  }

  get portRange(): PortRange {
    return { min: this.min, max: this.max };
  }

  get allocatedCount(): number {
    return this.allocatedPorts.size;
  }

  get capacity(): number {
    return this.max - this.min + 1;
  }

  /**
   * Reserve the first port in range that is free both here and on the system.
   *
   * @throws ChannelError with PORT_EXHAUSTED when every port is taken
   */
  async allocate(): Promise<number> {
    for (let port = this.min; port <= this.max; port++) {
      if (this.allocatedPorts.has(port)) {
        continue;
      }
      // Reserve before the async check so a concurrent allocate skips it
      this.allocatedPorts.add(port);
      if (await isPortAvailable(port)) {
        return port;
      }
      this.allocatedPorts.delete(port);
    }

    throw ChannelError.portExhausted(this.min, this.max);
  }

  /**
   * Reserve a specific port, which need not lie in the range.
   *
   * @throws ChannelError with PORT_UNAVAILABLE when it is reserved or cannot be bound
   */
  async allocatePort(port: number): Promise<number> {
    if (this.allocatedPorts.has(port)) {
      throw ChannelError.portUnavailable(port);
    }
    this.allocatedPorts.add(port);
    if (!(await isPortAvailable(port))) {
      this.allocatedPorts.delete(port);
      throw ChannelError.portUnavailable(port);
    }
    return port;
  }

  /**
   * @returns false if the port was not allocated
   */
  release(port: number): boolean {
    return this.allocatedPorts.delete(port);
  }

  isAllocated(port: number): boolean {
    return this.allocatedPorts.has(port);
  }

  getAllocatedPorts(): number[] {
    return Array.from(this.allocatedPorts).sort((a, b) => a - b);
  }
}

/**
 * Check that nothing on this host is listening on the loopback port.
 */
export async function isPortAvailable(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();

    server.once('error', () => {
      resolve(false);
    });

    server.once('listening', () => {
      server.close(() => {
        resolve(true);
      });
    });

    server.listen(port, '127.0.0.1');
  });
}
