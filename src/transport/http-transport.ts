/**
 * HTTP Transport
 *
 * Sends control-protocol requests to the engine's loopback listener with fetch.
 * One request is in flight at a time; there are no retries and no per-call timeout.
 */

import { encodeFramePath, remoteIdCodec } from '../codec/index.js';
import { RemoteError, TransportError, toError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { CallQueue } from './call-queue.js';
import {
  CREATE_PAGE_PATH,
  INVOKE_PATH,
  PING_PATH,
  responseEnvelopeSchema,
  type InvokeRequest,
} from './protocol.js';
import type { ResultDecoder, Transport } from './transport.interface.js';

const logger = createLogger('HttpTransport');

export interface HttpTransportConfig {
  /** Base URL of the control listener, e.g. http://127.0.0.1:9400 */
  baseUrl: string;
  /** Timeout for a single liveness probe */
  pingTimeoutMs?: number;
  /** Called once, on the first channel fault */
  onFault?: (error: TransportError) => void;
}

export class HttpTransport implements Transport {
  readonly baseUrl: string;

  private readonly pingTimeoutMs: number;
  private readonly onFault?: (error: TransportError) => void;
  private readonly queue = new CallQueue();
  private closed = false;

  constructor(config: HttpTransportConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.pingTimeoutMs = config.pingTimeoutMs ?? 1000;
    this.onFault = config.onFault;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async ping(): Promise<boolean> {
    if (this.closed) {
      return false;
    }

    try {
      const response = await fetch(`${this.baseUrl}${PING_PATH}`, {
        signal: AbortSignal.timeout(this.pingTimeoutMs),
      });
      if (!response.ok) {
        return false;
      }
      const envelope = responseEnvelopeSchema.safeParse(await response.json());
      return envelope.success && envelope.data.status === 'ok';
    } catch {
      // Listener not up yet
      return false;
    }
  }

  async createPage(): Promise<string> {
    return this.queue.run(() => this.send(CREATE_PAGE_PATH, 'createPage', {}, remoteIdCodec));
  }

  async call<T>(request: InvokeRequest, decoder: ResultDecoder<T>): Promise<T> {
    return this.queue.run(() =>
      this.send(
        INVOKE_PATH,
        request.member,
        {
          target: request.target,
          member: request.member,
          frame: request.frame?.length ? encodeFramePath(request.frame) : undefined,
          args: request.args ?? [],
        },
        decoder
      )
    );
  }

  close(): void {
    this.closed = true;
  }

  private async send<T>(
    path: string,
    member: string,
    body: object,
    decoder: ResultDecoder<T>
  ): Promise<T> {
    if (this.closed) {
      throw TransportError.closed(member);
    }

    let text: string;
    let status: number;
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(body),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      throw this.fault(TransportError.connectionFailed(member, toError(error)));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw this.fault(
        TransportError.malformedResponse(member, `body is not JSON (HTTP ${status})`)
      );
    }

    const envelope = responseEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw this.fault(
        TransportError.malformedResponse(member, `unexpected envelope (HTTP ${status})`)
      );
    }

    if (envelope.data.status === 'error') {
      logger.debug('Engine rejected request', { member, message: envelope.data.message });
      throw new RemoteError(member, envelope.data.message);
    }

    try {
      return decoder.decode(envelope.data.result);
    } catch (error) {
      if (error instanceof TransportError) {
        throw this.fault(error);
      }
      throw error;
    }
  }

  /**
   * Mark the channel dead and notify the owner the first time.
   */
  private fault(error: TransportError): TransportError {
    if (!this.closed) {
      this.closed = true;
      logger.error('Control channel fault', error, { baseUrl: this.baseUrl });
      this.onFault?.(error);
    }
    return error;
  }
}
