/**
 * Bridge Errors
 *
 * Error taxonomy for process supervision, transport and handle use.
 * Every error carries a code for programmatic handling and a context record for debugging.
 */

/**
 * Error codes, grouped by the class that raises them
 */
export type BridgeErrorCode =
  // LaunchError
  | 'BINARY_NOT_FOUND'
  | 'SPAWN_FAILED'
  | 'EXITED_DURING_STARTUP'
  | 'INVALID_STATE'
  | 'INVALID_CONFIG'
  // TimeoutError
  | 'STARTUP_TIMEOUT'
  // ChannelError
  | 'PORT_UNAVAILABLE'
  | 'PORT_EXHAUSTED'
  // TransportError
  | 'CONNECTION_FAILED'
  | 'MALFORMED_RESPONSE'
  | 'DECODE_FAILED'
  | 'TRANSPORT_CLOSED'
  // RemoteError
  | 'REMOTE_FAILURE'
  // InvalidHandleError
  | 'PAGE_CLOSED'
  | 'PROCESS_CLOSED'
  // RegistryError
  | 'PROCESS_NOT_OPEN'
  // FrameNotFoundError
  | 'FRAME_NOT_FOUND';

/**
 * Base class for all bridge errors.
 *
 * @example
 * ```typescript
 * try {
 *   await page.switchToFrameName('missing');
 * } catch (error) {
 *   if (BridgeError.isBridgeError(error) && error.code === 'FRAME_NOT_FOUND') {
 *     // stay on the current frame
 *   }
 * }
 * ```
 */
export class BridgeError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: BridgeErrorCode;

  /**
   * Additional context for debugging
   */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: BridgeErrorCode,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'BridgeError';
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause:
        this.cause instanceof Error
          ? {
              name: this.cause.name,
              message: this.cause.message,
            }
          : undefined,
      stack: this.stack,
    };
  }

  /**
   * Type guard to check if an error is a BridgeError
   */
  static isBridgeError(error: unknown): error is BridgeError {
    return error instanceof BridgeError;
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * The engine executable could not be found, started, or kept alive during startup.
 */
export class LaunchError extends BridgeError {
  constructor(
    message: string,
    code: BridgeErrorCode = 'SPAWN_FAILED',
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause);
    this.name = 'LaunchError';
  }

  static binaryNotFound(searched: string[]): LaunchError {
    return new LaunchError(
      'Engine executable not found. Set PHANTOMJS_BIN or pass binPath.',
      'BINARY_NOT_FOUND',
      { searched }
    );
  }

  static spawnFailed(binPath: string, cause: Error): LaunchError {
    return new LaunchError(
      `Failed to start engine: ${cause.message}`,
      'SPAWN_FAILED',
      { binPath },
      cause
    );
  }

  static exitedDuringStartup(code: number | null, signal: string | null): LaunchError {
    return new LaunchError(
      `Engine exited during startup (exit code: ${code}, signal: ${signal})`,
      'EXITED_DURING_STARTUP',
      { exitCode: code, signal }
    );
  }

  static invalidState(currentState: string, attemptedOperation: string): LaunchError {
    return new LaunchError(
      `Invalid operation "${attemptedOperation}" in state "${currentState}"`,
      'INVALID_STATE',
      { currentState, attemptedOperation }
    );
  }

  static invalidConfig(issues: string[]): LaunchError {
    return new LaunchError(`Invalid engine configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', {
      issues,
    });
  }
}

/**
 * A readiness probe never succeeded within its bound.
 */
export class TimeoutError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STARTUP_TIMEOUT', context);
    this.name = 'TimeoutError';
  }

  static startup(port: number, timeoutMs: number): TimeoutError {
    return new TimeoutError(
      `Engine control endpoint did not become available within ${timeoutMs}ms`,
      { port, timeoutMs }
    );
  }
}

/**
 * The control channel could not be allocated or bound.
 */
export class ChannelError extends BridgeError {
  constructor(message: string, code: BridgeErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'ChannelError';
  }

  static portUnavailable(port: number): ChannelError {
    return new ChannelError(`Control port ${port} cannot be bound`, 'PORT_UNAVAILABLE', { port });
  }

  static portExhausted(portMin: number, portMax: number): ChannelError {
    return new ChannelError(`No available ports in range ${portMin}-${portMax}`, 'PORT_EXHAUSTED', {
      portMin,
      portMax,
    });
  }
}

/**
 * Channel-level fault. The owning process is no longer usable.
 */
export class TransportError extends BridgeError {
  constructor(
    message: string,
    code: BridgeErrorCode = 'CONNECTION_FAILED',
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause);
    this.name = 'TransportError';
  }

  static connectionFailed(member: string, cause: Error): TransportError {
    return new TransportError(
      `Connection to engine failed during "${member}": ${cause.message}`,
      'CONNECTION_FAILED',
      { member },
      cause
    );
  }

  static malformedResponse(member: string, detail: string): TransportError {
    return new TransportError(
      `Malformed response to "${member}": ${detail}`,
      'MALFORMED_RESPONSE',
      { member }
    );
  }

  static decodeFailed(type: string, detail: string): TransportError {
    return new TransportError(`Cannot decode ${type}: ${detail}`, 'DECODE_FAILED', { type });
  }

  static closed(member: string): TransportError {
    return new TransportError(`Transport is closed; cannot call "${member}"`, 'TRANSPORT_CLOSED', {
      member,
    });
  }
}

/**
 * The engine rejected a well-formed request. The process stays usable.
 */
export class RemoteError extends BridgeError {
  /** Message supplied by the engine */
  readonly remoteMessage: string;

  constructor(member: string, remoteMessage: string, context?: Record<string, unknown>) {
    super(`Engine reported failure for "${member}": ${remoteMessage}`, 'REMOTE_FAILURE', {
      member,
      ...context,
    });
    this.name = 'RemoteError';
    this.remoteMessage = remoteMessage;
  }
}

/**
 * A page handle was used after its page or its process was closed.
 */
export class InvalidHandleError extends BridgeError {
  constructor(message: string, code: BridgeErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'InvalidHandleError';
  }

  static pageClosed(operation: string): InvalidHandleError {
    return new InvalidHandleError(
      `Cannot call "${operation}" on a closed page`,
      'PAGE_CLOSED',
      { operation }
    );
  }

  static processClosed(operation: string): InvalidHandleError {
    return new InvalidHandleError(
      `Cannot call "${operation}": the owning process is closed`,
      'PROCESS_CLOSED',
      { operation }
    );
  }
}

/**
 * A page could not be created because the owning process is not open.
 */
export class RegistryError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROCESS_NOT_OPEN', context);
    this.name = 'RegistryError';
  }

  static processNotOpen(state: string): RegistryError {
    return new RegistryError(`Cannot create a page while the process is ${state}`, { state });
  }
}

/**
 * A frame switch named a frame that is not in the current frameset.
 */
export class FrameNotFoundError extends BridgeError {
  constructor(selector: string | number, available?: string[]) {
    super(
      typeof selector === 'number'
        ? `No frame at position ${selector} in the current frameset`
        : `No frame named "${selector}" in the current frameset`,
      'FRAME_NOT_FOUND',
      { selector, available }
    );
    this.name = 'FrameNotFoundError';
  }
}
