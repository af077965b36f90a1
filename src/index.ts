/**
 * phantom-bridge
 *
 * Drive a headless rendering engine subprocess through typed page handles.
 */

export { EngineProcess, PortAllocator, resolveEngineBinary } from './process/index.js';
export type { EngineProcessEvents, EngineState, PortRange } from './process/index.js';

export { WebPage, PageRegistry } from './browser/index.js';
export type { FrameContextState, PageInfo } from './browser/index.js';

export {
  resolveEngineConfig,
  DEFAULT_PORT_RANGE,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_STOP_TIMEOUT_MS,
} from './config/index.js';
export type { EngineConfig, EngineOptions } from './config/index.js';

export {
  HeaderMap,
  ZERO_RECT,
  ZERO_POSITION,
  ZERO_SIZE,
  KEY_MODIFIER_FLAGS,
  isZeroRect,
  isZeroPosition,
  isZeroSize,
  isEmptyPaperSize,
  isSessionCookie,
  formatCookieExpiry,
} from './codec/index.js';
export type {
  Cookie,
  FrameSelector,
  HeadersInit,
  KeyboardEvent,
  KeyboardEventType,
  KeyModifier,
  MouseButton,
  MouseEvent,
  MouseEventType,
  PaperMargin,
  PaperSize,
  Position,
  Rect,
  RenderFormat,
  RenderOptions,
  Size,
  WebPageSettings,
} from './codec/index.js';

export {
  BridgeError,
  LaunchError,
  TimeoutError,
  ChannelError,
  TransportError,
  RemoteError,
  InvalidHandleError,
  RegistryError,
  FrameNotFoundError,
} from './shared/errors/index.js';
export type { BridgeErrorCode } from './shared/errors/index.js';

export {
  LoggingService,
  createLogger,
  getLogger,
  setLogger,
  type LogLevel,
  type LogEntry,
  type Logger,
} from './shared/services/logging.service.js';
