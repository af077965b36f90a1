/**
 * Process Module
 *
 * Engine subprocess supervision.
 */

export { EngineProcess, SHELL_SCRIPT_NAME } from './engine-process.js';
export { PortAllocator, isPortAvailable } from './port-allocator.js';
export { resolveEngineBinary, WELL_KNOWN_ENGINE_PATHS } from './engine-binary.js';
export type { EngineProcessEvents, EngineState, PortRange } from './types.js';
