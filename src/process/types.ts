/**
 * Process Module Types
 */

/**
 * EngineProcess lifecycle states
 */
export type EngineState = 'unopened' | 'opening' | 'open' | 'closing' | 'closed';

/**
 * Events emitted by EngineProcess
 */
export interface EngineProcessEvents {
  /** The control endpoint answered its first liveness probe */
  opened: { pid: number; port: number };
  /** The subprocess exited, expectedly or not */
  exit: { code: number | null; signal: string | null };
  /** The subprocess exited while the process was open */
  crashed: { code: number | null; signal: string | null };
  /** The subprocess reported an error after startup */
  error: { error: Error };
}

/**
 * Inclusive port range
 */
export interface PortRange {
  min: number;
  max: number;
}
