/**
 * Engine Process
 *
 * Supervises one engine subprocess running the control script.
 * Handles process lifecycle: open, close, crash and channel-fault detection.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { copyFile, mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PageRegistry, type WebPage } from '../browser/index.js';
import { resolveEngineConfig, type EngineConfig, type EngineOptions } from '../config/index.js';
import {
  BridgeError,
  LaunchError,
  RegistryError,
  TimeoutError,
  toError,
  type TransportError,
} from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { HttpTransport } from '../transport/index.js';
import { resolveEngineBinary } from './engine-binary.js';
import { PortAllocator } from './port-allocator.js';
import type { EngineProcessEvents, EngineState, PortRange } from './types.js';

const logger = createLogger('EngineProcess');

/** Control script copied into the working directory on every open */
const SHELL_SCRIPT = fileURLToPath(new URL('../../assets/shell.js', import.meta.url));

export const SHELL_SCRIPT_NAME = 'shell.js';

const READY_POLL_INTERVAL_MS = 100;

/**
 * One allocator per port range, shared by every process in this runtime
 */
const sharedAllocators = new Map<string, PortAllocator>();

function sharedPortAllocator(range: PortRange): PortAllocator {
  const key = `${range.min}-${range.max}`;
  let allocator = sharedAllocators.get(key);
  if (!allocator) {
    allocator = new PortAllocator(range);
    sharedAllocators.set(key, allocator);
  }
  return allocator;
}

/**
 * Type-safe EventEmitter for EngineProcess
 */
interface EngineProcessEmitter {
  on<K extends keyof EngineProcessEvents>(
    event: K,
    listener: (data: EngineProcessEvents[K]) => void
  ): this;
  once<K extends keyof EngineProcessEvents>(
    event: K,
    listener: (data: EngineProcessEvents[K]) => void
  ): this;
  emit<K extends keyof EngineProcessEvents>(event: K, data: EngineProcessEvents[K]): boolean;
  off<K extends keyof EngineProcessEvents>(
    event: K,
    listener: (data: EngineProcessEvents[K]) => void
  ): this;
  removeAllListeners<K extends keyof EngineProcessEvents>(event?: K): this;
}

/**
 * Per-open resources, released together
 */
interface OpenCycle {
  child: ChildProcess;
  exited: Promise<void>;
  port: number;
  workDir: string;
  tempDir: boolean;
  transport?: HttpTransport;
  /** First failure observed while opening */
  startupFailure?: BridgeError;
}

/**
 * Supervises an engine subprocess and hands out page handles bound to it.
 *
 * @example
 * ```typescript
 * const engine = new EngineProcess({ startupTimeoutMs: 10_000 });
 *
 * engine.on('crashed', ({ code }) => {
 *   console.error(`engine died with code ${code}`);
 * });
 *
 * await engine.open();
 * const page = await engine.createWebPage();
 * await page.open('http://example.com');
 * console.log(await page.title());
 * await engine.close();
 * ```
 */
export class EngineProcess extends EventEmitter implements EngineProcessEmitter {
  private readonly config: EngineConfig;
  private readonly allocator: PortAllocator;
  private cycle: OpenCycle | null = null;
  private registry: PageRegistry | null = null;
  private _state: EngineState = 'unopened';
  private _binPath: string | undefined;
  private opening: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  /**
   * @param options - Explicit options, merged over PHANTOMJS_* environment variables
   * @param allocator - Port allocator; processes share one per port range by default
   * @throws LaunchError with INVALID_CONFIG for malformed options
   */
  constructor(options: EngineOptions = {}, allocator?: PortAllocator) {
    super();
    this.config = resolveEngineConfig(options);
    this.allocator = allocator ?? sharedPortAllocator(this.config.portRange);
  }

  get state(): EngineState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'open';
  }

  /**
   * Subprocess ID while a subprocess exists
   */
  get pid(): number | undefined {
    return this.cycle?.child.pid;
  }

  /**
   * Control port while a subprocess exists
   */
  get port(): number | undefined {
    return this.cycle?.port;
  }

  /**
   * Working directory holding the control script while a subprocess exists
   */
  get path(): string | undefined {
    return this.cycle?.workDir;
  }

  /**
   * Executable resolved by the most recent open()
   */
  get binPath(): string | undefined {
    return this._binPath;
  }

  /**
   * Registry of the current open cycle, for introspection
   */
  get pages(): PageRegistry | undefined {
    return this.registry ?? undefined;
  }

  /**
   * Start the engine and wait until its control endpoint answers.
   *
   * @throws LaunchError if the executable is missing, fails to start or exits early
   * @throws ChannelError if no control port can be bound
   * @throws TimeoutError if the endpoint does not answer within startupTimeoutMs
   */
  async open(): Promise<void> {
    if (this._state === 'opening' || this._state === 'open' || this._state === 'closing') {
      throw LaunchError.invalidState(this._state, 'open');
    }

    this._state = 'opening';
    this.opening = this.start();
    try {
      await this.opening;
    } finally {
      this.opening = null;
    }
  }

  /**
   * Stop the engine. Every page handle is invalid from the moment this is called.
   * Safe to call in any state; waits for a shutdown already in progress.
   */
  async close(): Promise<void> {
    if (this.opening) {
      await this.opening.catch(() => undefined);
    }
    if (this.closing) {
      return this.closing;
    }
    if (this._state !== 'open') {
      return;
    }
    return this.beginShutdown('close requested');
  }

  /**
   * Allocate a new page inside the engine.
   *
   * @throws RegistryError if the process is not open
   */
  async createWebPage(): Promise<WebPage> {
    if (this._state !== 'open' || !this.registry) {
      throw RegistryError.processNotOpen(this._state);
    }
    return this.registry.createWebPage();
  }

  private async start(): Promise<void> {
    let cycle: OpenCycle | undefined;
    let port: number | undefined;
    let tempDir: string | undefined;

    try {
      const binPath = resolveEngineBinary(this.config.binPath);
      this._binPath = binPath;

      port =
        this.config.port !== undefined
          ? await this.allocator.allocatePort(this.config.port)
          : await this.allocator.allocate();

      let workDir: string;
      if (this.config.path !== undefined) {
        workDir = this.config.path;
        await mkdir(workDir, { recursive: true });
      } else {
        workDir = await mkdtemp(join(tmpdir(), 'phantom-bridge-'));
        tempDir = workDir;
      }
      const scriptPath = join(workDir, SHELL_SCRIPT_NAME);
      await copyFile(SHELL_SCRIPT, scriptPath);

      const args = this.buildArgs(scriptPath, port);
      logger.debug('Starting engine process', { binPath, port, workDir, args });

      cycle = this.spawnChild(binPath, args, port, workDir, tempDir !== undefined);
      this.cycle = cycle;

      const transport = new HttpTransport({
        baseUrl: `http://127.0.0.1:${port}`,
        onFault: (error) => this.handleFault(error),
      });
      cycle.transport = transport;

      await this.waitForReady(cycle, transport);

      this.registry = new PageRegistry(transport);
      this._state = 'open';

      const pid = cycle.child.pid ?? -1;
      this.emit('opened', { pid, port });
      logger.info('Engine process opened', { pid, port, workDir });
    } catch (error) {
      if (cycle) {
        cycle.transport?.close();
        cycle.child.kill('SIGKILL');
        this.cycle = null;
      }
      if (port !== undefined) {
        this.allocator.release(port);
      }
      if (tempDir !== undefined) {
        await removeDir(tempDir);
      }
      this._state = 'closed';

      const failure = BridgeError.isBridgeError(error)
        ? error
        : LaunchError.spawnFailed(this._binPath ?? '<unresolved>', toError(error));
      logger.error('Engine process failed to open', failure, { port });
      throw failure;
    }
  }

  /**
   * Build engine command line arguments
   */
  private buildArgs(scriptPath: string, port: number): string[] {
    const args: string[] = [];
    if (this.config.offlineStoragePath !== undefined) {
      args.push(`--offline-storage-path=${this.config.offlineStoragePath}`);
    }
    if (this.config.offlineStorageQuota !== undefined) {
      args.push(`--offline-storage-quota=${this.config.offlineStorageQuota}`);
    }
    if (this.config.localStoragePath !== undefined) {
      args.push(`--local-storage-path=${this.config.localStoragePath}`);
    }
    args.push(...this.config.args, scriptPath, String(port));
    return args;
  }

  private spawnChild(
    binPath: string,
    args: string[],
    port: number,
    workDir: string,
    tempDir: boolean
  ): OpenCycle {
    const child = spawn(binPath, args, {
      cwd: workDir,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: false,
    });

    let markExited: () => void = () => undefined;
    const exited = new Promise<void>((resolve) => {
      markExited = resolve;
    });
    const cycle: OpenCycle = { child, exited, port, workDir, tempDir };

    child.on('error', (error) => {
      if (this._state === 'opening' && this.cycle === cycle) {
        cycle.startupFailure ??= LaunchError.spawnFailed(binPath, error);
        // A child that never started emits no exit
        if (child.pid === undefined) {
          markExited();
        }
        return;
      }
      logger.error('Engine process error', error, { pid: child.pid });
      if (this.listenerCount('error') > 0) {
        this.emit('error', { error });
      }
    });

    child.on('exit', (code, signal) => {
      markExited();
      this.handleExit(cycle, code, signal);
    });

    const logOutput = (stream: string) => (data: Buffer) => {
      for (const line of data.toString().split('\n')) {
        const message = line.trim();
        if (message) {
          logger.debug(`Engine ${stream}`, { pid: child.pid, message });
        }
      }
    };
    child.stdout?.on('data', logOutput('stdout'));
    child.stderr?.on('data', logOutput('stderr'));

    return cycle;
  }

  private handleExit(cycle: OpenCycle, code: number | null, signal: string | null): void {
    if (this.cycle !== cycle) {
      return;
    }

    this.emit('exit', { code, signal });

    if (this._state === 'opening') {
      cycle.startupFailure ??= LaunchError.exitedDuringStartup(code, signal);
      return;
    }

    if (this._state === 'open') {
      logger.warning('Engine process exited unexpectedly', { exitCode: code, signal });
      this.beginShutdown('crash').catch((shutdownError: unknown) => {
        logger.error('Engine shutdown after crash failed', toError(shutdownError));
      });
      this.emit('crashed', { code, signal });
    }
  }

  private handleFault(error: TransportError): void {
    if (this._state !== 'open' || this.closing) {
      return;
    }
    logger.warning('Closing engine process after channel fault', { code: error.code });
    this.beginShutdown('channel fault').catch((shutdownError: unknown) => {
      logger.error('Engine shutdown after fault failed', toError(shutdownError));
    });
  }

  private beginShutdown(reason: string): Promise<void> {
    const cycle = this.cycle;
    if (!cycle) {
      this._state = 'closed';
      return Promise.resolve();
    }
    logger.debug('Closing engine process', { reason, pid: cycle.child.pid });
    this.closing = this.shutdown(cycle).finally(() => {
      this.closing = null;
    });
    return this.closing;
  }

  private async shutdown(cycle: OpenCycle): Promise<void> {
    this._state = 'closing';
    this.registry?.invalidate();
    this.registry = null;
    cycle.transport?.close();

    const { child } = cycle;
    if (child.exitCode === null && child.signalCode === null) {
      await this.terminate(cycle);
    }

    this.allocator.release(cycle.port);
    if (cycle.tempDir) {
      await removeDir(cycle.workDir);
    }
    child.removeAllListeners();
    child.stdout?.removeAllListeners();
    child.stderr?.removeAllListeners();
    if (this.cycle === cycle) {
      this.cycle = null;
    }
    this._state = 'closed';
    logger.info('Engine process closed', { port: cycle.port });
  }

  /**
   * SIGTERM, then SIGKILL after stopTimeoutMs
   */
  private async terminate(cycle: OpenCycle): Promise<void> {
    const forceKillTimer = setTimeout(() => {
      logger.warning('Engine process did not exit gracefully, sending SIGKILL', {
        pid: cycle.child.pid,
      });
      cycle.child.kill('SIGKILL');
    }, this.config.stopTimeoutMs);

    cycle.child.kill('SIGTERM');
    try {
      await cycle.exited;
    } finally {
      clearTimeout(forceKillTimer);
    }
  }

  /**
   * Poll the liveness endpoint until it answers or the startup bound elapses.
   */
  private async waitForReady(cycle: OpenCycle, transport: HttpTransport): Promise<void> {
    const deadline = Date.now() + this.config.startupTimeoutMs;

    for (;;) {
      if (cycle.startupFailure) {
        throw cycle.startupFailure;
      }
      if (await transport.ping()) {
        return;
      }
      if (cycle.startupFailure) {
        throw cycle.startupFailure;
      }
      if (Date.now() >= deadline) {
        throw TimeoutError.startup(cycle.port, this.config.startupTimeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, READY_POLL_INTERVAL_MS));
    }
  }
}

async function removeDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    logger.warning('Failed to remove working directory', {
      dir,
      error: toError(error).message,
    });
  }
}
