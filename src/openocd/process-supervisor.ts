/**
 * Process Supervisor
 * Owns the OpenOCD server process: start, liveness, graceful-then-forced stop
 */

import { execa, type ExecaChildProcess } from 'execa';
import { LaunchError, StartupError, errorMessage } from '../errors.js';
import type { SleepFn } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

const logger = createLogger('ProcessSupervisor');

// Keep the tail of stderr only; openocd can be chatty for hours
const MAX_STDERR_CHARS = 16_384;
const FORCE_KILL_GRACE_MS = 1000;

/**
 * Handle on a spawned server process
 */
export interface ServerProcess {
  readonly pid: number | undefined;
  hasExited(): boolean;
  exitCode(): number | undefined;
  /** Error emitted while spawning (ENOENT when the binary is missing) */
  spawnError(): Error | undefined;
  stderrText(): string;
  kill(signal: NodeJS.Signals): void;
  /** Resolves true once the process has exited, false if the timeout elapsed first */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export type ServerSpawner = (binary: string, args: string[]) => ServerProcess;

export function errnoCode(error: Error | undefined): string | undefined {
  if (error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

class ExecaServerProcess implements ServerProcess {
  private exited = false;
  private code?: number;
  private error?: Error;
  private stderr = '';
  private readonly exitPromise: Promise<void>;

  constructor(private readonly child: ExecaChildProcess) {
    child.stderr?.on('data', (chunk: Buffer) => {
      this.stderr = (this.stderr + chunk.toString('utf8')).slice(-MAX_STDERR_CHARS);
    });
    child.on('error', (error) => {
      this.error = error;
    });
    this.exitPromise = child.then(
      (result) => {
        this.exited = true;
        this.code = result.exitCode;
      },
      (error: unknown) => {
        this.exited = true;
        logger.debug('openocd process settled with error', { error: errorMessage(error) });
      },
    );
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  hasExited(): boolean {
    return this.exited;
  }

  exitCode(): number | undefined {
    return this.code;
  }

  spawnError(): Error | undefined {
    return this.error;
  }

  stderrText(): string {
    return this.stderr;
  }

  kill(signal: NodeJS.Signals): void {
    this.child.kill(signal);
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) return true;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    await Promise.race([this.exitPromise, timeout]);
    clearTimeout(timer);
    return this.exited;
  }
}

/**
 * Default spawner: execa with stdout discarded and stderr captured
 */
export const spawnWithExeca: ServerSpawner = (binary, args) => {
  const child = execa(binary, args, {
    reject: false,
    buffer: false,
    stdin: 'ignore',
    stdout: 'ignore',
    stderr: 'pipe',
  });
  return new ExecaServerProcess(child);
};

export interface ProcessSupervisorOptions {
  binary: string;
  startupSettleMs: number;
  stopTimeoutMs: number;
  spawner?: ServerSpawner;
  sleep?: SleepFn;
  /** Runs before the process is signalled; the session disconnects here */
  beforeStop?: () => Promise<void>;
}

export function buildServerArgs(interfaceConfig?: string, targetConfig?: string): string[] {
  const args: string[] = [];
  if (interfaceConfig) {
    args.push('-f', interfaceConfig);
  }
  if (targetConfig) {
    args.push('-f', targetConfig);
  }
  return args;
}

export class ProcessSupervisor {
  private process?: ServerProcess;
  // Spawned but still settling; a stop() in this window cancels the start
  private starting?: ServerProcess;
  private stopRequested = false;
  private readonly spawner: ServerSpawner;
  private readonly sleep: SleepFn;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.spawner = options.spawner ?? spawnWithExeca;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  isAlive(): boolean {
    return this.process !== undefined && !this.process.hasExited();
  }

  /**
   * Start the server; a live process makes this a no-op
   */
  async start(interfaceConfig?: string, targetConfig?: string): Promise<void> {
    if (this.isAlive()) {
      logger.info('OpenOCD is already running', { pid: this.pid });
      return;
    }

    const binary = this.options.binary;
    const args = buildServerArgs(interfaceConfig, targetConfig);
    logger.info('Starting OpenOCD', { command: [binary, ...args].join(' ') });

    let proc: ServerProcess;
    this.stopRequested = false;
    try {
      proc = this.spawner(binary, args);
    } catch (error) {
      throw new LaunchError(binary, { cause: error });
    }

    this.starting = proc;
    try {
      await this.sleep(this.options.startupSettleMs);
    } finally {
      this.starting = undefined;
    }

    if (this.stopRequested) {
      logger.warn('Stop requested while OpenOCD was starting');
      await this.terminate(proc);
      throw new StartupError('stopped while starting', proc.exitCode());
    }

    const spawnError = proc.spawnError();
    if (errnoCode(spawnError) === 'ENOENT') {
      throw new LaunchError(binary, { cause: spawnError });
    }
    if (proc.hasExited() || spawnError) {
      const stderr = proc.stderrText() || (spawnError ? spawnError.message : '');
      logger.error('OpenOCD failed to start', { exitCode: proc.exitCode(), stderr: stderr.trim() });
      throw new StartupError(stderr, proc.exitCode());
    }

    this.process = proc;
    logger.info('OpenOCD started successfully', { pid: proc.pid });
  }

  /**
   * Disconnect, then terminate the process (SIGTERM, SIGKILL after stopTimeoutMs).
   * Never throws.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      this.stopRequested = true;
    }
    if (this.options.beforeStop) {
      try {
        await this.options.beforeStop();
      } catch (error) {
        logger.warn('Disconnect before stop failed', { error: errorMessage(error) });
      }
    }

    const proc = this.process;
    this.process = undefined;
    if (proc) {
      await this.terminate(proc);
    }
  }

  // SIGTERM, then SIGKILL after stopTimeoutMs; never throws
  private async terminate(proc: ServerProcess): Promise<void> {
    if (proc.hasExited()) {
      return;
    }

    logger.info('Stopping OpenOCD...', { pid: proc.pid });
    try {
      proc.kill('SIGTERM');
      const exited = await proc.waitForExit(this.options.stopTimeoutMs);
      if (!exited) {
        logger.warn('OpenOCD did not exit in time, killing', { timeoutMs: this.options.stopTimeoutMs });
        proc.kill('SIGKILL');
        await proc.waitForExit(FORCE_KILL_GRACE_MS);
      }
      logger.info('OpenOCD stopped');
    } catch (error) {
      logger.error('Failed to stop OpenOCD', { error: errorMessage(error) });
    }
  }
}
