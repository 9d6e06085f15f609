/**
 * OpenOCD Session
 * Owns one server process, one console connection and the command stack on
 * top of them. Teardown always disconnects before stopping the process.
 */

import type { SessionConfig, SleepFn } from '../types.js';
import { CommandExecutor } from '../openocd/executor.js';
import { OperationLibrary } from '../openocd/operations.js';
import { ProcessSupervisor, type ServerSpawner } from '../openocd/process-supervisor.js';
import { ConsoleTransport, type ConsoleConnector } from '../openocd/transport.js';
import { createLogger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

const logger = createLogger('Session');

export interface SessionDependencies {
  spawner?: ServerSpawner;
  connector?: ConsoleConnector;
  sleep?: SleepFn;
}

export class OpenOcdSession {
  readonly transport: ConsoleTransport;
  readonly supervisor: ProcessSupervisor;
  readonly executor: CommandExecutor;
  readonly operations: OperationLibrary;
  private readonly sleep: SleepFn;

  constructor(
    readonly config: Readonly<SessionConfig>,
    deps: SessionDependencies = {},
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.transport = new ConsoleTransport({
      connectTimeoutMs: config.connectTimeoutMs,
      bannerTimeoutMs: config.bannerTimeoutMs,
      bufferStrategy: config.bufferStrategy,
      connector: deps.connector,
    });
    this.supervisor = new ProcessSupervisor({
      binary: config.binary,
      startupSettleMs: config.startupSettleMs,
      stopTimeoutMs: config.stopTimeoutMs,
      spawner: deps.spawner,
      sleep: this.sleep,
      beforeStop: async () => this.transport.disconnect(),
    });
    this.executor = new CommandExecutor(this.transport, {
      readTimeoutMs: config.readTimeoutMs,
      retryBackoffMs: config.retryBackoffMs,
      haltSettleMs: config.haltSettleMs,
      maxRetries: config.maxRetries,
      failureMarkers: config.failureMarkers,
      sleep: this.sleep,
    });
    this.operations = new OperationLibrary(this.executor);
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  async start(): Promise<void> {
    await this.supervisor.start(this.config.interfaceConfig, this.config.targetConfig);
  }

  async connect(): Promise<void> {
    await this.transport.connect(this.config.host, this.config.port);
  }

  /**
   * Start the server and connect; a failed connect stops the server again
   */
  async open(): Promise<void> {
    await this.start();
    try {
      await this.connect();
    } catch (error) {
      logger.error('Failed to connect to OpenOCD. Stopping...');
      await this.close();
      throw error;
    }
  }

  /**
   * Drop the console connection and open a fresh one; the process keeps running
   */
  async reconnect(): Promise<void> {
    this.transport.disconnect();
    await this.sleep(this.config.reconnectDelayMs);
    await this.connect();
  }

  async close(): Promise<void> {
    await this.supervisor.stop();
  }
}

export interface WithSessionOptions extends SessionDependencies {
  /** Aborting tears the session down; the in-flight command then fails */
  signal?: AbortSignal;
}

/**
 * Open a session, run `fn`, and close the session on every exit path
 */
export async function withSession<T>(
  config: Readonly<SessionConfig>,
  fn: (session: OpenOcdSession) => Promise<T>,
  options: WithSessionOptions = {},
): Promise<T> {
  const { signal, ...deps } = options;
  const session = new OpenOcdSession(config, deps);
  const onAbort = () => {
    logger.warn('Interrupted by user');
    session.close().catch((error: unknown) => {
      logger.error('Teardown after interrupt failed', { error: String(error) });
    });
  };
  signal?.addEventListener('abort', onAbort, { once: true });
  try {
    signal?.throwIfAborted();
    await session.open();
    signal?.throwIfAborted();
    return await fn(session);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    logger.info('Cleaning up...');
    await session.close();
  }
}
