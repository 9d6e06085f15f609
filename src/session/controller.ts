/**
 * Session Controller
 * Lazily opened, long-lived session for interactive front ends. Every call
 * goes through one CommandQueue so only one command is ever in flight.
 */

import type { SessionConfig } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { CommandQueue } from './command-queue.js';
import { OpenOcdSession, type SessionDependencies } from './session.js';

const logger = createLogger('SessionController');

export class SessionController {
  private session?: OpenOcdSession;
  private readonly queue = new CommandQueue();

  constructor(
    private readonly config: Readonly<SessionConfig>,
    private readonly deps: SessionDependencies = {},
  ) {}

  isOpen(): boolean {
    return this.session !== undefined;
  }

  /**
   * Run a task against the session, opening (or repairing) it first
   */
  run<T>(task: (session: OpenOcdSession) => Promise<T>): Promise<T> {
    return this.queue.run(async () => task(await this.ensureOpen()));
  }

  /**
   * Explicit reconnect action: new console connection, same server process
   */
  reconnect(): Promise<void> {
    return this.queue.run(async () => {
      const session = await this.ensureOpen();
      await session.reconnect();
    });
  }

  close(): Promise<void> {
    return this.queue.run(async () => {
      const session = this.session;
      this.session = undefined;
      if (session) {
        await session.close();
      }
    });
  }

  private async ensureOpen(): Promise<OpenOcdSession> {
    const existing = this.session;
    if (existing) {
      if (!existing.supervisor.isAlive()) {
        logger.warn('OpenOCD process is gone, restarting session');
        this.session = undefined;
        await existing.close();
      } else {
        if (!existing.isConnected()) {
          logger.warn('Console connection lost, reconnecting');
          await existing.connect();
        }
        return existing;
      }
    }

    const session = new OpenOcdSession(this.config, this.deps);
    await session.open();
    this.session = session;
    return session;
  }
}
