/**
 * Command Executor
 * Sends console commands, classifies responses and retries with halt recovery
 */

import { CommandFailedError, NotConnectedError } from '../errors.js';
import { DEFAULT_FAILURE_MARKERS } from '../config/session-config.js';
import type { SleepFn } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

const logger = createLogger('Executor');

export const STATUS_COMMAND = 'targets';
export const HALT_COMMAND = 'halt';

// Commands that change run state themselves; retrying them never halts first
export const RUN_STATE_COMMANDS: ReadonlySet<string> = new Set(['halt', 'reset halt', 'reset run']);

/**
 * The slice of the transport the executor needs
 */
export interface CommandTransport {
  isConnected(): boolean;
  exchange(command: string, timeoutMs: number): Promise<string>;
}

export type FailureClassifier = (response: string | undefined) => boolean;

/**
 * Heuristic classifier: a missing response, or one containing any marker
 * (case-insensitive), is a failure. Console text that happens to contain a
 * marker is misread as a failure, and a failure worded without one passes.
 */
export function createFailureClassifier(markers: readonly string[] = DEFAULT_FAILURE_MARKERS): FailureClassifier {
  const lowered = markers.map((marker) => marker.toLowerCase());
  return (response) => {
    if (response === undefined) return true;
    const text = response.toLowerCase();
    return lowered.some((marker) => text.includes(marker));
  };
}

export interface RetryPolicy<T> {
  attempt: () => Promise<T>;
  isFailure: (result: T) => boolean;
  maxAttempts: number;
  backoffMs: number;
  sleep: SleepFn;
  /** Runs between a failed attempt and the next one */
  recover?: () => Promise<void>;
  onRetry?: (nextAttempt: number, result: T) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; last: T | undefined; attempts: number };

/**
 * Bounded attempt loop; no delay after a success or after the final attempt
 */
export async function runWithRetry<T>(policy: RetryPolicy<T>): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let last: T | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await policy.attempt();
    if (!policy.isFailure(result)) {
      return { ok: true, value: result, attempts: attempt };
    }
    last = result;
    if (attempt < maxAttempts) {
      policy.onRetry?.(attempt + 1, result);
      if (policy.recover) {
        await policy.recover();
      }
      await policy.sleep(policy.backoffMs);
    }
  }

  return { ok: false, last, attempts: maxAttempts };
}

export interface CommandExecutorOptions {
  readTimeoutMs: number;
  retryBackoffMs: number;
  haltSettleMs: number;
  maxRetries?: number;
  failureMarkers?: readonly string[];
  classifier?: FailureClassifier;
  sleep?: SleepFn;
}

export interface SendOptions {
  maxRetries?: number;
  /** Halt the target between attempts (ignored for halt/reset commands) */
  checkHalt?: boolean;
}

export class CommandExecutor {
  private readonly classify: FailureClassifier;
  private readonly sleep: SleepFn;
  private readonly maxRetries: number;

  constructor(
    private readonly transport: CommandTransport,
    private readonly options: CommandExecutorOptions,
  ) {
    this.classify = options.classifier ?? createFailureClassifier(options.failureMarkers);
    this.sleep = options.sleep ?? defaultSleep;
    this.maxRetries = options.maxRetries ?? 3;
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  isFailure(response: string | undefined): boolean {
    return this.classify(response);
  }

  /**
   * Single exchange without retry; undefined when not connected or on transport error
   */
  async sendRaw(command: string): Promise<string | undefined> {
    if (!this.transport.isConnected()) {
      logger.error('Not connected to OpenOCD', { command });
      return undefined;
    }
    try {
      const response = await this.transport.exchange(command, this.options.readTimeoutMs);
      logger.debug('Command response', { command, response });
      return response;
    } catch (error) {
      logger.error('Error sending command', { command, error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }

  /**
   * Query run state; anything other than an explicit "halted" counts as not halted
   */
  async checkHalted(): Promise<boolean> {
    const response = await this.sendRaw(STATUS_COMMAND);
    if (response) {
      const text = response.toLowerCase();
      if (text.includes('halted')) return true;
      if (text.includes('running')) return false;
    }
    return false;
  }

  async ensureHalted(): Promise<void> {
    if (await this.checkHalted()) {
      return;
    }
    logger.warn('MCU not halted, attempting to halt...');
    await this.sendRaw(HALT_COMMAND);
    await this.sleep(this.options.haltSettleMs);
  }

  /**
   * Send with retry. Throws NotConnectedError up front and CommandFailedError
   * once every attempt has failed.
   */
  async send(command: string, options: SendOptions = {}): Promise<string> {
    if (!this.transport.isConnected()) {
      logger.error('Not connected to OpenOCD', { command });
      throw new NotConnectedError();
    }

    const maxAttempts = options.maxRetries ?? this.maxRetries;
    const checkHalt = options.checkHalt ?? true;
    const recover = checkHalt && !RUN_STATE_COMMANDS.has(command.trim()) ? () => this.ensureHalted() : undefined;

    const outcome = await runWithRetry<string | undefined>({
      attempt: () => this.sendRaw(command),
      isFailure: (response) => this.isFailure(response),
      maxAttempts,
      backoffMs: this.options.retryBackoffMs,
      sleep: this.sleep,
      recover,
      onRetry: (next, response) => {
        logger.warn(`Command failed, retrying (${next}/${Math.max(1, maxAttempts)})...`, { command, response });
      },
    });

    if (outcome.ok && outcome.value !== undefined) {
      return outcome.value;
    }

    const lastResponse = outcome.ok ? undefined : outcome.last;
    const error = new CommandFailedError(command, outcome.attempts, lastResponse);
    logger.error(error.message);
    throw error;
  }
}
