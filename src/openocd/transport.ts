/**
 * Session Transport
 * Single stream connection to the OpenOCD telnet console with prompt framing
 */

import * as net from 'node:net';
import type { Duplex } from 'node:stream';
import { ConnectionError, errorMessage } from '../errors.js';
import type { BufferStrategy } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Transport');

// Every console response ends with this prompt byte
export const PROMPT = '>';

export type ConsoleConnector = (options: { host: string; port: number; timeoutMs: number }) => Promise<Duplex>;

/**
 * Default connector: TCP with a bounded connect timeout
 */
export const connectTcp: ConsoleConnector = ({ host, port, timeoutMs }) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onError = (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };
    const timer = setTimeout(() => {
      socket.removeListener('error', onError);
      socket.destroy();
      reject(new Error(`connect timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });

/**
 * Strip the trailing prompt and surrounding whitespace from a framed response
 */
export function extractResponse(frame: string): string {
  const idx = frame.lastIndexOf(PROMPT);
  const body = idx >= 0 ? frame.slice(0, idx) : frame;
  return body.trim();
}

export interface ConsoleTransportOptions {
  connectTimeoutMs: number;
  bannerTimeoutMs: number;
  /**
   * `discard` drops bytes that arrived without a delimiter when a read times
   * out; `preserve` keeps them buffered for the next read.
   */
  bufferStrategy?: BufferStrategy;
  connector?: ConsoleConnector;
}

export class ConsoleTransport {
  private socket?: Duplex;
  private buffer: Buffer = Buffer.alloc(0);
  private connected = false;
  private ended = false;
  private inFlight = false;
  private wake?: () => void;
  private readonly connector: ConsoleConnector;
  private readonly bufferStrategy: BufferStrategy;

  constructor(private readonly options: ConsoleTransportOptions) {
    this.connector = options.connector ?? connectTcp;
    this.bufferStrategy = options.bufferStrategy ?? 'discard';
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Bytes received but not yet returned by a read */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Open the console connection and swallow the startup banner
   */
  async connect(host: string, port: number): Promise<void> {
    if (this.connected) {
      logger.info('Already connected to OpenOCD');
      return;
    }

    logger.info(`Connecting to OpenOCD on ${host}:${port}...`);
    try {
      const socket = await this.connector({ host, port, timeoutMs: this.options.connectTimeoutMs });
      this.attach(socket);
      await this.readUntil(PROMPT, this.options.bannerTimeoutMs);
      if (this.socket !== socket) {
        throw new Error('connection was closed during handshake');
      }
      if (this.ended) {
        throw new Error('connection closed by OpenOCD during handshake');
      }
      this.connected = true;
      logger.info('Connected to OpenOCD successfully');
    } catch (error) {
      logger.error('Error connecting to OpenOCD', { host, port, error: errorMessage(error) });
      this.socket?.destroy();
      this.release();
      throw new ConnectionError(host, port, { cause: error });
    }
  }

  /**
   * Close the connection; safe to call at any time
   */
  disconnect(): void {
    const socket = this.socket;
    if (socket) {
      try {
        socket.destroy();
        logger.info('Disconnected from OpenOCD');
      } catch (error) {
        logger.warn('Error closing console socket', { error: errorMessage(error) });
      }
    }
    this.release();
  }

  /**
   * Read until `delimiter`, `timeoutMs` or peer close.
   * On a match the frame includes the delimiter and surplus bytes stay buffered.
   */
  async readUntil(delimiter: string | Buffer, timeoutMs: number): Promise<Buffer> {
    const delim = typeof delimiter === 'string' ? Buffer.from(delimiter, 'ascii') : delimiter;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const idx = this.buffer.indexOf(delim);
      if (idx >= 0) {
        const end = idx + delim.length;
        const frame = Buffer.from(this.buffer.subarray(0, end));
        this.buffer = Buffer.from(this.buffer.subarray(end));
        return frame;
      }
      const remaining = deadline - Date.now();
      if (this.ended || !this.socket || remaining <= 0) {
        break;
      }
      await this.waitForData(remaining);
    }

    const partial = Buffer.from(this.buffer);
    if (this.bufferStrategy === 'discard') {
      this.buffer = Buffer.alloc(0);
    }
    return partial;
  }

  /**
   * Write one command line; embedded CR or LF is rejected
   */
  async sendLine(text: string): Promise<void> {
    // Each console line gets its own prompt; only one reply frame is read
    if (/[\r\n]/.test(text)) {
      throw new Error('command must be a single line');
    }
    const socket = this.socket;
    if (!socket || this.ended) {
      throw new Error('console connection is closed');
    }
    await new Promise<void>((resolve, reject) => {
      socket.write(`${text}\n`, 'ascii', (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * One request/response exchange: write the line, read to the prompt, strip it
   */
  async exchange(command: string, timeoutMs: number): Promise<string> {
    if (this.inFlight) {
      throw new Error(`command already in flight; refusing '${command}'`);
    }
    this.inFlight = true;
    try {
      await this.sendLine(command);
      const frame = await this.readUntil(PROMPT, timeoutMs);
      return extractResponse(frame.toString('ascii'));
    } finally {
      this.inFlight = false;
    }
  }

  private attach(socket: Duplex): void {
    this.socket = socket;
    this.ended = false;
    this.buffer = Buffer.alloc(0);

    socket.on('data', (chunk: Buffer | string) => {
      if (this.socket !== socket) return;
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'ascii') : chunk;
      this.buffer = Buffer.concat([this.buffer, bytes]);
      this.notify();
    });
    const onClosed = () => {
      if (this.socket !== socket) return;
      this.ended = true;
      this.connected = false;
      this.notify();
    };
    socket.on('end', onClosed);
    socket.on('close', onClosed);
    socket.on('error', (error: Error) => {
      if (this.socket !== socket) return;
      logger.warn('Console socket error', { error: error.message });
      onClosed();
    });
  }

  private waitForData(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, timeoutMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }

  private notify(): void {
    this.wake?.();
  }

  private release(): void {
    this.socket = undefined;
    this.connected = false;
    this.ended = false;
    this.buffer = Buffer.alloc(0);
    this.notify();
  }
}
