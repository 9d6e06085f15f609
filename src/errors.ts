/**
 * Error taxonomy for the session engine.
 *
 * Every error carries a stable `code` so front ends can report it without
 * matching on message text.
 */

export type OpenOcdErrorCode =
  | 'launch_error'
  | 'startup_error'
  | 'connection_error'
  | 'not_connected'
  | 'command_failed'
  | 'file_not_found'
  | 'unknown_descriptor'
  | 'invalid_descriptor';

export class OpenOcdError extends Error {
  constructor(readonly code: OpenOcdErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OpenOcdError';
  }
}

/** The debug-server binary could not be located or spawned. */
export class LaunchError extends OpenOcdError {
  constructor(readonly binary: string, options?: { cause?: unknown }) {
    super('launch_error', `${binary} command not found. Please install OpenOCD or set OPENOCD_BIN.`, options);
    this.name = 'LaunchError';
  }
}

/** The process started but exited before it became ready. */
export class StartupError extends OpenOcdError {
  constructor(readonly stderr: string, readonly exitCode?: number) {
    const detail = stderr.trim();
    super('startup_error', detail ? `OpenOCD failed to start: ${detail}` : 'OpenOCD failed to start');
    this.name = 'StartupError';
  }
}

export class ConnectionError extends OpenOcdError {
  constructor(readonly host: string, readonly port: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('connection_error', `Could not connect to OpenOCD on ${host}:${port}${reason}`, options);
    this.name = 'ConnectionError';
  }
}

export class NotConnectedError extends OpenOcdError {
  constructor() {
    super('not_connected', 'Not connected to OpenOCD');
    this.name = 'NotConnectedError';
  }
}

export class CommandFailedError extends OpenOcdError {
  constructor(
    readonly command: string,
    readonly attempts: number,
    readonly lastResponse: string | undefined,
  ) {
    let message = `Command '${command}' failed after ${attempts} attempts`;
    if (lastResponse) {
      message += `\nLast OpenOCD response: ${lastResponse}`;
    }
    super('command_failed', message);
    this.name = 'CommandFailedError';
  }
}

export class FileNotFoundError extends OpenOcdError {
  constructor(readonly path: string) {
    super('file_not_found', `Firmware file '${path}' not found`);
    this.name = 'FileNotFoundError';
  }
}

export class UnknownDescriptorError extends OpenOcdError {
  constructor(readonly type: string, readonly index: number) {
    super('unknown_descriptor', `Unknown command type '${type}' at position ${index + 1}`);
    this.name = 'UnknownDescriptorError';
  }
}

export class InvalidDescriptorError extends OpenOcdError {
  constructor(readonly index: number, readonly issues: string[]) {
    super('invalid_descriptor', `Invalid command at position ${index + 1}: ${issues.join('; ')}`);
    this.name = 'InvalidDescriptorError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
