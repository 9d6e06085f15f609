/**
 * Structured logger for openocd-session
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLevelName(value: string | undefined): value is LogLevel | 'silent' {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function currentLevel(): LogLevel | 'silent' {
  const configured = process.env.OCD_LOG_LEVEL?.toLowerCase();
  return isLevelName(configured) ? configured : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel()];
}

function formatMessage(level: LogLevel, module: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}${dataStr}`;
}

function write(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (shouldLog(level)) {
    process.stderr.write(`${formatMessage(level, module, message, data)}\n`);
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  return {
    debug: (message: string, data?: unknown) => write('debug', module, message, data),
    info: (message: string, data?: unknown) => write('info', module, message, data),
    warn: (message: string, data?: unknown) => write('warn', module, message, data),
    error: (message: string, data?: unknown) => write('error', module, message, data),
  };
}
