/**
 * Shared type definitions for openocd-session
 */

// How readUntil treats bytes that arrived without a delimiter before timeout/close
export type BufferStrategy = 'discard' | 'preserve';

// Session configuration
export interface SessionConfig {
  binary: string;
  host: string;
  port: number;
  interfaceConfig?: string;
  targetConfig?: string;
  maxRetries: number;
  failureMarkers: string[];
  bufferStrategy: BufferStrategy;
  startupSettleMs: number;
  stopTimeoutMs: number;
  connectTimeoutMs: number;
  bannerTimeoutMs: number;
  readTimeoutMs: number;
  retryBackoffMs: number;
  haltSettleMs: number;
  reconnectDelayMs: number;
}

// Entry of the fixed target menu
export interface TargetDefinition {
  id: string;
  label: string;
  configFile: string;
}

// Memory address or value: integers are formatted, strings pass through
export type HexValue = number | string;

export type SleepFn = (ms: number) => Promise<void>;

export type SafetyEraseOutcome = 'ok' | 'failed' | 'not_attempted';

// Batch result summary
export interface BatchReport {
  exitCode: 0 | 1;
  total: number;
  completed: number;
  failedIndex?: number;
  skipped: number;
  error?: {
    code: string;
    message: string;
  };
  safetyErase: SafetyEraseOutcome;
  durationMs: number;
}

// CLI run result
export interface CliRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}
