/**
 * openocd-session library entry point
 */

export * from './types.js';
export * from './errors.js';
export * from './config/session-config.js';
export * from './config/targets.js';
export * from './openocd/process-supervisor.js';
export * from './openocd/transport.js';
export * from './openocd/executor.js';
export * from './openocd/operations.js';
export * from './batch/descriptors.js';
export * from './batch/runner.js';
export * from './session/command-queue.js';
export * from './session/session.js';
export * from './session/controller.js';
export * from './mcp/schemas.js';
export { createMcpServer, startMcpServer } from './mcp/server.js';
export { OpenOcdCliRunner, parseOpenOcdVersion, resolveOpenOcdExecutable } from './utils/cli-runner.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
