/**
 * MCP Server
 * Exposes the session operations as MCP tools over stdio
 */

import { readFileSync } from 'node:fs';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { SessionController } from '../session/controller.js';
import type { OpenOcdCliRunner } from '../utils/cli-runner.js';
import { createLogger } from '../utils/logger.js';
import { toErrorResult, toToolResult } from './result.js';
import {
  customCommandSchema,
  eraseFlashSchema,
  flashSchema,
  readMemorySchema,
  resetSchema,
  runBatchSchema,
  verifySchema,
  writeMemorySchema,
} from './schemas.js';
import {
  runBatchTool,
  runCustomCommand,
  runEraseFlash,
  runFlash,
  runHalt,
  runReadMemory,
  runReconnect,
  runReset,
  runTargetInfo,
  runVerify,
  runWriteMemory,
} from './tools/index.js';

const logger = createLogger('McpServer');

const INSTRUCTIONS = [
  'Drives an OpenOCD debug server for STM32 targets over its telnet console.',
  'The server process starts on the first tool call and stays up until the MCP server exits.',
  'Commands run one at a time; failed commands are retried after halting the target.',
  'run_batch stops at the first failure and then erases flash as a safety measure.',
].join('\n');

function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: String(error) });
  }
  return '0.0.0';
}

export async function runVersion(cliRunner: OpenOcdCliRunner): Promise<CallToolResult> {
  try {
    const result = await cliRunner.getVersion();
    if (!result.ok) {
      return { ...toToolResult({ ok: false, error: result.error ?? 'unknown error', code: 'launch_error' }), isError: true };
    }
    return toToolResult({ ok: true, path: cliRunner.getPath(), version: result.version }, `OpenOCD ${result.version ?? ''}`.trim());
  } catch (error) {
    return toErrorResult(error);
  }
}

export function createMcpServer(controller: SessionController, cliRunner: OpenOcdCliRunner): McpServer {
  const server = new McpServer(
    {
      name: 'openocd-session',
      version: readPackageVersion(),
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
      instructions: INSTRUCTIONS,
    },
  );

  server.registerTool('version', {
    title: 'OpenOCD version',
    description: 'Show the installed OpenOCD version',
  }, async () => runVersion(cliRunner));

  server.registerTool('halt', {
    title: 'Halt MCU',
    description: 'Halt the target core',
  }, async () => runHalt(controller));

  server.registerTool('reset', {
    title: 'Reset MCU',
    description: 'Reset the target and either keep it halted or let it run',
    inputSchema: resetSchema.shape,
  }, async (params) => runReset(controller, resetSchema.parse(params)));

  server.registerTool('erase_flash', {
    title: 'Erase Flash',
    description: 'Erase every flash sector of the target. Requires confirm: true.',
    inputSchema: eraseFlashSchema.shape,
  }, async (params) => {
    eraseFlashSchema.parse(params);
    return runEraseFlash(controller);
  });

  server.registerTool('flash', {
    title: 'Flash Firmware',
    description: 'Program a firmware image into flash (default address 0x08000000)',
    inputSchema: flashSchema.shape,
  }, async (params) => runFlash(controller, flashSchema.parse(params)));

  server.registerTool('verify', {
    title: 'Verify Firmware',
    description: 'Compare a firmware image against target memory',
    inputSchema: verifySchema.shape,
  }, async (params) => runVerify(controller, verifySchema.parse(params)));

  server.registerTool('read_memory', {
    title: 'Read Memory',
    description: 'Read 32-bit words starting at an address',
    inputSchema: readMemorySchema.shape,
  }, async (params) => runReadMemory(controller, readMemorySchema.parse(params)));

  server.registerTool('write_memory', {
    title: 'Write Memory',
    description: 'Write one 32-bit word to an address',
    inputSchema: writeMemorySchema.shape,
  }, async (params) => runWriteMemory(controller, writeMemorySchema.parse(params)));

  server.registerTool('target_info', {
    title: 'Target Info',
    description: 'List configured targets and their run state',
  }, async () => runTargetInfo(controller));

  server.registerTool('custom_command', {
    title: 'Custom Command',
    description: 'Send a raw OpenOCD console command',
    inputSchema: customCommandSchema.shape,
  }, async (params) => runCustomCommand(controller, customCommandSchema.parse(params)));

  server.registerTool('reconnect', {
    title: 'Reconnect',
    description: 'Drop and re-open the console connection; the OpenOCD process keeps running',
  }, async () => runReconnect(controller));

  server.registerTool('run_batch', {
    title: 'Run Batch',
    description: 'Run command descriptors in order, inline or from a JSON file. Stops at the first failure and erases flash.',
    inputSchema: runBatchSchema.shape,
  }, async (params) => runBatchTool(controller, runBatchSchema.parse(params)));

  return server;
}

/**
 * Serve over stdio until the client goes away or a signal arrives;
 * the OpenOCD process is always stopped on the way out.
 */
export async function startMcpServer(controller: SessionController, cliRunner: OpenOcdCliRunner): Promise<void> {
  const server = createMcpServer(controller, cliRunner);
  const transport = new StdioServerTransport();

  let closing = false;
  const shutdown = async (reason: string) => {
    if (closing) return;
    closing = true;
    logger.info('Shutting down', { reason });
    try {
      await controller.close();
      await server.close();
    } catch (error) {
      logger.error('Shutdown failed', { error: String(error) });
      process.exitCode = 1;
    }
  };

  transport.onclose = () => {
    void shutdown('transport closed');
  };
  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await server.connect(transport);
  logger.info('MCP server ready on stdio');
}
