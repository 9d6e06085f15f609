/**
 * Operation Tools
 * One MCP tool per debug operation, all serialized through the controller
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from '../../errors.js';
import type { OperationLibrary } from '../../openocd/operations.js';
import type { SessionController } from '../../session/controller.js';
import { createLogger } from '../../utils/logger.js';
import { toErrorResult, toToolResult } from '../result.js';
import type {
  CustomCommandParams,
  FlashParams,
  ReadMemoryParams,
  ResetParams,
  VerifyParams,
  WriteMemoryParams,
} from '../schemas.js';

const logger = createLogger('OperationTools');

async function runOperation(
  controller: SessionController,
  name: string,
  operation: (operations: OperationLibrary) => Promise<string>,
): Promise<CallToolResult> {
  const started = Date.now();
  try {
    const response = await controller.run((session) => operation(session.operations));
    const durationMs = Date.now() - started;
    logger.debug('Tool finished', { name, durationMs });
    return toToolResult({ ok: true, operation: name, response, durationMs }, response || `${name} completed`);
  } catch (error) {
    logger.error('Tool failed', { name, error: errorMessage(error) });
    return toErrorResult(error);
  }
}

export function runHalt(controller: SessionController): Promise<CallToolResult> {
  return runOperation(controller, 'halt', (ops) => ops.halt());
}

export function runReset(controller: SessionController, params: ResetParams): Promise<CallToolResult> {
  return params.mode === 'run'
    ? runOperation(controller, 'reset_run', (ops) => ops.resetRun())
    : runOperation(controller, 'reset_halt', (ops) => ops.resetHalt());
}

export function runEraseFlash(controller: SessionController): Promise<CallToolResult> {
  return runOperation(controller, 'erase_flash', (ops) => ops.eraseFlash());
}

export function runFlash(controller: SessionController, params: FlashParams): Promise<CallToolResult> {
  return runOperation(controller, 'flash', (ops) => ops.flash(params.path, params.address));
}

export function runVerify(controller: SessionController, params: VerifyParams): Promise<CallToolResult> {
  return runOperation(controller, 'verify', (ops) => ops.verify(params.path, params.address));
}

export function runReadMemory(controller: SessionController, params: ReadMemoryParams): Promise<CallToolResult> {
  return runOperation(controller, 'read_memory', (ops) => ops.readMemory(params.address, params.count));
}

export function runWriteMemory(controller: SessionController, params: WriteMemoryParams): Promise<CallToolResult> {
  return runOperation(controller, 'write_memory', (ops) => ops.writeMemory(params.address, params.value));
}

export function runTargetInfo(controller: SessionController): Promise<CallToolResult> {
  return runOperation(controller, 'target_info', (ops) => ops.targetInfo());
}

export function runCustomCommand(controller: SessionController, params: CustomCommandParams): Promise<CallToolResult> {
  return runOperation(controller, 'custom_command', (ops) => ops.custom(params.command));
}

export async function runReconnect(controller: SessionController): Promise<CallToolResult> {
  try {
    await controller.reconnect();
    return toToolResult({ ok: true }, 'Reconnected to OpenOCD');
  } catch (error) {
    return toErrorResult(error);
  }
}
