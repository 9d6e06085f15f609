/**
 * Batch Tool
 * Runs a descriptor list, inline or from a JSON file, inside the shared session
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { loadBatchFile } from '../../batch/descriptors.js';
import { BatchRunner } from '../../batch/runner.js';
import type { SessionController } from '../../session/controller.js';
import { toErrorResult, toToolResult } from '../result.js';
import type { RunBatchParams } from '../schemas.js';

export async function runBatchTool(controller: SessionController, params: RunBatchParams): Promise<CallToolResult> {
  if ((params.commands === undefined) === (params.file === undefined)) {
    const message = 'Provide exactly one of "commands" or "file"';
    return { ...toToolResult({ ok: false, error: message, code: 'invalid_arguments' }, message), isError: true };
  }

  try {
    const descriptors = params.commands ?? (params.file ? await loadBatchFile(params.file) : []);
    const report = await controller.run((session) => new BatchRunner(session.operations).execute(descriptors));
    const message = report.exitCode === 0
      ? `All ${report.total} command(s) completed`
      : `Batch stopped at command ${(report.failedIndex ?? 0) + 1}/${report.total}: ${report.error?.message ?? 'unknown error'}`;
    return toToolResult({ ok: report.exitCode === 0, report }, message);
  } catch (error) {
    return toErrorResult(error);
  }
}
