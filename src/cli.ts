#!/usr/bin/env node
/**
 * openocd-session command line entry point
 */

import process from 'node:process';
import { parseArgs } from 'node:util';
import { loadBatchFile } from './batch/descriptors.js';
import { BatchRunner } from './batch/runner.js';
import { sessionConfigService, type SessionConfigOverrides, type SessionConfigService } from './config/session-config.js';
import { TARGETS, resolveTarget } from './config/targets.js';
import { errorMessage } from './errors.js';
import { startMcpServer } from './mcp/server.js';
import { SessionController } from './session/controller.js';
import { withSession, type SessionDependencies } from './session/session.js';
import type { SessionConfig } from './types.js';
import { OpenOcdCliRunner } from './utils/cli-runner.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('CLI');

export const USAGE = `Usage: openocd-session --target <${TARGETS.map((t) => t.id).join('|')}> [options]

Options:
  --target <id>        Target family (${TARGETS.map((t) => `${t.id}: ${t.label}`).join(', ')})
  --interface <cfg>    Interface config file (default interface/stlink.cfg)
  --host <host>        Console host (default localhost)
  --port <port>        Console port (default 4444)
  --batch <file>       Run a JSON batch file and exit
  --mcp                Serve MCP tools over stdio
  --check              Print the OpenOCD version and exit
  -h, --help           Show this help`;

export interface CliOptions {
  target?: string;
  interfaceConfig?: string;
  host?: string;
  port?: number;
  batch?: string;
  mcp: boolean;
  check: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      target: { type: 'string', short: 't' },
      interface: { type: 'string', short: 'i' },
      host: { type: 'string' },
      port: { type: 'string', short: 'p' },
      batch: { type: 'string', short: 'b' },
      mcp: { type: 'boolean', default: false },
      check: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): CliOptions {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }

  let port: number | undefined;
  if (values.port !== undefined) {
    port = Number(values.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new UsageError(`Invalid port: ${values.port}`);
    }
  }

  const options: CliOptions = {
    target: values.target,
    interfaceConfig: values.interface,
    host: values.host,
    port,
    batch: values.batch,
    mcp: values.mcp ?? false,
    check: values.check ?? false,
    help: values.help ?? false,
  };

  if (options.mcp && options.batch) {
    throw new UsageError('--mcp and --batch cannot be combined');
  }
  return options;
}

export interface CliDependencies {
  configService?: SessionConfigService;
  session?: SessionDependencies;
  cliRunner?: OpenOcdCliRunner;
  signal?: AbortSignal;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const err = deps.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    err(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }
  if (options.help) {
    out(USAGE);
    return 0;
  }

  const configService = deps.configService ?? sessionConfigService;
  await configService.load();

  if (options.check) {
    const runner = deps.cliRunner ?? new OpenOcdCliRunner(configService.getSnapshot().binary);
    const result = await runner.getVersion();
    if (!result.ok) {
      err(`OpenOCD is not available (${runner.getPath()}): ${result.error ?? 'unknown error'}`);
      return 1;
    }
    out(`OpenOCD ${result.version ?? 'unknown version'} (${runner.getPath()})`);
    return 0;
  }

  if (!options.target) {
    err(`--target is required\n\n${USAGE}`);
    return 1;
  }
  let config: Readonly<SessionConfig>;
  try {
    const target = resolveTarget(options.target);
    const overrides: SessionConfigOverrides = { targetConfig: target.configFile };
    if (options.interfaceConfig) overrides.interfaceConfig = options.interfaceConfig;
    if (options.host) overrides.host = options.host;
    if (options.port !== undefined) overrides.port = options.port;
    config = configService.apply(overrides);
    logger.info(`Selected target: ${target.label}`, { configFile: target.configFile });
  } catch (error) {
    err(errorMessage(error));
    return 1;
  }

  if (options.mcp) {
    const controller = new SessionController(config, deps.session);
    await startMcpServer(controller, deps.cliRunner ?? new OpenOcdCliRunner(config.binary));
    return 0;
  }

  if (!options.batch) {
    err(`Choose a mode: --batch <file> or --mcp\n\n${USAGE}`);
    return 1;
  }

  try {
    const descriptors = await loadBatchFile(options.batch);
    return await withSession(
      config,
      (session) => new BatchRunner(session.operations).runBatch(descriptors),
      { ...deps.session, signal: deps.signal },
    );
  } catch (error) {
    err(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

async function main(): Promise<void> {
  const abort = new AbortController();
  const onSigint = () => abort.abort();
  process.once('SIGINT', onSigint);
  try {
    const exitCode = await runCli(process.argv.slice(2), { signal: abort.signal });
    process.exitCode = exitCode;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

if (!process.env.OCD_SKIP_MAIN) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
