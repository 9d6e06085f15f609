import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { USAGE, UsageError, parseCliArgs, runCli } from '../src/cli.js';
import { SessionConfigService } from '../src/config/session-config.js';
import { OpenOcdCliRunner } from '../src/utils/cli-runner.js';
import { createSessionFixture } from './helpers/session-fixture.js';

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (text: string) => out.push(text), stderr: (text: string) => err.push(text) };
}

describe('CLI', () => {
  let tmpDir: string;
  let configService: SessionConfigService;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ocd-cli-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    configService = new SessionConfigService(path.join(tmpDir, 'no-config.json'), {});
  });

  describe('parseCliArgs', () => {
    it('should parse a batch invocation', () => {
      expect(parseCliArgs(['--target', 'l4', '--batch', 'flash.json', '--port', '4445'])).toEqual({
        target: 'l4',
        interfaceConfig: undefined,
        host: undefined,
        port: 4445,
        batch: 'flash.json',
        mcp: false,
        check: false,
        help: false,
      });
    });

    it('should reject an invalid port', () => {
      expect(() => parseCliArgs(['--port', 'telnet'])).toThrow('Invalid port: telnet');
    });

    it('should reject unknown flags', () => {
      expect(() => parseCliArgs(['--turbo'])).toThrow(UsageError);
    });

    it('should reject --mcp together with --batch', () => {
      expect(() => parseCliArgs(['--mcp', '--batch', 'x.json'])).toThrow('--mcp and --batch cannot be combined');
    });
  });

  describe('runCli', () => {
    it('should print usage for --help', async () => {
      const io = capture();
      await expect(runCli(['--help'], { ...io, configService })).resolves.toBe(0);
      expect(io.out).toEqual([USAGE]);
    });

    it('should require a target', async () => {
      const io = capture();
      await expect(runCli(['--batch', 'x.json'], { ...io, configService })).resolves.toBe(1);
      expect(io.err).toEqual([`--target is required\n\n${USAGE}`]);
    });

    it('should reject an unknown target', async () => {
      const io = capture();
      await expect(runCli(['--target', 'f4', '--batch', 'x.json'], { ...io, configService })).resolves.toBe(1);
      expect(io.err).toEqual(['Invalid target selection: f4 (expected one of l0, l4)']);
    });

    it('should require a mode', async () => {
      const io = capture();
      await expect(runCli(['--target', 'l0'], { ...io, configService })).resolves.toBe(1);
      expect(io.err).toEqual([`Choose a mode: --batch <file> or --mcp\n\n${USAGE}`]);
    });

    it('should print the version for --check', async () => {
      const io = capture();
      const cliRunner = new OpenOcdCliRunner('/usr/bin/openocd');
      vi.spyOn(cliRunner, 'getVersion').mockResolvedValue({ ok: true, version: '0.12.0' });

      await expect(runCli(['--check'], { ...io, configService, cliRunner })).resolves.toBe(0);
      expect(io.out).toEqual(['OpenOCD 0.12.0 (/usr/bin/openocd)']);
    });

    it('should fail --check when OpenOCD is missing', async () => {
      const io = capture();
      const cliRunner = new OpenOcdCliRunner('/usr/bin/openocd');
      vi.spyOn(cliRunner, 'getVersion').mockResolvedValue({ ok: false, error: 'spawn /usr/bin/openocd ENOENT' });

      await expect(runCli(['--check'], { ...io, configService, cliRunner })).resolves.toBe(1);
      expect(io.err).toEqual(['OpenOCD is not available (/usr/bin/openocd): spawn /usr/bin/openocd ENOENT']);
    });

    it('should run a batch file against the selected target', async () => {
      const io = capture();
      const fixture = createSessionFixture();
      const batch = path.join(tmpDir, 'batch.json');
      await fs.writeFile(batch, JSON.stringify([{ type: 'halt' }, { type: 'reset_run' }]));

      const code = await runCli(['--target', 'l4', '--batch', batch, '--port', '4445'], {
        ...io,
        configService,
        session: fixture.deps,
      });

      expect(code).toBe(0);
      expect(fixture.calls).toEqual([
        { binary: 'openocd', args: ['-f', 'interface/stlink.cfg', '-f', 'target/stm32l4x.cfg'] },
      ]);
      expect(fixture.connector).toHaveBeenCalledWith({ host: 'localhost', port: 4445, timeoutMs: 5000 });
      expect(fixture.commands()).toEqual(['halt', 'reset run']);
      expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
    });

    it('should exit 1 when the batch fails', async () => {
      const io = capture();
      const fixture = createSessionFixture();
      const batch = path.join(tmpDir, 'failing.json');
      await fs.writeFile(batch, JSON.stringify({ commands: [{ type: 'flash', path: path.join(tmpDir, 'none.bin') }] }));

      await expect(runCli(['--target', 'l0', '--batch', batch], { ...io, configService, session: fixture.deps })).resolves.toBe(1);
      expect(fixture.commands()).toEqual(['targets', 'flash erase_sector 0 0 last']);
    });

    it('should exit 1 with a diagnostic when OpenOCD cannot be reached', async () => {
      const io = capture();
      const fixture = createSessionFixture();
      fixture.connector.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:4444'));
      const batch = path.join(tmpDir, 'unreachable.json');
      await fs.writeFile(batch, JSON.stringify([{ type: 'halt' }]));

      await expect(runCli(['--target', 'l0', '--batch', batch], { ...io, configService, session: fixture.deps })).resolves.toBe(1);
      expect(io.err).toEqual([
        'Error: Could not connect to OpenOCD on localhost:4444: connect ECONNREFUSED 127.0.0.1:4444',
      ]);
      expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
    });
  });
});
