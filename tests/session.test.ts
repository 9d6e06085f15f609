import { describe, it, expect, vi } from 'vitest';
import { OpenOcdSession, withSession } from '../src/session/session.js';
import { ConnectionError } from '../src/errors.js';
import { TEST_CONFIG, createSessionFixture } from './helpers/session-fixture.js';

describe('OpenOCD Session', () => {
  it('should start the server and connect on open', async () => {
    const fixture = createSessionFixture();
    const session = new OpenOcdSession(TEST_CONFIG, fixture.deps);

    await session.open();
    expect(fixture.calls).toEqual([
      { binary: 'openocd', args: ['-f', 'interface/stlink.cfg', '-f', 'target/stm32l0.cfg'] },
    ]);
    expect(session.isConnected()).toBe(true);
    await expect(session.operations.targetInfo()).resolves.toBe('0* stm32l0.cpu cortex_m little stm32l0.cpu halted');
    await session.close();
  });

  it('should stop the server when the connection fails', async () => {
    const fixture = createSessionFixture();
    fixture.connector.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:4444'));
    const session = new OpenOcdSession(TEST_CONFIG, fixture.deps);

    await expect(session.open()).rejects.toBeInstanceOf(ConnectionError);
    expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
    expect(session.supervisor.isAlive()).toBe(false);
  });

  it('should disconnect before stopping on close', async () => {
    const fixture = createSessionFixture();
    const session = new OpenOcdSession(TEST_CONFIG, fixture.deps);
    await session.open();

    await session.close();
    expect(session.isConnected()).toBe(false);
    expect(fixture.consoles[0]?.destroyed).toBe(true);
    expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
  });

  it('should reconnect on a fresh connection and keep the process', async () => {
    const fixture = createSessionFixture();
    const session = new OpenOcdSession(TEST_CONFIG, fixture.deps);
    await session.open();

    await session.reconnect();
    expect(fixture.connector).toHaveBeenCalledTimes(2);
    expect(fixture.calls).toHaveLength(1);
    expect(fixture.sleep).toHaveBeenCalledWith(TEST_CONFIG.reconnectDelayMs);
    expect(session.isConnected()).toBe(true);
    await session.close();
  });

  describe('withSession', () => {
    it('should return the result and tear down', async () => {
      const fixture = createSessionFixture();

      const result = await withSession(TEST_CONFIG, async (session) => session.operations.halt(), fixture.deps);
      expect(result).toBe('');
      expect(fixture.commands()).toEqual(['halt']);
      expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
    });

    it('should tear down when the body throws', async () => {
      const fixture = createSessionFixture();

      await expect(
        withSession(TEST_CONFIG, async () => {
          throw new Error('boom');
        }, fixture.deps),
      ).rejects.toThrow('boom');
      expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
      expect(fixture.consoles[0]?.destroyed).toBe(true);
    });

    it('should not start anything once aborted', async () => {
      const fixture = createSessionFixture();
      const abort = new AbortController();
      abort.abort();

      await expect(
        withSession(TEST_CONFIG, async () => 'unreachable', { ...fixture.deps, signal: abort.signal }),
      ).rejects.toThrow();
      expect(fixture.calls).toHaveLength(0);
    });

    it('should not run the body when aborted while the server settles', async () => {
      const fixture = createSessionFixture();
      const abort = new AbortController();
      fixture.sleep.mockImplementationOnce(async () => {
        abort.abort();
      });
      const body = vi.fn(async () => 'ran');

      await expect(withSession(TEST_CONFIG, body, { ...fixture.deps, signal: abort.signal })).rejects.toThrow(
        'OpenOCD failed to start: stopped while starting',
      );
      expect(body).not.toHaveBeenCalled();
      expect(fixture.connector).not.toHaveBeenCalled();
      expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
    });

    it('should stop the server when aborted mid-run', async () => {
      const fixture = createSessionFixture();
      const abort = new AbortController();

      await withSession(
        TEST_CONFIG,
        async (session) => {
          abort.abort();
          await Promise.resolve();
          return session.supervisor.isAlive();
        },
        { ...fixture.deps, signal: abort.signal },
      );
      expect(fixture.processes[0]?.signals).toEqual(['SIGTERM']);
    });
  });
});
