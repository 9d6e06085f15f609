import { describe, it, expect, vi } from 'vitest';
import { ConsoleTransport, extractResponse } from '../src/openocd/transport.js';
import { ConnectionError } from '../src/errors.js';
import type { BufferStrategy } from '../src/types.js';
import { FakeConsole, type Responder } from './helpers/fake-console.js';

function createTransport(fake: FakeConsole, bufferStrategy?: BufferStrategy) {
  return new ConsoleTransport({
    connectTimeoutMs: 100,
    bannerTimeoutMs: 200,
    bufferStrategy,
    connector: fake.connector,
  });
}

async function connected(responder?: Responder, banner?: string, bufferStrategy?: BufferStrategy) {
  const fake = new FakeConsole(responder, banner);
  const transport = createTransport(fake, bufferStrategy);
  await transport.connect('localhost', 4444);
  return { fake, transport };
}

describe('Console Transport', () => {
  describe('extractResponse', () => {
    it('should strip the prompt and whitespace', () => {
      expect(extractResponse('\r\n0x20000000: 00000000\r\n> ')).toBe('0x20000000: 00000000');
    });

    it('should keep text without a prompt', () => {
      expect(extractResponse('  partial ')).toBe('partial');
    });
  });

  describe('connect', () => {
    it('should swallow the banner and report connected', async () => {
      const { transport } = await connected();
      expect(transport.isConnected()).toBe(true);
    });

    it('should be a no-op when already connected', async () => {
      const fake = new FakeConsole();
      const connector = vi.fn(fake.connector);
      const transport = new ConsoleTransport({ connectTimeoutMs: 100, bannerTimeoutMs: 200, connector });

      await transport.connect('localhost', 4444);
      await transport.connect('localhost', 4444);
      expect(connector).toHaveBeenCalledTimes(1);
    });

    it('should wrap connector failures in ConnectionError', async () => {
      const transport = new ConsoleTransport({
        connectTimeoutMs: 100,
        bannerTimeoutMs: 200,
        connector: async () => {
          throw new Error('connect ECONNREFUSED 127.0.0.1:4444');
        },
      });

      const error = await transport.connect('localhost', 4444).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.message).toBe('Could not connect to OpenOCD on localhost:4444: connect ECONNREFUSED 127.0.0.1:4444');
        expect(error.code).toBe('connection_error');
      }
      expect(transport.isConnected()).toBe(false);
    });

    it('should fail when the server hangs up during the handshake', async () => {
      const fake = new FakeConsole(undefined, '');
      fake.hangUp();
      const transport = createTransport(fake);

      await expect(transport.connect('localhost', 4444)).rejects.toBeInstanceOf(ConnectionError);
      expect(transport.isConnected()).toBe(false);
    });

    it('should fail when disconnected while waiting for the banner', async () => {
      const fake = new FakeConsole(undefined, '');
      const transport = createTransport(fake);

      const pending = transport.connect('localhost', 4444);
      setTimeout(() => transport.disconnect(), 20);
      await expect(pending).rejects.toBeInstanceOf(ConnectionError);
      expect(transport.isConnected()).toBe(false);
      await expect(transport.exchange('halt', 100)).rejects.toThrow('console connection is closed');
    });
  });

  describe('exchange', () => {
    it('should send one line and return the stripped response', async () => {
      const { fake, transport } = await connected((command) =>
        command === 'targets' ? ' 0* stm32l0.cpu cortex_m little stm32l0.cpu halted' : '',
      );

      await expect(transport.exchange('targets', 200)).resolves.toBe('0* stm32l0.cpu cortex_m little stm32l0.cpu halted');
      expect(fake.commands).toEqual(['targets']);
    });

    it('should refuse a second exchange while one is in flight', async () => {
      const { transport } = await connected((command) => (command === 'slow' ? undefined : 'ok'));

      const first = transport.exchange('slow', 100);
      await expect(transport.exchange('targets', 100)).rejects.toThrow("command already in flight; refusing 'targets'");
      await expect(first).resolves.toBe('');
    });

    it('should refuse a command spanning several lines', async () => {
      const { fake, transport } = await connected();

      await expect(transport.exchange('reg pc\nreg sp', 100)).rejects.toThrow('command must be a single line');
      await expect(transport.exchange('halt\r', 100)).rejects.toThrow('command must be a single line');
      expect(fake.commands).toEqual([]);
      await expect(transport.exchange('halt', 100)).resolves.toBe('');
    });

    it('should fail after disconnect', async () => {
      const { transport } = await connected();
      transport.disconnect();
      transport.disconnect();

      expect(transport.isConnected()).toBe(false);
      await expect(transport.exchange('halt', 100)).rejects.toThrow('console connection is closed');
    });
  });

  describe('readUntil', () => {
    it('should return partial bytes on timeout and empty the buffer', async () => {
      const { fake, transport } = await connected(undefined, 'banner>');
      fake.emitText('partial');

      const frame = await transport.readUntil('>', 50);
      expect(frame.toString('ascii')).toBe('partial');
      expect(transport.bufferedBytes).toBe(0);
    });

    it('should keep partial bytes when preserving', async () => {
      const { fake, transport } = await connected(undefined, 'banner>', 'preserve');
      fake.emitText('partial');

      const frame = await transport.readUntil('>', 50);
      expect(frame.toString('ascii')).toBe('partial');
      expect(transport.bufferedBytes).toBe(7);

      fake.emitText(' done>');
      const next = await transport.readUntil('>', 200);
      expect(next.toString('ascii')).toBe('partial done>');
    });

    it('should leave bytes after the delimiter buffered', async () => {
      const { fake, transport } = await connected(undefined, 'banner>');
      fake.emitText('one>two>');

      expect((await transport.readUntil('>', 200)).toString('ascii')).toBe('one>');
      expect(transport.bufferedBytes).toBe(4);
      expect((await transport.readUntil('>', 200)).toString('ascii')).toBe('two>');
    });
  });

  it('should mark the connection closed when the server hangs up', async () => {
    const { fake, transport } = await connected();
    fake.hangUp();

    await vi.waitFor(() => expect(transport.isConnected()).toBe(false));
  });
});
