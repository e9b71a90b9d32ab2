import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp } from './app';
import { listen, shutdown } from './lifecycle';

function portOf(server: Server): number {
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }

  return address.port;
}

describe('listen', () => {
  const servers: Server[] = [];

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it('resolves with the listening server', async () => {
    const server = await listen(createApp({ batcher: { size: 0 } }), 0);
    servers.push(server);

    expect(server.listening).toBe(true);
    expect(portOf(server)).toBeGreaterThan(0);
  });

  it('rejects when the port is already taken', async () => {
    const first = await listen(createApp({ batcher: { size: 0 } }), 0);
    servers.push(first);

    await expect(listen(createApp({ batcher: { size: 0 } }), portOf(first))).rejects.toMatchObject({
      code: 'EADDRINUSE'
    });
  });
});

describe('shutdown', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stops the consumer before flushing the pending batch', async () => {
    const order: string[] = [];
    const running = {
      consumer: {
        stop: vi.fn(async () => {
          order.push('stop');
        })
      },
      batcher: {
        flush: vi.fn(async () => {
          order.push('flush');
          return 3;
        })
      }
    };

    await shutdown(running, 'SIGTERM');

    expect(order).toStrictEqual(['stop', 'flush']);
    expect(console.log).toHaveBeenCalledWith('Flushed pending rows', { rows: 3 });
  });

  it('still flushes when stopping the consumer fails', async () => {
    const flush = vi.fn(async () => 2);
    const running = {
      consumer: {
        stop: vi.fn(async () => {
          throw new Error('broker unreachable');
        })
      },
      batcher: { flush }
    };

    await expect(shutdown(running, 'SIGINT')).resolves.toBeUndefined();

    expect(flush).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('Consumer stop failed', { error: 'broker unreachable' });
  });

  it('closes the health server', async () => {
    const server = await listen(createApp({ batcher: { size: 0 } }), 0);

    await shutdown(
      { consumer: { stop: vi.fn(async () => undefined) }, batcher: { flush: vi.fn(async () => 0) }, server },
      'SIGTERM'
    );

    expect(server.listening).toBe(false);
  });
});
