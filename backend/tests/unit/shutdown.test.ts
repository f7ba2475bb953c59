/**
 * Graceful Shutdown Unit Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { GracefulShutdown } from '../../src/lib/shutdown';

describe('GracefulShutdown', () => {
  it('closes the HTTP server before the store, then exits 0', async () => {
    const order: string[] = [];
    const exit = vi.fn();
    const shutdown = new GracefulShutdown(exit);

    shutdown.registerDefaults({
      store: {
        close: async () => {
          order.push('store');
        },
      },
      httpServer: {
        close: (callback) => {
          order.push('http');
          callback?.();
        },
      },
    });

    await shutdown.shutdown();

    expect(order).toEqual(['http', 'store']);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('keeps going when a handler fails', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdown(exit);
    const closeStore = vi.fn(async () => undefined);

    shutdown.registerDefaults({
      httpServer: { close: (callback) => callback?.(new Error('already closed')) },
      store: { close: closeStore },
    });

    await shutdown.shutdown();

    expect(closeStore).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('runs only once', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdown(exit);
    const handler = vi.fn(async () => undefined);
    shutdown.register('custom', 5, handler);

    await Promise.all([shutdown.shutdown(), shutdown.shutdown()]);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });
});
