import { logger } from '../logger';

export interface ShutdownHandler {
  name: string;
  priority: number;
  handler: () => Promise<void>;
}

export interface ShutdownTargets {
  httpServer?: { close: (callback?: (err?: Error) => void) => void };
  store?: { close: () => Promise<void> };
}

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown = false;
  private readonly FORCE_EXIT_TIMEOUT = 15000;

  constructor(private readonly exit: (code: number) => void = (code) => process.exit(code)) {}

  register(name: string, priority: number, handler: () => Promise<void>): void {
    this.handlers.push({ name, priority, handler });
  }

  /**
   * Run handlers in ascending priority order, then exit. Handler failures
   * are logged and do not stop later handlers.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info('Graceful shutdown initiated');

    const timeout = setTimeout(() => {
      logger.error('Force exit timeout reached, exiting with error');
      this.exit(1);
    }, this.FORCE_EXIT_TIMEOUT);

    const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);

    for (const { name, handler } of sortedHandlers) {
      try {
        logger.info(`Running shutdown handler: ${name}`);
        await handler();
        logger.info(`Shutdown handler completed: ${name}`);
      } catch (error) {
        logger.error({ err: error }, `Shutdown handler failed: ${name}`);
      }
    }

    clearTimeout(timeout);
    logger.info('Graceful shutdown completed');
    this.exit(0);
  }

  registerDefaults({ httpServer, store }: ShutdownTargets): void {
    if (httpServer) {
      // Stop accepting connections first; in-flight units finish before the store closes
      this.register('httpServer', 0, () =>
        new Promise<void>((resolve, reject) => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        })
      );
    }

    if (store) {
      this.register('ledgerStore', 10, () => store.close());
    }
  }

  setup(): void {
    process.on('SIGTERM', () => {
      logger.info('SIGTERM received');
      void this.shutdown();
    });

    process.on('SIGINT', () => {
      logger.info('SIGINT received');
      void this.shutdown();
    });
  }
}
