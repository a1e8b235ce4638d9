import { logger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;

interface CleanupOperation {
  name: string;
  handler: ShutdownHandler;
  timeoutMs?: number;
}

export interface ShutdownCoordinatorOptions {
  /** Overall budget before the process is forced down */
  shutdownTimeoutMs?: number;
  exit?: (code: number) => void;
}

/**
 * Runs registered cleanup operations once, in registration order
 *
 * A failing or hanging operation is logged and skipped; the overall
 * budget forces an exit when the whole sequence stalls.
 */
export class ShutdownCoordinator {
  private readonly operations: CleanupOperation[] = [];
  private shuttingDown = false;
  private readonly shutdownTimeoutMs: number;
  private readonly exit: (code: number) => void;

  constructor(options: ShutdownCoordinatorOptions = {}) {
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30000;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  register(name: string, handler: ShutdownHandler, timeoutMs?: number): void {
    this.operations.push({ name, handler, timeoutMs });
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  async shutdown(signal?: string): Promise<void> {
    if (this.shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    this.shuttingDown = true;
    logger.info({ signal, operationsCount: this.operations.length }, 'Starting graceful shutdown');

    const guard = setTimeout(() => {
      logger.error({ reason: 'timeout' }, 'Graceful shutdown timeout, forcing exit');
      this.exit(1);
    }, this.shutdownTimeoutMs);
    guard.unref();

    try {
      for (const operation of this.operations) {
        await this.runOperation(operation);
      }
      logger.info('Graceful shutdown completed');
    } finally {
      clearTimeout(guard);
    }
  }

  /**
   * Shut down on SIGINT/SIGTERM, then exit; a second signal exits at once
   */
  installSignalHandlers(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      process.on(signal, () => {
        if (this.shuttingDown) {
          logger.warn({ signal }, 'Second signal received, forcing exit');
          this.exit(1);
          return;
        }
        this.shutdown(signal).then(
          () => this.exit(0),
          (error: unknown) => {
            logger.error({ error }, 'Fatal error during shutdown, forcing exit');
            this.exit(1);
          }
        );
      });
    }
  }

  private async runOperation({ name, handler, timeoutMs }: CleanupOperation): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const run = Promise.resolve().then(handler);
      if (timeoutMs) {
        const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Operation ${name} timed out after ${timeoutMs}ms`)), timeoutMs);
        });
        await Promise.race([run, timeout]);
      } else {
        await run;
      }
      logger.debug({ operation: name }, 'Cleanup operation completed');
    } catch (error) {
      // Keep going so later operations still run
      logger.error({ error, operation: name }, 'Error during cleanup operation (continuing with shutdown)');
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
