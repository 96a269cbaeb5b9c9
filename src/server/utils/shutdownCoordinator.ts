import { logger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;

interface CleanupOperation {
  name: string;
  handler: ShutdownHandler;
  timeoutMs?: number;
}

export type ExitFunction = (code: number) => void;

/**
 * Runs cleanup operations when the process is interrupted, e.g. closing the completion store
 * so that committed batches are not lost with a half-written journal.
 */
export class ShutdownCoordinator {
  private readonly operations: CleanupOperation[] = [];
  private shuttingDown = false;
  private readonly shutdownTimeoutMs: number;
  private readonly exit: ExitFunction;

  constructor(shutdownTimeoutMs: number = 10000, exit: ExitFunction = (code) => process.exit(code)) {
    this.shutdownTimeoutMs = shutdownTimeoutMs;
    this.exit = exit;
  }

  /**
   * Operations run in registration order
   */
  register(name: string, handler: ShutdownHandler, timeoutMs?: number): void {
    this.operations.push({ name, handler, timeoutMs });
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Run every registered operation once. A second call while shutting down is ignored.
   */
  async shutdown(signal?: string): Promise<void> {
    if (this.shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    this.shuttingDown = true;
    logger.info({ signal, operations: this.operations.length }, 'Starting graceful shutdown');

    const forceExit = setTimeout(() => {
      logger.error({ timeoutMs: this.shutdownTimeoutMs }, 'Graceful shutdown timed out, forcing exit');
      this.exit(1);
    }, this.shutdownTimeoutMs);
    forceExit.unref();

    try {
      for (const operation of this.operations) {
        await this.runOperation(operation);
      }
      logger.info('Graceful shutdown completed');
    } finally {
      clearTimeout(forceExit);
    }
  }

  /**
   * Errors are logged and the remaining operations still run
   */
  private async runOperation({ name, handler, timeoutMs }: CleanupOperation): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const work = Promise.resolve().then(handler);
      if (timeoutMs) {
        await Promise.race([
          work,
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Operation ${name} timed out after ${timeoutMs}ms`)), timeoutMs);
          }),
        ]);
      } else {
        await work;
      }
      logger.debug({ operation: name }, 'Cleanup operation completed');
    } catch (error) {
      logger.error({ error, operation: name }, 'Cleanup operation failed, continuing shutdown');
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Shut down and exit on the given signals
   *
   * @returns function removing the listeners again
   */
  installSignalHandlers(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): () => void {
    const listener = (signal: NodeJS.Signals): void => {
      this.shutdown(signal).then(
        () => this.exit(signal === 'SIGTERM' ? 143 : 130),
        (error: unknown) => {
          logger.error({ error, signal }, 'Error during graceful shutdown');
          this.exit(1);
        }
      );
    };
    for (const signal of signals) {
      process.on(signal, listener);
    }
    return () => {
      for (const signal of signals) {
        process.off(signal, listener);
      }
    };
  }
}
