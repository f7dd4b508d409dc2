/**
 * Runs registered cleanup handlers once when the process is asked to stop,
 * so open connections are ended instead of dropped.
 */

import { Logger } from './logger';

export interface Closable {
  close(): Promise<void>;
}

export type ShutdownSignal = 'SIGTERM' | 'SIGINT' | 'beforeExit';

export class ProcessCleanup {
  private static instance: ProcessCleanup | null = null;
  private cleanupHandlers: (() => Promise<void>)[] = [];
  private isRegistered = false;
  private isShuttingDown = false;
  private logger: Logger;

  constructor() {
    this.logger = Logger.getInstance().createChildLogger({ class: 'ProcessCleanup' });
  }

  static getInstance(): ProcessCleanup {
    if (!ProcessCleanup.instance) {
      ProcessCleanup.instance = new ProcessCleanup();
    }
    return ProcessCleanup.instance;
  }

  /**
   * Register a cleanup handler that will be called on process exit
   */
  registerCleanupHandler(handler: () => Promise<void>): void {
    this.cleanupHandlers.push(handler);

    if (!this.isRegistered) {
      this.registerProcessHandlers();
      this.isRegistered = true;
    }
  }

  handlerCount(): number {
    return this.cleanupHandlers.length;
  }

  /**
   * Execute all registered cleanup handlers
   * @returns the number of handlers that failed
   */
  async executeCleanup(reason: string): Promise<number> {
    if (this.cleanupHandlers.length === 0) {
      this.logger.debug('No cleanup handlers registered');
      return 0;
    }

    this.logger.info(`Executing ${this.cleanupHandlers.length} cleanup handlers due to: ${reason}`);

    const handlers = this.cleanupHandlers.splice(0, this.cleanupHandlers.length);
    const results = await Promise.allSettled(handlers.map(handler => handler()));

    const failed = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    failed.forEach(result => this.logger.error('Cleanup handler failed', {}, result.reason));
    if (failed.length > 0) {
      this.logger.warn(`${failed.length} cleanup handlers failed`);
    } else {
      this.logger.info('All cleanup handlers completed successfully');
    }
    return failed.length;
  }

  async handleShutdown(signal: ShutdownSignal): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    const failures = await this.executeCleanup(signal);
    if (signal !== 'beforeExit') {
      process.exit(failures > 0 ? 1 : 0);
    }
  }

  private registerProcessHandlers(): void {
    const onSignal = (signal: ShutdownSignal) => () => {
      this.handleShutdown(signal).catch(error => {
        this.logger.error(`Cleanup failed during ${signal}`, {}, error);
        process.exit(1);
      });
    };

    process.once('SIGTERM', onSignal('SIGTERM'));
    process.once('SIGINT', onSignal('SIGINT'));
    process.once('beforeExit', onSignal('beforeExit'));

    this.logger.debug('Process cleanup handlers registered');
  }
}

/**
 * Closes `connection` when the process shuts down.
 */
export function registerConnectionCleanup(
  connection: Closable,
  cleanup: ProcessCleanup = ProcessCleanup.getInstance()
): void {
  cleanup.registerCleanupHandler(() => connection.close());
}
