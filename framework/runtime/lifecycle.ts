/**
 * Process Lifecycle Management
 *
 * Startup and shutdown hooks, plus optional signal handling for graceful
 * shutdown.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';

export type LifecycleHook = () => Promise<void> | void;

/**
 * Lifecycle manager for applications
 */
export class Lifecycle {
  private readonly startHooks: LifecycleHook[] = [];
  private readonly shutdownHooks: LifecycleHook[] = [];
  private abortController = new AbortController();
  private started = false;
  private isShuttingDown = false;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  /**
   * Aborted when shutdown begins
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Register a hook to run on application start
   */
  onStart(hook: LifecycleHook): void {
    this.startHooks.push(hook);
  }

  /**
   * Register a hook to run on graceful shutdown
   */
  onShutdown(hook: LifecycleHook): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Run start hooks in registration order. A failing hook aborts startup.
   */
  async emitStart(): Promise<void> {
    if (this.started) return;
    for (const hook of this.startHooks) {
      await hook();
    }
    this.started = true;
    this.isShuttingDown = false;
    this.abortController = new AbortController();
  }

  /**
   * Trigger graceful shutdown. Hooks run in reverse order (LIFO); a failing
   * hook is logged and the rest still run.
   */
  async shutdown(reason?: string): Promise<void> {
    if (this.isShuttingDown || !this.started) return;
    this.isShuttingDown = true;

    this.logger.info(`Shutting down${reason ? `: ${reason}` : ''}...`);
    this.abortController.abort();

    for (const hook of [...this.shutdownHooks].reverse()) {
      try {
        await hook();
      } catch (error) {
        this.logger.error('Error during shutdown', error);
      }
    }

    this.started = false;
    this.logger.info('Shutdown complete');
  }

  /**
   * Shut down on SIGINT and SIGTERM. Returns a function that removes the
   * listeners.
   */
  installSignalHandlers(onShutdown: (reason: string) => Promise<void>): () => void {
    const handle = (signal: NodeJS.Signals) => {
      onShutdown(`Received ${signal}`).catch((error: unknown) => {
        this.logger.error('Shutdown failed', error);
        process.exitCode = 1;
      });
    };

    process.once('SIGINT', handle);
    process.once('SIGTERM', handle);

    return () => {
      process.off('SIGINT', handle);
      process.off('SIGTERM', handle);
    };
  }
}
