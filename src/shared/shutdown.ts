/**
 * Graceful shutdown management for CLI commands.
 * Turns SIGINT/SIGTERM into an AbortSignal the pipeline listens to.
 */
import chalk from "chalk";

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Aborted once shutdown has been requested. Pass to every long-running call. */
  signal: AbortSignal;
  /** Returns false if shutdown has been requested. Use in loops. */
  shouldContinue: () => boolean;
  /** Register a cleanup callback, run once when the first signal arrives. */
  registerCleanup: (fn: () => void | Promise<void>) => void;
  /** Check if shutdown is in progress. */
  isShuttingDown: () => boolean;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * The first signal aborts `signal` and runs the cleanups; transfers stop and
 * keep their partial files. A second signal exits immediately.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 * shutdown.registerCleanup(() => history.close());
 *
 * await orchestrator.run(urls); // constructed with { signal: shutdown.signal }
 * ```
 */
export function createShutdownManager(): ShutdownManager {
  const controller = new AbortController();
  const cleanups: (() => void | Promise<void>)[] = [];

  const shutdown = async (signal: string): Promise<void> => {
    if (controller.signal.aborted) {
      // Force exit on second signal
      console.log(chalk.red("\n\n⚠️  Force exit"));
      process.exit(1);
    }

    console.log(chalk.yellow(`\n\n⏹️  ${signal} received, stopping after the current step...`));
    controller.abort(new Error(`${signal} received`));

    for (const cleanup of cleanups) {
      try {
        await cleanup();
      } catch (error) {
        console.error(
          chalk.gray(`   Cleanup failed: ${error instanceof Error ? error.message : String(error)}`)
        );
      }
    }
  };

  return {
    setup: () => {
      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));
    },

    signal: controller.signal,

    shouldContinue: () => !controller.signal.aborted,

    isShuttingDown: () => controller.signal.aborted,

    registerCleanup: (fn: () => void | Promise<void>) => {
      cleanups.push(fn);
    },
  };
}
