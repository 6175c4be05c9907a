/**
 * @fileoverview Polling abstraction for background jobs.
 *
 * Runs a job on a fixed interval, never overlapping with itself.
 * Used by the trash sweeper; the sync scheduler has its own per-account
 * loop because its delay varies with backoff.
 */

import { createLogger } from './observability/index.js';

/**
 * Interface for job polling implementations.
 */
export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight run to complete */
  stop(): Promise<void>;
  /** Check if the poller is running */
  isRunning(): boolean;
}

export interface IntervalPollerOptions {
  /** Name used in log events */
  name: string;
  intervalMs: number;
  /** Run once immediately on start (default: true) */
  runOnStart?: boolean;
}

/**
 * Create an interval-based poller.
 */
export function createIntervalPoller(
  job: () => Promise<void>,
  options: IntervalPollerOptions
): Poller {
  const log = createLogger({ domain: 'poller', poller: options.name });
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  return {
    start(): void {
      if (intervalId !== null) {
        log.debug('poller_already_running');
        return;
      }

      log.info('poller_started', { intervalMs: options.intervalMs });

      if (options.runOnStart ?? true) {
        runSafe();
      }

      intervalId = setInterval(runSafe, options.intervalMs);
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      if (inFlight) {
        await inFlight;
      }

      log.info('poller_stopped');
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };

  /**
   * Start a run unless one is already in flight. Errors are logged, never thrown.
   */
  function runSafe(): void {
    if (inFlight) {
      log.debug('poller_skip_overlap');
      return;
    }

    inFlight = job()
      .catch((error: unknown) => {
        log.error('poller_error', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        inFlight = null;
      });
  }
}
