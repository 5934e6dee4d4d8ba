// =============================================================================
// Background Sweeper
// =============================================================================
// Runs a periodic job that drains expired entries from a cache, so entries
// that expire and are never read or overwritten again do not hold memory
// forever.
//
// Each cache owns one sweeper:
//
//   start()    — schedule the task every `intervalMs`
//   runOnce()  — run the task now (skipped if a run is still in flight)
//   shutdown() — stop scheduling, wait up to `shutdownTimeoutMs` for an
//                in-flight run, then abort it
//
// Aborting only reaches tasks that await and watch their signal.  The
// CacheStore drain is synchronous, so it always finishes before shutdown
// sees it and is never cut short.
//
// The timer is unref'd so an idle cache never keeps the process alive.
// =============================================================================
import logger from '../utils/logger';
import { describeError } from '../utils/CacheConfigError';
import { SweepTask } from '../types';

export interface BackgroundSweeperOptions {
  /** Label used in log lines */
  name: string;
  intervalMs: number;
  shutdownTimeoutMs: number;
  task: SweepTask;
}

export class BackgroundSweeper {
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly task: SweepTask;
  private readonly abortController = new AbortController();

  /** Interval handle — cleared on shutdown. */
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<number> | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: BackgroundSweeperOptions) {
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs;
    this.task = options.task;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Starts the periodic sweep.  The first run happens one interval from
   * now.
   *
   * Calling this while already running, or after shutdown, is a no-op.
   */
  start(): void {
    if (this.shutdownPromise) {
      logger.debug('Sweeper already shut down — skipping start', { sweeper: this.name });
      return;
    }
    if (this.intervalHandle) {
      logger.debug('Sweeper already running — skipping start', { sweeper: this.name });
      return;
    }

    logger.info('Starting cache sweeper', { sweeper: this.name, intervalMs: this.intervalMs });

    this.intervalHandle = setInterval(() => {
      this.runOnce().catch((err: unknown) => {
        logger.error('Cache sweep tick failed', { sweeper: this.name, error: describeError(err) });
      });
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  /**
   * Stops the sweeper.
   *
   * Future runs are cancelled immediately.  A run already in progress gets
   * up to `shutdownTimeoutMs` to finish; past that its AbortSignal is
   * aborted and shutdown resolves without it.  Only an async task that
   * checks the signal can be cut short this way; a synchronous task has
   * already completed.  Repeated calls share the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.stop();
    }
    return this.shutdownPromise;
  }

  isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Sweep execution
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Runs the task once and resolves with the number of entries removed.
   * Resolves 0 when a previous run is still in flight, when the sweeper has
   * been shut down, or when the task throws (the failure is logged).
   */
  async runOnce(): Promise<number> {
    if (this.shutdownPromise) return 0;
    if (this.inFlight) {
      logger.debug('Previous sweep still running — skipping tick', { sweeper: this.name });
      return 0;
    }

    const run = this.execute();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  private async execute(): Promise<number> {
    try {
      const swept = await this.task(this.abortController.signal);
      if (swept > 0) {
        logger.info('Cache sweep completed', { sweeper: this.name, swept });
      }
      return swept;
    } catch (err) {
      logger.error('Cache sweep failed', { sweeper: this.name, error: describeError(err) });
      return 0;
    }
  }

  private async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }

    const pending = this.inFlight;
    if (pending) {
      const finished = await this.waitFor(pending);
      if (!finished) {
        this.abortController.abort();
        logger.warn('Cache sweep did not finish in time — forcing stop', {
          sweeper: this.name,
          timeoutMs: this.shutdownTimeoutMs,
        });
      }
    }

    logger.info('Cache sweeper stopped', { sweeper: this.name });
  }

  /** Resolves `true` if `run` settles within the shutdown timeout. */
  private async waitFor(run: Promise<number>): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
    });
    try {
      return await Promise.race([run.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
