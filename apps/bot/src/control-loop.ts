import { systemClock, type Clock, type Logger } from "@qtrader/core";

export interface ControlLoopOptions {
  pollMs: number;
  errorBackoffMs: number;
  logger: Logger;
  clock?: Clock;
}

/**
 * Runs ticks back to back at the poll interval. `stop()` cuts the pause short
 * but never interrupts a tick already in progress.
 */
export class ControlLoop {
  private readonly options: ControlLoopOptions;
  private readonly clock: Clock;
  private readonly abort = new AbortController();

  public constructor(options: ControlLoopOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  public get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  public stop(): void {
    this.abort.abort();
  }

  /** Resolves with the number of ticks run once the loop has stopped. */
  public async run(tick: () => Promise<void>): Promise<number> {
    let ticks = 0;
    while (!this.stopped) {
      const startedAt = this.clock.now();
      let waitMs: number;
      try {
        await tick();
        waitMs = Math.max(0, this.options.pollMs - (this.clock.now() - startedAt));
      } catch (error) {
        this.options.logger.error("LOOP_ERROR", "ERROR IN MAIN LOOP", {
          error: error instanceof Error ? error.message : String(error),
          backoffMs: this.options.errorBackoffMs,
        });
        waitMs = this.options.errorBackoffMs;
      }
      ticks += 1;

      if (!this.stopped && waitMs > 0) {
        await this.clock.sleep(waitMs, this.abort.signal);
      }
    }
    return ticks;
  }
}
