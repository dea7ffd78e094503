// src/core/scheduler.ts
import { errorMessage } from './errors.js';
import { FIRST_SCAN_DELAY_MS } from './config/constants.js';

export interface SchedulerOptions {
  intervalMs: number;
  firstDelayMs?: number;
}

/**
 * Calls `task` after a first delay and then on a fixed interval. A tick that
 * lands while the previous run is still going is skipped.
 */
export class ScanScheduler {
  private firstTimer?: NodeJS.Timeout;
  private intervalTimer?: NodeJS.Timeout;
  private running = false;
  private current?: Promise<void>;

  constructor(
    private readonly task: () => Promise<unknown>,
    private readonly options: SchedulerOptions
  ) {}

  get isStarted(): boolean {
    return this.firstTimer !== undefined || this.intervalTimer !== undefined;
  }

  start(): void {
    if (this.isStarted) return;

    this.firstTimer = setTimeout(() => {
      this.firstTimer = undefined;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), this.options.intervalMs);
    }, this.options.firstDelayMs ?? FIRST_SCAN_DELAY_MS);
  }

  /** Stops future runs and waits for one in progress. */
  async stop(): Promise<void> {
    clearTimeout(this.firstTimer);
    clearInterval(this.intervalTimer);
    this.firstTimer = undefined;
    this.intervalTimer = undefined;
    await this.current;
  }

  private tick(): void {
    if (this.running) {
      console.warn('[Schedule] Previous scan still running, skipping this tick');
      return;
    }

    this.running = true;
    this.current = this.task()
      .then(() => undefined)
      .catch(error => {
        console.error(`[Schedule] Scan failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running = false;
      });
  }
}
