/**
 * Recurring crawl task
 *
 * start() runs a cycle right away and re-arms a timer when each cycle
 * ends, so cycles never overlap. stop() clears the timer and resolves
 * once the cycle in flight (if any) has finished; an owner is never
 * interrupted mid-crawl.
 */

import type { Logger } from "@/types";
import * as defaultLogger from "@/logger";

export type CrawlTimerOptions = {
  /** Delay between the end of one cycle and the start of the next */
  intervalMs: number;
  logger?: Logger;
};

export class CrawlTimer {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;
  private cycles = 0;

  constructor(
    private readonly runCycle: () => Promise<unknown>,
    options: CrawlTimerOptions,
  ) {
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? defaultLogger;
  }

  get isRunning(): boolean {
    return this.active;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.logger.info("Crawl timer started", { intervalMs: this.intervalMs });
    this.tick();
  }

  async stop(): Promise<void> {
    this.active = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      this.logger.info("Crawl timer stopping, waiting for the current cycle");
      await this.inFlight;
    }
    this.logger.info("Crawl timer stopped", { cycles: this.cycles });
  }

  private tick(): void {
    this.timer = null;
    if (!this.active || this.inFlight) {
      return;
    }

    this.inFlight = this.runGuarded().finally(() => {
      this.inFlight = null;
      if (this.active) {
        this.timer = setTimeout(() => this.tick(), this.intervalMs);
      }
    });
  }

  private async runGuarded(): Promise<void> {
    this.cycles++;
    try {
      await this.runCycle();
    } catch (err) {
      this.logger.error("Crawl cycle failed", {
        cycle: this.cycles,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
