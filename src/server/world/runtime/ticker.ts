import type { Logger } from "pino";

export interface TickerOptions {
  name: string;
  intervalMs: number;
  logger: Logger;
}

/**
 * Fixed-period async loop. The next tick is scheduled only after the current
 * one settles, so ticks never overlap.
 */
export class Ticker {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private ticks = 0;

  constructor(
    private readonly tick: () => Promise<void> | void,
    private readonly options: TickerOptions,
  ) {}

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getTickCount(): number {
    return this.ticks;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.run();
    }, delayMs);
  }

  private async run(): Promise<void> {
    if (!this.running) {
      return;
    }
    const startedAt = Date.now();
    this.ticks += 1;
    try {
      await this.tick();
    } catch (error) {
      this.options.logger.error({ err: error, loop: this.options.name }, "Tick failed");
    }
    if (this.running) {
      this.schedule(Math.max(0, this.options.intervalMs - (Date.now() - startedAt)));
    }
  }
}
