export interface RefreshSchedulerOptions {
  intervalMs: number;
  refresh: () => Promise<void>;
  onError: (error: unknown) => void;
}

export function intervalForRate(updatesPerSecond: number): number {
  return Math.max(1, Math.round(1000 / Math.max(1, updatesPerSecond)));
}

/**
 * Coalesces refresh requests: the first notify after an idle period arms a
 * timer, later notifies are absorbed, and the timer firing performs exactly one
 * refresh before disarming.
 */
export class RefreshScheduler {
  private readonly options: RefreshSchedulerOptions;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private refreshes = 0;

  constructor(options: RefreshSchedulerOptions) {
    this.options = options;
  }

  get armed(): boolean {
    return this.timer !== null;
  }

  get refreshCount(): number {
    return this.refreshes;
  }

  notify(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.run();
    }, this.options.intervalMs);
  }

  // Unthrottled: used for cancellation and end of stream.
  async flush(): Promise<void> {
    this.cancel();
    if (this.inFlight) await this.inFlight;
    await this.run();
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  async idle(): Promise<void> {
    if (this.inFlight) await this.inFlight;
  }

  private async run(): Promise<void> {
    this.refreshes += 1;
    try {
      await this.options.refresh();
    } catch (error) {
      this.options.onError(error);
    }
  }
}
