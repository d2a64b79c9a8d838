/**
 * Repeating async task used for the tag and button polling.
 *
 * The next tick is scheduled only after the current one settles, so ticks
 * never overlap. `stop()` cancels the pending tick and waits for one that is
 * already running, which is the join the shutdown sequence relies on.
 */
import { describeError, type Logger } from "./logger.js";

export type PollTick = () => void | Promise<void>;

export class PollingLoop {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly tick: PollTick,
    private readonly log: Logger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      throw new Error(`${this.name} loop is already running`);
    }
    this.running = true;
    this.log.info(`${this.name} loop started (every ${this.intervalMs}ms)`);
    this.schedule();
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight !== null) {
      await this.inFlight;
    }
    this.log.info(`${this.name} loop stopped`);
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
        if (this.running) this.schedule();
      });
    }, this.intervalMs);
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.log.error(`${this.name} tick failed: ${describeError(err)}`);
    }
  }
}
