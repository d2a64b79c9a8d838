import type { BackendInfo, ButtonAction, ButtonSource } from "../hardware-types.js";
import type { Logger } from "../logger.js";
import { ButtonDebouncer } from "./button-debouncer.js";

/** Buttons pressed from the console or tests; one queued press per poll. */
export class SimulatedButtons implements ButtonSource {
  readonly info: BackendInfo = {
    id: "simulated",
    name: "Simulated buttons",
    description: "Play/pause and stop presses injected in-process",
  };

  private readonly pending: ButtonAction[] = [];
  private readonly debouncer: ButtonDebouncer;

  constructor(
    debounceMs: number,
    private readonly log: Logger,
    now: () => number = Date.now,
  ) {
    this.debouncer = new ButtonDebouncer(debounceMs, now);
  }

  press(action: ButtonAction): void {
    this.pending.push(action);
  }

  poll(): ButtonAction | null {
    const action = this.debouncer.accept(this.pending.shift() ?? null);
    if (action !== null) {
      this.log.info(`${action} pressed`);
    }
    return action;
  }

  release(): void {
    this.pending.length = 0;
  }
}
