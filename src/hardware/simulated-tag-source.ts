/**
 * Simulated token reader for development and tests.
 *
 * `place()` leaves a token on the reader until `lift()`, which exercises the
 * same dedup path a real reader goes through. `tap()` presents a token for a
 * single poll.
 */
import type { BackendInfo, TagSource } from "../hardware-types.js";
import type { Logger } from "../logger.js";
import { TagDeduplicator } from "./tag-deduplicator.js";

export class SimulatedTagSource implements TagSource {
  readonly info: BackendInfo = {
    id: "simulated",
    name: "Simulated reader",
    description: "In-process token reader driven by the console or tests",
  };

  private resting: string | null = null;
  private tapped: string | null = null;
  private readonly dedup: TagDeduplicator;

  constructor(
    dedupWindowMs: number,
    private readonly log: Logger,
    now: () => number = Date.now,
  ) {
    this.dedup = new TagDeduplicator(dedupWindowMs, now);
  }

  place(uid: string): void {
    this.resting = uid;
  }

  lift(): void {
    this.resting = null;
  }

  tap(uid: string): void {
    this.tapped = uid;
  }

  poll(): string | null {
    const raw = this.tapped ?? this.resting;
    this.tapped = null;

    const uid = this.dedup.accept(raw);
    if (uid !== null) {
      this.log.info(`Read UID ${uid}`);
    }
    return uid;
  }

  release(): void {
    this.resting = null;
    this.tapped = null;
  }
}
