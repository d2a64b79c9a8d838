/**
 * Simulated LED strip.
 *
 * Mirrors the timing of the real strip's cues with timers and logs every
 * pattern change. The scan flash and the pulse sequences always run to the
 * end; cues issued meanwhile wait their turn. Only the playing animation is
 * cut short by the next cue.
 */
import type { BackendInfo, VisualFeedback } from "../hardware-types.js";
import type { Logger } from "../logger.js";

export type LedPattern = "off" | "idle" | "scan" | "playing" | "last_video" | "all_done";

const SCAN_FLASH_MS = 150;
const BREATHE_PERIOD_MS = 1800;
const LAST_VIDEO_PULSE_MS = 400;
const ALL_DONE_PULSE_MS = 500;
const WARNING_PULSES = 3;

export class SimulatedLedStrip implements VisualFeedback {
  readonly info: BackendInfo = {
    id: "simulated",
    name: "Simulated LED strip",
    description: "Logs light cues instead of driving pixels",
  };

  private current: LedPattern = "off";
  /** Flash or pulse sequence in progress */
  private sequence: NodeJS.Timeout | null = null;
  private breathing: NodeJS.Timeout | null = null;
  private readonly pending: (() => void)[] = [];

  constructor(private readonly log: Logger) {}

  get pattern(): LedPattern {
    return this.current;
  }

  /** True while a timed pattern (flash, pulses, breathing) is still running. */
  get isAnimating(): boolean {
    return this.sequence !== null || this.breathing !== null;
  }

  /** Cues waiting for the current flash or pulse sequence to finish. */
  get queued(): number {
    return this.pending.length;
  }

  scanFeedback(): void {
    this.enqueue(() => {
      this.show("scan", "Scan flash");
      this.sequence = setTimeout(() => this.finishSequence(), SCAN_FLASH_MS);
    });
  }

  playingAnimation(): void {
    this.enqueue(() => {
      this.show("playing", "Playing animation started");
      this.breathing = setInterval(() => this.log.debug("Breathe"), BREATHE_PERIOD_MS);
    });
  }

  lastVideoWarning(): void {
    this.enqueue(() => {
      this.show("last_video", "Last video warning (amber pulse)");
      this.pulse(LAST_VIDEO_PULSE_MS);
    });
  }

  allDoneFeedback(): void {
    this.enqueue(() => {
      this.show("all_done", "All done (red pulse)");
      this.pulse(ALL_DONE_PULSE_MS);
    });
  }

  idle(): void {
    this.enqueue(() => this.show("idle", "Idle glow"));
  }

  off(): void {
    this.enqueue(() => this.show("off", "Off"));
  }

  release(): void {
    this.pending.length = 0;
    if (this.sequence) {
      clearTimeout(this.sequence);
      clearInterval(this.sequence);
      this.sequence = null;
    }
    this.stopBreathing();
    this.current = "off";
  }

  private enqueue(cue: () => void): void {
    if (this.sequence !== null) {
      this.pending.push(cue);
      return;
    }
    cue();
  }

  private show(pattern: LedPattern, message: string): void {
    this.stopBreathing();
    this.current = pattern;
    this.log.info(message);
  }

  /** Finite pulse sequence that ends with the strip off. */
  private pulse(periodMs: number): void {
    let remaining = WARNING_PULSES;
    this.sequence = setInterval(() => {
      remaining--;
      this.log.debug(`Pulse (${WARNING_PULSES - remaining}/${WARNING_PULSES})`);
      if (remaining === 0) this.finishSequence();
    }, periodMs);
  }

  private finishSequence(): void {
    if (this.sequence) {
      clearTimeout(this.sequence);
      clearInterval(this.sequence);
      this.sequence = null;
    }
    this.current = "off";

    while (this.sequence === null) {
      const next = this.pending.shift();
      if (!next) break;
      next();
    }
  }

  private stopBreathing(): void {
    if (this.breathing) {
      clearInterval(this.breathing);
      this.breathing = null;
    }
  }
}
