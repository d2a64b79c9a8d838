import type { AudioFeedback, BackendInfo } from "../hardware-types.js";
import type { Logger } from "../logger.js";

/** One note: frequency in Hz (0 = rest) and length in ms */
export interface Tone {
  readonly hz: number;
  readonly ms: number;
}

const PLAYED_HISTORY = 50;

export type BuzzerCue = "scan_confirm" | "last_video" | "all_done" | "error";

export const TONE_PATTERNS: Readonly<Record<BuzzerCue, readonly Tone[]>> = {
  scan_confirm: [
    { hz: 1000, ms: 80 },
    { hz: 0, ms: 30 },
    { hz: 1500, ms: 80 },
  ],
  // C5, E5, G5
  last_video: [
    { hz: 523, ms: 150 },
    { hz: 659, ms: 150 },
    { hz: 784, ms: 150 },
  ],
  // G5, E5, C5, G4
  all_done: [
    { hz: 784, ms: 200 },
    { hz: 659, ms: 200 },
    { hz: 523, ms: 200 },
    { hz: 392, ms: 200 },
  ],
  error: [
    { hz: 200, ms: 150 },
    { hz: 0, ms: 50 },
    { hz: 200, ms: 150 },
  ],
};

export function describeTones(tones: readonly Tone[]): string {
  return tones.map((t) => (t.hz === 0 ? `rest ${t.ms}ms` : `${t.hz}Hz ${t.ms}ms`)).join(", ");
}

/** Buzzer that logs the tone sequence of each cue. */
export class SimulatedBuzzer implements AudioFeedback {
  readonly info: BackendInfo = {
    id: "simulated",
    name: "Simulated buzzer",
    description: "Logs tone sequences instead of driving PWM",
  };

  /** Most recent cues, oldest first */
  readonly played: BuzzerCue[] = [];

  constructor(private readonly log: Logger) {}

  scanConfirm(): void {
    this.play("scan_confirm");
  }

  lastVideoWarning(): void {
    this.play("last_video");
  }

  allDone(): void {
    this.play("all_done");
  }

  error(): void {
    this.play("error");
  }

  release(): void {
    this.played.length = 0;
  }

  private play(cue: BuzzerCue): void {
    if (this.played.length >= PLAYED_HISTORY) {
      this.played.shift();
    }
    this.played.push(cue);
    this.log.info(`${cue}: ${describeTones(TONE_PATTERNS[cue])}`);
  }
}
