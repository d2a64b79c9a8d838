/**
 * Failure isolation for feedback backends.
 *
 * A broken LED strip or buzzer must never abort a session transition, so
 * every cue goes through `runCue`, which logs and swallows the failure.
 */
import type { AudioFeedback, BackendInfo, VisualFeedback } from "../hardware-types.js";
import { describeError, type Logger } from "../logger.js";

function runCue(log: Logger, cue: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.error(`Cue "${cue}" failed: ${describeError(err)}`);
  }
}

export class GuardedVisualFeedback implements VisualFeedback {
  constructor(
    private readonly inner: VisualFeedback,
    private readonly log: Logger,
  ) {}

  get info(): BackendInfo {
    return this.inner.info;
  }

  scanFeedback(): void {
    runCue(this.log, "scan", () => this.inner.scanFeedback());
  }

  playingAnimation(): void {
    runCue(this.log, "playing", () => this.inner.playingAnimation());
  }

  lastVideoWarning(): void {
    runCue(this.log, "last_video", () => this.inner.lastVideoWarning());
  }

  allDoneFeedback(): void {
    runCue(this.log, "all_done", () => this.inner.allDoneFeedback());
  }

  idle(): void {
    runCue(this.log, "idle", () => this.inner.idle());
  }

  off(): void {
    runCue(this.log, "off", () => this.inner.off());
  }

  async release(): Promise<void> {
    try {
      await this.inner.release();
    } catch (err) {
      this.log.error(`Release failed: ${describeError(err)}`);
    }
  }
}

export class GuardedAudioFeedback implements AudioFeedback {
  constructor(
    private readonly inner: AudioFeedback,
    private readonly log: Logger,
  ) {}

  get info(): BackendInfo {
    return this.inner.info;
  }

  scanConfirm(): void {
    runCue(this.log, "scan_confirm", () => this.inner.scanConfirm());
  }

  lastVideoWarning(): void {
    runCue(this.log, "last_video", () => this.inner.lastVideoWarning());
  }

  allDone(): void {
    runCue(this.log, "all_done", () => this.inner.allDone());
  }

  error(): void {
    runCue(this.log, "error", () => this.inner.error());
  }

  async release(): Promise<void> {
    try {
      await this.inner.release();
    } catch (err) {
      this.log.error(`Release failed: ${describeError(err)}`);
    }
  }
}
