/**
 * Timer-backed player for development without mpv.
 *
 * Each `play` schedules a cancellable completion that emits `ended` through
 * the same channel the real player uses. Pausing freezes the remaining time.
 */
import { EventEmitter } from "events";

import type { Player } from "../hardware-types.js";
import type { Logger } from "../logger.js";
import type { MediaType } from "../media.js";

export class StubPlayer extends EventEmitter implements Player {
  private timer: NodeJS.Timeout | null = null;
  private playing = false;
  private paused = false;
  private remainingMs = 0;
  private resumedAt = 0;

  constructor(
    private readonly durationMs: number,
    private readonly log: Logger,
  ) {
    super();
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  play(locator: string, mediaType: MediaType): void {
    this.stop();
    this.log.info(`Playing ${locator} (${mediaType}), ends in ${this.durationMs}ms`);
    this.playing = true;
    this.paused = false;
    this.schedule(this.durationMs);
  }

  stop(): void {
    if (!this.playing) return;
    this.clearTimer();
    this.playing = false;
    this.paused = false;
    this.log.info("Stopped");
  }

  pauseToggle(): void {
    if (!this.playing) return;

    if (this.paused) {
      this.paused = false;
      this.schedule(this.remainingMs);
      this.log.info("Resumed");
      return;
    }

    this.remainingMs = Math.max(0, this.remainingMs - (Date.now() - this.resumedAt));
    this.clearTimer();
    this.paused = true;
    this.log.info(`Paused (${this.remainingMs}ms left)`);
  }

  release(): void {
    this.stop();
    this.removeAllListeners();
  }

  private schedule(ms: number): void {
    this.remainingMs = ms;
    this.resumedAt = Date.now();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.playing = false;
      this.log.info("Playback finished");
      this.emit("ended");
    }, ms);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
