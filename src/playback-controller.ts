/**
 * Playback Controller
 *
 * Serializes tag scans, button presses, player notifications and status
 * reads into one playback session at a time.
 *
 * State transitions:
 *   IDLE -> CHECK_LIMITS (known tag scanned)
 *   CHECK_LIMITS -> IDLE (video budget used up)
 *   CHECK_LIMITS -> LOADING (audio, or video within budget)
 *   LOADING -> IDLE (media file missing)
 *   LOADING -> PLAYING (log row opened, player started)
 *   PLAYING -> FINISHED -> IDLE (natural end)
 *   PLAYING -> IDLE (stop button, player failure, shutdown)
 *
 * Every entry point runs inside one SessionLock critical section, so a
 * decision is never interleaved with another event. Scans that arrive while
 * a session is active are dropped, not queued.
 */
import { EventEmitter } from "events";

import type { AudioFeedback, Player, VisualFeedback } from "./hardware-types.js";
import { checkVideoLimit } from "./limits.js";
import { describeError, Logger } from "./logger.js";
import type { ControllerStatus, Media, NowPlaying, PlaybackState } from "./media.js";
import { SessionLock } from "./session-lock.js";
import { resolveLimitSettings } from "./settings.js";
import type { MediaLocator } from "./store/media-paths.js";
import type { PlaybackStore } from "./store/store-types.js";

export interface PlaybackControllerDeps {
  readonly store: PlaybackStore;
  readonly player: Player;
  readonly leds: VisualFeedback;
  readonly buzzer: AudioFeedback;
  readonly locateMedia: MediaLocator;
  readonly logger?: Logger;
}

/** Fields of the session currently holding the player */
interface ActiveSession {
  readonly mediaId: number;
  readonly tagUid: string;
  readonly logId: number;
  /** This video was the last one the budget allowed today */
  readonly lastAllowed: boolean;
}

export interface StateChangeEvent {
  readonly from: PlaybackState;
  readonly to: PlaybackState;
}

/**
 * Events:
 *   'stateChange' - emitted with { from, to } on every lifecycle transition
 */
export class PlaybackController extends EventEmitter {
  private readonly store: PlaybackStore;
  private readonly player: Player;
  private readonly leds: VisualFeedback;
  private readonly buzzer: AudioFeedback;
  private readonly locateMedia: MediaLocator;
  private readonly log: Logger;
  private readonly lock = new SessionLock();

  private state: PlaybackState = "IDLE";
  private session: ActiveSession | null = null;
  private registerModeEnabled = false;
  private lastScanned: string | null = null;

  constructor(deps: PlaybackControllerDeps) {
    super();
    this.store = deps.store;
    this.player = deps.player;
    this.leds = deps.leds;
    this.buzzer = deps.buzzer;
    this.locateMedia = deps.locateMedia;
    this.log = deps.logger ?? new Logger("Controller");

    this.player.on("ended", () => {
      this.onPlaybackEnd().catch((err: unknown) => {
        this.log.error(`Playback end handling failed: ${describeError(err)}`);
      });
    });
    this.player.on("failed", (err: Error) => {
      this.onPlaybackFailed(err).catch((handlerErr: unknown) => {
        this.log.error(`Playback failure handling failed: ${describeError(handlerErr)}`);
      });
    });

    this.leds.idle();
  }

  get currentState(): PlaybackState {
    return this.state;
  }

  get registerMode(): boolean {
    return this.registerModeEnabled;
  }

  get lastScannedUid(): string | null {
    return this.lastScanned;
  }

  get currentMediaId(): number | null {
    return this.session?.mediaId ?? null;
  }

  get currentTagUid(): string | null {
    return this.session?.tagUid ?? null;
  }

  get currentLogId(): number | null {
    return this.session?.logId ?? null;
  }

  /** While enabled, scans are captured for tag registration instead of playing. */
  async setRegisterMode(enabled: boolean): Promise<void> {
    await this.lock.runExclusive(() => {
      this.registerModeEnabled = enabled;
      this.log.info(`Register mode ${enabled ? "enabled" : "disabled"}`);
    });
  }

  /** Entry point for the tag polling loop. */
  async onTagScanned(uid: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.lastScanned = uid;

      if (this.registerModeEnabled) {
        this.log.info(`Register mode: captured UID ${uid}`);
        this.buzzer.scanConfirm();
        this.leds.scanFeedback();
        return;
      }

      if (this.state !== "IDLE") {
        this.log.debug(`Ignoring tag ${uid} (state is ${this.state})`);
        return;
      }

      try {
        await this.startSession(uid);
      } catch (err) {
        this.log.error(`Scan of ${uid} failed: ${describeError(err)}`);
        this.buzzer.error();
        await this.abandonSession();
      }
    });
  }

  /** Called by the player when playback reaches its natural end. */
  async onPlaybackEnd(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const session = this.session;
      if (this.state !== "PLAYING" || session === null) return;
      // A player that is still playing means this end belongs to an earlier stream
      if (this.player.isPlaying) {
        this.log.debug("Ignoring end notification from a replaced stream");
        return;
      }

      await this.closeLog(session.logId, true);
      this.transitionTo("FINISHED");
      this.log.info("Playback finished");

      if (session.lastAllowed) {
        this.buzzer.allDone();
        this.leds.allDoneFeedback();
      } else {
        this.leds.idle();
      }
      this.resetSession();
    });
  }

  /** Play/pause button. Pausing does not leave PLAYING. */
  async onPlayPause(): Promise<void> {
    await this.lock.runExclusive(() => {
      if (this.state !== "PLAYING") return;
      this.callPlayer("pause toggle", () => this.player.pauseToggle());
    });
  }

  /** Stop button. */
  async onStop(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const session = this.session;
      if (this.state !== "PLAYING" || session === null) return;

      this.log.info("Stop pressed");
      this.callPlayer("stop", () => this.player.stop());
      await this.closeLog(session.logId, false);
      this.leds.idle();
      this.resetSession();
    });
  }

  /** Snapshot for the dashboard, taken under the session lock. */
  async getStatus(): Promise<ControllerStatus> {
    return this.lock.runExclusive(async () => {
      let nowPlaying: NowPlaying | undefined;
      if (this.session !== null) {
        const media = await this.store.getMedia(this.session.mediaId);
        if (media) {
          nowPlaying = {
            title: media.title,
            mediaType: media.mediaType,
            thumbnail: media.thumbnail ?? null,
          };
        }
      }

      const limits = resolveLimitSettings(await this.store.getAllSettings());
      const stats = await this.store.getTodayVideoStats(limits.resetHour);

      return {
        state: this.state,
        registerMode: this.registerModeEnabled,
        lastScannedUid: this.lastScanned,
        ...(nowPlaying ? { nowPlaying } : {}),
        videoStats: {
          count: stats.count,
          totalMinutes: Math.round(stats.totalMinutes * 10) / 10,
          limitCount: limits.maxCount,
          limitMinutes: limits.maxMinutes,
        },
      };
    });
  }

  /**
   * End any active session before the process exits. The open log row is
   * closed as not completed rather than left dangling.
   */
  async shutdown(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const session = this.session;
      if (session !== null) {
        this.log.info(`Shutting down during playback of media ${session.mediaId}, closing log ${session.logId}`);
        this.callPlayer("stop", () => this.player.stop());
        await this.closeLog(session.logId, false);
        this.resetSession();
      }
      this.leds.off();
    });
  }

  // --- Internals (lock held) ---

  private async startSession(uid: string): Promise<void> {
    const tag = await this.store.getTag(uid);
    if (!tag) {
      this.log.warn(`Unknown tag: ${uid}`);
      this.buzzer.error();
      return;
    }

    const media = await this.store.getMedia(tag.mediaId);
    if (!media) {
      this.log.error(`Tag ${uid} points to missing media ${tag.mediaId}`);
      this.buzzer.error();
      return;
    }

    this.transitionTo("CHECK_LIMITS");
    const verdict = await this.checkLimits(media);
    if (verdict === "denied") {
      this.buzzer.allDone();
      this.leds.allDoneFeedback();
      this.transitionTo("IDLE");
      return;
    }
    const lastAllowed = verdict === "last";
    if (lastAllowed) {
      this.buzzer.lastVideoWarning();
      this.leds.lastVideoWarning();
    }

    this.transitionTo("LOADING");
    const path = this.locateMedia(media);
    if (path === null) {
      this.log.error(`Media file not found: ${media.filename} (${media.mediaType})`);
      this.buzzer.error();
      this.leds.idle();
      this.transitionTo("IDLE");
      return;
    }

    this.buzzer.scanConfirm();
    this.leds.scanFeedback();

    const logId = await this.store.logPlaybackStart(media.id, uid);
    this.session = { mediaId: media.id, tagUid: uid, logId, lastAllowed };
    this.transitionTo("PLAYING");
    this.log.info(`Playing "${media.title}" for tag ${uid}`);

    this.player.play(path, media.mediaType);
    this.leds.playingAnimation();
  }

  /** Settings and stats are read once here and used for this decision only. */
  private async checkLimits(media: Media): Promise<"allowed" | "last" | "denied"> {
    if (media.mediaType !== "video") return "allowed";

    const limits = resolveLimitSettings(await this.store.getAllSettings());
    const stats = await this.store.getTodayVideoStats(limits.resetHour);
    const result = checkVideoLimit(stats, limits.maxCount, limits.maxMinutes, media.durationS ?? 0);

    if (!result.allowed) {
      this.log.info(`Video limit reached: ${result.reason}`);
      return "denied";
    }
    if (result.isLast) {
      this.log.info("This is the last allowed video today");
      return "last";
    }
    return "allowed";
  }

  private async onPlaybackFailed(err: Error): Promise<void> {
    await this.lock.runExclusive(async () => {
      const session = this.session;
      if (this.state !== "PLAYING" || session === null) return;

      this.log.error(`Player failed: ${err.message}`);
      await this.closeLog(session.logId, false);
      this.buzzer.error();
      this.leds.idle();
      this.resetSession();
    });
  }

  /** Return to IDLE after an unexpected failure mid-scan. */
  private async abandonSession(): Promise<void> {
    const session = this.session;
    if (session !== null) {
      this.callPlayer("stop", () => this.player.stop());
      await this.closeLog(session.logId, false);
    }
    this.leds.idle();
    this.resetSession();
  }

  private async closeLog(logId: number, completed: boolean): Promise<void> {
    try {
      await this.store.logPlaybackEnd(logId, completed);
    } catch (err) {
      this.log.error(`Could not close playback log ${logId}: ${describeError(err)}`);
    }
  }

  private callPlayer(action: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.log.error(`Player ${action} failed: ${describeError(err)}`);
    }
  }

  private resetSession(): void {
    this.session = null;
    this.transitionTo("IDLE");
  }

  private transitionTo(next: PlaybackState): void {
    const from = this.state;
    if (from === next) return;
    this.state = next;
    this.log.debug(`${from} -> ${next}`);
    const event: StateChangeEvent = { from, to: next };
    this.emit("stateChange", event);
  }
}
