/**
 * Tests for PlaybackController: the session state machine.
 *
 * The store, player and feedback ports are in-memory fakes; every cue the
 * controller issues is recorded in one ordered list.
 */
import { EventEmitter } from "events";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { AudioFeedback, BackendInfo, Player, VisualFeedback } from "../hardware-types.js";
import { GuardedVisualFeedback } from "../hardware/guarded-feedback.js";
import { Logger, setLogHandler, type LogEntry } from "../logger.js";
import type { Media, MediaType, Tag, VideoStats } from "../media.js";
import { PlaybackController, type StateChangeEvent } from "../playback-controller.js";
import { DEFAULT_SETTINGS } from "../settings.js";
import type { PlaybackStore } from "../store/store-types.js";

interface LogRow {
  readonly id: number;
  readonly mediaId: number;
  readonly tagUid: string | null;
  completed: boolean | null;
}

class FakeStore implements PlaybackStore {
  readonly tags = new Map<string, Tag>();
  readonly media = new Map<number, Media>();
  settings: Record<string, string> = { ...DEFAULT_SETTINGS };
  stats: VideoStats = { count: 0, totalMinutes: 0 };
  readonly logs: LogRow[] = [];
  readonly statsResetHours: number[] = [];
  failLogStart = false;

  async getTag(uid: string): Promise<Tag | null> {
    return this.tags.get(uid) ?? null;
  }

  async getMedia(id: number): Promise<Media | null> {
    return this.media.get(id) ?? null;
  }

  async getTodayVideoStats(resetHour: number): Promise<VideoStats> {
    this.statsResetHours.push(resetHour);
    return this.stats;
  }

  async getAllSettings(): Promise<Record<string, string>> {
    return { ...this.settings };
  }

  async logPlaybackStart(mediaId: number, tagUid: string | null): Promise<number> {
    if (this.failLogStart) throw new Error("disk full");
    const id = this.logs.length + 1;
    this.logs.push({ id, mediaId, tagUid, completed: null });
    return id;
  }

  async logPlaybackEnd(logId: number, completed: boolean): Promise<void> {
    const row = this.logs.find((r) => r.id === logId);
    if (row && row.completed === null) row.completed = completed;
  }
}

class FakePlayer extends EventEmitter implements Player {
  isPlaying = false;
  failPlay = false;
  readonly calls: string[] = [];

  play(locator: string, mediaType: MediaType): void {
    this.calls.push(`play ${locator} (${mediaType})`);
    if (this.failPlay) throw new Error("no audio device");
    this.isPlaying = true;
  }

  stop(): void {
    this.calls.push("stop");
    this.isPlaying = false;
  }

  pauseToggle(): void {
    this.calls.push("pause");
  }

  release(): void {}

  /** Natural end of the current stream */
  finish(): void {
    this.isPlaying = false;
    this.emit("ended");
  }

  crash(message: string): void {
    this.isPlaying = false;
    this.emit("failed", new Error(message));
  }
}

const INFO: BackendInfo = { id: "fake", name: "Fake", description: "Records cues" };

function recordingLeds(cues: string[]): VisualFeedback {
  return {
    info: INFO,
    scanFeedback: () => cues.push("led:scan"),
    playingAnimation: () => cues.push("led:playing"),
    lastVideoWarning: () => cues.push("led:last_video"),
    allDoneFeedback: () => cues.push("led:all_done"),
    idle: () => cues.push("led:idle"),
    off: () => cues.push("led:off"),
    release: () => {},
  };
}

function recordingBuzzer(cues: string[]): AudioFeedback {
  return {
    info: INFO,
    scanConfirm: () => cues.push("buzz:scan_confirm"),
    lastVideoWarning: () => cues.push("buzz:last_video"),
    allDone: () => cues.push("buzz:all_done"),
    error: () => cues.push("buzz:error"),
    release: () => {},
  };
}

/** Let player event handlers work through the session lock. */
const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("PlaybackController", () => {
  let store: FakeStore;
  let player: FakePlayer;
  let cues: string[];
  let transitions: string[];
  let entries: LogEntry[];
  let controller: PlaybackController;

  function createController(leds: VisualFeedback = recordingLeds(cues)): PlaybackController {
    const ctrl = new PlaybackController({
      store,
      player,
      leds,
      buzzer: recordingBuzzer(cues),
      locateMedia: (media) => (media.filename === "missing.mp4" ? null : `/media/${media.mediaType}/${media.filename}`),
      logger: new Logger("Controller"),
    });
    ctrl.on("stateChange", (e: StateChangeEvent) => transitions.push(`${e.from}->${e.to}`));
    return ctrl;
  }

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));

    store = new FakeStore();
    store.media.set(1, { id: 1, title: "Lullaby", filename: "song.mp3", mediaType: "audio", durationS: 120 });
    store.media.set(2, {
      id: 2,
      title: "Dinosaur Facts",
      filename: "dino.mp4",
      mediaType: "video",
      thumbnail: "dino.jpg",
      durationS: 600,
    });
    store.media.set(3, { id: 3, title: "Lost Clip", filename: "missing.mp4", mediaType: "video", durationS: 60 });
    store.tags.set("AUDIO1", { uid: "AUDIO1", mediaId: 1 });
    store.tags.set("VIDEO1", { uid: "VIDEO1", mediaId: 2 });
    store.tags.set("MISSING", { uid: "MISSING", mediaId: 3 });
    store.tags.set("DANGLE", { uid: "DANGLE", mediaId: 99 });

    player = new FakePlayer();
    cues = [];
    transitions = [];
    controller = createController();
    cues.length = 0;
  });

  afterEach(() => {
    setLogHandler(null);
  });

  function expectNoSession(): void {
    expect(controller.currentMediaId).toBeNull();
    expect(controller.currentTagUid).toBeNull();
    expect(controller.currentLogId).toBeNull();
  }

  it("starts idle with the idle glow", () => {
    const fresh: string[] = [];
    const ctrl = new PlaybackController({
      store,
      player,
      leds: recordingLeds(fresh),
      buzzer: recordingBuzzer(fresh),
      locateMedia: () => null,
    });

    expect(ctrl.currentState).toBe("IDLE");
    expect(ctrl.registerMode).toBe(false);
    expect(ctrl.lastScannedUid).toBeNull();
    expect(fresh).toEqual(["led:idle"]);
  });

  describe("scanning", () => {
    it("plays a mapped audio tag", async () => {
      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("PLAYING");
      expect(controller.currentMediaId).toBe(1);
      expect(controller.currentTagUid).toBe("AUDIO1");
      expect(controller.currentLogId).toBe(1);
      expect(player.calls).toEqual(["play /media/audio/song.mp3 (audio)"]);
      expect(cues).toEqual(["buzz:scan_confirm", "led:scan", "led:playing"]);
      expect(transitions).toEqual(["IDLE->CHECK_LIMITS", "CHECK_LIMITS->LOADING", "LOADING->PLAYING"]);
      expect(store.logs).toEqual([{ id: 1, mediaId: 1, tagUid: "AUDIO1", completed: null }]);
    });

    it("does not consult the video budget for audio", async () => {
      store.stats = { count: 99, totalMinutes: 999 };
      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("PLAYING");
      expect(store.statsResetHours).toEqual([]);
    });

    it("gives one error cue for an unknown tag and stays idle", async () => {
      await controller.onTagScanned("NOPE");

      expect(controller.currentState).toBe("IDLE");
      expect(controller.lastScannedUid).toBe("NOPE");
      expect(cues).toEqual(["buzz:error"]);
      expect(transitions).toEqual([]);
      expect(store.logs).toEqual([]);
      expect(player.calls).toEqual([]);
    });

    it("logs and rejects a tag that points at missing media", async () => {
      await controller.onTagScanned("DANGLE");

      expect(controller.currentState).toBe("IDLE");
      expect(cues).toEqual(["buzz:error"]);
      expect(store.logs).toEqual([]);
      expect(entries.some((e) => e.level === "error" && e.message === "Tag DANGLE points to missing media 99")).toBe(
        true,
      );
    });

    it("returns to idle without a log row when the file is missing", async () => {
      await controller.onTagScanned("MISSING");

      expect(controller.currentState).toBe("IDLE");
      expect(cues).toEqual(["buzz:error", "led:idle"]);
      expect(transitions).toEqual(["IDLE->CHECK_LIMITS", "CHECK_LIMITS->LOADING", "LOADING->IDLE"]);
      expect(store.logs).toEqual([]);
      expect(player.calls).toEqual([]);
    });

    it("ignores any scan while a session is playing", async () => {
      await controller.onTagScanned("AUDIO1");
      cues.length = 0;

      await controller.onTagScanned("VIDEO1");
      await controller.onTagScanned("NOPE");

      expect(controller.currentState).toBe("PLAYING");
      expect(controller.currentMediaId).toBe(1);
      expect(controller.currentTagUid).toBe("AUDIO1");
      expect(controller.currentLogId).toBe(1);
      expect(player.calls).toEqual(["play /media/audio/song.mp3 (audio)"]);
      expect(cues).toEqual([]);
      expect(store.logs).toHaveLength(1);
    });

    it("starts only one session when two scans race", async () => {
      await Promise.all([controller.onTagScanned("AUDIO1"), controller.onTagScanned("VIDEO1")]);

      expect(controller.currentMediaId).toBe(1);
      expect(store.logs).toHaveLength(1);
      expect(controller.lastScannedUid).toBe("VIDEO1");
    });
  });

  describe("video budget", () => {
    it("denies a video once the budget is used up", async () => {
      store.stats = { count: 5, totalMinutes: 40 };
      await controller.onTagScanned("VIDEO1");

      expect(controller.currentState).toBe("IDLE");
      expect(cues).toEqual(["buzz:all_done", "led:all_done"]);
      expect(transitions).toEqual(["IDLE->CHECK_LIMITS", "CHECK_LIMITS->IDLE"]);
      expect(store.logs).toEqual([]);
      expect(player.calls).toEqual([]);
    });

    it("warns before the last allowed video and shows all-done when it ends", async () => {
      store.stats = { count: 4, totalMinutes: 30 };
      await controller.onTagScanned("VIDEO1");

      expect(controller.currentState).toBe("PLAYING");
      expect(cues).toEqual(["buzz:last_video", "led:last_video", "buzz:scan_confirm", "led:scan", "led:playing"]);

      cues.length = 0;
      player.finish();
      await settle();

      expect(controller.currentState).toBe("IDLE");
      expect(cues).toEqual(["buzz:all_done", "led:all_done"]);
    });

    it("reads the limits from the stored settings", async () => {
      store.settings = {
        ...DEFAULT_SETTINGS,
        daily_video_limit_count: "2",
        limit_reset_hour: "4",
      };
      store.stats = { count: 2, totalMinutes: 0 };
      await controller.onTagScanned("VIDEO1");

      expect(controller.currentState).toBe("IDLE");
      expect(store.statsResetHours).toEqual([4]);
    });
  });

  describe("playback end", () => {
    it("closes the log as completed and resets the session on a natural end", async () => {
      await controller.onTagScanned("AUDIO1");
      cues.length = 0;
      transitions.length = 0;

      player.finish();
      await settle();

      expect(controller.currentState).toBe("IDLE");
      expectNoSession();
      expect(store.logs).toEqual([{ id: 1, mediaId: 1, tagUid: "AUDIO1", completed: true }]);
      expect(cues).toEqual(["led:idle"]);
      expect(transitions).toEqual(["PLAYING->FINISHED", "FINISHED->IDLE"]);
    });

    it("ignores an end notification while idle", async () => {
      await controller.onPlaybackEnd();

      expect(controller.currentState).toBe("IDLE");
      expect(transitions).toEqual([]);
      expect(cues).toEqual([]);
    });

    it("ignores an end notification from a replaced stream", async () => {
      await controller.onTagScanned("AUDIO1");
      player.emit("ended");
      await settle();

      expect(controller.currentState).toBe("PLAYING");
      expect(store.logs[0]?.completed).toBeNull();
    });

    it("treats a player failure as an interrupted play", async () => {
      await controller.onTagScanned("AUDIO1");
      cues.length = 0;

      player.crash("mpv exited with code 2");
      await settle();

      expect(controller.currentState).toBe("IDLE");
      expectNoSession();
      expect(store.logs[0]?.completed).toBe(false);
      expect(cues).toEqual(["buzz:error", "led:idle"]);
    });
  });

  describe("buttons", () => {
    it("toggles pause without leaving PLAYING", async () => {
      await controller.onTagScanned("AUDIO1");
      await controller.onPlayPause();
      await controller.onPlayPause();

      expect(controller.currentState).toBe("PLAYING");
      expect(player.calls).toEqual(["play /media/audio/song.mp3 (audio)", "pause", "pause"]);
    });

    it("stops playback and closes the log as not completed", async () => {
      await controller.onTagScanned("AUDIO1");
      cues.length = 0;

      await controller.onStop();

      expect(controller.currentState).toBe("IDLE");
      expectNoSession();
      expect(player.isPlaying).toBe(false);
      expect(player.calls).toEqual(["play /media/audio/song.mp3 (audio)", "stop"]);
      expect(store.logs).toEqual([{ id: 1, mediaId: 1, tagUid: "AUDIO1", completed: false }]);
      expect(cues).toEqual(["led:idle"]);
    });

    it("does not complete a stopped session when a late end arrives", async () => {
      await controller.onTagScanned("AUDIO1");
      await controller.onStop();
      player.emit("ended");
      await settle();

      expect(store.logs[0]?.completed).toBe(false);
      expect(controller.currentState).toBe("IDLE");
    });

    it("ignores buttons outside PLAYING", async () => {
      await controller.onPlayPause();
      await controller.onStop();

      expect(player.calls).toEqual([]);
      expect(cues).toEqual([]);
    });
  });

  describe("register mode", () => {
    it("captures the UID without playing", async () => {
      await controller.setRegisterMode(true);
      await controller.onTagScanned("NEWUID");

      expect(controller.registerMode).toBe(true);
      expect(controller.lastScannedUid).toBe("NEWUID");
      expect(controller.currentState).toBe("IDLE");
      expect(cues).toEqual(["buzz:scan_confirm", "led:scan"]);
      expect(store.logs).toEqual([]);
      expect(player.calls).toEqual([]);
    });

    it("captures a mapped tag without playing it", async () => {
      await controller.setRegisterMode(true);
      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("IDLE");
      expect(player.calls).toEqual([]);
    });

    it("plays again once register mode is turned off", async () => {
      await controller.setRegisterMode(true);
      await controller.setRegisterMode(false);
      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("PLAYING");
    });
  });

  describe("failures", () => {
    it("keeps playing when a light cue fails", async () => {
      const broken: VisualFeedback = {
        ...recordingLeds(cues),
        scanFeedback: () => {
          throw new Error("led bus down");
        },
      };
      controller = createController(new GuardedVisualFeedback(broken, new Logger("LED")));
      cues.length = 0;

      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("PLAYING");
      expect(cues).toEqual(["buzz:scan_confirm", "led:playing"]);
    });

    it("returns to idle when the log row cannot be opened", async () => {
      store.failLogStart = true;
      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("IDLE");
      expectNoSession();
      expect(cues).toEqual(["buzz:scan_confirm", "led:scan", "buzz:error", "led:idle"]);
      expect(player.calls).toEqual([]);
    });

    it("closes the log when the player refuses to start", async () => {
      player.failPlay = true;
      await controller.onTagScanned("AUDIO1");

      expect(controller.currentState).toBe("IDLE");
      expectNoSession();
      expect(store.logs).toEqual([{ id: 1, mediaId: 1, tagUid: "AUDIO1", completed: false }]);
      expect(player.calls).toEqual(["play /media/audio/song.mp3 (audio)", "stop"]);
    });
  });

  describe("getStatus", () => {
    it("reports an idle box with today's budget", async () => {
      expect(await controller.getStatus()).toEqual({
        state: "IDLE",
        registerMode: false,
        lastScannedUid: null,
        videoStats: { count: 0, totalMinutes: 0, limitCount: 5, limitMinutes: 60 },
      });
    });

    it("includes the playing media and rounds the minutes", async () => {
      store.settings = { ...DEFAULT_SETTINGS, daily_video_limit_count: "4", daily_video_limit_minutes: "90" };
      store.stats = { count: 2, totalMinutes: 12.345 };
      await controller.onTagScanned("VIDEO1");

      expect(await controller.getStatus()).toEqual({
        state: "PLAYING",
        registerMode: false,
        lastScannedUid: "VIDEO1",
        nowPlaying: { title: "Dinosaur Facts", mediaType: "video", thumbnail: "dino.jpg" },
        videoStats: { count: 2, totalMinutes: 12.3, limitCount: 4, limitMinutes: 90 },
      });
    });

    it("reports a missing thumbnail as null", async () => {
      await controller.onTagScanned("AUDIO1");
      const status = await controller.getStatus();
      expect(status.nowPlaying).toEqual({ title: "Lullaby", mediaType: "audio", thumbnail: null });
    });
  });

  describe("shutdown", () => {
    it("stops an active session and closes its log as not completed", async () => {
      await controller.onTagScanned("AUDIO1");
      cues.length = 0;

      await controller.shutdown();

      expect(controller.currentState).toBe("IDLE");
      expectNoSession();
      expect(player.calls).toEqual(["play /media/audio/song.mp3 (audio)", "stop"]);
      expect(store.logs[0]?.completed).toBe(false);
      expect(cues).toEqual(["led:off"]);
    });

    it("turns the lights off when idle", async () => {
      await controller.shutdown();
      expect(cues).toEqual(["led:off"]);
      expect(player.calls).toEqual([]);
    });
  });
});
