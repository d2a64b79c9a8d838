/**
 * Assembles the hardware ports and the player picked by configuration.
 */
import { tmpdir } from "os";
import { join } from "path";

import type { TagBoxConfig } from "./config.js";
import { createBackend, listBackends, type BackendOptions } from "./hardware-registry.js";
import type { AudioFeedback, ButtonSource, Player, PortKind, PortKinds, TagSource, VisualFeedback } from "./hardware-types.js";
import { GuardedAudioFeedback, GuardedVisualFeedback } from "./hardware/guarded-feedback.js";
import "./hardware/index.js";
import type { Logger } from "./logger.js";
import { MpvPlayer } from "./player/mpv-player.js";
import { StubPlayer } from "./player/stub-player.js";

export interface Hardware {
  readonly tags: TagSource;
  readonly buttons: ButtonSource;
  readonly leds: VisualFeedback;
  readonly buzzer: AudioFeedback;
}

function requireBackend<K extends PortKind>(kind: K, id: string, options: BackendOptions): PortKinds[K] {
  const backend = createBackend(kind, id, options);
  if (backend === null) {
    throw new Error(`Unknown ${kind} backend "${id}" (available: ${listBackends(kind).join(", ")})`);
  }
  return backend;
}

/** Build every port. Feedback ports come back wrapped so a failing cue is only logged. */
export function buildHardware(cfg: TagBoxConfig, log: Logger, input?: NodeJS.ReadableStream): Hardware {
  const options = (sub: string): BackendOptions => ({
    logger: log.child(sub),
    tagDedupMs: cfg.tagDedupMs,
    buttonDebounceMs: cfg.buttonDebounceMs,
    ...(input ? { input } : {}),
  });

  return {
    tags: requireBackend("tags", cfg.tagBackend, options("Tags")),
    buttons: requireBackend("buttons", cfg.buttonBackend, options("Buttons")),
    leds: new GuardedVisualFeedback(requireBackend("leds", cfg.ledBackend, options("LED")), log.child("LED")),
    buzzer: new GuardedAudioFeedback(
      requireBackend("buzzer", cfg.buzzerBackend, options("Buzzer")),
      log.child("Buzzer"),
    ),
  };
}

export function createPlayer(cfg: TagBoxConfig, log: Logger): Player {
  if (cfg.player === "stub") {
    return new StubPlayer(cfg.stubPlaySeconds * 1000, log.child("Stub"));
  }
  return new MpvPlayer(
    {
      binaryPath: cfg.mpvPath,
      audioDevice: cfg.audioDevice,
      ipcSocketPath: join(tmpdir(), "tagbox-mpv.sock"),
    },
    log.child("mpv"),
  );
}
