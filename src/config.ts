/**
 * TagBox configuration from environment variables.
 */
import { join } from "path";

import { parseLogLevel, type LogLevel } from "./logger.js";

export type RuntimeEnv = "dev" | "device";

export type PlayerKind = "mpv" | "stub";

export interface TagBoxConfig {
  /** "dev" swaps in simulated hardware and the stub player */
  readonly env: RuntimeEnv;
  /** Root of the media directories and the database */
  readonly dataDir: string;
  readonly dbPath: string;

  readonly tagBackend: string;
  readonly buttonBackend: string;
  readonly ledBackend: string;
  readonly buzzerBackend: string;

  readonly player: PlayerKind;
  readonly mpvPath: string;
  readonly audioDevice: string;
  /** How long the stub player "plays" before reporting a natural end */
  readonly stubPlaySeconds: number;

  readonly tagPollMs: number;
  readonly buttonPollMs: number;
  /** Same-token suppression window */
  readonly tagDedupMs: number;
  readonly buttonDebounceMs: number;

  readonly statusHost: string;
  readonly statusPort: number;

  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

type Env = Readonly<Record<string, string | undefined>>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = readEnv(env, name);
  return raw === undefined ? fallback : parseInt(raw, 10);
}

/** Build the configuration from an environment map (defaults to process.env). */
export function loadConfig(env: Env = process.env): TagBoxConfig {
  const runtime: RuntimeEnv = readEnv(env, "TAGBOX_ENV") === "dev" ? "dev" : "device";
  const dev = runtime === "dev";
  const dataDir = readEnv(env, "TAGBOX_DATA_DIR") ?? "./data";
  const player = readEnv(env, "TAGBOX_PLAYER") ?? (dev ? "stub" : "mpv");

  return {
    env: runtime,
    dataDir,
    dbPath: join(dataDir, "tagbox.db"),

    tagBackend: readEnv(env, "TAGBOX_TAG_BACKEND") ?? (dev ? "simulated" : "keyboard"),
    buttonBackend: readEnv(env, "TAGBOX_BUTTON_BACKEND") ?? "simulated",
    ledBackend: readEnv(env, "TAGBOX_LED_BACKEND") ?? "simulated",
    buzzerBackend: readEnv(env, "TAGBOX_BUZZER_BACKEND") ?? "simulated",

    player: player === "stub" ? "stub" : "mpv",
    mpvPath: readEnv(env, "TAGBOX_MPV_PATH") ?? "mpv",
    audioDevice: readEnv(env, "TAGBOX_AUDIO_DEVICE") ?? "pulse",
    stubPlaySeconds: readInt(env, "TAGBOX_STUB_PLAY_SECONDS", 3),

    tagPollMs: readInt(env, "TAGBOX_TAG_POLL_MS", 200),
    buttonPollMs: readInt(env, "TAGBOX_BUTTON_POLL_MS", 50),
    tagDedupMs: readInt(env, "TAGBOX_TAG_DEDUP_MS", 2000),
    buttonDebounceMs: readInt(env, "TAGBOX_BUTTON_DEBOUNCE_MS", 200),

    statusHost: readEnv(env, "TAGBOX_STATUS_HOST") ?? "0.0.0.0",
    statusPort: readInt(env, "TAGBOX_STATUS_PORT", 5000),

    logLevel: parseLogLevel(readEnv(env, "TAGBOX_LOG_LEVEL")),
    logFile: readEnv(env, "TAGBOX_LOG_FILE") ?? null,
  };
}

export const config = loadConfig();

/**
 * Validate configuration at startup.
 * Throws on the first invalid value.
 */
export function validateConfig(cfg: TagBoxConfig = config, env: Env = process.env): void {
  const player = readEnv(env, "TAGBOX_PLAYER");
  if (player !== undefined && player !== "mpv" && player !== "stub") {
    throw new Error(`TAGBOX_PLAYER must be "mpv" or "stub" (got "${player}")`);
  }

  const positive: [string, number][] = [
    ["TAGBOX_STUB_PLAY_SECONDS", cfg.stubPlaySeconds],
    ["TAGBOX_TAG_POLL_MS", cfg.tagPollMs],
    ["TAGBOX_BUTTON_POLL_MS", cfg.buttonPollMs],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${name} must be a positive integer`);
    }
  }

  const nonNegative: [string, number][] = [
    ["TAGBOX_TAG_DEDUP_MS", cfg.tagDedupMs],
    ["TAGBOX_BUTTON_DEBOUNCE_MS", cfg.buttonDebounceMs],
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${name} must be a non-negative integer`);
    }
  }

  if (!Number.isInteger(cfg.statusPort) || cfg.statusPort < 0 || cfg.statusPort > 65535) {
    throw new Error("TAGBOX_STATUS_PORT must be a port number (0-65535)");
  }
}
