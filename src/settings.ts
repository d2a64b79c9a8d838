/**
 * Persistent settings keys, their defaults, and parsing of the limit values
 * the controller reads on every check.
 */
import { Logger } from "./logger.js";

export const SETTING_KEYS = {
  dailyVideoLimitCount: "daily_video_limit_count",
  dailyVideoLimitMinutes: "daily_video_limit_minutes",
  limitResetHour: "limit_reset_hour",
  speakerAddress: "bt_speaker_mac",
} as const;

export const DEFAULT_SETTINGS: Readonly<Record<string, string>> = {
  [SETTING_KEYS.dailyVideoLimitCount]: "5",
  [SETTING_KEYS.dailyVideoLimitMinutes]: "60",
  [SETTING_KEYS.limitResetHour]: "6",
  [SETTING_KEYS.speakerAddress]: "",
};

export interface LimitSettings {
  readonly maxCount: number;
  readonly maxMinutes: number;
  readonly resetHour: number;
}

const DEFAULT_LIMITS: LimitSettings = {
  maxCount: 5,
  maxMinutes: 60,
  resetHour: 6,
};

const log = new Logger("Settings");

function parseIntSetting(
  settings: Readonly<Record<string, string>>,
  key: string,
  fallback: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const raw = settings[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0 || value > max) {
    log.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

/** Read the limit settings out of a raw key → value snapshot. */
export function resolveLimitSettings(settings: Readonly<Record<string, string>>): LimitSettings {
  return {
    maxCount: parseIntSetting(settings, SETTING_KEYS.dailyVideoLimitCount, DEFAULT_LIMITS.maxCount),
    maxMinutes: parseIntSetting(settings, SETTING_KEYS.dailyVideoLimitMinutes, DEFAULT_LIMITS.maxMinutes),
    resetHour: parseIntSetting(settings, SETTING_KEYS.limitResetHour, DEFAULT_LIMITS.resetHour, 23),
  };
}
