/**
 * Catalog and session types shared by the controller, the store and the
 * status surface.
 */

export type MediaType = "audio" | "video";

export const MEDIA_TYPES: readonly MediaType[] = ["audio", "video"];

export function isMediaType(value: unknown): value is MediaType {
  return value === "audio" || value === "video";
}

/** A playable item in the catalog. */
export interface Media {
  readonly id: number;
  readonly title: string;
  /** File name inside the audio or video directory */
  readonly filename: string;
  readonly mediaType: MediaType;
  readonly sourceUrl?: string | null;
  readonly thumbnail?: string | null;
  readonly durationS?: number | null;
  readonly createdAt?: string | null;
}

/** Fields needed to add a media item; the store assigns id and createdAt. */
export type NewMedia = Omit<Media, "id" | "createdAt">;

/** A physical token mapped to one media item. */
export interface Tag {
  readonly uid: string;
  readonly mediaId: number;
  readonly label?: string | null;
  readonly createdAt?: string | null;
}

export interface PlaybackLog {
  readonly id: number;
  /** Null once the media item has been deleted */
  readonly mediaId: number | null;
  readonly tagUid: string | null;
  readonly startedAt: string;
  readonly endedAt: string | null;
  /** True only when playback ran to its natural end */
  readonly completed: boolean;
}

/** A playback log row with the title and type recorded when it started. */
export interface PlaybackHistoryEntry extends PlaybackLog {
  readonly title: string;
  readonly mediaType: MediaType;
}

/** Completed video plays inside the current day window. */
export interface VideoStats {
  readonly count: number;
  readonly totalMinutes: number;
}

/** Lifecycle of one playback session */
export type PlaybackState = "IDLE" | "CHECK_LIMITS" | "LOADING" | "PLAYING" | "FINISHED";

export interface NowPlaying {
  readonly title: string;
  readonly mediaType: MediaType;
  readonly thumbnail: string | null;
}

/** Snapshot served to the dashboard. */
export interface ControllerStatus {
  readonly state: PlaybackState;
  readonly registerMode: boolean;
  readonly lastScannedUid: string | null;
  readonly nowPlaying?: NowPlaying;
  readonly videoStats: {
    readonly count: number;
    readonly totalMinutes: number;
    readonly limitCount: number;
    readonly limitMinutes: number;
  };
}
