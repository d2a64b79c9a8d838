/**
 * Store contract consumed by the playback controller.
 *
 * Async so the controller does not care whether the catalog is a local
 * SQLite file or something slower; every call is made under the session lock.
 */
import type { Media, Tag, VideoStats } from "../media.js";

export interface PlaybackStore {
  getTag(uid: string): Promise<Tag | null>;
  getMedia(id: number): Promise<Media | null>;
  /**
   * Completed video plays inside the budget day containing `now`. The reset
   * hour comes from the caller's settings snapshot.
   */
  getTodayVideoStats(resetHour: number, now?: Date): Promise<VideoStats>;
  /** Every setting, defaults included. */
  getAllSettings(): Promise<Record<string, string>>;
  /** Open a playback log row; returns its id. */
  logPlaybackStart(mediaId: number, tagUid: string | null): Promise<number>;
  /** Close a playback log row. */
  logPlaybackEnd(logId: number, completed: boolean): Promise<void>;
}
