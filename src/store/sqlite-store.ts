/**
 * SQLite-backed catalog, tag map, playback log and settings.
 *
 * Timestamps are ISO-8601 UTC strings written by this class, so the day
 * boundary comparison in getTodayVideoStats is a plain string comparison.
 * Playback log rows keep their own copy of the media facts they need;
 * deleting media never rewrites history.
 */
import Database from "better-sqlite3";

import { windowStart } from "../limits.js";
import {
  isMediaType,
  type Media,
  type NewMedia,
  type PlaybackHistoryEntry,
  type Tag,
  type VideoStats,
} from "../media.js";
import { DEFAULT_SETTINGS } from "../settings.js";
import type { PlaybackStore } from "./store-types.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS media (
    id          INTEGER PRIMARY KEY,
    title       TEXT NOT NULL,
    filename    TEXT NOT NULL,
    media_type  TEXT NOT NULL CHECK (media_type IN ('audio', 'video')),
    source_url  TEXT,
    thumbnail   TEXT,
    duration_s  INTEGER,
    created_at  TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tags (
    uid         TEXT PRIMARY KEY,
    media_id    INTEGER NOT NULL REFERENCES media(id) ON DELETE CASCADE,
    label       TEXT,
    created_at  TEXT NOT NULL
);

-- title, media_type and duration_s are copied from media when a play starts,
-- so history and the daily budget outlive the media row.
CREATE TABLE IF NOT EXISTS playback_log (
    id          INTEGER PRIMARY KEY,
    media_id    INTEGER REFERENCES media(id) ON DELETE SET NULL,
    title       TEXT NOT NULL,
    media_type  TEXT NOT NULL,
    duration_s  INTEGER,
    tag_uid     TEXT,
    started_at  TEXT NOT NULL,
    ended_at    TEXT,
    completed   INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_playback_log_started ON playback_log (started_at);

CREATE TABLE IF NOT EXISTS settings (
    key         TEXT PRIMARY KEY,
    value       TEXT NOT NULL
);
`;

interface MediaRow {
  id: number;
  title: string;
  filename: string;
  media_type: string;
  source_url: string | null;
  thumbnail: string | null;
  duration_s: number | null;
  created_at: string;
}

interface TagRow {
  uid: string;
  media_id: number;
  label: string | null;
  created_at: string;
}

interface LogRow {
  id: number;
  media_id: number | null;
  title: string;
  media_type: string;
  duration_s: number | null;
  tag_uid: string | null;
  started_at: string;
  ended_at: string | null;
  completed: number;
}

function rowToMedia(row: MediaRow): Media {
  if (!isMediaType(row.media_type)) {
    throw new Error(`Media ${row.id} has unknown type "${row.media_type}"`);
  }
  return {
    id: row.id,
    title: row.title,
    filename: row.filename,
    mediaType: row.media_type,
    sourceUrl: row.source_url,
    thumbnail: row.thumbnail,
    durationS: row.duration_s,
    createdAt: row.created_at,
  };
}

function rowToTag(row: TagRow): Tag {
  return {
    uid: row.uid,
    mediaId: row.media_id,
    label: row.label,
    createdAt: row.created_at,
  };
}

export interface SqliteStoreOptions {
  /** Clock for row timestamps (tests pin it) */
  readonly now?: () => Date;
}

export class SqliteStore implements PlaybackStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  /** @param path database file, or ":memory:" */
  constructor(path: string, options: SqliteStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
    this.seedDefaults();
  }

  close(): void {
    this.db.close();
  }

  // --- Media ---

  addMedia(media: NewMedia): number {
    const result = this.db
      .prepare(
        `INSERT INTO media (title, filename, media_type, source_url, thumbnail, duration_s, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        media.title,
        media.filename,
        media.mediaType,
        media.sourceUrl ?? null,
        media.thumbnail ?? null,
        media.durationS ?? null,
        this.timestamp(),
      );
    return Number(result.lastInsertRowid);
  }

  async getMedia(id: number): Promise<Media | null> {
    return this.findMedia(id);
  }

  findMedia(id: number): Media | null {
    const row = this.db.prepare<[number], MediaRow>("SELECT * FROM media WHERE id = ?").get(id);
    return row ? rowToMedia(row) : null;
  }

  getAllMedia(): Media[] {
    return this.db
      .prepare<[], MediaRow>("SELECT * FROM media ORDER BY created_at DESC, id DESC")
      .all()
      .map(rowToMedia);
  }

  /** Delete a media item and its tags. Its playback log rows stay, unlinked. */
  deleteMedia(id: number): void {
    this.db.prepare("DELETE FROM media WHERE id = ?").run(id);
  }

  // --- Tags ---

  /** Map a UID to a media item; an existing mapping for the UID is replaced. */
  addTag(tag: Pick<Tag, "uid" | "mediaId" | "label">): void {
    this.db
      .prepare("INSERT OR REPLACE INTO tags (uid, media_id, label, created_at) VALUES (?, ?, ?, ?)")
      .run(tag.uid, tag.mediaId, tag.label ?? null, this.timestamp());
  }

  async getTag(uid: string): Promise<Tag | null> {
    const row = this.db.prepare<[string], TagRow>("SELECT * FROM tags WHERE uid = ?").get(uid);
    return row ? rowToTag(row) : null;
  }

  getAllTags(): Tag[] {
    return this.db
      .prepare<[], TagRow>("SELECT * FROM tags ORDER BY created_at DESC, uid")
      .all()
      .map(rowToTag);
  }

  deleteTag(uid: string): void {
    this.db.prepare("DELETE FROM tags WHERE uid = ?").run(uid);
  }

  // --- Playback log ---

  async logPlaybackStart(mediaId: number, tagUid: string | null): Promise<number> {
    const result = this.db
      .prepare(
        `INSERT INTO playback_log (media_id, title, media_type, duration_s, tag_uid, started_at)
         SELECT id, title, media_type, duration_s, ?, ? FROM media WHERE id = ?`,
      )
      .run(tagUid, this.timestamp(), mediaId);
    if (result.changes === 0) {
      throw new Error(`Media ${mediaId} not found`);
    }
    return Number(result.lastInsertRowid);
  }

  async logPlaybackEnd(logId: number, completed: boolean): Promise<void> {
    this.db
      .prepare("UPDATE playback_log SET ended_at = ?, completed = ? WHERE id = ? AND ended_at IS NULL")
      .run(this.timestamp(), completed ? 1 : 0, logId);
  }

  getPlaybackHistory(limit: number = 50): PlaybackHistoryEntry[] {
    const rows = this.db
      .prepare<[number], LogRow>("SELECT * FROM playback_log ORDER BY started_at DESC, id DESC LIMIT ?")
      .all(limit);

    return rows.map((row) => {
      if (!isMediaType(row.media_type)) {
        throw new Error(`Playback ${row.id} has unknown type "${row.media_type}"`);
      }
      return {
        id: row.id,
        mediaId: row.media_id,
        tagUid: row.tag_uid,
        startedAt: row.started_at,
        endedAt: row.ended_at,
        completed: row.completed === 1,
        title: row.title,
        mediaType: row.media_type,
      };
    });
  }

  async getTodayVideoStats(resetHour: number, now: Date = this.now()): Promise<VideoStats> {
    const since = windowStart(now, resetHour).toISOString();
    const row = this.db
      .prepare<[string], { cnt: number; total_s: number }>(
        `SELECT COUNT(*) AS cnt, COALESCE(SUM(duration_s), 0) AS total_s
         FROM playback_log
         WHERE media_type = 'video' AND completed = 1 AND started_at >= ?`,
      )
      .get(since);

    return {
      count: row?.cnt ?? 0,
      totalMinutes: (row?.total_s ?? 0) / 60,
    };
  }

  // --- Settings ---

  getSetting(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM settings WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  setSetting(key: string, value: string): void {
    this.db.prepare("INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)").run(key, value);
  }

  async getAllSettings(): Promise<Record<string, string>> {
    const rows = this.db.prepare<[], { key: string; value: string }>("SELECT key, value FROM settings").all();
    const settings: Record<string, string> = {};
    for (const row of rows) {
      settings[row.key] = row.value;
    }
    return settings;
  }

  private seedDefaults(): void {
    const insert = this.db.prepare("INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)");
    const seed = this.db.transaction((entries: [string, string][]) => {
      for (const [key, value] of entries) {
        insert.run(key, value);
      }
    });
    seed(Object.entries(DEFAULT_SETTINGS));
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
