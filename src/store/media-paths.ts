import { existsSync, mkdirSync } from "fs";
import { join } from "path";

import type { Media, MediaType } from "../media.js";

/** Storage directories under the data root */
export interface MediaDirs {
  readonly audio: string;
  readonly video: string;
  readonly thumbnails: string;
}

export function mediaDirs(dataDir: string): MediaDirs {
  const root = join(dataDir, "media");
  return {
    audio: join(root, "audio"),
    video: join(root, "video"),
    thumbnails: join(root, "thumbnails"),
  };
}

export function ensureMediaDirs(dirs: MediaDirs): void {
  for (const dir of [dirs.audio, dirs.video, dirs.thumbnails]) {
    mkdirSync(dir, { recursive: true });
  }
}

export function directoryFor(dirs: MediaDirs, mediaType: MediaType): string {
  return mediaType === "video" ? dirs.video : dirs.audio;
}

export function resolveMediaPath(dirs: MediaDirs, media: Pick<Media, "filename" | "mediaType">): string {
  return join(directoryFor(dirs, media.mediaType), media.filename);
}

/** Locates a media file on disk; null when it is missing. */
export type MediaLocator = (media: Media) => string | null;

export function createMediaLocator(dirs: MediaDirs): MediaLocator {
  return (media) => {
    const path = resolveMediaPath(dirs, media);
    return existsSync(path) ? path : null;
  };
}
