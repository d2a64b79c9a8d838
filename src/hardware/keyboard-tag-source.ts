/**
 * Keyboard-wedge token reader.
 *
 * USB proximity readers in HID mode "type" the token UID followed by Enter.
 * Lines arrive on a readable stream (stdin by default); only the most recent
 * unread line is kept, so scans made while nobody polls are not replayed.
 */
import { createInterface, type Interface } from "readline";

import type { BackendInfo, TagSource } from "../hardware-types.js";
import type { Logger } from "../logger.js";
import { TagDeduplicator } from "./tag-deduplicator.js";

/** Normalize a typed UID: trimmed, upper-case hex/alphanumerics only. */
export function normalizeUid(line: string): string | null {
  const uid = line.trim().toUpperCase();
  return /^[0-9A-Z]+$/.test(uid) ? uid : null;
}

export class KeyboardTagSource implements TagSource {
  readonly info: BackendInfo = {
    id: "keyboard",
    name: "Keyboard-wedge reader",
    description: "USB HID reader that types each UID as a line",
  };

  private pending: string | null = null;
  private readonly lines: Interface;
  private readonly dedup: TagDeduplicator;

  constructor(
    input: NodeJS.ReadableStream,
    dedupWindowMs: number,
    private readonly log: Logger,
    now: () => number = Date.now,
  ) {
    this.dedup = new TagDeduplicator(dedupWindowMs, now);
    this.lines = createInterface({ input, crlfDelay: Infinity });
    this.lines.on("line", (line: string) => this.handleLine(line));
  }

  poll(): string | null {
    const raw = this.pending;
    this.pending = null;
    if (raw === null) return null;

    const uid = this.dedup.accept(raw);
    if (uid !== null) {
      this.log.info(`Read UID ${uid}`);
    }
    return uid;
  }

  release(): void {
    this.lines.close();
    this.pending = null;
  }

  private handleLine(line: string): void {
    if (line.trim() === "") return;

    const uid = normalizeUid(line);
    if (uid === null) {
      this.log.warn(`Ignoring unreadable scan "${line.trim()}"`);
      return;
    }
    this.pending = uid;
  }
}
