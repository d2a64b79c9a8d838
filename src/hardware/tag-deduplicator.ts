/**
 * Suppresses repeated reads of a token resting on the reader.
 *
 * A UID is reported once, then ignored until either the dedup window passes
 * or the reader reports no token (the token was lifted).
 */
export class TagDeduplicator {
  private lastUid: string | null = null;
  private lastTime = 0;

  constructor(
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Feed one raw reader result; returns the UID to report or null. */
  accept(uid: string | null): string | null {
    if (uid === null) {
      this.lastUid = null;
      return null;
    }

    const now = this.now();
    if (uid === this.lastUid && now - this.lastTime < this.windowMs) {
      return null;
    }

    this.lastUid = uid;
    this.lastTime = now;
    return uid;
  }

  reset(): void {
    this.lastUid = null;
    this.lastTime = 0;
  }
}
