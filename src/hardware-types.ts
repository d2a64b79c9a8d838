/**
 * Capability ports for TagBox hardware and playback.
 *
 * The controller only ever talks to these interfaces. Each capability has
 * interchangeable backends (simulated, keyboard-wedge reader, ...) that are
 * registered in the backend registry and picked by configuration at startup.
 */
import type { EventEmitter } from "events";

import type { MediaType } from "./media.js";

/** Button actions reported by a button source */
export type ButtonAction = "play_pause" | "stop";

/** Static metadata about a backend */
export interface BackendInfo {
  readonly id: string;
  readonly name: string;
  readonly description: string;
}

/** Anything holding a device handle that must be released on shutdown. */
export interface Releasable {
  release(): void | Promise<void>;
}

/**
 * Token reader. `poll` never blocks: it returns the UID of a token that was
 * just placed, or null. Implementations suppress repeated reads of a token
 * resting on the reader within their dedup window.
 */
export interface TagSource extends Releasable {
  readonly info: BackendInfo;
  poll(): string | null;
}

/** Physical buttons. `poll` never blocks and is debounced by the backend. */
export interface ButtonSource extends Releasable {
  readonly info: BackendInfo;
  poll(): ButtonAction | null;
}

/**
 * Light cues. Any cue cancels a running animation before it starts, so at
 * most one pattern is ever on the strip.
 */
export interface VisualFeedback extends Releasable {
  readonly info: BackendInfo;
  /** Brief flash acknowledging a scan */
  scanFeedback(): void;
  /** Continuous breathing animation until another cue replaces it */
  playingAnimation(): void;
  /** Finite amber pulse sequence */
  lastVideoWarning(): void;
  /** Finite red pulse sequence, then off */
  allDoneFeedback(): void;
  /** Dim resting glow */
  idle(): void;
  off(): void;
}

/** Sound cues. Fire-and-forget from the caller's point of view. */
export interface AudioFeedback extends Releasable {
  readonly info: BackendInfo;
  scanConfirm(): void;
  /** Gentle ascending tone */
  lastVideoWarning(): void;
  /** Calm descending melody */
  allDone(): void;
  error(): void;
}

/**
 * Media player.
 *
 * `play` while a stream is running stops that stream first without emitting
 * `ended` for it. `stop` leaves the playing state before it returns. Only a
 * natural end emits `ended`; a stream that cannot start or dies emits
 * `failed` with an Error.
 */
export interface Player extends EventEmitter, Releasable {
  readonly isPlaying: boolean;
  play(locator: string, mediaType: MediaType): void;
  stop(): void;
  pauseToggle(): void;
}

/** Map of port kinds to the interface each backend implements */
export interface PortKinds {
  tags: TagSource;
  buttons: ButtonSource;
  leds: VisualFeedback;
  buzzer: AudioFeedback;
}

export type PortKind = keyof PortKinds;
