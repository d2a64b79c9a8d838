/**
 * Development console: drives the simulated reader and buttons from stdin.
 *
 * Commands:
 *   tag <uid>    tap a token (read once)
 *   place <uid>  leave a token resting on the reader
 *   lift         remove the resting token
 *   play         press play/pause
 *   stop         press stop
 */
import { createInterface, type Interface } from "readline";

import type { Logger } from "../logger.js";
import { normalizeUid } from "./keyboard-tag-source.js";
import type { SimulatedButtons } from "./simulated-buttons.js";
import type { SimulatedTagSource } from "./simulated-tag-source.js";

export type ConsoleCommand =
  | { readonly kind: "tag"; readonly uid: string }
  | { readonly kind: "place"; readonly uid: string }
  | { readonly kind: "lift" }
  | { readonly kind: "play" }
  | { readonly kind: "stop" };

/** Parse one console line. Returns null for blank or unrecognized input. */
export function parseConsoleCommand(line: string): ConsoleCommand | null {
  const [verb = "", arg = ""] = line.trim().split(/\s+/);
  switch (verb.toLowerCase()) {
    case "tag":
    case "place": {
      const uid = normalizeUid(arg);
      if (uid === null) return null;
      return verb.toLowerCase() === "tag" ? { kind: "tag", uid } : { kind: "place", uid };
    }
    case "lift":
      return { kind: "lift" };
    case "play":
      return { kind: "play" };
    case "stop":
      return { kind: "stop" };
    default:
      return null;
  }
}

export interface ConsoleTargets {
  readonly tags: SimulatedTagSource | null;
  readonly buttons: SimulatedButtons | null;
}

export function applyConsoleCommand(command: ConsoleCommand, targets: ConsoleTargets): boolean {
  switch (command.kind) {
    case "tag":
      targets.tags?.tap(command.uid);
      return targets.tags !== null;
    case "place":
      targets.tags?.place(command.uid);
      return targets.tags !== null;
    case "lift":
      targets.tags?.lift();
      return targets.tags !== null;
    case "play":
      targets.buttons?.press("play_pause");
      return targets.buttons !== null;
    case "stop":
      targets.buttons?.press("stop");
      return targets.buttons !== null;
  }
}

/** Start reading commands from `input`. Close the returned interface to detach. */
export function attachConsole(
  input: NodeJS.ReadableStream,
  targets: ConsoleTargets,
  log: Logger,
): Interface {
  const lines = createInterface({ input, crlfDelay: Infinity });
  lines.on("line", (line: string) => {
    if (line.trim() === "") return;

    const command = parseConsoleCommand(line);
    if (command === null) {
      log.warn(`Unknown command "${line.trim()}" (try: tag <uid>, place <uid>, lift, play, stop)`);
      return;
    }
    if (!applyConsoleCommand(command, targets)) {
      log.warn(`"${command.kind}" needs the simulated backend`);
    }
  });
  return lines;
}
