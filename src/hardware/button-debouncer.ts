import type { ButtonAction } from "../hardware-types.js";

/** Drops presses of the same button that arrive within the debounce window. */
export class ButtonDebouncer {
  private readonly lastPress = new Map<ButtonAction, number>();

  constructor(
    private readonly debounceMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  accept(action: ButtonAction | null): ButtonAction | null {
    if (action === null) return null;

    const now = this.now();
    const last = this.lastPress.get(action);
    if (last !== undefined && now - last <= this.debounceMs) {
      return null;
    }

    this.lastPress.set(action, now);
    return action;
  }
}
