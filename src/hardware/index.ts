/**
 * Built-in backend auto-registration.
 *
 * Import this module to register all built-in backends with the registry.
 */
import { registerBackend } from "../hardware-registry.js";
import { KeyboardTagSource } from "./keyboard-tag-source.js";
import { SimulatedButtons } from "./simulated-buttons.js";
import { SimulatedBuzzer } from "./simulated-buzzer.js";
import { SimulatedLedStrip } from "./simulated-leds.js";
import { SimulatedTagSource } from "./simulated-tag-source.js";

registerBackend("tags", "simulated", (o) => new SimulatedTagSource(o.tagDedupMs, o.logger));
registerBackend(
  "tags",
  "keyboard",
  (o) => new KeyboardTagSource(o.input ?? process.stdin, o.tagDedupMs, o.logger),
);
registerBackend("buttons", "simulated", (o) => new SimulatedButtons(o.buttonDebounceMs, o.logger));
registerBackend("leds", "simulated", (o) => new SimulatedLedStrip(o.logger));
registerBackend("buzzer", "simulated", (o) => new SimulatedBuzzer(o.logger));
