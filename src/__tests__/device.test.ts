/**
 * Tests for assembling hardware ports and the player from configuration.
 */
import { PassThrough } from "stream";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { buildHardware, createPlayer } from "../device.js";
import { listBackends } from "../hardware-registry.js";
import { GuardedAudioFeedback, GuardedVisualFeedback } from "../hardware/guarded-feedback.js";
import { KeyboardTagSource } from "../hardware/keyboard-tag-source.js";
import { SimulatedButtons } from "../hardware/simulated-buttons.js";
import { SimulatedTagSource } from "../hardware/simulated-tag-source.js";
import { Logger } from "../logger.js";
import { MpvPlayer } from "../player/mpv-player.js";
import { StubPlayer } from "../player/stub-player.js";

const log = new Logger("Test");

describe("device assembly", () => {
  it("registers the built-in backends", () => {
    expect(listBackends("tags")).toEqual(["simulated", "keyboard"]);
    expect(listBackends("buttons")).toEqual(["simulated"]);
    expect(listBackends("leds")).toEqual(["simulated"]);
    expect(listBackends("buzzer")).toEqual(["simulated"]);
  });

  it("builds simulated hardware in dev", () => {
    const hw = buildHardware(loadConfig({ TAGBOX_ENV: "dev" }), log);

    expect(hw.tags).toBeInstanceOf(SimulatedTagSource);
    expect(hw.buttons).toBeInstanceOf(SimulatedButtons);
    expect(hw.leds).toBeInstanceOf(GuardedVisualFeedback);
    expect(hw.buzzer).toBeInstanceOf(GuardedAudioFeedback);
    expect(hw.leds.info.id).toBe("simulated");
  });

  it("reads the keyboard-wedge reader from the given input", () => {
    const input = new PassThrough();
    const hw = buildHardware(loadConfig({}), log, input);

    expect(hw.tags).toBeInstanceOf(KeyboardTagSource);
    hw.tags.release();
  });

  it("names the available backends when one is unknown", () => {
    const cfg = loadConfig({ TAGBOX_ENV: "dev", TAGBOX_LED_BACKEND: "neopixel" });
    expect(() => buildHardware(cfg, log)).toThrow('Unknown leds backend "neopixel" (available: simulated)');
  });

  it("picks the player from configuration", () => {
    expect(createPlayer(loadConfig({ TAGBOX_ENV: "dev" }), log)).toBeInstanceOf(StubPlayer);
    expect(createPlayer(loadConfig({}), log)).toBeInstanceOf(MpvPlayer);
  });
});
