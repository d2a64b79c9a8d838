/**
 * TagBox
 *
 * Plays the audio or video mapped to a token placed on the reader, within
 * the daily video budget set by a parent.
 *
 * Environment variables: see config.ts (TAGBOX_ENV, TAGBOX_DATA_DIR,
 * TAGBOX_*_BACKEND, TAGBOX_PLAYER, TAGBOX_STATUS_PORT, TAGBOX_LOG_LEVEL, ...)
 */
import type { Interface } from "readline";

import { config, validateConfig } from "./config.js";
import { buildHardware, createPlayer } from "./device.js";
import { describeBackend } from "./hardware-registry.js";
import { attachConsole } from "./hardware/console-driver.js";
import { SimulatedButtons } from "./hardware/simulated-buttons.js";
import { SimulatedTagSource } from "./hardware/simulated-tag-source.js";
import { describeError, Logger, setLogFile, setMinLogLevel } from "./logger.js";
import { PlaybackController, type StateChangeEvent } from "./playback-controller.js";
import { PollingLoop } from "./polling-loop.js";
import { StatusServer } from "./status-server.js";
import { createMediaLocator, ensureMediaDirs, mediaDirs } from "./store/media-paths.js";
import { SqliteStore } from "./store/sqlite-store.js";

const log = new Logger("TagBox");

async function main(): Promise<void> {
  validateConfig();
  setMinLogLevel(config.logLevel);
  setLogFile(config.logFile);

  log.info("TagBox starting...");
  log.info(`Environment: ${config.env}`);
  log.info(`Data dir: ${config.dataDir}`);

  const dirs = mediaDirs(config.dataDir);
  ensureMediaDirs(dirs);
  const store = new SqliteStore(config.dbPath);

  const hardware = buildHardware(config, log.child("Hardware"));
  const player = createPlayer(config, log.child("Player"));
  log.info(`Tag reader: ${describeBackend(hardware.tags.info)}`);
  log.info(`Buttons: ${describeBackend(hardware.buttons.info)}`);
  log.info(`LEDs: ${describeBackend(hardware.leds.info)}`);
  log.info(`Buzzer: ${describeBackend(hardware.buzzer.info)}`);
  log.info(`Player: ${config.player}`);

  const controller = new PlaybackController({
    store,
    player,
    leds: hardware.leds,
    buzzer: hardware.buzzer,
    locateMedia: createMediaLocator(dirs),
    logger: log.child("Controller"),
  });
  controller.on("stateChange", ({ from, to }: StateChangeEvent) => {
    log.debug(`State ${from} -> ${to}`);
  });

  const tagLoop = new PollingLoop(
    "Tag",
    config.tagPollMs,
    async () => {
      const uid = hardware.tags.poll();
      if (uid !== null) await controller.onTagScanned(uid);
    },
    log.child("Tags"),
  );
  const buttonLoop = new PollingLoop(
    "Button",
    config.buttonPollMs,
    async () => {
      const action = hardware.buttons.poll();
      if (action === "play_pause") await controller.onPlayPause();
      else if (action === "stop") await controller.onStop();
    },
    log.child("Buttons"),
  );

  let console_: Interface | null = null;
  if (config.env === "dev") {
    const tags = hardware.tags instanceof SimulatedTagSource ? hardware.tags : null;
    const buttons = hardware.buttons instanceof SimulatedButtons ? hardware.buttons : null;
    if (tags !== null || buttons !== null) {
      console_ = attachConsole(process.stdin, { tags, buttons }, log.child("Console"));
      log.info("Console ready (tag <uid>, place <uid>, lift, play, stop)");
    }
  }

  const server = new StatusServer(controller, store);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    console_?.close();
    await server.stop();
    await Promise.all([tagLoop.stop(), buttonLoop.stop()]);
    await controller.shutdown();
    for (const port of [hardware.tags, hardware.buttons, hardware.leds, hardware.buzzer, player]) {
      try {
        await port.release();
      } catch (err) {
        log.error(`Release failed: ${describeError(err)}`);
      }
    }
    store.close();
    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      log.error(`Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  tagLoop.start();
  buttonLoop.start();
  await server.start(config.statusPort, config.statusHost);
  log.info("Ready, waiting for tags");
}

main().catch((err: unknown) => {
  log.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
