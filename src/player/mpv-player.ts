/**
 * mpv-backed player.
 *
 * One mpv process per play. Pause is toggled over mpv's JSON IPC socket.
 * A process we stopped ourselves is forgotten before it is killed, so its
 * exit never reaches listeners; only a clean exit of the current process
 * emits `ended`, any other exit emits `failed`.
 */
import { spawn } from "child_process";
import { EventEmitter } from "events";
import { createConnection } from "net";

import type { Player } from "../hardware-types.js";
import { describeError, type Logger } from "../logger.js";
import type { MediaType } from "../media.js";

/** The slice of ChildProcess the player relies on */
export interface MpvProcess extends EventEmitter {
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnMpv = (binary: string, args: readonly string[]) => MpvProcess;

export type SendIpcCommand = (socketPath: string, command: readonly (string | number | boolean)[]) => Promise<void>;

export interface MpvPlayerOptions {
  readonly binaryPath: string;
  readonly audioDevice: string;
  readonly ipcSocketPath: string;
  readonly spawnMpv?: SpawnMpv;
  readonly sendIpc?: SendIpcCommand;
}

const defaultSpawn: SpawnMpv = (binary, args) => spawn(binary, [...args], { stdio: "ignore" });

/** Write one JSON IPC command to mpv's socket. */
export const sendMpvCommand: SendIpcCommand = (socketPath, command) =>
  new Promise<void>((resolve, reject) => {
    const socket = createConnection(socketPath);
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.end(`${JSON.stringify({ command })}\n`, () => resolve());
    });
  });

/** Command line for one play. Audio plays without opening a video output. */
export function buildMpvArgs(
  locator: string,
  mediaType: MediaType,
  options: Pick<MpvPlayerOptions, "audioDevice" | "ipcSocketPath">,
): string[] {
  const args = [
    "--no-terminal",
    "--no-input-default-bindings",
    `--input-ipc-server=${options.ipcSocketPath}`,
    `--audio-device=${options.audioDevice}`,
  ];
  if (mediaType === "video") {
    args.push("--fullscreen", "--hwdec=auto");
  } else {
    args.push("--no-video");
  }
  args.push("--", locator);
  return args;
}

export class MpvPlayer extends EventEmitter implements Player {
  private current: MpvProcess | null = null;
  private paused = false;
  private readonly spawnMpv: SpawnMpv;
  private readonly sendIpc: SendIpcCommand;

  constructor(
    private readonly options: MpvPlayerOptions,
    private readonly log: Logger,
  ) {
    super();
    this.spawnMpv = options.spawnMpv ?? defaultSpawn;
    this.sendIpc = options.sendIpc ?? sendMpvCommand;
  }

  get isPlaying(): boolean {
    return this.current !== null;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  play(locator: string, mediaType: MediaType): void {
    this.stop();

    this.log.info(`Playing ${locator} (${mediaType})`);
    const child = this.spawnMpv(this.options.binaryPath, buildMpvArgs(locator, mediaType, this.options));
    this.current = child;
    this.paused = false;

    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (child !== this.current) return;
      this.current = null;
      this.paused = false;

      if (code === 0) {
        this.log.info("Playback finished");
        this.emit("ended");
        return;
      }
      const reason = signal ? `signal ${signal}` : `code ${code}`;
      this.log.error(`mpv exited with ${reason}`);
      this.emit("failed", new Error(`mpv exited with ${reason}`));
    });

    child.on("error", (err: Error) => {
      if (child !== this.current) return;
      this.current = null;
      this.paused = false;
      this.log.error(`mpv failed to start: ${err.message}`);
      this.emit("failed", err);
    });
  }

  stop(): void {
    const child = this.current;
    if (child === null) return;

    this.current = null;
    this.paused = false;
    this.log.info("Stopping playback");
    child.kill("SIGTERM");
  }

  pauseToggle(): void {
    if (this.current === null) return;

    this.paused = !this.paused;
    this.log.info(this.paused ? "Paused" : "Resumed");
    this.sendIpc(this.options.ipcSocketPath, ["cycle", "pause"]).catch((err: unknown) => {
      this.log.warn(`Pause toggle failed: ${describeError(err)}`);
    });
  }

  release(): void {
    this.stop();
    this.removeAllListeners();
  }
}
