/**
 * Status and control surface for the parent dashboard.
 *
 * Routes:
 *   GET  /api/status         controller status snapshot
 *   POST /api/register-mode  { enabled?: boolean } (default true)
 *   GET  /api/scan-tag       { uid } last scanned token
 *   POST /api/tags           { uid, mediaId, label? } map a token, leave register mode
 *   POST /api/settings       { key: value, ... }
 *   GET  /api/media          catalog, newest first
 *   DELETE /api/media/:id    remove a media item and its tags
 *   GET  /api/tags           token mappings
 *   DELETE /api/tags/:uid    forget a token
 *   GET  /api/history        recent plays (?limit=, default 50)
 *
 * Routing lives in `handleApiRequest`, which knows nothing about sockets.
 */
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";

import { describeError, Logger } from "./logger.js";
import type { ControllerStatus, Media, PlaybackHistoryEntry, Tag } from "./media.js";

/** The controller operations the API needs */
export interface StatusSource {
  readonly lastScannedUid: string | null;
  getStatus(): Promise<ControllerStatus>;
  setRegisterMode(enabled: boolean): Promise<void>;
}

/** Store operations behind the catalog, tag, history and settings routes */
export interface CatalogAdmin {
  getAllMedia(): Media[];
  deleteMedia(id: number): void;
  getAllTags(): Tag[];
  addTag(tag: { uid: string; mediaId: number; label: string | null }): void;
  deleteTag(uid: string): void;
  getPlaybackHistory(limit?: number): PlaybackHistoryEntry[];
  setSetting(key: string, value: string): void;
}

export interface ApiRequest {
  readonly method: string;
  readonly path: string;
  readonly query?: Readonly<Record<string, string>>;
  readonly body?: unknown;
}

export interface ApiResponse {
  readonly status: number;
  readonly body: unknown;
}

const MAX_BODY_BYTES = 64 * 1024;
const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 500;

const MEDIA_ITEM = /^\/api\/media\/([^/]+)$/;
const TAG_ITEM = /^\/api\/tags\/([^/]+)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function badRequest(error: string): ApiResponse {
  return { status: 400, body: { error } };
}

async function registerTag(
  body: unknown,
  controller: StatusSource,
  admin: CatalogAdmin,
): Promise<ApiResponse> {
  if (!isRecord(body)) return badRequest("uid and mediaId required");

  const uid = typeof body.uid === "string" ? body.uid.trim() : "";
  const mediaId = typeof body.mediaId === "number" ? body.mediaId : Number(body.mediaId);
  if (!uid || !Number.isInteger(mediaId) || mediaId <= 0) {
    return badRequest("uid and mediaId required");
  }
  const label = typeof body.label === "string" && body.label.trim() ? body.label.trim() : null;

  try {
    admin.addTag({ uid, mediaId, label });
  } catch (err) {
    return badRequest(`Could not register tag: ${describeError(err)}`);
  }
  await controller.setRegisterMode(false);
  return { status: 200, body: { ok: true } };
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

function deleteMedia(segment: string, admin: CatalogAdmin): ApiResponse {
  const id = Number(segment);
  if (!Number.isInteger(id) || id <= 0) return badRequest("Media id must be a positive integer");
  admin.deleteMedia(id);
  return { status: 200, body: { ok: true } };
}

function deleteTag(segment: string, admin: CatalogAdmin): ApiResponse {
  const uid = decodeSegment(segment)?.trim();
  if (!uid) return badRequest("uid required");
  admin.deleteTag(uid);
  return { status: 200, body: { ok: true } };
}

function history(query: Readonly<Record<string, string>>, admin: CatalogAdmin): ApiResponse {
  const raw = query.limit;
  const limit = raw === undefined ? DEFAULT_HISTORY_LIMIT : Number(raw);
  if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_HISTORY_LIMIT) {
    return badRequest(`limit must be an integer from 1 to ${MAX_HISTORY_LIMIT}`);
  }
  return { status: 200, body: admin.getPlaybackHistory(limit) };
}

function updateSettings(body: unknown, admin: CatalogAdmin): ApiResponse {
  if (!isRecord(body)) return badRequest("Expected an object of settings");

  const entries: [string, string][] = [];
  for (const [key, value] of Object.entries(body)) {
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      return badRequest(`Setting "${key}" must be a string, number or boolean`);
    }
    entries.push([key, String(value)]);
  }
  for (const [key, value] of entries) {
    admin.setSetting(key, value);
  }
  return { status: 200, body: { ok: true } };
}

/** Route one parsed request. */
export async function handleApiRequest(
  req: ApiRequest,
  controller: StatusSource,
  admin: CatalogAdmin,
): Promise<ApiResponse> {
  const method = req.method.toUpperCase();
  const route = `${method} ${req.path}`;

  if (method === "DELETE") {
    const media = MEDIA_ITEM.exec(req.path)?.[1];
    if (media !== undefined) return deleteMedia(media, admin);
    const tag = TAG_ITEM.exec(req.path)?.[1];
    if (tag !== undefined) return deleteTag(tag, admin);
  }

  switch (route) {
    case "GET /api/status":
      return { status: 200, body: await controller.getStatus() };

    case "POST /api/register-mode": {
      const enabled = isRecord(req.body) ? req.body.enabled : undefined;
      if (enabled !== undefined && typeof enabled !== "boolean") {
        return badRequest("enabled must be a boolean");
      }
      await controller.setRegisterMode(enabled ?? true);
      return { status: 200, body: { registerMode: enabled ?? true } };
    }

    case "GET /api/scan-tag":
      return { status: 200, body: { uid: controller.lastScannedUid } };

    case "POST /api/tags":
      return registerTag(req.body, controller, admin);

    case "POST /api/settings":
      return updateSettings(req.body, admin);

    case "GET /api/media":
      return { status: 200, body: admin.getAllMedia() };

    case "GET /api/tags":
      return { status: 200, body: admin.getAllTags() };

    case "GET /api/history":
      return history(req.query ?? {}, admin);

    default:
      return { status: 404, body: { error: `No route for ${route}` } };
  }
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    let size = 0;
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

export class StatusServer {
  private server: Server | null = null;
  private readonly log = new Logger("Status");

  constructor(
    private readonly controller: StatusSource,
    private readonly admin: CatalogAdmin,
  ) {}

  get isRunning(): boolean {
    return this.server !== null;
  }

  async start(port: number, host: string): Promise<void> {
    if (this.server) {
      throw new Error("Status server is already running");
    }

    const server = createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        this.log.error(`Request ${req.method} ${req.url} failed: ${describeError(err)}`);
        this.send(res, { status: 500, body: { error: "Internal error" } });
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    server.on("error", (err: Error) => this.log.error(`Server error: ${err.message}`));
    this.server = server;
    this.log.info(`Listening on http://${host}:${port}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.log.info("Stopped");
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname;
    const query = Object.fromEntries(url.searchParams);
    const method = req.method ?? "GET";

    let body: unknown;
    if (method === "POST") {
      const raw = await readBody(req);
      if (raw.trim() !== "") {
        try {
          body = JSON.parse(raw);
        } catch {
          this.send(res, badRequest("Malformed JSON body"));
          return;
        }
      }
    }

    this.send(res, await handleApiRequest({ method, path, query, body }, this.controller, this.admin));
  }

  private send(res: ServerResponse, response: ApiResponse): void {
    if (res.headersSent) return;
    res.writeHead(response.status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(response.body));
  }
}
