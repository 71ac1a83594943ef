import http from "node:http";
import type net from "node:net";
import fs from "node:fs/promises";
import path from "node:path";
import WebSocket, { WebSocketServer } from "ws";
import { z } from "zod";

import { createAccessControl, readSuppliedCode } from "./access-control.js";
import { resolveLanshareConfig } from "./config.js";
import { createProtocolHandler, sanitizeName } from "./connection.js";
import type {
  HubServer,
  HubSettings,
  Logger,
  ServerOptions,
  SessionTransport,
} from "./domain.js";
import { BadRequestError, HttpError, PayloadTooLargeError, StorageError } from "./errors.js";
import { createFileStore } from "./file-store.js";
import { createFileRoutes, type RequestContext, type UploadNotice } from "./http-files.js";
import { respondWithError, sendHttpError, sendJson } from "./http-response.js";
import { getLanAddress, normalizeAddress } from "./network.js";
import { PROTOCOL_VERSION, SERVER_NAME, nowSeconds } from "./protocol.js";
import { createSerialQueue } from "./serial-queue.js";
import { createSessionRegistry } from "./session-registry.js";

export { PROTOCOL_VERSION } from "./protocol.js";

const STORE_LANE = "store";
const MAX_JSON_BODY_BYTES = 16 * 1024;
const FORCE_CLOSE_GRACE_MS = 1_000;

const SettingsUpdateSchema = z
  .object({
    code: z.string().optional(),
    save_dir: z.string().trim().min(1).optional(),
    access_code: z.string().optional(),
  })
  .strict();

function createWsTransport(
  ws: WebSocket,
  remoteAddress: string,
  maxBufferedBytes: number,
  logger: Logger,
): SessionTransport {
  return {
    remoteAddress,
    isOpen: () => ws.readyState === WebSocket.OPEN,
    /**
     * Resolves once ws has queued the frame, not once it is flushed; ws keeps
     * frames in order per socket. A peer that stops reading is cut off when
     * its unsent backlog passes `maxBufferedBytes`.
     */
    send(payload: unknown) {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new Error("socket not open"));
      }
      const data = JSON.stringify(payload);
      if (ws.bufferedAmount + Buffer.byteLength(data) > maxBufferedBytes) {
        logger.warn("[lanshare:ws] peer_backlog_exceeded", {
          remoteAddress,
          bufferedAmount: ws.bufferedAmount,
        });
        ws.terminate();
        return Promise.reject(new Error("peer is not reading"));
      }
      ws.send(data, (err) => {
        if (err) {
          logger.warn("[lanshare:ws] send_failed", { remoteAddress, error: err.message });
          ws.terminate();
        }
      });
      return Promise.resolve();
    },
    close(code: number, reason?: string) {
      if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) {
        return;
      }
      ws.close(code, reason);
      // Peers that never answer the closing handshake are cut off.
      const timer = setTimeout(() => ws.terminate(), FORCE_CLOSE_GRACE_MS);
      timer.unref();
      ws.once("close", () => clearTimeout(timer));
    },
  };
}

function decodeRawData(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_JSON_BODY_BYTES) {
      throw new PayloadTooLargeError("Request body too large");
    }
    chunks.push(buf);
  }
  if (size === 0) {
    return {};
  }
  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new BadRequestError("Malformed JSON");
  }
}

export async function createHubServer(options: ServerOptions = {}): Promise<HubServer> {
  const config = resolveLanshareConfig(options.config);
  const logger: Logger = options.logger ?? console;
  let saveDir = config.storage.saveDir;
  let accessCode = config.auth.accessCode;

  const queue = createSerialQueue();
  const access = createAccessControl({
    getAccessCode: () => accessCode,
    maxFailedAttemptsPerMinute: config.auth.maxFailedAttemptsPerMinute,
    trustedAddresses: config.network.trustedAddresses,
    trustLocalInterfaces: config.network.trustLocalInterfaces,
    isTrustedOrigin: options.isTrustedOrigin,
  });
  const registry = createSessionRegistry({ queue, logger });
  const store = createFileStore({ getSaveDir: () => saveDir, queue, logger });
  const protocol = createProtocolHandler({
    registry,
    access,
    queue,
    limits: config.sessions,
    logger,
  });

  await store.ensureSaveDir();
  await store.cleanupTempFiles();

  function getSettings(): HubSettings {
    return { save_dir: saveDir, requires_code: access.requiresCode() };
  }

  async function broadcastSettings() {
    await registry.deliverAll(registry.list(), { kind: "settings", ...getSettings() });
  }

  function notifyUpload(notice: UploadNotice): Promise<number> {
    const recipients = registry.resolveReceivers(notice.targetDeviceIds, notice.uploaderDeviceId);
    return registry.deliverAll(recipients, {
      kind: "file",
      name: notice.file.name,
      size: notice.file.size,
      ...(notice.uploaderName ? { from: notice.uploaderName } : {}),
      ...(notice.uploaderDeviceId ? { device_id: notice.uploaderDeviceId } : {}),
      ts: nowSeconds(),
    });
  }

  /** Swaps the save directory on the store lane so no directory operation straddles it. */
  function changeSaveDir(next: string): Promise<void> {
    return queue.run(STORE_LANE, async () => {
      const resolved = path.resolve(next);
      try {
        await fs.mkdir(resolved, { recursive: true });
      } catch (err) {
        throw new StorageError(err);
      }
      saveDir = resolved;
      logger.info?.("[lanshare:http] save_dir_changed", { saveDir });
    });
  }

  const fileRoutes = createFileRoutes({
    store,
    access,
    limits: config.storage,
    logger,
    sanitizeUploaderName: (raw) => sanitizeName(raw, config.sessions.maxNameChars),
    notifyUpload,
  });

  function requestContext(req: http.IncomingMessage, url: URL): RequestContext {
    const remoteAddress = normalizeAddress(req.socket.remoteAddress);
    return { url, remoteAddress, isAdmin: access.isAdminOrigin(remoteAddress) };
  }

  function handleInfo(res: http.ServerResponse, ctx: RequestContext) {
    const lanIp = getLanAddress();
    const port = readBoundPort();
    sendJson(res, 200, {
      name: SERVER_NAME,
      lan_ip: lanIp,
      port,
      lan_url: `http://${lanIp}:${port}`,
      requires_code: access.requiresCode(),
      is_admin: ctx.isAdmin,
    });
  }

  async function handleUpdateSettings(req: http.IncomingMessage, res: http.ServerResponse, ctx: RequestContext) {
    try {
      const parsed = SettingsUpdateSchema.safeParse(await readJsonBody(req));
      if (!parsed.success) {
        throw new BadRequestError(parsed.error.issues[0]?.message ?? "Invalid settings");
      }
      const update = parsed.data;
      access.validateOperation(readSuppliedCode(req, ctx.url, update.code), ctx.remoteAddress);
      access.requireAdmin(ctx.isAdmin, "Only the host can change settings");
      if (update.save_dir) {
        await changeSaveDir(update.save_dir);
      }
      if (update.access_code !== undefined) {
        accessCode = update.access_code.trim();
        logger.info?.("[lanshare:http] access_code_changed", { requiresCode: accessCode.length > 0 });
      }
      await broadcastSettings();
      sendJson(res, 200, getSettings());
    } catch (err) {
      respondWithError(res, err, logger, "settings_update_failed");
    }
  }

  async function handleSaveDialog(req: http.IncomingMessage, res: http.ServerResponse, ctx: RequestContext) {
    try {
      access.validateOperation(readSuppliedCode(req, ctx.url), ctx.remoteAddress);
      access.requireAdmin(ctx.isAdmin, "Only the host can choose the folder");
      if (!options.pickFolder) {
        throw new HttpError(501, "not_supported", "Folder picker not available");
      }
      const chosen = await options.pickFolder();
      if (!chosen) {
        throw new BadRequestError("No folder chosen");
      }
      await changeSaveDir(chosen);
      await broadcastSettings();
      sendJson(res, 200, { save_dir: saveDir });
    } catch (err) {
      respondWithError(res, err, logger, "save_dialog_failed");
    }
  }

  const logHttpRequest = (info: Record<string, unknown>) => {
    logger.info?.("[lanshare:http]", info);
  };

  const httpServer = http.createServer(async (req, res) => {
    try {
      if (!req.url) {
        res.writeHead(404).end();
        return;
      }
      const url = new URL(req.url, "http://localhost");
      const method = req.method ?? "UNKNOWN";
      const pathname = url.pathname;
      const ctx = requestContext(req, url);
      logHttpRequest({ event: "request_received", method, path: pathname });

      if (method === "GET" && pathname === "/version") {
        sendJson(res, 200, { protocolVersion: PROTOCOL_VERSION });
        return;
      }
      if (method === "GET" && pathname === "/info") {
        handleInfo(res, ctx);
        return;
      }
      if (method === "GET" && pathname === "/settings") {
        access.validateOperation(readSuppliedCode(req, url), ctx.remoteAddress);
        sendJson(res, 200, getSettings());
        return;
      }
      if (method === "POST" && pathname === "/settings") {
        await handleUpdateSettings(req, res, ctx);
        return;
      }
      if (method === "POST" && pathname === "/settings/save-dialog") {
        await handleSaveDialog(req, res, ctx);
        return;
      }
      if (method === "GET" && pathname === "/files") {
        await fileRoutes.handleList(req, res, ctx);
        return;
      }
      if (method === "POST" && pathname === "/upload") {
        await fileRoutes.handleUpload(req, res, ctx);
        return;
      }
      if (pathname.startsWith("/files/") && (method === "GET" || method === "DELETE")) {
        let name: string;
        try {
          name = decodeURIComponent(pathname.slice("/files/".length));
        } catch {
          throw new BadRequestError("Invalid file name");
        }
        if (method === "GET") {
          await fileRoutes.handleDownload(req, res, ctx, name);
        } else {
          await fileRoutes.handleDelete(req, res, ctx, name);
        }
        return;
      }
      logHttpRequest({ event: "request_not_found", method, path: pathname });
      sendHttpError(res, 404, "not_found", "Not found");
    } catch (err) {
      respondWithError(res, err, logger, "request_failed");
    }
  });

  const sockets = new Set<net.Socket>();
  httpServer.on("connection", (socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: config.sessions.maxMessageBytes });

  httpServer.on("upgrade", (request, socket, head) => {
    const pathname = new URL(request.url ?? "/", "http://localhost").pathname;
    if (pathname !== "/ws") {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  wss.on("connection", (ws: WebSocket, request: http.IncomingMessage) => {
    const remoteAddress = normalizeAddress(request.socket.remoteAddress);
    const transport = createWsTransport(
      ws,
      remoteAddress,
      config.sessions.maxBufferedBytes,
      logger,
    );
    const handle = protocol.accept(transport, { isAdmin: access.isAdminOrigin(remoteAddress) });
    logger.info?.("[lanshare:ws] connection_opened", { connectionId: handle.id, remoteAddress });

    ws.on("message", (data) => {
      handle.receive(decodeRawData(data)).catch((err) => {
        logger.error("[lanshare:ws] receive_failed", err);
      });
    });
    ws.on("close", () => {
      handle.transportClosed().catch((err) => {
        logger.error("[lanshare:ws] close_cleanup_failed", err);
      });
    });
    ws.on("error", (err) => {
      logger.warn("[lanshare:ws] socket_error", { connectionId: handle.id, error: err.message });
    });
  });

  let started = false;

  const readBoundPort = () => {
    const addr = httpServer.address();
    if (!addr || typeof addr === "string") {
      return config.port;
    }
    return addr.port;
  };

  return {
    async start() {
      if (started) return;
      await new Promise<void>((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(config.port, config.network.bindAddress, () => {
          httpServer.off("error", reject);
          resolve();
        });
      });
      started = true;
      logger.info(`[lanshare] listening on ${config.network.bindAddress}:${readBoundPort()}`);
    },
    async stop() {
      if (!started) return;
      for (const client of wss.clients) {
        client.terminate();
      }
      for (const socket of sockets) {
        socket.destroy();
      }
      httpServer.closeAllConnections();
      const closeWithTimeout = (fn: (cb: () => void) => void, label: string) =>
        new Promise<void>((resolve, reject) => {
          const timer = setTimeout(() => {
            logger.warn("[lanshare] shutdown_timeout", { label });
            reject(new Error(`${label} close timeout`));
          }, 5000);
          fn(() => {
            clearTimeout(timer);
            resolve();
          });
        });
      await closeWithTimeout((cb) => wss.close(() => cb()), "wss");
      await closeWithTimeout((cb) => httpServer.close(() => cb()), "httpServer");
      await queue.drain();
      started = false;
    },
    getPort() {
      return readBoundPort();
    },
    getSettings,
  };
}
