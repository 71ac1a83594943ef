import type http from "node:http";
import { createWriteStream } from "node:fs";
import Busboy from "busboy";
import { readClientId, readSuppliedCode, type AccessControl } from "./access-control.js";
import type { LanshareConfig, Logger, StoredFileSummary, UploadResult } from "./domain.js";
import { BadRequestError, PayloadTooLargeError, StorageError } from "./errors.js";
import type { FileStore } from "./file-store.js";
import { respondWithError, sendJson } from "./http-response.js";

/** Per-request facts fixed by the transport layer. */
export type RequestContext = {
  url: URL;
  remoteAddress: string;
  isAdmin: boolean;
};

export type UploadNotice = {
  file: StoredFileSummary;
  uploaderName?: string;
  uploaderDeviceId?: string;
  targetDeviceIds: string[];
};

export type FileRouteDeps = {
  store: FileStore;
  access: AccessControl;
  limits: Pick<LanshareConfig["storage"], "maxUploadBytes">;
  logger: Logger;
  sanitizeUploaderName: (raw: string | undefined) => string;
  notifyUpload: (notice: UploadNotice) => Promise<number>;
};

type UploadFields = {
  name?: string;
  client_id?: string;
  code?: string;
  targetIds: string[];
};

/** `target_ids` may be repeated or comma-separated; blanks are dropped. */
export function parseTargetIds(values: string[]): string[] {
  const ids = values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  return Array.from(new Set(ids));
}

function contentDisposition(fileName: string): string {
  const ascii = fileName.replace(/[^\x20-\x7E]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

export function createFileRoutes(deps: FileRouteDeps) {
  const { store, access, limits, logger } = deps;

  async function handleList(req: http.IncomingMessage, res: http.ServerResponse, ctx: RequestContext) {
    try {
      access.validateOperation(readSuppliedCode(req, ctx.url), ctx.remoteAddress);
      const files = await store.list();
      sendJson(res, 200, { files });
    } catch (err) {
      respondWithError(res, err, logger, "list_failed");
    }
  }

  async function handleDownload(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    ctx: RequestContext,
    name: string,
  ) {
    try {
      access.validateOperation(readSuppliedCode(req, ctx.url), ctx.remoteAddress);
      const opened = await store.openForRead(name);
      res.writeHead(200, {
        "Content-Type": "application/octet-stream",
        "Content-Length": opened.size,
        "Content-Disposition": contentDisposition(opened.name),
      });
      const stream = opened.handle.createReadStream();
      stream.on("error", (err) => {
        logger.error("[lanshare:http] download_stream_failed", err);
        // Headers are out; aborting keeps a short body from passing as complete.
        res.destroy(err);
      });
      stream.on("close", () => {
        opened.handle.close().catch(() => undefined);
      });
      stream.pipe(res);
    } catch (err) {
      respondWithError(res, err, logger, "download_failed");
    }
  }

  async function handleDelete(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    ctx: RequestContext,
    name: string,
  ) {
    try {
      access.validateOperation(readSuppliedCode(req, ctx.url), ctx.remoteAddress);
      access.requireAdmin(ctx.isAdmin, "Only the host can remove files");
      await store.remove(name);
      res.writeHead(204).end();
    } catch (err) {
      respondWithError(res, err, logger, "delete_failed");
    }
  }

  function receiveMultipart(req: http.IncomingMessage, tmpPath: string) {
    const fields: UploadFields = { targetIds: [] };
    let declaredName: string | undefined;
    const done = new Promise<void>((resolve, reject) => {
      let busboy: Busboy.Busboy;
      try {
        busboy = Busboy({
          headers: req.headers,
          defParamCharset: "utf8",
          limits: { files: 1, fileSize: limits.maxUploadBytes },
        });
      } catch (err) {
        reject(new BadRequestError(err instanceof Error ? err.message : "Invalid multipart body"));
        return;
      }
      let handled = false;
      let settled = false;
      let writeDone: Promise<void> | null = null;
      const finish = (err?: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        if (err) {
          req.unpipe(busboy);
          req.resume();
          reject(err);
          return;
        }
        resolve();
      };
      busboy.on("field", (fieldname, value) => {
        if (fieldname === "target_ids") {
          fields.targetIds.push(value);
        } else if (fieldname === "name" || fieldname === "client_id" || fieldname === "code") {
          fields[fieldname] = value;
        }
      });
      busboy.on("file", (fieldname, file, info) => {
        if (handled || fieldname !== "file") {
          file.resume();
          if (!handled) {
            finish(new BadRequestError("Invalid upload field"));
          }
          return;
        }
        handled = true;
        declaredName = info.filename;
        const writeStream = createWriteStream(tmpPath);
        writeDone = new Promise<void>((writeResolve, writeReject) => {
          writeStream.on("finish", writeResolve);
          writeStream.on("error", (err) => writeReject(new StorageError(err)));
        });
        writeDone.catch(finish);
        file.on("limit", () => {
          file.unpipe(writeStream);
          writeStream.destroy();
          file.resume();
          finish(new PayloadTooLargeError());
        });
        file.on("error", finish);
        file.pipe(writeStream);
      });
      busboy.on("finish", () => {
        if (!handled || !writeDone) {
          finish(new BadRequestError("Missing file field"));
          return;
        }
        writeDone.then(() => finish(), finish);
      });
      busboy.on("error", (err) =>
        finish(new BadRequestError(err instanceof Error ? err.message : "Invalid multipart body")),
      );
      req.pipe(busboy);
    });
    return done.then(() => ({ fields, declaredName }));
  }

  async function handleUpload(req: http.IncomingMessage, res: http.ServerResponse, ctx: RequestContext) {
    let tmpPath: string | undefined;
    let finalized = false;
    try {
      const headerCode = readSuppliedCode(req, ctx.url);
      if (headerCode !== undefined) {
        access.validateOperation(headerCode, ctx.remoteAddress);
      }
      tmpPath = await store.createTempPath();
      const { fields, declaredName } = await receiveMultipart(req, tmpPath);
      if (headerCode === undefined) {
        access.validateOperation(fields.code, ctx.remoteAddress);
      }
      const uploaderName = deps.sanitizeUploaderName(fields.name);
      const uploaderDeviceId = readClientId(req, ctx.url, fields.client_id);
      const file = await store.finalizeUpload(tmpPath, declaredName, {
        from: uploaderName,
        deviceId: uploaderDeviceId,
      });
      finalized = true;
      const notified = await deps.notifyUpload({
        file,
        uploaderName,
        uploaderDeviceId,
        targetDeviceIds: parseTargetIds(fields.targetIds),
      });
      logger.info?.("[lanshare:http] upload_stored", { name: file.name, size: file.size, notified });
      const result: UploadResult = { name: file.name, size: file.size };
      sendJson(res, 200, result);
    } catch (err) {
      if (tmpPath && !finalized) {
        await store.discard(tmpPath);
      }
      if (!req.readableEnded) {
        req.resume();
      }
      respondWithError(res, err, logger, "upload_failed");
    }
  }

  return { handleList, handleDownload, handleDelete, handleUpload };
}
