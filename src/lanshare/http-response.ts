import type http from "node:http";
import type { Logger } from "./domain.js";
import { HttpError } from "./errors.js";

export function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.setHeader("Content-Type", "application/json");
  res.writeHead(status);
  res.end(JSON.stringify(body));
}

export function sendHttpError(res: http.ServerResponse, status: number, code: string, detail: string) {
  sendJson(res, status, { detail, code });
}

/** Maps a thrown error to an error response; anything unexpected is a logged 500. */
export function respondWithError(res: http.ServerResponse, err: unknown, logger: Logger, event: string) {
  if (res.headersSent) {
    logger.error(`[lanshare:http] ${event}`, err);
    res.end();
    return;
  }
  if (err instanceof HttpError) {
    if (err.status >= 500) {
      logger.error(`[lanshare:http] ${event}`, err);
    }
    sendHttpError(res, err.status, err.code, err.message);
    return;
  }
  logger.error(`[lanshare:http] ${event}`, err);
  sendHttpError(res, 500, "server_error", "Internal error");
}
