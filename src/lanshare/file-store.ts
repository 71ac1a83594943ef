import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger, StoredFileSummary } from "./domain.js";
import { NotFoundError, StorageError, errnoCode } from "./errors.js";
import type { SerialQueue } from "./serial-queue.js";

const STORE_LANE = "store";
const TEMP_PREFIX = ".lanshare-";
const TEMP_SUFFIX = ".part";
const FALLBACK_NAME = "upload";
const MAX_NAME_ATTEMPTS = 10_000;
// Hard links fail across devices and on filesystems without them (FAT, some shares).
const LINK_UNSUPPORTED_CODES = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS"]);
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS_REGEX = /[\u0000-\u001F\u007F]/g;

type FileMeta = { from?: string; deviceId?: string };

/** Reduces a client-declared file name to a safe, visible base name. */
export function sanitizeFileName(declared: string | undefined): string {
  const base = path.basename((declared ?? "").replace(/\\/g, "/"));
  const cleaned = base.replace(CONTROL_CHARS_REGEX, "").trim().replace(/^\.+/, "");
  return cleaned || FALLBACK_NAME;
}

export function collisionCandidate(fileName: string, attempt: number): string {
  if (attempt === 0) {
    return fileName;
  }
  const ext = path.extname(fileName);
  const stem = ext ? fileName.slice(0, -ext.length) : fileName;
  return `${stem} (${attempt})${ext}`;
}

function isListable(name: string): boolean {
  return !name.startsWith(".");
}

function toStorageError(err: unknown): StorageError {
  return err instanceof StorageError ? err : new StorageError(err);
}

export type OpenedFile = { name: string; size: number; handle: fs.FileHandle };

export type FileStore = ReturnType<typeof createFileStore>;

/**
 * Directory operations over the configured save directory. Listing, upload
 * finalization and deletion share one lane, so a finished upload is visible
 * to the next listing and collision resolution never races another writer.
 */
export function createFileStore(params: {
  getSaveDir: () => string;
  queue: SerialQueue;
  logger?: Logger;
}) {
  const { getSaveDir, queue } = params;
  const logger: Logger = params.logger ?? console;
  const metadata = new Map<string, FileMeta>();

  const metaKey = (dir: string, name: string) => path.join(dir, name);

  async function ensureSaveDir(): Promise<string> {
    const dir = getSaveDir();
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw toStorageError(err);
    }
    return dir;
  }

  function list(): Promise<StoredFileSummary[]> {
    return queue.run(STORE_LANE, async () => {
      const dir = await ensureSaveDir();
      try {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        const files: StoredFileSummary[] = [];
        for (const entry of entries) {
          if (!entry.isFile() || !isListable(entry.name)) {
            continue;
          }
          const stats = await fs.stat(path.join(dir, entry.name));
          const meta = metadata.get(metaKey(dir, entry.name));
          files.push({
            name: entry.name,
            size: stats.size,
            mtime: Math.floor(stats.mtimeMs / 1000),
            ...(meta?.from ? { from: meta.from } : {}),
          });
        }
        files.sort((a, b) => {
          const left = a.name.toLowerCase();
          const right = b.name.toLowerCase();
          return left < right ? -1 : left > right ? 1 : 0;
        });
        return files;
      } catch (err) {
        throw toStorageError(err);
      }
    });
  }

  async function locate(name: string): Promise<{ filePath: string; size: number; name: string }> {
    const safe = path.basename(name);
    if (!safe || safe !== name || !isListable(safe)) {
      throw new NotFoundError();
    }
    const filePath = path.join(getSaveDir(), safe);
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new NotFoundError();
      }
      return { filePath, size: stats.size, name: safe };
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw err;
      }
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") {
        throw new NotFoundError();
      }
      throw toStorageError(err);
    }
  }

  async function openForRead(name: string): Promise<OpenedFile> {
    const located = await locate(name);
    try {
      const handle = await fs.open(located.filePath, "r");
      return { name: located.name, size: located.size, handle };
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        throw new NotFoundError();
      }
      throw toStorageError(err);
    }
  }

  function remove(name: string): Promise<void> {
    return queue.run(STORE_LANE, async () => {
      const located = await locate(name);
      try {
        await fs.unlink(located.filePath);
      } catch (err) {
        if (errnoCode(err) === "ENOENT") {
          throw new NotFoundError();
        }
        throw toStorageError(err);
      }
      metadata.delete(located.filePath);
      logger.info?.("[lanshare:store] file_deleted", { name: located.name });
    });
  }

  /** A hidden path inside the save directory for bytes still in flight. */
  async function createTempPath(): Promise<string> {
    const dir = await ensureSaveDir();
    return path.join(dir, `${TEMP_PREFIX}${randomUUID()}${TEMP_SUFFIX}`);
  }

  /**
   * Creates `finalPath` from the temp file only if nothing exists there yet,
   * so an existing file is never replaced. Resolves false when the name is taken.
   */
  async function claimName(tmpPath: string, finalPath: string): Promise<boolean> {
    try {
      await fs.link(tmpPath, finalPath);
    } catch (err) {
      const code = errnoCode(err);
      if (code === "EEXIST") {
        return false;
      }
      if (!code || !LINK_UNSUPPORTED_CODES.has(code)) {
        throw err;
      }
      try {
        await fs.copyFile(tmpPath, finalPath, fs.constants.COPYFILE_EXCL);
      } catch (copyErr) {
        if (errnoCode(copyErr) === "EEXIST") {
          return false;
        }
        throw copyErr;
      }
    }
    await safeUnlink(tmpPath);
    return true;
  }

  /** Gives a fully written temp file its collision-free final name. */
  function finalizeUpload(
    tmpPath: string,
    declaredName: string | undefined,
    meta: FileMeta,
  ): Promise<StoredFileSummary> {
    return queue.run(STORE_LANE, async () => {
      const dir = await ensureSaveDir();
      const base = sanitizeFileName(declaredName);
      try {
        let finalName: string | undefined;
        for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt += 1) {
          const candidate = collisionCandidate(base, attempt);
          if (await claimName(tmpPath, path.join(dir, candidate))) {
            finalName = candidate;
            break;
          }
        }
        if (finalName === undefined) {
          throw new StorageError(`No free name left for ${base}`);
        }
        const finalPath = path.join(dir, finalName);
        const stats = await fs.stat(finalPath);
        metadata.set(metaKey(dir, finalName), meta);
        logger.info?.("[lanshare:store] file_stored", { name: finalName, size: stats.size });
        return {
          name: finalName,
          size: stats.size,
          mtime: Math.floor(stats.mtimeMs / 1000),
          ...(meta.from ? { from: meta.from } : {}),
        };
      } catch (err) {
        throw toStorageError(err);
      }
    });
  }

  async function safeUnlink(filePath: string) {
    try {
      await fs.unlink(filePath);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return;
      }
      logger.warn("[lanshare:store] file_unlink_failed", err);
    }
  }

  /** Removes temp files left behind by interrupted uploads. */
  async function cleanupTempFiles() {
    try {
      const dir = await ensureSaveDir();
      const entries = await fs.readdir(dir);
      await Promise.all(
        entries
          .filter((entry) => entry.startsWith(TEMP_PREFIX) && entry.endsWith(TEMP_SUFFIX))
          .map((entry) => safeUnlink(path.join(dir, entry))),
      );
    } catch (err) {
      logger.warn("[lanshare:store] temp_cleanup_failed", err);
    }
  }

  return {
    list,
    openForRead,
    remove,
    createTempPath,
    finalizeUpload,
    discard: safeUnlink,
    cleanupTempFiles,
    ensureSaveDir,
  };
}
