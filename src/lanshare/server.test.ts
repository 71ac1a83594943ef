import { Blob } from "node:buffer";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { FormData, fetch, getGlobalDispatcher } from "undici";
import { afterAll, describe, expect, it } from "vitest";
import WebSocket from "ws";
import type { FolderPicker, HubServer } from "./domain.js";
import { createHubServer } from "./server.js";
import { silentLogger } from "./testing/fake-transport.js";

type Frame = Record<string, unknown>;

function isFrame(value: unknown): value is Frame {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const decodeRawData = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
};

function createMessageQueue(ws: WebSocket) {
  const queued: Frame[] = [];
  const waiters: Array<(value: Frame) => void> = [];

  const onMessage = (data: WebSocket.RawData) => {
    const parsed: unknown = JSON.parse(decodeRawData(data));
    const frame = isFrame(parsed) ? parsed : { raw: parsed };
    const waiter = waiters.shift();
    if (waiter) {
      waiter(frame);
      return;
    }
    queued.push(frame);
  };

  ws.on("message", onMessage);

  const next = (): Promise<Frame> => {
    const head = queued.shift();
    return head ? Promise.resolve(head) : new Promise((resolve) => waiters.push(resolve));
  };

  return {
    next,
    /** Skips roster updates, which arrive whenever anyone joins or leaves. */
    async nextNonRoster(): Promise<Frame> {
      for (;;) {
        const frame = await next();
        if (frame.kind !== "clients") {
          return frame;
        }
      }
    },
    async waitForRoster(size: number): Promise<Frame> {
      for (;;) {
        const frame = await next();
        if (frame.kind === "clients" && Array.isArray(frame.items) && frame.items.length === size) {
          return frame;
        }
      }
    },
  };
}

function waitForOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error("WebSocket open timeout"));
    }, 2000);
    const cleanup = () => {
      clearTimeout(timer);
      ws.off("open", handleOpen);
      ws.off("error", handleError);
    };
    const handleOpen = () => {
      cleanup();
      resolve();
    };
    const handleError = (err: Error) => {
      cleanup();
      reject(err);
    };
    ws.once("open", handleOpen);
    ws.once("error", handleError);
  });
}

function waitForClose(ws: WebSocket): Promise<number> {
  return new Promise((resolve) => {
    ws.once("close", (code: number) => resolve(code));
  });
}

afterAll(async () => {
  // Undici keeps connections alive by default; close the global dispatcher so Vitest can exit.
  await getGlobalDispatcher().close();
});

type TestServerContext = {
  server: HubServer;
  base: string;
  port: number;
  saveDir: string;
  connect: (hello: Frame) => Promise<TestClient>;
  cleanup: () => Promise<void>;
};

type TestClient = {
  ws: WebSocket;
  queue: ReturnType<typeof createMessageQueue>;
  welcome: Frame;
  sessionId: string;
  closed: Promise<number>;
};

async function setupTestServer(
  options: {
    accessCode?: string;
    admin?: boolean;
    maxUploadBytes?: number;
    maxBufferedBytes?: number;
    pickFolder?: FolderPicker;
  } = {},
): Promise<TestServerContext> {
  const saveDir = await fs.mkdtemp(path.join(os.tmpdir(), "lanshare-server-"));
  const server = await createHubServer({
    config: {
      port: 0,
      network: { bindAddress: "127.0.0.1" },
      storage: {
        saveDir,
        ...(options.maxUploadBytes ? { maxUploadBytes: options.maxUploadBytes } : {}),
      },
      auth: { accessCode: options.accessCode ?? "", maxFailedAttemptsPerMinute: 0 },
      ...(options.maxBufferedBytes ? { sessions: { maxBufferedBytes: options.maxBufferedBytes } } : {}),
    },
    logger: silentLogger,
    isTrustedOrigin: () => options.admin ?? false,
    pickFolder: options.pickFolder,
  });
  await server.start();
  const port = server.getPort();
  const clients: WebSocket[] = [];

  const connect = async (hello: Frame): Promise<TestClient> => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws`);
    clients.push(ws);
    const queue = createMessageQueue(ws);
    const closed = waitForClose(ws);
    await waitForOpen(ws);
    ws.send(JSON.stringify({ kind: "hello", ...hello }));
    const welcome = await queue.next();
    return { ws, queue, welcome, sessionId: String(welcome.session_id), closed };
  };

  return {
    server,
    base: `http://127.0.0.1:${port}`,
    port,
    saveDir,
    connect,
    cleanup: async () => {
      for (const ws of clients) {
        ws.terminate();
      }
      await server.stop();
      await fs.rm(saveDir, { recursive: true, force: true });
    },
  };
}

function upload(
  base: string,
  fileName: string,
  data: Buffer,
  fields: Record<string, string> = {},
  headers: Record<string, string> = {},
) {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  form.set("file", new Blob([data], { type: "application/octet-stream" }), fileName);
  return fetch(`${base}/upload`, { method: "POST", body: form, headers });
}

function postJson(base: string, route: string, body: unknown) {
  return fetch(`${base}${route}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("hub server http", () => {
  it("reports version and host info", async () => {
    const ctx = await setupTestServer();
    try {
      const version = await fetch(`${ctx.base}/version`);
      expect(version.status).toBe(200);
      expect(await version.json()).toEqual({ protocolVersion: 1 });

      const info = await fetch(`${ctx.base}/info`);
      const body = await info.json();
      expect(body).toEqual({
        name: "LanShare",
        lan_ip: expect.any(String),
        port: ctx.port,
        lan_url: expect.stringMatching(new RegExp(`^http://.+:${ctx.port}$`)),
        requires_code: false,
        is_admin: false,
      });
    } finally {
      await ctx.cleanup();
    }
  });

  it("answers unknown routes with a 404", async () => {
    const ctx = await setupTestServer();
    try {
      const res = await fetch(`${ctx.base}/nope`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: "Not found", code: "not_found" });
    } finally {
      await ctx.cleanup();
    }
  });

  it("stores uploads under collision-free names and serves them back", async () => {
    const ctx = await setupTestServer();
    try {
      const first = await upload(ctx.base, "a.txt", Buffer.from("abc"), { name: "Alice" });
      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ name: "a.txt", size: 3 });

      const second = await upload(ctx.base, "a.txt", Buffer.from("hello"));
      expect(await second.json()).toEqual({ name: "a (1).txt", size: 5 });

      const listing = await fetch(`${ctx.base}/files`);
      expect(await listing.json()).toEqual({
        files: [
          { name: "a (1).txt", size: 5, mtime: expect.any(Number), from: "Guest" },
          { name: "a.txt", size: 3, mtime: expect.any(Number), from: "Alice" },
        ],
      });

      const download = await fetch(`${ctx.base}/files/${encodeURIComponent("a (1).txt")}`);
      expect(download.status).toBe(200);
      expect(download.headers.get("content-type")).toBe("application/octet-stream");
      expect(download.headers.get("content-disposition")).toBe(
        "attachment; filename=\"a (1).txt\"; filename*=UTF-8''a%20(1).txt",
      );
      expect(await download.text()).toBe("hello");
    } finally {
      await ctx.cleanup();
    }
  });

  it("keeps concurrent uploads intact", async () => {
    const ctx = await setupTestServer();
    try {
      const left = Buffer.alloc(200_000, 7);
      const right = Buffer.alloc(150_000, 9);
      const responses = await Promise.all([
        upload(ctx.base, "left.bin", left),
        upload(ctx.base, "right.bin", right),
      ]);
      expect(responses.map((res) => res.status)).toEqual([200, 200]);

      const leftBack = Buffer.from(await (await fetch(`${ctx.base}/files/left.bin`)).arrayBuffer());
      const rightBack = Buffer.from(await (await fetch(`${ctx.base}/files/right.bin`)).arrayBuffer());
      expect(leftBack.equals(left)).toBe(true);
      expect(rightBack.equals(right)).toBe(true);
    } finally {
      await ctx.cleanup();
    }
  });

  it("reports missing files", async () => {
    const ctx = await setupTestServer();
    try {
      const res = await fetch(`${ctx.base}/files/missing.txt`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: "File not found", code: "not_found" });
    } finally {
      await ctx.cleanup();
    }
  });

  it("rejects uploads over the size limit without keeping a file", async () => {
    const ctx = await setupTestServer({ maxUploadBytes: 10 });
    try {
      const res = await upload(ctx.base, "big.bin", Buffer.alloc(100, 1));
      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({ detail: "Upload too large", code: "payload_too_large" });

      const listing = await fetch(`${ctx.base}/files`);
      expect(await listing.json()).toEqual({ files: [] });
    } finally {
      await ctx.cleanup();
    }
  });

  it("requires the access code for every file operation", async () => {
    const ctx = await setupTestServer({ accessCode: "1234" });
    try {
      const unauthorized = { detail: "Invalid access code", code: "unauthorized" };

      const list = await fetch(`${ctx.base}/files`);
      expect(list.status).toBe(401);
      expect(await list.json()).toEqual(unauthorized);

      const download = await fetch(`${ctx.base}/files/a.txt?code=0000`);
      expect(download.status).toBe(401);
      await download.body?.cancel();

      const remove = await fetch(`${ctx.base}/files/a.txt`, { method: "DELETE" });
      expect(remove.status).toBe(401);
      await remove.body?.cancel();

      const settings = await fetch(`${ctx.base}/settings`);
      expect(settings.status).toBe(401);
      await settings.body?.cancel();

      const rejected = await upload(ctx.base, "a.txt", Buffer.from("abc"), { code: "0000" });
      expect(rejected.status).toBe(401);
      expect(await rejected.json()).toEqual(unauthorized);
      await expect(fs.readdir(ctx.saveDir)).resolves.toEqual([]);

      const accepted = await upload(ctx.base, "a.txt", Buffer.from("abc"), { code: "1234" });
      expect(await accepted.json()).toEqual({ name: "a.txt", size: 3 });

      const byHeader = await fetch(`${ctx.base}/files`, { headers: { "x-lanshare-code": "1234" } });
      expect(await byHeader.json()).toEqual({
        files: [{ name: "a.txt", size: 3, mtime: expect.any(Number), from: "Guest" }],
      });

      const byQuery = await fetch(`${ctx.base}/files/a.txt?code=1234`);
      expect(await byQuery.text()).toBe("abc");

      const info = await fetch(`${ctx.base}/info`);
      expect(await info.json()).toMatchObject({ requires_code: true });
    } finally {
      await ctx.cleanup();
    }
  });

  it("only lets the host delete files", async () => {
    const guest = await setupTestServer();
    try {
      await upload(guest.base, "keep.txt", Buffer.from("k"));
      const res = await fetch(`${guest.base}/files/keep.txt`, { method: "DELETE" });
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        detail: "Only the host can remove files",
        code: "forbidden",
      });
      await expect(fs.readdir(guest.saveDir)).resolves.toEqual(["keep.txt"]);
    } finally {
      await guest.cleanup();
    }

    const host = await setupTestServer({ admin: true });
    try {
      await upload(host.base, "gone.txt", Buffer.from("g"));
      const res = await fetch(`${host.base}/files/gone.txt`, { method: "DELETE" });
      expect(res.status).toBe(204);
      const after = await fetch(`${host.base}/files/gone.txt`);
      expect(after.status).toBe(404);
      await after.body?.cancel();
    } finally {
      await host.cleanup();
    }
  });
});

describe("hub server settings", () => {
  it("lets the host change the save directory and the access code", async () => {
    const ctx = await setupTestServer({ accessCode: "1234", admin: true });
    try {
      const watcher = await ctx.connect({ name: "Watcher", code: "1234", can_receive: false });
      await watcher.queue.waitForRoster(1);
      const inbox = path.join(ctx.saveDir, "inbox");

      const moved = await postJson(ctx.base, "/settings", { code: "1234", save_dir: inbox });
      expect(moved.status).toBe(200);
      expect(await moved.json()).toEqual({ save_dir: inbox, requires_code: true });
      expect(await watcher.queue.nextNonRoster()).toEqual({
        kind: "settings",
        save_dir: inbox,
        requires_code: true,
      });

      await upload(ctx.base, "moved.txt", Buffer.from("m"), { code: "1234" });
      await expect(fs.readdir(inbox)).resolves.toEqual(["moved.txt"]);

      const opened = await postJson(ctx.base, "/settings", { code: "1234", access_code: "" });
      expect(await opened.json()).toEqual({ save_dir: inbox, requires_code: false });
      expect(await watcher.queue.nextNonRoster()).toEqual({
        kind: "settings",
        save_dir: inbox,
        requires_code: false,
      });

      const current = await fetch(`${ctx.base}/settings`);
      expect(await current.json()).toEqual({ save_dir: inbox, requires_code: false });
    } finally {
      await ctx.cleanup();
    }
  });

  it("refuses settings changes from guests", async () => {
    const ctx = await setupTestServer();
    try {
      const res = await postJson(ctx.base, "/settings", { save_dir: path.join(ctx.saveDir, "x") });
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        detail: "Only the host can change settings",
        code: "forbidden",
      });
    } finally {
      await ctx.cleanup();
    }
  });

  it("rejects unknown settings fields", async () => {
    const ctx = await setupTestServer({ admin: true });
    try {
      const res = await postJson(ctx.base, "/settings", { colour: "blue" });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: "invalid_request" });
    } finally {
      await ctx.cleanup();
    }
  });

  it("uses the folder picker for the save dialog", async () => {
    const unsupported = await setupTestServer({ admin: true });
    try {
      const res = await fetch(`${unsupported.base}/settings/save-dialog`, { method: "POST" });
      expect(res.status).toBe(501);
      expect(await res.json()).toEqual({
        detail: "Folder picker not available",
        code: "not_supported",
      });
    } finally {
      await unsupported.cleanup();
    }

    let choice: string | null = null;
    const picking = await setupTestServer({ admin: true, pickFolder: async () => choice });
    try {
      const cancelled = await fetch(`${picking.base}/settings/save-dialog`, { method: "POST" });
      expect(cancelled.status).toBe(400);
      expect(await cancelled.json()).toEqual({ detail: "No folder chosen", code: "invalid_request" });

      choice = path.join(picking.saveDir, "picked");
      const chosen = await fetch(`${picking.base}/settings/save-dialog`, { method: "POST" });
      expect(chosen.status).toBe(200);
      expect(await chosen.json()).toEqual({ save_dir: choice });
      expect(picking.server.getSettings().save_dir).toBe(choice);
    } finally {
      await picking.cleanup();
    }
  });
});

describe("hub server websocket", () => {
  it("closes a handshake with the wrong code", async () => {
    const ctx = await setupTestServer({ accessCode: "1234" });
    try {
      const client = await ctx.connect({ name: "Mallory", code: "0000" });
      expect(client.welcome).toEqual({
        kind: "error",
        code: "unauthorized",
        detail: "Invalid access code",
      });
      await expect(client.closed).resolves.toBe(1008);
    } finally {
      await ctx.cleanup();
    }
  });

  it("welcomes a client and relays notes", async () => {
    const ctx = await setupTestServer();
    try {
      const alice = await ctx.connect({ name: "Alice", device_id: "dev-a" });
      expect(alice.welcome).toEqual({
        kind: "welcome",
        session_id: expect.any(String),
        name: "Alice",
        device_id: "dev-a",
        admin: false,
        can_receive: true,
        requires_code: false,
        server: "LanShare",
      });
      const bob = await ctx.connect({ name: "Bob", device_id: "dev-b" });
      await alice.queue.waitForRoster(2);
      await bob.queue.waitForRoster(2);

      alice.ws.send(JSON.stringify({ kind: "note", text: "lunch?", to: [bob.sessionId] }));

      expect(await bob.queue.nextNonRoster()).toEqual({
        kind: "note",
        text: "lunch?",
        from: "Alice",
        session_id: alice.sessionId,
        device_id: "dev-a",
        to: [bob.sessionId],
        ts: expect.any(Number),
      });
    } finally {
      await ctx.cleanup();
    }
  });

  it("notifies only targeted devices of an upload, never the uploader", async () => {
    const ctx = await setupTestServer();
    try {
      const x = await ctx.connect({ name: "X", device_id: "dev-x" });
      const y = await ctx.connect({ name: "Y", device_id: "dev-y" });
      const u = await ctx.connect({ name: "Uma", device_id: "dev-u" });
      await Promise.all([x, y, u].map((client) => client.queue.waitForRoster(3)));

      const targeted = await upload(ctx.base, "report.txt", Buffer.from("data"), {
        name: "Uma",
        client_id: "dev-u",
        target_ids: "dev-x",
      });
      expect(targeted.status).toBe(200);
      await targeted.body?.cancel();

      expect(await x.queue.nextNonRoster()).toEqual({
        kind: "file",
        name: "report.txt",
        size: 4,
        from: "Uma",
        device_id: "dev-u",
        ts: expect.any(Number),
      });
      for (const client of [y, u]) {
        client.ws.send(JSON.stringify({ kind: "ping" }));
        expect(await client.queue.nextNonRoster()).toEqual({ kind: "pong" });
      }

      const broadcast = await upload(ctx.base, "all.txt", Buffer.from("everyone"), {
        client_id: "dev-u",
      });
      expect(broadcast.status).toBe(200);
      await broadcast.body?.cancel();

      for (const client of [x, y]) {
        expect(await client.queue.nextNonRoster()).toMatchObject({ kind: "file", name: "all.txt", size: 8 });
      }
      u.ws.send(JSON.stringify({ kind: "ping" }));
      expect(await u.queue.nextNonRoster()).toEqual({ kind: "pong" });
    } finally {
      await ctx.cleanup();
    }
  });

  it("skips devices that turned receiving off", async () => {
    const ctx = await setupTestServer();
    try {
      const x = await ctx.connect({ name: "X", device_id: "dev-x" });
      await x.queue.waitForRoster(1);
      x.ws.send(JSON.stringify({ kind: "mode", can_receive: false }));
      expect(await x.queue.next()).toMatchObject({
        kind: "clients",
        items: [expect.objectContaining({ can_receive: false })],
      });

      const res = await upload(ctx.base, "quiet.txt", Buffer.from("q"));
      expect(res.status).toBe(200);
      await res.body?.cancel();

      x.ws.send(JSON.stringify({ kind: "ping" }));
      expect(await x.queue.next()).toEqual({ kind: "pong" });
    } finally {
      await ctx.cleanup();
    }
  });

  it("lets the host kick a device", async () => {
    const ctx = await setupTestServer({ admin: true });
    try {
      const host = await ctx.connect({ name: "Desk" });
      const bob = await ctx.connect({ name: "Bob" });
      await host.queue.waitForRoster(2);

      host.ws.send(JSON.stringify({ kind: "kick", target: bob.sessionId }));

      await expect(bob.closed).resolves.toBe(4000);
      const roster = await host.queue.waitForRoster(1);
      expect(roster.items).toEqual([expect.objectContaining({ session_id: host.sessionId })]);
    } finally {
      await ctx.cleanup();
    }
  });

  it("keeps welcoming new devices while one peer stops reading", async () => {
    const ctx = await setupTestServer({ maxBufferedBytes: 64 * 1024 });
    try {
      const slow = await ctx.connect({ name: "Slow" });
      await slow.queue.waitForRoster(1);
      slow.ws.pause();

      const busy = await ctx.connect({ name: "Busy" });
      await busy.queue.waitForRoster(2);
      const text = "n".repeat(3900);
      for (let i = 0; i < 8000; i += 1) {
        busy.ws.send(JSON.stringify({ kind: "note", text }));
      }
      busy.ws.send(JSON.stringify({ kind: "ping" }));
      expect(await busy.queue.nextNonRoster()).toEqual({ kind: "pong" });

      const late = await ctx.connect({ name: "Late" });
      expect(late.welcome).toMatchObject({ kind: "welcome", name: "Late" });
      const roster = await late.queue.waitForRoster(2);
      expect(roster.items).toEqual([
        expect.objectContaining({ session_id: busy.sessionId }),
        expect.objectContaining({ session_id: late.sessionId }),
      ]);
    } finally {
      await ctx.cleanup();
    }
  }, 30_000);

  it("closes the connection on a malformed frame", async () => {
    const ctx = await setupTestServer();
    try {
      const alice = await ctx.connect({ name: "Alice" });
      await alice.queue.waitForRoster(1);

      alice.ws.send("{oops");

      expect(await alice.queue.next()).toEqual({
        kind: "error",
        code: "invalid_json",
        detail: "Malformed JSON",
      });
      await expect(alice.closed).resolves.toBe(1002);
    } finally {
      await ctx.cleanup();
    }
  });
});
