import { randomUUID } from "node:crypto";
import type { AccessControl } from "./access-control.js";
import type { HubSession, LanshareConfig, Logger, SessionTransport } from "./domain.js";
import { ProtocolError } from "./errors.js";
import {
  CLOSE_KICKED,
  CLOSE_POLICY_VIOLATION,
  CLOSE_PROTOCOL_ERROR,
  SERVER_NAME,
  nowSeconds,
  parseClientFrame,
  type ClientMessage,
  type HelloMessage,
  type KickMessage,
  type NoteMessage,
  type ServerEvent,
} from "./protocol.js";
import type { SerialQueue } from "./serial-queue.js";
import type { SessionRegistry } from "./session-registry.js";

export type ConnectionState = "connecting" | "handshaking" | "active" | "closed";

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS_REGEX = /[\u0000-\u001F\u007F]/g;
const MAX_DEVICE_ID_CHARS = 128;
const DEFAULT_NAME = "Guest";

export function sanitizeName(raw: string | undefined, maxChars: number): string {
  const stripped = (raw ?? "").replace(CONTROL_CHARS_REGEX, "").trim();
  if (!stripped) {
    return DEFAULT_NAME;
  }
  return Array.from(stripped).slice(0, maxChars).join("");
}

function sanitizeDeviceId(raw: string | undefined): string {
  const stripped = (raw ?? "").replace(CONTROL_CHARS_REGEX, "").trim();
  return stripped ? stripped.slice(0, MAX_DEVICE_ID_CHARS) : randomUUID();
}

export type ConnectionHandle = {
  readonly id: string;
  state(): ConnectionState;
  session(): HubSession | undefined;
  /** Queues one inbound frame; frames are handled strictly in arrival order. */
  receive(raw: string): Promise<void>;
  /** Called by the transport layer once the underlying socket is gone. */
  transportClosed(): Promise<void>;
};

export type ProtocolHandlerDeps = {
  registry: SessionRegistry;
  access: AccessControl;
  queue: SerialQueue;
  limits: LanshareConfig["sessions"];
  logger?: Logger;
};

export type ProtocolHandler = ReturnType<typeof createProtocolHandler>;

export function createProtocolHandler(deps: ProtocolHandlerDeps) {
  const { registry, access, queue, limits } = deps;
  const logger: Logger = deps.logger ?? console;

  /**
   * Wraps a freshly opened transport. `isAdmin` is decided by the transport
   * layer from the connection's origin and never changes afterwards.
   */
  function accept(transport: SessionTransport, origin: { isAdmin: boolean }): ConnectionHandle {
    const id = randomUUID();
    const lane = `connection:${id}`;
    let state: ConnectionState = "connecting";
    let session: HubSession | undefined;
    let transportGone = false;

    state = "handshaking";

    async function send(event: ServerEvent): Promise<void> {
      if (!transport.isOpen()) {
        return;
      }
      await transport.send(event);
    }

    async function terminate(code: number, reason: string) {
      if (state === "closed") {
        return;
      }
      state = "closed";
      transport.close(code, reason);
      if (session) {
        await registry.unregister(session.sessionId);
      }
    }

    async function reject(code: string, detail: string, closeCode: number) {
      await send({ kind: "error", code, detail }).catch(() => undefined);
      await terminate(closeCode, code);
    }

    async function handleHello(message: HelloMessage) {
      const decision = access.validateHandshake(message.code, transport.remoteAddress);
      if (!decision.ok) {
        logger.warn("[lanshare:ws] handshake_rejected", {
          connectionId: id,
          reason: decision.reason,
          remoteAddress: transport.remoteAddress,
        });
        await reject(decision.reason, decision.message, CLOSE_POLICY_VIOLATION);
        return;
      }
      const name = sanitizeName(message.name, limits.maxNameChars);
      const canReceive = message.can_receive ?? true;
      session = await registry.register(
        {
          deviceId: sanitizeDeviceId(message.device_id),
          name,
          canReceive,
          isAdmin: origin.isAdmin,
          transport,
        },
        async (registered) => {
          await send({
            kind: "welcome",
            session_id: registered.sessionId,
            name: registered.name,
            device_id: registered.deviceId,
            admin: registered.isAdmin,
            can_receive: registered.canReceive,
            requires_code: access.requiresCode(),
            server: SERVER_NAME,
          });
        },
      );
      state = "active";
    }

    async function handleNote(sender: HubSession, message: NoteMessage) {
      const text = Array.from(message.text).slice(0, limits.maxNoteChars).join("");
      const requested = Array.from(new Set(message.to ?? []));
      const recipients =
        requested.length === 0
          ? registry.list().filter((candidate) => candidate.sessionId !== sender.sessionId)
          : requested
              .filter((target) => target !== sender.sessionId)
              .map((target) => registry.get(target))
              .filter((candidate): candidate is HubSession => candidate !== undefined);
      await registry.deliverAll(recipients, {
        kind: "note",
        text,
        from: sender.name,
        session_id: sender.sessionId,
        device_id: sender.deviceId,
        ...(requested.length > 0 ? { to: recipients.map((r) => r.sessionId) } : {}),
        ts: nowSeconds(),
      });
    }

    async function handleKick(sender: HubSession, message: KickMessage) {
      if (!sender.isAdmin) {
        await send({ kind: "error", code: "forbidden", detail: "Only the host can remove devices" });
        return;
      }
      const decision = access.validateHandshake(message.code, transport.remoteAddress);
      if (!decision.ok) {
        await send({ kind: "error", code: decision.reason, detail: decision.message });
        return;
      }
      const target = registry.get(message.target);
      if (!target) {
        await send({ kind: "error", code: "not_found", detail: "Unknown session" });
        return;
      }
      logger.info("[lanshare:ws] session_kicked", {
        sessionId: target.sessionId,
        by: sender.sessionId,
      });
      target.transport.close(CLOSE_KICKED, "kicked");
      await registry.unregister(target.sessionId);
    }

    async function dispatch(active: HubSession, message: ClientMessage) {
      switch (message.kind) {
        case "note":
          await handleNote(active, message);
          return;
        case "mode":
          await registry.updateCapability(active.sessionId, message.can_receive);
          return;
        case "kick":
          await handleKick(active, message);
          return;
        case "ping":
          await send({ kind: "pong" });
          return;
        case "hello":
          throw new ProtocolError("invalid_message", "Already connected");
        default: {
          const unreachable: never = message;
          throw new ProtocolError("invalid_message", `Unknown kind ${String(unreachable)}`);
        }
      }
    }

    async function process(raw: string) {
      if (transportGone || state === "closed" || !transport.isOpen()) {
        return;
      }
      if (Buffer.byteLength(raw, "utf8") > limits.maxMessageBytes) {
        throw new ProtocolError("payload_too_large", "Message too large");
      }
      const frame = parseClientFrame(raw);
      if (!frame.ok) {
        throw new ProtocolError(frame.code, frame.detail);
      }
      if (state === "handshaking") {
        if (frame.message.kind !== "hello") {
          throw new ProtocolError("invalid_message", "Expected hello");
        }
        await handleHello(frame.message);
        return;
      }
      if (!session) {
        throw new ProtocolError("invalid_message", "No session");
      }
      await dispatch(session, frame.message);
    }

    function receive(raw: string): Promise<void> {
      return queue.run(lane, async () => {
        try {
          await process(raw);
        } catch (err) {
          if (err instanceof ProtocolError) {
            logger.warn("[lanshare:ws] protocol_error", {
              connectionId: id,
              code: err.code,
              message: err.message,
            });
            await reject(err.code, err.message, CLOSE_PROTOCOL_ERROR);
            return;
          }
          logger.error("[lanshare:ws] message_failed", err);
          await terminate(1011, "server_error");
        }
      });
    }

    function transportClosed(): Promise<void> {
      transportGone = true;
      return queue.run(lane, async () => {
        state = "closed";
        if (session) {
          await registry.unregister(session.sessionId);
        }
      });
    }

    return {
      id,
      state: () => state,
      session: () => session,
      receive,
      transportClosed,
    };
  }

  return { accept };
}
