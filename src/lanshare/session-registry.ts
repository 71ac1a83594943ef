import { randomUUID } from "node:crypto";
import type { HubSession, Logger, RosterEntry, SessionTransport } from "./domain.js";
import type { ServerEvent } from "./protocol.js";
import type { SerialQueue } from "./serial-queue.js";

const REGISTRY_LANE = "registry";
const CLOSE_SEND_FAILED = 1011;

export type RegisterInput = {
  deviceId: string;
  name: string;
  canReceive: boolean;
  isAdmin: boolean;
  transport: SessionTransport;
};

export type SessionRegistry = ReturnType<typeof createSessionRegistry>;

/**
 * Owns the live session set. Every mutation runs on a single lane together
 * with its roster broadcast, so a broadcast is fully delivered before the
 * next mutation starts and always reflects exactly the live set.
 */
export function createSessionRegistry(params: { queue: SerialQueue; logger?: Logger }) {
  const { queue } = params;
  const logger: Logger = params.logger ?? console;
  const sessions = new Map<string, HubSession>();

  function toRosterEntry(session: HubSession): RosterEntry {
    return {
      session_id: session.sessionId,
      device_id: session.deviceId,
      name: session.name,
      can_receive: session.canReceive,
      admin: session.isAdmin,
    };
  }

  function snapshot(): RosterEntry[] {
    return Array.from(sessions.values(), toRosterEntry);
  }

  /** Sends one event; a failed send closes that transport and reports false. */
  async function deliver(session: HubSession, event: ServerEvent): Promise<boolean> {
    if (!session.transport.isOpen()) {
      return false;
    }
    try {
      await session.transport.send(event);
      return true;
    } catch (err) {
      logger.warn("[lanshare:ws] send_failed", {
        sessionId: session.sessionId,
        kind: event.kind,
        error: err instanceof Error ? err.message : String(err),
      });
      session.transport.close(CLOSE_SEND_FAILED, "send failed");
      return false;
    }
  }

  async function deliverAll(targets: Iterable<HubSession>, event: ServerEvent): Promise<number> {
    const results = await Promise.all(Array.from(targets, (session) => deliver(session, event)));
    return results.filter(Boolean).length;
  }

  async function broadcastRoster(): Promise<void> {
    await deliverAll(sessions.values(), { kind: "clients", items: snapshot() });
  }

  /**
   * Adds a session with a fresh id. `onRegistered` runs inside the same step,
   * before the roster goes out, so the new session can be greeted first.
   */
  function register(
    input: RegisterInput,
    onRegistered?: (session: HubSession) => Promise<void> | void,
  ): Promise<HubSession> {
    return queue.run(REGISTRY_LANE, async () => {
      let sessionId = randomUUID();
      while (sessions.has(sessionId)) {
        sessionId = randomUUID();
      }
      const session: HubSession = { sessionId, ...input };
      sessions.set(sessionId, session);
      logger.info?.("[lanshare:ws] session_registered", {
        sessionId,
        deviceId: session.deviceId,
        admin: session.isAdmin,
      });
      try {
        await onRegistered?.(session);
      } catch (err) {
        sessions.delete(sessionId);
        throw err;
      }
      await broadcastRoster();
      return session;
    });
  }

  /** Idempotent; resolves to whether a session was actually removed. */
  function unregister(sessionId: string): Promise<boolean> {
    return queue.run(REGISTRY_LANE, async () => {
      if (!sessions.delete(sessionId)) {
        return false;
      }
      logger.info("[lanshare:ws] session_unregistered", { sessionId });
      await broadcastRoster();
      return true;
    });
  }

  function updateCapability(sessionId: string, canReceive: boolean): Promise<boolean> {
    return queue.run(REGISTRY_LANE, async () => {
      const session = sessions.get(sessionId);
      if (!session) {
        return false;
      }
      session.canReceive = canReceive;
      await broadcastRoster();
      return true;
    });
  }

  function get(sessionId: string): HubSession | undefined {
    return sessions.get(sessionId);
  }

  function list(): HubSession[] {
    return Array.from(sessions.values());
  }

  /**
   * Receive-capable sessions of the given devices (or of every device when
   * the list is empty), minus any session of `excludeDeviceId`.
   */
  function resolveReceivers(deviceIds: string[], excludeDeviceId?: string): HubSession[] {
    const wanted = new Set(deviceIds);
    return list().filter(
      (session) =>
        session.canReceive &&
        session.deviceId !== excludeDeviceId &&
        (wanted.size === 0 || wanted.has(session.deviceId)),
    );
  }

  return {
    register,
    unregister,
    updateCapability,
    get,
    list,
    snapshot,
    resolveReceivers,
    deliver,
    deliverAll,
  };
}
