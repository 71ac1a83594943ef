import { z } from "zod";
import type { HubSettings, RosterEntry } from "./domain.js";

export const PROTOCOL_VERSION = 1;
export const SERVER_NAME = "LanShare";

export const CLOSE_PROTOCOL_ERROR = 1002;
export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_KICKED = 4000;

const HelloMessageSchema = z.object({
  kind: z.literal("hello"),
  name: z.string().optional(),
  code: z.string().optional(),
  device_id: z.string().optional(),
  can_receive: z.boolean().optional(),
});

const NoteMessageSchema = z.object({
  kind: z.literal("note"),
  text: z.string(),
  to: z.array(z.string()).optional(),
});

const ModeMessageSchema = z.object({
  kind: z.literal("mode"),
  can_receive: z.boolean(),
});

const KickMessageSchema = z.object({
  kind: z.literal("kick"),
  target: z.string().min(1),
  code: z.string().optional(),
});

const PingMessageSchema = z.object({
  kind: z.literal("ping"),
});

export const ClientMessageSchema = z.discriminatedUnion("kind", [
  HelloMessageSchema,
  NoteMessageSchema,
  ModeMessageSchema,
  KickMessageSchema,
  PingMessageSchema,
]);

export type HelloMessage = z.infer<typeof HelloMessageSchema>;
export type NoteMessage = z.infer<typeof NoteMessageSchema>;
export type ModeMessage = z.infer<typeof ModeMessageSchema>;
export type KickMessage = z.infer<typeof KickMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type WelcomeEvent = {
  kind: "welcome";
  session_id: string;
  name: string;
  device_id: string;
  admin: boolean;
  can_receive: boolean;
  requires_code: boolean;
  server: string;
};

export type ErrorEvent = { kind: "error"; code: string; detail: string };

export type ClientsEvent = { kind: "clients"; items: RosterEntry[] };

export type NoteEvent = {
  kind: "note";
  text: string;
  from: string;
  session_id: string;
  device_id: string;
  to?: string[];
  ts: number;
};

export type FileEvent = {
  kind: "file";
  name: string;
  size: number;
  from?: string;
  device_id?: string;
  ts: number;
};

export type SettingsEvent = { kind: "settings" } & HubSettings;

export type PongEvent = { kind: "pong" };

export type ServerEvent =
  | WelcomeEvent
  | ErrorEvent
  | ClientsEvent
  | NoteEvent
  | FileEvent
  | SettingsEvent
  | PongEvent;

export type ParsedFrame =
  | { ok: true; message: ClientMessage }
  | { ok: false; code: "invalid_json" | "invalid_message"; detail: string };

export function parseClientFrame(raw: string): ParsedFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, code: "invalid_json", detail: "Malformed JSON" };
  }
  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, code: "invalid_message", detail: `${where}${issue?.message ?? "Invalid message"}` };
  }
  return { ok: true, message: parsed.data };
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
