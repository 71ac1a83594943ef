export type Logger = Pick<typeof console, "info" | "warn" | "error">;

export interface LanshareConfig {
  port: number;
  network: {
    bindAddress: string;
    /** Extra remote addresses treated as the host machine (admin origin). */
    trustedAddresses: string[];
    /** Treat addresses bound to this machine's own interfaces as admin origins. */
    trustLocalInterfaces: boolean;
  };
  storage: {
    saveDir: string;
    maxUploadBytes: number;
  };
  auth: {
    /** Empty string means open access. */
    accessCode: string;
    maxFailedAttemptsPerMinute: number;
  };
  sessions: {
    maxNameChars: number;
    maxNoteChars: number;
    maxMessageBytes: number;
    /** Outbound bytes a peer may leave unread before it is disconnected. */
    maxBufferedBytes: number;
  };
}

/** One live connection. Created on accepted handshake, gone on close or kick. */
export type HubSession = {
  sessionId: string;
  deviceId: string;
  name: string;
  canReceive: boolean;
  isAdmin: boolean;
  transport: SessionTransport;
};

export type RosterEntry = {
  session_id: string;
  device_id: string;
  name: string;
  can_receive: boolean;
  admin: boolean;
};

export interface SessionTransport {
  readonly remoteAddress: string;
  isOpen(): boolean;
  send(payload: unknown): Promise<void>;
  close(code: number, reason?: string): void;
}

export type StoredFileSummary = {
  name: string;
  size: number;
  mtime: number;
  from?: string;
};

export type UploadResult = {
  name: string;
  size: number;
};

export type HubSettings = {
  save_dir: string;
  requires_code: boolean;
};

export type FolderPicker = () => Promise<string | null>;

export interface ServerOptions {
  config?: LanshareConfigInput;
  logger?: Logger;
  /** Host-side folder chooser used by `POST /settings/save-dialog`. */
  pickFolder?: FolderPicker;
  /** Overrides origin trust; decides admin status from the remote address. */
  isTrustedOrigin?: (remoteAddress: string) => boolean;
}

export interface HubServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
  getSettings(): HubSettings;
}

export type LanshareConfigInput = {
  port?: number;
  network?: Partial<LanshareConfig["network"]>;
  storage?: Partial<LanshareConfig["storage"]>;
  auth?: Partial<LanshareConfig["auth"]>;
  sessions?: Partial<LanshareConfig["sessions"]>;
};
