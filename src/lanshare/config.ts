import os from "node:os";
import path from "node:path";
import type { LanshareConfig, LanshareConfigInput } from "./domain.js";
import { LanshareConfigSchema } from "./config-schema.js";

const defaultSaveDir = path.join(os.homedir(), "Downloads", "LanShare");

const DEFAULTS: LanshareConfig = {
  port: 8000,
  network: {
    bindAddress: "0.0.0.0",
    trustedAddresses: [],
    trustLocalInterfaces: true,
  },
  storage: {
    saveDir: defaultSaveDir,
    maxUploadBytes: 2 * 1024 * 1024 * 1024,
  },
  auth: {
    accessCode: "",
    maxFailedAttemptsPerMinute: 10,
  },
  sessions: {
    maxNameChars: 40,
    maxNoteChars: 4000,
    maxMessageBytes: 65_536,
    maxBufferedBytes: 4 * 1024 * 1024,
  },
};

export function expandUserPath(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function resolvePathValue(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  const raw = trimmed && trimmed.length > 0 ? trimmed : fallback;
  const expanded = expandUserPath(raw);
  return path.isAbsolute(expanded) ? expanded : path.resolve(expanded);
}

export class ConfigError extends Error {}

export function resolveLanshareConfig(input: LanshareConfigInput = {}): LanshareConfig {
  const parsed = LanshareConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid lanshare config: ${issues}`);
  }
  const { network, storage, auth, sessions } = parsed.data;
  return {
    port: parsed.data.port ?? DEFAULTS.port,
    network: {
      bindAddress: network?.bindAddress ?? DEFAULTS.network.bindAddress,
      trustedAddresses: [...(network?.trustedAddresses ?? DEFAULTS.network.trustedAddresses)],
      trustLocalInterfaces: network?.trustLocalInterfaces ?? DEFAULTS.network.trustLocalInterfaces,
    },
    storage: {
      saveDir: resolvePathValue(storage?.saveDir, defaultSaveDir),
      maxUploadBytes: storage?.maxUploadBytes ?? DEFAULTS.storage.maxUploadBytes,
    },
    auth: {
      accessCode: (auth?.accessCode ?? DEFAULTS.auth.accessCode).trim(),
      maxFailedAttemptsPerMinute:
        auth?.maxFailedAttemptsPerMinute ?? DEFAULTS.auth.maxFailedAttemptsPerMinute,
    },
    sessions: {
      maxNameChars: sessions?.maxNameChars ?? DEFAULTS.sessions.maxNameChars,
      maxNoteChars: sessions?.maxNoteChars ?? DEFAULTS.sessions.maxNoteChars,
      maxMessageBytes: sessions?.maxMessageBytes ?? DEFAULTS.sessions.maxMessageBytes,
      maxBufferedBytes: sessions?.maxBufferedBytes ?? DEFAULTS.sessions.maxBufferedBytes,
    },
  };
}
