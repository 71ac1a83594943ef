import os from "node:os";

const LOOPBACK_ADDRESSES = new Set(["127.0.0.1", "::1", "localhost"]);

/** Strips the IPv4-mapped IPv6 prefix Node reports for dual-stack sockets. */
export function normalizeAddress(address: string | undefined): string {
  if (!address) {
    return "";
  }
  return address.startsWith("::ffff:") ? address.slice("::ffff:".length) : address;
}

export function isLoopback(address: string): boolean {
  const normalized = normalizeAddress(address);
  return LOOPBACK_ADDRESSES.has(normalized) || normalized.startsWith("127.");
}

function scorePrivateAddress(ip: string): number {
  if (ip.startsWith("192.168.")) {
    return 3;
  }
  if (ip.startsWith("10.")) {
    return 2;
  }
  if (ip.startsWith("172.")) {
    const second = Number(ip.split(".")[1]);
    if (second >= 16 && second <= 31) {
      return 1;
    }
  }
  return 0;
}

type InterfaceMap = ReturnType<typeof os.networkInterfaces>;

export function listLocalAddresses(interfaces: InterfaceMap = os.networkInterfaces()): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      addresses.push(normalizeAddress(entry.address));
    }
  }
  return addresses;
}

/** Best private IPv4 address of this machine, falling back to loopback. */
export function getLanAddress(interfaces: InterfaceMap = os.networkInterfaces()): string {
  let best: { ip: string; score: number } | null = null;
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family !== "IPv4" || entry.internal) {
        continue;
      }
      const ip = entry.address;
      if (ip.startsWith("169.254.") || ip.startsWith("100.64.")) {
        continue;
      }
      const score = scorePrivateAddress(ip);
      if (score === 0) {
        continue;
      }
      if (!best || score > best.score) {
        best = { ip, score };
      }
    }
  }
  return best?.ip ?? "127.0.0.1";
}
