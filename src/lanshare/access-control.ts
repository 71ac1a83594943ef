import type http from "node:http";
import { timingSafeEqual } from "node:crypto";
import { FailedAttemptLimiter } from "./attempt-limiter.js";
import { AuthError, AuthorizationError, RateLimitedError } from "./errors.js";
import { isLoopback, listLocalAddresses, normalizeAddress } from "./network.js";

export const CODE_HEADER = "x-lanshare-code";
export const CLIENT_HEADER = "x-lanshare-client";

export type AccessDecision =
  | { ok: true }
  | { ok: false; reason: "unauthorized" | "rate_limited"; message: string };

function timingSafeStringEqual(a: string, b: string): boolean {
  const bufA = Buffer.from(a);
  const bufB = Buffer.from(b);
  if (bufA.length !== bufB.length) {
    return false;
  }
  return timingSafeEqual(bufA, bufB);
}

/** An empty configured code means open access. */
export function codeMatches(supplied: string | undefined | null, configured: string): boolean {
  if (!configured) {
    return true;
  }
  if (typeof supplied !== "string") {
    return false;
  }
  return timingSafeStringEqual(supplied.trim(), configured);
}

export type AccessControl = ReturnType<typeof createAccessControl>;

/**
 * Code checks for handshakes and gated operations, plus origin trust.
 * The access code never grants admin: admin comes from where the
 * connection originates, decided once when the transport is accepted.
 */
export function createAccessControl(params: {
  getAccessCode: () => string;
  maxFailedAttemptsPerMinute: number;
  trustedAddresses?: string[];
  trustLocalInterfaces?: boolean;
  isTrustedOrigin?: (remoteAddress: string) => boolean;
}) {
  const limiter = new FailedAttemptLimiter(params.maxFailedAttemptsPerMinute, 60_000);
  const trusted = new Set((params.trustedAddresses ?? []).map((address) => normalizeAddress(address)));

  function check(code: string | undefined | null, remoteAddress: string): AccessDecision {
    const configured = params.getAccessCode();
    if (!configured) {
      return { ok: true };
    }
    // The host itself is never locked out.
    const limited = !isAdminOrigin(remoteAddress);
    const key = normalizeAddress(remoteAddress);
    if (limited && limiter.isBlocked(key)) {
      return { ok: false, reason: "rate_limited", message: "Too many failed attempts" };
    }
    if (!codeMatches(code, configured)) {
      // Only a wrong guess counts; a request without any code is not an attempt.
      if (limited && typeof code === "string" && code.trim().length > 0) {
        limiter.recordFailure(key);
      }
      return { ok: false, reason: "unauthorized", message: "Invalid access code" };
    }
    if (limited) {
      limiter.clear(key);
    }
    return { ok: true };
  }

  function validateHandshake(code: string | undefined, remoteAddress: string): AccessDecision {
    return check(code, remoteAddress);
  }

  /** Throws the matching HTTP error when a gated operation is not allowed. */
  function validateOperation(code: string | undefined | null, remoteAddress: string): void {
    const decision = check(code, remoteAddress);
    if (decision.ok) {
      return;
    }
    if (decision.reason === "rate_limited") {
      throw new RateLimitedError(decision.message);
    }
    throw new AuthError(decision.message);
  }

  function requireAdmin(isAdmin: boolean, message?: string): void {
    if (!isAdmin) {
      throw new AuthorizationError(message);
    }
  }

  function isAdminOrigin(remoteAddress: string): boolean {
    if (params.isTrustedOrigin) {
      return params.isTrustedOrigin(remoteAddress);
    }
    const address = normalizeAddress(remoteAddress);
    if (!address) {
      return false;
    }
    if (isLoopback(address) || trusted.has(address)) {
      return true;
    }
    return params.trustLocalInterfaces === true && listLocalAddresses().includes(address);
  }

  return {
    requiresCode: () => params.getAccessCode().length > 0,
    validateHandshake,
    validateOperation,
    requireAdmin,
    isAdminOrigin,
  };
}

type HeaderSource = Pick<http.IncomingMessage, "headers">;

function headerValue(req: HeaderSource, name: string): string | undefined {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() ? value.trim() : undefined;
}

/** Code from an explicit field first, then the header, then the query string. */
export function readSuppliedCode(
  req: HeaderSource,
  url: URL,
  explicit?: string,
): string | undefined {
  if (explicit?.trim()) {
    return explicit.trim();
  }
  return headerValue(req, CODE_HEADER) ?? url.searchParams.get("code") ?? undefined;
}

export function readClientId(
  req: HeaderSource,
  url: URL,
  explicit?: string,
): string | undefined {
  if (explicit?.trim()) {
    return explicit.trim();
  }
  const fromQuery = url.searchParams.get("client_id")?.trim();
  return headerValue(req, CLIENT_HEADER) ?? (fromQuery ? fromQuery : undefined);
}
