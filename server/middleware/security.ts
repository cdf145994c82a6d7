/**
 * Security Middleware
 *
 * Response headers and an Origin check for state-changing requests.
 */

import type { Response, NextFunction } from "express";
import { ValidationError } from "../utils/errorHandler";

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export function getAllowedOrigins(): string[] {
  return (process.env.ALLOWED_ORIGINS ?? "")
    .split(",")
    .map(entry => entry.trim())
    .filter(Boolean);
}

export interface OriginCheckedRequest {
  method: string;
  get(name: string): string | undefined;
}

/**
 * Rejects POST/PUT/PATCH/DELETE whose Origin (or Referer) names neither the
 * request host nor a host listed in ALLOWED_ORIGINS. Requests that carry
 * neither header pass.
 */
export function validateOrigin(req: OriginCheckedRequest, _res: unknown, next: NextFunction): void {
  if (SAFE_METHODS.has(req.method)) {
    next();
    return;
  }

  const origin = req.get("Origin") || req.get("Referer");
  if (!origin) {
    next();
    return;
  }

  const host = req.get("Host");
  let originUrl: URL;
  try {
    originUrl = new URL(origin);
  } catch {
    console.warn(`[Security] Malformed origin: ${origin}`);
    next(new ValidationError("Invalid request origin"));
    return;
  }

  const allowed = getAllowedOrigins();
  const isValid =
    originUrl.host === host ||
    allowed.some(entry => entry === originUrl.origin || entry === originUrl.host || entry === originUrl.hostname);

  if (!isValid) {
    console.warn(`[Security] Invalid origin: ${origin} for host: ${host}`);
    next(new ValidationError("Invalid request origin"));
    return;
  }

  next();
}

export function addSecurityHeaders(_req: unknown, res: Pick<Response, "setHeader">, next: NextFunction): void {
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");

  const csp = [
    "default-src 'self'",
    "script-src 'self' 'unsafe-inline'",
    "style-src 'self' 'unsafe-inline'",
    "img-src 'self' data:",
    "connect-src 'self'",
  ].join("; ");
  res.setHeader("Content-Security-Policy", csp);

  next();
}
