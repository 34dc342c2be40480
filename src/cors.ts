// src/cors.ts
// Single-origin CORS: the paired front-end is the only allowed caller

import type { IncomingMessage } from "node:http";

export const ALLOWED_METHODS = "GET, POST, OPTIONS";
export const ALLOWED_HEADERS = "Content-Type, Authorization, X-Request-Id";

/**
 * Standard CORS + security headers for every response. The allowed origin is
 * always the configured one, never an echo and never "*".
 */
export function stdHeaders(allowedOrigin: string, extra?: Record<string, string>): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": allowedOrigin,
    "Access-Control-Allow-Methods": ALLOWED_METHODS,
    "Access-Control-Allow-Headers": ALLOWED_HEADERS,
    "Access-Control-Expose-Headers": "X-Request-Id",
    Vary: "Origin",
    "X-Content-Type-Options": "nosniff",
    ...(extra || {}),
  };
}

/** Requests without an Origin header (curl, server-to-server) are not browser CORS calls. */
export function isOriginAllowed(req: IncomingMessage, allowedOrigin: string): boolean {
  const origin = req.headers.origin;
  if (!origin) return true;
  return origin.replace(/\/+$/, "") === allowedOrigin;
}
