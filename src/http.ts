import type { IncomingMessage, ServerResponse } from "node:http";
import { generateRequestId } from "./log.js";

export class BodyTooLargeError extends Error {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

export class InvalidJsonBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidJsonBodyError";
  }
}

export type ReadBodyResult = { empty: true } | { empty: false; value: unknown };

/**
 * Reads and parses a JSON body, refusing anything over `limit` bytes.
 */
export function readBody(req: IncomingMessage, limit: number): Promise<ReadBodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let done = false;

    req.on("data", (chunk: Buffer) => {
      if (done) return;
      size += chunk.length;
      if (size > limit) {
        done = true;
        reject(new BodyTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (done) return;
      done = true;
      const data = Buffer.concat(chunks).toString("utf8");
      if (!data.trim()) return resolve({ empty: true });
      try {
        resolve({ empty: false, value: JSON.parse(data) });
      } catch (err) {
        reject(new InvalidJsonBodyError(err instanceof Error ? err.message : String(err)));
      }
    });
    req.on("error", (err) => {
      if (done) return;
      done = true;
      reject(err);
    });
  });
}

export function send(
  res: ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): void {
  if (res.writableEnded || res.destroyed) return;
  res.writeHead(status, { ...headers, "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function getRequestId(req: IncomingMessage): string {
  const header = req.headers["x-request-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() ? value.trim() : generateRequestId();
}
