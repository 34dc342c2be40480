// src/ai.ts
// Provider-agnostic contract for the upstream text-generation call

import type { LlmProviderName } from "./config.js";
import type { ResponseSchema } from "./lesson/templates.js";

export type FinishReason = "STOP" | "LENGTH" | "SAFETY" | "RECITATION" | "OTHER" | "UNKNOWN";

export interface RawModelOutput {
  text: string;
  finishReason: FinishReason;
  /** Verbatim value the provider reported, for error messages. */
  providerFinishReason: string | null;
}

export interface SamplingConfig {
  temperature: number;
  maxOutputTokens: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  jsonMode: boolean;
  responseSchema?: ResponseSchema;
}

export type GatewayError =
  | { kind: "unauthenticated"; status: number; body: string }
  | { kind: "upstream"; status: number; body: string }
  | { kind: "timeout"; timeoutMs: number }
  | { kind: "aborted" }
  | { kind: "network"; message: string }
  | { kind: "malformed"; message: string };

export type GatewayResult = { ok: true; output: RawModelOutput } | { ok: false; error: GatewayError };

export interface GenerateRequest {
  systemInstruction: string;
  userMessage: string;
  sampling: SamplingConfig;
  /** Aborts the upstream call, typically on client disconnect. */
  signal?: AbortSignal;
}

export interface LlmGateway {
  readonly provider: LlmProviderName;
  readonly model: string;
  generate(request: GenerateRequest): Promise<GatewayResult>;
}

export class CredentialMissingError extends Error {
  constructor(public readonly variable: string) {
    super(`BLOCKED: ${variable} is REQUIRED`);
    this.name = "CredentialMissingError";
  }
}

export type FinishReasonTable = Readonly<Record<string, FinishReason>>;

export function mapFinishReason(table: FinishReasonTable, value: string | null | undefined): FinishReason {
  if (!value) return "UNKNOWN";
  return Object.hasOwn(table, value) ? table[value] : "UNKNOWN";
}

export type TextResponse = { ok: true; status: number; text: string } | { ok: false; error: GatewayError };

/**
 * POSTs JSON and reads the whole body under one deadline. The caller's signal
 * and the timeout both abort the same request; which one fired decides the
 * error kind.
 */
export async function postJsonWithTimeout(
  url: string,
  init: { headers: Record<string, string>; body: unknown },
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<TextResponse> {
  if (signal?.aborted) return { ok: false, error: { kind: "aborted" } };

  const ctrl = new AbortController();
  let timedOut = false;
  const t = setTimeout(() => {
    timedOut = true;
    ctrl.abort();
  }, timeoutMs);
  const onAbort = () => ctrl.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const resp = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...init.headers },
      body: JSON.stringify(init.body),
      signal: ctrl.signal,
    });
    const text = await resp.text();
    return { ok: true, status: resp.status, text };
  } catch (e) {
    if (timedOut) return { ok: false, error: { kind: "timeout", timeoutMs } };
    if (signal?.aborted) return { ok: false, error: { kind: "aborted" } };
    return { ok: false, error: { kind: "network", message: e instanceof Error ? e.message : String(e) } };
  } finally {
    clearTimeout(t);
    signal?.removeEventListener("abort", onAbort);
  }
}

/** Classifies a non-2xx transport answer. */
export function httpFailure(status: number, body: string): GatewayError {
  if (status === 401 || status === 403) return { kind: "unauthenticated", status, body };
  return { kind: "upstream", status, body };
}

export function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
