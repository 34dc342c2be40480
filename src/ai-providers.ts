/**
 * Upstream LLM providers
 *
 * Each provider owns its endpoint, its request body and its finish-reason
 * vocabulary. The tables below are the only place a provider's stop reasons
 * are interpreted.
 */

import { z } from "zod";
import type { AppConfig, LlmProviderName } from "./config.js";
import {
  CredentialMissingError,
  httpFailure,
  mapFinishReason,
  postJsonWithTimeout,
  safeJsonParse,
  type FinishReasonTable,
  type GatewayResult,
  type GenerateRequest,
  type LlmGateway,
} from "./ai.js";

export interface ProviderOptions {
  apiKey: string;
  apiKeyVar: string;
  model: string;
  timeoutMs: number;
}

// ============================================================
// OPENROUTER (OpenAI-compatible chat completions)
// ============================================================

export const OPENROUTER_URL = "https://openrouter.ai/api/v1/chat/completions";

export const OPENROUTER_FINISH_REASONS: FinishReasonTable = {
  stop: "STOP",
  length: "LENGTH",
  content_filter: "SAFETY",
  tool_calls: "OTHER",
  function_call: "OTHER",
  error: "OTHER",
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .nullish(),
  error: z.object({ message: z.string().optional(), code: z.union([z.number(), z.string()]).optional() }).nullish(),
});

export class OpenRouterGateway implements LlmGateway {
  readonly provider = "openrouter" as const;
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(opts: ProviderOptions) {
    if (!opts.apiKey.trim()) throw new CredentialMissingError(opts.apiKeyVar);
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs;
  }

  async generate({ systemInstruction, userMessage, sampling, signal }: GenerateRequest): Promise<GatewayResult> {
    const res = await postJsonWithTimeout(
      OPENROUTER_URL,
      {
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: {
          model: this.model,
          messages: [
            { role: "system", content: systemInstruction },
            { role: "user", content: userMessage },
          ],
          temperature: sampling.temperature,
          max_tokens: sampling.maxOutputTokens,
          top_p: sampling.topP,
          frequency_penalty: sampling.frequencyPenalty,
          presence_penalty: sampling.presencePenalty,
          ...(sampling.jsonMode ? { response_format: { type: "json_object" } } : {}),
        },
      },
      this.timeoutMs,
      signal,
    );
    if (!res.ok) return res;
    if (res.status < 200 || res.status >= 300) return { ok: false, error: httpFailure(res.status, res.text) };

    const parsed = ChatCompletionSchema.safeParse(safeJsonParse(res.text));
    if (!parsed.success) {
      return { ok: false, error: { kind: "malformed", message: "Unexpected chat completion payload" } };
    }

    const data = parsed.data;
    const choice = data.choices?.[0];
    // OpenRouter reports some upstream failures inside a 200 envelope.
    if (!choice && data.error) {
      const status = typeof data.error.code === "number" ? data.error.code : 502;
      return { ok: false, error: httpFailure(status, data.error.message || res.text) };
    }

    const providerFinishReason = choice?.finish_reason ?? null;
    return {
      ok: true,
      output: {
        text: (choice?.message?.content ?? "").trim(),
        finishReason: mapFinishReason(OPENROUTER_FINISH_REASONS, providerFinishReason),
        providerFinishReason,
      },
    };
  }
}

// ============================================================
// GEMINI (generateContent)
// ============================================================

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";

export const GEMINI_FINISH_REASONS: FinishReasonTable = {
  STOP: "STOP",
  MAX_TOKENS: "LENGTH",
  SAFETY: "SAFETY",
  BLOCKLIST: "SAFETY",
  PROHIBITED_CONTENT: "SAFETY",
  SPII: "SAFETY",
  IMAGE_SAFETY: "SAFETY",
  RECITATION: "RECITATION",
  LANGUAGE: "OTHER",
  OTHER: "OTHER",
  MALFORMED_FUNCTION_CALL: "OTHER",
  FINISH_REASON_UNSPECIFIED: "UNKNOWN",
};

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).nullish() }).nullish(),
        finishReason: z.string().nullish(),
      }),
    )
    .nullish(),
  promptFeedback: z.object({ blockReason: z.string().nullish() }).nullish(),
});

export class GeminiGateway implements LlmGateway {
  readonly provider = "gemini" as const;
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(opts: ProviderOptions) {
    if (!opts.apiKey.trim()) throw new CredentialMissingError(opts.apiKeyVar);
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs;
  }

  async generate({ systemInstruction, userMessage, sampling, signal }: GenerateRequest): Promise<GatewayResult> {
    const url = `${GEMINI_BASE_URL}/${encodeURIComponent(this.model)}:generateContent`;
    const res = await postJsonWithTimeout(
      url,
      {
        headers: { "x-goog-api-key": this.apiKey },
        body: {
          systemInstruction: { parts: [{ text: systemInstruction }] },
          contents: [{ role: "user", parts: [{ text: userMessage }] }],
          generationConfig: {
            temperature: sampling.temperature,
            maxOutputTokens: sampling.maxOutputTokens,
            topP: sampling.topP,
            ...(sampling.jsonMode ? { responseMimeType: "application/json" } : {}),
            ...(sampling.jsonMode && sampling.responseSchema ? { responseSchema: sampling.responseSchema } : {}),
          },
        },
      },
      this.timeoutMs,
      signal,
    );
    if (!res.ok) return res;
    if (res.status < 200 || res.status >= 300) return { ok: false, error: httpFailure(res.status, res.text) };

    const parsed = GenerateContentSchema.safeParse(safeJsonParse(res.text));
    if (!parsed.success) {
      return { ok: false, error: { kind: "malformed", message: "Unexpected generateContent payload" } };
    }

    const candidate = parsed.data.candidates?.[0];
    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (!candidate && blockReason) {
      // The prompt itself was rejected; there is no candidate to read.
      return { ok: true, output: { text: "", finishReason: "SAFETY", providerFinishReason: blockReason } };
    }

    const text = (candidate?.content?.parts ?? [])
      .map((p) => p.text ?? "")
      .join("")
      .trim();
    const providerFinishReason = candidate?.finishReason ?? null;
    return {
      ok: true,
      output: { text, finishReason: mapFinishReason(GEMINI_FINISH_REASONS, providerFinishReason), providerFinishReason },
    };
  }
}

// ============================================================
// SELECTION
// ============================================================

const PROVIDERS: Record<LlmProviderName, new (opts: ProviderOptions) => LlmGateway> = {
  openrouter: OpenRouterGateway,
  gemini: GeminiGateway,
};

/** Throws `CredentialMissingError` when the configured provider has no key. */
export function createGateway(config: AppConfig): LlmGateway {
  const Provider = PROVIDERS[config.provider];
  return new Provider({
    apiKey: config.apiKey,
    apiKeyVar: config.apiKeyVar,
    model: config.model,
    timeoutMs: config.timeoutMs,
  });
}
