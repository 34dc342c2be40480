import type { GatewayError, LlmGateway, SamplingConfig } from "../ai.js";
import type { SamplingDefaults } from "../config.js";
import { Errors, type ApiError, type ErrorBody } from "../error.js";
import { BodyTooLargeError, InvalidJsonBodyError, type ReadBodyResult } from "../http.js";
import { normalize, type LessonPlanResult, type NormalizationError } from "../lesson/normalize.js";
import { buildPrompt } from "../lesson/prompt.js";
import type { LessonTemplate } from "../lesson/templates.js";
import type { Logger } from "../log.js";
import { parseLessonRequest } from "../validators.js";

export interface GenerateDeps {
  /** Null when the process was started without a provider credential. */
  gateway: LlmGateway | null;
  template: LessonTemplate;
  sampling: SamplingDefaults;
  rawLogMaxChars: number;
  logger: Logger;
}

export interface GenerateContext {
  requestId: string;
  signal?: AbortSignal;
}

export type ClientErrorReason = "missing_payload" | "invalid_json_body" | "payload_too_large" | "invalid_fields";

export type GatewayFailureReason = GatewayError | { kind: "credential_missing" };

export type GenerateOutcome =
  | { kind: "success"; plan: LessonPlanResult }
  | { kind: "client_error"; reason: ClientErrorReason; details: string; limit?: number }
  | { kind: "gateway_failure"; error: GatewayFailureReason }
  | { kind: "normalization_failure"; error: NormalizationError };

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function samplingFor(template: LessonTemplate, defaults: SamplingDefaults): SamplingConfig {
  return {
    ...defaults,
    jsonMode: template.jsonMode,
    responseSchema: template.responseSchema,
  };
}

function truncateForLog(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…[+${text.length - max} chars]` : text;
}

/**
 * Runs one lesson-plan request: credential check, body validation, prompt
 * build, the single upstream call, then normalization. The first failure ends
 * the request.
 */
export async function handleGenerate(
  readPayload: () => Promise<ReadBodyResult>,
  deps: GenerateDeps,
  ctx: GenerateContext,
): Promise<GenerateOutcome> {
  const { gateway, template, logger } = deps;
  if (!gateway) return { kind: "gateway_failure", error: { kind: "credential_missing" } };

  let payload: ReadBodyResult;
  try {
    payload = await readPayload();
  } catch (e) {
    if (e instanceof BodyTooLargeError) {
      return { kind: "client_error", reason: "payload_too_large", details: e.message, limit: e.limit };
    }
    if (e instanceof InvalidJsonBodyError) {
      return { kind: "client_error", reason: "invalid_json_body", details: e.message };
    }
    throw e;
  }

  if (payload.empty || !isRecord(payload.value) || Object.keys(payload.value).length === 0) {
    return { kind: "client_error", reason: "missing_payload", details: "Request body must be a non-empty JSON object" };
  }

  const parsed = parseLessonRequest(payload.value);
  if (!parsed.ok) return { kind: "client_error", reason: "invalid_fields", details: parsed.details };

  const prompt = buildPrompt(parsed.request, template);
  const result = await gateway.generate({
    systemInstruction: prompt.systemInstruction,
    userMessage: prompt.userMessage,
    sampling: samplingFor(template, deps.sampling),
    signal: ctx.signal,
  });

  if (!result.ok) {
    logger.warn("LLM gateway call failed", { requestId: ctx.requestId, provider: gateway.provider, error: result.error });
    return { kind: "gateway_failure", error: result.error };
  }

  const { output } = result;
  logger.info("Raw model output", {
    requestId: ctx.requestId,
    provider: gateway.provider,
    model: gateway.model,
    template: template.id,
    finishReason: output.finishReason,
    providerFinishReason: output.providerFinishReason,
    chars: output.text.length,
    text: truncateForLog(output.text, deps.rawLogMaxChars),
  });

  const normalized = normalize(output, template);
  if (!normalized.ok) return { kind: "normalization_failure", error: normalized.error };
  return { kind: "success", plan: normalized.plan };
}

function clientErrorToApi(outcome: Extract<GenerateOutcome, { kind: "client_error" }>): ApiError {
  switch (outcome.reason) {
    case "missing_payload":
      return Errors.missingPayload();
    case "payload_too_large":
      return Errors.payloadTooLarge(outcome.limit ?? 0);
    case "invalid_json_body":
      return Errors.invalidRequest(`Body is not valid JSON: ${outcome.details}`);
    case "invalid_fields":
      return Errors.invalidRequest(outcome.details);
  }
}

function gatewayFailureToApi(error: GatewayFailureReason): ApiError {
  switch (error.kind) {
    case "credential_missing":
      return Errors.credentialMissing();
    case "unauthenticated":
    case "upstream":
      return Errors.upstream(error.status, error.body);
    case "timeout":
      return Errors.timeout(error.timeoutMs);
    case "aborted":
      return Errors.clientClosed();
    case "network":
    case "malformed":
      return Errors.upstreamUnavailable(error.message);
  }
}

function normalizationFailureToApi(error: NormalizationError): ApiError {
  switch (error.kind) {
    case "blocked_or_empty":
      return Errors.contentBlocked(error.providerReason ?? error.finishReason);
    case "invalid_json":
      return Errors.invalidJson(
        error.truncated ? `${error.message} (model output appears truncated)` : error.message,
        error.rawText,
      );
    case "primary_content_empty":
      return Errors.primaryContentEmpty(error.field);
  }
}

function failureToApi(outcome: Exclude<GenerateOutcome, { kind: "success" }>): ApiError {
  switch (outcome.kind) {
    case "client_error":
      return clientErrorToApi(outcome);
    case "gateway_failure":
      return gatewayFailureToApi(outcome.error);
    case "normalization_failure":
      return normalizationFailureToApi(outcome.error);
  }
}

export function outcomeToResponse(outcome: GenerateOutcome): { status: number; body: LessonPlanResult | ErrorBody } {
  if (outcome.kind === "success") return { status: 200, body: outcome.plan };
  const apiError = failureToApi(outcome);
  return { status: apiError.status, body: apiError.body };
}
