// src/error.ts
// Error taxonomy and the response bodies each kind produces

/**
 * Error response body. `content` carries the raw model text when the model
 * answered with something that could not be parsed.
 */
export interface ErrorBody {
  error: string;
  details?: string;
  content?: string;
  [key: string]: unknown;
}

export type ErrorCode =
  | "client_input"
  | "payload_too_large"
  | "credential_missing"
  | "upstream_transport"
  | "upstream_timeout"
  | "client_closed"
  | "content_blocked"
  | "invalid_json_from_model"
  | "primary_content_empty"
  | "forbidden_origin"
  | "not_found"
  | "method_not_allowed"
  | "internal_error";

export interface ApiError {
  code: ErrorCode;
  status: number;
  body: ErrorBody;
}

/**
 * Create a standardized error object (not a response)
 */
export function createErrorObject(code: ErrorCode, status: number, error: string, details?: string): ApiError {
  return { code, status, body: details === undefined ? { error } : { error, details } };
}

/**
 * Common error responses
 */
export const Errors = {
  /** 400 - Invalid or missing request fields */
  invalidRequest: (details: string) => createErrorObject("client_input", 400, "Invalid request", details),

  /** 400 - Body absent or empty */
  missingPayload: () =>
    createErrorObject("client_input", 400, "No request payload provided", "POST a JSON object describing the lesson"),

  /** 413 - Body over the configured cap */
  payloadTooLarge: (limit: number) =>
    createErrorObject("payload_too_large", 413, "Request payload too large", `Limit is ${limit} bytes`),

  /** 500 - No usable provider credential */
  credentialMissing: () => createErrorObject("credential_missing", 500, "API key not set in environment"),

  /** 500 - Provider answered with a non-success status */
  upstream: (status: number, body: string) =>
    createErrorObject("upstream_transport", 500, `AI Error: ${status}`, body),

  /** 500 - Provider could not be reached or answered garbage */
  upstreamUnavailable: (details: string) =>
    createErrorObject("upstream_transport", 500, "AI provider unavailable", details),

  /** 500 - Provider did not answer in time */
  timeout: (timeoutMs: number) =>
    createErrorObject("upstream_timeout", 500, "AI request timed out", `No response within ${timeoutMs} ms`),

  /** 499 - Client went away mid-request */
  clientClosed: () => createErrorObject("client_closed", 499, "Client closed request"),

  /** 400 - Provider blocked the content or returned nothing */
  contentBlocked: (reason: string) =>
    createErrorObject("content_blocked", 400, "Content blocked or empty", `Finish reason: ${reason}`),

  /** 500 - Model output is not JSON; raw text returned for diagnosis */
  invalidJson: (details: string, rawText: string): ApiError => ({
    code: "invalid_json_from_model",
    status: 500,
    body: { error: "Model returned invalid JSON", details, content: rawText },
  }),

  /** 500 - Parsed fine but the main section is empty */
  primaryContentEmpty: (field: string) =>
    createErrorObject("primary_content_empty", 500, "Model returned an empty lesson body", `Field "${field}" is empty`),

  /** 403 - Origin not allowed */
  forbiddenOrigin: () => createErrorObject("forbidden_origin", 403, "Request origin not allowed"),

  /** 404 - Route not found */
  notFound: (path: string) => createErrorObject("not_found", 404, "Not found", `No route for ${path}`),

  /** 405 - Method not allowed */
  methodNotAllowed: (method: string) =>
    createErrorObject("method_not_allowed", 405, "Method not allowed", `HTTP method ${method} not allowed`),

  /** 500 - Internal server error */
  internal: (details: string) => createErrorObject("internal_error", 500, "Internal server error", details),
};
