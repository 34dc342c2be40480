import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import { CredentialMissingError, mapFinishReason, type SamplingConfig } from "../src/ai";
import {
  GEMINI_BASE_URL,
  GEMINI_FINISH_REASONS,
  GeminiGateway,
  OPENROUTER_FINISH_REASONS,
  OPENROUTER_URL,
  OpenRouterGateway,
  createGateway,
} from "../src/ai-providers";
import { loadConfig } from "../src/config";
import { TEMPLATES } from "../src/lesson/templates";

const sampling: SamplingConfig = {
  temperature: 0.5,
  maxOutputTokens: 512,
  topP: 0.9,
  frequencyPenalty: 0.2,
  presencePenalty: 0.2,
  jsonMode: true,
  responseSchema: TEMPLATES.flat.responseSchema,
};

const opts = { apiKey: "test-secret", apiKeyVar: "TEST_KEY", model: "test-model", timeoutMs: 5_000 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

let fetchSpy: jest.SpiedFunction<typeof fetch>;

beforeEach(() => {
  fetchSpy = jest.spyOn(globalThis, "fetch");
});

afterEach(() => {
  fetchSpy.mockRestore();
});

function lastRequest(): { url: string; headers: Headers; body: unknown } {
  const [input, init] = fetchSpy.mock.calls[fetchSpy.mock.calls.length - 1];
  return {
    url: String(input),
    headers: new Headers(init?.headers),
    body: JSON.parse(String(init?.body)),
  };
}

describe("finish reason tables", () => {
  it("maps each provider vocabulary onto the shared enum", () => {
    expect(mapFinishReason(OPENROUTER_FINISH_REASONS, "stop")).toBe("STOP");
    expect(mapFinishReason(OPENROUTER_FINISH_REASONS, "length")).toBe("LENGTH");
    expect(mapFinishReason(OPENROUTER_FINISH_REASONS, "content_filter")).toBe("SAFETY");
    expect(mapFinishReason(GEMINI_FINISH_REASONS, "MAX_TOKENS")).toBe("LENGTH");
    expect(mapFinishReason(GEMINI_FINISH_REASONS, "RECITATION")).toBe("RECITATION");
    expect(mapFinishReason(GEMINI_FINISH_REASONS, "PROHIBITED_CONTENT")).toBe("SAFETY");
  });

  it("falls back to UNKNOWN for missing or unlisted values", () => {
    expect(mapFinishReason(OPENROUTER_FINISH_REASONS, null)).toBe("UNKNOWN");
    expect(mapFinishReason(GEMINI_FINISH_REASONS, "SOMETHING_NEW")).toBe("UNKNOWN");
  });

  it("ignores values that name Object prototype members", () => {
    expect(mapFinishReason(OPENROUTER_FINISH_REASONS, "constructor")).toBe("UNKNOWN");
    expect(mapFinishReason(GEMINI_FINISH_REASONS, "toString")).toBe("UNKNOWN");
  });
});

describe("OpenRouterGateway", () => {
  it("refuses to construct without a credential", () => {
    expect(() => new OpenRouterGateway({ ...opts, apiKey: "  " })).toThrow(CredentialMissingError);
  });

  it("sends the chat completion request with sampling and JSON mode", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: '  {"phase1":"x"}  ' }, finish_reason: "stop" }] }),
    );
    const gateway = new OpenRouterGateway(opts);

    const result = await gateway.generate({ systemInstruction: "SYS", userMessage: "USER", sampling });

    expect(result).toEqual({
      ok: true,
      output: { text: '{"phase1":"x"}', finishReason: "STOP", providerFinishReason: "stop" },
    });
    const req = lastRequest();
    expect(req.url).toBe(OPENROUTER_URL);
    expect(req.headers.get("Authorization")).toBe("Bearer test-secret");
    expect(req.body).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "SYS" },
        { role: "user", content: "USER" },
      ],
      temperature: 0.5,
      max_tokens: 512,
      top_p: 0.9,
      frequency_penalty: 0.2,
      presence_penalty: 0.2,
      response_format: { type: "json_object" },
    });
  });

  it("omits response_format when JSON mode is off", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ choices: [{ message: { content: "plan" }, finish_reason: "stop" }] }));
    await new OpenRouterGateway(opts).generate({
      systemInstruction: "S",
      userMessage: "U",
      sampling: { ...sampling, jsonMode: false },
    });
    expect(lastRequest().body).not.toHaveProperty("response_format");
  });

  it("surfaces filtered content as a successful empty result", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ choices: [{ message: { content: null }, finish_reason: "content_filter" }] }));
    const result = await new OpenRouterGateway(opts).generate({ systemInstruction: "S", userMessage: "U", sampling });
    expect(result).toEqual({
      ok: true,
      output: { text: "", finishReason: "SAFETY", providerFinishReason: "content_filter" },
    });
  });

  it("classifies rejected credentials and other HTTP failures", async () => {
    const gateway = new OpenRouterGateway(opts);

    fetchSpy.mockResolvedValueOnce(new Response("bad key", { status: 401 }));
    expect(await gateway.generate({ systemInstruction: "S", userMessage: "U", sampling })).toEqual({
      ok: false,
      error: { kind: "unauthenticated", status: 401, body: "bad key" },
    });

    fetchSpy.mockResolvedValueOnce(new Response("rate limited", { status: 429 }));
    expect(await gateway.generate({ systemInstruction: "S", userMessage: "U", sampling })).toEqual({
      ok: false,
      error: { kind: "upstream", status: 429, body: "rate limited" },
    });
  });

  it("reads errors reported inside a 200 envelope", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: { message: "Provider returned error", code: 503 } }));
    expect(await new OpenRouterGateway(opts).generate({ systemInstruction: "S", userMessage: "U", sampling })).toEqual({
      ok: false,
      error: { kind: "upstream", status: 503, body: "Provider returned error" },
    });
  });

  it("reports non-JSON success bodies as malformed", async () => {
    fetchSpy.mockResolvedValue(new Response("<html>oops</html>", { status: 200 }));
    const result = await new OpenRouterGateway(opts).generate({ systemInstruction: "S", userMessage: "U", sampling });
    expect(result).toEqual({ ok: false, error: { kind: "malformed", message: "Unexpected chat completion payload" } });
  });

  it("reports transport failures as network errors", async () => {
    fetchSpy.mockRejectedValue(new TypeError("fetch failed"));
    const result = await new OpenRouterGateway(opts).generate({ systemInstruction: "S", userMessage: "U", sampling });
    expect(result).toEqual({ ok: false, error: { kind: "network", message: "fetch failed" } });
  });
});

describe("request deadlines", () => {
  function hangUntilAborted(): void {
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
        }),
    );
  }

  it("times out a provider that never answers", async () => {
    hangUntilAborted();
    const gateway = new OpenRouterGateway({ ...opts, timeoutMs: 20 });
    expect(await gateway.generate({ systemInstruction: "S", userMessage: "U", sampling })).toEqual({
      ok: false,
      error: { kind: "timeout", timeoutMs: 20 },
    });
  });

  it("aborts when the caller's signal fires", async () => {
    hangUntilAborted();
    const controller = new AbortController();
    const pending = new GeminiGateway(opts).generate({
      systemInstruction: "S",
      userMessage: "U",
      sampling,
      signal: controller.signal,
    });
    controller.abort();
    expect(await pending).toEqual({ ok: false, error: { kind: "aborted" } });
  });

  it("does not call the provider with an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await new OpenRouterGateway(opts).generate({
      systemInstruction: "S",
      userMessage: "U",
      sampling,
      signal: controller.signal,
    });
    expect(result).toEqual({ ok: false, error: { kind: "aborted" } });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe("GeminiGateway", () => {
  it("sends generateContent with the response schema", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({
        candidates: [{ content: { parts: [{ text: '{"phase1":' }, { text: '"x"}' }] }, finishReason: "STOP" }],
      }),
    );
    const result = await new GeminiGateway(opts).generate({ systemInstruction: "SYS", userMessage: "USER", sampling });

    expect(result).toEqual({
      ok: true,
      output: { text: '{"phase1":"x"}', finishReason: "STOP", providerFinishReason: "STOP" },
    });
    const req = lastRequest();
    expect(req.url).toBe(`${GEMINI_BASE_URL}/test-model:generateContent`);
    expect(req.headers.get("x-goog-api-key")).toBe("test-secret");
    expect(req.body).toEqual({
      systemInstruction: { parts: [{ text: "SYS" }] },
      contents: [{ role: "user", parts: [{ text: "USER" }] }],
      generationConfig: {
        temperature: 0.5,
        maxOutputTokens: 512,
        topP: 0.9,
        responseMimeType: "application/json",
        responseSchema: TEMPLATES.flat.responseSchema,
      },
    });
  });

  it("maps a blocked prompt to an empty SAFETY result", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ promptFeedback: { blockReason: "PROHIBITED_CONTENT" } }));
    expect(await new GeminiGateway(opts).generate({ systemInstruction: "S", userMessage: "U", sampling })).toEqual({
      ok: true,
      output: { text: "", finishReason: "SAFETY", providerFinishReason: "PROHIBITED_CONTENT" },
    });
  });

  it("keeps truncated text with a LENGTH finish reason", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({ candidates: [{ content: { parts: [{ text: '{"phase1":"x"' }] }, finishReason: "MAX_TOKENS" }] }),
    );
    expect(await new GeminiGateway(opts).generate({ systemInstruction: "S", userMessage: "U", sampling })).toEqual({
      ok: true,
      output: { text: '{"phase1":"x"', finishReason: "LENGTH", providerFinishReason: "MAX_TOKENS" },
    });
  });
});

describe("createGateway", () => {
  it("builds the configured provider", () => {
    const gateway = createGateway(loadConfig({ LLM_PROVIDER: "gemini", GEMINI_API_KEY: "test-secret" }));
    expect(gateway).toBeInstanceOf(GeminiGateway);
    expect(gateway.model).toBe("gemini-1.5-flash");
  });

  it("throws CredentialMissingError naming the variable", () => {
    expect(() => createGateway(loadConfig({}))).toThrow("BLOCKED: OPENROUTER_API_KEY is REQUIRED");
  });
});
