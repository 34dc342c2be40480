import http from "node:http";
import type { LlmGateway } from "./ai.js";
import type { AppConfig } from "./config.js";
import { isOriginAllowed, stdHeaders } from "./cors.js";
import { Errors, type ApiError } from "./error.js";
import { handleGenerate, outcomeToResponse, type GenerateDeps } from "./handlers/generate.js";
import { health } from "./handlers/health.js";
import { getRequestId, readBody, send } from "./http.js";
import { getTemplate } from "./lesson/templates.js";
import { createLogger, type Logger } from "./log.js";

export interface ServerDeps {
  config: AppConfig;
  /** Null runs the server in degraded mode: every generation fails with a credential error. */
  gateway: LlmGateway | null;
  logger?: Logger;
}

type RouteHandler = (req: http.IncomingMessage, res: http.ServerResponse, requestId: string) => Promise<void>;

export function createServer({ config, gateway, logger = createLogger("server") }: ServerDeps): http.Server {
  const template = getTemplate(config.templateId);
  const generateDeps: GenerateDeps = {
    gateway,
    template,
    sampling: config.sampling,
    rawLogMaxChars: config.rawLogMaxChars,
    logger,
  };

  const headersFor = (requestId: string) => stdHeaders(config.corsOrigin, { "X-Request-Id": requestId });
  const sendError = (res: http.ServerResponse, requestId: string, err: ApiError, extra?: Record<string, string>) =>
    send(res, err.status, err.body, { ...headersFor(requestId), ...(extra || {}) });

  const routes: Record<string, Partial<Record<string, RouteHandler>>> = {
    "/": {
      GET: async (_req, res, requestId) => {
        send(res, 200, health({ gateway, templateId: template.id }), headersFor(requestId));
      },
    },
    "/generate": {
      POST: async (req, res, requestId) => {
        const controller = new AbortController();
        res.on("close", () => {
          if (!res.writableFinished) controller.abort();
        });

        const outcome = await handleGenerate(() => readBody(req, config.maxBodyBytes), generateDeps, {
          requestId,
          signal: controller.signal,
        });

        if (outcome.kind === "gateway_failure" && outcome.error.kind === "aborted") {
          logger.warn("Client disconnected before the lesson plan was ready", { requestId });
          return;
        }
        if (outcome.kind === "normalization_failure") {
          logger.warn("Lesson plan normalization failed", { requestId, reason: outcome.error.kind });
        }

        const { status, body } = outcomeToResponse(outcome);
        send(res, status, body, headersFor(requestId));
      },
    },
  };

  return http.createServer((req, res) => {
    const requestId = getRequestId(req);
    const startedAt = Date.now();
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    res.on("finish", () => {
      logger.info(`${req.method} ${path} ${res.statusCode}`, { requestId, durationMs: Date.now() - startedAt });
    });

    const dispatch = async () => {
      if (req.method === "OPTIONS") {
        if (!isOriginAllowed(req, config.corsOrigin)) return sendError(res, requestId, Errors.forbiddenOrigin());
        res.writeHead(204, headersFor(requestId));
        res.end();
        return;
      }

      const route = routes[path];
      if (!route) return sendError(res, requestId, Errors.notFound(path));

      const handler = route[req.method ?? "GET"];
      if (!handler) {
        return sendError(res, requestId, Errors.methodNotAllowed(req.method ?? "UNKNOWN"), {
          Allow: Object.keys(route).concat("OPTIONS").join(", "),
        });
      }
      await handler(req, res, requestId);
    };

    dispatch().catch((error: unknown) => {
      logger.error("Unhandled request error", error, { requestId, path });
      sendError(res, requestId, Errors.internal(error instanceof Error ? error.message : String(error)));
    });
  });
}
