import { createGateway } from "./ai-providers.js";
import { CredentialMissingError, type LlmGateway } from "./ai.js";
import { ConfigError, loadConfig, loadEnvFiles, type AppConfig } from "./config.js";
import { createLogger } from "./log.js";
import { createServer } from "./server.js";

const logger = createLogger("boot");

/**
 * Missing credentials stop the process unless degraded start was asked for,
 * in which case the server answers every generation with a credential error.
 */
function bootGateway(config: AppConfig): LlmGateway | null {
  try {
    return createGateway(config);
  } catch (e) {
    if (!(e instanceof CredentialMissingError)) throw e;
    if (!config.allowDegradedStart) throw e;
    logger.warn("!!! No LLM credential configured; every /generate request will fail !!!", {
      variable: e.variable,
      provider: config.provider,
    });
    return null;
  }
}

function main(): void {
  loadEnvFiles();

  let config: AppConfig;
  let gateway: LlmGateway | null;
  try {
    config = loadConfig();
    gateway = bootGateway(config);
  } catch (e) {
    if (e instanceof ConfigError || e instanceof CredentialMissingError) {
      logger.error("Refusing to start: configuration is incomplete", e);
      process.exit(1);
    }
    throw e;
  }

  const server = createServer({ config, gateway, logger: createLogger("server") });
  server.listen(config.port, config.host, () => {
    logger.info(`Lesson plan relay listening on http://${config.host}:${config.port}`, {
      provider: config.provider,
      model: config.model,
      template: config.templateId,
      corsOrigin: config.corsOrigin,
    });
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}; closing server`);
    server.close((err) => {
      if (err) {
        logger.error("Error while closing server", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

main();
