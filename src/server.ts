import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("SKILL_MATCH_MODE", { mode: env.skillMatchMode });
    logger.info("LOG_WEBHOOK", {
      enabled: env.logWebhookEnabled,
      urlConfigured: Boolean(env.logWebhookUrl),
      level: env.logWebhookLevel,
    });
  });
}

bootstrap();
