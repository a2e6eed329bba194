import "dotenv/config";

import express from "express";
import pino from "pino";
import { loadIntakeConfig } from "./config/intakeConfig";
import { registerConsultationRoutes } from "./intake/http/consultationRoutes";
import { createIntakeRuntime } from "./intake/runtime";

const config = loadIntakeConfig();
const logger = pino({ level: config.logLevel });

const app = express();
app.use(express.json({ limit: "1mb" }));

const runtime = createIntakeRuntime(config, logger);

// config snapshot for troubleshooting (never the URL itself)
logger.info(
  {
    port: config.port,
    store: runtime.storeKind,
    databaseUrlSource: config.databaseUrlSource,
    rulesPath: config.rulesPath,
    bottleneckDedup: config.bottleneckDedup,
    defaultTier: config.defaultTier,
  },
  "[startup] intake configuration"
);

app.get("/health", (_req, res) => {
  res.json({ ok: true, store: runtime.storeKind });
});

registerConsultationRoutes(app, logger, { orchestrator: runtime.orchestrator });

async function startServer() {
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: process.env.NODE_ENV }, "server listening");
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    server.close(() => {
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error }, "failed to close the consultation store");
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((error) => {
  logger.error({ error }, "fatal error during server startup");
  process.exit(1);
});
