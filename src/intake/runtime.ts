// src/intake/runtime.ts
// Wires config, store and rules into an orchestrator for the server and scripts.

import { Pool } from "pg";
import type pino from "pino";
import type { IntakeConfig } from "../config/intakeConfig";
import type { ConsultationStore } from "../repositories/consultationStore";
import { InMemoryConsultationStore } from "../repositories/inMemoryConsultationStore";
import { createPoolQuery, PgConsultationStore } from "../repositories/pgConsultationStore";
import { loadBottleneckRules } from "./extraction/bottleneckIdentifier";
import { ConsultationOrchestrator } from "./orchestrator/consultationOrchestrator";

export interface IntakeRuntime {
  orchestrator: ConsultationOrchestrator;
  store: ConsultationStore;
  storeKind: "postgres" | "memory";
  close(): Promise<void>;
}

export function createIntakeRuntime(
  config: Readonly<IntakeConfig>,
  logger: pino.Logger
): IntakeRuntime {
  const rules = loadBottleneckRules(config.rulesPath, logger);

  let store: ConsultationStore;
  let pool: Pool | null = null;
  if (config.databaseUrl) {
    pool = new Pool({ connectionString: config.databaseUrl });
    store = new PgConsultationStore({ query: createPoolQuery(pool) });
    logger.info(
      { databaseUrlSource: config.databaseUrlSource },
      "[runtime] using PostgreSQL consultation store"
    );
  } else {
    store = new InMemoryConsultationStore();
    logger.warn("[runtime] no database URL configured, consultations are kept in memory");
  }

  const orchestrator = new ConsultationOrchestrator({
    store,
    logger,
    config,
    rules,
  });

  return {
    orchestrator,
    store,
    storeKind: pool ? "postgres" : "memory",
    close: async () => {
      if (pool) await pool.end();
    },
  };
}
