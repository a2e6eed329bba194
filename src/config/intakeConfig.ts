// src/config/intakeConfig.ts
// Environment-backed settings, parsed once at startup.

import { z } from "zod";
import { DEFAULT_RULES_PATH } from "../intake/extraction/bottleneckIdentifier";
import {
  DEFAULT_STAGE_THRESHOLDS,
  type StageThresholds,
} from "../intake/flow/intakeStageMachine";
import type { ImplementationTier } from "../intake/types";

/**
 * How repeated bottleneck categories across turns are stored.
 * - by_name: a category already recorded for the consultation is skipped
 * - additive: every detection is stored
 */
export type BottleneckDedupPolicy = "by_name" | "additive";

export interface IntakeConfig {
  port: number;
  logLevel: string;
  databaseUrl: string | null;
  databaseUrlSource: "primary" | "backup" | null;
  rulesPath: string;
  topN: number;
  defaultTier: ImplementationTier;
  bottleneckDedup: BottleneckDedupPolicy;
  stageThresholds: StageThresholds;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const count = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const envSchema = z.object({
  PORT: count(3000, 1),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  ),
  DATABASE_URL: optionalText,
  DATABASE_URL_BACKUP: optionalText,
  INTAKE_RULES_PATH: z.preprocess(blankToUndefined, z.string().default(DEFAULT_RULES_PATH)),
  INTAKE_TOP_N: count(3, 1),
  INTAKE_DEFAULT_TIER: z.preprocess(
    blankToUndefined,
    z.enum(["starter", "growth", "enterprise"]).default("growth")
  ),
  INTAKE_BOTTLENECK_DEDUP: z.preprocess(
    blankToUndefined,
    z.enum(["by_name", "additive"]).default("by_name")
  ),
  INTAKE_OPENING_MIN_INFORMATIVE: count(DEFAULT_STAGE_THRESHOLDS.opening.minInformativeExchanges, 0),
  INTAKE_OPENING_MAX_TURNS: count(DEFAULT_STAGE_THRESHOLDS.opening.maxTurns, 1),
  INTAKE_DISCOVERY_MIN_INFORMATIVE: count(DEFAULT_STAGE_THRESHOLDS.discovery.minInformativeExchanges, 0),
  INTAKE_DISCOVERY_MAX_TURNS: count(DEFAULT_STAGE_THRESHOLDS.discovery.maxTurns, 1),
  INTAKE_DEEP_DIVE_MIN_INFORMATIVE: count(DEFAULT_STAGE_THRESHOLDS.deep_dive.minInformativeExchanges, 0),
  INTAKE_DEEP_DIVE_MAX_TURNS: count(DEFAULT_STAGE_THRESHOLDS.deep_dive.maxTurns, 1),
  INTAKE_SYNTHESIS_MIN_INFORMATIVE: count(DEFAULT_STAGE_THRESHOLDS.synthesis.minInformativeExchanges, 0),
  INTAKE_SYNTHESIS_MAX_TURNS: count(DEFAULT_STAGE_THRESHOLDS.synthesis.maxTurns, 1),
});

export class IntakeConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `invalid intake configuration: ${issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
    this.name = "IntakeConfigError";
    this.issues = issues;
  }
}

export function loadIntakeConfig(
  env: NodeJS.ProcessEnv = process.env
): Readonly<IntakeConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new IntakeConfigError(parsed.error.issues);
  }
  const e = parsed.data;

  // the primary URL wins; the backup is only read when the primary is unset
  let databaseUrl: string | null = null;
  let databaseUrlSource: IntakeConfig["databaseUrlSource"] = null;
  if (e.DATABASE_URL) {
    databaseUrl = e.DATABASE_URL;
    databaseUrlSource = "primary";
  } else if (e.DATABASE_URL_BACKUP) {
    databaseUrl = e.DATABASE_URL_BACKUP;
    databaseUrlSource = "backup";
  }

  return Object.freeze({
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    databaseUrl,
    databaseUrlSource,
    rulesPath: e.INTAKE_RULES_PATH,
    topN: e.INTAKE_TOP_N,
    defaultTier: e.INTAKE_DEFAULT_TIER,
    bottleneckDedup: e.INTAKE_BOTTLENECK_DEDUP,
    stageThresholds: {
      opening: {
        minInformativeExchanges: e.INTAKE_OPENING_MIN_INFORMATIVE,
        maxTurns: e.INTAKE_OPENING_MAX_TURNS,
      },
      discovery: {
        minInformativeExchanges: e.INTAKE_DISCOVERY_MIN_INFORMATIVE,
        maxTurns: e.INTAKE_DISCOVERY_MAX_TURNS,
      },
      deep_dive: {
        minInformativeExchanges: e.INTAKE_DEEP_DIVE_MIN_INFORMATIVE,
        maxTurns: e.INTAKE_DEEP_DIVE_MAX_TURNS,
      },
      synthesis: {
        minInformativeExchanges: e.INTAKE_SYNTHESIS_MIN_INFORMATIVE,
        maxTurns: e.INTAKE_SYNTHESIS_MAX_TURNS,
      },
    },
  });
}
